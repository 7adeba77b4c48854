import { z } from "zod";

const envSchema = z.object({
  PUSHLINE_HOST: z.string().min(1).default("0.0.0.0"),
  PUSHLINE_PORT: z.coerce.number().int().min(0).max(65535).default(3333),
  PUSHLINE_ENDPOINT: z.string().startsWith("/").default("/push"),
  PUSHLINE_POLL_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  PUSHLINE_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  PUSHLINE_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(110_000),
  PUSHLINE_DISCONNECT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(20_000),
  PUSHLINE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type ServerConfig = {
  readonly host: string;
  readonly port: number;
  readonly endpoint: string;
  readonly pollDelayMs: number;
  readonly heartbeatIntervalMs: number;
  readonly connectionTimeoutMs: number;
  readonly disconnectTimeoutMs: number;
  readonly logLevel: "debug" | "info" | "warn" | "error";
};

export const getServerConfig = (env: Record<string, string | undefined> = process.env): ServerConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.map((segment) => String(segment)).join(".")}: ${issue.message}`);
    throw new Error(`Invalid server configuration: ${details.join("; ")}`);
  }

  const parsed = result.data;
  return {
    host: parsed.PUSHLINE_HOST,
    port: parsed.PUSHLINE_PORT,
    endpoint: parsed.PUSHLINE_ENDPOINT,
    pollDelayMs: parsed.PUSHLINE_POLL_DELAY_MS,
    heartbeatIntervalMs: parsed.PUSHLINE_HEARTBEAT_INTERVAL_MS,
    connectionTimeoutMs: parsed.PUSHLINE_CONNECTION_TIMEOUT_MS,
    disconnectTimeoutMs: parsed.PUSHLINE_DISCONNECT_TIMEOUT_MS,
    logLevel: parsed.PUSHLINE_LOG_LEVEL
  };
};
