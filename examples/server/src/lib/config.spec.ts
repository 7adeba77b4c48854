import { getServerConfig } from "./config";

describe("getServerConfig", () => {
  it("should apply defaults to an empty environment", () => {
    expect(getServerConfig({})).toEqual({
      host: "0.0.0.0",
      port: 3333,
      endpoint: "/push",
      pollDelayMs: 0,
      heartbeatIntervalMs: 10_000,
      connectionTimeoutMs: 110_000,
      disconnectTimeoutMs: 20_000,
      logLevel: "info"
    });
  });

  it("should coerce numeric variables", () => {
    const config = getServerConfig({
      PUSHLINE_PORT: "8080",
      PUSHLINE_POLL_DELAY_MS: "2000",
      PUSHLINE_ENDPOINT: "/events",
      PUSHLINE_LOG_LEVEL: "debug"
    });

    expect(config).toMatchObject({ port: 8080, pollDelayMs: 2000, endpoint: "/events", logLevel: "debug" });
  });

  it("should reject invalid values", () => {
    expect(() => getServerConfig({ PUSHLINE_PORT: "70000" })).toThrow(/^Invalid server configuration: PUSHLINE_PORT: /);
    expect(() => getServerConfig({ PUSHLINE_ENDPOINT: "push" })).toThrow(/PUSHLINE_ENDPOINT/);
    expect(() => getServerConfig({ PUSHLINE_LOG_LEVEL: "verbose" })).toThrow(/PUSHLINE_LOG_LEVEL/);
  });
});
