import { createServer } from "node:http";

import { ConsoleLogger } from "pushline-long-polling-server-transport";

import { getServerConfig } from "./lib/config";
import { InMemoryTransportHeartBeat } from "./lib/heartbeat/memory";
import { InMemoryMessageStore } from "./lib/message-store/memory";
import { createRequestListener } from "./lib/server";

const main = async (): Promise<void> => {
  const config = getServerConfig();
  const log = new ConsoleLogger(config.logLevel, "[pushline-example]");

  const store = new InMemoryMessageStore();
  const heartBeat = new InMemoryTransportHeartBeat(
    {
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      connectionTimeoutMs: config.connectionTimeoutMs,
      disconnectTimeoutMs: config.disconnectTimeoutMs
    },
    log
  );
  const shutdown = new AbortController();

  const server = createServer(
    createRequestListener({
      endpoint: config.endpoint,
      store,
      heartBeat,
      transport: { pollDelayMs: config.pollDelayMs },
      shutdownSignal: shutdown.signal,
      log
    })
  );

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => resolve());
  });
  heartBeat.start();

  log.info("Long-polling example server is running", {
    url: `http://${config.host}:${config.port}${config.endpoint}`,
    health: `http://${config.host}:${config.port}/health`,
    readiness: `http://${config.host}:${config.port}/readiness`,
    pollDelayMs: config.pollDelayMs
  });

  const stop = async (signal: string) => {
    log.info(`Shutting down (${signal})`);
    // Ends every pending poll without a response
    shutdown.abort(new Error(`Received ${signal}`));
    heartBeat.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };

  process.on("SIGINT", () => void stop("SIGINT"));
  process.on("SIGTERM", () => void stop("SIGTERM"));
};

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error in long-polling example server", err);
  process.exit(1);
});
