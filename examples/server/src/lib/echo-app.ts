import type { Logger, LongPollingTransport } from "pushline-long-polling-server-transport";

import type { InMemoryMessageStore } from "./message-store/memory";

/**
 * Wires a transport to a tiny echo application: a new connection gets a
 * welcome message, every payload it sends is published back to it.
 */
export const attachEchoApplication = (transport: LongPollingTransport, store: InMemoryMessageStore, log: Logger): void => {
  const connectionId = transport.connectionId;

  transport.connected = async () => {
    log.info("Connection established", { connectionId });
    store.publish(connectionId, { type: "welcome", connectionId });
  };

  transport.reconnected = async () => {
    log.info("Connection re-established", { connectionId });
  };

  transport.received = async (data) => {
    if (data === null) return;
    store.publish(connectionId, { type: "echo", data });
  };

  transport.disconnected = async () => {
    log.info("Connection closed", { connectionId });
    store.remove(connectionId);
  };

  transport.error = (err) => {
    log.warn("Request failed", { connectionId, error: err.message });
  };
};
