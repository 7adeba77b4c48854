import { NoopLogger, toError, type Logger, type TrackedTransport, type TransportHeartBeat } from "pushline-long-polling-server-transport";

export type HeartBeatOptions = {
  /** How often tracked connections are checked */
  readonly heartbeatIntervalMs: number;
  /** How long a poll may be held open before it is timed out */
  readonly connectionTimeoutMs: number;
  /** Grace period, on top of the transport's threshold, before a silent connection is dropped */
  readonly disconnectTimeoutMs: number;
};

type TrackedConnection = {
  readonly transport: TrackedTransport;
  readonly trackedAt: number;
  lastMarkedAt: number;
};

/**
 * Liveness registry for a single process.
 *
 * Every sweep times out polls held longer than `connectionTimeoutMs` and
 * disconnects connections whose client has not come back within the
 * transport's disconnect threshold plus `disconnectTimeoutMs`.
 */
export class InMemoryTransportHeartBeat implements TransportHeartBeat {
  private readonly connections = new Map<string, TrackedConnection>();
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly options: HeartBeatOptions,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  get size(): number {
    return this.connections.size;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.options.heartbeatIntervalMs);
    this.timer.unref();
  }

  close(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.connections.clear();
  }

  addConnection(transport: TrackedTransport): boolean {
    const now = Date.now();
    const isNewConnection = !this.connections.has(transport.connectionId);
    // A new poll for a known connection replaces the previous transport
    this.connections.set(transport.connectionId, { transport, trackedAt: now, lastMarkedAt: now });
    return isNewConnection;
  }

  markConnection(transport: TrackedTransport): void {
    const tracked = this.connections.get(transport.connectionId);
    if (tracked) {
      tracked.lastMarkedAt = Date.now();
    }
  }

  removeConnection(transport: TrackedTransport): void {
    const tracked = this.connections.get(transport.connectionId);
    if (tracked?.transport === transport) {
      this.connections.delete(transport.connectionId);
    }
  }

  private sweep(): void {
    const now = Date.now();

    for (const [connectionId, tracked] of this.connections) {
      const { transport } = tracked;

      if (transport.isAlive) {
        if (!transport.isTimedOut && now - tracked.trackedAt >= this.options.connectionTimeoutMs) {
          this.logger.debug("Timing out long poll", { component: "heartbeat", connectionId });
          transport.timeout();
        }
        continue;
      }

      if (now - tracked.lastMarkedAt >= transport.disconnectThresholdMs + this.options.disconnectTimeoutMs) {
        this.connections.delete(connectionId);
        this.logger.info("Connection disconnected", { component: "heartbeat", connectionId });
        transport.disconnect().catch((err: unknown) => {
          this.logger.error("Failed to disconnect connection", toError(err), { component: "heartbeat", connectionId });
        });
      }
    }
  }
}
