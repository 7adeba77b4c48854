import {
  LongPollingTransport,
  NoopLogger,
  type HostContext,
  type HostResponse
} from "pushline-long-polling-server-transport";

import { attachEchoApplication } from "./echo-app";
import { InMemoryTransportHeartBeat } from "./heartbeat/memory";
import { InMemoryMessageStore } from "./message-store/memory";

class RecordingResponse implements HostResponse {
  ended = false;
  body = "";

  setContentType(_contentType: string): void {}

  write(chunk: string): void {
    this.body += chunk;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function createRequest(path: string, params: Record<string, string>, form: Record<string, string> = {}) {
  const url = new URL(`http://localhost${path}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  const response = new RecordingResponse();
  const context: HostContext = {
    request: { url, query: url.searchParams, form: async () => new URLSearchParams(form) },
    response,
    signal: new AbortController().signal
  };
  return { context, response };
}

describe("echo application over long polling", () => {
  let store: InMemoryMessageStore;
  let heartBeat: InMemoryTransportHeartBeat;

  const handle = (path: string, params: Record<string, string>, form?: Record<string, string>) => {
    const { context, response } = createRequest(path, params, form);
    const transport = new LongPollingTransport({ context, heartBeat });
    attachEchoApplication(transport, store, new NoopLogger());
    const task = transport.processRequest(store.connection(transport.connectionId));
    if (!task) {
      throw new Error(`Unhandled request: ${path}`);
    }
    return { transport, response, task };
  };

  beforeEach(() => {
    jest.useFakeTimers();
    store = new InMemoryMessageStore();
    heartBeat = new InMemoryTransportHeartBeat({ heartbeatIntervalMs: 1000, connectionTimeoutMs: 5000, disconnectTimeoutMs: 2000 });
    heartBeat.start();
  });

  afterEach(() => {
    heartBeat.close();
    jest.useRealTimers();
  });

  it("should deliver the welcome message in the connect response", async () => {
    const { response, task } = handle("/push/connect", { connectionId: "c1" });
    await task;

    expect(JSON.parse(response.body)).toMatchObject({
      messages: [{ id: "1", payload: { type: "welcome", connectionId: "c1" } }],
      lastId: "1",
      aborted: false,
      timedOut: false
    });
    expect(heartBeat.size).toBe(1);
  });

  it("should echo sent data on the next poll", async () => {
    await handle("/push/connect", { connectionId: "c1" }).task;

    const send = handle("/push/send", { connectionId: "c1" }, { data: "hi" });
    await send.task;
    expect(send.response.body).toBe("");

    const poll = handle("/push", { connectionId: "c1", messageId: "1" });
    await poll.task;

    expect(JSON.parse(poll.response.body)).toMatchObject({
      messages: [{ id: "2", payload: { type: "echo", data: "hi" } }],
      lastId: "2"
    });
  });

  it("should answer a waiting poll as aborted and forget the connection on abort", async () => {
    await handle("/push/connect", { connectionId: "c1" }).task;
    const poll = handle("/push", { connectionId: "c1", messageId: "1" });

    await handle("/push/abort", { connectionId: "c1" }).task;
    await poll.task;

    expect(JSON.parse(poll.response.body)).toEqual({ messages: [], lastId: "1", aborted: true, timedOut: false });
    expect(heartBeat.size).toBe(0);
    expect(store.size).toBe(0);
    expect(store.publish("c1", "after abort")).toBeUndefined();
  });

  it("should keep no state for sends and aborts of connections that never polled", async () => {
    for (let i = 0; i < 10; i++) {
      await handle("/push/send", { connectionId: `stray-send-${i}` }, { data: "hi" }).task;
      await handle("/push/abort", { connectionId: `stray-abort-${i}` }).task;
    }

    jest.advanceTimersByTime(60_000);

    expect(store.size).toBe(0);
    expect(heartBeat.size).toBe(0);
  });

  it("should time out a poll held open too long", async () => {
    const poll = handle("/push", { connectionId: "c1", messageId: "0" });

    jest.advanceTimersByTime(5000);
    await poll.task;

    expect(JSON.parse(poll.response.body)).toEqual({ messages: [], lastId: "0", aborted: false, timedOut: true });
    expect(poll.transport.state).toBe("completed");
  });

  it("should disconnect a client that does not poll again", async () => {
    await handle("/push/connect", { connectionId: "c1" }).task;

    jest.advanceTimersByTime(1000);
    expect(heartBeat.size).toBe(1);

    jest.advanceTimersByTime(1000);
    expect(heartBeat.size).toBe(0);
    expect(store.size).toBe(0);
  });
});
