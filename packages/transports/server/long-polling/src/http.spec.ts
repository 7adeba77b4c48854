import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";

import { createNodeHostContext, readFormBody } from "./http";
import type { TransportHeartBeat } from "./interfaces";
import { LongPollingTransport } from "./transport";

function createRequest(url: string, headers: Record<string, string> = {}, body?: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  req.method = body === undefined ? "GET" : "POST";
  req.headers = { host: "example.test", ...headers };
  if (body !== undefined) {
    req.push(body);
  }
  req.push(null);
  return req;
}

describe("readFormBody", () => {
  it("should parse a form-encoded body", async () => {
    const req = createRequest("/push/send", { "content-type": "application/x-www-form-urlencoded" }, "data=hello%20world&x=1");

    const form = await readFormBody(req);

    expect(form.get("data")).toBe("hello world");
    expect(form.get("x")).toBe("1");
  });

  it("should accept a charset on the form content type", async () => {
    const req = createRequest("/push/send", { "content-type": "application/x-www-form-urlencoded; charset=UTF-8" }, "data=a");

    expect((await readFormBody(req)).get("data")).toBe("a");
  });

  it("should yield empty parameters for other content types", async () => {
    const req = createRequest("/push/send", { "content-type": "application/json" }, '{"data":"hello"}');

    expect([...(await readFormBody(req)).keys()]).toEqual([]);
  });
});

describe("createNodeHostContext", () => {
  it("should expose the request url and query", () => {
    const req = createRequest("/push/connect?connectionId=c1&messageId=4");
    const context = createNodeHostContext(req, new ServerResponse(req));

    expect(context.request.url.pathname).toBe("/push/connect");
    expect(context.request.url.host).toBe("example.test");
    expect(context.request.query.get("connectionId")).toBe("c1");
    expect(context.request.query.get("messageId")).toBe("4");
  });

  it("should read the form body once", async () => {
    const req = createRequest("/push/send?connectionId=c1", { "content-type": "application/x-www-form-urlencoded" }, "data=hi");
    const context = createNodeHostContext(req, new ServerResponse(req));

    const first = context.request.form();

    expect(context.request.form()).toBe(first);
    expect((await first).get("data")).toBe("hi");
  });

  it("should set the content type header", () => {
    const req = createRequest("/push");
    const res = new ServerResponse(req);
    const context = createNodeHostContext(req, res);

    context.response.setContentType("text/javascript; charset=UTF-8");

    expect(res.getHeader("Content-Type")).toBe("text/javascript; charset=UTF-8");
    expect(context.response.ended).toBe(false);
  });

  it("should abort the signal when the client goes away", () => {
    const req = createRequest("/push");
    const res = new ServerResponse(req);
    const context = createNodeHostContext(req, res);

    expect(context.signal.aborted).toBe(false);
    res.emit("close");
    expect(context.signal.aborted).toBe(true);
  });

  it("should abort the signal when the host shuts down", () => {
    const req = createRequest("/push");
    const shutdown = new AbortController();
    const context = createNodeHostContext(req, new ServerResponse(req), { shutdownSignal: shutdown.signal });

    shutdown.abort();

    expect(context.signal.aborted).toBe(true);
  });

  it("should settle end for a response whose client already went away", async () => {
    const req = createRequest("/push");
    const res = new ServerResponse(req);
    const context = createNodeHostContext(req, res);
    res.destroy();

    context.response.write("{}");

    await expect(context.response.end()).resolves.toBeUndefined();
  });

  it("should let a transport send after the client disconnected", async () => {
    const req = createRequest("/push?connectionId=c1&messageId=3");
    const res = new ServerResponse(req);
    const heartBeat: TransportHeartBeat = { addConnection: () => true, markConnection: jest.fn(), removeConnection: jest.fn() };
    const transport = new LongPollingTransport({ context: createNodeHostContext(req, res), heartBeat });
    res.destroy();

    await expect(transport.sendValue({ messages: [] })).resolves.toBeUndefined();
  });
});
