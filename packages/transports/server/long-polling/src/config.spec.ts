import { DEFAULT_MAX_BUFFERED_MESSAGES, DEFAULT_POLL_DELAY_MS, resolveLongPollingConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("resolveLongPollingConfig", () => {
  it("should apply defaults", () => {
    expect(resolveLongPollingConfig()).toEqual({
      pollDelayMs: DEFAULT_POLL_DELAY_MS,
      maxBufferedMessages: DEFAULT_MAX_BUFFERED_MESSAGES
    });
    expect(DEFAULT_MAX_BUFFERED_MESSAGES).toBe(5000);
  });

  it("should keep provided values", () => {
    expect(resolveLongPollingConfig({ pollDelayMs: 2000, maxBufferedMessages: 100 })).toEqual({
      pollDelayMs: 2000,
      maxBufferedMessages: 100
    });
  });

  it("should reject a negative poll delay", () => {
    expect(() => resolveLongPollingConfig({ pollDelayMs: -5 })).toThrow(ConfigurationError);
  });

  it("should list every failing field", () => {
    let thrown: unknown;
    try {
      resolveLongPollingConfig({ pollDelayMs: 1.5, maxBufferedMessages: 0 });
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (!(thrown instanceof ConfigurationError)) return;
    expect(thrown.code).toBe("INVALID_CONFIGURATION");
    expect(thrown.issues).toHaveLength(2);
    expect(thrown.issues[0]).toMatch(/^pollDelayMs: /);
    expect(thrown.issues[1]).toMatch(/^maxBufferedMessages: /);
  });
});
