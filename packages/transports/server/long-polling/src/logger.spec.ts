import { ConsoleLogger, toError } from "./logger";

describe("ConsoleLogger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should drop entries below the configured level", () => {
    const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("warn");

    logger.debug("hidden");
    logger.warn("shown", { connectionId: "c1" });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[pushline] [WARN] shown", { connectionId: "c1" });
  });

  it("should pass the error object to console.error", () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("boom");

    new ConsoleLogger("info", "[test]").error("Request failed", failure);

    expect(error).toHaveBeenCalledWith("[test] [ERROR] Request failed", failure, "");
  });
});

describe("toError", () => {
  it("should keep errors and wrap anything else", () => {
    const error = new Error("kept");

    expect(toError(error)).toBe(error);
    expect(toError("text").message).toBe("text");
  });
});
