import { describe, it, expect, vi } from "vitest";
import { createConsoleLogger, silentLogger } from "../../types/logger.js";

const createSink = () => ({ debug: vi.fn(), warn: vi.fn() });

describe("createConsoleLogger()", () => {
  it("emits warnings but not debug lines by default", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });
    logger.debug("trace");
    logger.warn("careful");
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[entity-mapper] careful");
  });

  it("appends non-empty context as JSON", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });
    logger.warn("skipped", { recordIndex: 3 });
    logger.warn("plain", {});
    expect(sink.warn).toHaveBeenNthCalledWith(1, '[entity-mapper] skipped {"recordIndex":3}');
    expect(sink.warn).toHaveBeenNthCalledWith(2, "[entity-mapper] plain");
  });

  it("honours the level and prefix", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink, level: "debug", prefix: "orders" });
    logger.debug("trace");
    expect(sink.debug).toHaveBeenCalledWith("[orders] trace");
  });

  it("stays quiet at the silent level", () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink, level: "silent" });
    logger.warn("careful");
    expect(sink.warn).not.toHaveBeenCalled();
  });
});

describe("silentLogger", () => {
  it("discards everything", () => {
    expect(silentLogger.warn("ignored")).toBeUndefined();
    expect(Object.isFrozen(silentLogger)).toBe(true);
  });
});
