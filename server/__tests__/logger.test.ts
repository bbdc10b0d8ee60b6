import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { componentLogger, logger, setLogLevel } from "../logger";

describe("setLogLevel", () => {
  afterEach(() => {
    setLogLevel("info");
  });

  it("drives the root logger from the loaded configuration", () => {
    setLogLevel(loadConfig({ LOG_LEVEL: "warn" }).logLevel);

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  it("is inherited by component loggers created afterwards", () => {
    setLogLevel(loadConfig({ LOG_LEVEL: "silent" }).logLevel);

    expect(componentLogger("product-service").level).toBe("silent");
  });
});
