import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";
import { captureLogger } from "../helpers/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "warn", json: true });
    expect(logger.level).toBe("warn");
  });

  it("creates a child logger", () => {
    const logger = createLogger({ level: "info", json: true });
    const child = logger.child({ component: "ledger-registry" });
    expect(child.level).toBe("info");
  });

  it("writes structured lines to a given stream", () => {
    const { logger, lines } = captureLogger();
    logger.child({ component: "budget-gate" }).warn({ userId: "1" }, "User reached the usage limit");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatchObject({
      level: 40,
      component: "budget-gate",
      userId: "1",
      msg: "User reached the usage limit",
    });
  });
});
