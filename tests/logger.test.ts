import { afterEach, describe, it, expect, vi } from "vitest";

const originalLevel = process.env.LOG_LEVEL;

function setLevel(level: string | undefined): void {
  if (level === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = level;
  }
}

async function loadLogger(level: string) {
  setLevel(level);
  vi.resetModules();
  return import("../src/utils/logger.js");
}

describe("createModuleLogger", () => {
  afterEach(() => {
    setLevel(originalLevel);
    vi.resetModules();
  });

  it("takes its level from LOG_LEVEL", async () => {
    const { createModuleLogger } = await loadLogger("debug");
    const logger = createModuleLogger("indexer");

    expect(logger.level).toBe("debug");
    expect(logger.silent).toBe(false);
  });

  it("is silent when LOG_LEVEL is silent", async () => {
    const { createModuleLogger } = await loadLogger("silent");
    expect(createModuleLogger("indexer").silent).toBe(true);
  });

  it("falls back to info for an unknown level", async () => {
    const { createModuleLogger } = await loadLogger("verbose");
    expect(createModuleLogger("indexer").level).toBe("info");
  });
});
