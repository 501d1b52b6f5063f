import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { createLogger } from "../../src/common/logger.ts";
import { collect, createTestHandler } from "../helpers/setup.js";

function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

describe("logging", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("logs writes with bucket, key and size but no content", async () => {
    const { logger, lines } = captureLogger();
    const { handler, s3 } = createTestHandler({ logger });
    s3.createBucket("log-bucket");

    await handler.writeFile("log-bucket", "secret.txt", "hello");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: "s3.write",
      bucket: "log-bucket",
      key: "secret.txt",
      size: 5,
      msg: "Writing object",
    });
    expect(JSON.stringify(lines[0])).not.toContain("hello");
  });

  it("logs one line per listing page", async () => {
    const { logger, lines } = captureLogger();
    const { handler, s3 } = createTestHandler({ logger, keysPerPage: 1 });
    s3.seedObject("log-bucket", "a");
    s3.seedObject("log-bucket", "b");

    await collect(handler.iterateKeys("log-bucket"));

    expect(lines.map((line) => [line.event, line.keys, line.truncated])).toEqual([
      ["s3.listPage", 1, true],
      ["s3.listPage", 1, false],
    ]);
  });

  it("uses a given pino instance as is", () => {
    const { logger } = captureLogger();

    expect(createLogger(logger)).toBe(logger);
  });

  it("builds a silent logger when disabled", () => {
    expect(createLogger(false).level).toBe("silent");
  });

  it("reads the level from LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");

    expect(createLogger(true).level).toBe("warn");
  });
});
