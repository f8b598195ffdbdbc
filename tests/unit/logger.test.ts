import { describe, expect, it } from "vitest";
import { createLogger } from "../../src/infrastructure/logging/logger.js";

/** Run `fn` with the stream's writes collected instead of printed */
const capture = (stream: NodeJS.WriteStream, fn: () => void): string[] => {
  const output: string[] = [];
  const originalWrite = stream.write;

  stream.write = (chunk: string | Uint8Array): boolean => {
    output.push(typeof chunk === "string" ? chunk : new TextDecoder().decode(chunk));
    return true;
  };

  try {
    fn();
  } finally {
    stream.write = originalWrite;
  }
  return output;
};

describe("Logger (JSON format)", () => {
  it("json format outputs valid JSON lines", () => {
    const output = capture(process.stdout, () => {
      createLogger("info", {}, "json").info("test message", { key: "value" });
    });

    expect(output.length).toBe(1);
    const parsed = JSON.parse((output[0] ?? "").trim());
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("test message");
    expect(parsed.key).toBe("value");
    expect(new Date(parsed.time).toISOString()).toBe(parsed.time);
  });

  it("json format includes bindings", () => {
    const output = capture(process.stdout, () => {
      createLogger("info", { service: "monitor" }, "json").info("hello");
    });

    const parsed = JSON.parse((output[0] ?? "").trim());
    expect(parsed.service).toBe("monitor");
  });

  it("child logger inherits format and bindings", () => {
    const output = capture(process.stdout, () => {
      const parent = createLogger("info", { service: "ingest" }, "json");
      parent.child({ requestId: "abc-123" }).info("child log");
    });

    const parsed = JSON.parse((output[0] ?? "").trim());
    expect(parsed.service).toBe("ingest");
    expect(parsed.requestId).toBe("abc-123");
    expect(parsed.msg).toBe("child log");
  });

  it("drops undefined values and flattens errors", () => {
    const output = capture(process.stderr, () => {
      createLogger("info", {}, "json").error("insert failed", {
        id: undefined,
        error: new Error("deadlock"),
      });
    });

    const parsed = JSON.parse((output[0] ?? "").trim());
    expect("id" in parsed).toBe(false);
    expect(parsed.error.name).toBe("Error");
    expect(parsed.error.message).toBe("deadlock");
  });

  it("respects log level filtering", () => {
    const output = capture(process.stdout, () => {
      const logger = createLogger("warn", {}, "json");
      logger.debug("should not appear");
      logger.info("should not appear");
    });

    expect(output.length).toBe(0);
  });

  it("warn and error go to stderr in json mode", () => {
    const output = capture(process.stderr, () => {
      const logger = createLogger("warn", {}, "json");
      logger.warn("warning message");
      logger.error("error message");
    });

    expect(output.length).toBe(2);
    expect(JSON.parse((output[0] ?? "").trim()).level).toBe("warn");
    expect(JSON.parse((output[1] ?? "").trim()).level).toBe("error");
  });
});

describe("Logger (pretty format)", () => {
  it("writes a colored line with the message and metadata", () => {
    const output = capture(process.stdout, () => {
      createLogger("info", {}, "pretty").info("pretty log", { fridgeNo: 2 });
    });

    expect(output.length).toBe(1);
    const line = output[0] ?? "";
    expect(line).toContain("pretty log");
    expect(line).toContain("fridgeNo");
    expect(() => JSON.parse(line.trim())).toThrow();
  });
});
