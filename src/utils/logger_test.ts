import { afterEach, expect, test } from "vitest";
import { getLogLevel, logger, type LogLevel, setLogLevel } from "./logger.ts";

// =====================
// Console spy helpers
// =====================

interface ConsoleCall {
  method: string;
  message: string;
  args: unknown[];
}

interface ConsoleSpy {
  calls: ConsoleCall[];
  install: () => void;
  uninstall: () => void;
}

/**
 * Creates a spy that captures console.debug/info/warn/error calls.
 * Modifies the process-global console object, so tests in this file
 * restore it in a finally block.
 */
function createConsoleSpy(): ConsoleSpy {
  const calls: ConsoleCall[] = [];
  const original = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  return {
    calls,
    install() {
      console.debug = (msg: string, ...args: unknown[]) =>
        calls.push({ method: "debug", message: msg, args });
      console.info = (msg: string, ...args: unknown[]) =>
        calls.push({ method: "info", message: msg, args });
      console.warn = (msg: string, ...args: unknown[]) =>
        calls.push({ method: "warn", message: msg, args });
      console.error = (msg: string, ...args: unknown[]) =>
        calls.push({ method: "error", message: msg, args });
    },
    uninstall() {
      console.debug = original.debug;
      console.info = original.info;
      console.warn = original.warn;
      console.error = original.error;
    },
  };
}

function withLevel(level: LogLevel, fn: (spy: ConsoleSpy) => void): void {
  const spy = createConsoleSpy();
  setLogLevel(level);
  try {
    spy.install();
    fn(spy);
  } finally {
    spy.uninstall();
  }
}

afterEach(() => {
  setLogLevel("info");
});

// =====================
// Log level filtering tests
// =====================

test("logger defaults to info level", () => {
  expect(getLogLevel()).toBe("info");
});

test("logger.debug outputs at debug level", () => {
  withLevel("debug", (spy) => {
    logger.debug("test debug message");

    expect(spy.calls.length).toBe(1);
    expect(spy.calls[0].method).toBe("debug");
    expect(spy.calls[0].message).toBe("[DEBUG] test debug message");
  });
});

test("logger.debug suppressed at info level", () => {
  withLevel("info", (spy) => {
    logger.debug("should not appear");

    expect(spy.calls.length).toBe(0);
  });
});

test("logger.info suppressed at warn level", () => {
  withLevel("warn", (spy) => {
    logger.info("should not appear");

    expect(spy.calls.length).toBe(0);
  });
});

test("logger.warn outputs at warn level", () => {
  withLevel("warn", (spy) => {
    logger.warn("test warn message");

    expect(spy.calls.length).toBe(1);
    expect(spy.calls[0].method).toBe("warn");
    expect(spy.calls[0].message).toBe("[WARN] test warn message");
  });
});

test("logger.error outputs at error level", () => {
  withLevel("error", (spy) => {
    logger.warn("should not appear");
    logger.error("test error message");

    expect(spy.calls.length).toBe(1);
    expect(spy.calls[0].message).toBe("[ERROR] test error message");
  });
});

test("none level suppresses all log methods", () => {
  withLevel("none", (spy) => {
    logger.debug("debug msg");
    logger.info("info msg");
    logger.warn("warn msg");
    logger.error("error msg");

    expect(spy.calls.length).toBe(0);
  });
});

test("all log methods output at debug level", () => {
  withLevel("debug", (spy) => {
    logger.debug("debug msg");
    logger.info("info msg");
    logger.warn("warn msg");
    logger.error("error msg");

    expect(spy.calls.map((c) => c.method)).toEqual([
      "debug",
      "info",
      "warn",
      "error",
    ]);
  });
});

test("logger passes additional args to console", () => {
  withLevel("info", (spy) => {
    logger.info("multi args", "arg1", 123, { nested: true });

    expect(spy.calls[0].args).toEqual(["arg1", 123, { nested: true }]);
  });
});
