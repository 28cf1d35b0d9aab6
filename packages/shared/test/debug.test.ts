import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  DEBUG_ENV_VAR,
  configureDebug,
  debug,
  formatDebugValue,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
} from "../src/debug.js";

let lines: string[] = [];

function enable(channels: string | undefined): void {
  if (channels === undefined) {
    delete process.env[DEBUG_ENV_VAR];
  } else {
    process.env[DEBUG_ENV_VAR] = channels;
  }
  refreshDebugChannels();
}

beforeEach(() => {
  lines = [];
  configureDebug({ format: "pretty", timestamps: false, output: (message) => lines.push(message) });
});

afterEach(() => {
  enable(undefined);
  configureDebug({ format: "pretty", timestamps: false, output: console.log });
});

describe("debug channels", () => {
  test("are silent when the variable is unset", () => {
    enable(undefined);
    debug.args("bind", { name: "count" });
    debug.dispatch("target", { kind: "missing-alignment" });

    expect(lines).toEqual([]);
    expect(isDebugEnabled()).toBe(false);
  });

  test("log only the listed channels", () => {
    enable("args");
    debug.args("bind", { name: "count" });
    debug.subdiag("merge", { part: "label" });

    expect(lines).toEqual(['[args.bind] { name="count" }']);
    expect(isDebugEnabled("args")).toBe(true);
    expect(isDebugEnabled("subdiag")).toBe(false);
  });

  test("wildcard enables every channel", () => {
    enable("*");
    debug.layout("spec.ignored");
    debug.subdiag("merge", { spans: 2 });

    expect(lines).toEqual(["[layout.spec.ignored]", "[subdiag.merge] { spans=2 }"]);
  });

  test("channel names are case-insensitive", () => {
    enable(" Dispatch ");
    debug.dispatch("target");

    expect(lines).toEqual(["[dispatch.target]"]);
  });

  test("json format makes bigints serializable", () => {
    enable("args");
    configureDebug({ format: "json" });
    debug.args("rebind", { value: 5n });

    expect(lines).toEqual(['{"channel":"args","point":"rebind","data":{"value":"5"}}']);
  });

  test("extra channels follow the variable", () => {
    enable("custom");
    getDebugChannel("custom")("hit", { n: 1 });
    getDebugChannel("other")("miss");

    expect(lines).toEqual(["[custom.hit] { n=1 }"]);
  });
});

describe("formatDebugValue", () => {
  test("renders primitives", () => {
    expect(formatDebugValue(null)).toBe("null");
    expect(formatDebugValue(undefined)).toBe("undefined");
    expect(formatDebugValue("x")).toBe('"x"');
    expect(formatDebugValue(3)).toBe("3");
    expect(formatDebugValue(false)).toBe("false");
    expect(formatDebugValue(5n)).toBe("5n");
    expect(formatDebugValue(Symbol("tag"))).toBe("tag");
  });

  test("truncates long strings", () => {
    const text = "a".repeat(70);
    expect(formatDebugValue(text)).toBe(`"${"a".repeat(57)}..."`);
  });

  test("renders functions by name", () => {
    function named(): void {}
    expect(formatDebugValue(named)).toBe("[function named]");
  });

  test("renders short arrays inline and long ones by count", () => {
    expect(formatDebugValue([1, 2])).toBe("[1, 2]");
    expect(formatDebugValue([])).toBe("[]");
    expect(formatDebugValue([1, 2, 3, 4])).toBe("[4 items]");
  });

  test("prefers a name or kind tag for objects", () => {
    expect(formatDebugValue({ name: "Widget", size: 2 })).toBe("<Widget>");
    expect(formatDebugValue({ kind: "str", value: "x" })).toBe("<str>");
  });

  test("spreads plain and null-prototype objects", () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare["a"] = 1;

    expect(formatDebugValue({ a: 1, b: "two" })).toBe('{ a=1, b="two" }');
    expect(formatDebugValue(bare)).toBe("{ a=1 }");
    expect(formatDebugValue({ outer: { inner: 1 } })).toBe("{ outer={...} }");
  });

  test("renders objects whose getters throw as <object>", () => {
    const spreadThrows = {
      get boom(): string {
        throw new Error("getter");
      },
    };
    const nameThrows = {
      get name(): string {
        throw new Error("getter");
      },
    };

    expect(formatDebugValue(spreadThrows)).toBe("<object>");
    expect(formatDebugValue(nameThrows)).toBe("<object>");
  });
});
