/**
 * Debug Channels
 *
 * Targeted debug logging for argument conversion, subdiagnostic composition,
 * error dispatch and data-layout parsing. Channels answer *what* value was
 * produced and *which* path produced it.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * DIAGWEAVE_DEBUG=args npm test            # Just argument conversion
 * DIAGWEAVE_DEBUG=subdiag,dispatch npm test
 * DIAGWEAVE_DEBUG=* npm test               # Everything
 * ```
 *
 * In code (always present, zero-cost when disabled):
 * ```typescript
 * debug.args('fallback.display', { type: 'Widget' });
 * debug.dispatch('variant', { kind: error.kind, key });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "DIAGWEAVE_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

/** Enabled channels (parsed once at module load, can be refreshed) */
let enabledChannels = parseDebugEnv();

/** Channels created outside of this module */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data: toJsonSafe(data) }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

// JSON.stringify rejects bigint, which argument values carry.
function toJsonSafe(data: DebugData): DebugData {
  const out: DebugData = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

function formatData(data: DebugData, depth = 0): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return "{}";

  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${key}=${formatDebugValue(value, depth)}`);
  }

  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100 || depth > 0) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

/**
 * Compact, debug-style rendering of an arbitrary value.
 *
 * Never throws. An object whose getters throw while it is read renders as
 * `<object>`.
 */
export function formatDebugValue(value: unknown, depth = 0): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "symbol") return value.description ?? "Symbol()";
  if (typeof value === "function") return `[function ${value.name || "anonymous"}]`;
  try {
    return formatDebugObject(value, depth);
  } catch {
    // A getter or proxy trap threw while the object was being read.
    return "<object>";
  }
}

function formatDebugObject(value: object, depth: number): string {
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const items = value.map((v: unknown) => formatDebugValue(v, depth + 1));
      const inline = `[${items.join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if ("name" in value && typeof value.name === "string") {
    return `<${value.name}>`;
  }
  if ("kind" in value && typeof value.kind === "string") {
    return `<${value.kind}>`;
  }
  if (depth < 1) {
    return formatData({ ...value }, depth + 1);
  }
  return "{...}";
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Refresh debug channels (re-reads DIAGWEAVE_DEBUG).
 *
 * Channels obtained through `getDebugChannel` before the refresh keep their
 * old enablement; call sites that must observe a refresh look the channel up
 * through `debug` or `getDebugChannel` at log time.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.args = createChannel("args");
  debug.subdiag = createChannel("subdiag");
  debug.dispatch = createChannel("dispatch");
  debug.layout = createChannel("layout");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for conditional expensive computations.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

/**
 * Debug channels for each subsystem.
 *
 * ```typescript
 * import { debug } from '@diagweave/shared';
 *
 * debug.subdiag('merge', { kind: 'label', spans: 2 });
 * ```
 */
export const debug = {
  /** Argument conversion and binding */
  args: createChannel("args"),

  /** Subdiagnostic merges */
  subdiag: createChannel("subdiag"),

  /** Error-variant dispatch */
  dispatch: createChannel("dispatch"),

  /** Target data-layout parsing */
  layout: createChannel("layout"),
};

export type Debug = typeof debug;
