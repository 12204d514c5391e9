/**
 * Debug Channels
 *
 * Targeted, structured logging for the extraction and planning pipeline. Every
 * channel is always present in code and collapses to a no-op unless enabled.
 *
 * Enable via environment variable:
 * ```bash
 * RENDERPLAN_DEBUG=parse renderplan inspect shot.usd       # One channel
 * RENDERPLAN_DEBUG=resolve,plan renderplan plan shot.usd   # Several channels
 * RENDERPLAN_DEBUG=* npm test                              # Everything
 * ```
 *
 * In code:
 * ```typescript
 * debug.parse("prim.def", { path, kind, depth });
 * debug.plan("pass.outputs", { pass, outputs });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** Logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Sink for formatted messages (defaults to console.error, keeping stdout clean for CLI output) */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "RENDERPLAN_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

/** Channels created through getDebugChannel() */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) {
      const inline = `[${value.map((v) => formatValue(v)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Get or create a debug channel outside the built-in set. */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/** Re-read RENDERPLAN_DEBUG and recreate every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.parse = createChannel("parse");
  debug.resolve = createChannel("resolve");
  debug.plan = createChannel("plan");
  debug.farm = createChannel("farm");
  debug.config = createChannel("config");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

/** Whether `channel` (or, without an argument, any channel) is enabled. */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Layer dump extraction */
  parse: createChannel("parse"),

  /** Selection pattern matching */
  resolve: createChannel("resolve"),

  /** Pass/settings/output planning */
  plan: createChannel("plan"),

  /** Farm submission, dump tool and executable lookup */
  farm: createChannel("farm"),

  /** Config file discovery and merging */
  config: createChannel("config"),
};

export type Debug = typeof debug;
