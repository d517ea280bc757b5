/**
 * Debug channels for the tokenizer and assemblers.
 *
 * Each channel is a function that logs one structured point when enabled and
 * is a no-op otherwise. Enable with the `BUILDSPAN_DEBUG` environment variable:
 *
 * ```bash
 * BUILDSPAN_DEBUG=heredoc npm test        # heredoc matching only
 * BUILDSPAN_DEBUG=tokenize,run npm test   # several channels
 * BUILDSPAN_DEBUG=* npm test              # everything
 * ```
 *
 * ```typescript
 * debug.heredoc("close", { delimiter: "EOF", pending: 0 });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** JSON lines or `[channel.point] key=value` text. */
  format: "json" | "pretty";
  timestamps: boolean;
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "BUILDSPAN_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data ? { data } : {}),
      ...(config.timestamps ? { timestamp: Date.now() } : {}),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    // Heredoc bodies and shell lines get long; keep one point per line.
    const escaped = JSON.stringify(value);
    return escaped.length > 62 ? `${escaped.slice(0, 58)}..."` : escaped;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("start" in value && "end" in value) {
      return `${String(value.start)}..${String(value.end)}`;
    }
    if ("$kind" in value && typeof value.$kind === "string") return `<${value.$kind}>`;
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Get or create a channel outside the built-in set. */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/** Re-read `BUILDSPAN_DEBUG` and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.tokenize = createChannel("tokenize");
  debug.copy = createChannel("copy");
  debug.run = createChannel("run");
  debug.heredoc = createChannel("heredoc");
  debug.convert = createChannel("convert");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Instruction recognition (text → token tree) */
  tokenize: createChannel("tokenize"),
  /** COPY assembly */
  copy: createChannel("copy"),
  /** RUN assembly */
  run: createChannel("run"),
  /** Delimiter queue: open / close / mismatch */
  heredoc: createChannel("heredoc"),
  /** Instruction narrowing */
  convert: createChannel("convert"),
};

export type Debug = typeof debug;
