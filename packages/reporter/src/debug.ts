/**
 * Debug channels for tracing what the reporter publishes.
 *
 * Enable via environment variable:
 * ```bash
 * COMPILE_REPORTER_DEBUG=store npm test          # Just the diagnostic store
 * COMPILE_REPORTER_DEBUG=reporter,client npm test
 * COMPILE_REPORTER_DEBUG=* npm test              # Everything
 * ```
 *
 * Disabled channels are no-op functions, so call sites stay in the code.
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to writing to stderr, which stays clear of a stdio transport. */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => {
    process.stderr.write(`${message}\n`);
  },
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

export const DEBUG_ENV = "COMPILE_REPORTER_DEBUG";

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatDebugMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
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
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

export const debug = {
  /** Reporter lifecycle and per-problem routing */
  reporter: createChannel("reporter"),

  /** Diagnostic store growth */
  store: createChannel("store"),

  /** Notifications handed to the JSON-RPC connection */
  client: createChannel("client"),
};

/**
 * Re-read COMPILE_REPORTER_DEBUG and rebuild the channels.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.reporter = createChannel("reporter");
  debug.store = createChannel("store");
  debug.client = createChannel("client");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}
