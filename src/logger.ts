export type Logger = {
  info?: (message: string, meta?: Record<string, unknown>) => void;
  warn?: (message: string, meta?: Record<string, unknown>) => void;
  debug?: (message: string, meta?: Record<string, unknown>) => void;
};

/** Sink for the human-readable progress lines printed by the commands. */
export type OutputSink = (line: string) => void;

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  return ` ${JSON.stringify(meta)}`;
}

/**
 * Diagnostics go to stderr so stdout stays reserved for command output
 * (Waybar reads module JSON from stdout).
 */
export function createConsoleLogger(options?: { debug?: boolean }): Logger {
  const debugEnabled =
    options?.debug ?? (process.env.WAYBAR_AI_USAGE_DEBUG ?? "").trim().length > 0;
  const write = (level: string, message: string, meta?: Record<string, unknown>) => {
    process.stderr.write(`[waybar-ai-usage] ${level} ${message}${formatMeta(meta)}\n`);
  };

  return {
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    debug: debugEnabled ? (message, meta) => write("debug", message, meta) : undefined,
  };
}
