export type RenderLogLevel = "info" | "warn" | "error";

/** Receives every formatted log line. */
export type RenderLogSink = (level: RenderLogLevel, line: string) => void;

const consoleSink: RenderLogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

let sink: RenderLogSink = consoleSink;
const warnedKeys = new Set<string>();

/** Route log lines elsewhere (host console, test capture). null restores console output. */
export function setRenderLogSink(next: RenderLogSink | null): void {
  sink = next ?? consoleSink;
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(level: RenderLogLevel, msg: string): void {
  sink(level, `${timestamp()} [isogrid] ${msg}`);
}

export function renderLog(msg: string): void {
  write("info", msg);
}

export function renderWarn(msg: string): void {
  write("warn", msg);
}

/** Log an error (with stack trace). */
export function renderLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write("error", `${label}: ${msg}`);
}

/**
 * Warn once per key. Fallbacks hit every frame (missing tile image, unknown
 * projectile kind), so only the first occurrence is worth a line.
 */
export function renderWarnOnce(key: string, msg: string): void {
  if (warnedKeys.has(key)) return;
  warnedKeys.add(key);
  write("warn", msg);
}

/** Forget which keys already warned. */
export function resetRenderWarnings(): void {
  warnedKeys.clear();
}
