// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  action: string;
  email?: string | undefined;
  orderId?: string | undefined;
  sku?: string | undefined;
  durationMs?: number | undefined;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

// stderr keeps the menus on stdout readable
const stderrSink: LogSink = (line) => console.error(line);

let sink: LogSink = stderrSink;
let minimum: LogLevel | 'silent' = 'info';

export function log(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minimum]) return;
  sink(JSON.stringify(entry));
}

export function setLogLevel(level: LogLevel | 'silent'): void {
  minimum = level;
}

/** Replaces the output sink; call with no argument to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}
