// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  action: string;
  item?: string | undefined;
  durationMs?: number | undefined;
  [key: string]: unknown;
}

export type Logger = (entry: LogEntry) => void;

export function log(entry: LogEntry): void {
  console.log(JSON.stringify(entry));
}
