export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  action: string;
  orderId?: string | undefined;
  durationMs?: number | undefined;
  [key: string]: unknown;
}

export function log(entry: LogEntry): void {
  console.log(JSON.stringify(entry));
}
