/**
 * Run activity log: in-memory ring buffer for generation diagnostics
 *
 * Appends to the buffer and mirrors to stderr unless the mirror is off.
 * Tests and the CLI summary query the buffer with getRunLog().
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'pipeline' | 'sink' | 'content' | 'config'
  | 'catalog' | 'profiles' | 'cli';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
let mirror = true;

/**
 * Log a message to the ring buffer and stderr.
 */
export function runLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  buffer.push({ ts: Date.now(), component, message, level });
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  if (mirror) {
    const prefix = level === 'error' ? '[orgsim] ERROR' : level === 'warn' ? '[orgsim] WARN' : '[orgsim]';
    console.error(`${prefix} [${component}] ${message}`);
  }
}

/**
 * Query the log buffer with optional filters.
 */
export function getRunLog(options: {
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): LogEntry[] {
  const { since, component, level, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (level) {
    entries = entries.filter(e => e.level === level);
  }

  // Most recent entries (tail of buffer)
  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return entries.slice();
}

export function setRunLogMirror(enabled: boolean): void {
  mirror = enabled;
}

export function clearRunLog(): void {
  buffer.length = 0;
}
