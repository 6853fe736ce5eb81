export interface LogEntry {
  timestamp: number;
  level: 'log' | 'warn' | 'error';
  scope: string;
  message: string;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];
let consoleEcho = true;

function format(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  return JSON.stringify(arg);
}

function push(level: LogEntry['level'], scope: string, args: unknown[]) {
  const message = args.map(format).join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();

  if (consoleEcho) {
    const line = `[${scope}] ${message}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  for (const cb of listeners) cb(entry);
}

/** A logger whose entries are tagged with `scope` */
export function createLogger(scope: string): Logger {
  return {
    log: (...args) => push('log', scope, args),
    warn: (...args) => push('warn', scope, args),
    error: (...args) => push('error', scope, args),
  };
}

/** Turn console output on or off. Buffering and listeners are unaffected. */
export function setConsoleEcho(enabled: boolean): void {
  consoleEcho = enabled;
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs() {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
