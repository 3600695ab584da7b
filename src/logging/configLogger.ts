export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function formatLine(args: unknown[]): string {
  return args.map(formatArg).join(' ') + '\n';
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    process.stdout.write(formatLine(args));
  }
}

export function error(...args: unknown[]): void {
  process.stderr.write(formatLine(args));
}

export function warn(...args: unknown[]): void {
  process.stderr.write(formatLine(args));
}

export function info(...args: unknown[]): void {
  process.stdout.write(formatLine(args));
}

export function createLogger(debugMode: boolean | string = false): Logger {
  const isDebugEnabled = typeof debugMode === 'string' ? debugMode === 'true' : Boolean(debugMode);

  return {
    debug: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    log: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    error,
    warn,
    info,
  };
}
