import fs from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

class ScopedLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel,
    private readonly sinks: LogSink[],
  ) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`, this.level, this.sinks);
  }

  /** Same scope and level, with an extra sink appended. */
  tee(sink: LogSink): Logger {
    return new ScopedLogger(this.scope, this.level, [...this.sinks, sink]);
  }

  private write(level: LogLevel, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.scope}] ${message}`;
    for (const sink of this.sinks) sink(level, line);
  }
}

export function createLogger(scope = 'harvestq', options: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  return new ScopedLogger(scope, options.level ?? 'info', [options.sink ?? consoleSink]);
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/**
 * Returns a logger that also appends every line to `filePath`. A failing
 * append is reported once through the original logger and the file is dropped.
 */
export function teeToFile(logger: Logger, filePath: string): Logger {
  if (!(logger instanceof ScopedLogger)) return logger;
  let broken = false;
  return logger.tee((_level, line) => {
    if (broken) return;
    try {
      fs.appendFileSync(filePath, line + '\n');
    } catch (err) {
      broken = true;
      logger.warn(`job log ${filePath} disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
}
