export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

/**
 * Where formatted log lines end up. Defaults to stderr so stdout only carries results.
 */
export type LogSink = (line: string) => void;

/**
 * Leveled logger shared by every module of the packager
 */
export class Logger {
  private static instance: Logger | null = null;
  private level: LogLevel = 'info';
  private sink: LogSink = (line) => process.stderr.write(`${line}\n`);

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Redirect output, e.g. to capture lines in tests. Returns the previous sink.
   */
  setSink(sink: LogSink): LogSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }

  debug(message: string, error?: Error): void {
    this.log('debug', message, error);
  }

  info(message: string, error?: Error): void {
    this.log('info', message, error);
  }

  warn(message: string, error?: Error): void {
    this.log('warn', message, error);
  }

  error(message: string, error?: Error): void {
    this.log('error', message, error);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, error?: Error): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (error) {
      line += ` - ${error.message}`;
      if (this.level === 'debug' && error.stack) {
        line += `\n${error.stack}`;
      }
    }
    this.sink(line);
  }
}
