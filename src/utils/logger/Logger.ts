import { LogLevel } from '../../types/enums';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.SILENT]: 100,
};

/**
 * Output sink, stderr by default so stdout stays free for report output
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Parses a level name (case-insensitive), falling back when unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
}

/**
 * Logger - Context-tagged, level-filtered logger
 */
export class Logger {
  private level: LogLevel;
  private readonly context: string;
  private readonly sink: LogSink;

  constructor(level: LogLevel = LogLevel.INFO, context: string = 'webposture', sink: LogSink = stderrSink) {
    this.level = level;
    this.context = context;
    this.sink = sink;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Logger for a sub-component, sharing level and sink
   */
  public child(context: string): Logger {
    return new Logger(this.level, `${this.context}:${context}`, this.sink);
  }

  public debug(message: string, ...details: unknown[]): void {
    this.write(LogLevel.DEBUG, message, details);
  }

  public info(message: string, ...details: unknown[]): void {
    this.write(LogLevel.INFO, message, details);
  }

  public warn(message: string, ...details: unknown[]): void {
    this.write(LogLevel.WARN, message, details);
  }

  public error(message: string, ...details: unknown[]): void {
    this.write(LogLevel.ERROR, message, details);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }

    const suffix = details.length > 0 ? ` ${details.map(formatDetail).join(' ')}` : '';
    this.sink(`[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.context}] ${message}${suffix}`);
  }
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.message;
  }
  if (typeof detail === 'string') {
    return detail;
  }
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
}
