import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogMetadata {
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

// Always output to stderr so JSON printed by the CLI on stdout stays clean
const stderrSink: LogSink = line => {
  console.error(line);
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    this.sink(JSON.stringify(entry));
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  const logger = createLogger('performance');
  logger.debug(`${metrics.operation} completed`, {
    target: metrics.component,
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
