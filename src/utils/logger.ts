import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/**
 * 打印器的结构化日志：每条一行 JSON，写到 stderr，stdout 只留给 IR 文本。
 *
 * 打印路径只在 DEBUG 记录统计信息，在 WARN 记录校验产生的非阻断诊断；
 * 级别阈值（含 INFO、ERROR）来自 LOG_LEVEL。
 */
export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.WARN, message, meta);
  }

  /** 构造昂贵的元数据之前先检查 */
  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private write(level: LogLevel, message: string, meta: LogMetadata = {}): void {
    if (!this.isEnabled(level)) return;
    console.error(
      JSON.stringify({
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...meta,
      })
    );
  }
}

/**
 * 按组件创建日志器；最低级别取自 ConfigService（LOG_LEVEL）。
 */
export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
