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
 * 按组件划分的 JSON 行日志，写到 stderr。
 *
 * 库内只输出 DEBUG 级别的诊断信息（遍历轨迹、耗时），`LOG_LEVEL` 高于 DEBUG 时全部静默。
 */
export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  /** 调用方可据此跳过昂贵的元数据构造 */
  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(LogLevel.DEBUG)) return;
    // stdout 留给 CLI 的遍历结果
    console.error(
      JSON.stringify({
        level: LogLevel[LogLevel.DEBUG],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...meta,
      })
    );
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  createLogger(metrics.component).debug(`${metrics.operation} completed`, {
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
