/**
 * Prefixed logger and operator message sink
 * 带前缀的日志器与操作员消息输出
 */

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Destination for formatted log lines
 * 格式化日志行的输出目标
 */
export interface LogSink {
  write(level: LogLevel, message: string): void;
}

/**
 * Writes to console.log / console.warn / console.error by level
 * 按级别写入 console.log / console.warn / console.error
 */
export const consoleSink: LogSink = {
  write(level: LogLevel, message: string): void {
    switch (level) {
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
      default:
        console.log(message);
        break;
    }
  }
};

export const silentSink: LogSink = {
  write(): void {
    // discard
  }
};

/**
 * Logger that prefixes every message with `[Tag]`
 * 为每条消息添加 `[Tag]` 前缀的日志器
 *
 * @example
 * ```typescript
 * const logger = new Logger('SessionReplay');
 * logger.warn('netid 12 has no meta');
 * // => [SessionReplay] netid 12 has no meta
 * ```
 */
export class Logger {
  private readonly _prefix: string;

  constructor(public readonly tag: string, private readonly sink: LogSink = consoleSink) {
    this._prefix = `[${tag}]`;
  }

  /**
   * Derive a logger with a different tag on the same sink
   * 使用相同输出目标派生不同标签的日志器
   */
  child(tag: string): Logger {
    return new Logger(tag, this.sink);
  }

  log(message: string, level: LogLevel = 'info'): void {
    this.sink.write(level, `${this._prefix} ${message}`);
  }

  info(message: string): void {
    this.log(message, 'info');
  }

  warn(message: string): void {
    this.log(message, 'warn');
  }

  error(message: string): void {
    this.log(message, 'error');
  }
}

/**
 * Channel for messages meant for the operator (chat broadcast in most hosts)
 * 面向操作员的消息通道（多数宿主中为聊天广播）
 */
export interface MessageSink {
  broadcast(message: string): void;
}

/**
 * Message sink that forwards operator messages to a logger
 * 将操作员消息转发到日志器的消息输出
 */
export class LoggerMessageSink implements MessageSink {
  constructor(private readonly logger: Logger) {}

  broadcast(message: string): void {
    this.logger.info(message);
  }
}
