import { mkdirSync } from 'fs';
import pino from 'pino';
import pinoPretty from 'pino-pretty';
import type { AppConfig } from '../config/schema.js';

let logger: pino.Logger | null = null;

/**
 * 创建应用日志实例。
 *
 * 控制台输出使用同步 pino-pretty（避免 worker 线程启动延迟），
 * 文件日志使用 pino-roll worker 线程异步写入。
 *
 * @param config - 日志配置。
 * @returns 配置好的 pino logger。
 */
export function createLogger(config: AppConfig['logging']): pino.Logger {
  mkdirSync(config.directory, { recursive: true });

  const prettyStream = pinoPretty({ destination: 1 });

  const fileTransport = pino.transport({
    target: 'pino-roll',
    level: config.level,
    options: {
      file: `${config.directory}/policy`,
      size: config.maxSize,
      limit: { count: config.maxFiles },
    },
  });

  const multistream = pino.multistream([
    { level: config.level, stream: prettyStream },
    { level: config.level, stream: fileTransport },
  ]);

  logger = pino({ level: config.level }, multistream);

  return logger;
}

/**
 * 获取已创建的 logger。
 *
 * 本模块常作为库嵌入到其他服务中，宿主未调用 createLogger() 时
 * 返回一个 silent logger，而不是抛错。
 *
 * @returns pino Logger 实例。
 */
export function getLogger(): pino.Logger {
  if (!logger) {
    logger = pino({ level: 'silent' });
  }
  return logger;
}

/**
 * 丢弃当前 logger（仅用于测试）。
 */
export function resetLogger(): void {
  logger = null;
}
