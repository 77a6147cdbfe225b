/**
 * 日志记录器
 *
 * @module utils/logger
 * @description 基于 pino 的全局日志记录器。日志级别由 LOG_LEVEL 环境变量控制。
 */

import { pino, type Bindings, type Logger } from 'pino'

let rootLogger: Logger | undefined

/**
 * 获取根日志记录器（首次调用时创建）
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'xlsx-reader',
      level: process.env['LOG_LEVEL'] || 'info',
    })
  }
  return rootLogger
}

/**
 * 替换根日志记录器，供嵌入方注入自己的 pino 实例
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger
}

/**
 * 基于根日志记录器创建子记录器
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ requestId: 'req-1' })
 * log.debug({ path: 'xl/workbook.xml' }, 'Reading part')
 * ```
 */
export function createChildLogger(bindings: Bindings, parent?: Logger): Logger {
  return (parent || getLogger()).child(bindings)
}

export default { getLogger, setLogger, createChildLogger }
