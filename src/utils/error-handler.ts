/**
 * 解析警告收集器
 *
 * @module utils/error-handler
 * @description 收集解析过程中的非致命问题（宽松处理被丢弃的值、跳过的对象等）。
 * 致命错误不经过这里，它们以 XlsxParseError 直接向上抛出。
 *
 * @example
 * ```typescript
 * const collector = new ParseWarningCollector(requestId, logger)
 *
 * collector.add(Warnings.unknownCellType('e'), { path: 'xl/worksheets/sheet1.xml', cellRef: 'C3' })
 *
 * const warnings = collector.getWarnings()
 * ```
 */

import type { Logger } from 'pino'
import type { ParseWarning, WarningInfo } from './errors.js'
import { getLogger } from './logger.js'

/**
 * 警告详情
 */
export interface WarningDetail {
  /** 警告代码 */
  code: string
  /** 警告消息 */
  message: string
  /** 相关部件路径 */
  path?: string
  /** 相关单元格引用 */
  cellRef?: string
  /** 额外详情 */
  details?: Record<string, unknown>
  /** 时间戳 */
  timestamp: number
}

/**
 * 警告附加信息
 */
export interface WarningContext {
  path?: string
  cellRef?: string
  [key: string]: unknown
}

/**
 * 解析警告收集器
 *
 * 每次解码创建一个实例；工作表级别的处理使用子收集器，警告会同时转发给父收集器。
 */
export class ParseWarningCollector {
  private readonly requestId: string
  private readonly logger: Logger
  private readonly warnings: WarningDetail[] = []
  private readonly parent?: ParseWarningCollector

  /**
   * @param requestId - 请求唯一标识符，用于日志追踪
   * @param logger - 可选的日志记录器，如果不提供则使用默认 logger
   */
  constructor(requestId: string, logger?: Logger, parent?: ParseWarningCollector) {
    this.requestId = requestId
    this.logger = logger || getLogger()
    this.parent = parent
  }

  /**
   * 记录一条由 Warnings 工厂创建的警告
   */
  add(warning: ParseWarning, context?: WarningContext): void {
    this.addWarning(warning.code, warning.message, context)
  }

  /**
   * 添加警告信息
   *
   * @param code - 警告代码，遵循 WARN_XXX_XXX 格式
   * @param message - 人类可读的警告消息
   * @param context - 可选的额外详情
   */
  addWarning(code: string, message: string, context?: WarningContext): void {
    const warning: WarningDetail = {
      code,
      message,
      path: context?.path,
      cellRef: context?.cellRef,
      details: context,
      timestamp: Date.now(),
    }

    this.warnings.push(warning)

    this.logger.debug(
      {
        requestId: this.requestId,
        warning,
      },
      `Warning added: ${code}`
    )

    this.parent?.addWarning(code, message, context)
  }

  /**
   * 获取按代码分组的警告
   *
   * @example
   * ```typescript
   * collector.getWarnings()
   * // [
   * //   { code: 'WARN_SHARED_STRING_INDEX', message: '...', count: 2 },
   * //   { code: 'WARN_UNKNOWN_CELL_TYPE', message: '...', count: 1 }
   * // ]
   * ```
   */
  getWarnings(): WarningInfo[] {
    const warningMap = new Map<string, { message: string; count: number }>()

    for (const warning of this.warnings) {
      const existing = warningMap.get(warning.code)
      if (existing) {
        existing.count++
      } else {
        warningMap.set(warning.code, {
          message: warning.message,
          count: 1,
        })
      }
    }

    return Array.from(warningMap.entries()).map(([code, data]) => ({
      code,
      message: data.message,
      count: data.count,
    }))
  }

  getWarningCount(): number {
    return this.warnings.length
  }

  /**
   * 创建子收集器
   *
   * 子收集器使用带上下文绑定的子 logger，并将警告转发到当前收集器。
   *
   * @param context - 子上下文名称，例如工作表部件路径
   */
  createChild(context: string): ParseWarningCollector {
    return new ParseWarningCollector(this.requestId, this.logger.child({ context }), this)
  }
}

export default ParseWarningCollector
