/**
 * 解析上下文
 *
 * @module modules/xlsx/context/parsing-context
 * @description 一次解码过程中共享的只读结构。共享字符串表、内容类型索引和数据透视缓存表
 * 在任何工作表解析开始之前构建完毕，之后不再修改。
 */

import type { Logger } from 'pino'
import type { Archive } from '../services/parser/archive.js'
import type { PivotCacheTable, SharedStringItem } from '../types/xlsx.js'
import type { ParseWarningCollector } from '../../../utils/error-handler.js'

/**
 * 共享字符串表，按 0 起始的索引引用
 */
export type SharedStringTable = readonly SharedStringItem[]

/**
 * 内容类型索引
 */
export interface ContentTypes {
  /** 扩展名（小写，不含点） -> MIME 类型 */
  readonly defaults: ReadonlyMap<string, string>
  /** 以 "/" 开头的部件路径 -> MIME 类型 */
  readonly overrides: ReadonlyMap<string, string>
}

/**
 * 工作表解析上下文
 */
export interface ParsingContext {
  readonly archive: Archive
  readonly sharedStrings: SharedStringTable
  readonly contentTypes: ContentTypes
  readonly caches: PivotCacheTable
  readonly warnings: ParseWarningCollector
  readonly logger: Logger
}
