/**
 * 单元格值解码
 *
 * @module modules/xlsx/services/parser/cell-value
 * @description 按单元格类型标记（t 属性）解码 v 元素的文本。无法解码时返回 undefined
 * 并通过回调报告警告，而不是抛出错误。
 */

import type { SharedStringTable } from '../../context/parsing-context.js'
import type { CellValue } from '../../types/xlsx.js'
import { sstItem } from './shared-strings.js'
import { parseDecimal } from './xml.js'
import { Warnings, type ParseWarning } from '../../../../utils/errors.js'

/** 未给出 t 属性时的默认类型 */
export const DEFAULT_CELL_TYPE = 'n'

const INDEX_PATTERN = /^\s*\d+\s*$/

/**
 * 解析 n 类型单元格与数据透视共享项的数字文本
 */
export function parseDouble(raw: string): number | undefined {
  return parseDecimal(raw)
}

/**
 * 解码单元格值
 *
 * @param sst - 共享字符串表
 * @param cellType - t 属性（s / str / n / b）
 * @param raw - v 元素的文本
 * @param onDrop - 值被丢弃时的回调
 *
 * @example
 * ```typescript
 * extractCellValue(sst, 's', '0')  // { type: 'text', value: 'Hello' }
 * extractCellValue(sst, 'n', '42') // { type: 'double', value: 42 }
 * extractCellValue(sst, 'b', '1')  // { type: 'bool', value: true }
 * ```
 */
export function extractCellValue(
  sst: SharedStringTable,
  cellType: string,
  raw: string,
  onDrop?: (warning: ParseWarning) => void
): CellValue | undefined {
  switch (cellType) {
    case 's': {
      const item = INDEX_PATTERN.test(raw) ? sstItem(sst, parseInt(raw, 10)) : undefined
      if (!item) {
        onDrop?.(Warnings.sharedStringIndex(raw))
        return undefined
      }
      return item.kind === 'text'
        ? { type: 'text', value: item.text }
        : { type: 'rich', value: item.runs }
    }
    case 'str':
      return { type: 'text', value: raw }
    case 'n': {
      const value = parseDouble(raw)
      if (value === undefined) {
        onDrop?.(Warnings.cellValueDropped(cellType, raw))
        return undefined
      }
      return { type: 'double', value }
    }
    case 'b':
      if (raw === '1') return { type: 'bool', value: true }
      if (raw === '0') return { type: 'bool', value: false }
      onDrop?.(Warnings.cellValueDropped(cellType, raw))
      return undefined
    default:
      onDrop?.(Warnings.unknownCellType(cellType))
      return undefined
  }
}

export default { extractCellValue, parseDouble }
