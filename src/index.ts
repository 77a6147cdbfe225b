/**
 * xlsx-reader
 *
 * @module xlsx-reader
 * @description 将 xlsx 电子表格文档解码为完全解析的类型化文档模型。
 *
 * @example
 * ```typescript
 * import { parseXlsxFile } from 'xlsx-reader'
 *
 * const xlsx = await parseXlsxFile('report.xlsx')
 * for (const { name, worksheet } of xlsx.sheets) {
 *   console.log(name, worksheet.cells.size)
 * }
 * ```
 */

import { readFile } from 'node:fs/promises'
import type { Xlsx } from './modules/xlsx/types/xlsx.js'
import { parseXlsx, type ParseOptions } from './modules/xlsx/services/parser/index.js'

export {
  parseXlsx,
  parseXlsxEither,
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
  type ParseResult,
} from './modules/xlsx/services/parser/index.js'
export {
  decodeCellRef,
  encodeCellRef,
  columnToLetters,
  lettersToColumn,
  parseRange,
} from './modules/xlsx/services/parser/cell-ref.js'
export { DEFAULT_ROW_PROPERTIES, isDefaultRowProperties } from './modules/xlsx/services/parser/worksheet.js'
export { CellMap } from './modules/xlsx/types/cell-map.js'
export * from './modules/xlsx/types/xlsx.js'
export {
  XlsxParseError,
  ParseWarning,
  isXlsxParseError,
  type ParseErrorCode,
  type ParseErrorResponse,
  type WarningInfo,
} from './utils/errors.js'
export { setLogger } from './utils/logger.js'

/**
 * 从磁盘读取并解码 xlsx 文件
 *
 * @param filePath - 文件路径
 * @throws {XlsxParseError} 解码失败时抛出；文件读取失败时抛出原始的文件系统错误
 */
export async function parseXlsxFile(filePath: string, options?: ParseOptions): Promise<Xlsx> {
  const buffer = await readFile(filePath)
  return parseXlsx(buffer, options)
}
