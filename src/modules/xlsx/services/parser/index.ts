/**
 * xlsx 解析器
 *
 * @module modules/xlsx/services/parser
 * @description 将 xlsx 压缩包解码为完全解析的文档模型。
 * 遵循 ECMA-376 Office Open XML 标准（SpreadsheetML 部分）。
 *
 * 解码顺序：
 * 1. 打开压缩包
 * 2. 读取共享字符串表、内容类型索引
 * 3. 读取工作簿（工作表列表、定义名称、数据透视缓存）
 * 4. 逐个（或并发）解析工作表
 * 5. 读取自定义属性与样式
 *
 * 任一步骤的分类错误都会终止解码，不产生部分文档。
 *
 * @example
 * ```typescript
 * import { parseXlsx } from './services/parser/index.js'
 *
 * const buffer = await fs.readFile('book.xlsx')
 * const xlsx = await parseXlsx(buffer)
 *
 * console.log(`工作表数量: ${xlsx.sheets.length}`)
 * ```
 */

import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { NamedWorksheet, Xlsx } from '../../types/xlsx.js'
import type { ParsingContext } from '../../context/parsing-context.js'
import { openArchive } from './archive.js'
import { getSharedStrings } from './shared-strings.js'
import { getContentTypes } from './content-types.js'
import { readWorkbook, type WorksheetFile } from './workbook.js'
import { extractSheet } from './worksheet.js'
import { getCustomProperties, CUSTOM_PROPERTIES_PATH } from './custom-properties.js'
import { getStyles } from './styles.js'
import { isXlsxParseError, type ParseErrorResponse, type WarningInfo } from '../../../../utils/errors.js'
import { ParseWarningCollector } from '../../../../utils/error-handler.js'
import { createChildLogger } from '../../../../utils/logger.js'

// 重新导出子模块
export * from './archive.js'
export * from './xml.js'
export * from './utils.js'
export * from './relationships.js'
export * from './content-types.js'
export * from './shared-strings.js'
export * from './cell-ref.js'
export * from './cell-value.js'
export * from './comments.js'
export * from './drawing.js'
export * from './chart.js'
export * from './pivot-table.js'
export * from './table.js'
export * from './workbook.js'
export * from './worksheet.js'
export * from './custom-properties.js'
export * from './styles.js'
export * from './elements/index.js'

/**
 * 解码选项
 */
export interface ParseOptions {
  /**
   * 日志关联 ID（默认：生成 uuid v4）
   */
  requestId?: string

  /**
   * 父日志记录器（默认：根 logger）
   */
  logger?: Logger

  /**
   * 是否并发解析工作表（默认：true）
   */
  parallel?: boolean
}

/**
 * 默认解码选项
 */
export const DEFAULT_PARSE_OPTIONS: Required<Pick<ParseOptions, 'parallel'>> = {
  parallel: true,
}

/**
 * 解码结果
 */
export type ParseResult<T> = { success: true; data: T; warnings: WarningInfo[] } | ParseErrorResponse

interface DecodeOutcome {
  xlsx: Xlsx
  warnings: ParseWarningCollector
}

async function extractSheets(ctx: ParsingContext, files: WorksheetFile[], parallel: boolean): Promise<NamedWorksheet[]> {
  const extractOne = async (file: WorksheetFile): Promise<NamedWorksheet> => ({
    name: file.name,
    worksheet: await extractSheet(ctx, file),
  })

  if (parallel) return Promise.all(files.map(extractOne))

  const sheets: NamedWorksheet[] = []
  for (const file of files) {
    sheets.push(await extractOne(file))
  }
  return sheets
}

async function decode(buffer: Buffer | Uint8Array, options: ParseOptions): Promise<DecodeOutcome> {
  const { parallel } = { ...DEFAULT_PARSE_OPTIONS, ...options }
  const requestId = options.requestId ?? uuidv4()
  const logger = createChildLogger({ requestId }, options.logger)
  const warnings = new ParseWarningCollector(requestId, logger)

  logger.debug({ size: buffer.byteLength, parallel }, 'Starting xlsx decode')

  try {
    const archive = await openArchive(buffer)
    const sharedStrings = await getSharedStrings(archive)
    const contentTypes = await getContentTypes(archive)
    const workbook = await readWorkbook(archive)

    logger.debug(
      {
        workbook: workbook.path,
        sheets: workbook.sheets.length,
        sharedStrings: sharedStrings.length,
        pivotCaches: workbook.caches.size,
      },
      'Workbook read'
    )

    const ctx: ParsingContext = {
      archive,
      sharedStrings,
      contentTypes,
      caches: workbook.caches,
      warnings,
      logger,
    }

    const sheets = await extractSheets(ctx, workbook.sheets, parallel)
    const customProperties = await getCustomProperties(archive, warning =>
      warnings.add(warning, { path: CUSTOM_PROPERTIES_PATH })
    )
    const styles = await getStyles(archive)

    logger.debug({ sheets: sheets.length, warnings: warnings.getWarningCount() }, 'xlsx decode completed')

    return {
      xlsx: { sheets, styles, definedNames: workbook.definedNames, customProperties },
      warnings,
    }
  } catch (error) {
    if (isXlsxParseError(error)) {
      logger.warn({ code: error.code, path: error.path, refId: error.refId }, `xlsx decode failed: ${error.message}`)
    }
    throw error
  }
}

/**
 * 解码 xlsx 文档
 *
 * @param buffer - xlsx 文件的二进制数据
 * @param options - 解码选项
 * @returns 完全解析的文档模型
 * @throws {XlsxParseError} 遇到的第一个分类错误
 *
 * @example
 * ```typescript
 * const xlsx = await parseXlsx(buffer, { requestId: 'req-42' })
 * xlsx.sheets[0].worksheet.cells.get(1, 1)
 * ```
 */
export async function parseXlsx(buffer: Buffer | Uint8Array, options: ParseOptions = {}): Promise<Xlsx> {
  const { xlsx } = await decode(buffer, options)
  return xlsx
}

/**
 * 解码 xlsx 文档，以结果对象返回分类错误
 *
 * 非分类异常（程序错误）仍然抛出。
 *
 * @example
 * ```typescript
 * const result = await parseXlsxEither(buffer)
 * if (!result.success) {
 *   console.error(result.error.code, result.error.path)
 * }
 * ```
 */
export async function parseXlsxEither(
  buffer: Buffer | Uint8Array,
  options: ParseOptions = {}
): Promise<ParseResult<Xlsx>> {
  try {
    const { xlsx, warnings } = await decode(buffer, options)
    return { success: true, data: xlsx, warnings: warnings.getWarnings() }
  } catch (error) {
    if (isXlsxParseError(error)) return error.toJSON()
    throw error
  }
}

export default { parseXlsx, parseXlsxEither }
