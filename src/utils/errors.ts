/**
 * 错误与警告定义
 *
 * @module utils/errors
 * @description 定义 xlsx 解析过程中的分类错误（致命）与警告（非致命）。
 *
 * @example
 * ```typescript
 * throw Errors.missingFile('xl/workbook.xml')
 * throw Errors.invalidRef('xl/worksheets/sheet1.xml', 'rId7')
 * ```
 */

/**
 * 错误代码
 */
export type ParseErrorCode =
  | 'ERR_INVALID_ZIP'
  | 'ERR_MISSING_FILE'
  | 'ERR_INVALID_FILE'
  | 'ERR_INVALID_REF'
  | 'ERR_INCONSISTENT_XLSX'

/**
 * 错误响应格式
 */
export interface ParseErrorResponse {
  success: false
  error: {
    code: ParseErrorCode
    message: string
    path?: string
    refId?: string
    suggestion?: string
  }
}

/**
 * 警告信息（按代码分组后）
 */
export interface WarningInfo {
  code: string
  message: string
  count: number
}

/**
 * xlsx 解析错误
 *
 * 每个错误都带有分类代码，并尽可能指出出错的部件路径和关系 ID。
 */
export class XlsxParseError extends Error {
  readonly code: ParseErrorCode
  readonly path?: string
  readonly refId?: string
  readonly suggestion?: string

  constructor(
    code: ParseErrorCode,
    message: string,
    details: { path?: string; refId?: string; suggestion?: string } = {}
  ) {
    super(message)
    this.name = 'XlsxParseError'
    this.code = code
    this.path = details.path
    this.refId = details.refId
    this.suggestion = details.suggestion
  }

  toJSON(): ParseErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        path: this.path,
        refId: this.refId,
        suggestion: this.suggestion,
      },
    }
  }
}

/**
 * 判断一个值是否为分类解析错误
 */
export function isXlsxParseError(value: unknown): value is XlsxParseError {
  return value instanceof XlsxParseError
}

/**
 * 解析警告（宽松处理时记录）
 */
export class ParseWarning {
  constructor(
    readonly code: string,
    readonly message: string
  ) {}
}

/**
 * 错误工厂
 */
export const Errors = {
  invalidZipArchive: (): XlsxParseError =>
    new XlsxParseError('ERR_INVALID_ZIP', 'Input is not a valid zip archive', {
      suggestion: 'Make sure the input is an .xlsx file and not truncated',
    }),

  missingFile: (path: string): XlsxParseError =>
    new XlsxParseError('ERR_MISSING_FILE', `Missing file: ${path}`, { path }),

  invalidFile: (path: string): XlsxParseError =>
    new XlsxParseError('ERR_INVALID_FILE', `Invalid file: ${path}`, { path }),

  invalidRef: (path: string, refId: string): XlsxParseError =>
    new XlsxParseError('ERR_INVALID_REF', `Invalid relationship reference ${refId} in ${path}`, {
      path,
      refId,
    }),

  inconsistentXlsx: (detail: string, path?: string): XlsxParseError =>
    new XlsxParseError('ERR_INCONSISTENT_XLSX', detail, { path }),
}

/**
 * 警告工厂
 */
export const Warnings = {
  sharedStringIndex: (raw: string): ParseWarning =>
    new ParseWarning('WARN_SHARED_STRING_INDEX', `Shared string index "${raw}" does not resolve`),

  cellValueDropped: (cellType: string, raw: string): ParseWarning =>
    new ParseWarning('WARN_CELL_VALUE_DROPPED', `Cannot decode "${raw}" as cell type "${cellType}"`),

  unknownCellType: (cellType: string): ParseWarning =>
    new ParseWarning('WARN_UNKNOWN_CELL_TYPE', `Unsupported cell type "${cellType}"`),

  missingReference: (element: string): ParseWarning =>
    new ParseWarning('WARN_MISSING_REFERENCE', `A ${element} element has no r attribute and was skipped`),

  duplicateElement: (element: string): ParseWarning =>
    new ParseWarning('WARN_DUPLICATE_ELEMENT', `More than one ${element} element, only the first is used`),

  unsupportedObject: (element: string): ParseWarning =>
    new ParseWarning('WARN_UNSUPPORTED_OBJECT', `Drawing object ${element} is not supported and was skipped`),

  unsupportedProperty: (name: string, variant: string): ParseWarning =>
    new ParseWarning('WARN_UNSUPPORTED_PROPERTY', `Custom property "${name}" has unsupported type ${variant}`),
}

export default { XlsxParseError, ParseWarning, Errors, Warnings, isXlsxParseError }
