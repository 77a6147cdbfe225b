/**
 * 解析器工具函数
 *
 * @module modules/xlsx/services/parser/utils
 * @description 读取并解析包内部件。可选部件统一经过 readXmlOptional / readBytesOptional，
 * 缺失时降级为 undefined，其他错误照常抛出。
 */

import type { Archive } from './archive.js'
import { parseXml, type XmlElement } from './xml.js'
import { Errors, isXlsxParseError } from '../../../../utils/errors.js'

/**
 * 读取必需的 XML 部件
 *
 * @throws {XlsxParseError} ERR_MISSING_FILE 部件不存在；ERR_INVALID_FILE 不是格式良好的 XML
 *
 * @example
 * ```typescript
 * const root = await readXmlRequired(archive, 'xl/workbook.xml')
 * const sheets = children(child(root, 'sheets'), 'sheet')
 * ```
 */
export async function readXmlRequired(archive: Archive, path: string): Promise<XmlElement> {
  const content = await archive.readText(path)
  if (content === undefined) throw Errors.missingFile(path)

  const root = parseXml(content)
  if (!root) throw Errors.invalidFile(path)
  return root
}

/**
 * 读取可选的 XML 部件
 *
 * @returns 部件缺失时返回 undefined
 */
export async function readXmlOptional(archive: Archive, path: string): Promise<XmlElement | undefined> {
  return optional(path, readXmlRequired(archive, path))
}

/**
 * 读取必需的二进制部件
 */
export async function readBytesRequired(archive: Archive, path: string): Promise<Buffer> {
  const bytes = await archive.readBytes(path)
  if (bytes === undefined) throw Errors.missingFile(path)
  return bytes
}

/**
 * 读取可选的二进制部件
 *
 * @returns 部件缺失时返回 undefined
 */
export async function readBytesOptional(archive: Archive, path: string): Promise<Buffer | undefined> {
  return optional(path, readBytesRequired(archive, path))
}

/** 只有该路径本身缺失才降级为 undefined */
async function optional<T>(path: string, pending: Promise<T>): Promise<T | undefined> {
  try {
    return await pending
  } catch (error) {
    if (isXlsxParseError(error) && error.code === 'ERR_MISSING_FILE' && error.path === path) {
      return undefined
    }
    throw error
  }
}

export default { readXmlRequired, readXmlOptional, readBytesRequired, readBytesOptional }
