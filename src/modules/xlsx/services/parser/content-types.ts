/**
 * 内容类型解析器
 *
 * @module modules/xlsx/services/parser/content-types
 * @description 解析包级 [Content_Types].xml，建立部件路径到 MIME 类型的索引。
 */

import type { Archive } from './archive.js'
import type { ContentTypes } from '../../context/parsing-context.js'
import { children, attr } from './xml.js'
import { readXmlRequired } from './utils.js'

export const CONTENT_TYPES_PATH = '[Content_Types].xml'

/**
 * 解析 [Content_Types].xml
 *
 * @throws {XlsxParseError} ERR_MISSING_FILE 文件不存在；ERR_INVALID_FILE 不是格式良好的 XML
 *
 * @example
 * ```typescript
 * const contentTypes = await getContentTypes(archive)
 * lookupContentType(contentTypes, '/xl/media/image1.png') // 'image/png'
 * ```
 */
export async function getContentTypes(archive: Archive): Promise<ContentTypes> {
  const root = await readXmlRequired(archive, CONTENT_TYPES_PATH)

  const defaults = new Map<string, string>()
  for (const item of children(root, 'Default')) {
    const extension = attr(item, 'Extension')
    const contentType = attr(item, 'ContentType')
    if (extension && contentType) defaults.set(extension.toLowerCase(), contentType)
  }

  const overrides = new Map<string, string>()
  for (const item of children(root, 'Override')) {
    const partName = attr(item, 'PartName')
    const contentType = attr(item, 'ContentType')
    if (partName && contentType) overrides.set(partName, contentType)
  }

  return { defaults, overrides }
}

/**
 * 查找部件的 MIME 类型
 *
 * 先按完整部件名匹配 Override，再按扩展名匹配 Default。
 *
 * @param partName - 以 "/" 开头的部件路径
 */
export function lookupContentType(contentTypes: ContentTypes, partName: string): string | undefined {
  const override = contentTypes.overrides.get(partName)
  if (override) return override

  const file = partName.slice(partName.lastIndexOf('/') + 1)
  const dot = file.lastIndexOf('.')
  if (dot < 0) return undefined
  return contentTypes.defaults.get(file.slice(dot + 1).toLowerCase())
}

export default { getContentTypes, lookupContentType }
