/**
 * 共享字符串表解析器
 *
 * @module modules/xlsx/services/parser/shared-strings
 * @description 解析 xl/sharedStrings.xml。该部件可选，缺失时得到空表。
 */

import type { Archive } from './archive.js'
import type { SharedStringTable } from '../../context/parsing-context.js'
import type { SharedStringItem } from '../../types/xlsx.js'
import { children } from './xml.js'
import { readXmlOptional } from './utils.js'
import { parseStringItem } from './elements/rich-text.js'

export const SHARED_STRINGS_PATH = 'xl/sharedStrings.xml'

/**
 * 获取共享字符串表
 *
 * @example
 * ```typescript
 * const sst = await getSharedStrings(archive)
 * sstItem(sst, 0) // { kind: 'text', text: 'Hello' }
 * ```
 */
export async function getSharedStrings(archive: Archive): Promise<SharedStringTable> {
  const root = await readXmlOptional(archive, SHARED_STRINGS_PATH)
  if (!root) return []
  return Object.freeze(children(root, 'si').map(parseStringItem))
}

/**
 * 按索引取共享字符串，越界时返回 undefined
 */
export function sstItem(sst: SharedStringTable, index: number): SharedStringItem | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= sst.length) return undefined
  return sst[index]
}

export default { getSharedStrings, sstItem }
