/**
 * 样式读取
 *
 * @module modules/xlsx/services/parser/styles
 * @description xl/styles.xml 以原始字节透传，不在这里解释。缺失时为空字节。
 */

import type { Archive } from './archive.js'
import { readBytesOptional } from './utils.js'
import type { Styles } from '../../types/xlsx.js'

export const STYLES_PATH = 'xl/styles.xml'

export async function getStyles(archive: Archive): Promise<Styles> {
  const raw = await readBytesOptional(archive, STYLES_PATH)
  return { raw: raw ?? Buffer.alloc(0) }
}

export default { getStyles }
