/**
 * 自定义属性解析器
 *
 * @module modules/xlsx/services/parser/custom-properties
 * @description 解析 docProps/custom.xml。该部件可选，缺失时得到空映射。
 */

import type { Archive } from './archive.js'
import type { Variant } from '../../types/xlsx.js'
import { type XmlElement, NS, children, attr } from './xml.js'
import { readXmlOptional } from './utils.js'
import { parseDouble } from './cell-value.js'
import { Warnings, type ParseWarning } from '../../../../utils/errors.js'

export const CUSTOM_PROPERTIES_PATH = 'docProps/custom.xml'

const STRING_TYPES = ['lpwstr', 'lpstr', 'bstr']
const INTEGER_TYPES = ['i1', 'i2', 'i4', 'i8', 'int', 'ui1', 'ui2', 'ui4', 'ui8', 'uint']
const DOUBLE_TYPES = ['r4', 'r8', 'decimal']
const DATE_TYPES = ['filetime', 'date']

/**
 * 解析 vt: 命名空间下的值元素
 */
export function parseVariant(el: XmlElement): Variant | undefined {
  if (el.namespace !== NS.vt) return undefined
  const raw = el.text

  if (STRING_TYPES.includes(el.name)) return { type: 'string', value: raw }
  if (el.name === 'bool') {
    const value = raw.trim()
    if (value === 'true' || value === '1') return { type: 'boolean', value: true }
    if (value === 'false' || value === '0') return { type: 'boolean', value: false }
    return undefined
  }
  if (INTEGER_TYPES.includes(el.name)) {
    return /^\s*[-+]?\d+\s*$/.test(raw) ? { type: 'integer', value: parseInt(raw, 10) } : undefined
  }
  if (DOUBLE_TYPES.includes(el.name)) {
    const value = parseDouble(raw)
    return value === undefined ? undefined : { type: 'double', value }
  }
  if (DATE_TYPES.includes(el.name)) {
    const value = new Date(raw.trim())
    return Number.isNaN(value.getTime()) ? undefined : { type: 'date', value }
  }
  return undefined
}

/**
 * 读取自定义属性
 *
 * 不支持或无法解码的值类型会被跳过并报告警告。
 */
export async function getCustomProperties(
  archive: Archive,
  onSkip?: (warning: ParseWarning) => void
): Promise<Map<string, Variant>> {
  const properties = new Map<string, Variant>()
  const root = await readXmlOptional(archive, CUSTOM_PROPERTIES_PATH)
  if (!root) return properties

  for (const property of children(root, 'property')) {
    const name = attr(property, 'name')
    const valueEl = property.children[0]
    if (name === undefined || !valueEl) continue

    const value = parseVariant(valueEl)
    if (value) {
      properties.set(name, value)
    } else {
      onSkip?.(Warnings.unsupportedProperty(name, valueEl.name))
    }
  }

  return properties
}

export default { getCustomProperties, parseVariant }
