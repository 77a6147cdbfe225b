/**
 * 列属性解析器
 *
 * @module modules/xlsx/services/parser/elements/columns
 */

import type { ColumnsProperties } from '../../../types/xlsx.js'
import { type XmlElement, attrInt, attrNumber, attrBool } from '../xml.js'

/**
 * 解析 col 元素；缺少 min / max 时返回 undefined
 */
export function parseColumn(el: XmlElement): ColumnsProperties | undefined {
  const min = attrInt(el, 'min')
  const max = attrInt(el, 'max')
  if (min === undefined || max === undefined) return undefined

  return {
    min,
    max,
    width: attrNumber(el, 'width'),
    style: attrInt(el, 'style'),
    hidden: attrBool(el, 'hidden', false),
    bestFit: attrBool(el, 'bestFit', false),
    customWidth: attrBool(el, 'customWidth', false),
    outlineLevel: attrInt(el, 'outlineLevel'),
    collapsed: attrBool(el, 'collapsed', false),
  }
}
