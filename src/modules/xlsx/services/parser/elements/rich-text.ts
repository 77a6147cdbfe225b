/**
 * 富文本解析器
 *
 * @module modules/xlsx/services/parser/elements/rich-text
 * @description 解析共享字符串、批注和内联字符串中的文本与富文本运行。
 */

import type { Color, RichTextRun, RunProperties, SharedStringItem } from '../../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrNumber, attrBool } from '../xml.js'

/**
 * 解析颜色元素（color / fgColor / bgColor 等）
 */
export function parseColor(el: XmlElement | undefined): Color | undefined {
  if (!el) return undefined
  return {
    rgb: attr(el, 'rgb'),
    theme: attrInt(el, 'theme'),
    indexed: attrInt(el, 'indexed'),
    tint: attrNumber(el, 'tint'),
    auto: attrBool(el, 'auto'),
  }
}

// <b/> 表示 true，<b val="0"/> 表示 false
function flag(el: XmlElement | undefined): boolean | undefined {
  return el ? attrBool(el, 'val', true) : undefined
}

function val(el: XmlElement | undefined): string | undefined {
  return attr(el, 'val')
}

/**
 * 解析运行属性 rPr
 */
export function parseRunProperties(rPr: XmlElement): RunProperties {
  const underline = child(rPr, 'u')
  return {
    font: val(child(rPr, 'rFont')),
    charset: attrInt(child(rPr, 'charset'), 'val'),
    family: attrInt(child(rPr, 'family'), 'val'),
    bold: flag(child(rPr, 'b')),
    italic: flag(child(rPr, 'i')),
    strike: flag(child(rPr, 'strike')),
    outline: flag(child(rPr, 'outline')),
    shadow: flag(child(rPr, 'shadow')),
    condense: flag(child(rPr, 'condense')),
    extend: flag(child(rPr, 'extend')),
    color: parseColor(child(rPr, 'color')),
    size: attrNumber(child(rPr, 'sz'), 'val'),
    underline: underline ? val(underline) || 'single' : undefined,
    vertAlign: val(child(rPr, 'vertAlign')),
    scheme: val(child(rPr, 'scheme')),
  }
}

/**
 * 解析富文本运行列表（r 元素）
 */
export function parseRuns(el: XmlElement): RichTextRun[] {
  return children(el, 'r').map(r => {
    const rPr = child(r, 'rPr')
    const run: RichTextRun = { text: child(r, 't')?.text ?? '' }
    if (rPr) run.properties = parseRunProperties(rPr)
    return run
  })
}

/**
 * 解析字符串条目（si / is）
 *
 * 含有 r 子元素时为富文本，否则取 t 的文本。
 */
export function parseStringItem(el: XmlElement): SharedStringItem {
  if (children(el, 'r').length > 0) {
    return { kind: 'rich', runs: parseRuns(el) }
  }
  return { kind: 'text', text: child(el, 't')?.text ?? '' }
}

/**
 * 将字符串条目统一为运行列表（批注文本使用）
 */
export function toRuns(item: SharedStringItem): RichTextRun[] {
  return item.kind === 'rich' ? item.runs : [{ text: item.text }]
}

export default { parseColor, parseRunProperties, parseRuns, parseStringItem, toRuns }
