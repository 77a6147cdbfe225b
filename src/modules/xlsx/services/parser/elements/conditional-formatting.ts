/**
 * 条件格式解析器
 *
 * @module modules/xlsx/services/parser/elements/conditional-formatting
 * @description 解析 conditionalFormatting 元素为 (sqref, 规则列表) 对。
 */

import type { CfRule, Cfvo, SqRef } from '../../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrBool } from '../xml.js'
import { parseColor } from './rich-text.js'

function parseCfvo(el: XmlElement): Cfvo {
  return {
    type: attr(el, 'type') ?? 'num',
    value: attr(el, 'val'),
    gte: attrBool(el, 'gte', true),
  }
}

/**
 * 解析 cfRule 元素
 */
export function parseCfRule(el: XmlElement): CfRule {
  const rule: CfRule = {
    type: attr(el, 'type') ?? 'expression',
    priority: attrInt(el, 'priority') ?? 0,
    dxfId: attrInt(el, 'dxfId'),
    stopIfTrue: attrBool(el, 'stopIfTrue', false),
    operator: attr(el, 'operator'),
    text: attr(el, 'text'),
    timePeriod: attr(el, 'timePeriod'),
    rank: attrInt(el, 'rank'),
    percent: attrBool(el, 'percent', false),
    bottom: attrBool(el, 'bottom', false),
    aboveAverage: attrBool(el, 'aboveAverage', true),
    equalAverage: attrBool(el, 'equalAverage', false),
    stdDev: attrInt(el, 'stdDev'),
    formulas: children(el, 'formula').map(f => f.text),
  }

  const colorScale = child(el, 'colorScale')
  if (colorScale) {
    rule.colorScale = {
      cfvos: children(colorScale, 'cfvo').map(parseCfvo),
      colors: children(colorScale, 'color').flatMap(c => parseColor(c) ?? []),
    }
  }

  const dataBar = child(el, 'dataBar')
  if (dataBar) {
    rule.dataBar = {
      cfvos: children(dataBar, 'cfvo').map(parseCfvo),
      color: parseColor(child(dataBar, 'color')),
      minLength: attrInt(dataBar, 'minLength'),
      maxLength: attrInt(dataBar, 'maxLength'),
      showValue: attrBool(dataBar, 'showValue', true),
    }
  }

  const iconSet = child(el, 'iconSet')
  if (iconSet) {
    rule.iconSet = {
      iconSet: attr(iconSet, 'iconSet') ?? '3TrafficLights1',
      cfvos: children(iconSet, 'cfvo').map(parseCfvo),
      showValue: attrBool(iconSet, 'showValue', true),
      percent: attrBool(iconSet, 'percent', true),
      reverse: attrBool(iconSet, 'reverse', false),
    }
  }

  return rule
}

/**
 * 解析 conditionalFormatting 元素；缺少 sqref 时返回 undefined
 */
export function parseConditionalFormatting(el: XmlElement): [SqRef, CfRule[]] | undefined {
  const sqref = attr(el, 'sqref')
  if (!sqref) return undefined
  return [sqref, children(el, 'cfRule').map(parseCfRule)]
}
