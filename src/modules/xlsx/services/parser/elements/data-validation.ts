/**
 * 数据验证解析器
 *
 * @module modules/xlsx/services/parser/elements/data-validation
 */

import type { DataValidation, SqRef } from '../../../types/xlsx.js'
import { type XmlElement, child, attr, attrBool } from '../xml.js'

/**
 * 解析 dataValidation 元素；缺少 sqref 时返回 undefined
 *
 * 注意 showDropDown 为 true 表示“不显示”下拉箭头，这里保持文件中的原值。
 */
export function parseDataValidation(el: XmlElement): [SqRef, DataValidation] | undefined {
  const sqref = attr(el, 'sqref')
  if (!sqref) return undefined

  return [
    sqref,
    {
      type: attr(el, 'type') ?? 'none',
      operator: attr(el, 'operator') ?? 'between',
      errorStyle: attr(el, 'errorStyle') ?? 'stop',
      allowBlank: attrBool(el, 'allowBlank', false),
      showDropDown: attrBool(el, 'showDropDown', false),
      showInputMessage: attrBool(el, 'showInputMessage', false),
      showErrorMessage: attrBool(el, 'showErrorMessage', false),
      errorTitle: attr(el, 'errorTitle'),
      error: attr(el, 'error'),
      promptTitle: attr(el, 'promptTitle'),
      prompt: attr(el, 'prompt'),
      formula1: child(el, 'formula1')?.text,
      formula2: child(el, 'formula2')?.text,
    },
  ]
}
