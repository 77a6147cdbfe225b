/**
 * 自动筛选解析器
 *
 * @module modules/xlsx/services/parser/elements/auto-filter
 * @description 工作表与表格部件共用。
 */

import type { AutoFilter, FilterColumn, FilterCriteria } from '../../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrNumber, attrBool } from '../xml.js'

function parseCriteria(col: XmlElement): FilterCriteria | undefined {
  const filters = child(col, 'filters')
  if (filters) {
    return {
      type: 'values',
      values: children(filters, 'filter').flatMap(f => attr(f, 'val') ?? []),
      blank: attrBool(filters, 'blank', false),
    }
  }

  const top10 = child(col, 'top10')
  if (top10) {
    return {
      type: 'top10',
      top: attrBool(top10, 'top', true),
      percent: attrBool(top10, 'percent', false),
      value: attrNumber(top10, 'val') ?? 10,
      filterValue: attrNumber(top10, 'filterVal'),
    }
  }

  const custom = child(col, 'customFilters')
  if (custom) {
    return {
      type: 'custom',
      and: attrBool(custom, 'and', false),
      filters: children(custom, 'customFilter').map(f => ({
        operator: attr(f, 'operator') ?? 'equal',
        value: attr(f, 'val') ?? '',
      })),
    }
  }

  const dynamic = child(col, 'dynamicFilter')
  if (dynamic) {
    return {
      type: 'dynamic',
      dynamicType: attr(dynamic, 'type') ?? 'null',
      value: attrNumber(dynamic, 'val'),
      maxValue: attrNumber(dynamic, 'maxVal'),
    }
  }

  const color = child(col, 'colorFilter')
  if (color) {
    return { type: 'color', dxfId: attrInt(color, 'dxfId'), cellColor: attrBool(color, 'cellColor', true) }
  }

  const icon = child(col, 'iconFilter')
  if (icon) {
    return { type: 'icon', iconSet: attr(icon, 'iconSet') ?? '', iconId: attrInt(icon, 'iconId') }
  }

  return undefined
}

function parseFilterColumn(el: XmlElement): FilterColumn | undefined {
  const colId = attrInt(el, 'colId')
  if (colId === undefined) return undefined
  return {
    colId,
    hiddenButton: attrBool(el, 'hiddenButton', false),
    showButton: attrBool(el, 'showButton', true),
    criteria: parseCriteria(el),
  }
}

/**
 * 解析 autoFilter 元素
 */
export function parseAutoFilter(el: XmlElement): AutoFilter {
  return {
    ref: attr(el, 'ref'),
    filterColumns: children(el, 'filterColumn').flatMap(c => parseFilterColumn(c) ?? []),
  }
}
