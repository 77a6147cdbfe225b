/**
 * 数据透视表解析器
 *
 * @module modules/xlsx/services/parser/pivot-table
 * @description 解析数据透视缓存定义（工作簿级别）和数据透视表定义（工作表级别）。
 * 透视表通过数字缓存 ID 引用缓存，字段名来自缓存字段。
 */

import type {
  CacheField,
  CacheId,
  CellValue,
  PivotCache,
  PivotDataField,
  PivotFieldInfo,
  PivotFieldName,
  PivotTable,
} from '../../types/xlsx.js'
import { DATA_FIELD_INDEX } from '../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrBool } from './xml.js'
import { parseDouble } from './cell-value.js'

function parseSharedItem(el: XmlElement): CellValue | undefined {
  const v = attr(el, 'v')
  switch (el.name) {
    case 's':
    case 'd':
    case 'e':
      return v === undefined ? undefined : { type: 'text', value: v }
    case 'n': {
      const n = v === undefined ? undefined : parseDouble(v)
      return n === undefined ? undefined : { type: 'double', value: n }
    }
    case 'b':
      return v === undefined ? undefined : { type: 'bool', value: v === '1' || v === 'true' }
    default:
      return undefined
  }
}

function parseCacheField(el: XmlElement): CacheField | undefined {
  const name = attr(el, 'name')
  if (name === undefined) return undefined
  return {
    name,
    items: (child(el, 'sharedItems')?.children ?? []).flatMap(item => parseSharedItem(item) ?? []),
  }
}

/**
 * 解析 pivotCacheDefinition 根元素
 *
 * @returns 缺少工作表数据源或字段名时返回 undefined
 */
export function parseCache(root: XmlElement): PivotCache | undefined {
  if (root.name !== 'pivotCacheDefinition') return undefined

  const source = child(child(root, 'cacheSource'), 'worksheetSource')
  const sourceSheet = attr(source, 'sheet')
  const sourceRef = attr(source, 'ref')
  if (sourceSheet === undefined || sourceRef === undefined) return undefined

  const fields: CacheField[] = []
  for (const el of children(child(root, 'cacheFields'), 'cacheField')) {
    const field = parseCacheField(el)
    if (!field) return undefined
    fields.push(field)
  }

  return { sourceSheet, sourceRef, fields }
}

function fieldName(x: number, cache: PivotCache): PivotFieldName | undefined {
  if (x === DATA_FIELD_INDEX) return { type: 'values' }
  const field = cache.fields[x]
  return field ? { type: 'field', name: field.name } : undefined
}

function parseFieldList(el: XmlElement | undefined, cache: PivotCache): PivotFieldName[] | undefined {
  const names: PivotFieldName[] = []
  for (const field of children(el, 'field')) {
    const x = attrInt(field, 'x')
    const name = x === undefined ? undefined : fieldName(x, cache)
    if (!name) return undefined
    names.push(name)
  }
  return names
}

function parseDataFields(el: XmlElement | undefined, cache: PivotCache): PivotDataField[] | undefined {
  const dataFields: PivotDataField[] = []
  for (const df of children(el, 'dataField')) {
    const fld = attrInt(df, 'fld')
    const field = fld === undefined ? undefined : cache.fields[fld]
    if (!field) return undefined
    dataFields.push({
      name: attr(df, 'name'),
      field: field.name,
      subtotal: attr(df, 'subtotal') ?? 'sum',
      numFmtId: attrInt(df, 'numFmtId'),
    })
  }
  return dataFields
}

/**
 * 解析 pivotTableDefinition 根元素
 *
 * @param root - 根元素
 * @param lookupCache - 按缓存 ID 查找工作簿级缓存
 * @returns 结构不符合要求或缓存 ID 无法解析时返回 undefined
 */
export function parsePivotTable(
  root: XmlElement,
  lookupCache: (cacheId: CacheId) => PivotCache | undefined
): PivotTable | undefined {
  if (root.name !== 'pivotTableDefinition') return undefined

  const name = attr(root, 'name')
  const cacheId = attrInt(root, 'cacheId')
  const dataCaption = attr(root, 'dataCaption')
  const location = attr(child(root, 'location'), 'ref')
  if (name === undefined || cacheId === undefined || dataCaption === undefined || !location) return undefined

  const cache = lookupCache(cacheId)
  if (!cache) return undefined

  const fields: PivotFieldInfo[] = children(child(root, 'pivotFields'), 'pivotField').map((el, i) => ({
    name: cache.fields[i]?.name,
    axis: attr(el, 'axis'),
    dataField: attrBool(el, 'dataField', false),
    showAll: attrBool(el, 'showAll', true),
    outline: attrBool(el, 'outline', true),
    compact: attrBool(el, 'compact', true),
  }))

  const rowFields = parseFieldList(child(root, 'rowFields'), cache)
  const columnFields = parseFieldList(child(root, 'colFields'), cache)
  const dataFields = parseDataFields(child(root, 'dataFields'), cache)
  if (!rowFields || !columnFields || !dataFields) return undefined

  return {
    name,
    cacheId,
    dataCaption,
    location,
    sourceSheet: cache.sourceSheet,
    sourceRef: cache.sourceRef,
    fields,
    rowFields,
    columnFields,
    dataFields,
    rowGrandTotals: attrBool(root, 'rowGrandTotals', true),
    columnGrandTotals: attrBool(root, 'colGrandTotals', true),
    outline: attrBool(root, 'outline', false),
    outlineData: attrBool(root, 'outlineData', false),
  }
}

export default { parseCache, parsePivotTable }
