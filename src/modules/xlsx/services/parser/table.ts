/**
 * 表格解析器
 *
 * @module modules/xlsx/services/parser/table
 * @description 解析工作表通过 tablePart 引用的表格部件。
 */

import type { Archive } from './archive.js'
import type { Table, TableColumn, TableStyleInfo } from '../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrBool } from './xml.js'
import { readXmlRequired } from './utils.js'
import { parseAutoFilter } from './elements/auto-filter.js'
import { Errors } from '../../../../utils/errors.js'

function parseTableColumn(el: XmlElement): TableColumn | undefined {
  const id = attrInt(el, 'id')
  const name = attr(el, 'name')
  if (id === undefined || name === undefined) return undefined
  return {
    id,
    name,
    totalsRowFunction: attr(el, 'totalsRowFunction'),
    totalsRowLabel: attr(el, 'totalsRowLabel'),
    calculatedColumnFormula: child(el, 'calculatedColumnFormula')?.text,
  }
}

function parseStyleInfo(el: XmlElement): TableStyleInfo {
  return {
    name: attr(el, 'name'),
    showFirstColumn: attrBool(el, 'showFirstColumn', false),
    showLastColumn: attrBool(el, 'showLastColumn', false),
    showRowStripes: attrBool(el, 'showRowStripes', false),
    showColumnStripes: attrBool(el, 'showColumnStripes', false),
  }
}

/**
 * 解析 table 根元素
 *
 * @returns 结构不符合要求（缺少 id / displayName / ref 或列定义不完整）时返回 undefined
 */
export function parseTable(root: XmlElement): Table | undefined {
  if (root.name !== 'table') return undefined

  const id = attrInt(root, 'id')
  const displayName = attr(root, 'displayName')
  const ref = attr(root, 'ref')
  if (id === undefined || !displayName || !ref) return undefined

  const columnEls = children(child(root, 'tableColumns'), 'tableColumn')
  const columns: TableColumn[] = []
  for (const el of columnEls) {
    const column = parseTableColumn(el)
    if (!column) return undefined
    columns.push(column)
  }

  const autoFilter = child(root, 'autoFilter')
  const styleInfo = child(root, 'tableStyleInfo')

  return {
    id,
    name: attr(root, 'name'),
    displayName,
    ref,
    comment: attr(root, 'comment'),
    headerRowCount: attrInt(root, 'headerRowCount') ?? 1,
    totalsRowCount: attrInt(root, 'totalsRowCount') ?? 0,
    columns,
    autoFilter: autoFilter ? parseAutoFilter(autoFilter) : undefined,
    styleInfo: styleInfo ? parseStyleInfo(styleInfo) : undefined,
  }
}

/**
 * 读取表格部件
 *
 * @throws {XlsxParseError} ERR_MISSING_FILE / ERR_INVALID_FILE / ERR_INCONSISTENT_XLSX
 */
export async function getTable(archive: Archive, path: string): Promise<Table> {
  const root = await readXmlRequired(archive, path)
  const table = parseTable(root)
  if (!table) throw Errors.inconsistentXlsx(`Bad table in ${path}`, path)
  return table
}

export default { getTable, parseTable }
