/**
 * 工作表解析器
 *
 * @module modules/xlsx/services/parser/worksheet
 * @description 将一个工作表部件解析为完整的工作表模型：单元格、行属性、批注、合并区域、
 * 视图、页面设置、条件格式、数据验证、保护、自动筛选，以及通过关系解析的绘图、
 * 数据透视表和表格。
 */

import type { ParsingContext } from '../../context/parsing-context.js'
import type {
  Cell,
  CellFormula,
  CellValue,
  CfRule,
  DataValidation,
  PivotTable,
  Range,
  RowProperties,
  SqRef,
  Table,
  Worksheet,
} from '../../types/xlsx.js'
import { CellMap } from '../../types/cell-map.js'
import { type XmlElement, NS, child, children, attr, attrInt, attrNumber, attrBool } from './xml.js'
import { readXmlRequired } from './utils.js'
import {
  getRelationships,
  allByType,
  findByType,
  lookupRelPath,
  REL_TYPES,
  type Relationships,
} from './relationships.js'
import { decodeCellRef } from './cell-ref.js'
import { extractCellValue, DEFAULT_CELL_TYPE } from './cell-value.js'
import { getComments, type CommentTable } from './comments.js'
import { getDrawing } from './drawing.js'
import { parsePivotTable } from './pivot-table.js'
import { getTable } from './table.js'
import type { WorksheetFile } from './workbook.js'
import {
  parseAutoFilter,
  parseColumn,
  parseConditionalFormatting,
  parseDataValidation,
  parsePageSetup,
  parseSheetProtection,
  parseSheetViews,
  parseStringItem,
} from './elements/index.js'
import { Errors, Warnings, type ParseWarning } from '../../../../utils/errors.js'
import type { ParseWarningCollector } from '../../../../utils/error-handler.js'

/**
 * 默认行属性：未设置行高、没有显式样式、未隐藏
 */
export const DEFAULT_ROW_PROPERTIES: Readonly<RowProperties> = Object.freeze({ hidden: false })

export function isDefaultRowProperties(props: RowProperties): boolean {
  return (
    props.height === DEFAULT_ROW_PROPERTIES.height &&
    props.style === DEFAULT_ROW_PROPERTIES.style &&
    props.hidden === DEFAULT_ROW_PROPERTIES.hidden
  )
}

const FORMULA_TYPES: readonly CellFormula['type'][] = ['normal', 'shared', 'array', 'dataTable']

/**
 * 解析 f 元素
 */
export function parseFormula(el: XmlElement): CellFormula {
  const rawType = attr(el, 't')
  return {
    expression: el.text,
    type: FORMULA_TYPES.find(t => t === rawType) ?? 'normal',
    ref: attr(el, 'ref'),
    sharedIndex: attrInt(el, 'si'),
  }
}

/**
 * 工作表解析过程中的局部状态
 */
interface SheetScope {
  ctx: ParsingContext
  path: string
  rels: Relationships
  warnings: ParseWarningCollector
}

function warn(scope: SheetScope, cellRef?: string): (warning: ParseWarning) => void {
  return warning => scope.warnings.add(warning, { path: scope.path, cellRef })
}

/**
 * 取至多出现一次的元素；出现多次时取第一个并记录警告
 */
function single(scope: SheetScope, root: XmlElement, name: string): XmlElement | undefined {
  const els = children(root, name)
  if (els.length > 1) warn(scope)(Warnings.duplicateElement(name))
  return els[0]
}

function parseRowProperties(row: XmlElement): RowProperties {
  return {
    height: attrBool(row, 'customHeight') === true ? attrNumber(row, 'ht') : undefined,
    style: attrInt(row, 's'),
    hidden: attrBool(row, 'hidden', false),
  }
}

function parseCellValue(scope: SheetScope, cellEl: XmlElement, ref: string): CellValue | undefined {
  const cellType = attr(cellEl, 't') ?? DEFAULT_CELL_TYPE

  if (cellType === 'inlineStr') {
    const is = child(cellEl, 'is')
    if (!is) return undefined
    const item = parseStringItem(is)
    return item.kind === 'text' ? { type: 'text', value: item.text } : { type: 'rich', value: item.runs }
  }

  const v = child(cellEl, 'v')
  if (!v || v.text === '') return undefined
  return extractCellValue(scope.ctx.sharedStrings, cellType, v.text, warn(scope, ref))
}

/**
 * 解析 sheetData：稀疏行属性与单元格
 *
 * 同一位置出现多次时保留第一个单元格。
 */
function parseSheetData(
  scope: SheetScope,
  root: XmlElement
): { rowProperties: Map<number, RowProperties>; cells: CellMap } {
  const rowProperties = new Map<number, RowProperties>()
  const cells = new CellMap()

  for (const rowEl of children(child(root, 'sheetData'), 'row')) {
    const r = attrInt(rowEl, 'r')
    if (r === undefined) {
      warn(scope)(Warnings.missingReference('row'))
      continue
    }

    const props = parseRowProperties(rowEl)
    if (!isDefaultRowProperties(props)) rowProperties.set(r, props)

    for (const cellEl of children(rowEl, 'c')) {
      const ref = attr(cellEl, 'r')
      if (ref === undefined) {
        warn(scope)(Warnings.missingReference('c'))
        continue
      }

      const address = decodeCellRef(ref)
      if (!address) {
        throw Errors.inconsistentXlsx(`Invalid cell reference "${ref}" in ${scope.path}`, scope.path)
      }
      if (cells.has(address.row, address.col)) continue

      const cell: Cell = {}
      const style = attrInt(cellEl, 's')
      const value = parseCellValue(scope, cellEl, ref)
      const formula = child(cellEl, 'f')
      if (style !== undefined) cell.style = style
      if (value !== undefined) cell.value = value
      if (formula) cell.formula = parseFormula(formula)

      cells.set(address.row, address.col, cell)
    }
  }

  return { rowProperties, cells }
}

/**
 * 读取批注：批注关系指向的部件，加上 legacyDrawing 指向的 VML 绘图
 */
async function resolveComments(scope: SheetScope, root: XmlElement): Promise<CommentTable | undefined> {
  const legacyDrawingId = attr(child(root, 'legacyDrawing'), 'id', NS.r)
  const legacyDrawingPath =
    legacyDrawingId === undefined ? undefined : lookupRelPath(scope.path, scope.rels, legacyDrawingId)

  const commentsRel = findByType(scope.rels, REL_TYPES.comments)
  if (!commentsRel) return undefined

  return getComments(scope.ctx.archive, commentsRel.target, legacyDrawingPath)
}

/**
 * 将批注合并进单元格映射
 *
 * 已有单元格只补充批注；只有批注的位置生成仅含批注的单元格。批注不会覆盖值。
 */
function mergeComments(scope: SheetScope, cells: CellMap, comments: CommentTable): void {
  for (const [ref, comment] of comments) {
    const address = decodeCellRef(ref)
    if (!address) {
      throw Errors.inconsistentXlsx(`Invalid comment reference "${ref}" for ${scope.path}`, scope.path)
    }
    const existing = cells.get(address.row, address.col)
    cells.set(address.row, address.col, existing ? { ...existing, comment } : { comment })
  }
}

async function resolvePivotTables(scope: SheetScope): Promise<PivotTable[]> {
  const { archive, caches } = scope.ctx
  return Promise.all(
    allByType(scope.rels, REL_TYPES.pivotTable).map(async rel => {
      const ptRoot = await readXmlRequired(archive, rel.target)
      const pivotTable = parsePivotTable(ptRoot, cacheId => caches.get(cacheId))
      if (!pivotTable) throw Errors.inconsistentXlsx(`Bad pivot table in ${rel.target}`, rel.target)
      return pivotTable
    })
  )
}

async function resolveTables(scope: SheetScope, root: XmlElement): Promise<Table[]> {
  const tableIds = children(child(root, 'tableParts'), 'tablePart').flatMap(el => attr(el, 'id', NS.r) ?? [])
  const paths = tableIds.map(refId => lookupRelPath(scope.path, scope.rels, refId))
  return Promise.all(paths.map(tablePath => getTable(scope.ctx.archive, tablePath)))
}

/**
 * 解析工作表部件
 *
 * @param ctx - 解析上下文（共享字符串表、内容类型索引、数据透视缓存表等）
 * @param file - 工作表名称与部件路径
 * @throws {XlsxParseError} 部件缺失、格式错误、关系 ID 悬空或引用部件结构不一致时抛出
 *
 * @example
 * ```typescript
 * const sheet = await extractSheet(ctx, { name: 'Sheet1', path: 'xl/worksheets/sheet1.xml' })
 * sheet.cells.get(1, 1) // { value: { type: 'text', value: 'Hello' } }
 * ```
 */
export async function extractSheet(ctx: ParsingContext, file: WorksheetFile): Promise<Worksheet> {
  const { path } = file
  const root = await readXmlRequired(ctx.archive, path)
  const rels = await getRelationships(ctx.archive, path)
  const scope: SheetScope = { ctx, path, rels, warnings: ctx.warnings.createChild(path) }

  // sheetViews 与 pageSetup 在 schema 中至多出现一次
  const sheetViewsEl = single(scope, root, 'sheetViews')
  const views = sheetViewsEl ? parseSheetViews(sheetViewsEl) : []
  const pageSetupEl = single(scope, root, 'pageSetup')

  const comments = await resolveComments(scope, root)
  const { rowProperties, cells } = parseSheetData(scope, root)
  if (comments) mergeComments(scope, cells, comments)

  const columnsProperties = children(root, 'cols')
    .flatMap(cols => children(cols, 'col'))
    .flatMap(col => parseColumn(col) ?? [])

  const merges: Range[] = children(root, 'mergeCells')
    .flatMap(mc => children(mc, 'mergeCell'))
    .flatMap(mc => attr(mc, 'ref') ?? [])

  const conditionalFormattings = new Map<SqRef, CfRule[]>(
    children(root, 'conditionalFormatting').flatMap(cf => {
      const pair = parseConditionalFormatting(cf)
      return pair ? [pair] : []
    })
  )

  const dataValidations = new Map<SqRef, DataValidation>(
    children(root, 'dataValidations')
      .flatMap(dvs => children(dvs, 'dataValidation'))
      .flatMap(dv => {
        const pair = parseDataValidation(dv)
        return pair ? [pair] : []
      })
  )

  const protectionEl = child(root, 'sheetProtection')
  const autoFilterEl = child(root, 'autoFilter')

  const drawingId = attr(child(root, 'drawing'), 'id', NS.r)
  const drawing =
    drawingId === undefined
      ? undefined
      : await getDrawing(ctx.archive, ctx.contentTypes, lookupRelPath(path, rels, drawingId), warn(scope))

  const pivotTables = await resolvePivotTables(scope)
  const tables = await resolveTables(scope, root)

  ctx.logger.debug(
    {
      path,
      cells: cells.size,
      rows: rowProperties.size,
      comments: comments?.size ?? 0,
      pivotTables: pivotTables.length,
      tables: tables.length,
      hasDrawing: drawing !== undefined,
    },
    `Worksheet extracted: ${file.name}`
  )

  return {
    columnsProperties,
    rowProperties,
    cells,
    drawing,
    merges,
    sheetViews: views.length > 0 ? views : undefined,
    pageSetup: pageSetupEl ? parsePageSetup(pageSetupEl) : undefined,
    conditionalFormattings,
    dataValidations,
    pivotTables,
    autoFilter: autoFilterEl ? parseAutoFilter(autoFilterEl) : undefined,
    tables,
    protection: protectionEl ? parseSheetProtection(protectionEl) : undefined,
  }
}

export default { extractSheet, parseFormula, isDefaultRowProperties }
