/**
 * xlsx 文档模型类型定义
 *
 * @module modules/xlsx/types/xlsx
 * @description 解码后的电子表格文档模型。所有关系 ID 在这里都已解析完毕，
 * 只有 Drawing 的未解析形式（Drawing<RefId | undefined, RefId>）仍携带关系 ID。
 */

import type { CellMap } from './cell-map.js'

/** 关系 ID，仅在声明它的部件的关系表内有意义 */
export type RefId = string

/** 单元格引用，例如 "B7" */
export type CellRef = string

/** 区域引用，例如 "A1:C3" */
export type Range = string

/** 以空格分隔的区域列表，例如 "A1:A4 C1:C4" */
export type SqRef = string

/** 数据透视缓存 ID */
export type CacheId = number

// ==================== 文本 ====================

/**
 * 颜色
 */
export interface Color {
  rgb?: string
  theme?: number
  indexed?: number
  tint?: number
  auto?: boolean
}

/**
 * 富文本运行属性
 */
export interface RunProperties {
  font?: string
  charset?: number
  family?: number
  bold?: boolean
  italic?: boolean
  strike?: boolean
  outline?: boolean
  shadow?: boolean
  condense?: boolean
  extend?: boolean
  color?: Color
  size?: number
  underline?: string
  vertAlign?: string
  scheme?: string
}

/**
 * 富文本运行
 */
export interface RichTextRun {
  text: string
  properties?: RunProperties
}

/**
 * 共享字符串表条目
 */
export type SharedStringItem =
  | { kind: 'text'; text: string }
  | { kind: 'rich'; runs: RichTextRun[] }

// ==================== 单元格 ====================

/**
 * 单元格值
 */
export type CellValue =
  | { type: 'text'; value: string }
  | { type: 'rich'; value: RichTextRun[] }
  | { type: 'double'; value: number }
  | { type: 'bool'; value: boolean }

/**
 * 单元格公式
 */
export interface CellFormula {
  expression: string
  type: 'normal' | 'shared' | 'array' | 'dataTable'
  /** 共享/数组公式的作用区域 */
  ref?: Range
  /** 共享公式索引 */
  sharedIndex?: number
}

/**
 * 批注
 */
export interface Comment {
  text: RichTextRun[]
  author: string
  visible: boolean
}

/**
 * 单元格
 */
export interface Cell {
  style?: number
  value?: CellValue
  comment?: Comment
  formula?: CellFormula
}

// ==================== 行列 ====================

/**
 * 行属性（仅保存偏离默认值的行）
 */
export interface RowProperties {
  height?: number
  style?: number
  hidden: boolean
}

/**
 * 列属性（宽度覆盖）
 */
export interface ColumnsProperties {
  min: number
  max: number
  width?: number
  style?: number
  hidden: boolean
  bestFit: boolean
  customWidth: boolean
  outlineLevel?: number
  collapsed: boolean
}

// ==================== 视图与打印 ====================

export interface Pane {
  xSplit?: number
  ySplit?: number
  topLeftCell?: CellRef
  activePane?: string
  state?: string
}

export interface Selection {
  pane?: string
  activeCell?: CellRef
  activeCellId?: number
  sqref?: SqRef
}

/**
 * 工作表视图
 */
export interface SheetView {
  workbookViewId: number
  tabSelected?: boolean
  showGridLines?: boolean
  showFormulas?: boolean
  showRowColHeaders?: boolean
  showZeros?: boolean
  rightToLeft?: boolean
  view?: string
  topLeftCell?: CellRef
  zoomScale?: number
  zoomScaleNormal?: number
  pane?: Pane
  selections: Selection[]
}

/**
 * 页面设置
 */
export interface PageSetup {
  paperSize?: number
  paperHeight?: string
  paperWidth?: string
  scale?: number
  firstPageNumber?: number
  fitToWidth?: number
  fitToHeight?: number
  pageOrder?: string
  orientation?: string
  usePrinterDefaults?: boolean
  blackAndWhite?: boolean
  draft?: boolean
  cellComments?: string
  useFirstPageNumber?: boolean
  errors?: string
  horizontalDpi?: number
  verticalDpi?: number
  copies?: number
  /** 打印机设置部件的关系 ID */
  id?: RefId
}

// ==================== 条件格式与数据验证 ====================

/**
 * 条件格式值对象
 */
export interface Cfvo {
  type: string
  value?: string
  gte: boolean
}

/**
 * 条件格式规则
 */
export interface CfRule {
  type: string
  priority: number
  dxfId?: number
  stopIfTrue: boolean
  operator?: string
  text?: string
  timePeriod?: string
  rank?: number
  percent: boolean
  bottom: boolean
  aboveAverage: boolean
  equalAverage: boolean
  stdDev?: number
  formulas: string[]
  colorScale?: { cfvos: Cfvo[]; colors: Color[] }
  dataBar?: { cfvos: Cfvo[]; color?: Color; minLength?: number; maxLength?: number; showValue: boolean }
  iconSet?: { iconSet: string; cfvos: Cfvo[]; showValue: boolean; percent: boolean; reverse: boolean }
}

/**
 * 数据验证规则
 */
export interface DataValidation {
  type: string
  operator: string
  errorStyle: string
  allowBlank: boolean
  showDropDown: boolean
  showInputMessage: boolean
  showErrorMessage: boolean
  errorTitle?: string
  error?: string
  promptTitle?: string
  prompt?: string
  formula1?: string
  formula2?: string
}

// ==================== 自动筛选 ====================

export interface CustomFilter {
  operator: string
  value: string
}

export type FilterCriteria =
  | { type: 'values'; values: string[]; blank: boolean }
  | { type: 'top10'; top: boolean; percent: boolean; value: number; filterValue?: number }
  | { type: 'custom'; and: boolean; filters: CustomFilter[] }
  | { type: 'dynamic'; dynamicType: string; value?: number; maxValue?: number }
  | { type: 'color'; dxfId?: number; cellColor: boolean }
  | { type: 'icon'; iconSet: string; iconId?: number }

export interface FilterColumn {
  colId: number
  hiddenButton: boolean
  showButton: boolean
  criteria?: FilterCriteria
}

/**
 * 自动筛选
 */
export interface AutoFilter {
  ref?: Range
  filterColumns: FilterColumn[]
}

// ==================== 保护 ====================

/**
 * 工作表保护
 */
export interface SheetProtection {
  password?: string
  algorithmName?: string
  hashValue?: string
  saltValue?: string
  spinCount?: number
  sheet: boolean
  objects: boolean
  scenarios: boolean
  formatCells: boolean
  formatColumns: boolean
  formatRows: boolean
  insertColumns: boolean
  insertRows: boolean
  insertHyperlinks: boolean
  deleteColumns: boolean
  deleteRows: boolean
  selectLockedCells: boolean
  sort: boolean
  autoFilter: boolean
  pivotTables: boolean
  selectUnlockedCells: boolean
}

// ==================== 绘图与图表 ====================

/**
 * 二进制文件信息（图片等）
 */
export interface FileInfo {
  /** 去掉 "xl/media/" 前缀后的文件名 */
  filename: string
  contentType: string
  contents: Buffer
}

export interface Marker {
  col: number
  colOffset: number
  row: number
  rowOffset: number
}

export interface Extent {
  cx: number
  cy: number
}

export interface Point {
  x: number
  y: number
}

export type Anchoring =
  | { type: 'twoCell'; from: Marker; to: Marker; editAs: string }
  | { type: 'oneCell'; from: Marker; ext: Extent }
  | { type: 'absolute'; pos: Point; ext: Extent }

export interface NonVisualProperties {
  id: number
  name: string
  description?: string
  title?: string
  hidden: boolean
}

export interface Transform {
  offset?: Point
  extents?: Extent
  rotation?: number
  flipH: boolean
  flipV: boolean
}

export interface PictureObject<P> {
  type: 'picture'
  macro?: string
  published: boolean
  nonVisual: NonVisualProperties
  /** 未解析时为关系 ID，解析后为文件信息 */
  image: P
  stretch: boolean
  transform?: Transform
}

export interface GraphicObject<G> {
  type: 'graphic'
  nonVisual: NonVisualProperties
  /** 未解析时为关系 ID，解析后为图表 */
  chart: G
  transform?: Transform
}

export type DrawingObject<P, G> = PictureObject<P> | GraphicObject<G>

export interface Anchor<P, G> {
  anchoring: Anchoring
  object: DrawingObject<P, G>
  clientData: { locksWithSheet: boolean; printsWithSheet: boolean }
}

export interface Drawing<P = FileInfo | undefined, G = ChartSpace> {
  anchors: Anchor<P, G>[]
}

export type UnresolvedDrawing = Drawing<RefId | undefined, RefId>

/**
 * 图表数据序列
 */
export interface ChartSeries {
  index: number
  order: number
  /** 系列名称（公式引用或字面量） */
  title?: string
  categories?: string
  values?: string
  xValues?: string
  yValues?: string
}

export type ChartType =
  | 'area'
  | 'area3D'
  | 'bar'
  | 'bar3D'
  | 'bubble'
  | 'doughnut'
  | 'line'
  | 'line3D'
  | 'ofPie'
  | 'pie'
  | 'pie3D'
  | 'radar'
  | 'scatter'
  | 'stock'
  | 'surface'
  | 'surface3D'

export interface ChartPlot {
  chartType: ChartType
  grouping?: string
  barDirection?: string
  scatterStyle?: string
  varyColors: boolean
  series: ChartSeries[]
}

/**
 * 图表
 */
export interface ChartSpace {
  title?: string
  autoTitleDeleted: boolean
  plots: ChartPlot[]
  legendPosition?: string
  plotVisOnly: boolean
  dispBlanksAs?: string
}

// ==================== 表格 ====================

export interface TableColumn {
  id: number
  name: string
  totalsRowFunction?: string
  totalsRowLabel?: string
  calculatedColumnFormula?: string
}

export interface TableStyleInfo {
  name?: string
  showFirstColumn: boolean
  showLastColumn: boolean
  showRowStripes: boolean
  showColumnStripes: boolean
}

/**
 * 表格
 */
export interface Table {
  id: number
  name?: string
  displayName: string
  ref: Range
  comment?: string
  headerRowCount: number
  totalsRowCount: number
  columns: TableColumn[]
  autoFilter?: AutoFilter
  styleInfo?: TableStyleInfo
}

// ==================== 数据透视 ====================

/**
 * 缓存字段
 */
export interface CacheField {
  name: string
  items: CellValue[]
}

/**
 * 数据透视缓存（工作簿级别）
 */
export interface PivotCache {
  sourceSheet: string
  sourceRef: CellRef
  fields: CacheField[]
}

export type PivotCacheTable = ReadonlyMap<CacheId, PivotCache>

/** 行/列字段中的数据值伪字段 */
export const DATA_FIELD_INDEX = -2

export interface PivotFieldInfo {
  name?: string
  axis?: string
  dataField: boolean
  showAll: boolean
  outline: boolean
  compact: boolean
}

export type PivotFieldName = { type: 'field'; name: string } | { type: 'values' }

export interface PivotDataField {
  name?: string
  field: string
  subtotal: string
  numFmtId?: number
}

/**
 * 数据透视表
 */
export interface PivotTable {
  name: string
  cacheId: CacheId
  dataCaption: string
  location: Range
  sourceSheet: string
  sourceRef: CellRef
  fields: PivotFieldInfo[]
  rowFields: PivotFieldName[]
  columnFields: PivotFieldName[]
  dataFields: PivotDataField[]
  rowGrandTotals: boolean
  columnGrandTotals: boolean
  outline: boolean
  outlineData: boolean
}

// ==================== 工作表与工作簿 ====================

/**
 * 工作表
 */
export interface Worksheet {
  columnsProperties: ColumnsProperties[]
  rowProperties: Map<number, RowProperties>
  cells: CellMap
  drawing?: Drawing
  merges: Range[]
  sheetViews?: SheetView[]
  pageSetup?: PageSetup
  conditionalFormattings: Map<SqRef, CfRule[]>
  dataValidations: Map<SqRef, DataValidation>
  pivotTables: PivotTable[]
  autoFilter?: AutoFilter
  tables: Table[]
  protection?: SheetProtection
}

/**
 * 定义名称
 */
export interface DefinedName {
  name: string
  localSheetId?: string
  value: string
}

/**
 * 自定义属性值
 */
export type Variant =
  | { type: 'string'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'integer'; value: number }
  | { type: 'double'; value: number }
  | { type: 'date'; value: Date }

/**
 * 样式（原始字节，不做解释）
 */
export interface Styles {
  raw: Buffer
}

export interface NamedWorksheet {
  name: string
  worksheet: Worksheet
}

/**
 * 解码结果
 */
export interface Xlsx {
  sheets: NamedWorksheet[]
  styles: Styles
  definedNames: DefinedName[]
  customProperties: Map<string, Variant>
}
