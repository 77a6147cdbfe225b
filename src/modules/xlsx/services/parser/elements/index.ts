/**
 * 元素解析器导出
 *
 * @module modules/xlsx/services/parser/elements
 * @description 导出工作表片段的叶子解析器。
 */

export { parseColor, parseRunProperties, parseRuns, parseStringItem, toRuns } from './rich-text.js'
export { parseSheetView, parseSheetViews } from './sheet-view.js'
export { parsePageSetup } from './page-setup.js'
export { parseColumn } from './columns.js'
export { parseSheetProtection } from './protection.js'
export { parseCfRule, parseConditionalFormatting } from './conditional-formatting.js'
export { parseDataValidation } from './data-validation.js'
export { parseAutoFilter } from './auto-filter.js'
