/**
 * 工作表保护解析器
 *
 * @module modules/xlsx/services/parser/elements/protection
 * @description 属性缺省值遵循 ECMA-376 CT_SheetProtection。
 */

import type { SheetProtection } from '../../../types/xlsx.js'
import { type XmlElement, attr, attrInt, attrBool } from '../xml.js'

export function parseSheetProtection(el: XmlElement): SheetProtection {
  return {
    password: attr(el, 'password'),
    algorithmName: attr(el, 'algorithmName'),
    hashValue: attr(el, 'hashValue'),
    saltValue: attr(el, 'saltValue'),
    spinCount: attrInt(el, 'spinCount'),
    sheet: attrBool(el, 'sheet', false),
    objects: attrBool(el, 'objects', false),
    scenarios: attrBool(el, 'scenarios', false),
    formatCells: attrBool(el, 'formatCells', true),
    formatColumns: attrBool(el, 'formatColumns', true),
    formatRows: attrBool(el, 'formatRows', true),
    insertColumns: attrBool(el, 'insertColumns', true),
    insertRows: attrBool(el, 'insertRows', true),
    insertHyperlinks: attrBool(el, 'insertHyperlinks', true),
    deleteColumns: attrBool(el, 'deleteColumns', true),
    deleteRows: attrBool(el, 'deleteRows', true),
    selectLockedCells: attrBool(el, 'selectLockedCells', false),
    sort: attrBool(el, 'sort', true),
    autoFilter: attrBool(el, 'autoFilter', true),
    pivotTables: attrBool(el, 'pivotTables', true),
    selectUnlockedCells: attrBool(el, 'selectUnlockedCells', false),
  }
}
