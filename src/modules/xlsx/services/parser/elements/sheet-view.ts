/**
 * 工作表视图解析器
 *
 * @module modules/xlsx/services/parser/elements/sheet-view
 */

import type { Pane, Selection, SheetView } from '../../../types/xlsx.js'
import { type XmlElement, child, children, attr, attrInt, attrNumber, attrBool } from '../xml.js'

function parsePane(el: XmlElement): Pane {
  return {
    xSplit: attrNumber(el, 'xSplit'),
    ySplit: attrNumber(el, 'ySplit'),
    topLeftCell: attr(el, 'topLeftCell'),
    activePane: attr(el, 'activePane'),
    state: attr(el, 'state'),
  }
}

function parseSelection(el: XmlElement): Selection {
  return {
    pane: attr(el, 'pane'),
    activeCell: attr(el, 'activeCell'),
    activeCellId: attrInt(el, 'activeCellId'),
    sqref: attr(el, 'sqref'),
  }
}

/**
 * 解析 sheetView 元素
 */
export function parseSheetView(el: XmlElement): SheetView {
  const pane = child(el, 'pane')
  return {
    workbookViewId: attrInt(el, 'workbookViewId') ?? 0,
    tabSelected: attrBool(el, 'tabSelected'),
    showGridLines: attrBool(el, 'showGridLines'),
    showFormulas: attrBool(el, 'showFormulas'),
    showRowColHeaders: attrBool(el, 'showRowColHeaders'),
    showZeros: attrBool(el, 'showZeros'),
    rightToLeft: attrBool(el, 'rightToLeft'),
    view: attr(el, 'view'),
    topLeftCell: attr(el, 'topLeftCell'),
    zoomScale: attrInt(el, 'zoomScale'),
    zoomScaleNormal: attrInt(el, 'zoomScaleNormal'),
    pane: pane ? parsePane(pane) : undefined,
    selections: children(el, 'selection').map(parseSelection),
  }
}

/**
 * 解析 sheetViews 元素下的所有 sheetView
 */
export function parseSheetViews(el: XmlElement): SheetView[] {
  return children(el, 'sheetView').map(parseSheetView)
}
