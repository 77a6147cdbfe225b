/**
 * 页面设置解析器
 *
 * @module modules/xlsx/services/parser/elements/page-setup
 */

import type { PageSetup } from '../../../types/xlsx.js'
import { type XmlElement, NS, attr, attrInt, attrBool } from '../xml.js'

export function parsePageSetup(el: XmlElement): PageSetup {
  return {
    paperSize: attrInt(el, 'paperSize'),
    paperHeight: attr(el, 'paperHeight'),
    paperWidth: attr(el, 'paperWidth'),
    scale: attrInt(el, 'scale'),
    firstPageNumber: attrInt(el, 'firstPageNumber'),
    fitToWidth: attrInt(el, 'fitToWidth'),
    fitToHeight: attrInt(el, 'fitToHeight'),
    pageOrder: attr(el, 'pageOrder'),
    orientation: attr(el, 'orientation'),
    usePrinterDefaults: attrBool(el, 'usePrinterDefaults'),
    blackAndWhite: attrBool(el, 'blackAndWhite'),
    draft: attrBool(el, 'draft'),
    cellComments: attr(el, 'cellComments'),
    useFirstPageNumber: attrBool(el, 'useFirstPageNumber'),
    errors: attr(el, 'errors'),
    horizontalDpi: attrInt(el, 'horizontalDpi'),
    verticalDpi: attrInt(el, 'verticalDpi'),
    copies: attrInt(el, 'copies'),
    id: attr(el, 'id', NS.r),
  }
}
