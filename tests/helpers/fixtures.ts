/**
 * 多个测试共用的部件 XML
 */

import { MAIN_NS } from './xlsx-builder.js'

export const CACHE_XML =
  `<pivotCacheDefinition ${MAIN_NS} r:id="rId1">` +
  '<cacheSource type="worksheet"><worksheetSource ref="A1:C4" sheet="Data"/></cacheSource>' +
  '<cacheFields count="3">' +
  '<cacheField name="Region"><sharedItems><s v="North"/><s v="South"/></sharedItems></cacheField>' +
  '<cacheField name="Year"><sharedItems containsNumber="1"><n v="2023"/><n v="2024"/></sharedItems></cacheField>' +
  '<cacheField name="Amount"><sharedItems/></cacheField>' +
  '</cacheFields></pivotCacheDefinition>'
