/**
 * 工作簿解析器
 *
 * @module modules/xlsx/services/parser/workbook
 * @description 解析工作簿部件：工作表名称与部件路径（保持声明顺序）、定义名称，
 * 以及按缓存 ID 建立的数据透视缓存表。
 */

import type { Archive } from './archive.js'
import type { CacheId, DefinedName, PivotCache, PivotCacheTable } from '../../types/xlsx.js'
import { NS, child, children, attr, attrInt } from './xml.js'
import { readXmlRequired } from './utils.js'
import { getRelationships, findByType, lookupRelPath, REL_TYPES, type Relationships } from './relationships.js'
import { parseCache } from './pivot-table.js'
import { Errors } from '../../../../utils/errors.js'

export const DEFAULT_WORKBOOK_PATH = 'xl/workbook.xml'

/**
 * 工作表部件信息
 */
export interface WorksheetFile {
  name: string
  path: string
}

/**
 * 工作簿解析结果
 */
export interface WorkbookResult {
  path: string
  sheets: WorksheetFile[]
  definedNames: DefinedName[]
  caches: PivotCacheTable
}

/**
 * 通过包级关系查找工作簿部件路径，找不到时使用默认路径
 */
export async function findWorkbookPath(archive: Archive): Promise<string> {
  const packageRels = await getRelationships(archive, '')
  const rel = findByType(packageRels, REL_TYPES.officeDocument)
  return rel && !rel.external ? rel.target : DEFAULT_WORKBOOK_PATH
}

async function readCache(
  archive: Archive,
  wbPath: string,
  wbRels: Relationships,
  cacheId: CacheId,
  refId: string
): Promise<[CacheId, PivotCache]> {
  const cachePath = lookupRelPath(wbPath, wbRels, refId)
  const root = await readXmlRequired(archive, cachePath)
  const cache = parseCache(root)
  if (!cache) throw Errors.inconsistentXlsx(`Bad pivot table cache in ${cachePath}`, cachePath)
  return [cacheId, cache]
}

/**
 * 读取工作簿
 *
 * @throws {XlsxParseError} 工作簿缺失、格式错误，或工作表 / 缓存关系 ID 无法解析时抛出
 *
 * @example
 * ```typescript
 * const { sheets, definedNames } = await readWorkbook(archive)
 * sheets[0] // { name: 'Sheet1', path: 'xl/worksheets/sheet1.xml' }
 * ```
 */
export async function readWorkbook(archive: Archive): Promise<WorkbookResult> {
  const wbPath = await findWorkbookPath(archive)
  const root = await readXmlRequired(archive, wbPath)
  const wbRels = await getRelationships(archive, wbPath)

  const definedNames: DefinedName[] = children(child(root, 'definedNames'), 'definedName').map(el => {
    const name = attr(el, 'name')
    if (name === undefined) {
      throw Errors.inconsistentXlsx(`definedName without name attribute in ${wbPath}`, wbPath)
    }
    return { name, localSheetId: attr(el, 'localSheetId'), value: el.text }
  })

  const sheets: WorksheetFile[] = []
  for (const sheet of children(child(root, 'sheets'), 'sheet')) {
    const name = attr(sheet, 'name')
    const refId = attr(sheet, 'id', NS.r)
    if (name === undefined || refId === undefined) continue
    sheets.push({ name, path: lookupRelPath(wbPath, wbRels, refId) })
  }

  const cacheRefs: Array<[CacheId, string]> = []
  for (const el of children(child(root, 'pivotCaches'), 'pivotCache')) {
    const cacheId = attrInt(el, 'cacheId')
    const refId = attr(el, 'id', NS.r)
    if (cacheId !== undefined && refId !== undefined) cacheRefs.push([cacheId, refId])
  }
  const caches = new Map(
    await Promise.all(cacheRefs.map(([cacheId, refId]) => readCache(archive, wbPath, wbRels, cacheId, refId)))
  )

  return { path: wbPath, sheets, definedNames, caches }
}

export default { readWorkbook, findWorkbookPath }
