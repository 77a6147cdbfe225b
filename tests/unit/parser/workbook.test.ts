/**
 * 工作簿解析器单元测试
 */

import { describe, it, expect } from 'vitest'
import { readWorkbook, findWorkbookPath, DEFAULT_WORKBOOK_PATH } from '../../../src/modules/xlsx/services/parser/workbook.js'
import type { PackageFiles } from '../../helpers/xlsx-builder.js'
import { archiveOf, relsXml, relType, workbookXml, MAIN_NS } from '../../helpers/xlsx-builder.js'
import { CACHE_XML } from '../../helpers/fixtures.js'

const CACHE_PATH = 'xl/pivotCache/pivotCacheDefinition1.xml'

const EXTRA =
  '<definedNames>' +
  '<definedName name="_xlnm.Print_Area" localSheetId="0">Data!$A$1:$C$10</definedName>' +
  '<definedName name="Rate">0.2</definedName>' +
  '</definedNames>' +
  '<pivotCaches><pivotCache cacheId="7" r:id="rId3"/></pivotCaches>'

function workbookFiles(overrides: PackageFiles = {}): PackageFiles {
  return {
    '_rels/.rels': relsXml([{ id: 'rId1', type: relType('officeDocument'), target: 'xl/workbook.xml' }]),
    'xl/workbook.xml': workbookXml(
      [
        ['Data', 'rId1'],
        ['Summary', 'rId2'],
      ],
      EXTRA
    ),
    'xl/_rels/workbook.xml.rels': relsXml([
      { id: 'rId1', type: relType('worksheet'), target: 'worksheets/sheet1.xml' },
      { id: 'rId2', type: relType('worksheet'), target: '/xl/worksheets/sheet2.xml' },
      { id: 'rId3', type: relType('pivotCacheDefinition'), target: 'pivotCache/pivotCacheDefinition1.xml' },
    ]),
    [CACHE_PATH]: CACHE_XML,
    ...overrides,
  }
}

describe('findWorkbookPath', () => {
  it('should follow the officeDocument package relationship', async () => {
    const archive = await archiveOf({
      '_rels/.rels': relsXml([{ id: 'rId1', type: relType('officeDocument'), target: 'xl/book.xml' }]),
    })
    expect(await findWorkbookPath(archive)).toBe('xl/book.xml')
  })

  it('should fall back to the default path without package relationships', async () => {
    const archive = await archiveOf({})
    expect(await findWorkbookPath(archive)).toBe(DEFAULT_WORKBOOK_PATH)
  })
})

describe('readWorkbook', () => {
  it('should list sheets in declaration order with resolved part paths', async () => {
    const workbook = await readWorkbook(await archiveOf(workbookFiles()))

    expect(workbook.path).toBe('xl/workbook.xml')
    expect(workbook.sheets).toEqual([
      { name: 'Data', path: 'xl/worksheets/sheet1.xml' },
      { name: 'Summary', path: 'xl/worksheets/sheet2.xml' },
    ])
  })

  it('should read defined names', async () => {
    const workbook = await readWorkbook(await archiveOf(workbookFiles()))

    expect(workbook.definedNames).toEqual([
      { name: '_xlnm.Print_Area', localSheetId: '0', value: 'Data!$A$1:$C$10' },
      { name: 'Rate', value: '0.2' },
    ])
  })

  it('should load pivot caches keyed by cache id', async () => {
    const workbook = await readWorkbook(await archiveOf(workbookFiles()))

    expect([...workbook.caches.keys()]).toEqual([7])
    expect(workbook.caches.get(7)?.fields.map(f => f.name)).toEqual(['Region', 'Year', 'Amount'])
  })

  it('should skip sheet entries without a relationship id', async () => {
    const files = workbookFiles({
      'xl/workbook.xml': `<workbook ${MAIN_NS}><sheets><sheet name="Orphan" sheetId="1"/><sheet name="Data" sheetId="2" r:id="rId1"/></sheets></workbook>`,
    })

    const workbook = await readWorkbook(await archiveOf(files))

    expect(workbook.sheets.map(s => s.name)).toEqual(['Data'])
    expect(workbook.caches.size).toBe(0)
  })

  it('should fail with ERR_MISSING_FILE when the workbook part is absent', async () => {
    const files = workbookFiles()
    delete files['xl/workbook.xml']

    await expect(readWorkbook(await archiveOf(files))).rejects.toMatchObject({
      code: 'ERR_MISSING_FILE',
      path: 'xl/workbook.xml',
    })
  })

  it('should fail with ERR_INVALID_REF for a dangling sheet id', async () => {
    const files = workbookFiles({ 'xl/workbook.xml': workbookXml([['Ghost', 'rId9']]) })

    await expect(readWorkbook(await archiveOf(files))).rejects.toMatchObject({
      code: 'ERR_INVALID_REF',
      path: 'xl/workbook.xml',
      refId: 'rId9',
    })
  })

  it('should fail with ERR_INCONSISTENT_XLSX for a malformed pivot cache', async () => {
    const files = workbookFiles({ [CACHE_PATH]: `<pivotCacheDefinition ${MAIN_NS}/>` })

    await expect(readWorkbook(await archiveOf(files))).rejects.toMatchObject({
      code: 'ERR_INCONSISTENT_XLSX',
      message: `Bad pivot table cache in ${CACHE_PATH}`,
    })
  })

  it('should fail with ERR_INCONSISTENT_XLSX for a defined name without a name', async () => {
    const files = workbookFiles({
      'xl/workbook.xml': workbookXml([['Data', 'rId1']], '<definedNames><definedName>A1</definedName></definedNames>'),
    })

    await expect(readWorkbook(await archiveOf(files))).rejects.toMatchObject({ code: 'ERR_INCONSISTENT_XLSX' })
  })
})
