/**
 * xlsx 解码入口测试
 *
 * 覆盖从压缩包到文档模型的完整流程。
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parseXlsx, parseXlsxEither } from '../../../src/modules/xlsx/services/parser/index.js'
import { parseXlsxFile, XlsxParseError } from '../../../src/index.js'
import { NS } from '../../../src/modules/xlsx/services/parser/xml.js'
import type { PackageFiles } from '../../helpers/xlsx-builder.js'
import {
  buildZip,
  contentTypesXml,
  corruptEntry,
  minimalPackage,
  relsXml,
  relType,
  sheetXml,
  silentLogger,
  workbookXml,
} from '../../helpers/xlsx-builder.js'

const BASIC_SHEET = '<sheetData><row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1"><v>42</v></c></row></sheetData>'

const options = { logger: silentLogger(), requestId: 'test-request' }

function twoSheetPackage(): PackageFiles {
  return {
    '[Content_Types].xml': contentTypesXml(),
    '_rels/.rels': relsXml([{ id: 'rId1', type: relType('officeDocument'), target: 'xl/workbook.xml' }]),
    'xl/workbook.xml': workbookXml([
      ['First', 'rId1'],
      ['Second', 'rId2'],
    ]),
    'xl/_rels/workbook.xml.rels': relsXml([
      { id: 'rId1', type: relType('worksheet'), target: 'worksheets/sheet1.xml' },
      { id: 'rId2', type: relType('worksheet'), target: 'worksheets/sheet2.xml' },
    ]),
    'xl/worksheets/sheet1.xml': sheetXml('<sheetData><row r="1"><c r="A1"><v>1</v></c></row></sheetData>'),
    'xl/worksheets/sheet2.xml': sheetXml('<sheetData><row r="2"><c r="B2"><v>2</v></c></row></sheetData>'),
  }
}

describe('parseXlsx', () => {
  it('should decode a minimal workbook', async () => {
    const xlsx = await parseXlsx(await buildZip(minimalPackage(BASIC_SHEET, ['Hello'])), options)

    expect(xlsx.sheets.map(s => s.name)).toEqual(['Sheet1'])
    const cells = xlsx.sheets[0]?.worksheet.cells
    expect(cells?.get(1, 1)?.value).toEqual({ type: 'text', value: 'Hello' })
    expect(cells?.get(1, 2)?.value).toEqual({ type: 'double', value: 42 })
    expect(xlsx.definedNames).toEqual([])
    expect(xlsx.customProperties.size).toBe(0)
  })

  it('should pass styles through as raw bytes', async () => {
    const files = minimalPackage(BASIC_SHEET, ['Hello'])
    files['xl/styles.xml'] = '<styleSheet/>'

    const xlsx = await parseXlsx(await buildZip(files), options)

    expect(xlsx.styles.raw).toEqual(Buffer.from('<styleSheet/>'))
  })

  it('should use empty styles when the part is absent', async () => {
    const xlsx = await parseXlsx(await buildZip(minimalPackage(BASIC_SHEET, ['Hello'])), options)
    expect(xlsx.styles.raw.length).toBe(0)
  })

  it('should keep workbook sheet order with sequential and parallel extraction', async () => {
    const buffer = await buildZip(twoSheetPackage())

    const parallel = await parseXlsx(buffer, options)
    const sequential = await parseXlsx(buffer, { ...options, parallel: false })

    expect(parallel.sheets.map(s => s.name)).toEqual(['First', 'Second'])
    expect(sequential.sheets.map(s => s.name)).toEqual(['First', 'Second'])
    expect([...(sequential.sheets[1]?.worksheet.cells ?? [])]).toEqual([[2, 2, { value: { type: 'double', value: 2 } }]])
  })

  it('should produce the same model for the same input', async () => {
    const buffer = await buildZip(minimalPackage(BASIC_SHEET, ['Hello']))

    const first = await parseXlsx(buffer, options)
    const second = await parseXlsx(buffer, options)

    expect([...(second.sheets[0]?.worksheet.cells ?? [])]).toEqual([...(first.sheets[0]?.worksheet.cells ?? [])])
  })

  it('should fail with ERR_INVALID_ZIP for bytes that are not a zip archive', async () => {
    await expect(parseXlsx(Buffer.from('not a zip'), options)).rejects.toMatchObject({ code: 'ERR_INVALID_ZIP' })
  })

  it('should fail with ERR_MISSING_FILE when [Content_Types].xml is absent', async () => {
    const files = minimalPackage(BASIC_SHEET, ['Hello'])
    delete files['[Content_Types].xml']

    const error = await parseXlsx(await buildZip(files), options).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(XlsxParseError)
    expect(error).toMatchObject({ code: 'ERR_MISSING_FILE', path: '[Content_Types].xml' })
  })

  it('should fail with ERR_INVALID_REF for a dangling drawing id', async () => {
    const buffer = await buildZip(minimalPackage('<sheetData/><drawing r:id="rId5"/>'))

    await expect(parseXlsx(buffer, options)).rejects.toMatchObject({
      code: 'ERR_INVALID_REF',
      path: 'xl/worksheets/sheet1.xml',
      refId: 'rId5',
    })
  })
})

describe('parseXlsxEither', () => {
  it('should return the model with grouped warnings', async () => {
    const body = '<sheetData><row r="1"><c r="A1" t="s"><v>9</v></c><c r="B1" t="s"><v>7</v></c></row></sheetData>'

    const result = await parseXlsxEither(await buildZip(minimalPackage(body, ['Hello'])), options)

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.data.sheets[0]?.worksheet.cells.size).toBe(2)
    expect(result.warnings).toEqual([
      { code: 'WARN_SHARED_STRING_INDEX', message: 'Shared string index "9" does not resolve', count: 2 },
    ])
  })

  it('should report unsupported custom properties as warnings', async () => {
    const files = minimalPackage(BASIC_SHEET, ['Hello'])
    files['docProps/custom.xml'] =
      `<Properties xmlns="${NS.customProps}" xmlns:vt="${NS.vt}">` +
      '<property pid="2" name="Blob"><vt:blob>AAAA</vt:blob></property></Properties>'

    const result = await parseXlsxEither(await buildZip(files), options)

    expect(result.success && result.warnings.map(w => w.code)).toEqual(['WARN_UNSUPPORTED_PROPERTY'])
  })

  it('should classify a corrupt worksheet entry as ERR_INVALID_FILE', async () => {
    const zip = await buildZip(minimalPackage(BASIC_SHEET, ['Hello']), 'DEFLATE')

    const result = await parseXlsxEither(corruptEntry(zip, 'xl/worksheets/sheet1.xml'), options)

    expect(result).toMatchObject({
      success: false,
      error: { code: 'ERR_INVALID_FILE', path: 'xl/worksheets/sheet1.xml' },
    })
  })

  it('should return the classified error instead of throwing', async () => {
    const result = await parseXlsxEither(Buffer.from('not a zip'), options)

    expect(result).toMatchObject({
      success: false,
      error: { code: 'ERR_INVALID_ZIP', message: 'Input is not a valid zip archive' },
    })
  })
})

describe('parseXlsxFile', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('should read and decode a file from disk', async () => {
    dir = await mkdtemp(join(tmpdir(), 'xlsx-reader-'))
    const file = join(dir, 'book.xlsx')
    await writeFile(file, await buildZip(minimalPackage(BASIC_SHEET, ['Hello'])))

    const xlsx = await parseXlsxFile(file, options)

    expect(xlsx.sheets[0]?.worksheet.cells.get(1, 1)?.value).toEqual({ type: 'text', value: 'Hello' })
  })
})
