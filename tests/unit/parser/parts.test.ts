/**
 * 压缩包、部件读取、内容类型与共享字符串单元测试
 */

import { describe, it, expect } from 'vitest'
import { openArchive } from '../../../src/modules/xlsx/services/parser/archive.js'
import {
  readXmlRequired,
  readXmlOptional,
  readBytesRequired,
  readBytesOptional,
} from '../../../src/modules/xlsx/services/parser/utils.js'
import { getContentTypes, lookupContentType } from '../../../src/modules/xlsx/services/parser/content-types.js'
import { getSharedStrings, sstItem } from '../../../src/modules/xlsx/services/parser/shared-strings.js'
import { archiveOf, buildZip, contentTypesXml, corruptEntry, MAIN_NS } from '../../helpers/xlsx-builder.js'

describe('openArchive', () => {
  it('should list files and read text and bytes', async () => {
    const archive = await archiveOf({ 'xl/a.xml': '<a/>', 'xl/media/b.bin': Buffer.from([1, 2, 3]) })

    expect(archive.paths.sort()).toEqual(['xl/a.xml', 'xl/media/b.bin'])
    expect(archive.has('xl/a.xml')).toBe(true)
    expect(archive.has('xl/missing.xml')).toBe(false)
    expect(await archive.readText('xl/a.xml')).toBe('<a/>')
    expect(await archive.readBytes('xl/media/b.bin')).toEqual(Buffer.from([1, 2, 3]))
    expect(await archive.readText('xl/missing.xml')).toBeUndefined()
  })

  it('should fail with ERR_INVALID_FILE when an entry cannot be decompressed', async () => {
    const zip = await buildZip({ 'xl/a.xml': `<a>${'data '.repeat(50)}</a>`, 'xl/b.xml': '<b/>' }, 'DEFLATE')
    const archive = await openArchive(corruptEntry(zip, 'xl/a.xml'))

    await expect(archive.readText('xl/a.xml')).rejects.toMatchObject({ code: 'ERR_INVALID_FILE', path: 'xl/a.xml' })
    await expect(archive.readBytes('xl/a.xml')).rejects.toMatchObject({ code: 'ERR_INVALID_FILE', path: 'xl/a.xml' })
    expect(await archive.readText('xl/b.xml')).toBe('<b/>')
  })

  it('should fail with ERR_INVALID_ZIP for bytes that are not a zip archive', async () => {
    await expect(openArchive(Buffer.from('plain text, not a zip'))).rejects.toMatchObject({
      code: 'ERR_INVALID_ZIP',
    })
  })
})

describe('part readers', () => {
  it('readXmlRequired should fail with ERR_MISSING_FILE naming the path', async () => {
    const archive = await archiveOf({})
    await expect(readXmlRequired(archive, 'xl/workbook.xml')).rejects.toMatchObject({
      code: 'ERR_MISSING_FILE',
      path: 'xl/workbook.xml',
      message: 'Missing file: xl/workbook.xml',
    })
  })

  it('readXmlRequired should fail with ERR_INVALID_FILE for malformed XML', async () => {
    const archive = await archiveOf({ 'xl/workbook.xml': '<workbook><sheets></workbook>' })
    await expect(readXmlRequired(archive, 'xl/workbook.xml')).rejects.toMatchObject({
      code: 'ERR_INVALID_FILE',
      path: 'xl/workbook.xml',
    })
  })

  it('readXmlOptional should return undefined only for a missing part', async () => {
    const archive = await archiveOf({ 'xl/bad.xml': '<a><b></a>' })

    expect(await readXmlOptional(archive, 'xl/none.xml')).toBeUndefined()
    await expect(readXmlOptional(archive, 'xl/bad.xml')).rejects.toMatchObject({ code: 'ERR_INVALID_FILE' })
  })

  it('readBytesRequired should fail with ERR_MISSING_FILE', async () => {
    const archive = await archiveOf({})
    await expect(readBytesRequired(archive, 'xl/media/image1.png')).rejects.toMatchObject({
      code: 'ERR_MISSING_FILE',
      path: 'xl/media/image1.png',
    })
  })

  it('readBytesOptional should return undefined for a missing part and bytes otherwise', async () => {
    const archive = await archiveOf({ 'xl/styles.xml': '<styleSheet/>' })

    expect(await readBytesOptional(archive, 'xl/none.xml')).toBeUndefined()
    expect(await readBytesOptional(archive, 'xl/styles.xml')).toEqual(Buffer.from('<styleSheet/>'))
  })

  it('readBytesOptional should still fail for a corrupt entry', async () => {
    const zip = await buildZip({ 'xl/styles.xml': `<styleSheet>${'font '.repeat(50)}</styleSheet>` }, 'DEFLATE')
    const archive = await openArchive(corruptEntry(zip, 'xl/styles.xml'))

    await expect(readBytesOptional(archive, 'xl/styles.xml')).rejects.toMatchObject({
      code: 'ERR_INVALID_FILE',
      path: 'xl/styles.xml',
    })
  })
})

describe('content types', () => {
  it('should prefer overrides, then defaults by lower-cased extension', async () => {
    const archive = await archiveOf({
      '[Content_Types].xml': contentTypesXml(
        [['/xl/media/special.png', 'image/x-special']],
        [['png', 'image/png'], ['JPEG', 'image/jpeg']]
      ),
    })

    const contentTypes = await getContentTypes(archive)

    expect(lookupContentType(contentTypes, '/xl/media/special.png')).toBe('image/x-special')
    expect(lookupContentType(contentTypes, '/xl/media/image1.png')).toBe('image/png')
    expect(lookupContentType(contentTypes, '/xl/media/image2.PNG')).toBe('image/png')
    expect(lookupContentType(contentTypes, '/xl/media/photo.jpeg')).toBe('image/jpeg')
    expect(lookupContentType(contentTypes, '/xl/media/image3.gif')).toBeUndefined()
    expect(lookupContentType(contentTypes, '/xl/media/noext')).toBeUndefined()
  })

  it('should fail with ERR_MISSING_FILE when [Content_Types].xml is absent', async () => {
    const archive = await archiveOf({})
    await expect(getContentTypes(archive)).rejects.toMatchObject({
      code: 'ERR_MISSING_FILE',
      path: '[Content_Types].xml',
    })
  })
})

describe('shared strings', () => {
  it('should read plain and rich entries in order', async () => {
    const archive = await archiveOf({
      'xl/sharedStrings.xml':
        `<sst ${MAIN_NS}><si><t>Hello</t></si>` +
        '<si><r><rPr><b/><sz val="11"/></rPr><t>Bold</t></r><r><t xml:space="preserve"> plain</t></r></si>' +
        '<si><t/></si></sst>',
    })

    const sst = await getSharedStrings(archive)

    expect(sst).toHaveLength(3)
    expect(sst[0]).toEqual({ kind: 'text', text: 'Hello' })
    expect(sst[2]).toEqual({ kind: 'text', text: '' })

    const rich = sst[1]
    expect(rich?.kind).toBe('rich')
    if (rich?.kind !== 'rich') return
    expect(rich.runs.map(r => r.text)).toEqual(['Bold', ' plain'])
    expect(rich.runs[0]?.properties?.bold).toBe(true)
    expect(rich.runs[0]?.properties?.size).toBe(11)
    expect(rich.runs[1]?.properties).toBeUndefined()
  })

  it('should be empty when the part is absent', async () => {
    const archive = await archiveOf({})
    expect(await getSharedStrings(archive)).toEqual([])
  })

  it('sstItem should return undefined out of range', () => {
    const sst = [{ kind: 'text' as const, text: 'only' }]

    expect(sstItem(sst, 0)).toEqual({ kind: 'text', text: 'only' })
    expect(sstItem(sst, 1)).toBeUndefined()
    expect(sstItem(sst, -1)).toBeUndefined()
  })
})
