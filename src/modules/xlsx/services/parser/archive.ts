/**
 * 压缩包访问
 *
 * @module modules/xlsx/services/parser/archive
 * @description 包装 JSZip，按包内路径读取部件的原始字节或文本。
 */

import JSZip from 'jszip'
import { Errors } from '../../../../utils/errors.js'

/**
 * 只读压缩包
 */
export interface Archive {
  /** 包内所有文件路径（不含目录） */
  readonly paths: string[]
  has(path: string): boolean
  /** 读取原始字节，不存在时返回 undefined；压缩数据损坏时抛出 ERR_INVALID_FILE */
  readBytes(path: string): Promise<Buffer | undefined>
  /** 以 UTF-8 读取文本，不存在时返回 undefined */
  readText(path: string): Promise<string | undefined>
}

/**
 * 等待条目解压；压缩数据损坏时 JSZip 抛出普通 Error，这里统一归类为 ERR_INVALID_FILE
 */
async function inflate<T>(path: string, pending: Promise<T>): Promise<T> {
  try {
    return await pending
  } catch {
    throw Errors.invalidFile(path)
  }
}

class ZipArchive implements Archive {
  readonly paths: string[]

  constructor(private readonly zip: JSZip) {
    this.paths = Object.values(zip.files)
      .filter(file => !file.dir)
      .map(file => file.name)
  }

  has(path: string): boolean {
    const file = this.zip.file(path)
    return file !== null && !file.dir
  }

  async readBytes(path: string): Promise<Buffer | undefined> {
    const file = this.zip.file(path)
    if (!file || file.dir) return undefined
    return inflate(path, file.async('nodebuffer'))
  }

  async readText(path: string): Promise<string | undefined> {
    const file = this.zip.file(path)
    if (!file || file.dir) return undefined
    return inflate(path, file.async('string'))
  }
}

/**
 * 打开压缩包
 *
 * @param buffer - .xlsx 文件的二进制数据
 * @throws {XlsxParseError} ERR_INVALID_ZIP，输入不是有效的 zip 压缩包
 *
 * @example
 * ```typescript
 * const archive = await openArchive(await readFile('book.xlsx'))
 * const xml = await archive.readText('xl/workbook.xml')
 * ```
 */
export async function openArchive(buffer: Buffer | Uint8Array): Promise<Archive> {
  let zip: JSZip
  try {
    zip = await JSZip.loadAsync(buffer)
  } catch {
    throw Errors.invalidZipArchive()
  }
  return new ZipArchive(zip)
}

export default { openArchive }
