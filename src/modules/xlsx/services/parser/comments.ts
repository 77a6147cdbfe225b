/**
 * 批注解析器
 *
 * @module modules/xlsx/services/parser/comments
 * @description 解析工作表的批注部件，并根据旧版 VML 绘图中隐藏的批注形状设置可见性。
 */

import type { Archive } from './archive.js'
import type { CellRef, Comment } from '../../types/xlsx.js'
import { type XmlElement, NS, child, children, attr, attrInt } from './xml.js'
import { readXmlOptional } from './utils.js'
import { parseStringItem, toRuns } from './elements/rich-text.js'
import { encodeCellRef } from './cell-ref.js'

/**
 * 批注表（单元格引用 -> 批注），保持声明顺序
 */
export type CommentTable = Map<CellRef, Comment>

function parseCommentTable(root: XmlElement): CommentTable {
  const authors = children(child(root, 'authors'), 'author').map(a => a.text)
  const table: CommentTable = new Map()

  for (const comment of children(child(root, 'commentList'), 'comment')) {
    const ref = attr(comment, 'ref')
    if (!ref) continue

    const textEl = child(comment, 'text')
    table.set(ref, {
      text: textEl ? toRuns(parseStringItem(textEl)) : [],
      author: authors[attrInt(comment, 'authorId') ?? -1] ?? '',
      visible: true,
    })
  }

  return table
}

function isHiddenShape(shape: XmlElement): boolean {
  const style = attr(shape, 'style')
  if (!style) return false
  return style.split(';').some(decl => decl.replace(/\s+/g, '') === 'visibility:hidden')
}

/**
 * 从 VML 绘图中找出被隐藏的批注所在单元格
 *
 * ClientData 中的 Row / Column 为 0 起始。
 */
export function hiddenCommentRefs(vml: XmlElement): CellRef[] {
  const refs: CellRef[] = []

  for (const shape of children(vml, 'shape', NS.vml)) {
    if (!isHiddenShape(shape)) continue
    for (const data of children(shape, 'ClientData', NS.excel)) {
      const row = child(data, 'Row', NS.excel)?.text.trim()
      const col = child(data, 'Column', NS.excel)?.text.trim()
      if (!row || !col || !/^\d+$/.test(row) || !/^\d+$/.test(col)) continue
      refs.push(encodeCellRef(parseInt(row, 10) + 1, parseInt(col, 10) + 1))
    }
  }

  return refs
}

/**
 * 读取批注
 *
 * @description
 * 批注部件缺失时视为没有批注（返回 undefined）；旧版绘图部件缺失时所有批注保持可见。
 * 其他错误（例如 XML 格式错误）照常抛出。
 *
 * @param archive - 压缩包
 * @param commentsPath - 批注部件路径
 * @param legacyDrawingPath - 旧版 VML 绘图部件路径
 */
export async function getComments(
  archive: Archive,
  commentsPath: string,
  legacyDrawingPath?: string
): Promise<CommentTable | undefined> {
  const root = await readXmlOptional(archive, commentsPath)
  const vml = legacyDrawingPath ? await readXmlOptional(archive, legacyDrawingPath) : undefined
  if (!root) return undefined

  const table = parseCommentTable(root)
  if (vml) {
    for (const ref of hiddenCommentRefs(vml)) {
      const comment = table.get(ref)
      if (comment) table.set(ref, { ...comment, visible: false })
    }
  }

  return table
}

export default { getComments, hiddenCommentRefs }
