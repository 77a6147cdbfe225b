/**
 * 单元格引用编解码
 *
 * @module modules/xlsx/services/parser/cell-ref
 * @description A1 形式的单元格引用与 1 起始的 (行, 列) 之间互相转换。
 */

import type { CellRef, Range } from '../../types/xlsx.js'

/** 最大列号（XFD） */
export const MAX_COLUMN = 16384
/** 最大行号 */
export const MAX_ROW = 1048576

const CELL_REF_PATTERN = /^\$?([A-Za-z]{1,3})\$?([1-9][0-9]{0,6})$/

export interface CellAddress {
  row: number
  col: number
}

/**
 * 列号转列字母
 *
 * @example
 * ```typescript
 * columnToLetters(1)     // 'A'
 * columnToLetters(28)    // 'AB'
 * columnToLetters(16384) // 'XFD'
 * ```
 */
export function columnToLetters(col: number): string {
  let letters = ''
  let n = col
  while (n > 0) {
    const rem = (n - 1) % 26
    letters = String.fromCharCode(65 + rem) + letters
    n = Math.floor((n - 1) / 26)
  }
  return letters
}

/**
 * 列字母转列号（不区分大小写）
 */
export function lettersToColumn(letters: string): number {
  let col = 0
  for (const ch of letters.toUpperCase()) {
    col = col * 26 + (ch.charCodeAt(0) - 64)
  }
  return col
}

/**
 * 解码单元格引用
 *
 * @returns 引用无效或超出工作表范围时返回 undefined
 *
 * @example
 * ```typescript
 * decodeCellRef('B7')   // { row: 7, col: 2 }
 * decodeCellRef('$C$3') // { row: 3, col: 3 }
 * ```
 */
export function decodeCellRef(ref: CellRef): CellAddress | undefined {
  const match = CELL_REF_PATTERN.exec(ref)
  if (!match) return undefined

  const col = lettersToColumn(match[1])
  const row = parseInt(match[2], 10)
  if (col > MAX_COLUMN || row > MAX_ROW) return undefined
  return { row, col }
}

/**
 * 编码单元格引用
 */
export function encodeCellRef(row: number, col: number): CellRef {
  return `${columnToLetters(col)}${row}`
}

/**
 * 解析区域引用，单个单元格视为起止相同的区域
 */
export function parseRange(range: Range): { from: CellAddress; to: CellAddress } | undefined {
  const [start, end, ...rest] = range.split(':')
  if (rest.length > 0 || start === undefined) return undefined

  const from = decodeCellRef(start)
  const to = end === undefined ? from : decodeCellRef(end)
  if (!from || !to) return undefined
  return { from, to }
}

export default { columnToLetters, lettersToColumn, decodeCellRef, encodeCellRef, parseRange }
