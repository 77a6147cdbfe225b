/**
 * 稀疏单元格映射
 *
 * @module modules/xlsx/types/cell-map
 * @description 以 1 起始的 (行, 列) 为键的稀疏单元格映射，迭代顺序为按行优先升序。
 */

import type { Cell } from './xlsx.js'

export class CellMap {
  private readonly rows = new Map<number, Map<number, Cell>>()
  private count = 0

  get size(): number {
    return this.count
  }

  get(row: number, col: number): Cell | undefined {
    return this.rows.get(row)?.get(col)
  }

  has(row: number, col: number): boolean {
    return this.rows.get(row)?.has(col) ?? false
  }

  set(row: number, col: number, cell: Cell): this {
    let cols = this.rows.get(row)
    if (!cols) {
      cols = new Map()
      this.rows.set(row, cols)
    }
    if (!cols.has(col)) this.count++
    cols.set(col, cell)
    return this
  }

  delete(row: number, col: number): boolean {
    const cols = this.rows.get(row)
    if (!cols || !cols.delete(col)) return false
    if (cols.size === 0) this.rows.delete(row)
    this.count--
    return true
  }

  /**
   * 按行优先升序迭代 [row, col, cell]
   */
  *entries(): IterableIterator<[number, number, Cell]> {
    const rowKeys = [...this.rows.keys()].sort((a, b) => a - b)
    for (const row of rowKeys) {
      const cols = this.rows.get(row)
      if (!cols) continue
      const colKeys = [...cols.keys()].sort((a, b) => a - b)
      for (const col of colKeys) {
        const cell = cols.get(col)
        if (cell) yield [row, col, cell]
      }
    }
  }

  [Symbol.iterator](): IterableIterator<[number, number, Cell]> {
    return this.entries()
  }
}

export default CellMap
