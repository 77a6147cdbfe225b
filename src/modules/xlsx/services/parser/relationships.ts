/**
 * 关系文件解析器
 *
 * @module modules/xlsx/services/parser/relationships
 * @description 解析部件的同级 .rels 关系文件，并提供关系 ID 到部件路径的解析。
 * 所有关系 ID 查找都必须经过 lookupRelPath，悬空引用统一报告为 ERR_INVALID_REF。
 */

import type { Archive } from './archive.js'
import type { RefId } from '../../types/xlsx.js'
import { children, attr } from './xml.js'
import { readXmlOptional } from './utils.js'
import { Errors } from '../../../../utils/errors.js'

const OFFICE_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships'

/**
 * 关系类型 URI，按字符串相等比较，不做进一步解析
 */
export const REL_TYPES = {
  officeDocument: `${OFFICE_REL}/officeDocument`,
  worksheet: `${OFFICE_REL}/worksheet`,
  sharedStrings: `${OFFICE_REL}/sharedStrings`,
  styles: `${OFFICE_REL}/styles`,
  comments: `${OFFICE_REL}/comments`,
  vmlDrawing: `${OFFICE_REL}/vmlDrawing`,
  drawing: `${OFFICE_REL}/drawing`,
  image: `${OFFICE_REL}/image`,
  chart: `${OFFICE_REL}/chart`,
  table: `${OFFICE_REL}/table`,
  pivotTable: `${OFFICE_REL}/pivotTable`,
  pivotCacheDefinition: `${OFFICE_REL}/pivotCacheDefinition`,
  customProperties: `${OFFICE_REL}/custom-properties`,
} as const

/**
 * 单条关系
 */
export interface Relationship {
  id: RefId
  type: string
  /** 已规范化为相对包根的路径；外部关系保留原始目标 */
  target: string
  external: boolean
}

/**
 * 关系表（rId -> 关系），保持 .rels 中的声明顺序
 */
export type Relationships = ReadonlyMap<RefId, Relationship>

export const EMPTY_RELATIONSHIPS: Relationships = new Map()

/**
 * 计算部件的 .rels 文件路径
 *
 * @example
 * ```typescript
 * relsPathFor('xl/worksheets/sheet1.xml') // 'xl/worksheets/_rels/sheet1.xml.rels'
 * relsPathFor('')                         // '_rels/.rels'
 * ```
 */
export function relsPathFor(partPath: string): string {
  const slash = partPath.lastIndexOf('/')
  const dir = partPath.slice(0, slash + 1)
  const file = partPath.slice(slash + 1)
  return `${dir}_rels/${file}.rels`
}

/**
 * 将关系目标解析为相对包根的路径
 *
 * 相对目标以所属部件的目录为基准，并处理 "." 与 ".."；以 "/" 开头的目标已是包根路径。
 */
export function resolveTargetPath(ownerPath: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1)

  const base = ownerPath.slice(0, ownerPath.lastIndexOf('/') + 1)
  const resolved: string[] = []
  for (const segment of (base + target).split('/')) {
    if (segment === '..') {
      resolved.pop()
    } else if (segment !== '.' && segment !== '') {
      resolved.push(segment)
    }
  }
  return resolved.join('/')
}

/**
 * 解析部件的关系表
 *
 * @description
 * .rels 文件缺失时返回空表（很多部件本来就没有关系）；
 * 存在但不是格式良好的 XML 时抛出 ERR_INVALID_FILE。
 *
 * @param archive - 压缩包
 * @param partPath - 所属部件路径，包级关系传入空字符串
 *
 * @example
 * ```typescript
 * const rels = await getRelationships(archive, 'xl/workbook.xml')
 * rels.get('rId1')?.target // 'xl/worksheets/sheet1.xml'
 * ```
 */
export async function getRelationships(archive: Archive, partPath: string): Promise<Relationships> {
  const root = await readXmlOptional(archive, relsPathFor(partPath))
  if (!root) return EMPTY_RELATIONSHIPS

  const relationships = new Map<RefId, Relationship>()
  for (const rel of children(root, 'Relationship')) {
    const id = attr(rel, 'Id')
    const type = attr(rel, 'Type')
    const target = attr(rel, 'Target')

    if (!id || !type || target === undefined) continue

    const external = attr(rel, 'TargetMode') === 'External'
    relationships.set(id, {
      id,
      type,
      target: external ? target : resolveTargetPath(partPath, target),
      external,
    })
  }

  return relationships
}

export function lookupRelationship(rels: Relationships, id: RefId): Relationship | undefined {
  return rels.get(id)
}

/**
 * 按声明顺序返回指定类型的所有关系
 */
export function allByType(rels: Relationships, type: string): Relationship[] {
  return [...rels.values()].filter(rel => rel.type === type)
}

/**
 * 返回指定类型的第一个关系
 */
export function findByType(rels: Relationships, type: string): Relationship | undefined {
  for (const rel of rels.values()) {
    if (rel.type === type) return rel
  }
  return undefined
}

/**
 * 将关系 ID 解析为部件路径
 *
 * @param ownerPath - 声明该关系 ID 的部件路径（用于错误信息）
 * @throws {XlsxParseError} ERR_INVALID_REF，关系表中不存在该 ID
 */
export function lookupRelPath(ownerPath: string, rels: Relationships, refId: RefId): string {
  const rel = rels.get(refId)
  if (!rel) throw Errors.invalidRef(ownerPath, refId)
  return rel.target
}

export default {
  getRelationships,
  lookupRelationship,
  allByType,
  findByType,
  lookupRelPath,
  relsPathFor,
  resolveTargetPath,
}
