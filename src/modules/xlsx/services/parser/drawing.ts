/**
 * 绘图解析器
 *
 * @module modules/xlsx/services/parser/drawing
 * @description 解析工作表绘图部件（xdr:wsDr）中的锚定对象，并通过绘图部件自己的关系表
 * 把图片引用解析为文件内容、把图形框架引用解析为图表。
 */

import type { Archive } from './archive.js'
import type { ContentTypes } from '../../context/parsing-context.js'
import type {
  Anchor,
  Anchoring,
  ChartSpace,
  Drawing,
  DrawingObject,
  Extent,
  FileInfo,
  Marker,
  NonVisualProperties,
  Point,
  RefId,
  Transform,
  UnresolvedDrawing,
} from '../../types/xlsx.js'
import { type XmlElement, NS, child, path, attr, attrInt, attrBool } from './xml.js'
import { readXmlRequired, readBytesRequired } from './utils.js'
import { getRelationships, lookupRelPath, type Relationships } from './relationships.js'
import { lookupContentType } from './content-types.js'
import { readChart } from './chart.js'
import { Errors, Warnings, type ParseWarning } from '../../../../utils/errors.js'

const MEDIA_PREFIX = 'xl/media/'

function intText(el: XmlElement | undefined): number {
  const raw = el?.text.trim()
  return raw && /^-?\d+$/.test(raw) ? parseInt(raw, 10) : 0
}

function parseMarker(el: XmlElement | undefined): Marker {
  return {
    col: intText(child(el, 'col')),
    colOffset: intText(child(el, 'colOff')),
    row: intText(child(el, 'row')),
    rowOffset: intText(child(el, 'rowOff')),
  }
}

function parseExtent(el: XmlElement | undefined): Extent {
  return { cx: attrInt(el, 'cx') ?? 0, cy: attrInt(el, 'cy') ?? 0 }
}

function parsePoint(el: XmlElement | undefined): Point {
  return { x: attrInt(el, 'x') ?? 0, y: attrInt(el, 'y') ?? 0 }
}

function parseAnchoring(anchor: XmlElement): Anchoring | undefined {
  switch (anchor.name) {
    case 'twoCellAnchor':
      return {
        type: 'twoCell',
        from: parseMarker(child(anchor, 'from')),
        to: parseMarker(child(anchor, 'to')),
        editAs: attr(anchor, 'editAs') ?? 'twoCell',
      }
    case 'oneCellAnchor':
      return { type: 'oneCell', from: parseMarker(child(anchor, 'from')), ext: parseExtent(child(anchor, 'ext')) }
    case 'absoluteAnchor':
      return { type: 'absolute', pos: parsePoint(child(anchor, 'pos')), ext: parseExtent(child(anchor, 'ext')) }
    default:
      return undefined
  }
}

function parseNonVisual(cNvPr: XmlElement | undefined): NonVisualProperties {
  return {
    id: attrInt(cNvPr, 'id') ?? 0,
    name: attr(cNvPr, 'name') ?? '',
    description: attr(cNvPr, 'descr'),
    title: attr(cNvPr, 'title'),
    hidden: attrBool(cNvPr, 'hidden', false),
  }
}

function parseTransform(xfrm: XmlElement | undefined): Transform | undefined {
  if (!xfrm) return undefined
  const off = child(xfrm, 'off', NS.a)
  const ext = child(xfrm, 'ext', NS.a)
  return {
    offset: off ? parsePoint(off) : undefined,
    extents: ext ? parseExtent(ext) : undefined,
    rotation: attrInt(xfrm, 'rot'),
    flipH: attrBool(xfrm, 'flipH', false),
    flipV: attrBool(xfrm, 'flipV', false),
  }
}

function parseObject(el: XmlElement): DrawingObject<RefId | undefined, RefId> | undefined {
  if (el.name === 'pic') {
    const blipFill = child(el, 'blipFill')
    return {
      type: 'picture',
      macro: attr(el, 'macro'),
      published: attrBool(el, 'fPublished', false),
      nonVisual: parseNonVisual(path(el, ['nvPicPr', 'cNvPr'])),
      image: attr(child(blipFill, 'blip', NS.a), 'embed', NS.r),
      stretch: child(blipFill, 'stretch', NS.a) !== undefined,
      transform: parseTransform(child(child(el, 'spPr'), 'xfrm', NS.a)),
    }
  }

  if (el.name === 'graphicFrame') {
    const chartRef = child(path(el, ['graphic', 'graphicData']), 'chart', NS.c)
    const chartId = attr(chartRef, 'id', NS.r)
    if (!chartId) return undefined
    return {
      type: 'graphic',
      nonVisual: parseNonVisual(path(el, ['nvGraphicFramePr', 'cNvPr'])),
      chart: chartId,
      transform: parseTransform(child(el, 'xfrm')),
    }
  }

  return undefined
}

const OBJECT_ELEMENTS = ['pic', 'graphicFrame', 'sp', 'grpSp', 'cxnSp', 'contentPart']

/**
 * 解析 wsDr 根元素为未解析的绘图
 *
 * @returns 根元素不是 wsDr 时返回 undefined
 */
export function parseDrawing(
  root: XmlElement,
  onSkip?: (warning: ParseWarning) => void
): UnresolvedDrawing | undefined {
  if (root.name !== 'wsDr') return undefined

  const anchors: Anchor<RefId | undefined, RefId>[] = []
  for (const anchorEl of root.children) {
    const anchoring = parseAnchoring(anchorEl)
    if (!anchoring) continue

    const objectEl = anchorEl.children.find(c => OBJECT_ELEMENTS.includes(c.name))
    if (!objectEl) continue

    const object = parseObject(objectEl)
    if (!object) {
      onSkip?.(Warnings.unsupportedObject(objectEl.name))
      continue
    }

    const clientData = child(anchorEl, 'clientData')
    anchors.push({
      anchoring,
      object,
      clientData: {
        locksWithSheet: attrBool(clientData, 'fLocksWithSheet', true),
        printsWithSheet: attrBool(clientData, 'fPrintsWithSheet', true),
      },
    })
  }

  return { anchors }
}

function stripMediaPrefix(p: string): string {
  return p.startsWith(MEDIA_PREFIX) ? p.slice(MEDIA_PREFIX.length) : p
}

async function lookupFileInfo(
  archive: Archive,
  contentTypes: ContentTypes,
  drawingPath: string,
  rels: Relationships,
  refId: RefId | undefined
): Promise<FileInfo | undefined> {
  if (refId === undefined) return undefined

  const imagePath = lookupRelPath(drawingPath, rels, refId)
  // 内容类型索引使用以 "/" 开头的路径
  const contentType = lookupContentType(contentTypes, `/${imagePath}`)
  if (!contentType) throw Errors.invalidFile(imagePath)

  const contents = await readBytesRequired(archive, imagePath)
  return { filename: stripMediaPrefix(imagePath), contentType, contents }
}

async function resolveAnchor(
  archive: Archive,
  contentTypes: ContentTypes,
  drawingPath: string,
  rels: Relationships,
  anchor: Anchor<RefId | undefined, RefId>
): Promise<Anchor<FileInfo | undefined, ChartSpace>> {
  const { object } = anchor
  if (object.type === 'picture') {
    const image = await lookupFileInfo(archive, contentTypes, drawingPath, rels, object.image)
    return { ...anchor, object: { ...object, image } }
  }

  const chartPath = lookupRelPath(drawingPath, rels, object.chart)
  const chart = await readChart(archive, chartPath)
  return { ...anchor, object: { ...object, chart } }
}

/**
 * 读取并解析绘图部件
 *
 * @param archive - 压缩包
 * @param contentTypes - 内容类型索引
 * @param drawingPath - 绘图部件路径
 * @param onSkip - 跳过不支持的对象时的回调
 * @throws {XlsxParseError} 任一步骤失败时抛出
 */
export async function getDrawing(
  archive: Archive,
  contentTypes: ContentTypes,
  drawingPath: string,
  onSkip?: (warning: ParseWarning) => void
): Promise<Drawing> {
  const root = await readXmlRequired(archive, drawingPath)
  const rels = await getRelationships(archive, drawingPath)

  const unresolved = parseDrawing(root, onSkip)
  if (!unresolved) throw Errors.invalidFile(drawingPath)

  const anchors = await Promise.all(
    unresolved.anchors.map(anchor => resolveAnchor(archive, contentTypes, drawingPath, rels, anchor))
  )
  return { anchors }
}

export default { getDrawing, parseDrawing }
