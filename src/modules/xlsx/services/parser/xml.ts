/**
 * XML 元素树
 *
 * @module modules/xlsx/services/parser/xml
 * @description 用 fast-xml-parser 解析 XML，并转换为带命名空间信息的精简元素树。
 * 只提供解析器需要的查询：按本地名（可选命名空间）取子元素、取属性、取文本。
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'

/**
 * 常用命名空间
 */
export const NS = {
  main: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  rels: 'http://schemas.openxmlformats.org/package/2006/relationships',
  contentTypes: 'http://schemas.openxmlformats.org/package/2006/content-types',
  customProps: 'http://schemas.openxmlformats.org/officeDocument/2006/custom-properties',
  vt: 'http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes',
  xdr: 'http://schemas.openxmlformats.org/drawingml/2006/spreadsheetDrawing',
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  c: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  vml: 'urn:schemas-microsoft-com:vml',
  excel: 'urn:schemas-microsoft-com:office:excel',
  xml: 'http://www.w3.org/XML/1998/namespace',
} as const

export interface XmlAttribute {
  name: string
  namespace?: string
  value: string
}

export interface XmlElement {
  /** 本地名（不含前缀） */
  name: string
  namespace?: string
  attributes: XmlAttribute[]
  children: XmlElement[]
  /** 直接文本子节点拼接后的内容 */
  text: string
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  htmlEntities: true,
})

const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

type Scope = ReadonlyMap<string, string>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function splitName(qname: string): [string | undefined, string] {
  const i = qname.indexOf(':')
  return i < 0 ? [undefined, qname] : [qname.slice(0, i), qname.slice(i + 1)]
}

function convertElement(qname: string, content: unknown, rawAttrs: unknown, parentScope: Scope): XmlElement {
  const attrs: Array<[string, string]> = isRecord(rawAttrs)
    ? Object.entries(rawAttrs).map(([k, v]) => [k, String(v)])
    : []

  // 先收集命名空间声明
  let declared: Map<string, string> | undefined
  for (const [key, value] of attrs) {
    if (key === 'xmlns' || key.startsWith('xmlns:')) {
      declared ??= new Map(parentScope)
      declared.set(key === 'xmlns' ? '' : key.slice(6), value)
    }
  }
  const scope: Scope = declared ?? parentScope

  const attributes: XmlAttribute[] = []
  for (const [key, value] of attrs) {
    if (key === 'xmlns' || key.startsWith('xmlns:')) continue
    const [prefix, name] = splitName(key)
    attributes.push({ name, namespace: prefix === undefined ? undefined : scope.get(prefix), value })
  }

  const [prefix, name] = splitName(qname)
  const { elements, text } = convertNodes(content, scope)

  return {
    name,
    namespace: scope.get(prefix ?? ''),
    attributes,
    children: elements,
    text,
  }
}

function convertNodes(nodes: unknown, scope: Scope): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = []
  let text = ''
  if (!Array.isArray(nodes)) return { elements, text }

  for (const node of nodes) {
    if (!isRecord(node)) continue
    for (const key of Object.keys(node)) {
      if (key === ATTRIBUTES_KEY) continue
      if (key === TEXT_KEY) {
        text += String(node[key])
        continue
      }
      elements.push(convertElement(key, node[key], node[ATTRIBUTES_KEY], scope))
    }
  }

  return { elements, text }
}

/**
 * 解析 XML 文本为元素树
 *
 * @returns 根元素；XML 不是格式良好的文档或没有根元素时返回 undefined
 *
 * @example
 * ```typescript
 * const root = parseXml('<a xmlns:r="..."><b r:id="rId1"/></a>')
 * attr(child(root, 'b'), 'id', NS.r) // 'rId1'
 * ```
 */
export function parseXml(xml: string): XmlElement | undefined {
  const source = xml.charCodeAt(0) === 0xfeff ? xml.slice(1) : xml
  if (XMLValidator.validate(source) !== true) return undefined

  const nodes: unknown = parser.parse(source)
  const initialScope: Scope = new Map([['xml', NS.xml]])
  const { elements } = convertNodes(nodes, initialScope)
  return elements[0]
}

function matches(el: XmlElement, name: string, namespace?: string): boolean {
  return el.name === name && (namespace === undefined || el.namespace === namespace)
}

/**
 * 按本地名获取所有直接子元素；给出 namespace 时同时匹配命名空间
 */
export function children(el: XmlElement | undefined, name: string, namespace?: string): XmlElement[] {
  if (!el) return []
  return el.children.filter(c => matches(c, name, namespace))
}

/**
 * 获取第一个匹配的直接子元素
 */
export function child(el: XmlElement | undefined, name: string, namespace?: string): XmlElement | undefined {
  return el?.children.find(c => matches(c, name, namespace))
}

/**
 * 沿路径逐级获取第一个匹配的子元素
 */
export function path(el: XmlElement | undefined, names: string[]): XmlElement | undefined {
  let current = el
  for (const name of names) {
    current = child(current, name)
    if (!current) return undefined
  }
  return current
}

/**
 * 获取属性值
 *
 * 不给 namespace 时只匹配无前缀属性；关系 ID 这类属性需传入 NS.r。
 */
export function attr(el: XmlElement | undefined, name: string, namespace?: string): string | undefined {
  return el?.attributes.find(a => a.name === name && a.namespace === namespace)?.value
}

export function attrInt(el: XmlElement | undefined, name: string): number | undefined {
  const raw = attr(el, name)
  if (raw === undefined || !/^\s*[-+]?\d+\s*$/.test(raw)) return undefined
  return parseInt(raw, 10)
}

/** xsd:double 的十进制 / 指数写法；不接受 0x、0b、0o 前缀和 Infinity */
const DECIMAL_NUMBER = /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/

/**
 * 解析十进制数字文本，不接受尾随垃圾字符
 */
export function parseDecimal(raw: string): number | undefined {
  if (!DECIMAL_NUMBER.test(raw)) return undefined
  const n = Number(raw)
  return Number.isFinite(n) ? n : undefined
}

export function attrNumber(el: XmlElement | undefined, name: string): number | undefined {
  const raw = attr(el, name)
  return raw === undefined ? undefined : parseDecimal(raw)
}

/**
 * 读取 xsd:boolean 属性（"1"/"true"/"0"/"false"）
 */
export function attrBool(el: XmlElement | undefined, name: string): boolean | undefined
export function attrBool(el: XmlElement | undefined, name: string, fallback: boolean): boolean
export function attrBool(el: XmlElement | undefined, name: string, fallback?: boolean): boolean | undefined {
  const raw = attr(el, name)
  if (raw === '1' || raw === 'true') return true
  if (raw === '0' || raw === 'false') return false
  return fallback
}

/**
 * 获取元素的直接文本内容
 */
export function text(el: XmlElement | undefined): string | undefined {
  return el?.text
}

export default { parseXml, children, child, path, attr, attrInt, attrNumber, parseDecimal, attrBool, text, NS }
