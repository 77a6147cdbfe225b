/**
 * XML 元素树单元测试
 */

import { describe, it, expect } from 'vitest'
import {
  NS,
  parseXml,
  child,
  children,
  path,
  attr,
  attrInt,
  attrNumber,
  attrBool,
  text,
} from '../../../src/modules/xlsx/services/parser/xml.js'

describe('parseXml', () => {
  it('should return the root element with local name and namespace', () => {
    const root = parseXml(`<?xml version="1.0"?><x:worksheet xmlns:x="${NS.main}"><x:sheetData/></x:worksheet>`)

    expect(root?.name).toBe('worksheet')
    expect(root?.namespace).toBe(NS.main)
    expect(root?.children.map(c => c.name)).toEqual(['sheetData'])
  })

  it('should return undefined for malformed XML', () => {
    expect(parseXml('<a><b></a>')).toBeUndefined()
    expect(parseXml('not xml at all <')).toBeUndefined()
  })

  it('should strip a leading byte order mark', () => {
    const root = parseXml('\uFEFF<root/>')
    expect(root?.name).toBe('root')
  })

  it('should resolve attribute prefixes against xmlns declarations', () => {
    const root = parseXml(`<a xmlns:rel="${NS.r}"><b rel:id="rId3" id="plain"/></a>`)
    const b = child(root, 'b')

    expect(attr(b, 'id', NS.r)).toBe('rId3')
    expect(attr(b, 'id')).toBe('plain')
  })

  it('should inherit the default namespace in nested elements', () => {
    const root = parseXml(`<a xmlns="${NS.main}"><b><c/></b></a>`)
    expect(path(root, ['b', 'c'])?.namespace).toBe(NS.main)
  })

  it('should decode entities in text and attributes', () => {
    const root = parseXml('<a v="x &amp; y"><t>1 &lt; 2</t></a>')

    expect(attr(root, 'v')).toBe('x & y')
    expect(child(root, 't')?.text).toBe('1 < 2')
  })

  it('should keep surrounding whitespace in text', () => {
    const root = parseXml('<t xml:space="preserve">  padded  </t>')

    expect(root?.text).toBe('  padded  ')
    expect(attr(root, 'space', NS.xml)).toBe('preserve')
  })
})

describe('element queries', () => {
  const root = parseXml(
    `<root xmlns:c="${NS.c}"><item n="1"/><c:item n="2"/><item n="3"/><other/></root>`
  )

  it('children should match local names across namespaces when no namespace is given', () => {
    expect(children(root, 'item').map(el => attr(el, 'n'))).toEqual(['1', '2', '3'])
  })

  it('children should filter by namespace when one is given', () => {
    expect(children(root, 'item', NS.c).map(el => attr(el, 'n'))).toEqual(['2'])
  })

  it('child should return the first match', () => {
    expect(attr(child(root, 'item'), 'n')).toBe('1')
    expect(child(root, 'missing')).toBeUndefined()
  })

  it('queries on undefined should be empty', () => {
    expect(children(undefined, 'item')).toEqual([])
    expect(child(undefined, 'item')).toBeUndefined()
    expect(attr(undefined, 'n')).toBeUndefined()
    expect(text(undefined)).toBeUndefined()
  })
})

describe('typed attributes', () => {
  const el = parseXml('<a i="42" neg="-7" bad="4x" f="12.5" hex="0x1A" exp="-2.5e-1" t="true" one="1" zero="0" no="false" junk="yes"/>')

  it('attrInt should accept only integers', () => {
    expect(attrInt(el, 'i')).toBe(42)
    expect(attrInt(el, 'neg')).toBe(-7)
    expect(attrInt(el, 'bad')).toBeUndefined()
    expect(attrInt(el, 'missing')).toBeUndefined()
  })

  it('attrNumber should accept decimals', () => {
    expect(attrNumber(el, 'f')).toBe(12.5)
    expect(attrNumber(el, 'exp')).toBe(-0.25)
    expect(attrNumber(el, 'bad')).toBeUndefined()
  })

  it('attrNumber should reject hexadecimal literals', () => {
    expect(attrNumber(el, 'hex')).toBeUndefined()
  })

  it('attrBool should read xsd:boolean values', () => {
    expect(attrBool(el, 't')).toBe(true)
    expect(attrBool(el, 'one')).toBe(true)
    expect(attrBool(el, 'zero')).toBe(false)
    expect(attrBool(el, 'no')).toBe(false)
    expect(attrBool(el, 'junk')).toBeUndefined()
  })

  it('attrBool should use the fallback when the attribute is absent or invalid', () => {
    expect(attrBool(el, 'missing', true)).toBe(true)
    expect(attrBool(el, 'junk', false)).toBe(false)
  })
})
