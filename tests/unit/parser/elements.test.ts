/**
 * 工作表元素解析器单元测试
 */

import { describe, it, expect } from 'vitest'
import {
  parseAutoFilter,
  parseConditionalFormatting,
  parseDataValidation,
  parseSheetProtection,
  parseStringItem,
  toRuns,
} from '../../../src/modules/xlsx/services/parser/elements/index.js'
import { parseXml, type XmlElement } from '../../../src/modules/xlsx/services/parser/xml.js'

function xml(source: string): XmlElement {
  const root = parseXml(source)
  if (!root) throw new Error('fixture did not parse')
  return root
}

describe('rich text', () => {
  it('should read plain string items', () => {
    expect(parseStringItem(xml('<si><t>Total</t></si>'))).toEqual({ kind: 'text', text: 'Total' })
  })

  it('should read runs with their properties', () => {
    const item = parseStringItem(
      xml(
        '<si><r><rPr><b/><i val="0"/><u/><sz val="11"/><color rgb="FFFF0000"/><rFont val="Calibri"/></rPr><t>Bold</t></r>' +
          '<r><t xml:space="preserve"> plain</t></r></si>'
      )
    )

    expect(item).toEqual({
      kind: 'rich',
      runs: [
        {
          text: 'Bold',
          properties: {
            font: 'Calibri',
            bold: true,
            italic: false,
            underline: 'single',
            size: 11,
            color: { rgb: 'FFFF0000' },
          },
        },
        { text: ' plain' },
      ],
    })
  })

  it('toRuns should wrap plain text in a single run', () => {
    expect(toRuns({ kind: 'text', text: 'note' })).toEqual([{ text: 'note' }])
  })
})

describe('parseAutoFilter', () => {
  it('should read value and custom filters and skip columns without colId', () => {
    const filter = parseAutoFilter(
      xml(
        '<autoFilter ref="A1:C10">' +
          '<filterColumn colId="0"><filters blank="1"><filter val="North"/><filter val="South"/></filters></filterColumn>' +
          '<filterColumn colId="2"><customFilters and="1"><customFilter operator="greaterThan" val="100"/><customFilter val="5"/></customFilters></filterColumn>' +
          '<filterColumn><top10 val="5"/></filterColumn>' +
          '</autoFilter>'
      )
    )

    expect(filter).toEqual({
      ref: 'A1:C10',
      filterColumns: [
        {
          colId: 0,
          hiddenButton: false,
          showButton: true,
          criteria: { type: 'values', values: ['North', 'South'], blank: true },
        },
        {
          colId: 2,
          hiddenButton: false,
          showButton: true,
          criteria: {
            type: 'custom',
            and: true,
            filters: [
              { operator: 'greaterThan', value: '100' },
              { operator: 'equal', value: '5' },
            ],
          },
        },
      ],
    })
  })

  it('should apply top10 defaults', () => {
    const filter = parseAutoFilter(xml('<autoFilter><filterColumn colId="1"><top10/></filterColumn></autoFilter>'))

    expect(filter.filterColumns[0]?.criteria).toEqual({ type: 'top10', top: true, percent: false, value: 10 })
  })
})

describe('parseConditionalFormatting', () => {
  it('should read rules in order with their formulas and color scales', () => {
    const result = parseConditionalFormatting(
      xml(
        '<conditionalFormatting sqref="A1:A10">' +
          '<cfRule type="cellIs" dxfId="0" priority="1" operator="greaterThan"><formula>5</formula></cfRule>' +
          '<cfRule type="colorScale" priority="2"><colorScale><cfvo type="min"/><cfvo type="max"/>' +
          '<color rgb="FFF8696B"/><color rgb="FF63BE7B"/></colorScale></cfRule>' +
          '</conditionalFormatting>'
      )
    )

    expect(result?.[0]).toBe('A1:A10')
    const [cellIs, scale] = result?.[1] ?? []
    expect(cellIs).toMatchObject({
      type: 'cellIs',
      priority: 1,
      dxfId: 0,
      operator: 'greaterThan',
      stopIfTrue: false,
      formulas: ['5'],
    })
    expect(scale?.colorScale).toEqual({
      cfvos: [
        { type: 'min', gte: true },
        { type: 'max', gte: true },
      ],
      colors: [{ rgb: 'FFF8696B' }, { rgb: 'FF63BE7B' }],
    })
  })

  it('should reject an element without sqref', () => {
    expect(parseConditionalFormatting(xml('<conditionalFormatting><cfRule type="expression"/></conditionalFormatting>'))).toBeUndefined()
  })
})

describe('parseDataValidation', () => {
  it('should apply attribute defaults', () => {
    const result = parseDataValidation(
      xml('<dataValidation type="list" allowBlank="1" showErrorMessage="1" sqref="B2:B10"><formula1>"Yes,No"</formula1></dataValidation>')
    )

    expect(result).toEqual([
      'B2:B10',
      {
        type: 'list',
        operator: 'between',
        errorStyle: 'stop',
        allowBlank: true,
        showDropDown: false,
        showInputMessage: false,
        showErrorMessage: true,
        formula1: '"Yes,No"',
      },
    ])
  })

  it('should reject an element without sqref', () => {
    expect(parseDataValidation(xml('<dataValidation type="whole"/>'))).toBeUndefined()
  })
})

describe('parseSheetProtection', () => {
  it('should combine explicit flags with their defaults', () => {
    const protection = parseSheetProtection(xml('<sheetProtection sheet="1" formatCells="0" selectLockedCells="1"/>'))

    expect(protection).toMatchObject({
      sheet: true,
      objects: false,
      scenarios: false,
      formatCells: false,
      formatColumns: true,
      insertRows: true,
      selectLockedCells: true,
      selectUnlockedCells: false,
    })
    expect(protection.password).toBeUndefined()
  })
})
