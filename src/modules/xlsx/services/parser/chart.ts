/**
 * 图表解析器
 *
 * @module modules/xlsx/services/parser/chart
 * @description 解析绘图中图形框架引用的图表部件（c:chartSpace）。
 */

import type { Archive } from './archive.js'
import type { ChartPlot, ChartSeries, ChartSpace, ChartType } from '../../types/xlsx.js'
import { type XmlElement, NS, child, children, attr, attrInt, attrBool } from './xml.js'
import { readXmlRequired } from './utils.js'
import { Errors } from '../../../../utils/errors.js'

const CHART_TYPES: readonly ChartType[] = [
  'area',
  'area3D',
  'bar',
  'bar3D',
  'bubble',
  'doughnut',
  'line',
  'line3D',
  'ofPie',
  'pie',
  'pie3D',
  'radar',
  'scatter',
  'stock',
  'surface',
  'surface3D',
]

function chartTypeOf(el: XmlElement): ChartType | undefined {
  if (el.namespace !== NS.c || !el.name.endsWith('Chart')) return undefined
  const name = el.name.slice(0, -'Chart'.length)
  return CHART_TYPES.find(type => type === name)
}

function val(el: XmlElement | undefined): string | undefined {
  return attr(el, 'val')
}

// <c:varyColors/> 无 val 时为 true
function flag(el: XmlElement | undefined, fallback: boolean): boolean {
  return el ? attrBool(el, 'val', true) : fallback
}

function collectText(el: XmlElement): string {
  if (el.name === 't' && el.namespace === NS.a) return el.text
  return el.children.map(collectText).join('')
}

/**
 * 取数据源引用：numRef / strRef 的公式，或字面量 v
 */
function dataSource(el: XmlElement | undefined): string | undefined {
  if (!el) return undefined
  const ref = child(el, 'numRef', NS.c) ?? child(el, 'strRef', NS.c)
  if (ref) return child(ref, 'f', NS.c)?.text
  return child(el, 'v', NS.c)?.text
}

function parseTitle(title: XmlElement | undefined): string | undefined {
  const tx = child(title, 'tx', NS.c)
  if (!tx) return undefined
  const rich = child(tx, 'rich', NS.c)
  if (rich) return collectText(rich)
  return dataSource(tx)
}

function parseSeries(el: XmlElement): ChartSeries {
  return {
    index: attrInt(child(el, 'idx', NS.c), 'val') ?? 0,
    order: attrInt(child(el, 'order', NS.c), 'val') ?? 0,
    title: dataSource(child(el, 'tx', NS.c)),
    categories: dataSource(child(el, 'cat', NS.c)),
    values: dataSource(child(el, 'val', NS.c)),
    xValues: dataSource(child(el, 'xVal', NS.c)),
    yValues: dataSource(child(el, 'yVal', NS.c)),
  }
}

function parsePlot(el: XmlElement, chartType: ChartType): ChartPlot {
  return {
    chartType,
    grouping: val(child(el, 'grouping', NS.c)),
    barDirection: val(child(el, 'barDir', NS.c)),
    scatterStyle: val(child(el, 'scatterStyle', NS.c)),
    varyColors: flag(child(el, 'varyColors', NS.c), false),
    series: children(el, 'ser', NS.c).map(parseSeries),
  }
}

/**
 * 解析 chartSpace 根元素
 */
export function parseChartSpace(root: XmlElement): ChartSpace | undefined {
  if (root.name !== 'chartSpace' || root.namespace !== NS.c) return undefined

  const chart = child(root, 'chart', NS.c)
  const plots: ChartPlot[] = []
  for (const el of child(chart, 'plotArea', NS.c)?.children ?? []) {
    const chartType = chartTypeOf(el)
    if (chartType) plots.push(parsePlot(el, chartType))
  }

  return {
    title: parseTitle(child(chart, 'title', NS.c)),
    autoTitleDeleted: flag(child(chart, 'autoTitleDeleted', NS.c), false),
    plots,
    legendPosition: val(child(child(chart, 'legend', NS.c), 'legendPos', NS.c)),
    plotVisOnly: flag(child(chart, 'plotVisOnly', NS.c), false),
    dispBlanksAs: val(child(chart, 'dispBlanksAs', NS.c)),
  }
}

/**
 * 读取图表部件
 *
 * @throws {XlsxParseError} ERR_MISSING_FILE / ERR_INVALID_FILE
 */
export async function readChart(archive: Archive, path: string): Promise<ChartSpace> {
  const root = await readXmlRequired(archive, path)
  const chart = parseChartSpace(root)
  if (!chart) throw Errors.invalidFile(path)
  return chart
}

export default { readChart, parseChartSpace }
