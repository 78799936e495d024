import { useCallback, useEffect, useRef, useState } from 'react'
import * as d3 from 'd3'
import { isConditionalColor, type ChartSpec, type FieldEncoding } from './chartSpecs'
import type { ChartRecord } from './panelData'
import { selectionPayload, type SelectionEvent } from './selection'

interface SpecChartProps {
  spec: ChartSpec
  records: readonly ChartRecord[]
  onSelect?: (event: SelectionEvent) => void
}

interface TooltipState {
  x: number
  y: number
  lines: string[]
}

interface PlotPoint {
  index: number
  record: ChartRecord
  x: number
  y: number
  r: number
}

type PositionScale = d3.ScaleLinear<number, number> | d3.ScaleLogarithmic<number, number>

const MARGIN = { top: 24, right: 200, bottom: 64, left: 84 }
const POINT_RADIUS = 4
const FALLBACK_COLOR = '#4472C4'

const numericValue = (record: ChartRecord, field: string): number | null => {
  const value = record[field]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

const categoryOf = (record: ChartRecord, field: string): string => String(record[field] ?? 'Unknown')

const positionScale = (
  encoding: FieldEncoding | undefined,
  records: readonly ChartRecord[],
  range: [number, number]
): PositionScale | null => {
  if (!encoding) return null
  const log = encoding.scale?.type === 'log'
  const values = records
    .map(record => numericValue(record, encoding.field))
    .filter((value): value is number => value !== null && (!log || value > 0))

  const [min, max] = encoding.scale?.domain ?? d3.extent(values)
  if (min === undefined || max === undefined) return null

  if (log) return d3.scaleLog().domain([min, max]).range(range).nice().clamp(true)
  return d3.scaleLinear().domain([min, max]).range(range).nice()
}

const radiusScale = (
  encoding: FieldEncoding | undefined,
  records: readonly ChartRecord[]
): ((value: number | null) => number) => {
  if (!encoding) return () => POINT_RADIUS * 1.5

  const values = records
    .map(record => numericValue(record, encoding.field))
    .filter((value): value is number => value !== null)
  const [min, max] = encoding.scale?.domain ?? d3.extent(values)
  const [minArea, maxArea] = encoding.scale?.range ?? [30, 3000]
  if (min === undefined || max === undefined) return () => Math.sqrt(minArea / Math.PI)

  // size encodes area
  const area = d3.scaleLinear().domain([min, max]).range([minArea, maxArea]).clamp(true)
  return (value: number | null) => Math.sqrt(area(value ?? min) / Math.PI)
}

const axisTitle = (encoding: FieldEncoding): string =>
  encoding.scale?.type === 'log' ? `${encoding.field} (log scale)` : encoding.field

export default function SpecChart({ spec, records, onSelect }: SpecChartProps) {
  const svgRef = useRef<SVGSVGElement>(null)
  const [selected, setSelected] = useState<Set<number>>(new Set())
  const [tooltip, setTooltip] = useState<TooltipState | null>(null)

  useEffect(() => {
    setSelected(new Set())
    setTooltip(null)
  }, [spec, records])

  const commitSelection = useCallback(
    (next: Set<number>) => {
      setSelected(next)
      onSelect?.(selectionPayload(spec, records.filter((_record, index) => next.has(index))))
    },
    [onSelect, records, spec]
  )

  useEffect(() => {
    if (!svgRef.current) return

    const { width, height } = spec
    const { x: xEncoding, y: yEncoding, size: sizeEncoding, color: colorEncoding } = spec.encoding

    const svg = d3.select(svgRef.current)
    svg.selectAll('*').remove()
    svg.attr('width', width + MARGIN.left + MARGIN.right).attr('height', height + MARGIN.top + MARGIN.bottom)

    const xScale = positionScale(xEncoding, records, [0, width])
    const yScale = positionScale(yEncoding, records, [height, 0])
    if (!xEncoding || !yEncoding || !xScale || !yScale) return

    const radius = radiusScale(sizeEncoding, records)
    const colorField = colorEncoding
      ? isConditionalColor(colorEncoding)
        ? colorEncoding.condition.field
        : colorEncoding.field
      : null
    const unselectedColor = colorEncoding && isConditionalColor(colorEncoding) ? colorEncoding.value : null
    const categories = colorField
      ? Array.from(new Set(records.map(record => categoryOf(record, colorField)))).sort((a, b) => a.localeCompare(b))
      : []
    const palette = d3.scaleOrdinal<string, string>().domain(categories).range(d3.schemeTableau10)

    const fillFor = (point: PlotPoint): string => {
      const base = colorField ? palette(categoryOf(point.record, colorField)) : FALLBACK_COLOR
      if (unselectedColor === null || selected.size === 0 || selected.has(point.index)) return base
      return unselectedColor
    }

    const points = records
      .map((record, index) => {
        const xValue = numericValue(record, xEncoding.field)
        const yValue = numericValue(record, yEncoding.field)
        if (xValue === null || yValue === null) return null
        return {
          index,
          record,
          x: xScale(xValue),
          y: yScale(yValue),
          r: spec.mark.type === 'circle' ? radius(sizeEncoding ? numericValue(record, sizeEncoding.field) : null) : POINT_RADIUS
        } satisfies PlotPoint
      })
      .filter((point): point is PlotPoint => point !== null && Number.isFinite(point.x) && Number.isFinite(point.y))

    const g = svg.append('g').attr('transform', `translate(${MARGIN.left},${MARGIN.top})`)

    g.append('rect')
      .attr('width', width)
      .attr('height', height)
      .attr('fill', 'transparent')
      .on('click', () => {
        if (selected.size > 0) commitSelection(new Set())
      })

    g.append('g')
      .attr('transform', `translate(0,${height})`)
      .call(d3.axisBottom<number>(xScale).ticks(8, '~s'))
      .append('text')
      .attr('x', width / 2)
      .attr('y', 44)
      .attr('fill', 'black')
      .style('font-size', '13px')
      .style('text-anchor', 'middle')
      .text(axisTitle(xEncoding))

    g.append('g')
      .call(d3.axisLeft<number>(yScale).ticks(8, '~s'))
      .append('text')
      .attr('transform', 'rotate(-90)')
      .attr('x', -height / 2)
      .attr('y', -60)
      .attr('fill', 'black')
      .style('font-size', '13px')
      .style('text-anchor', 'middle')
      .text(axisTitle(yEncoding))

    if (spec.mark.type === 'line' && colorField) {
      const orderField = spec.encoding.order?.field
      const line = d3
        .line<PlotPoint>()
        .x(point => point.x)
        .y(point => point.y)

      d3.group(points, point => categoryOf(point.record, colorField)).forEach((series, key) => {
        const ordered = orderField
          ? series.slice().sort((a, b) => (numericValue(a.record, orderField) ?? 0) - (numericValue(b.record, orderField) ?? 0))
          : series
        g.append('path')
          .datum(ordered)
          .attr('fill', 'none')
          .attr('stroke', palette(key))
          .attr('stroke-width', 2)
          .attr('d', line)
      })
    }

    const tooltipFields = spec.encoding.tooltip ?? []

    g.selectAll<SVGCircleElement, PlotPoint>('.mark')
      .data(points, point => String(point.index))
      .join('circle')
      .attr('class', 'mark')
      .attr('cx', point => point.x)
      .attr('cy', point => point.y)
      .attr('r', point => point.r)
      .attr('fill', fillFor)
      .attr('fill-opacity', spec.mark.opacity ?? 1)
      .attr('stroke', spec.mark.stroke ?? 'none')
      .attr('stroke-width', spec.mark.strokeWidth ?? 0)
      .style('cursor', spec.selection ? 'pointer' : 'default')
      .on('mouseover', (_event, point) => {
        setTooltip({
          x: point.x + MARGIN.left,
          y: point.y + MARGIN.top,
          lines: tooltipFields.map(encoding => String(point.record[encoding.field] ?? 'N/A'))
        })
      })
      .on('mouseout', () => setTooltip(null))
      .on('click', (event: MouseEvent, point) => {
        if (!spec.selection) return
        event.stopPropagation()
        const next = new Set(event.shiftKey ? selected : [])
        if (next.has(point.index)) {
          next.delete(point.index)
        } else {
          next.add(point.index)
        }
        commitSelection(next)
      })

    if (categories.length > 0) {
      const legend = g.append('g').attr('transform', `translate(${width + 24}, 0)`)
      categories.forEach((category, i) => {
        const row = legend.append('g').attr('transform', `translate(0, ${i * 20})`)
        row.append('circle').attr('r', 5).attr('fill', palette(category)).attr('fill-opacity', 0.8)
        row.append('text')
          .attr('x', 12)
          .attr('y', 4)
          .style('font-size', '12px')
          .style('font-family', 'sans-serif')
          .style('fill', '#333')
          .text(category)
      })
    }
  }, [commitSelection, records, selected, spec])

  return (
    <div className="chart-wrapper" style={{ position: 'relative' }}>
      <svg ref={svgRef} className="spec-chart"></svg>
      {tooltip && (
        <div className="tooltip" style={{ position: 'absolute', left: `${tooltip.x + 10}px`, top: `${tooltip.y + 10}px` }}>
          {tooltip.lines.map((line, i) => (
            <div key={`${line}-${i}`} style={i === 0 ? { fontWeight: 'bold' } : undefined}>
              {line}
            </div>
          ))}
        </div>
      )}
    </div>
  )
}
