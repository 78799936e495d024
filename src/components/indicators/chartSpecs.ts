import * as d3 from 'd3'
import { assertIndicators, matchesCountries, type FilteredView } from './buildView'
import { ChartError, invalidIndicator } from './chartErrors'
import type { FilterState } from './filterState'
import {
  COUNTRY_COLUMN,
  ID_COLUMN,
  POPULATION_COLUMN,
  REGION_COLUMN,
  YEAR_COLUMN,
  indicatorValue,
  isIndicator,
  toChartRecord,
  type ChartRecord,
  type PanelDataset,
  type PanelRow
} from './panelData'

export type ScalePolicy = 'perFrame' | 'global'
export type MarkType = 'circle' | 'line' | 'geoshape'
export type FieldType = 'quantitative' | 'nominal' | 'ordinal'
export type ScaleType = 'linear' | 'log'
export type SelectionChannel = 'x' | 'y' | 'size'

export interface ScaleSpec {
  type: ScaleType
  zero: boolean
  domain?: [number, number]
  range?: [number, number]
}

export interface FieldEncoding {
  field: string
  type: FieldType
  scale?: ScaleSpec
}

export interface ConditionalColor {
  condition: FieldEncoding & { selection: string }
  value: string
}

export interface ChartEncoding {
  x?: FieldEncoding
  y?: FieldEncoding
  size?: FieldEncoding
  color?: FieldEncoding | ConditionalColor
  order?: FieldEncoding
  tooltip?: FieldEncoding[]
}

export interface MarkSpec {
  type: MarkType
  opacity?: number
  stroke?: string
  strokeWidth?: number
  point?: boolean
}

export interface SelectionSpec {
  name: string
  type: 'multi'
  encodings: SelectionChannel[]
}

export interface LookupTransform {
  lookup: string
  from: {
    key: string
    fields: string[]
  }
}

export interface ChartSpec {
  title?: string
  width: number
  height: number
  mark: MarkSpec
  encoding: ChartEncoding
  selection?: SelectionSpec
  geometry?: {
    url: string
    feature: string
  }
  transform?: LookupTransform[]
  projection?: {
    type: 'equirectangular'
  }
}

export interface ChartDimensions {
  width: number
  height: number
}

export const BUBBLE_SELECTION = 'selected'
export const SIZE_RANGE: [number, number] = [30, 3000]
export const UNSELECTED_COLOR = 'lightgray'
export const WORLD_ATLAS_URL = 'https://cdn.jsdelivr.net/npm/world-atlas@2/countries-110m.json'

const DEFAULT_DIMENSIONS: ChartDimensions = { width: 800, height: 500 }

export const isConditionalColor = (color: FieldEncoding | ConditionalColor): color is ConditionalColor =>
  'condition' in color

/** Positive values only on a log scale, which has no place for zero. */
const domainOf = (values: Iterable<number | null>, log: boolean): [number, number] | undefined => {
  const usable = Array.from(values).filter((value): value is number => value !== null && (!log || value > 0))
  const [min, max] = d3.extent(usable)
  if (min === undefined || max === undefined) return undefined
  return [min, max]
}

const scaleSpec = (log: boolean, domain: [number, number] | undefined, range?: [number, number]): ScaleSpec => {
  const scale: ScaleSpec = { type: log ? 'log' : 'linear', zero: false }
  if (domain) scale.domain = domain
  if (range) scale.range = range
  return scale
}

const quantitative = (field: string, scale: ScaleSpec): FieldEncoding => ({ field, type: 'quantitative', scale })

const domainRows = (view: FilteredView, filter: FilterState, policy: ScalePolicy): readonly PanelRow[] => {
  if (policy === 'perFrame') return view.rows
  return view.dataset.rows.filter(row => matchesCountries(filter, row.country))
}

export const buildBubbleSpec = (
  view: FilteredView,
  filter: FilterState,
  scalePolicy: ScalePolicy,
  dimensions: ChartDimensions = DEFAULT_DIMENSIONS
): ChartSpec => {
  assertIndicators(view.dataset, filter)
  if (view.rows.length === 0) {
    throw new ChartError('EmptyView', `No countries have both values for ${filter.year}`)
  }

  const rows = domainRows(view, filter, scalePolicy)
  const population = isIndicator(view.dataset, POPULATION_COLUMN)
    ? domainOf(rows.map(row => indicatorValue(row, POPULATION_COLUMN)), false)
    : undefined

  return {
    width: dimensions.width,
    height: dimensions.height,
    mark: { type: 'circle', opacity: 0.7, stroke: 'black', strokeWidth: 1 },
    encoding: {
      x: quantitative(
        filter.xIndicator,
        scaleSpec(filter.xLog, domainOf(rows.map(row => indicatorValue(row, filter.xIndicator)), filter.xLog))
      ),
      y: quantitative(
        filter.yIndicator,
        scaleSpec(filter.yLog, domainOf(rows.map(row => indicatorValue(row, filter.yIndicator)), filter.yLog))
      ),
      size: quantitative(POPULATION_COLUMN, scaleSpec(false, population, SIZE_RANGE)),
      color: {
        condition: { selection: BUBBLE_SELECTION, field: REGION_COLUMN, type: 'nominal' },
        value: UNSELECTED_COLOR
      },
      tooltip: [{ field: COUNTRY_COLUMN, type: 'nominal' }]
    },
    selection: { name: BUBBLE_SELECTION, type: 'multi', encodings: ['x', 'y', 'size'] }
  }
}

/** Every year of the given countries with both values present, by country then year. */
export const seriesRecords = (
  dataset: PanelDataset,
  filter: FilterState,
  countries: ReadonlySet<string>
): ChartRecord[] => {
  assertIndicators(dataset, filter)
  return dataset.rows
    .filter(
      row =>
        countries.has(row.country) &&
        indicatorValue(row, filter.xIndicator) !== null &&
        indicatorValue(row, filter.yIndicator) !== null
    )
    .sort((a, b) => a.country.localeCompare(b.country) || a.year - b.year)
    .map(toChartRecord)
}

export const buildConnectedScatterSpec = (
  dataset: PanelDataset,
  filter: FilterState,
  countries: ReadonlySet<string>,
  dimensions: ChartDimensions = DEFAULT_DIMENSIONS
): ChartSpec => {
  if (seriesRecords(dataset, filter, countries).length === 0) {
    throw new ChartError('EmptyView', 'None of the selected countries have values for both indicators')
  }

  return {
    width: dimensions.width,
    height: dimensions.height,
    mark: { type: 'line', point: true },
    encoding: {
      x: quantitative(filter.xIndicator, scaleSpec(filter.xLog, undefined)),
      y: quantitative(filter.yIndicator, scaleSpec(filter.yLog, undefined)),
      color: { field: COUNTRY_COLUMN, type: 'nominal' },
      order: { field: YEAR_COLUMN, type: 'ordinal' },
      tooltip: [
        { field: COUNTRY_COLUMN, type: 'nominal' },
        { field: YEAR_COLUMN, type: 'ordinal' }
      ]
    }
  }
}

export const buildChoroplethSpec = (
  view: FilteredView,
  indicatorName: string,
  dimensions: ChartDimensions = DEFAULT_DIMENSIONS,
  atlasUrl: string = WORLD_ATLAS_URL
): ChartSpec => {
  if (!isIndicator(view.dataset, indicatorName)) throw invalidIndicator(indicatorName)
  if (view.rows.length === 0) {
    throw new ChartError('EmptyView', `No values of ${indicatorName} for ${view.filter.year}`)
  }

  return {
    title: indicatorName,
    width: dimensions.width,
    height: dimensions.height,
    mark: { type: 'geoshape', stroke: 'white' },
    geometry: { url: atlasUrl, feature: 'countries' },
    transform: [{ lookup: ID_COLUMN, from: { key: ID_COLUMN, fields: [indicatorName] } }],
    encoding: {
      color: { field: indicatorName, type: 'quantitative' }
    },
    projection: { type: 'equirectangular' }
  }
}

export const viewRecords = (view: FilteredView): ChartRecord[] => view.rows.map(toChartRecord)
