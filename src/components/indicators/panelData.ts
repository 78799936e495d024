import * as d3 from 'd3'
import { parseCsv, readCell, toNumber } from '../../utils/csv'

export const COUNTRY_COLUMN = 'Country'
export const REGION_COLUMN = 'Region'
export const YEAR_COLUMN = 'Year'
export const ID_COLUMN = 'id'
export const POPULATION_COLUMN = 'Population, total'

const META_COLUMNS = new Set([COUNTRY_COLUMN, REGION_COLUMN, YEAR_COLUMN, ID_COLUMN])

export interface PanelRow {
  readonly country: string
  readonly region: string
  readonly year: number
  /** Numeric country code shared with the world map features */
  readonly id: number | null
  readonly values: Readonly<Record<string, number | null>>
}

export interface PanelDataset {
  /** Identity of this snapshot; part of every cache key */
  readonly version: number
  readonly rows: readonly PanelRow[]
  readonly indicators: readonly string[]
  readonly countries: readonly string[]
  readonly regions: readonly string[]
  readonly yearRange: readonly [number, number]
}

/** Flat record handed to the renderer, keyed by column name */
export type ChartRecord = Readonly<Record<string, string | number | null>>

let nextVersion = 1

export const createPanelDataset = (rows: readonly PanelRow[], indicators: readonly string[]): PanelDataset => {
  const years = rows.map(row => row.year)
  const minYear = d3.min(years) ?? 0
  const maxYear = d3.max(years) ?? 0

  return Object.freeze({
    version: nextVersion++,
    rows: Object.freeze(rows.map(row => Object.freeze({ ...row, values: Object.freeze({ ...row.values }) }))),
    indicators: Object.freeze([...indicators]),
    countries: Object.freeze(Array.from(new Set(rows.map(row => row.country))).sort((a, b) => a.localeCompare(b))),
    regions: Object.freeze(Array.from(new Set(rows.map(row => row.region))).sort((a, b) => a.localeCompare(b))),
    yearRange: Object.freeze([minYear, maxYear] as const)
  })
}

export const isIndicator = (dataset: PanelDataset, name: string): boolean => dataset.indicators.includes(name)

export const indicatorValue = (row: PanelRow, indicator: string): number | null => row.values[indicator] ?? null

export const toChartRecord = (row: PanelRow): ChartRecord => ({
  [COUNTRY_COLUMN]: row.country,
  [REGION_COLUMN]: row.region,
  [YEAR_COLUMN]: row.year,
  [ID_COLUMN]: row.id,
  ...row.values
})

/** Column order of the loaded table: meta columns, then indicators. */
export const datasetColumns = (dataset: PanelDataset): string[] => [
  COUNTRY_COLUMN,
  REGION_COLUMN,
  YEAR_COLUMN,
  ID_COLUMN,
  ...dataset.indicators
]

export const previewRecords = (dataset: PanelDataset, limit = 10): ChartRecord[] =>
  dataset.rows.slice(0, Math.max(0, limit)).map(toChartRecord)

/**
 * Parses the indicator table. A non-meta column counts as an indicator when
 * every non-empty cell in it is a number; rows without a country or a year
 * are skipped.
 */
export const parsePanelCsv = (text: string): PanelDataset => {
  const parsed = parseCsv(text)
  const candidates = parsed.columns.filter(column => !META_COLUMNS.has(column))

  const indicators = candidates.filter(column =>
    parsed.every(row => {
      const cell = readCell(row, column)
      return cell.length === 0 || toNumber(cell) !== null
    })
  )

  const rows = parsed
    .map(row => {
      const country = readCell(row, COUNTRY_COLUMN)
      const yearValue = toNumber(readCell(row, YEAR_COLUMN))
      if (!country || yearValue === null) return null

      const values: Record<string, number | null> = {}
      indicators.forEach(indicator => {
        values[indicator] = toNumber(readCell(row, indicator))
      })

      const idValue = toNumber(readCell(row, ID_COLUMN))

      return {
        country,
        region: readCell(row, REGION_COLUMN) || 'Unknown',
        year: Math.trunc(yearValue),
        id: idValue === null ? null : Math.trunc(idValue),
        values
      } satisfies PanelRow
    })
    .filter((row): row is PanelRow => row !== null)

  return createPanelDataset(rows, indicators)
}
