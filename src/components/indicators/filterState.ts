import { invalidIndicator } from './chartErrors'
import { isIndicator, type PanelDataset } from './panelData'

export interface FilterState {
  readonly xIndicator: string
  readonly yIndicator: string
  readonly xLog: boolean
  readonly yLog: boolean
  readonly year: number
  readonly selectedCountries: ReadonlySet<string>
}

const DEFAULT_X_INDEX = 5
const DEFAULT_Y_INDEX = 9
/** Year shown first when the session has none persisted */
export const DEFAULT_YEAR = 2015

const clamp = (value: number, min: number, max: number): number => {
  return Math.max(min, Math.min(max, value))
}

const freezeFilter = (filter: FilterState): FilterState => Object.freeze({ ...filter })

const pickIndicator = (dataset: PanelDataset, preferred: number, fallback: number): string => {
  const { indicators } = dataset
  const name = indicators[preferred] ?? indicators[Math.min(fallback, indicators.length - 1)]
  if (name === undefined) {
    throw invalidIndicator('(none)')
  }
  return name
}

export const clampYear = (dataset: PanelDataset, year: number): number => {
  const [minYear, maxYear] = dataset.yearRange
  return clamp(Math.trunc(year), minYear, maxYear)
}

const assertIndicator = (dataset: PanelDataset, name: string): void => {
  if (!isIndicator(dataset, name)) throw invalidIndicator(name)
}

/** Keeps only names the dataset knows about. */
const knownCountries = (dataset: PanelDataset, countries: Iterable<string>): ReadonlySet<string> => {
  const known = new Set(dataset.countries)
  return new Set(Array.from(countries).filter(country => known.has(country)))
}

export const createFilterState = (dataset: PanelDataset, overrides: Partial<FilterState> = {}): FilterState => {
  const xIndicator = overrides.xIndicator ?? pickIndicator(dataset, DEFAULT_X_INDEX, 0)
  const yIndicator = overrides.yIndicator ?? pickIndicator(dataset, DEFAULT_Y_INDEX, 1)
  assertIndicator(dataset, xIndicator)
  assertIndicator(dataset, yIndicator)

  return freezeFilter({
    xIndicator,
    yIndicator,
    xLog: overrides.xLog ?? true,
    yLog: overrides.yLog ?? false,
    year: clampYear(dataset, overrides.year ?? DEFAULT_YEAR),
    selectedCountries: knownCountries(dataset, overrides.selectedCountries ?? [])
  })
}

export const setXIndicator = (dataset: PanelDataset, filter: FilterState, xIndicator: string): FilterState => {
  assertIndicator(dataset, xIndicator)
  return freezeFilter({ ...filter, xIndicator })
}

export const setYIndicator = (dataset: PanelDataset, filter: FilterState, yIndicator: string): FilterState => {
  assertIndicator(dataset, yIndicator)
  return freezeFilter({ ...filter, yIndicator })
}

export const setXLog = (filter: FilterState, xLog: boolean): FilterState => freezeFilter({ ...filter, xLog })

export const setYLog = (filter: FilterState, yLog: boolean): FilterState => freezeFilter({ ...filter, yLog })

export const setYear = (dataset: PanelDataset, filter: FilterState, year: number): FilterState =>
  freezeFilter({ ...filter, year: clampYear(dataset, year) })

export const setCountries = (dataset: PanelDataset, filter: FilterState, countries: Iterable<string>): FilterState =>
  freezeFilter({ ...filter, selectedCountries: knownCountries(dataset, countries) })

/**
 * Narrows the filter to the countries picked out by a brush. An empty
 * selection leaves the filter as it is.
 */
export const applySelection = (filter: FilterState, countries: ReadonlySet<string>): FilterState => {
  if (countries.size === 0) return filter
  return freezeFilter({ ...filter, selectedCountries: new Set(countries) })
}

export const filterKey = (filter: FilterState): string =>
  JSON.stringify([
    filter.xIndicator,
    filter.yIndicator,
    filter.xLog,
    filter.yLog,
    filter.year,
    Array.from(filter.selectedCountries).sort()
  ])
