import { invalidIndicator } from './chartErrors'
import { filterKey, type FilterState } from './filterState'
import { MemoCache } from './memoCache'
import { indicatorValue, isIndicator, type PanelDataset, type PanelRow } from './panelData'

export interface FilteredView {
  readonly dataset: PanelDataset
  readonly filter: FilterState
  readonly rows: readonly PanelRow[]
}

export const assertIndicators = (dataset: PanelDataset, filter: FilterState): void => {
  if (!isIndicator(dataset, filter.xIndicator)) throw invalidIndicator(filter.xIndicator)
  if (!isIndicator(dataset, filter.yIndicator)) throw invalidIndicator(filter.yIndicator)
}

export const matchesCountries = (filter: FilterState, country: string): boolean =>
  filter.selectedCountries.size === 0 || filter.selectedCountries.has(country)

export const buildView = (dataset: PanelDataset, filter: FilterState): FilteredView => {
  assertIndicators(dataset, filter)

  const rows = dataset.rows.filter(
    row =>
      row.year === filter.year &&
      matchesCountries(filter, row.country) &&
      indicatorValue(row, filter.xIndicator) !== null &&
      indicatorValue(row, filter.yIndicator) !== null
  )

  return Object.freeze({ dataset, filter, rows: Object.freeze(rows) })
}

export const viewCacheKey = (dataset: PanelDataset, filter: FilterState): string =>
  `${dataset.version}|${filterKey(filter)}`

export class ViewCache {
  private readonly cache: MemoCache<FilteredView>

  constructor(maxEntries?: number) {
    this.cache = new MemoCache<FilteredView>(maxEntries)
  }

  get(dataset: PanelDataset, filter: FilterState): FilteredView {
    return this.cache.getOrCompute(viewCacheKey(dataset, filter), () => buildView(dataset, filter))
  }

  clear(): void {
    this.cache.clear()
  }

  stats() {
    return this.cache.stats()
  }
}
