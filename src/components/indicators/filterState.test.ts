import { describe, expect, it } from 'vitest'
import { ChartError } from './chartErrors'
import {
  applySelection,
  createFilterState,
  filterKey,
  setCountries,
  setXIndicator,
  setXLog,
  setYear,
  setYLog
} from './filterState'
import { threeCountryDataset } from './fixtures'

describe('createFilterState', () => {
  it('falls back to the first indicators on a short dataset and clamps the default year', () => {
    const filter = createFilterState(threeCountryDataset())
    expect(filter).toMatchObject({ xIndicator: 'GDP', yIndicator: 'LifeExp', xLog: true, yLog: false, year: 2012 })
    expect(filter.selectedCountries.size).toBe(0)
  })

  it('rejects unknown indicators', () => {
    expect(() => createFilterState(threeCountryDataset(), { xIndicator: 'Nope' })).toThrow(ChartError)
  })

  it('drops countries the dataset does not know', () => {
    const filter = createFilterState(threeCountryDataset(), { selectedCountries: new Set(['Alpha', 'Atlantis']) })
    expect(Array.from(filter.selectedCountries)).toEqual(['Alpha'])
  })
})

describe('filter transitions', () => {
  const dataset = threeCountryDataset()
  const base = createFilterState(dataset)

  it('returns new frozen values and leaves the original untouched', () => {
    const next = setXLog(base, false)
    expect(next.xLog).toBe(false)
    expect(base.xLog).toBe(true)
    expect(Object.isFrozen(next)).toBe(true)
    expect(setYLog(base, true).yLog).toBe(true)
  })

  it('clamps years into the dataset range', () => {
    expect(setYear(dataset, base, 1990).year).toBe(2010)
    expect(setYear(dataset, base, 2011.7).year).toBe(2011)
  })

  it('reports an InvalidIndicator for unknown columns', () => {
    try {
      setXIndicator(dataset, base, 'Nope')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ChartError)
      expect(error).toMatchObject({ kind: 'InvalidIndicator' })
    }
  })

  it('sets countries', () => {
    expect(Array.from(setCountries(dataset, base, ['Beta', 'Gamma']).selectedCountries)).toEqual(['Beta', 'Gamma'])
  })

  it('keeps the filter when a selection matched nothing', () => {
    expect(applySelection(base, new Set())).toBe(base)
    expect(Array.from(applySelection(base, new Set(['Alpha'])).selectedCountries)).toEqual(['Alpha'])
  })
})

describe('filterKey', () => {
  it('ignores the order countries were picked in', () => {
    const dataset = threeCountryDataset()
    const base = createFilterState(dataset)
    expect(filterKey(setCountries(dataset, base, ['Gamma', 'Alpha']))).toBe(
      filterKey(setCountries(dataset, base, ['Alpha', 'Gamma']))
    )
    expect(filterKey(base)).not.toBe(filterKey(setYear(dataset, base, 2010)))
  })
})
