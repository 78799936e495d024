import { describe, expect, it } from 'vitest'
import { buildView } from './buildView'
import { ChartError } from './chartErrors'
import {
  buildBubbleSpec,
  buildChoroplethSpec,
  buildConnectedScatterSpec,
  seriesRecords,
  viewRecords,
  type ChartSpec
} from './chartSpecs'
import { createFilterState, setCountries, setYear } from './filterState'
import { POPULATION, row, threeCountryDataset } from './fixtures'
import { createPanelDataset } from './panelData'

const bubbleFor = (year: number, policy: 'perFrame' | 'global', xLog = true): ChartSpec => {
  const dataset = threeCountryDataset()
  const filter = createFilterState(dataset, { year, xLog })
  return buildBubbleSpec(buildView(dataset, filter), filter, policy)
}

const kindOf = (fn: () => unknown): string | null => {
  try {
    fn()
    return null
  } catch (error) {
    return error instanceof ChartError ? error.kind : 'other'
  }
}

describe('buildBubbleSpec', () => {
  it('encodes the chosen indicators with a log x axis', () => {
    const dataset = threeCountryDataset()
    const filter = createFilterState(dataset, { year: 2012, xLog: true, yLog: false })
    const view = buildView(dataset, filter)
    const spec = buildBubbleSpec(view, filter, 'perFrame')

    expect(viewRecords(view).map(record => record.Country)).toEqual(['Alpha', 'Beta'])
    expect(spec.encoding.x).toEqual({
      field: 'GDP',
      type: 'quantitative',
      scale: { type: 'log', zero: false, domain: [600, 1200] }
    })
    expect(spec.encoding.y?.scale?.type).toBe('linear')
  })

  it('sizes by population and dims points outside the selection', () => {
    const spec = bubbleFor(2012, 'perFrame')
    expect(spec.encoding.size).toEqual({
      field: POPULATION,
      type: 'quantitative',
      scale: { type: 'linear', zero: false, domain: [5.2e6, 2.2e7], range: [30, 3000] }
    })
    expect(spec.encoding.color).toEqual({
      condition: { selection: 'selected', field: 'Region', type: 'nominal' },
      value: 'lightgray'
    })
    expect(spec.encoding.tooltip).toEqual([{ field: 'Country', type: 'nominal' }])
    expect(spec.selection).toEqual({ name: 'selected', type: 'multi', encodings: ['x', 'y', 'size'] })
    expect(spec.mark).toEqual({ type: 'circle', opacity: 0.7, stroke: 'black', strokeWidth: 1 })
    expect([spec.width, spec.height]).toEqual([800, 500])
  })

  it('keeps axes fixed across years with the global policy', () => {
    const early = bubbleFor(2010, 'global')
    const late = bubbleFor(2012, 'global')
    expect(early.encoding).toEqual(late.encoding)
    expect(early.encoding.x?.scale?.domain).toEqual([300, 1200])
    expect(early.encoding.y?.scale?.domain).toEqual([50, 72])
    expect(early.encoding.size?.scale?.domain).toEqual([1e6, 2.2e7])
  })

  it('rescales per year with the per-frame policy', () => {
    expect(bubbleFor(2010, 'perFrame').encoding.x?.scale?.domain).toEqual([500, 1000])
    expect(bubbleFor(2012, 'perFrame').encoding.x?.scale?.domain).toEqual([600, 1200])
  })

  it('limits global domains to the selected countries', () => {
    const dataset = threeCountryDataset()
    const filter = setCountries(dataset, createFilterState(dataset, { year: 2012 }), ['Alpha'])
    const spec = buildBubbleSpec(buildView(dataset, filter), filter, 'global')
    expect(spec.encoding.x?.scale?.domain).toEqual([1000, 1200])
  })

  it('ignores non-positive values in log domains', () => {
    const dataset = createPanelDataset(
      [
        row('A', 'R', 2000, { GDP: 0, LifeExp: 1, [POPULATION]: 1 }),
        row('B', 'R', 2000, { GDP: 10, LifeExp: 2, [POPULATION]: 2 }),
        row('C', 'R', 2000, { GDP: 100, LifeExp: 3, [POPULATION]: 3 })
      ],
      ['GDP', 'LifeExp', POPULATION]
    )
    const filter = createFilterState(dataset, { year: 2000 })
    expect(buildBubbleSpec(buildView(dataset, filter), filter, 'perFrame').encoding.x?.scale?.domain).toEqual([10, 100])
  })

  it('is deterministic', () => {
    expect(bubbleFor(2011, 'global')).toEqual(bubbleFor(2011, 'global'))
  })

  it('reports an empty view', () => {
    const dataset = threeCountryDataset()
    const filter = setCountries(dataset, createFilterState(dataset, { year: 2012 }), ['Gamma'])
    expect(kindOf(() => buildBubbleSpec(buildView(dataset, filter), filter, 'perFrame'))).toBe('EmptyView')
  })

  it('reports an invalid indicator', () => {
    const dataset = threeCountryDataset()
    const filter = createFilterState(dataset)
    const view = buildView(dataset, filter)
    expect(kindOf(() => buildBubbleSpec(view, { ...filter, xIndicator: 'Nope' }, 'perFrame'))).toBe('InvalidIndicator')
  })
})

describe('buildConnectedScatterSpec', () => {
  const dataset = threeCountryDataset()
  const filter = createFilterState(dataset, { year: 2010 })

  it('draws one line per country across every year', () => {
    const spec = buildConnectedScatterSpec(dataset, filter, new Set(['Alpha', 'Beta']))
    expect(spec.mark).toEqual({ type: 'line', point: true })
    expect(spec.encoding).toEqual({
      x: { field: 'GDP', type: 'quantitative', scale: { type: 'log', zero: false } },
      y: { field: 'LifeExp', type: 'quantitative', scale: { type: 'linear', zero: false } },
      color: { field: 'Country', type: 'nominal' },
      order: { field: 'Year', type: 'ordinal' },
      tooltip: [
        { field: 'Country', type: 'nominal' },
        { field: 'Year', type: 'ordinal' }
      ]
    })
    expect(spec.selection).toBeUndefined()
  })

  it('orders its records by country then year and skips missing values', () => {
    const records = seriesRecords(dataset, setYear(dataset, filter, 2012), new Set(['Beta', 'Alpha']))
    expect(records.map(record => `${record.Country} ${record.Year}`)).toEqual([
      'Alpha 2010',
      'Alpha 2011',
      'Alpha 2012',
      'Beta 2010',
      'Beta 2012'
    ])
  })

  it('reports an empty view when no country has values', () => {
    expect(kindOf(() => buildConnectedScatterSpec(dataset, filter, new Set(['Nobody'])))).toBe('EmptyView')
  })
})

describe('buildChoroplethSpec', () => {
  const dataset = threeCountryDataset()
  const filter = createFilterState(dataset, { xIndicator: 'CO2', yIndicator: 'CO2', year: 2012 })
  const view = buildView(dataset, filter)

  it('joins map features to rows by id', () => {
    const spec = buildChoroplethSpec(view, 'CO2', { width: 400, height: 300 }, 'https://example.test/world.json')
    expect(spec).toEqual({
      title: 'CO2',
      width: 400,
      height: 300,
      mark: { type: 'geoshape', stroke: 'white' },
      geometry: { url: 'https://example.test/world.json', feature: 'countries' },
      transform: [{ lookup: 'id', from: { key: 'id', fields: ['CO2'] } }],
      encoding: { color: { field: 'CO2', type: 'quantitative' } },
      projection: { type: 'equirectangular' }
    })
    expect(viewRecords(view).map(record => [record.id, record.CO2])).toEqual([
      [1, 120],
      [2, 320],
      [3, 12]
    ])
  })

  it('rejects unknown indicators', () => {
    expect(kindOf(() => buildChoroplethSpec(view, 'Nope'))).toBe('InvalidIndicator')
  })
})
