import { describe, expect, it } from 'vitest'
import { buildView } from './buildView'
import { buildBubbleSpec, buildConnectedScatterSpec, viewRecords } from './chartSpecs'
import { createFilterState } from './filterState'
import { row, threeCountryDataset } from './fixtures'
import { createPanelDataset } from './panelData'
import { selectionConstraints, selectionPayload, translateSelection } from './selection'

const sharedValueDataset = () =>
  createPanelDataset(
    [
      row('A', 'North', 2000, { X: 10, Y: 1 }),
      row('B', 'North', 2000, { X: 20, Y: 2 }),
      row('C', 'South', 2000, { X: 10, Y: 3 })
    ],
    ['X', 'Y']
  )

describe('translateSelection', () => {
  const dataset = sharedValueDataset()
  const filter = createFilterState(dataset, { year: 2000 })
  const view = buildView(dataset, filter)

  it('matches every country sharing a brushed x value', () => {
    const countries = translateSelection({ vlMulti: { or: [{ X: 10, Y: 1 }] } }, view, filter)
    expect(Array.from(countries).sort()).toEqual(['A', 'C'])
  })

  it('ignores the other channels', () => {
    const countries = translateSelection({ vlMulti: { or: [{ X: 20, Y: 99 }] } }, view, filter)
    expect(Array.from(countries)).toEqual(['B'])
  })

  it('returns nothing for an empty or missing payload', () => {
    expect(translateSelection({}, view, filter).size).toBe(0)
    expect(translateSelection({ vlMulti: { or: [] } }, view, filter).size).toBe(0)
    expect(translateSelection(null, view, filter).size).toBe(0)
  })

  it('returns nothing when no value lines up', () => {
    expect(translateSelection({ vlMulti: { or: [{ X: 15 }] } }, view, filter).size).toBe(0)
    expect(translateSelection({ vlMulti: { or: [{ X: '10' }] } }, view, filter).size).toBe(0)
  })
})

describe('selectionConstraints', () => {
  it('reads the disjunction', () => {
    expect(selectionConstraints({ vlMulti: { or: [{ X: 1 }, { X: 2 }] } })).toEqual([{ X: 1 }, { X: 2 }])
    expect(selectionConstraints(undefined)).toEqual([])
  })
})

describe('selectionPayload', () => {
  const dataset = threeCountryDataset()
  const filter = createFilterState(dataset, { year: 2012 })
  const view = buildView(dataset, filter)
  const records = viewRecords(view)

  it('carries the fields of the selection channels', () => {
    const spec = buildBubbleSpec(view, filter, 'perFrame')
    const alpha = records.filter(record => record.Country === 'Alpha')
    expect(selectionPayload(spec, alpha)).toEqual({
      vlMulti: { or: [{ GDP: 1200, LifeExp: 72, 'Population, total': 5.2e6 }] }
    })
  })

  it('round-trips through the translator', () => {
    const spec = buildBubbleSpec(view, filter, 'perFrame')
    const beta = records.filter(record => record.Country === 'Beta')
    expect(Array.from(translateSelection(selectionPayload(spec, beta), view, filter))).toEqual(['Beta'])
  })

  it('is empty without a selection or without records', () => {
    const spec = buildBubbleSpec(view, filter, 'perFrame')
    const linked = buildConnectedScatterSpec(dataset, filter, new Set(['Alpha']))
    expect(selectionPayload(spec, [])).toEqual({})
    expect(selectionPayload(linked, records)).toEqual({})
  })
})
