import type { FilteredView } from './buildView'
import type { ChartSpec, FieldEncoding } from './chartSpecs'
import type { FilterState } from './filterState'
import { indicatorValue, type ChartRecord } from './panelData'

export type SelectionConstraint = Readonly<Record<string, unknown>>

/**
 * Brush payload reported by the renderer: a disjunction of points, each
 * holding the field values of the brushed channels.
 */
export interface SelectionEvent {
  vlMulti?: {
    or?: readonly SelectionConstraint[]
  }
}

export const selectionConstraints = (event: SelectionEvent | null | undefined): readonly SelectionConstraint[] =>
  event?.vlMulti?.or ?? []

/**
 * Countries of the current view whose x value appears in the selection. Only
 * the x channel takes part in the join, so unrelated countries that share an
 * x value with a brushed point are picked up too.
 */
export const translateSelection = (
  event: SelectionEvent | null | undefined,
  view: FilteredView,
  filter: FilterState
): Set<string> => {
  const constraints = selectionConstraints(event)
  if (constraints.length === 0) return new Set()

  const xValues = new Set<number>()
  constraints.forEach(constraint => {
    const value = constraint[filter.xIndicator]
    if (typeof value === 'number') xValues.add(value)
  })

  const countries = new Set<string>()
  view.rows.forEach(row => {
    if (row.year !== filter.year) return
    const x = indicatorValue(row, filter.xIndicator)
    if (x !== null && xValues.has(x)) countries.add(row.country)
  })
  return countries
}

const channelEncoding = (spec: ChartSpec, channel: 'x' | 'y' | 'size'): FieldEncoding | undefined =>
  spec.encoding[channel]

/** Builds the payload for the records picked on a chart carrying a selection. */
export const selectionPayload = (spec: ChartSpec, records: readonly ChartRecord[]): SelectionEvent => {
  if (!spec.selection || records.length === 0) return {}

  const fields = spec.selection.encodings
    .map(channel => channelEncoding(spec, channel)?.field)
    .filter((field): field is string => field !== undefined)

  return {
    vlMulti: {
      or: records.map(record => {
        const constraint: Record<string, unknown> = {}
        fields.forEach(field => {
          constraint[field] = record[field] ?? null
        })
        return constraint
      })
    }
  }
}
