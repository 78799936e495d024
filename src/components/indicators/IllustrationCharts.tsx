import { useMemo } from 'react'
import { buildView } from './buildView'
import { isChartError } from './chartErrors'
import { buildBubbleSpec, buildChoroplethSpec, viewRecords, type ChartSpec } from './chartSpecs'
import ChoroplethMap from './ChoroplethMap'
import { EXPLORER_CONFIG } from './explorerConfig'
import { createFilterState } from './filterState'
import type { ChartRecord, PanelDataset } from './panelData'
import SpecChart from './SpecChart'

interface IllustrationChartsProps {
  dataset: PanelDataset
}

const { illustrationYear, illustrationIndicator, chartWidth, chartHeight, worldAtlasUrl } = EXPLORER_CONFIG
const DIMENSIONS = { width: chartWidth, height: chartHeight }

type Illustration = { spec: ChartSpec; records: ChartRecord[]; error: null } | { spec: null; records: []; error: string }

const illustrate = (build: () => { spec: ChartSpec; records: ChartRecord[] }): Illustration => {
  try {
    return { ...build(), error: null }
  } catch (caught) {
    if (!isChartError(caught)) throw caught
    return { spec: null, records: [], error: caught.message }
  }
}

/** Fixed-year charts shown above the interactive explorer. */
export default function IllustrationCharts({ dataset }: IllustrationChartsProps) {
  const bubble = useMemo(
    () =>
      illustrate(() => {
        const filter = createFilterState(dataset, { year: illustrationYear })
        const view = buildView(dataset, filter)
        return { spec: buildBubbleSpec(view, filter, 'perFrame', DIMENSIONS), records: viewRecords(view) }
      }),
    [dataset]
  )

  const map = useMemo(
    () =>
      illustrate(() => {
        const filter = createFilterState(dataset, {
          xIndicator: illustrationIndicator,
          yIndicator: illustrationIndicator,
          xLog: false,
          year: illustrationYear
        })
        const view = buildView(dataset, filter)
        return {
          spec: buildChoroplethSpec(view, illustrationIndicator, DIMENSIONS, worldAtlasUrl),
          records: viewRecords(view)
        }
      }),
    [dataset]
  )

  return (
    <section className="illustrations">
      <h2>{`The world in ${illustrationYear}`}</h2>
      {bubble.spec ? <SpecChart spec={bubble.spec} records={bubble.records} /> : <div className="empty-chart">{bubble.error}</div>}
      {map.spec ? <ChoroplethMap spec={map.spec} records={map.records} /> : <div className="empty-chart">{map.error}</div>}
    </section>
  )
}
