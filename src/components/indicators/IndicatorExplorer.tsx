import { useCallback, useEffect, useState, useSyncExternalStore, type ChangeEvent } from 'react'
import DatasetPreview from './DatasetPreview'
import { EXPLORER_CONFIG } from './explorerConfig'
import { ExplorerSession, type ChartPanel } from './explorerSession'
import IllustrationCharts from './IllustrationCharts'
import type { PanelDataset } from './panelData'
import type { SelectionEvent } from './selection'
import SpecChart from './SpecChart'
import { usePanelData } from './usePanelData'
import './IndicatorExplorer.css'

interface SessionViewProps {
  dataset: PanelDataset
  session: ExplorerSession
}

let sessionCounter = 0

const nextSessionId = (): string => {
  sessionCounter += 1
  return `wdi-session-${sessionCounter}`
}

function PanelChart({ panel, onSelect }: { panel: ChartPanel; onSelect?: (event: SelectionEvent) => void }) {
  if (!panel.spec) {
    return <div className="empty-chart">{panel.error?.message ?? 'Nothing to show'}</div>
  }
  return <SpecChart spec={panel.spec} records={panel.records} onSelect={onSelect} />
}

function SessionView({ dataset, session }: SessionViewProps) {
  const snapshot = useSyncExternalStore(session.subscribe, session.getSnapshot)
  const { filter, animation, notice, linked, linkedCountries } = snapshot
  const [minYear, maxYear] = dataset.yearRange
  const running = animation.status === 'running'

  const handleSelect = useCallback((event: SelectionEvent) => session.applySelection(event), [session])

  const handleCountries = (event: ChangeEvent<HTMLSelectElement>) => {
    session.setCountries(Array.from(event.target.selectedOptions, option => option.value))
  }

  return (
    <div className="explorer-layout">
      <aside className="explorer-sidebar">
        <label>
          X-axis
          <select value={filter.xIndicator} onChange={event => session.setXIndicator(event.target.value)}>
            {dataset.indicators.map(indicator => (
              <option key={indicator} value={indicator}>
                {indicator}
              </option>
            ))}
          </select>
        </label>
        <label className="checkbox">
          <input type="checkbox" checked={filter.xLog} onChange={event => session.setXLog(event.target.checked)} />
          Log scale on x-axis
        </label>

        <label>
          Y-axis
          <select value={filter.yIndicator} onChange={event => session.setYIndicator(event.target.value)}>
            {dataset.indicators.map(indicator => (
              <option key={indicator} value={indicator}>
                {indicator}
              </option>
            ))}
          </select>
        </label>
        <label className="checkbox">
          <input type="checkbox" checked={filter.yLog} onChange={event => session.setYLog(event.target.checked)} />
          Log scale on y-axis
        </label>

        <label>
          Countries
          <select multiple size={10} value={Array.from(filter.selectedCountries)} onChange={handleCountries}>
            {dataset.countries.map(country => (
              <option key={country} value={country}>
                {country}
              </option>
            ))}
          </select>
        </label>
      </aside>

      <main className="explorer-main">
        <label className="year-slider">
          Year
          <input
            type="range"
            min={minYear}
            max={maxYear}
            step={1}
            value={filter.year}
            onChange={event => session.setYear(Number.parseInt(event.target.value, 10))}
          />
        </label>
        <p className="year-label">{snapshot.yearLabel}</p>

        <div className="animation-controls">
          <button onClick={() => void session.startAnimation()} disabled={running}>
            Start
          </button>
          <button onClick={() => session.stopAnimation()} disabled={!running}>
            Stop
          </button>
        </div>

        {notice && <div className={`notice notice-${notice.level}`}>{notice.message}</div>}

        <PanelChart panel={snapshot.bubble} onSelect={handleSelect} />

        <h2>Interacting with other charts</h2>
        {linked ? (
          <>
            <ul className="linked-countries">
              {Array.from(linkedCountries).map(country => (
                <li key={country}>{country}</li>
              ))}
            </ul>
            <PanelChart panel={linked} />
          </>
        ) : (
          <p className="hint">Click bubbles (shift-click to add more) to follow those countries over time.</p>
        )}
      </main>
    </div>
  )
}

function ExplorerPanel({ dataset }: { dataset: PanelDataset }) {
  const [session, setSession] = useState<ExplorerSession | null>(null)

  useEffect(() => {
    const created = new ExplorerSession(dataset, {
      sessionId: nextSessionId(),
      stepDelayMs: EXPLORER_CONFIG.stepDelayMs,
      defaultYear: EXPLORER_CONFIG.defaultYear,
      dimensions: { width: EXPLORER_CONFIG.chartWidth, height: EXPLORER_CONFIG.chartHeight }
    })
    setSession(created)
    return () => created.dispose()
  }, [dataset])

  if (!session) return <div className="loading">Preparing charts...</div>
  return <SessionView dataset={dataset} session={session} />
}

export default function IndicatorExplorer() {
  const { loading, error, dataset } = usePanelData(EXPLORER_CONFIG.datasetFile)

  if (loading) return <div className="loading">Loading data...</div>
  if (error || !dataset) return <div className="error">Error: {error ?? 'No data'}</div>

  return (
    <>
      <DatasetPreview dataset={dataset} />
      <IllustrationCharts dataset={dataset} />
      <ExplorerPanel dataset={dataset} />
    </>
  )
}
