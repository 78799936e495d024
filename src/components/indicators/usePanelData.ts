import { useEffect, useState } from 'react'
import { parsePanelCsv, type PanelDataset } from './panelData'

export interface PanelDataResult {
  loading: boolean
  error: string | null
  dataset: PanelDataset | null
}

export function usePanelData(fileName: string): PanelDataResult {
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)
  const [dataset, setDataset] = useState<PanelDataset | null>(null)

  useEffect(() => {
    let cancelled = false

    setLoading(true)
    setError(null)
    setDataset(null)

    const load = async () => {
      try {
        const response = await fetch(`${import.meta.env.BASE_URL}${fileName}`)
        if (!response.ok) {
          throw new Error(`Failed to load ${fileName} (${response.status})`)
        }

        const csvText = await response.text()
        if (cancelled) return

        const parsed = parsePanelCsv(csvText)
        if (parsed.rows.length === 0 || parsed.indicators.length < 2) {
          throw new Error(`${fileName} has no usable indicator rows`)
        }

        setDataset(parsed)
        setLoading(false)
      } catch (loadError) {
        if (cancelled) return
        console.error('Failed to load data:', loadError)
        setDataset(null)
        setError(loadError instanceof Error ? loadError.message : String(loadError))
        setLoading(false)
      }
    }

    void load()

    return () => {
      cancelled = true
    }
  }, [fileName])

  return { loading, error, dataset }
}
