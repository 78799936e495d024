import { WORLD_ATLAS_URL } from './chartSpecs'
import { DEFAULT_YEAR } from './filterState'

export interface ExplorerConfig {
  datasetFile: string
  stepDelayMs: number
  defaultYear: number
  chartWidth: number
  chartHeight: number
  illustrationYear: number
  illustrationIndicator: string
  worldAtlasUrl: string
}

export const EXPLORER_CONFIG: ExplorerConfig = {
  datasetFile: import.meta.env.VITE_WDI_DATASET ?? 'WDIData.csv',
  stepDelayMs: 200,
  defaultYear: DEFAULT_YEAR,
  chartWidth: 800,
  chartHeight: 500,
  illustrationYear: 2012,
  illustrationIndicator: 'CO2 emissions (kt)',
  worldAtlasUrl: WORLD_ATLAS_URL
}
