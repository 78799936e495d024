import { createPanelDataset, type PanelDataset, type PanelRow } from './panelData'

export const row = (
  country: string,
  region: string,
  year: number,
  values: Record<string, number | null>,
  id: number | null = null
): PanelRow => ({ country, region, year, id, values })

export const POPULATION = 'Population, total'

/**
 * Three countries over 2010-2012. Gamma has no GDP in 2010 and 2012, Beta no
 * life expectancy in 2011.
 */
export const threeCountryDataset = (): PanelDataset =>
  createPanelDataset(
    [
      row('Alpha', 'Europe', 2010, { GDP: 1000, LifeExp: 70, [POPULATION]: 5e6, CO2: 100 }, 1),
      row('Alpha', 'Europe', 2011, { GDP: 1100, LifeExp: 71, [POPULATION]: 5.1e6, CO2: 110 }, 1),
      row('Alpha', 'Europe', 2012, { GDP: 1200, LifeExp: 72, [POPULATION]: 5.2e6, CO2: 120 }, 1),
      row('Beta', 'Asia', 2010, { GDP: 500, LifeExp: 60, [POPULATION]: 2e7, CO2: null }, 2),
      row('Beta', 'Asia', 2011, { GDP: 550, LifeExp: null, [POPULATION]: 2.1e7, CO2: 300 }, 2),
      row('Beta', 'Asia', 2012, { GDP: 600, LifeExp: 62, [POPULATION]: 2.2e7, CO2: 320 }, 2),
      row('Gamma', 'Africa', 2010, { GDP: null, LifeExp: 50, [POPULATION]: 1e6, CO2: 10 }, 3),
      row('Gamma', 'Africa', 2011, { GDP: 300, LifeExp: 51, [POPULATION]: 1.1e6, CO2: 11 }, 3),
      row('Gamma', 'Africa', 2012, { GDP: null, LifeExp: 52, [POPULATION]: 1.2e6, CO2: 12 }, 3)
    ],
    ['GDP', 'LifeExp', POPULATION, 'CO2']
  )

/** Two indicators whose years with values never overlap. */
export const disjointDataset = (): PanelDataset =>
  createPanelDataset(
    [
      row('Alpha', 'Europe', 2010, { Early: 1, Late: null }),
      row('Alpha', 'Europe', 2012, { Early: null, Late: 2 })
    ],
    ['Early', 'Late']
  )
