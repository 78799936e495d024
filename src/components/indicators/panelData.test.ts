import { describe, expect, it } from 'vitest'
import { datasetColumns, parsePanelCsv, previewRecords, toChartRecord } from './panelData'

const CSV = [
  'Country,Region,Year,id,GDP,LifeExp,Notes',
  'Alpha,Europe,2010,8,1000,70.5,first',
  'Beta,,2011,,,61,',
  ',Asia,2011,4,10,10,orphan',
  'Gamma,Africa,,5,1,1,no year'
].join('\n')

describe('parsePanelCsv', () => {
  it('keeps only numeric non-meta columns as indicators', () => {
    expect(parsePanelCsv(CSV).indicators).toEqual(['GDP', 'LifeExp'])
  })

  it('skips rows without a country or a year', () => {
    const dataset = parsePanelCsv(CSV)
    expect(dataset.rows.map(r => r.country)).toEqual(['Alpha', 'Beta'])
    expect(dataset.countries).toEqual(['Alpha', 'Beta'])
    expect(dataset.yearRange).toEqual([2010, 2011])
  })

  it('reads blanks as null and falls back to an Unknown region', () => {
    const [alpha, beta] = parsePanelCsv(CSV).rows
    expect(alpha).toEqual({ country: 'Alpha', region: 'Europe', year: 2010, id: 8, values: { GDP: 1000, LifeExp: 70.5 } })
    expect(beta).toEqual({ country: 'Beta', region: 'Unknown', year: 2011, id: null, values: { GDP: null, LifeExp: 61 } })
  })

  it('gives every parsed dataset its own version', () => {
    expect(parsePanelCsv(CSV).version).not.toBe(parsePanelCsv(CSV).version)
  })

  it('flattens rows into chart records keyed by column', () => {
    const [alpha] = parsePanelCsv(CSV).rows
    expect(toChartRecord(alpha)).toEqual({
      Country: 'Alpha',
      Region: 'Europe',
      Year: 2010,
      id: 8,
      GDP: 1000,
      LifeExp: 70.5
    })
  })
})

describe('dataset preview', () => {
  it('lists meta columns before the indicators', () => {
    expect(datasetColumns(parsePanelCsv(CSV))).toEqual(['Country', 'Region', 'Year', 'id', 'GDP', 'LifeExp'])
  })

  it('takes the first rows as records', () => {
    const dataset = parsePanelCsv(CSV)
    expect(previewRecords(dataset, 1)).toEqual([
      { Country: 'Alpha', Region: 'Europe', Year: 2010, id: 8, GDP: 1000, LifeExp: 70.5 }
    ])
    expect(previewRecords(dataset).map(record => record.Country)).toEqual(['Alpha', 'Beta'])
    expect(previewRecords(dataset, 0)).toEqual([])
  })
})
