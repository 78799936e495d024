import { useMemo } from 'react'
import { datasetColumns, previewRecords, type PanelDataset } from './panelData'

interface DatasetPreviewProps {
  dataset: PanelDataset
  rows?: number
}

const formatCell = (value: string | number | null | undefined): string => {
  if (value === null || value === undefined) return ''
  return typeof value === 'number' ? value.toLocaleString() : value
}

export default function DatasetPreview({ dataset, rows = 10 }: DatasetPreviewProps) {
  const columns = useMemo(() => datasetColumns(dataset), [dataset])
  const records = useMemo(() => previewRecords(dataset, rows), [dataset, rows])

  return (
    <section className="dataset-preview">
      <h2>Load data</h2>
      <p className="hint">
        {`${dataset.rows.length.toLocaleString()} rows, ${dataset.countries.length} countries, ${dataset.yearRange[0]}-${dataset.yearRange[1]}`}
      </p>
      <div className="table-scroll">
        <table>
          <thead>
            <tr>
              {columns.map(column => (
                <th key={column}>{column}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {records.map((record, i) => (
              <tr key={`${record.Country}-${record.Year}-${i}`}>
                {columns.map(column => (
                  <td key={column}>{formatCell(record[column])}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      <details>
        <summary>{`Columns (${columns.length})`}</summary>
        <ul className="column-list">
          {columns.map(column => (
            <li key={column}>{column}</li>
          ))}
        </ul>
      </details>
    </section>
  )
}
