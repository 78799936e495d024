import { csvParse, type DSVRowArray, type DSVRowString } from 'd3'

export const parseCsv = (text: string): DSVRowArray<string> => csvParse(text)

export const readCell = (row: DSVRowString<string>, column: string): string => (row[column] ?? '').trim()

export const toNumber = (value: string): number | null => {
  const trimmed = value.trim()
  if (trimmed.length === 0) return null

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}
