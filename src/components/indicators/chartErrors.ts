export type ChartErrorKind = 'InvalidIndicator' | 'EmptyView' | 'EmptyRange' | 'SelectionJoinMismatch'

/**
 * Recoverable failure of the chart engine. Callers render these as a visible
 * message next to the chart; anything else thrown is a programming error.
 */
export class ChartError extends Error {
  readonly kind: ChartErrorKind

  constructor(kind: ChartErrorKind, message: string) {
    super(message)
    this.name = 'ChartError'
    this.kind = kind
  }
}

export const isChartError = (value: unknown): value is ChartError => value instanceof ChartError

export const invalidIndicator = (indicator: string): ChartError =>
  new ChartError('InvalidIndicator', `"${indicator}" is not a numeric indicator of this dataset`)
