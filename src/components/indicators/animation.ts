import * as d3 from 'd3'
import { buildView, type FilteredView } from './buildView'
import { ChartError, isChartError } from './chartErrors'
import { buildBubbleSpec, type ChartSpec } from './chartSpecs'
import { setYear, type FilterState } from './filterState'
import { indicatorValue, type PanelDataset } from './panelData'

export type AnimationStatus = 'idle' | 'running' | 'stopped' | 'completed'

export interface AnimationRun {
  readonly firstYear: number
  readonly lastYear: number
  readonly currentYear: number
  readonly status: AnimationStatus
}

export interface AnimationFrame {
  readonly year: number
  readonly label: string
  readonly filter: FilterState
  readonly view: FilteredView | null
  readonly spec: ChartSpec | null
  readonly error: ChartError | null
  /** Set on the frame emitted by `stop()` */
  readonly final: boolean
}

export interface AnimationHost {
  readonly dataset: PanelDataset
  /** Latest filter; indicator or log changes made during a run are picked up on the next step */
  currentFilter(): FilterState
  /** Year the session last committed through the year slider, if any */
  persistedYear(): number | undefined
  onFrame(frame: AnimationFrame): void
  buildView?(dataset: PanelDataset, filter: FilterState): FilteredView
  buildSpec?(view: FilteredView, filter: FilterState): ChartSpec
}

const freezeRun = (run: AnimationRun): AnimationRun => Object.freeze({ ...run })

export const IDLE_RUN = freezeRun({ firstYear: 0, lastYear: -1, currentYear: 0, status: 'idle' })

export const yearLabel = (year: number): string => `Year: ${year}`

const yearsWithValues = (dataset: PanelDataset, indicator: string): number[] =>
  dataset.rows.filter(row => indicatorValue(row, indicator) !== null).map(row => row.year)

/** Years in which both indicators have at least one value. */
export const computeYearRange = (dataset: PanelDataset, xIndicator: string, yIndicator: string): [number, number] => {
  const xYears = yearsWithValues(dataset, xIndicator)
  const yYears = yearsWithValues(dataset, yIndicator)
  const first = Math.max(d3.min(xYears) ?? Infinity, d3.min(yYears) ?? Infinity)
  const last = Math.min(d3.max(xYears) ?? -Infinity, d3.max(yYears) ?? -Infinity)
  return [first, last]
}

export const pause = (delayMs: number): Promise<void> => {
  if (delayMs <= 0) return Promise.resolve()
  return new Promise(resolve => {
    d3.timeout(() => resolve(), delayMs)
  })
}

export class AnimationController {
  private run: AnimationRun = IDLE_RUN
  private committedYear: number | null = null
  /** Bumped by start() and reset(); a play() loop only steps the run it began with */
  private generation = 0

  constructor(private readonly host: AnimationHost) {}

  get state(): AnimationRun {
    return this.run
  }

  get running(): boolean {
    return this.run.status === 'running'
  }

  start(): AnimationRun {
    if (this.running) return this.run

    const filter = this.host.currentFilter()
    const [firstYear, lastYear] = computeYearRange(this.host.dataset, filter.xIndicator, filter.yIndicator)
    if (!(firstYear <= lastYear)) {
      throw new ChartError(
        'EmptyRange',
        `${filter.xIndicator} and ${filter.yIndicator} have no years with values in common`
      )
    }

    this.generation += 1
    this.committedYear = filter.year
    this.run = freezeRun({ firstYear, lastYear, currentYear: firstYear, status: 'running' })
    return this.run
  }

  step(): AnimationFrame {
    if (!this.running) {
      throw new Error(`Cannot step an animation that is ${this.run.status}`)
    }

    const year = this.run.currentYear
    const frame = this.emit(year, false)
    // stop() from inside a frame listener already ended the run
    if (!this.running) return frame

    const currentYear = year + 1
    this.run = freezeRun({
      ...this.run,
      currentYear,
      status: currentYear > this.run.lastYear ? 'completed' : 'running'
    })
    return frame
  }

  /**
   * Ends the run and redraws at the year the user last chose on the slider,
   * not at the year the run had reached.
   */
  stop(): AnimationFrame | null {
    if (!this.running) return null

    this.run = freezeRun({ ...this.run, status: 'stopped' })
    const year = this.host.persistedYear() ?? this.committedYear ?? this.host.currentFilter().year
    return this.emit(year, true)
  }

  reset(): void {
    this.generation += 1
    this.run = IDLE_RUN
    this.committedYear = null
  }

  /**
   * Steps until the run completes or is stopped, pausing between steps only.
   * A loop whose run was stopped and replaced during a pause ends without
   * stepping the new run.
   */
  async play(delayMs: number): Promise<AnimationRun> {
    const generation = this.generation
    let last = this.run
    while (this.running) {
      this.step()
      last = this.run
      if (!this.running) return last
      await pause(delayMs)
      if (this.generation !== generation) return freezeRun({ ...last, status: 'stopped' })
    }
    return this.run
  }

  private emit(year: number, final: boolean): AnimationFrame {
    const { dataset } = this.host
    const filter = setYear(dataset, this.host.currentFilter(), year)
    let view: FilteredView | null = null
    let spec: ChartSpec | null = null
    let error: ChartError | null = null
    try {
      view = this.host.buildView ? this.host.buildView(dataset, filter) : buildView(dataset, filter)
      spec = this.host.buildSpec ? this.host.buildSpec(view, filter) : buildBubbleSpec(view, filter, 'global')
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      error = caught
    }

    const frame: AnimationFrame = Object.freeze({ year, label: yearLabel(year), filter, view, spec, error, final })
    this.host.onFrame(frame)
    return frame
  }
}
