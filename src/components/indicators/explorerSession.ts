import { AnimationController, yearLabel, type AnimationFrame, type AnimationRun } from './animation'
import { ViewCache, type FilteredView } from './buildView'
import { isChartError, type ChartError, type ChartErrorKind } from './chartErrors'
import {
  buildBubbleSpec,
  buildConnectedScatterSpec,
  seriesRecords,
  viewRecords,
  type ChartDimensions,
  type ChartSpec,
  type ScalePolicy
} from './chartSpecs'
import {
  applySelection,
  createFilterState,
  filterKey,
  setCountries,
  setXIndicator,
  setXLog,
  setYear,
  setYIndicator,
  setYLog,
  type FilterState
} from './filterState'
import { MemoCache } from './memoCache'
import type { ChartRecord, PanelDataset } from './panelData'
import { selectionConstraints, translateSelection, type SelectionEvent } from './selection'
import { closeSessionState, openSessionState, type SessionState } from './sessionState'

export interface ChartPanel {
  readonly spec: ChartSpec | null
  readonly records: readonly ChartRecord[]
  readonly error: ChartError | null
}

export interface Notice {
  readonly level: 'info' | 'success' | 'error'
  readonly kind: ChartErrorKind | null
  readonly message: string
}

export interface ExplorerSnapshot {
  readonly filter: FilterState
  readonly yearLabel: string
  readonly scalePolicy: ScalePolicy
  readonly bubble: ChartPanel
  readonly linked: ChartPanel | null
  readonly linkedCountries: ReadonlySet<string>
  readonly animation: AnimationRun
  readonly notice: Notice | null
}

export interface ExplorerSessionOptions {
  sessionId: string
  stepDelayMs?: number
  defaultYear?: number
  dimensions?: ChartDimensions
}

type Listener = (snapshot: ExplorerSnapshot) => void

const DEFAULT_STEP_DELAY_MS = 200
const DEFAULT_DIMENSIONS: ChartDimensions = { width: 800, height: 500 }
const EMPTY_COUNTRIES: ReadonlySet<string> = new Set()

const errorNotice = (error: ChartError): Notice => ({ level: 'error', kind: error.kind, message: error.message })

/**
 * One user's interactive run. Every public method handles a single user
 * intent, moves the filter to its next value and recomputes only the panels
 * that depend on what changed.
 */
export class ExplorerSession {
  readonly sessionId: string

  private filter: FilterState
  private scalePolicy: ScalePolicy = 'perFrame'
  private bubble: ChartPanel
  private linked: ChartPanel | null = null
  private linkedCountries: ReadonlySet<string> = EMPTY_COUNTRIES
  private notice: Notice | null = null
  private snapshot: ExplorerSnapshot
  private listeners: Listener[] = []
  private disposed = false
  private playing: Promise<AnimationRun> | null = null

  private readonly stepDelayMs: number
  private readonly dimensions: ChartDimensions
  private readonly persisted: SessionState
  private readonly views = new ViewCache()
  private readonly specs = new MemoCache<ChartSpec>()
  private readonly animation: AnimationController

  constructor(
    readonly dataset: PanelDataset,
    options: ExplorerSessionOptions
  ) {
    this.sessionId = options.sessionId
    this.stepDelayMs = options.stepDelayMs ?? DEFAULT_STEP_DELAY_MS
    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS
    this.persisted = openSessionState(options.sessionId)

    const persistedYear = this.persisted.get('year')
    this.filter = createFilterState(dataset, { year: persistedYear ?? options.defaultYear })

    this.animation = new AnimationController({
      dataset,
      currentFilter: () => this.filter,
      persistedYear: () => this.persisted.get('year'),
      onFrame: frame => this.handleFrame(frame),
      buildView: (source, filter) => this.views.get(source, filter),
      buildSpec: (view, filter) => this.bubbleSpec(view, filter, 'global')
    })

    this.bubble = this.computeBubble()
    this.snapshot = this.buildSnapshot()
  }

  getSnapshot = (): ExplorerSnapshot => this.snapshot

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener)
    }
  }

  setXIndicator(name: string): void {
    this.changeFilter(() => setXIndicator(this.dataset, this.filter, name), { resetLinked: true })
  }

  setYIndicator(name: string): void {
    this.changeFilter(() => setYIndicator(this.dataset, this.filter, name), { resetLinked: true })
  }

  setXLog(xLog: boolean): void {
    this.changeFilter(() => setXLog(this.filter, xLog), { refreshLinked: true })
  }

  setYLog(yLog: boolean): void {
    this.changeFilter(() => setYLog(this.filter, yLog), { refreshLinked: true })
  }

  /** Direct use of the year slider; the only place the persisted year is written. */
  setYear(year: number): void {
    if (this.disposed) return
    this.changeFilter(() => setYear(this.dataset, this.filter, year), {})
    this.persisted.set('year', this.filter.year)
  }

  setCountries(countries: Iterable<string>): void {
    this.changeFilter(() => setCountries(this.dataset, this.filter, countries), { resetLinked: true })
  }

  /**
   * Turns a brush on the bubble chart into the country set of the connected
   * scatterplot. Returns the matched countries.
   */
  applySelection(event: SelectionEvent | null | undefined): ReadonlySet<string> {
    if (this.disposed) return EMPTY_COUNTRIES
    if (selectionConstraints(event).length === 0) {
      this.linkedCountries = EMPTY_COUNTRIES
      this.linked = null
      this.notice = null
      this.publish()
      return EMPTY_COUNTRIES
    }

    let countries: ReadonlySet<string> = EMPTY_COUNTRIES
    let failure: Notice | null = null
    try {
      countries = translateSelection(event, this.currentView(), this.filter)
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      failure = errorNotice(caught)
    }

    if (countries.size === 0) {
      this.linkedCountries = EMPTY_COUNTRIES
      this.linked = null
      this.notice = failure ?? {
        level: 'info',
        kind: 'SelectionJoinMismatch',
        message: 'No countries match the selection'
      }
    } else {
      this.linkedCountries = applySelection(this.filter, countries).selectedCountries
      this.linked = this.computeLinked()
      this.notice = { level: 'success', kind: null, message: 'Match found!' }
    }
    this.publish()
    return this.linkedCountries
  }

  clearSelection(): void {
    this.applySelection(null)
  }

  /**
   * Resolves once the run has completed or been stopped. A restart right
   * after a stop waits for the stopped run's loop to finish its pause.
   */
  async startAnimation(): Promise<AnimationRun> {
    if (this.disposed || this.animation.running) return this.animation.state
    if (this.playing) {
      await this.playing
      if (this.disposed || this.animation.running) return this.animation.state
    }

    try {
      this.animation.start()
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      console.warn('Animation not started:', caught.message)
      this.notice = errorNotice(caught)
      this.publish()
      return this.animation.state
    }

    this.notice = null
    this.publish()
    const playing = this.animation.play(this.stepDelayMs)
    this.playing = playing
    const finished = await playing
    if (this.playing === playing) this.playing = null
    if (!this.disposed && !this.animation.running) {
      this.animation.reset()
      this.publish()
    }
    return finished
  }

  stopAnimation(): void {
    if (this.disposed) return
    this.animation.stop()
  }

  dispose(): void {
    this.disposed = true
    this.animation.reset()
    this.listeners = []
    this.views.clear()
    this.specs.clear()
    closeSessionState(this.sessionId)
  }

  private changeFilter(
    next: () => FilterState,
    effects: { resetLinked?: boolean; refreshLinked?: boolean }
  ): void {
    if (this.disposed) return
    try {
      this.filter = next()
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      this.notice = errorNotice(caught)
      this.publish()
      return
    }

    this.notice = null
    this.scalePolicy = this.animation.running ? 'global' : 'perFrame'
    this.bubble = this.computeBubble()

    if (effects.resetLinked) {
      this.linkedCountries = EMPTY_COUNTRIES
      this.linked = null
    } else if (effects.refreshLinked && this.linkedCountries.size > 0) {
      this.linked = this.computeLinked()
    }
    this.publish()
  }

  private handleFrame(frame: AnimationFrame): void {
    if (this.disposed) return
    this.filter = frame.filter
    this.scalePolicy = 'global'
    this.bubble = Object.freeze({
      spec: frame.spec,
      records: frame.view && frame.spec ? viewRecords(frame.view) : [],
      error: frame.error
    })
    this.publish()
  }

  private currentView(): FilteredView {
    return this.views.get(this.dataset, this.filter)
  }

  private bubbleSpec(view: FilteredView, filter: FilterState, policy: ScalePolicy): ChartSpec {
    const key = `${this.dataset.version}|bubble|${policy}|${filterKey(filter)}`
    return this.specs.getOrCompute(key, () => buildBubbleSpec(view, filter, policy, this.dimensions))
  }

  private computeBubble(): ChartPanel {
    try {
      const view = this.currentView()
      const spec = this.bubbleSpec(view, this.filter, this.scalePolicy)
      return Object.freeze({ spec, records: viewRecords(view), error: null })
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      return Object.freeze({ spec: null, records: [], error: caught })
    }
  }

  private computeLinked(): ChartPanel {
    const countries = this.linkedCountries
    const filter = applySelection(this.filter, countries)
    const key = `${this.dataset.version}|linked|${filterKey(filter)}`
    try {
      const spec = this.specs.getOrCompute(key, () =>
        buildConnectedScatterSpec(this.dataset, filter, countries, this.dimensions)
      )
      return Object.freeze({ spec, records: seriesRecords(this.dataset, filter, countries), error: null })
    } catch (caught) {
      if (!isChartError(caught)) throw caught
      return Object.freeze({ spec: null, records: [], error: caught })
    }
  }

  private buildSnapshot(): ExplorerSnapshot {
    return Object.freeze({
      filter: this.filter,
      yearLabel: yearLabel(this.filter.year),
      scalePolicy: this.scalePolicy,
      bubble: this.bubble,
      linked: this.linked,
      linkedCountries: this.linkedCountries,
      animation: this.animation.state,
      notice: this.notice
    })
  }

  private publish(): void {
    if (this.disposed) return
    this.snapshot = this.buildSnapshot()
    this.listeners.forEach(listener => listener(this.snapshot))
  }
}
