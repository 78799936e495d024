export interface PersistedExplorerState {
  year: number
}

/** Key/value state that outlives recompute cycles but not the session. */
export class SessionState<T extends object = PersistedExplorerState> {
  private values: Partial<T> = {}

  constructor(readonly sessionId: string) {}

  get<K extends keyof T>(key: K): Partial<T>[K] {
    return this.values[key]
  }

  set<K extends keyof T>(key: K, value: T[K]): void {
    this.values[key] = value
  }

  has(key: keyof T): boolean {
    return this.values[key] !== undefined
  }

  clear(): void {
    this.values = {}
  }
}

const sessionStates = new Map<string, SessionState>()

export const openSessionState = (sessionId: string): SessionState => {
  const existing = sessionStates.get(sessionId)
  if (existing) return existing

  const state = new SessionState(sessionId)
  sessionStates.set(sessionId, state)
  return state
}

export const closeSessionState = (sessionId: string): void => {
  sessionStates.get(sessionId)?.clear()
  sessionStates.delete(sessionId)
}

export const openSessionCount = (): number => sessionStates.size
