import { createStore } from 'zustand/vanilla'
import { InvalidOperationError } from '@shared/errors'
import type {
  CompanySnapshot,
  DecisionInput,
  FundingResult,
  FundingSource,
  HireResult,
  QuarterResult,
  TechnologyTrack,
} from '@shared/types'
import { SimEngine } from '@sim/engine'

export interface GameStore {
  selectedTrack: TechnologyTrack | null
  engine: SimEngine | null
  snapshot: CompanySnapshot | null
  lastMessage: string | null
  selectTrack: (track: TechnologyTrack) => void
  startGame: (seed?: number) => void
  advanceQuarter: (decisions: DecisionInput) => QuarterResult
  raiseFunding: (source: FundingSource) => FundingResult
  hireFire: (department: string, delta: number) => HireResult
  reset: () => void
}

export function createGameStore() {
  return createStore<GameStore>((set, get) => {
    const requireEngine = (): SimEngine => {
      const { engine } = get()
      if (!engine) {
        throw new InvalidOperationError('GAME_NOT_STARTED', 'Start a game before issuing commands')
      }
      return engine
    }

    return {
      selectedTrack: null,
      engine: null,
      snapshot: null,
      lastMessage: null,
      selectTrack: (selectedTrack) => set({ selectedTrack }),
      startGame: (seed) => {
        const { selectedTrack, engine: previous } = get()
        if (!selectedTrack) {
          throw new InvalidOperationError('GAME_NOT_STARTED', 'Choose a technology track first')
        }

        previous?.onSnapshot(null)
        const engine = new SimEngine({ track: selectedTrack, seed })
        set({ engine, lastMessage: null })
        engine.onSnapshot((snapshot) => set({ snapshot }))
      },
      advanceQuarter: (decisions) => {
        const result = requireEngine().advanceQuarter(decisions)
        set({ lastMessage: result.event ? `${result.event.title} - ${result.event.description}` : null })
        return result
      },
      raiseFunding: (source) => {
        const result = requireEngine().raiseFunding(source)
        set({ lastMessage: result.message })
        return result
      },
      hireFire: (department, delta) => {
        const result = requireEngine().hireFire(department, delta)
        set({ lastMessage: result.message })
        return result
      },
      reset: () => {
        get().engine?.onSnapshot(null)
        set({ selectedTrack: null, engine: null, snapshot: null, lastMessage: null })
      },
    }
  })
}
