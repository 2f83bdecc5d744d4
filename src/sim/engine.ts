import type {
  CommandResult,
  CompanySnapshot,
  DecisionInput,
  FundingResult,
  FundingSource,
  GameCommand,
  HireResult,
  InitConfig,
  QuarterResult,
} from '@shared/types'
import { applyCommand, hireFire, raiseFunding } from '@sim/commands/applyCommand'
import { advanceQuarter } from '@sim/quarter'
import { createInitialState, createSnapshot, type InternalState } from '@sim/world/state'

type SnapshotListener = (snapshot: CompanySnapshot) => void

/**
 * One company for one playthrough. Every command runs to completion and
 * notifies the snapshot listener, if any, with a fresh copy of the state.
 */
export class SimEngine {
  private readonly state: InternalState
  private snapshotListener: SnapshotListener | null = null

  constructor(config: InitConfig) {
    this.state = createInitialState(config)
  }

  get gameOver(): boolean {
    return this.state.gameOver
  }

  advanceQuarter(decisions: DecisionInput = {}): QuarterResult {
    const result = advanceQuarter(this.state, decisions)
    this.emitSnapshot()
    return result
  }

  raiseFunding(source: FundingSource): FundingResult {
    const result = raiseFunding(this.state, source)
    this.emitSnapshot()
    return result
  }

  hireFire(department: string, delta: number): HireResult {
    const result = hireFire(this.state, department, delta)
    this.emitSnapshot()
    return result
  }

  dispatch(command: GameCommand): CommandResult {
    const result = applyCommand(this.state, command)
    this.emitSnapshot()
    return result
  }

  getCurrentState(): CompanySnapshot {
    return createSnapshot(this.state)
  }

  onSnapshot(listener: SnapshotListener | null): void {
    this.snapshotListener = listener
    this.emitSnapshot()
  }

  private emitSnapshot(): void {
    if (!this.snapshotListener) {
      return
    }

    this.snapshotListener(createSnapshot(this.state))
  }
}
