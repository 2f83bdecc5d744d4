import {
  DEFAULT_DECISIONS,
  SEED_CAPITAL,
  STARTING_COMPETITORS,
  STARTING_DEPARTMENTS,
  TRACK_PARAMETERS,
} from '@shared/constants'
import { InvalidOperationError } from '@shared/errors'
import { isDepartmentName, parseTechnologyTrack } from '@shared/decisions'
import { mulberry32 } from '@shared/rng'
import type {
  CompanySnapshot,
  Competitor,
  Decisions,
  Department,
  DepartmentName,
  InitConfig,
  LedgerEntry,
  LedgerKind,
  Metrics,
  RandomEvent,
  RandomSource,
  TechnologyTrack,
  TrackParameters,
} from '@shared/types'

export interface InternalState {
  seed: number
  random: RandomSource
  track: TechnologyTrack
  params: TrackParameters
  metrics: Metrics
  history: Metrics[]
  departments: Map<DepartmentName, Department>
  competitors: Competitor[]
  decisions: Decisions
  cumulativeRdSpend: number
  gameOver: boolean
  gameOverReason: string | null
  lastEvent: RandomEvent | null
  ledger: LedgerEntry[]
}

export function createInitialState(config: InitConfig): InternalState {
  const track = parseTechnologyTrack(config.track)
  const seed = config.seed ?? Date.now()
  const params = { ...TRACK_PARAMETERS[track] }

  const departments = new Map<DepartmentName, Department>()
  for (const department of STARTING_DEPARTMENTS) {
    departments.set(department.name, { ...department })
  }

  return {
    seed,
    random: config.random ?? mulberry32(seed),
    track,
    params,
    metrics: createInitialMetrics(params.unitCost),
    history: [],
    departments,
    competitors: STARTING_COMPETITORS.map((competitor) => ({ ...competitor })),
    decisions: { ...DEFAULT_DECISIONS },
    cumulativeRdSpend: 0,
    gameOver: false,
    gameOverReason: null,
    lastEvent: null,
    ledger: [],
  }
}

export function createInitialMetrics(unitCost: number): Metrics {
  return {
    quarter: 0,
    cash: SEED_CAPITAL,
    revenue: 0,
    cogs: 0,
    grossProfit: 0,
    operatingExpenses: 0,
    netIncome: 0,
    cumulativeProduction: 0,
    unitsSold: 0,
    marketShare: 0,
    techLevel: 1,
    unitCost,
    valuation: SEED_CAPITAL,
    totalFundingRaised: SEED_CAPITAL,
    equityGiven: 0,
  }
}

export function getDepartment(state: InternalState, name: string): Department {
  const department = isDepartmentName(name) ? state.departments.get(name) : undefined
  if (!department) {
    throw new InvalidOperationError('UNKNOWN_DEPARTMENT', `Invalid department: ${name}`)
  }

  return department
}

export function activeCompetitors(state: InternalState): Competitor[] {
  return state.competitors.filter((competitor) => competitor.active)
}

export function payroll(departments: Iterable<Department>): number {
  let total = 0
  for (const department of departments) {
    total += department.headcount * department.salaryPerHead
  }
  return total
}

export function recordLedger(state: InternalState, kind: LedgerKind, message: string): void {
  state.ledger.push({ quarter: state.metrics.quarter, kind, message })
}

export function recordHistory(state: InternalState): void {
  state.history.push(Object.freeze({ ...state.metrics }))
}

export function createSnapshot(state: InternalState): CompanySnapshot {
  return {
    seed: state.seed,
    track: state.track,
    metrics: { ...state.metrics },
    departments: [...state.departments.values()].map((department) => ({ ...department })),
    competitors: state.competitors.map((competitor) => ({ ...competitor })),
    decisions: { ...state.decisions },
    cumulativeRdSpend: state.cumulativeRdSpend,
    history: state.history.map((entry) => ({ ...entry })),
    gameOver: state.gameOver,
    gameOverReason: state.gameOverReason,
    lastEvent: state.lastEvent ? cloneEvent(state.lastEvent) : null,
    log: state.ledger.map((entry) => ({ ...entry })),
  }
}

export function cloneEvent(event: RandomEvent): RandomEvent {
  return { ...event, impact: { ...event.impact } }
}
