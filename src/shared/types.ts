export type TechnologyTrack = 'battery' | 'solar' | 'hydrogen' | 'carbonCapture'

export type FundingSource = 'angel' | 'vcSeriesA' | 'vcSeriesB' | 'grant' | 'debt'

export type DepartmentName = 'Engineering' | 'Sales' | 'Marketing' | 'Operations'

export type EffectType = 'positive' | 'negative' | 'neutral'

export type RandomSource = () => number

export interface Metrics {
  quarter: number
  cash: number
  revenue: number
  cogs: number
  grossProfit: number
  operatingExpenses: number
  netIncome: number
  cumulativeProduction: number
  unitsSold: number
  marketShare: number
  techLevel: number
  unitCost: number
  valuation: number
  totalFundingRaised: number
  equityGiven: number
}

export interface Department {
  name: DepartmentName
  headcount: number
  salaryPerHead: number
}

export interface Competitor {
  name: string
  techLevel: number
  marketShare: number
  price: number
  active: boolean
}

export interface TrackParameters {
  unitCost: number
  marketSize: number
  priceElasticity: number
  rdEffectiveness: number
}

export interface FundingTerms {
  label: string
  amount: number
  dilution: number
  debtCostRate: number
}

export type EventEffectKey =
  | 'cash'
  | 'techBoost'
  | 'techLevelMult'
  | 'techLevel'
  | 'unitCostMult'
  | 'engineerLoss'
  | 'operatingCost'
  | 'valuationMult'
  | 'demandBoost'
  | 'marketShareMult'
  | 'marketingEfficiency'
  | 'productionLimit'

export type EventImpact = Partial<Record<EventEffectKey, number>>

export interface RandomEvent {
  title: string
  description: string
  effectType: EffectType
  impact: EventImpact
}

export interface Decisions {
  price: number
  production: number
  marketing: number
  rd: number
}

export type DecisionInput = Partial<Decisions>

export interface QuarterResult {
  quarter: number
  demand: number
  unitsSold: number
  revenue: number
  netIncome: number
  cash: number
  marketShare: number
  techLevel: number
  unitCost: number
  event: RandomEvent | null
  ignoredEffects: EventEffectKey[]
}

export interface FundingResult {
  success: boolean
  source: FundingSource
  amount: number
  dilution: number
  message: string
}

export interface HireResult {
  success: boolean
  department: DepartmentName
  message: string
  newHeadcount: number
}

export type LedgerKind = 'quarter' | 'funding' | 'hiring' | 'event' | 'gameOver'

export interface LedgerEntry {
  quarter: number
  kind: LedgerKind
  message: string
}

export interface CompanySnapshot {
  seed: number
  track: TechnologyTrack
  metrics: Metrics
  departments: Department[]
  competitors: Competitor[]
  decisions: Decisions
  cumulativeRdSpend: number
  history: Metrics[]
  gameOver: boolean
  gameOverReason: string | null
  lastEvent: RandomEvent | null
  log: LedgerEntry[]
}

export interface InitConfig {
  track: TechnologyTrack
  seed?: number
  random?: RandomSource
}

export interface AdvanceQuarterCommand {
  type: 'advanceQuarter'
  decisions: DecisionInput
}

export interface RaiseFundingCommand {
  type: 'raiseFunding'
  source: FundingSource
}

export interface HireFireCommand {
  type: 'hireFire'
  department: string
  delta: number
}

export type GameCommand = AdvanceQuarterCommand | RaiseFundingCommand | HireFireCommand

export type CommandResult =
  | { type: 'advanceQuarter'; result: QuarterResult }
  | { type: 'raiseFunding'; result: FundingResult }
  | { type: 'hireFire'; result: HireResult }
