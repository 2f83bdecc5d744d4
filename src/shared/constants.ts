import type {
  Competitor,
  Decisions,
  Department,
  DepartmentName,
  EventEffectKey,
  FundingSource,
  FundingTerms,
  TechnologyTrack,
  TrackParameters,
} from '@shared/types'

export const TOTAL_QUARTERS = 12
export const BANKRUPTCY_CASH_THRESHOLD = -1_000_000

export const SEED_CAPITAL = 3_000_000
export const FIXED_OVERHEAD = 50_000
export const MARKET_GROWTH_RATE = 0.05

export const EVENT_PROBABILITY = 0.2
export const GRANT_APPROVAL_PROBABILITY = 0.6
export const SERIES_B_MIN_RAISED = 2_000_000
export const VALUATION_FUNDING_FLOOR = 0.5

export const MAX_PRICE = 10_000
export const MAX_PRODUCTION = 20_000
export const MAX_SPEND = 1_000_000

export const TECHNOLOGY_TRACKS = ['battery', 'solar', 'hydrogen', 'carbonCapture'] as const satisfies readonly TechnologyTrack[]

export const FUNDING_SOURCES = [
  'angel',
  'vcSeriesA',
  'vcSeriesB',
  'grant',
  'debt',
] as const satisfies readonly FundingSource[]

export const DEPARTMENT_NAMES = [
  'Engineering',
  'Sales',
  'Marketing',
  'Operations',
] as const satisfies readonly DepartmentName[]

export const EVENT_EFFECT_KEYS = [
  'cash',
  'techBoost',
  'techLevelMult',
  'techLevel',
  'unitCostMult',
  'engineerLoss',
  'operatingCost',
  'valuationMult',
  'demandBoost',
  'marketShareMult',
  'marketingEfficiency',
  'productionLimit',
] as const satisfies readonly EventEffectKey[]

export const TRACK_PARAMETERS: Record<TechnologyTrack, TrackParameters> = {
  battery: { unitCost: 350, marketSize: 8000, priceElasticity: -1.8, rdEffectiveness: 1.2 },
  solar: { unitCost: 280, marketSize: 12000, priceElasticity: -2.0, rdEffectiveness: 1.0 },
  hydrogen: { unitCost: 420, marketSize: 5000, priceElasticity: -1.5, rdEffectiveness: 1.3 },
  carbonCapture: { unitCost: 380, marketSize: 6000, priceElasticity: -1.6, rdEffectiveness: 1.1 },
}

export const TRACK_INFO: Record<TechnologyTrack, { name: string; pitch: string }> = {
  battery: {
    name: 'Advanced Battery Storage',
    pitch: 'High unit cost, medium market size, strong R&D leverage',
  },
  solar: {
    name: 'Next-Gen Solar Panels',
    pitch: 'Lower unit cost, large market size, high price competition',
  },
  hydrogen: {
    name: 'Green Hydrogen Production',
    pitch: 'Highest unit cost, smaller market, excellent R&D potential',
  },
  carbonCapture: {
    name: 'Carbon Capture Technology',
    pitch: 'High unit cost, growing market, moderate R&D leverage',
  },
}

// debtCostRate is quarterly and informational; nothing charges it yet.
export const FUNDING_TERMS: Record<FundingSource, FundingTerms> = {
  angel: { label: 'Angel Investment', amount: 500_000, dilution: 0.08, debtCostRate: 0 },
  vcSeriesA: { label: 'VC Series A', amount: 3_000_000, dilution: 0.2, debtCostRate: 0 },
  vcSeriesB: { label: 'VC Series B', amount: 8_000_000, dilution: 0.25, debtCostRate: 0 },
  grant: { label: 'Government Grant', amount: 750_000, dilution: 0, debtCostRate: 0 },
  debt: { label: 'Debt Financing', amount: 2_000_000, dilution: 0, debtCostRate: 0.02 },
}

export const STARTING_DEPARTMENTS: readonly Department[] = [
  { name: 'Engineering', headcount: 5, salaryPerHead: 35_000 },
  { name: 'Sales', headcount: 3, salaryPerHead: 28_000 },
  { name: 'Marketing', headcount: 2, salaryPerHead: 25_000 },
  { name: 'Operations', headcount: 4, salaryPerHead: 27_000 },
]

export const STARTING_COMPETITORS: readonly Competitor[] = [
  { name: 'TechPower Inc', techLevel: 1.0, marketShare: 0.3, price: 420, active: true },
  { name: 'GreenFuture Corp', techLevel: 0.95, marketShare: 0.25, price: 440, active: true },
  { name: 'EcoInnovate', techLevel: 0.9, marketShare: 0.2, price: 460, active: true },
]

export const DEFAULT_DECISIONS: Decisions = {
  price: 450,
  production: 1000,
  marketing: 50_000,
  rd: 100_000,
}

export const GAME_COMPLETE_REASON = `Game Complete - ${TOTAL_QUARTERS} quarters finished`
export const BANKRUPTCY_REASON = 'Bankruptcy - Cash balance below -$1M'
