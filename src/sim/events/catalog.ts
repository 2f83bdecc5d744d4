import type { RandomEvent } from '@shared/types'

export const EVENT_CATALOG: readonly RandomEvent[] = [
  {
    title: 'Government Subsidy Approved!',
    description: 'Your technology qualifies for a new government clean energy subsidy program.',
    effectType: 'positive',
    impact: { cash: 500_000, demandBoost: 1.2 },
  },
  {
    title: 'Supply Chain Disruption',
    description: 'Global chip shortage impacts your production capabilities.',
    effectType: 'negative',
    impact: { unitCostMult: 1.15, productionLimit: 0.7 },
  },
  {
    title: 'Breakthrough in R&D!',
    description: 'Your engineering team achieves a major technological breakthrough.',
    effectType: 'positive',
    impact: { techBoost: 1.2 },
  },
  {
    title: 'Key Engineer Departs',
    description: 'Your lead engineer accepted a position at a competitor.',
    effectType: 'negative',
    impact: { techLevelMult: 0.95, engineerLoss: 1 },
  },
  {
    title: 'Major Customer Win',
    description: 'Fortune 500 company signs large purchase agreement.',
    effectType: 'positive',
    impact: { demandBoost: 1.5, cash: 300_000 },
  },
  {
    title: 'Regulatory Change',
    description: 'New environmental regulations increase compliance costs.',
    effectType: 'negative',
    impact: { operatingCost: 150_000 },
  },
  {
    title: 'New Competitor Enters Market',
    description: 'Well-funded startup announces competing product.',
    effectType: 'negative',
    impact: { marketShareMult: 0.85 },
  },
  {
    title: 'Industry Conference Success',
    description: "Your CEO's keynote generates significant buzz and sales leads.",
    effectType: 'positive',
    impact: { marketingEfficiency: 1.3 },
  },
  {
    title: 'Patent Granted',
    description: 'Your core technology patent is approved, providing competitive protection.',
    effectType: 'positive',
    impact: { techLevel: 1.15, valuationMult: 1.1 },
  },
  {
    title: 'Economic Downturn',
    description: 'Market recession reduces overall demand for clean energy products.',
    effectType: 'negative',
    impact: { demandBoost: 0.75 },
  },
  {
    title: 'Strategic Partnership',
    description: 'Major energy company proposes distribution partnership.',
    effectType: 'positive',
    impact: { cash: 400_000, demandBoost: 1.3 },
  },
  {
    title: 'Product Recall',
    description: 'Quality issue requires costly product recall and repairs.',
    effectType: 'negative',
    impact: { cash: -600_000, marketShareMult: 0.8 },
  },
]
