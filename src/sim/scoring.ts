import { FIXED_OVERHEAD } from '@shared/constants'
import type { CompanySnapshot, Decisions, Department, Metrics } from '@shared/types'
import { payroll } from '@sim/world/state'

export type PerformanceTier = 'outstanding' | 'good' | 'needsImprovement'

export interface GameSummary {
  quarter: number
  finalValuation: number
  cumulativeRevenue: number
  cumulativeNetIncome: number
  remainingEquity: number
  score: number
  tier: PerformanceTier
}

export function finalScore(metrics: Metrics): number {
  return metrics.valuation / 1_000_000 + metrics.marketShare * 1000 + metrics.techLevel * 100
}

export function performanceTier(score: number): PerformanceTier {
  if (score > 500) {
    return 'outstanding'
  }
  if (score > 300) {
    return 'good'
  }
  return 'needsImprovement'
}

export function estimateQuarterlyBurn(departments: Iterable<Department>, decisions: Decisions): number {
  return payroll(departments) + decisions.marketing + decisions.rd + FIXED_OVERHEAD
}

export function grossMargin(price: number, unitCost: number): number {
  return price > 0 ? (price - unitCost) / price : 0
}

export function summarizeGame(snapshot: CompanySnapshot): GameSummary {
  const score = finalScore(snapshot.metrics)

  return {
    quarter: snapshot.metrics.quarter,
    finalValuation: snapshot.metrics.valuation,
    cumulativeRevenue: snapshot.history.reduce((sum, entry) => sum + entry.revenue, 0),
    cumulativeNetIncome: snapshot.history.reduce((sum, entry) => sum + entry.netIncome, 0),
    remainingEquity: 1 - snapshot.metrics.equityGiven,
    score,
    tier: performanceTier(score),
  }
}
