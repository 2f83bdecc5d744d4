import { FIXED_OVERHEAD, VALUATION_FUNDING_FLOOR } from '@shared/constants'
import { payroll, type InternalState } from '@sim/world/state'

const QUARTERS_PER_YEAR = 4
const TECH_PREMIUM_PER_LEVEL = 500_000
const MARKET_SHARE_PREMIUM = 2_000_000

export function runSalesSystem(state: InternalState, demand: number): void {
  const unitsSold = Math.max(0, Math.trunc(Math.min(state.decisions.production, demand)))

  state.metrics.unitsSold = unitsSold
  state.metrics.cumulativeProduction += unitsSold
}

export function runFinanceSystem(state: InternalState): void {
  const { metrics, decisions } = state

  metrics.revenue = metrics.unitsSold * decisions.price
  metrics.cogs = metrics.unitsSold * metrics.unitCost
  metrics.grossProfit = metrics.revenue - metrics.cogs
  metrics.operatingExpenses =
    payroll(state.departments.values()) + decisions.marketing + decisions.rd + FIXED_OVERHEAD
  metrics.netIncome = metrics.grossProfit - metrics.operatingExpenses
  metrics.cash += metrics.netIncome
}

export function runValuationSystem(state: InternalState): void {
  const { metrics } = state

  const revenueMultiple = metrics.revenue > 0 ? 3 : 1
  const value =
    metrics.revenue * QUARTERS_PER_YEAR * revenueMultiple +
    metrics.techLevel * TECH_PREMIUM_PER_LEVEL +
    metrics.marketShare * MARKET_SHARE_PREMIUM +
    Math.max(0, metrics.cash)

  metrics.valuation = Math.max(value, valuationFloor(metrics.totalFundingRaised))
}

export function valuationFloor(totalFundingRaised: number): number {
  return totalFundingRaised * VALUATION_FUNDING_FLOOR
}
