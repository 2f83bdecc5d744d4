import { clamp, uniform } from '@shared/rng'
import { activeCompetitors, type InternalState } from '@sim/world/state'

// Competitor volume is estimated against the launch-quarter market, not the grown one.
const COMPETITOR_SALES_FACTOR = 0.9

const MIN_COMPETITOR_SHARE = 0.05
const MAX_COMPETITOR_SHARE = 0.35

export function runMarketShareSystem(state: InternalState): void {
  const ourSales = state.metrics.unitsSold
  const competitorSales = activeCompetitors(state).reduce(
    (sum, competitor) => sum + state.params.marketSize * competitor.marketShare * COMPETITOR_SALES_FACTOR,
    0,
  )
  const totalSales = ourSales + competitorSales

  state.metrics.marketShare = totalSales > 0 ? ourSales / totalSales : 0
}

export function runCompetitorSystem(state: InternalState): void {
  for (const competitor of state.competitors) {
    if (!competitor.active) {
      continue
    }

    competitor.techLevel *= uniform(state.random, 1.01, 1.03)
    competitor.price *= uniform(state.random, 0.98, 1.02)
    competitor.marketShare = clamp(
      competitor.marketShare * uniform(state.random, 0.95, 1.05),
      MIN_COMPETITOR_SHARE,
      MAX_COMPETITOR_SHARE,
    )
  }
}
