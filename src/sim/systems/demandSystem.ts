import { MARKET_GROWTH_RATE } from '@shared/constants'
import { InvalidOperationError } from '@shared/errors'
import { uniform } from '@shared/rng'
import type { Competitor } from '@shared/types'
import type { InternalState } from '@sim/world/state'

const MARKETING_SCALE = 10_000
const MARKETING_WEIGHT = 0.1
const TECH_ADVANTAGE_WEIGHT = 0.5

export interface CompetitorAverages {
  count: number
  price: number
  techLevel: number
}

export function summarizeCompetitors(competitors: Competitor[]): CompetitorAverages {
  const active = competitors.filter((competitor) => competitor.active)
  if (active.length === 0) {
    throw new InvalidOperationError('NO_ACTIVE_COMPETITORS', 'Demand needs at least one active competitor')
  }

  const price = active.reduce((sum, competitor) => sum + competitor.price, 0) / active.length
  const techLevel = active.reduce((sum, competitor) => sum + competitor.techLevel, 0) / active.length

  return {
    count: active.length,
    price: price || 1,
    techLevel: techLevel || 1,
  }
}

export function currentMarketSize(state: InternalState): number {
  return state.params.marketSize * Math.pow(1 + MARKET_GROWTH_RATE, state.metrics.quarter)
}

/** Share of the market we would capture before noise, relative to an even split. */
export function demandShare(state: InternalState, averages: CompetitorAverages): number {
  const priceEffect = Math.pow(state.decisions.price / averages.price, state.params.priceElasticity)
  const marketingEffect = 1 + Math.log(1 + state.decisions.marketing / MARKETING_SCALE) * MARKETING_WEIGHT
  const techEffect = 1 + (state.metrics.techLevel / averages.techLevel - 1) * TECH_ADVANTAGE_WEIGHT

  return (priceEffect * marketingEffect * techEffect) / (averages.count + 1)
}

export function runDemandSystem(state: InternalState, averages: CompetitorAverages): number {
  const noise = uniform(state.random, 0.85, 1.15)
  const demand = Math.trunc(currentMarketSize(state) * demandShare(state, averages) * noise)

  return Math.max(0, demand)
}
