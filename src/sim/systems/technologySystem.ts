import { uniform } from '@shared/rng'
import { getDepartment, type InternalState } from '@sim/world/state'

const RD_SPEND_SCALE = 100_000
const RD_TECH_WEIGHT = 0.05
const ENGINEER_TECH_WEIGHT = 0.01

// 2^-0.234 ~= 0.85 per doubling of cumulative output, measured in batches of 1000.
const LEARNING_EXPONENT = -0.234
const LEARNING_BATCH = 1000

/**
 * Recomputes tech level from cumulative R&D and the current engineering team.
 * The previous level is discarded, so the jitter can move it either way.
 */
export function runTechnologySystem(state: InternalState): void {
  state.cumulativeRdSpend += state.decisions.rd

  const rdFactor =
    Math.log(1 + state.cumulativeRdSpend / RD_SPEND_SCALE) * RD_TECH_WEIGHT * state.params.rdEffectiveness
  const engineerFactor = getDepartment(state, 'Engineering').headcount * ENGINEER_TECH_WEIGHT
  const jitter = uniform(state.random, 0.98, 1.02)

  state.metrics.techLevel = (1 + rdFactor + engineerFactor) * jitter
}

export function runUnitCostSystem(state: InternalState): void {
  const learning = learningCurveFactor(state.metrics.cumulativeProduction)
  const techFactor = state.metrics.techLevel > 0 ? 1 / state.metrics.techLevel : 1

  state.metrics.unitCost = state.params.unitCost * learning * techFactor
}

export function learningCurveFactor(cumulativeProduction: number): number {
  if (cumulativeProduction <= 0) {
    return 1
  }

  return Math.pow(2, Math.log2(cumulativeProduction / LEARNING_BATCH + 1) * LEARNING_EXPONENT)
}
