import {
  BANKRUPTCY_CASH_THRESHOLD,
  BANKRUPTCY_REASON,
  GAME_COMPLETE_REASON,
  TOTAL_QUARTERS,
} from '@shared/constants'
import { resolveDecisions } from '@shared/decisions'
import { InvalidOperationError } from '@shared/errors'
import { fmtInt, fmtMoney } from '@shared/format'
import type { DecisionInput, QuarterResult } from '@shared/types'
import { runEventSystem } from '@sim/events/eventSystem'
import { runDemandSystem, summarizeCompetitors } from '@sim/systems/demandSystem'
import { runFinanceSystem, runSalesSystem, runValuationSystem } from '@sim/systems/financeSystem'
import { runCompetitorSystem, runMarketShareSystem } from '@sim/systems/marketSystem'
import { runTechnologySystem, runUnitCostSystem } from '@sim/systems/technologySystem'
import { cloneEvent, recordHistory, recordLedger, type InternalState } from '@sim/world/state'

/**
 * Runs one full quarter. Validation happens before the first write, so a
 * rejected call leaves the previous quarter intact.
 */
export function advanceQuarter(state: InternalState, input: DecisionInput = {}): QuarterResult {
  assertGameActive(state)

  const decisions = resolveDecisions(state.decisions, input)
  const competitors = summarizeCompetitors(state.competitors)

  state.decisions = decisions
  state.metrics.quarter += 1

  runTechnologySystem(state)
  runUnitCostSystem(state)

  const demand = runDemandSystem(state, competitors)
  runSalesSystem(state, demand)
  runFinanceSystem(state)

  runMarketShareSystem(state)
  runCompetitorSystem(state)
  runValuationSystem(state)

  const fired = runEventSystem(state)

  const { metrics } = state
  recordLedger(
    state,
    'quarter',
    `Q${metrics.quarter}: sold ${fmtInt(metrics.unitsSold)} of ${fmtInt(demand)} demanded, net income ${fmtMoney(metrics.netIncome)}`,
  )

  checkGameOver(state)
  recordHistory(state)

  return {
    quarter: metrics.quarter,
    demand,
    unitsSold: metrics.unitsSold,
    revenue: metrics.revenue,
    netIncome: metrics.netIncome,
    cash: metrics.cash,
    marketShare: metrics.marketShare,
    techLevel: metrics.techLevel,
    unitCost: metrics.unitCost,
    event: fired ? cloneEvent(fired.event) : null,
    ignoredEffects: fired?.ignoredEffects ?? [],
  }
}

export function checkGameOver(state: InternalState): void {
  if (state.gameOver) {
    return
  }

  if (state.metrics.cash < BANKRUPTCY_CASH_THRESHOLD) {
    state.gameOver = true
    state.gameOverReason = BANKRUPTCY_REASON
  } else if (state.metrics.quarter >= TOTAL_QUARTERS) {
    state.gameOver = true
    state.gameOverReason = GAME_COMPLETE_REASON
  } else {
    return
  }

  recordLedger(state, 'gameOver', state.gameOverReason)
}

export function assertGameActive(state: InternalState): void {
  if (state.gameOver) {
    throw new InvalidOperationError('GAME_OVER', `Game is over: ${state.gameOverReason ?? 'unknown reason'}`)
  }
}
