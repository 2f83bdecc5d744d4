import { EVENT_EFFECT_KEYS, EVENT_PROBABILITY } from '@shared/constants'
import { fmtMoney } from '@shared/format'
import { pick } from '@shared/rng'
import type { EventEffectKey, EventImpact, RandomEvent } from '@shared/types'
import { EVENT_CATALOG } from '@sim/events/catalog'
import { cloneEvent, getDepartment, recordLedger, type InternalState } from '@sim/world/state'

// Keys that mutate state, in application order. Anything else in an impact map
// (demandBoost, marketShareMult, marketingEfficiency, productionLimit, techLevel)
// is carried for display only.
const APPLIED_EFFECTS: readonly EventEffectKey[] = [
  'cash',
  'techBoost',
  'techLevelMult',
  'unitCostMult',
  'engineerLoss',
  'operatingCost',
  'valuationMult',
]

export interface FiredEvent {
  event: RandomEvent
  ignoredEffects: EventEffectKey[]
}

export function runEventSystem(
  state: InternalState,
  catalog: readonly RandomEvent[] = EVENT_CATALOG,
): FiredEvent | null {
  if (state.random() >= EVENT_PROBABILITY) {
    return null
  }

  const event = cloneEvent(pick(state.random, catalog))
  state.lastEvent = event

  const ignoredEffects = applyEventEffects(state, event.impact)
  recordLedger(state, 'event', describeEvent(event))

  return { event, ignoredEffects }
}

export function applyEventEffects(state: InternalState, impact: EventImpact): EventEffectKey[] {
  const { metrics } = state

  for (const key of APPLIED_EFFECTS) {
    const magnitude = impact[key]
    if (magnitude === undefined) {
      continue
    }

    switch (key) {
      case 'cash':
        metrics.cash += magnitude
        break
      case 'techBoost':
      case 'techLevelMult':
        metrics.techLevel *= magnitude
        break
      case 'unitCostMult':
        metrics.unitCost *= magnitude
        break
      case 'engineerLoss': {
        const engineering = getDepartment(state, 'Engineering')
        if (engineering.headcount > 0) {
          engineering.headcount -= 1
        }
        break
      }
      case 'operatingCost':
        metrics.operatingExpenses += magnitude
        break
      case 'valuationMult':
        metrics.valuation *= magnitude
        break
    }
  }

  return EVENT_EFFECT_KEYS.filter((key) => impact[key] !== undefined && !APPLIED_EFFECTS.includes(key))
}

function describeEvent(event: RandomEvent): string {
  const cash = event.impact.cash
  return cash === undefined ? event.title : `${event.title} (${cash > 0 ? '+' : ''}${fmtMoney(cash)})`
}
