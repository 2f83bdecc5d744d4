import { describe, expect, it } from 'vitest'
import { BANKRUPTCY_REASON, GAME_COMPLETE_REASON } from '@shared/constants'
import { InvalidOperationError } from '@shared/errors'
import { EVENT_CATALOG } from '@sim/events/catalog'
import { advanceQuarter, checkGameOver } from '@sim/quarter'
import { createInitialState, getDepartment } from '@sim/world/state'

// A constant 0.5 makes every jitter exactly 1.0 and never fires an event.
const steady = () => 0.5

describe('advanceQuarter', () => {
  it('runs the first quarter on default decisions', () => {
    const state = createInitialState({ track: 'solar', random: steady })

    const result = advanceQuarter(state)
    const techLevel = 1 + Math.log(2) * 0.05 + 0.05

    expect(result.quarter).toBe(1)
    expect(result.demand).toBe(3802)
    expect(result.unitsSold).toBe(1000)
    expect(result.revenue).toBe(450_000)
    expect(result.techLevel).toBeCloseTo(techLevel, 12)
    expect(result.unitCost).toBeCloseTo(280 / techLevel, 9)
    expect(result.netIncome).toBeCloseTo(450_000 - 1000 * (280 / techLevel) - 617_000, 6)
    expect(result.marketShare).toBeCloseTo(1000 / 9100, 12)
    expect(result.event).toBeNull()
    expect(result.ignoredEffects).toEqual([])
  })

  it('moves cash by exactly the net income', () => {
    const state = createInitialState({ track: 'battery', random: steady })

    for (let quarter = 0; quarter < 5; quarter += 1) {
      const before = state.metrics.cash
      const result = advanceQuarter(state, { price: 380 + quarter * 20 })

      expect(result.cash).toBe(before + result.netIncome)
    }
  })

  it('carries decisions forward when fields are omitted', () => {
    const state = createInitialState({ track: 'solar', random: steady })

    advanceQuarter(state, { price: 520, rd: 0 })
    advanceQuarter(state, { marketing: 10_000 })

    expect(state.decisions).toEqual({ price: 520, production: 1000, marketing: 10_000, rd: 0 })
    expect(state.cumulativeRdSpend).toBe(0)
  })

  it('never sells more than planned or less than zero', () => {
    const state = createInitialState({ track: 'hydrogen', random: steady })

    const capped = advanceQuarter(state, { production: 250 })
    const idle = advanceQuarter(state, { production: 0 })

    expect(capped.unitsSold).toBe(250)
    expect(idle.unitsSold).toBe(0)
  })

  it('keeps valuation at or above half the capital raised', () => {
    const state = createInitialState({ track: 'carbonCapture', random: steady })

    for (let quarter = 0; quarter < 4; quarter += 1) {
      advanceQuarter(state, { production: 0 })
      expect(state.metrics.valuation).toBeGreaterThanOrEqual(state.metrics.totalFundingRaised * 0.5)
    }
  })

  it('appends a frozen copy of the metrics to history', () => {
    const state = createInitialState({ track: 'solar', random: steady })

    advanceQuarter(state)
    advanceQuarter(state)

    expect(state.history).toHaveLength(2)
    expect(state.history[1]).toEqual(state.metrics)
    expect(state.history[1]).not.toBe(state.metrics)
    expect(state.history[0].quarter).toBe(1)
  })

  it('logs a line per quarter', () => {
    const state = createInitialState({ track: 'solar', random: steady })

    advanceQuarter(state)

    expect(state.ledger).toHaveLength(1)
    expect(state.ledger[0].kind).toBe('quarter')
    expect(state.ledger[0].message.startsWith('Q1: sold 1,000 of 3,802 demanded, net income -$')).toBe(true)
  })

  it('reports a fired event', () => {
    // tech, demand, 3 x 3 competitor draws, event roll, event pick
    const draws = [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.1, 0.3]
    let index = 0
    const state = createInitialState({ track: 'solar', random: () => draws[index++ % draws.length] })

    const result = advanceQuarter(state)

    expect(result.event?.title).toBe('Key Engineer Departs')
    expect(getDepartment(state, 'Engineering').headcount).toBe(4)
    expect(state.history[0].techLevel).toBeCloseTo(result.techLevel, 12)
  })

  it('hands out event copies the caller cannot use to rewrite the catalog', () => {
    const draws = [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.1, 0.95]
    let index = 0
    const state = createInitialState({ track: 'solar', random: () => draws[index++ % draws.length] })

    const result = advanceQuarter(state)
    if (!result.event) {
      throw new Error('Expected an event to fire')
    }
    result.event.impact.cash = -99_000_000
    result.event.title = 'Tampered'

    expect(EVENT_CATALOG[11].title).toBe('Product Recall')
    expect(EVENT_CATALOG[11].impact.cash).toBe(-600_000)
    expect(state.lastEvent?.impact.cash).toBe(-600_000)
  })
})

describe('Game over', () => {
  it('completes after twelve quarters', () => {
    const state = createInitialState({ track: 'solar', random: steady })
    state.metrics.cash = 50_000_000

    for (let quarter = 1; quarter <= 12; quarter += 1) {
      expect(state.gameOver).toBe(false)
      advanceQuarter(state)
    }

    expect(state.metrics.quarter).toBe(12)
    expect(state.gameOver).toBe(true)
    expect(state.gameOverReason).toBe(GAME_COMPLETE_REASON)
    expect(state.ledger.at(-1)).toEqual({ quarter: 12, kind: 'gameOver', message: GAME_COMPLETE_REASON })
  })

  it('declares bankruptcy below -$1M', () => {
    const state = createInitialState({ track: 'solar', random: steady })
    state.metrics.cash = -1_200_000

    advanceQuarter(state)

    expect(state.gameOver).toBe(true)
    expect(state.gameOverReason).toBe(BANKRUPTCY_REASON)
    expect(state.gameOverReason).toContain('Bankruptcy')
  })

  it('puts bankruptcy ahead of completion on the final quarter', () => {
    const state = createInitialState({ track: 'solar', seed: 1 })
    state.metrics.quarter = 12
    state.metrics.cash = -1_000_001

    checkGameOver(state)

    expect(state.gameOverReason).toBe(BANKRUPTCY_REASON)
  })

  it('treats exactly -$1M as solvent', () => {
    const state = createInitialState({ track: 'solar', seed: 1 })
    state.metrics.quarter = 3
    state.metrics.cash = -1_000_000

    checkGameOver(state)

    expect(state.gameOver).toBe(false)
  })

  it('rejects a quarter after the game has ended without touching state', () => {
    const state = createInitialState({ track: 'solar', random: steady })
    state.metrics.cash = -1_200_000
    advanceQuarter(state)
    const metrics = { ...state.metrics }

    expect(() => advanceQuarter(state)).toThrow(InvalidOperationError)
    expect(state.metrics).toEqual(metrics)
    expect(state.history).toHaveLength(1)
  })
})

describe('Atomic failure', () => {
  it('leaves state intact when decisions are invalid', () => {
    const state = createInitialState({ track: 'solar', random: steady })
    const metrics = { ...state.metrics }

    expect(() => advanceQuarter(state, { price: -5 })).toThrow(InvalidOperationError)
    expect(state.metrics).toEqual(metrics)
    expect(state.decisions.price).toBe(450)
    expect(state.cumulativeRdSpend).toBe(0)
  })

  it('leaves state intact when no competitor is active', () => {
    const state = createInitialState({ track: 'solar', random: steady })
    for (const competitor of state.competitors) {
      competitor.active = false
    }

    expect(() => advanceQuarter(state, { price: 300 })).toThrow(InvalidOperationError)
    expect(state.metrics.quarter).toBe(0)
    expect(state.decisions.price).toBe(450)
    expect(state.history).toEqual([])
  })
})
