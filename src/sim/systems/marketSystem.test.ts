import { describe, expect, it } from 'vitest'
import { runCompetitorSystem, runMarketShareSystem } from '@sim/systems/marketSystem'
import { createInitialState } from '@sim/world/state'

describe('Market share system', () => {
  it('measures our sales against launch-size competitor estimates', () => {
    const state = createInitialState({ track: 'solar', seed: 1 })
    state.metrics.unitsSold = 900
    state.metrics.quarter = 6

    runMarketShareSystem(state)

    expect(state.metrics.marketShare).toBeCloseTo(0.1, 12)
  })

  it('ignores inactive competitors', () => {
    const state = createInitialState({ track: 'solar', seed: 1 })
    state.metrics.unitsSold = 1000
    state.competitors[0].active = false
    state.competitors[1].active = false

    runMarketShareSystem(state)

    // 12000 * 0.2 * 0.9 = 2160
    expect(state.metrics.marketShare).toBeCloseTo(1000 / 3160, 12)
  })

  it('is zero when nobody sells', () => {
    const state = createInitialState({ track: 'solar', seed: 1 })
    state.metrics.unitsSold = 0
    for (const competitor of state.competitors) {
      competitor.active = false
    }

    runMarketShareSystem(state)

    expect(state.metrics.marketShare).toBe(0)
  })
})

describe('Competitor system', () => {
  it('drifts tech, price and share from three draws per competitor', () => {
    const state = createInitialState({ track: 'solar', random: () => 0 })

    runCompetitorSystem(state)

    const [first] = state.competitors
    expect(first.techLevel).toBeCloseTo(1.01, 12)
    expect(first.price).toBeCloseTo(411.6, 9)
    expect(first.marketShare).toBeCloseTo(0.285, 12)
  })

  it('clamps share between 5% and 35%', () => {
    const state = createInitialState({ track: 'solar', random: () => 0.999 })
    state.competitors[0].marketShare = 0.35
    state.competitors[1].marketShare = 0.04

    runCompetitorSystem(state)

    expect(state.competitors[0].marketShare).toBe(0.35)
    expect(state.competitors[1].marketShare).toBe(0.05)
  })

  it('leaves inactive competitors and the random stream untouched', () => {
    let draws = 0
    const state = createInitialState({
      track: 'solar',
      random: () => {
        draws += 1
        return 0.5
      },
    })
    state.competitors[1].active = false

    runCompetitorSystem(state)

    expect(draws).toBe(6)
    expect(state.competitors[1]).toEqual({
      name: 'GreenFuture Corp',
      techLevel: 0.95,
      marketShare: 0.25,
      price: 440,
      active: false,
    })
  })
})
