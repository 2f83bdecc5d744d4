import {
  FUNDING_TERMS,
  GRANT_APPROVAL_PROBABILITY,
  SEED_CAPITAL,
  SERIES_B_MIN_RAISED,
} from '@shared/constants'
import { parseFundingSource } from '@shared/decisions'
import { InvalidOperationError } from '@shared/errors'
import { fmtMoney } from '@shared/format'
import type {
  CommandResult,
  DepartmentName,
  FundingResult,
  FundingSource,
  GameCommand,
  HireResult,
} from '@shared/types'
import { advanceQuarter, assertGameActive } from '@sim/quarter'
import { getDepartment, recordLedger, type InternalState } from '@sim/world/state'

export function applyCommand(state: InternalState, command: GameCommand): CommandResult {
  if (command.type === 'advanceQuarter') {
    return { type: command.type, result: advanceQuarter(state, command.decisions) }
  }

  if (command.type === 'raiseFunding') {
    return { type: command.type, result: raiseFunding(state, command.source) }
  }

  return { type: command.type, result: hireFire(state, command.department, command.delta) }
}

export function raiseFunding(state: InternalState, requested: FundingSource): FundingResult {
  assertGameActive(state)

  const source = parseFundingSource(requested)
  const terms = FUNDING_TERMS[source]

  // The seed round counts toward totalFundingRaised, so Series B looks at money raised since founding.
  if (source === 'vcSeriesB' && state.metrics.totalFundingRaised - SEED_CAPITAL < SERIES_B_MIN_RAISED) {
    return rejectFunding(state, source, 'Need to raise Series A first')
  }

  if (source === 'grant' && state.random() >= GRANT_APPROVAL_PROBABILITY) {
    return rejectFunding(state, source, 'Grant application not approved')
  }

  state.metrics.cash += terms.amount
  state.metrics.totalFundingRaised += terms.amount
  state.metrics.equityGiven += terms.dilution

  const message = `Successfully raised ${fmtMoney(terms.amount)}`
  recordLedger(state, 'funding', `${terms.label}: ${message}`)

  return { success: true, source, amount: terms.amount, dilution: terms.dilution, message }
}

export function hireFire(state: InternalState, department: string, delta: number): HireResult {
  assertGameActive(state)

  if (!Number.isInteger(delta)) {
    throw new InvalidOperationError('INVALID_DELTA', `Headcount change must be a whole number, got ${delta}`)
  }

  const target = getDepartment(state, department)
  const newHeadcount = target.headcount + delta

  if (newHeadcount < 0) {
    return settleHiring(state, target.name, false, 'Cannot have negative headcount', target.headcount)
  }

  if (delta === 0) {
    return settleHiring(state, target.name, true, `No change to ${target.name}`, newHeadcount)
  }

  target.headcount = newHeadcount

  const message = `${delta > 0 ? 'Hired' : 'Fired'} ${Math.abs(delta)} employee(s) in ${target.name}`
  return settleHiring(state, target.name, true, message, newHeadcount)
}

function settleHiring(
  state: InternalState,
  department: DepartmentName,
  success: boolean,
  message: string,
  newHeadcount: number,
): HireResult {
  recordLedger(state, 'hiring', success ? message : `${department}: ${message}`)
  return { success, department, message, newHeadcount }
}

function rejectFunding(state: InternalState, source: FundingSource, message: string): FundingResult {
  recordLedger(state, 'funding', `${FUNDING_TERMS[source].label}: ${message}`)
  return { success: false, source, amount: 0, dilution: 0, message }
}
