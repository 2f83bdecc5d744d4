import { z } from 'zod'
import {
  DEPARTMENT_NAMES,
  FUNDING_SOURCES,
  MAX_PRICE,
  MAX_PRODUCTION,
  MAX_SPEND,
  TECHNOLOGY_TRACKS,
} from '@shared/constants'
import { InvalidOperationError } from '@shared/errors'
import type {
  DecisionInput,
  Decisions,
  DepartmentName,
  FundingSource,
  TechnologyTrack,
} from '@shared/types'

export const technologyTrackSchema = z.enum(TECHNOLOGY_TRACKS)
export const fundingSourceSchema = z.enum(FUNDING_SOURCES)
export const departmentNameSchema = z.enum(DEPARTMENT_NAMES)

export const decisionInputSchema = z
  .object({
    price: z.number().finite().positive().max(MAX_PRICE).optional(),
    production: z.number().int().min(0).max(MAX_PRODUCTION).optional(),
    marketing: z.number().finite().min(0).max(MAX_SPEND).optional(),
    rd: z.number().finite().min(0).max(MAX_SPEND).optional(),
  })
  .strict()

/** Omitted fields carry over from the previous quarter's decisions. */
export function resolveDecisions(previous: Decisions, input: DecisionInput): Decisions {
  const parsed = decisionInputSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidOperationError('INVALID_DECISIONS', describeIssues(parsed.error))
  }

  return {
    price: parsed.data.price ?? previous.price,
    production: parsed.data.production ?? previous.production,
    marketing: parsed.data.marketing ?? previous.marketing,
    rd: parsed.data.rd ?? previous.rd,
  }
}

export function parseTechnologyTrack(raw: unknown): TechnologyTrack {
  const parsed = technologyTrackSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidOperationError('UNKNOWN_TRACK', `Invalid technology track: ${String(raw)}`)
  }

  return parsed.data
}

export function parseFundingSource(raw: unknown): FundingSource {
  const parsed = fundingSourceSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidOperationError('UNKNOWN_FUNDING_SOURCE', `Invalid funding source: ${String(raw)}`)
  }

  return parsed.data
}

export function isDepartmentName(raw: unknown): raw is DepartmentName {
  return departmentNameSchema.safeParse(raw).success
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'decisions'}: ${issue.message}`)
    .join('; ')
}
