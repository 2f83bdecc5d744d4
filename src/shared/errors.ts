export type InvalidOperationCode =
  | 'GAME_OVER'
  | 'GAME_NOT_STARTED'
  | 'UNKNOWN_TRACK'
  | 'UNKNOWN_FUNDING_SOURCE'
  | 'UNKNOWN_DEPARTMENT'
  | 'INVALID_DELTA'
  | 'INVALID_DECISIONS'
  | 'NO_ACTIVE_COMPETITORS'

/**
 * Raised for calls the caller should never make, such as advancing a finished
 * game. Player-facing rejections (declined grants and the like) are returned
 * as results instead.
 */
export class InvalidOperationError extends Error {
  readonly code: InvalidOperationCode

  constructor(code: InvalidOperationCode, message: string) {
    super(message)
    this.name = 'InvalidOperationError'
    this.code = code
  }
}
