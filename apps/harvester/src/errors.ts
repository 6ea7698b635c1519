/**
 * Harvester error types.
 *
 * Per-platform failures never surface as exceptions; these cover the
 * cycle-fatal and caller-facing cases only.
 */

export type TicketDeskErrorCode =
  | 'NO_ACTIVE_PLATFORMS'
  | 'CYCLE_DEADLINE_EXCEEDED'
  | 'RELAY_VALIDATION_FAILED'
  | 'HISTORY_READ_FAILED'
  | 'LOCK_TIMEOUT'
  | 'CONFIGURATION_ERROR'

export class TicketDeskError extends Error {
  readonly code: TicketDeskErrorCode

  constructor(code: TicketDeskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TicketDeskError'
    this.code = code
  }
}

export class NoActivePlatformsError extends TicketDeskError {
  constructor(attempted: number) {
    super(
      'NO_ACTIVE_PLATFORMS',
      `All ${attempted} platforms returned no data (likely blocked); prior history left untouched`
    )
    this.name = 'NoActivePlatformsError'
  }
}

export class CycleDeadlineError extends TicketDeskError {
  readonly deadlineMs: number

  constructor(deadlineMs: number) {
    super('CYCLE_DEADLINE_EXCEEDED', `Scrape cycle exceeded its ${deadlineMs}ms deadline`)
    this.name = 'CycleDeadlineError'
    this.deadlineMs = deadlineMs
  }
}

export interface RelayValidationIssue {
  field: string
  message: string
}

export class RelayValidationError extends TicketDeskError {
  readonly issues: RelayValidationIssue[]

  constructor(issues: RelayValidationIssue[]) {
    super('RELAY_VALIDATION_FAILED', issues.map((i) => `${i.field}: ${i.message}`).join('; '))
    this.name = 'RelayValidationError'
    this.issues = issues
  }
}

export class HistoryReadError extends TicketDeskError {
  constructor(path: string, cause: unknown) {
    super('HISTORY_READ_FAILED', `Could not read ${path}`, { cause })
    this.name = 'HistoryReadError'
  }
}

export class LockTimeoutError extends TicketDeskError {
  constructor(lockPath: string, waitedMs: number) {
    super('LOCK_TIMEOUT', `Timed out after ${waitedMs}ms waiting for ${lockPath}`)
    this.name = 'LockTimeoutError'
  }
}

export class ConfigError extends TicketDeskError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
