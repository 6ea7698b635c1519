import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { LockTimeoutError, NoActivePlatformsError, RelayValidationError } from '@ticketdesk/harvester'
import { classifyError, ERROR_CODES, formatErrorForLog, getSafeMessage } from '../errors'

describe('classifyError', () => {
  it('maps ZodError to validation with issue details', () => {
    const result = z.object({ floor: z.number() }).safeParse({ floor: 'cheap' })
    if (result.success) throw new Error('expected parse failure')

    const classified = classifyError(result.error)

    expect(classified.category).toBe('validation')
    expect(classified.code).toBe(ERROR_CODES.VALIDATION_FAILED)
    expect(classified.statusCode).toBe(400)
    expect(classified.details).toEqual({
      issues: [{ path: 'floor', message: 'Expected number, received string', code: 'invalid_type' }],
    })
  })

  it('maps relay validation failures to 400', () => {
    const classified = classifyError(new RelayValidationError([{ field: 'platform', message: 'is required' }]))

    expect(classified.statusCode).toBe(400)
    expect(classified.code).toBe('RELAY_VALIDATION_FAILED')
    expect(classified.message).toBe('platform: is required')
  })

  it('maps lock contention to 409', () => {
    const classified = classifyError(new LockTimeoutError('/tmp/ticket_data.json.lock', 10000))

    expect(classified.category).toBe('conflict')
    expect(classified.statusCode).toBe(409)
    expect(getSafeMessage(classified)).toBe('Resource busy. Please try again')
  })

  it('treats cycle failures as internal', () => {
    const classified = classifyError(new NoActivePlatformsError(5))

    expect(classified.statusCode).toBe(500)
    expect(classified.isOperational).toBe(true)
  })

  it('maps body-parser failures to INVALID_JSON', () => {
    const error = Object.assign(new SyntaxError('Unexpected end of JSON input'), { status: 400 })

    const classified = classifyError(error)

    expect(classified.code).toBe(ERROR_CODES.INVALID_JSON)
    expect(classified.statusCode).toBe(400)
  })

  it('maps unknown errors to a non-operational 500', () => {
    const classified = classifyError(new Error('ENOENT: /srv/data'))

    expect(classified.code).toBe(ERROR_CODES.UNEXPECTED_ERROR)
    expect(classified.isOperational).toBe(false)
    expect(getSafeMessage(classified)).toBe('An unexpected error occurred')
  })

  it('handles non-Error thrown values', () => {
    const classified = classifyError('boom')

    expect(classified.message).toBe('boom')
    expect(classified.statusCode).toBe(500)
    expect(classified.originalError).toBeUndefined()
  })
})

describe('formatErrorForLog', () => {
  it('flattens the classification into snake_case fields', () => {
    const error = new Error('disk full')
    const formatted = formatErrorForLog(classifyError(error))

    expect(formatted).toMatchObject({
      error_category: 'internal',
      error_code: 'UNEXPECTED_ERROR',
      error_message: 'disk full',
      error_status_code: 500,
      error_is_operational: false,
      error_name: 'Error',
    })
    expect(formatted.error_stack).toBe(error.stack)
  })
})
