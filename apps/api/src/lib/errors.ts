/**
 * Error Classification and Structured Error Handling
 *
 * Maps anything thrown inside a route to a category, status code and a
 * client-safe message. Internal details stay in the logs.
 */

import { ZodError } from 'zod'
import { TicketDeskError, type TicketDeskErrorCode } from '@ticketdesk/harvester'

export type ErrorCategory =
  | 'validation' // Client sent invalid data (4xx)
  | 'auth' // Missing or wrong scrape token
  | 'not_found' // Resource not found (404)
  | 'conflict' // Lock contention, concurrent writer (409)
  | 'internal' // Unexpected internal errors (500)

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  statusCode: number
  isOperational: boolean // Expected errors vs bugs
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

const DOMAIN_CATEGORIES: Record<TicketDeskErrorCode, { category: ErrorCategory; statusCode: number }> = {
  RELAY_VALIDATION_FAILED: { category: 'validation', statusCode: 400 },
  CONFIGURATION_ERROR: { category: 'internal', statusCode: 500 },
  LOCK_TIMEOUT: { category: 'conflict', statusCode: 409 },
  HISTORY_READ_FAILED: { category: 'internal', statusCode: 500 },
  NO_ACTIVE_PLATFORMS: { category: 'internal', statusCode: 500 },
  CYCLE_DEADLINE_EXCEEDED: { category: 'internal', statusCode: 500 },
}

function numericProperty(error: Error, key: 'status' | 'statusCode'): number | undefined {
  if (!(key in error)) return undefined
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'number' ? value : undefined
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      statusCode: 400,
      isOperational: true,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof TicketDeskError) {
    const { category, statusCode } = DOMAIN_CATEGORIES[error.code]
    return {
      category,
      code: error.code,
      message: error.message,
      statusCode,
      isOperational: true,
      originalError: error,
    }
  }

  if (error instanceof Error) {
    // body-parser marks malformed JSON with type 'entity.parse.failed' and status 400
    const status = numericProperty(error, 'status') ?? numericProperty(error, 'statusCode')
    if (status === 400) {
      return {
        category: 'validation',
        code: ERROR_CODES.INVALID_JSON,
        message: error.message,
        statusCode: 400,
        isOperational: true,
        originalError: error,
      }
    }
    if (status === 401) {
      return {
        category: 'auth',
        code: ERROR_CODES.UNAUTHORIZED,
        message: error.message,
        statusCode: 401,
        isOperational: true,
        originalError: error,
      }
    }
    if (status === 404) {
      return {
        category: 'not_found',
        code: ERROR_CODES.NOT_FOUND,
        message: error.message,
        statusCode: 404,
        isOperational: true,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      statusCode: 500,
      isOperational: false,
      originalError: error,
    }
  }

  // Non-Error thrown values
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    statusCode: 500,
    isOperational: false,
  }
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_status_code: classified.statusCode,
    error_is_operational: classified.isOperational,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

const SAFE_MESSAGES: Record<string, string> = {
  VALIDATION_FAILED: 'Please check your input and try again',
  INVALID_JSON: 'Request body is not valid JSON',
  RELAY_VALIDATION_FAILED: 'Relay submission rejected',
  UNAUTHORIZED: 'unauthorized',
  NOT_FOUND: 'not found',
  CONFLICT: 'Resource busy. Please try again',
  LOCK_TIMEOUT: 'Resource busy. Please try again',
  HISTORY_READ_FAILED: 'Stored data could not be read',
}

/**
 * User-safe message for a classified error (never exposes internal details)
 */
export function getSafeMessage(classified: ClassifiedError): string {
  return SAFE_MESSAGES[classified.code] ?? 'An unexpected error occurred'
}
