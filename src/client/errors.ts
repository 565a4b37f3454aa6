/** Typed API error codes for downstream error handling */
export type ApiErrorCode = 'RETRIABLE' | 'FATAL' | 'RETRIES_EXHAUSTED'

/**
 * Error raised by the request executor.
 *
 * RETRIABLE never leaves the executor: it is converted to RETRIES_EXHAUSTED
 * once every attempt is used up. statusCode is 0 for network failures
 * and timeouts.
 */
export class ApiError extends Error {
  readonly code: ApiErrorCode
  readonly statusCode: number
  readonly responseText: string
  readonly url: string

  constructor(
    code: ApiErrorCode,
    statusCode: number,
    responseText: string,
    url: string,
    message?: string,
  ) {
    super(message ?? describeFailure(statusCode, responseText, url))
    this.name = 'ApiError'
    this.code = code
    this.statusCode = statusCode
    this.responseText = responseText
    this.url = url
  }
}

export function describeFailure(statusCode: number, responseText: string, url: string): string {
  return `Error status code: ${statusCode}, response: ${responseText}, response url: ${url}`
}
