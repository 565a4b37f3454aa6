/** Typed discovery error codes */
export type DiscoveryErrorCode = 'FORMS_UNAVAILABLE' | 'FIELDS_UNAVAILABLE'

/**
 * FORMS_UNAVAILABLE aborts a whole run; FIELDS_UNAVAILABLE only the streams
 * of `formId`.
 */
export class DiscoveryError extends Error {
  readonly code: DiscoveryErrorCode
  readonly formId?: string

  constructor(code: DiscoveryErrorCode, message: string, options: { formId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'DiscoveryError'
    this.code = code
    this.formId = options.formId
  }
}
