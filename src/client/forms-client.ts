/**
 * Endpoint wrappers for the forms API.
 *
 * Every call is a POST through the RequestExecutor with the access token in
 * the JSON body. Response bodies are checked against TypeBox schemas; a body
 * of the wrong shape fails like a fatal response.
 */

import type { Static, TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { TapConfig } from '../types/config.js'
import {
  FormsListResponseSchema,
  FormInfoResponseSchema,
  ResponsesListResponseSchema,
  ResponseInfoResponseSchema,
  type Form,
  type Field,
  type Identifier,
  type RawRecordSummary,
  type RawDetailPayload,
} from '../types/api.js'
import { ApiError } from './errors.js'
import { RequestExecutor, isRecord, type ExecutorOptions } from './executor.js'
import { paginate, type PageToken } from './paginator.js'

export interface FormsClientOptions {
  baseUrl: string
  accessToken: string
}

/** A page of records together with the token it was fetched with */
export interface RecordPage<T> {
  records: T[]
  token: PageToken
}

function expectShape<T extends TSchema>(schema: T, body: unknown, url: string): Static<T> {
  if (Value.Check(schema, body)) return body
  const first = Value.Errors(schema, body).First()
  const detail = first ? `${first.path || '/'}: ${first.message}` : 'unknown mismatch'
  throw new ApiError(
    'FATAL',
    200,
    JSON.stringify(body),
    url,
    `Unexpected response shape from ${url} (${detail})`,
  )
}

export class FormsClient {
  private readonly baseUrl: string
  private readonly accessToken: string

  constructor(
    private readonly executor: RequestExecutor,
    options: FormsClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.accessToken = options.accessToken
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`
  }

  private post(path: string, params: Record<string, unknown> = {}): Promise<unknown> {
    return this.executor.execute('POST', this.url(path), { token: this.accessToken, ...params })
  }

  /**
   * List every form visible to the token.
   * POST /forms.list
   */
  async listForms(): Promise<Form[]> {
    const body = await this.post('/forms.list')
    return expectShape(FormsListResponseSchema, body, this.url('/forms.list')).forms
  }

  /**
   * Field metadata of the latest version of a form.
   * POST /forms.info
   */
  async getFormFields(formId: Identifier): Promise<Field[]> {
    const body = await this.post('/forms.info', { form_id: formId })
    return expectShape(FormInfoResponseSchema, body, this.url('/forms.info')).form.latest.fields
  }

  /**
   * Response summaries of a form, page by page.
   * POST /responses.list
   *
   * @param updatedAfter - epoch milliseconds lower bound, omitted when undefined
   */
  async *listResponses(
    formId: Identifier,
    updatedAfter?: number,
  ): AsyncGenerator<RecordPage<RawRecordSummary>, void, undefined> {
    const url = this.url('/responses.list')
    const pages = paginate((page) =>
      this.post('/responses.list', {
        form_id: formId,
        ...(page !== undefined ? { page } : {}),
        ...(updatedAfter !== undefined ? { updated_after: updatedAfter } : {}),
      }),
    )
    for await (const page of pages) {
      const body = expectShape(ResponsesListResponseSchema, page.body, url)
      yield { records: body.responses ?? [], token: page.token }
    }
  }

  /**
   * Full detail of one response. Not paginated.
   * POST /responses.info
   */
  async getResponse(formId: Identifier, responseId: Identifier): Promise<RawDetailPayload> {
    const body = await this.post('/responses.info', { form_id: formId, response_id: responseId })
    return expectShape(ResponseInfoResponseSchema, body, this.url('/responses.info')).response
  }

  /**
   * Records of a fixed list endpoint (roles, users, lines of business).
   *
   * @param recordsKey - body property holding the record array
   */
  async *listRecords(
    path: string,
    recordsKey: string,
  ): AsyncGenerator<RecordPage<Record<string, unknown>>, void, undefined> {
    for await (const page of paginate((token) =>
      this.post(path, token !== undefined ? { page: token } : {}),
    )) {
      const records = isRecord(page.body) ? page.body[recordsKey] : undefined
      yield {
        records: Array.isArray(records) ? records.filter(isRecord) : [],
        token: page.token,
      }
    }
  }
}

/** Executor options drawn from the validated configuration */
export function executorOptionsFromConfig(config: TapConfig): ExecutorOptions {
  return {
    extraRetryStatuses: config.extra_retry_statuses,
    maxAttempts: config.max_attempts,
    backoffFactor: config.backoff_factor,
    rateLimitCooldownMs: config.rate_limit_cooldown_ms,
    requestTimeoutMs: config.request_timeout_ms,
    userAgent: config.user_agent,
  }
}

/**
 * Build a client from configuration. `overrides` supplies what configuration
 * does not carry (abort signal, injected sleep for tests).
 */
export function createFormsClient(
  config: TapConfig,
  overrides: Partial<ExecutorOptions> = {},
): FormsClient {
  const executor = new RequestExecutor({ ...executorOptionsFromConfig(config), ...overrides })
  return new FormsClient(executor, { baseUrl: config.base_url, accessToken: config.access_token })
}
