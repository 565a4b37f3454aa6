import { createChildLogger } from '../logger.js'
import { Value } from '@sinclair/typebox/value'
import { ApiEnvelopeSchema } from '../types/api.js'

const log = createChildLogger('paginator')

/** 1-based page number; undefined requests page 1 without sending a page parameter */
export type PageToken = number | undefined

export interface Page {
  body: unknown
  /** Token the page was requested with */
  token: PageToken
  nextToken: PageToken
}

export interface PaginateOptions {
  /** false for single-shot endpoints: one request, never a next token */
  paginate?: boolean
  startToken?: PageToken
}

export type PageRequest = (token: PageToken) => Promise<unknown>

function lastPageOf(body: unknown): number {
  if (!Value.Check(ApiEnvelopeSchema, body)) return 0
  return body.paging?.last_page ?? 0
}

/**
 * Next token after a page fetched with `previous`, or undefined when
 * `paging.last_page` says there is none.
 */
export function nextPageToken(body: unknown, previous: PageToken): PageToken {
  const current = previous ?? 1
  const next = current + 1
  const lastPage = lastPageOf(body)
  log.debug('Paging decision', { lastPage, previousPage: current, nextPage: next })
  return lastPage >= next ? next : undefined
}

/**
 * Lazily request pages in increasing order. Page N+1 is requested only after
 * the consumer has pulled page N.
 */
export async function* paginate(
  request: PageRequest,
  options: PaginateOptions = {},
): AsyncGenerator<Page, void, undefined> {
  const paginated = options.paginate ?? true
  let token = options.startToken

  for (;;) {
    const body = await request(token)
    const nextToken = paginated ? nextPageToken(body, token) : undefined
    yield { body, token, nextToken }
    if (nextToken === undefined) return
    token = nextToken
  }
}
