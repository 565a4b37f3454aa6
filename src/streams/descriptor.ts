import { streamNameOf } from '../discovery/forms.js'
import type { Form, Identifier } from '../types/api.js'

export type StreamKind = 'list' | 'detail' | 'static'

/**
 * Plain description of one stream. Generic stream code is parameterized by
 * it; nothing is generated per form.
 */
export interface StreamDescriptor {
  name: string
  kind: StreamKind
  /** Set for list and detail streams */
  formId?: Identifier
  /** Name of the stream whose records drive this one */
  parent?: string
}

/** The list/detail pair derived from one form */
export interface FormStreams {
  form: Form
  list: StreamDescriptor
  detail: StreamDescriptor
}

export const LIST_STREAM_SUFFIX = '_responses_list'

/** Replication key of list streams and the request parameter it bounds */
export const LIST_REPLICATION_KEY = 'updated'

export function describeForm(form: Form): FormStreams {
  const name = streamNameOf(form.name)
  const list: StreamDescriptor = { name: `${name}${LIST_STREAM_SUFFIX}`, kind: 'list', formId: form.id }
  const detail: StreamDescriptor = { name, kind: 'detail', formId: form.id, parent: list.name }
  return { form, list, detail }
}
