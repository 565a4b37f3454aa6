/**
 * Form enumeration and per-form field metadata.
 *
 * FieldCatalog memoizes (fields, inferred schema) per form id for the life of
 * the catalog instance, which is the life of the process for the CLI. There
 * is no invalidation short of a restart. A failed lookup is evicted so a later
 * run in the same process asks again.
 */

import type { FormsClient } from '../client/forms-client.js'
import { createChildLogger } from '../logger.js'
import { inferSchema, type InferOptions, type InferredSchema } from '../schema/infer.js'
import type { Field, Form, Identifier } from '../types/api.js'
import { DiscoveryError } from './errors.js'

const log = createChildLogger('discovery')

export interface FormFields {
  formId: Identifier
  fields: readonly Field[]
  inferred: InferredSchema
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Stream name for a form: spaces to underscores, other non-word characters dropped */
export function streamNameOf(formName: string): string {
  return formName.replace(/ /g, '_').replace(/[^\w]+/g, '')
}

/**
 * Enumerate forms. Failure here leaves nothing to sync.
 *
 * @throws DiscoveryError FORMS_UNAVAILABLE
 */
export async function discoverForms(client: FormsClient): Promise<Form[]> {
  try {
    const forms = await client.listForms()
    log.info('Discovered forms', { count: forms.length })
    return forms
  } catch (err) {
    throw new DiscoveryError('FORMS_UNAVAILABLE', `Request to list forms failed: ${messageOf(err)}`, {
      cause: err,
    })
  }
}

export class FieldCatalog {
  private readonly entries = new Map<string, Promise<FormFields>>()

  constructor(
    private readonly client: FormsClient,
    private readonly options: InferOptions = {},
  ) {}

  /**
   * Fields and inferred schema of a form, fetched on first access.
   *
   * @throws DiscoveryError FIELDS_UNAVAILABLE
   */
  get(formId: Identifier): Promise<FormFields> {
    const key = String(formId)
    const cached = this.entries.get(key)
    if (cached) return cached

    const pending = this.load(formId)
    this.entries.set(key, pending)
    void pending.catch(() => this.entries.delete(key))
    return pending
  }

  /** Number of forms currently cached */
  get size(): number {
    return this.entries.size
  }

  private async load(formId: Identifier): Promise<FormFields> {
    let fields: Field[]
    try {
      fields = await this.client.getFormFields(formId)
    } catch (err) {
      throw new DiscoveryError(
        'FIELDS_UNAVAILABLE',
        `Error while trying to fetch fields for form id ${formId}. Error: ${messageOf(err)}`,
        { formId: String(formId), cause: err },
      )
    }
    log.debug('Fetched form fields', { formId, fields: fields.length })
    return { formId, fields, inferred: inferSchema(fields, this.options) }
  }
}
