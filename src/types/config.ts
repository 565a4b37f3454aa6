import { Type, type Static } from '@sinclair/typebox'

/** Extractor configuration schema for forms-tap.config.json */
export const TapConfigSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  /** ISO-8601 lower bound, used only while no bookmark exists */
  start_date: Type.Optional(Type.String({ minLength: 1 })),
  user_agent: Type.Optional(Type.String()),
  base_url: Type.String({ default: 'https://api.kpaehs.com/v1' }),
  extra_retry_statuses: Type.Array(Type.Integer({ minimum: 100, maximum: 599 }), { default: [429] }),
  max_attempts: Type.Integer({ minimum: 1, default: 5 }),
  backoff_factor: Type.Number({ minimum: 0, default: 2 }),
  rate_limit_cooldown_ms: Type.Integer({ minimum: 0, default: 120000 }),
  request_timeout_ms: Type.Integer({ minimum: 1000, default: 300000 }),
  switch_as_boolean: Type.Boolean({ default: true }),
  state_path: Type.String({ default: './data/forms-tap.db' }),
})

export type TapConfig = Static<typeof TapConfigSchema>
