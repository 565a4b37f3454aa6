import type { TapConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: Omit<TapConfig, 'access_token'> = {
  base_url: 'https://api.kpaehs.com/v1',
  extra_retry_statuses: [429],
  max_attempts: 5,
  backoff_factor: 2,
  rate_limit_cooldown_ms: 120000,
  request_timeout_ms: 300000,
  switch_as_boolean: true,
  state_path: './data/forms-tap.db',
}
