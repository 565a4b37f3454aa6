export { discoverForms, streamNameOf, FieldCatalog } from './forms.js'
export type { FormFields } from './forms.js'
export { DiscoveryError } from './errors.js'
export type { DiscoveryErrorCode } from './errors.js'
