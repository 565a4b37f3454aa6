export { ApiError, describeFailure } from './errors.js'
export type { ApiErrorCode } from './errors.js'

export {
  RequestExecutor,
  classifyResponse,
  isRecord,
  RATE_LIMIT_ERROR,
} from './executor.js'
export type { Classification, ExecutorOptions, HttpMethod, Sleep } from './executor.js'

export { paginate, nextPageToken } from './paginator.js'
export type { Page, PageToken, PageRequest, PaginateOptions } from './paginator.js'

export { FormsClient, createFormsClient, executorOptionsFromConfig } from './forms-client.js'
export type { FormsClientOptions, RecordPage } from './forms-client.js'
