// ---------------------------------------------------------------------------
// @user-registry/client — typed client for the user registry HTTP API
// ---------------------------------------------------------------------------

export { RegistryClient, type RegistryClientOptions } from './client'
export { UsersApi, type User, type UserEndpoints } from './users'
export { HealthApi, type HealthStatus } from './health'
export { UserDbHelper, type StoredUser } from './db-helper'
export {
  ApiError,
  HttpTransport,
  DEFAULT_TIMEOUT_MS,
  type ApiResponse,
  type ErrorBody,
  type FetchFn,
  type TransportOptions,
} from './http'
