// ---------------------------------------------------------------------------
// @user-registry/domain — public API
// ---------------------------------------------------------------------------

export * from './shared/types'
export * from './shared/errors'
export * from './user/index'
