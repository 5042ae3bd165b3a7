// ---------------------------------------------------------------------------
// User module
// The User entity, its validators, and the policy that governs writes to it.
// ---------------------------------------------------------------------------

export * from './national-id'
export * from './phone'
export * from './record'
export * from './store'
export * from './memory-store'
export * from './policy'
