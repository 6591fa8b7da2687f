/**
 * Configuration module
 * Client options with Zod validation, environment loading, and error types
 */

export * from './errors'
export * from './environment'
export * from './schema'
