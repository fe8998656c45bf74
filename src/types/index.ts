/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './config'
export * from './flow'
export * from './geo'
