/**
 * Commands module - command definitions and the registry.
 */

export * from './types'
export * from './command-registry'
