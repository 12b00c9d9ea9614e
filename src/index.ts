/**
 * psc-headers - Papyrus header stub generator
 *
 * Core exports:
 * - generate, processSource from './generator'
 * - parse, parseSource from './parser'
 * - renderHeader from './emitter'
 * - SourceUnit and config types from './types'
 */

export * from './archive'
export * from './config'
export * from './decompiler'
export * from './emitter'
export * from './errors'
export * from './generator'
export * from './io'
export * from './logger'
export * from './options'
export * from './parser'
export * from './scanner'
export * from './types'
