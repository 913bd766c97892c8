/**
 * Context Tests
 *
 * Backreference numbering and nesting depth tracking.
 */

import { describe, it, expect } from 'vitest'
import {
  createContext,
  recordBackreference,
  getBackreference,
  enterNesting,
  exitNesting,
} from './context'
import { createTraceContext } from './trace'
import type { GeneratorConfig } from '../types'

// ============================================================================
// Helper Functions
// ============================================================================

const defaultConfig: GeneratorConfig = {
  maxAttempts: 10,
  maxNestingDepth: 3,
}

// ============================================================================
// Context Creation Tests
// ============================================================================

describe('createContext', () => {
  it('should create context with default values', () => {
    const ctx = createContext(defaultConfig)

    expect(ctx.backreferences.size).toBe(0)
    expect(ctx.nextBackreferenceKey).toBe(1)
    expect(ctx.depth).toBe(0)
    expect(ctx.config).toBe(defaultConfig)
    expect(ctx.trace).toBeUndefined()
  })

  it('should keep a shared trace context', () => {
    const trace = createTraceContext()
    const ctx = createContext(defaultConfig, trace)
    expect(ctx.trace).toBe(trace)
  })

  it('should give every context its own store', () => {
    const first = createContext(defaultConfig)
    recordBackreference(first, 'alpha')

    const second = createContext(defaultConfig)
    expect(getBackreference(second, 1)).toBeUndefined()
  })
})

// ============================================================================
// Backreference Tests
// ============================================================================

describe('backreferences', () => {
  it('should number values from 1 in recording order', () => {
    const ctx = createContext(defaultConfig)

    expect(recordBackreference(ctx, 'alpha')).toBe(1)
    expect(recordBackreference(ctx, 'beta')).toBe(2)
    expect(getBackreference(ctx, 1)).toBe('alpha')
    expect(getBackreference(ctx, 2)).toBe('beta')
  })

  it('should store empty values under their own key', () => {
    const ctx = createContext(defaultConfig)

    recordBackreference(ctx, '')
    expect(recordBackreference(ctx, 'next')).toBe(2)
    expect(getBackreference(ctx, 1)).toBe('')
  })

  it('should return undefined for a missing key', () => {
    const ctx = createContext(defaultConfig)
    expect(getBackreference(ctx, 7)).toBeUndefined()
  })
})

// ============================================================================
// Nesting Tests
// ============================================================================

describe('nesting depth', () => {
  it('should allow nesting up to the configured depth', () => {
    const ctx = createContext(defaultConfig)

    expect(enterNesting(ctx)).toBe(true)
    expect(enterNesting(ctx)).toBe(true)
    expect(enterNesting(ctx)).toBe(true)
    expect(enterNesting(ctx)).toBe(false)
  })

  it('should decrement on exit and never go below zero', () => {
    const ctx = createContext(defaultConfig)

    enterNesting(ctx)
    exitNesting(ctx)
    exitNesting(ctx)
    expect(ctx.depth).toBe(0)
  })
})
