/**
 * Resolution Context
 *
 * State of a single generation attempt: the numbered backreference store,
 * the current nesting depth and the (optional) trace. A fresh context is
 * created for every attempt and discarded afterwards, so backreferences
 * never leak from a failed attempt into the next one.
 */

import type { GeneratorConfig } from '../types'
import type { TraceContext } from './trace'

// ============================================================================
// Types
// ============================================================================

export interface ResolutionContext {
  /** Resolved placeholder values keyed by resolution order, starting at 1 */
  backreferences: Map<number, string>

  /** Key the next resolved placeholder will be stored under */
  nextBackreferenceKey: number

  /** Current placeholder nesting depth */
  depth: number

  config: GeneratorConfig

  /** Optional trace context - shared by all attempts of one generate() call */
  trace?: TraceContext
}

// ============================================================================
// Context Factory
// ============================================================================

export function createContext(config: GeneratorConfig, trace?: TraceContext): ResolutionContext {
  return {
    backreferences: new Map(),
    nextBackreferenceKey: 1,
    depth: 0,
    config,
    trace,
  }
}

// ============================================================================
// Backreferences
// ============================================================================

/**
 * Store a resolved value under the next key and return that key
 */
export function recordBackreference(ctx: ResolutionContext, value: string): number {
  const key = ctx.nextBackreferenceKey++
  ctx.backreferences.set(key, value)
  return key
}

/**
 * Look up a stored value; undefined when nothing was stored under the key
 */
export function getBackreference(ctx: ResolutionContext, key: number): string | undefined {
  return ctx.backreferences.get(key)
}

// ============================================================================
// Nesting Depth
// ============================================================================

/**
 * Increment nesting depth and check limit
 * Returns true if within limit, false if exceeded
 */
export function enterNesting(ctx: ResolutionContext): boolean {
  ctx.depth++
  return ctx.depth <= ctx.config.maxNestingDepth
}

export function exitNesting(ctx: ResolutionContext): void {
  ctx.depth = Math.max(0, ctx.depth - 1)
}
