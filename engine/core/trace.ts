/**
 * Trace Mode Module
 *
 * Captures how a password was put together: every placeholder, the
 * alternative that was chosen, qualifier rolls, modifier applications,
 * word-list lookups and backreference reads, arranged as a tree that
 * mirrors the inside-out resolution order.
 */

import type { ResolutionContext } from './context'

// ============================================================================
// Core Types
// ============================================================================

/**
 * A single traced operation. Nodes form a tree via `children`.
 */
export interface TraceNode {
  /** Unique ID for this node */
  id: string

  type: TraceNodeType

  /** Human-readable label for display */
  label: string

  /** Timestamp when this operation started (ms) */
  startTime: number

  /** Duration of this operation (ms) - computed at completion */
  duration?: number

  input: TraceInput

  output: TraceOutput

  children: TraceNode[]

  metadata?: TraceMetadata
}

export type TraceNodeType =
  | 'root' // One generate() call
  | 'attempt' // One resolution attempt
  | 'placeholder' // A {...} span
  | 'alternatives' // A|B|C choice
  | 'backreference' // {$W<n>} read
  | 'qualifier' // [N] percentage roll
  | 'modifier' // +name transform
  | 'builtin' // Builtin value dispatch
  | 'word_lookup' // Word-list collaborator call

export interface TraceInput {
  /** Raw input value/expression */
  raw: string
  /** Parsed form if different from raw */
  parsed?: unknown
}

export interface TraceOutput {
  value: string
  /** Error if the operation failed */
  error?: string
}

// ============================================================================
// Type-Specific Metadata
// ============================================================================

export type TraceMetadata =
  | PlaceholderMetadata
  | AlternativesMetadata
  | BackreferenceMetadata
  | QualifierMetadata
  | ModifierMetadata
  | WordLookupMetadata

export interface PlaceholderMetadata {
  type: 'placeholder'
  /** Backreference key the value was stored under */
  key: number
}

export interface AlternativesMetadata {
  type: 'alternatives'
  options: string[]
  chosen: string
}

export interface BackreferenceMetadata {
  type: 'backreference'
  key: number
  found: boolean
}

export interface QualifierMetadata {
  type: 'qualifier'
  /** Chance of keeping the value, 0-100 */
  percent: number
  /** The rand(99, 0) roll */
  roll: number
  kept: boolean
}

export interface ModifierMetadata {
  type: 'modifier'
  name: string
  params: string[]
}

export interface WordLookupMetadata {
  type: 'word_lookup'
  list: string
  found: boolean
}

// ============================================================================
// Trace Result
// ============================================================================

export interface GenerationTrace {
  root: TraceNode
  /** Total time for the generate() call (ms) */
  totalTime: number
  stats: TraceStats
}

export interface TraceStats {
  nodeCount: number
  maxDepth: number
  typeBreakdown: Partial<Record<TraceNodeType, number>>
  /** Modifier names in the order they were applied */
  modifiersApplied: string[]
  /** Distinct word lists that were consulted */
  wordlistsUsed: string[]
}

// ============================================================================
// Trace Context (shared by every attempt of one generate() call)
// ============================================================================

export interface TraceContext {
  enabled: boolean

  /** Stack of open nodes */
  nodeStack: TraceNode[]

  /** Counter for generating unique node IDs */
  idCounter: number

  startTime: number

  /** Saved so it can be extracted after the stack is empty */
  rootNode?: TraceNode
}

// ============================================================================
// Helper Functions
// ============================================================================

function activeTrace(ctx: ResolutionContext): TraceContext | undefined {
  return ctx.trace?.enabled ? ctx.trace : undefined
}

function createNode(
  trace: TraceContext,
  type: TraceNodeType,
  label: string,
  input: TraceInput,
  output: TraceOutput
): TraceNode {
  return {
    id: `trace-${trace.idCounter++}`,
    type,
    label,
    startTime: Date.now(),
    input,
    output,
    children: [],
  }
}

/**
 * Start a new trace node and push it onto the stack.
 * Returns the node if tracing is enabled, null otherwise.
 */
export function beginTraceNode(
  ctx: ResolutionContext,
  type: TraceNodeType,
  label: string,
  input: TraceInput
): TraceNode | null {
  const trace = activeTrace(ctx)
  if (!trace) return null

  const node = createNode(trace, type, label, input, { value: '' })

  const parent = trace.nodeStack[trace.nodeStack.length - 1]
  if (parent) {
    parent.children.push(node)
  } else {
    trace.rootNode = node
  }

  trace.nodeStack.push(node)
  return node
}

/**
 * Complete the innermost open node and pop it from the stack
 */
export function endTraceNode(
  ctx: ResolutionContext,
  output: TraceOutput,
  metadata?: TraceMetadata
): void {
  const trace = activeTrace(ctx)
  if (!trace) return

  const node = trace.nodeStack.pop()
  if (node) {
    node.duration = Date.now() - node.startTime
    node.output = output
    if (metadata) {
      node.metadata = metadata
    }
  }
}

/**
 * Add a leaf node under the innermost open node
 */
export function addTraceLeaf(
  ctx: ResolutionContext,
  type: TraceNodeType,
  label: string,
  input: TraceInput,
  output: TraceOutput,
  metadata?: TraceMetadata
): void {
  const trace = activeTrace(ctx)
  if (!trace) return

  const node = createNode(trace, type, label, input, output)
  node.duration = 0
  node.metadata = metadata

  const parent = trace.nodeStack[trace.nodeStack.length - 1]
  if (parent) {
    parent.children.push(node)
  }
}

/**
 * Close every node still open, marking it with the error that unwound it.
 * Used when an attempt fails part-way through a nested resolution.
 */
export function unwindTraceTo(ctx: ResolutionContext, node: TraceNode | null, error: string): void {
  const trace = activeTrace(ctx)
  if (!trace || !node) return

  while (trace.nodeStack.length > 0) {
    const top = trace.nodeStack[trace.nodeStack.length - 1]
    if (top === node) return
    endTraceNode(ctx, { value: '', error })
  }
}

export function createTraceContext(): TraceContext {
  return {
    enabled: true,
    nodeStack: [],
    idCounter: 0,
    startTime: Date.now(),
  }
}

/**
 * Extract the completed trace
 */
export function extractTrace(trace: TraceContext | undefined): GenerationTrace | undefined {
  if (!trace?.enabled || !trace.rootNode) {
    return undefined
  }

  const root = trace.rootNode
  return {
    root,
    totalTime: Date.now() - trace.startTime,
    stats: computeTraceStats(root),
  }
}

function computeTraceStats(root: TraceNode): TraceStats {
  const stats: TraceStats = {
    nodeCount: 0,
    maxDepth: 0,
    typeBreakdown: {},
    modifiersApplied: [],
    wordlistsUsed: [],
  }

  function traverse(node: TraceNode, depth: number): void {
    stats.nodeCount++
    stats.maxDepth = Math.max(stats.maxDepth, depth)
    stats.typeBreakdown[node.type] = (stats.typeBreakdown[node.type] ?? 0) + 1

    if (node.metadata?.type === 'modifier') {
      stats.modifiersApplied.push(node.metadata.name)
    }

    if (node.metadata?.type === 'word_lookup' && node.metadata.found) {
      stats.wordlistsUsed.push(node.metadata.list)
    }

    for (const child of node.children) {
      traverse(child, depth + 1)
    }
  }

  traverse(root, 0)

  stats.wordlistsUsed = [...new Set(stats.wordlistsUsed)]

  return stats
}

/**
 * Render a trace tree as indented text, one node per line
 */
export function formatTrace(trace: GenerationTrace): string {
  const lines: string[] = []

  function render(node: TraceNode, indent: string): void {
    const error = node.output.error ? ` (error: ${node.output.error})` : ''
    lines.push(`${indent}${node.label} => "${node.output.value}"${error}`)
    for (const child of node.children) {
      render(child, `${indent}  `)
    }
  }

  render(trace.root, '')
  return lines.join('\n')
}
