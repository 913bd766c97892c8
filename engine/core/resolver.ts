/**
 * Pattern Resolver
 *
 * Walks an escaped pattern left to right and replaces every `{...}` span
 * with its value. Inner spans resolve before the span around them, so the
 * content of a placeholder is already free of placeholders when it is
 * parsed. After the closing brace an optional `[N]` qualifier and any
 * number of `+modifier` suffixes are applied, and the final value is
 * stored as the next backreference.
 *
 * Values flowing through the resolver stay escaped: reserved characters
 * inside generated text are sentinel tokens until the session unescapes
 * the finished result.
 */

import { ok, err } from '../types'
import type { Collaborators, ModifierSpec, Result } from '../types'
import {
  findClosingBrace,
  scanModifierEnd,
  parseInteger,
  parseModifierSpec,
  parsePlaceholderContent,
  parseBackreference,
} from './parser'
import { escapeValue, unescape } from './escaper'
import {
  recordBackreference,
  getBackreference,
  enterNesting,
  exitNesting,
  type ResolutionContext,
} from './context'
import { beginTraceNode, endTraceNode, addTraceLeaf } from './trace'
import { resolveBuiltin } from '../builtins'
import { applyModifier } from '../modifiers'
import { rand, pickOne } from '../random'

// ============================================================================
// Types
// ============================================================================

interface ResolvedSpan {
  /** Escaped value of the span */
  value: string
  /** Index just past the span and its suffixes */
  end: number
}

// ============================================================================
// Resolver
// ============================================================================

export class PatternResolver {
  private collaborators: Collaborators

  constructor(collaborators: Collaborators) {
    this.collaborators = collaborators
  }

  /**
   * Resolve every placeholder in an escaped pattern.
   * An unmatched `{` is copied to the output as a literal character.
   */
  resolvePattern(text: string, ctx: ResolutionContext): Result<string> {
    let output = ''
    let i = 0

    while (i < text.length) {
      const open = text.indexOf('{', i)
      if (open === -1) {
        output += text.slice(i)
        break
      }

      output += text.slice(i, open)

      const close = findClosingBrace(text, open)
      if (close === -1) {
        output += '{'
        i = open + 1
        continue
      }

      const span = this.resolveSpan(text, open, close, ctx)
      if (!span.ok) return span

      output += span.value.value
      i = span.value.end
    }

    return ok(output)
  }

  // ==========================================================================
  // Spans
  // ==========================================================================

  private resolveSpan(
    text: string,
    open: number,
    close: number,
    ctx: ResolutionContext
  ): Result<ResolvedSpan> {
    const content = text.slice(open + 1, close)
    beginTraceNode(ctx, 'placeholder', `{${unescape(content)}}`, { raw: content })

    const processed = this.resolveNested(content, ctx)
    if (!processed.ok) return processed

    const resolved = this.resolveContent(processed.value, ctx)
    if (!resolved.ok) return resolved

    let value = resolved.value
    let end = close + 1

    // }[N]
    if (text[end] === '[') {
      const qualifierEnd = text.indexOf(']', end)
      if (qualifierEnd !== -1) {
        const percent = parseInteger(text.slice(end + 1, qualifierEnd))
        if (percent !== undefined && !this.rollQualifier(percent, ctx)) {
          value = ''
        }
        end = qualifierEnd + 1
      }
    }

    // }+name(params)[N]+...
    while (text[end] === '+') {
      const modifierEnd = scanModifierEnd(text, end + 1)
      const spec = text.slice(end + 1, modifierEnd)
      end = modifierEnd

      if (!spec) continue

      const parsed = parseModifierSpec(spec)
      const params = this.resolveParams(parsed.params, ctx)
      if (!params.ok) return params

      const modified = this.applyModifierSpec(value, { ...parsed, params: params.value }, ctx)
      if (!modified.ok) return modified
      value = modified.value
    }

    const key = recordBackreference(ctx, value)
    endTraceNode(ctx, { value: unescape(value) }, { type: 'placeholder', key })

    return ok({ value, end })
  }

  /**
   * Resolve the placeholders inside a span's content, parameter or chosen
   * alternative one nesting level deeper
   */
  private resolveNested(text: string, ctx: ResolutionContext): Result<string> {
    if (!enterNesting(ctx)) {
      exitNesting(ctx)
      return err('TOO_DEEPLY_NESTED', `Pattern is nested deeper than ${ctx.config.maxNestingDepth} levels`)
    }

    const result = this.resolvePattern(text, ctx)
    exitNesting(ctx)
    return result
  }

  /**
   * Resolve placeholders inside post-brace modifier parameters. Each value is
   * passed on as produced, without further splitting or trimming.
   */
  private resolveParams(params: string[], ctx: ResolutionContext): Result<string[]> {
    const resolved: string[] = []
    for (const param of params) {
      if (!param.includes('{')) {
        resolved.push(param)
        continue
      }
      const result = this.resolveNested(param, ctx)
      if (!result.ok) return result
      resolved.push(result.value)
    }
    return ok(resolved)
  }

  // ==========================================================================
  // Content
  // ==========================================================================

  private resolveContent(content: string, ctx: ResolutionContext): Result<string> {
    const key = parseBackreference(content)
    if (key !== undefined) {
      const stored = getBackreference(ctx, key)
      addTraceLeaf(
        ctx,
        'backreference',
        `$W${key}`,
        { raw: content },
        { value: unescape(stored ?? '') },
        { type: 'backreference', key, found: stored !== undefined }
      )
      return ok(stored ?? '')
    }

    const parsed = parsePlaceholderContent(content)

    if (parsed.alternatives) {
      const chosen = pickOne(parsed.alternatives, 1, '|')
      addTraceLeaf(
        ctx,
        'alternatives',
        `Choose from ${parsed.alternatives.length} options`,
        { raw: content },
        { value: unescape(chosen) },
        { type: 'alternatives', options: parsed.alternatives, chosen }
      )
      return chosen.includes('{') ? this.resolveNested(chosen, ctx) : ok(chosen)
    }

    if (parsed.qualifier !== undefined && !this.rollQualifier(parsed.qualifier, ctx)) {
      return ok('')
    }

    // Literal grouping: the (already resolved) content is the value
    if (parsed.literal) {
      return ok(parsed.qualifier !== undefined ? content.replace(/\[\d+\]/g, '') : content)
    }

    const base = this.resolveBuiltinValue(parsed.name, parsed.params.map(unescape), ctx)
    if (!base.ok) return base

    let value = escapeValue(base.value)
    for (const spec of parsed.modifiers) {
      const modified = this.applyModifierSpec(value, spec, ctx)
      if (!modified.ok) return modified
      value = modified.value
    }

    return ok(value)
  }

  private resolveBuiltinValue(name: string, params: string[], ctx: ResolutionContext): Result<string> {
    beginTraceNode(ctx, 'builtin', params.length > 0 ? `${name}(${params.join(', ')})` : name, {
      raw: name,
      parsed: params,
    })

    const result = resolveBuiltin(name, params, {
      lookupWord: (list) => this.lookupWord(list, ctx),
      pronounceableWord: () => this.collaborators.pronounceableWord(),
    })

    endTraceNode(ctx, result.ok ? { value: result.value } : { value: '', error: result.error.message })
    return result
  }

  private lookupWord(list: string, ctx: ResolutionContext): string | undefined {
    const word = this.collaborators.lookupWord(list)
    addTraceLeaf(
      ctx,
      'word_lookup',
      `Word list: ${list}`,
      { raw: list },
      { value: word ?? '' },
      { type: 'word_lookup', list, found: word !== undefined }
    )
    return word
  }

  // ==========================================================================
  // Modifiers & Qualifiers
  // ==========================================================================

  /**
   * Apply one modifier to an escaped value. A failed qualifier leaves the
   * value unchanged and the chain continues.
   */
  private applyModifierSpec(value: string, spec: ModifierSpec, ctx: ResolutionContext): Result<string> {
    const params = spec.params.map(unescape)

    if (spec.qualifier !== undefined && !this.rollQualifier(spec.qualifier, ctx)) {
      return ok(value)
    }

    const input = unescape(value)
    const result = applyModifier(input, spec.name, params, {
      numberToWords: (text) => this.collaborators.numberToWords(text),
    })

    addTraceLeaf(
      ctx,
      'modifier',
      `+${spec.name}`,
      { raw: input, parsed: params },
      result.ok ? { value: result.value } : { value: '', error: result.error.message },
      { type: 'modifier', name: spec.name, params }
    )

    if (!result.ok) return result
    return ok(escapeValue(result.value))
  }

  /**
   * Roll rand(99, 0) against a percentage; true means keep/apply
   */
  private rollQualifier(percent: number, ctx: ResolutionContext): boolean {
    const roll = rand(99, 0)
    const kept = roll < percent
    addTraceLeaf(
      ctx,
      'qualifier',
      `[${percent}]`,
      { raw: String(percent) },
      { value: kept ? 'kept' : 'dropped' },
      { type: 'qualifier', percent, roll, kept }
    )
    return kept
  }
}
