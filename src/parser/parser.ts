// Core Parser class with cursor primitives and backtracking helpers.
// Grammar methods are added to the prototype by other modules (expressions.ts,
// types.ts, declarators.ts, declarations.ts, statements.ts).
//
// Every grammar method takes a token index and returns either a node with the
// index just past it, or a failure. Nothing advances a shared cursor, so
// trying another alternative after a failure needs no rollback.

import { TokenKind } from '../lexer/token'
import type { Token } from '../lexer/token'
import type { ParseNode } from '../ast/nodes'
import { spanOf } from '../ast/builders'
import type { NodeSpan } from '../ast/builders'
import type { ParseFailure } from '../errors'
import { noopLogger } from '../logger'
import type { Logger } from '../logger'

export type Failed = { ok: false; failure: ParseFailure }

export type Parsed<T = ParseNode> = { ok: true; node: T; pos: number } | Failed

export type ParsedList<T = ParseNode> = { ok: true; items: T[]; pos: number } | Failed

/** Result of a repetition: the items, and the failure that ended it. */
export type Repetition<T = ParseNode> =
  | { ok: true; items: T[]; pos: number; stop: ParseFailure | null }
  | Failed

export function success<T>(node: T, pos: number): Parsed<T> {
  return { ok: true, node, pos }
}

export function fail(failure: ParseFailure): Failed {
  return { ok: false, failure }
}

/** Failures no other alternative can get past. */
export function isFatal(failure: ParseFailure): boolean {
  return failure.code === 'NestingTooDeep' || failure.code === 'UnsupportedFeature'
}

/**
 * Failures that end ordered choice and separated lists: fatal ones, and a
 * rejected assignment or initializer whose operands both parsed. Repetition
 * still stops on the latter, so an unfinished translation unit reports it as
 * the cause.
 */
export function isCommitted(failure: ParseFailure): boolean {
  return isFatal(failure) || failure.code === 'IllegalAssignment'
}

export const DEFAULT_MAX_DEPTH = 256

export interface ParserOptions {
  /** Nested assignment, cast, unary, declarator, pointer, initializer and statement frames. Default: 256. */
  maxDepth?: number
  logger?: Logger
}

export class Parser {
  readonly tokens: readonly Token[]
  readonly maxDepth: number
  readonly logger: Logger
  private depth = 0
  // Unary expressions are re-parsed from the same position by the
  // assignment fallback; results depend only on the position.
  readonly unaryMemo = new Map<number, Parsed>()

  constructor(tokens: readonly Token[], options?: ParserOptions) {
    this.tokens = tokens
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH
    this.logger = options?.logger ?? noopLogger
  }

  // === cursor primitives ===

  atEnd(pos: number): boolean {
    return pos >= this.tokens.length
  }

  peek(pos: number): TokenKind | null {
    const token = this.tokens[pos]
    return token === undefined ? null : token.kind
  }

  at(pos: number, kind: TokenKind): boolean {
    return this.peek(pos) === kind
  }

  /** Check the token at `pos` without advancing. */
  expect(pos: number, kind: TokenKind): ParseFailure | null {
    const found = this.peek(pos)
    if (found === kind) return null
    return { code: 'UnexpectedToken', position: pos, expected: kind, found }
  }

  /** Name of the identifier at `pos`, or null. */
  identifierAt(pos: number): string | null {
    const token = this.tokens[pos]
    if (token === undefined || token.kind !== TokenKind.Identifier) return null
    return typeof token.value === 'string' ? token.value : null
  }

  noViable(pos: number, production: string): Failed {
    return fail({ code: 'NoViableAlternative', position: pos, production, found: this.peek(pos) })
  }

  /** Source span of tokens [from, to). */
  span(from: number, to: number): NodeSpan {
    return spanOf(this.tokens, from, to)
  }

  // === combinators ===

  /**
   * Ordered choice: the first alternative that succeeds wins. When all fail,
   * the last failure is returned.
   */
  firstOf<T>(pos: number, production: string, alternatives: ReadonlyArray<(pos: number) => Parsed<T>>): Parsed<T> {
    let last: Failed | null = null
    for (let i = 0; i < alternatives.length; i++) {
      const result = alternatives[i](pos)
      if (result.ok || isCommitted(result.failure)) return result
      this.logger.debug('%s: alternative %d failed at token %d (%s)', production, i, pos, result.failure.code)
      last = result
    }
    return last ?? this.noViable(pos, production)
  }

  /**
   * One or more items separated by `separator`. A separator not followed by
   * an item is left unconsumed.
   */
  separatedList<T>(pos: number, item: (pos: number) => Parsed<T>, separator = TokenKind.Comma): ParsedList<T> {
    const first = item(pos)
    if (!first.ok) return first
    const items = [first.node]
    let cur = first.pos
    while (this.at(cur, separator)) {
      const next = item(cur + 1)
      if (!next.ok) {
        if (isCommitted(next.failure)) return next
        break
      }
      items.push(next.node)
      cur = next.pos
    }
    return { ok: true, items, pos: cur }
  }

  /** Zero or more items; stops at the first failure. */
  repeat<T>(pos: number, item: (pos: number) => Parsed<T>): Repetition<T> {
    const items: T[] = []
    let cur = pos
    for (;;) {
      const next = item(cur)
      if (!next.ok) {
        if (isFatal(next.failure)) return next
        return { ok: true, items, pos: cur, stop: next.failure }
      }
      if (next.pos === cur) return { ok: true, items, pos: cur, stop: null }
      items.push(next.node)
      cur = next.pos
    }
  }

  /** Run a nested grammar frame, failing once maxDepth frames are open. */
  descend<T>(pos: number, body: () => Parsed<T>): Parsed<T> {
    if (this.depth >= this.maxDepth) {
      return fail({ code: 'NestingTooDeep', position: pos, limit: this.maxDepth })
    }
    this.depth++
    try {
      return body()
    } finally {
      this.depth--
    }
  }
}
