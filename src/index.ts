// Public API for the typed C11 parser.
// Usage: import { parse } from 'c11-typed-parser';

import { Scanner } from './lexer/scanner'
import type { Token } from './lexer/token'
import { Parser } from './parser/parser'
import type { ParserOptions } from './parser/parser'
import type * as AST from './ast/nodes'
import { normalizeAstLocations } from './ast/locations'
import { ParseError, describeFailure } from './errors'
import type { ParseFailure } from './errors'
import { noopLogger } from './logger'

// Import all parser extensions to register prototype methods
import './parser/expressions'
import './parser/types'
import './parser/statements'
import './parser/declarations'
import './parser/declarators'

export const DEFAULT_SOURCE_LABEL = '<input>'

export interface ParseOptions extends ParserOptions {
  // Compute loc { line, column } for each node. Default: false.
  loc?: boolean
  // Name of the source in messages. Default: '<input>'.
  sourceLabel?: string
}

export type ParseResult =
  | { ok: true; tree: AST.TranslationUnit }
  | { ok: false; failure: ParseFailure; message: string }

/**
 * Parse a token sequence into a typed translation unit. Never throws on bad
 * input: failures are returned with a rendered message.
 */
export function parseTokens(tokens: readonly Token[], sourceLabel: string, options?: ParserOptions): ParseResult {
  const logger = options?.logger ?? noopLogger
  logger.debug('parsing %s (%d tokens)', sourceLabel, tokens.length)
  const parser = new Parser(tokens, options)
  const result = parser.parseTranslationUnit(sourceLabel)
  if (!result.ok) {
    const message = describeFailure(result.failure)
    logger.warn('parse of %s failed: %s', sourceLabel, message)
    return { ok: false, failure: result.failure, message }
  }
  logger.debug('parsed %s: %d external declarations', sourceLabel, result.node.children.length)
  return { ok: true, tree: result.node }
}

/** Scan and parse C source text. Throws ParseError (or LexError from the scanner). */
export function parse(source: string, options?: ParseOptions): AST.TranslationUnit {
  const sourceLabel = options?.sourceLabel ?? DEFAULT_SOURCE_LABEL
  const includeLoc = options?.loc ?? false
  const tokens = new Scanner(source).scan()
  const result = parseTokens(tokens, sourceLabel, options)
  if (!result.ok) throw new ParseError(result.failure, sourceLabel)
  normalizeAstLocations(result.tree, source, includeLoc)
  return result.tree
}

export { formatTree } from './ast/printer'
export { Scanner } from './lexer/scanner'
export { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
export type { ParserOptions, Parsed } from './parser/parser'
export { TokenKind, tokenKindName } from './lexer/token'
export type { Token, StringEncoding } from './lexer/token'
export {
  typeOf,
  placeholder,
  pointerTo,
  arrayOf,
  functionReturning,
  tupleOf,
  noneType,
  applyDeclarator,
  formatType,
} from './sema/types'
export type { TypeExpression, BaseType, TypeTag, PrimitiveTag } from './sema/types'
export { castIsLegal, combineTypes, resolveImplicitConversion, typesEqual } from './sema/rules'
export type { TypeCombination } from './sema/rules'
export { ParseError, LexError, describeFailure } from './errors'
export type { ParseFailure, FailureCode } from './errors'
export type { Logger } from './logger'
export { noopLogger } from './logger'
export type * from './ast/nodes'
