// Failure taxonomy shared by the scanner, the grammar and the driver.
//
// Grammar methods return failures as values; only the text-level `parse()`
// and the scanner throw.

import { TokenKind, tokenKindName } from './lexer/token'
import { formatType } from './sema/types'
import type { TypeExpression } from './sema/types'

export interface PlainFailure<T extends string> {
  code: T
  /** Index of the token where the failure was detected. */
  position: number
}

export interface TokenFailure<T extends string> extends PlainFailure<T> {
  /** Kind of the offending token, or null past the end of input. */
  found: TokenKind | null
}

export type PositionOutOfRange = PlainFailure<'PositionOutOfRange'>
export type UnexpectedToken = TokenFailure<'UnexpectedToken'> & { expected: TokenKind }
export type NoViableAlternative = TokenFailure<'NoViableAlternative'> & { production: string }
export type IllegalTypeCombination = PlainFailure<'IllegalTypeCombination'> & {
  left: TypeExpression
  right: TypeExpression
  operator: string
}
export type IllegalCast = PlainFailure<'IllegalCast'> & { from: TypeExpression; to: TypeExpression }
export type IllegalAssignment = PlainFailure<'IllegalAssignment'> & {
  target: TypeExpression
  value: TypeExpression
}
export type InvalidCondition = PlainFailure<'InvalidCondition'> & { condition: TypeExpression }
export type BranchTypeMismatch = PlainFailure<'BranchTypeMismatch'> & {
  whenTrue: TypeExpression
  whenFalse: TypeExpression
}
export type ConflictingSpecifiers = PlainFailure<'ConflictingSpecifiers'>
export type NoGenericMatch = PlainFailure<'NoGenericMatch'> & { controlling: TypeExpression }
export type UnsupportedFeature = PlainFailure<'UnsupportedFeature'> & { feature: string }
export type NestingTooDeep = PlainFailure<'NestingTooDeep'> & { limit: number }
export type IncompleteParse = PlainFailure<'IncompleteParse'> & {
  sourceLabel: string
  cause: ParseFailure | null
}

export type ParseFailure =
  | PositionOutOfRange
  | UnexpectedToken
  | NoViableAlternative
  | IllegalTypeCombination
  | IllegalCast
  | IllegalAssignment
  | InvalidCondition
  | BranchTypeMismatch
  | ConflictingSpecifiers
  | NoGenericMatch
  | UnsupportedFeature
  | NestingTooDeep
  | IncompleteParse

export type FailureCode = ParseFailure['code']

function spellFound(found: TokenKind | null): string {
  return found === null ? 'end of input' : tokenKindName(found)
}

export function describeFailure(failure: ParseFailure): string {
  switch (failure.code) {
    case 'PositionOutOfRange':
      return `Position ${failure.position} is out of range`
    case 'UnexpectedToken':
      return `Expected ${tokenKindName(failure.expected)} but found ${spellFound(failure.found)} at token ${failure.position}`
    case 'NoViableAlternative':
      return `No viable alternative for ${failure.production} at token ${failure.position} (found ${spellFound(failure.found)})`
    case 'IllegalTypeCombination':
      return `Operator '${failure.operator}' cannot combine ${formatType(failure.left)} and ${formatType(failure.right)}`
    case 'IllegalCast':
      return `Cannot cast ${formatType(failure.from)} to ${formatType(failure.to)}`
    case 'IllegalAssignment':
      return `Cannot assign ${formatType(failure.value)} to ${formatType(failure.target)}`
    case 'InvalidCondition':
      return `Condition of type ${formatType(failure.condition)} is not an integer type`
    case 'BranchTypeMismatch':
      return `Conditional branches differ: ${formatType(failure.whenTrue)} vs ${formatType(failure.whenFalse)}`
    case 'ConflictingSpecifiers':
      return `Conflicting type specifiers at token ${failure.position}`
    case 'NoGenericMatch':
      return `No _Generic association matches ${formatType(failure.controlling)}`
    case 'UnsupportedFeature':
      return `${failure.feature} is not supported`
    case 'NestingTooDeep':
      return `Nesting deeper than ${failure.limit} levels at token ${failure.position}`
    case 'IncompleteParse':
      return `Parser did not consume all tokens of ${failure.sourceLabel}`
  }
}

export class ParseError extends Error {
  readonly failure: ParseFailure
  readonly sourceLabel: string

  constructor(failure: ParseFailure, sourceLabel: string) {
    super(describeFailure(failure))
    this.name = 'ParseError'
    this.failure = failure
    this.sourceLabel = sourceLabel
  }
}

export class LexError extends Error {
  /** Source offset of the offending character. */
  readonly offset: number

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`)
    this.name = 'LexError'
    this.offset = offset
  }
}
