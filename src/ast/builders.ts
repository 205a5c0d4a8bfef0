// Helpers shared by every grammar module for node spans and list typing.

import type { Token } from '../lexer/token'
import { tupleOf } from '../sema/types'
import type { TypeExpression } from '../sema/types'
import type { ParseNode } from './nodes'

export interface NodeSpan {
  start: number
  end: number
}

/**
 * Source offsets covered by tokens [from, to). An empty range sits at the
 * start of token `from` (or the end of input).
 */
export function spanOf(tokens: readonly Token[], from: number, to: number): NodeSpan {
  const first = tokens[from]
  const last = tokens[to - 1]
  const tail = tokens[tokens.length - 1]
  const start = first !== undefined ? first.start : tail !== undefined ? tail.end : 0
  if (to <= from || last === undefined) return { start, end: start }
  return { start, end: last.end }
}

/** Type of a list node: its single element's type, or a tuple of them. */
export function listType(items: readonly ParseNode[]): TypeExpression {
  const [only] = items
  if (items.length === 1 && only !== undefined) return only.type
  return tupleOf(items.map((item) => item.type))
}

/** Element types of a list node built with listType. */
export function listElementTypes(node: ParseNode): readonly TypeExpression[] {
  if (node.children.length === 1) return [node.type]
  return node.type.children
}
