// Expression parsing: a precedence cascade from comma expression down to primary.
//
// Call hierarchy (loosest to tightest binding):
//   parseExpression -> parseAssignmentExpression -> parseConditionalExpression
//   -> parseBinary(LogicalOr) -> ... -> parseBinary(Multiplicative)
//   -> parseCastExpression -> parseUnaryExpression -> parsePostfixExpression
//   -> parsePrimaryExpression
//
// Every node is typed as it is built; a type the oracle rejects fails the
// parse on the spot.

import { Parser, success, fail } from './parser'
import type { Parsed } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import { listType } from '../ast/builders'
import {
  typeOf,
  placeholder,
  pointerTo,
  arrayOf,
  hasTag,
} from '../sema/types'
import type { TypeExpression, PrimitiveTag } from '../sema/types'
import {
  combineTypes,
  castIsLegal,
  resolveImplicitConversion,
  typesEqual,
  baseTypeOf,
} from '../sema/rules'

// C operator precedence levels (loosest to tightest binding).
const enum PrecedenceLevel {
  LogicalOr,
  LogicalAnd,
  BitwiseOr,
  BitwiseXor,
  BitwiseAnd,
  Equality,
  Relational,
  Shift,
  Additive,
  Multiplicative,
}

// Types a `?:` condition may have.
const CONDITION_TAGS: readonly PrimitiveTag[] = ['Int', 'Bool', 'Long', 'Signed', 'Unsigned', 'Char']

// `__func__` is not resolved to the enclosing function's name.
const FUNC_NAME_PLACEHOLDER = '__func_name__'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseExpression(pos: number): Parsed
    parseAssignmentExpression(pos: number): Parsed
    parseConditionalExpression(pos: number): Parsed
    parseConstantExpression(pos: number): Parsed
    parseCastExpression(pos: number): Parsed
    parseUnaryExpression(pos: number): Parsed
    parsePostfixExpression(pos: number): Parsed
    parsePrimaryExpression(pos: number): Parsed
    parseArgumentList(pos: number): Parsed<AST.ArgumentList>
    parseGenericSelection(pos: number): Parsed<AST.GenericSelection>
    parseCompoundLiteral(pos: number): Parsed<AST.CompoundLiteral>
  }
}

// === parseExpression ===
// Comma expression. A single assignment-expression is returned as is.
Parser.prototype.parseExpression = function (this: Parser, pos: number): Parsed {
  const list = this.separatedList(pos, (p) => this.parseAssignmentExpression(p))
  if (!list.ok) return list
  const { items } = list
  const last = items[items.length - 1]
  if (items.length === 1) return success(last, list.pos)
  const node: AST.CommaExpression = {
    kind: 'CommaExpression',
    children: items,
    type: last.type,
    ...this.span(pos, list.pos),
  }
  return success(node, list.pos)
}

// === parseAssignmentExpression ===
Parser.prototype.parseAssignmentExpression = function (this: Parser, pos: number): Parsed {
  return this.descend(pos, () =>
    this.firstOf<AST.ParseNode>(pos, 'assignment-expression', [
      (p) => parseAssignment.call(this, p),
      (p) => this.parseConditionalExpression(p),
    ]),
  )
}

function assignmentOperator(kind: TokenKind | null): AST.AssignmentOperator | null {
  switch (kind) {
    case TokenKind.Assign:
      return '='
    case TokenKind.StarAssign:
      return '*='
    case TokenKind.SlashAssign:
      return '/='
    case TokenKind.PercentAssign:
      return '%='
    case TokenKind.PlusAssign:
      return '+='
    case TokenKind.MinusAssign:
      return '-='
    case TokenKind.LessLessAssign:
      return '<<='
    case TokenKind.GreaterGreaterAssign:
      return '>>='
    case TokenKind.AmpAssign:
      return '&='
    case TokenKind.CaretAssign:
      return '^='
    case TokenKind.PipeAssign:
      return '|='
    default:
      return null
  }
}

// unary-expression assignment-operator assignment-expression
function parseAssignment(this: Parser, pos: number): Parsed {
  const target = this.parseUnaryExpression(pos)
  if (!target.ok) return target
  const opPos = target.pos
  const op = assignmentOperator(this.peek(opPos))
  if (op === null) {
    return fail({ code: 'UnexpectedToken', position: opPos, expected: TokenKind.Assign, found: this.peek(opPos) })
  }
  const value = this.parseAssignmentExpression(opPos + 1)
  if (!value.ok) return value

  const left = target.node.type
  const right = value.node.type
  const type = resolveImplicitConversion(left, right)
  if (type === null) {
    return fail({ code: 'IllegalAssignment', position: opPos, target: left, value: right })
  }
  const node: AST.AssignmentExpression = {
    kind: 'AssignmentExpression',
    operator: op,
    children: [target.node, value.node],
    type,
    ...this.span(pos, value.pos),
  }
  return success(node, value.pos)
}

// === parseConditionalExpression ===
Parser.prototype.parseConditionalExpression = function (this: Parser, pos: number): Parsed {
  const cond = parseBinary.call(this, PrecedenceLevel.LogicalOr, pos)
  if (!cond.ok || !this.at(cond.pos, TokenKind.Question)) return cond

  const condition = cond.node.type
  if (!CONDITION_TAGS.some((tag) => typesEqual(baseTypeOf(condition), typeOf(tag)))) {
    return fail({ code: 'InvalidCondition', position: cond.pos, condition })
  }
  const whenTrue = this.parseExpression(cond.pos + 1)
  if (!whenTrue.ok) return whenTrue
  const colon = this.expect(whenTrue.pos, TokenKind.Colon)
  if (colon !== null) return fail(colon)
  const whenFalse = this.parseConditionalExpression(whenTrue.pos + 1)
  if (!whenFalse.ok) return whenFalse

  if (!typesEqual(whenTrue.node.type, whenFalse.node.type)) {
    return fail({
      code: 'BranchTypeMismatch',
      position: whenTrue.pos,
      whenTrue: whenTrue.node.type,
      whenFalse: whenFalse.node.type,
    })
  }
  const node: AST.ConditionalExpression = {
    kind: 'ConditionalExpression',
    children: [cond.node, whenTrue.node, whenFalse.node],
    type: whenFalse.node.type,
    ...this.span(pos, whenFalse.pos),
  }
  return success(node, whenFalse.pos)
}

// === parseConstantExpression ===
Parser.prototype.parseConstantExpression = function (this: Parser, pos: number): Parsed {
  return this.parseConditionalExpression(pos)
}

// === parseBinary (module-private) ===
// One cascade level: operand (op operand)*, folded to the left.

function binaryOperator(level: PrecedenceLevel, kind: TokenKind | null): AST.BinaryOperator | null {
  switch (level) {
    case PrecedenceLevel.LogicalOr:
      return kind === TokenKind.PipePipe ? '||' : null
    case PrecedenceLevel.LogicalAnd:
      return kind === TokenKind.AmpAmp ? '&&' : null
    case PrecedenceLevel.BitwiseOr:
      return kind === TokenKind.Pipe ? '|' : null
    case PrecedenceLevel.BitwiseXor:
      return kind === TokenKind.Caret ? '^' : null
    case PrecedenceLevel.BitwiseAnd:
      return kind === TokenKind.Amp ? '&' : null
    case PrecedenceLevel.Equality:
      if (kind === TokenKind.EqualEqual) return '=='
      if (kind === TokenKind.BangEqual) return '!='
      return null
    case PrecedenceLevel.Relational:
      if (kind === TokenKind.Less) return '<'
      if (kind === TokenKind.Greater) return '>'
      if (kind === TokenKind.LessEqual) return '<='
      if (kind === TokenKind.GreaterEqual) return '>='
      return null
    case PrecedenceLevel.Shift:
      if (kind === TokenKind.LessLess) return '<<'
      if (kind === TokenKind.GreaterGreater) return '>>'
      return null
    case PrecedenceLevel.Additive:
      if (kind === TokenKind.Plus) return '+'
      if (kind === TokenKind.Minus) return '-'
      return null
    case PrecedenceLevel.Multiplicative:
      if (kind === TokenKind.Star) return '*'
      if (kind === TokenKind.Slash) return '/'
      if (kind === TokenKind.Percent) return '%'
      return null
  }
}

function parseOperand(this: Parser, level: PrecedenceLevel, pos: number): Parsed {
  if (level === PrecedenceLevel.Multiplicative) return this.parseCastExpression(pos)
  return parseBinary.call(this, level + 1, pos)
}

function parseBinary(this: Parser, level: PrecedenceLevel, pos: number): Parsed {
  const first = parseOperand.call(this, level, pos)
  if (!first.ok) return first
  let left = first.node
  let cur = first.pos

  for (;;) {
    const op = binaryOperator(level, this.peek(cur))
    if (op === null) break
    const right = parseOperand.call(this, level, cur + 1)
    if (!right.ok) return right
    const combined = combineTypes(left.type, right.node.type, op)
    if (!combined.accepted) {
      return fail({
        code: 'IllegalTypeCombination',
        position: cur,
        left: left.type,
        right: right.node.type,
        operator: op,
      })
    }
    const node: AST.BinaryExpression = {
      kind: 'BinaryExpression',
      operator: op,
      children: [left, right.node],
      type: combined.type,
      ...this.span(pos, right.pos),
    }
    left = node
    cur = right.pos
  }
  return success(left, cur)
}

// === parseCastExpression ===
Parser.prototype.parseCastExpression = function (this: Parser, pos: number): Parsed {
  return this.descend(pos, () => {
    if (!this.at(pos, TokenKind.LParen)) return this.parseUnaryExpression(pos)
    return this.firstOf<AST.ParseNode>(pos, 'cast-expression', [
      (p) => this.parseUnaryExpression(p),
      (p) => parseCast.call(this, p),
    ])
  })
}

// ( type-name ) cast-expression
function parseCast(this: Parser, pos: number): Parsed {
  const typeName = parseParenthesizedTypeName.call(this, pos)
  if (!typeName.ok) return typeName
  const operand = this.parseCastExpression(typeName.pos)
  if (!operand.ok) return operand
  const to = typeName.node.type
  const from = operand.node.type
  if (!castIsLegal(to, from)) {
    return fail({ code: 'IllegalCast', position: pos, from, to })
  }
  const node: AST.CastExpression = {
    kind: 'CastExpression',
    children: [typeName.node, operand.node],
    type: to,
    ...this.span(pos, operand.pos),
  }
  return success(node, operand.pos)
}

// ( type-name ), positioned after the closing parenthesis.
function parseParenthesizedTypeName(this: Parser, pos: number): Parsed<AST.TypeName> {
  const open = this.expect(pos, TokenKind.LParen)
  if (open !== null) return fail(open)
  const typeName = this.parseTypeName(pos + 1)
  if (!typeName.ok) return typeName
  const close = this.expect(typeName.pos, TokenKind.RParen)
  if (close !== null) return fail(close)
  return success(typeName.node, typeName.pos + 1)
}

// === parseUnaryExpression ===
Parser.prototype.parseUnaryExpression = function (this: Parser, pos: number): Parsed {
  const cached = this.unaryMemo.get(pos)
  if (cached !== undefined) return cached
  const result = this.descend(pos, () => parseUnary.call(this, pos))
  this.unaryMemo.set(pos, result)
  return result
}

function prefixOperator(kind: TokenKind | null): AST.UnaryOperator | null {
  switch (kind) {
    case TokenKind.Amp:
      return '&'
    case TokenKind.Star:
      return '*'
    case TokenKind.Plus:
      return '+'
    case TokenKind.Minus:
      return '-'
    case TokenKind.Tilde:
      return '~'
    case TokenKind.Bang:
      return '!'
    default:
      return null
  }
}

function unaryType(op: AST.UnaryOperator, operand: TypeExpression): TypeExpression {
  switch (op) {
    case '&':
      return pointerTo(operand)
    case '*':
      // Dereference is not resolved to the pointee; callers cast the result.
      return typeOf('Pointer', [], [{ tag: 'VoidPointer' }])
    case 'sizeof':
    case '_Alignof':
      return typeOf('SizeT')
    default:
      return operand
  }
}

function unaryNode(
  this: Parser,
  op: AST.UnaryOperator,
  operand: AST.ParseNode,
  from: number,
  to: number,
): AST.UnaryExpression {
  return {
    kind: 'UnaryExpression',
    operator: op,
    children: [operand],
    type: unaryType(op, operand.type),
    ...this.span(from, to),
  }
}

function parseUnary(this: Parser, pos: number): Parsed {
  const kind = this.peek(pos)
  switch (kind) {
    case TokenKind.PlusPlus:
    case TokenKind.MinusMinus: {
      const operand = this.parseUnaryExpression(pos + 1)
      if (!operand.ok) return operand
      const op = kind === TokenKind.PlusPlus ? '++' : '--'
      return success(unaryNode.call(this, op, operand.node, pos, operand.pos), operand.pos)
    }
    case TokenKind.Sizeof:
      return this.firstOf<AST.ParseNode>(pos, 'sizeof', [
        (p) => parseSizeofType.call(this, p, 'sizeof'),
        (p) => {
          const operand = this.parseUnaryExpression(p + 1)
          if (!operand.ok) return operand
          return success(unaryNode.call(this, 'sizeof', operand.node, p, operand.pos), operand.pos)
        },
      ])
    case TokenKind.Alignof:
      return parseSizeofType.call(this, pos, '_Alignof')
    default: {
      const op = prefixOperator(kind)
      if (op === null) return this.parsePostfixExpression(pos)
      const operand = this.parseCastExpression(pos + 1)
      if (!operand.ok) return operand
      return success(unaryNode.call(this, op, operand.node, pos, operand.pos), operand.pos)
    }
  }
}

// sizeof ( type-name ) and _Alignof ( type-name )
function parseSizeofType(this: Parser, pos: number, op: 'sizeof' | '_Alignof'): Parsed {
  const typeName = parseParenthesizedTypeName.call(this, pos + 1)
  if (!typeName.ok) return typeName
  return success(unaryNode.call(this, op, typeName.node, pos, typeName.pos), typeName.pos)
}

// === parsePostfixExpression ===
Parser.prototype.parsePostfixExpression = function (this: Parser, pos: number): Parsed {
  const head = this.at(pos, TokenKind.LParen)
    ? this.firstOf<AST.ParseNode>(pos, 'postfix-expression', [
        (p) => this.parseCompoundLiteral(p),
        (p) => this.parsePrimaryExpression(p),
      ])
    : this.parsePrimaryExpression(pos)
  if (!head.ok) return head

  let expr = head.node
  let cur = head.pos
  for (;;) {
    const suffix = parsePostfixSuffix.call(this, expr, pos, cur)
    if (suffix === null) break
    if (!suffix.ok) return suffix
    expr = suffix.node
    cur = suffix.pos
  }
  return success(expr, cur)
}

function elementType(base: TypeExpression): TypeExpression {
  const [element] = base.children
  if ((hasTag(base, 'Array') || hasTag(base, 'Pointer')) && element !== undefined) return element
  return base
}

function returnType(callee: TypeExpression): TypeExpression {
  const [first] = callee.children
  if (hasTag(callee, 'Function') && first !== undefined) return first
  if (hasTag(callee, 'Pointer') && first !== undefined && hasTag(first, 'Function')) {
    const [returns] = first.children
    if (returns !== undefined) return returns
  }
  return callee
}

// One postfix suffix applied to `expr`, or null when none follows.
function parsePostfixSuffix(this: Parser, expr: AST.ParseNode, from: number, pos: number): Parsed | null {
  switch (this.peek(pos)) {
    case TokenKind.LBracket: {
      const index = this.parseExpression(pos + 1)
      if (!index.ok) return index
      const close = this.expect(index.pos, TokenKind.RBracket)
      if (close !== null) return fail(close)
      const node: AST.Subscript = {
        kind: 'Subscript',
        children: [expr, index.node],
        type: elementType(expr.type),
        ...this.span(from, index.pos + 1),
      }
      return success(node, index.pos + 1)
    }
    case TokenKind.LParen: {
      let cur = pos + 1
      const children: AST.ParseNode[] = [expr]
      if (!this.at(cur, TokenKind.RParen)) {
        const args = this.parseArgumentList(cur)
        if (!args.ok) return args
        children.push(args.node)
        cur = args.pos
      }
      const close = this.expect(cur, TokenKind.RParen)
      if (close !== null) return fail(close)
      const node: AST.Call = {
        kind: 'Call',
        children,
        type: returnType(expr.type),
        ...this.span(from, cur + 1),
      }
      return success(node, cur + 1)
    }
    case TokenKind.Dot:
    case TokenKind.Arrow: {
      const member = this.identifierAt(pos + 1)
      if (member === null) {
        return fail({ code: 'UnexpectedToken', position: pos + 1, expected: TokenKind.Identifier, found: this.peek(pos + 1) })
      }
      const node: AST.MemberAccess = {
        kind: 'MemberAccess',
        member,
        arrow: this.at(pos, TokenKind.Arrow),
        children: [expr],
        type: placeholder(member),
        ...this.span(from, pos + 2),
      }
      return success(node, pos + 2)
    }
    case TokenKind.PlusPlus:
    case TokenKind.MinusMinus: {
      const node: AST.PostfixIncDec = {
        kind: 'PostfixIncDec',
        operator: this.at(pos, TokenKind.PlusPlus) ? '++' : '--',
        children: [expr],
        type: expr.type,
        ...this.span(from, pos + 1),
      }
      return success(node, pos + 1)
    }
    default:
      return null
  }
}

// === parseArgumentList ===
Parser.prototype.parseArgumentList = function (this: Parser, pos: number): Parsed<AST.ArgumentList> {
  const list = this.separatedList(pos, (p) => this.parseAssignmentExpression(p))
  if (!list.ok) return list
  return success<AST.ArgumentList>(
    { kind: 'ArgumentList', children: list.items, type: listType(list.items), ...this.span(pos, list.pos) },
    list.pos,
  )
}

// === parseCompoundLiteral ===
// ( type-name ) { initializer-list ,opt }
Parser.prototype.parseCompoundLiteral = function (this: Parser, pos: number): Parsed<AST.CompoundLiteral> {
  const typeName = parseParenthesizedTypeName.call(this, pos)
  if (!typeName.ok) return typeName
  const init = this.parseBracedInitializer(typeName.pos)
  if (!init.ok) return init
  const node: AST.CompoundLiteral = {
    kind: 'CompoundLiteral',
    children: [typeName.node, init.node],
    type: typeName.node.type,
    ...this.span(pos, init.pos),
  }
  return success(node, init.pos)
}

// === parsePrimaryExpression ===
Parser.prototype.parsePrimaryExpression = function (this: Parser, pos: number): Parsed {
  const token = this.tokens[pos]
  if (token === undefined) return this.noViable(pos, 'primary-expression')

  switch (token.kind) {
    case TokenKind.Identifier: {
      const name = this.identifierAt(pos) ?? ''
      const node: AST.Identifier = {
        kind: 'Identifier',
        name,
        children: [],
        type: placeholder(name),
        ...this.span(pos, pos + 1),
      }
      return success(node, pos + 1)
    }
    case TokenKind.IntConstant:
    case TokenKind.FloatConstant: {
      const floating = token.kind === TokenKind.FloatConstant
      const node: AST.Constant = {
        kind: 'Constant',
        value: token.bigValue ?? (typeof token.value === 'number' ? token.value : 0),
        floating,
        children: [],
        type: typeOf(floating ? 'Double' : 'Long'),
        ...this.span(pos, pos + 1),
      }
      return success(node, pos + 1)
    }
    case TokenKind.StringLiteral:
      return parseStringLiterals.call(this, pos)
    case TokenKind.FuncName: {
      const node: AST.StringLiteral = {
        kind: 'StringLiteral',
        value: FUNC_NAME_PLACEHOLDER,
        encoding: 'none',
        children: [],
        type: arrayOf(FUNC_NAME_PLACEHOLDER.length, typeOf('Char')),
        ...this.span(pos, pos + 1),
      }
      return success(node, pos + 1)
    }
    case TokenKind.LParen: {
      const inner = this.parseExpression(pos + 1)
      if (!inner.ok) return inner
      const close = this.expect(inner.pos, TokenKind.RParen)
      if (close !== null) return fail(close)
      return success(inner.node, inner.pos + 1)
    }
    case TokenKind.Generic:
      return this.parseGenericSelection(pos)
    default:
      return this.noViable(pos, 'primary-expression')
  }
}

// Adjacent string literals concatenate; the first prefix other than none wins.
function parseStringLiterals(this: Parser, pos: number): Parsed {
  let value = ''
  let encoding: AST.StringLiteral['encoding'] = 'none'
  let cur = pos
  while (this.at(cur, TokenKind.StringLiteral)) {
    const token = this.tokens[cur]
    value += typeof token.value === 'string' ? token.value : ''
    if (encoding === 'none' && token.encoding !== undefined) encoding = token.encoding
    cur++
  }
  const node: AST.StringLiteral = {
    kind: 'StringLiteral',
    value,
    encoding,
    children: [],
    type: arrayOf(value.length, typeOf('Char')),
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parseGenericSelection ===
// _Generic ( assignment-expression , generic-association-list )
Parser.prototype.parseGenericSelection = function (this: Parser, pos: number): Parsed<AST.GenericSelection> {
  const open = this.expect(pos + 1, TokenKind.LParen)
  if (open !== null) return fail(open)
  const controlling = this.parseAssignmentExpression(pos + 2)
  if (!controlling.ok) return controlling
  const comma = this.expect(controlling.pos, TokenKind.Comma)
  if (comma !== null) return fail(comma)
  const associations = this.separatedList(controlling.pos + 1, (p) => parseGenericAssociation.call(this, p))
  if (!associations.ok) return associations
  const close = this.expect(associations.pos, TokenKind.RParen)
  if (close !== null) return fail(close)

  const selected = selectAssociation(controlling.node.type, associations.items)
  if (selected === null) {
    return fail({ code: 'NoGenericMatch', position: pos, controlling: controlling.node.type })
  }
  const node: AST.GenericSelection = {
    kind: 'GenericSelection',
    children: [controlling.node, ...associations.items],
    type: selected,
    ...this.span(pos, associations.pos + 1),
  }
  return success(node, associations.pos + 1)
}

function selectAssociation(controlling: TypeExpression, associations: readonly AST.GenericAssociation[]): TypeExpression | null {
  let fallback: TypeExpression | null = null
  for (const association of associations) {
    const [head] = association.children
    if (association.isDefault) {
      if (fallback === null) fallback = association.type
    } else if (head !== undefined && typesEqual(head.type, controlling)) {
      return association.type
    }
  }
  return fallback
}

// type-name : assignment-expression | default : assignment-expression
function parseGenericAssociation(this: Parser, pos: number): Parsed<AST.GenericAssociation> {
  const isDefault = this.at(pos, TokenKind.Default)
  let cur = pos + 1
  const children: AST.ParseNode[] = []
  if (!isDefault) {
    const typeName = this.parseTypeName(pos)
    if (!typeName.ok) return typeName
    children.push(typeName.node)
    cur = typeName.pos
  }
  const colon = this.expect(cur, TokenKind.Colon)
  if (colon !== null) return fail(colon)
  const value = this.parseAssignmentExpression(cur + 1)
  if (!value.ok) return value
  children.push(value.node)
  const node: AST.GenericAssociation = {
    kind: 'GenericAssociation',
    isDefault,
    children,
    type: value.node.type,
    ...this.span(pos, value.pos),
  }
  return success(node, value.pos)
}
