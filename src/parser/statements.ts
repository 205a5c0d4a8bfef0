// Statement parsing: labeled, compound, expression, selection, iteration and
// jump statements.
//
// Statements are dispatched on their first token; only an identifier needs a
// second token of lookahead (`name :` is a label, anything else an
// expression). Block items try a declaration before a statement.

import { Parser, success, fail } from './parser'
import type { Parsed } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import { noneType } from '../sema/types'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseStatement(pos: number): Parsed
    parseLabeledStatement(pos: number): Parsed<AST.LabeledStatement | AST.CaseStatement | AST.DefaultStatement>
    parseCompoundStatement(pos: number): Parsed<AST.CompoundStatement>
    parseBlockItem(pos: number): Parsed
    parseExpressionStatement(pos: number): Parsed<AST.ExpressionStatement>
    parseSelectionStatement(pos: number): Parsed<AST.SelectionStatement>
    parseIterationStatement(pos: number): Parsed<AST.IterationStatement>
    parseForStatement(pos: number): Parsed<AST.IterationStatement>
    parseJumpStatement(pos: number): Parsed<AST.JumpStatement>
  }
}

// === parseStatement ===
Parser.prototype.parseStatement = function (this: Parser, pos: number): Parsed {
  return this.descend(pos, (): Parsed => {
    switch (this.peek(pos)) {
      case TokenKind.Identifier:
        if (this.at(pos + 1, TokenKind.Colon)) return this.parseLabeledStatement(pos)
        return this.parseExpressionStatement(pos)
      case TokenKind.Case:
      case TokenKind.Default:
        return this.parseLabeledStatement(pos)
      case TokenKind.LBrace:
        return this.parseCompoundStatement(pos)
      case TokenKind.If:
      case TokenKind.Switch:
        return this.parseSelectionStatement(pos)
      case TokenKind.While:
      case TokenKind.Do:
      case TokenKind.For:
        return this.parseIterationStatement(pos)
      case TokenKind.Goto:
      case TokenKind.Continue:
      case TokenKind.Break:
      case TokenKind.Return:
        return this.parseJumpStatement(pos)
      case null:
        return this.noViable(pos, 'statement')
      default:
        return this.parseExpressionStatement(pos)
    }
  })
}

// Expect each kind in turn from `pos`; returns the position after the last.
function expectAll(this: Parser, pos: number, kinds: readonly TokenKind[]): Parsed<null> {
  let cur = pos
  for (const kind of kinds) {
    const mismatch = this.expect(cur, kind)
    if (mismatch !== null) return fail(mismatch)
    cur++
  }
  return success(null, cur)
}

// === parseLabeledStatement ===
// identifier : statement | case constant-expression : statement | default : statement
Parser.prototype.parseLabeledStatement = function (
  this: Parser,
  pos: number,
): Parsed<AST.LabeledStatement | AST.CaseStatement | AST.DefaultStatement> {
  if (this.at(pos, TokenKind.Case)) {
    const value = this.parseConstantExpression(pos + 1)
    if (!value.ok) return value
    const colon = this.expect(value.pos, TokenKind.Colon)
    if (colon !== null) return fail(colon)
    const body = this.parseStatement(value.pos + 1)
    if (!body.ok) return body
    const node: AST.CaseStatement = {
      kind: 'CaseStatement',
      children: [value.node, body.node],
      type: noneType(),
      ...this.span(pos, body.pos),
    }
    return success(node, body.pos)
  }

  if (this.at(pos, TokenKind.Default)) {
    const colon = this.expect(pos + 1, TokenKind.Colon)
    if (colon !== null) return fail(colon)
    const body = this.parseStatement(pos + 2)
    if (!body.ok) return body
    const node: AST.DefaultStatement = {
      kind: 'DefaultStatement',
      children: [body.node],
      type: noneType(),
      ...this.span(pos, body.pos),
    }
    return success(node, body.pos)
  }

  const label = this.identifierAt(pos)
  if (label === null) return this.noViable(pos, 'labeled-statement')
  const colon = this.expect(pos + 1, TokenKind.Colon)
  if (colon !== null) return fail(colon)
  const body = this.parseStatement(pos + 2)
  if (!body.ok) return body
  const node: AST.LabeledStatement = {
    kind: 'LabeledStatement',
    label,
    children: [body.node],
    type: noneType(),
    ...this.span(pos, body.pos),
  }
  return success(node, body.pos)
}

// === parseCompoundStatement ===
// { block-item* }
Parser.prototype.parseCompoundStatement = function (this: Parser, pos: number): Parsed<AST.CompoundStatement> {
  const open = this.expect(pos, TokenKind.LBrace)
  if (open !== null) return fail(open)
  const items = this.repeat(pos + 1, (p) => this.parseBlockItem(p))
  if (!items.ok) return items
  const close = this.expect(items.pos, TokenKind.RBrace)
  // The item that failed to parse explains a missing `}` better than the brace does.
  if (close !== null) return fail(items.stop ?? close)
  const node: AST.CompoundStatement = {
    kind: 'CompoundStatement',
    children: items.items,
    type: noneType(),
    ...this.span(pos, items.pos + 1),
  }
  return success(node, items.pos + 1)
}

// === parseBlockItem ===
Parser.prototype.parseBlockItem = function (this: Parser, pos: number): Parsed {
  if (this.at(pos, TokenKind.RBrace)) return this.noViable(pos, 'block-item')
  return this.firstOf<AST.ParseNode>(pos, 'block-item', [
    (p) => this.parseDeclaration(p),
    (p) => this.parseStatement(p),
  ])
}

// === parseExpressionStatement ===
// expression? ;
Parser.prototype.parseExpressionStatement = function (this: Parser, pos: number): Parsed<AST.ExpressionStatement> {
  if (this.at(pos, TokenKind.Semicolon)) {
    return success<AST.ExpressionStatement>(
      { kind: 'ExpressionStatement', children: [], type: noneType(), ...this.span(pos, pos + 1) },
      pos + 1,
    )
  }
  const expr = this.parseExpression(pos)
  if (!expr.ok) return expr
  const semi = this.expect(expr.pos, TokenKind.Semicolon)
  if (semi !== null) return fail(semi)
  const node: AST.ExpressionStatement = {
    kind: 'ExpressionStatement',
    children: [expr.node],
    type: noneType(),
    ...this.span(pos, expr.pos + 1),
  }
  return success(node, expr.pos + 1)
}

// ( expression ) as used by if, switch and while.
function parseControllingExpression(this: Parser, pos: number): Parsed {
  const open = this.expect(pos, TokenKind.LParen)
  if (open !== null) return fail(open)
  const expr = this.parseExpression(pos + 1)
  if (!expr.ok) return expr
  const close = this.expect(expr.pos, TokenKind.RParen)
  if (close !== null) return fail(close)
  return success(expr.node, expr.pos + 1)
}

// === parseSelectionStatement ===
// if ( expression ) statement ( else statement )? | switch ( expression ) statement
Parser.prototype.parseSelectionStatement = function (this: Parser, pos: number): Parsed<AST.SelectionStatement> {
  const keyword = this.at(pos, TokenKind.If) ? 'if' : this.at(pos, TokenKind.Switch) ? 'switch' : null
  if (keyword === null) return this.noViable(pos, 'selection-statement')
  const condition = parseControllingExpression.call(this, pos + 1)
  if (!condition.ok) return condition
  const body = this.parseStatement(condition.pos)
  if (!body.ok) return body

  const children: AST.ParseNode[] = [condition.node, body.node]
  let end = body.pos
  if (keyword === 'if' && this.at(end, TokenKind.Else)) {
    const otherwise = this.parseStatement(end + 1)
    if (!otherwise.ok) return otherwise
    children.push(otherwise.node)
    end = otherwise.pos
  }
  const node: AST.SelectionStatement = {
    kind: 'SelectionStatement',
    keyword,
    children,
    type: noneType(),
    ...this.span(pos, end),
  }
  return success(node, end)
}

// === parseIterationStatement ===
// while ( expression ) statement | do statement while ( expression ) ; | for ...
Parser.prototype.parseIterationStatement = function (this: Parser, pos: number): Parsed<AST.IterationStatement> {
  if (this.at(pos, TokenKind.For)) return this.parseForStatement(pos)

  if (this.at(pos, TokenKind.While)) {
    const condition = parseControllingExpression.call(this, pos + 1)
    if (!condition.ok) return condition
    const body = this.parseStatement(condition.pos)
    if (!body.ok) return body
    const node: AST.IterationStatement = {
      kind: 'IterationStatement',
      keyword: 'while',
      children: [condition.node, body.node],
      type: noneType(),
      ...this.span(pos, body.pos),
    }
    return success(node, body.pos)
  }

  if (!this.at(pos, TokenKind.Do)) return this.noViable(pos, 'iteration-statement')
  const body = this.parseStatement(pos + 1)
  if (!body.ok) return body
  const keyword = this.expect(body.pos, TokenKind.While)
  if (keyword !== null) return fail(keyword)
  const condition = parseControllingExpression.call(this, body.pos + 1)
  if (!condition.ok) return condition
  const semi = this.expect(condition.pos, TokenKind.Semicolon)
  if (semi !== null) return fail(semi)
  const node: AST.IterationStatement = {
    kind: 'IterationStatement',
    keyword: 'do',
    children: [body.node, condition.node],
    type: noneType(),
    ...this.span(pos, condition.pos + 1),
  }
  return success(node, condition.pos + 1)
}

// === parseForStatement ===
// for ( expression-statement | declaration  expression-statement  expression? ) statement
// Children: initializer, condition, optional step expression, body.
Parser.prototype.parseForStatement = function (this: Parser, pos: number): Parsed<AST.IterationStatement> {
  const head = expectAll.call(this, pos, [TokenKind.For, TokenKind.LParen])
  if (!head.ok) return head
  const init = this.firstOf<AST.ParseNode>(head.pos, 'for-initializer', [
    (p) => this.parseExpressionStatement(p),
    (p) => this.parseDeclaration(p),
  ])
  if (!init.ok) return init
  const condition = this.parseExpressionStatement(init.pos)
  if (!condition.ok) return condition

  const children: AST.ParseNode[] = [init.node, condition.node]
  let cur = condition.pos
  if (!this.at(cur, TokenKind.RParen)) {
    const step = this.parseExpression(cur)
    if (!step.ok) return step
    children.push(step.node)
    cur = step.pos
  }
  const close = this.expect(cur, TokenKind.RParen)
  if (close !== null) return fail(close)
  const body = this.parseStatement(cur + 1)
  if (!body.ok) return body
  children.push(body.node)
  const node: AST.IterationStatement = {
    kind: 'IterationStatement',
    keyword: 'for',
    children,
    type: noneType(),
    ...this.span(pos, body.pos),
  }
  return success(node, body.pos)
}

// === parseJumpStatement ===
// goto identifier ; | continue ; | break ; | return expression? ;
// `return expression ;` takes the expression's type.
Parser.prototype.parseJumpStatement = function (this: Parser, pos: number): Parsed<AST.JumpStatement> {
  switch (this.peek(pos)) {
    case TokenKind.Goto: {
      const label = this.identifierAt(pos + 1)
      if (label === null) {
        return fail({ code: 'UnexpectedToken', position: pos + 1, expected: TokenKind.Identifier, found: this.peek(pos + 1) })
      }
      const semi = this.expect(pos + 2, TokenKind.Semicolon)
      if (semi !== null) return fail(semi)
      return success<AST.JumpStatement>(
        { kind: 'JumpStatement', keyword: 'goto', label, children: [], type: noneType(), ...this.span(pos, pos + 3) },
        pos + 3,
      )
    }
    case TokenKind.Continue:
    case TokenKind.Break: {
      const keyword = this.at(pos, TokenKind.Continue) ? 'continue' : 'break'
      const semi = this.expect(pos + 1, TokenKind.Semicolon)
      if (semi !== null) return fail(semi)
      return success<AST.JumpStatement>(
        { kind: 'JumpStatement', keyword, label: null, children: [], type: noneType(), ...this.span(pos, pos + 2) },
        pos + 2,
      )
    }
    case TokenKind.Return: {
      if (this.at(pos + 1, TokenKind.Semicolon)) {
        return success<AST.JumpStatement>(
          { kind: 'JumpStatement', keyword: 'return', label: null, children: [], type: noneType(), ...this.span(pos, pos + 2) },
          pos + 2,
        )
      }
      const value = this.parseExpression(pos + 1)
      if (!value.ok) return value
      const semi = this.expect(value.pos, TokenKind.Semicolon)
      if (semi !== null) return fail(semi)
      const node: AST.JumpStatement = {
        kind: 'JumpStatement',
        keyword: 'return',
        label: null,
        children: [value.node],
        type: value.node.type,
        ...this.span(pos, value.pos + 1),
      }
      return success(node, value.pos + 1)
    }
    default:
      return this.noViable(pos, 'jump-statement')
  }
}
