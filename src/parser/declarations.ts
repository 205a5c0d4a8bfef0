// Declaration parsing: external (top-level) and block-scope declarations,
// initializers, and the translation unit.
//
// External declarations are either function definitions or declarations.
// Both start with specifiers and a declarator, so the function definition is
// tried first and the declaration re-parses from the same position when no
// body follows.
//
// K&R-style parameter declarations between a function declarator and its body
// are accepted as a declaration list.

import { Parser, success, fail } from './parser'
import type { Parsed } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import { listType } from '../ast/builders'
import { noneType, hasTag, placeholder } from '../sema/types'
import type { TypeExpression } from '../sema/types'
import { declaredType, resolveImplicitConversion } from '../sema/rules'

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseTranslationUnit(sourceLabel: string): Parsed<AST.TranslationUnit>
    parseExternalDeclaration(pos: number): Parsed<AST.FunctionDefinition | AST.Declaration | AST.StaticAssertDeclaration>
    parseFunctionDefinition(pos: number): Parsed<AST.FunctionDefinition>
    parseDeclaration(pos: number): Parsed<AST.Declaration | AST.StaticAssertDeclaration>
    parseStaticAssertDeclaration(pos: number): Parsed<AST.StaticAssertDeclaration>
    parseInitDeclaratorList(pos: number, specType: TypeExpression): Parsed<AST.InitDeclaratorList>
    parseInitDeclarator(pos: number, specType: TypeExpression): Parsed<AST.InitDeclarator>
    parseInitializer(pos: number): Parsed
    parseBracedInitializer(pos: number): Parsed<AST.InitializerList>
    parseDesignation(pos: number): Parsed<AST.Designation>
  }
}

// === parseTranslationUnit ===
// external-declaration*, which must consume every token.
Parser.prototype.parseTranslationUnit = function (this: Parser, sourceLabel: string): Parsed<AST.TranslationUnit> {
  if (this.tokens.length === 0) return fail({ code: 'PositionOutOfRange', position: 0 })
  const decls = this.repeat(0, (p) => this.parseExternalDeclaration(p))
  if (!decls.ok) return decls
  if (!this.atEnd(decls.pos)) {
    return fail({ code: 'IncompleteParse', position: decls.pos, sourceLabel, cause: decls.stop })
  }
  const node: AST.TranslationUnit = {
    kind: 'TranslationUnit',
    children: decls.items,
    type: listType(decls.items),
    ...this.span(0, decls.pos),
  }
  return success(node, decls.pos)
}

// === parseExternalDeclaration ===
Parser.prototype.parseExternalDeclaration = function (
  this: Parser,
  pos: number,
): Parsed<AST.FunctionDefinition | AST.Declaration | AST.StaticAssertDeclaration> {
  return this.firstOf<AST.FunctionDefinition | AST.Declaration | AST.StaticAssertDeclaration>(
    pos,
    'external-declaration',
    [(p) => this.parseFunctionDefinition(p), (p) => this.parseDeclaration(p)],
  )
}

// === parseFunctionDefinition ===
// declaration-specifiers declarator declaration-list? compound-statement
Parser.prototype.parseFunctionDefinition = function (this: Parser, pos: number): Parsed<AST.FunctionDefinition> {
  const specs = this.parseDeclarationSpecifiers(pos)
  if (!specs.ok) return specs
  const declarator = this.parseDeclarator(specs.pos)
  if (!declarator.ok) return declarator
  const type = declaredType(declarator.node.type, specs.node.type)
  if (!hasTag(type, 'Function')) return this.noViable(declarator.pos, 'function-definition')

  const children: AST.ParseNode[] = [specs.node, declarator.node]
  let cur = declarator.pos
  const params = this.repeat(cur, (p) => this.parseDeclaration(p))
  if (!params.ok) return params
  if (params.items.length > 0) {
    const list: AST.DeclarationList = {
      kind: 'DeclarationList',
      children: params.items,
      type: listType(params.items),
      ...this.span(cur, params.pos),
    }
    children.push(list)
    cur = params.pos
  }

  const body = this.parseCompoundStatement(cur)
  if (!body.ok) return body
  children.push(body.node)
  const node: AST.FunctionDefinition = {
    kind: 'FunctionDefinition',
    name: declarator.node.name,
    children,
    type,
    ...this.span(pos, body.pos),
  }
  return success(node, body.pos)
}

// === parseDeclaration ===
// declaration-specifiers init-declarator-list? ; | static_assert-declaration
Parser.prototype.parseDeclaration = function (
  this: Parser,
  pos: number,
): Parsed<AST.Declaration | AST.StaticAssertDeclaration> {
  if (this.at(pos, TokenKind.StaticAssert)) return this.parseStaticAssertDeclaration(pos)
  const specs = this.parseDeclarationSpecifiers(pos)
  if (!specs.ok) return specs

  const children: AST.ParseNode[] = [specs.node]
  let type = specs.node.type
  let cur = specs.pos
  if (!this.at(cur, TokenKind.Semicolon)) {
    const declarators = this.parseInitDeclaratorList(cur, specs.node.type)
    if (!declarators.ok) return declarators
    children.push(declarators.node)
    type = declarators.node.type
    cur = declarators.pos
  }
  const semi = this.expect(cur, TokenKind.Semicolon)
  if (semi !== null) return fail(semi)
  const node: AST.Declaration = {
    kind: 'Declaration',
    children,
    type,
    ...this.span(pos, cur + 1),
  }
  return success(node, cur + 1)
}

// === parseStaticAssertDeclaration ===
// _Static_assert ( constant-expression , string-literal ) ;
Parser.prototype.parseStaticAssertDeclaration = function (
  this: Parser,
  pos: number,
): Parsed<AST.StaticAssertDeclaration> {
  const keyword = this.expect(pos, TokenKind.StaticAssert)
  if (keyword !== null) return fail(keyword)
  const open = this.expect(pos + 1, TokenKind.LParen)
  if (open !== null) return fail(open)
  const condition = this.parseConstantExpression(pos + 2)
  if (!condition.ok) return condition
  let cur = condition.pos
  for (const kind of [TokenKind.Comma, TokenKind.StringLiteral]) {
    const mismatch = this.expect(cur, kind)
    if (mismatch !== null) return fail(mismatch)
    cur++
  }
  const message = this.tokens[cur - 1].value
  for (const kind of [TokenKind.RParen, TokenKind.Semicolon]) {
    const mismatch = this.expect(cur, kind)
    if (mismatch !== null) return fail(mismatch)
    cur++
  }
  const node: AST.StaticAssertDeclaration = {
    kind: 'StaticAssertDeclaration',
    message: typeof message === 'string' ? message : '',
    children: [condition.node],
    type: noneType(),
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parseInitDeclaratorList ===
Parser.prototype.parseInitDeclaratorList = function (
  this: Parser,
  pos: number,
  specType: TypeExpression,
): Parsed<AST.InitDeclaratorList> {
  const list = this.separatedList(pos, (p) => this.parseInitDeclarator(p, specType))
  if (!list.ok) return list
  const node: AST.InitDeclaratorList = {
    kind: 'InitDeclaratorList',
    children: list.items,
    type: listType(list.items),
    ...this.span(pos, list.pos),
  }
  return success(node, list.pos)
}

// === parseInitDeclarator ===
// declarator ( = initializer )?
// Once `=` is seen the initializer is committed: its failure is the declarator's.
Parser.prototype.parseInitDeclarator = function (
  this: Parser,
  pos: number,
  specType: TypeExpression,
): Parsed<AST.InitDeclarator> {
  const declarator = this.parseDeclarator(pos)
  if (!declarator.ok) return declarator
  const type = declaredType(declarator.node.type, specType)
  if (!this.at(declarator.pos, TokenKind.Assign)) {
    return success<AST.InitDeclarator>(
      { kind: 'InitDeclarator', children: [declarator.node], type, ...this.span(pos, declarator.pos) },
      declarator.pos,
    )
  }

  const assignPos = declarator.pos
  const init = this.parseInitializer(assignPos + 1)
  if (!init.ok) return init
  const value = init.node.type
  const accepted =
    init.node.kind === 'InitializerList' ? !hasTag(type, 'Function') : resolveImplicitConversion(type, value) !== null
  if (!accepted) {
    return fail({ code: 'IllegalAssignment', position: assignPos, target: type, value })
  }
  const node: AST.InitDeclarator = {
    kind: 'InitDeclarator',
    children: [declarator.node, init.node],
    type,
    ...this.span(pos, init.pos),
  }
  return success(node, init.pos)
}

// === parseInitializer ===
// assignment-expression | { initializer-list ,? }
Parser.prototype.parseInitializer = function (this: Parser, pos: number): Parsed {
  return this.descend(pos, () =>
    this.at(pos, TokenKind.LBrace) ? this.parseBracedInitializer(pos) : this.parseAssignmentExpression(pos),
  )
}

// === parseBracedInitializer ===
Parser.prototype.parseBracedInitializer = function (this: Parser, pos: number): Parsed<AST.InitializerList> {
  const open = this.expect(pos, TokenKind.LBrace)
  if (open !== null) return fail(open)
  const items = this.separatedList(pos + 1, (p) => parseInitializerItem.call(this, p))
  if (!items.ok) return items
  let cur = items.pos
  if (this.at(cur, TokenKind.Comma)) cur++
  const close = this.expect(cur, TokenKind.RBrace)
  if (close !== null) return fail(close)
  const node: AST.InitializerList = {
    kind: 'InitializerList',
    children: items.items,
    type: listType(items.items),
    ...this.span(pos, cur + 1),
  }
  return success(node, cur + 1)
}

// designation? initializer
function parseInitializerItem(this: Parser, pos: number): Parsed {
  if (!this.at(pos, TokenKind.LBracket) && !this.at(pos, TokenKind.Dot)) return this.parseInitializer(pos)
  const designation = this.parseDesignation(pos)
  if (!designation.ok) return designation
  const init = this.parseInitializer(designation.pos)
  if (!init.ok) return init
  const node: AST.DesignatedInitializer = {
    kind: 'DesignatedInitializer',
    children: [designation.node, init.node],
    type: init.node.type,
    ...this.span(pos, init.pos),
  }
  return success(node, init.pos)
}

// === parseDesignation ===
// designator+ =
Parser.prototype.parseDesignation = function (this: Parser, pos: number): Parsed<AST.Designation> {
  const designators = this.repeat(pos, (p) => parseDesignator.call(this, p))
  if (!designators.ok) return designators
  if (designators.items.length === 0) return this.noViable(pos, 'designation')
  const assign = this.expect(designators.pos, TokenKind.Assign)
  if (assign !== null) return fail(assign)
  const node: AST.Designation = {
    kind: 'Designation',
    children: designators.items,
    type: listType(designators.items),
    ...this.span(pos, designators.pos + 1),
  }
  return success(node, designators.pos + 1)
}

// [ constant-expression ] | . identifier
function parseDesignator(this: Parser, pos: number): Parsed<AST.ArrayDesignator | AST.MemberDesignator> {
  if (this.at(pos, TokenKind.Dot)) {
    const member = this.identifierAt(pos + 1)
    if (member === null) {
      return fail({ code: 'UnexpectedToken', position: pos + 1, expected: TokenKind.Identifier, found: this.peek(pos + 1) })
    }
    const node: AST.MemberDesignator = {
      kind: 'MemberDesignator',
      member,
      children: [],
      type: placeholder(member),
      ...this.span(pos, pos + 2),
    }
    return success(node, pos + 2)
  }
  const open = this.expect(pos, TokenKind.LBracket)
  if (open !== null) return fail(open)
  const index = this.parseConstantExpression(pos + 1)
  if (!index.ok) return index
  const close = this.expect(index.pos, TokenKind.RBracket)
  if (close !== null) return fail(close)
  const node: AST.ArrayDesignator = {
    kind: 'ArrayDesignator',
    children: [index.node],
    type: index.node.type,
    ...this.span(pos, index.pos + 1),
  }
  return success(node, index.pos + 1)
}
