// Specifier parsing: storage classes, type keywords, qualifiers, function and
// alignment specifiers, and struct/union/enum/_Atomic type specifiers.
//
// C allows type keywords in any order ("long unsigned int" == "unsigned long int"),
// so the specifiers of a declaration are collected first and flattened into one
// type at the end.

import { Parser, success, fail } from './parser'
import type { Parsed } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import { listType, listElementTypes } from '../ast/builders'
import { typeOf, withModifiers, applyDeclarator, noneType, isPlaceholder } from '../sema/types'
import type { TypeExpression, BaseType, PrimitiveTag } from '../sema/types'
import { isInteger } from '../sema/rules'
import type { ParseFailure } from '../errors'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseDeclarationSpecifiers(pos: number): Parsed<AST.DeclarationSpecifiers>
    parseSpecifierQualifierList(pos: number): Parsed<AST.SpecifierQualifierList>
    parseTypeSpecifier(pos: number): Parsed
    parseTypeQualifier(pos: number): Parsed<AST.TypeQualifier>
    parseAlignmentSpecifier(pos: number): Parsed<AST.AlignmentSpecifier>
    parseStructOrUnionSpecifier(pos: number): Parsed<AST.StructOrUnionSpecifier>
    parseStructDeclaration(pos: number): Parsed
    parseStructDeclaratorList(pos: number, specType: TypeExpression): Parsed<AST.StructDeclaratorList>
    parseStructDeclarator(pos: number, specType: TypeExpression): Parsed<AST.StructDeclarator>
    parseEnumSpecifier(pos: number): Parsed<AST.EnumSpecifier>
    parseEnumerator(pos: number): Parsed<AST.Enumerator>
    parseAtomicTypeSpecifier(pos: number): Parsed<AST.AtomicTypeSpecifier>
  }
}

// Strongest keyword first: it becomes the base, the rest become modifiers.
const BASE_STRENGTH: readonly PrimitiveTag[] = [
  'Double',
  'Float',
  'Long',
  'Short',
  'Char',
  'Int',
  'Bool',
  'Void',
  'Unsigned',
  'Signed',
  'Complex',
  'Imaginary',
]

function typeKeyword(kind: TokenKind | null): AST.TypeKeyword | null {
  switch (kind) {
    case TokenKind.Void:
      return 'void'
    case TokenKind.Char:
      return 'char'
    case TokenKind.Short:
      return 'short'
    case TokenKind.Int:
      return 'int'
    case TokenKind.Long:
      return 'long'
    case TokenKind.Float:
      return 'float'
    case TokenKind.Double:
      return 'double'
    case TokenKind.Signed:
      return 'signed'
    case TokenKind.Unsigned:
      return 'unsigned'
    case TokenKind.Bool:
      return '_Bool'
    case TokenKind.Complex:
      return '_Complex'
    case TokenKind.Imaginary:
      return '_Imaginary'
    default:
      return null
  }
}

function keywordTag(keyword: AST.TypeKeyword): PrimitiveTag {
  switch (keyword) {
    case 'void':
      return 'Void'
    case 'char':
      return 'Char'
    case 'short':
      return 'Short'
    case 'int':
      return 'Int'
    case 'long':
      return 'Long'
    case 'float':
      return 'Float'
    case 'double':
      return 'Double'
    case 'signed':
      return 'Signed'
    case 'unsigned':
      return 'Unsigned'
    case '_Bool':
      return 'Bool'
    case '_Complex':
      return 'Complex'
    case '_Imaginary':
      return 'Imaginary'
  }
}

function storageClass(kind: TokenKind | null): { specifier: AST.StorageClass; tag: PrimitiveTag } | null {
  switch (kind) {
    case TokenKind.Extern:
      return { specifier: 'extern', tag: 'Extern' }
    case TokenKind.Static:
      return { specifier: 'static', tag: 'Static' }
    case TokenKind.ThreadLocal:
      return { specifier: '_Thread_local', tag: 'ThreadLocal' }
    case TokenKind.Auto:
      return { specifier: 'auto', tag: 'Auto' }
    case TokenKind.Register:
      return { specifier: 'register', tag: 'Register' }
    default:
      return null
  }
}

function qualifier(kind: TokenKind | null): { qualifier: AST.Qualifier; tag: PrimitiveTag } | null {
  switch (kind) {
    case TokenKind.Const:
      return { qualifier: 'const', tag: 'Const' }
    case TokenKind.Restrict:
      return { qualifier: 'restrict', tag: 'Restrict' }
    case TokenKind.Volatile:
      return { qualifier: 'volatile', tag: 'Volatile' }
    case TokenKind.Atomic:
      return { qualifier: '_Atomic', tag: 'Atomic' }
    default:
      return null
  }
}

// Keywords made redundant by the chosen base: `long int` is `long`,
// `signed int` is `int`.
function isRedundant(keyword: PrimitiveTag, base: PrimitiveTag): boolean {
  if (keyword === 'Int') return base === 'Short' || base === 'Long'
  if (keyword === 'Signed') return base !== 'Char'
  return false
}

/** Collapse a specifier sequence into one type. */
function flattenSpecifiers(items: readonly AST.ParseNode[], pos: number): TypeExpression | ParseFailure {
  const modifiers: BaseType[] = []
  const keywords: PrimitiveTag[] = []
  const aggregates: TypeExpression[] = []
  for (const item of items) {
    switch (item.kind) {
      case 'StorageClassSpecifier':
      case 'TypeQualifier':
      case 'FunctionSpecifier':
        modifiers.push(item.type.base)
        break
      case 'TypeSpecifier':
        keywords.push(keywordTag(item.specifier))
        break
      case 'StructOrUnionSpecifier':
      case 'EnumSpecifier':
      case 'AtomicTypeSpecifier':
        aggregates.push(item.type)
        break
      default:
        break
    }
  }

  const [aggregate] = aggregates
  if (aggregates.length > 1 || (aggregate !== undefined && keywords.length > 0)) {
    return { code: 'ConflictingSpecifiers', position: pos }
  }
  if (aggregate !== undefined) return withModifiers(aggregate, modifiers)

  const base = BASE_STRENGTH.find((tag) => keywords.includes(tag)) ?? 'Int'
  const extra: BaseType[] = []
  let baseSeen = false
  for (const keyword of keywords) {
    if (keyword === base && !baseSeen) {
      baseSeen = true
    } else if (!isRedundant(keyword, base)) {
      extra.push({ tag: keyword })
    }
  }
  return typeOf(base, [], [...modifiers, ...extra])
}

// === parseDeclarationSpecifiers ===
Parser.prototype.parseDeclarationSpecifiers = function (
  this: Parser,
  pos: number,
): Parsed<AST.DeclarationSpecifiers> {
  const items = this.repeat(pos, (p) => parseDeclarationSpecifier.call(this, p))
  if (!items.ok) return items
  if (items.items.length === 0) return items.stop === null ? this.noViable(pos, 'declaration-specifiers') : fail(items.stop)
  const type = flattenSpecifiers(items.items, pos)
  if ('code' in type) return fail(type)
  const node: AST.DeclarationSpecifiers = {
    kind: 'DeclarationSpecifiers',
    children: items.items,
    type,
    ...this.span(pos, items.pos),
  }
  return success(node, items.pos)
}

function parseDeclarationSpecifier(this: Parser, pos: number): Parsed {
  const kind = this.peek(pos)
  if (kind === TokenKind.Typedef) {
    return fail({ code: 'UnsupportedFeature', position: pos, feature: 'typedef' })
  }
  const storage = storageClass(kind)
  if (storage !== null) {
    const node: AST.StorageClassSpecifier = {
      kind: 'StorageClassSpecifier',
      specifier: storage.specifier,
      children: [],
      type: typeOf(storage.tag),
      ...this.span(pos, pos + 1),
    }
    return success(node, pos + 1)
  }
  if (kind === TokenKind.Inline || kind === TokenKind.Noreturn) {
    const inline = kind === TokenKind.Inline
    const node: AST.FunctionSpecifier = {
      kind: 'FunctionSpecifier',
      specifier: inline ? 'inline' : '_Noreturn',
      children: [],
      type: typeOf(inline ? 'Inline' : 'Noreturn'),
      ...this.span(pos, pos + 1),
    }
    return success(node, pos + 1)
  }
  if (kind === TokenKind.Alignas) return this.parseAlignmentSpecifier(pos)
  return parseSpecifierOrQualifier.call(this, pos)
}

// type-specifier | type-qualifier. `_Atomic (` starts a type specifier.
function parseSpecifierOrQualifier(this: Parser, pos: number): Parsed {
  const atomicSpecifier = this.at(pos, TokenKind.Atomic) && this.at(pos + 1, TokenKind.LParen)
  if (qualifier(this.peek(pos)) !== null && !atomicSpecifier) return this.parseTypeQualifier(pos)
  return this.parseTypeSpecifier(pos)
}

// === parseSpecifierQualifierList ===
Parser.prototype.parseSpecifierQualifierList = function (
  this: Parser,
  pos: number,
): Parsed<AST.SpecifierQualifierList> {
  const items = this.repeat(pos, (p) => parseSpecifierOrQualifier.call(this, p))
  if (!items.ok) return items
  if (items.items.length === 0) return items.stop === null ? this.noViable(pos, 'specifier-qualifier-list') : fail(items.stop)
  const type = flattenSpecifiers(items.items, pos)
  if ('code' in type) return fail(type)
  const node: AST.SpecifierQualifierList = {
    kind: 'SpecifierQualifierList',
    children: items.items,
    type,
    ...this.span(pos, items.pos),
  }
  return success(node, items.pos)
}

// === parseTypeSpecifier ===
Parser.prototype.parseTypeSpecifier = function (this: Parser, pos: number): Parsed {
  const kind = this.peek(pos)
  switch (kind) {
    case TokenKind.Struct:
    case TokenKind.Union:
      return this.parseStructOrUnionSpecifier(pos)
    case TokenKind.Enum:
      return this.parseEnumSpecifier(pos)
    case TokenKind.Atomic:
      return this.parseAtomicTypeSpecifier(pos)
    default:
      break
  }
  const keyword = typeKeyword(kind)
  if (keyword === null) return this.noViable(pos, 'type-specifier')
  const node: AST.TypeSpecifier = {
    kind: 'TypeSpecifier',
    specifier: keyword,
    children: [],
    type: typeOf(keywordTag(keyword)),
    ...this.span(pos, pos + 1),
  }
  return success(node, pos + 1)
}

// === parseTypeQualifier ===
Parser.prototype.parseTypeQualifier = function (this: Parser, pos: number): Parsed<AST.TypeQualifier> {
  const q = qualifier(this.peek(pos))
  if (q === null) return this.noViable(pos, 'type-qualifier')
  const node: AST.TypeQualifier = {
    kind: 'TypeQualifier',
    qualifier: q.qualifier,
    children: [],
    type: typeOf(q.tag),
    ...this.span(pos, pos + 1),
  }
  return success(node, pos + 1)
}

// === parseAlignmentSpecifier ===
// _Alignas ( type-name ) | _Alignas ( constant-expression )
Parser.prototype.parseAlignmentSpecifier = function (this: Parser, pos: number): Parsed<AST.AlignmentSpecifier> {
  const keyword = this.expect(pos, TokenKind.Alignas)
  if (keyword !== null) return fail(keyword)
  const open = this.expect(pos + 1, TokenKind.LParen)
  if (open !== null) return fail(open)
  const operand = this.firstOf<AST.ParseNode>(pos + 2, 'alignment-specifier', [
    (p) => this.parseTypeName(p),
    (p) => this.parseConstantExpression(p),
  ])
  if (!operand.ok) return operand
  const close = this.expect(operand.pos, TokenKind.RParen)
  if (close !== null) return fail(close)
  const node: AST.AlignmentSpecifier = {
    kind: 'AlignmentSpecifier',
    children: [operand.node],
    type: noneType(),
    ...this.span(pos, operand.pos + 1),
  }
  return success(node, operand.pos + 1)
}

// === parseStructOrUnionSpecifier ===
// struct-or-union identifier? { struct-declaration* } | struct-or-union identifier
Parser.prototype.parseStructOrUnionSpecifier = function (
  this: Parser,
  pos: number,
): Parsed<AST.StructOrUnionSpecifier> {
  const kind = this.peek(pos)
  if (kind !== TokenKind.Struct && kind !== TokenKind.Union) return this.noViable(pos, 'struct-or-union-specifier')
  const variant = kind === TokenKind.Struct ? 'struct' : 'union'
  const tag = this.identifierAt(pos + 1)
  let cur = tag === null ? pos + 1 : pos + 2
  const tagModifiers: BaseType[] = tag === null ? [] : [{ tag: 'Identifier', name: tag }]
  const baseTag = variant === 'struct' ? 'Struct' : 'Union'

  if (!this.at(cur, TokenKind.LBrace)) {
    if (tag === null) {
      return fail({ code: 'UnexpectedToken', position: cur, expected: TokenKind.LBrace, found: this.peek(cur) })
    }
    const node: AST.StructOrUnionSpecifier = {
      kind: 'StructOrUnionSpecifier',
      variant,
      tag,
      children: [],
      type: typeOf(baseTag, [], tagModifiers),
      ...this.span(pos, cur),
    }
    return success(node, cur)
  }

  const members = this.repeat(cur + 1, (p) => this.parseStructDeclaration(p))
  if (!members.ok) return members
  const close = this.expect(members.pos, TokenKind.RBrace)
  if (close !== null) return fail(members.stop ?? close)
  cur = members.pos + 1

  const memberTypes: TypeExpression[] = []
  for (const member of members.items) {
    if (member.kind !== 'StructDeclaration') continue
    const [, declarators] = member.children
    if (declarators === undefined) memberTypes.push(member.type)
    else memberTypes.push(...listElementTypes(declarators))
  }
  const node: AST.StructOrUnionSpecifier = {
    kind: 'StructOrUnionSpecifier',
    variant,
    tag,
    children: members.items,
    type: typeOf(baseTag, memberTypes, tagModifiers),
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parseStructDeclaration ===
// specifier-qualifier-list struct-declarator-list? ; | static_assert-declaration
Parser.prototype.parseStructDeclaration = function (this: Parser, pos: number): Parsed {
  if (this.at(pos, TokenKind.StaticAssert)) return this.parseStaticAssertDeclaration(pos)
  const specs = this.parseSpecifierQualifierList(pos)
  if (!specs.ok) return specs

  const children: AST.ParseNode[] = [specs.node]
  let type = specs.node.type
  let cur = specs.pos
  if (!this.at(cur, TokenKind.Semicolon)) {
    const declarators = this.parseStructDeclaratorList(cur, specs.node.type)
    if (!declarators.ok) return declarators
    children.push(declarators.node)
    type = declarators.node.type
    cur = declarators.pos
  }
  const semi = this.expect(cur, TokenKind.Semicolon)
  if (semi !== null) return fail(semi)
  const node: AST.StructDeclaration = {
    kind: 'StructDeclaration',
    children,
    type,
    ...this.span(pos, cur + 1),
  }
  return success(node, cur + 1)
}

// === parseStructDeclaratorList ===
Parser.prototype.parseStructDeclaratorList = function (
  this: Parser,
  pos: number,
  specType: TypeExpression,
): Parsed<AST.StructDeclaratorList> {
  const list = this.separatedList(pos, (p) => this.parseStructDeclarator(p, specType))
  if (!list.ok) return list
  const node: AST.StructDeclaratorList = {
    kind: 'StructDeclaratorList',
    children: list.items,
    type: listType(list.items),
    ...this.span(pos, list.pos),
  }
  return success(node, list.pos)
}

// === parseStructDeclarator ===
// declarator | declarator? : constant-expression
Parser.prototype.parseStructDeclarator = function (
  this: Parser,
  pos: number,
  specType: TypeExpression,
): Parsed<AST.StructDeclarator> {
  const children: AST.ParseNode[] = []
  let type = specType
  let cur = pos
  if (!this.at(pos, TokenKind.Colon)) {
    const declarator = this.parseDeclarator(pos)
    if (!declarator.ok) return declarator
    children.push(declarator.node)
    type = applyDeclarator(declarator.node.type, specType)
    cur = declarator.pos
  }
  const named = children.length > 0
  const bitField = this.at(cur, TokenKind.Colon)
  if (bitField) {
    const width = this.parseConstantExpression(cur + 1)
    if (!width.ok) return width
    children.push(width.node)
    cur = width.pos
  } else if (!named) {
    return this.noViable(pos, 'struct-declarator')
  }
  const node: AST.StructDeclarator = {
    kind: 'StructDeclarator',
    named,
    bitField,
    children,
    type,
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parseEnumSpecifier ===
// enum identifier? { enumerator-list ,? } | enum identifier
Parser.prototype.parseEnumSpecifier = function (this: Parser, pos: number): Parsed<AST.EnumSpecifier> {
  const keyword = this.expect(pos, TokenKind.Enum)
  if (keyword !== null) return fail(keyword)
  const tag = this.identifierAt(pos + 1)
  let cur = tag === null ? pos + 1 : pos + 2
  const type = typeOf('Enum', [], tag === null ? [] : [{ tag: 'Identifier', name: tag }])

  if (!this.at(cur, TokenKind.LBrace)) {
    if (tag === null) {
      return fail({ code: 'UnexpectedToken', position: cur, expected: TokenKind.LBrace, found: this.peek(cur) })
    }
    return success<AST.EnumSpecifier>({ kind: 'EnumSpecifier', tag, children: [], type, ...this.span(pos, cur) }, cur)
  }

  const enumerators = this.separatedList(cur + 1, (p) => this.parseEnumerator(p))
  if (!enumerators.ok) return enumerators
  const list: AST.EnumeratorList = {
    kind: 'EnumeratorList',
    children: enumerators.items,
    type: listType(enumerators.items),
    ...this.span(cur + 1, enumerators.pos),
  }
  cur = enumerators.pos
  if (this.at(cur, TokenKind.Comma)) cur++
  const close = this.expect(cur, TokenKind.RBrace)
  if (close !== null) return fail(close)
  const node: AST.EnumSpecifier = {
    kind: 'EnumSpecifier',
    tag,
    children: [list],
    type,
    ...this.span(pos, cur + 1),
  }
  return success(node, cur + 1)
}

// === parseEnumerator ===
// identifier | identifier = constant-expression
Parser.prototype.parseEnumerator = function (this: Parser, pos: number): Parsed<AST.Enumerator> {
  const name = this.identifierAt(pos)
  if (name === null) {
    return fail({ code: 'UnexpectedToken', position: pos, expected: TokenKind.Identifier, found: this.peek(pos) })
  }
  const type = typeOf('Long')
  if (!this.at(pos + 1, TokenKind.Assign)) {
    return success<AST.Enumerator>({ kind: 'Enumerator', name, children: [], type, ...this.span(pos, pos + 1) }, pos + 1)
  }
  const value = this.parseConstantExpression(pos + 2)
  if (!value.ok) return value
  const valueType = value.node.type
  if (!isInteger(valueType) && !isPlaceholder(valueType)) {
    return fail({ code: 'IllegalAssignment', position: pos + 1, target: type, value: valueType })
  }
  const node: AST.Enumerator = {
    kind: 'Enumerator',
    name,
    children: [value.node],
    type,
    ...this.span(pos, value.pos),
  }
  return success(node, value.pos)
}

// === parseAtomicTypeSpecifier ===
// _Atomic ( type-name )
Parser.prototype.parseAtomicTypeSpecifier = function (this: Parser, pos: number): Parsed<AST.AtomicTypeSpecifier> {
  const keyword = this.expect(pos, TokenKind.Atomic)
  if (keyword !== null) return fail(keyword)
  const open = this.expect(pos + 1, TokenKind.LParen)
  if (open !== null) return fail(open)
  const typeName = this.parseTypeName(pos + 2)
  if (!typeName.ok) return typeName
  const close = this.expect(typeName.pos, TokenKind.RParen)
  if (close !== null) return fail(close)
  const node: AST.AtomicTypeSpecifier = {
    kind: 'AtomicTypeSpecifier',
    children: [typeName.node],
    type: withModifiers(typeName.node.type, [{ tag: 'Atomic' }]),
    ...this.span(pos, typeName.pos + 1),
  }
  return success(node, typeName.pos + 1)
}
