// Declarator parsing: the part after the specifiers that introduces the name
// together with pointer, array and function shape.
//
// C declarators follow an "inside-out" rule: int (*fp)(int) means fp is a
// pointer to a function returning int, read from the name outward. A
// declarator's type is its shape with the name's placeholder at the core;
// applyDeclarator resolves it against the specifier type.

import { Parser, success, fail, isCommitted } from './parser'
import type { Parsed } from './parser'
import { TokenKind } from '../lexer/token'
import type * as AST from '../ast/nodes'
import { listType } from '../ast/builders'
import { typeOf, placeholder, noneType, applyDeclarator, hasTag } from '../sema/types'
import { declaredType } from '../sema/rules'
import type { TypeExpression, BaseType } from '../sema/types'

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseDeclarator(pos: number): Parsed<AST.Declarator>
    parseDirectDeclarator(pos: number): Parsed<AST.DirectDeclarator>
    parsePointer(pos: number): Parsed<AST.Pointer>
    parseDeclaratorSuffix(pos: number): Parsed<AST.ArrayDeclarator | AST.FunctionDeclarator>
    parseParameterTypeList(pos: number): Parsed<AST.ParameterTypeList>
    parseParameterDeclaration(pos: number): Parsed<AST.ParameterDeclaration>
    parseIdentifierList(pos: number): Parsed<AST.IdentifierList>
    parseTypeName(pos: number): Parsed<AST.TypeName>
    parseAbstractDeclarator(pos: number): Parsed<AST.AbstractDeclarator>
    parseDirectAbstractDeclarator(pos: number): Parsed<AST.DirectAbstractDeclarator>
  }
}

// Attach the pointer chain around the shape it points from.
function graft(pointer: TypeExpression, core: TypeExpression): TypeExpression {
  const [inner] = pointer.children
  return {
    base: pointer.base,
    children: [inner === undefined ? core : graft(inner, core)],
    modifiers: pointer.modifiers,
  }
}

// Wrap the shape built so far in one suffix.
function applySuffix(shape: TypeExpression, suffix: TypeExpression): TypeExpression {
  return { base: suffix.base, children: [shape, ...suffix.children], modifiers: suffix.modifiers }
}

function declaredName(direct: AST.DirectDeclarator): string {
  const [head] = direct.children
  if (head !== undefined && (head.kind === 'Identifier' || head.kind === 'Declarator')) return head.name
  return ''
}

/** A lone unnamed `void` parameter means "no parameters". */
function isVoidParameterList(params: readonly AST.ParseNode[]): boolean {
  const [only] = params
  return (
    params.length === 1 &&
    only !== undefined &&
    only.kind === 'ParameterDeclaration' &&
    only.name === null &&
    hasTag(only.type, 'Void') &&
    only.type.children.length === 0
  )
}

// === parseDeclarator ===
// pointer? direct-declarator
Parser.prototype.parseDeclarator = function (this: Parser, pos: number): Parsed<AST.Declarator> {
  return this.descend(pos, () => {
    const children: AST.ParseNode[] = []
    let pointer: TypeExpression | null = null
    let cur = pos
    if (this.at(pos, TokenKind.Star)) {
      const ptr = this.parsePointer(pos)
      if (!ptr.ok) return ptr
      children.push(ptr.node)
      pointer = ptr.node.type
      cur = ptr.pos
    }
    const direct = this.parseDirectDeclarator(cur)
    if (!direct.ok) return direct
    children.push(direct.node)
    const node: AST.Declarator = {
      kind: 'Declarator',
      name: declaredName(direct.node),
      children,
      type: pointer === null ? direct.node.type : graft(pointer, direct.node.type),
      ...this.span(pos, direct.pos),
    }
    return success(node, direct.pos)
  })
}

// === parseDirectDeclarator ===
// ( identifier | ( declarator ) ) suffix*
Parser.prototype.parseDirectDeclarator = function (this: Parser, pos: number): Parsed<AST.DirectDeclarator> {
  const children: AST.ParseNode[] = []
  let shape: TypeExpression
  let cur: number

  const name = this.identifierAt(pos)
  if (name !== null) {
    const ident: AST.Identifier = {
      kind: 'Identifier',
      name,
      children: [],
      type: placeholder(name),
      ...this.span(pos, pos + 1),
    }
    children.push(ident)
    shape = ident.type
    cur = pos + 1
  } else if (this.at(pos, TokenKind.LParen)) {
    const inner = this.parseDeclarator(pos + 1)
    if (!inner.ok) return inner
    const close = this.expect(inner.pos, TokenKind.RParen)
    if (close !== null) return fail(close)
    children.push(inner.node)
    shape = inner.node.type
    cur = inner.pos + 1
  } else {
    return this.noViable(pos, 'direct-declarator')
  }

  while (this.at(cur, TokenKind.LBracket) || this.at(cur, TokenKind.LParen)) {
    const suffix = this.parseDeclaratorSuffix(cur)
    if (!suffix.ok) return suffix
    children.push(suffix.node)
    shape = applySuffix(shape, suffix.node.type)
    cur = suffix.pos
  }

  const node: AST.DirectDeclarator = {
    kind: 'DirectDeclarator',
    children,
    type: shape,
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parsePointer ===
// * type-qualifier-list? pointer?
Parser.prototype.parsePointer = function (this: Parser, pos: number): Parsed<AST.Pointer> {
  const star = this.expect(pos, TokenKind.Star)
  if (star !== null) return fail(star)
  const children: AST.ParseNode[] = []
  const qualifiers: BaseType[] = []
  let cur = pos + 1

  const quals = this.repeat(cur, (p) => this.parseTypeQualifier(p))
  if (!quals.ok) return quals
  if (quals.items.length > 0) {
    const list: AST.TypeQualifierList = {
      kind: 'TypeQualifierList',
      children: quals.items,
      type: listType(quals.items),
      ...this.span(cur, quals.pos),
    }
    children.push(list)
    for (const q of quals.items) qualifiers.push(q.type.base)
    cur = quals.pos
  }

  let inner: TypeExpression[] = []
  if (this.at(cur, TokenKind.Star)) {
    const next = this.descend(cur, () => this.parsePointer(cur))
    if (!next.ok) return next
    children.push(next.node)
    inner = [next.node.type]
    cur = next.pos
  }

  const node: AST.Pointer = {
    kind: 'Pointer',
    children,
    type: typeOf('Pointer', inner, qualifiers),
    ...this.span(pos, cur),
  }
  return success(node, cur)
}

// === parseDeclaratorSuffix ===
// [ assignment-expression? ] | ( parameter-type-list ) | ( identifier-list? )
Parser.prototype.parseDeclaratorSuffix = function (
  this: Parser,
  pos: number,
): Parsed<AST.ArrayDeclarator | AST.FunctionDeclarator> {
  if (this.at(pos, TokenKind.LBracket)) {
    if (this.at(pos + 1, TokenKind.RBracket)) {
      return success<AST.ArrayDeclarator>(
        {
          kind: 'ArrayDeclarator',
          children: [],
          type: { base: { tag: 'Array', length: null }, children: [], modifiers: [] },
          ...this.span(pos, pos + 2),
        },
        pos + 2,
      )
    }
    const size = this.parseAssignmentExpression(pos + 1)
    if (!size.ok) return size
    const close = this.expect(size.pos, TokenKind.RBracket)
    if (close !== null) return fail(close)
    const sizeNode = size.node
    const length = sizeNode.kind === 'Constant' && !sizeNode.floating ? Number(sizeNode.value) : null
    const node: AST.ArrayDeclarator = {
      kind: 'ArrayDeclarator',
      children: [sizeNode],
      type: { base: { tag: 'Array', length }, children: [], modifiers: [] },
      ...this.span(pos, size.pos + 1),
    }
    return success(node, size.pos + 1)
  }

  const open = this.expect(pos, TokenKind.LParen)
  if (open !== null) return fail(open)
  if (this.at(pos + 1, TokenKind.RParen)) {
    return success<AST.FunctionDeclarator>(
      { kind: 'FunctionDeclarator', children: [], type: typeOf('Function'), ...this.span(pos, pos + 2) },
      pos + 2,
    )
  }
  const params = this.firstOf<AST.ParameterTypeList | AST.IdentifierList>(pos + 1, 'function-declarator', [
    (p) => this.parseParameterTypeList(p),
    (p) => this.parseIdentifierList(p),
  ])
  if (!params.ok) return params
  const close = this.expect(params.pos, TokenKind.RParen)
  if (close !== null) return fail(close)

  let paramTypes: TypeExpression[]
  let variadic = false
  if (params.node.kind === 'ParameterTypeList') {
    const [list] = params.node.children
    const decls = list === undefined ? [] : list.children
    paramTypes = isVoidParameterList(decls) ? [] : decls.map((d) => d.type)
    variadic = params.node.variadic
  } else {
    paramTypes = params.node.children.map((ident) => ident.type)
  }
  const node: AST.FunctionDeclarator = {
    kind: 'FunctionDeclarator',
    children: [params.node],
    type: typeOf('Function', paramTypes, variadic ? [{ tag: 'VaList' }] : []),
    ...this.span(pos, params.pos + 1),
  }
  return success(node, params.pos + 1)
}

// === parseParameterTypeList ===
// parameter-list | parameter-list , ...
Parser.prototype.parseParameterTypeList = function (this: Parser, pos: number): Parsed<AST.ParameterTypeList> {
  const params = this.separatedList(pos, (p) => this.parseParameterDeclaration(p))
  if (!params.ok) return params
  const list: AST.ParameterList = {
    kind: 'ParameterList',
    children: params.items,
    type: listType(params.items),
    ...this.span(pos, params.pos),
  }
  const variadic = this.at(params.pos, TokenKind.Comma) && this.at(params.pos + 1, TokenKind.Ellipsis)
  const end = variadic ? params.pos + 2 : params.pos
  const node: AST.ParameterTypeList = {
    kind: 'ParameterTypeList',
    variadic,
    children: [list],
    type: list.type,
    ...this.span(pos, end),
  }
  return success(node, end)
}

// === parseParameterDeclaration ===
// declaration-specifiers ( declarator | abstract-declarator? )
Parser.prototype.parseParameterDeclaration = function (this: Parser, pos: number): Parsed<AST.ParameterDeclaration> {
  const specs = this.parseDeclarationSpecifiers(pos)
  if (!specs.ok) return specs
  const declarator = this.firstOf<AST.Declarator | AST.AbstractDeclarator>(specs.pos, 'parameter-declarator', [
    (p) => this.parseDeclarator(p),
    (p) => this.parseAbstractDeclarator(p),
  ])

  if (!declarator.ok) {
    if (isCommitted(declarator.failure)) return declarator
    return success<AST.ParameterDeclaration>(
      {
        kind: 'ParameterDeclaration',
        name: null,
        children: [specs.node],
        type: specs.node.type,
        ...this.span(pos, specs.pos),
      },
      specs.pos,
    )
  }
  const node: AST.ParameterDeclaration = {
    kind: 'ParameterDeclaration',
    name: declarator.node.kind === 'Declarator' ? declarator.node.name : null,
    children: [specs.node, declarator.node],
    type: declaredType(declarator.node.type, specs.node.type),
    ...this.span(pos, declarator.pos),
  }
  return success(node, declarator.pos)
}

// === parseIdentifierList ===
Parser.prototype.parseIdentifierList = function (this: Parser, pos: number): Parsed<AST.IdentifierList> {
  const list = this.separatedList<AST.Identifier>(pos, (p) => {
    const name = this.identifierAt(p)
    if (name === null) {
      return fail({ code: 'UnexpectedToken', position: p, expected: TokenKind.Identifier, found: this.peek(p) })
    }
    return success<AST.Identifier>(
      { kind: 'Identifier', name, children: [], type: placeholder(name), ...this.span(p, p + 1) },
      p + 1,
    )
  })
  if (!list.ok) return list
  const node: AST.IdentifierList = {
    kind: 'IdentifierList',
    children: list.items,
    type: listType(list.items),
    ...this.span(pos, list.pos),
  }
  return success(node, list.pos)
}

// === parseTypeName ===
// specifier-qualifier-list abstract-declarator?
Parser.prototype.parseTypeName = function (this: Parser, pos: number): Parsed<AST.TypeName> {
  const specs = this.parseSpecifierQualifierList(pos)
  if (!specs.ok) return specs
  const abstract = this.parseAbstractDeclarator(specs.pos)
  if (!abstract.ok) {
    if (isCommitted(abstract.failure)) return abstract
    return success<AST.TypeName>(
      { kind: 'TypeName', children: [specs.node], type: specs.node.type, ...this.span(pos, specs.pos) },
      specs.pos,
    )
  }
  const node: AST.TypeName = {
    kind: 'TypeName',
    children: [specs.node, abstract.node],
    type: applyDeclarator(abstract.node.type, specs.node.type),
    ...this.span(pos, abstract.pos),
  }
  return success(node, abstract.pos)
}

// === parseAbstractDeclarator ===
// pointer | pointer? direct-abstract-declarator
Parser.prototype.parseAbstractDeclarator = function (this: Parser, pos: number): Parsed<AST.AbstractDeclarator> {
  return this.descend(pos, () => {
    const children: AST.ParseNode[] = []
    let pointer: TypeExpression | null = null
    let cur = pos
    if (this.at(pos, TokenKind.Star)) {
      const ptr = this.parsePointer(pos)
      if (!ptr.ok) return ptr
      children.push(ptr.node)
      pointer = ptr.node.type
      cur = ptr.pos
    }

    let core = noneType()
    const direct = this.parseDirectAbstractDeclarator(cur)
    if (direct.ok) {
      children.push(direct.node)
      core = direct.node.type
      cur = direct.pos
    } else if (pointer === null || isCommitted(direct.failure)) {
      return direct
    }

    const node: AST.AbstractDeclarator = {
      kind: 'AbstractDeclarator',
      children,
      type: pointer === null ? core : graft(pointer, core),
      ...this.span(pos, cur),
    }
    return success(node, cur)
  })
}

// === parseDirectAbstractDeclarator ===
// ( abstract-declarator )? suffix*, with at least one part
Parser.prototype.parseDirectAbstractDeclarator = function (
  this: Parser,
  pos: number,
): Parsed<AST.DirectAbstractDeclarator> {
  const children: AST.ParseNode[] = []
  let shape = noneType()
  let cur = pos

  if (this.at(pos, TokenKind.LParen)) {
    const inner = this.parseAbstractDeclarator(pos + 1)
    if (inner.ok && this.at(inner.pos, TokenKind.RParen)) {
      children.push(inner.node)
      shape = inner.node.type
      cur = inner.pos + 1
    } else if (!inner.ok && isCommitted(inner.failure)) {
      return inner
    }
  }

  while (this.at(cur, TokenKind.LBracket) || this.at(cur, TokenKind.LParen)) {
    const suffix = this.parseDeclaratorSuffix(cur)
    if (!suffix.ok) return suffix
    children.push(suffix.node)
    shape = applySuffix(shape, suffix.node.type)
    cur = suffix.pos
  }

  if (children.length === 0) return this.noViable(pos, 'direct-abstract-declarator')
  const node: AST.DirectAbstractDeclarator = {
    kind: 'DirectAbstractDeclarator',
    children,
    type: shape,
    ...this.span(pos, cur),
  }
  return success(node, cur)
}
