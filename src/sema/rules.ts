// Type Oracle: cast legality, binary operand combination, implicit
// conversion on assignment and type equality.

import { typeOf, isPlaceholder, hasTag, tagName, applyDeclarator } from './types'
import type { TypeExpression, BaseType, TypeTag } from './types'
import type { BinaryOperator } from '../ast/nodes'

export type TypeCombination = { accepted: true; type: TypeExpression } | { accepted: false }

const INT_RANK = 4

// Modifiers that only describe the declared object, not its value type.
const STORAGE_MODIFIERS: ReadonlySet<TypeTag> = new Set<TypeTag>([
  'Extern',
  'Static',
  'ThreadLocal',
  'Auto',
  'Register',
  'Inline',
  'Noreturn',
])

const QUALIFIER_MODIFIERS: ReadonlySet<TypeTag> = new Set<TypeTag>([
  'Const',
  'Restrict',
  'Volatile',
  'Atomic',
])

/** Integer conversion rank, or 0 for non-integers. */
function integerRank(t: TypeExpression): number {
  switch (t.base.tag) {
    case 'Bool':
      return 1
    case 'Char':
      return 2
    case 'Short':
      return 3
    case 'Int':
    case 'Signed':
    case 'Enum':
      return t.modifiers.some((m) => m.tag === 'Unsigned') ? 5 : 4
    case 'Unsigned':
      return 5
    case 'Long':
    case 'SizeT':
      return 6
    default:
      return 0
  }
}

function floatingRank(t: TypeExpression): number {
  switch (t.base.tag) {
    case 'Float':
      return 7
    case 'Double':
    case 'Complex':
    case 'Imaginary':
      return 8
    default:
      return 0
  }
}

function arithmeticRank(t: TypeExpression): number {
  return Math.max(integerRank(t), floatingRank(t))
}

export function isInteger(t: TypeExpression): boolean {
  return integerRank(t) > 0
}

export function isFloating(t: TypeExpression): boolean {
  return floatingRank(t) > 0
}

export function isArithmetic(t: TypeExpression): boolean {
  return arithmeticRank(t) > 0
}

/** Pointers and arrays (which decay to pointers in expressions). */
function isObjectPointer(t: TypeExpression): boolean {
  return hasTag(t, 'Pointer') || hasTag(t, 'Array')
}

function isPointerish(t: TypeExpression): boolean {
  return isObjectPointer(t) || hasTag(t, 'Function')
}

export function isScalar(t: TypeExpression): boolean {
  return isArithmetic(t) || isPointerish(t)
}

function isAggregate(t: TypeExpression): boolean {
  return hasTag(t, 'Struct') || hasTag(t, 'Union')
}

/** Void, the statement marker and tuples never denote a value. */
function isValueless(t: TypeExpression): boolean {
  return hasTag(t, 'Void') || hasTag(t, 'NoneExpression') || hasTag(t, 'Tuple')
}

function withoutModifiers(t: TypeExpression, drop: (m: BaseType) => boolean): TypeExpression {
  if (!t.modifiers.some(drop)) return t
  return { base: t.base, children: t.children, modifiers: t.modifiers.filter((m) => !drop(m)) }
}

/** Drop storage classes and function specifiers. */
export function stripStorage(t: TypeExpression): TypeExpression {
  return withoutModifiers(t, (m) => STORAGE_MODIFIERS.has(m.tag))
}

/** Drop storage classes, function specifiers and qualifiers. */
export function unqualified(t: TypeExpression): TypeExpression {
  return withoutModifiers(t, (m) => STORAGE_MODIFIERS.has(m.tag) || QUALIFIER_MODIFIERS.has(m.tag))
}

// `char s[] = "abc"`: arrays only take arrays of the same element type.
function sameElementArray(left: TypeExpression, right: TypeExpression): boolean {
  const [target] = left.children
  const [source] = right.children
  if (!hasTag(right, 'Array') || target === undefined || source === undefined) return false
  return typesEqual(unqualified(target), unqualified(source))
}

/**
 * Resolve a declarator shape against its specifier type. Storage classes and
 * function specifiers stay on the declared entity: `static int f(void)` is
 * `static function(int)`.
 */
export function declaredType(shape: TypeExpression, specifiers: TypeExpression): TypeExpression {
  const storage = specifiers.modifiers.filter((m) => STORAGE_MODIFIERS.has(m.tag))
  const declared = applyDeclarator(shape, stripStorage(specifiers))
  if (storage.length === 0) return declared
  return { base: declared.base, children: declared.children, modifiers: [...storage, ...declared.modifiers] }
}

/** The same type with every modifier removed. */
export function baseTypeOf(t: TypeExpression): TypeExpression {
  return { base: t.base, children: t.children, modifiers: [] }
}

function decay(t: TypeExpression): TypeExpression {
  const element = t.children[0]
  if (hasTag(t, 'Array') && element !== undefined) {
    return { base: { tag: 'Pointer' }, children: [element], modifiers: [] }
  }
  return unqualified(t)
}

function promote(t: TypeExpression): TypeExpression {
  return integerRank(t) < INT_RANK ? typeOf('Int') : unqualified(t)
}

function usualArithmetic(left: TypeExpression, right: TypeExpression): TypeExpression {
  const winner = arithmeticRank(right) > arithmeticRank(left) ? right : left
  if (isInteger(winner)) return promote(winner)
  return unqualified(winner)
}

function accept(type: TypeExpression): TypeCombination {
  return { accepted: true, type }
}

const REJECT: TypeCombination = { accepted: false }

function isComparison(op: BinaryOperator): boolean {
  switch (op) {
    case '<':
    case '>':
    case '<=':
    case '>=':
    case '==':
    case '!=':
    case '&&':
    case '||':
      return true
    default:
      return false
  }
}

// The type a placeholder operand takes: the other operand's, except opposite a
// pointer in `+`, or right of a pointer in `-`, where it is an integer offset.
function standIn(other: TypeExpression, op: BinaryOperator, onRight: boolean): TypeExpression {
  if (isObjectPointer(other) && (op === '+' || (op === '-' && onRight))) return typeOf('Long')
  return other
}

/**
 * Result type of `left op right`, or a rejection. A named placeholder
 * operand stands in for the other operand's type.
 */
export function combineTypes(
  left: TypeExpression,
  right: TypeExpression,
  op: BinaryOperator,
): TypeCombination {
  if (isPlaceholder(left) && isPlaceholder(right)) {
    return accept(isComparison(op) ? typeOf('Int') : left)
  }
  const l = isPlaceholder(left) ? standIn(right, op, false) : left
  const r = isPlaceholder(right) ? standIn(left, op, true) : right

  switch (op) {
    case '*':
    case '/':
      return isArithmetic(l) && isArithmetic(r) ? accept(usualArithmetic(l, r)) : REJECT
    case '%':
    case '&':
    case '^':
    case '|':
      return isInteger(l) && isInteger(r) ? accept(usualArithmetic(l, r)) : REJECT
    case '<<':
    case '>>':
      return isInteger(l) && isInteger(r) ? accept(promote(l)) : REJECT
    case '+':
      if (isArithmetic(l) && isArithmetic(r)) return accept(usualArithmetic(l, r))
      if (isObjectPointer(l) && isInteger(r)) return accept(decay(l))
      if (isInteger(l) && isObjectPointer(r)) return accept(decay(r))
      return REJECT
    case '-':
      if (isArithmetic(l) && isArithmetic(r)) return accept(usualArithmetic(l, r))
      if (isObjectPointer(l) && isInteger(r)) return accept(decay(l))
      if (isObjectPointer(l) && isObjectPointer(r)) return accept(typeOf('Long'))
      return REJECT
    case '<':
    case '>':
    case '<=':
    case '>=':
      if (isArithmetic(l) && isArithmetic(r)) return accept(typeOf('Int'))
      if (isObjectPointer(l) && isObjectPointer(r)) return accept(typeOf('Int'))
      return REJECT
    case '==':
    case '!=':
      if (isArithmetic(l) && isArithmetic(r)) return accept(typeOf('Int'))
      if (isPointerish(l) && (isPointerish(r) || isInteger(r))) return accept(typeOf('Int'))
      if (isInteger(l) && isPointerish(r)) return accept(typeOf('Int'))
      return REJECT
    case '&&':
    case '||':
      return isScalar(l) && isScalar(r) ? accept(typeOf('Int')) : REJECT
  }
}

/** Whether an explicit `(target) source` cast is allowed. */
export function castIsLegal(target: TypeExpression, source: TypeExpression): boolean {
  switch (target.base.tag) {
    case 'Struct':
    case 'Union':
    case 'Array':
    case 'Function':
    case 'Tuple':
    case 'NoneExpression':
      return false
    case 'Void':
      return true
    default:
      break
  }
  if (isPlaceholder(source)) return true
  if (!isScalar(source) || !isScalar(target)) return false
  if (isFloating(target) && isPointerish(source)) return false
  if (isPointerish(target) && isFloating(source)) return false
  return true
}

function sameAggregate(left: TypeExpression, right: TypeExpression): boolean {
  if (left.base.tag !== right.base.tag) return false
  const l = tagName(left)
  const r = tagName(right)
  if (l !== null || r !== null) return l === r
  return typesEqual(baseTypeOf(left), baseTypeOf(right))
}

/**
 * Type of `left = right`: the left type without storage modifiers, or null
 * when no implicit conversion exists.
 */
export function resolveImplicitConversion(
  left: TypeExpression,
  right: TypeExpression,
): TypeExpression | null {
  if (isValueless(right)) return null
  if (isPlaceholder(left)) return stripStorage(right)

  const result = stripStorage(left)
  if (hasTag(left, 'Array')) {
    return isPlaceholder(right) || sameElementArray(left, right) ? result : null
  }
  switch (left.base.tag) {
    case 'Function':
    case 'Void':
    case 'NoneExpression':
    case 'Tuple':
      return null
    default:
      break
  }
  if (isPlaceholder(right)) return result

  if (isAggregate(left)) {
    return sameAggregate(left, right) ? result : null
  }
  if (isAggregate(right)) return null

  if (hasTag(left, 'Pointer')) {
    return isPointerish(right) || isInteger(right) ? result : null
  }
  if (hasTag(left, 'Bool')) {
    return isScalar(right) ? result : null
  }
  if (isArithmetic(left)) {
    return isArithmetic(right) ? result : null
  }
  return null
}

function modifierKey(m: BaseType): string {
  switch (m.tag) {
    case 'Identifier':
      return `$${m.name}`
    case 'Array':
      return `[${m.length ?? ''}]`
    default:
      return m.tag
  }
}

function relevantModifiers(t: TypeExpression): string[] {
  return t.modifiers
    .filter((m) => !STORAGE_MODIFIERS.has(m.tag))
    .map(modifierKey)
    .sort()
}

function sameBase(a: BaseType, b: BaseType): boolean {
  if (a.tag === 'Array' && b.tag === 'Array') {
    return a.length === null || b.length === null || a.length === b.length
  }
  return a.tag === b.tag
}

/**
 * Structural equality. Storage classes and function specifiers are ignored;
 * a named placeholder equals any type.
 */
export function typesEqual(a: TypeExpression, b: TypeExpression): boolean {
  if (isPlaceholder(a) || isPlaceholder(b)) return true
  if (!sameBase(a.base, b.base)) return false

  const am = relevantModifiers(a)
  const bm = relevantModifiers(b)
  if (am.length !== bm.length) return false
  for (let i = 0; i < am.length; i++) {
    if (am[i] !== bm[i]) return false
  }

  if (a.children.length !== b.children.length) return false
  for (let i = 0; i < a.children.length; i++) {
    if (!typesEqual(a.children[i], b.children[i])) return false
  }
  return true
}
