// Type Expression model: the vocabulary every parse node is labeled with.
//
// A type is a primary tag (`base`), composed children (pointer-to-X,
// array-of-X, function-returning-X) and a flat list of extra values
// (`modifiers`) for qualifiers, storage classes and multi-keyword
// combinations such as `unsigned long`.

export type PrimitiveTag =
  | 'Void'
  | 'Bool'
  | 'Char'
  | 'Short'
  | 'Int'
  | 'Long'
  | 'Float'
  | 'Double'
  | 'Signed'
  | 'Unsigned'
  | 'Complex'
  | 'Imaginary'
  | 'Pointer'
  | 'VoidPointer'
  | 'Struct'
  | 'Union'
  | 'Enum'
  | 'Function'
  | 'Extern'
  | 'Static'
  | 'ThreadLocal'
  | 'Auto'
  | 'Register'
  | 'Const'
  | 'Restrict'
  | 'Volatile'
  | 'Atomic'
  | 'Inline'
  | 'Noreturn'
  | 'SizeT'
  | 'VaList'
  | 'NoneExpression'
  | 'Tuple'

export type BaseType =
  | { readonly tag: PrimitiveTag }
  | { readonly tag: 'Array'; readonly length: number | null }
  | { readonly tag: 'Identifier'; readonly name: string }

export type TypeTag = BaseType['tag']

export interface TypeExpression {
  readonly base: BaseType
  readonly children: readonly TypeExpression[]
  readonly modifiers: readonly BaseType[]
}

// === constructors ===

export function typeOf(
  tag: PrimitiveTag,
  children: readonly TypeExpression[] = [],
  modifiers: readonly BaseType[] = [],
): TypeExpression {
  return { base: { tag }, children, modifiers }
}

/** Named placeholder: the type of an identifier whose declaration is not tracked. */
export function placeholder(name: string): TypeExpression {
  return { base: { tag: 'Identifier', name }, children: [], modifiers: [] }
}

export function pointerTo(target: TypeExpression, modifiers: readonly BaseType[] = []): TypeExpression {
  return { base: { tag: 'Pointer' }, children: [target], modifiers }
}

export function arrayOf(length: number | null, element: TypeExpression): TypeExpression {
  return { base: { tag: 'Array', length }, children: [element], modifiers: [] }
}

export function functionReturning(
  returns: TypeExpression,
  params: readonly TypeExpression[],
  variadic: boolean,
): TypeExpression {
  return {
    base: { tag: 'Function' },
    children: [returns, ...params],
    modifiers: variadic ? [{ tag: 'VaList' }] : [],
  }
}

export function tupleOf(items: readonly TypeExpression[]): TypeExpression {
  return typeOf('Tuple', items)
}

/** Statement marker: constructs that have no expression type. */
export function noneType(): TypeExpression {
  return typeOf('NoneExpression')
}

export function withModifiers(t: TypeExpression, extra: readonly BaseType[]): TypeExpression {
  if (extra.length === 0) return t
  return { base: t.base, children: t.children, modifiers: [...t.modifiers, ...extra] }
}

// === queries ===

export function hasTag(t: TypeExpression, tag: TypeTag): boolean {
  return t.base.tag === tag
}

export function isPlaceholder(t: TypeExpression): boolean {
  return t.base.tag === 'Identifier'
}

/** Tag name of a struct, union or enum type, when it has one. */
export function tagName(t: TypeExpression): string | null {
  for (const m of t.modifiers) {
    if (m.tag === 'Identifier') return m.name
  }
  return null
}

// === declarator resolution ===

/**
 * Turn a declarator shape inside out around the specifier type.
 *
 * Shapes nest the declared name at their core: `*a[3]` is
 * Pointer{Array(3){a}}. Each layer wraps the accumulated type from the
 * outside in, so the result reads the way C declares it:
 * `int *a[3]` is array[3](pointer(int)). Both a named placeholder and the
 * NoneExpression hole of an abstract declarator end the walk.
 */
export function applyDeclarator(shape: TypeExpression, base: TypeExpression): TypeExpression {
  switch (shape.base.tag) {
    case 'Pointer':
    case 'Array':
    case 'Function': {
      const [inner, ...rest] = shape.children
      const wrapped: TypeExpression = {
        base: shape.base,
        children: [base, ...rest],
        modifiers: shape.modifiers,
      }
      if (inner === undefined) return wrapped
      return applyDeclarator(inner, wrapped)
    }
    default:
      return base
  }
}

// === rendering ===

function spellTag(base: BaseType): string {
  switch (base.tag) {
    case 'Array':
      return base.length === null ? 'array[]' : `array[${base.length}]`
    case 'Identifier':
      return `$${base.name}`
    case 'VoidPointer':
      return 'void*'
    case 'SizeT':
      return 'size_t'
    case 'VaList':
      return '...'
    case 'NoneExpression':
      return 'none'
    case 'ThreadLocal':
      return '_Thread_local'
    case 'Noreturn':
      return '_Noreturn'
    case 'Bool':
      return '_Bool'
    case 'Atomic':
      return '_Atomic'
    case 'Complex':
      return '_Complex'
    case 'Imaginary':
      return '_Imaginary'
    default:
      return base.tag.toLowerCase()
  }
}

/**
 * Render a type as text: modifiers before the base, children in parentheses.
 * `unsigned long`, `pointer(int)`, `array[3](pointer(int))`, `struct $point`,
 * `function(int, long, ...)`.
 */
export function formatType(t: TypeExpression): string {
  const words: string[] = []
  const parts = t.children.map(formatType)
  let tag: string | null = null
  for (const m of t.modifiers) {
    if (m.tag === 'Identifier') {
      tag = spellTag(m)
    } else if (m.tag === 'VaList') {
      parts.push('...')
    } else {
      words.push(spellTag(m))
    }
  }
  words.push(spellTag(t.base))
  if (tag !== null) words.push(tag)
  const head = words.join(' ')
  if (parts.length === 0) return head
  return `${head}(${parts.join(', ')})`
}
