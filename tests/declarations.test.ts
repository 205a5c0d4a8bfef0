import { parse, parseTokens, Scanner, formatType } from '../src/index'
import type { ParseFailure, ParseNode } from '../src/index'

/** Helper: the first external declaration of a translation unit */
function firstDecl(source: string): ParseNode {
  const [decl] = parse(source).children
  if (decl === undefined) throw new Error('expected a declaration')
  return decl
}

function declType(source: string): string {
  return formatType(firstDecl(source).type)
}

function failureOf(source: string): ParseFailure {
  const result = parseTokens(new Scanner(source).scan(), 'test.c')
  if (result.ok) throw new Error(`expected ${source} to fail`)
  return result.failure
}

/** Helper: the failure that stopped the translation unit early */
function causeOf(source: string): ParseFailure | null {
  const failure = failureOf(source)
  if (failure.code !== 'IncompleteParse') throw new Error(`expected IncompleteParse, got ${failure.code}`)
  return failure.cause
}

describe('declarations', () => {
  describe('specifiers', () => {
    it('types a plain declaration', () => {
      const decl = firstDecl('int x;')
      expect(decl.kind).toBe('Declaration')
      expect(formatType(decl.type)).toBe('int')
    })

    it('keeps extra arithmetic keywords as modifiers', () => {
      expect(declType('unsigned long x;')).toBe('unsigned long')
      expect(declType('long unsigned int x;')).toBe('unsigned long')
      expect(declType('signed char c;')).toBe('signed char')
    })

    it('drops redundant keywords', () => {
      expect(declType('long int y;')).toBe('long')
      expect(declType('signed int z;')).toBe('int')
    })

    it('keeps a lone signed or unsigned as the base', () => {
      expect(declType('unsigned u;')).toBe('unsigned')
    })

    it('records qualifiers and storage classes', () => {
      expect(declType('const volatile int z;')).toBe('const volatile int')
      expect(declType('static int count;')).toBe('static int')
      expect(declType('extern const double pi;')).toBe('extern const double')
    })

    it('names the storage class on its specifier node', () => {
      const specifiers = firstDecl('_Thread_local register int n;').children[0]
      expect(specifiers.children.map((c) => (c.kind === 'StorageClassSpecifier' ? c.specifier : c.kind))).toEqual([
        '_Thread_local',
        'register',
        'TypeSpecifier',
      ])
    })

    it('treats _Atomic specifier and qualifier alike', () => {
      expect(declType('_Atomic(int) x;')).toBe('_Atomic int')
      expect(declType('_Atomic int y;')).toBe('_Atomic int')
    })

    it('ignores _Alignas in the type', () => {
      expect(declType('_Alignas(8) int x;')).toBe('int')
      expect(declType('_Alignas(double) char c;')).toBe('char')
    })

    it('rejects a struct combined with a type keyword', () => {
      expect(causeOf('struct P int x;')?.code).toBe('ConflictingSpecifiers')
    })

    it('rejects typedef', () => {
      const failure = failureOf('typedef int T;')
      expect(failure.code).toBe('UnsupportedFeature')
      if (failure.code === 'UnsupportedFeature') expect(failure.feature).toBe('typedef')
    })
  })

  describe('declarators', () => {
    it('resolves an array of pointers', () => {
      expect(declType('int *a[3];')).toBe('array[3](pointer(int))')
    })

    it('resolves a pointer to a function', () => {
      expect(declType('int (*fp)(int);')).toBe('pointer(function(int, int))')
    })

    it('resolves multidimensional arrays', () => {
      expect(declType('char buf[2][3];')).toBe('array[2](array[3](char))')
      expect(declType('int a[];')).toBe('array[](int)')
    })

    it('qualifies the pointed-to type', () => {
      expect(declType('const char *s;')).toBe('pointer(const char)')
    })

    it('limits long pointer chains', () => {
      const failure = failureOf(`int ${'*'.repeat(20000)}p;`)
      expect(failure.code).toBe('NestingTooDeep')
      if (failure.code === 'NestingTooDeep') expect(failure.limit).toBe(256)
    })

    it('types several declarators as a tuple', () => {
      expect(declType('int a, *b;')).toBe('tuple(int, pointer(int))')
    })

    it('types function prototypes', () => {
      expect(declType('int f(void);')).toBe('function(int)')
      expect(declType('void g();')).toBe('function(void)')
      expect(declType('void h(int *, char);')).toBe('function(void, pointer(int), char)')
    })

    it('marks variadic functions', () => {
      const decl = firstDecl('int printf(const char *fmt, ...);')
      expect(formatType(decl.type)).toBe('function(int, pointer(const char), ...)')
    })
  })

  describe('struct, union and enum', () => {
    it('types a struct by its members', () => {
      expect(declType('struct point { int x; int y; } p;')).toBe('struct $point(int, int)')
      expect(declType('struct point;')).toBe('struct $point')
    })

    it('parses bit-fields', () => {
      expect(declType('struct flags { unsigned a : 1; unsigned : 3; } f;')).toBe('struct $flags(unsigned, unsigned)')
    })

    it('types a union by its members', () => {
      expect(declType('union u { int i; double d; } v;')).toBe('union $u(int, double)')
    })

    it('parses an enum with a trailing comma', () => {
      const decl = firstDecl('enum color { RED, GREEN = 2, };')
      expect(formatType(decl.type)).toBe('enum $color')
      const specifier = decl.children[0].children[0]
      expect(specifier.kind).toBe('EnumSpecifier')
      const enumerators = specifier.children[0].children
      expect(enumerators.map((e) => (e.kind === 'Enumerator' ? e.name : null))).toEqual(['RED', 'GREEN'])
      expect(formatType(enumerators[1].type)).toBe('long')
    })

    it('rejects a floating enumerator value', () => {
      expect(causeOf('enum E { A = 1.5 };')?.code).toBe('IllegalAssignment')
    })
  })

  describe('initializers', () => {
    it('accepts a convertible initializer', () => {
      const decl = firstDecl('int x = 1;')
      expect(formatType(decl.type)).toBe('int')
      const init = decl.children[1].children[0]
      expect(init.kind).toBe('InitDeclarator')
      expect(init.children[1].kind).toBe('Constant')
    })

    it('accepts a string for a char pointer', () => {
      expect(declType('const char *s = "hi";')).toBe('pointer(const char)')
    })

    it('initializes a char array from a string literal', () => {
      expect(declType('char s[] = "abc";')).toBe('array[](char)')
      expect(declType('char s[4] = "abc";')).toBe('array[4](char)')
    })

    it('rejects a string for an int array', () => {
      expect(causeOf('int a[2] = "ab";')?.code).toBe('IllegalAssignment')
    })

    it('rejects an initializer without an implicit conversion', () => {
      expect(causeOf('int *p = 1.5;')?.code).toBe('IllegalAssignment')
      expect(causeOf('int x = "s";')?.code).toBe('IllegalAssignment')
    })

    it('parses designated initializers', () => {
      const decl = firstDecl('int a[3] = { [0] = 1, [2] = 3 };')
      const list = decl.children[1].children[0].children[1]
      expect(list.kind).toBe('InitializerList')
      expect(list.children).toHaveLength(2)
      const [first] = list.children
      expect(first.kind).toBe('DesignatedInitializer')
      expect(first.children[0].kind).toBe('Designation')
      expect(first.children[0].children[0].kind).toBe('ArrayDesignator')
    })

    it('parses nested and member initializers', () => {
      const decl = firstDecl('struct P p = { .x = 1, .y = { 2, }, };')
      const list = decl.children[1].children[0].children[1]
      expect(list.children).toHaveLength(2)
      const designator = list.children[1].children[0].children[0]
      expect(designator.kind === 'MemberDesignator' && designator.member).toBe('y')
    })
  })

  describe('function definitions', () => {
    it('types a definition with its function type', () => {
      const fn = firstDecl('int add(int a, int b) { return a + b; }')
      if (fn.kind !== 'FunctionDefinition') throw new Error('expected FunctionDefinition')
      expect(fn.name).toBe('add')
      expect(formatType(fn.type)).toBe('function(int, int, int)')
      expect(fn.children.map((c) => c.kind)).toEqual(['DeclarationSpecifiers', 'Declarator', 'CompoundStatement'])
    })

    it('keeps function specifiers and storage on the function', () => {
      expect(declType('inline static int h(void) { return 0; }')).toBe('inline static function(int)')
    })

    it('accepts K&R parameter declarations', () => {
      const fn = firstDecl('int f(a, b) int a; int b; { return a; }')
      expect(fn.children.map((c) => c.kind)).toEqual([
        'DeclarationSpecifiers',
        'Declarator',
        'DeclarationList',
        'CompoundStatement',
      ])
      expect(formatType(fn.type)).toBe('function(int, $a, $b)')
    })
  })

  it('parses _Static_assert', () => {
    const decl = firstDecl('_Static_assert(1, "ok");')
    if (decl.kind !== 'StaticAssertDeclaration') throw new Error('expected StaticAssertDeclaration')
    expect(decl.message).toBe('ok')
    expect(formatType(decl.type)).toBe('none')
  })
})
