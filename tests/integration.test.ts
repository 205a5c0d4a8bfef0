import { parse, parseTokens, Scanner, ParseError, formatTree, formatType } from '../src/index'
import type { ParseFailure } from '../src/index'

const program = `
struct point { int x; int y; };

static int dot(struct point *a, struct point *b) {
  return a->x * b->x + a->y * b->y;
}

int main(void) {
  int total = 0;
  for (int i = 0; i < 4; i++) {
    if (i % 2) continue;
    total += i;
  }
  return total;
}
`

function failureOf(source: string): ParseFailure {
  try {
    parse(source)
  } catch (err) {
    if (err instanceof ParseError) return err.failure
    throw err
  }
  throw new Error(`expected ${source} to fail`)
}

describe('integration', () => {
  it('parses a complete program', () => {
    const unit = parse(program)
    expect(unit.kind).toBe('TranslationUnit')
    expect(unit.children.map((c) => c.kind)).toEqual(['Declaration', 'FunctionDefinition', 'FunctionDefinition'])
    expect(formatType(unit.type)).toBe(
      'tuple(struct $point(int, int), static function(int, pointer(struct $point), pointer(struct $point)), function(int))',
    )
  })

  it('produces identical trees for identical input', () => {
    expect(parse(program)).toEqual(parse(program))
  })

  it('types a single declaration unit with that declaration', () => {
    expect(formatType(parse('long n;').type)).toBe('long')
  })

  describe('failures', () => {
    it('rejects empty input', () => {
      expect(failureOf('').code).toBe('PositionOutOfRange')
    })

    it('reports unconsumed tokens', () => {
      const failure = failureOf('int x; }')
      expect(failure.code).toBe('IncompleteParse')
      expect(failure.position).toBe(3)
      expect(() => parse('int x; }')).toThrow('Parser did not consume all tokens of <input>')
    })

    it('names the source in the thrown error', () => {
      let error: unknown = null
      try {
        parse('int x', { sourceLabel: 'main.c' })
      } catch (err) {
        error = err
      }
      expect(error).toBeInstanceOf(ParseError)
      if (error instanceof ParseError) {
        expect(error.name).toBe('ParseError')
        expect(error.sourceLabel).toBe('main.c')
        expect(error.message).toBe('Parser did not consume all tokens of main.c')
      }
    })

    it('reports a rejected assignment statement as the cause', () => {
      const failure = failureOf('void f(void) { &x = 1.5; }')
      if (failure.code !== 'IncompleteParse') throw new Error(`expected IncompleteParse, got ${failure.code}`)
      expect(failure.cause?.code).toBe('IllegalAssignment')
      expect(failure.cause?.position).toBe(8)
    })

    it('accepts a compound assignment statement with a floating value', () => {
      const [fn] = parse('void f(void) { x <<= 1.5; }').children
      expect(fn.kind).toBe('FunctionDefinition')
    })

    it('rejects typedef', () => {
      expect(() => parse('typedef int T;')).toThrow('typedef is not supported')
    })

    it('limits statement nesting', () => {
      const body = `${'{'.repeat(10)}${'}'.repeat(10)}`
      let error: unknown = null
      try {
        parse(`void f(void) { ${body} }`, { maxDepth: 4 })
      } catch (err) {
        error = err
      }
      if (!(error instanceof ParseError)) throw new Error('expected ParseError')
      expect(error.failure.code).toBe('NestingTooDeep')
    })

    it('returns failures from parseTokens instead of throwing', () => {
      const result = parseTokens(new Scanner('int x; }').scan(), 'unit.c')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.message).toBe('Parser did not consume all tokens of unit.c')
    })
  })

  describe('logging', () => {
    function spyLogger() {
      return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    }

    it('logs the token count and the result', () => {
      const logger = spyLogger()
      parse('int x;', { logger })
      expect(logger.debug).toHaveBeenCalledWith('parsing %s (%d tokens)', '<input>', 3)
      expect(logger.debug).toHaveBeenCalledWith('parsed %s: %d external declarations', '<input>', 1)
      expect(logger.warn).not.toHaveBeenCalled()
    })

    it('warns when a parse fails', () => {
      const logger = spyLogger()
      expect(() => parse('int x; }', { logger })).toThrow(ParseError)
      expect(logger.warn).toHaveBeenCalledWith(
        'parse of %s failed: %s',
        '<input>',
        'Parser did not consume all tokens of <input>',
      )
    })
  })

  describe('locations', () => {
    it('adds line and column when requested', () => {
      const unit = parse('int x;\nint y;', { loc: true })
      const second = unit.children[1]
      expect(second.loc).toEqual({ start: { line: 2, column: 0 }, end: { line: 2, column: 6 } })
      expect(second.start).toBe(7)
      expect(second.end).toBe(13)
    })

    it('omits locations by default', () => {
      const unit = parse('int x;\nint y;')
      expect(unit.children[1].loc).toBeUndefined()
    })
  })

  it('dumps a parsed declaration', () => {
    const unit = parse('int x = 0;')
    expect(formatTree(unit)).toBe(
      [
        'TranslationUnit : int',
        '  Declaration : int',
        '    DeclarationSpecifiers : int',
        '      TypeSpecifier int : int',
        '    InitDeclaratorList : int',
        '      InitDeclarator : int',
        '        Declarator x : $x',
        '          DirectDeclarator : $x',
        '            Identifier x : $x',
        '        Constant 0 : long',
      ].join('\n'),
    )
  })
})
