import { Parser, Scanner, formatType, formatTree } from '../src/index'
import type { Parsed, ParseNode, ParserOptions } from '../src/index'

function parserFor(source: string, options?: ParserOptions) {
  return new Parser(new Scanner(source).scan(), options)
}

/** Helper: parse a standalone expression from the first token */
function parseExpr(source: string, options?: ParserOptions): Parsed {
  return parserFor(source, options).parseExpression(0)
}

/** Helper: parse an expression that must succeed and consume all input */
function exprNode(source: string): ParseNode {
  const tokenCount = new Scanner(source).scan().length
  const result = parseExpr(source)
  if (!result.ok) throw new Error(`expected ${source} to parse, got ${result.failure.code}`)
  expect(result.pos).toBe(tokenCount)
  return result.node
}

function exprType(source: string): string {
  return formatType(exprNode(source).type)
}

describe('expressions', () => {
  describe('primary expressions', () => {
    it('types integer constants as long', () => {
      const node = exprNode('42')
      expect(node.kind).toBe('Constant')
      if (node.kind === 'Constant') {
        expect(node.value).toBe(42)
        expect(node.floating).toBe(false)
      }
      expect(formatType(node.type)).toBe('long')
    })

    it('types floating constants as double', () => {
      expect(exprType('1.5')).toBe('double')
    })

    it('types identifiers with a named placeholder', () => {
      const node = exprNode('count')
      expect(node.kind).toBe('Identifier')
      expect(formatType(node.type)).toBe('$count')
    })

    it('concatenates adjacent string literals', () => {
      const node = exprNode('"ab" "cd"')
      expect(node.kind).toBe('StringLiteral')
      if (node.kind === 'StringLiteral') {
        expect(node.value).toBe('abcd')
      }
      expect(formatType(node.type)).toBe('array[4](char)')
    })

    it('replaces __func__ with a fixed name', () => {
      const node = exprNode('__func__')
      if (node.kind !== 'StringLiteral') throw new Error('expected StringLiteral')
      expect(node.value).toBe('__func_name__')
      expect(formatType(node.type)).toBe('array[13](char)')
    })

    it('returns the inner node of a parenthesized expression', () => {
      const node = exprNode('((((1))))')
      expect(node.kind).toBe('Constant')
    })
  })

  describe('binary operators', () => {
    it('folds same-precedence operators to the left', () => {
      expect(formatTree(exprNode('1 - 2 - 3'))).toBe(
        [
          'BinaryExpression - : long',
          '  BinaryExpression - : long',
          '    Constant 1 : long',
          '    Constant 2 : long',
          '  Constant 3 : long',
        ].join('\n'),
      )
    })

    it('binds multiplication tighter than addition', () => {
      const node = exprNode('1 + 2 * 3')
      if (node.kind !== 'BinaryExpression') throw new Error('expected BinaryExpression')
      expect(node.operator).toBe('+')
      const right = node.children[1]
      expect(right.kind === 'BinaryExpression' && right.operator).toBe('*')
    })

    it('types comparisons as int', () => {
      expect(exprType('1.5 < 2')).toBe('int')
      expect(exprType('a == b && c')).toBe('int')
    })

    it('promotes mixed arithmetic', () => {
      expect(exprType('1 + 2.5')).toBe('double')
      expect(exprType('x * 2')).toBe('long')
    })

    it('treats a name added to a pointer as an offset', () => {
      expect(exprType('&a[0] + i')).toBe('pointer($a)')
    })

    it('rejects operands the operator cannot combine', () => {
      const result = parseExpr('1.5 % 2')
      expect(result.ok).toBe(false)
      if (!result.ok && result.failure.code === 'IllegalTypeCombination') {
        expect(result.failure.operator).toBe('%')
        expect(result.failure.position).toBe(1)
      } else {
        throw new Error('expected IllegalTypeCombination')
      }
    })
  })

  describe('conditional expression', () => {
    it('takes the type of the false branch', () => {
      const node = exprNode('1 ? 2 : 3')
      expect(node.kind).toBe('ConditionalExpression')
      expect(formatType(node.type)).toBe('long')
    })

    it('accepts a placeholder condition', () => {
      expect(exprType('ready ? 1.0 : 2.0')).toBe('double')
    })

    it('rejects a floating condition', () => {
      const result = parseExpr('1.5 ? 2 : 3')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.failure.code).toBe('InvalidCondition')
        expect(result.failure.position).toBe(1)
      }
    })

    it('rejects branches of different types', () => {
      const result = parseExpr('1 ? 2 : 3.0')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.failure.code).toBe('BranchTypeMismatch')
    })
  })

  describe('assignment', () => {
    it('types an assignment with the converted value', () => {
      const node = exprNode('x = 1')
      if (node.kind !== 'AssignmentExpression') throw new Error('expected AssignmentExpression')
      expect(node.operator).toBe('=')
      expect(formatType(node.type)).toBe('long')
    })

    it('is right associative', () => {
      const node = exprNode('a = b = 2')
      expect(node.kind).toBe('AssignmentExpression')
      expect(node.children[1].kind).toBe('AssignmentExpression')
    })

    it('accepts compound assignment', () => {
      expect(exprType('x += 1.5')).toBe('double')
    })

    it('checks compound assignment by implicit conversion only', () => {
      const node = exprNode('x <<= 1.5')
      if (node.kind !== 'AssignmentExpression') throw new Error('expected AssignmentExpression')
      expect(node.operator).toBe('<<=')
      expect(formatType(node.type)).toBe('double')
    })

    it('fails a complete assignment the oracle rejects', () => {
      const result = parseExpr('&x = 1.5')
      expect(result.ok).toBe(false)
      if (!result.ok && result.failure.code === 'IllegalAssignment') {
        expect(result.failure.position).toBe(2)
        expect(formatType(result.failure.target)).toBe('pointer($x)')
        expect(formatType(result.failure.value)).toBe('double')
      } else {
        throw new Error('expected IllegalAssignment')
      }
    })

    it('fails a rejected assignment inside an argument list', () => {
      const result = parseExpr('f(1, &x = 1.5)')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.failure.code).toBe('IllegalAssignment')
    })

    it('falls back to a conditional expression without an assignment operator', () => {
      const debug = vi.fn()
      const logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const result = parseExpr('a + b', { logger })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.node.kind).toBe('BinaryExpression')
        expect(result.pos).toBe(3)
      }
      expect(debug).toHaveBeenCalledWith(
        '%s: alternative %d failed at token %d (%s)',
        'assignment-expression',
        0,
        0,
        'UnexpectedToken',
      )
    })

    it('builds a comma expression typed by its last element', () => {
      const node = exprNode('a, 1.5')
      expect(node.kind).toBe('CommaExpression')
      expect(formatType(node.type)).toBe('double')
    })
  })

  describe('casts', () => {
    it('types a cast with its target', () => {
      const node = exprNode('(long)1')
      expect(node.kind).toBe('CastExpression')
      expect(formatType(node.type)).toBe('long')
    })

    it('casts a parenthesized operand', () => {
      const node = exprNode('(int)(1)')
      expect(node.kind).toBe('CastExpression')
      expect(formatType(node.type)).toBe('int')
      expect(node.children[1].kind).toBe('Constant')
    })

    it('casts to pointer types', () => {
      expect(exprType('(char *)0')).toBe('pointer(char)')
    })

    it('rejects a cast to a struct', () => {
      const result = parseExpr('(struct P)1')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.failure.code).toBe('IllegalCast')
        expect(result.failure.position).toBe(0)
      }
    })

    it('rejects a cast from a struct compound literal', () => {
      const result = parseExpr('(int)(struct P){1}')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.failure.code).toBe('IllegalCast')
    })

    it('parses a compound literal', () => {
      const node = exprNode('(int){1, 2,}')
      expect(node.kind).toBe('CompoundLiteral')
      expect(formatType(node.type)).toBe('int')
    })
  })

  describe('unary operators', () => {
    it('takes the address of an operand', () => {
      expect(exprType('&x')).toBe('pointer($x)')
    })

    it('types a dereference as a void pointer', () => {
      expect(exprType('*p')).toBe('void* pointer')
    })

    it('types sizeof and _Alignof as size_t', () => {
      expect(exprType('sizeof x')).toBe('size_t')
      expect(exprType('sizeof(int)')).toBe('size_t')
      expect(exprType('_Alignof(double)')).toBe('size_t')
    })

    it('keeps the operand type for arithmetic operators', () => {
      expect(exprType('-1')).toBe('long')
      expect(exprType('~x')).toBe('$x')
      expect(exprType('++i')).toBe('$i')
    })
  })

  describe('postfix expressions', () => {
    it('parses subscripts, member access and increments', () => {
      expect(exprNode('a[1]').kind).toBe('Subscript')
      expect(exprType('s.x')).toBe('$x')
      expect(exprType('i++')).toBe('$i')

      const arrow = exprNode('p->y')
      if (arrow.kind !== 'MemberAccess') throw new Error('expected MemberAccess')
      expect(arrow.arrow).toBe(true)
      expect(arrow.member).toBe('y')
    })

    it('parses a call with arguments', () => {
      const node = exprNode('f(1, 2)')
      expect(node.kind).toBe('Call')
      const args = node.children[1]
      expect(args.kind).toBe('ArgumentList')
      expect(args.children).toHaveLength(2)
      expect(formatType(args.type)).toBe('tuple(long, long)')
    })

    it('parses a call without arguments', () => {
      const node = exprNode('f()')
      expect(node.kind).toBe('Call')
      expect(node.children).toHaveLength(1)
    })

    it('stops an argument list before a trailing comma', () => {
      const parser = parserFor('f(a, b,)')
      const args = parser.parseArgumentList(2)
      expect(args.ok).toBe(true)
      if (args.ok) {
        expect(args.node.children).toHaveLength(2)
        expect(args.pos).toBe(5)
      }
    })

    it('rejects a call with a trailing comma', () => {
      const result = parseExpr('f(a, b,)')
      expect(result.ok).toBe(false)
      if (!result.ok && result.failure.code === 'UnexpectedToken') {
        expect(result.failure.position).toBe(5)
      } else {
        throw new Error('expected UnexpectedToken')
      }
    })
  })

  describe('_Generic', () => {
    it('selects the association matching the controlling type', () => {
      const node = exprNode('_Generic(1, int: 2, long: 3.0, default: 4)')
      expect(node.kind).toBe('GenericSelection')
      expect(formatType(node.type)).toBe('double')
    })

    it('falls back to the default association', () => {
      expect(exprType('_Generic(1.5, int: 2, default: 4)')).toBe('long')
    })

    it('fails when nothing matches', () => {
      const result = parseExpr('_Generic(1.5, int: 2)')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.failure.code).toBe('NoGenericMatch')
    })
  })

  describe('nesting', () => {
    const deep = `${'('.repeat(20)}1${')'.repeat(20)}`

    function nestingLimit(result: Parsed): number | null {
      return !result.ok && result.failure.code === 'NestingTooDeep' ? result.failure.limit : null
    }

    it('parses deeply parenthesized expressions', () => {
      expect(exprNode(deep).kind).toBe('Constant')
    })

    it('fails once the nesting limit is reached', () => {
      expect(nestingLimit(parseExpr(deep, { maxDepth: 8 }))).toBe(8)
    })

    it('limits chains of prefix increments', () => {
      expect(nestingLimit(parseExpr(`${'++'.repeat(20000)}x`))).toBe(256)
    })

    it('limits chains of sizeof', () => {
      expect(nestingLimit(parseExpr(`${'sizeof '.repeat(20000)}x`))).toBe(256)
    })

    it('limits chains of unary operators', () => {
      expect(nestingLimit(parseExpr(`${'- '.repeat(20000)}x`))).toBe(256)
    })
  })
})
