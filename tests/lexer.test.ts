import { Scanner } from '../src/lexer/scanner'
import { TokenKind, tokenKindName } from '../src/lexer/token'
import { LexError } from '../src/errors'

function tokenize(source: string) {
  return new Scanner(source).scan()
}

function tokenKinds(source: string) {
  return tokenize(source).map((t) => t.kind)
}

describe('Scanner', () => {
  describe('keywords', () => {
    it('tokenizes C keywords', () => {
      expect(tokenKinds('int char void struct union enum return if while for')).toEqual([
        TokenKind.Int,
        TokenKind.Char,
        TokenKind.Void,
        TokenKind.Struct,
        TokenKind.Union,
        TokenKind.Enum,
        TokenKind.Return,
        TokenKind.If,
        TokenKind.While,
        TokenKind.For,
      ])
    })

    it('tokenizes storage class keywords', () => {
      expect(tokenKinds('static extern typedef const volatile')).toEqual([
        TokenKind.Static,
        TokenKind.Extern,
        TokenKind.Typedef,
        TokenKind.Const,
        TokenKind.Volatile,
      ])
    })

    it('tokenizes C11 keywords', () => {
      expect(tokenKinds('_Bool _Alignas _Alignof _Atomic _Noreturn _Static_assert _Generic _Thread_local')).toEqual([
        TokenKind.Bool,
        TokenKind.Alignas,
        TokenKind.Alignof,
        TokenKind.Atomic,
        TokenKind.Noreturn,
        TokenKind.StaticAssert,
        TokenKind.Generic,
        TokenKind.ThreadLocal,
      ])
    })

    it('tokenizes __func__ as its own kind', () => {
      expect(tokenKinds('__func__')).toEqual([TokenKind.FuncName])
    })
  })

  describe('identifiers', () => {
    it('carries the identifier text', () => {
      const tokens = tokenize('foo _bar baz42')
      expect(tokens.map((t) => t.value)).toEqual(['foo', '_bar', 'baz42'])
      expect(tokens.every((t) => t.kind === TokenKind.Identifier)).toBe(true)
    })

    it('records source offsets', () => {
      const [, name] = tokenize('int  count;')
      expect(name.start).toBe(5)
      expect(name.end).toBe(10)
    })
  })

  describe('numbers', () => {
    it('parses decimal, hex and octal integers', () => {
      const values = tokenize('42 0x1F 017 0').map((t) => t.value)
      expect(values).toEqual([42, 31, 15, 0])
    })

    it('consumes integer suffixes', () => {
      const tokens = tokenize('10u 10UL 7ll')
      expect(tokens.map((t) => t.kind)).toEqual([TokenKind.IntConstant, TokenKind.IntConstant, TokenKind.IntConstant])
      expect(tokens.map((t) => t.value)).toEqual([10, 10, 7])
    })

    it('parses floating constants', () => {
      const tokens = tokenize('1.5 .5 2e3 1.0f')
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.FloatConstant,
        TokenKind.FloatConstant,
        TokenKind.FloatConstant,
        TokenKind.FloatConstant,
      ])
      expect(tokens.map((t) => t.value)).toEqual([1.5, 0.5, 2000, 1])
    })

    it('keeps integers beyond the safe range as bigint', () => {
      const [token] = tokenize('9007199254740993')
      expect(token.value).toBeUndefined()
      expect(token.bigValue).toBe(9007199254740993n)
    })

    it('treats character constants as integers', () => {
      const [token] = tokenize("'a'")
      expect(token.kind).toBe(TokenKind.IntConstant)
      expect(token.value).toBe(97)
    })

    it('rejects an invalid integer suffix', () => {
      expect(() => tokenize('12abc')).toThrow(LexError)
    })

    it('parses hexadecimal floating constants', () => {
      const [token] = tokenize('0x1.8p1')
      expect(token.kind).toBe(TokenKind.FloatConstant)
      expect(token.value).toBe(3)
    })

    it('rejects 8 and 9 in an octal constant', () => {
      expect(() => tokenize('x = 09;')).toThrow('invalid digit in octal constant at offset 4')
    })

    it('packs multi-character constants a byte at a time', () => {
      expect(tokenize("'ab'")[0].value).toBe(0x6162)
    })

    it('stops a decimal constant before an ellipsis', () => {
      expect(tokenKinds('1...')).toEqual([TokenKind.IntConstant, TokenKind.Ellipsis])
    })
  })

  describe('strings', () => {
    it('decodes escape sequences', () => {
      const [token] = tokenize('"a\\n\\x41"')
      expect(token.kind).toBe(TokenKind.StringLiteral)
      expect(token.value).toBe('a\nA')
      expect(token.encoding).toBe('none')
    })

    it('decodes octal escapes', () => {
      expect(tokenize('"\\101\\0"')[0].value).toBe('A\0')
    })

    it('records the encoding prefix', () => {
      const [token] = tokenize('L"wide"')
      expect(token.value).toBe('wide')
      expect(token.encoding).toBe('L')
    })

    it('fails on an unterminated string', () => {
      expect(() => tokenize('"open')).toThrow('unterminated string literal at offset 0')
    })
  })

  describe('punctuation', () => {
    it('prefers the longest operator', () => {
      expect(tokenKinds('... -> <<= >>= ++ -- && || == != <= >=')).toEqual([
        TokenKind.Ellipsis,
        TokenKind.Arrow,
        TokenKind.LessLessAssign,
        TokenKind.GreaterGreaterAssign,
        TokenKind.PlusPlus,
        TokenKind.MinusMinus,
        TokenKind.AmpAmp,
        TokenKind.PipePipe,
        TokenKind.EqualEqual,
        TokenKind.BangEqual,
        TokenKind.LessEqual,
        TokenKind.GreaterEqual,
      ])
    })

    it('splits runs of operator characters greedily', () => {
      expect(tokenKinds('++++ ***')).toEqual([
        TokenKind.PlusPlus,
        TokenKind.PlusPlus,
        TokenKind.Star,
        TokenKind.Star,
        TokenKind.Star,
      ])
    })

    it('reports an unknown character with its offset', () => {
      expect(() => tokenize('int @')).toThrow("unexpected character '@' at offset 4")
    })
  })

  describe('trivia', () => {
    it('skips comments', () => {
      expect(tokenKinds('int /* block */ x; // line\n')).toEqual([
        TokenKind.Int,
        TokenKind.Identifier,
        TokenKind.Semicolon,
      ])
    })

    it('skips preprocessor line markers', () => {
      expect(tokenKinds('# 1 "main.c"\nint x;')).toEqual([TokenKind.Int, TokenKind.Identifier, TokenKind.Semicolon])
    })

    it('fails on an unterminated block comment', () => {
      expect(() => tokenize('int /* x')).toThrow('unterminated comment at offset 4')
    })

    it('produces no tokens for blank input', () => {
      expect(tokenize('  \n\t')).toEqual([])
    })
  })

  it('names token kinds', () => {
    expect(tokenKindName(TokenKind.Semicolon)).toBe('Semicolon')
  })
})
