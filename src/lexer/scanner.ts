import { TokenKind, keywordFromString } from './token'
import type { Token, StringEncoding } from './token'
import { LexError } from '../errors'

// Sticky patterns: each one matches only at `lastIndex`.
const TRIVIA = /[ \t\n\r\f\v]+|\/\/[^\n]*|\/\*[\s\S]*?\*\//y
const LINE_MARKER = /# *[0-9][^\n]*/y
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y
const HEX_FLOAT = /0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?[0-9]+)/y
const HEX_INT = /0[xX]([0-9a-fA-F]*)/y
const DECIMAL_FLOAT = /(?:[0-9]+\.(?!\.\.)[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?|[0-9]+[eE][+-]?[0-9]+/y
const DECIMAL_INT = /[0-9]+/y
const INT_SUFFIX = /[uU](?:ll|LL|[lL])?|(?:ll|LL|[lL])[uU]?/y
const FLOAT_SUFFIX = /[fFlL]/y
const HEX_DIGITS = /[0-9a-fA-F]+/y
const OCTAL_ESCAPE = /[0-7]{1,3}/y
const UCN_SHORT = /[0-9a-fA-F]{4}/y
const UCN_LONG = /[0-9a-fA-F]{8}/y

const OCTAL = /^0[0-7]*$/
const IDENT_CHAR = /[A-Za-z0-9_]/

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['v', '\v'],
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
  ['?', '?'],
])

// Longest spellings first, so the first hit is the longest match.
const PUNCTUATORS: ReadonlyArray<readonly [string, TokenKind]> = [
  ['...', TokenKind.Ellipsis],
  ['<<=', TokenKind.LessLessAssign],
  ['>>=', TokenKind.GreaterGreaterAssign],
  ['->', TokenKind.Arrow],
  ['++', TokenKind.PlusPlus],
  ['--', TokenKind.MinusMinus],
  ['&&', TokenKind.AmpAmp],
  ['||', TokenKind.PipePipe],
  ['==', TokenKind.EqualEqual],
  ['!=', TokenKind.BangEqual],
  ['<=', TokenKind.LessEqual],
  ['>=', TokenKind.GreaterEqual],
  ['<<', TokenKind.LessLess],
  ['>>', TokenKind.GreaterGreater],
  ['+=', TokenKind.PlusAssign],
  ['-=', TokenKind.MinusAssign],
  ['*=', TokenKind.StarAssign],
  ['/=', TokenKind.SlashAssign],
  ['%=', TokenKind.PercentAssign],
  ['&=', TokenKind.AmpAssign],
  ['^=', TokenKind.CaretAssign],
  ['|=', TokenKind.PipeAssign],
  ['(', TokenKind.LParen],
  [')', TokenKind.RParen],
  ['{', TokenKind.LBrace],
  ['}', TokenKind.RBrace],
  ['[', TokenKind.LBracket],
  [']', TokenKind.RBracket],
  [';', TokenKind.Semicolon],
  [',', TokenKind.Comma],
  ['~', TokenKind.Tilde],
  ['?', TokenKind.Question],
  [':', TokenKind.Colon],
  ['.', TokenKind.Dot],
  ['+', TokenKind.Plus],
  ['-', TokenKind.Minus],
  ['*', TokenKind.Star],
  ['/', TokenKind.Slash],
  ['%', TokenKind.Percent],
  ['&', TokenKind.Amp],
  ['|', TokenKind.Pipe],
  ['^', TokenKind.Caret],
  ['!', TokenKind.Bang],
  ['=', TokenKind.Assign],
  ['<', TokenKind.Less],
  ['>', TokenKind.Greater],
]

function encodingOf(prefix: string): StringEncoding | null {
  switch (prefix) {
    case 'u8':
    case 'u':
    case 'U':
    case 'L':
      return prefix
    default:
      return null
  }
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9'
}

/**
 * Tokenizer for preprocessed C11 source.
 *
 * Produces the whole token list up front. There is no end-of-file token:
 * the parser treats `pos === tokens.length` as the end of input.
 */
export class Scanner {
  private readonly source: string
  private offset = 0

  constructor(source: string) {
    this.source = source
  }

  scan(): Token[] {
    const tokens: Token[] = []
    this.skipTrivia()
    while (this.offset < this.source.length) {
      tokens.push(this.nextToken())
      this.skipTrivia()
    }
    return tokens
  }

  /** Run a sticky pattern at the cursor, advancing past the match. */
  private accept(pattern: RegExp): RegExpExecArray | null {
    pattern.lastIndex = this.offset
    const match = pattern.exec(this.source)
    if (match !== null) this.offset = pattern.lastIndex
    return match
  }

  private nextToken(): Token {
    const start = this.offset
    const c = this.source.charAt(start)
    if (isDigit(c) || (c === '.' && isDigit(this.source.charAt(start + 1)))) {
      return this.number(start)
    }
    if (c === '"') return this.string(start, 'none')
    if (c === "'") return this.character(start)
    const word = this.accept(IDENTIFIER)
    if (word !== null) return this.word(start, word[0])
    return this.punctuator(start)
  }

  // === trivia ===

  private skipTrivia(): void {
    for (;;) {
      if (this.accept(TRIVIA) !== null) continue
      if (this.source.startsWith('/*', this.offset)) {
        throw new LexError('unterminated comment', this.offset)
      }
      // `# 12 "file.c"` markers from the preprocessor, at the start of a line only
      const lineStart = this.offset === 0 || this.source.charAt(this.offset - 1) === '\n'
      if (lineStart && this.accept(LINE_MARKER) !== null) continue
      return
    }
  }

  // === numbers ===

  private number(start: number): Token {
    const hexFloat = this.accept(HEX_FLOAT)
    if (hexFloat !== null) {
      const [, whole = '', fraction = '', exponent] = hexFloat
      const mantissa = parseInt(`${whole}${fraction}` || '0', 16) / 16 ** fraction.length
      return this.floatToken(start, mantissa * 2 ** Number(exponent))
    }

    const hex = this.accept(HEX_INT)
    if (hex !== null) {
      if (hex[1] === '') throw new LexError('hexadecimal constant without digits', start)
      return this.intToken(start, BigInt(`0x${hex[1]}`))
    }

    const decimalFloat = this.accept(DECIMAL_FLOAT)
    if (decimalFloat !== null) return this.floatToken(start, parseFloat(decimalFloat[0]))

    const digits = this.accept(DECIMAL_INT)
    if (digits === null) throw new LexError('malformed number', start)
    const text = digits[0]
    if (text.length > 1 && text.startsWith('0')) {
      if (!OCTAL.test(text)) throw new LexError('invalid digit in octal constant', start)
      return this.intToken(start, BigInt(`0o${text.slice(1)}`))
    }
    return this.intToken(start, BigInt(text))
  }

  private floatToken(start: number, value: number): Token {
    this.accept(FLOAT_SUFFIX)
    this.rejectSuffix('floating')
    return { kind: TokenKind.FloatConstant, start, end: this.offset, value }
  }

  /** Integers past the safe range are carried as `bigValue` only. */
  private intToken(start: number, value: bigint): Token {
    this.accept(INT_SUFFIX)
    this.rejectSuffix('integer')
    if (value > MAX_SAFE) return { kind: TokenKind.IntConstant, start, end: this.offset, bigValue: value }
    return { kind: TokenKind.IntConstant, start, end: this.offset, value: Number(value) }
  }

  private rejectSuffix(what: string): void {
    if (IDENT_CHAR.test(this.source.charAt(this.offset))) {
      throw new LexError(`invalid suffix on ${what} constant`, this.offset)
    }
  }

  // === strings and character constants ===

  private string(start: number, encoding: StringEncoding): Token {
    const value = this.quoted('"', start, 'string literal').join('')
    return { kind: TokenKind.StringLiteral, start, end: this.offset, value, encoding }
  }

  /** Character constants are integers; several characters pack into one value a byte at a time. */
  private character(start: number): Token {
    const chars = this.quoted("'", start, 'character constant')
    if (chars.length === 0) throw new LexError('empty character constant', start)
    let value = 0
    chars.forEach((ch, i) => {
      const code = ch.codePointAt(0) ?? 0
      value = i === 0 ? code : (value << 8) | (code & 0xff)
    })
    return { kind: TokenKind.IntConstant, start, end: this.offset, value }
  }

  /** The decoded characters between a pair of quotes, cursor on the opening one. */
  private quoted(quote: string, start: number, what: string): string[] {
    const chars: string[] = []
    this.offset++
    for (;;) {
      const c = this.source.charAt(this.offset)
      if (c === '' || c === '\n') throw new LexError(`unterminated ${what}`, start)
      this.offset++
      if (c === quote) return chars
      chars.push(c === '\\' ? this.escape() : c)
    }
  }

  private escape(): string {
    const escapeStart = this.offset - 1
    const c = this.source.charAt(this.offset)
    const simple = SIMPLE_ESCAPES.get(c)
    if (simple !== undefined) {
      this.offset++
      return simple
    }
    if (c >= '0' && c <= '7') {
      const octal = this.accept(OCTAL_ESCAPE)
      return String.fromCharCode(parseInt(octal === null ? '0' : octal[0], 8) & 0xff)
    }
    this.offset++
    if (c === 'x') {
      // Only the low byte survives, which is the last two digits.
      const hex = this.accept(HEX_DIGITS)
      return String.fromCharCode(hex === null ? 0 : parseInt(hex[0].slice(-2), 16))
    }
    if (c === 'u' || c === 'U') {
      const ucn = this.accept(c === 'u' ? UCN_SHORT : UCN_LONG)
      if (ucn === null) throw new LexError('incomplete universal character name', escapeStart)
      const code = parseInt(ucn[0], 16)
      if (code > 0x10ffff) throw new LexError('universal character name out of range', escapeStart)
      return String.fromCodePoint(code)
    }
    return c
  }

  // === words and punctuation ===

  /** Keywords, identifiers, and the `u8`/`u`/`U`/`L` prefixes of strings and character constants. */
  private word(start: number, text: string): Token {
    const encoding = encodingOf(text)
    const next = this.source.charAt(this.offset)
    if (encoding !== null && next === '"') return this.string(start, encoding)
    if (encoding !== null && encoding !== 'u8' && next === "'") {
      return { ...this.character(this.offset), start }
    }
    const keyword = keywordFromString(text)
    if (keyword !== undefined) return { kind: keyword, start, end: this.offset }
    return { kind: TokenKind.Identifier, start, end: this.offset, value: text }
  }

  private punctuator(start: number): Token {
    for (const [text, kind] of PUNCTUATORS) {
      if (this.source.startsWith(text, start)) {
        this.offset = start + text.length
        return { kind, start, end: this.offset }
      }
    }
    const ch = String.fromCodePoint(this.source.codePointAt(start) ?? 0)
    throw new LexError(`unexpected character '${ch}'`, start)
  }
}
