/**
 * Token kinds recognized by the C11 lexer.
 * A plain numeric enum: the reverse mapping (`TokenKind[kind]`) names kinds in diagnostics.
 */
export enum TokenKind {
  // Literals
  IntConstant = 0,
  FloatConstant = 1,
  StringLiteral = 2,
  FuncName = 3,

  // Identifiers
  Identifier = 4,

  // Keywords
  Auto = 5,
  Break = 6,
  Case = 7,
  Char = 8,
  Const = 9,
  Continue = 10,
  Default = 11,
  Do = 12,
  Double = 13,
  Else = 14,
  Enum = 15,
  Extern = 16,
  Float = 17,
  For = 18,
  Goto = 19,
  If = 20,
  Inline = 21,
  Int = 22,
  Long = 23,
  Register = 24,
  Restrict = 25,
  Return = 26,
  Short = 27,
  Signed = 28,
  Sizeof = 29,
  Static = 30,
  Struct = 31,
  Switch = 32,
  Typedef = 33,
  Union = 34,
  Unsigned = 35,
  Void = 36,
  Volatile = 37,
  While = 38,

  // C11 keywords
  Alignas = 39,
  Alignof = 40,
  Atomic = 41,
  Bool = 42,
  Complex = 43,
  Generic = 44,
  Imaginary = 45,
  Noreturn = 46,
  StaticAssert = 47,
  ThreadLocal = 48,

  // Punctuation
  LParen = 49,
  RParen = 50,
  LBrace = 51,
  RBrace = 52,
  LBracket = 53,
  RBracket = 54,
  Semicolon = 55,
  Comma = 56,
  Dot = 57,
  Arrow = 58,
  Ellipsis = 59,

  // Operators
  Plus = 60,
  Minus = 61,
  Star = 62,
  Slash = 63,
  Percent = 64,
  Amp = 65,
  Pipe = 66,
  Caret = 67,
  Tilde = 68,
  Bang = 69,
  Assign = 70,
  Less = 71,
  Greater = 72,
  Question = 73,
  Colon = 74,

  // Compound operators
  PlusPlus = 75,
  MinusMinus = 76,
  PlusAssign = 77,
  MinusAssign = 78,
  StarAssign = 79,
  SlashAssign = 80,
  PercentAssign = 81,
  AmpAssign = 82,
  PipeAssign = 83,
  CaretAssign = 84,
  LessLess = 85,
  GreaterGreater = 86,
  LessLessAssign = 87,
  GreaterGreaterAssign = 88,
  EqualEqual = 89,
  BangEqual = 90,
  LessEqual = 91,
  GreaterEqual = 92,
  AmpAmp = 93,
  PipePipe = 94,
}

/** Prefix of a string literal: `u8"..."`, `u"..."`, `U"..."`, `L"..."` or none. */
export type StringEncoding = 'none' | 'u8' | 'u' | 'U' | 'L'

/**
 * A token with its kind and source location.
 * Identifiers and string literals carry a string value, constants a number
 * (or `bigValue` for integers beyond Number.MAX_SAFE_INTEGER).
 */
export interface Token {
  kind: TokenKind
  start: number
  end: number
  value?: string | number
  bigValue?: bigint
  encoding?: StringEncoding
}

export function tokenKindName(kind: TokenKind): string {
  return TokenKind[kind]
}

/**
 * Convert a keyword string to its token kind.
 *
 * Uses a two-stage filter to quickly reject non-keywords:
 * Stage 1: reject by length (keywords are 2-14 chars).
 * Stage 2: reject by first character.
 */
export function keywordFromString(s: string): TokenKind | undefined {
  const len = s.length
  if (len < 2 || len > 14) {
    return undefined
  }

  const first = s.charCodeAt(0)
  // Fast reject: keywords only start with _ a b c d e f g i l r s t u v w
  if (
    first !== 0x5f /* _ */ &&
    first !== 0x61 /* a */ &&
    first !== 0x62 /* b */ &&
    first !== 0x63 /* c */ &&
    first !== 0x64 /* d */ &&
    first !== 0x65 /* e */ &&
    first !== 0x66 /* f */ &&
    first !== 0x67 /* g */ &&
    first !== 0x69 /* i */ &&
    first !== 0x6c /* l */ &&
    first !== 0x72 /* r */ &&
    first !== 0x73 /* s */ &&
    first !== 0x74 /* t */ &&
    first !== 0x75 /* u */ &&
    first !== 0x76 /* v */ &&
    first !== 0x77 /* w */
  ) {
    return undefined
  }

  switch (s) {
    case 'auto':
      return TokenKind.Auto
    case 'break':
      return TokenKind.Break
    case 'case':
      return TokenKind.Case
    case 'char':
      return TokenKind.Char
    case 'const':
      return TokenKind.Const
    case 'continue':
      return TokenKind.Continue
    case 'default':
      return TokenKind.Default
    case 'do':
      return TokenKind.Do
    case 'double':
      return TokenKind.Double
    case 'else':
      return TokenKind.Else
    case 'enum':
      return TokenKind.Enum
    case 'extern':
      return TokenKind.Extern
    case 'float':
      return TokenKind.Float
    case 'for':
      return TokenKind.For
    case 'goto':
      return TokenKind.Goto
    case 'if':
      return TokenKind.If
    case 'inline':
      return TokenKind.Inline
    case 'int':
      return TokenKind.Int
    case 'long':
      return TokenKind.Long
    case 'register':
      return TokenKind.Register
    case 'restrict':
      return TokenKind.Restrict
    case 'return':
      return TokenKind.Return
    case 'short':
      return TokenKind.Short
    case 'signed':
      return TokenKind.Signed
    case 'sizeof':
      return TokenKind.Sizeof
    case 'static':
      return TokenKind.Static
    case 'struct':
      return TokenKind.Struct
    case 'switch':
      return TokenKind.Switch
    case 'typedef':
      return TokenKind.Typedef
    case 'union':
      return TokenKind.Union
    case 'unsigned':
      return TokenKind.Unsigned
    case 'void':
      return TokenKind.Void
    case 'volatile':
      return TokenKind.Volatile
    case 'while':
      return TokenKind.While
    case '_Alignas':
      return TokenKind.Alignas
    case '_Alignof':
      return TokenKind.Alignof
    case '_Atomic':
      return TokenKind.Atomic
    case '_Bool':
      return TokenKind.Bool
    case '_Complex':
      return TokenKind.Complex
    case '_Generic':
      return TokenKind.Generic
    case '_Imaginary':
      return TokenKind.Imaginary
    case '_Noreturn':
      return TokenKind.Noreturn
    case '_Static_assert':
      return TokenKind.StaticAssert
    case '_Thread_local':
      return TokenKind.ThreadLocal
    case '__func__':
      return TokenKind.FuncName
    default:
      return undefined
  }
}
