// ---------------------------------------------------------------------------
// Parse Node types: one variant per production, each carrying only the
// payload that production needs. Every node owns its children and carries
// the type the grammar derived for it.
// ---------------------------------------------------------------------------

import type { TypeExpression } from '../sema/types'
import type { StringEncoding } from '../lexer/token'

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

export interface SourceLocation {
  start: SourcePosition
  end: SourcePosition
}

export interface BaseNode {
  kind: string
  start: number
  end: number
  loc?: SourceLocation
  children: ParseNode[]
  type: TypeExpression
}

// ---- Operators ----
export type BinaryOperator =
  | '*'
  | '/'
  | '%'
  | '+'
  | '-'
  | '<<'
  | '>>'
  | '<'
  | '>'
  | '<='
  | '>='
  | '=='
  | '!='
  | '&'
  | '^'
  | '|'
  | '&&'
  | '||'

export type AssignmentOperator = '=' | '*=' | '/=' | '%=' | '+=' | '-=' | '<<=' | '>>=' | '&=' | '^=' | '|='

export type UnaryOperator = '++' | '--' | '&' | '*' | '+' | '-' | '~' | '!' | 'sizeof' | '_Alignof'

export type PostfixOperator = '++' | '--'

export type StorageClass = 'extern' | 'static' | '_Thread_local' | 'auto' | 'register'

export type TypeKeyword =
  | 'void'
  | 'char'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'signed'
  | 'unsigned'
  | '_Bool'
  | '_Complex'
  | '_Imaginary'

export type Qualifier = 'const' | 'restrict' | 'volatile' | '_Atomic'

export type FunctionSpecifierKeyword = 'inline' | '_Noreturn'

// ---- Expressions ----
export interface Identifier extends BaseNode {
  kind: 'Identifier'
  name: string
}

export interface Constant extends BaseNode {
  kind: 'Constant'
  value: number | bigint
  floating: boolean
}

export interface StringLiteral extends BaseNode {
  kind: 'StringLiteral'
  value: string
  encoding: StringEncoding
}

export interface GenericSelection extends BaseNode {
  kind: 'GenericSelection'
}

export interface GenericAssociation extends BaseNode {
  kind: 'GenericAssociation'
  isDefault: boolean
}

export interface CompoundLiteral extends BaseNode {
  kind: 'CompoundLiteral'
}

export interface Subscript extends BaseNode {
  kind: 'Subscript'
}

export interface Call extends BaseNode {
  kind: 'Call'
}

export interface ArgumentList extends BaseNode {
  kind: 'ArgumentList'
}

export interface MemberAccess extends BaseNode {
  kind: 'MemberAccess'
  member: string
  arrow: boolean
}

export interface PostfixIncDec extends BaseNode {
  kind: 'PostfixIncDec'
  operator: PostfixOperator
}

export interface UnaryExpression extends BaseNode {
  kind: 'UnaryExpression'
  operator: UnaryOperator
}

export interface CastExpression extends BaseNode {
  kind: 'CastExpression'
}

export interface BinaryExpression extends BaseNode {
  kind: 'BinaryExpression'
  operator: BinaryOperator
}

export interface ConditionalExpression extends BaseNode {
  kind: 'ConditionalExpression'
}

export interface AssignmentExpression extends BaseNode {
  kind: 'AssignmentExpression'
  operator: AssignmentOperator
}

export interface CommaExpression extends BaseNode {
  kind: 'CommaExpression'
}

// ---- Declarations ----
export interface Declaration extends BaseNode {
  kind: 'Declaration'
}

export interface StaticAssertDeclaration extends BaseNode {
  kind: 'StaticAssertDeclaration'
  message: string
}

export interface DeclarationSpecifiers extends BaseNode {
  kind: 'DeclarationSpecifiers'
}

export interface StorageClassSpecifier extends BaseNode {
  kind: 'StorageClassSpecifier'
  specifier: StorageClass
}

export interface TypeSpecifier extends BaseNode {
  kind: 'TypeSpecifier'
  specifier: TypeKeyword
}

export interface TypeQualifier extends BaseNode {
  kind: 'TypeQualifier'
  qualifier: Qualifier
}

export interface FunctionSpecifier extends BaseNode {
  kind: 'FunctionSpecifier'
  specifier: FunctionSpecifierKeyword
}

export interface AlignmentSpecifier extends BaseNode {
  kind: 'AlignmentSpecifier'
}

export interface StructOrUnionSpecifier extends BaseNode {
  kind: 'StructOrUnionSpecifier'
  variant: 'struct' | 'union'
  tag: string | null
}

export interface StructDeclaration extends BaseNode {
  kind: 'StructDeclaration'
}

export interface SpecifierQualifierList extends BaseNode {
  kind: 'SpecifierQualifierList'
}

export interface StructDeclaratorList extends BaseNode {
  kind: 'StructDeclaratorList'
}

export interface StructDeclarator extends BaseNode {
  kind: 'StructDeclarator'
  named: boolean
  bitField: boolean
}

export interface EnumSpecifier extends BaseNode {
  kind: 'EnumSpecifier'
  tag: string | null
}

export interface EnumeratorList extends BaseNode {
  kind: 'EnumeratorList'
}

export interface Enumerator extends BaseNode {
  kind: 'Enumerator'
  name: string
}

export interface AtomicTypeSpecifier extends BaseNode {
  kind: 'AtomicTypeSpecifier'
}

export interface InitDeclaratorList extends BaseNode {
  kind: 'InitDeclaratorList'
}

export interface InitDeclarator extends BaseNode {
  kind: 'InitDeclarator'
}

// ---- Declarators ----
// Declarator types hold the declarator's shape (see applyDeclarator).

export interface Declarator extends BaseNode {
  kind: 'Declarator'
  name: string
}

export interface DirectDeclarator extends BaseNode {
  kind: 'DirectDeclarator'
}

export interface ArrayDeclarator extends BaseNode {
  kind: 'ArrayDeclarator'
}

export interface FunctionDeclarator extends BaseNode {
  kind: 'FunctionDeclarator'
}

export interface Pointer extends BaseNode {
  kind: 'Pointer'
}

export interface TypeQualifierList extends BaseNode {
  kind: 'TypeQualifierList'
}

export interface ParameterTypeList extends BaseNode {
  kind: 'ParameterTypeList'
  variadic: boolean
}

export interface ParameterList extends BaseNode {
  kind: 'ParameterList'
}

export interface ParameterDeclaration extends BaseNode {
  kind: 'ParameterDeclaration'
  name: string | null
}

export interface IdentifierList extends BaseNode {
  kind: 'IdentifierList'
}

export interface TypeName extends BaseNode {
  kind: 'TypeName'
}

export interface AbstractDeclarator extends BaseNode {
  kind: 'AbstractDeclarator'
}

export interface DirectAbstractDeclarator extends BaseNode {
  kind: 'DirectAbstractDeclarator'
}

// ---- Initializers ----
export interface InitializerList extends BaseNode {
  kind: 'InitializerList'
}

export interface DesignatedInitializer extends BaseNode {
  kind: 'DesignatedInitializer'
}

export interface Designation extends BaseNode {
  kind: 'Designation'
}

export interface ArrayDesignator extends BaseNode {
  kind: 'ArrayDesignator'
}

export interface MemberDesignator extends BaseNode {
  kind: 'MemberDesignator'
  member: string
}

// ---- Statements ----
export interface LabeledStatement extends BaseNode {
  kind: 'LabeledStatement'
  label: string
}

export interface CaseStatement extends BaseNode {
  kind: 'CaseStatement'
}

export interface DefaultStatement extends BaseNode {
  kind: 'DefaultStatement'
}

export interface CompoundStatement extends BaseNode {
  kind: 'CompoundStatement'
}

export interface ExpressionStatement extends BaseNode {
  kind: 'ExpressionStatement'
}

export interface SelectionStatement extends BaseNode {
  kind: 'SelectionStatement'
  keyword: 'if' | 'switch'
}

export interface IterationStatement extends BaseNode {
  kind: 'IterationStatement'
  keyword: 'while' | 'do' | 'for'
}

export interface JumpStatement extends BaseNode {
  kind: 'JumpStatement'
  keyword: 'goto' | 'continue' | 'break' | 'return'
  label: string | null
}

// ---- Top Level ----
export interface TranslationUnit extends BaseNode {
  kind: 'TranslationUnit'
}

export interface FunctionDefinition extends BaseNode {
  kind: 'FunctionDefinition'
  name: string
}

export interface DeclarationList extends BaseNode {
  kind: 'DeclarationList'
}

export type ParseNode =
  | Identifier
  | Constant
  | StringLiteral
  | GenericSelection
  | GenericAssociation
  | CompoundLiteral
  | Subscript
  | Call
  | ArgumentList
  | MemberAccess
  | PostfixIncDec
  | UnaryExpression
  | CastExpression
  | BinaryExpression
  | ConditionalExpression
  | AssignmentExpression
  | CommaExpression
  | Declaration
  | StaticAssertDeclaration
  | DeclarationSpecifiers
  | StorageClassSpecifier
  | TypeSpecifier
  | TypeQualifier
  | FunctionSpecifier
  | AlignmentSpecifier
  | StructOrUnionSpecifier
  | StructDeclaration
  | SpecifierQualifierList
  | StructDeclaratorList
  | StructDeclarator
  | EnumSpecifier
  | EnumeratorList
  | Enumerator
  | AtomicTypeSpecifier
  | InitDeclaratorList
  | InitDeclarator
  | Declarator
  | DirectDeclarator
  | ArrayDeclarator
  | FunctionDeclarator
  | Pointer
  | TypeQualifierList
  | ParameterTypeList
  | ParameterList
  | ParameterDeclaration
  | IdentifierList
  | TypeName
  | AbstractDeclarator
  | DirectAbstractDeclarator
  | InitializerList
  | DesignatedInitializer
  | Designation
  | ArrayDesignator
  | MemberDesignator
  | LabeledStatement
  | CaseStatement
  | DefaultStatement
  | CompoundStatement
  | ExpressionStatement
  | SelectionStatement
  | IterationStatement
  | JumpStatement
  | TranslationUnit
  | FunctionDefinition
  | DeclarationList

export type NodeKind = ParseNode['kind']

/** Narrow a ParseNode union to the variant with the given kind. */
export type NodeOf<K extends NodeKind> = Extract<ParseNode, { kind: K }>
