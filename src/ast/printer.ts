// Indented debug dump of a parse tree: one line per node with its kind,
// payload and type.

import type { ParseNode } from './nodes'
import { formatType } from '../sema/types'

function payload(node: ParseNode): string | null {
  switch (node.kind) {
    case 'Identifier':
    case 'Enumerator':
    case 'Declarator':
    case 'FunctionDefinition':
      return node.name
    case 'ParameterDeclaration':
      return node.name
    case 'Constant':
      return String(node.value)
    case 'StringLiteral':
      return node.encoding === 'none' ? JSON.stringify(node.value) : `${node.encoding}${JSON.stringify(node.value)}`
    case 'StaticAssertDeclaration':
      return JSON.stringify(node.message)
    case 'MemberAccess':
      return `${node.arrow ? '->' : '.'}${node.member}`
    case 'MemberDesignator':
      return `.${node.member}`
    case 'PostfixIncDec':
    case 'UnaryExpression':
    case 'BinaryExpression':
    case 'AssignmentExpression':
      return node.operator
    case 'StorageClassSpecifier':
    case 'TypeSpecifier':
    case 'FunctionSpecifier':
      return node.specifier
    case 'TypeQualifier':
      return node.qualifier
    case 'StructOrUnionSpecifier':
      return node.tag === null ? node.variant : `${node.variant} ${node.tag}`
    case 'EnumSpecifier':
      return node.tag
    case 'GenericAssociation':
      return node.isDefault ? 'default' : null
    case 'ParameterTypeList':
      return node.variadic ? '...' : null
    case 'LabeledStatement':
      return node.label
    case 'SelectionStatement':
    case 'IterationStatement':
      return node.keyword
    case 'JumpStatement':
      return node.label === null ? node.keyword : `${node.keyword} ${node.label}`
    default:
      return null
  }
}

function printNode(node: ParseNode, indent: number, lines: string[]): void {
  const spaces = '  '.repeat(indent)
  const detail = payload(node)
  const head = detail === null ? node.kind : `${node.kind} ${detail}`
  lines.push(`${spaces}${head} : ${formatType(node.type)}`)
  for (const child of node.children) printNode(child, indent + 1, lines)
}

/**
 * Render a tree as text, e.g. for `a + 1`:
 *
 *     BinaryExpression + : long
 *       Identifier a : $a
 *       Constant 1 : long
 */
export function formatTree(node: ParseNode): string {
  const lines: string[] = []
  printNode(node, 0, lines)
  return lines.join('\n')
}
