import { parse, formatType, formatTree } from '../src/index'
import type { ParseNode } from '../src/index'

/** Helper: the block items of a function body */
function parseBody(body: string): ParseNode[] {
  const [fn] = parse(`void f(void) { ${body} }`).children
  if (fn.kind !== 'FunctionDefinition') throw new Error('expected FunctionDefinition')
  const block = fn.children[fn.children.length - 1]
  if (block.kind !== 'CompoundStatement') throw new Error('expected CompoundStatement')
  return block.children
}

/** Helper: the single statement of a function body */
function parseStmt(body: string): ParseNode {
  const items = parseBody(body)
  expect(items).toHaveLength(1)
  return items[0]
}

describe('statements', () => {
  it('parses an empty body', () => {
    expect(parseBody('')).toEqual([])
  })

  it('types expression statements with the statement marker', () => {
    const stmt = parseStmt('x = 1;')
    expect(stmt.kind).toBe('ExpressionStatement')
    expect(formatType(stmt.type)).toBe('none')
    expect(stmt.children[0].kind).toBe('AssignmentExpression')
  })

  it('parses an empty statement', () => {
    const stmt = parseStmt(';')
    expect(stmt.kind).toBe('ExpressionStatement')
    expect(stmt.children).toHaveLength(0)
  })

  it('mixes declarations and statements', () => {
    const items = parseBody('int x = 1; x++; long y;')
    expect(items.map((i) => i.kind)).toEqual(['Declaration', 'ExpressionStatement', 'Declaration'])
  })

  describe('compound statements', () => {
    it('nests blocks', () => {
      const stmt = parseStmt('{ { ; } }')
      expect(stmt.kind).toBe('CompoundStatement')
      expect(stmt.children[0].kind).toBe('CompoundStatement')
      expect(formatType(stmt.type)).toBe('none')
    })
  })

  describe('selection statements', () => {
    it('parses if without else', () => {
      const stmt = parseStmt('if (x) y = 1;')
      if (stmt.kind !== 'SelectionStatement') throw new Error('expected SelectionStatement')
      expect(stmt.keyword).toBe('if')
      expect(stmt.children).toHaveLength(2)
    })

    it('parses if with else', () => {
      const stmt = parseStmt('if (x) y = 1; else y = 2;')
      expect(stmt.children).toHaveLength(3)
    })

    it('binds else to the nearest if', () => {
      const stmt = parseStmt('if (a) if (b) x = 1; else x = 2;')
      expect(stmt.children).toHaveLength(2)
      expect(stmt.children[1].children).toHaveLength(3)
    })

    it('parses switch with case and default labels', () => {
      const stmt = parseStmt('switch (x) { case 1: break; default: return; }')
      if (stmt.kind !== 'SelectionStatement') throw new Error('expected SelectionStatement')
      expect(stmt.keyword).toBe('switch')
      const body = stmt.children[1]
      expect(body.children.map((c) => c.kind)).toEqual(['CaseStatement', 'DefaultStatement'])
      expect(body.children[0].children[0].kind).toBe('Constant')
    })
  })

  describe('iteration statements', () => {
    it('parses while', () => {
      const stmt = parseStmt('while (n) n--;')
      if (stmt.kind !== 'IterationStatement') throw new Error('expected IterationStatement')
      expect(stmt.keyword).toBe('while')
      expect(stmt.children.map((c) => c.kind)).toEqual(['Identifier', 'ExpressionStatement'])
    })

    it('parses do-while with the body first', () => {
      const stmt = parseStmt('do n--; while (n);')
      if (stmt.kind !== 'IterationStatement') throw new Error('expected IterationStatement')
      expect(stmt.keyword).toBe('do')
      expect(stmt.children.map((c) => c.kind)).toEqual(['ExpressionStatement', 'Identifier'])
    })

    it('parses for with a declaration initializer', () => {
      const stmt = parseStmt('for (int i = 0; i < 10; i++) total += i;')
      expect(stmt.children.map((c) => c.kind)).toEqual([
        'Declaration',
        'ExpressionStatement',
        'PostfixIncDec',
        'ExpressionStatement',
      ])
    })

    it('parses for with empty clauses', () => {
      const stmt = parseStmt('for (;;) break;')
      expect(stmt.children.map((c) => c.kind)).toEqual(['ExpressionStatement', 'ExpressionStatement', 'JumpStatement'])
    })
  })

  describe('jump statements', () => {
    it('types return with the returned expression', () => {
      const stmt = parseStmt('return 1.5;')
      if (stmt.kind !== 'JumpStatement') throw new Error('expected JumpStatement')
      expect(stmt.keyword).toBe('return')
      expect(formatType(stmt.type)).toBe('double')
    })

    it('types a bare return with the statement marker', () => {
      expect(formatType(parseStmt('return;').type)).toBe('none')
    })

    it('parses goto and labels', () => {
      const [label, jump] = parseBody('out: x = 0; goto out;')
      if (label.kind !== 'LabeledStatement') throw new Error('expected LabeledStatement')
      expect(label.label).toBe('out')
      if (jump.kind !== 'JumpStatement') throw new Error('expected JumpStatement')
      expect(jump.keyword).toBe('goto')
      expect(jump.label).toBe('out')
    })

    it('parses continue inside a loop', () => {
      const stmt = parseStmt('while (1) continue;')
      const body = stmt.children[1]
      expect(body.kind === 'JumpStatement' && body.keyword).toBe('continue')
    })
  })

  it('prints a statement tree', () => {
    const stmt = parseStmt('if (x) return 1;')
    expect(formatTree(stmt)).toBe(
      ['SelectionStatement if : none', '  Identifier x : $x', '  JumpStatement return : long', '    Constant 1 : long'].join(
        '\n',
      ),
    )
  })

  it('fails on a missing semicolon', () => {
    expect(() => parseBody('x = 1')).toThrow('Parser did not consume all tokens of <input>')
  })
})
