/**
 * AST Printer
 * Parenthesized prefix rendering of expressions and statements.
 *
 * @example
 * ```typescript
 * printProgram(parse('print -1 + 2 * 3;').program)
 * // '(print (+ (- 1) (* 2 3)))'
 * ```
 */

import type { ExprNode, LiteralValue, ProgramNode, StmtNode } from './types.js';

function printLiteral(value: LiteralValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
}

function parenthesize(name: string, ...parts: string[]): string {
  return `(${[name, ...parts].join(' ')})`;
}

export function printExpr(node: ExprNode): string {
  switch (node.type) {
    case 'LiteralExpr':
      return printLiteral(node.value);
    case 'GroupingExpr':
      return parenthesize('group', printExpr(node.expression));
    case 'UnaryExpr':
      return parenthesize(node.op, printExpr(node.operand));
    case 'BinaryExpr':
    case 'LogicalExpr':
      return parenthesize(node.op, printExpr(node.left), printExpr(node.right));
    case 'VariableExpr':
      return node.name;
    case 'AssignExpr':
      return parenthesize('=', node.name, printExpr(node.value));
  }
}

export function printStmt(node: StmtNode): string {
  switch (node.type) {
    case 'ExpressionStmt':
      return parenthesize('expr', printExpr(node.expression));
    case 'PrintStmt':
      return parenthesize('print', printExpr(node.expression));
    case 'VarStmt':
      return node.initializer
        ? parenthesize('var', node.name, printExpr(node.initializer))
        : parenthesize('var', node.name);
    case 'BlockStmt':
      return parenthesize('block', ...node.statements.map(printStmt));
    case 'IfStmt':
      return node.elseBranch
        ? parenthesize(
            'if',
            printExpr(node.condition),
            printStmt(node.thenBranch),
            printStmt(node.elseBranch)
          )
        : parenthesize(
            'if',
            printExpr(node.condition),
            printStmt(node.thenBranch)
          );
    case 'WhileStmt':
      return parenthesize(
        'while',
        printExpr(node.condition),
        printStmt(node.body)
      );
  }
}

/** One line per top-level statement */
export function printProgram(program: ProgramNode): string {
  return program.statements.map(printStmt).join('\n');
}
