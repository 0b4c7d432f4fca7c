// Simple AST node constructors
import type * as AST from '../types.js';

function createEmptySpan(): AST.Span {
  return {
    start: { line: 0, col: 0 },
    end: { line: 0, col: 0 },
  };
}

export const Node = {
  Program: (file: string | null, items: readonly AST.Item[]): AST.Program => ({
    kind: 'Program',
    file,
    items,
    span: createEmptySpan(),
  }),
  ImportedName: (name: string): AST.ImportedName => ({
    kind: 'ImportedName',
    name,
    span: createEmptySpan(),
  }),
  Referencing: (names: readonly AST.ImportedName[], module: string): AST.ReferencingStmt => ({
    kind: 'Referencing',
    names,
    module,
    span: createEmptySpan(),
  }),
  Scope: (
    keyword: AST.ScopeDef['keyword'],
    name: string,
    nameSpan: AST.Span,
    items: readonly AST.Item[]
  ): AST.ScopeDef => ({
    kind: 'Scope',
    keyword,
    name,
    nameSpan,
    items,
    span: createEmptySpan(),
  }),
  Field: (type: AST.TypeNode, name: string): AST.Field => ({
    kind: 'Field',
    type,
    name,
    span: createEmptySpan(),
  }),
  Struct: (name: string, nameSpan: AST.Span, fields: readonly AST.Field[]): AST.StructDef => ({
    kind: 'Struct',
    name,
    nameSpan,
    fields,
    span: createEmptySpan(),
  }),
  Variant: (name: string): AST.Variant => ({
    kind: 'Variant',
    name,
    span: createEmptySpan(),
  }),
  Enum: (name: string, nameSpan: AST.Span, variants: readonly AST.Variant[]): AST.EnumDef => ({
    kind: 'Enum',
    name,
    nameSpan,
    variants,
    span: createEmptySpan(),
  }),
  Parameter: (type: AST.TypeNode, name: string): AST.Parameter => ({
    kind: 'Parameter',
    type,
    name,
    span: createEmptySpan(),
  }),
  Function: (
    name: string,
    nameSpan: AST.Span,
    params: readonly AST.Parameter[],
    returnType: AST.TypeNode | null,
    body: AST.Block
  ): AST.FunctionDef => ({
    kind: 'Function',
    name,
    nameSpan,
    params,
    returnType,
    body,
    span: createEmptySpan(),
  }),
  Block: (statements: readonly AST.Statement[]): AST.Block => ({
    kind: 'Block',
    statements,
    span: createEmptySpan(),
  }),
  VariableDecl: (
    type: AST.TypeNode,
    name: string,
    nameSpan: AST.Span,
    value: AST.Expression | null
  ): AST.VariableDecl => ({
    kind: 'VariableDecl',
    type,
    name,
    nameSpan,
    value,
    span: createEmptySpan(),
  }),
  Return: (expr: AST.Expression, form: AST.ReturnStmt['form'] = 'return'): AST.ReturnStmt => ({
    kind: 'Return',
    form,
    expr,
    span: createEmptySpan(),
  }),
  PassStmt: (): AST.PassStmt => ({
    kind: 'PassStmt',
    span: createEmptySpan(),
  }),
  ExprStmt: (expr: AST.Expression): AST.ExprStmt => ({
    kind: 'ExprStmt',
    expr,
    span: createEmptySpan(),
  }),

  // Literals
  Int: (value: number): AST.IntLiteral => ({ kind: 'Int', value, span: createEmptySpan() }),
  Float: (value: number): AST.FloatLiteral => ({ kind: 'Float', value, span: createEmptySpan() }),
  String: (value: string): AST.StringLiteral => ({ kind: 'String', value, span: createEmptySpan() }),
  Bool: (value: boolean): AST.BoolLiteral => ({ kind: 'Bool', value, span: createEmptySpan() }),
  Money: (currency: string, amount: string): AST.MoneyLiteral => ({
    kind: 'Money',
    currency,
    amount,
    span: createEmptySpan(),
  }),
  Percent: (value: number): AST.PercentLiteral => ({
    kind: 'Percent',
    value,
    span: createEmptySpan(),
  }),
  Date: (value: string): AST.DateLiteral => ({ kind: 'Date', value, span: createEmptySpan() }),
  Duration: (parts: readonly AST.DurationPart[]): AST.DurationLiteral => ({
    kind: 'Duration',
    parts,
    span: createEmptySpan(),
  }),
  PassLiteral: (): AST.PassLiteral => ({ kind: 'PassLiteral', span: createEmptySpan() }),

  Name: (name: string): AST.NameExpr => ({ kind: 'Name', name, span: createEmptySpan() }),
  FieldAccess: (target: AST.Expression, field: string, fieldSpan: AST.Span): AST.FieldAccess => ({
    kind: 'FieldAccess',
    target,
    field,
    fieldSpan,
    span: createEmptySpan(),
  }),
  Index: (target: AST.Expression, index: AST.Expression): AST.IndexExpr => ({
    kind: 'Index',
    target,
    index,
    span: createEmptySpan(),
  }),
  Binary: (op: AST.BinaryOp, left: AST.Expression, right: AST.Expression): AST.BinaryExpr => ({
    kind: 'Binary',
    op,
    left,
    right,
    span: createEmptySpan(),
  }),
  Unary: (op: AST.UnaryOp, operand: AST.Expression): AST.UnaryExpr => ({
    kind: 'Unary',
    op,
    operand,
    span: createEmptySpan(),
  }),
  Call: (callee: AST.Expression, args: readonly AST.Expression[]): AST.CallExpr => ({
    kind: 'Call',
    callee,
    args,
    span: createEmptySpan(),
  }),
  FieldInit: (name: string, value: AST.Expression): AST.FieldInit => ({
    kind: 'FieldInit',
    name,
    value,
    span: createEmptySpan(),
  }),
  StructLiteral: (typeName: string | null, fields: readonly AST.FieldInit[]): AST.StructLiteral => ({
    kind: 'StructLiteral',
    typeName,
    fields,
    span: createEmptySpan(),
  }),
  MatchArm: (
    pattern: AST.Pattern,
    guard: AST.Expression | null,
    consequence: AST.Expression
  ): AST.MatchArm => ({
    kind: 'MatchArm',
    pattern,
    guard,
    consequence,
    span: createEmptySpan(),
  }),
  Match: (scrutinee: AST.Expression | null, arms: readonly AST.MatchArm[]): AST.MatchExpr => ({
    kind: 'Match',
    scrutinee,
    arms,
    span: createEmptySpan(),
  }),

  // Patterns
  WildcardPattern: (): AST.WildcardPattern => ({ kind: 'WildcardPattern', span: createEmptySpan() }),
  LiteralPattern: (literal: AST.Literal): AST.LiteralPattern => ({
    kind: 'LiteralPattern',
    literal,
    span: createEmptySpan(),
  }),
  NamePattern: (name: string): AST.NamePattern => ({
    kind: 'NamePattern',
    name,
    span: createEmptySpan(),
  }),
  VariantPattern: (enumName: string, variant: string): AST.VariantPattern => ({
    kind: 'VariantPattern',
    enumName,
    variant,
    span: createEmptySpan(),
  }),
  FieldPattern: (name: string, pattern: AST.Pattern | null): AST.FieldPattern => ({
    kind: 'FieldPattern',
    name,
    pattern,
    span: createEmptySpan(),
  }),
  StructPattern: (typeName: string, fields: readonly AST.FieldPattern[]): AST.StructPattern => ({
    kind: 'StructPattern',
    typeName,
    fields,
    span: createEmptySpan(),
  }),

  // Type annotations
  BuiltinType: (name: AST.BuiltinTypeName): AST.BuiltinType => ({
    kind: 'BuiltinType',
    name,
    span: createEmptySpan(),
  }),
  NamedType: (name: string): AST.NamedType => ({
    kind: 'NamedType',
    name,
    span: createEmptySpan(),
  }),
  UnionType: (members: readonly AST.TypeNode[]): AST.UnionType => ({
    kind: 'UnionType',
    members,
    span: createEmptySpan(),
  }),
};
