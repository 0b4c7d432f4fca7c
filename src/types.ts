// Core type definitions for the statute DSL front end

export interface Position {
  readonly line: number;
  readonly col: number;
}

/** 源码区间，`end` 指向最后一个字符之后的位置（不含） */
export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export enum TokenKind {
  EOF = 'EOF',
  IDENT = 'IDENT',
  KEYWORD = 'KEYWORD',
  TYPE = 'TYPE',
  INT = 'INT',
  FLOAT = 'FLOAT',
  STRING = 'STRING',
  BOOL = 'BOOL',
  MONEY = 'MONEY',
  PERCENT = 'PERCENT',
  DATE = 'DATE',
  DURATION = 'DURATION',
  ASSIGN = 'ASSIGN',
  EQ = 'EQ',
  NEQ = 'NEQ',
  LT = 'LT',
  LTE = 'LTE',
  GT = 'GT',
  GTE = 'GTE',
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  STAR = 'STAR',
  SLASH = 'SLASH',
  MOD = 'MOD',
  AND = 'AND',
  OR = 'OR',
  NOT = 'NOT',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  COMMA = 'COMMA',
  DOT = 'DOT',
  COLON = 'COLON',
  SEMICOLON = 'SEMICOLON',
  UNDERSCORE = 'UNDERSCORE',
  COMMENT = 'COMMENT',
}

export interface MoneyValue {
  readonly currency: string;
  /** 去掉千分位逗号后的十进制字符串，如 `1000.50` */
  readonly amount: string;
}

export type DurationUnit = 'year' | 'month' | 'week' | 'day' | 'hour' | 'minute' | 'second';

export interface DurationPart {
  readonly amount: number;
  readonly unit: DurationUnit;
}

export interface DurationValue {
  readonly parts: readonly DurationPart[];
}

/**
 * 注释 Token 的取值结构（仅在 keepComments 模式下产生）
 */
export interface CommentValue {
  readonly text: string;
  readonly block: boolean;
}

export type TokenValue =
  | string
  | number
  | boolean
  | null
  | MoneyValue
  | DurationValue
  | CommentValue;

export interface Token {
  readonly kind: TokenKind;
  readonly value: TokenValue;
  /** 源码中的原始文本 */
  readonly lexeme: string;
  readonly start: Position;
  readonly end: Position;
  readonly channel?: 'trivia';
}

export function isCommentToken(token: Token): token is Token & {
  readonly kind: TokenKind.COMMENT;
  readonly value: CommentValue;
} {
  return token.kind === TokenKind.COMMENT;
}

// ============================================================
// AST
// ============================================================

export interface Program {
  readonly kind: 'Program';
  readonly file: string | null;
  readonly items: readonly Item[];
  span: Span;
}

/** 顶层或 scope 块内允许出现的条目 */
export type Item =
  | ReferencingStmt
  | ScopeDef
  | StructDef
  | EnumDef
  | FunctionDef
  | VariableDecl
  | ExprStmt;

/** 可被其他模块引用的声明 */
export type ExportableDecl = ScopeDef | StructDef | EnumDef | FunctionDef;

export interface ImportedName {
  readonly kind: 'ImportedName';
  readonly name: string;
  span: Span;
}

export interface ReferencingStmt {
  readonly kind: 'Referencing';
  readonly names: readonly ImportedName[];
  /** 以 `/` 分隔的模块路径，不含扩展名 */
  readonly module: string;
  span: Span;
}

export interface ScopeDef {
  readonly kind: 'Scope';
  readonly keyword: 'scope' | 'statute';
  readonly name: string;
  readonly nameSpan: Span;
  readonly items: readonly Item[];
  span: Span;
}

export interface Field {
  readonly kind: 'Field';
  readonly type: TypeNode;
  readonly name: string;
  span: Span;
}

export interface StructDef {
  readonly kind: 'Struct';
  readonly name: string;
  readonly nameSpan: Span;
  readonly fields: readonly Field[];
  span: Span;
}

export interface Variant {
  readonly kind: 'Variant';
  readonly name: string;
  span: Span;
}

export interface EnumDef {
  readonly kind: 'Enum';
  readonly name: string;
  readonly nameSpan: Span;
  readonly variants: readonly Variant[];
  span: Span;
}

export interface Parameter {
  readonly kind: 'Parameter';
  readonly type: TypeNode;
  readonly name: string;
  span: Span;
}

export interface FunctionDef {
  readonly kind: 'Function';
  readonly name: string;
  readonly nameSpan: Span;
  readonly params: readonly Parameter[];
  /** 未声明返回类型时为 null */
  readonly returnType: TypeNode | null;
  readonly body: Block;
  span: Span;
}

export interface Block {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
  span: Span;
}

export type Statement = VariableDecl | ReturnStmt | PassStmt | ExprStmt;

export interface VariableDecl {
  readonly kind: 'VariableDecl';
  readonly type: TypeNode;
  readonly name: string;
  readonly nameSpan: Span;
  readonly value: Expression | null;
  span: Span;
}

export interface ReturnStmt {
  readonly kind: 'Return';
  /** `return e;` 或函数体内的 `:= e;` 简写 */
  readonly form: 'return' | 'assign';
  readonly expr: Expression;
  span: Span;
}

export interface PassStmt {
  readonly kind: 'PassStmt';
  span: Span;
}

export interface ExprStmt {
  readonly kind: 'ExprStmt';
  readonly expr: Expression;
  span: Span;
}

// ------------------------------------------------------------
// Expressions
// ------------------------------------------------------------

export interface IntLiteral {
  readonly kind: 'Int';
  readonly value: number;
  span: Span;
}

export interface FloatLiteral {
  readonly kind: 'Float';
  readonly value: number;
  span: Span;
}

export interface StringLiteral {
  readonly kind: 'String';
  readonly value: string;
  span: Span;
}

export interface BoolLiteral {
  readonly kind: 'Bool';
  readonly value: boolean;
  span: Span;
}

export interface MoneyLiteral {
  readonly kind: 'Money';
  readonly currency: string;
  readonly amount: string;
  span: Span;
}

export interface PercentLiteral {
  readonly kind: 'Percent';
  readonly value: number;
  span: Span;
}

export interface DateLiteral {
  readonly kind: 'Date';
  /** ISO `YYYY-MM-DD` */
  readonly value: string;
  span: Span;
}

export interface DurationLiteral {
  readonly kind: 'Duration';
  readonly parts: readonly DurationPart[];
  span: Span;
}

export interface PassLiteral {
  readonly kind: 'PassLiteral';
  span: Span;
}

export type Literal =
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | BoolLiteral
  | MoneyLiteral
  | PercentLiteral
  | DateLiteral
  | DurationLiteral
  | PassLiteral;

/** 标识符引用：只保存名字，由符号表在语义阶段解析 */
export interface NameExpr {
  readonly kind: 'Name';
  readonly name: string;
  span: Span;
}

export interface FieldAccess {
  readonly kind: 'FieldAccess';
  readonly target: Expression;
  readonly field: string;
  readonly fieldSpan: Span;
  span: Span;
}

export interface IndexExpr {
  readonly kind: 'Index';
  readonly target: Expression;
  readonly index: Expression;
  span: Span;
}

export type BinaryOp =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOp = '!' | '-';

export interface BinaryExpr {
  readonly kind: 'Binary';
  readonly op: BinaryOp;
  readonly left: Expression;
  readonly right: Expression;
  span: Span;
}

export interface UnaryExpr {
  readonly kind: 'Unary';
  readonly op: UnaryOp;
  readonly operand: Expression;
  span: Span;
}

export interface CallExpr {
  readonly kind: 'Call';
  readonly callee: Expression;
  readonly args: readonly Expression[];
  span: Span;
}

export interface FieldInit {
  readonly kind: 'FieldInit';
  readonly name: string;
  readonly value: Expression;
  span: Span;
}

export interface StructLiteral {
  readonly kind: 'StructLiteral';
  /** 匿名结构体字面量（`{ a := 1 }`）时为 null，类型取自上下文 */
  readonly typeName: string | null;
  readonly fields: readonly FieldInit[];
  span: Span;
}

export interface MatchArm {
  readonly kind: 'MatchArm';
  readonly pattern: Pattern;
  readonly guard: Expression | null;
  readonly consequence: Expression;
  span: Span;
}

export interface MatchExpr {
  readonly kind: 'Match';
  /** `match { ... }` 形式没有被匹配值，按布尔条件匹配处理 */
  readonly scrutinee: Expression | null;
  readonly arms: readonly MatchArm[];
  span: Span;
}

export type Expression =
  | Literal
  | NameExpr
  | FieldAccess
  | IndexExpr
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | StructLiteral
  | MatchExpr;

// ------------------------------------------------------------
// Patterns
// ------------------------------------------------------------

export interface WildcardPattern {
  readonly kind: 'WildcardPattern';
  span: Span;
}

export interface LiteralPattern {
  readonly kind: 'LiteralPattern';
  readonly literal: Literal;
  span: Span;
}

/** 裸标识符模式：语义阶段决定是枚举变体还是变量绑定 */
export interface NamePattern {
  readonly kind: 'NamePattern';
  readonly name: string;
  span: Span;
}

export interface VariantPattern {
  readonly kind: 'VariantPattern';
  readonly enumName: string;
  readonly variant: string;
  span: Span;
}

export interface FieldPattern {
  readonly kind: 'FieldPattern';
  readonly name: string;
  /** `{ amount }` 简写时为 null，等价于绑定同名变量 */
  readonly pattern: Pattern | null;
  span: Span;
}

export interface StructPattern {
  readonly kind: 'StructPattern';
  readonly typeName: string;
  readonly fields: readonly FieldPattern[];
  span: Span;
}

export type Pattern =
  | WildcardPattern
  | LiteralPattern
  | NamePattern
  | VariantPattern
  | StructPattern;

// ------------------------------------------------------------
// Type annotations
// ------------------------------------------------------------

export type BuiltinTypeName =
  | 'int'
  | 'integer'
  | 'float'
  | 'bool'
  | 'boolean'
  | 'string'
  | 'money'
  | 'date'
  | 'duration'
  | 'percent'
  | 'pass';

export interface BuiltinType {
  readonly kind: 'BuiltinType';
  readonly name: BuiltinTypeName;
  span: Span;
}

export interface NamedType {
  readonly kind: 'NamedType';
  /** 可能是点号限定名，如 `Theft.Penalty` */
  readonly name: string;
  span: Span;
}

export interface UnionType {
  readonly kind: 'UnionType';
  readonly members: readonly TypeNode[];
  span: Span;
}

export type TypeNode = BuiltinType | NamedType | UnionType;

export type AstNode =
  | Program
  | Item
  | Statement
  | Expression
  | Pattern
  | TypeNode
  | ImportedName
  | Field
  | Variant
  | Parameter
  | Block
  | FieldInit
  | MatchArm
  | FieldPattern;
