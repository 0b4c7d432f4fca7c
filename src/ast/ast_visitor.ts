import type {
  Program,
  Item,
  Block,
  Statement,
  Expression,
  Pattern,
  TypeNode,
  MatchArm,
  AstNode,
} from '../types.js';

/**
 * 统一的 AST 遍历器接口与默认实现（只读遍历）。
 *
 * - 入口：visitProgram/visitItem/visitBlock/visitStatement/visitExpression
 * - 默认实现执行深度优先递归；子类可覆写特定 visit 方法并调用 super 继续遍历
 */
export interface AstVisitor<Ctx, R = void> {
  visitProgram(p: Program, ctx: Ctx): R;
  visitItem(item: Item, ctx: Ctx): R;
  visitBlock(b: Block, ctx: Ctx): R;
  visitStatement(s: Statement, ctx: Ctx): R;
  visitExpression(e: Expression, ctx: Ctx): R;
  visitPattern?(p: Pattern, ctx: Ctx): R;
  visitType?(t: TypeNode, ctx: Ctx): R;
}

export class DefaultAstVisitor<Ctx> implements AstVisitor<Ctx, void> {
  // 可选钩子默认不实现，由子类按需覆写
  public visitType?(t: TypeNode, ctx: Ctx): void;
  public visitPattern?(p: Pattern, ctx: Ctx): void;

  visitProgram(p: Program, ctx: Ctx): void {
    for (const item of p.items) this.visitItem(item, ctx);
  }

  visitItem(item: Item, ctx: Ctx): void {
    switch (item.kind) {
      case 'Referencing':
        return;
      case 'Scope':
        for (const inner of item.items) this.visitItem(inner, ctx);
        return;
      case 'Struct':
        for (const f of item.fields) this.visitType?.(f.type, ctx);
        return;
      case 'Enum':
        return;
      case 'Function':
        for (const p of item.params) this.visitType?.(p.type, ctx);
        if (item.returnType) this.visitType?.(item.returnType, ctx);
        this.visitBlock(item.body, ctx);
        return;
      case 'VariableDecl':
      case 'ExprStmt':
        this.visitStatement(item, ctx);
        return;
    }
  }

  visitBlock(b: Block, ctx: Ctx): void {
    for (const s of b.statements) this.visitStatement(s, ctx);
  }

  visitStatement(s: Statement, ctx: Ctx): void {
    switch (s.kind) {
      case 'VariableDecl':
        this.visitType?.(s.type, ctx);
        if (s.value) this.visitExpression(s.value, ctx);
        return;
      case 'Return':
      case 'ExprStmt':
        this.visitExpression(s.expr, ctx);
        return;
      case 'PassStmt':
        return;
    }
  }

  visitArm(arm: MatchArm, ctx: Ctx): void {
    this.visitPattern?.(arm.pattern, ctx);
    if (arm.guard) this.visitExpression(arm.guard, ctx);
    this.visitExpression(arm.consequence, ctx);
  }

  visitExpression(e: Expression, ctx: Ctx): void {
    switch (e.kind) {
      case 'FieldAccess':
        this.visitExpression(e.target, ctx);
        return;
      case 'Index':
        this.visitExpression(e.target, ctx);
        this.visitExpression(e.index, ctx);
        return;
      case 'Binary':
        this.visitExpression(e.left, ctx);
        this.visitExpression(e.right, ctx);
        return;
      case 'Unary':
        this.visitExpression(e.operand, ctx);
        return;
      case 'Call':
        this.visitExpression(e.callee, ctx);
        for (const a of e.args) this.visitExpression(a, ctx);
        return;
      case 'StructLiteral':
        for (const f of e.fields) this.visitExpression(f.value, ctx);
        return;
      case 'Match':
        if (e.scrutinee) this.visitExpression(e.scrutinee, ctx);
        for (const arm of e.arms) this.visitArm(arm, ctx);
        return;
      default:
        // 字面量与 Name 为叶节点
        return;
    }
  }
}

/**
 * 返回节点的直接子节点（按源码顺序）。
 */
export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case 'Program':
      return [...node.items];
    case 'Referencing':
      return [...node.names];
    case 'Scope':
      return [...node.items];
    case 'Struct':
      return [...node.fields];
    case 'Enum':
      return [...node.variants];
    case 'Function':
      return [...node.params, ...(node.returnType ? [node.returnType] : []), node.body];
    case 'Field':
    case 'Parameter':
      return [node.type];
    case 'Block':
      return [...node.statements];
    case 'VariableDecl':
      return node.value ? [node.type, node.value] : [node.type];
    case 'Return':
    case 'ExprStmt':
      return [node.expr];
    case 'FieldAccess':
      return [node.target];
    case 'Index':
      return [node.target, node.index];
    case 'Binary':
      return [node.left, node.right];
    case 'Unary':
      return [node.operand];
    case 'Call':
      return [node.callee, ...node.args];
    case 'StructLiteral':
      return [...node.fields];
    case 'FieldInit':
      return [node.value];
    case 'Match':
      return node.scrutinee ? [node.scrutinee, ...node.arms] : [...node.arms];
    case 'MatchArm':
      return node.guard
        ? [node.pattern, node.guard, node.consequence]
        : [node.pattern, node.consequence];
    case 'LiteralPattern':
      return [node.literal];
    case 'StructPattern':
      return [...node.fields];
    case 'FieldPattern':
      return node.pattern ? [node.pattern] : [];
    case 'UnionType':
      return [...node.members];
    default:
      return [];
  }
}

/**
 * 对整棵树做前序折叠。
 */
export function foldAst<T>(node: AstNode, initial: T, step: (acc: T, node: AstNode) => T): T {
  let acc = step(initial, node);
  for (const child of childrenOf(node)) {
    acc = foldAst(child, acc, step);
  }
  return acc;
}

/**
 * 前序遍历；回调返回 false 时跳过该节点的子树。
 */
export function walk(node: AstNode, enter: (node: AstNode, parent: AstNode | null) => boolean | void, parent: AstNode | null = null): void {
  if (enter(node, parent) === false) return;
  for (const child of childrenOf(node)) walk(child, enter, node);
}
