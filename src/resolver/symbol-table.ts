/**
 * 程序级符号表：限定名到声明的映射、各模块的命名空间以及声明之间的名字引用图。
 *
 * AST 中的标识符只是查找键，声明之间（可能成环）的引用关系只记录在引用图里。
 */

import type { EnumDef, FunctionDef, ScopeDef, Span, StructDef, VariableDecl } from '../types.js';
import type { Type } from '../semantic/types.js';
import { DependencyGraph } from './dependency-graph.js';

export type ProgramSymbolKind = 'scope' | 'struct' | 'enum' | 'function' | 'variable';

export type DeclarationNode = ScopeDef | StructDef | EnumDef | FunctionDef | VariableDecl;

export interface ProgramSymbol {
  readonly name: string;
  /** `module::Name`，scope 成员为 `module::Scope::Name` */
  readonly qualifiedName: string;
  readonly kind: ProgramSymbolKind;
  readonly moduleId: string;
  readonly file: string;
  readonly node: DeclarationNode;
  /** 名字位置，用于诊断 */
  readonly span: Span;
  /**
   * struct/enum/scope 为自身的 UserDefined 类型；函数为返回类型；变量为声明类型。
   * 由解析器在合并完成后填入。
   */
  type: Type;
  /** 仅 scope：成员名到符号 */
  readonly members: Map<string, ProgramSymbol>;
}

export const QUALIFIER = '::';

export function qualify(...parts: string[]): string {
  return parts.join(QUALIFIER);
}

export class SymbolTable {
  private readonly symbols = new Map<string, ProgramSymbol>();
  private readonly namespaces = new Map<string, Map<string, ProgramSymbol>>();
  private readonly referenceGraph = new DependencyGraph();
  private frozen = false;

  private assertMutable(): void {
    if (this.frozen) throw new Error('SymbolTable is frozen');
  }

  /**
   * 登记声明；同一限定名已存在时保留先声明者并返回 false（重复声明由语义分析报告）。
   */
  define(symbol: ProgramSymbol): boolean {
    this.assertMutable();
    if (this.symbols.has(symbol.qualifiedName)) return false;
    this.symbols.set(symbol.qualifiedName, symbol);
    this.referenceGraph.addNode(symbol.qualifiedName);
    return true;
  }

  get(qualifiedName: string): ProgramSymbol | undefined {
    return this.symbols.get(qualifiedName);
  }

  get size(): number {
    return this.symbols.size;
  }

  /**
   * 在模块命名空间中绑定裸名。
   * 已绑定到另一个符号时不覆盖，并返回已有符号供调用方报告冲突。
   */
  bind(moduleId: string, name: string, symbol: ProgramSymbol): ProgramSymbol | undefined {
    this.assertMutable();
    let ns = this.namespaces.get(moduleId);
    if (!ns) {
      ns = new Map();
      this.namespaces.set(moduleId, ns);
    }
    const existing = ns.get(name);
    if (existing && existing.qualifiedName !== symbol.qualifiedName) return existing;
    ns.set(name, symbol);
    return undefined;
  }

  namespace(moduleId: string): ReadonlyMap<string, ProgramSymbol> {
    return this.namespaces.get(moduleId) ?? new Map();
  }

  lookup(moduleId: string, name: string): ProgramSymbol | undefined {
    return this.namespaces.get(moduleId)?.get(name);
  }

  /**
   * 解析点号路径（`Scope.Member`）。第一个段在模块命名空间中查找，其余段逐层进入 scope 成员。
   */
  lookupPath(moduleId: string, path: readonly string[]): ProgramSymbol | undefined {
    const [head, ...rest] = path;
    if (head === undefined) return undefined;
    let current = this.lookup(moduleId, head);
    for (const segment of rest) {
      current = current?.members.get(segment);
    }
    return current;
  }

  /** 记录声明 from 引用了声明 to */
  addReference(from: string, to: string): void {
    this.assertMutable();
    if (!this.referenceGraph.hasNode(from) || !this.referenceGraph.hasNode(to)) return;
    this.referenceGraph.addEdge(from, to);
  }

  /** 名字引用图中的环 */
  referenceCycles(): string[][] {
    return this.referenceGraph.detectCycles() ?? [];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
