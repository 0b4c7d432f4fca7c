/**
 * 在模块命名空间（及外层 scope 成员）中查找名字并把类型注解转换为语义类型。
 */

import type { NamedType, TypeNode } from '../types.js';
import { TypeSystem } from '../semantic/types.js';
import type { Type } from '../semantic/types.js';
import type { ProgramSymbol, SymbolTable } from './symbol-table.js';

/** 名字查找环境：所在模块与由外到内的 scope 链 */
export interface NameEnv {
  readonly moduleId: string;
  readonly scopes: readonly ProgramSymbol[];
}

export function moduleEnv(moduleId: string): NameEnv {
  return { moduleId, scopes: [] };
}

export function enterScopeEnv(env: NameEnv, scope: ProgramSymbol): NameEnv {
  return { moduleId: env.moduleId, scopes: [...env.scopes, scope] };
}

/** 内层 scope 成员优先，其次模块命名空间 */
export function lookupName(symbols: SymbolTable, env: NameEnv, name: string): ProgramSymbol | undefined {
  for (let i = env.scopes.length - 1; i >= 0; i--) {
    const member = env.scopes[i]?.members.get(name);
    if (member) return member;
  }
  return symbols.lookup(env.moduleId, name);
}

export function lookupPath(
  symbols: SymbolTable,
  env: NameEnv,
  path: readonly string[]
): ProgramSymbol | undefined {
  const [head, ...rest] = path;
  if (head === undefined) return undefined;
  let current = lookupName(symbols, env, head);
  for (const segment of rest) {
    current = current?.members.get(segment);
  }
  return current;
}

export type UnresolvedTypeHandler = (node: NamedType, found: ProgramSymbol | undefined) => void;

/**
 * 将类型注解解析为语义类型；未知名字或不是类型的名字得到 Unknown，并回调 onUnresolved。
 */
export function resolveTypeNode(
  symbols: SymbolTable,
  env: NameEnv,
  node: TypeNode,
  onUnresolved?: UnresolvedTypeHandler
): Type {
  switch (node.kind) {
    case 'BuiltinType':
      return TypeSystem.fromBuiltin(node.name);
    case 'UnionType':
      return TypeSystem.union(node.members.map(m => resolveTypeNode(symbols, env, m, onUnresolved)));
    case 'NamedType': {
      const found = lookupPath(symbols, env, node.name.split('.'));
      if (found && (found.kind === 'struct' || found.kind === 'enum')) {
        return found.type;
      }
      onUnresolved?.(node, found);
      return TypeSystem.unknown();
    }
  }
}
