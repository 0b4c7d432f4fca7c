import type { Span } from '../types.js';
import type { Type } from './types.js';

export type LocalKind = 'variable' | 'param' | 'binding';

export interface LocalSymbol {
  name: string;
  type: Type;
  kind: LocalKind;
  span: Span;
}

export class DuplicateSymbolError extends Error {
  readonly symbol: LocalSymbol;
  readonly existing: LocalSymbol;

  constructor(symbol: LocalSymbol, existing: LocalSymbol) {
    super(`Duplicate symbol '${symbol.name}' declared in the same scope`);
    this.symbol = symbol;
    this.existing = existing;
  }
}

class Scope {
  private readonly symbols = new Map<string, LocalSymbol>();

  constructor(readonly parent: Scope | null) {}

  define(symbol: LocalSymbol): void {
    const existing = this.symbols.get(symbol.name);
    if (existing) {
      throw new DuplicateSymbolError(symbol, existing);
    }
    this.symbols.set(symbol.name, symbol);
  }

  lookup(name: string): LocalSymbol | undefined {
    return this.symbols.get(name) ?? this.parent?.lookup(name);
  }
}

/**
 * 函数体内的局部作用域栈（参数、局部变量、match 绑定）。
 * 模块级名字不在这里，由程序符号表负责。
 * 内层作用域可以遮蔽外层同名符号，同一层重复定义则报错。
 */
export class ScopeStack {
  private current: Scope | null = null;

  /** 在新作用域中执行 body，结束后自动退出 */
  within<T>(body: () => T): T {
    const scope = new Scope(this.current);
    this.current = scope;
    try {
      return body();
    } finally {
      this.current = scope.parent;
    }
  }

  get depth(): number {
    let n = 0;
    for (let s = this.current; s; s = s.parent) n++;
    return n;
  }

  /**
   * @throws {DuplicateSymbolError} 当前作用域已有同名符号
   */
  define(name: string, type: Type, kind: LocalKind, span: Span): LocalSymbol {
    if (!this.current) {
      throw new Error(`Cannot define '${name}': no scope is open`);
    }
    const symbol: LocalSymbol = { name, type, kind, span };
    this.current.define(symbol);
    return symbol;
  }

  lookup(name: string): LocalSymbol | undefined {
    return this.current?.lookup(name);
  }
}
