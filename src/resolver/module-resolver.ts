/**
 * @module module-resolver
 *
 * 模块解析器：从入口文件出发加载所有 `referencing` 引用的文件，检测循环导入，
 * 校验导入的名字并把各模块导出的符号合并到一个 SymbolTable。
 *
 * 解析是原子的：任何错误都以 ResolveError 抛出，不返回部分结果。
 * 每次 resolve 调用使用独立的缓存与符号表，解析器实例可重复使用。
 */

import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { lex } from '../frontend/lexer.js';
import { parse } from '../parser.js';
import { DiagnosticError } from '../diagnostics/diagnostics.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { ImportedName, Item, Program, ReferencingStmt, Span } from '../types.js';
import { TypeSystem } from '../semantic/types.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import { ResolveErrors } from './errors.js';
import type { ImportSite } from './errors.js';
import type { SourceHost } from './source-host.js';
import { SymbolTable, qualify } from './symbol-table.js';
import type { DeclarationNode, ProgramSymbol, ProgramSymbolKind } from './symbol-table.js';
import { enterScopeEnv, moduleEnv, resolveTypeNode } from './type-resolver.js';
import type { NameEnv } from './type-resolver.js';

export const SOURCE_EXTENSION = '.yh';

export type ExportPolicy = 'namespace' | 'global';

export interface ResolverOptions {
  /**
   * 额外搜索路径（相对路径以入口文件目录为基准）。
   * 未提供时为入口目录及其下的 `lib/`、`stdlib/`。
   */
  readonly searchPaths?: readonly string[];
  /**
   * namespace：同一模块命名空间内一个裸名绑定两个不同符号才算冲突；
   * global：任意两个模块导出同名符号即冲突。
   */
  readonly exportPolicy?: ExportPolicy;
  /** 解析每个文件时是否启用错误恢复（默认 true） */
  readonly recover?: boolean;
}

export interface ImportRequest {
  readonly names: readonly ImportedName[];
  readonly module: string;
  readonly span: Span;
  /** 目标文件的绝对路径 */
  readonly resolvedPath: string;
}

export interface Module {
  /** 相对入口目录的路径（不含扩展名），如 `lib/penalties` */
  readonly id: string;
  /** 绝对路径 */
  readonly path: string;
  readonly source: string;
  readonly program: Program;
  /** 顶层 struct/enum/func/scope 名字到符号 */
  readonly exports: ReadonlyMap<string, ProgramSymbol>;
  readonly imports: readonly ImportRequest[];
}

export interface ResolvedProgram {
  readonly entry: Module;
  /** 依赖优先，入口模块在最后 */
  readonly modules: readonly Module[];
  readonly symbols: SymbolTable;
  readonly diagnostics: readonly Diagnostic[];
}

interface ResolveState {
  readonly baseDir: string;
  readonly searchPaths: readonly string[];
  readonly symbols: SymbolTable;
  readonly cache: Map<string, Module>;
  readonly stack: string[];
  readonly order: Module[];
  readonly diagnostics: Diagnostic[];
}

const logger = createLogger('resolver');

function toModuleId(baseDir: string, filePath: string): string {
  const relative = path.relative(baseDir, filePath).split(path.sep).join('/');
  return relative.endsWith(SOURCE_EXTENSION) ? relative.slice(0, -SOURCE_EXTENSION.length) : relative;
}

function declarationKind(item: Item): ProgramSymbolKind | null {
  switch (item.kind) {
    case 'Scope':
      return 'scope';
    case 'Struct':
      return 'struct';
    case 'Enum':
      return 'enum';
    case 'Function':
      return 'function';
    case 'VariableDecl':
      return 'variable';
    default:
      return null;
  }
}

function isDeclaration(item: Item): item is DeclarationNode & Item {
  return declarationKind(item) !== null;
}

function isExportKind(kind: ProgramSymbolKind): boolean {
  return kind !== 'variable';
}

export class ModuleResolver {
  constructor(
    private readonly host: SourceHost,
    private readonly options: ResolverOptions = {}
  ) {}

  /**
   * 解析入口文件及其全部依赖。
   *
   * @throws {ResolveError} ModuleNotFound、CircularImport、MissingSymbol、DuplicateExport 或 InvalidSource
   */
  resolve(entryPath: string): ResolvedProgram {
    const startTime = performance.now();
    const entryAbs = path.resolve(entryPath);
    const baseDir = path.dirname(entryAbs);
    const state: ResolveState = {
      baseDir,
      searchPaths: this.searchPathsFor(baseDir),
      symbols: new SymbolTable(),
      cache: new Map(),
      stack: [],
      order: [],
      diagnostics: [],
    };

    if (!this.host.fileExists(entryAbs)) {
      throw ResolveErrors.moduleNotFound(toModuleId(baseDir, entryAbs), [entryAbs]);
    }

    const entry = this.load(state, entryAbs);
    this.merge(state);
    this.assignTypes(state);

    logPerformance({
      component: 'resolver',
      operation: 'resolve',
      duration: performance.now() - startTime,
      metadata: { entry: entry.id, modules: state.order.length, symbols: state.symbols.size },
    });

    return {
      entry,
      modules: [...state.order],
      symbols: state.symbols,
      diagnostics: state.diagnostics,
    };
  }

  private searchPathsFor(baseDir: string): string[] {
    const configured = this.options.searchPaths;
    if (configured && configured.length > 0) {
      return configured.map(p => path.resolve(baseDir, p));
    }
    return [baseDir, path.join(baseDir, 'lib'), path.join(baseDir, 'stdlib')];
  }

  /**
   * 候选路径：导入方所在目录优先，然后依次是各搜索路径（去重）。
   */
  candidatePaths(importerPath: string, module: string, searchPaths: readonly string[]): string[] {
    const relative = `${module}${SOURCE_EXTENSION}`;
    const roots = [path.dirname(importerPath), ...searchPaths];
    const seen = new Set<string>();
    const candidates: string[] = [];
    for (const root of roots) {
      const candidate = path.resolve(root, relative);
      if (seen.has(candidate)) continue;
      seen.add(candidate);
      candidates.push(candidate);
    }
    return candidates;
  }

  private displayPath(state: ResolveState, filePath: string): string {
    return path.relative(state.baseDir, filePath).split(path.sep).join('/');
  }

  private load(state: ResolveState, filePath: string, site?: ImportSite): Module {
    const cached = state.cache.get(filePath);
    if (cached) return cached;

    const onStack = state.stack.indexOf(filePath);
    if (onStack !== -1) {
      const cycle = state.stack.slice(onStack).map(p => this.displayPath(state, p));
      throw ResolveErrors.circularImport(cycle, site);
    }

    state.stack.push(filePath);
    const id = toModuleId(state.baseDir, filePath);
    const { source, program } = this.parseFile(state, filePath);
    const exports = this.declare(state, id, filePath, program.items);
    const imports: ImportRequest[] = [];

    for (const item of program.items) {
      if (item.kind !== 'Referencing') continue;
      imports.push(this.resolveImport(state, filePath, item));
    }

    state.stack.pop();
    const module: Module = { id, path: filePath, source, program, exports, imports };
    state.cache.set(filePath, module);
    state.order.push(module);
    logger.debug('Module loaded', { module: id, imports: imports.length, exports: exports.size });
    return module;
  }

  private resolveImport(state: ResolveState, importerPath: string, stmt: ReferencingStmt): ImportRequest {
    const site: ImportSite = { file: importerPath, span: stmt.span };
    const candidates = this.candidatePaths(importerPath, stmt.module, state.searchPaths);
    const target = candidates.find(candidate => this.host.fileExists(candidate));
    if (!target) {
      throw ResolveErrors.moduleNotFound(stmt.module, candidates, site);
    }
    if (target === importerPath) {
      throw ResolveErrors.circularImport([this.displayPath(state, importerPath)], site);
    }

    const targetModule = this.load(state, target, site);
    for (const imported of stmt.names) {
      if (!targetModule.exports.has(imported.name)) {
        const available = [...targetModule.exports.keys()].sort();
        throw ResolveErrors.missingSymbol(imported.name, stmt.module, available, {
          file: importerPath,
          span: imported.span,
        });
      }
    }
    return { names: stmt.names, module: stmt.module, span: stmt.span, resolvedPath: target };
  }

  private parseFile(state: ResolveState, filePath: string): { source: string; program: Program } {
    const source = this.host.readFile(filePath);
    if (source === undefined) {
      throw ResolveErrors.moduleNotFound(toModuleId(state.baseDir, filePath), [filePath]);
    }
    try {
      const tokens = lex(source);
      const result = parse(tokens, { recover: this.options.recover ?? true, file: filePath });
      for (const diagnostic of result.diagnostics) {
        state.diagnostics.push({ ...diagnostic, file: filePath });
      }
      return { source, program: result.program };
    } catch (error) {
      if (error instanceof DiagnosticError) {
        throw ResolveErrors.invalidSource(filePath, { ...error.diagnostic, file: filePath });
      }
      throw error;
    }
  }

  /**
   * 登记模块内的全部声明（含 scope 成员），返回顶层导出表。
   */
  private declare(
    state: ResolveState,
    moduleId: string,
    filePath: string,
    items: readonly Item[]
  ): Map<string, ProgramSymbol> {
    const exports = new Map<string, ProgramSymbol>();
    const visit = (list: readonly Item[], prefix: string[], members: Map<string, ProgramSymbol> | null): void => {
      for (const item of list) {
        const kind = declarationKind(item);
        if (kind === null || !isDeclaration(item)) continue;
        const qualifiedName = qualify(moduleId, ...prefix, item.name);
        const symbol: ProgramSymbol = {
          name: item.name,
          qualifiedName,
          kind,
          moduleId,
          file: filePath,
          node: item,
          span: item.nameSpan,
          type:
            kind === 'struct' || kind === 'enum' || kind === 'scope'
              ? TypeSystem.userDefined(item.name, qualifiedName)
              : TypeSystem.unknown(),
          members: new Map(),
        };
        // 同一限定名重复声明时保留第一个，由语义分析报告
        if (!state.symbols.define(symbol)) continue;
        if (members) {
          members.set(item.name, symbol);
        } else {
          state.symbols.bind(moduleId, item.name, symbol);
          if (isExportKind(kind)) exports.set(item.name, symbol);
        }
        if (item.kind === 'Scope') {
          visit(item.items, [...prefix, item.name], symbol.members);
        }
      }
    };
    visit(items, [], null);
    return exports;
  }

  /**
   * 把导入的名字绑定进各模块命名空间，并按导出策略检测冲突。
   */
  private merge(state: ResolveState): void {
    const { symbols } = state;
    if (this.options.exportPolicy === 'global') {
      const owners = new Map<string, ProgramSymbol>();
      for (const module of state.order) {
        for (const [name, symbol] of module.exports) {
          const previous = owners.get(name);
          if (previous) {
            throw ResolveErrors.duplicateExport(
              name,
              [previous.moduleId, symbol.moduleId],
              { file: symbol.file, span: symbol.span },
              { file: previous.file, span: previous.span }
            );
          }
          owners.set(name, symbol);
        }
      }
    }

    for (const module of state.order) {
      for (const request of module.imports) {
        const target = state.cache.get(request.resolvedPath);
        if (!target) continue;
        for (const imported of request.names) {
          const symbol = target.exports.get(imported.name);
          if (!symbol) continue;
          const conflict = symbols.bind(module.id, imported.name, symbol);
          if (conflict) {
            const modules = [...new Set([conflict.moduleId, symbol.moduleId])];
            throw ResolveErrors.duplicateExport(
              imported.name,
              modules,
              { file: module.path, span: imported.span },
              { file: conflict.file, span: conflict.span }
            );
          }
        }
      }
    }
  }

  /**
   * 合并完成后解析函数返回类型与变量声明类型；未知名字留作 Unknown，由语义分析报告。
   */
  private assignTypes(state: ResolveState): void {
    const { symbols } = state;
    const visit = (env: NameEnv, scopeSymbol: ProgramSymbol | null): void => {
      const members = scopeSymbol ? [...scopeSymbol.members.values()] : [...symbols.namespace(env.moduleId).values()];
      for (const symbol of members) {
        if (symbol.moduleId !== env.moduleId) continue;
        const node = symbol.node;
        if (node.kind === 'Function') {
          symbol.type = node.returnType ? resolveTypeNode(symbols, env, node.returnType) : TypeSystem.unknown();
        } else if (node.kind === 'VariableDecl') {
          symbol.type = resolveTypeNode(symbols, env, node.type);
        } else if (node.kind === 'Scope') {
          visit(enterScopeEnv(env, symbol), symbol);
        }
      }
    };
    for (const module of state.order) {
      visit(moduleEnv(module.id), null);
    }
  }
}
