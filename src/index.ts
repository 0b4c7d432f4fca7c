/**
 * @module statute-dsl
 *
 * 法规规则 DSL（`.yh` 文件）编译器前端的主要 API 接口。
 *
 * **编译管道**：
 * ```
 * 源代码 → lex → parse → AST → ModuleResolver → ResolvedProgram → analyze → Diagnostic[]
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { checkSource, formatDiagnostic } from 'statute-dsl';
 *
 * const program = checkSource(`
 *   enum Severity { Minor, Major }
 *   money func fine(Severity s) {
 *     return match s { case Minor := $100; case Major := $5,000; };
 *   }
 * `);
 * for (const d of program.diagnostics) console.log(formatDiagnostic(d));
 * ```
 */

// 编译器管道函数
export { lex, tokenize, TokenStream } from './frontend/lexer.js';
export type { LexOptions } from './frontend/lexer.js';
export { TokenKind, KW, tokenCategory, describeToken } from './frontend/tokens.js';
export type { TokenCategory } from './frontend/tokens.js';
export { parse } from './parser.js';
export type { ParseOptions, ParseResult } from './parser.js';

// AST
export { Node } from './ast/ast.js';
export { DefaultAstVisitor, childrenOf, foldAst, walk } from './ast/ast_visitor.js';
export type { AstVisitor } from './ast/ast_visitor.js';
export { printProgram, printExpression, stripSpans } from './ast/printer.js';

// 模块解析
export { ModuleResolver, SOURCE_EXTENSION } from './resolver/module-resolver.js';
export type {
  ExportPolicy,
  ImportRequest,
  Module,
  ResolvedProgram,
  ResolverOptions,
} from './resolver/module-resolver.js';
export { InMemorySourceHost, createNodeSourceHost } from './resolver/source-host.js';
export type { SourceHost } from './resolver/source-host.js';
export { SymbolTable, qualify } from './resolver/symbol-table.js';
export type { ProgramSymbol, ProgramSymbolKind } from './resolver/symbol-table.js';
export { ResolveError } from './resolver/errors.js';
export type { ResolveErrorDetail, ResolveErrorKind } from './resolver/errors.js';

// 语义分析
export { analyze } from './semantic/analyzer.js';
export { TypeSystem, Types } from './semantic/types.js';
export type { Type } from './semantic/types.js';
export { check, checkSource, resolve, ConfigError } from './compiler.js';
export type { CheckOptions, CheckSourceOptions } from './compiler.js';

// 配置
export { ConfigService } from './config/config-service.js';
export { loadProjectConfig, validateProjectConfig, PROJECT_CONFIG_FILE } from './config/project-config.js';
export type { ProjectConfig, ProjectConfigResult } from './config/project-config.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  LexError,
  ParseError,
  formatDiagnostic,
  isError,
} from './diagnostics/diagnostics.js';
export type { Diagnostic, RelatedInformation } from './diagnostics/diagnostics.js';

// 类型定义重导出
export type * from './types.js';
