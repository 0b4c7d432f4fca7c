import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  dummyPosition,
} from '../diagnostics/diagnostics.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { Span } from '../types.js';

export type ResolveErrorDetail =
  | {
      readonly kind: 'ModuleNotFound';
      readonly module: string;
      /** 按搜索顺序列出的候选文件 */
      readonly searchedPaths: readonly string[];
    }
  | {
      readonly kind: 'CircularImport';
      /** 从被重复访问的模块开始到当前模块的文件路径 */
      readonly cycle: readonly string[];
    }
  | {
      readonly kind: 'MissingSymbol';
      readonly symbol: string;
      readonly module: string;
      readonly available: readonly string[];
    }
  | {
      readonly kind: 'DuplicateExport';
      readonly symbol: string;
      readonly modules: readonly string[];
    }
  | {
      readonly kind: 'InvalidSource';
      readonly file: string;
      readonly diagnostic: Diagnostic;
    };

export type ResolveErrorKind = ResolveErrorDetail['kind'];

/**
 * 模块解析失败。解析是原子的：抛出此错误时不返回任何部分结果。
 */
export class ResolveError extends DiagnosticError {
  readonly detail: ResolveErrorDetail;

  constructor(detail: ResolveErrorDetail, diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = 'ResolveError';
    this.detail = detail;
  }

  get kind(): ResolveErrorKind {
    return this.detail.kind;
  }
}

/** 导入语句所在位置 */
export interface ImportSite {
  readonly file: string;
  readonly span: Span;
}

function siteSpan(site: ImportSite | undefined): Span {
  return site?.span ?? { start: dummyPosition(), end: dummyPosition() };
}

export const ResolveErrors = {
  moduleNotFound: (module: string, searchedPaths: readonly string[], site?: ImportSite): ResolveError =>
    new ResolveError(
      { kind: 'ModuleNotFound', module, searchedPaths },
      DiagnosticBuilder.error(DiagnosticCode.R001_ModuleNotFound)
        .withMessage(`Module '${module}' not found (searched: ${searchedPaths.join(', ')})`)
        .withSpan(siteSpan(site))
        .withFile(site?.file)
        .build()
    ),

  circularImport: (cycle: readonly string[], site?: ImportSite): ResolveError =>
    new ResolveError(
      { kind: 'CircularImport', cycle },
      DiagnosticBuilder.error(DiagnosticCode.R002_CircularImport)
        .withMessage(`Circular import: ${[...cycle, cycle[0] ?? ''].join(' -> ')}`)
        .withSpan(siteSpan(site))
        .withFile(site?.file)
        .build()
    ),

  missingSymbol: (
    symbol: string,
    module: string,
    available: readonly string[],
    site?: ImportSite
  ): ResolveError =>
    new ResolveError(
      { kind: 'MissingSymbol', symbol, module, available },
      DiagnosticBuilder.error(DiagnosticCode.R003_MissingSymbol)
        .withMessage(
          available.length > 0
            ? `Module '${module}' does not export '${symbol}' (available: ${available.join(', ')})`
            : `Module '${module}' does not export '${symbol}' (it has no exports)`
        )
        .withSpan(siteSpan(site))
        .withFile(site?.file)
        .build()
    ),

  duplicateExport: (
    symbol: string,
    modules: readonly string[],
    site?: ImportSite,
    previous?: ImportSite
  ): ResolveError => {
    const builder = DiagnosticBuilder.error(DiagnosticCode.R004_DuplicateExport)
      .withMessage(`Name '${symbol}' is exported by more than one module: ${modules.join(', ')}`)
      .withSpan(siteSpan(site))
      .withFile(site?.file);
    if (previous) builder.withRelated(previous.span, `'${symbol}' first bound here`, previous.file);
    return new ResolveError({ kind: 'DuplicateExport', symbol, modules }, builder.build());
  },

  invalidSource: (file: string, diagnostic: Diagnostic): ResolveError =>
    new ResolveError(
      { kind: 'InvalidSource', file, diagnostic },
      DiagnosticBuilder.error(DiagnosticCode.R005_InvalidSource)
        .withMessage(`Cannot load '${file}': ${diagnostic.message}`)
        .withSpan(diagnostic.span)
        .withFile(file)
        .build()
    ),
};
