import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ModuleResolver } from '../../../src/resolver/module-resolver.js';
import type { ResolvedProgram, ResolverOptions } from '../../../src/resolver/module-resolver.js';
import { InMemorySourceHost } from '../../../src/resolver/source-host.js';
import { ResolveError } from '../../../src/resolver/errors.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { TypeSystem, Types } from '../../../src/semantic/types.js';

const ROOT = '/project';

function host(files: Record<string, string>): InMemorySourceHost {
  const absolute: Record<string, string> = {};
  for (const [file, text] of Object.entries(files)) absolute[`${ROOT}/${file}`] = text;
  return new InMemorySourceHost(absolute);
}

function resolve(files: Record<string, string>, options: ResolverOptions = {}, entry = 'main.yh'): ResolvedProgram {
  return new ModuleResolver(host(files), options).resolve(`${ROOT}/${entry}`);
}

function resolveError(files: Record<string, string>, options: ResolverOptions = {}, entry = 'main.yh'): ResolveError {
  try {
    resolve(files, options, entry);
  } catch (error) {
    if (error instanceof ResolveError) return error;
    throw error;
  }
  assert.fail('expected a ResolveError');
}

describe('ModuleResolver：加载', () => {
  it('依赖优先，入口模块最后', () => {
    const program = resolve({
      'main.yh': 'referencing Fine from lib/penalties;\nFine f;',
      'lib/penalties.yh': 'struct Fine { money amount }',
    });
    assert.deepEqual(
      program.modules.map(m => m.id),
      ['lib/penalties', 'main']
    );
    assert.equal(program.entry.id, 'main');
    assert.equal(program.entry.path, '/project/main.yh');
    assert.deepEqual(
      program.entry.imports.map(i => [i.module, i.resolvedPath]),
      [['lib/penalties', '/project/lib/penalties.yh']]
    );
    assert.equal(program.symbols.lookup('main', 'Fine')?.qualifiedName, 'lib/penalties::Fine');
  });

  it('导入方目录之后依次查找 lib/ 与 stdlib/', () => {
    const program = resolve({
      'main.yh': 'referencing Fine from penalties;\nreferencing Day from calendar;',
      'lib/penalties.yh': 'struct Fine {}',
      'stdlib/calendar.yh': 'enum Day { Mon, Tue }',
    });
    assert.deepEqual(
      program.modules.map(m => m.id),
      ['lib/penalties', 'stdlib/calendar', 'main']
    );
  });

  it('配置的搜索路径替代默认路径', () => {
    const program = resolve(
      {
        'main.yh': 'referencing Fine from penalties;',
        'vendor/penalties.yh': 'struct Fine {}',
      },
      { searchPaths: ['vendor'] }
    );
    assert.equal(program.modules[0]?.path, '/project/vendor/penalties.yh');
  });

  it('共享依赖只加载一次', () => {
    const program = resolve({
      'main.yh': 'referencing B from b;\nreferencing C from c;',
      'b.yh': 'referencing D from d;\nstruct B {}',
      'c.yh': 'referencing D from d;\nstruct C {}',
      'd.yh': 'struct D {}',
    });
    assert.deepEqual(
      program.modules.map(m => m.id),
      ['d', 'b', 'c', 'main']
    );
  });

  it('scope 成员通过点号路径可见，变量不导出', () => {
    const program = resolve({
      'main.yh': 'referencing Theft from lib;',
      'lib.yh': 'scope Theft { struct Item {} }\nint limit := 1;',
    });
    assert.equal(program.symbols.lookupPath('main', ['Theft', 'Item'])?.qualifiedName, 'lib::Theft::Item');
    const lib = program.modules[0];
    assert.deepEqual([...(lib?.exports.keys() ?? [])], ['Theft']);
  });

  it('合并后为函数与变量填入声明类型', () => {
    const program = resolve({ 'main.yh': 'struct P {}\nP func f() { := P {}; }\nint || pass v := 1;' });
    const f = program.symbols.lookup('main', 'f');
    const v = program.symbols.lookup('main', 'v');
    assert.ok(f && v);
    assert.ok(TypeSystem.equals(f.type, TypeSystem.userDefined('P', 'main::P')));
    assert.equal(TypeSystem.format(v.type), 'int || pass');
    assert.ok(TypeSystem.equals(v.type, TypeSystem.union([Types.Int, Types.Pass])));
  });

  it('可恢复的语法错误记录在 diagnostics 中并带有文件路径', () => {
    const program = resolve({ 'main.yh': 'int x := ;\nint y := 1;' });
    assert.deepEqual(
      program.diagnostics.map(d => [d.code, d.file]),
      [[DiagnosticCode.P003_ExpectedExpression, '/project/main.yh']]
    );
  });

  it('同一个解析器实例可重复使用', () => {
    const resolver = new ModuleResolver(host({ 'main.yh': 'struct A {}' }));
    const first = resolver.resolve('/project/main.yh');
    const second = resolver.resolve('/project/main.yh');
    assert.notEqual(first.symbols, second.symbols);
    assert.equal(second.symbols.size, 1);
  });
});

describe('ModuleResolver：错误', () => {
  it('找不到模块时列出全部候选路径', () => {
    const error = resolveError({ 'main.yh': 'referencing X from missing;' });
    assert.equal(error.kind, 'ModuleNotFound');
    assert.deepEqual(error.detail, {
      kind: 'ModuleNotFound',
      module: 'missing',
      searchedPaths: ['/project/missing.yh', '/project/lib/missing.yh', '/project/stdlib/missing.yh'],
    });
    assert.equal(error.diagnostic.code, DiagnosticCode.R001_ModuleNotFound);
    assert.equal(error.diagnostic.file, '/project/main.yh');
    assert.deepEqual(error.diagnostic.span.start, { line: 1, col: 1 });
  });

  it('入口文件不存在', () => {
    const error = resolveError({}, {}, 'nope.yh');
    assert.deepEqual(error.detail, {
      kind: 'ModuleNotFound',
      module: 'nope',
      searchedPaths: ['/project/nope.yh'],
    });
  });

  it('检测循环导入并报告环路', () => {
    const error = resolveError(
      {
        'a.yh': 'referencing B from b;\nstruct A {}',
        'b.yh': 'referencing A from a;\nstruct B {}',
      },
      {},
      'a.yh'
    );
    assert.deepEqual(error.detail, { kind: 'CircularImport', cycle: ['a.yh', 'b.yh'] });
    assert.equal(error.diagnostic.message, 'Circular import: a.yh -> b.yh -> a.yh');
    assert.equal(error.diagnostic.file, '/project/b.yh');
  });

  it('模块导入自身也是循环导入', () => {
    const error = resolveError({ 'main.yh': 'referencing A from main;\nstruct A {}' });
    assert.deepEqual(error.detail, { kind: 'CircularImport', cycle: ['main.yh'] });
  });

  it('导入不存在的名字时列出可用导出', () => {
    const error = resolveError({
      'main.yh': 'referencing Nope from lib;',
      'lib.yh': 'struct B {}\nenum A { X }',
    });
    assert.equal(error.kind, 'MissingSymbol');
    assert.equal(error.diagnostic.message, "Module 'lib' does not export 'Nope' (available: A, B)");
    assert.deepEqual(error.diagnostic.span, {
      start: { line: 1, col: 13 },
      end: { line: 1, col: 17 },
    });
  });

  it('没有导出的模块', () => {
    const error = resolveError({
      'main.yh': 'referencing limit from lib;',
      'lib.yh': 'int limit := 1;',
    });
    assert.equal(error.diagnostic.message, "Module 'lib' does not export 'limit' (it has no exports)");
  });

  it('同一命名空间中一个名字绑定两个符号', () => {
    const error = resolveError({
      'main.yh': 'referencing Fine from a;\nreferencing Fine from b;',
      'a.yh': 'struct Fine {}',
      'b.yh': 'struct Fine {}',
    });
    assert.deepEqual(error.detail, { kind: 'DuplicateExport', symbol: 'Fine', modules: ['a', 'b'] });
    assert.equal(error.diagnostic.message, "Name 'Fine' is exported by more than one module: a, b");
    assert.deepEqual(
      error.diagnostic.relatedInformation?.map(r => [r.message, r.file]),
      [["'Fine' first bound here", '/project/a.yh']]
    );
  });

  it('导入的名字与本地声明冲突', () => {
    const error = resolveError({
      'main.yh': 'referencing Fine from a;\nstruct Fine {}',
      'a.yh': 'struct Fine {}',
    });
    assert.deepEqual(error.detail, { kind: 'DuplicateExport', symbol: 'Fine', modules: ['main', 'a'] });
  });

  it('global 策略下任意两个模块导出同名符号即冲突', () => {
    const files = {
      'main.yh': 'referencing Fine from a;\nreferencing Other from b;',
      'a.yh': 'struct Fine {}',
      'b.yh': 'struct Fine {}\nstruct Other {}',
    };
    assert.equal(resolve(files).modules.length, 3);
    const error = resolveError(files, { exportPolicy: 'global' });
    assert.deepEqual(error.detail, { kind: 'DuplicateExport', symbol: 'Fine', modules: ['a', 'b'] });
    assert.equal(error.diagnostic.file, '/project/b.yh');
  });

  it('依赖文件存在词法错误时报告 InvalidSource', () => {
    const error = resolveError({
      'main.yh': 'referencing A from lib;',
      'lib.yh': 'struct A { @ }',
    });
    assert.equal(error.kind, 'InvalidSource');
    assert.equal(error.diagnostic.code, DiagnosticCode.R005_InvalidSource);
    assert.equal(error.diagnostic.message, "Cannot load '/project/lib.yh': Unexpected character '@'");
    assert.deepEqual(error.diagnostic.span.start, { line: 1, col: 12 });
  });

  it('关闭错误恢复时第一个语法错误即致命', () => {
    const error = resolveError({ 'main.yh': 'int x := ;' }, { recover: false });
    assert.equal(error.kind, 'InvalidSource');
    assert.equal(error.diagnostic.message, "Cannot load '/project/main.yh': Expected expression, found ';'");
  });
});
