import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createDiagnosticsError, describeError, handleError } from '../../../src/cli/utils/error-handler.js';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import type { Diagnostic } from '../../../src/diagnostics/diagnostics.js';

function diag(code: DiagnosticCode, message: string, file = 'main.yh'): Diagnostic {
  return DiagnosticBuilder.error(code).withMessage(message).withPosition({ line: 2, col: 4 }).withFile(file).build();
}

const MODULE_HINT = '请检查 referencing 语句中的模块路径，或通过 --search-path 添加搜索目录';

describe('describeError', () => {
  it('DiagnosticError 输出格式化的诊断', () => {
    const error = new DiagnosticError(diag(DiagnosticCode.P001_ExpectedToken, "Expected ';', found '}'"));
    assert.deepEqual(describeError(error), [
      { level: 'error', text: "error P001: Expected ';', found '}' at main.yh:2:4" },
    ]);
  });

  it('模块错误附带一次提示', () => {
    const error = createDiagnosticsError([
      diag(DiagnosticCode.R001_ModuleNotFound, "Module 'a' not found"),
      diag(DiagnosticCode.R001_ModuleNotFound, "Module 'b' not found"),
    ]);
    assert.equal(error.message, 'CLI_DIAGNOSTIC_ERROR');
    assert.deepEqual(describeError(error), [
      { level: 'error', text: "error R001: Module 'a' not found at main.yh:2:4" },
      { level: 'hint', text: MODULE_HINT },
      { level: 'error', text: "error R001: Module 'b' not found at main.yh:2:4" },
    ]);
  });

  it('配置错误提示 schema 位置', () => {
    const lines = describeError([diag(DiagnosticCode.C002_ConfigSchemaViolation, 'bad', 'yh.config.json')]);
    assert.equal(lines[1]?.level, 'hint');
    assert.ok(lines[1]?.text.includes('schemas/yh-config.schema.json'));
  });

  it('文件系统错误按错误码分类', () => {
    const error: NodeJS.ErrnoException = new Error("ENOENT: no such file or directory, open 'x.yh'");
    error.code = 'ENOENT';
    assert.deepEqual(describeError(error), [
      { level: 'error', text: "未找到目标文件：ENOENT: no such file or directory, open 'x.yh'" },
    ]);

    const other: NodeJS.ErrnoException = new Error('busy');
    other.code = 'EBUSY';
    assert.deepEqual(describeError(other), [{ level: 'error', text: '文件系统错误(EBUSY)：busy' }]);
  });

  it('普通异常与非异常值', () => {
    assert.deepEqual(describeError(new Error('boom')), [{ level: 'error', text: 'boom' }]);
    assert.deepEqual(describeError(42), [{ level: 'error', text: '发生未知错误，请重试' }]);
  });
});

describe('handleError', () => {
  const originalExitCode = process.exitCode;

  afterEach(() => {
    mock.restoreAll();
    process.exitCode = originalExitCode;
  });

  it('错误写到 stderr，提示走警告输出，并设置退出码', () => {
    const errors = mock.method(console, 'error', () => {});
    const warnings = mock.method(console, 'warn', () => {});
    handleError(createDiagnosticsError([diag(DiagnosticCode.R003_MissingSymbol, "Module 'lib' does not export 'X'")]));
    assert.equal(errors.mock.callCount(), 1);
    assert.equal(warnings.mock.callCount(), 1);
    assert.equal(process.exitCode, 1);
  });
});
