import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  PROJECT_CONFIG_FILE,
  defaultConfigPath,
  loadProjectConfig,
  validateProjectConfig,
} from '../../../src/config/project-config.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';

let tmpDir: string;

function writeConfig(name: string, content: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

describe('项目配置文件', () => {
  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'yh-project-config-'));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('默认路径位于入口文件旁', () => {
    assert.equal(PROJECT_CONFIG_FILE, 'yh.config.json');
    assert.equal(defaultConfigPath('/rules/penal/main.yh'), path.join('/rules/penal', 'yh.config.json'));
  });

  it('文件不存在时返回空配置', () => {
    const result = loadProjectConfig(path.join(tmpDir, 'missing.json'));
    assert.deepEqual(result, { ok: true, config: {}, path: null });
  });

  it('读取有效配置', () => {
    const file = writeConfig(
      'valid.json',
      JSON.stringify({ searchPaths: ['vendor'], exportPolicy: 'global', recover: false })
    );
    const result = loadProjectConfig(file);
    assert.deepEqual(result, {
      ok: true,
      config: { searchPaths: ['vendor'], exportPolicy: 'global', recover: false },
      path: file,
    });
  });

  it('无效 JSON 报告 C001', () => {
    const file = writeConfig('broken.json', '{ "searchPaths": [');
    const result = loadProjectConfig(file);
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0]?.code, DiagnosticCode.C001_ConfigParseError);
    assert.equal(result.diagnostics[0]?.file, file);
    assert.ok(result.diagnostics[0]?.message.startsWith('Invalid JSON: '));
  });

  it('未知字段报告 C002', () => {
    const result = validateProjectConfig({ searchPath: ['lib'] }, 'yh.config.json');
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(
      result.diagnostics.map(d => [d.code, d.message]),
      [[DiagnosticCode.C002_ConfigSchemaViolation, "Unknown configuration field 'searchPath'"]]
    );
  });

  it('枚举取值错误时列出允许值', () => {
    const result = validateProjectConfig({ exportPolicy: 'flat' }, 'yh.config.json');
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(
      result.diagnostics.map(d => d.message),
      ['Invalid value at /exportPolicy: expected one of ["namespace","global"]']
    );
  });

  it('收集全部违反项', () => {
    const result = validateProjectConfig({ recover: 'yes', searchPaths: [''] }, 'yh.config.json');
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(
      result.diagnostics.map(d => d.code),
      [DiagnosticCode.C002_ConfigSchemaViolation, DiagnosticCode.C002_ConfigSchemaViolation]
    );
  });

  it('顶层不是对象', () => {
    const result = validateProjectConfig([], 'yh.config.json');
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(
      result.diagnostics.map(d => d.message),
      ['Invalid value at /: must be object']
    );
  });
});
