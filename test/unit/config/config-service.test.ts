import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { delimiter } from 'node:path';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = ['LOG_LEVEL', 'YH_SEARCH_PATHS', 'YH_DEBUG_PARSER'];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function clearEnv(): void {
  for (const key of ENV_KEYS) delete process.env[key];
}

describe('ConfigService', () => {
  beforeEach(() => {
    clearEnv();
    ConfigService.resetForTesting();
  });

  afterEach(() => {
    restoreEnv();
    ConfigService.resetForTesting();
  });

  it('未设置环境变量时使用默认值', () => {
    const config = ConfigService.getInstance();
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.deepEqual(config.searchPaths, []);
    assert.equal(config.debugParser, false);
  });

  it('LOG_LEVEL 不区分大小写，无法识别时回退到 INFO', () => {
    process.env.LOG_LEVEL = 'debug';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.DEBUG);

    ConfigService.resetForTesting();
    process.env.LOG_LEVEL = 'Silent';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.SILENT);

    ConfigService.resetForTesting();
    process.env.LOG_LEVEL = 'verbose';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.INFO);
  });

  it('YH_SEARCH_PATHS 按平台分隔符拆分并忽略空项', () => {
    process.env.YH_SEARCH_PATHS = ['vendor', ' shared/rules ', '', 'lib'].join(delimiter);
    assert.deepEqual(ConfigService.getInstance().searchPaths, ['vendor', 'shared/rules', 'lib']);
  });

  it('YH_DEBUG_PARSER 只有为 1 时启用', () => {
    process.env.YH_DEBUG_PARSER = 'true';
    assert.equal(ConfigService.getInstance().debugParser, false);

    ConfigService.resetForTesting();
    process.env.YH_DEBUG_PARSER = '1';
    assert.equal(ConfigService.getInstance().debugParser, true);
  });

  it('单例在重置前不重新读取环境变量', () => {
    const first = ConfigService.getInstance();
    process.env.LOG_LEVEL = 'ERROR';
    assert.equal(ConfigService.getInstance(), first);
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.INFO);

    ConfigService.resetForTesting();
    assert.notEqual(ConfigService.getInstance(), first);
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.ERROR);
  });
});
