import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LogLevel, Logger } from '../../../src/utils/logger.js';

function capture(level: LogLevel): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger('test', level, line => lines.push(line)), lines };
}

describe('Logger', () => {
  it('输出单行 JSON，包含组件与元数据', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);
    logger.info('module loaded', { module: 'lib/penalties' });
    assert.equal(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null);
    assert.equal(Reflect.get(entry, 'level'), 'INFO');
    assert.equal(Reflect.get(entry, 'component'), 'test');
    assert.equal(Reflect.get(entry, 'message'), 'module loaded');
    assert.equal(Reflect.get(entry, 'module'), 'lib/penalties');
    assert.equal(typeof Reflect.get(entry, 'timestamp'), 'string');
  });

  it('低于最小级别的日志被丢弃', () => {
    const { logger, lines } = capture(LogLevel.WARN);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    assert.equal(lines.length, 1);
    assert.equal(logger.isEnabled(LogLevel.ERROR), true);
    assert.equal(logger.isEnabled(LogLevel.INFO), false);
  });

  it('error 附带异常消息', () => {
    const { logger, lines } = capture(LogLevel.INFO);
    logger.error('failed', new Error('boom'), { file: 'main.yh' });
    const entry: unknown = JSON.parse(lines[0] ?? '');
    assert.ok(typeof entry === 'object' && entry !== null);
    assert.equal(Reflect.get(entry, 'error'), 'boom');
    assert.equal(Reflect.get(entry, 'file'), 'main.yh');
  });

  it('SILENT 不输出任何内容', () => {
    const { logger, lines } = capture(LogLevel.SILENT);
    logger.error('x');
    assert.deepEqual(lines, []);
  });
});
