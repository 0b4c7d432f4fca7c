#!/usr/bin/env node
import { cac } from 'cac';
import { checkCommand } from '../src/cli/commands/check.js';
import type { CommandResult } from '../src/cli/commands/command-result.js';
import { fmtCommand } from '../src/cli/commands/fmt.js';
import { lexCommand } from '../src/cli/commands/lex.js';
import { parseCommand } from '../src/cli/commands/parse.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function emit(result: CommandResult): void {
  for (const message of result.messages) console.error(message);
  if (result.output.length > 0) process.stdout.write(`${result.output}\n`);
  process.exitCode = result.exitCode;
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => CommandResult) {
  return (...args: Args): void => {
    try {
      emit(fn(...args));
    } catch (error) {
      handleError(error);
    }
  };
}

function stringList(value: unknown): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value.map(String) : [String(value)];
}

function main(): void {
  const cli = cac('yh');

  cli
    .command('lex <file>', '输出 token 列表（JSON）')
    .option('--comments', '同时输出注释 token', { default: false })
    .action(
      wrapAction((file: string, options: Record<string, unknown>) =>
        lexCommand(file, { comments: Boolean(options.comments) })
      )
    );

  cli
    .command('parse <file>', '解析 .yh 文件为 AST（JSON）')
    .option('--spans', '包含位置信息', { default: false })
    .action(
      wrapAction((file: string, options: Record<string, unknown>) =>
        parseCommand(file, { spans: Boolean(options.spans) })
      )
    );

  cli
    .command('check <file>', '解析全部引用的模块并进行语义检查')
    .option('--search-path <dir>', '额外的模块搜索目录（可重复）')
    .option('--config <file>', '项目配置文件（默认为入口文件旁的 yh.config.json）')
    .option('--json', '以 JSON 格式输出诊断', { default: false })
    .action(
      wrapAction((file: string, options: Record<string, unknown>) =>
        checkCommand(file, {
          searchPath: stringList(options.searchPath),
          json: Boolean(options.json),
          ...(typeof options.config === 'string' ? { config: options.config } : {}),
        })
      )
    );

  cli
    .command('fmt <file>', '按规范格式输出源码')
    .action(wrapAction((file: string) => fmtCommand(file)));

  cli.help();
  cli.parse();
}

try {
  main();
} catch (error) {
  handleError(error);
}
