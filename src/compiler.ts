/**
 * 编译器入口：解析模块并进行语义分析。
 *
 * 搜索路径的优先级：调用方显式传入 > 项目配置文件 > 默认（入口目录、lib、stdlib），
 * 环境变量 YH_SEARCH_PATHS 中的路径追加在最后。
 */

import path from 'node:path';
import { ConfigService } from './config/config-service.js';
import { defaultConfigPath, loadProjectConfig } from './config/project-config.js';
import type { ProjectConfig } from './config/project-config.js';
import type { Diagnostic } from './diagnostics/diagnostics.js';
import { ModuleResolver } from './resolver/module-resolver.js';
import type { ExportPolicy, ResolvedProgram } from './resolver/module-resolver.js';
import { InMemorySourceHost, createNodeSourceHost } from './resolver/source-host.js';
import type { SourceHost } from './resolver/source-host.js';
import { analyze } from './semantic/analyzer.js';

const DEFAULT_SEARCH_PATHS: readonly string[] = ['.', 'lib', 'stdlib'];

export interface CheckOptions {
  readonly searchPaths?: readonly string[];
  readonly exportPolicy?: ExportPolicy;
  readonly recover?: boolean;
  /** 显式的配置文件路径；未提供时读取入口文件旁的 yh.config.json */
  readonly configPath?: string;
  /** 直接给出配置，不再读取配置文件 */
  readonly config?: ProjectConfig;
  readonly host?: SourceHost;
}

/**
 * 配置文件无效时抛出，携带 C001/C002 诊断。
 */
export class ConfigError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    super(diagnostics[0]?.message ?? 'Invalid project configuration');
    this.name = 'ConfigError';
    this.diagnostics = [...diagnostics];
  }
}

function projectConfigFor(entryPath: string, options: CheckOptions): ProjectConfig {
  if (options.config) return options.config;
  const result = loadProjectConfig(options.configPath ?? defaultConfigPath(entryPath));
  if (!result.ok) throw new ConfigError(result.diagnostics);
  return result.config;
}

function freezeProgram(program: ResolvedProgram, diagnostics: readonly Diagnostic[]): ResolvedProgram {
  return Object.freeze({
    entry: program.entry,
    modules: Object.freeze([...program.modules]),
    symbols: program.symbols,
    diagnostics: Object.freeze([...diagnostics]),
  });
}

/**
 * 只解析入口文件及其依赖，不做语义分析。
 *
 * @throws {ResolveError} 无法完成模块解析（含词法错误与致命语法错误）
 * @throws {ConfigError} 配置文件无效
 */
export function resolve(entryPath: string, options: CheckOptions = {}): ResolvedProgram {
  const entry = path.resolve(entryPath);
  const config = projectConfigFor(entry, options);
  const searchPaths = [
    ...(options.searchPaths ?? config.searchPaths ?? DEFAULT_SEARCH_PATHS),
    ...ConfigService.getInstance().searchPaths,
  ];
  const exportPolicy = options.exportPolicy ?? config.exportPolicy;
  const recover = options.recover ?? config.recover;

  const resolver = new ModuleResolver(options.host ?? createNodeSourceHost(), {
    searchPaths,
    ...(exportPolicy !== undefined ? { exportPolicy } : {}),
    ...(recover !== undefined ? { recover } : {}),
  });
  return resolver.resolve(entry);
}

/**
 * 解析入口文件及其依赖并分析。
 *
 * 返回的程序不可变，diagnostics 含各文件的可恢复语法错误与语义诊断。
 *
 * @throws {ResolveError} 无法完成模块解析（含词法错误与致命语法错误）
 * @throws {ConfigError} 配置文件无效
 */
export function check(entryPath: string, options: CheckOptions = {}): ResolvedProgram {
  const program = resolve(entryPath, options);
  return freezeProgram(program, analyze(program));
}

export interface CheckSourceOptions extends Omit<CheckOptions, 'host' | 'configPath'> {
  /** 同一内存文件系统中的其他文件（路径到源码） */
  readonly files?: Readonly<Record<string, string>>;
}

/**
 * 检查内存中的源码，不读取磁盘与配置文件。
 */
export function checkSource(source: string, file = 'main.yh', options: CheckSourceOptions = {}): ResolvedProgram {
  const host = new InMemorySourceHost({ ...options.files, [file]: source });
  return check(file, { ...options, config: options.config ?? {}, host });
}
