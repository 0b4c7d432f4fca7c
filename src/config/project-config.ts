/**
 * 项目配置文件 `yh.config.json` 的读取与校验。
 *
 * 文件位于入口文件旁（或由调用方显式指定），用 JSON Schema 校验。
 * 读取失败或 JSON 无效报告 C001，违反 schema 报告 C002。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv } from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { DiagnosticBuilder, DiagnosticCode, dummyPosition } from '../diagnostics/diagnostics.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { ExportPolicy } from '../resolver/module-resolver.js';

export const PROJECT_CONFIG_FILE = 'yh.config.json';

export interface ProjectConfig {
  readonly searchPaths?: readonly string[];
  readonly exportPolicy?: ExportPolicy;
  readonly recover?: boolean;
}

export type ProjectConfigResult =
  | { readonly ok: true; readonly config: ProjectConfig; readonly path: string | null }
  | { readonly ok: false; readonly diagnostics: readonly Diagnostic[] };

// schema 不会被编译进 dist：从源码目录或 dist/src/config 向上查找
const moduleDir = dirname(fileURLToPath(import.meta.url));
const schemaPath =
  [join(moduleDir, '..', '..', 'schemas'), join(moduleDir, '..', '..', '..', 'schemas')]
    .map(dir => join(dir, 'yh-config.schema.json'))
    .find(candidate => existsSync(candidate)) ?? join(moduleDir, '..', '..', 'schemas', 'yh-config.schema.json');

const ajv = new Ajv({ strict: true, allErrors: true });
const validateSchema: ValidateFunction<ProjectConfig> = ajv.compile<ProjectConfig>(
  JSON.parse(readFileSync(schemaPath, 'utf-8'))
);

function configError(code: DiagnosticCode, message: string, file: string): Diagnostic {
  return DiagnosticBuilder.error(code).withMessage(message).withPosition(dummyPosition()).withFile(file).build();
}

function describeAjvError(error: ErrorObject): string {
  const field = error.instancePath || '/';
  switch (error.keyword) {
    case 'additionalProperties':
      return `Unknown configuration field '${String(error.params.additionalProperty)}'`;
    case 'enum':
      return `Invalid value at ${field}: expected one of ${JSON.stringify(error.params.allowedValues)}`;
    default:
      return `Invalid value at ${field}: ${error.message ?? 'schema violation'}`;
  }
}

/**
 * 校验已解析的 JSON 值。
 */
export function validateProjectConfig(value: unknown, file: string): ProjectConfigResult {
  if (validateSchema(value)) {
    return { ok: true, config: value, path: file };
  }
  const diagnostics = (validateSchema.errors ?? []).map(error =>
    configError(DiagnosticCode.C002_ConfigSchemaViolation, describeAjvError(error), file)
  );
  return { ok: false, diagnostics };
}

/**
 * 读取并校验配置文件。文件不存在时返回空配置（path 为 null）。
 */
export function loadProjectConfig(filePath: string): ProjectConfigResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ok: true, config: {}, path: null };
    }
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      diagnostics: [configError(DiagnosticCode.C001_ConfigParseError, `Cannot read configuration: ${message}`, filePath)],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      diagnostics: [configError(DiagnosticCode.C001_ConfigParseError, `Invalid JSON: ${message}`, filePath)],
    };
  }
  return validateProjectConfig(parsed, filePath);
}

/** 入口文件旁的默认配置文件路径 */
export function defaultConfigPath(entryPath: string): string {
  return join(dirname(entryPath), PROJECT_CONFIG_FILE);
}
