import fs from 'node:fs';
import path from 'node:path';

/**
 * 模块解析器使用的文件读取能力。
 * 解析器本身不直接访问文件系统，便于在测试与编辑器中注入内存实现。
 */
export interface SourceHost {
  /** 读取文件内容；文件不存在时返回 undefined */
  readFile(filePath: string): string | undefined;
  fileExists(filePath: string): boolean;
}

/**
 * 基于 node:fs 的实现
 */
export function createNodeSourceHost(): SourceHost {
  return {
    readFile(filePath: string): string | undefined {
      try {
        return fs.readFileSync(filePath, 'utf8');
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return undefined;
        }
        throw error;
      }
    },
    fileExists(filePath: string): boolean {
      return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
    },
  };
}

/**
 * 内存文件系统，路径在存取时统一规范化。
 */
export class InMemorySourceHost implements SourceHost {
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, text] of Object.entries(files)) {
      this.set(filePath, text);
    }
  }

  set(filePath: string, text: string): this {
    this.files.set(path.resolve(filePath), text);
    return this;
  }

  readFile(filePath: string): string | undefined {
    return this.files.get(path.resolve(filePath));
  }

  fileExists(filePath: string): boolean {
    return this.files.has(path.resolve(filePath));
  }
}
