/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 * 结构化日志走 src/utils/logger.ts（stderr JSON），这里只负责给人看的输出。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
}

function useColor(): boolean {
  return process.env.NO_COLOR === undefined && Boolean(process.stderr.isTTY);
}

function colorize(symbol: string, message: string, color: AnsiColor, enabled = useColor()): string {
  return enabled ? `${color}${symbol}${AnsiColor.Reset} ${message}` : `${symbol} ${message}`;
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
