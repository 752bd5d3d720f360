/**
 * 콘솔 로거 + ANSI 색상 보조
 * 사용자 출력은 cli/src/logger.ts, 여기서는 진단용 debug 로그만
 */

// ANSI 색상 코드
const C = {
  reset:  '\x1b[0m',
  green:  '\x1b[32m',
  red:    '\x1b[31m',
  gray:   '\x1b[90m',
  bold:   '\x1b[1m',
} as const;

export function isDebug(): boolean {
  return process.env['NETCONFIG_DEBUG'] === 'true' || process.env['DEBUG'] === 'true';
}

/** TTY 가 아니거나 NO_COLOR 가 설정되면 색상 없이 출력 */
export function useColor(stream: NodeJS.WriteStream): boolean {
  return process.env['NO_COLOR'] === undefined && stream.isTTY === true;
}

export function paint(stream: NodeJS.WriteStream, color: string, msg: string): string {
  return useColor(stream) ? `${color}${msg}${C.reset}` : msg;
}

function format(stream: NodeJS.WriteStream, prefix: string, color: string, msg: string): string {
  return `${paint(stream, color, prefix)} ${msg}`;
}

export const logger = {
  /** NETCONFIG_DEBUG=true (또는 --debug) 일 때만 stderr 에 출력 */
  debug(msg: string): void {
    if (isDebug()) {
      console.error(format(process.stderr, '[debug]', C.gray, msg));
    }
  },
};

export { C as ansi };
