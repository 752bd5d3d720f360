/**
 * cli/src/args.ts
 * 명령 앞에 오는 전역 옵션 분리
 *
 * 지원 형식:
 *   netconfig [--config=<path>|--config <path>] [--debug] <command> [args...]
 *
 * 명령 이후의 토큰은 그대로 남겨 Arguments 가 위치 기반으로 해석한다.
 */

import { invalidArgument } from '@netconfig/core';

export interface GlobalOptions {
  config?: string;
  debug: boolean;
}

export interface SplitArgs {
  options: GlobalOptions;
  /** 명령과 그 인수 */
  rest: string[];
}

const KNOWN_OPTIONS = new Set(['config', 'debug']);

/**
 * process.argv[2..] 에서 전역 옵션 분리
 * 알 수 없는 `--xxx` 를 만나면 거기서 멈춘다 (--help, --version 은 명령으로 취급)
 * --config 값이 없거나 '-' 로 시작하면 실패
 */
export function splitGlobalOptions(argv: string[] = process.argv.slice(2)): SplitArgs {
  const options: GlobalOptions = { debug: false };
  let i = 0;

  for (; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) break;

    const withoutDash = arg.slice(2);
    const eqIdx = withoutDash.indexOf('=');
    const key = eqIdx === -1 ? withoutDash : withoutDash.slice(0, eqIdx);
    if (!KNOWN_OPTIONS.has(key)) break;

    if (key === 'debug') {
      options.debug = true;
    } else {
      // --config=value | --config value
      const value = eqIdx !== -1 ? withoutDash.slice(eqIdx + 1) : argv[++i];
      if (!value || value.startsWith('-')) {
        throw invalidArgument('Missing value for --config, expected --config=PATH');
      }
      options.config = value;
    }
  }

  return { options, rest: argv.slice(i) };
}
