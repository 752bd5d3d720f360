/**
 * cli/src/logger.ts
 * CLI 전용 출력 유틸
 *
 * 에러는 stderr 에 접두어 없이 메시지 한 줄만 쓴다.
 */

import { ansi, paint } from '@netconfig/core';

export const log = {
  success: (msg: string) => console.log(paint(process.stdout, ansi.green, msg)),
  error: (msg: string) => console.error(paint(process.stderr, ansi.red, msg)),
  step: (msg: string) => console.log(`${paint(process.stdout, ansi.gray, '→')} ${msg}`),
  title: (msg: string) => console.log(paint(process.stdout, ansi.bold, msg)),
  plain: (msg: string) => console.log(msg),
};

/** 값 변경 요청 후 출력하는 메시지 */
export const COMPLETE_MESSAGE = 'Request has been sent';

export function printComplete(): void {
  log.success(COMPLETE_MESSAGE);
}
