#!/usr/bin/env node
/**
 * netconfig CLI 진입점
 *
 * 사용법:
 *   netconfig [--config=<path>] [--debug] <command> [args...]
 *   netconfig help [command]      : 도움말
 *   netconfig <command> help      : 명령 도움말
 *   netconfig --version           : 버전
 *
 * 실패 시 에러 메시지 한 줄을 stderr 에 쓰고 종료 코드 1.
 */

import { isDebug } from '@netconfig/core';
import { log } from './logger.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2)).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  log.error(msg);
  if (isDebug()) {
    console.error(err);
  }
  process.exitCode = 1;
});
