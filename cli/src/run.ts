/**
 * cli/src/run.ts
 * argv → 명령 실행
 *
 * 진입점(index.ts)과 분리해 테스트에서 버스/인터페이스 목록을 주입한다.
 */

import {
  Arguments,
  BusctlBus,
  DEFAULT_CONFIG,
  NetworkService,
  loadConfig,
  logger,
  type InterfaceLister,
  type NetconfigConfig,
  type NetworkBus,
} from '@netconfig/core';
import { splitGlobalOptions } from './args.js';
import { execute, help, isHelpRequest, printCommandHelp } from './commands/index.js';
import { log } from './logger.js';

export const VERSION = '0.1.0';

const USAGE = `
netconfig v${VERSION} - BMC network configuration

Usage: netconfig [--config=PATH] [--debug] COMMAND [OPTION...]

Commands:
`.trim();

const VERSION_FLAGS = ['--version', '-v', 'version'];

export interface RunOptions {
  /** 미지정 시 config.bus 로 BusctlBus 생성 */
  bus?: NetworkBus;
  listInterfaces?: InterfaceLister;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function printUsage(): void {
  log.plain(USAGE);
  log.plain('');
}

/** 설정 파일을 읽지 않는 명령 (init) */
function needsConfig(command: string): boolean {
  return command !== 'init';
}

export async function runCli(argv: string[], options: RunOptions = {}): Promise<void> {
  const { options: globalOptions, rest } = splitGlobalOptions(argv);
  const env = options.env ?? process.env;
  if (globalOptions.debug) {
    process.env['NETCONFIG_DEBUG'] = 'true';
  }

  const args = new Arguments(rest, options.listInterfaces);
  const command = args.peek();

  // netconfig | netconfig help [COMMAND]
  if (command === undefined || isHelpRequest(command)) {
    if (command !== undefined) args.advance();
    if (args.peek() === undefined) printUsage();
    help(args);
    return;
  }

  if (VERSION_FLAGS.includes(command)) {
    args.advance();
    args.expectEnd();
    log.plain(`netconfig v${VERSION}`);
    return;
  }

  // netconfig COMMAND help
  if (isHelpRequest(args.peekNext())) {
    args.advance();
    args.advance();
    args.expectEnd();
    printCommandHelp(command);
    return;
  }

  const cwd = options.cwd ?? process.cwd();
  let config: NetconfigConfig = DEFAULT_CONFIG;
  if (needsConfig(command)) {
    const loaded = loadConfig({ configPath: globalOptions.config, cwd, env });
    config = loaded.config;
    logger.debug(loaded.path ? `설정 파일: ${loaded.path}` : '설정 파일 없음, 기본값 사용');
  }

  const bus = options.bus ?? new BusctlBus({
    command: config.bus.command,
    host: config.bus.host,
    timeoutMs: config.bus.timeoutMs,
  });

  await execute({ args, service: new NetworkService(bus), config, cwd });
}
