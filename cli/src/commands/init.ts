/**
 * cli/src/commands/init.ts
 * netconfig init: netconfig.config.yml 초기 생성
 *
 * 이미 존재하면 실패 (--force 로 덮어쓰기 가능)
 */

import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILES, NetconfigError, type Arguments } from '@netconfig/core';
import { log } from '../logger.js';

const CONFIG_FILENAME = CONFIG_FILES[0] ?? 'netconfig.config.yml';

export const TEMPLATE = `# netconfig 설정 파일

network:
  defaultInterface: eth0      # VLAN 생성, 인터페이스 생략 시 대상

ip:
  prefixPolicy: default       # default (/24, /64 자동) | required (IP/PREFIX 필수)

bus:
  command: busctl
  host: ""                    # busctl -H user@host (비우면 로컬 시스템 버스)
  timeoutMs: 25000
`;

export interface InitOptions {
  force?: boolean;
  cwd?: string;
}

/** `init [--force]` 인수 해석 */
export function readInitOptions(args: Arguments): InitOptions {
  const force = args.peek() === '--force';
  if (force) args.advance();
  args.expectEnd();
  return { force };
}

export async function runInit(options: InitOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.join(cwd, CONFIG_FILENAME);

  if (fs.existsSync(configPath) && !options.force) {
    throw new NetconfigError({
      code: 'CONFIG_INVALID',
      reason: `${CONFIG_FILENAME} already exists, use --force to overwrite`,
    });
  }

  await fs.promises.writeFile(configPath, TEMPLATE, 'utf-8');
  log.success(`${CONFIG_FILENAME} created`);
  log.step(`edit network.defaultInterface if the management interface is not eth0`);
  return configPath;
}
