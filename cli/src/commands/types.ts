/**
 * cli/src/commands/types.ts
 * 명령 핸들러 공통 타입 + 인수 보조 함수
 */

import {
  invalidArgument,
  isNumericToken,
  vlanInterfaceName,
  type Action,
  type Arguments,
  type NetconfigConfig,
  type NetworkService,
  type Toggle,
} from '@netconfig/core';

export interface CommandContext {
  /** 명령 이름을 소비한 뒤의 인수 */
  args: Arguments;
  service: NetworkService;
  config: NetconfigConfig;
  cwd: string;
}

export type Handler = (ctx: CommandContext) => Promise<void>;

export interface Command {
  name: string;
  /** 인수 형식 (없으면 인수 없음) */
  fmt?: string;
  help: string;
  run: Handler;
}

/** IEEE 802.1Q VLAN ID 범위 */
export const MIN_VLAN_ID = 2;
export const MAX_VLAN_ID = 4094;

export function readVlanId(args: Arguments): number {
  const text = args.peek();
  const id = args.asNumber();
  if (id < MIN_VLAN_ID || id > MAX_VLAN_ID) {
    throw invalidArgument(
      `Invalid VLAN ID: ${text ?? ''}, expected an integer in the range ${MIN_VLAN_ID} - ${MAX_VLAN_ID}`,
    );
  }
  return id;
}

/**
 * 선택 인수 [IFACE|VLANID] → 인터페이스 이름
 *   숫자         → 기본 인터페이스의 VLAN (eth0.100)
 *   keywords 외  → 호스트에 존재하는 인터페이스 이름
 *   생략         → 기본 인터페이스
 */
export function selectInterface(ctx: CommandContext, keywords: readonly string[]): string {
  const next = ctx.args.peek();
  const parent = ctx.config.network.defaultInterface;

  if (isNumericToken(next)) {
    return vlanInterfaceName(parent, readVlanId(ctx.args));
  }
  if (next !== undefined && !keywords.includes(next)) {
    return ctx.args.asNetInterface();
  }
  return parent;
}

export function actionVerb(action: Action): string {
  return action === 'add' ? 'Adding' : 'Removing';
}

export function toggleVerb(toggle: Toggle): string {
  return toggle === 'enable' ? 'Enable' : 'Disable';
}
