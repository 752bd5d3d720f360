/**
 * cli/src/commands/index.ts
 * 명령 테이블 + 실행/도움말
 */

import { invalidArgument, type Arguments } from '@netconfig/core';
import { log } from '../logger.js';
import { runShow } from './show.js';
import { runDhcp, runDns, runDomain, runIp, runMac, runNtp } from './interface.js';
import { runDhcpcfg, runGateway, runHostname, runReset, runVlan } from './system.js';
import { runSyslog } from './syslog.js';
import { readInitOptions, runInit } from './init.js';
import type { Command, CommandContext } from './types.js';

export const COMMANDS: readonly Command[] = [
  { name: 'show',     help: 'Show current configuration', run: runShow },
  { name: 'reset',    help: 'Reset configuration to factory defaults', run: runReset },
  { name: 'mac',      fmt: '[IFACE] MAC', help: 'Set MAC address', run: runMac },
  { name: 'hostname', fmt: 'NAME', help: 'Set host name', run: runHostname },
  { name: 'domain',   fmt: '[IFACE|VLANID] {add|del} NAME...', help: 'Add or remove domain names', run: runDomain },
  { name: 'gateway',  fmt: 'IP', help: 'Set default gateway', run: runGateway },
  { name: 'ip',       fmt: '[IFACE|VLANID] {add|del} IP[/PREFIX] [GATEWAY]', help: 'Add or remove static IP address (without GATEWAY an empty gateway is sent)', run: runIp },
  { name: 'dhcp',     fmt: '[IFACE|VLANID] {enable|disable}', help: 'Enable or disable DHCP client', run: runDhcp },
  { name: 'dhcpcfg',  fmt: '{enable|disable} {dns|ntp}', help: 'Enable or disable DHCP features', run: runDhcpcfg },
  { name: 'dns',      fmt: '[IFACE|VLANID] {add|del} [static] IP...', help: 'Add or remove DNS servers', run: runDns },
  { name: 'ntp',      fmt: '[IFACE|VLANID] {add|del} ADDR...', help: 'Add or remove NTP servers', run: runNtp },
  { name: 'vlan',     fmt: '{add|del} ID', help: 'Add or remove VLAN', run: runVlan },
  { name: 'syslog',   fmt: '{ADDR[:PORT]|none}', help: 'Set or clear remote syslog server', run: runSyslog },
  { name: 'init',     fmt: '[--force]', help: 'Create netconfig.config.yml in the current directory', run: runInitCommand },
];

async function runInitCommand({ args, cwd }: CommandContext): Promise<void> {
  await runInit({ ...readInitOptions(args), cwd });
}

export const HELP_KEYWORDS: readonly string[] = ['help', '--help', '-h'];

export function isHelpRequest(arg: string | undefined): boolean {
  return arg !== undefined && HELP_KEYWORDS.includes(arg);
}

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find(cmd => cmd.name === name);
}

/**
 * 명령 실행
 * ctx.args 는 명령 이름부터 시작한다
 */
export async function execute(ctx: CommandContext): Promise<void> {
  const name = ctx.args.asText();
  const cmd = findCommand(name);
  if (!cmd) {
    throw invalidArgument(`Invalid command: ${name}`);
  }
  await cmd.run(ctx);
}

/** 한 명령의 도움말 */
export function printCommandHelp(name: string): void {
  const cmd = findCommand(name);
  if (!cmd) {
    throw invalidArgument(`${name} is not a valid command, try --help option`);
  }
  log.plain(cmd.help);
  log.plain(`${cmd.name} ${cmd.fmt ?? ''}`.trimEnd());
}

/** 전체 명령 목록 */
export function printCommandList(): void {
  for (const cmd of COMMANDS) {
    log.plain(`  ${cmd.name.padEnd(10)} ${cmd.help}`);
    if (cmd.fmt) {
      log.plain(`  ${''.padEnd(10)} Command format: ${cmd.name} ${cmd.fmt}`);
    }
    log.plain('');
  }
}

/**
 * `help [COMMAND]` 의 나머지 인수 처리
 * 명령 이름이 있으면 그 명령만, 없으면 전체 목록
 */
export function help(args: Arguments): void {
  const name = args.peek();
  if (name === undefined) {
    printCommandList();
    return;
  }
  args.advance();
  args.expectEnd();
  printCommandHelp(name);
}
