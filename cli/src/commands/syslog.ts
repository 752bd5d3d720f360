/**
 * cli/src/commands/syslog.ts
 * 원격 syslog 서버 설정: `syslog {ADDR[:PORT]|none}`
 */

import {
  IFACE,
  OBJECT,
  PROP,
  SERVICE,
  busValue,
  ipVersionOf,
  type BusTarget,
  type Endpoint,
} from '@netconfig/core';
import { log, printComplete } from '../logger.js';
import type { CommandContext } from './types.js';

export const syslogTarget: BusTarget = {
  service: SERVICE.syslog,
  object: OBJECT.syslog,
  iface: IFACE.client,
};

/** host:port, IPv6 는 [host]:port */
export function formatEndpoint({ host, port }: Endpoint): string {
  return ipVersionOf(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}

export async function runSyslog({ args, service }: CommandContext): Promise<void> {
  if (args.peek() === 'none') {
    args.advance();
    args.expectEnd();

    log.plain('Disabling remote syslog server...');
    await service.bus.setProperty(syslogTarget, PROP.address, busValue.str(''));
    await service.bus.setProperty(syslogTarget, PROP.port, busValue.uint16(0));
    printComplete();
    return;
  }

  const endpoint = args.parseAddrAndPort();
  args.expectEnd();

  log.plain(`Setting remote syslog server ${formatEndpoint(endpoint)}...`);
  await service.bus.setProperty(syslogTarget, PROP.address, busValue.str(endpoint.host));
  await service.bus.setProperty(syslogTarget, PROP.port, busValue.uint16(endpoint.port));
  printComplete();
}
