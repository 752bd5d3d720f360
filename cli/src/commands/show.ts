/**
 * cli/src/commands/show.ts
 * netconfig show: 현재 네트워크 설정 출력
 *
 * 출력 예:
 *   Global network configuration:
 *     Host name:            bmc
 *     Default IPv4 gateway: 10.0.0.1
 */

import {
  DHCP_MODE,
  IFACE,
  OBJECT,
  PROP,
  isNetconfigError,
  logger,
  type ManagedObjects,
  type NetworkService,
  type Properties,
  type PropertyValue,
} from '@netconfig/core';
import { log } from '../logger.js';
import { syslogTarget } from './syslog.js';
import type { CommandContext } from './types.js';

/** 프로퍼티 제목 열 너비 */
const NAME_WIDTH = 20;

interface ValueFormat {
  /** [false, true] 표시 */
  bools?: readonly [string, string];
  /** 문자열 값 치환 */
  strings?: Readonly<Record<string, string>>;
}

const ENABLED: readonly [string, string] = ['Disabled', 'Enabled'];

const DHCP_LABELS: Readonly<Record<string, string>> = {
  [DHCP_MODE.both]: 'Enabled (IPv4, IPv6)',
  [DHCP_MODE.v4]: 'Enabled (IPv4 only)',
  [DHCP_MODE.v6]: 'Enabled (IPv6 only)',
  [DHCP_MODE.none]: 'Disabled',
};

/** 값 없음 → N/A, 빈 문자열 → - */
export function formatLine(title: string, value: string | undefined): string {
  const shown = value === undefined ? 'N/A' : value === '' ? '-' : value;
  const pad = ' '.repeat(Math.max(0, NAME_WIDTH - title.length));
  return `  ${title}: ${pad}${shown}`;
}

export function formatValue(value: PropertyValue, format: ValueFormat = {}): string {
  const bools = format.bools ?? ENABLED;
  const mapString = (s: string) => format.strings?.[s] ?? s;

  if (typeof value === 'boolean') return value ? bools[1] : bools[0];
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return mapString(value);
  return value.map(mapString).join(', ');
}

function printProperty(title: string, name: string, props: Properties, format?: ValueFormat): void {
  const value = props[name];
  log.plain(formatLine(title, value === undefined ? undefined : formatValue(value, format)));
}

function propertiesOf(objects: ManagedObjects, object: string, iface: string): Properties {
  return objects[object]?.[iface] ?? {};
}

async function printInterface(service: NetworkService, objects: ManagedObjects, object: string): Promise<void> {
  const eth = propertiesOf(objects, object, IFACE.ethernet);
  const vlan = propertiesOf(objects, object, IFACE.vlan);
  const mac = propertiesOf(objects, object, IFACE.mac);

  const name = eth[PROP.interfaceName];
  log.title(`Ethernet interface ${typeof name === 'string' ? name : object}:`);

  if (Object.keys(vlan).length > 0) {
    printProperty('VLAN Id', PROP.vlanId, vlan);
  }
  printProperty('MAC address', PROP.macAddress, mac);
  printProperty('Link state', PROP.linkUp, eth, { bools: ['DOWN', 'UP'] });
  printProperty('Link speed', PROP.speed, eth);

  for (const ip of await service.getAddresses(object, objects)) {
    const gateway = ip.gateway ? `, gateway ${ip.gateway}` : '';
    log.plain(formatLine('IP address', `${ip.address}/${ip.prefix}${gateway}`));
  }

  printProperty('DHCP', PROP.dhcpEnabled, eth, { strings: DHCP_LABELS });
  printProperty('Domain names', PROP.domainName, eth);
  printProperty('DNS servers', PROP.nameservers, eth);
  printProperty('Static DNS servers', PROP.staticNameServers, eth);
  printProperty('NTP servers', PROP.ntpServers, eth);
}

/** 원격 syslog 설정 (syslog 서비스가 없으면 N/A) */
async function readSyslog(service: NetworkService): Promise<Properties> {
  try {
    return {
      [PROP.address]: await service.bus.getProperty(syslogTarget, PROP.address),
      [PROP.port]: await service.bus.getProperty(syslogTarget, PROP.port),
    };
  } catch (err) {
    if (!isNetconfigError(err) || err.code !== 'BUS_CALL_FAILED') throw err;
    logger.debug(`syslog 설정 조회 실패: ${err.message}`);
    return {};
  }
}

export async function runShow({ args, service }: CommandContext): Promise<void> {
  args.expectEnd();

  const objects = await service.getNetworkObjects();

  const globalCfg = propertiesOf(objects, OBJECT.config, IFACE.systemConfig);
  log.title('Global network configuration:');
  printProperty('Host name', PROP.hostName, globalCfg);
  printProperty('Default IPv4 gateway', PROP.defaultGateway4, globalCfg);
  printProperty('Default IPv6 gateway', PROP.defaultGateway6, globalCfg);

  const dhcpCfg = propertiesOf(objects, OBJECT.dhcp, IFACE.dhcpConfig);
  log.title('Global DHCP configuration:');
  printProperty('DNS over DHCP', PROP.dnsEnabled, dhcpCfg);
  printProperty('NTP over DHCP', PROP.ntpEnabled, dhcpCfg);

  const interfaces = Object.keys(objects)
    .filter(path => objects[path]?.[IFACE.ethernet] !== undefined)
    .sort();
  for (const object of interfaces) {
    await printInterface(service, objects, object);
  }

  const syslog = await readSyslog(service);
  log.title('Remote syslog server:');
  printProperty('Address', PROP.address, syslog);
  printProperty('Port', PROP.port, syslog);
}
