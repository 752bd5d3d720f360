/**
 * cli/src/commands/system.ts
 * 전역 설정: reset / hostname / gateway / dhcpcfg / vlan
 */

import {
  IFACE,
  METHOD,
  OBJECT,
  PROP,
  SERVICE,
  busValue,
  vlanPath,
  type BusTarget,
} from '@netconfig/core';
import { log, printComplete } from '../logger.js';
import { actionVerb, readVlanId, toggleVerb, type CommandContext } from './types.js';

const systemConfig: BusTarget = {
  service: SERVICE.network,
  object: OBJECT.config,
  iface: IFACE.systemConfig,
};

/** `reset` */
export async function runReset({ args, service }: CommandContext): Promise<void> {
  args.expectEnd();

  log.plain('Reset network configuration...');
  await service.bus.call(
    { service: SERVICE.network, object: OBJECT.root, iface: IFACE.factoryReset },
    METHOD.reset,
  );
  printComplete();
}

/** `hostname NAME` */
export async function runHostname({ args, service }: CommandContext): Promise<void> {
  const name = args.asText();
  args.expectEnd();

  log.plain(`Set new host name ${name}...`);
  await service.bus.setProperty(systemConfig, PROP.hostName, busValue.str(name));
  printComplete();
}

/** `gateway IP` */
export async function runGateway({ args, service }: CommandContext): Promise<void> {
  const ip = args.asIpAddress();
  args.expectEnd();

  log.plain(`Setting default gateway for IPv${ip.ver} to ${ip.address}...`);
  const property = ip.ver === 4 ? PROP.defaultGateway4 : PROP.defaultGateway6;
  await service.bus.setProperty(systemConfig, property, busValue.str(ip.address));
  printComplete();
}

const DHCP_FEATURES = ['dns', 'ntp'] as const;

/** `dhcpcfg {enable|disable} {dns|ntp}` */
export async function runDhcpcfg({ args, service }: CommandContext): Promise<void> {
  const toggle = args.asToggle();
  const feature = args.asOneOf(DHCP_FEATURES);
  args.expectEnd();

  const enable = toggle === 'enable';
  log.plain(`${toggleVerb(toggle)} ${feature.toUpperCase()} over DHCP...`);
  await service.bus.setProperty(
    { service: SERVICE.network, object: OBJECT.dhcp, iface: IFACE.dhcpConfig },
    feature === 'dns' ? PROP.dnsEnabled : PROP.ntpEnabled,
    busValue.bool(enable),
  );
  printComplete();
}

/** `vlan {add|del} ID` */
export async function runVlan({ args, service, config }: CommandContext): Promise<void> {
  const action = args.asAction();
  const id = readVlanId(args);
  args.expectEnd();

  const parent = config.network.defaultInterface;
  log.plain(`${actionVerb(action)} VLAN with ID ${id} on ${parent}...`);

  if (action === 'add') {
    await service.bus.call(
      { service: SERVICE.network, object: OBJECT.root, iface: IFACE.vlanCreate },
      METHOD.vlanCreate,
      [busValue.str(parent), busValue.uint32(id)],
    );
  } else {
    await service.bus.call(
      { service: SERVICE.network, object: vlanPath(parent, id), iface: IFACE.delete },
      METHOD.delete,
    );
  }
  printComplete();
}
