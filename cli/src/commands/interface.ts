/**
 * cli/src/commands/interface.ts
 * 이더넷 인터페이스 단위 설정: mac / ip / dhcp / dns / ntp / domain
 */

import {
  ACTIONS,
  TOGGLES,
  DHCP_MODE,
  IFACE,
  METHOD,
  PROP,
  SERVICE,
  busValue,
  ethToPath,
  invalidArgument,
  type BusTarget,
} from '@netconfig/core';
import { log, printComplete } from '../logger.js';
import { actionVerb, selectInterface, toggleVerb, type CommandContext } from './types.js';

function ethernetTarget(ifaceName: string): BusTarget {
  return { service: SERVICE.network, object: ethToPath(ifaceName), iface: IFACE.ethernet };
}

/** `mac [IFACE] MAC` */
export async function runMac(ctx: CommandContext): Promise<void> {
  const { args, service, config } = ctx;
  const ifaceName = args.remaining() > 1 ? args.asNetInterface() : config.network.defaultInterface;
  const mac = args.asMacAddress();
  args.expectEnd();

  log.plain(`Set new MAC address ${mac} on ${ifaceName}...`);
  await service.bus.setProperty(
    { service: SERVICE.network, object: ethToPath(ifaceName), iface: IFACE.mac },
    PROP.macAddress,
    busValue.str(mac),
  );
  printComplete();
}

/** `ip [IFACE|VLANID] add IP[/PREFIX] [GATEWAY]` / `ip [IFACE|VLANID] del IP` */
export async function runIp(ctx: CommandContext): Promise<void> {
  const { args, service, config } = ctx;
  const ifaceName = selectInterface(ctx, ACTIONS);
  const object = ethToPath(ifaceName);
  const action = args.asAction();

  if (action === 'add') {
    const ip = args.asIpAddrMask(config.ip.prefixPolicy);
    const gateway = args.peek() === undefined ? undefined : args.asIpAddress();
    args.expectEnd();
    if (gateway && gateway.ver !== ip.ver) {
      throw invalidArgument('IP version mismatch');
    }

    const suffix = gateway ? `, gateway ${gateway.address}` : '';
    log.plain(`Adding IP address ${ip.address}/${ip.prefix}${suffix} to ${ifaceName}...`);
    await service.bus.call(
      { service: SERVICE.network, object, iface: IFACE.ipCreate },
      METHOD.ipCreate,
      [
        busValue.str(ip.ver === 4 ? IFACE.ipv4 : IFACE.ipv6),
        busValue.str(ip.address),
        busValue.byte(ip.prefix),
        busValue.str(gateway?.address ?? ''),
      ],
    );
  } else {
    const ip = args.asIpAddress();
    args.expectEnd();

    const entry = (await service.getAddresses(object)).find(it => it.address === ip.address);
    if (!entry) {
      throw invalidArgument(`IP address ${ip.address} not found`);
    }

    log.plain(`Removing IP address ${entry.address}/${entry.prefix} from ${ifaceName}...`);
    await service.bus.call(
      { service: SERVICE.network, object: entry.object, iface: IFACE.delete },
      METHOD.delete,
    );
  }

  printComplete();
}

/** `dhcp [IFACE|VLANID] {enable|disable}` */
export async function runDhcp(ctx: CommandContext): Promise<void> {
  const { args, service } = ctx;
  const ifaceName = selectInterface(ctx, TOGGLES);
  const toggle = args.asToggle();
  args.expectEnd();

  log.plain(`${toggleVerb(toggle)} DHCP client on ${ifaceName}...`);
  await service.bus.setProperty(
    ethernetTarget(ifaceName),
    PROP.dhcpEnabled,
    busValue.str(toggle === 'enable' ? DHCP_MODE.both : DHCP_MODE.none),
  );
  printComplete();
}

/** `dns [IFACE|VLANID] {add|del} [static] IP...` */
export async function runDns(ctx: CommandContext): Promise<void> {
  const { args, service } = ctx;
  const ifaceName = selectInterface(ctx, ACTIONS);
  const action = args.asAction();

  const isStatic = args.peek() === 'static';
  if (isStatic) args.advance();
  const servers = args.asIpAddressList().map(ip => ip.address);
  args.expectEnd();

  const property = isStatic ? PROP.staticNameServers : PROP.nameservers;
  log.plain(`${actionVerb(action)} ${isStatic ? 'static ' : ''}DNS server ${servers.join(', ')}...`);

  const target = ethernetTarget(ifaceName);
  if (action === 'add') {
    await service.append(target, property, servers);
  } else {
    await service.remove(target, property, servers);
  }
  printComplete();
}

/** `ntp [IFACE|VLANID] {add|del} ADDR...` */
export async function runNtp(ctx: CommandContext): Promise<void> {
  const { args, service } = ctx;
  const ifaceName = selectInterface(ctx, ACTIONS);
  const action = args.asAction();
  const servers = args.asIpOrFQDNList();
  args.expectEnd();

  log.plain(`${actionVerb(action)} NTP server ${servers.join(', ')}...`);

  const target = ethernetTarget(ifaceName);
  if (action === 'add') {
    await service.append(target, PROP.ntpServers, servers);
  } else {
    await service.remove(target, PROP.ntpServers, servers);
  }
  printComplete();
}

/** `domain [IFACE|VLANID] {add|del} NAME...` */
export async function runDomain(ctx: CommandContext): Promise<void> {
  const { args, service } = ctx;
  const ifaceName = selectInterface(ctx, ACTIONS);
  const action = args.asAction();
  const domains = args.asTextList();
  args.expectEnd();

  log.plain(`${actionVerb(action)} domain name ${domains.join(', ')}...`);

  const target = ethernetTarget(ifaceName);
  if (action === 'add') {
    await service.append(target, PROP.domainName, domains);
  } else {
    await service.remove(target, PROP.domainName, domains);
  }
  printComplete();
}
