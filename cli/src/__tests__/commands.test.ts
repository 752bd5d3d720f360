import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DHCP_MODE, IFACE, METHOD, OBJECT, SERVICE, busValue } from '@netconfig/core';
import { runCli } from '../run.js';
import { TEMPLATE } from '../commands/init.js';
import { MemoryBus } from './helpers/memory-bus.js';
import { ETH0, ETH0_IP, bmcObjects } from './helpers/fixture.js';

const DONE = 'Request has been sent';

let dir: string;
let bus: MemoryBus;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'netconfig-cli-'));
  bus = new MemoryBus(bmcObjects());
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

function run(...argv: string[]): Promise<void> {
  return runCli(argv, { bus, listInterfaces: () => ['eth0', 'eth1'], cwd: dir, env: {} });
}

function output(): string[] {
  return vi.mocked(console.log).mock.calls.map(call => String(call[0]));
}

const row = (title: string, value: string) => `  ${`${title}:`.padEnd(22)}${value}`;

// ─── 전역 설정 ────────────────────────────────────────────────────────────────

describe('hostname / gateway / reset', () => {
  it('sets the host name', async () => {
    await run('hostname', 'bmc-new');
    expect(bus.property(OBJECT.config, IFACE.systemConfig, 'HostName')).toBe('bmc-new');
    expect(output()).toEqual(['Set new host name bmc-new...', DONE]);
  });

  it('sets the IPv6 gateway in canonical form', async () => {
    await run('gateway', '2001:0db8::1');
    expect(bus.property(OBJECT.config, IFACE.systemConfig, 'DefaultGateway6')).toBe('2001:db8::1');
    expect(bus.property(OBJECT.config, IFACE.systemConfig, 'DefaultGateway')).toBe('10.0.0.1');
    expect(output()).toEqual(['Setting default gateway for IPv6 to 2001:db8::1...', DONE]);
  });

  it('rejects a gateway that is not an IP', async () => {
    await expect(run('gateway', 'router.example')).rejects.toThrow(
      'Invalid IP address: router.example, expected IPv4 or IPv6 address',
    );
  });

  it('requests a factory reset', async () => {
    await run('reset');
    expect(bus.calls).toEqual([
      {
        target: { service: SERVICE.network, object: OBJECT.root, iface: IFACE.factoryReset },
        method: METHOD.reset,
        args: [],
      },
    ]);
  });

  it('rejects extra arguments', async () => {
    await expect(run('reset', 'now')).rejects.toThrow('Unexpected arguments: now');
    expect(bus.calls).toEqual([]);
  });
});

describe('mac', () => {
  it('uses the default interface', async () => {
    await run('mac', '02:00:00:00:00:01');
    expect(bus.property(ETH0, IFACE.mac, 'MACAddress')).toBe('02:00:00:00:00:01');
    expect(output()).toEqual(['Set new MAC address 02:00:00:00:00:01 on eth0...', DONE]);
  });

  it('checks the interface name', async () => {
    await expect(run('mac', 'eth9', '02:00:00:00:00:01')).rejects.toThrow(
      'Invalid network interface name: eth9',
    );
  });
});

// ─── IP 주소 ─────────────────────────────────────────────────────────────────

describe('ip', () => {
  it('adds an address with the default prefix', async () => {
    await run('ip', 'add', '192.168.1.20');
    expect(bus.calls).toEqual([
      {
        target: { service: SERVICE.network, object: ETH0, iface: IFACE.ipCreate },
        method: METHOD.ipCreate,
        args: [busValue.str(IFACE.ipv4), busValue.str('192.168.1.20'), busValue.byte(24), busValue.str('')],
      },
    ]);
    expect(output()).toEqual(['Adding IP address 192.168.1.20/24 to eth0...', DONE]);
  });

  it('adds an address with gateway on a VLAN', async () => {
    await run('ip', '100', 'add', '10.1.0.5/16', '10.1.0.1');
    expect(bus.calls[0]?.target.object).toBe(`${OBJECT.root}/eth0_100`);
    expect(bus.calls[0]?.args).toEqual([
      busValue.str(IFACE.ipv4),
      busValue.str('10.1.0.5'),
      busValue.byte(16),
      busValue.str('10.1.0.1'),
    ]);
    expect(output()[0]).toBe('Adding IP address 10.1.0.5/16, gateway 10.1.0.1 to eth0.100...');
  });

  it('rejects a gateway of another IP version', async () => {
    await expect(run('ip', 'add', '10.0.0.5/24', 'fe80::1')).rejects.toThrow('IP version mismatch');
    expect(bus.calls).toEqual([]);
  });

  it('rejects a VLAN id out of range', async () => {
    await expect(run('ip', '1', 'add', '10.0.0.5')).rejects.toThrow(
      'Invalid VLAN ID: 1, expected an integer in the range 2 - 4094',
    );
  });

  it('deletes an existing address', async () => {
    await run('ip', 'del', '10.0.0.10');
    expect(bus.calls).toEqual([
      {
        target: { service: SERVICE.network, object: ETH0_IP, iface: IFACE.delete },
        method: METHOD.delete,
        args: [],
      },
    ]);
    expect(output()).toEqual(['Removing IP address 10.0.0.10/24 from eth0...', DONE]);
  });

  it('fails to delete an unknown address', async () => {
    await expect(run('ip', 'del', '10.9.9.9')).rejects.toThrow('IP address 10.9.9.9 not found');
  });
});

// ─── 목록 프로퍼티 ────────────────────────────────────────────────────────────

describe('dns / ntp / domain', () => {
  it('appends a DNS server', async () => {
    await run('dns', 'add', '10.0.0.54');
    expect(bus.property(ETH0, IFACE.ethernet, 'Nameservers')).toEqual(['10.0.0.53', '10.0.0.54']);
    expect(output()).toEqual(['Adding DNS server 10.0.0.54...', DONE]);
  });

  it('appends static DNS servers', async () => {
    await run('dns', 'eth0', 'add', 'static', '10.0.0.1', '2001:db8::53');
    expect(bus.property(ETH0, IFACE.ethernet, 'StaticNameServers')).toEqual(['10.0.0.1', '2001:db8::53']);
    expect(output()[0]).toBe('Adding static DNS server 10.0.0.1, 2001:db8::53...');
  });

  it('rejects a duplicate DNS server', async () => {
    await expect(run('dns', 'add', '10.0.0.53')).rejects.toThrow('Value 10.0.0.53 already exists');
  });

  it('rejects removing an unknown static server', async () => {
    await expect(run('dns', 'del', 'static', '10.0.0.99')).rejects.toThrow('Value 10.0.0.99 not found');
  });

  it('removes an NTP server', async () => {
    await run('ntp', 'del', 'ntp.example.com');
    expect(bus.property(ETH0, IFACE.ethernet, 'NTPServers')).toEqual([]);
    expect(output()).toEqual(['Removing NTP server ntp.example.com...', DONE]);
  });

  it('adds domain names', async () => {
    await run('domain', 'add', 'corp.example', 'lab.example');
    expect(bus.property(ETH0, IFACE.ethernet, 'DomainName')).toEqual(['corp.example', 'lab.example']);
  });

  it('needs at least one value', async () => {
    await expect(run('ntp', 'add')).rejects.toThrow('Not enough arguments');
  });
});

// ─── DHCP / VLAN / syslog ────────────────────────────────────────────────────

describe('dhcp / dhcpcfg', () => {
  it('disables the DHCP client', async () => {
    await run('dhcp', 'disable');
    expect(bus.property(ETH0, IFACE.ethernet, 'DHCPEnabled')).toBe(DHCP_MODE.none);
    expect(output()).toEqual(['Disable DHCP client on eth0...', DONE]);
  });

  it('enables the DHCP client for both versions', async () => {
    await run('dhcp', 'eth0', 'enable');
    expect(bus.property(ETH0, IFACE.ethernet, 'DHCPEnabled')).toBe(DHCP_MODE.both);
  });

  it('toggles DNS over DHCP', async () => {
    await run('dhcpcfg', 'disable', 'dns');
    expect(bus.property(OBJECT.dhcp, IFACE.dhcpConfig, 'DNSEnabled')).toBe(false);
    expect(output()).toEqual(['Disable DNS over DHCP...', DONE]);
  });

  it('rejects an unknown feature', async () => {
    await expect(run('dhcpcfg', 'enable', 'ftp')).rejects.toThrow(
      'Invalid argument: ftp, expected one of [dns, ntp]',
    );
  });
});

describe('vlan', () => {
  it('creates a VLAN on the default interface', async () => {
    await run('vlan', 'add', '100');
    expect(bus.calls).toEqual([
      {
        target: { service: SERVICE.network, object: OBJECT.root, iface: IFACE.vlanCreate },
        method: METHOD.vlanCreate,
        args: [busValue.str('eth0'), busValue.uint32(100)],
      },
    ]);
    expect(output()).toEqual(['Adding VLAN with ID 100 on eth0...', DONE]);
  });

  it('deletes a VLAN', async () => {
    await run('vlan', 'del', '100');
    expect(bus.calls[0]?.target).toEqual({
      service: SERVICE.network,
      object: `${OBJECT.root}/eth0_100`,
      iface: IFACE.delete,
    });
  });

  it('rejects an id out of range', async () => {
    await expect(run('vlan', 'add', '4095')).rejects.toThrow(
      'Invalid VLAN ID: 4095, expected an integer in the range 2 - 4094',
    );
  });
});

describe('syslog', () => {
  it('sets an IPv6 server with port', async () => {
    await run('syslog', '[2001:db8::5]:1514');
    expect(bus.property(OBJECT.syslog, IFACE.client, 'Address')).toBe('2001:db8::5');
    expect(bus.property(OBJECT.syslog, IFACE.client, 'Port')).toBe(1514);
    expect(output()).toEqual(['Setting remote syslog server [2001:db8::5]:1514...', DONE]);
  });

  it('uses the default port', async () => {
    await run('syslog', '10.0.0.7');
    expect(bus.property(OBJECT.syslog, IFACE.client, 'Port')).toBe(514);
    expect(output()[0]).toBe('Setting remote syslog server 10.0.0.7:514...');
  });

  it('clears the server', async () => {
    await run('syslog', 'none');
    expect(bus.property(OBJECT.syslog, IFACE.client, 'Address')).toBe('');
    expect(bus.property(OBJECT.syslog, IFACE.client, 'Port')).toBe(0);
    expect(output()).toEqual(['Disabling remote syslog server...', DONE]);
  });
});

// ─── show ────────────────────────────────────────────────────────────────────

describe('show', () => {
  it('prints the whole configuration', async () => {
    await run('show');
    expect(output()).toEqual([
      'Global network configuration:',
      row('Host name', 'bmc'),
      row('Default IPv4 gateway', '10.0.0.1'),
      row('Default IPv6 gateway', '-'),
      'Global DHCP configuration:',
      row('DNS over DHCP', 'Enabled'),
      row('NTP over DHCP', 'Disabled'),
      'Ethernet interface eth0:',
      row('MAC address', '00:11:22:33:44:55'),
      row('Link state', 'UP'),
      row('Link speed', '1000'),
      row('IP address', '10.0.0.10/24, gateway 10.0.0.1'),
      row('DHCP', 'Enabled (IPv4 only)'),
      row('Domain names', '-'),
      row('DNS servers', '10.0.0.53'),
      row('Static DNS servers', '-'),
      row('NTP servers', 'ntp.example.com'),
      'Remote syslog server:',
      row('Address', 'log.example.com'),
      row('Port', '514'),
    ]);
  });

  it('prints N/A when the syslog service is missing', async () => {
    const objects = bmcObjects();
    delete objects[OBJECT.syslog];
    bus = new MemoryBus(objects);

    await run('show');
    expect(output().slice(-3)).toEqual(['Remote syslog server:', row('Address', 'N/A'), row('Port', 'N/A')]);
  });
});

// ─── 도움말 / 버전 / 오류 ────────────────────────────────────────────────────

describe('help and version', () => {
  it('prints usage and the command list without arguments', async () => {
    await run();
    const lines = output();
    expect(lines[0]?.startsWith('netconfig v0.1.0 - BMC network configuration')).toBe(true);
    expect(lines).toContain(`  ${'show'.padEnd(10)} Show current configuration`);
    expect(lines).toContain(`  ${''.padEnd(10)} Command format: vlan {add|del} ID`);
  });

  it('prints help for one command', async () => {
    await run('help', 'ip');
    expect(output()).toEqual([
      'Add or remove static IP address (without GATEWAY an empty gateway is sent)',
      'ip [IFACE|VLANID] {add|del} IP[/PREFIX] [GATEWAY]',
    ]);
  });

  it('accepts help after the command name', async () => {
    await run('show', '--help');
    expect(output()).toEqual(['Show current configuration', 'show']);
  });

  it('rejects help for an unknown command', async () => {
    await expect(run('help', 'bogus')).rejects.toThrow('bogus is not a valid command, try --help option');
  });

  it('prints the version', async () => {
    await run('--version');
    expect(output()).toEqual(['netconfig v0.1.0']);
  });

  it('rejects an unknown command', async () => {
    await expect(run('bogus')).rejects.toThrow('Invalid command: bogus');
  });
});

// ─── 설정 파일 ───────────────────────────────────────────────────────────────

describe('configuration', () => {
  it('takes the default interface from the config file', async () => {
    fs.writeFileSync(path.join(dir, 'netconfig.config.yml'), 'network:\n  defaultInterface: eth1\n');
    await run('vlan', 'add', '10');
    expect(bus.calls[0]?.args).toEqual([busValue.str('eth1'), busValue.uint32(10)]);
  });

  it('requires a prefix under the required policy', async () => {
    fs.writeFileSync(path.join(dir, 'netconfig.config.yml'), 'ip:\n  prefixPolicy: required\n');
    await expect(run('ip', 'add', '10.0.0.5')).rejects.toThrow(
      'Invalid argument: 10.0.0.5, expected IP/PREFIX (e.g. 10.0.0.1/8)',
    );
  });

  it('fails on a missing --config file', async () => {
    await expect(run('--config=missing.yml', 'show')).rejects.toThrow(
      `Invalid configuration: file not found: ${path.join(dir, 'missing.yml')}`,
    );
  });
});

describe('init', () => {
  it('writes the config template', async () => {
    await run('init');
    expect(fs.readFileSync(path.join(dir, 'netconfig.config.yml'), 'utf-8')).toBe(TEMPLATE);
    expect(output()[0]).toBe('netconfig.config.yml created');
  });

  it('refuses to overwrite without --force', async () => {
    fs.writeFileSync(path.join(dir, 'netconfig.config.yml'), 'network: {}\n');
    await expect(run('init')).rejects.toThrow(
      'Invalid configuration: netconfig.config.yml already exists, use --force to overwrite',
    );
    await run('init', '--force');
    expect(fs.readFileSync(path.join(dir, 'netconfig.config.yml'), 'utf-8')).toBe(TEMPLATE);
  });
});
