import { DHCP_MODE, IFACE, OBJECT, ethToPath, type ManagedObjects } from '@netconfig/core';

export const ETH0 = ethToPath('eth0');
export const ETH0_IP = `${ETH0}/ipv4/a1b2c3`;

/** eth0 하나와 전역 설정, 원격 syslog 가 있는 BMC */
export function bmcObjects(): ManagedObjects {
  return {
    [OBJECT.config]: {
      [IFACE.systemConfig]: { HostName: 'bmc', DefaultGateway: '10.0.0.1', DefaultGateway6: '' },
    },
    [OBJECT.dhcp]: {
      [IFACE.dhcpConfig]: { DNSEnabled: true, NTPEnabled: false },
    },
    [ETH0]: {
      [IFACE.ethernet]: {
        InterfaceName: 'eth0',
        LinkUp: true,
        Speed: 1000,
        DHCPEnabled: DHCP_MODE.v4,
        DomainName: [],
        Nameservers: ['10.0.0.53'],
        StaticNameServers: [],
        NTPServers: ['ntp.example.com'],
      },
      [IFACE.mac]: { MACAddress: '00:11:22:33:44:55' },
    },
    [ETH0_IP]: {
      [IFACE.ip]: { Address: '10.0.0.10', PrefixLength: 24, Gateway: '10.0.0.1' },
    },
    [OBJECT.syslog]: {
      [IFACE.client]: { Address: 'log.example.com', Port: 514 },
    },
  };
}
