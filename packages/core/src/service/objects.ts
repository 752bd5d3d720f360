/**
 * 네트워크 관리 서비스의 D-Bus 이름들
 * (서비스 / 오브젝트 경로 / 인터페이스 / 프로퍼티)
 */

export const SERVICE = {
  network: 'xyz.openbmc_project.Network',
  syslog: 'xyz.openbmc_project.Syslog.Config',
} as const;

export const OBJECT = {
  root: '/xyz/openbmc_project/network',
  config: '/xyz/openbmc_project/network/config',
  dhcp: '/xyz/openbmc_project/network/config/dhcp',
  syslog: '/xyz/openbmc_project/logging/config/remote',
} as const;

export const IFACE = {
  systemConfig: 'xyz.openbmc_project.Network.SystemConfiguration',
  dhcpConfig: 'xyz.openbmc_project.Network.DHCPConfiguration',
  mac: 'xyz.openbmc_project.Network.MACAddress',
  ethernet: 'xyz.openbmc_project.Network.EthernetInterface',
  vlan: 'xyz.openbmc_project.Network.VLAN',
  vlanCreate: 'xyz.openbmc_project.Network.VLAN.Create',
  ip: 'xyz.openbmc_project.Network.IP',
  ipCreate: 'xyz.openbmc_project.Network.IP.Create',
  ipv4: 'xyz.openbmc_project.Network.IP.Protocol.IPv4',
  ipv6: 'xyz.openbmc_project.Network.IP.Protocol.IPv6',
  client: 'xyz.openbmc_project.Network.Client',
  delete: 'xyz.openbmc_project.Object.Delete',
  factoryReset: 'xyz.openbmc_project.Common.FactoryReset',
  objectManager: 'org.freedesktop.DBus.ObjectManager',
} as const;

export const PROP = {
  hostName: 'HostName',
  defaultGateway4: 'DefaultGateway',
  defaultGateway6: 'DefaultGateway6',
  dnsEnabled: 'DNSEnabled',
  ntpEnabled: 'NTPEnabled',
  macAddress: 'MACAddress',
  interfaceName: 'InterfaceName',
  dhcpEnabled: 'DHCPEnabled',
  domainName: 'DomainName',
  ntpServers: 'NTPServers',
  nameservers: 'Nameservers',
  staticNameServers: 'StaticNameServers',
  linkUp: 'LinkUp',
  speed: 'Speed',
  vlanId: 'Id',
  address: 'Address',
  gateway: 'Gateway',
  prefixLength: 'PrefixLength',
  port: 'Port',
} as const;

export const METHOD = {
  ipCreate: 'IP',
  vlanCreate: 'VLAN',
  delete: 'Delete',
  reset: 'Reset',
  getManagedObjects: 'GetManagedObjects',
} as const;

const DHCP_CONF = 'xyz.openbmc_project.Network.EthernetInterface.DHCPConf';

export const DHCP_MODE = {
  both: `${DHCP_CONF}.both`,
  v4: `${DHCP_CONF}.v4`,
  v6: `${DHCP_CONF}.v6`,
  none: `${DHCP_CONF}.none`,
} as const;

/** 인터페이스 이름 → 오브젝트 경로 (eth0.100 → .../network/eth0_100) */
export function ethToPath(name: string): string {
  return `${OBJECT.root}/${name.replace(/\./g, '_')}`;
}

/** VLAN 인터페이스 이름 (eth0 + 100 → eth0.100) */
export function vlanInterfaceName(parent: string, id: number): string {
  return `${parent}.${id}`;
}

export function vlanPath(parent: string, id: number): string {
  return ethToPath(vlanInterfaceName(parent, id));
}
