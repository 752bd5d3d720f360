// @netconfig/core: 인수 검증 엔진 + 네트워크 관리 서비스 클라이언트

// 유틸리티
export * from './utils/logger.js';
export * from './utils/errors.js';

// 설정
export * from './config.js';

// ── 인수 파서 ──────────────────────────────────────────────────────────────
export {
  Arguments,
  ACTIONS,
  TOGGLES,
  type Action,
  type Toggle,
  type IpAddrMask,
  type PrefixPolicy,
} from './parser/arguments.js';
export { isNumericToken, MAX_NUMERIC_LEN } from './parser/numeric.js';
export {
  parseIpLiteral,
  ipVersionOf,
  prefixIsValid,
  defaultPrefix,
  IP4_MAX_PREFIX,
  IP6_MAX_PREFIX,
  type IpAddress,
  type IpVer,
} from './parser/ip-address.js';
export { isFqdn } from './parser/fqdn.js';
export { isMacAddress } from './parser/mac-address.js';
export { parsePort, SYSLOG_DEFAULT_PORT, type Endpoint } from './parser/endpoint.js';
export { listNetInterfaces, type InterfaceLister } from './net/interfaces.js';

// ── 원격 서비스 ────────────────────────────────────────────────────────────
export * from './service/types.js';
export * from './service/objects.js';
export { NetworkService, type IpAddressEntry } from './service/network-service.js';
export {
  BusctlBus,
  runCommand,
  encodeArgs,
  type BusctlOptions,
  type CommandRunner,
} from './service/busctl.js';
