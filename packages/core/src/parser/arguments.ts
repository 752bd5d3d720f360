/**
 * 명령행 인수 파서
 *
 * 토큰 배열 위를 움직이는 커서. 호출자는 "다음 인수를 X 로 달라"고만 요청하고
 * 원문 텍스트를 직접 들여다보지 않는다.
 *
 * - 모든 asXxx() 는 먼저 토큰 하나를 소비한 뒤 검증한다
 * - 검증 실패 시 커서는 잘못된 토큰 뒤에 머문다 (되감기 없음)
 * - 실패는 전부 NetconfigError(INVALID_ARGUMENT)
 */

import { invalidArgument, isNetconfigError } from '../utils/errors.js';
import { listNetInterfaces, type InterfaceLister } from '../net/interfaces.js';
import { isNumericToken } from './numeric.js';
import { isMacAddress } from './mac-address.js';
import { isFqdn } from './fqdn.js';
import {
  parseIpLiteral,
  prefixIsValid,
  defaultPrefix,
  type IpAddress,
  type IpVer,
} from './ip-address.js';
import {
  parsePort,
  countColons,
  splitBracketed,
  SYSLOG_DEFAULT_PORT,
  type Endpoint,
} from './endpoint.js';

export type Action = 'add' | 'del';
export type Toggle = 'enable' | 'disable';

export const ACTIONS: readonly Action[] = ['add', 'del'];
export const TOGGLES: readonly Toggle[] = ['enable', 'disable'];

export interface IpAddrMask extends IpAddress {
  /** 프리픽스 길이 (비트) */
  prefix: number;
}

/**
 * `/PREFIX` 가 없을 때의 처리
 * - default:  v4 는 /24, v6 는 /64 적용
 * - required: 주소만 있으면 거부
 */
export type PrefixPolicy = 'default' | 'required';

export class Arguments {
  private readonly args: readonly string[];
  private readonly listInterfaces: InterfaceLister;
  private index = 0;

  /**
   * @param args           프로그램 이름을 뺀 인수 목록
   * @param listInterfaces asNetInterface() 가 조회할 인터페이스 목록
   */
  constructor(args: readonly string[], listInterfaces: InterfaceLister = listNetInterfaces) {
    this.args = [...args];
    this.listInterfaces = listInterfaces;
  }

  // ─── 커서 ──────────────────────────────────────────────────────────────────

  /** 현재 인수 (소비하지 않음) */
  peek(): string | undefined {
    return this.args[this.index];
  }

  /** 현재 인수 다음 것 (소비하지 않음) */
  peekNext(): string | undefined {
    if (this.peek() === undefined) return undefined;
    return this.args[this.index + 1];
  }

  /** 남은 인수 개수 */
  remaining(): number {
    return this.args.length - this.index;
  }

  advance(): this {
    if (this.index >= this.args.length) {
      throw invalidArgument('Not enough arguments');
    }
    this.index++;
    return this;
  }

  /** 남은 인수가 있으면 실패 */
  expectEnd(): void {
    const extra = this.peek();
    if (extra !== undefined) {
      throw invalidArgument(`Unexpected arguments: ${extra}`);
    }
  }

  // ─── 기본 값 ───────────────────────────────────────────────────────────────

  asText(): string {
    const arg = this.peek();
    this.advance();
    return arg ?? '';
  }

  asOneOf<T extends string>(expected: readonly T[]): T {
    const arg = this.asText();
    const found = expected.find(candidate => candidate === arg);
    if (found === undefined) {
      throw invalidArgument(`Invalid argument: ${arg}, expected one of [${expected.join(', ')}]`);
    }
    return found;
  }

  asNumber(): number {
    const arg = this.asText();
    if (!isNumericToken(arg)) {
      throw invalidArgument(`Invalid numeric argument: ${arg}`);
    }
    return parseInt(arg, 10);
  }

  asAction(): Action {
    return this.asOneOf(ACTIONS);
  }

  asToggle(): Toggle {
    return this.asOneOf(TOGGLES);
  }

  // ─── 네트워크 값 ───────────────────────────────────────────────────────────

  /** 현재 호스트에 존재하는 인터페이스 이름 */
  asNetInterface(): string {
    const arg = this.asText();
    if (!this.listInterfaces().includes(arg)) {
      throw invalidArgument(`Invalid network interface name: ${arg}`);
    }
    return arg;
  }

  asMacAddress(): string {
    const arg = this.asText();
    if (!isMacAddress(arg)) {
      throw invalidArgument(`Invalid MAC address: ${arg}, expected hex-digits-and-colons notation`);
    }
    return arg;
  }

  asIpAddress(): IpAddress {
    const arg = this.asText();
    try {
      return parseIpLiteral(arg);
    } catch (err) {
      if (!isNetconfigError(err)) throw err;
      // 하위 파서 메시지 대신 통일된 메시지
      throw invalidArgument(`Invalid IP address: ${arg}, expected IPv4 or IPv6 address`);
    }
  }

  /**
   * IP[/PREFIX]
   * 마지막 `/` 기준으로 나누고, 주소/프리픽스/범위가 모두 맞아야 성공
   */
  asIpAddrMask(policy: PrefixPolicy = 'default'): IpAddrMask {
    const arg = this.asText();
    const parsed = parseAddrMask(arg, policy);
    if (!parsed) {
      const expected =
        policy === 'default'
          ? 'IP[/PREFIX] (e.g. 10.0.0.1/8 or 192.168.1.1)'
          : 'IP/PREFIX (e.g. 10.0.0.1/8)';
      throw invalidArgument(`Invalid argument: ${arg}, expected ${expected}`);
    }
    return parsed;
  }

  /**
   * IP 주소(정규형) 또는 FQDN
   * @param param 지정하면 토큰을 소비하지 않고 이 값을 검사
   */
  asIpOrFQDN(param?: string): string {
    const arg = param ?? this.asText();

    const ip = tryParseIp(arg);
    if (ip) return ip.address;

    if (isFqdn(arg)) return arg;

    throw invalidArgument(
      `Invalid argument: ${arg}, expected IP address or FQDN. ` +
        'Please, enter IPv4-addresses in dotted-decimal format.',
    );
  }

  /**
   * ADDR[:PORT]
   *   콜론 0개  → HOST (기본 포트)
   *   콜론 1개  → HOST:PORT
   *   콜론 2개+ → [IPv6]:PORT, 대괄호가 없으면 IPv6 주소 전체 (기본 포트)
   * 포트를 먼저 검사한다.
   */
  parseAddrAndPort(): Endpoint {
    const arg = this.asText();

    switch (countColons(arg)) {
      case 0:
        return { host: this.asIpOrFQDN(arg), port: SYSLOG_DEFAULT_PORT };

      case 1: {
        const delim = arg.indexOf(':');
        const port = parsePort(arg.slice(delim + 1));
        return { host: this.asIpOrFQDN(arg.slice(0, delim)), port };
      }

      default: {
        if (!arg.startsWith('[')) {
          return { host: this.asIpOrFQDN(arg), port: SYSLOG_DEFAULT_PORT };
        }

        const parts = splitBracketed(arg);
        if (!parts) {
          throw invalidArgument(`Invalid IP address: ${arg}, expected IPv4 or IPv6 address`);
        }
        const port = parts.port === undefined ? SYSLOG_DEFAULT_PORT : parsePort(parts.port);
        const ip = tryParseIp(parts.host);
        if (!ip) {
          throw invalidArgument(`Invalid IP address: ${parts.host}, expected IPv4 or IPv6 address`);
        }
        return { host: ip.address, port };
      }
    }
  }

  // ─── 가변 길이 목록 ────────────────────────────────────────────────────────

  /** 남은 인수 전부 (최소 1개) */
  asTextList(): string[] {
    return this.collect(() => this.asText());
  }

  asIpAddressList(): IpAddress[] {
    return this.collect(() => this.asIpAddress());
  }

  asIpOrFQDNList(): string[] {
    return this.collect(() => this.asIpOrFQDN());
  }

  private collect<T>(next: () => T): T[] {
    if (this.peek() === undefined) {
      throw invalidArgument('Not enough arguments');
    }
    const values: T[] = [];
    while (this.peek() !== undefined) {
      values.push(next());
    }
    return values;
  }
}

// ─── 내부 유틸 ─────────────────────────────────────────────────────────────────

function tryParseIp(text: string): IpAddress | undefined {
  try {
    return parseIpLiteral(text);
  } catch (err) {
    if (isNetconfigError(err)) return undefined;
    throw err;
  }
}

function parseAddrMask(text: string, policy: PrefixPolicy): IpAddrMask | undefined {
  const delim = text.lastIndexOf('/');

  if (delim === -1) {
    if (policy === 'required') return undefined;
    const ip = tryParseIp(text);
    return ip && { ...ip, prefix: defaultPrefix(ip.ver) };
  }

  const prefixText = text.slice(delim + 1);
  if (!isNumericToken(prefixText)) return undefined;

  const ip = tryParseIp(text.slice(0, delim));
  if (!ip) return undefined;

  const prefix = parseInt(prefixText, 10);
  return prefixIsValid(ip.ver, prefix) ? { ...ip, prefix } : undefined;
}

export type { IpAddress, IpVer, Endpoint };
