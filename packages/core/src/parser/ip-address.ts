/**
 * IP 리터럴 파서
 *
 * - IPv4: 점으로 구분된 10진수 4개, 각 0-255, 선행 0 불허
 * - IPv6: 1-4자리 16진수 그룹, `::` 최대 1회, 마지막에 IPv4 표기 허용
 *
 * 파싱한 바이너리 주소를 다시 직렬화해 정규형(canonical form)을 돌려준다.
 * 예) 2001:0db8:85a3:0000:0000:8a2e:0370:7334 → 2001:db8:85a3::8a2e:370:7334
 */

import { invalidArgument } from '../utils/errors.js';

export type IpVer = 4 | 6;

export interface IpAddress {
  ver: IpVer;
  /** 정규형 주소 문자열 */
  address: string;
}

export const IP4_MAX_PREFIX = 32;
export const IP6_MAX_PREFIX = 64;

const IPV4_PATTERN = /^(0|[1-9][0-9]{0,2})\.(0|[1-9][0-9]{0,2})\.(0|[1-9][0-9]{0,2})\.(0|[1-9][0-9]{0,2})$/;
const HEX_GROUP = /^[0-9a-f]{1,4}$/i;

// ─── IPv4 ────────────────────────────────────────────────────────────────────

export function parseIPv4(text: string): [number, number, number, number] | undefined {
  const match = IPV4_PATTERN.exec(text);
  if (!match) return undefined;

  const octets = match.slice(1).map(o => parseInt(o, 10));
  const [a, b, c, d] = octets;
  if (a === undefined || b === undefined || c === undefined || d === undefined) {
    return undefined;
  }
  if (octets.some(o => o > 255)) return undefined;
  return [a, b, c, d];
}

// ─── IPv6 ────────────────────────────────────────────────────────────────────

/**
 * 콜론 그룹 목록 → 16비트 워드 배열
 * @param allowV4Tail 마지막 그룹에 IPv4 표기 허용 여부
 */
function parseGroups(part: string, allowV4Tail: boolean): number[] | undefined {
  if (part === '') return [];

  const pieces = part.split(':');
  const words: number[] = [];

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i] ?? '';

    if (allowV4Tail && i === pieces.length - 1 && piece.includes('.')) {
      const v4 = parseIPv4(piece);
      if (!v4) return undefined;
      words.push((v4[0] << 8) | v4[1], (v4[2] << 8) | v4[3]);
      continue;
    }

    if (!HEX_GROUP.test(piece)) return undefined;
    words.push(parseInt(piece, 16));
  }

  return words;
}

export function parseIPv6(text: string): number[] | undefined {
  const gap = text.indexOf('::');

  if (gap === -1) {
    const words = parseGroups(text, true);
    return words?.length === 8 ? words : undefined;
  }

  // `::` 는 한 번만
  if (text.indexOf('::', gap + 1) !== -1) return undefined;

  const head = parseGroups(text.slice(0, gap), false);
  const tail = parseGroups(text.slice(gap + 2), true);
  if (!head || !tail) return undefined;

  // `::` 는 최소 한 개의 0 그룹을 대신한다
  const zeros = 8 - head.length - tail.length;
  if (zeros < 1) return undefined;

  return [...head, ...new Array<number>(zeros).fill(0), ...tail];
}

/**
 * 16비트 워드 8개 → 정규형 문자열
 * 가장 긴 0 그룹 구간(2개 이상, 동률이면 앞쪽)을 `::` 로 압축
 */
export function formatIPv6(words: readonly number[]): string {
  let best = { base: -1, len: 0 };
  let cur = { base: -1, len: 0 };

  for (let i = 0; i < 8; i++) {
    if (words[i] === 0) {
      cur = cur.base === -1 ? { base: i, len: 1 } : { base: cur.base, len: cur.len + 1 };
    } else if (cur.base !== -1) {
      if (best.base === -1 || cur.len > best.len) best = cur;
      cur = { base: -1, len: 0 };
    }
  }
  if (cur.base !== -1 && (best.base === -1 || cur.len > best.len)) best = cur;
  if (best.base !== -1 && best.len < 2) best = { base: -1, len: 0 };

  // ::a.b.c.d (IPv4-compatible), ::ffff:a.b.c.d (IPv4-mapped)
  const dottedTail =
    best.base === 0 &&
    (best.len === 6 ||
      (best.len === 7 && words[7] !== 0x0001) ||
      (best.len === 5 && words[5] === 0xffff));

  let out = '';
  for (let i = 0; i < 8; i++) {
    if (best.base !== -1 && i >= best.base && i < best.base + best.len) {
      if (i === best.base) out += ':';
      continue;
    }
    if (i !== 0) out += ':';
    if (i === 6 && dottedTail) {
      const hi = words[6] ?? 0;
      const lo = words[7] ?? 0;
      out += [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff].join('.');
      break;
    }
    out += (words[i] ?? 0).toString(16);
  }
  if (best.base !== -1 && best.base + best.len === 8) out += ':';

  return out;
}

// ─── 공개 API ────────────────────────────────────────────────────────────────

/**
 * IP 리터럴 파싱 + 정규화
 * @throws NetconfigError(INVALID_ARGUMENT) IPv4, IPv6 어느 쪽도 아닐 때
 */
export function parseIpLiteral(text: string): IpAddress {
  const v4 = parseIPv4(text);
  if (v4) {
    return { ver: 4, address: v4.join('.') };
  }

  const v6 = parseIPv6(text);
  if (v6) {
    return { ver: 6, address: formatIPv6(v6) };
  }

  throw invalidArgument(`Invalid IP address: ${text}`);
}

/** IP 버전 확인 (IP 가 아니면 undefined) */
export function ipVersionOf(text: string): IpVer | undefined {
  if (parseIPv4(text)) return 4;
  if (parseIPv6(text)) return 6;
  return undefined;
}

/** 버전별 프리픽스 길이 범위 확인. /0 은 항상 거부 */
export function prefixIsValid(ver: IpVer, prefix: number): boolean {
  if (!Number.isInteger(prefix) || prefix < 1) return false;
  return prefix <= (ver === 4 ? IP4_MAX_PREFIX : IP6_MAX_PREFIX);
}

/** 프리픽스 생략 시 기본값 */
export function defaultPrefix(ver: IpVer): number {
  return ver === 4 ? 24 : 64;
}
