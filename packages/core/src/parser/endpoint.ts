/**
 * HOST[:PORT] 엔드포인트 보조 함수
 */

import { invalidArgument } from '../utils/errors.js';
import { isNumericToken } from './numeric.js';

export interface Endpoint {
  /** IP 정규형 또는 FQDN */
  host: string;
  port: number;
}

/** 원격 syslog 기본 포트 */
export const SYSLOG_DEFAULT_PORT = 514;
export const PORT_MAX = 65535;

/**
 * 10진수 포트 번호 파싱 (1-65535)
 * @throws NetconfigError(INVALID_ARGUMENT)
 */
export function parsePort(text: string): number {
  if (isNumericToken(text)) {
    const port = parseInt(text, 10);
    if (port > 0 && port <= PORT_MAX) {
      return port;
    }
  }
  throw invalidArgument(
    `Invalid port number: ${text}, expected an integer in the range 1 - ${PORT_MAX}`,
  );
}

export function countColons(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === ':') count++;
  }
  return count;
}

/** "[2001:db8::1]:530" → host / port 문자열 분리 (대괄호가 닫히지 않으면 undefined) */
export function splitBracketed(text: string): { host: string; port: string | undefined } | undefined {
  const close = text.indexOf(']');
  if (!text.startsWith('[') || close === -1) return undefined;

  const host = text.slice(1, close);
  const rest = text.slice(close + 1);
  if (rest === '') return { host, port: undefined };
  // "]" 뒤에는 ":PORT" 만 올 수 있음
  return { host, port: rest.startsWith(':') ? rest.slice(1) : rest };
}
