/**
 * MAC 주소 리터럴 검사
 * 1-2자리 16진수 6개, 구분자는 `:` 또는 `-` 중 한 종류만
 *   01:23:45:67:89:ab  ✓
 *   01-23-45-67-89-AB  ✓
 *   01.23.45-67-89:ab  ✗
 */

const OCTET = /^[0-9a-f]{1,2}$/i;

export function isMacAddress(text: string): boolean {
  const separator = text.includes(':') ? ':' : '-';
  const octets = text.split(separator);
  return octets.length === 6 && octets.every(o => OCTET.test(o));
}
