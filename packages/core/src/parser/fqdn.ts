/**
 * FQDN 문법 검사
 *
 * RFC 2181: 전체 이름은 구분자 포함 255 옥텟 이하, 각 레이블은 63 옥텟 이하
 * RFC 1123 (2.1): 레이블은 숫자로 시작할 수 있고 전부 숫자여도 된다
 * RFC 1738 (3.1): 가장 오른쪽 레이블은 숫자로 시작하지 않는다
 */

export const FQDN_MAX_LENGTH = 255;
export const FQDN_MAX_LABELS = 127;

// 영문/숫자/하이픈, 하이픈으로 시작하거나 끝나지 않음, 1-63자
const LABEL = /^(?!-)[a-z0-9-]{0,62}[a-z0-9]$/i;
const LEADING_DIGIT = /^[0-9]/;

export function isFqdn(name: string): boolean {
  if (name.length < 1 || name.length > FQDN_MAX_LENGTH) return false;

  // 끝의 점 하나는 허용
  const body = name.endsWith('.') ? name.slice(0, -1) : name;
  const labels = body.split('.');
  if (labels.length > FQDN_MAX_LABELS) return false;
  if (!labels.every(label => LABEL.test(label))) return false;

  // 레이블이 하나뿐이면 호스트 이름 (숫자만으로 구성 가능)
  const last = labels[labels.length - 1] ?? '';
  return labels.length === 1 || !LEADING_DIGIT.test(last);
}
