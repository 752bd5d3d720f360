/** 숫자 토큰 최대 길이 */
export const MAX_NUMERIC_LEN = 10;

const DIGITS = /^[0-9]+$/;

/**
 * 부호 없는 10진수 토큰인지 확인
 * 음수, 16진수, 10자리를 넘는 값은 거부
 */
export function isNumericToken(text: string | undefined): text is string {
  if (text === undefined || text.length === 0 || text.length > MAX_NUMERIC_LEN) {
    return false;
  }
  return DIGITS.test(text);
}
