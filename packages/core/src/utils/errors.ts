/**
 * netconfig 에러 타입 정의 및 유틸리티
 *
 * 인수 검증 실패는 모두 INVALID_ARGUMENT 하나로 보고한다.
 * 구문 오류와 범위 오류는 메시지로만 구분된다.
 */

// ─── 에러 타입 ──────────────────────────────────────────────────────────────

export type NetconfigErrorDetail =
  | { code: 'INVALID_ARGUMENT';  message: string }
  | { code: 'VALUE_EXISTS';      value: string }
  | { code: 'VALUE_NOT_FOUND';   value: string }
  | { code: 'BUS_CALL_FAILED';   target: string; reason: string }
  | { code: 'BUS_REPLY_INVALID'; target: string; reason: string }
  | { code: 'CONFIG_INVALID';    reason: string };

export type NetconfigErrorCode = NetconfigErrorDetail['code'];

/** NetconfigErrorDetail → 사용자에게 출력할 한 줄 메시지 */
export function formatNetconfigError(detail: NetconfigErrorDetail): string {
  switch (detail.code) {
    case 'INVALID_ARGUMENT':
      return detail.message;
    case 'VALUE_EXISTS':
      return `Value ${detail.value} already exists`;
    case 'VALUE_NOT_FOUND':
      return `Value ${detail.value} not found`;
    case 'BUS_CALL_FAILED':
      return `D-Bus call failed (${detail.target}): ${detail.reason}`;
    case 'BUS_REPLY_INVALID':
      return `Unexpected D-Bus reply (${detail.target}): ${detail.reason}`;
    case 'CONFIG_INVALID':
      return `Invalid configuration: ${detail.reason}`;
  }
}

export class NetconfigError extends Error {
  constructor(public readonly detail: NetconfigErrorDetail) {
    super(formatNetconfigError(detail));
    this.name = 'NetconfigError';
  }

  get code(): NetconfigErrorCode {
    return this.detail.code;
  }
}

/** NetconfigError인지 타입 가드 */
export function isNetconfigError(err: unknown): err is NetconfigError {
  return err instanceof NetconfigError;
}

/** 인수 검증 실패 */
export function invalidArgument(message: string): NetconfigError {
  return new NetconfigError({ code: 'INVALID_ARGUMENT', message });
}
