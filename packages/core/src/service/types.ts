/**
 * 원격 네트워크 관리 서비스와의 경계
 */

/** D-Bus 로 보내는 값 (시그니처 + 값) */
export type BusValue =
  | { type: 's'; value: string }
  | { type: 'b'; value: boolean }
  | { type: 'y' | 'q' | 'u'; value: number }
  | { type: 'as'; value: string[] };

export type BusSignature = BusValue['type'];

/** 서비스에서 읽어 온 프로퍼티 값 */
export type PropertyValue = string | number | boolean | string[];
export type Properties = Record<string, PropertyValue>;

/** 오브젝트 경로 → 인터페이스 → 프로퍼티 */
export type ManagedObjects = Record<string, Record<string, Properties>>;

export interface BusTarget {
  service: string;
  object: string;
  iface: string;
}

export interface NetworkBus {
  /** 메서드 호출 (응답 값은 사용하지 않음) */
  call(target: BusTarget, method: string, args?: readonly BusValue[]): Promise<void>;
  getProperty(target: BusTarget, name: string): Promise<PropertyValue>;
  setProperty(target: BusTarget, name: string, value: BusValue): Promise<void>;
  getManagedObjects(service: string, root: string): Promise<ManagedObjects>;
}

export const busValue = {
  str: (value: string): BusValue => ({ type: 's', value }),
  bool: (value: boolean): BusValue => ({ type: 'b', value }),
  byte: (value: number): BusValue => ({ type: 'y', value }),
  uint16: (value: number): BusValue => ({ type: 'q', value }),
  uint32: (value: number): BusValue => ({ type: 'u', value }),
  strings: (value: string[]): BusValue => ({ type: 'as', value }),
};
