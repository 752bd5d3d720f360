/**
 * NetworkBus 위의 공통 동작
 *
 * - 문자열 배열 프로퍼티에 값 추가/삭제 (이미 있거나 없으면 실패)
 * - 이더넷 오브젝트에 속한 IP 주소 목록
 */

import { NetconfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { IFACE, OBJECT, PROP, SERVICE } from './objects.js';
import { busValue, type BusTarget, type ManagedObjects, type NetworkBus } from './types.js';

export interface IpAddressEntry {
  /** IP 오브젝트 경로 */
  object: string;
  address: string;
  prefix: number;
  /** 게이트웨이 (없으면 빈 문자열) */
  gateway: string;
}

export class NetworkService {
  constructor(public readonly bus: NetworkBus) {}

  /** 문자열 배열 프로퍼티에 값 추가 */
  async append(target: BusTarget, name: string, values: readonly string[]): Promise<void> {
    const current = await this.getStrings(target, name);
    for (const value of values) {
      if (current.includes(value)) {
        throw new NetconfigError({ code: 'VALUE_EXISTS', value });
      }
      current.push(value);
    }
    await this.bus.setProperty(target, name, busValue.strings(current));
  }

  /** 문자열 배열 프로퍼티에서 값 삭제 */
  async remove(target: BusTarget, name: string, values: readonly string[]): Promise<void> {
    let current = await this.getStrings(target, name);
    for (const value of values) {
      if (!current.includes(value)) {
        throw new NetconfigError({ code: 'VALUE_NOT_FOUND', value });
      }
      current = current.filter(v => v !== value);
    }
    await this.bus.setProperty(target, name, busValue.strings(current));
  }

  async getStrings(target: BusTarget, name: string): Promise<string[]> {
    const value = await this.bus.getProperty(target, name);
    if (!Array.isArray(value)) {
      throw new NetconfigError({
        code: 'BUS_REPLY_INVALID',
        target: `${target.object} ${target.iface}.${name}`,
        reason: 'expected an array of strings',
      });
    }
    return [...value];
  }

  async getNetworkObjects(): Promise<ManagedObjects> {
    return this.bus.getManagedObjects(SERVICE.network, OBJECT.root);
  }

  /**
   * 이더넷(또는 VLAN) 오브젝트의 IP 주소 목록
   * @param objects 이미 읽어 둔 오브젝트 목록 (없으면 새로 조회)
   */
  async getAddresses(ethObject: string, objects?: ManagedObjects): Promise<IpAddressEntry[]> {
    const all = objects ?? (await this.getNetworkObjects());
    const pathPrefix = `${ethObject}/ip`;
    const addresses: IpAddressEntry[] = [];

    for (const [path, ifaces] of Object.entries(all)) {
      if (!path.startsWith(pathPrefix)) continue;
      const props = ifaces[IFACE.ip];
      if (!props) continue;

      const address = props[PROP.address];
      const prefix = props[PROP.prefixLength];
      const gateway = props[PROP.gateway];
      if (typeof address !== 'string' || typeof prefix !== 'number') {
        logger.debug(`IP 오브젝트 형식 오류, 건너뜀: ${path}`);
        continue;
      }
      addresses.push({
        object: path,
        address,
        prefix,
        gateway: typeof gateway === 'string' ? gateway : '',
      });
    }

    return addresses;
  }
}
