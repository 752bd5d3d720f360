/**
 * 호스트의 네트워크 인터페이스 목록
 *
 * /sys/class/net 은 주소가 없는 인터페이스도 포함한다.
 * sysfs 가 없는 환경에서는 os.networkInterfaces() 로 대체.
 * 호출할 때마다 새로 읽는다 (캐시 없음).
 */

import fs from 'node:fs';
import os from 'node:os';
import { logger } from '../utils/logger.js';

export type InterfaceLister = () => string[];

const SYSFS_NET = '/sys/class/net';

export const listNetInterfaces: InterfaceLister = () => {
  try {
    return fs.readdirSync(SYSFS_NET);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.debug(`${SYSFS_NET} 읽기 실패, os.networkInterfaces() 사용: ${msg}`);
    return Object.keys(os.networkInterfaces());
  }
};
