/**
 * busctl 기반 NetworkBus 구현
 *
 * - busctl --json=short 로 호출하고 JSON 응답을 일반 값으로 변환
 * - 인수는 busctl 명령행 형식으로 인코딩 (시그니처 뒤에 값 나열)
 *     as ["a", "b"]  →  as 2 a b
 * - busctl 이 0 이 아닌 코드로 끝나면 BUS_CALL_FAILED (stderr 포함)
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { NetconfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { IFACE, METHOD } from './objects.js';
import type {
  BusTarget,
  BusValue,
  ManagedObjects,
  NetworkBus,
  Properties,
  PropertyValue,
} from './types.js';

const execFileAsync = promisify(execFile);

/** 외부 명령 실행 → stdout */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, { encoding: 'utf8', timeout: timeoutMs });
  return stdout;
};

export interface BusctlOptions {
  /** busctl 실행 파일 (기본: busctl) */
  command?: string;
  /** 원격 호스트 (busctl -H), 비어 있으면 로컬 시스템 버스 */
  host?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

const DEFAULT_TIMEOUT_MS = 25_000;

// ─── 인코딩 / 디코딩 ──────────────────────────────────────────────────────────

function encodeValue(value: BusValue): string[] {
  switch (value.type) {
    case 's':
      return [value.value];
    case 'b':
      return [value.value ? 'true' : 'false'];
    case 'y':
    case 'q':
    case 'u':
      return [String(value.value)];
    case 'as':
      return [String(value.value.length), ...value.value];
  }
}

/** [시그니처, 값...] 형식의 busctl 인수 */
export function encodeArgs(values: readonly BusValue[]): string[] {
  if (values.length === 0) return [];
  const signature = values.map(v => v.type).join('');
  return [signature, ...values.flatMap(encodeValue)];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPropertyValue(data: unknown): PropertyValue | undefined {
  if (typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }
  if (Array.isArray(data) && data.every((item): item is string => typeof item === 'string')) {
    return data;
  }
  return undefined;
}

/** {"type":"s","data":"..."} → "..." */
export function decodeVariant(raw: unknown): PropertyValue | undefined {
  if (!isRecord(raw) || typeof raw['type'] !== 'string') return undefined;
  return toPropertyValue(raw['data']);
}

/**
 * GetManagedObjects 응답 디코딩
 * 알 수 없는 타입(구조체 등)의 프로퍼티는 건너뛴다
 */
export function decodeManagedObjects(raw: unknown): ManagedObjects | undefined {
  if (!isRecord(raw) || !Array.isArray(raw['data'])) return undefined;
  const [objects] = raw['data'];
  if (!isRecord(objects)) return undefined;

  const result: ManagedObjects = {};
  for (const [path, ifaces] of Object.entries(objects)) {
    if (!isRecord(ifaces)) continue;
    const decodedIfaces: Record<string, Properties> = {};
    for (const [iface, props] of Object.entries(ifaces)) {
      if (!isRecord(props)) continue;
      const decoded: Properties = {};
      for (const [name, variant] of Object.entries(props)) {
        const value = decodeVariant(variant);
        if (value !== undefined) decoded[name] = value;
      }
      decodedIfaces[iface] = decoded;
    }
    result[path] = decodedIfaces;
  }
  return result;
}

function failureReason(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string') {
    const stderr = err.stderr.trim();
    if (stderr) return stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

// ─── BusctlBus ───────────────────────────────────────────────────────────────

export class BusctlBus implements NetworkBus {
  private readonly command: string;
  private readonly host: string | undefined;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: BusctlOptions = {}) {
    this.command = options.command ?? 'busctl';
    this.host = options.host || undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
  }

  async call(target: BusTarget, method: string, args: readonly BusValue[] = []): Promise<void> {
    await this.exec(`${target.object} ${target.iface}.${method}`, [
      'call',
      target.service,
      target.object,
      target.iface,
      method,
      ...encodeArgs(args),
    ]);
  }

  async getProperty(target: BusTarget, name: string): Promise<PropertyValue> {
    const label = `${target.object} ${target.iface}.${name}`;
    const raw = await this.execJson(label, [
      'get-property',
      target.service,
      target.object,
      target.iface,
      name,
    ]);
    const value = decodeVariant(raw);
    if (value === undefined) {
      throw new NetconfigError({ code: 'BUS_REPLY_INVALID', target: label, reason: 'unsupported value type' });
    }
    return value;
  }

  async setProperty(target: BusTarget, name: string, value: BusValue): Promise<void> {
    await this.exec(`${target.object} ${target.iface}.${name}`, [
      'set-property',
      target.service,
      target.object,
      target.iface,
      name,
      ...encodeArgs([value]),
    ]);
  }

  async getManagedObjects(service: string, root: string): Promise<ManagedObjects> {
    const label = `${root} ${IFACE.objectManager}.${METHOD.getManagedObjects}`;
    const raw = await this.execJson(label, [
      'call',
      service,
      root,
      IFACE.objectManager,
      METHOD.getManagedObjects,
    ]);
    const objects = decodeManagedObjects(raw);
    if (!objects) {
      throw new NetconfigError({ code: 'BUS_REPLY_INVALID', target: label, reason: 'malformed object list' });
    }
    return objects;
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private async exec(label: string, args: string[]): Promise<string> {
    const fullArgs = [
      '--json=short',
      ...(this.host ? [`--host=${this.host}`] : []),
      // 이후 토큰은 '-' 로 시작해도 옵션이 아님
      '--',
      ...args,
    ];
    logger.debug(`${this.command} ${fullArgs.join(' ')}`);

    try {
      return await this.runner(this.command, fullArgs, this.timeoutMs);
    } catch (err) {
      throw new NetconfigError({ code: 'BUS_CALL_FAILED', target: label, reason: failureReason(err) });
    }
  }

  private async execJson(label: string, args: string[]): Promise<unknown> {
    const stdout = await this.exec(label, args);
    try {
      const parsed: unknown = JSON.parse(stdout);
      return parsed;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new NetconfigError({ code: 'BUS_REPLY_INVALID', target: label, reason: msg });
    }
  }
}
