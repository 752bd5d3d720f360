/**
 * netconfig.config.yml 로더
 *
 * 탐색 순서: 명시적 경로 → $NETCONFIG_CONFIG → ./netconfig.config.yml → /etc/netconfig.yml
 * 파일이 없으면 기본값으로 동작한다.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { NetconfigError } from './utils/errors.js';
import type { PrefixPolicy } from './parser/arguments.js';

export interface NetconfigConfig {
  network: {
    /** VLAN 생성 및 인터페이스 생략 시 사용할 기본 인터페이스 */
    defaultInterface: string;
  };

  ip: {
    /** `ip add` 에서 /PREFIX 생략 시 처리 */
    prefixPolicy: PrefixPolicy;
  };

  bus: {
    command: string;
    /** busctl -H 대상, 빈 문자열이면 로컬 버스 */
    host: string;
    timeoutMs: number;
  };
}

export interface LoadedConfig {
  config: NetconfigConfig;
  /** 읽은 파일 경로 (기본값 사용 시 undefined) */
  path: string | undefined;
}

// ─── 기본값 ──────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: NetconfigConfig = {
  network: {
    defaultInterface: 'eth0',
  },
  ip: {
    prefixPolicy: 'default',
  },
  bus: {
    command: 'busctl',
    host: '',
    timeoutMs: 25_000,
  },
};

export const CONFIG_FILES = ['netconfig.config.yml', 'netconfig.config.yaml'];
export const SYSTEM_CONFIG_FILE = '/etc/netconfig.yml';

// ─── ENV 변수 치환 ─────────────────────────────────────────────────────────────

function substituteEnv(value: string, env: NodeJS.ProcessEnv): string {
  // ${ENV_VAR} 형식 치환
  return value.replace(/\$\{([^}]+)\}/g, (_, key: string) => {
    const envVal = env[key];
    if (envVal === undefined) {
      throw new NetconfigError({ code: 'CONFIG_INVALID', reason: `environment variable ${key} is not set` });
    }
    return envVal;
  });
}

function substituteEnvDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return substituteEnv(obj, env);
  if (Array.isArray(obj)) return obj.map(item => substituteEnvDeep(item, env));
  if (isRecord(obj)) {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [k, substituteEnvDeep(v, env)]),
    );
  }
  return obj;
}

// ─── loadConfig ───────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const filePath = resolveConfigPath(options.configPath, cwd, env);
  if (!filePath) {
    return { config: structuredClone(DEFAULT_CONFIG), path: undefined };
  }

  const raw = readConfigFile(filePath);
  return { config: parseConfig(substituteEnvDeep(raw, env)), path: filePath };
}

/**
 * YAML 문서 → NetconfigConfig (기본값과 병합 + 값 검증)
 */
export function parseConfig(raw: unknown): NetconfigConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) invalid('top level must be a mapping');

  const network = section(raw, 'network');
  const defaultInterface = network['defaultInterface'];
  if (defaultInterface !== undefined) {
    if (typeof defaultInterface !== 'string' || !defaultInterface) {
      invalid('network.defaultInterface must be a non-empty string');
    }
    config.network.defaultInterface = defaultInterface;
  }

  const ip = section(raw, 'ip');
  const prefixPolicy = ip['prefixPolicy'];
  if (prefixPolicy !== undefined) {
    if (prefixPolicy !== 'default' && prefixPolicy !== 'required') {
      invalid(`ip.prefixPolicy must be "default" or "required", got ${String(prefixPolicy)}`);
    }
    config.ip.prefixPolicy = prefixPolicy;
  }

  const bus = section(raw, 'bus');
  const command = bus['command'];
  if (command !== undefined) {
    if (typeof command !== 'string' || !command) invalid('bus.command must be a non-empty string');
    config.bus.command = command;
  }
  const host = bus['host'];
  if (host !== undefined && host !== null) {
    if (typeof host !== 'string') invalid('bus.host must be a string');
    config.bus.host = host;
  }
  const timeoutMs = bus['timeoutMs'];
  if (timeoutMs !== undefined) {
    if (typeof timeoutMs !== 'number' || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      invalid('bus.timeoutMs must be a positive integer');
    }
    config.bus.timeoutMs = timeoutMs;
  }

  return config;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): never {
  throw new NetconfigError({ code: 'CONFIG_INVALID', reason });
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) invalid(`${key} must be a mapping`);
  return value;
}

function resolveConfigPath(
  configPath: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const explicit = configPath ?? env['NETCONFIG_CONFIG'];
  if (explicit) {
    const abs = resolve(cwd, explicit);
    if (!existsSync(abs)) {
      invalid(`file not found: ${abs}`);
    }
    return abs;
  }

  for (const name of CONFIG_FILES) {
    const abs = resolve(cwd, name);
    if (existsSync(abs)) return abs;
  }

  return existsSync(SYSTEM_CONFIG_FILE) ? SYSTEM_CONFIG_FILE : undefined;
}

function readConfigFile(filePath: string): unknown {
  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    return parsed;
  } catch (e) {
    invalid(`${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
}
