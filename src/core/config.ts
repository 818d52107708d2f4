import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from './errors';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// 설정 인터페이스 정의
export interface Config {
  // Debian 미러 (dists/<suite>/<component> 까지)
  mirror: string;
  // Contents-<arch>.gz 저장 위치
  downloadsDir: string;
  // 기본 출력 패키지 수 (0 = 전체)
  defaultTop: number;
  // 요청 타임아웃 (ms)
  requestTimeout: number;
  maxRetries: number;
  logLevel: LogLevel;
}

export type ConfigKey = keyof Config;

// 기본 설정값
export const DEFAULT_CONFIG: Readonly<Config> = {
  mirror: 'http://ftp.uk.debian.org/debian/dists/stable/main',
  downloadsDir: './downloads',
  defaultTop: 10,
  requestTimeout: 60000,
  maxRetries: 3,
  logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// 설정 항목 설명 (config list 용)
export const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  mirror: 'Debian 미러 URL',
  downloadsDir: '다운로드 저장 경로',
  defaultTop: '기본 출력 패키지 수 (0 = 전체)',
  requestTimeout: '요청 타임아웃 (ms)',
  maxRetries: '최대 다운로드 시도 횟수',
  logLevel: '로그 레벨',
};

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * 설정값 하나를 검증합니다. 올바르지 않으면 에러 메시지를 반환합니다.
 */
export function validateConfigValue(key: ConfigKey, value: unknown): string | null {
  switch (key) {
    case 'mirror':
      if (typeof value !== 'string' || !/^https?:\/\//.test(value)) {
        return 'mirror는 http(s) URL이어야 합니다';
      }
      return null;
    case 'downloadsDir':
      if (typeof value !== 'string' || value.length === 0) {
        return 'downloadsDir는 비어 있지 않은 경로여야 합니다';
      }
      return null;
    case 'defaultTop':
    case 'requestTimeout':
      if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
        return `${key}는 0 이상의 정수여야 합니다`;
      }
      return null;
    case 'maxRetries':
      if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
        return 'maxRetries는 1 이상의 정수여야 합니다';
      }
      return null;
    case 'logLevel':
      if (!isLogLevel(value)) {
        return `logLevel은 ${LOG_LEVELS.join(', ')} 중 하나여야 합니다`;
      }
      return null;
  }
}

/**
 * 저장된 값과 기본값을 병합합니다. 타입이 맞지 않는 항목은 기본값을 씁니다.
 */
export function mergeConfig(raw: Record<string, unknown>): Config {
  const config: Config = { ...DEFAULT_CONFIG };

  if (validateConfigValue('mirror', raw.mirror) === null && typeof raw.mirror === 'string') {
    config.mirror = raw.mirror;
  }
  if (
    validateConfigValue('downloadsDir', raw.downloadsDir) === null &&
    typeof raw.downloadsDir === 'string'
  ) {
    config.downloadsDir = raw.downloadsDir;
  }
  if (validateConfigValue('defaultTop', raw.defaultTop) === null && typeof raw.defaultTop === 'number') {
    config.defaultTop = raw.defaultTop;
  }
  if (
    validateConfigValue('requestTimeout', raw.requestTimeout) === null &&
    typeof raw.requestTimeout === 'number'
  ) {
    config.requestTimeout = raw.requestTimeout;
  }
  if (validateConfigValue('maxRetries', raw.maxRetries) === null && typeof raw.maxRetries === 'number') {
    config.maxRetries = raw.maxRetries;
  }
  if (isLogLevel(raw.logLevel)) {
    config.logLevel = raw.logLevel;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = process.env.CONTENTS_STATS_HOME || path.join(os.homedir(), '.contents-stats')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 설정을 동기적으로 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  getConfig(): Config {
    return mergeConfig(this.readRaw());
  }

  /**
   * 설정값을 검증 후 저장합니다.
   */
  set(key: string, value: unknown): void {
    if (!isConfigKey(key)) {
      throw new ConfigError(
        `알 수 없는 설정 키입니다: ${key} (사용 가능: ${Object.keys(DEFAULT_CONFIG).join(', ')})`
      );
    }

    const problem = validateConfigValue(key, value);
    if (problem) {
      throw new ConfigError(problem);
    }

    const raw = this.readRaw();
    raw[key] = value;
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, raw, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }

  private readRaw(): Record<string, unknown> {
    if (!fs.pathExistsSync(this.configPath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.configPath);
    } catch (error) {
      throw new ConfigError(
        `설정 파일을 읽을 수 없습니다: ${this.configPath} (${(error as Error).message})`
      );
    }

    if (!isRecord(raw)) {
      throw new ConfigError(`설정 파일 형식이 올바르지 않습니다: ${this.configPath}`);
    }
    return raw;
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
