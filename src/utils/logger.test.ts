import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Logger } from './logger';

// 파일 로테이션 대신 메모리 스트림에 기록
vi.mock('winston-daily-rotate-file', async () => {
  const winston = await import('winston');
  const { PassThrough } = await import('stream');
  return {
    default: vi.fn(function (options: { level?: string }) {
      return new winston.transports.Stream({ level: options.level, stream: new PassThrough() });
    }),
  };
});

describe('Logger.initialize', () => {
  let homeDir: string;
  let settingsPath: string;

  beforeAll(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'contents-stats-logger-'));
    settingsPath = path.join(homeDir, 'settings.json');
    vi.stubEnv('CONTENTS_STATS_HOME', homeDir);
  });

  afterAll(() => {
    vi.unstubAllEnvs();
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.mocked(DailyRotateFile).mockClear();
    fs.rmSync(settingsPath, { force: true });
  });

  it('설정의 logLevel 사용, 로그는 <home>/logs 에 기록', async () => {
    fs.writeFileSync(settingsPath, JSON.stringify({ logLevel: 'warn' }));
    const logger = new Logger();

    await logger.initialize();

    expect(logger.getLevel()).toBe('warn');
    expect(vi.mocked(DailyRotateFile)).toHaveBeenCalledTimes(2);
    expect(vi.mocked(DailyRotateFile).mock.calls[0][0]).toMatchObject({
      dirname: path.join(homeDir, 'logs'),
      filename: 'app-%DATE%.log',
    });
  });

  it('깨진 settings.json 이어도 기본 레벨로 초기화', async () => {
    fs.writeFileSync(settingsPath, '{not json');
    const logger = new Logger();

    await expect(logger.initialize()).resolves.toBeUndefined();
    expect(logger.getLevel()).toBe('info');
  });

  it('--verbose 이면 설정을 읽지 않고 debug', async () => {
    fs.writeFileSync(settingsPath, '[1, 2]');
    const logger = new Logger();
    logger.setVerbose(true);

    await logger.initialize();

    expect(logger.getLevel()).toBe('debug');
  });
});
