import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { DEFAULT_CONFIG, getConfigManager, type LogLevel } from '../core/config';
import { ConfigError } from '../core/errors';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

class Logger {
  private logger: winston.Logger;
  private initialized = false;
  private verbose = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용). 테스트 중에는 출력하지 않음
    this.logger = winston.createLogger({
      level: 'info',
      format: logFormat,
      silent: process.env.VITEST === 'true',
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn', 'info', 'debug'],
        }),
      ],
    });
  }

  /**
   * 초기화 전에 호출하면 콘솔(stderr)에도 debug 레벨로 기록합니다.
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로와 레벨을 가져옵니다.
   * CLI 출력과 섞이지 않도록 개발 모드가 아니면 파일에만 기록합니다.
   * 설정 파일이 깨져 있으면 기본 로그 레벨을 씁니다.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();

    let level: LogLevel = 'debug';
    let configProblem: string | null = null;
    if (!isDev && !this.verbose) {
      try {
        level = configManager.getConfig().logLevel;
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        level = DEFAULT_CONFIG.logLevel;
        configProblem = error.message;
      }
    }

    // 파일 로테이션 트랜스포트 설정
    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d', // 30일 보관
      format: logFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    // 트랜스포트 배열 구성
    const transports: winston.transport[] = [fileTransport, errorFileTransport];

    // 개발 모드 또는 --verbose 에서만 콘솔 로깅 추가 (stderr)
    if (isDev || this.verbose) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn', 'info', 'debug'],
        })
      );
    }

    // 로거 재설정
    this.logger = winston.createLogger({
      level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir, level });
    if (configProblem) {
      this.warn('설정 파일을 읽지 못해 기본 로그 레벨을 사용합니다', { reason: configProblem });
    }
  }

  getLevel(): string {
    return this.logger.level;
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
