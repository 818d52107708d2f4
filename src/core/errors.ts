/**
 * contents-stats 에러 타입
 */

export class ContentsStatsError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = 'ContentsStatsError';
  }
}

/**
 * 파일명과 패키지 목록 사이에 공백 구분자가 없는 줄
 */
export class MalformedLineError extends ContentsStatsError {
  readonly line: string;
  readonly lineNumber?: number;

  constructor(line: string, lineNumber?: number) {
    const where = lineNumber !== undefined ? `${lineNumber}번째 줄` : '줄';
    super(`잘못된 형식의 ${where}입니다 (공백 구분자 없음): ${JSON.stringify(line)}`);
    this.name = 'MalformedLineError';
    this.line = line;
    this.lineNumber = lineNumber;
  }

  /** 줄 번호를 붙인 새 에러 */
  withLineNumber(lineNumber: number): MalformedLineError {
    return new MalformedLineError(this.line, lineNumber);
  }
}

export class InvalidSelectionError extends ContentsStatsError {
  readonly value: string;

  constructor(value: string) {
    super(`잘못된 패키지 수입니다: ${value} (0 이상의 정수 또는 'all')`);
    this.name = 'InvalidSelectionError';
    this.value = value;
  }
}

export class UnsupportedArchitectureError extends ContentsStatsError {
  readonly architecture: string;

  constructor(architecture: string, supported: Iterable<string>) {
    super(
      `지원하지 않는 아키텍처입니다: ${architecture}\n` +
        `지원 아키텍처: ${Array.from(supported).join(' ')}`
    );
    this.name = 'UnsupportedArchitectureError';
    this.architecture = architecture;
  }
}

export class NetworkError extends ContentsStatsError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause?: Error) {
    super(`${url} 다운로드 실패 (${attempts}회 시도): ${cause?.message ?? '알 수 없는 오류'}`, {
      cause,
    });
    this.name = 'NetworkError';
    this.url = url;
    this.attempts = attempts;
  }
}

export class DecompressionError extends ContentsStatsError {
  constructor(source: string, cause?: Error) {
    super(`gzip 해제 실패: ${source}${cause ? ` (${cause.message})` : ''}`, { cause });
    this.name = 'DecompressionError';
  }
}

export class ConfigError extends ContentsStatsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
