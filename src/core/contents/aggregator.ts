/**
 * 패키지별 파일 수 집계
 */

import { MalformedLineError } from '../errors';
import { parsePackages } from './line-parser';

/** 헤더 줄의 패키지 컬럼 이름 */
const HEADER_LOCATION = 'LOCATION';
/** 헤더 줄의 파일 컬럼 이름 */
const HEADER_FILE = 'FILE';

/**
 * 텍스트를 줄 단위로 나눕니다.
 * 마지막 개행 뒤의 빈 조각은 줄로 치지 않습니다.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * `FILE  LOCATION` 형식의 헤더 줄인지 확인합니다.
 */
export function isHeaderLine(line: string): boolean {
  if (!line.includes(HEADER_FILE)) {
    return false;
  }

  let packages: string[];
  try {
    packages = parsePackages(line);
  } catch (error) {
    if (error instanceof MalformedLineError) {
      return false;
    }
    throw error;
  }

  return packages.length === 1 && packages[0] === HEADER_LOCATION;
}

/**
 * Contents 텍스트 전체를 읽어 패키지 → 파일 수 맵을 만듭니다.
 *
 * 첫 줄이 헤더면 건너뜁니다. 그 외에 구분자가 없는 줄이 하나라도 있으면
 * 줄 번호를 담은 MalformedLineError로 전체 집계가 실패합니다.
 */
export function countFiles(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  const lines = splitLines(text);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (index === 0 && isHeaderLine(line)) {
      continue;
    }

    let packages: string[];
    try {
      packages = parsePackages(line);
    } catch (error) {
      if (error instanceof MalformedLineError) {
        throw error.withLineNumber(index + 1);
      }
      throw error;
    }

    for (const name of packages) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }

  return counts;
}
