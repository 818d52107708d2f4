/**
 * Contents 인덱스 줄 파서
 *
 * 한 줄은 `<파일명><공백><패키지목록>` 형식입니다. 파일명에는 공백이 들어갈 수
 * 있지만 패키지 목록에는 공백이 없으므로, 줄의 마지막 공백(스페이스 또는 탭)이
 * 구분자가 됩니다.
 */

import { MalformedLineError } from '../errors';

/** 패키지 목록 구분자 */
const PACKAGE_SEPARATOR = ',';

/**
 * text 안에서 chars 중 하나가 마지막으로 나오는 위치를 반환합니다.
 * 없으면 -1
 */
export function findLastOf(text: string, chars: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (chars.includes(text[i])) {
      return i;
    }
  }
  return -1;
}

/**
 * 줄에서 패키지 목록 부분(마지막 공백 뒤)을 잘라냅니다.
 */
export function splitLine(line: string): { filename: string; packageList: string } {
  const separatorIndex = findLastOf(line, ' \t');
  if (separatorIndex === -1) {
    throw new MalformedLineError(line);
  }

  return {
    filename: line.substring(0, separatorIndex).trimEnd(),
    packageList: line.substring(separatorIndex + 1),
  };
}

/**
 * 줄에 연결된 패키지 이름 목록을 반환합니다.
 * 빈 토큰(`a,,b`, `a,`)은 버립니다.
 */
export function parsePackages(line: string): string[] {
  const { packageList } = splitLine(line);
  return packageList.split(PACKAGE_SEPARATOR).filter((name) => name.length > 0);
}
