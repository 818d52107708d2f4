/**
 * 출력할 패키지 수 선택값
 */

import { InvalidSelectionError } from '../errors';

export type Selection = { kind: 'all' } | { kind: 'top'; count: number };

/** 'all' 로 해석되는 토큰 */
const ALL_TOKEN = 'all';

export function selectAll(): Selection {
  return { kind: 'all' };
}

export function selectTop(count: number): Selection {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidSelectionError(String(count));
  }
  return { kind: 'top', count };
}

/**
 * CLI 인자를 Selection으로 변환합니다.
 * `all`과 `0`은 전체, 그 외 0 이상의 정수는 상위 N개입니다.
 */
export function parseSelection(token: string): Selection {
  const value = token.trim();

  if (value.toLowerCase() === ALL_TOKEN) {
    return selectAll();
  }
  if (!/^\d+$/.test(value)) {
    throw new InvalidSelectionError(token);
  }

  const count = Number(value);
  if (count === 0) {
    return selectAll();
  }
  if (!Number.isSafeInteger(count)) {
    throw new InvalidSelectionError(token);
  }
  return selectTop(count);
}

export function formatSelection(selection: Selection): string {
  return selection.kind === 'all' ? ALL_TOKEN : String(selection.count);
}
