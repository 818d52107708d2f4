/**
 * 파일 수 상위 K개 패키지 선택
 */

import { BinaryHeap } from './max-heap';
import type { Selection } from './selection';

export interface PackageCount {
  name: string;
  count: number;
}

/**
 * 파일 수 내림차순, 같으면 이름 오름차순
 */
export function comparePackageCounts(a: PackageCount, b: PackageCount): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/**
 * 힙을 O(N)으로 만든 뒤 K번 꺼냅니다: O(N + K log N)
 */
export function topK(counts: ReadonlyMap<string, number>, selection: Selection): PackageCount[] {
  const limit = selection.kind === 'all' ? counts.size : Math.min(selection.count, counts.size);
  if (limit === 0) {
    return [];
  }

  const entries: PackageCount[] = [];
  for (const [name, count] of counts) {
    entries.push({ name, count });
  }

  const heap = new BinaryHeap(entries, comparePackageCounts);
  const result: PackageCount[] = [];

  while (result.length < limit) {
    const next = heap.pop();
    if (next === undefined) {
      break;
    }
    result.push(next);
  }

  return result;
}
