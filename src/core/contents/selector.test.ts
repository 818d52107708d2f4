import { describe, it, expect } from 'vitest';
import { topK, comparePackageCounts } from './selector';
import { selectAll, selectTop, parseSelection, formatSelection } from './selection';
import { BinaryHeap } from './max-heap';
import { InvalidSelectionError } from '../errors';

function mapOf(entries: Record<string, number>): Map<string, number> {
  return new Map(Object.entries(entries));
}

describe('selector', () => {
  describe('BinaryHeap', () => {
    it('비교 함수 순서대로 꺼냄', () => {
      const heap = new BinaryHeap([5, 1, 9, 3, 7], (a, b) => b - a);
      const out: number[] = [];
      let next = heap.pop();
      while (next !== undefined) {
        out.push(next);
        next = heap.pop();
      }
      expect(out).toEqual([9, 7, 5, 3, 1]);
    });

    it('push 후 peek', () => {
      const heap = new BinaryHeap<number>([], (a, b) => a - b);
      heap.push(4);
      heap.push(2);
      heap.push(8);
      expect(heap.peek()).toBe(2);
      expect(heap.size()).toBe(3);
    });

    it('빈 힙에서 pop은 undefined', () => {
      const heap = new BinaryHeap<number>([], (a, b) => a - b);
      expect(heap.pop()).toBeUndefined();
    });
  });

  describe('comparePackageCounts', () => {
    it('개수 내림차순', () => {
      expect(comparePackageCounts({ name: 'a', count: 1 }, { name: 'b', count: 2 })).toBeGreaterThan(0);
    });

    it('개수가 같으면 이름 오름차순', () => {
      expect(comparePackageCounts({ name: 'a', count: 2 }, { name: 'b', count: 2 })).toBe(-1);
      expect(comparePackageCounts({ name: 'b', count: 2 }, { name: 'a', count: 2 })).toBe(1);
    });
  });

  describe('topK', () => {
    const counts = mapOf({ pkgX: 2, pkgY: 1, pkgZ: 1 });

    it('상위 2개, 동률은 이름순', () => {
      expect(topK(counts, selectTop(2))).toEqual([
        { name: 'pkgX', count: 2 },
        { name: 'pkgY', count: 1 },
      ]);
    });

    it('전체 선택은 모든 항목을 내림차순으로', () => {
      const result = topK(mapOf({ e: 1, c: 3, a: 5, d: 2, b: 4 }), selectAll());
      expect(result).toEqual([
        { name: 'a', count: 5 },
        { name: 'b', count: 4 },
        { name: 'c', count: 3 },
        { name: 'd', count: 2 },
        { name: 'e', count: 1 },
      ]);
    });

    it('K가 패키지 수 이상이면 전체와 동일', () => {
      expect(topK(counts, selectTop(3))).toEqual(topK(counts, selectAll()));
      expect(topK(counts, selectTop(100))).toEqual(topK(counts, selectAll()));
    });

    it('K = 0이면 빈 결과', () => {
      expect(topK(counts, selectTop(0))).toEqual([]);
    });

    it('빈 맵은 항상 빈 결과', () => {
      expect(topK(new Map(), selectAll())).toEqual([]);
      expect(topK(new Map(), selectTop(5))).toEqual([]);
    });

    it('결과 개수는 비증가 순서', () => {
      const many = new Map<string, number>();
      for (let i = 0; i < 200; i++) {
        many.set(`pkg${i}`, (i * 37) % 23);
      }

      const result = topK(many, selectAll());
      expect(result).toHaveLength(200);
      for (let i = 1; i < result.length; i++) {
        expect(result[i - 1].count).toBeGreaterThanOrEqual(result[i].count);
      }
      for (const entry of result) {
        expect(entry.count).toBe(many.get(entry.name));
      }
    });
  });

  describe('selection', () => {
    it('all 토큰', () => {
      expect(parseSelection('all')).toEqual({ kind: 'all' });
      expect(parseSelection('ALL')).toEqual({ kind: 'all' });
    });

    it('0은 전체', () => {
      expect(parseSelection('0')).toEqual({ kind: 'all' });
    });

    it('양의 정수', () => {
      expect(parseSelection('10')).toEqual({ kind: 'top', count: 10 });
    });

    it('음수, 소수, 문자열은 InvalidSelectionError', () => {
      expect(() => parseSelection('-1')).toThrow(InvalidSelectionError);
      expect(() => parseSelection('1.5')).toThrow(InvalidSelectionError);
      expect(() => parseSelection('ten')).toThrow(InvalidSelectionError);
      expect(() => parseSelection('')).toThrow(InvalidSelectionError);
    });

    it('selectTop은 음수와 소수를 거부', () => {
      expect(() => selectTop(-3)).toThrow(InvalidSelectionError);
      expect(() => selectTop(2.5)).toThrow(InvalidSelectionError);
    });

    it('formatSelection', () => {
      expect(formatSelection(selectAll())).toBe('all');
      expect(formatSelection(selectTop(7))).toBe('7');
    });
  });
});
