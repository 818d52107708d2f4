// Contents 인덱스 집계 모듈

export { findLastOf, splitLine, parsePackages } from './line-parser';
export { splitLines, isHeaderLine, countFiles } from './aggregator';
export { BinaryHeap } from './max-heap';
export { selectAll, selectTop, parseSelection, formatSelection } from './selection';
export type { Selection } from './selection';
export { topK, comparePackageCounts } from './selector';
export type { PackageCount } from './selector';
