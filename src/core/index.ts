// Core module exports for contents-stats

// Contents 집계
export * from './contents';

// 아키텍처
export { ARCHITECTURES, isSupportedArchitecture, assertSupportedArchitecture } from './architectures';

// 통계
export { PackageStatistics } from './packageStatistics';
export type { PackageStatisticsOptions, PackageStatisticsResult, FetchOptions } from './packageStatistics';

// 다운로더
export { ContentsDownloader, contentsUrl } from './downloaders/contents';
export type { ContentsDownloaderOptions, ContentsDownloadProgress } from './downloaders/contents';

// Cache Manager
export { CacheManager, contentsFileName, architectureFromFileName } from './cacheManager';
export type { CacheEntry } from './cacheManager';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey, LogLevel } from './config';

// Errors
export * from './errors';
