/**
 * 아키텍처별 패키지 파일 수 통계
 * Contents 다운로드(캐시) → gzip 해제 → 집계 → 상위 K개 선택
 */

import { ARCHITECTURES, assertSupportedArchitecture } from './architectures';
import { CacheManager } from './cacheManager';
import { ContentsDownloader, type ContentsDownloadProgress } from './downloaders/contents';
import { countFiles, topK, type PackageCount, type Selection } from './contents';
import { validateConfigValue, type Config } from './config';
import { ConfigError } from './errors';
import logger from '../utils/logger';

export interface PackageStatisticsOptions {
  cache: CacheManager;
  downloader: ContentsDownloader;
  architectures?: ReadonlySet<string>;
}

export interface FetchOptions {
  /** 캐시가 있어도 다시 다운로드 */
  refresh?: boolean;
  onProgress?: (progress: ContentsDownloadProgress) => void;
}

export interface PackageStatisticsResult {
  architecture: string;
  /** 집계에 사용한 Contents 파일 경로 */
  filePath: string;
  /** 캐시를 썼는지 여부 */
  fromCache: boolean;
  /** 전체 패키지 수 */
  totalPackages: number;
  packages: PackageCount[];
}

export class PackageStatistics {
  private cache: CacheManager;
  private downloader: ContentsDownloader;
  private architectures: ReadonlySet<string>;

  constructor(options: PackageStatisticsOptions) {
    this.cache = options.cache;
    this.downloader = options.downloader;
    this.architectures = options.architectures ?? ARCHITECTURES;
  }

  /**
   * 설정값으로 인스턴스를 만듭니다. mirror를 넘기면 설정의 미러 대신 사용합니다.
   */
  static fromConfig(config: Config, mirror?: string): PackageStatistics {
    // 명령행에서 받은 미러도 설정값과 같은 규칙으로 검증
    if (mirror !== undefined) {
      const problem = validateConfigValue('mirror', mirror);
      if (problem) {
        throw new ConfigError(`${problem}: ${mirror}`);
      }
    }

    return new PackageStatistics({
      cache: new CacheManager(config.downloadsDir),
      downloader: new ContentsDownloader({
        mirror: mirror ?? config.mirror,
        timeout: config.requestTimeout,
        maxRetries: config.maxRetries,
      }),
    });
  }

  /**
   * Contents 파일이 캐시에 없으면 다운로드하고 경로를 반환합니다.
   */
  async maybeDownloadContents(
    architecture: string,
    options: FetchOptions = {}
  ): Promise<{ filePath: string; fromCache: boolean }> {
    if (!options.refresh && (await this.cache.has(architecture))) {
      logger.debug('캐시 히트', { architecture });
      return { filePath: this.cache.pathFor(architecture), fromCache: true };
    }

    await this.cache.ensureDir();
    const tempPath = this.cache.tempPathFor(architecture);
    await this.downloader.download(architecture, tempPath, options.onProgress);
    const filePath = await this.cache.store(architecture, tempPath);

    return { filePath, fromCache: false };
  }

  /**
   * 저장된 Contents 파일을 텍스트로 읽습니다.
   */
  async readContents(filePath: string): Promise<string> {
    return this.downloader.readContents(filePath);
  }

  /**
   * 파일 수 기준 상위 패키지를 구합니다.
   */
  async getTopPackages(
    architecture: string,
    selection: Selection,
    options: FetchOptions = {}
  ): Promise<PackageStatisticsResult> {
    assertSupportedArchitecture(architecture, this.architectures);

    const { filePath, fromCache } = await this.maybeDownloadContents(architecture, options);
    const text = await this.readContents(filePath);

    const started = Date.now();
    const counts = countFiles(text);
    const packages = topK(counts, selection);
    logger.debug('Contents 집계 완료', {
      architecture,
      totalPackages: counts.size,
      selected: packages.length,
      elapsedMs: Date.now() - started,
    });

    return {
      architecture,
      filePath,
      fromCache,
      totalPackages: counts.size,
      packages,
    };
  }
}
