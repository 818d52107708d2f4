/**
 * Contents 캐시 관리
 * 다운로드한 Contents-<arch>.gz 를 아키텍처 이름으로 저장하여 재사용
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import logger from '../utils/logger';

export interface CacheEntry {
  architecture: string;
  filePath: string;
  size: number;
  modifiedAt: Date;
}

const CONTENTS_PREFIX = 'Contents-';
const CONTENTS_SUFFIX = '.gz';

/**
 * 아키텍처별 Contents 파일명
 */
export function contentsFileName(architecture: string): string {
  return `${CONTENTS_PREFIX}${architecture}${CONTENTS_SUFFIX}`;
}

/**
 * 파일명에서 아키텍처를 추출합니다. Contents 파일이 아니면 null
 */
export function architectureFromFileName(fileName: string): string | null {
  if (!fileName.startsWith(CONTENTS_PREFIX) || !fileName.endsWith(CONTENTS_SUFFIX)) {
    return null;
  }
  const architecture = fileName.slice(CONTENTS_PREFIX.length, -CONTENTS_SUFFIX.length);
  return architecture.length > 0 ? architecture : null;
}

/**
 * 캐시 관리자 클래스
 */
export class CacheManager {
  private cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = path.resolve(cacheDir);
  }

  getCacheDir(): string {
    return this.cacheDir;
  }

  pathFor(architecture: string): string {
    return path.join(this.cacheDir, contentsFileName(architecture));
  }

  /**
   * 다운로드 중인 파일의 임시 경로
   */
  tempPathFor(architecture: string): string {
    return `${this.pathFor(architecture)}.part`;
  }

  async ensureDir(): Promise<void> {
    await fs.ensureDir(this.cacheDir);
  }

  async has(architecture: string): Promise<boolean> {
    return fs.pathExists(this.pathFor(architecture));
  }

  /**
   * 다운로드가 끝난 임시 파일을 캐시 위치로 옮깁니다.
   */
  async store(architecture: string, sourcePath: string): Promise<string> {
    const target = this.pathFor(architecture);
    await this.ensureDir();
    await fs.move(sourcePath, target, { overwrite: true });

    logger.debug('캐시 저장', { architecture, filePath: target });
    return target;
  }

  async remove(architecture: string): Promise<boolean> {
    const target = this.pathFor(architecture);
    if (!(await fs.pathExists(target))) {
      return false;
    }
    await fs.remove(target);
    logger.debug('캐시 삭제', { architecture });
    return true;
  }

  /**
   * 캐시된 Contents 목록 (아키텍처 이름순)
   */
  async list(): Promise<CacheEntry[]> {
    if (!(await fs.pathExists(this.cacheDir))) {
      return [];
    }

    const entries: CacheEntry[] = [];
    for (const fileName of await fs.readdir(this.cacheDir)) {
      const architecture = architectureFromFileName(fileName);
      if (!architecture) continue;

      const filePath = path.join(this.cacheDir, fileName);
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) continue;

      entries.push({ architecture, filePath, size: stats.size, modifiedAt: stats.mtime });
    }

    return entries.sort((a, b) => a.architecture.localeCompare(b.architecture));
  }

  /**
   * 캐시 전체 크기 (bytes)
   */
  async size(): Promise<number> {
    const entries = await this.list();
    return entries.reduce((total, entry) => total + entry.size, 0);
  }

  /**
   * 캐시된 Contents 파일을 모두 지웁니다. 지운 항목 수를 반환합니다.
   */
  async clear(): Promise<number> {
    const entries = await this.list();
    for (const entry of entries) {
      await fs.remove(entry.filePath);
    }

    logger.info('캐시 초기화', { clearedEntries: entries.length });
    return entries.length;
  }
}
