/**
 * Debian Contents 인덱스 다운로더
 * dists/<suite>/<component>/Contents-<arch>.gz 를 받아 저장하고 gzip을 해제
 */

import axios from 'axios';
import * as fs from 'fs-extra';
import { gunzipSync } from 'zlib';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { DecompressionError, NetworkError } from '../errors';
import { contentsFileName } from '../cacheManager';
import logger from '../../utils/logger';

/**
 * 다운로드 진행 상황
 */
export interface ContentsDownloadProgress {
  architecture: string;
  downloadedBytes: number;
  /** Content-Length가 없으면 0 */
  totalBytes: number;
  /** 0-100, totalBytes를 모르면 0 */
  progress: number;
  /** bytes/s */
  speed: number;
}

export interface ContentsDownloaderOptions {
  /** 미러 URL (dists/<suite>/<component> 까지) */
  mirror: string;
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  maxRetries?: number;
  /** 재시도 대기 기본값 (ms), 시도마다 배수로 증가 */
  retryDelay?: number;
}

/**
 * Contents 파일 URL 생성
 */
export function contentsUrl(mirror: string, architecture: string): string {
  return `${mirror.replace(/\/+$/, '')}/${contentsFileName(architecture)}`;
}

function describeError(error: unknown): Error {
  if (axios.isAxiosError(error) && error.response) {
    return new Error(`HTTP ${error.response.status}: ${error.response.statusText}`);
  }
  return error instanceof Error ? error : new Error(String(error));
}

export class ContentsDownloader {
  private mirror: string;
  private timeout: number;
  private maxRetries: number;
  private retryDelay: number;

  constructor(options: ContentsDownloaderOptions) {
    this.mirror = options.mirror;
    this.timeout = options.timeout ?? 60000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelay = options.retryDelay ?? 1000;
  }

  urlFor(architecture: string): string {
    return contentsUrl(this.mirror, architecture);
  }

  /**
   * Contents-<arch>.gz 를 destPath에 저장합니다. 저장한 바이트 수를 반환합니다.
   * 실패한 시도가 남긴 파일은 지우고, 모든 시도가 실패하면 NetworkError
   */
  async download(
    architecture: string,
    destPath: string,
    onProgress?: (progress: ContentsDownloadProgress) => void
  ): Promise<number> {
    const url = this.urlFor(architecture);
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug('Contents 다운로드 시작', { url, attempt });
        const bytes = await this.downloadFile(url, architecture, destPath, onProgress);
        logger.info('Contents 다운로드 완료', { url, bytes });
        return bytes;
      } catch (error) {
        lastError = describeError(error);
        logger.warn('Contents 다운로드 실패', { url, attempt, error: lastError.message });
        await fs.remove(destPath);

        if (attempt < this.maxRetries) {
          // 재시도 전 대기
          await new Promise((resolve) => setTimeout(resolve, this.retryDelay * attempt));
        }
      }
    }

    throw new NetworkError(url, this.maxRetries, lastError);
  }

  /**
   * gzip 데이터를 UTF-8 텍스트로 해제합니다.
   */
  decompress(data: Buffer, source = 'Contents'): string {
    try {
      return gunzipSync(data).toString('utf-8');
    } catch (error) {
      throw new DecompressionError(source, error instanceof Error ? error : undefined);
    }
  }

  /**
   * 저장된 Contents-<arch>.gz 를 읽어 텍스트로 반환합니다.
   */
  async readContents(filePath: string): Promise<string> {
    const data = await fs.readFile(filePath);
    return this.decompress(data, filePath);
  }

  private async downloadFile(
    url: string,
    architecture: string,
    destPath: string,
    onProgress?: (progress: ContentsDownloadProgress) => void
  ): Promise<number> {
    const response = await axios.get<Readable>(url, {
      responseType: 'stream',
      timeout: this.timeout,
    });

    const totalBytes = parseInt(String(response.headers['content-length'] ?? '0'), 10) || 0;
    let downloadedBytes = 0;
    let lastBytes = 0;
    let lastTime = Date.now();
    let currentSpeed = 0;

    response.data.on('data', (chunk: Buffer) => {
      downloadedBytes += chunk.length;

      // 속도 계산 (0.3초마다)
      const now = Date.now();
      const elapsed = (now - lastTime) / 1000;
      if (elapsed >= 0.3) {
        currentSpeed = (downloadedBytes - lastBytes) / elapsed;
        lastBytes = downloadedBytes;
        lastTime = now;
      }

      if (onProgress) {
        onProgress({
          architecture,
          downloadedBytes,
          totalBytes,
          progress: totalBytes > 0 ? (downloadedBytes / totalBytes) * 100 : 0,
          speed: currentSpeed,
        });
      }
    });

    await pipeline(response.data, fs.createWriteStream(destPath));
    return downloadedBytes;
  }
}
