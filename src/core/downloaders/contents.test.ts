/**
 * contents.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Readable } from 'stream';
import { gzipSync } from 'zlib';
import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import { ContentsDownloader, contentsUrl } from './contents';
import { DecompressionError, NetworkError } from '../errors';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const MIRROR = 'http://mirror.test/debian/dists/stable/main';

function streamResponse(body: Buffer, withLength = true): AxiosResponse<Readable> {
  return {
    data: Readable.from([body]),
    status: 200,
    statusText: 'OK',
    headers: withLength ? { 'content-length': String(body.length) } : {},
    config: { headers: new AxiosHeaders() },
  };
}

describe('contents downloader', () => {
  let testDir: string;
  let downloader: ContentsDownloader;

  beforeEach(() => {
    vi.clearAllMocks();
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'contents-download-'));
    downloader = new ContentsDownloader({ mirror: MIRROR, timeout: 5000, maxRetries: 2, retryDelay: 0 });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('contentsUrl', () => {
    it('미러 뒤에 Contents 파일명', () => {
      expect(contentsUrl(MIRROR, 'amd64')).toBe(`${MIRROR}/Contents-amd64.gz`);
    });

    it('끝의 슬래시 제거', () => {
      expect(contentsUrl(`${MIRROR}//`, 'source')).toBe(`${MIRROR}/Contents-source.gz`);
    });
  });

  describe('download', () => {
    it('파일 저장 후 바이트 수 반환', async () => {
      const body = gzipSync(Buffer.from('usr/bin/ls utils/coreutils\n'));
      mockedAxios.get.mockResolvedValueOnce(streamResponse(body));
      const destPath = path.join(testDir, 'Contents-amd64.gz.part');

      const bytes = await downloader.download('amd64', destPath);

      expect(bytes).toBe(body.length);
      expect(fs.readFileSync(destPath).equals(body)).toBe(true);
      expect(mockedAxios.get).toHaveBeenCalledWith(`${MIRROR}/Contents-amd64.gz`, {
        responseType: 'stream',
        timeout: 5000,
      });
    });

    it('진행률 콜백', async () => {
      const body = Buffer.from('0123456789');
      mockedAxios.get.mockResolvedValueOnce(streamResponse(body));
      const onProgress = vi.fn();

      await downloader.download('arm64', path.join(testDir, 'out.gz'), onProgress);

      expect(onProgress).toHaveBeenLastCalledWith(
        expect.objectContaining({
          architecture: 'arm64',
          downloadedBytes: 10,
          totalBytes: 10,
          progress: 100,
        })
      );
    });

    it('Content-Length가 없으면 진행률 0', async () => {
      mockedAxios.get.mockResolvedValueOnce(streamResponse(Buffer.from('abc'), false));
      const onProgress = vi.fn();

      await downloader.download('i386', path.join(testDir, 'out.gz'), onProgress);

      expect(onProgress).toHaveBeenLastCalledWith(
        expect.objectContaining({ downloadedBytes: 3, totalBytes: 0, progress: 0 })
      );
    });

    it('실패 후 재시도', async () => {
      mockedAxios.get
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce(streamResponse(Buffer.from('ok')));
      const destPath = path.join(testDir, 'retry.gz');

      await downloader.download('armhf', destPath);

      expect(mockedAxios.get).toHaveBeenCalledTimes(2);
      expect(fs.readFileSync(destPath, 'utf-8')).toBe('ok');
    });

    it('모든 시도가 실패하면 NetworkError', async () => {
      mockedAxios.get.mockRejectedValue(new Error('connect ECONNREFUSED'));
      const destPath = path.join(testDir, 'fail.gz');

      const error = await downloader.download('s390x', destPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect((error as NetworkError).attempts).toBe(2);
      expect((error as NetworkError).url).toBe(`${MIRROR}/Contents-s390x.gz`);
      expect((error as NetworkError).message).toBe(
        `${MIRROR}/Contents-s390x.gz 다운로드 실패 (2회 시도): connect ECONNREFUSED`
      );
      expect(fs.existsSync(destPath)).toBe(false);
    });
  });

  describe('decompress', () => {
    it('gzip 해제', () => {
      const text = 'usr/share/doc/a/README  doc/a\n';
      expect(downloader.decompress(gzipSync(Buffer.from(text)))).toBe(text);
    });

    it('gzip이 아니면 DecompressionError', () => {
      expect(() => downloader.decompress(Buffer.from('plain text'))).toThrow(DecompressionError);
    });
  });

  describe('readContents', () => {
    it('저장된 파일을 텍스트로 읽기', async () => {
      const filePath = path.join(testDir, 'Contents-all.gz');
      fs.writeFileSync(filePath, gzipSync(Buffer.from('a b\n')));

      expect(await downloader.readContents(filePath)).toBe('a b\n');
    });
  });
});
