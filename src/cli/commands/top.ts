import chalk from 'chalk';
import Table from 'cli-table3';
import * as cliProgress from 'cli-progress';
import { getConfigManager } from '../../core/config';
import { ARCHITECTURES, isSupportedArchitecture } from '../../core/architectures';
import { PackageStatistics } from '../../core/packageStatistics';
import { formatSelection, parseSelection, type PackageCount } from '../../core/contents';
import type { ContentsDownloadProgress } from '../../core/downloaders/contents';
import { CacheManager, contentsFileName } from '../../core/cacheManager';
import logger from '../../utils/logger';
import { formatBytes } from './cache';

// top 옵션
export interface TopOptions {
  count?: string;
  mirror?: string;
  refresh?: boolean;
  plain?: boolean;
}

/**
 * 패키지 목록을 표로 렌더링
 */
export function renderPackageTable(packages: PackageCount[]): string {
  const table = new Table({
    head: [chalk.cyan('#'), chalk.cyan('패키지'), chalk.cyan('파일 수')],
    colAligns: ['right', 'left', 'right'],
  });

  packages.forEach((pkg, index) => {
    table.push([String(index + 1), pkg.name, pkg.count.toLocaleString('en-US')]);
  });

  return table.toString();
}

/**
 * 스크립트용 고정 폭 출력 (패키지명 왼쪽 정렬, 파일 수 오른쪽 정렬)
 */
export function renderPlain(packages: PackageCount[]): string {
  const nameWidth = Math.max(0, ...packages.map((pkg) => pkg.name.length));
  const countWidth = Math.max(0, ...packages.map((pkg) => String(pkg.count).length));

  return packages
    .map((pkg) => `${pkg.name.padEnd(nameWidth)}  ${String(pkg.count).padStart(countWidth)}`)
    .join('\n');
}

/**
 * 다운로드 진행률 바. 첫 진행 이벤트에서 시작합니다.
 */
class DownloadProgressBar {
  private bar: cliProgress.SingleBar | null = null;

  constructor(private readonly filename: string) {}

  update(progress: ContentsDownloadProgress): void {
    // 전체 크기를 모르면 표시하지 않음
    if (progress.totalBytes === 0) return;

    if (!this.bar) {
      this.bar = new cliProgress.SingleBar(
        {
          clearOnComplete: true,
          hideCursor: true,
          format: ' {bar} | {filename} | {percentage}% | {value}/{total} bytes',
        },
        cliProgress.Presets.shades_classic
      );
      this.bar.start(progress.totalBytes, 0, { filename: this.filename });
    }
    this.bar.update(progress.downloadedBytes);
  }

  stop(): void {
    this.bar?.stop();
    this.bar = null;
  }
}

/**
 * 사용법 안내
 */
export function usageMessage(): string {
  return (
    '사용법: contents-stats top <architecture> [-n <count|all>]\n\n' +
    `지원 아키텍처: ${Array.from(ARCHITECTURES).join(' ')}`
  );
}

/**
 * top 명령어 핸들러
 */
export async function topCommand(architecture: string, options: TopOptions): Promise<void> {
  if (!isSupportedArchitecture(architecture)) {
    console.error(chalk.red(`지원하지 않는 아키텍처입니다: ${architecture}\n`));
    console.error(usageMessage());
    process.exit(1);
  }

  const progressBar = new DownloadProgressBar(contentsFileName(architecture));

  try {
    const config = getConfigManager().getConfig();
    const selection = parseSelection(options.count ?? String(config.defaultTop));
    const stats = PackageStatistics.fromConfig(config, options.mirror);

    if (!options.plain) {
      console.log(chalk.cyan(`${architecture} Contents 분석 중... (상위 ${formatSelection(selection)})`));
    }

    const result = await stats.getTopPackages(architecture, selection, {
      refresh: options.refresh,
      onProgress: options.plain ? undefined : (progress) => progressBar.update(progress),
    });
    progressBar.stop();

    if (options.plain) {
      if (result.packages.length > 0) {
        console.log(renderPlain(result.packages));
      }
      return;
    }

    const source = result.fromCache ? '캐시' : '다운로드';
    console.log(chalk.gray(`  ${source}: ${result.filePath}`));

    if (result.packages.length === 0) {
      console.log(chalk.yellow('\n집계된 패키지가 없습니다'));
      return;
    }

    console.log('\n' + renderPackageTable(result.packages));
    console.log(
      chalk.gray(
        `\n전체 ${result.totalPackages.toLocaleString('en-US')}개 패키지 중 ${result.packages.length}개 표시`
      )
    );
  } catch (error) {
    progressBar.stop();
    logger.logError(error as Error, 'top 명령 실패');
    console.error(chalk.red(`오류: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * architectures 명령어 핸들러
 */
export async function architecturesCommand(): Promise<void> {
  const config = getConfigManager().getConfig();
  const cache = new CacheManager(config.downloadsDir);
  const entries = await cache.list();
  const cached = new Set(entries.map((entry) => entry.architecture));
  const cachedBytes = await cache.size();

  const table = new Table({
    head: [chalk.cyan('아키텍처'), chalk.cyan('캐시')],
  });

  for (const architecture of ARCHITECTURES) {
    const entry = cached.has(architecture) ? chalk.green('✓') : '-';
    table.push([architecture, entry]);
  }

  console.log(chalk.cyan('\n지원 아키텍처:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`\n다운로드 경로: ${cache.getCacheDir()}`));
  console.log(chalk.gray(`총 ${ARCHITECTURES.size}개, 캐시 ${cached.size}개 (${formatBytes(cachedBytes)})`));
}
