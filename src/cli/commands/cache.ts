import chalk from 'chalk';
import Table from 'cli-table3';
import * as readline from 'readline';
import { getConfigManager } from '../../core/config';
import { CacheManager } from '../../core/cacheManager';
import logger from '../../utils/logger';

function getCache(): CacheManager {
  const config = getConfigManager().getConfig();
  return new CacheManager(config.downloadsDir);
}

/**
 * 캐시 크기 확인
 */
export async function cacheSize(): Promise<void> {
  const cache = getCache();

  try {
    const entries = await cache.list();
    const size = await cache.size();
    console.log(chalk.cyan('\n캐시 정보:'));
    console.log(`  경로: ${cache.getCacheDir()}`);
    console.log(`  파일 수: ${entries.length}`);
    console.log(`  크기: ${formatBytes(size)}`);
  } catch (error) {
    logger.logError(error as Error, '캐시 크기 확인 실패');
    console.error(chalk.red(`캐시 크기 확인 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 캐시 삭제
 */
export async function cacheClear(options: { force?: boolean; arch?: string }): Promise<void> {
  const cache = getCache();

  if (!options.force) {
    const target = options.arch ? `${options.arch} Contents 캐시` : '캐시';
    const confirm = await askConfirmation(`정말로 ${target}를 삭제하시겠습니까?`);
    if (!confirm) {
      console.log(chalk.yellow('캐시 삭제가 취소되었습니다'));
      return;
    }
  }

  try {
    if (options.arch) {
      const removed = await cache.remove(options.arch);
      if (removed) {
        console.log(chalk.green(`✓ ${options.arch} 캐시가 삭제되었습니다`));
      } else {
        console.log(chalk.yellow(`${options.arch} 캐시가 없습니다`));
      }
      return;
    }

    const size = await cache.size();
    const cleared = await cache.clear();
    if (cleared === 0) {
      console.log(chalk.yellow('삭제할 캐시가 없습니다'));
      return;
    }
    console.log(chalk.green(`✓ ${cleared}개 파일이 삭제되었습니다 (${formatBytes(size)} 확보)`));
  } catch (error) {
    logger.logError(error as Error, '캐시 삭제 실패');
    console.error(chalk.red(`캐시 삭제 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 캐시된 Contents 목록
 */
export async function cacheList(): Promise<void> {
  const cache = getCache();

  try {
    const entries = await cache.list();
    if (entries.length === 0) {
      console.log(chalk.yellow('캐시된 Contents 파일이 없습니다'));
      return;
    }

    const table = new Table({
      head: [chalk.cyan('아키텍처'), chalk.cyan('크기'), chalk.cyan('다운로드 일시')],
      colWidths: [18, 12, 24],
    });

    for (const entry of entries) {
      table.push([entry.architecture, formatBytes(entry.size), entry.modifiedAt.toLocaleString('ko-KR')]);
    }

    console.log(chalk.cyan('\n캐시된 Contents 목록:\n'));
    console.log(table.toString());
    console.log(chalk.gray(`\n총 ${entries.length}개 (${cache.getCacheDir()})`));
  } catch (error) {
    logger.logError(error as Error, '캐시 목록 조회 실패');
    console.error(chalk.red(`캐시 목록 조회 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 바이트 포맷
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * 확인 프롬프트
 */
async function askConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}
