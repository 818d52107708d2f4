#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import logger from '../utils/logger';
import type { TopOptions } from './commands/top';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('contents-stats')
  .description(chalk.cyan('contents-stats - Debian Contents 인덱스 기반 패키지 파일 수 통계'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .option('--verbose', '디버그 로그를 stderr에 출력');

// 모든 명령 실행 전에 로거 초기화
program.hook('preAction', async () => {
  logger.setVerbose(program.opts<{ verbose?: boolean }>().verbose === true);
  await logger.initialize();
});

// top 명령어
program
  .command('top')
  .description('파일 수가 가장 많은 패키지 표시')
  .argument('<architecture>', '아키텍처 (amd64, arm64, source, udeb-amd64 등)')
  .option('-n, --count <count>', "표시할 패키지 수 (0 또는 'all' = 전체, 기본값: 설정 defaultTop)")
  .option('-m, --mirror <url>', 'Debian 미러 URL (dists/<suite>/<component> 까지)')
  .option('-r, --refresh', '캐시를 무시하고 다시 다운로드')
  .option('--plain', '표 대신 고정 폭 텍스트로 출력')
  .action(async (architecture: string, options: TopOptions) => {
    const { topCommand } = await import('./commands/top');
    await topCommand(architecture, options);
  });

// architectures 명령어
program
  .command('architectures')
  .description('지원 아키텍처 목록')
  .action(async () => {
    const { architecturesCommand } = await import('./commands/top');
    await architecturesCommand();
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// cache 명령어
program
  .command('cache')
  .description('다운로드 캐시 관리')
  .addCommand(
    new Command('size')
      .description('캐시 크기 확인')
      .action(async () => {
        const { cacheSize } = await import('./commands/cache');
        await cacheSize();
      })
  )
  .addCommand(
    new Command('clear')
      .description('캐시 삭제')
      .option('-f, --force', '확인 없이 삭제')
      .option('-a, --arch <architecture>', '특정 아키텍처만 삭제')
      .action(async (options: { force?: boolean; arch?: string }) => {
        const { cacheClear } = await import('./commands/cache');
        await cacheClear(options);
      })
  )
  .addCommand(
    new Command('list')
      .description('캐시된 Contents 목록')
      .action(async () => {
        const { cacheList } = await import('./commands/cache');
        await cacheList();
      })
  );

// 에러 핸들링
program.exitOverride((err: CommanderError) => {
  if (
    err.code === 'commander.help' ||
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.version'
  ) {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  contents-stats - Debian Contents 인덱스 기반 패키지 파일 수 통계\n'));
  console.log('  사용법: contents-stats <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    top <arch>       파일 수 상위 패키지');
  console.log('    architectures    지원 아키텍처 목록');
  console.log('    config           설정 관리');
  console.log('    cache            캐시 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    contents-stats top amd64'));
  console.log(chalk.gray('    contents-stats top arm64 -n 25'));
  console.log(chalk.gray('    contents-stats top source -n all --plain'));
  console.log(chalk.gray('    contents-stats config set mirror http://deb.debian.org/debian/dists/bookworm/main'));
  console.log('\n  자세한 내용: contents-stats --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: Error) => {
    logger.logError(error, '명령 실행 실패');
    console.error(chalk.red(`오류: ${error.message}`));
    process.exit(1);
  });
}
