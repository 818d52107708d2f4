import chalk from 'chalk';
import Table from 'cli-table3';
import { CONFIG_DESCRIPTIONS, getConfigManager, isConfigKey } from '../../core/config';
import logger from '../../utils/logger';

/**
 * 문자열 인자를 설정값으로 변환 (숫자, 불리언, 문자열)
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const configManager = getConfigManager();

  try {
    const config = configManager.getConfig();

    if (key) {
      if (isConfigKey(key)) {
        console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
      } else {
        console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
      }
    } else {
      console.log(chalk.cyan('\n현재 설정:'));
      console.log(JSON.stringify(config, null, 2));
    }
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  const configManager = getConfigManager();

  try {
    const parsedValue = parseConfigValue(value);
    configManager.set(key, parsedValue);
    logger.info('설정 변경', { key, value: parsedValue });
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();

  try {
    const config = configManager.getConfig();

    const table = new Table({
      head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
      colWidths: [18, 50, 32],
      wordWrap: true,
    });

    for (const key of Object.keys(config)) {
      if (!isConfigKey(key)) continue;
      table.push([key, String(config[key]), CONFIG_DESCRIPTIONS[key]]);
    }

    console.log(chalk.cyan('\n설정 목록:\n'));
    console.log(table.toString());
    console.log(chalk.gray(`\n설정 파일: ${configManager.getConfigPath()}`));
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  const configManager = getConfigManager();

  try {
    configManager.reset();
    logger.info('설정 초기화');
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${(error as Error).message}`));
    process.exit(1);
  }
}
