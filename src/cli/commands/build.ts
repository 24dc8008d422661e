/**
 * 폰트 패키지 빌드 명령어
 */

import chalk from 'chalk';
import type { BuildStage } from '../../types';
import { getConfigManager, DEFAULT_CONFIG } from '../../core/config';
import type { Config, ConfigManager } from '../../core/config';
import { resolveBuildAction } from '../../core/packager/fontInputs';
import { FontPackager } from '../../core/packager/fontPackager';
import type { CommandRunner } from '../../core/shared/command-runner';
import { ExternalToolError, InterruptedError, UserError } from '../../core/shared/errors';
import logger from '../../utils/logger';

// 빌드 옵션 (commander가 채움)
export interface BuildCommandOptions {
  install?: boolean;
  source?: boolean;
  /** -s (--source의 숨은 별칭) */
  s?: boolean;
  name?: string;
  ver?: string;
  desc?: string;
  verbose?: boolean;
}

export interface BuildCommandDeps {
  configManager?: ConfigManager;
  runner?: CommandRunner;
}

export interface RunBuildDeps {
  config?: Config;
  signal?: AbortSignal;
  runner?: CommandRunner;
}

// 진행 상황으로 출력할 단계
const STAGE_LABELS: Partial<Record<BuildStage, string>> = {
  stageFiles: '빌드 디렉토리 준비 중...',
  generateArtifacts: 'PKGBUILD 및 install 스크립트 생성 중...',
  computeChecksums: '체크섬 갱신 중...',
  build: '패키지 빌드 중...',
  finalize: '산출물 복사 중...',
};

/**
 * 명령어 핸들러: 설정/로거 초기화, 시그널 처리 후 빌드하고 종료 코드로 종료
 */
export async function buildCommand(
  fonts: string[],
  options: BuildCommandOptions,
  deps: BuildCommandDeps = {}
): Promise<void> {
  // 옵션 충돌은 설정/로그 디렉토리를 건드리기 전에 확인
  try {
    resolveBuildAction(toBuildFlags(options));
  } catch (error) {
    process.exit(reportError(error));
  }

  const configManager = deps.configManager ?? getConfigManager();
  const config = await configManager.loadConfig((message) => logger.warn(message));
  await logger.initialize({ verbose: options.verbose, level: config.logLevel, configManager });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    console.error(chalk.yellow(`\n${signal} 수신, 정리 후 종료합니다...`));
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  let exitCode: number;
  try {
    exitCode = await runBuild(fonts, options, {
      config,
      signal: controller.signal,
      runner: deps.runner,
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  await logger.flush();
  process.exit(exitCode);
}

/**
 * 빌드를 실행하고 종료 코드를 반환합니다.
 * 0: 성공, 2: 입력/외부 명령 오류, 130: 중단, 1: 예상하지 못한 오류
 */
export async function runBuild(
  fonts: string[],
  options: BuildCommandOptions,
  deps: RunBuildDeps = {}
): Promise<number> {
  const config = deps.config ?? DEFAULT_CONFIG;
  const packager = new FontPackager({
    runner: deps.runner,
    config,
    signal: deps.signal,
    onStage: printStage,
    onWarning: (message) => logger.warn(message),
  });

  try {
    const result = await packager.build({
      fontPaths: fonts,
      ...toBuildFlags(options),
      name: options.name,
      versionSpec: options.ver ?? config.defaultVersion,
      description: options.desc ?? config.defaultDescription,
    });

    const { descriptor } = result;
    console.log(chalk.green(`✓ 패키지 생성 완료: ${result.artifactPath}`));
    console.log(
      chalk.gray(
        `  ${descriptor.pkgName} ${descriptor.pkgVersion}-${descriptor.pkgRelease} (폰트 ${descriptor.fontFiles.length}개)`
      )
    );
    if (result.action === 'install') {
      console.log(chalk.gray('  시스템에 설치되었습니다'));
    }
    return 0;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * 에러를 한 줄로 출력하고 종료 코드를 결정합니다.
 */
export function reportError(error: unknown): number {
  if (error instanceof InterruptedError) {
    console.error(chalk.yellow(error.message));
    logger.debug('빌드 중단');
    return error.exitCode;
  }

  if (error instanceof UserError) {
    console.error(chalk.red(`오류: ${error.message}`));
    const meta: Record<string, unknown> = { name: error.name };
    if (error instanceof ExternalToolError && error.command) {
      meta.command = error.command;
      meta.commandExitCode = error.commandExitCode;
    }
    logger.error(error.message, meta);
    return error.exitCode;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  console.error(chalk.red(`오류: ${err.message}`));
  logger.logError(err, '예상하지 못한 오류');
  return 1;
}

/**
 * -s는 --source의 별칭
 */
function toBuildFlags(options: BuildCommandOptions): { install?: boolean; source?: boolean } {
  return { install: options.install, source: options.source || options.s };
}

function printStage(stage: BuildStage): void {
  const label = STAGE_LABELS[stage];
  if (label) {
    console.log(chalk.cyan(label));
  }
}
