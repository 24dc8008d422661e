/**
 * 폰트 패키저
 * 입력 검증 → 스테이징 → PKGBUILD/install 생성 → updpkgsums → makepkg → 산출물 복사
 * 순서로 진행하며, 어느 단계에서 실패해도 임시 디렉토리와 작업 디렉토리를 정리합니다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type {
  BuildAction,
  BuildRequest,
  BuildResult,
  BuildStage,
  FontFileInfo,
  PackageDescriptor,
} from '../../types';
import type { Config } from '../config';
import { DEFAULT_CONFIG } from '../config';
import { runCommand } from '../shared/command-runner';
import type { CommandResult, CommandRunner } from '../shared/command-runner';
import { ExternalToolError, InterruptedError } from '../shared/errors';
import { withTempDirectory, withWorkingDirectory } from '../shared/scoped';
import { createPackageDescriptor, inspectFontFiles, resolveBuildAction } from './fontInputs';
import { getRecipeGenerator } from './recipeGenerator';
import { getInstallScriptGenerator } from './installScriptGenerator';
import logger from '../../utils/logger';

/** 스테이징 디렉토리 접두사 */
export const STAGING_PREFIX = 'fontpkg-';

/** makepkg 모드별 인자 */
const MAKEPKG_ARGS: Record<BuildAction, string[]> = {
  install: ['--install'],
  source: ['--source'],
  binary: [],
};

export type BuildToolConfig = Pick<
  Config,
  'makepkgCommand' | 'updpkgsumsCommand' | 'packageExtension'
>;

export interface FontPackagerOptions {
  /** 외부 명령 실행기 (기본값: child_process.spawn) */
  runner?: CommandRunner;
  config?: Partial<BuildToolConfig>;
  /** abort되면 현재 단계를 중단하고 InterruptedError로 끝냄 */
  signal?: AbortSignal;
  onStage?: (stage: BuildStage) => void;
  /** 패키지명 정리 등 진행에 지장 없는 경고 */
  onWarning?: (message: string) => void;
}

/**
 * 빌드 모드에 따른 산출물 파일명
 *
 * @example
 * artifactFileName(descriptor, 'binary', '.pkg.tar.zst') // 'ttf-a-1.0-1-any.pkg.tar.zst'
 * artifactFileName(descriptor, 'source', '.pkg.tar.zst') // 'ttf-a-1.0-1.src.tar.gz'
 */
export function artifactFileName(
  descriptor: PackageDescriptor,
  action: BuildAction,
  packageExtension: string
): string {
  const base = `${descriptor.pkgName}-${descriptor.pkgVersion}-${descriptor.pkgRelease}`;
  if (action === 'source') {
    return `${base}.src.tar.gz`;
  }
  return `${base}-${descriptor.arch}${packageExtension}`;
}

/**
 * 폰트 패키저 클래스
 */
export class FontPackager {
  private readonly runner: CommandRunner;
  private readonly config: BuildToolConfig;
  private stage: BuildStage = 'parseArgs';

  constructor(private readonly options: FontPackagerOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.config = {
      makepkgCommand: options.config?.makepkgCommand ?? DEFAULT_CONFIG.makepkgCommand,
      updpkgsumsCommand: options.config?.updpkgsumsCommand ?? DEFAULT_CONFIG.updpkgsumsCommand,
      packageExtension: options.config?.packageExtension ?? DEFAULT_CONFIG.packageExtension,
    };
  }

  /**
   * 폰트 패키지 빌드
   */
  async build(request: BuildRequest): Promise<BuildResult> {
    try {
      this.enter('parseArgs');
      const action = resolveBuildAction(request);

      this.enter('validateFonts');
      const fonts = inspectFontFiles(request.fontPaths, process.cwd());

      this.enter('validateNameVersion');
      const descriptor = createPackageDescriptor(fonts, {
        name: request.name,
        versionSpec: request.versionSpec,
        description: request.description,
        onWarning: this.options.onWarning,
      });

      this.enter('stageFiles');
      const artifactPath = await withTempDirectory(STAGING_PREFIX, (stagingDir) =>
        withWorkingDirectory(stagingDir, (invocationDir) =>
          this.buildInStaging(fonts, descriptor, action, invocationDir)
        )
      );

      this.enter('done');
      logger.info('폰트 패키지 빌드 완료', { pkgName: descriptor.pkgName, action, artifactPath });

      return { descriptor, action, artifactPath };
    } catch (error) {
      const failedStage = this.stage;
      this.enter('failed');
      logger.debug('폰트 패키지 빌드 실패', {
        stage: failedStage,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * 스테이징 디렉토리(현재 작업 디렉토리) 안에서 실행되는 단계들
   */
  private async buildInStaging(
    fonts: FontFileInfo[],
    descriptor: PackageDescriptor,
    action: BuildAction,
    invocationDir: string
  ): Promise<string> {
    const stagingDir = process.cwd();
    logger.debug('스테이징 디렉토리 생성', { stagingDir });

    this.enter('generateArtifacts');
    for (const font of fonts) {
      await this.copyFile(font.sourcePath, path.join(stagingDir, font.fileName), '폰트 파일 복사 실패');
    }
    await getRecipeGenerator().write(descriptor, stagingDir, {
      packageExtension: this.config.packageExtension,
    });
    await getInstallScriptGenerator().write(descriptor, stagingDir);

    this.enter('computeChecksums');
    await this.runTool(this.config.updpkgsumsCommand, []);

    this.enter('build');
    await this.runTool(this.config.makepkgCommand, MAKEPKG_ARGS[action]);

    this.enter('finalize');
    const fileName = artifactFileName(descriptor, action, this.config.packageExtension);
    const builtPath = path.join(stagingDir, fileName);
    if (!(await fs.pathExists(builtPath))) {
      throw new ExternalToolError(
        `${this.config.makepkgCommand}이(가) 산출물을 만들지 않았습니다: ${fileName}`,
        this.config.makepkgCommand
      );
    }

    const artifactPath = path.join(invocationDir, fileName);
    await this.copyFile(builtPath, artifactPath, '산출물 복사 실패');
    return artifactPath;
  }

  /**
   * 단계 전환. 중단 요청이 있으면 다음 단계로 넘어가지 않음
   * (산출물 복사가 끝난 뒤의 done과 failed는 예외)
   */
  private enter(stage: BuildStage): void {
    if (stage !== 'done' && stage !== 'failed' && this.options.signal?.aborted) {
      throw new InterruptedError();
    }
    this.stage = stage;
    logger.debug(`빌드 단계: ${stage}`);
    this.options.onStage?.(stage);
  }

  private async copyFile(from: string, to: string, context: string): Promise<void> {
    try {
      await fs.copyFile(from, to);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalToolError(`${context}: ${message}`);
    }
  }

  /**
   * 외부 명령 실행. 종료 코드가 0이 아니면 ExternalToolError
   */
  private async runTool(command: string, args: string[]): Promise<void> {
    const { signal } = this.options;
    logger.debug('외부 명령 실행', { command, args });

    let result: CommandResult;
    try {
      result = await this.runner(command, args, { cwd: process.cwd(), signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new InterruptedError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalToolError(`${command} 실행 실패: ${message}`, command);
    }

    if (signal?.aborted || result.signal === 'SIGINT') {
      throw new InterruptedError();
    }

    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        `${command}이(가) 종료 코드 ${result.exitCode}(으)로 실패했습니다`,
        command,
        result.exitCode
      );
    }
  }
}
