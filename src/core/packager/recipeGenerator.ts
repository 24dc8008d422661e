/**
 * PKGBUILD 생성기
 * 패키지 디스크립터로 makepkg가 읽는 빌드 레시피를 생성
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { PackageDescriptor } from '../../types';
import { escapeShell } from '../shared/shell-escape';
import { fontInstallDir } from './fontInputs';
import { installScriptFileName } from './installScriptGenerator';
import logger from '../../utils/logger';

/** 레시피 파일명 (makepkg가 현재 디렉토리에서 찾는 이름) */
export const RECIPE_FILENAME = 'PKGBUILD';

/** 기본 바이너리 패키지 확장자 */
export const DEFAULT_PACKAGE_EXTENSION = '.pkg.tar.zst';

export interface RecipeOptions {
  /** PKGEXT 값 */
  packageExtension?: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}

const quote = (value: string): string => `"${escapeShell(value, 'double')}"`;

/**
 * PKGBUILD 생성기 클래스
 */
export class RecipeGenerator {
  /**
   * PKGBUILD 내용 생성
   */
  render(descriptor: PackageDescriptor, options: RecipeOptions = {}): string {
    const { packageExtension = DEFAULT_PACKAGE_EXTENSION } = options;
    const lines: string[] = [];

    lines.push('# Generated by fontpkg');
    lines.push(`pkgname=${quote(descriptor.pkgName)}`);
    lines.push(`pkgver=${descriptor.pkgVersion}`);
    lines.push(`pkgrel=${descriptor.pkgRelease}`);
    lines.push(`pkgdesc=${quote(descriptor.pkgDescription)}`);
    lines.push(`arch=('${descriptor.arch}')`);
    lines.push(`PKGEXT='${escapeShell(packageExtension, 'single')}'`);
    lines.push(`source=(${descriptor.fontFiles.map(quote).join(' ')})`);
    // updpkgsums가 채움
    lines.push('sha256sums=()');
    lines.push(`install=${quote(installScriptFileName(descriptor.pkgName))}`);
    lines.push('');

    lines.push('package() {');
    descriptor.fontFiles.forEach((fileName, index) => {
      const escaped = escapeShell(fileName, 'double');
      const targetDir = fontInstallDir(descriptor.fontTypes[index]);
      lines.push(`  install -Dm644 "$srcdir/${escaped}" "$pkgdir${targetDir}/${escaped}"`);
    });
    lines.push('}');
    lines.push('');

    return lines.join('\n');
  }

  /**
   * PKGBUILD 파일 쓰기 (기존 파일은 덮어씀)
   */
  async write(
    descriptor: PackageDescriptor,
    outputDir: string = process.cwd(),
    options: RecipeOptions = {}
  ): Promise<GeneratedFile> {
    const content = this.render(descriptor, options);
    const outputPath = path.join(outputDir, RECIPE_FILENAME);
    await fs.writeFile(outputPath, content, 'utf-8');

    logger.debug('PKGBUILD 생성 완료', { outputPath });

    return { path: outputPath, content };
  }
}

// 싱글톤 인스턴스
let recipeGeneratorInstance: RecipeGenerator | null = null;

export function getRecipeGenerator(): RecipeGenerator {
  if (!recipeGeneratorInstance) {
    recipeGeneratorInstance = new RecipeGenerator();
  }
  return recipeGeneratorInstance;
}
