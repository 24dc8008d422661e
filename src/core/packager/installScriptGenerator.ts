/**
 * install 훅 스크립트 생성기
 * 패키지 설치/업그레이드/제거 시 폰트 캐시와 폰트 디렉토리 인덱스를 갱신하는 스크립트 생성
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { FontType, PackageDescriptor } from '../../types';
import { fontInstallDir } from './fontInputs';
import type { GeneratedFile } from './recipeGenerator';
import logger from '../../utils/logger';

/**
 * 패키지명으로 install 훅 파일명 생성 (예: ttf-foo.install)
 */
export function installScriptFileName(pkgName: string): string {
  return `${pkgName}.install`;
}

/**
 * 중복을 제거하고 알파벳 순으로 정렬한 폰트 타입 목록
 */
export function distinctFontTypes(types: readonly FontType[]): FontType[] {
  return [...new Set(types)].sort();
}

/**
 * install 훅 스크립트 생성기 클래스
 */
export class InstallScriptGenerator {
  /**
   * install 스크립트 내용 생성
   */
  render(descriptor: PackageDescriptor): string {
    const lines: string[] = [];

    lines.push('post_install() {');
    lines.push('  fc-cache -fs >/dev/null');
    for (const type of distinctFontTypes(descriptor.fontTypes)) {
      const dir = fontInstallDir(type);
      lines.push(`  mkfontscale ${dir}`);
      lines.push(`  mkfontdir ${dir}`);
    }
    lines.push('}');
    lines.push('');

    // 업그레이드/제거도 같은 갱신 작업
    lines.push('post_upgrade() {');
    lines.push('  post_install');
    lines.push('}');
    lines.push('');
    lines.push('post_remove() {');
    lines.push('  post_install');
    lines.push('}');
    lines.push('');

    return lines.join('\n');
  }

  /**
   * <pkgName>.install 파일 쓰기 (기존 파일은 덮어씀)
   */
  async write(
    descriptor: PackageDescriptor,
    outputDir: string = process.cwd()
  ): Promise<GeneratedFile> {
    const content = this.render(descriptor);
    const outputPath = path.join(outputDir, installScriptFileName(descriptor.pkgName));
    await fs.writeFile(outputPath, content, 'utf-8');

    logger.debug('install 스크립트 생성 완료', { outputPath });

    return { path: outputPath, content };
  }
}

// 싱글톤 인스턴스
let installScriptGeneratorInstance: InstallScriptGenerator | null = null;

export function getInstallScriptGenerator(): InstallScriptGenerator {
  if (!installScriptGeneratorInstance) {
    installScriptGeneratorInstance = new InstallScriptGenerator();
  }
  return installScriptGeneratorInstance;
}
