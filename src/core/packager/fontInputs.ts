/**
 * 폰트 입력 검증 및 패키지 디스크립터 생성
 */

import * as path from 'path';
import type {
  BuildAction,
  FontFileInfo,
  FontType,
  PackageDescriptor,
} from '../../types';
import { InputError } from '../shared/errors';
import { parseVersion, sanitizePackageName } from '../shared/package-name';

/** 폰트가 설치되는 루트 디렉토리 */
export const FONTS_ROOT = '/usr/share/fonts';

const FONT_TYPES: Record<string, FontType> = {
  TTF: 'TTF',
  OTF: 'OTF',
};

/**
 * 폰트 타입별 설치 디렉토리 (예: /usr/share/fonts/TTF)
 */
export function fontInstallDir(type: FontType): string {
  return `${FONTS_ROOT}/${type}`;
}

/**
 * -i / -S 옵션에서 빌드 모드를 결정합니다.
 * 둘 다 지정되면 아무 작업도 하기 전에 실패합니다.
 */
export function resolveBuildAction(flags: { install?: boolean; source?: boolean }): BuildAction {
  if (flags.install && flags.source) {
    throw new InputError('--install과 --source는 함께 사용할 수 없습니다');
  }
  if (flags.install) return 'install';
  if (flags.source) return 'source';
  return 'binary';
}

/**
 * 입력 폰트 파일 경로를 검사합니다.
 * 확장자는 대소문자 구분 없이 ttf/otf만 허용하고, 파일명은 서로 달라야 합니다.
 *
 * @param baseDir 상대 경로를 해석할 기준 디렉토리 (호출 디렉토리)
 */
export function inspectFontFiles(
  fontPaths: string[],
  baseDir: string = process.cwd()
): FontFileInfo[] {
  if (fontPaths.length === 0) {
    throw new InputError('폰트 파일을 하나 이상 지정하세요');
  }

  const fonts: FontFileInfo[] = [];
  const seen = new Set<string>();

  for (const fontPath of fontPaths) {
    const fileName = path.basename(fontPath);
    const extension = path.extname(fileName);
    const type = FONT_TYPES[extension.slice(1).toUpperCase()];

    if (!type) {
      throw new InputError(`${fontPath}: not a recognized font type (ttf, otf만 지원)`);
    }

    if (seen.has(fileName)) {
      throw new InputError(`${fontPath}: duplicate font filename`);
    }
    seen.add(fileName);

    fonts.push({
      sourcePath: path.resolve(baseDir, fontPath),
      fileName,
      stem: path.basename(fileName, extension),
      type,
    });
  }

  return fonts;
}

/**
 * --name이 없을 때 쓰는 기본 패키지명: <소문자 타입>-<첫 번째 폰트 이름>
 */
export function defaultPackageName(fonts: FontFileInfo[]): string {
  const [first] = fonts;
  if (!first) {
    throw new InputError('폰트 파일을 하나 이상 지정하세요');
  }
  return `${first.type.toLowerCase()}-${first.stem}`;
}

export interface DescriptorOptions {
  name?: string;
  versionSpec: string;
  description: string;
  /** 패키지명이 정리되어 바뀌었을 때 호출 */
  onWarning?: (message: string) => void;
}

/**
 * 검증된 폰트 목록과 메타데이터로 패키지 디스크립터를 만듭니다.
 */
export function createPackageDescriptor(
  fonts: FontFileInfo[],
  options: DescriptorOptions
): PackageDescriptor {
  const { version, release } = parseVersion(options.versionSpec);
  const pkgName = sanitizePackageName(options.name ?? defaultPackageName(fonts), options.onWarning);

  const descriptor: PackageDescriptor = {
    fontTypes: Object.freeze(fonts.map((font) => font.type)),
    fontFiles: Object.freeze(fonts.map((font) => font.fileName)),
    fontNames: Object.freeze(fonts.map((font) => font.stem)),
    pkgName,
    pkgVersion: version,
    pkgRelease: release,
    pkgDescription: options.description,
    arch: 'any',
  };
  return Object.freeze(descriptor);
}
