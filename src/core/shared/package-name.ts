/**
 * 패키지명/버전 검증 유틸리티
 * 사용자가 입력한 패키지명, 버전, 릴리스 번호를 makepkg가 받아들이는 형식으로 정리합니다.
 */

import { InputError } from './errors';

/** 정리 결과가 비었을 때 쓰는 패키지명 */
export const PLACEHOLDER_PACKAGE_NAME = '_';

/** 기본 릴리스 번호 */
export const DEFAULT_RELEASE = '1';

const PACKAGE_NAME_RUN = /[a-z0-9@._+]+/g;
const VERSION_PATTERN = /^[a-z0-9._]+$/;
const RELEASE_PATTERN = /^[0-9]+$/;

/** 파싱된 버전 정보 */
export interface ParsedVersion {
  version: string;
  release: string;
}

/**
 * 패키지명을 정리합니다.
 * 소문자로 바꾼 뒤 허용 문자 구간만 뽑아 '-'로 연결합니다.
 * 결과가 입력과 다르면 onWarning으로 알리지만 중단하지는 않습니다.
 *
 * @example
 * sanitizePackageName('My Font') // 'my-font'
 * sanitizePackageName('!!!') // '_'
 */
export function sanitizePackageName(
  raw: string,
  onWarning?: (message: string) => void
): string {
  const lowered = raw.toLowerCase();
  const runs = lowered.match(PACKAGE_NAME_RUN) ?? [];
  const name = runs.length > 0 ? runs.join('-') : PLACEHOLDER_PACKAGE_NAME;

  if (name !== lowered) {
    onWarning?.(`패키지명 "${raw}"을(를) "${name}"(으)로 변경했습니다`);
  }

  return name;
}

/**
 * VER 또는 VER-REL 형식의 버전 문자열을 파싱합니다.
 *
 * @example
 * parseVersion('1.0') // { version: '1.0', release: '1' }
 * parseVersion('2.3-4') // { version: '2.3', release: '4' }
 */
export function parseVersion(spec: string): ParsedVersion {
  const parts = spec.split('-');
  if (parts.length > 2) {
    throw new InputError(`잘못된 버전 형식: ${spec} (too many hyphens)`);
  }

  const version = parts[0].toLowerCase();
  const release = parts.length === 2 ? parts[1] : DEFAULT_RELEASE;

  if (!VERSION_PATTERN.test(version)) {
    throw new InputError(`잘못된 버전: "${parts[0]}" (허용 문자: a-z 0-9 . _)`);
  }

  if (!RELEASE_PATTERN.test(release) || release === '0') {
    throw new InputError(`잘못된 릴리스 번호: "${release}" (0이 아닌 숫자여야 합니다)`);
  }

  return { version, release };
}
