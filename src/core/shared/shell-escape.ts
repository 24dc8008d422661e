/**
 * 셸 문자열 이스케이프
 * 생성하는 PKGBUILD/install 스크립트에 사용자 입력을 넣기 전에 반드시 거칩니다.
 */

import { ConfigurationError } from './errors';

/**
 * 따옴표 안에 넣을 문자열을 이스케이프합니다. style은 'double' 또는 'single'
 *
 * - double: \ " $ ` 앞에 백슬래시, !는 "'!'"로 바꿔 history expansion 방지
 * - single: '를 '"'"'로 바꿈
 *
 * style은 설정 파일 등에서 들어올 수 있어 런타임에 검사합니다.
 *
 * @example
 * escapeShell('a "b" $c', 'double') // 'a \\"b\\" \\$c'
 * escapeShell("it's", 'single') // `it'"'"'s`
 */
export function escapeShell(value: string, style: string): string {
  switch (style) {
    case 'double':
      return value.replace(/[\\"$`]/g, '\\$&').replace(/!/g, `"'!'"`);
    case 'single':
      return value.replace(/'/g, `'"'"'`);
    default:
      throw new ConfigurationError(`지원하지 않는 따옴표 스타일: ${style}`);
  }
}
