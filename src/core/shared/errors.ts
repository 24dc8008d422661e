/**
 * fontpkg 에러 타입
 * CLI 최상위 핸들러가 에러 종류에 따라 종료 코드를 결정합니다.
 */

/**
 * 사용자에게 한 줄로 보여주는 에러의 기본 클래스 (종료 코드 2)
 */
export class UserError extends Error {
  readonly exitCode: number = 2;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 잘못된 CLI 입력 (폰트 확장자, 중복 파일명, 버전 형식, 동시 지정 불가 옵션 등)
 */
export class InputError extends UserError {}

/**
 * 잘못된 내부 설정값 (예: 지원하지 않는 따옴표 스타일)
 */
export class ConfigurationError extends InputError {}

/**
 * 외부 명령 실패 또는 파일 복사 중 OS 에러
 */
export class ExternalToolError extends UserError {
  constructor(
    message: string,
    readonly command?: string,
    /** 외부 명령의 종료 코드 (OS 에러면 없음) */
    readonly commandExitCode?: number
  ) {
    super(message);
  }
}

/**
 * SIGINT/SIGTERM으로 중단됨 (종료 코드 130)
 */
export class InterruptedError extends Error {
  readonly exitCode = 130;

  constructor(message = '사용자에 의해 중단되었습니다') {
    super(message);
    this.name = 'InterruptedError';
  }
}
