// ============================================
// 폰트 패키지 관련 타입
// ============================================

/** 지원하는 폰트 타입 (확장자 대문자) */
export type FontType = 'TTF' | 'OTF';

/** 패키지 아키텍처 (폰트 패키지는 항상 any) */
export type PackageArch = 'any';

/** makepkg 실행 모드 */
export type BuildAction = 'install' | 'source' | 'binary';

/** 입력 폰트 파일 정보 */
export interface FontFileInfo {
  /** 호출 디렉토리 기준으로 해석한 절대 경로 */
  sourcePath: string;
  /** 파일명 (예: Foo.ttf) */
  fileName: string;
  /** 확장자를 뺀 파일명 (예: Foo) */
  stem: string;
  type: FontType;
}

/**
 * 패키지 디스크립터
 * 호출 한 번에 한 번만 만들어지고 이후 변경되지 않음
 */
export interface PackageDescriptor {
  readonly fontTypes: readonly FontType[];
  readonly fontFiles: readonly string[];
  readonly fontNames: readonly string[];
  readonly pkgName: string;
  readonly pkgVersion: string;
  readonly pkgRelease: string;
  /** 원문 그대로 보관, 스크립트에 넣을 때 이스케이프 */
  readonly pkgDescription: string;
  readonly arch: PackageArch;
}

// ============================================
// 빌드 관련 타입
// ============================================

/** 빌드 단계 */
export type BuildStage =
  | 'parseArgs'
  | 'validateFonts'
  | 'validateNameVersion'
  | 'stageFiles'
  | 'generateArtifacts'
  | 'computeChecksums'
  | 'build'
  | 'finalize'
  | 'done'
  | 'failed';

/** 빌드 요청 (CLI 옵션에서 생성) */
export interface BuildRequest {
  fontPaths: string[];
  install?: boolean;
  source?: boolean;
  name?: string;
  /** VER 또는 VER-REL */
  versionSpec: string;
  description: string;
}

/** 빌드 결과 */
export interface BuildResult {
  descriptor: PackageDescriptor;
  action: BuildAction;
  /** 호출 디렉토리로 복사된 산출물 경로 */
  artifactPath: string;
}
