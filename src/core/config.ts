import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 패키지 기본값
  defaultVersion: string;
  defaultDescription: string;

  // 외부 도구
  makepkgCommand: string;
  updpkgsumsCommand: string;
  /** PKGBUILD의 PKGEXT 값 (바이너리 패키지 확장자) */
  packageExtension: string;

  // 기타 설정
  logLevel: string;
}

const CONFIG_KEYS: (keyof Config)[] = [
  'defaultVersion',
  'defaultDescription',
  'makepkgCommand',
  'updpkgsumsCommand',
  'packageExtension',
  'logLevel',
];

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  defaultVersion: '1.0-1',
  defaultDescription: 'Custom font',
  makepkgCommand: 'makepkg',
  updpkgsumsCommand: 'updpkgsums',
  packageExtension: '.pkg.tar.zst',
  logLevel: 'info',
};

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  /**
   * @param baseDir 설정 디렉토리 (기본값: $FONTPKG_HOME 또는 ~/.fontpkg)
   */
  constructor(baseDir?: string) {
    this.configDir = baseDir ?? process.env.FONTPKG_HOME ?? path.join(os.homedir(), '.fontpkg');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없거나 읽을 수 없으면 기본값을 사용합니다.
   * 빌드 때마다 읽기만 하므로 기본값 파일을 만들지는 않습니다.
   */
  async loadConfig(onWarning?: (message: string) => void): Promise<Config> {
    if (!(await fs.pathExists(this.configPath))) {
      return { ...DEFAULT_CONFIG };
    }

    try {
      const rawConfig: unknown = await fs.readJson(this.configPath);
      // 저장된 설정과 기본값을 병합 (새로운 설정 항목 대응)
      return { ...DEFAULT_CONFIG, ...pickConfig(rawConfig) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      onWarning?.(`설정 파일 로드 실패, 기본값 사용: ${message}`);
      return { ...DEFAULT_CONFIG };
    }
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }
}

/**
 * JSON에서 문자열 타입인 알려진 키만 골라냅니다.
 */
function pickConfig(raw: unknown): Partial<Config> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('설정 파일 최상위 값이 객체가 아닙니다');
  }

  const picked: Partial<Config> = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === 'string' && value.length > 0) {
      picked[key] = value;
    }
  }
  return picked;
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
