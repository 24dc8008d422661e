/**
 * 범위 기반 자원 관리
 * 임시 디렉토리와 작업 디렉토리를 콜백 범위 안에서만 유지하고,
 * 성공/실패/중단 어느 경로로 빠져나가도 반드시 정리합니다.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

/**
 * 새 임시 디렉토리를 만들어 fn에 넘기고, 끝나면 삭제합니다.
 */
export async function withTempDirectory<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.remove(dir);
  }
}

/**
 * fn 실행 동안 현재 작업 디렉토리를 dir로 바꾸고, 끝나면 원래 디렉토리로 복원합니다.
 * 원래 디렉토리 경로를 fn에 넘깁니다.
 */
export async function withWorkingDirectory<T>(
  dir: string,
  fn: (previousDir: string) => Promise<T>
): Promise<T> {
  const previousDir = process.cwd();
  process.chdir(dir);
  try {
    return await fn(previousDir);
  } finally {
    process.chdir(previousDir);
  }
}
