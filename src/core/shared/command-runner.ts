/**
 * 외부 명령 실행기
 * updpkgsums, makepkg 등 외부 도구를 실행하고 종료 코드를 돌려줍니다.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  /** 시그널로 종료된 경우 시그널 이름 */
  signal: NodeJS.Signals | null;
}

export interface RunCommandOptions {
  cwd?: string;
  /** abort되면 자식 프로세스에 SIGTERM 전달 */
  signal?: AbortSignal;
}

/**
 * 외부 명령 실행 함수 타입
 * 테스트에서는 가짜 구현으로 교체합니다.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/**
 * 명령을 실행하고 종료될 때까지 기다립니다.
 * 출력은 터미널로 그대로 흘려보냅니다. 실행 자체가 실패하면(명령 없음 등) reject합니다.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd ?? process.cwd(),
      stdio: 'inherit',
      signal: options.signal,
      killSignal: 'SIGTERM',
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? 1,
        signal,
      });
    });

    child.on('error', (err) => {
      reject(err);
    });
  });
};
