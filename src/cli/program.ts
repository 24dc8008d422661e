import { Command, Option } from 'commander';
import chalk from 'chalk';
import { buildCommand } from './commands/build';
import type { BuildCommandOptions } from './commands/build';

// 버전 정보
export const VERSION = '1.0.0';

/**
 * fontpkg 명령줄 프로그램 생성
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('fontpkg')
    .description(chalk.cyan('fontpkg - TTF/OTF 폰트를 설치 가능한 패키지로 만드는 도구'))
    .version(VERSION, '-v, --version', '버전 정보 표시')
    .helpOption('-h, --help', '도움말 표시')
    .argument('<fonts...>', '패키지에 넣을 폰트 파일 (.ttf, .otf)')
    .option('-i, --install', '빌드 후 바로 설치')
    .option('-S, --source', '바이너리 대신 소스 패키지 생성')
    .addOption(new Option('-s', '--source와 같음').hideHelp())
    .option('-n, --name <name>', '패키지명 (기본값: <폰트 타입>-<첫 번째 폰트 이름>)')
    .option('--ver <version>', '버전[-릴리스] (기본값: 1.0-1)')
    .option('--desc <text>', '패키지 설명 (기본값: Custom font)')
    .option('--verbose', '디버그 로그 출력')
    .addHelpText(
      'after',
      `
예시:
  ${chalk.gray('fontpkg MyFont-Regular.ttf MyFont-Bold.ttf')}
  ${chalk.gray('fontpkg -n my-fonts --ver 2.1-3 --desc "사내 폰트" *.otf')}
  ${chalk.gray('fontpkg -i Foo.ttf')}`
    )
    .action(async (fonts: string[], options: BuildCommandOptions) => {
      await buildCommand(fonts, options);
    });

  // commander 에러 메시지는 빨간색으로
  program.configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
  });

  // 사용법 오류는 종료 코드 2, 도움말/버전은 0
  program.exitOverride((err) => {
    process.exit(err.exitCode === 0 ? 0 : 2);
  });

  return program;
}
