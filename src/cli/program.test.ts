import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createProgram, VERSION } from './program';

describe('createProgram', () => {
  let errOutput: string;
  let stdOutput: string;

  function parse(args: string[]): Promise<unknown> {
    const program = createProgram();
    program.configureOutput({
      writeErr: (str) => {
        errOutput += str;
      },
      writeOut: (str) => {
        stdOutput += str;
      },
    });
    return program.parseAsync(['node', 'fontpkg', ...args]);
  }

  beforeEach(() => {
    errOutput = '';
    stdOutput = '';
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('폰트 파일이 없으면 사용법 오류로 종료 코드 2', async () => {
    await expect(parse([])).rejects.toThrow('process.exit(2)');
    expect(errOutput).toContain("missing required argument 'fonts'");
  });

  it('알 수 없는 옵션은 종료 코드 2', async () => {
    await expect(parse(['--bogus', 'A.ttf'])).rejects.toThrow('process.exit(2)');
    expect(errOutput).toContain("unknown option '--bogus'");
  });

  it('--version은 종료 코드 0', async () => {
    await expect(parse(['--version'])).rejects.toThrow('process.exit(0)');
    expect(stdOutput).toBe(`${VERSION}\n`);
  });

  it('-i와 -S를 함께 쓰면 설정 디렉토리를 만들지 않고 종료 코드 2', async () => {
    const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fontpkg-program-'));
    const previousHome = process.env.FONTPKG_HOME;
    process.env.FONTPKG_HOME = path.join(baseDir, 'home');
    try {
      await expect(parse(['-i', '-S', 'A.ttf'])).rejects.toThrow('process.exit(2)');
      expect(vi.mocked(console.error)).toHaveBeenCalledWith(
        expect.stringContaining('--install과 --source는 함께 사용할 수 없습니다')
      );
      expect(await fs.pathExists(path.join(baseDir, 'home'))).toBe(false);
    } finally {
      if (previousHome === undefined) {
        delete process.env.FONTPKG_HOME;
      } else {
        process.env.FONTPKG_HOME = previousHome;
      }
      await fs.remove(baseDir);
    }
  });

  it('-s는 --source의 별칭', async () => {
    await expect(parse(['-i', '-s', 'A.ttf'])).rejects.toThrow('process.exit(2)');
  });
});
