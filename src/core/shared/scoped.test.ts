import { describe, it, expect } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { withTempDirectory, withWorkingDirectory } from './scoped';

describe('scoped', () => {
  describe('withTempDirectory', () => {
    it('콜백 동안 디렉토리가 존재하고 끝나면 삭제', async () => {
      let seen = '';
      const result = await withTempDirectory('fontpkg-test-', async (dir) => {
        seen = dir;
        expect(await fs.pathExists(dir)).toBe(true);
        expect(path.basename(dir).startsWith('fontpkg-test-')).toBe(true);
        await fs.writeFile(path.join(dir, 'a.txt'), 'a');
        return 42;
      });

      expect(result).toBe(42);
      expect(await fs.pathExists(seen)).toBe(false);
    });

    it('콜백이 실패해도 삭제 후 에러 전파', async () => {
      let seen = '';
      await expect(
        withTempDirectory('fontpkg-test-', async (dir) => {
          seen = dir;
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(seen).not.toBe('');
      expect(await fs.pathExists(seen)).toBe(false);
    });
  });

  describe('withWorkingDirectory', () => {
    it('콜백 동안 cwd 변경 후 복원', async () => {
      const original = process.cwd();
      const target = await fs.realpath(os.tmpdir());

      const previous = await withWorkingDirectory(target, async (prev) => {
        expect(await fs.realpath(process.cwd())).toBe(target);
        return prev;
      });

      expect(previous).toBe(original);
      expect(process.cwd()).toBe(original);
    });

    it('콜백이 실패해도 cwd 복원', async () => {
      const original = process.cwd();

      await expect(
        withWorkingDirectory(os.tmpdir(), async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(process.cwd()).toBe(original);
    });
  });
});
