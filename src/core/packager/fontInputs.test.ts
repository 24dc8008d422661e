import { describe, it, expect, vi } from 'vitest';
import {
  inspectFontFiles,
  resolveBuildAction,
  defaultPackageName,
  createPackageDescriptor,
  fontInstallDir,
} from './fontInputs';
import { InputError } from '../shared/errors';

describe('fontInputs', () => {
  describe('resolveBuildAction', () => {
    it('플래그가 없으면 binary', () => {
      expect(resolveBuildAction({})).toBe('binary');
    });

    it('install / source', () => {
      expect(resolveBuildAction({ install: true })).toBe('install');
      expect(resolveBuildAction({ source: true })).toBe('source');
    });

    it('둘 다 지정하면 InputError', () => {
      expect(() => resolveBuildAction({ install: true, source: true })).toThrow(InputError);
    });
  });

  describe('inspectFontFiles', () => {
    it('파일명, 이름, 타입 추출 및 경로 해석', () => {
      const fonts = inspectFontFiles(['A.ttf', 'sub/B.otf', '/abs/C.Bold.TTF'], '/work');
      expect(fonts).toEqual([
        { sourcePath: '/work/A.ttf', fileName: 'A.ttf', stem: 'A', type: 'TTF' },
        { sourcePath: '/work/sub/B.otf', fileName: 'B.otf', stem: 'B', type: 'OTF' },
        { sourcePath: '/abs/C.Bold.TTF', fileName: 'C.Bold.TTF', stem: 'C.Bold', type: 'TTF' },
      ]);
    });

    it('확장자는 대소문자 구분 없음', () => {
      const fonts = inspectFontFiles(['x.Otf'], '/work');
      expect(fonts[0].type).toBe('OTF');
    });

    it('지원하지 않는 확장자는 실패', () => {
      expect(() => inspectFontFiles(['bar.woff'], '/work')).toThrow(InputError);
      expect(() => inspectFontFiles(['A.ttf', 'bar.woff'], '/work')).toThrow(
        'bar.woff: not a recognized font type'
      );
      expect(() => inspectFontFiles(['noext'], '/work')).toThrow(InputError);
    });

    it('경로가 달라도 파일명이 같으면 실패', () => {
      expect(() => inspectFontFiles(['one/Foo.ttf', 'two/Foo.ttf'], '/work')).toThrow(
        'two/Foo.ttf: duplicate font filename'
      );
    });

    it('빈 목록은 실패', () => {
      expect(() => inspectFontFiles([], '/work')).toThrow(InputError);
    });
  });

  describe('defaultPackageName', () => {
    it('첫 번째 폰트의 타입과 이름 사용', () => {
      const fonts = inspectFontFiles(['A.ttf', 'B.otf'], '/work');
      expect(defaultPackageName(fonts)).toBe('ttf-A');
    });
  });

  describe('createPackageDescriptor', () => {
    const fonts = inspectFontFiles(['A.ttf', 'B.otf'], '/work');

    it('기본 패키지명은 정리 후 ttf-a', () => {
      const descriptor = createPackageDescriptor(fonts, {
        versionSpec: '1.0-1',
        description: 'Custom font',
      });

      expect(descriptor).toEqual({
        fontTypes: ['TTF', 'OTF'],
        fontFiles: ['A.ttf', 'B.otf'],
        fontNames: ['A', 'B'],
        pkgName: 'ttf-a',
        pkgVersion: '1.0',
        pkgRelease: '1',
        pkgDescription: 'Custom font',
        arch: 'any',
      });
    });

    it('--name이 있으면 정리해서 사용하고 경고 전달', () => {
      const onWarning = vi.fn();
      const descriptor = createPackageDescriptor(fonts, {
        name: 'My Fonts',
        versionSpec: '2.3-4',
        description: 'x',
        onWarning,
      });

      expect(descriptor.pkgName).toBe('my-fonts');
      expect(descriptor.pkgVersion).toBe('2.3');
      expect(descriptor.pkgRelease).toBe('4');
      expect(onWarning).toHaveBeenCalledTimes(1);
    });

    it('잘못된 버전은 InputError', () => {
      expect(() =>
        createPackageDescriptor(fonts, { versionSpec: '1.0-0', description: 'x' })
      ).toThrow(InputError);
    });

    it('생성 후 변경 불가', () => {
      const descriptor = createPackageDescriptor(fonts, {
        versionSpec: '1.0',
        description: 'x',
      });
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.fontFiles)).toBe(true);
    });
  });

  it('fontInstallDir', () => {
    expect(fontInstallDir('TTF')).toBe('/usr/share/fonts/TTF');
    expect(fontInstallDir('OTF')).toBe('/usr/share/fonts/OTF');
  });
});
