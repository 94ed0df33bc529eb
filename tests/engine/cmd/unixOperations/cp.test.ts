import { describe, it, expect } from 'vitest';

import {
  AmbiguousOptionError,
  AmbiguousValueError,
  InvalidValueError,
  MissingOperandError,
} from '@/engine/args';
import type { Env } from '@/engine/args';
import { CpCommand } from '@/engine/cmd/unixOperations';
import type { CpSettings } from '@/engine/cmd/unixOperations';

/**
 * cp の引数解析テスト
 */

const cp = new CpCommand();

function parse(args: string[], env: Env = {}): CpSettings {
  const outcome = cp.parse(args, { env });
  if (outcome.kind !== 'settings') throw new Error(`unexpected ${outcome.kind} request`);
  return outcome.settings;
}

describe('cp', () => {
  describe('オペランドのレイアウト', () => {
    it('最後のオペランドが宛先', () => {
      const s = parse(['a', 'b', 'c', 'dir']);
      expect(s.sources).toEqual(['a', 'b', 'c']);
      expect(s.destination).toBe('dir');
    });

    it('-t DIRECTORY があれば全部がコピー元', () => {
      const s = parse(['-t', 'dir', 'a', 'b']);
      expect(s.targetDirectory).toBe('dir');
      expect(s.sources).toEqual(['a', 'b']);
      expect(s.destination).toBeNull();
    });

    it('--target-directory は後ろに置いてもよい', () => {
      const s = parse(['a', 'b', '--target-directory=dir']);
      expect(s.sources).toEqual(['a', 'b']);
      expect(s.destination).toBeNull();
    });

    it('オペランドが一つだけ', () => {
      expect(() => parse(['a'])).toThrow(MissingOperandError);
      expect(() => parse(['a'])).toThrow("missing operand after 'a'");
    });

    it('-t だけでコピー元がない', () => {
      expect(() => parse(['-t', 'dir'])).toThrow(/^missing operand$/);
    });

    it('-T', () => {
      expect(parse(['-T', 'a', 'b']).noTargetDirectory).toBe(true);
    });
  });

  describe('上書きの扱い', () => {
    it('-f / -i / -n は最後のものが勝つ', () => {
      expect(parse(['-i', '-n', '-f', 'a', 'b']).overwrite).toBe('force');
      expect(parse(['-f', '-i', 'a', 'b']).overwrite).toBe('interactive');
      expect(parse(['-fin', 'a', 'b']).overwrite).toBe('no-clobber');
    });
  });

  describe('--archive', () => {
    it('-a は -dR --preserve=all', () => {
      const s = parse(['-a', 'a', 'b']);
      expect(s.recursive).toBe(true);
      expect(s.dereference).toBe('never');
      expect(s.preserve).toEqual(['mode', 'ownership', 'timestamps', 'context', 'links', 'xattr']);
    });

    it('--no-preserve で属性を外す', () => {
      expect(parse(['-a', '--no-preserve=mode,xattr', 'a', 'b']).preserve).toEqual([
        'ownership',
        'timestamps',
        'context',
        'links',
      ]);
    });
  });

  describe('--preserve', () => {
    it('-p と値なしの --preserve は mode,ownership,timestamps', () => {
      expect(parse(['-p', 'a', 'b']).preserve).toEqual(['mode', 'ownership', 'timestamps']);
      expect(parse(['--preserve', 'a', 'b']).preserve).toEqual(['mode', 'ownership', 'timestamps']);
    });

    it('属性リスト', () => {
      expect(parse(['--preserve=links,mode', '-p', 'a', 'b']).preserve).toEqual([
        'links',
        'mode',
        'ownership',
        'timestamps',
      ]);
    });

    it('未知の属性', () => {
      expect(() => parse(['--preserve=mode,bogus', 'a', 'b'])).toThrow(InvalidValueError);
      expect(() => parse(['--preserve=mode,bogus', 'a', 'b'])).toThrow(
        "invalid argument 'bogus' for '--preserve'"
      );
    });
  });

  describe('--backup', () => {
    it('-b と値なしの --backup は existing', () => {
      expect(parse(['-b', 'a', 'b']).backup).toBe('existing');
      expect(parse(['--backup', 'a', 'b']).backup).toBe('existing');
    });

    it('同じ制御を指す別名', () => {
      expect(parse(['--backup=t', 'a', 'b']).backup).toBe('numbered');
      expect(parse(['--backup=nil', 'a', 'b']).backup).toBe('existing');
      expect(parse(['--backup=never', 'a', 'b']).backup).toBe('simple');
      expect(parse(['--backup=off', 'a', 'b']).backup).toBe('none');
      expect(parse(['--backup=num', 'a', 'b']).backup).toBe('numbered');
    });

    it('異なる制御にまたがる前方一致は曖昧', () => {
      expect(() => parse(['--backup=n', 'a', 'b'])).toThrow(AmbiguousValueError);
    });

    it('任意値は = なしでは取らない', () => {
      const s = parse(['--backup', 'numbered', 'a', 'b']);
      expect(s.backup).toBe('existing');
      expect(s.sources).toEqual(['numbered', 'a']);
      expect(s.destination).toBe('b');
    });

    it('接尾辞は SIMPLE_BACKUP_SUFFIX から', () => {
      expect(parse(['a', 'b']).suffix).toBe('~');
      expect(parse(['a', 'b'], { SIMPLE_BACKUP_SUFFIX: '.bak' }).suffix).toBe('.bak');
      expect(parse(['-S', '.orig', 'a', 'b'], { SIMPLE_BACKUP_SUFFIX: '.bak' }).suffix).toBe('.orig');
    });
  });

  describe('その他のオプション', () => {
    it('--reflink と --sparse', () => {
      expect(parse(['--reflink', 'a', 'b']).reflink).toBe('always');
      expect(parse(['--reflink=au', 'a', 'b']).reflink).toBe('auto');
      expect(parse(['--sparse=never', 'a', 'b']).sparse).toBe('never');
      expect(() => parse(['--reflink=a', 'a', 'b'])).toThrow(
        "ambiguous argument 'a' for '--reflink'\nValid arguments are: 'always' 'auto'"
      );
    });

    it('リンクの作成は後勝ち', () => {
      expect(parse(['-l', '-s', 'a', 'b']).link).toBe('symbolic');
      expect(parse(['-s', '-l', 'a', 'b']).link).toBe('hard');
    });

    it('クラスタ', () => {
      const s = parse(['-rvu', 'a', 'b']);
      expect([s.recursive, s.verbose, s.update]).toEqual([true, true, true]);
    });

    it('参照の扱い', () => {
      expect(parse(['-L', 'a', 'b']).dereference).toBe('always');
      expect(parse(['-H', 'a', 'b']).dereference).toBe('command-line');
      expect(parse(['--no-d', 'a', 'b']).dereference).toBe('never');
    });

    it('--no だけでは曖昧', () => {
      expect(() => parse(['--no', 'a', 'b'])).toThrow(AmbiguousOptionError);
      expect(() => parse(['--no', 'a', 'b'])).toThrow(
        "option '--no' is ambiguous; possibilities: '--no-clobber' '--no-dereference' '--no-preserve' '--no-target-directory'"
      );
    });
  });

  it('ディレクトリを取るオプションはディレクトリを補完する', () => {
    const lines = cp.completion('fish').split('\n');
    expect(lines.filter(l => l.includes('__fish_complete_directories'))).toEqual([
      "complete -c cp -s t -l target-directory -r -f -a '(__fish_complete_directories)'",
    ]);
  });
});
