import { describe, it, expect, vi } from 'vitest';

import { AmbiguousOptionError, AmbiguousValueError, InvalidValueError } from '@/engine/args';
import type { Env } from '@/engine/args';
import { LsCommand } from '@/engine/cmd/unixOperations';
import type { LsSettings } from '@/engine/cmd/unixOperations';
import { loggerStore } from '@/stores/loggerStore';

/**
 * ls の引数解析テスト
 * 同じ設定を書く複数のスペリングと、列挙値の別名を中心に確認する
 */

const ls = new LsCommand();

function parse(args: string[], env: Env = {}): LsSettings {
  const outcome = ls.parse(args, { env });
  if (outcome.kind !== 'settings') throw new Error(`unexpected ${outcome.kind} request`);
  return outcome.settings;
}

describe('ls', () => {
  it('オプションとファイルを混在できる', () => {
    const s = parse(['a', '-la', 'b']);
    expect(s.files).toEqual(['a', 'b']);
    expect(s.format).toBe('long');
    expect(s.whichFiles).toBe('all');
  });

  describe('表示幅', () => {
    it('既定は 80', () => {
      expect(parse([]).width).toBe(80);
    });

    it('COLUMNS から取る', () => {
      expect(parse([], { COLUMNS: '120' }).width).toBe(120);
    });

    it('不正な COLUMNS は警告して無視する', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      expect(parse([], { COLUMNS: 'abc' }).width).toBe(80);
      expect(loggerStore.messages.map(m => m.message)).toEqual([
        "ignoring invalid width in environment variable COLUMNS: 'abc'",
      ]);
      warn.mockRestore();
    });

    it('-w が COLUMNS より優先', () => {
      expect(parse(['-w', '100'], { COLUMNS: '120' }).width).toBe(100);
    });

    it('-w は 16 ビットに収まること', () => {
      expect(() => parse(['-w', '70000'])).toThrow(
        "invalid argument '70000' for '-w': value too large"
      );
    });
  });

  describe('--format', () => {
    it('短いオプションは --format の別表記', () => {
      expect(parse(['-l']).format).toBe('long');
      expect(parse(['-1']).format).toBe('single-column');
      expect(parse(['-C']).format).toBe('vertical');
      expect(parse(['-x']).format).toBe('across');
      expect(parse(['-m']).format).toBe('commas');
    });

    it('後勝ち', () => {
      expect(parse(['-l', '--format=commas']).format).toBe('commas');
      expect(parse(['--format=commas', '-l']).format).toBe('long');
      expect(parse(['-l1']).format).toBe('single-column');
    });

    it('別名', () => {
      expect(parse(['--format=h']).format).toBe('across');
      expect(parse(['--format=verb']).format).toBe('long');
    });

    it('異なる形式にまたがる前方一致は曖昧', () => {
      expect(() => parse(['--format=ver'])).toThrow(AmbiguousValueError);
    });

    it('-g / -o / -n は長い形式を選ぶ', () => {
      const s = parse(['-o', '-n']);
      expect(s.format).toBe('long');
      expect(s.longNoGroup).toBe(true);
      expect(s.longNumericUidGid).toBe(true);
      expect(parse(['-g']).longNoOwner).toBe(true);
    });
  });

  describe('--sort と --time', () => {
    it('短いオプションは --sort の別表記', () => {
      expect(parse(['-t']).sort).toBe('time');
      expect(parse(['-S']).sort).toBe('size');
      expect(parse(['-t', '-U']).sort).toBe('none');
      expect(parse(['-v']).sort).toBe('version');
      expect(parse(['-X']).sort).toBe('extension');
    });

    it('値の前方一致', () => {
      expect(parse(['--sort=v']).sort).toBe('version');
      expect(parse(['--sort=e']).sort).toBe('extension');
      expect(() => parse(['--sort=name'])).toThrow(InvalidValueError);
    });

    it('-c / -u は --time の別表記', () => {
      expect(parse(['-c']).time).toBe('change');
      expect(parse(['-u']).time).toBe('access');
      expect(parse(['--time=use']).time).toBe('access');
    });

    it('同じメンバーの別名だけに一致する前方一致は曖昧としない', () => {
      expect(parse(['--time=a']).time).toBe('access');
    });

    it('異なるメンバーにまたがる前方一致', () => {
      expect(() => parse(['--time=c'])).toThrow(
        "ambiguous argument 'c' for '--time'\nValid arguments are: 'ctime' 'change' 'creation'"
      );
    });
  });

  describe('--color / --classify', () => {
    it('既定は never', () => {
      expect(parse([]).color).toBe('never');
    });

    it('値なしは always', () => {
      expect(parse(['--color']).color).toBe('always');
    });

    it('別名', () => {
      expect(parse(['--color=tty']).color).toBe('auto');
      expect(parse(['--color=force']).color).toBe('always');
      expect(parse(['--color=n']).color).toBe('never');
    });

    it('-F は classify', () => {
      expect(parse(['-F']).indicatorStyle).toBe('classify');
      expect(parse(['--classify=auto']).indicatorStyle).toBe('classify');
      expect(parse(['-F', '--classify=never']).indicatorStyle).toBe('none');
    });

    it('--indicator-style の別表記', () => {
      expect(parse(['-p']).indicatorStyle).toBe('slash');
      expect(parse(['--file-type']).indicatorStyle).toBe('file-type');
      expect(parse(['--indicator-style=cl']).indicatorStyle).toBe('classify');
    });
  });

  describe('--quoting-style', () => {
    it('別表記', () => {
      expect(parse(['-N']).quotingStyle).toBe('literal');
      expect(parse(['--escape']).quotingStyle).toBe('escape');
      expect(parse(['-Q']).quotingStyle).toBe('c');
      expect(parse(['--quote-name']).quotingStyle).toBe('c');
    });

    it('完全一致は長い名前の前方一致より優先', () => {
      expect(parse(['--quoting-style=shell-escape']).quotingStyle).toBe('shell-escape');
      expect(() => parse(['--quoting-style=shell-e'])).toThrow(AmbiguousValueError);
    });

    it('--quot は曖昧', () => {
      expect(() => parse(['--quot'])).toThrow(
        "option '--quot' is ambiguous; possibilities: '--quoting-style' '--quote-name'"
      );
    });
  });

  describe('複数の設定を書くオプション', () => {
    it('-f は -a -U と色なし', () => {
      const s = parse(['--color', '-f']);
      expect(s.whichFiles).toBe('all');
      expect(s.sort).toBe('none');
      expect(s.color).toBe('never');
    });

    it('-f の後の指定は有効', () => {
      expect(parse(['-f', '-t']).sort).toBe('time');
    });
  });

  describe('その他', () => {
    it('完全一致は --almost-all に勝つ', () => {
      expect(parse(['--all']).whichFiles).toBe('all');
      expect(parse(['--alm']).whichFiles).toBe('almost-all');
      expect(() => parse(['--al'])).toThrow(AmbiguousOptionError);
    });

    it('参照の扱い', () => {
      expect(parse(['-L']).dereference).toBe('all');
      expect(parse(['--dereference-command-line']).dereference).toBe('args');
      expect(parse(['--dereference-command-line-s']).dereference).toBe('dir-args');
    });

    it('--ignore は複数指定できる', () => {
      expect(parse(['-I', '*.o', '--ignore=*~']).ignorePatterns).toEqual(['*.o', '*~']);
    });

    it('制御文字の表示は後勝ち', () => {
      expect(parse(['-q', '--show-control-chars']).hideControlChars).toBe(false);
      expect(parse(['--show-control-chars', '-q']).hideControlChars).toBe(true);
    });

    it('サイズ表記', () => {
      expect(parse(['-h']).sizeFormat).toBe('binary');
      expect(parse(['-h', '--si']).sizeFormat).toBe('si');
      expect(parse(['-sk']).allocationSize).toBe(true);
    });

    it('--zero', () => {
      expect(parse(['--zero']).eol).toBe('\0');
    });
  });
});
