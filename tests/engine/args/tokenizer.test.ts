import { describe, it, expect } from 'vitest';

import { Tokenizer, createArgSpec, matchNumeric } from '@/engine/args';
import type { ArgSpecDef, Token } from '@/engine/args';

/**
 * 字句解析のテスト
 */

const tailLike: ArgSpecDef = {
  options: [
    { id: 'lines', flags: ['-n NUM', '--lines=NUM'] },
    { id: 'verbose', flags: ['-v', '--verbose'] },
    { id: 'obsolete', flags: [] },
  ],
  numeric: [
    { sign: '-', target: 'obsolete', suffix: 'cf', firstOnly: true },
    { sign: '+', target: 'obsolete' },
  ],
};

const spec = createArgSpec(tailLike);

function tokenize(argv: string[], def: ArgSpecDef = tailLike): Token[] {
  return [...new Tokenizer(argv, createArgSpec(def))];
}

describe('Tokenizer', () => {
  describe('基本の分類', () => {
    it('短いオプション・長いオプション・値・終端', () => {
      expect(tokenize(['-v', '--lines=5', '--verbose', 'file', '-', '--', '-v'])).toEqual([
        { kind: 'short', chars: 'v', raw: '-v', position: 0 },
        { kind: 'long', name: 'lines', value: '5', raw: '--lines=5', position: 1 },
        { kind: 'long', name: 'verbose', value: null, raw: '--verbose', position: 2 },
        { kind: 'value', value: 'file', position: 3 },
        { kind: 'value', value: '-', position: 4 },
        { kind: 'terminator', position: 5 },
        { kind: 'value', value: '-v', position: 6 },
      ]);
    });

    it('終端の後の -- は値', () => {
      expect(tokenize(['--', '--'])).toEqual([
        { kind: 'terminator', position: 0 },
        { kind: 'value', value: '--', position: 1 },
      ]);
    });

    it('長いオプションは最初の = で分ける', () => {
      expect(tokenize(['--a=b=c', '--=x', '--lines='])).toEqual([
        { kind: 'long', name: 'a', value: 'b=c', raw: '--a=b=c', position: 0 },
        { kind: 'long', name: '', value: 'x', raw: '--=x', position: 1 },
        { kind: 'long', name: 'lines', value: '', raw: '--lines=', position: 2 },
      ]);
    });

    it('短いオプションのクラスタはそのまま渡す', () => {
      expect(tokenize(['-vn5'])).toEqual([
        { kind: 'short', chars: 'vn5', raw: '-vn5', position: 0 },
      ]);
    });
  });

  describe('旧式の数値省略形', () => {
    it('最初の引数の -NUM', () => {
      const [token] = tokenize(['-20', 'file']);
      expect(token).toMatchObject({
        kind: 'numeric',
        match: { sign: '-', digits: '20', suffix: '' },
        binding: { target: 'obsolete', sign: '-' },
        raw: '-20',
        position: 0,
      });
    });

    it('firstOnly のバインディングは 2 番目以降では値になる', () => {
      expect(tokenize(['file', '-20'])[1]).toEqual({ kind: 'value', value: '-20', position: 1 });
    });

    it('+NUM は位置を問わない', () => {
      expect(tokenize(['file', '+20'])[1]).toMatchObject({ kind: 'numeric', raw: '+20', position: 1 });
    });

    it('接尾辞は宣言された文字を一度ずつ', () => {
      expect(tokenize(['-100cf'])[0]).toMatchObject({
        kind: 'numeric',
        match: { sign: '-', digits: '100', suffix: 'cf' },
      });
      expect(tokenize(['-100cc'])[0]).toEqual({ kind: 'value', value: '-100cc', position: 0 });
      expect(tokenize(['-100x'])[0]).toEqual({ kind: 'value', value: '-100x', position: 0 });
    });

    it('数字のない + や一致しない + は値', () => {
      expect(tokenize(['+', '+x', '+5c'])).toEqual([
        { kind: 'value', value: '+', position: 0 },
        { kind: 'value', value: '+x', position: 1 },
        { kind: 'value', value: '+5c', position: 2 },
      ]);
    });
  });

  describe('数字の短いオプションと数値省略形の優先', () => {
    const digitDef = (numericPrecedence: 'short' | 'numeric'): ArgSpecDef => ({
      options: [
        { id: 'five', flags: ['-5'] },
        { id: 'count', flags: [] },
      ],
      numeric: [{ sign: '-', target: 'count' }],
      numericPrecedence,
    });

    it('既定では宣言された短いオプションが勝つ', () => {
      expect(tokenize(['-5'], digitDef('short'))[0]).toEqual({
        kind: 'short',
        chars: '5',
        raw: '-5',
        position: 0,
      });
    });

    it('numeric では数値省略形が勝つ', () => {
      expect(tokenize(['-5'], digitDef('numeric'))[0]).toMatchObject({ kind: 'numeric', raw: '-5' });
    });

    it('numeric でもバインディングに一致しなければクラスタ', () => {
      expect(tokenize(['-5x'], digitDef('numeric'))[0]).toEqual({
        kind: 'short',
        chars: '5x',
        raw: '-5x',
        position: 0,
      });
    });

    it('宣言もバインディングもなければ値', () => {
      expect(tokenize(['-7'], { options: [{ id: 'v', flags: ['-v'] }] })[0]).toEqual({
        kind: 'value',
        value: '-7',
        position: 0,
      });
    });
  });

  describe('カーソル操作', () => {
    it('takeRaw と rest は次の引数を解釈せずに返す', () => {
      const tokens = new Tokenizer(['-n', '-v', 'a', 'b'], spec);

      expect(tokens.next()).toEqual({ kind: 'short', chars: 'n', raw: '-n', position: 0 });
      expect(tokens.takeRaw()).toEqual({ value: '-v', position: 1 });
      expect(tokens.position).toBe(2);
      expect(tokens.rest()).toEqual(['a', 'b']);
      expect(tokens.next()).toBeNull();
      expect(tokens.takeRaw()).toBeNull();
    });
  });
});

describe('matchNumeric', () => {
  it('符号・数字・接尾辞に分ける', () => {
    expect(matchNumeric('-100cf', 0, spec.numeric)?.match).toEqual({
      sign: '-',
      digits: '100',
      suffix: 'cf',
    });
  });

  it('一致しない形', () => {
    expect(matchNumeric('-100cf', 1, spec.numeric)).toBeNull();
    expect(matchNumeric('abc', 0, spec.numeric)).toBeNull();
    expect(matchNumeric('-', 0, spec.numeric)).toBeNull();
    expect(matchNumeric('-c', 0, spec.numeric)).toBeNull();
  });
});
