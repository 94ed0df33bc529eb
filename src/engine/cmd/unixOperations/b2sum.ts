import { InvalidValueError, atLeast, createArgSpec, requireValue, toInteger } from '@/engine/args';
import type { ArgEvent } from '@/engine/args';

import { UnixCommandBase } from './base';

export type CheckOutput = 'warn' | 'quiet' | 'status';

export interface B2sumSettings {
  binary: boolean;
  check: boolean;
  tag: boolean;
  /** ダイジェストのビット長 */
  length: number;
  checkOutput: CheckOutput;
  strict: boolean;
  ignoreMissing: boolean;
  zero: boolean;
  files: string[];
}

const b2sumSpec = createArgSpec({
  options: [
    { id: 'binary', flags: ['-b', '--binary'], help: 'read in binary mode' },
    { id: 'check', flags: ['-c', '--check'], help: 'read checksums from the FILEs and check them' },
    { id: 'length', flags: ['-l BITS', '--length=BITS'] },
    { id: 'tag', flags: ['--tag'], help: 'create a BSD-style checksum' },
    { id: 'text', flags: ['-t', '--text'], help: 'read in text mode (default)' },
    { id: 'zero', flags: ['-z', '--zero'] },
    { id: 'ignore-missing', flags: ['--ignore-missing'] },
    { id: 'quiet', flags: ['-q', '--quiet'] },
    { id: 'status', flags: ['-s', '--status'] },
    { id: 'strict', flags: ['--strict'] },
    { id: 'warn', flags: ['-w', '--warn'] },
  ],
  operands: [{ id: 'FILE', arity: atLeast(0) }],
});

const MAX_LENGTH = 512;

/**
 * 8 の倍数で 512 以下。0 は最大長を表す
 */
export function parseDigestLength(option: string, raw: string): number {
  const bits = toInteger(option, raw);
  if (bits > MAX_LENGTH) throw new InvalidValueError(option, raw, 'maximum digest length is 512');
  if (bits % 8 !== 0) throw new InvalidValueError(option, raw, 'length is not a multiple of 8');
  return bits === 0 ? MAX_LENGTH : bits;
}

/**
 * b2sum - BLAKE2b チェックサムの計算・検証
 *
 * 使用法:
 *   b2sum [OPTION]... [FILE]...
 */
export class B2sumCommand extends UnixCommandBase<B2sumSettings> {
  readonly name = 'b2sum';
  protected readonly spec = b2sumSpec;

  protected initial(): B2sumSettings {
    return {
      binary: false,
      check: false,
      tag: false,
      length: MAX_LENGTH,
      checkOutput: 'warn',
      strict: false,
      ignoreMissing: false,
      zero: false,
      files: [],
    };
  }

  protected apply(s: B2sumSettings, event: ArgEvent): B2sumSettings {
    if (event.kind === 'operand') {
      s.files.push(event.value);
      return s;
    }
    if (event.kind !== 'option') return s;

    switch (event.id) {
      case 'binary':
        s.binary = true;
        break;
      case 'text':
        s.binary = false;
        break;
      case 'check':
        s.check = true;
        break;
      case 'length':
        s.length = parseDigestLength(event.flag, requireValue(event));
        break;
      case 'tag':
        s.tag = true;
        break;
      case 'zero':
        s.zero = true;
        break;
      case 'ignore-missing':
        s.ignoreMissing = true;
        break;
      case 'quiet':
        s.checkOutput = 'quiet';
        break;
      case 'status':
        s.checkOutput = 'status';
        break;
      case 'warn':
        s.checkOutput = 'warn';
        break;
      case 'strict':
        s.strict = true;
        break;
    }
    return s;
  }
}
