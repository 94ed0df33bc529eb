import { createArgSpec, requireValue } from '@/engine/args';
import type { ArgEvent } from '@/engine/args';

import { UnixCommandBase } from './base';

export interface CommSettings {
  /** 列 1, 2, 3 を出力しない */
  suppress: [boolean, boolean, boolean];
  checkOrder: 'default' | 'check' | 'nocheck';
  outputDelimiter: string;
  zeroTerminated: boolean;
  total: boolean;
  file1: string;
  file2: string;
}

const commSpec = createArgSpec({
  options: [
    { id: 'suppress-1', flags: ['-1'], help: 'suppress column 1 (lines unique to FILE1)' },
    { id: 'suppress-2', flags: ['-2'], help: 'suppress column 2 (lines unique to FILE2)' },
    { id: 'suppress-3', flags: ['-3'], help: 'suppress column 3 (lines that appear in both files)' },
    { id: 'check-order', flags: ['--check-order'] },
    { id: 'nocheck-order', flags: ['--nocheck-order'] },
    { id: 'output-delimiter', flags: ['--output-delimiter=STR'] },
    { id: 'total', flags: ['--total'] },
    { id: 'zero-terminated', flags: ['-z', '--zero-terminated'] },
  ],
  operands: [{ id: 'FILE1' }, { id: 'FILE2' }],
});

/**
 * comm - ソート済みの 2 ファイルを行ごとに比較
 *
 * 使用法:
 *   comm [OPTION]... FILE1 FILE2
 */
export class CommCommand extends UnixCommandBase<CommSettings> {
  readonly name = 'comm';
  protected readonly spec = commSpec;

  protected initial(): CommSettings {
    return {
      suppress: [false, false, false],
      checkOrder: 'default',
      outputDelimiter: '\t',
      zeroTerminated: false,
      total: false,
      file1: '',
      file2: '',
    };
  }

  protected apply(settings: CommSettings, event: ArgEvent): CommSettings {
    if (event.kind === 'operand') {
      if (event.id === 'FILE1') settings.file1 = event.value;
      else settings.file2 = event.value;
      return settings;
    }
    if (event.kind !== 'option') return settings;

    switch (event.id) {
      case 'suppress-1':
        settings.suppress[0] = true;
        break;
      case 'suppress-2':
        settings.suppress[1] = true;
        break;
      case 'suppress-3':
        settings.suppress[2] = true;
        break;
      case 'check-order':
        settings.checkOrder = 'check';
        break;
      case 'nocheck-order':
        settings.checkOrder = 'nocheck';
        break;
      case 'output-delimiter':
        settings.outputDelimiter = requireValue(event);
        break;
      case 'total':
        settings.total = true;
        break;
      case 'zero-terminated':
        settings.zeroTerminated = true;
        break;
    }
    return settings;
  }
}
