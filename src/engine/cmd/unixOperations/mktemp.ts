import { createArgSpec, range, requireValue } from '@/engine/args';
import type { ArgEvent, Env } from '@/engine/args';

import { UnixCommandBase } from './base';

export interface MktempSettings {
  directory: boolean;
  dryRun: boolean;
  quiet: boolean;
  suffix: string | null;
  treatAsTemplate: boolean;
  /** -p / --tmpdir が指定された場合のディレクトリ */
  tmpDir: string | null;
  template: string;
  /** --tmpdir に値がない場合に使うディレクトリ */
  defaultTmpDir: string;
}

const mktempSpec = createArgSpec({
  options: [
    { id: 'directory', flags: ['-d', '--directory'] },
    { id: 'dry-run', flags: ['-u', '--dry-run'] },
    { id: 'quiet', flags: ['-q', '--quiet'] },
    { id: 'suffix', flags: ['--suffix=SUFFIX'] },
    { id: 'treat-as-template', flags: ['-t'] },
    { id: 'tmpdir', flags: ['-p DIR', '--tmpdir[=DIR]'], hint: 'dir-path' },
  ],
  operands: [{ id: 'TEMPLATE', arity: range(0, 1) }],
});

/**
 * mktemp - 一時ファイル・ディレクトリを作成
 *
 * 使用法:
 *   mktemp [OPTION]... [TEMPLATE]
 */
export class MktempCommand extends UnixCommandBase<MktempSettings> {
  readonly name = 'mktemp';
  protected readonly spec = mktempSpec;

  protected initial(env: Env): MktempSettings {
    return {
      directory: false,
      dryRun: false,
      quiet: false,
      suffix: null,
      treatAsTemplate: false,
      tmpDir: null,
      template: 'tmp.XXXXXXXXXX',
      defaultTmpDir: env.TMPDIR || '/tmp',
    };
  }

  protected apply(s: MktempSettings, event: ArgEvent): MktempSettings {
    if (event.kind === 'operand') {
      s.template = event.value;
      return s;
    }
    if (event.kind !== 'option') return s;

    switch (event.id) {
      case 'directory':
        s.directory = true;
        break;
      case 'dry-run':
        s.dryRun = true;
        break;
      case 'quiet':
        s.quiet = true;
        break;
      case 'suffix':
        s.suffix = requireValue(event);
        break;
      case 'treat-as-template':
        s.treatAsTemplate = true;
        break;
      case 'tmpdir':
        s.tmpDir = event.value ?? s.defaultTmpDir;
        break;
    }
    return s;
  }
}
