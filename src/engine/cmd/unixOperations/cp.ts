import { atLeast, createArgSpec, requireValue, toEnum } from '@/engine/args';
import type { ArgEvent, Env } from '@/engine/args';

import { UnixCommandBase } from './base';

const BACKUP_CONTROLS = ['none', 'numbered', 'existing', 'simple'] as const;
const WHEN = ['always', 'auto', 'never'] as const;
const ATTRIBUTES = ['mode', 'ownership', 'timestamps', 'context', 'links', 'xattr', 'all'] as const;

export type BackupControl = (typeof BACKUP_CONTROLS)[number];
export type When = (typeof WHEN)[number];
export type Attribute = (typeof ATTRIBUTES)[number];

export interface CpSettings {
  /** -f / -i / -n のうち最後のものが勝つ */
  overwrite: 'force' | 'interactive' | 'no-clobber' | 'default';
  recursive: boolean;
  dereference: 'always' | 'never' | 'command-line' | 'default';
  preserve: Attribute[];
  backup: BackupControl | null;
  suffix: string;
  targetDirectory: string | null;
  noTargetDirectory: boolean;
  link: 'copy' | 'hard' | 'symbolic';
  reflink: When;
  sparse: When;
  update: boolean;
  verbose: boolean;
  sources: string[];
  destination: string | null;
}

const cpSpec = createArgSpec({
  options: [
    { id: 'archive', flags: ['-a', '--archive'], help: 'same as -dR --preserve=all' },
    {
      id: 'backup',
      flags: ['--backup[=CONTROL]', { flag: '-b', help: 'like --backup but does not accept an argument' }],
      values: {
        none: ['none', 'off'],
        numbered: ['numbered', 't'],
        existing: ['existing', 'nil'],
        simple: ['simple', 'never'],
      },
      default: 'existing',
    },
    { id: 'no-dereference-preserve-links', flags: ['-d'] },
    { id: 'force', flags: ['-f', '--force'] },
    { id: 'interactive', flags: ['-i', '--interactive'] },
    { id: 'no-clobber', flags: ['-n', '--no-clobber'] },
    { id: 'dereference-command-line', flags: ['-H'] },
    { id: 'link', flags: ['-l', '--link'] },
    { id: 'dereference', flags: ['-L', '--dereference'] },
    { id: 'no-dereference', flags: ['-P', '--no-dereference'] },
    { id: 'preserve-default', flags: ['-p'] },
    { id: 'preserve', flags: ['--preserve[=ATTR_LIST]'], default: 'mode,ownership,timestamps' },
    { id: 'no-preserve', flags: ['--no-preserve=ATTR_LIST'] },
    { id: 'recursive', flags: ['-R', '-r', '--recursive'] },
    { id: 'reflink', flags: ['--reflink[=WHEN]'], values: WHEN, default: 'always' },
    { id: 'sparse', flags: ['--sparse=WHEN'], values: WHEN },
    { id: 'symbolic-link', flags: ['-s', '--symbolic-link'] },
    { id: 'suffix', flags: ['-S SUFFIX', '--suffix=SUFFIX'] },
    {
      id: 'target-directory',
      flags: ['-t DIRECTORY', '--target-directory=DIRECTORY'],
      hint: 'dir-path',
    },
    { id: 'no-target-directory', flags: ['-T', '--no-target-directory'] },
    { id: 'update', flags: ['-u', '--update'] },
    { id: 'verbose', flags: ['-v', '--verbose'] },
  ],
  operands: [
    { id: 'SOURCE', arity: atLeast(1) },
    { id: 'DEST' },
  ],
  // -t DIRECTORY があれば宛先はオペランドではない
  operandLayouts: [{ when: 'target-directory', operands: [{ id: 'SOURCE', arity: atLeast(1) }] }],
});

/**
 * ATTR_LIST (カンマ区切り) を属性の配列にする
 */
function attributeList(option: string, raw: string): Attribute[] {
  const list = raw.split(',').map(a => toEnum(option, a, ATTRIBUTES));
  return list.includes('all') ? ATTRIBUTES.filter(a => a !== 'all') : list;
}

/**
 * cp - ファイルやディレクトリをコピー (GNU準拠の引数のみ)
 *
 * 使用法:
 *   cp [OPTION]... [-T] SOURCE DEST
 *   cp [OPTION]... SOURCE... DIRECTORY
 *   cp [OPTION]... -t DIRECTORY SOURCE...
 */
export class CpCommand extends UnixCommandBase<CpSettings> {
  readonly name = 'cp';
  protected readonly spec = cpSpec;

  protected initial(env: Env): CpSettings {
    return {
      overwrite: 'default',
      recursive: false,
      dereference: 'default',
      preserve: [],
      backup: null,
      suffix: env.SIMPLE_BACKUP_SUFFIX ?? '~',
      targetDirectory: null,
      noTargetDirectory: false,
      link: 'copy',
      reflink: 'auto',
      sparse: 'auto',
      update: false,
      verbose: false,
      sources: [],
      destination: null,
    };
  }

  protected apply(s: CpSettings, event: ArgEvent): CpSettings {
    if (event.kind === 'operand') {
      if (event.id === 'SOURCE') s.sources.push(event.value);
      else s.destination = event.value;
      return s;
    }
    if (event.kind !== 'option') return s;

    switch (event.id) {
      case 'archive':
        s.recursive = true;
        s.dereference = 'never';
        s.preserve = attributeList(event.flag, 'all');
        break;
      case 'backup':
        s.backup = toEnum(event.flag, requireValue(event), BACKUP_CONTROLS);
        break;
      case 'no-dereference-preserve-links':
        s.dereference = 'never';
        if (!s.preserve.includes('links')) s.preserve.push('links');
        break;
      case 'force':
        s.overwrite = 'force';
        break;
      case 'interactive':
        s.overwrite = 'interactive';
        break;
      case 'no-clobber':
        s.overwrite = 'no-clobber';
        break;
      case 'dereference-command-line':
        s.dereference = 'command-line';
        break;
      case 'link':
        s.link = 'hard';
        break;
      case 'symbolic-link':
        s.link = 'symbolic';
        break;
      case 'dereference':
        s.dereference = 'always';
        break;
      case 'no-dereference':
        s.dereference = 'never';
        break;
      case 'preserve-default':
      case 'preserve':
        for (const a of attributeList(event.flag, event.value ?? 'mode,ownership,timestamps')) {
          if (!s.preserve.includes(a)) s.preserve.push(a);
        }
        break;
      case 'no-preserve': {
        const removed = attributeList(event.flag, requireValue(event));
        s.preserve = s.preserve.filter(a => !removed.includes(a));
        break;
      }
      case 'recursive':
        s.recursive = true;
        break;
      case 'reflink':
        s.reflink = toEnum(event.flag, requireValue(event), WHEN);
        break;
      case 'sparse':
        s.sparse = toEnum(event.flag, requireValue(event), WHEN);
        break;
      case 'suffix':
        s.suffix = requireValue(event);
        break;
      case 'target-directory':
        s.targetDirectory = requireValue(event);
        break;
      case 'no-target-directory':
        s.noTargetDirectory = true;
        break;
      case 'update':
        s.update = true;
        break;
      case 'verbose':
        s.verbose = true;
        break;
    }
    return s;
  }
}
