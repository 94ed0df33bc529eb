import { atLeast, createArgSpec, requireValue, toEnum, toInteger } from '@/engine/args';
import type { ArgEvent, Env } from '@/engine/args';
import { argsWarn } from '@/engine/args/argsLogger';

import { UnixCommandBase } from './base';

const FORMATS = ['long', 'single-column', 'vertical', 'across', 'commas'] as const;
const SORTS = ['none', 'size', 'time', 'version', 'extension', 'width'] as const;
const TIMES = ['modification', 'access', 'change', 'birth'] as const;
const WHEN = ['always', 'auto', 'never'] as const;
const QUOTING_STYLES = [
  'literal',
  'locale',
  'shell',
  'shell-always',
  'shell-escape',
  'shell-escape-always',
  'c',
  'escape',
] as const;
const INDICATOR_STYLES = ['none', 'slash', 'file-type', 'classify'] as const;

export type Format = (typeof FORMATS)[number];
export type Sort = (typeof SORTS)[number] | 'name';
export type Time = (typeof TIMES)[number];
export type When = (typeof WHEN)[number];
export type QuotingStyle = (typeof QUOTING_STYLES)[number];
export type IndicatorStyle = (typeof INDICATOR_STYLES)[number];

const WHEN_KEYS = {
  always: ['yes', 'always', 'force'],
  auto: ['auto', 'if-tty', 'tty'],
  never: ['no', 'never', 'none'],
};

export interface LsSettings {
  format: Format;
  files: string[];
  sort: Sort;
  recursive: boolean;
  reverse: boolean;
  dereference: 'default' | 'all' | 'args' | 'dir-args';
  ignorePatterns: string[];
  directory: boolean;
  time: Time;
  inode: boolean;
  color: When;
  longAuthor: boolean;
  longNoGroup: boolean;
  longNoOwner: boolean;
  longNumericUidGid: boolean;
  width: number;
  quotingStyle: QuotingStyle;
  indicatorStyle: IndicatorStyle;
  sizeFormat: 'bytes' | 'binary' | 'si';
  kibibytes: boolean;
  allocationSize: boolean;
  context: boolean;
  groupDirectoriesFirst: boolean;
  eol: string;
  whichFiles: 'default' | 'almost-all' | 'all';
  ignoreBackups: boolean;
  hideControlChars: boolean;
}

const lsSpec = createArgSpec({
  options: [
    // ファイルの選択
    { id: 'all', flags: ['-a', '--all'], help: 'do not ignore entries starting with .' },
    { id: 'almost-all', flags: ['-A', '--almost-all'], help: 'do not list implied . and ..' },
    { id: 'unsorted-all', flags: ['-f'], help: 'list all entries in directory order' },
    { id: 'ignore-backups', flags: ['-B', '--ignore-backups'] },
    { id: 'ignore', flags: ['-I PATTERN', '--ignore=PATTERN'] },
    { id: 'directory', flags: ['-d', '--directory'] },
    { id: 'recursive', flags: ['-R', '--recursive'] },

    // ソートと時刻
    {
      id: 'sort',
      flags: [
        '--sort=WORD',
        { flag: '-S', default: 'size', help: 'sort by file size, largest first' },
        { flag: '-t', default: 'time', help: 'sort by time, newest first' },
        { flag: '-U', default: 'none', help: 'do not sort' },
        { flag: '-v', default: 'version', help: 'natural sort of (version) numbers' },
        { flag: '-X', default: 'extension', help: 'sort alphabetically by entry extension' },
      ],
      values: SORTS,
    },
    {
      id: 'time',
      flags: ['--time=WORD', { flag: '-c', default: 'change' }, { flag: '-u', default: 'access' }],
      values: {
        modification: ['mtime', 'modification'],
        access: ['atime', 'access', 'use'],
        change: ['ctime', 'change', 'status'],
        birth: ['birth', 'creation'],
      },
    },
    { id: 'reverse', flags: ['-r', '--reverse'] },
    { id: 'group-directories-first', flags: ['--group-directories-first'] },

    // 出力形式
    {
      id: 'format',
      flags: [
        '--format=WORD',
        { flag: '-l', default: 'long', help: 'use a long listing format' },
        { flag: '-1', default: 'single-column', help: 'list one file per line' },
        { flag: '-C', default: 'vertical', help: 'list entries by columns' },
        { flag: '-x', default: 'across', help: 'list entries by lines instead of by columns' },
        { flag: '-m', default: 'commas', help: 'fill width with a comma separated list of entries' },
      ],
      values: {
        long: ['long', 'verbose'],
        'single-column': ['single-column'],
        vertical: ['vertical'],
        across: ['across', 'horizontal'],
        commas: ['commas'],
      },
    },
    { id: 'long-no-owner', flags: ['-g'] },
    { id: 'long-no-group', flags: ['-o'] },
    { id: 'numeric-uid-gid', flags: ['-n', '--numeric-uid-gid'] },
    { id: 'no-group', flags: ['-G', '--no-group'] },
    { id: 'author', flags: ['--author'] },
    { id: 'inode', flags: ['-i', '--inode'] },
    { id: 'size', flags: ['-s', '--size'] },
    { id: 'context', flags: ['-Z', '--context'] },
    { id: 'width', flags: ['-w COLS', '--width=COLS'] },
    { id: 'zero', flags: ['--zero'] },

    // サイズ表記
    { id: 'human-readable', flags: ['-h', '--human-readable'] },
    { id: 'si', flags: ['--si'] },
    { id: 'kibibytes', flags: ['-k', '--kibibytes'] },

    // シンボリックリンク
    { id: 'dereference', flags: ['-L', '--dereference'] },
    { id: 'dereference-command-line', flags: ['-H', '--dereference-command-line'] },
    {
      id: 'dereference-command-line-symlink-to-dir',
      flags: ['--dereference-command-line-symlink-to-dir'],
    },

    // 名前の表示
    {
      id: 'quoting-style',
      flags: [
        '--quoting-style=WORD',
        { flag: '-N', default: 'literal' },
        { flag: '--literal', default: 'literal' },
        { flag: '-b', default: 'escape' },
        { flag: '--escape', default: 'escape' },
        { flag: '-Q', default: 'c' },
        { flag: '--quote-name', default: 'c' },
      ],
      values: QUOTING_STYLES,
    },
    {
      id: 'indicator-style',
      flags: [
        '--indicator-style=WORD',
        { flag: '-p', default: 'slash', help: 'append / indicator to directories' },
        { flag: '--file-type', default: 'file-type' },
      ],
      values: INDICATOR_STYLES,
    },
    { id: 'classify', flags: ['-F', '--classify[=WHEN]'], values: WHEN_KEYS, default: 'always' },
    { id: 'color', flags: ['--color[=WHEN]'], values: WHEN_KEYS, default: 'always' },
    { id: 'hide-control-chars', flags: ['-q', '--hide-control-chars'] },
    { id: 'show-control-chars', flags: ['--show-control-chars'] },
  ],
  operands: [{ id: 'FILE', arity: atLeast(0) }],
});

const DEFAULT_WIDTH = 80;

/**
 * COLUMNS から表示幅を決める。不正な値は無視して既定値を使う
 */
function terminalWidth(env: Env): number {
  const columns = env.COLUMNS;
  if (columns === undefined || columns === '') return DEFAULT_WIDTH;
  if (/^\d+$/.test(columns) && Number(columns) <= 0xffff) return Number(columns);

  argsWarn(`ignoring invalid width in environment variable COLUMNS: '${columns}'`);
  return DEFAULT_WIDTH;
}

/**
 * ls - ディレクトリの内容を表示
 *
 * 使用法:
 *   ls [OPTION]... [FILE]...
 *
 * 同じ設定を書くオプションは後勝ち (`-l --format=commas` は commas)。
 * `-t` `-U` などは `--sort=WORD` の別表記で、`-c` `-u` は `--time=WORD` の別表記。
 */
export class LsCommand extends UnixCommandBase<LsSettings> {
  readonly name = 'ls';
  protected readonly spec = lsSpec;

  protected initial(env: Env): LsSettings {
    return {
      format: 'vertical',
      files: [],
      sort: 'name',
      recursive: false,
      reverse: false,
      dereference: 'default',
      ignorePatterns: [],
      directory: false,
      time: 'modification',
      inode: false,
      color: 'never',
      longAuthor: false,
      longNoGroup: false,
      longNoOwner: false,
      longNumericUidGid: false,
      width: terminalWidth(env),
      quotingStyle: 'shell',
      indicatorStyle: 'none',
      sizeFormat: 'bytes',
      kibibytes: false,
      allocationSize: false,
      context: false,
      groupDirectoriesFirst: false,
      eol: '\n',
      whichFiles: 'default',
      ignoreBackups: false,
      hideControlChars: false,
    };
  }

  protected apply(s: LsSettings, event: ArgEvent): LsSettings {
    if (event.kind === 'operand') {
      s.files.push(event.value);
      return s;
    }
    if (event.kind !== 'option') return s;

    switch (event.id) {
      case 'all':
        s.whichFiles = 'all';
        break;
      case 'almost-all':
        s.whichFiles = 'almost-all';
        break;
      case 'unsorted-all':
        // -f は -a -U に加えて色付けを無効にする
        s.whichFiles = 'all';
        s.sort = 'none';
        s.color = 'never';
        break;
      case 'ignore-backups':
        s.ignoreBackups = true;
        break;
      case 'ignore':
        s.ignorePatterns.push(requireValue(event));
        break;
      case 'directory':
        s.directory = true;
        break;
      case 'recursive':
        s.recursive = true;
        break;
      case 'sort':
        s.sort = toEnum(event.flag, requireValue(event), SORTS);
        break;
      case 'time':
        s.time = toEnum(event.flag, requireValue(event), TIMES);
        break;
      case 'reverse':
        s.reverse = true;
        break;
      case 'group-directories-first':
        s.groupDirectoriesFirst = true;
        break;
      case 'format':
        s.format = toEnum(event.flag, requireValue(event), FORMATS);
        break;
      case 'long-no-owner':
        s.format = 'long';
        s.longNoOwner = true;
        break;
      case 'long-no-group':
        s.format = 'long';
        s.longNoGroup = true;
        break;
      case 'numeric-uid-gid':
        s.format = 'long';
        s.longNumericUidGid = true;
        break;
      case 'no-group':
        s.longNoGroup = true;
        break;
      case 'author':
        s.longAuthor = true;
        break;
      case 'inode':
        s.inode = true;
        break;
      case 'size':
        s.allocationSize = true;
        break;
      case 'context':
        s.context = true;
        break;
      case 'width':
        s.width = toInteger(event.flag, requireValue(event), 'u16');
        break;
      case 'zero':
        s.eol = '\0';
        break;
      case 'human-readable':
        s.sizeFormat = 'binary';
        break;
      case 'si':
        s.sizeFormat = 'si';
        break;
      case 'kibibytes':
        s.kibibytes = true;
        break;
      case 'dereference':
        s.dereference = 'all';
        break;
      case 'dereference-command-line':
        s.dereference = 'args';
        break;
      case 'dereference-command-line-symlink-to-dir':
        s.dereference = 'dir-args';
        break;
      case 'quoting-style':
        s.quotingStyle = toEnum(event.flag, requireValue(event), QUOTING_STYLES);
        break;
      case 'indicator-style':
        s.indicatorStyle = toEnum(event.flag, requireValue(event), INDICATOR_STYLES);
        break;
      case 'classify':
        // auto は端末判定を行わず always と同じに扱う
        s.indicatorStyle =
          toEnum(event.flag, requireValue(event), WHEN) === 'never' ? 'none' : 'classify';
        break;
      case 'color':
        s.color = toEnum(event.flag, requireValue(event), WHEN);
        break;
      case 'hide-control-chars':
        s.hideControlChars = true;
        break;
      case 'show-control-chars':
        s.hideControlChars = false;
        break;
    }
    return s;
  }
}
