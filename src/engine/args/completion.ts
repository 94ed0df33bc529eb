/**
 * completion - シェル補完スクリプトの生成
 *
 * 引数定義から fish の complete 行を作る。隠しスペリングは出力しない。
 */

import { visibleOptions } from './spec';
import type { ArgSpec, OptionSpec, ValueHint } from './spec';

export type CompletionShell = 'fish' | 'bash' | 'zsh' | 'sh' | 'csh' | 'elvish' | 'powershell';

function fishQuote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

const FISH_HINTS: Record<ValueHint, string> = {
  'any-path': '-F',
  'file-path': '-F',
  'executable-path': '-F',
  'dir-path': "-f -a '(__fish_complete_directories)'",
  username: "-f -a '(__fish_complete_users)'",
  hostname: "-f -a '(__fish_print_hostnames)'",
};

function fishLine(command: string, option: OptionSpec): string {
  const parts = ['complete', '-c', command];

  for (const spelling of option.spellings) {
    parts.push(spelling.kind === 'short' ? '-s' : '-l', spelling.name);
  }

  if (option.spellings.some(s => s.arity === 'required')) parts.push('-r');

  if (option.values !== null) {
    parts.push('-f', '-a', fishQuote(option.values.map(v => v.key).join(' ')));
  } else if (option.hint !== null) {
    parts.push(FISH_HINTS[option.hint]);
  }

  const help = option.help ?? option.spellings.find(s => s.help !== null)?.help ?? null;
  if (help) parts.push('-d', fishQuote(help));

  return parts.join(' ');
}

export function renderFishCompletion(command: string, spec: ArgSpec): string {
  return visibleOptions(spec)
    .map(o => fishLine(command, o))
    .join('\n');
}

export function renderCompletion(command: string, spec: ArgSpec, shell: CompletionShell): string {
  switch (shell) {
    case 'fish':
      return renderFishCompletion(command, spec);
    default:
      throw new Error(`shell '${shell}' completion is not supported yet`);
  }
}
