/**
 * 解析結果のイベント
 *
 * 値は未変換の文字列のまま。型変換は畳み込み側で行う。
 * position は元の引数列での位置で、イベント列はこの順に並ぶ。
 */
export type ArgEvent =
  | {
      kind: 'option';
      /** OptionSpec.id */
      id: string;
      /** 一致したスペリング (`-p`, `--tmpdir`)。旧式の数値省略形では入力そのもの */
      flag: string;
      value: string | null;
      position: number;
    }
  | { kind: 'operand'; id: string; value: string; position: number }
  | { kind: 'trailing'; id: string; values: readonly string[]; position: number };

export type OptionEvent = Extract<ArgEvent, { kind: 'option' }>;

/**
 * --help / --version による中断要求
 */
export interface ParseRequest {
  kind: 'help' | 'version';
  flag: string;
  position: number;
}
