/**
 * reducer - イベント列を設定レコードへ畳み込む
 *
 * 一つのイベントが複数のフィールドを更新してよいし、
 * 後のイベントが前のイベントの結果を上書きしてよい（後勝ち）。
 * どのイベントがどのフィールドを書くかは apply 一か所にまとめる。
 */

import type { ArgEvent } from './events';

export type Env = Readonly<Record<string, string | undefined>>;

export type Apply<S> = (settings: S, event: ArgEvent) => S;

export interface SettingsDef<S> {
  /** 解析ごとに新しいレコードを作る。環境変数から初期値を取ってよい */
  initial: (env: Env) => S;
  apply: Apply<S>;
}

export function fold<S>(initial: S, events: Iterable<ArgEvent>, apply: Apply<S>): S {
  let settings = initial;
  for (const event of events) {
    settings = apply(settings, event);
  }
  return settings;
}
