/**
 * positional - オペランドの割り当て
 *
 * オプション以外の値をスロットへ左から順に配る。
 *   - exactly / range は先頭から取る
 *   - 最後でない atLeast は後続スロットの最小数を残して残りを取る
 *     (cp SRC... DEST の DEST を確保する形)
 *   - 最後の atLeast は残りすべてを取る
 *   - greedy スロットは解析器が取り込んだ末尾の列をそのまま受け取る
 */

import { ExcessOperandError, MissingOperandError } from './errors';
import type { ArgEvent, OptionEvent } from './events';
import { arityMax, arityMin } from './spec';
import type { ArgSpec, PositionalSlot } from './spec';
import type { RawArg } from './tokenizer';

export interface TrailingCapture {
  values: string[];
  position: number;
}

/**
 * 出現したオプションに応じて有効なレイアウトを選ぶ
 * (`cp -t DIR` なら DEST スロットを持たないレイアウト)
 */
export function selectLayout(
  spec: ArgSpec,
  events: readonly OptionEvent[]
): readonly PositionalSlot[] {
  const seen = new Set(events.map(e => e.id));
  const layout = spec.operandLayouts.find(l => seen.has(l.when));
  return layout ? layout.slots : spec.operands;
}

/**
 * greedy スロットがあれば、そこに入る最初の値の番号（何番目のオペランドか）
 */
export function greedyStart(slots: readonly PositionalSlot[]): number | null {
  const last = slots[slots.length - 1];
  if (!last || !last.greedy) return null;
  return slots.slice(0, -1).reduce((n, s) => n + arityMax(s.arity), 0);
}

export function allocate(
  values: readonly RawArg[],
  slots: readonly PositionalSlot[],
  trailing: TrailingCapture | null = null
): ArgEvent[] {
  const last = slots[slots.length - 1];
  const greedy = last && last.greedy ? last : null;
  const regular = greedy ? slots.slice(0, -1) : slots;

  const events: ArgEvent[] = [];
  const missing: string[] = [];
  let cursor = 0;

  regular.forEach((slot, i) => {
    const available = values.length - cursor;
    const min = arityMin(slot.arity);
    let take: number;

    if (slot.arity.kind !== 'atLeast') {
      take = Math.min(arityMax(slot.arity), available);
    } else if (i === regular.length - 1) {
      take = available;
    } else {
      const reserve = regular.slice(i + 1).reduce((n, s) => n + arityMin(s.arity), 0);
      take = Math.max(0, available - reserve);
    }

    if (take < min) missing.push(slot.id);

    for (const { value, position } of values.slice(cursor, cursor + take)) {
      events.push({ kind: 'operand', id: slot.id, value, position });
    }
    cursor += take;
  });

  if (greedy) {
    const captured = trailing?.values ?? [];
    if (captured.length < arityMin(greedy.arity)) missing.push(greedy.id);
    if (trailing && captured.length > 0) {
      events.push({ kind: 'trailing', id: greedy.id, values: captured, position: trailing.position });
    }
  }

  if (missing.length > 0) {
    const after = values.length > 0 ? values[values.length - 1].value : null;
    throw new MissingOperandError(missing, after);
  }
  if (cursor < values.length) throw new ExcessOperandError(values[cursor].value);

  return events;
}
