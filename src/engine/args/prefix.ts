/**
 * prefix - 一意な前方一致による名前解決
 *
 * 長いオプション名と列挙値の両方で同じ規則を使う。
 * 完全一致は他の名前の前方一致でもあっても常に優先される。
 */

export type Resolution =
  | { kind: 'exact'; name: string }
  | { kind: 'prefix'; name: string }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'none' };

export function resolvePrefix(candidate: string, names: Iterable<string>): Resolution {
  const candidates: string[] = [];

  for (const name of names) {
    if (name === candidate) return { kind: 'exact', name };
    if (name.startsWith(candidate) && !candidates.includes(name)) candidates.push(name);
  }

  if (candidates.length === 0) return { kind: 'none' };
  if (candidates.length === 1) return { kind: 'prefix', name: candidates[0] };
  return { kind: 'ambiguous', candidates };
}

/**
 * 解決できた名前、または null
 */
export function resolvedName(resolution: Resolution): string | null {
  return resolution.kind === 'exact' || resolution.kind === 'prefix' ? resolution.name : null;
}
