/**
 * Group rows by a key tuple and fold each group into an accumulator.
 * Groups come back in first-seen order; callers sort as their view needs.
 */
export function groupAndFold<Row, Key extends readonly (string | number)[], Acc>(
  rows: readonly Row[],
  keyOf: (row: Row) => Key,
  init: () => Acc,
  fold: (acc: Acc, row: Row) => Acc
): Array<{ key: Key; value: Acc }> {
  const groups = new Map<string, { key: Key; value: Acc }>();
  for (const row of rows) {
    const key = keyOf(row);
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.value = fold(group.value, row);
    } else {
      groups.set(id, { key, value: fold(init(), row) });
    }
  }
  return [...groups.values()];
}

/** Count rows per key tuple. */
export function countBy<Row, Key extends readonly (string | number)[]>(
  rows: readonly Row[],
  keyOf: (row: Row) => Key
): Array<{ key: Key; value: number }> {
  return groupAndFold(rows, keyOf, () => 0, (n) => n + 1);
}

/** Code-unit string order, independent of locale. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
