const MAX_HALVINGS = 12;

/** [step, count] windows walking back from the head. */
const HEAD_WINDOWS: readonly (readonly [number, number])[] = [
  [10, 14],
  [100, 11],
  [10_000, 21],
];

/**
 * Candidate heights for bracketing a boundary: repeated halvings of the head
 * cover deep history coarsely, fixed windows near the head cover the recent
 * range finely. Sorted ascending, no duplicates, nothing below 1.
 */
export function generateSeeds(chainHead: number): number[] {
  const seeds = new Set<number>();

  let b = chainHead;
  while (b >= 1 && seeds.size < MAX_HALVINGS) {
    seeds.add(b);
    b = Math.floor(b / 2);
  }
  seeds.add(1);

  for (const [step, count] of HEAD_WINDOWS) {
    for (let i = 0; i < count; i++) {
      seeds.add(chainHead - i * step);
    }
  }

  return [...seeds].filter((s) => s >= 1).sort((a, b) => a - b);
}
