/** `n` weeks of a constant value. */
export function flat(n: number, value: number): number[] {
  return Array.from({ length: n }, () => value);
}

/** Deterministic pseudo-random series in [0, 100] (LCG). */
export function pseudoRandomSeries(n: number, seed: number): number[] {
  let state = seed >>> 0;
  const out: number[] = [];
  for (let i = 0; i < n; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out.push(Math.round((state / 0xffffffff) * 100));
  }
  return out;
}
