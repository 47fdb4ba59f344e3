export type Rng = Readonly<{
  /** Uniform float in [0, 1). */
  next: () => number;
  /** Uniform integer in [0, max). */
  int: (max: number) => number;
  /** Fisher–Yates shuffle into a new array. */
  shuffle: <T>(items: readonly T[]) => T[];
}>;

/** Deterministic mulberry32 generator. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  const int = (max: number): number => Math.floor(next() * Math.max(0, max));
  const shuffle = <T>(items: readonly T[]): T[] => {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = int(i + 1);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  };
  return Object.freeze({ next, int, shuffle });
}
