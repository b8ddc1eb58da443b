export type RandomFn = () => number;

export function randInt(random: RandomFn, minInclusive: number, maxExclusive: number): number {
  return minInclusive + Math.floor(random() * (maxExclusive - minInclusive));
}

export function pickRandom<T>(random: RandomFn, list: readonly [T, ...T[]]): T {
  const index = randInt(random, 0, list.length);
  return list[index] ?? list[0];
}

export function seededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
