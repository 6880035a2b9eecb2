export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed: number | undefined): RandomSource {
  return seed === undefined ? Math.random : mulberry32(seed);
}
