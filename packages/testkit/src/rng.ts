/** Seeded pseudo-random source returning values in [0, 1). */
export type Rng = () => number;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

export function nextInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Run a seeded scenario, tagging any failure with the seed so it can be replayed.
 */
export function withSeed<T>(label: string, seed: number, run: (rng: Rng) => T): T {
  try {
    return run(createRng(seed));
  } catch (error) {
    throw new Error(`[${label}] seed=${String(seed)} failed: ${describeError(error)}`);
  }
}
