const TAU = 0x9e3779b9;

function mix(seed: number, value: number): number {
  let x = (seed ^ value) >>> 0;
  x = Math.imul(x ^ (x >>> 16), 0x45d9f3b);
  x = Math.imul(x ^ (x >>> 16), 0x45d9f3b);
  return x ^ (x >>> 16);
}

function hashString(str: string, seed: number): number {
  let h = seed >>> 0;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), TAU);
  }
  return mix(h, str.length);
}

/**
 * Anything that hands out uniform draws in [0, 1). The step engine, the
 * topology generator and the default duration samplers only ever need this,
 * so tests can substitute a scripted sequence.
 */
export interface RandomSource {
  float(): number;
}

/** Seed for the stream `namespace` split off a generator in state `state`. */
function streamSeed(state: number, namespace: string): number {
  return mix(state, hashString(namespace, state ^ TAU));
}

/** xorshift32 generator; `child` splits off named, independent streams. */
export class RNG implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = Number.isFinite(seed) ? seed >>> 0 || 1 : 1;
  }

  float(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    // never return 1
    return Math.min(this.state / 0xffffffff, 0.9999999995);
  }

  child(namespace: string): RNG {
    return new RNG(streamSeed(this.state, namespace));
  }
}

export function normalFrom(source: RandomSource, mu = 0, sigma = 1): number {
  const u = source.float() || 1e-12;
  const v = source.float() || 1e-12;
  const mag = Math.sqrt(-2 * Math.log(u));
  const angle = 2 * Math.PI * v;
  return mu + sigma * mag * Math.cos(angle);
}

/** Uniform integer in [0, n). */
export function randomIndex(source: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(source.float() * n));
}

/**
 * Replays a fixed list of draws, cycling when exhausted. Used to make the
 * contagion coin flips deterministic.
 */
export class ScriptedRandom implements RandomSource {
  private cursor = 0;

  constructor(private readonly draws: readonly number[]) {
    if (!draws.length) throw new Error("ScriptedRandom needs at least one draw");
  }

  float(): number {
    const value = this.draws[this.cursor % this.draws.length];
    this.cursor++;
    return value;
  }

  get consumed(): number {
    return this.cursor;
  }
}
