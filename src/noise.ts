/**
 * Noise Injector
 *
 * Multiplicative Gaussian perturbation of reported measurements. The
 * state handed in is never modified; only the returned copy is noisy.
 */

import { cloneVector } from './integrator.js';
import type { NoiseSettings, PlantConfig, ProcessState } from './types.js';
import { PROCESS_TANK_IDS, TANK_IDS } from './types.js';

export type RandomSource = () => number;

/**
 * Uniform source in [0, 1]. A seed gives a reproducible
 * linear-congruential sequence.
 */
export function createRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;

  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0xffffffff;
  };
}

/**
 * Standard normal sample (Box–Muller)
 */
export function gaussian(random: RandomSource): number {
  const u1 = Math.max(random(), Number.MIN_VALUE);
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export class NoiseInjector {
  private enabled: boolean;
  private level: number;
  private readonly seed: number | undefined;
  private random: RandomSource;

  constructor(settings: NoiseSettings) {
    this.enabled = settings.enabled;
    this.level = settings.level;
    this.seed = settings.seed;
    this.random = createRandom(settings.seed);
  }

  get settings(): NoiseSettings {
    const settings: NoiseSettings = { enabled: this.enabled, level: this.level };
    if (this.seed !== undefined) settings.seed = this.seed;
    return settings;
  }

  get active(): boolean {
    return this.enabled && this.level > 0;
  }

  configure(enabled: boolean, level?: number): void {
    this.enabled = enabled;
    if (level !== undefined) this.level = level;
  }

  /**
   * reported = true · (1 + level · N(0,1)), clamped to physical bounds
   */
  apply(state: ProcessState, plant: PlantConfig): ProcessState {
    const reported = cloneVector(state);
    if (!this.active) return reported;

    for (const id of TANK_IDS) {
      reported.levels[id] = bounded(this.perturb(state.levels[id]), plant.tanks[id].maxLevel);
    }
    for (const id of PROCESS_TANK_IDS) {
      reported.concentrations[id] = bounded(
        this.perturb(state.concentrations[id]),
        plant.maxConcentration
      );
    }
    return reported;
  }

  private perturb(value: number): number {
    return value * (1 + this.level * gaussian(this.random));
  }
}

function bounded(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max);
}
