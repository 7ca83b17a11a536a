/**
 * One Euro Filter
 * ===============
 *
 * Low-pass filter whose cutoff adapts to the estimated signal speed:
 *   - at rest the cutoff stays near `minCutoff` (strong smoothing, no jitter)
 *   - during fast motion it rises by `beta * |dx/dt|` (little lag)
 *
 * Timestamps are in seconds. The first sample passes through unchanged, and a
 * non-increasing timestamp returns the previous output instead of dividing by
 * zero.
 *
 * Reference: Casiez, Roussel, Vogel. "1€ Filter: A Simple Speed-based
 * Low-pass Filter for Noisy Input in Interactive Systems", CHI 2012.
 *
 * @module OneEuroFilter
 */

import * as THREE from "three";

export interface OneEuroParams {
  /** Minimum cutoff frequency (Hz). Lower = smoother at rest */
  minCutoff: number;
  /** Speed coefficient. Higher = more responsive to fast motion */
  beta: number;
  /** Cutoff frequency for the derivative estimate (Hz) */
  dCutoff: number;
}

export const DEFAULT_ONE_EURO_PARAMS: OneEuroParams = {
  minCutoff: 0.004,
  beta: 1.0,
  dCutoff: 1.0,
};

/**
 * Exponential smoothing factor for a sampling interval and cutoff:
 *   α = 1 / (1 + τ/Δt),  τ = 1 / (2π·cutoff)
 * A non-positive cutoff disables smoothing (α = 1).
 */
export function smoothingFactor(dt: number, cutoff: number): number {
  if (cutoff <= 0) return 1;
  const r = 2 * Math.PI * cutoff * dt;
  return r / (r + 1);
}

function exponentialSmoothing(a: number, x: number, prev: number): number {
  return a * x + (1 - a) * prev;
}

export class OneEuroFilter {
  readonly minCutoff: number;
  readonly dCutoff: number;
  private _beta: number;

  private xPrev: number | null = null;
  private dxPrev = 0;
  private tPrev: number | null = null;

  constructor(params: Partial<OneEuroParams> = {}) {
    const p = { ...DEFAULT_ONE_EURO_PARAMS, ...params };
    this.minCutoff = p.minCutoff;
    this.dCutoff = p.dCutoff;
    this._beta = p.beta;
  }

  /** Speed coefficient; may be changed between samples */
  get beta(): number {
    return this._beta;
  }

  set beta(value: number) {
    this._beta = value;
  }

  /** Last smoothed value, or null before the first sample */
  get value(): number | null {
    return this.xPrev;
  }

  filter(t: number, x: number): number {
    if (this.xPrev === null || this.tPrev === null) {
      this.xPrev = x;
      this.tPrev = t;
      return x;
    }

    const te = t - this.tPrev;
    if (te <= 0) {
      return this.xPrev;
    }

    const aD = smoothingFactor(te, this.dCutoff);
    const dx = (x - this.xPrev) / te;
    const dxHat = exponentialSmoothing(aD, dx, this.dxPrev);

    const cutoff = this.minCutoff + this._beta * Math.abs(dxHat);
    const a = smoothingFactor(te, cutoff);
    const xHat = exponentialSmoothing(a, x, this.xPrev);

    this.xPrev = xHat;
    this.dxPrev = dxHat;
    this.tPrev = t;
    return xHat;
  }

  reset(): void {
    this.xPrev = null;
    this.dxPrev = 0;
    this.tPrev = null;
  }
}

/**
 * Three independent scalar filters sharing one timestamp.
 */
export class OneEuroFilterVector3 {
  private readonly fx: OneEuroFilter;
  private readonly fy: OneEuroFilter;
  private readonly fz: OneEuroFilter;

  constructor(params: Partial<OneEuroParams> = {}) {
    this.fx = new OneEuroFilter(params);
    this.fy = new OneEuroFilter(params);
    this.fz = new OneEuroFilter(params);
  }

  get beta(): number {
    return this.fx.beta;
  }

  /** Updates beta on all three axes */
  set beta(value: number) {
    this.fx.beta = value;
    this.fy.beta = value;
    this.fz.beta = value;
  }

  filter(t: number, v: THREE.Vector3): THREE.Vector3 {
    return new THREE.Vector3(
      this.fx.filter(t, v.x),
      this.fy.filter(t, v.y),
      this.fz.filter(t, v.z),
    );
  }

  reset(): void {
    this.fx.reset();
    this.fy.reset();
    this.fz.reset();
  }
}
