/**
 * Bone Smoothing Engine
 * =====================
 *
 * Temporal smoothing for retargeted bones, keyed by bone name:
 *
 * - Rotations: velocity-adaptive slerp. The interpolation factor rises during
 *   fast motion (less lag) and drops at rest (less jitter).
 * - Positions: outlier rejection against a constant-velocity prediction, then
 *   a One-Euro filter whose beta follows the same fast/slow classification.
 *
 * Hands track faster than the torso, so every bone belongs to a body-part
 * class ("hand" | "core" | "limb") with its own factor range and beta.
 *
 * @module SmoothingEngine
 */

import * as THREE from "three";
import { OneEuroFilterVector3 } from "./OneEuroFilter";
import { slerp } from "../math/vectorMath";
import { smoothingLog } from "../logger";
import {
  classifyBone,
  type BodyPartClass,
} from "../../biomech/canonicalBones";
import type { CanonicalPose } from "../../biomech/CanonicalPose";

// ============================================================================
// CONFIG
// ============================================================================

export interface InterpolationFactors {
  base: number;
  min: number;
  max: number;
}

export interface SmoothingConfig {
  enableVelocityAdaptive: boolean;
  enableQuaternionSmoothing: boolean;
  enableOutlierRejection: boolean;
  /** Angular speed (rad/s) above which a bone counts as moving fast */
  velocityThreshold: number;
  /** Linear speed (units/s) above which a point counts as moving fast */
  positionVelocityThreshold: number;
  /** Rejection distance in multiples of the recent prediction error */
  outlierThreshold: number;
  /** Floor on the prediction-error spread (units) */
  minOutlierSpread: number;
  /** After this many rejections in a row the next sample is accepted */
  maxConsecutiveRejections: number;
  /** Window length for speeds, accepted samples and prediction errors */
  historySize: number;
  factors: Record<BodyPartClass, InterpolationFactors>;
  /** One-Euro beta per class for position smoothing */
  positionBeta: Record<BodyPartClass, number>;
  positionMinCutoff: number;
  positionDCutoff: number;
  /** Beta multiplier while a point is moving fast */
  fastBetaScale: number;
}

export const DEFAULT_SMOOTHING_CONFIG: SmoothingConfig = {
  enableVelocityAdaptive: true,
  enableQuaternionSmoothing: true,
  enableOutlierRejection: true,
  velocityThreshold: 0.1,
  positionVelocityThreshold: 0.5,
  outlierThreshold: 3.0,
  minOutlierSpread: 0.05,
  maxConsecutiveRejections: 5,
  historySize: 10,
  factors: {
    hand: { base: 0.7, min: 0.3, max: 0.85 },
    core: { base: 0.4, min: 0.1, max: 0.8 },
    limb: { base: 0.5, min: 0.1, max: 0.9 },
  },
  positionBeta: {
    hand: 0.3,
    core: 0.05,
    limb: 0.1,
  },
  positionMinCutoff: 0.01,
  positionDCutoff: 1.0,
  fastBetaScale: 2.0,
};

/** Deep-ish merge: nested factor/beta tables are merged per class */
export function resolveSmoothingConfig(
  overrides: Partial<SmoothingConfig> = {},
): SmoothingConfig {
  const d = DEFAULT_SMOOTHING_CONFIG;
  return {
    ...d,
    ...overrides,
    factors: {
      hand: { ...d.factors.hand, ...overrides.factors?.hand },
      core: { ...d.factors.core, ...overrides.factors?.core },
      limb: { ...d.factors.limb, ...overrides.factors?.limb },
    },
    positionBeta: { ...d.positionBeta, ...overrides.positionBeta },
  };
}

// ============================================================================
// ROLLING WINDOW
// ============================================================================

class RollingWindow<T> {
  private readonly items: T[] = [];

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) this.items.shift();
  }

  get length(): number {
    return this.items.length;
  }

  values(): readonly T[] {
    return this.items;
  }

  clear(): void {
    this.items.length = 0;
  }
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

// ============================================================================
// QUATERNION SMOOTHER
// ============================================================================

export class QuaternionSmoother {
  private prev: THREE.Quaternion | null = null;
  private tPrev: number | null = null;
  private readonly speeds: RollingWindow<number>;

  constructor(
    private readonly factors: InterpolationFactors,
    private readonly config: SmoothingConfig = DEFAULT_SMOOTHING_CONFIG,
  ) {
    this.speeds = new RollingWindow(config.historySize);
  }

  /** Mean angular speed over the window (rad/s) */
  get averageSpeed(): number {
    return average(this.speeds.values());
  }

  /** Interpolation factor implied by the current speed window */
  get interpolationFactor(): number {
    const { base, min, max } = this.factors;
    if (!this.config.enableVelocityAdaptive || this.speeds.length === 0) {
      return base;
    }
    return this.averageSpeed > this.config.velocityThreshold
      ? Math.min(base * 1.5, max)
      : Math.max(base * 0.7, min);
  }

  smooth(t: number, target: THREE.Quaternion): THREE.Quaternion {
    if (this.prev === null || this.tPrev === null) {
      this.prev = target.clone().normalize();
      this.tPrev = t;
      return this.prev.clone();
    }

    const dt = t - this.tPrev;
    if (dt <= 0) return this.prev.clone();

    // q and -q are the same rotation; take the one nearest the previous output
    const aligned = target.clone();
    if (this.prev.dot(aligned) < 0) {
      aligned.set(-aligned.x, -aligned.y, -aligned.z, -aligned.w);
    }

    const delta = aligned.clone().multiply(this.prev.clone().invert());
    const w = THREE.MathUtils.clamp(delta.w, -1, 1);
    this.speeds.push((2 * Math.acos(w)) / dt);

    const out = slerp(this.prev, aligned, this.interpolationFactor);
    this.prev = out;
    this.tPrev = t;
    return out.clone();
  }

  reset(): void {
    this.prev = null;
    this.tPrev = null;
    this.speeds.clear();
  }
}

// ============================================================================
// POSITION SMOOTHER
// ============================================================================

interface TimedSample {
  t: number;
  p: THREE.Vector3;
}

/**
 * Outlier gate, then One-Euro.
 *
 * The gate keeps the last raw samples it let through and extrapolates them at
 * constant velocity. A candidate is an outlier when its distance from that
 * prediction exceeds `outlierThreshold` times the RMS of recent prediction
 * errors (floored at `minOutlierSpread`). Steady motion predicts itself, so
 * only sudden jumps are rejected.
 */
export class PositionSmoother {
  private readonly filter: OneEuroFilterVector3;
  private readonly baseBeta: number;
  private readonly history: RollingWindow<TimedSample>;
  private readonly residuals: RollingWindow<number>;
  private readonly speeds: RollingWindow<number>;
  private last: THREE.Vector3 | null = null;
  private tPrev: number | null = null;
  private rejections = 0;

  constructor(
    beta: number,
    private readonly config: SmoothingConfig = DEFAULT_SMOOTHING_CONFIG,
  ) {
    this.baseBeta = beta;
    this.filter = new OneEuroFilterVector3({
      minCutoff: config.positionMinCutoff,
      beta,
      dCutoff: config.positionDCutoff,
    });
    this.history = new RollingWindow(config.historySize);
    this.residuals = new RollingWindow(config.historySize);
    this.speeds = new RollingWindow(config.historySize);
  }

  /** Current One-Euro beta (scaled while moving fast) */
  get beta(): number {
    return this.filter.beta;
  }

  /** Consecutive samples rejected so far */
  get rejectionCount(): number {
    return this.rejections;
  }

  smooth(t: number, position: THREE.Vector3): THREE.Vector3 {
    if (this.last === null || this.tPrev === null) {
      return this.accept(t, position);
    }
    if (t - this.tPrev <= 0) return this.last.clone();

    if (this.config.enableOutlierRejection && this.isOutlier(t, position)) {
      this.rejections++;
      if (this.rejections <= this.config.maxConsecutiveRejections) {
        return this.last.clone();
      }
      // The subject really moved: restart the gate from here, keep the filter
      smoothingLog.debug(
        `Accepting sample after ${this.rejections - 1} rejections`,
      );
      this.history.clear();
      this.residuals.clear();
    }

    return this.accept(t, position);
  }

  /** Constant-velocity extrapolation of the last two accepted samples */
  private predict(t: number): THREE.Vector3 | null {
    const samples = this.history.values();
    const a = samples[samples.length - 2];
    const b = samples[samples.length - 1];
    if (!a || !b) return null;
    const velocity = b.p
      .clone()
      .sub(a.p)
      .multiplyScalar(1 / (b.t - a.t));
    return velocity.multiplyScalar(t - b.t).add(b.p);
  }

  private isOutlier(t: number, p: THREE.Vector3): boolean {
    if (this.history.length < 3) return false;
    const predicted = this.predict(t);
    if (predicted === null) return false;

    const errors = this.residuals.values();
    let sumSq = 0;
    for (const e of errors) sumSq += e * e;
    const rms = errors.length > 0 ? Math.sqrt(sumSq / errors.length) : 0;

    const spread = Math.max(rms, this.config.minOutlierSpread);
    return p.distanceTo(predicted) > this.config.outlierThreshold * spread;
  }

  private accept(t: number, position: THREE.Vector3): THREE.Vector3 {
    this.rejections = 0;

    const predicted = this.predict(t);
    if (predicted !== null) this.residuals.push(position.distanceTo(predicted));
    this.history.push({ t, p: position.clone() });

    const out = this.filter.filter(t, position);

    if (this.last !== null && this.tPrev !== null) {
      const dt = t - this.tPrev;
      this.speeds.push(out.distanceTo(this.last) / dt);
    }
    if (this.config.enableVelocityAdaptive && this.speeds.length > 0) {
      const fast =
        average(this.speeds.values()) > this.config.positionVelocityThreshold;
      this.filter.beta = fast
        ? this.baseBeta * this.config.fastBetaScale
        : this.baseBeta;
    }

    this.last = out.clone();
    this.tPrev = t;
    return out;
  }

  reset(): void {
    this.filter.reset();
    this.filter.beta = this.baseBeta;
    this.history.clear();
    this.residuals.clear();
    this.speeds.clear();
    this.last = null;
    this.tPrev = null;
    this.rejections = 0;
  }
}

// ============================================================================
// ENGINE
// ============================================================================

export class BoneSmoothingEngine {
  readonly config: SmoothingConfig;
  private readonly rotation = new Map<string, QuaternionSmoother>();
  private readonly position = new Map<string, PositionSmoother>();

  constructor(config: Partial<SmoothingConfig> = {}) {
    this.config = resolveSmoothingConfig(config);
  }

  smoothRotation(
    bone: string,
    t: number,
    target: THREE.Quaternion,
  ): THREE.Quaternion {
    if (!this.config.enableQuaternionSmoothing) return target.clone();
    let smoother = this.rotation.get(bone);
    if (!smoother) {
      smoother = new QuaternionSmoother(
        this.config.factors[classifyBone(bone)],
        this.config,
      );
      this.rotation.set(bone, smoother);
    }
    return smoother.smooth(t, target);
  }

  smoothPosition(
    bone: string,
    t: number,
    target: THREE.Vector3,
  ): THREE.Vector3 {
    let smoother = this.position.get(bone);
    if (!smoother) {
      smoother = new PositionSmoother(
        this.config.positionBeta[classifyBone(bone)],
        this.config,
      );
      this.position.set(bone, smoother);
    }
    return smoother.smooth(t, target);
  }

  /** Smooth every present point of a pose in place */
  smoothPose(pose: CanonicalPose, t: number): CanonicalPose {
    pose.forEach((point, bone) => {
      point.position = this.smoothPosition(bone, t, point.position);
    });
    return pose;
  }

  /**
   * Current rotation interpolation factor for a bone; the class base factor
   * before any rotation sample has been seen.
   */
  getAdaptiveInterpolationFactor(bone: string): number {
    const smoother = this.rotation.get(bone);
    if (smoother) return smoother.interpolationFactor;
    return this.config.factors[classifyBone(bone)].base;
  }

  reset(): void {
    this.rotation.clear();
    this.position.clear();
  }

  resetBone(bone: string): void {
    this.rotation.delete(bone);
    this.position.delete(bone);
  }
}
