/**
 * Root Motion Estimator
 * =====================
 *
 * Estimates hip translation in model units from the image-space hip
 * landmarks. World landmarks are hip-centred, so they cannot tell whether the
 * subject walked across the frame; the image landmarks can.
 *
 * The pixel → model factor converges toward modelHipSpan / pixelHipSpan,
 * but only from frames where the hips are wide enough on screen (> 20 px) and
 * seen mostly side-to-side (|Δx| > |Δz|), since a subject turned sideways
 * foreshortens the span.
 *
 * @module RootMotionEstimator
 */

import * as THREE from "three";
import { PoseLandmark, type Landmark } from "../biomech/landmarks";
import { rootMotionLog } from "../lib/logger";

export interface RootMotionOptions {
  /** Convergence rate of the pixel → model factor per frame */
  scaleLerp: number;
  /** Minimum hip span on screen (px) to update the factor */
  minPixelSpan: number;
  /** Extra gain on depth motion */
  depthGain: number;
}

export const DEFAULT_ROOT_MOTION_OPTIONS: RootMotionOptions = {
  scaleLerp: 0.05,
  minPixelSpan: 20,
  depthGain: 1.5,
};

export class RootMotionEstimator {
  private readonly options: RootMotionOptions;
  private origin: THREE.Vector3 | null = null;
  private factor: number | null = null;
  private modelHipSpan = 1;
  private width = 1;
  private height = 1;

  constructor(options: Partial<RootMotionOptions> = {}) {
    this.options = { ...DEFAULT_ROOT_MOTION_OPTIONS, ...options };
  }

  /** Current pixel → model factor, or null before the first usable frame */
  get scaleFactor(): number | null {
    return this.factor;
  }

  get hasOrigin(): boolean {
    return this.origin !== null;
  }

  get frameSize(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  /** Distance between the model's hip joints, in model units */
  updateModelMetrics(hipSpan: number): void {
    if (hipSpan > 0 && Number.isFinite(hipSpan)) {
      this.modelHipSpan = hipSpan;
    } else {
      rootMotionLog.warn(`Ignoring invalid model hip span ${hipSpan}`);
    }
  }

  /** Forget the origin and factor; the next frame becomes the new origin */
  reset(width: number, height: number): void {
    this.origin = null;
    this.factor = null;
    this.width = width;
    this.height = height;
  }

  /**
   * Hip translation relative to the origin frame, in model units
   * (x right, y up, z toward the camera). Null when either hip landmark is
   * missing.
   */
  estimate(imageLandmarks: readonly Landmark[]): THREE.Vector3 | null {
    const left = imageLandmarks[PoseLandmark.LEFT_HIP];
    const right = imageLandmarks[PoseLandmark.RIGHT_HIP];
    if (!left || !right) return null;

    const l = this.toPixels(left);
    const r = this.toPixels(right);
    const mid = l.clone().add(r).multiplyScalar(0.5);

    if (this.origin === null) {
      this.origin = mid;
      rootMotionLog.debug("Root origin captured", {
        x: mid.x,
        y: mid.y,
        z: mid.z,
      });
      return new THREE.Vector3();
    }

    const span = l.distanceTo(r);
    const dxHips = Math.abs(l.x - r.x);
    const dzHips = Math.abs(l.z - r.z);
    if (span > this.options.minPixelSpan && dxHips > dzHips) {
      const target = this.modelHipSpan / span;
      this.factor =
        this.factor === null
          ? target
          : THREE.MathUtils.lerp(this.factor, target, this.options.scaleLerp);
    }

    const f = this.factor ?? 0;
    const delta = mid.sub(this.origin);
    return new THREE.Vector3(
      delta.x * f,
      -delta.y * f,
      delta.z * f * this.options.depthGain,
    );
  }

  private toPixels(lm: Landmark): THREE.Vector3 {
    return new THREE.Vector3(
      lm.x * this.width,
      lm.y * this.height,
      lm.z * this.width,
    );
  }
}
