/**
 * RetargetSession - one motion source → one skeleton
 * ==================================================
 *
 * Per frame:  validate → PoseMapper → position smoothing → Retargeter
 *
 * Filter state (position/rotation smoothers, palm-orientation hysteresis,
 * root-motion origin) belongs to one continuous source. Call beginSource()
 * before feeding a different recording or restarting a camera.
 *
 * @module retarget/RetargetSession
 */

import * as THREE from "three";
import {
  PalmOrientationSmoother,
  buildCanonicalPose,
  type PoseMapperOptions,
} from "../biomech/PoseMapper";
import {
  validateLandmarkFrame,
  type LandmarkFrame,
} from "../biomech/landmarks";
import type { CanonicalPose } from "../biomech/CanonicalPose";
import {
  BoneSmoothingEngine,
  type SmoothingConfig,
} from "../lib/signal/SmoothingEngine";
import { Retargeter, type RetargeterOptions } from "./Retargeter";
import { resolveSkeletonBinding } from "./SkeletonBinding";
import type { SkeletonBinding } from "./BoneHandle";
import {
  useRetargetSettingsStore,
  type RetargetSettings,
} from "../store/useRetargetSettingsStore";
import { sessionLog } from "../lib/logger";

export interface RetargetSessionOptions {
  smoothing: Partial<SmoothingConfig>;
  retarget: Partial<Omit<RetargeterOptions, "smoothing">>;
  mapper: Partial<PoseMapperOptions>;
  nominalFps: number;
  /** Run the pose-level position smoother before retargeting */
  smoothPositions: boolean;
}

export type FrameResult =
  | { status: "applied"; pose: CanonicalPose; timestamp: number }
  | { status: "dropped"; reason: string };

function fromSettings(settings: RetargetSettings): RetargetSessionOptions {
  return {
    smoothing: settings.smoothing,
    retarget: settings.retarget,
    mapper: settings.mapper,
    nominalFps: settings.nominalFps,
    smoothPositions: true,
  };
}

export class RetargetSession {
  readonly retargeter: Retargeter;
  private readonly options: RetargetSessionOptions;
  private readonly positionSmoother: BoneSmoothingEngine;
  private readonly palmSmoother = new PalmOrientationSmoother();
  private _frameCount = 0;
  private _droppedCount = 0;
  /** Invalid frames since the last applied one */
  private dropRun = 0;
  private lastTimestamp: number | null = null;

  /**
   * @param binding - canonical → bone handles for the target skeleton
   * @param options - overrides; anything omitted comes from the settings store
   */
  constructor(
    binding: SkeletonBinding,
    options: Partial<RetargetSessionOptions> = {},
  ) {
    const base = fromSettings(useRetargetSettingsStore.getState().settings);
    this.options = {
      ...base,
      ...options,
      smoothing: { ...base.smoothing, ...options.smoothing },
      retarget: { ...base.retarget, ...options.retarget },
      mapper: { ...base.mapper, ...options.mapper },
    };
    this.positionSmoother = new BoneSmoothingEngine(this.options.smoothing);
    this.retargeter = new Retargeter(binding, {
      ...this.options.retarget,
      smoothing: this.options.smoothing,
    });
  }

  /** Bind a three.js model by bone name and start a session on it */
  static fromModel(
    root: THREE.Object3D,
    options: Partial<RetargetSessionOptions> = {},
  ): RetargetSession {
    const { binding, missing } = resolveSkeletonBinding(root);
    if (missing.length > 0) {
      sessionLog.info(`Unbound canonical bones: ${missing.join(", ")}`);
    }
    return new RetargetSession(binding, options);
  }

  get frameCount(): number {
    return this._frameCount;
  }

  get droppedCount(): number {
    return this._droppedCount;
  }

  /** Forget everything learned from the previous motion source */
  beginSource(): void {
    this.positionSmoother.reset();
    this.palmSmoother.reset();
    this.retargeter.resetSmoothing();
    this._frameCount = 0;
    this._droppedCount = 0;
    this.dropRun = 0;
    this.lastTimestamp = null;
    sessionLog.debug("New motion source");
  }

  processFrame(frame: LandmarkFrame): FrameResult {
    const issues = validateLandmarkFrame(frame);
    if (issues.length > 0) {
      this._droppedCount++;
      const reason = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
      // Warn once per run; an empty camera view drops every frame
      if (this.dropRun === 0) {
        sessionLog.warn(`Dropping frames: ${reason}`);
      } else {
        sessionLog.debug(`Dropping frame: ${reason}`);
      }
      this.dropRun++;
      return { status: "dropped", reason };
    }
    if (this.dropRun > 0) {
      sessionLog.info(`Resumed after ${this.dropRun} dropped frames`);
      this.dropRun = 0;
    }

    const timestamp = this.resolveTimestamp(frame.timestamp);
    const pose = buildCanonicalPose(frame, {
      ...this.options.mapper,
      palmSmoother: this.palmSmoother,
    });
    if (this.options.smoothPositions) {
      this.positionSmoother.smoothPose(pose, timestamp);
    }

    this.retargeter.applyPose(pose, {
      imageLandmarks: frame.imageLandmarks,
      width: frame.width,
      height: frame.height,
      timestamp,
    });

    this._frameCount++;
    this.lastTimestamp = timestamp;
    return { status: "applied", pose, timestamp };
  }

  /** Frame timestamp, or one nominal frame step after the previous frame */
  private resolveTimestamp(timestamp: number | undefined): number {
    if (timestamp !== undefined) return timestamp;
    const step = 1 / this.options.nominalFps;
    return this.lastTimestamp === null ? 0 : this.lastTimestamp + step;
  }
}
