/**
 * Retargeter - Canonical Pose → Skeleton
 * ======================================
 *
 * Drives an arbitrary humanoid skeleton from a CanonicalPose, every frame.
 *
 * BIND TIME (constructor / recomputeBindPose):
 *   - world position + rotation and local rotation of every bound bone
 *   - unit bind direction of every parent → child chain link
 *   - hips basis (up = Spine − Hips, right = LeftUpLeg − RightUpLeg)
 *   - spine basis (up = Neck − Spine, right = LeftArm − RightArm)
 *   - vertical axis + up sign from the hips bone's local position
 *   - model leg length and hip span, in the hips bone's local units
 *
 * PER FRAME (applyPose):
 *   1. Hip placement (height from floor distance, root motion, damped)
 *   2. Hips + spine rotation from orthonormal bases
 *   3. Limbs: direction alignment, swivel (elbow/knee plane), forearm twist
 *   4. Hands: palm basis from index/pinky
 *   5. Head: basis from ears/eyes/shoulders with a flip check
 *   6. Remaining links (finger segments, toes)
 *   With a timestamp, each bone's rotation is smoothed as soon as its stage
 *   is done, before any child of it is solved.
 *
 * Every solver works the same way: build a world-space target rotation as
 * (observed frame ⊗ bind frame⁻¹) ⊗ boneBindWorld, convert it into the
 * bone's local space through the parent's CURRENT world rotation, then
 * slerp the local rotation toward it by a weight. A missing point or a
 * degenerate direction skips that joint only.
 *
 * @module retarget/Retargeter
 */

import * as THREE from "three";
import {
  CHAIN_LINKS,
  STANDARD_ALIGN_LINKS,
  armBones,
  fingerBone,
  legBones,
  type CanonicalBoneName,
  type Side,
} from "../biomech/canonicalBones";
import {
  BoneTable,
  type CanonicalPose,
  type PosePoint,
} from "../biomech/CanonicalPose";
import type { Landmark } from "../biomech/landmarks";
import {
  applyBasisDelta,
  basisFromUpForward,
  basisQuaternion,
  direction,
  crossDirection,
  invert,
  multiply,
  orthonormalBasis,
  quatFromBasis,
  quatFromUnitVectors,
  slerp,
  type OrthonormalBasis,
} from "../lib/math/vectorMath";
import {
  BoneSmoothingEngine,
  type SmoothingConfig,
} from "../lib/signal/SmoothingEngine";
import {
  RootMotionEstimator,
  type RootMotionOptions,
} from "./RootMotionEstimator";
import type { BoneHandle, SkeletonBinding } from "./BoneHandle";
import { retargetLog } from "../lib/logger";

// ============================================================================
// TYPES
// ============================================================================

export type RetargetState = "unbound" | "bound";
export type VerticalAxis = "y" | "z";

export interface BindInfo {
  position: THREE.Vector3;
  quaternion: THREE.Quaternion;
  localQuaternion: THREE.Quaternion;
  /** Unit bind direction toward each chain child */
  childDirections: Map<CanonicalBoneName, THREE.Vector3>;
}

export interface RetargeterOptions {
  /** Minimum visibility for a joint to be driven */
  visibilityThreshold: number;
  /** Per-frame lerp factor toward the target hip position */
  hipDamping: number;
  /** Hip height never drops below this fraction of the model leg length */
  minHipHeightRatio: number;
  /** Hips/spine weight = coreWeightBase + coreWeightGain · visibility */
  coreWeightBase: number;
  coreWeightGain: number;
  /** Spine1/Spine2 slerp toward their bind rotation by this much */
  spineRelaxWeight: number;
  armAlignWeight: number;
  defaultAlignWeight: number;
  armSwivelWeight: number;
  legSwivelWeight: number;
  forearmTwistWeight: number;
  handWeight: number;
  /** Head weight = headWeightBase + headWeightGain · confidence */
  headWeightBase: number;
  headWeightGain: number;
  /** Fraction of the head weight given to the neck */
  neckShare: number;
  enableRotationSmoothing: boolean;
  smoothing: Partial<SmoothingConfig>;
  rootMotion: Partial<RootMotionOptions>;
}

export const DEFAULT_RETARGETER_OPTIONS: RetargeterOptions = {
  visibilityThreshold: 0.5,
  hipDamping: 0.1,
  minHipHeightRatio: 0.85,
  coreWeightBase: 0.3,
  coreWeightGain: 0.4,
  spineRelaxWeight: 0.7,
  armAlignWeight: 0.8,
  defaultAlignWeight: 0.5,
  armSwivelWeight: 0.75,
  legSwivelWeight: 0.5,
  forearmTwistWeight: 0.75,
  handWeight: 0.9,
  headWeightBase: 0.3,
  headWeightGain: 0.5,
  neckShare: 0.25,
  enableRotationSmoothing: true,
  smoothing: {},
  rootMotion: {},
};

/** Per-frame side information alongside the canonical pose */
export interface RetargetFrameInfo {
  /** Normalised image landmarks for root motion */
  imageLandmarks?: readonly Landmark[];
  width?: number;
  height?: number;
  /** Seconds; enables the rotation smoothing pass */
  timestamp?: number;
}

const AXIS_X = new THREE.Vector3(1, 0, 0);
const AXIS_Z = new THREE.Vector3(0, 0, 1);

/** Core bones whose absence disables a whole solver */
const REQUIRED_BONES: readonly CanonicalBoneName[] = [
  "Hips",
  "Spine",
  "Neck",
  "Head",
  "LeftUpLeg",
  "RightUpLeg",
  "LeftArm",
  "RightArm",
];

function clamp01(v: number): number {
  return THREE.MathUtils.clamp(v, 0, 1);
}

function axisValue(v: THREE.Vector3, axis: "x" | "y" | "z"): number {
  return v[axis];
}

// ============================================================================
// RETARGETER
// ============================================================================

export class Retargeter {
  readonly options: RetargeterOptions;
  private readonly binding: SkeletonBinding;
  private readonly bind = new BoneTable<BindInfo>();
  private readonly rootMotion: RootMotionEstimator;
  private readonly smoothing: BoneSmoothingEngine;
  /** Bones written since the last settle(), awaiting rotation smoothing */
  private readonly pending = new Set<CanonicalBoneName>();
  private readonly settled = new Set<CanonicalBoneName>();
  private smoothAt: number | null = null;

  private _state: RetargetState = "unbound";
  private hipsBindBasis: THREE.Quaternion | null = null;
  private spineBindBasis: THREE.Quaternion | null = null;
  private _verticalAxis: VerticalAxis = "y";
  private _upSign = 1;
  private _modelLegLength = 1;
  private _unitScale = 1;
  private lastFrameSize: { width: number; height: number } | null = null;

  constructor(
    binding: SkeletonBinding,
    options: Partial<RetargeterOptions> = {},
  ) {
    this.options = { ...DEFAULT_RETARGETER_OPTIONS, ...options };
    this.binding = binding;
    this.rootMotion = new RootMotionEstimator(this.options.rootMotion);
    this.smoothing = new BoneSmoothingEngine(this.options.smoothing);

    const missing = REQUIRED_BONES.filter((b) => !binding.has(b));
    if (missing.length > 0) {
      retargetLog.warn(`Skeleton is missing core bones: ${missing.join(", ")}`);
    }
    this.recomputeBindPose();
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get state(): RetargetState {
    return this._state;
  }

  get verticalAxis(): VerticalAxis {
    return this._verticalAxis;
  }

  get upSign(): number {
    return this._upSign;
  }

  /** Model leg length in the hips bone's local units */
  get modelLegLength(): number {
    return this._modelLegLength;
  }

  /** Local / world unit ratio applied to leg length and hip span */
  get unitScale(): number {
    return this._unitScale;
  }

  getBindInfo(bone: CanonicalBoneName): BindInfo | undefined {
    return this.bind.get(bone);
  }

  // --------------------------------------------------------------------------
  // Bind pose
  // --------------------------------------------------------------------------

  /** Capture the current skeleton transforms as the bind pose */
  recomputeBindPose(): void {
    this.bind.clear();
    this.binding.get("Hips")?.propagateToChildren();

    this.binding.forEach((handle, bone) => {
      this.bind.set(bone, {
        position: handle.getWorldPosition(),
        quaternion: handle.getWorldQuaternion(),
        localQuaternion: handle.getLocalQuaternion(),
        childDirections: new Map(),
      });
    });

    for (const [parent, child] of CHAIN_LINKS) {
      const p = this.bind.get(parent);
      const c = this.bind.get(child);
      if (!p || !c) continue;
      const dir = direction(p.position, c.position);
      if (dir) p.childDirections.set(child, dir);
    }

    this.hipsBindBasis = this.bindBasis(
      "Spine",
      "Hips",
      "LeftUpLeg",
      "RightUpLeg",
    );
    this.spineBindBasis = this.bindBasis(
      "Neck",
      "Spine",
      "LeftArm",
      "RightArm",
    );
    this.detectAxes();
    this.computeModelMetrics();

    retargetLog.debug("Bind pose captured", {
      bones: this.bind.size,
      verticalAxis: this._verticalAxis,
      upSign: this._upSign,
      legLength: this._modelLegLength,
    });
  }

  private bindBasis(
    upTo: CanonicalBoneName,
    upFrom: CanonicalBoneName,
    left: CanonicalBoneName,
    right: CanonicalBoneName,
  ): THREE.Quaternion | null {
    const a = this.bind.get(upTo);
    const b = this.bind.get(upFrom);
    const l = this.bind.get(left);
    const r = this.bind.get(right);
    if (!a || !b || !l || !r) return null;
    const basis = orthonormalBasis(
      a.position.clone().sub(b.position),
      l.position.clone().sub(r.position),
    );
    return basis ? basisQuaternion(basis) : null;
  }

  private detectAxes(): void {
    const hips = this.binding.get("Hips");
    if (!hips) return;
    const p = hips.getLocalPosition();
    const ax = Math.abs(p.x);
    const ay = Math.abs(p.y);
    const az = Math.abs(p.z);
    if (az > ay && az > ax) {
      this._verticalAxis = "z";
      this._upSign = p.z === 0 ? -1 : Math.sign(p.z);
    } else {
      this._verticalAxis = "y";
      this._upSign = p.y === 0 ? 1 : Math.sign(p.y);
    }
  }

  private computeModelMetrics(): void {
    const hips = this.bind.get("Hips");
    let legLength = 0;

    if (hips) {
      legLength = Math.abs(axisValue(hips.position, this._verticalAxis));
      const lengths: number[] = [];
      for (const side of ["Left", "Right"] as const) {
        const { leg, foot } = legBones(side);
        const knee = this.bind.get(leg);
        const ankle = this.bind.get(foot);
        if (knee && ankle) {
          lengths.push(
            hips.position.distanceTo(knee.position) +
              knee.position.distanceTo(ankle.position),
          );
        }
      }
      if (lengths.length === 2) {
        const avg = (lengths[0] + lengths[1]) / 2;
        if (avg > 0.01) legLength = avg;
      }
    }

    if (legLength < 0.01) {
      retargetLog.warn("Could not measure model leg length; using 1.0");
      legLength = 1;
    }

    // Rigs exported in centimetres under a 0.01-scaled armature measure
    // ~1 m in world space but ~100 in the hips' local space
    this._unitScale = 1;
    const hipsHandle = this.binding.get("Hips");
    if (hipsHandle && legLength > 0.5 && legLength < 5) {
      const localHeight = Math.abs(
        axisValue(hipsHandle.getLocalPosition(), this._verticalAxis),
      );
      if (localHeight >= legLength * 10) this._unitScale = 100;
    }
    this._modelLegLength = legLength * this._unitScale;

    const leftHip = this.bind.get("LeftUpLeg");
    const rightHip = this.bind.get("RightUpLeg");
    if (leftHip && rightHip) {
      this.rootMotion.updateModelMetrics(
        leftHip.position.distanceTo(rightHip.position) * this._unitScale,
      );
    }
  }

  // --------------------------------------------------------------------------
  // Per frame
  // --------------------------------------------------------------------------

  applyPose(pose: CanonicalPose, frame: RetargetFrameInfo = {}): void {
    if (pose.isEmpty()) return;
    this.pending.clear();
    this.settled.clear();
    this.smoothAt =
      frame.timestamp !== undefined && this.options.enableRotationSmoothing
        ? frame.timestamp
        : null;

    // Parents settle before their children are solved
    this.positionHips(pose, frame);
    this.solveHips(pose);
    this.settle();
    this.solveSpine(pose);
    this.settle();

    for (const side of ["Left", "Right"] as const) {
      const { arm, foreArm, hand } = armBones(side);
      this.solveLimb(pose, arm, foreArm, hand, fingerBone(side, "Middle", 1));
    }
    for (const side of ["Left", "Right"] as const) {
      const { upLeg, leg, foot } = legBones(side);
      this.solveLimb(pose, upLeg, leg, foot, null);
    }
    for (const side of ["Left", "Right"] as const) {
      this.solveHand(pose, side);
      this.settle();
    }

    this.solveHead(pose);
    this.settle();

    for (const [parent, child] of STANDARD_ALIGN_LINKS) {
      this.alignBone(parent, child, pose);
      this.settle();
    }

    this.binding.get("Hips")?.propagateToChildren();
    this._state = "bound";
  }

  /** Clear rotation/position filters and the root-motion origin */
  resetSmoothing(): void {
    this.smoothing.reset();
    const size = this.lastFrameSize ?? this.rootMotion.frameSize;
    this.rootMotion.reset(size.width, size.height);
  }

  // --------------------------------------------------------------------------
  // 1. Hip placement
  // --------------------------------------------------------------------------

  private positionHips(pose: CanonicalPose, frame: RetargetFrameInfo): void {
    const handle = this.binding.get("Hips");
    const pHips = pose.get("Hips");
    const pLeftFoot = pose.get("LeftFoot");
    const pRightFoot = pose.get("RightFoot");
    if (!handle || !pHips || !pLeftFoot || !pRightFoot) return;

    let observedLeg = 1;
    const pLeftKnee = pose.get("LeftLeg");
    const pRightKnee = pose.get("RightLeg");
    if (pLeftKnee && pRightKnee) {
      const left =
        pHips.position.distanceTo(pLeftKnee.position) +
        pLeftKnee.position.distanceTo(pLeftFoot.position);
      const right =
        pHips.position.distanceTo(pRightKnee.position) +
        pRightKnee.position.distanceTo(pRightFoot.position);
      observedLeg = (left + right) / 2;
    }
    const scale = this._modelLegLength / (observedLeg > 0.01 ? observedLeg : 1);

    let floorY = Math.min(pLeftFoot.position.y, pRightFoot.position.y);
    const pLeftToe = pose.get("LeftToeBase");
    const pRightToe = pose.get("RightToeBase");
    if (pLeftToe) floorY = Math.min(floorY, pLeftToe.position.y);
    if (pRightToe) floorY = Math.min(floorY, pRightToe.position.y);

    const distToFloor = Math.abs(pHips.position.y - floorY);
    const minHeight = this._modelLegLength * this.options.minHipHeightRatio;
    let targetHeight = Math.max(distToFloor * scale, minHeight) * this._upSign;
    if (this._upSign < 0 && targetHeight > 0) targetHeight = 0;
    if (this._upSign > 0 && targetHeight < 0) targetHeight = 0;

    const current = handle.getLocalPosition();
    const forwardAxis = this._verticalAxis === "y" ? "z" : "y";
    let targetSide = current.x;
    let targetForward = axisValue(current, forwardAxis);

    const translation = this.estimateRootMotion(frame);
    if (translation) {
      targetSide = translation.x;
      targetForward = translation.z;
    }

    const a = this.options.hipDamping;
    const next = current.clone();
    next.x = THREE.MathUtils.lerp(current.x, targetSide, a);
    if (this._verticalAxis === "y") {
      next.y = THREE.MathUtils.lerp(current.y, targetHeight, a);
      next.z = THREE.MathUtils.lerp(current.z, targetForward, a);
    } else {
      next.z = THREE.MathUtils.lerp(current.z, targetHeight, a);
      next.y = THREE.MathUtils.lerp(current.y, targetForward, a);
    }
    handle.setLocalPosition(next);
    handle.propagateToChildren();
  }

  private estimateRootMotion(frame: RetargetFrameInfo): THREE.Vector3 | null {
    const { imageLandmarks, width, height } = frame;
    if (!imageLandmarks || imageLandmarks.length === 0) return null;
    if (width === undefined || height === undefined) return null;
    if (width <= 0 || height <= 0) return null;

    if (
      !this.lastFrameSize ||
      this.lastFrameSize.width !== width ||
      this.lastFrameSize.height !== height
    ) {
      retargetLog.debug(`Frame size ${width}x${height}; resetting root motion`);
      this.rootMotion.reset(width, height);
      this.lastFrameSize = { width, height };
    }
    return this.rootMotion.estimate(imageLandmarks);
  }

  // --------------------------------------------------------------------------
  // 2. Hips & spine
  // --------------------------------------------------------------------------

  private solveHips(pose: CanonicalPose): void {
    const bind = this.bind.get("Hips");
    const pHips = pose.get("Hips");
    const pSpine = pose.get("Spine");
    const pLeft = pose.get("LeftUpLeg");
    const pRight = pose.get("RightUpLeg");
    if (!bind || !this.hipsBindBasis) return;
    if (!pHips || !pSpine || !pLeft || !pRight) return;

    const threshold = this.options.visibilityThreshold;
    const vis = (pHips.visibility + pLeft.visibility + pRight.visibility) / 3;
    if (vis < threshold * 0.5) return;

    const up = pSpine.position.clone().sub(pHips.position);
    let right = direction(pRight.position, pLeft.position);
    if (!right) return;

    // Low hip confidence: lean on the shoulder line for yaw
    const pLeftArm = pose.get("LeftArm");
    const pRightArm = pose.get("RightArm");
    if (pLeftArm && pRightArm && vis < threshold) {
      const shoulderRight = direction(pRightArm.position, pLeftArm.position);
      const shoulderVis = (pLeftArm.visibility + pRightArm.visibility) / 2;
      if (shoulderRight && shoulderVis > vis) {
        const blend = THREE.MathUtils.clamp(
          (shoulderVis - vis) / (1 - vis),
          0,
          0.5,
        );
        right = right
          .multiplyScalar(1 - blend)
          .add(shoulderRight.multiplyScalar(blend));
      }
    }

    const basis = orthonormalBasis(up, right);
    if (!basis) return;

    const targetWorld = applyBasisDelta(
      basisQuaternion(basis),
      this.hipsBindBasis,
      bind.quaternion,
    );
    this.applyWorldRotation("Hips", targetWorld, this.coreWeight(vis));
  }

  private solveSpine(pose: CanonicalPose): void {
    const bind = this.bind.get("Spine");
    const pNeck = pose.get("Neck");
    const pSpine = pose.get("Spine");
    const pLeftArm = pose.get("LeftArm");
    const pRightArm = pose.get("RightArm");
    if (!bind || !this.spineBindBasis) return;
    if (!pNeck || !pSpine || !pLeftArm || !pRightArm) return;

    const vis =
      (pNeck.visibility + pLeftArm.visibility + pRightArm.visibility) / 3;
    if (vis < this.options.visibilityThreshold * 0.5) return;

    const basis = orthonormalBasis(
      pNeck.position.clone().sub(pSpine.position),
      pLeftArm.position.clone().sub(pRightArm.position),
    );
    if (!basis) return;

    const targetWorld = applyBasisDelta(
      basisQuaternion(basis),
      this.spineBindBasis,
      bind.quaternion,
    );
    this.applyWorldRotation("Spine", targetWorld, this.coreWeight(vis));

    // Upper spine segments relax toward bind so the bend spreads naturally
    for (const bone of ["Spine1", "Spine2"] as const) {
      const handle = this.binding.get(bone);
      const b = this.bind.get(bone);
      if (!handle || !b) continue;
      this.setLocal(
        bone,
        handle,
        slerp(
          handle.getLocalQuaternion(),
          b.localQuaternion,
          this.options.spineRelaxWeight,
        ),
      );
    }
  }

  private coreWeight(visibility: number): number {
    const { coreWeightBase, coreWeightGain } = this.options;
    return coreWeightBase + coreWeightGain * clamp01(visibility);
  }

  // --------------------------------------------------------------------------
  // 3. Limbs
  // --------------------------------------------------------------------------

  private solveLimb(
    pose: CanonicalPose,
    start: CanonicalBoneName,
    mid: CanonicalBoneName,
    end: CanonicalBoneName,
    fingerTip: CanonicalBoneName | null,
  ): void {
    const pStart = pose.get(start);
    const pMid = pose.get(mid);
    const pEnd = pose.get(end);
    const bStart = this.bind.get(start);
    const bMid = this.bind.get(mid);
    const bEnd = this.bind.get(end);
    const complete = Boolean(pStart && pMid && pEnd && bStart && bMid && bEnd);

    // Swivel only turns the limb root, so it settles before the mid joint
    this.alignBone(start, mid, pose);
    if (pStart && pMid && pEnd && bStart && bMid && bEnd) {
      const isArm = fingerTip !== null;
      this.solveSwivel(start, pStart, pMid, pEnd, bStart, bMid, bEnd, isArm);
    }
    this.settle();

    this.alignBone(mid, end, pose);
    if (complete && fingerTip && pMid && pEnd && bMid && bEnd) {
      const pFinger = pose.get(fingerTip);
      const bFinger = this.bind.get(fingerTip);
      if (
        pFinger &&
        bFinger &&
        pFinger.visibility >= this.options.visibilityThreshold
      ) {
        this.solveForearmTwist(mid, pMid, pEnd, pFinger, bMid, bEnd, bFinger);
      }
    }
    this.settle();
  }

  /** Turn the limb root about its axis so the elbow/knee bends in plane */
  private solveSwivel(
    start: CanonicalBoneName,
    pStart: PosePoint,
    pMid: PosePoint,
    pEnd: PosePoint,
    bStart: BindInfo,
    bMid: BindInfo,
    bEnd: BindInfo,
    isArm: boolean,
  ): void {
    const observed = limbPlane(pStart.position, pMid.position, pEnd.position);
    const rest = limbPlane(bStart.position, bMid.position, bEnd.position);
    if (!observed || !rest) return;

    const targetWorld = applyBasisDelta(observed, rest, bStart.quaternion);
    const weight = isArm
      ? this.options.armSwivelWeight
      : this.options.legSwivelWeight;
    this.applyWorldRotation(start, targetWorld, weight);
  }

  private solveForearmTwist(
    mid: CanonicalBoneName,
    pMid: PosePoint,
    pEnd: PosePoint,
    pFinger: PosePoint,
    bMid: BindInfo,
    bEnd: BindInfo,
    bFinger: BindInfo,
  ): void {
    const observed = twistFrame(pMid.position, pEnd.position, pFinger.position);
    const rest = twistFrame(bMid.position, bEnd.position, bFinger.position);
    if (!observed || !rest) return;

    const targetWorld = applyBasisDelta(observed, rest, bMid.quaternion);
    this.applyWorldRotation(mid, targetWorld, this.options.forearmTwistWeight);
  }

  // --------------------------------------------------------------------------
  // 4. Hands
  // --------------------------------------------------------------------------

  private solveHand(pose: CanonicalPose, side: Side): void {
    const { foreArm, hand } = armBones(side);
    const index = fingerBone(side, "Index", 1);
    const pinky = fingerBone(side, "Pinky", 1);

    const pHand = pose.get(hand);
    const pForeArm = pose.get(foreArm);
    const pIndex = pose.get(index);
    const pPinky = pose.get(pinky);
    const bHand = this.bind.get(hand);
    const bForeArm = this.bind.get(foreArm);
    const bIndex = this.bind.get(index);
    const bPinky = this.bind.get(pinky);

    let solved = false;
    if (
      pHand &&
      pForeArm &&
      pIndex &&
      pPinky &&
      bHand &&
      bForeArm &&
      bIndex &&
      bPinky &&
      pHand.visibility >= this.options.visibilityThreshold
    ) {
      solved = this.solvePalm(
        hand,
        palmFrame(
          pForeArm.position,
          pHand.position,
          pIndex.position,
          pPinky.position,
        ),
        palmFrame(
          bForeArm.position,
          bHand.position,
          bIndex.position,
          bPinky.position,
        ),
        bHand.quaternion,
      );
    }

    // Without a palm frame, at least point the hand along the middle finger
    if (!solved) this.alignBone(hand, fingerBone(side, "Middle", 1), pose);
  }

  private solvePalm(
    hand: CanonicalBoneName,
    observed: THREE.Quaternion | null,
    rest: THREE.Quaternion | null,
    bindWorld: THREE.Quaternion,
  ): boolean {
    if (!observed || !rest) return false;
    const targetWorld = applyBasisDelta(observed, rest, bindWorld);
    this.applyWorldRotation(hand, targetWorld, this.options.handWeight);
    return true;
  }

  // --------------------------------------------------------------------------
  // 5. Head
  // --------------------------------------------------------------------------

  private solveHead(pose: CanonicalPose): void {
    const pHead = pose.get("Head");
    const pNeck = pose.get("Neck");
    const bHead = this.bind.get("Head");
    const bNeck = this.bind.get("Neck");
    if (!pHead || !pNeck || !bHead || !bNeck) return;

    const threshold = this.options.visibilityThreshold;
    const pLeftEar = pose.get("LeftEar");
    const pRightEar = pose.get("RightEar");

    let visSum = pHead.visibility;
    let visCount = 1;
    if (pLeftEar && pRightEar) {
      visSum += (pLeftEar.visibility + pRightEar.visibility) / 2;
      visCount++;
    }
    if (visSum / visCount < threshold * 0.5) {
      this.alignBone("Neck", "Head", pose);
      return;
    }

    const up = direction(pNeck.position, pHead.position);
    const observedRight = up ? this.headRight(pose, up) : null;
    if (!up || !observedRight) {
      this.alignBone("Neck", "Head", pose);
      return;
    }

    const basis = orthonormalBasis(up, observedRight.right);
    const bindBasis = headBindBasis(bNeck.position, bHead.position);
    if (!basis || !bindBasis) {
      this.alignBone("Neck", "Head", pose);
      return;
    }

    // A face pointing backwards relative to bind is almost always a
    // left/right swap in the tracker
    let confidence = observedRight.confidence;
    if (basis.forward.dot(bindBasis.forward) < -0.3) confidence *= 0.3;

    const target = basisQuaternion(basis);
    const rest = basisQuaternion(bindBasis);
    const { headWeightBase, headWeightGain } = this.options;
    const headWeight = headWeightBase + headWeightGain * clamp01(confidence);
    this.applyWorldRotation(
      "Head",
      applyBasisDelta(target, rest, bHead.quaternion),
      headWeight,
    );

    if (this.binding.has("Neck")) {
      this.applyWorldRotation(
        "Neck",
        applyBasisDelta(target, rest, bNeck.quaternion),
        headWeight * this.options.neckShare,
      );
    }
  }

  /** Head right vector: ears, then eyes, then shoulders */
  private headRight(
    pose: CanonicalPose,
    up: THREE.Vector3,
  ): { right: THREE.Vector3; confidence: number } | null {
    const threshold = this.options.visibilityThreshold;

    const pLeftEar = pose.get("LeftEar");
    const pRightEar = pose.get("RightEar");
    if (
      pLeftEar &&
      pRightEar &&
      pLeftEar.visibility > threshold * 0.7 &&
      pRightEar.visibility > threshold * 0.7
    ) {
      const ears = direction(pRightEar.position, pLeftEar.position);
      // Ears nearly parallel to the neck axis means a bad detection
      if (ears && Math.abs(ears.dot(up)) < 0.7) {
        return {
          right: ears,
          confidence: (pLeftEar.visibility + pRightEar.visibility) / 2,
        };
      }
    }

    const pLeftEye = pose.get("LeftEye");
    const pRightEye = pose.get("RightEye");
    if (
      pLeftEye &&
      pRightEye &&
      pLeftEye.visibility > threshold &&
      pRightEye.visibility > threshold
    ) {
      const eyes = direction(pRightEye.position, pLeftEye.position);
      if (eyes) {
        return {
          right: eyes,
          confidence: ((pLeftEye.visibility + pRightEye.visibility) / 2) * 0.8,
        };
      }
    }

    const pLeftArm = pose.get("LeftArm");
    const pRightArm = pose.get("RightArm");
    if (
      pLeftArm &&
      pRightArm &&
      pLeftArm.visibility > threshold &&
      pRightArm.visibility > threshold
    ) {
      const shoulders = direction(pRightArm.position, pLeftArm.position);
      if (shoulders) return { right: shoulders, confidence: 0.5 };
    }

    return null;
  }

  // --------------------------------------------------------------------------
  // Shared solvers
  // --------------------------------------------------------------------------

  /** Point `parent` at `child`, minimal rotation from its bind direction */
  private alignBone(
    parent: CanonicalBoneName,
    child: CanonicalBoneName,
    pose: CanonicalPose,
  ): void {
    const pParent = pose.get(parent);
    const pChild = pose.get(child);
    const bind = this.bind.get(parent);
    if (!pParent || !pChild || !bind || !this.binding.has(parent)) return;
    if (pParent.visibility < this.options.visibilityThreshold) return;

    const bindDir = bind.childDirections.get(child);
    const targetDir = direction(pParent.position, pChild.position);
    if (!bindDir || !targetDir) return;

    const targetWorld = multiply(
      quatFromUnitVectors(bindDir, targetDir),
      bind.quaternion,
    );
    const isArmBone = parent.includes("Arm") || parent.includes("Hand");
    const weight = isArmBone
      ? this.options.armAlignWeight
      : this.options.defaultAlignWeight;
    this.applyWorldRotation(parent, targetWorld, weight);
  }

  /** local = parentWorld⁻¹ ⊗ targetWorld, then slerp by weight */
  private applyWorldRotation(
    bone: CanonicalBoneName,
    targetWorld: THREE.Quaternion,
    weight: number,
  ): void {
    const handle = this.binding.get(bone);
    if (!handle) return;
    const targetLocal = multiply(
      invert(handle.getParentWorldQuaternion()),
      targetWorld,
    );
    const next = slerp(handle.getLocalQuaternion(), targetLocal, weight);
    this.setLocal(bone, handle, next);
  }

  private setLocal(
    bone: CanonicalBoneName,
    handle: BoneHandle,
    rotation: THREE.Quaternion,
  ): void {
    handle.setLocalQuaternion(rotation);
    handle.propagateToChildren();
    if (!this.settled.has(bone)) this.pending.add(bone);
  }

  /**
   * Smooth the bones written since the last call. Runs between solver
   * stages, so children are always solved against their parent's final,
   * smoothed rotation. Each bone is smoothed at most once per frame.
   */
  private settle(): void {
    if (this.smoothAt === null) {
      this.pending.clear();
      return;
    }
    for (const bone of this.pending) {
      const handle = this.binding.get(bone);
      if (!handle) continue;
      handle.setLocalQuaternion(
        this.smoothing.smoothRotation(
          bone,
          this.smoothAt,
          handle.getLocalQuaternion(),
        ),
      );
      handle.propagateToChildren();
      this.settled.add(bone);
    }
    this.pending.clear();
  }
}

// ============================================================================
// FRAMES
// ============================================================================

/**
 * Limb plane frame: up along start → mid, forward along the bend normal.
 * Null for a straight (or folded) limb, whose plane is undefined.
 */
function limbPlane(
  start: THREE.Vector3,
  mid: THREE.Vector3,
  end: THREE.Vector3,
): THREE.Quaternion | null {
  const upper = direction(start, mid);
  const lower = direction(mid, end);
  if (!upper || !lower) return null;
  const normal = crossDirection(upper, lower, 0.01);
  if (!normal) return null;
  const basis = basisFromUpForward(upper, normal);
  return basis ? basisQuaternion(basis) : null;
}

/** Forearm frame: up along the forearm, right toward the finger bend */
function twistFrame(
  elbow: THREE.Vector3,
  wrist: THREE.Vector3,
  finger: THREE.Vector3,
): THREE.Quaternion | null {
  const forearm = direction(elbow, wrist);
  const hand = direction(wrist, finger);
  if (!forearm || !hand) return null;
  const normal = crossDirection(forearm, hand, 1e-6);
  if (!normal) return null;
  const basis = basisFromUpForward(forearm, normal.clone().cross(forearm));
  return basis ? basisQuaternion(basis) : null;
}

/**
 * Palm frame: Y toward the fingers (mean of wrist → index and
 * wrist → pinky),
 * Z the palm normal (index × pinky, or Y × forearm when the two fingers are
 * parallel), X = Y × Z.
 */
function palmFrame(
  elbow: THREE.Vector3,
  wrist: THREE.Vector3,
  index: THREE.Vector3,
  pinky: THREE.Vector3,
): THREE.Quaternion | null {
  const toIndex = direction(wrist, index);
  const toPinky = direction(wrist, pinky);
  if (!toIndex || !toPinky) return null;

  const y = toIndex.clone().add(toPinky).normalize();
  if (y.lengthSq() === 0) return null;

  let z = crossDirection(toIndex, toPinky, 1e-6);
  if (!z) {
    const forearm = direction(elbow, wrist);
    z = forearm ? crossDirection(y, forearm, 1e-6) : null;
  }
  if (!z) return null;

  const x = y.clone().cross(z).normalize();
  return quatFromBasis(x, y, z);
}

/** Bind head frame: up = Neck → Head, right +X (or +Z when X is vertical) */
function headBindBasis(
  neck: THREE.Vector3,
  head: THREE.Vector3,
): OrthonormalBasis | null {
  const up = direction(neck, head);
  if (!up) return null;
  const right = Math.abs(AXIS_X.dot(up)) > 0.9 ? AXIS_Z : AXIS_X;
  return orthonormalBasis(up, right);
}
