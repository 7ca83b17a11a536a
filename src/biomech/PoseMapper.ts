/**
 * PoseMapper - Landmarks → Canonical Pose
 * ========================================
 *
 * Turns one frame of MediaPipe-style landmarks into a CanonicalPose:
 * a position + visibility per canonical bone.
 *
 * Pipeline:
 * 1. AXIS FLIP: world landmarks are y-down / z-away; the skeleton is y-up /
 *    z-forward, so every world point gets y = -y, z = -z.
 * 2. DIRECT POINTS: shoulders, elbows, wrists, hips, knees, ankles, toes,
 *    eyes, ears, nose.
 * 3. DERIVED POINTS: neck, hips centre, spine segments, head, head-top,
 *    toe ends. A midpoint needs ALL of its inputs; if one is missing the
 *    derived point is missing too.
 * 4. FINGERS: detailed hand landmarks when present (anchored on the body
 *    wrist, scaled from the forearm), otherwise straight fallback chains
 *    toward the body fingertip estimates.
 *
 * Visibility of a derived point is the average (midpoints) or the minimum
 * (extrapolations, finger chains) of its inputs.
 *
 * @module biomech/PoseMapper
 */

import * as THREE from "three";
import {
  FINGERS,
  FINGER_SEGMENTS,
  armBones,
  fingerBone,
  legBones,
  type CanonicalBoneName,
  type FingerName,
  type Side,
} from "./canonicalBones";
import {
  createPose,
  type CanonicalPose,
  type PosePoint,
} from "./CanonicalPose";
import {
  HAND_LANDMARK_COUNT,
  HandLandmark,
  PoseLandmark,
  landmarkVisibility,
  type Landmark,
  type LandmarkFrame,
} from "./landmarks";
import { crossDirection, direction } from "../lib/math/vectorMath";

// ============================================================================
// OPTIONS
// ============================================================================

export interface PoseMapperOptions {
  /** Palm length (wrist → middle MCP) as a fraction of forearm length */
  palmToForearmRatio: number;
  /** HeadTop_End = Head + k·(Head − Neck) */
  headTopExtension: number;
  /** Toe_End = ToeBase + k·(ToeBase − Foot) */
  toeEndExtension: number;
}

export const DEFAULT_POSE_MAPPER_OPTIONS: PoseMapperOptions = {
  palmToForearmRatio: 0.4,
  headTopExtension: 0.3,
  toeEndExtension: 0.3,
};

export interface BuildPoseOptions extends Partial<PoseMapperOptions> {
  /** Hysteresis for the hand-depth sign; omit for per-frame decisions */
  palmSmoother?: PalmOrientationSmoother;
}

type DepthSign = 1 | -1;

// ============================================================================
// PALM ORIENTATION SMOOTHER
// ============================================================================

/**
 * The hand detector's relative depth is often mirrored, which turns the palm
 * inside out. Each frame votes for a depth sign; the accepted sign changes
 * only after `switchFrames` consecutive votes for the other one.
 */
export class PalmOrientationSmoother {
  private readonly state: Record<Side, { sign: DepthSign; streak: number }> = {
    Left: { sign: 1, streak: 0 },
    Right: { sign: 1, streak: 0 },
  };

  constructor(private readonly switchFrames: number = 3) {}

  current(side: Side): DepthSign {
    return this.state[side].sign;
  }

  /** Feed one frame's vote (null = no opinion) and get the sign to use */
  resolve(side: Side, vote: DepthSign | null): DepthSign {
    const s = this.state[side];
    if (vote === null || vote === s.sign) {
      s.streak = 0;
      return s.sign;
    }
    s.streak++;
    if (s.streak >= this.switchFrames) {
      s.sign = vote;
      s.streak = 0;
    }
    return s.sign;
  }

  reset(): void {
    this.state.Left = { sign: 1, streak: 0 };
    this.state.Right = { sign: 1, streak: 0 };
  }
}

// ============================================================================
// POINT HELPERS
// ============================================================================

function toCanonical(lm: Landmark): THREE.Vector3 {
  return new THREE.Vector3(lm.x, -lm.y, -lm.z);
}

function getPoint(
  landmarks: readonly Landmark[],
  index: number,
): PosePoint | undefined {
  if (index < 0 || index >= landmarks.length) return undefined;
  const lm = landmarks[index];
  if (!lm) return undefined;
  return { position: toCanonical(lm), visibility: landmarkVisibility(lm) };
}

function midpointOf(
  a: PosePoint | undefined,
  b: PosePoint | undefined,
): PosePoint | undefined {
  if (!a || !b) return undefined;
  return {
    position: a.position.clone().add(b.position).multiplyScalar(0.5),
    visibility: (a.visibility + b.visibility) / 2,
  };
}

/** base + k·(base − from); a zero-length direction returns a copy of base */
function extendFrom(
  base: PosePoint | undefined,
  from: PosePoint | undefined,
  k: number,
): PosePoint | undefined {
  if (!base || !from) return undefined;
  const visibility = Math.min(base.visibility, from.visibility);
  const dir = base.position.clone().sub(from.position);
  if (dir.lengthSq() === 0) {
    return { position: base.position.clone(), visibility };
  }
  return {
    position: base.position.clone().add(dir.multiplyScalar(k)),
    visibility,
  };
}

function copyPoint(p: PosePoint): PosePoint {
  return { position: p.position.clone(), visibility: p.visibility };
}

function put(
  pose: CanonicalPose,
  bone: CanonicalBoneName,
  p: PosePoint | undefined,
): void {
  if (p) pose.set(bone, copyPoint(p));
}

// ============================================================================
// FINGERS
// ============================================================================

/** Straight chain from base toward tip, `segments` evenly spaced points */
function createFingerChain(
  base: PosePoint | undefined,
  tip: PosePoint | undefined,
  segments = 4,
): PosePoint[] {
  if (!base || !tip) return [];
  const visibility = Math.min(base.visibility, tip.visibility);
  const chain: PosePoint[] = [];
  for (let i = 1; i <= segments; i++) {
    chain.push({
      position: base.position.clone().lerp(tip.position, i / segments),
      visibility,
    });
  }
  return chain;
}

/** First hand-landmark index of each finger (CMC/MCP → tip is +0..+3) */
const FINGER_BASE_INDEX: Record<FingerName, number> = {
  Thumb: HandLandmark.THUMB_CMC,
  Index: HandLandmark.INDEX_MCP,
  Middle: HandLandmark.MIDDLE_MCP,
  Ring: HandLandmark.RING_MCP,
  Pinky: HandLandmark.PINKY_MCP,
};

interface BodyHandRefs {
  wrist?: PosePoint;
  elbow?: PosePoint;
  index?: PosePoint;
  pinky?: PosePoint;
  thumb?: PosePoint;
}

function withDepth(v: THREE.Vector3, sign: DepthSign): THREE.Vector3 {
  return new THREE.Vector3(v.x, v.y, v.z * sign);
}

/**
 * Vote for the hand-depth sign. Primary reference: the body-landmark palm
 * normal. Fallback: fingers should continue the elbow → wrist direction.
 */
function voteDepthSign(
  offsets: readonly THREE.Vector3[],
  refs: BodyHandRefs,
): DepthSign | null {
  const score = (sign: DepthSign): number | null => {
    const indexMcp = withDepth(offsets[HandLandmark.INDEX_MCP], sign);
    const pinkyMcp = withDepth(offsets[HandLandmark.PINKY_MCP], sign);
    const middleMcp = withDepth(offsets[HandLandmark.MIDDLE_MCP], sign);

    if (refs.wrist && refs.index && refs.pinky) {
      const toIndex = refs.index.position.clone().sub(refs.wrist.position);
      const toPinky = refs.pinky.position.clone().sub(refs.wrist.position);
      const bodyNormal = crossDirection(toIndex, toPinky);
      const handNormal = crossDirection(indexMcp, pinkyMcp);
      if (bodyNormal && handNormal) return handNormal.dot(bodyNormal);
    }

    if (refs.wrist && refs.elbow) {
      const forearm = direction(refs.elbow.position, refs.wrist.position);
      const palm = direction(new THREE.Vector3(), middleMcp);
      if (forearm && palm) return palm.dot(forearm);
    }
    return null;
  };

  const plus = score(1);
  const minus = score(-1);
  if (plus === null || minus === null) return null;
  if (Math.abs(plus - minus) < 1e-6) return null;
  return plus >= minus ? 1 : -1;
}

/**
 * Map 21 detailed hand landmarks onto the finger bones of one side.
 * Returns null when the hand cannot be anchored (no wrist/elbow, degenerate
 * palm) so the caller can fall back to synthetic chains.
 */
function mapDetailedHand(
  side: Side,
  hand: readonly Landmark[],
  refs: BodyHandRefs,
  frameWidth: number,
  frameHeight: number,
  palmToForearmRatio: number,
  palmSmoother: PalmOrientationSmoother | undefined,
): Array<[CanonicalBoneName, PosePoint]> | null {
  const { wrist, elbow } = refs;
  if (hand.length < HAND_LANDMARK_COUNT || !wrist || !elbow) return null;

  const origin = hand[HandLandmark.WRIST];
  const offsets = hand.map(
    (lm) =>
      new THREE.Vector3(
        (lm.x - origin.x) * frameWidth,
        -(lm.y - origin.y) * frameHeight,
        -(lm.z - origin.z) * frameWidth,
      ),
  );

  const palmLength = offsets[HandLandmark.MIDDLE_MCP].length();
  const forearmLength = wrist.position.distanceTo(elbow.position);
  if (palmLength < 1e-9 || forearmLength < 1e-9) return null;
  const scale = (forearmLength * palmToForearmRatio) / palmLength;

  const vote = voteDepthSign(offsets, refs);
  const sign: DepthSign = palmSmoother
    ? palmSmoother.resolve(side, vote)
    : (vote ?? 1);

  const out: Array<[CanonicalBoneName, PosePoint]> = [];
  for (const finger of FINGERS) {
    const base = FINGER_BASE_INDEX[finger];
    for (const segment of FINGER_SEGMENTS) {
      const i = base + segment - 1;
      const offset = withDepth(offsets[i], sign).multiplyScalar(scale);
      out.push([
        fingerBone(side, finger, segment),
        {
          position: wrist.position.clone().add(offset),
          visibility: Math.min(landmarkVisibility(hand[i]), wrist.visibility),
        },
      ]);
    }
  }
  return out;
}

function assignChain(
  pose: CanonicalPose,
  side: Side,
  finger: FingerName,
  chain: readonly PosePoint[],
): void {
  chain.forEach((p, i) => {
    const segment = FINGER_SEGMENTS[i];
    if (segment !== undefined) pose.set(fingerBone(side, finger, segment), p);
  });
}

function mapFallbackHand(
  pose: CanonicalPose,
  side: Side,
  refs: BodyHandRefs,
): void {
  const palmTip = midpointOf(refs.index, refs.pinky);
  assignChain(pose, side, "Thumb", createFingerChain(refs.wrist, refs.thumb));
  assignChain(pose, side, "Index", createFingerChain(refs.wrist, refs.index));
  assignChain(pose, side, "Middle", createFingerChain(refs.wrist, palmTip));
  assignChain(pose, side, "Ring", createFingerChain(refs.wrist, palmTip));
  assignChain(pose, side, "Pinky", createFingerChain(refs.wrist, refs.pinky));
}

// ============================================================================
// BUILD
// ============================================================================

const SIDE_LANDMARKS: Record<
  Side,
  {
    shoulder: number;
    elbow: number;
    wrist: number;
    index: number;
    pinky: number;
    thumb: number;
    hip: number;
    knee: number;
    ankle: number;
    footIndex: number;
    eye: number;
    ear: number;
  }
> = {
  Left: {
    shoulder: PoseLandmark.LEFT_SHOULDER,
    elbow: PoseLandmark.LEFT_ELBOW,
    wrist: PoseLandmark.LEFT_WRIST,
    index: PoseLandmark.LEFT_INDEX,
    pinky: PoseLandmark.LEFT_PINKY,
    thumb: PoseLandmark.LEFT_THUMB,
    hip: PoseLandmark.LEFT_HIP,
    knee: PoseLandmark.LEFT_KNEE,
    ankle: PoseLandmark.LEFT_ANKLE,
    footIndex: PoseLandmark.LEFT_FOOT_INDEX,
    eye: PoseLandmark.LEFT_EYE,
    ear: PoseLandmark.LEFT_EAR,
  },
  Right: {
    shoulder: PoseLandmark.RIGHT_SHOULDER,
    elbow: PoseLandmark.RIGHT_ELBOW,
    wrist: PoseLandmark.RIGHT_WRIST,
    index: PoseLandmark.RIGHT_INDEX,
    pinky: PoseLandmark.RIGHT_PINKY,
    thumb: PoseLandmark.RIGHT_THUMB,
    hip: PoseLandmark.RIGHT_HIP,
    knee: PoseLandmark.RIGHT_KNEE,
    ankle: PoseLandmark.RIGHT_ANKLE,
    footIndex: PoseLandmark.RIGHT_FOOT_INDEX,
    eye: PoseLandmark.RIGHT_EYE,
    ear: PoseLandmark.RIGHT_EAR,
  },
};

export type PoseMapperInput = Pick<
  LandmarkFrame,
  "worldLandmarks" | "leftHandLandmarks" | "rightHandLandmarks"
> &
  Partial<Pick<LandmarkFrame, "width" | "height">>;

/**
 * Build a canonical pose from one landmark frame. Pure apart from the
 * optional palm smoother's hysteresis state.
 */
export function buildCanonicalPose(
  input: PoseMapperInput,
  options: BuildPoseOptions = {},
): CanonicalPose {
  const { palmSmoother, ...overrides } = options;
  const opts: PoseMapperOptions = {
    ...DEFAULT_POSE_MAPPER_OPTIONS,
    ...overrides,
  };
  const pose = createPose();
  const lms = input.worldLandmarks;
  if (lms.length === 0) return pose;

  const frameWidth = input.width && input.width > 0 ? input.width : 1;
  const frameHeight = input.height && input.height > 0 ? input.height : 1;

  const at = (i: number) => getPoint(lms, i);

  // --- Torso & head ---
  const leftShoulder = at(PoseLandmark.LEFT_SHOULDER);
  const rightShoulder = at(PoseLandmark.RIGHT_SHOULDER);
  const hips = midpointOf(
    at(PoseLandmark.LEFT_HIP),
    at(PoseLandmark.RIGHT_HIP),
  );
  const neck = midpointOf(leftShoulder, rightShoulder);
  const head =
    midpointOf(at(PoseLandmark.LEFT_EAR), at(PoseLandmark.RIGHT_EAR)) ??
    at(PoseLandmark.NOSE);

  const spine1 = midpointOf(hips, neck);
  const spine = midpointOf(hips, spine1);
  const spine2 = midpointOf(spine1, neck);

  put(pose, "Hips", hips);
  put(pose, "Spine", spine);
  put(pose, "Spine1", spine1);
  put(pose, "Spine2", spine2);
  put(pose, "Neck", neck);
  put(pose, "Head", head);
  put(pose, "HeadTop_End", extendFrom(head, neck, opts.headTopExtension));
  put(pose, "Nose", at(PoseLandmark.NOSE));

  for (const side of ["Left", "Right"] as const) {
    const idx = SIDE_LANDMARKS[side];
    put(pose, `${side}Eye`, at(idx.eye));
    put(pose, `${side}Ear`, at(idx.ear));
  }

  // --- Arms & hands ---
  for (const side of ["Left", "Right"] as const) {
    const idx = SIDE_LANDMARKS[side];
    const { arm, foreArm, hand } = armBones(side);
    const refs: BodyHandRefs = {
      wrist: at(idx.wrist),
      elbow: at(idx.elbow),
      index: at(idx.index),
      pinky: at(idx.pinky),
      thumb: at(idx.thumb),
    };

    put(pose, arm, at(idx.shoulder));
    put(pose, foreArm, refs.elbow);
    put(pose, hand, refs.wrist);

    const handLms =
      side === "Left" ? input.leftHandLandmarks : input.rightHandLandmarks;
    const detailed =
      handLms && handLms.length > 0
        ? mapDetailedHand(
            side,
            handLms,
            refs,
            frameWidth,
            frameHeight,
            opts.palmToForearmRatio,
            palmSmoother,
          )
        : null;

    if (detailed) {
      for (const [bone, p] of detailed) pose.set(bone, p);
    } else {
      mapFallbackHand(pose, side, refs);
    }
  }

  // --- Legs & feet ---
  for (const side of ["Left", "Right"] as const) {
    const idx = SIDE_LANDMARKS[side];
    const { upLeg, leg, foot, toeBase, toeEnd } = legBones(side);
    const ankle = at(idx.ankle);
    const toe = at(idx.footIndex);

    put(pose, upLeg, at(idx.hip));
    put(pose, leg, at(idx.knee));
    put(pose, foot, ankle);
    put(pose, toeBase, toe);
    put(pose, toeEnd, extendFrom(toe, ankle, opts.toeEndExtension));
  }

  return pose;
}
