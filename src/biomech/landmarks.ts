/**
 * Landmark Frame Model
 * ====================
 *
 * Input records from the pose-estimation service (MediaPipe Pose / Hands
 * topology): 33 body landmarks in world space and in normalised image space,
 * plus optional 21-point hand landmarks per hand.
 */

export interface Landmark {
  x: number;
  y: number;
  z: number;
  /** Confidence in [0, 1]; absent means fully visible */
  visibility?: number;
}

export interface LandmarkFrame {
  /** 33 body landmarks, metres, origin at hip centre, y down, z away */
  worldLandmarks: readonly Landmark[];
  /** 33 body landmarks in normalised image coordinates (x, y in [0, 1]) */
  imageLandmarks?: readonly Landmark[];
  /** 21 hand landmarks in normalised image coordinates */
  leftHandLandmarks?: readonly Landmark[] | null;
  rightHandLandmarks?: readonly Landmark[] | null;
  /** Frame size in pixels */
  width: number;
  height: number;
  /** Capture time in seconds */
  timestamp?: number;
}

export const BODY_LANDMARK_COUNT = 33;
export const HAND_LANDMARK_COUNT = 21;

/** MediaPipe Pose landmark indices */
export const PoseLandmark = {
  NOSE: 0,
  LEFT_EYE_INNER: 1,
  LEFT_EYE: 2,
  LEFT_EYE_OUTER: 3,
  RIGHT_EYE_INNER: 4,
  RIGHT_EYE: 5,
  RIGHT_EYE_OUTER: 6,
  LEFT_EAR: 7,
  RIGHT_EAR: 8,
  MOUTH_LEFT: 9,
  MOUTH_RIGHT: 10,
  LEFT_SHOULDER: 11,
  RIGHT_SHOULDER: 12,
  LEFT_ELBOW: 13,
  RIGHT_ELBOW: 14,
  LEFT_WRIST: 15,
  RIGHT_WRIST: 16,
  LEFT_PINKY: 17,
  RIGHT_PINKY: 18,
  LEFT_INDEX: 19,
  RIGHT_INDEX: 20,
  LEFT_THUMB: 21,
  RIGHT_THUMB: 22,
  LEFT_HIP: 23,
  RIGHT_HIP: 24,
  LEFT_KNEE: 25,
  RIGHT_KNEE: 26,
  LEFT_ANKLE: 27,
  RIGHT_ANKLE: 28,
  LEFT_HEEL: 29,
  RIGHT_HEEL: 30,
  LEFT_FOOT_INDEX: 31,
  RIGHT_FOOT_INDEX: 32,
} as const;

/** MediaPipe Hands landmark indices */
export const HandLandmark = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const;

export function landmarkVisibility(lm: Landmark): number {
  return typeof lm.visibility === "number" ? lm.visibility : 1;
}

function isFiniteLandmark(lm: Landmark): boolean {
  return (
    Number.isFinite(lm.x) && Number.isFinite(lm.y) && Number.isFinite(lm.z)
  );
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface FrameIssue {
  field: string;
  message: string;
}

function checkList(
  field: string,
  list: readonly Landmark[],
  expected: number,
  issues: FrameIssue[],
): void {
  if (list.length !== expected) {
    issues.push({
      field,
      message: `expected ${expected} landmarks, got ${list.length}`,
    });
  }
  for (let i = 0; i < list.length; i++) {
    // Sparse arrays and JSON nulls both leave holes
    const lm: Landmark | null | undefined = list[i];
    if (lm == null) {
      issues.push({ field, message: `missing landmark at index ${i}` });
      return;
    }
    if (!isFiniteLandmark(lm)) {
      issues.push({ field, message: `non-finite coordinates at index ${i}` });
      return;
    }
  }
}

/**
 * Structural checks on an incoming frame. An empty result means the frame is
 * usable; hand lists are optional and only checked when present.
 */
export function validateLandmarkFrame(frame: LandmarkFrame): FrameIssue[] {
  const issues: FrameIssue[] = [];

  const { imageLandmarks, leftHandLandmarks, rightHandLandmarks } = frame;

  checkList(
    "worldLandmarks",
    frame.worldLandmarks,
    BODY_LANDMARK_COUNT,
    issues,
  );
  if (imageLandmarks && imageLandmarks.length > 0) {
    checkList("imageLandmarks", imageLandmarks, BODY_LANDMARK_COUNT, issues);
  }
  if (leftHandLandmarks && leftHandLandmarks.length > 0) {
    checkList(
      "leftHandLandmarks",
      leftHandLandmarks,
      HAND_LANDMARK_COUNT,
      issues,
    );
  }
  if (rightHandLandmarks && rightHandLandmarks.length > 0) {
    checkList(
      "rightHandLandmarks",
      rightHandLandmarks,
      HAND_LANDMARK_COUNT,
      issues,
    );
  }
  if (!(frame.width > 0) || !(frame.height > 0)) {
    issues.push({
      field: "size",
      message: `invalid frame size ${frame.width}x${frame.height}`,
    });
  }
  if (frame.timestamp !== undefined && !Number.isFinite(frame.timestamp)) {
    issues.push({ field: "timestamp", message: "timestamp is not finite" });
  }

  return issues;
}
