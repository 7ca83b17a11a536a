/**
 * Synthetic landmark frames for tests.
 *
 * Body: a person standing upright facing the camera, arms hanging, in
 * pose-service world space (metres, hip-centred, y down, z away from the
 * camera). After the mapper's axis flip the subject's left is +x, up is +y
 * and forward (toward the camera) is +z.
 */

import { PoseLandmark, type Landmark } from '../../biomech/landmarks';

type Point = [x: number, y: number, z: number];

/** Left-side points; right side mirrors x */
const LEFT_SIDE: Array<[left: number, right: number, point: Point]> = [
    [PoseLandmark.LEFT_EYE_INNER, PoseLandmark.RIGHT_EYE_INNER, [0.015, -0.65, -0.085]],
    [PoseLandmark.LEFT_EYE, PoseLandmark.RIGHT_EYE, [0.03, -0.65, -0.08]],
    [PoseLandmark.LEFT_EYE_OUTER, PoseLandmark.RIGHT_EYE_OUTER, [0.045, -0.65, -0.075]],
    [PoseLandmark.LEFT_EAR, PoseLandmark.RIGHT_EAR, [0.07, -0.62, 0]],
    [PoseLandmark.MOUTH_LEFT, PoseLandmark.MOUTH_RIGHT, [0.02, -0.55, -0.09]],
    [PoseLandmark.LEFT_SHOULDER, PoseLandmark.RIGHT_SHOULDER, [0.18, -0.45, 0]],
    [PoseLandmark.LEFT_ELBOW, PoseLandmark.RIGHT_ELBOW, [0.18, -0.2, 0]],
    [PoseLandmark.LEFT_WRIST, PoseLandmark.RIGHT_WRIST, [0.18, 0.05, 0]],
    [PoseLandmark.LEFT_PINKY, PoseLandmark.RIGHT_PINKY, [0.16, 0.12, 0.01]],
    [PoseLandmark.LEFT_INDEX, PoseLandmark.RIGHT_INDEX, [0.19, 0.13, -0.02]],
    [PoseLandmark.LEFT_THUMB, PoseLandmark.RIGHT_THUMB, [0.2, 0.1, -0.03]],
    [PoseLandmark.LEFT_HIP, PoseLandmark.RIGHT_HIP, [0.1, 0, 0]],
    [PoseLandmark.LEFT_KNEE, PoseLandmark.RIGHT_KNEE, [0.1, 0.42, 0]],
    [PoseLandmark.LEFT_ANKLE, PoseLandmark.RIGHT_ANKLE, [0.1, 0.84, 0]],
    [PoseLandmark.LEFT_HEEL, PoseLandmark.RIGHT_HEEL, [0.1, 0.87, 0.05]],
    [PoseLandmark.LEFT_FOOT_INDEX, PoseLandmark.RIGHT_FOOT_INDEX, [0.1, 0.88, -0.1]],
];

const NOSE: Point = [0, -0.6, -0.1];

export function standingWorldLandmarks(
    visibility: Partial<Record<number, number>> = {},
): Landmark[] {
    const out: Landmark[] = new Array<Landmark>(33);
    const put = (i: number, [x, y, z]: Point) => {
        out[i] = { x, y, z, visibility: visibility[i] ?? 1 };
    };
    put(PoseLandmark.NOSE, NOSE);
    for (const [left, right, [x, y, z]] of LEFT_SIDE) {
        put(left, [x, y, z]);
        put(right, [-x, y, z]);
    }
    return out;
}

/** Normalised image landmarks with both hips at the given pixel positions */
export function imageLandmarksWithHips(
    width: number,
    height: number,
    leftHipPx: Point,
    rightHipPx: Point,
): Landmark[] {
    const out: Landmark[] = [];
    for (let i = 0; i < 33; i++) out.push({ x: 0.5, y: 0.5, z: 0 });
    out[PoseLandmark.LEFT_HIP] = {
        x: leftHipPx[0] / width,
        y: leftHipPx[1] / height,
        z: leftHipPx[2] / width,
    };
    out[PoseLandmark.RIGHT_HIP] = {
        x: rightHipPx[0] / width,
        y: rightHipPx[1] / height,
        z: rightHipPx[2] / width,
    };
    return out;
}

/**
 * Hand offsets from the wrist in pixels, y up / z toward the camera:
 * fingers pointing down, palm length (wrist → middle MCP) 100 px.
 */
export const HAND_OFFSETS_PX: readonly Point[] = [
    [0, 0, 0],
    [15, -20, 5], [25, -35, 8], [32, -48, 10], [38, -60, 12],
    [20, -90, 10], [22, -120, 12], [23, -140, 13], [24, -155, 14],
    [0, -100, 0], [0, -135, 0], [0, -158, 0], [0, -175, 0],
    [-12, -92, -5], [-13, -122, -6], [-14, -142, -6], [-15, -158, -7],
    [-25, -80, -10], [-27, -102, -11], [-28, -118, -12], [-29, -130, -12],
];

/**
 * 21 normalised hand landmarks reproducing `offsets` relative to a wrist at
 * image position (wx, wy). `depthSign` -1 mirrors the relative depth the
 * way a confused hand detector does.
 */
export function handLandmarks(
    width: number,
    height: number,
    wx = 0.6,
    wy = 0.5,
    depthSign: 1 | -1 = 1,
    offsets: readonly Point[] = HAND_OFFSETS_PX,
): Landmark[] {
    return offsets.map(([dx, dy, dz]) => ({
        x: wx + dx / width,
        y: wy - dy / height,
        z: (-dz * depthSign) / width,
    }));
}
