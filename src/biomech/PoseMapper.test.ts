/**
 * PoseMapper Tests
 * ================
 *
 * Axis flip, derived torso points, strict midpoints, finger chains and
 * hand-depth disambiguation.
 */

import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { buildCanonicalPose, PalmOrientationSmoother } from './PoseMapper';
import type { CanonicalPose } from './CanonicalPose';
import type { CanonicalBoneName } from './canonicalBones';
import { PoseLandmark } from './landmarks';
import {
    handLandmarks,
    standingWorldLandmarks,
} from '../tests/fixtures/landmarkFixtures';

const W = 640;
const H = 480;

function expectAt(pose: CanonicalPose, bone: CanonicalBoneName, x: number, y: number, z: number) {
    const p = pose.get(bone);
    expect(p, bone).toBeDefined();
    if (!p) return;
    expect(p.position.x).toBeCloseTo(x, 6);
    expect(p.position.y).toBeCloseTo(y, 6);
    expect(p.position.z).toBeCloseTo(z, 6);
}

function positionOf(pose: CanonicalPose, bone: CanonicalBoneName): THREE.Vector3 {
    return pose.get(bone)?.position.clone() ?? new THREE.Vector3(NaN, NaN, NaN);
}

describe('buildCanonicalPose', () => {
    describe('body', () => {
        it('flips y and z into the skeleton frame', () => {
            const pose = buildCanonicalPose({ worldLandmarks: standingWorldLandmarks() });

            expectAt(pose, 'LeftArm', 0.18, 0.45, 0);
            expectAt(pose, 'RightForeArm', -0.18, 0.2, 0);
            expectAt(pose, 'LeftToeBase', 0.1, -0.88, 0.1);
            expectAt(pose, 'Nose', 0, 0.6, 0.1);
        });

        it('derives the torso chain from hips and shoulders', () => {
            const pose = buildCanonicalPose({ worldLandmarks: standingWorldLandmarks() });

            expectAt(pose, 'Hips', 0, 0, 0);
            expectAt(pose, 'Neck', 0, 0.45, 0);
            expectAt(pose, 'Spine1', 0, 0.225, 0);
            expectAt(pose, 'Spine', 0, 0.1125, 0);
            expectAt(pose, 'Spine2', 0, 0.3375, 0);
        });

        it('places the head between the ears and extends the head top and toe ends', () => {
            const pose = buildCanonicalPose({ worldLandmarks: standingWorldLandmarks() });

            expectAt(pose, 'Head', 0, 0.62, 0);
            // 0.62 + 0.3 · (0.62 − 0.45)
            expectAt(pose, 'HeadTop_End', 0, 0.671, 0);
            // toe (0.1, −0.88, 0.1) + 0.3 · (toe − ankle (0.1, −0.84, 0))
            expectAt(pose, 'LeftToe_End', 0.1, -0.892, 0.13);
        });

        it('averages visibility for midpoints and takes the minimum for extrapolations', () => {
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks({
                    [PoseLandmark.LEFT_SHOULDER]: 0.8,
                    [PoseLandmark.RIGHT_SHOULDER]: 0.6,
                }),
            });

            expect(pose.get('Neck')?.visibility).toBeCloseTo(0.7, 10);
            expect(pose.get('Spine1')?.visibility).toBeCloseTo(0.85, 10);
            expect(pose.get('HeadTop_End')?.visibility).toBeCloseTo(0.7, 10);
            expect(pose.get('LeftArm')?.visibility).toBe(0.8);
        });

        it('drops derived points when one input is missing', () => {
            // Landmarks 0..22: face and arms, no hips or legs
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks().slice(0, PoseLandmark.LEFT_HIP),
            });

            expect(pose.has('Neck')).toBe(true);
            expect(pose.has('Hips')).toBe(false);
            expect(pose.has('Spine')).toBe(false);
            expect(pose.has('Spine1')).toBe(false);
            expect(pose.has('Spine2')).toBe(false);
            expect(pose.has('LeftUpLeg')).toBe(false);
            expect(pose.has('LeftToe_End')).toBe(false);
        });

        it('falls back to the nose for the head when the ears are missing', () => {
            // Landmarks 0..6: nose and eyes only
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks().slice(0, PoseLandmark.LEFT_EAR),
            });

            expectAt(pose, 'Head', 0, 0.6, 0.1);
            expect(pose.has('HeadTop_End')).toBe(false);
            expect(pose.has('LeftEye')).toBe(true);
        });

        it('returns an empty pose for an empty frame', () => {
            const pose = buildCanonicalPose({ worldLandmarks: [] });
            expect(pose.isEmpty()).toBe(true);
        });
    });

    describe('fallback fingers', () => {
        it('runs straight chains from the wrist to the body fingertip estimates', () => {
            const pose = buildCanonicalPose({ worldLandmarks: standingWorldLandmarks() });

            // wrist (−0.18, −0.05, 0) → index (−0.19, −0.13, 0.02)
            expectAt(pose, 'RightHandIndex2', -0.185, -0.09, 0.01);
            expectAt(pose, 'RightHandIndex4', -0.19, -0.13, 0.02);
            // middle and ring head for the index/pinky midpoint
            expectAt(pose, 'RightHandMiddle4', -0.175, -0.125, 0.005);
            expectAt(pose, 'RightHandRing4', -0.175, -0.125, 0.005);
        });

        it('uses the lower visibility of wrist and tip', () => {
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks({ [PoseLandmark.LEFT_THUMB]: 0.4 }),
            });
            expect(pose.get('LeftHandThumb1')?.visibility).toBe(0.4);
            expect(pose.get('LeftHandIndex1')?.visibility).toBe(1);
        });
    });

    describe('detailed hands', () => {
        it('anchors finger points on the body wrist, scaled from the forearm', () => {
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks(),
                leftHandLandmarks: handLandmarks(W, H),
                width: W,
                height: H,
            });

            // forearm 0.25 · 0.4 / palm 100 px = 0.001 per pixel
            expectAt(pose, 'LeftHandMiddle1', 0.18, -0.15, 0);
            expectAt(pose, 'LeftHandIndex1', 0.2, -0.14, 0.01);
            expectAt(pose, 'LeftHandThumb1', 0.195, -0.07, 0.005);
            expectAt(pose, 'LeftHand', 0.18, -0.05, 0);
        });

        it('corrects mirrored hand depth against the body palm', () => {
            const base = { worldLandmarks: standingWorldLandmarks(), width: W, height: H };
            const normal = buildCanonicalPose({ ...base, leftHandLandmarks: handLandmarks(W, H) });
            const mirrored = buildCanonicalPose({
                ...base,
                leftHandLandmarks: handLandmarks(W, H, 0.6, 0.5, -1),
            });

            for (const bone of ['LeftHandIndex1', 'LeftHandPinky3', 'LeftHandThumb4'] as const) {
                expect(positionOf(mirrored, bone).distanceTo(positionOf(normal, bone)))
                    .toBeCloseTo(0, 9);
            }
        });

        it('holds the depth sign until the smoother sees enough agreeing frames', () => {
            const smoother = new PalmOrientationSmoother(3);
            const frame = {
                worldLandmarks: standingWorldLandmarks(),
                leftHandLandmarks: handLandmarks(W, H, 0.6, 0.5, -1),
                width: W,
                height: H,
            };

            const first = buildCanonicalPose(frame, { palmSmoother: smoother });
            expect(first.get('LeftHandIndex1')?.position.z).toBeCloseTo(-0.01, 9);
            buildCanonicalPose(frame, { palmSmoother: smoother });
            const third = buildCanonicalPose(frame, { palmSmoother: smoother });
            expect(third.get('LeftHandIndex1')?.position.z).toBeCloseTo(0.01, 9);
            expect(smoother.current('Left')).toBe(-1);
            expect(smoother.current('Right')).toBe(1);
        });

        it('falls back to synthetic chains when the hand list is too short', () => {
            const pose = buildCanonicalPose({
                worldLandmarks: standingWorldLandmarks(),
                leftHandLandmarks: handLandmarks(W, H).slice(0, 10),
                width: W,
                height: H,
            });
            // straight chain end = body index (0.19, −0.13, 0.02)
            expectAt(pose, 'LeftHandIndex4', 0.19, -0.13, 0.02);
        });
    });
});

describe('PalmOrientationSmoother', () => {
    it('switches only after N consecutive opposing votes', () => {
        const s = new PalmOrientationSmoother(3);
        expect(s.resolve('Left', -1)).toBe(1);
        expect(s.resolve('Left', -1)).toBe(1);
        expect(s.resolve('Left', -1)).toBe(-1);
    });

    it('restarts the streak on an agreeing or empty vote', () => {
        const s = new PalmOrientationSmoother(2);
        s.resolve('Right', -1);
        s.resolve('Right', null);
        expect(s.resolve('Right', -1)).toBe(1);
        s.resolve('Right', 1);
        expect(s.resolve('Right', -1)).toBe(1);
        expect(s.resolve('Right', -1)).toBe(-1);
    });

    it('reset() restores the positive sign on both sides', () => {
        const s = new PalmOrientationSmoother(1);
        s.resolve('Left', -1);
        s.reset();
        expect(s.current('Left')).toBe(1);
    });
});
