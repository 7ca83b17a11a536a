/**
 * Root Motion Estimator Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RootMotionEstimator } from './RootMotionEstimator';
import { imageLandmarksWithHips } from '../tests/fixtures/landmarkFixtures';

const W = 640;
const H = 480;

function hips(dx: number, dy = 0, dz = 0, span = 40) {
    return imageLandmarksWithHips(
        W,
        H,
        [300 + dx, 240 + dy, dz],
        [300 + span + dx, 240 + dy, dz],
    );
}

describe('RootMotionEstimator', () => {
    let estimator: RootMotionEstimator;

    beforeEach(() => {
        estimator = new RootMotionEstimator();
        estimator.updateModelMetrics(0.2);
        estimator.reset(W, H);
    });

    it('captures the origin on the first frame and returns zero', () => {
        expect(estimator.hasOrigin).toBe(false);
        const out = estimator.estimate(hips(50, 20));
        expect(out?.length()).toBe(0);
        expect(estimator.hasOrigin).toBe(true);
        expect(estimator.scaleFactor).toBeNull();
    });

    it('returns null when a hip landmark is missing', () => {
        expect(estimator.estimate(hips(0).slice(0, 24))).toBeNull();
        expect(estimator.hasOrigin).toBe(false);
    });

    it('seeds the factor from the first qualifying frame and scales translation', () => {
        estimator.estimate(hips(0));
        const out = estimator.estimate(hips(32));

        // model hip span 0.2 / 40 px
        expect(estimator.scaleFactor).toBeCloseTo(0.005, 12);
        expect(out?.x).toBeCloseTo(0.16, 9);
        expect(out?.y).toBeCloseTo(0, 9);
        expect(out?.z).toBeCloseTo(0, 9);
    });

    it('flips image y to up and applies the depth gain', () => {
        estimator.estimate(hips(0));
        const out = estimator.estimate(hips(32, 10, 8));

        expect(out?.x).toBeCloseTo(0.16, 9);
        expect(out?.y).toBeCloseTo(-0.05, 9);
        // 8 px · 0.005 · 1.5
        expect(out?.z).toBeCloseTo(0.06, 9);
    });

    it('converges toward a new span at the configured rate', () => {
        estimator.estimate(hips(0));
        estimator.estimate(hips(0));
        estimator.estimate(hips(0, 0, 0, 80));
        // 0.005 + (0.0025 − 0.005) · 0.05
        expect(estimator.scaleFactor).toBeCloseTo(0.004875, 12);
    });

    it('ignores frames where the hips are too close on screen or turned sideways', () => {
        estimator.estimate(hips(0));
        estimator.estimate(hips(5, 0, 0, 15));
        expect(estimator.scaleFactor).toBeNull();

        estimator.estimate(
            imageLandmarksWithHips(W, H, [340, 240, -30], [350, 240, 30]),
        );
        expect(estimator.scaleFactor).toBeNull();

        // No factor yet: translation stays at the origin
        const out = estimator.estimate(hips(100, 0, 0, 15));
        expect(out?.length()).toBe(0);
    });

    it('reset() forgets the origin and factor and stores the frame size', () => {
        estimator.estimate(hips(0));
        estimator.estimate(hips(10));
        estimator.reset(1280, 720);

        expect(estimator.hasOrigin).toBe(false);
        expect(estimator.scaleFactor).toBeNull();
        expect(estimator.frameSize).toEqual({ width: 1280, height: 720 });
    });

    it('keeps the previous hip span when given an invalid one', () => {
        estimator.updateModelMetrics(-1);
        estimator.updateModelMetrics(Number.NaN);
        estimator.estimate(hips(0));
        estimator.estimate(hips(0));
        expect(estimator.scaleFactor).toBeCloseTo(0.005, 12);
    });
});
