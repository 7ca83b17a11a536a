/**
 * One Euro Filter Tests
 */

import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import {
    DEFAULT_ONE_EURO_PARAMS,
    OneEuroFilter,
    OneEuroFilterVector3,
    smoothingFactor,
} from './OneEuroFilter';

describe('OneEuroFilter', () => {
    it('uses the documented defaults', () => {
        expect(DEFAULT_ONE_EURO_PARAMS).toEqual({ minCutoff: 0.004, beta: 1.0, dCutoff: 1.0 });
    });

    it('passes the first sample through unchanged', () => {
        const f = new OneEuroFilter();
        expect(f.value).toBeNull();
        expect(f.filter(0, 5)).toBe(5);
        expect(f.value).toBe(5);
    });

    it('returns the previous value for non-increasing timestamps', () => {
        const f = new OneEuroFilter();
        f.filter(1, 2);
        const next = f.filter(2, 4);
        expect(f.filter(2, 100)).toBe(next);
        expect(f.filter(1.5, -100)).toBe(next);
    });

    it('follows the exponential smoothing formula', () => {
        const f = new OneEuroFilter({ minCutoff: 1, beta: 0, dCutoff: 1 });
        f.filter(0, 0);
        const out = f.filter(0.1, 1);

        const r = 2 * Math.PI * 1 * 0.1;
        const alpha = r / (r + 1);
        expect(out).toBeCloseTo(alpha, 12);
    });

    it('lags less with a higher beta', () => {
        const slow = new OneEuroFilter({ minCutoff: 0.5, beta: 0 });
        const fast = new OneEuroFilter({ minCutoff: 0.5, beta: 5 });
        slow.filter(0, 0);
        fast.filter(0, 0);
        const s = slow.filter(0.1, 1);
        const q = fast.filter(0.1, 1);
        expect(q).toBeGreaterThan(s);
        expect(q).toBeLessThanOrEqual(1);
    });

    it('allows beta to change at runtime', () => {
        const f = new OneEuroFilter();
        f.beta = 3;
        expect(f.beta).toBe(3);
    });

    it('reset() makes the next sample a fresh seed', () => {
        const f = new OneEuroFilter();
        f.filter(0, 1);
        f.filter(1, 2);
        f.reset();
        expect(f.value).toBeNull();
        expect(f.filter(5, 42)).toBe(42);
    });

    it('smoothingFactor() is 1 for a non-positive cutoff', () => {
        expect(smoothingFactor(0.1, 0)).toBe(1);
        expect(smoothingFactor(0.1, -2)).toBe(1);
    });
});

describe('OneEuroFilterVector3', () => {
    it('filters each axis independently and returns a new vector', () => {
        const f = new OneEuroFilterVector3({ minCutoff: 1, beta: 0 });
        const first = new THREE.Vector3(1, 2, 3);
        const out0 = f.filter(0, first);
        expect(out0).not.toBe(first);
        expect(out0.toArray()).toEqual([1, 2, 3]);

        const out1 = f.filter(0.1, new THREE.Vector3(2, 2, 3));
        const r = 2 * Math.PI * 0.1;
        const alpha = r / (r + 1);
        expect(out1.x).toBeCloseTo(1 + alpha, 12);
        expect(out1.y).toBeCloseTo(2, 12);
        expect(out1.z).toBeCloseTo(3, 12);
    });

    it('sets beta on every axis', () => {
        const f = new OneEuroFilterVector3();
        f.beta = 0.25;
        expect(f.beta).toBe(0.25);
    });
});
