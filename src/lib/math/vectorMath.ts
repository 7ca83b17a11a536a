/**
 * Vector Math for Retargeting
 * ===========================
 * Value-semantics helpers over three.js Vector3 / Quaternion.
 *
 * Every function returns a NEW instance and never mutates its arguments, so
 * bind-pose data can be shared freely between solvers without aliasing.
 * Quaternion results are renormalised.
 *
 * Conventions:
 *   - multiply(a, b) = a ⊗ b (Hamilton product, left operand first)
 *   - world delta application: q_target = delta ⊗ q_bind
 *   - basis quaternions map local (X=right, Y=up, Z=forward) into world
 *
 * @module vectorMath
 */

import * as THREE from "three";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Squared length below which a direction is treated as degenerate */
export const DEGENERATE_LENGTH_SQ = 1e-12;

/** dot(a, b) + 1 below this means the vectors are (nearly) opposite */
const OPPOSITE_EPSILON = 1e-6;

const AXIS_X = new THREE.Vector3(1, 0, 0);
const AXIS_Y = new THREE.Vector3(0, 1, 0);

// ============================================================================
// VECTORS
// ============================================================================

export function vec3(x = 0, y = 0, z = 0): THREE.Vector3 {
  return new THREE.Vector3(x, y, z);
}

export function add(a: THREE.Vector3, b: THREE.Vector3): THREE.Vector3 {
  return a.clone().add(b);
}

export function sub(a: THREE.Vector3, b: THREE.Vector3): THREE.Vector3 {
  return a.clone().sub(b);
}

export function scale(v: THREE.Vector3, s: number): THREE.Vector3 {
  return v.clone().multiplyScalar(s);
}

export function dot(a: THREE.Vector3, b: THREE.Vector3): number {
  return a.dot(b);
}

export function cross(a: THREE.Vector3, b: THREE.Vector3): THREE.Vector3 {
  return new THREE.Vector3().crossVectors(a, b);
}

export function length(v: THREE.Vector3): number {
  return v.length();
}

export function distance(a: THREE.Vector3, b: THREE.Vector3): number {
  return a.distanceTo(b);
}

/**
 * Unit-length copy of v. A zero vector comes back as a zero vector
 * (no throw, no NaN).
 */
export function normalize(v: THREE.Vector3): THREE.Vector3 {
  const lenSq = v.lengthSq();
  if (lenSq === 0) return v.clone();
  return v.clone().multiplyScalar(1 / Math.sqrt(lenSq));
}

export function midpoint(a: THREE.Vector3, b: THREE.Vector3): THREE.Vector3 {
  return a.clone().add(b).multiplyScalar(0.5);
}

/** Linear interpolation a → b (t = 0 gives a) */
export function lerpVec(
  a: THREE.Vector3,
  b: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  return a.clone().lerp(b, t);
}

/**
 * Unit direction from → to, or null when the two points coincide.
 */
export function direction(
  from: THREE.Vector3,
  to: THREE.Vector3,
): THREE.Vector3 | null {
  const d = to.clone().sub(from);
  const lenSq = d.lengthSq();
  if (lenSq < DEGENERATE_LENGTH_SQ) return null;
  return d.multiplyScalar(1 / Math.sqrt(lenSq));
}

/**
 * Normalised cross product, or null when |a × b|² < minLengthSq.
 */
export function crossDirection(
  a: THREE.Vector3,
  b: THREE.Vector3,
  minLengthSq = DEGENERATE_LENGTH_SQ,
): THREE.Vector3 | null {
  const c = cross(a, b);
  const lenSq = c.lengthSq();
  if (lenSq < minLengthSq) return null;
  return c.multiplyScalar(1 / Math.sqrt(lenSq));
}

/** Unsigned angle between two vectors in radians (0 for a zero vector) */
export function angleBetween(a: THREE.Vector3, b: THREE.Vector3): number {
  const denom = Math.sqrt(a.lengthSq() * b.lengthSq());
  if (denom === 0) return 0;
  return Math.acos(THREE.MathUtils.clamp(a.dot(b) / denom, -1, 1));
}

// ============================================================================
// QUATERNIONS
// ============================================================================

export function identity(): THREE.Quaternion {
  return new THREE.Quaternion();
}

/** a ⊗ b, renormalised */
export function multiply(
  a: THREE.Quaternion,
  b: THREE.Quaternion,
): THREE.Quaternion {
  return new THREE.Quaternion().multiplyQuaternions(a, b).normalize();
}

/** Inverse of a unit quaternion (its conjugate) */
export function invert(q: THREE.Quaternion): THREE.Quaternion {
  return q.clone().conjugate().normalize();
}

/**
 * Spherical interpolation from → to along the shortest arc.
 * The target is negated when dot(from, to) < 0.
 */
export function slerp(
  from: THREE.Quaternion,
  to: THREE.Quaternion,
  t: number,
): THREE.Quaternion {
  const target = to.clone();
  if (from.dot(target) < 0) {
    target.set(-target.x, -target.y, -target.z, -target.w);
  }
  return from.clone().slerp(target, t).normalize();
}

/** Rotation angle of q in radians, in [0, π] */
export function quatAngle(q: THREE.Quaternion): number {
  const w = Math.abs(THREE.MathUtils.clamp(q.w, -1, 1));
  return 2 * Math.acos(w);
}

/** Angular distance between two rotations in radians, in [0, π] */
export function quatDistance(
  a: THREE.Quaternion,
  b: THREE.Quaternion,
): number {
  const d = Math.abs(THREE.MathUtils.clamp(a.dot(b), -1, 1));
  return 2 * Math.acos(d);
}

/**
 * Minimal rotation carrying unit direction `from` onto `to`.
 *
 * When the vectors are opposite the cross product degenerates; a 180°
 * rotation about an axis perpendicular to `from` is returned instead
 * (X × from, or Y × from if `from` is parallel to X).
 */
export function quatFromUnitVectors(
  from: THREE.Vector3,
  to: THREE.Vector3,
): THREE.Quaternion {
  const v1 = normalize(from);
  const v2 = normalize(to);
  const r = v1.dot(v2) + 1;

  if (r < OPPOSITE_EPSILON) {
    let axis = cross(AXIS_X, v1);
    if (axis.lengthSq() < OPPOSITE_EPSILON) {
      axis = cross(AXIS_Y, v1);
    }
    axis.normalize();
    return new THREE.Quaternion(axis.x, axis.y, axis.z, 0);
  }

  const c = cross(v1, v2);
  return new THREE.Quaternion(c.x, c.y, c.z, r).normalize();
}

/**
 * Quaternion of the rotation matrix whose columns are (right, up, forward).
 *
 * Trace-based conversion with the three diagonal fallback branches, so that
 * rotations near 180° (trace ≈ -1) stay well conditioned.
 */
export function quatFromBasis(
  right: THREE.Vector3,
  up: THREE.Vector3,
  forward: THREE.Vector3,
): THREE.Quaternion {
  const m00 = right.x, m01 = up.x, m02 = forward.x;
  const m10 = right.y, m11 = up.y, m12 = forward.y;
  const m20 = right.z, m21 = up.z, m22 = forward.z;
  const trace = m00 + m11 + m22;

  let x: number, y: number, z: number, w: number;
  if (trace > 0) {
    const s = 0.5 / Math.sqrt(trace + 1);
    w = 0.25 / s;
    x = (m21 - m12) * s;
    y = (m02 - m20) * s;
    z = (m10 - m01) * s;
  } else if (m00 > m11 && m00 > m22) {
    const s = 2 * Math.sqrt(1 + m00 - m11 - m22);
    w = (m21 - m12) / s;
    x = 0.25 * s;
    y = (m01 + m10) / s;
    z = (m02 + m20) / s;
  } else if (m11 > m22) {
    const s = 2 * Math.sqrt(1 + m11 - m00 - m22);
    w = (m02 - m20) / s;
    x = (m01 + m10) / s;
    y = 0.25 * s;
    z = (m12 + m21) / s;
  } else {
    const s = 2 * Math.sqrt(1 + m22 - m00 - m11);
    w = (m10 - m01) / s;
    x = (m02 + m20) / s;
    y = (m12 + m21) / s;
    z = 0.25 * s;
  }
  return new THREE.Quaternion(x, y, z, w).normalize();
}

export interface OrthonormalBasis {
  right: THREE.Vector3;
  up: THREE.Vector3;
  forward: THREE.Vector3;
}

/**
 * Orthonormal frame from an up direction and an approximate right direction:
 *   forward = right × up,  right' = up × forward
 * Up is kept exactly. Returns null when the inputs are zero or parallel.
 */
export function orthonormalBasis(
  up: THREE.Vector3,
  right: THREE.Vector3,
): OrthonormalBasis | null {
  const u = normalize(up);
  const r = normalize(right);
  if (u.lengthSq() === 0 || r.lengthSq() === 0) return null;

  const forward = crossDirection(r, u);
  if (!forward) return null;
  const orthoRight = crossDirection(u, forward);
  if (!orthoRight) return null;

  return { right: orthoRight, up: u, forward };
}

/**
 * Right-handed frame from an exact up direction and an approximate forward:
 *   right = up × forward,  forward' = right × up
 */
export function basisFromUpForward(
  up: THREE.Vector3,
  forward: THREE.Vector3,
): OrthonormalBasis | null {
  const u = normalize(up);
  if (u.lengthSq() === 0) return null;
  const right = crossDirection(u, forward);
  if (!right) return null;
  const f = crossDirection(right, u);
  if (!f) return null;
  return { right, up: u, forward: f };
}

/** Quaternion of an orthonormalBasis() frame */
export function basisQuaternion(basis: OrthonormalBasis): THREE.Quaternion {
  return quatFromBasis(basis.right, basis.up, basis.forward);
}

/**
 * World-space delta that turns `bindBasis` into `targetBasis`, applied to a
 * bone's bind world rotation:  (target ⊗ bind⁻¹) ⊗ boneBindWorld
 */
export function applyBasisDelta(
  targetBasis: THREE.Quaternion,
  bindBasis: THREE.Quaternion,
  boneBindWorld: THREE.Quaternion,
): THREE.Quaternion {
  const delta = multiply(targetBasis, invert(bindBasis));
  return multiply(delta, boneBindWorld);
}
