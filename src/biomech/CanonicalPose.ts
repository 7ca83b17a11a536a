/**
 * BoneTable / CanonicalPose
 * =========================
 *
 * Array-backed table with one nullable slot per canonical bone. Used for the
 * per-frame pose, the bind pose and the skeleton binding so that the hot path
 * indexes a dense array instead of growing string-keyed objects.
 *
 * An empty slot means "not present": for a pose, unobserved this frame.
 */

import * as THREE from "three";
import {
  CANONICAL_BONES,
  CANONICAL_BONE_COUNT,
  boneIndex,
  type CanonicalBoneName,
} from "./canonicalBones";

export class BoneTable<T> {
  private readonly slots: (T | undefined)[];
  private _size = 0;

  constructor() {
    this.slots = new Array<T | undefined>(CANONICAL_BONE_COUNT).fill(undefined);
  }

  get size(): number {
    return this._size;
  }

  get(bone: CanonicalBoneName): T | undefined {
    return this.slots[boneIndex(bone)];
  }

  /** Direct dense-index access */
  getAt(index: number): T | undefined {
    return this.slots[index];
  }

  has(bone: CanonicalBoneName): boolean {
    return this.get(bone) !== undefined;
  }

  set(bone: CanonicalBoneName, value: T): this {
    const i = boneIndex(bone);
    if (i < 0) return this;
    if (this.slots[i] === undefined) this._size++;
    this.slots[i] = value;
    return this;
  }

  delete(bone: CanonicalBoneName): boolean {
    const i = boneIndex(bone);
    if (i < 0 || this.slots[i] === undefined) return false;
    this.slots[i] = undefined;
    this._size--;
    return true;
  }

  clear(): void {
    this.slots.fill(undefined);
    this._size = 0;
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  forEach(fn: (value: T, bone: CanonicalBoneName) => void): void {
    for (let i = 0; i < CANONICAL_BONE_COUNT; i++) {
      const v = this.slots[i];
      if (v !== undefined) fn(v, CANONICAL_BONES[i]);
    }
  }

  keys(): CanonicalBoneName[] {
    const out: CanonicalBoneName[] = [];
    this.forEach((_, bone) => out.push(bone));
    return out;
  }

  static fromEntries<T>(
    entries: Iterable<readonly [CanonicalBoneName, T]>,
  ): BoneTable<T> {
    const table = new BoneTable<T>();
    for (const [bone, value] of entries) table.set(bone, value);
    return table;
  }
}

// ============================================================================
// POSE
// ============================================================================

export interface PosePoint {
  position: THREE.Vector3;
  /** Confidence in [0, 1] */
  visibility: number;
}

export type CanonicalPose = BoneTable<PosePoint>;

export function createPose(): CanonicalPose {
  return new BoneTable<PosePoint>();
}

export function clonePoint(p: PosePoint): PosePoint {
  return { position: p.position.clone(), visibility: p.visibility };
}

export function clonePose(pose: CanonicalPose): CanonicalPose {
  const out = createPose();
  pose.forEach((p, bone) => out.set(bone, clonePoint(p)));
  return out;
}
