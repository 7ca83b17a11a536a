/**
 * Bone handle abstraction.
 *
 * The retargeter reads bind transforms from and writes rotations to a
 * BoneHandle; it never touches the renderer directly. ThreeBoneHandle adapts
 * any three.js Object3D (normally a THREE.Bone from a loaded GLTF).
 */

import * as THREE from "three";
import { BoneTable } from "../biomech/CanonicalPose";

export interface BoneHandle {
  readonly name: string;
  getWorldPosition(): THREE.Vector3;
  getWorldQuaternion(): THREE.Quaternion;
  /** Identity for a root bone */
  getParentWorldQuaternion(): THREE.Quaternion;
  getLocalPosition(): THREE.Vector3;
  setLocalPosition(position: THREE.Vector3): void;
  getLocalQuaternion(): THREE.Quaternion;
  setLocalQuaternion(rotation: THREE.Quaternion): void;
  /** Recompute world transforms of this bone and everything below it */
  propagateToChildren(): void;
}

export class ThreeBoneHandle implements BoneHandle {
  constructor(readonly object: THREE.Object3D) {}

  get name(): string {
    return this.object.name;
  }

  getWorldPosition(): THREE.Vector3 {
    return this.object.getWorldPosition(new THREE.Vector3());
  }

  getWorldQuaternion(): THREE.Quaternion {
    return this.object.getWorldQuaternion(new THREE.Quaternion());
  }

  getParentWorldQuaternion(): THREE.Quaternion {
    const parent = this.object.parent;
    return parent
      ? parent.getWorldQuaternion(new THREE.Quaternion())
      : new THREE.Quaternion();
  }

  getLocalPosition(): THREE.Vector3 {
    return this.object.position.clone();
  }

  setLocalPosition(position: THREE.Vector3): void {
    this.object.position.copy(position);
  }

  getLocalQuaternion(): THREE.Quaternion {
    return this.object.quaternion.clone();
  }

  setLocalQuaternion(rotation: THREE.Quaternion): void {
    this.object.quaternion.copy(rotation);
  }

  propagateToChildren(): void {
    this.object.updateWorldMatrix(true, true);
  }
}

/** Canonical bone → handle; handles are borrowed, never owned */
export type SkeletonBinding = BoneTable<BoneHandle>;
