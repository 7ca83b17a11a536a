/**
 * T-pose test skeleton
 *
 * A Mixamo-style humanoid built from THREE.Bone objects, unrotated, facing +z
 * with the character's left on +x. Hips sit 1 m above the floor.
 */

import * as THREE from 'three';
import { FINGERS, type CanonicalBoneName, type Side } from '../../biomech/canonicalBones';
import { createPose, type CanonicalPose } from '../../biomech/CanonicalPose';

type Offset = [x: number, y: number, z: number];

export interface TPoseSkeleton {
    root: THREE.Object3D;
    /** Canonical name → bone */
    bones: Map<CanonicalBoneName, THREE.Bone>;
}

export interface TPoseOptions {
    /** Prepended to every bone name, e.g. "mixamorig:" */
    prefix?: string;
    /** Armature scale; 0.01 with centimetre offsets mimics FBX exports */
    armatureScale?: number;
    /** Multiplier on every local offset */
    unit?: number;
}

const FINGER_BASE: Record<(typeof FINGERS)[number], Offset> = {
    Thumb: [0.03, 0, 0.04],
    Index: [0.08, 0, 0.025],
    Middle: [0.08, 0, 0.005],
    Ring: [0.08, 0, -0.015],
    Pinky: [0.07, 0, -0.035],
};

export function buildTPoseSkeleton(options: TPoseOptions = {}): TPoseSkeleton {
    const { prefix = '', armatureScale = 1, unit = 1 } = options;
    const root = new THREE.Object3D();
    root.scale.setScalar(armatureScale);
    const bones = new Map<CanonicalBoneName, THREE.Bone>();

    const add = (name: CanonicalBoneName, parent: THREE.Object3D, [x, y, z]: Offset) => {
        const b = new THREE.Bone();
        b.name = `${prefix}${name}`;
        b.position.set(x * unit, y * unit, z * unit);
        parent.add(b);
        bones.set(name, b);
        return b;
    };

    const hips = add('Hips', root, [0, 1, 0]);
    const spine = add('Spine', hips, [0, 0.1, 0]);
    const spine1 = add('Spine1', spine, [0, 0.1, 0]);
    const spine2 = add('Spine2', spine1, [0, 0.1, 0]);
    const neck = add('Neck', spine2, [0, 0.15, 0]);
    const head = add('Head', neck, [0, 0.1, 0]);
    add('HeadTop_End', head, [0, 0.15, 0]);
    add('LeftEye', head, [0.03, 0.05, 0.08]);
    add('RightEye', head, [-0.03, 0.05, 0.08]);

    const sides: Array<[Side, number]> = [['Left', 1], ['Right', -1]];
    for (const [side, s] of sides) {
        const arm = add(`${side}Arm`, spine2, [0.15 * s, 0.1, 0]);
        const foreArm = add(`${side}ForeArm`, arm, [0.25 * s, 0, 0]);
        const hand = add(`${side}Hand`, foreArm, [0.25 * s, 0, 0]);
        for (const finger of FINGERS) {
            const [bx, by, bz] = FINGER_BASE[finger];
            let parent = add(`${side}Hand${finger}1`, hand, [bx * s, by, bz]);
            parent = add(`${side}Hand${finger}2`, parent, [0.03 * s, 0, 0]);
            parent = add(`${side}Hand${finger}3`, parent, [0.03 * s, 0, 0]);
            add(`${side}Hand${finger}4`, parent, [0.03 * s, 0, 0]);
        }

        const upLeg = add(`${side}UpLeg`, hips, [0.1 * s, -0.05, 0]);
        const leg = add(`${side}Leg`, upLeg, [0, -0.42, 0]);
        const foot = add(`${side}Foot`, leg, [0, -0.42, 0]);
        const toe = add(`${side}ToeBase`, foot, [0, -0.05, 0.12]);
        add(`${side}Toe_End`, toe, [0, 0, 0.05]);
    }

    root.updateWorldMatrix(true, true);
    return { root, bones };
}

/** Pose whose points are the skeleton's current world bone positions */
export function poseFromSkeleton(
    skeleton: TPoseSkeleton,
    only?: readonly CanonicalBoneName[],
): CanonicalPose {
    skeleton.root.updateWorldMatrix(true, true);
    const pose = createPose();
    for (const [name, bone] of skeleton.bones) {
        if (only && !only.includes(name)) continue;
        pose.set(name, { position: bone.getWorldPosition(new THREE.Vector3()), visibility: 1 });
    }
    return pose;
}
