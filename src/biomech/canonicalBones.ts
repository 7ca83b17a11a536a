/**
 * Canonical Bones
 * ===============
 *
 * Fixed humanoid vocabulary that every landmark source and every skeleton is
 * mapped onto. Names follow the widely used Mixamo rig convention (without a
 * rig prefix) so most humanoid assets bind by exact name.
 *
 * Each name has a dense index (0..CANONICAL_BONE_COUNT-1) used by BoneTable
 * for array-backed per-frame storage.
 */

export type Side = "Left" | "Right";
export type FingerName = "Thumb" | "Index" | "Middle" | "Ring" | "Pinky";
export type FingerSegment = 1 | 2 | 3 | 4;

export type CoreBone =
  | "Hips"
  | "Spine"
  | "Spine1"
  | "Spine2"
  | "Neck"
  | "Head"
  | "HeadTop_End";

/** Observation-only points used to orient the head */
export type FaceBone = `${Side}Eye` | `${Side}Ear` | "Nose";
export type ArmBone = `${Side}Arm` | `${Side}ForeArm` | `${Side}Hand`;
export type FingerBone = `${Side}Hand${FingerName}${FingerSegment}`;
export type LegBone =
  | `${Side}UpLeg`
  | `${Side}Leg`
  | `${Side}Foot`
  | `${Side}ToeBase`
  | `${Side}Toe_End`;

export type CanonicalBoneName =
  | CoreBone
  | FaceBone
  | ArmBone
  | FingerBone
  | LegBone;

export const SIDES: readonly Side[] = ["Left", "Right"];
export const FINGERS: readonly FingerName[] = [
  "Thumb",
  "Index",
  "Middle",
  "Ring",
  "Pinky",
];
export const FINGER_SEGMENTS: readonly FingerSegment[] = [1, 2, 3, 4];

const CORE_BONES: readonly CoreBone[] = [
  "Hips",
  "Spine",
  "Spine1",
  "Spine2",
  "Neck",
  "Head",
  "HeadTop_End",
];

// ============================================================================
// NAME BUILDERS
// ============================================================================

export function fingerBone(
  side: Side,
  finger: FingerName,
  segment: FingerSegment,
): FingerBone {
  return `${side}Hand${finger}${segment}`;
}

export function armBones(side: Side): {
  arm: ArmBone;
  foreArm: ArmBone;
  hand: ArmBone;
} {
  return {
    arm: `${side}Arm`,
    foreArm: `${side}ForeArm`,
    hand: `${side}Hand`,
  };
}

export function legBones(side: Side): {
  upLeg: LegBone;
  leg: LegBone;
  foot: LegBone;
  toeBase: LegBone;
  toeEnd: LegBone;
} {
  return {
    upLeg: `${side}UpLeg`,
    leg: `${side}Leg`,
    foot: `${side}Foot`,
    toeBase: `${side}ToeBase`,
    toeEnd: `${side}Toe_End`,
  };
}

function faceBones(): FaceBone[] {
  const out: FaceBone[] = [];
  for (const side of SIDES) {
    const eye: FaceBone = `${side}Eye`;
    const ear: FaceBone = `${side}Ear`;
    out.push(eye, ear);
  }
  out.push("Nose");
  return out;
}

function buildVocabulary(): CanonicalBoneName[] {
  const bones: CanonicalBoneName[] = [...CORE_BONES, ...faceBones()];
  for (const side of SIDES) {
    const { arm, foreArm, hand } = armBones(side);
    bones.push(arm, foreArm, hand);
    for (const finger of FINGERS) {
      for (const segment of FINGER_SEGMENTS) {
        bones.push(fingerBone(side, finger, segment));
      }
    }
  }
  for (const side of SIDES) {
    const { upLeg, leg, foot, toeBase, toeEnd } = legBones(side);
    bones.push(upLeg, leg, foot, toeBase, toeEnd);
  }
  return bones;
}

// ============================================================================
// VOCABULARY + INDEX
// ============================================================================

export const CANONICAL_BONES: readonly CanonicalBoneName[] = buildVocabulary();
export const CANONICAL_BONE_COUNT = CANONICAL_BONES.length;

const BONE_INDEX: ReadonlyMap<string, number> = new Map(
  CANONICAL_BONES.map((name, i) => [name, i]),
);

export function boneIndex(bone: CanonicalBoneName): number {
  return BONE_INDEX.get(bone) ?? -1;
}

export function isCanonicalBoneName(name: string): name is CanonicalBoneName {
  return BONE_INDEX.has(name);
}

// ============================================================================
// BODY-PART CLASSIFICATION
// ============================================================================

/** Smoothing class: fingers/wrists track faster than torso or limbs */
export type BodyPartClass = "hand" | "core" | "limb";

const CORE_SET: ReadonlySet<string> = new Set<string>([
  ...CORE_BONES,
  ...faceBones(),
]);

export function isHandBone(bone: string): boolean {
  if (bone === "LeftHand" || bone === "RightHand") return true;
  return bone.includes("Hand") && FINGERS.some((f) => bone.includes(f));
}

export function classifyBone(bone: string): BodyPartClass {
  if (isHandBone(bone)) return "hand";
  if (CORE_SET.has(bone)) return "core";
  return "limb";
}

// ============================================================================
// CHAIN TABLE
// ============================================================================

export type ChainLink = readonly [
  parent: CanonicalBoneName,
  child: CanonicalBoneName,
];

function fingerLinks(side: Side, fromHand: boolean): ChainLink[] {
  const { hand } = armBones(side);
  const links: ChainLink[] = [];
  for (const finger of FINGERS) {
    if (fromHand) links.push([hand, fingerBone(side, finger, 1)]);
    links.push([fingerBone(side, finger, 1), fingerBone(side, finger, 2)]);
    links.push([fingerBone(side, finger, 2), fingerBone(side, finger, 3)]);
    links.push([fingerBone(side, finger, 3), fingerBone(side, finger, 4)]);
  }
  return links;
}

function footLinks(side: Side): ChainLink[] {
  const { foot, toeBase, toeEnd } = legBones(side);
  return [
    [foot, toeBase],
    [toeBase, toeEnd],
  ];
}

function buildChainLinks(): ChainLink[] {
  const links: ChainLink[] = [["Neck", "Head"]];
  for (const side of SIDES) {
    const { arm, foreArm, hand } = armBones(side);
    links.push([arm, foreArm], [foreArm, hand], ...fingerLinks(side, true));
  }
  for (const side of SIDES) {
    const { upLeg, leg, foot } = legBones(side);
    links.push([upLeg, leg], [leg, foot], ...footLinks(side));
  }
  return links;
}

/** Every parent→child link whose bind direction is recorded */
export const CHAIN_LINKS: readonly ChainLink[] = buildChainLinks();

/**
 * Links aligned by plain direction after the limb, hand and head solvers
 * have run: finger segments and toes. Hand → finger-base links are left out;
 * the hand solver owns the wrist.
 */
export const STANDARD_ALIGN_LINKS: readonly ChainLink[] = [
  ...fingerLinks("Left", false),
  ...fingerLinks("Right", false),
  ...footLinks("Left"),
  ...footLinks("Right"),
];
