/**
 * SkeletonBinding - Canonical Bone → Model Bone
 * ==============================================
 *
 * Resolves the canonical vocabulary against the bones of a loaded model:
 *
 *   1. Exact name, over rig-prefix variants (Hips, mixamorigHips,
 *      mixamorig_Hips, mixamorig:Hips, mixamorig1Hips)
 *   2. Case-insensitive name over the same variants
 *   3. Fuzzy keyword match: every body-part keyword of the canonical name
 *      must appear in the normalised bone name
 *
 * @module retarget/SkeletonBinding
 */

import * as THREE from "three";
import {
  CANONICAL_BONES,
  type CanonicalBoneName,
} from "../biomech/canonicalBones";
import { BoneTable } from "../biomech/CanonicalPose";
import {
  ThreeBoneHandle,
  type BoneHandle,
  type SkeletonBinding,
} from "./BoneHandle";
import { bindingLog } from "../lib/logger";

// ============================================================================
// TYPES
// ============================================================================

export interface FuzzyMatch {
  canonical: CanonicalBoneName;
  boneName: string;
}

export interface SkeletonBindingResult {
  binding: SkeletonBinding;
  /** Canonical names with no bone in the model */
  missing: CanonicalBoneName[];
  fuzzyMatches: FuzzyMatch[];
}

export interface SkeletonBindingOptions {
  /** Names to resolve; defaults to every bindable canonical bone */
  bones?: readonly CanonicalBoneName[];
  /** Allow keyword matching after exact lookups fail (default true) */
  fuzzy?: boolean;
}

/** Observation-only points that no rig carries as bones */
const OBSERVATION_ONLY = new Set<CanonicalBoneName>([
  "LeftEar",
  "RightEar",
  "Nose",
]);

export const BINDABLE_BONES: readonly CanonicalBoneName[] =
  CANONICAL_BONES.filter((b) => !OBSERVATION_ONLY.has(b));

export const RIG_PREFIXES = [
  "",
  "mixamorig",
  "mixamorig_",
  "mixamorig:",
  "mixamorig1",
] as const;

const BONE_KEYWORDS = [
  "hip",
  "hips",
  "pelvis",
  "spine",
  "spine1",
  "spine2",
  "chest",
  "neck",
  "head",
  "shoulder",
  "arm",
  "forearm",
  "hand",
  "thumb",
  "index",
  "middle",
  "ring",
  "pinky",
  "leg",
  "upleg",
  "knee",
  "foot",
  "toe",
  "eye",
  "left",
  "right",
];

// ============================================================================
// HELPERS
// ============================================================================

export function nameVariants(canonical: string): string[] {
  return RIG_PREFIXES.map((prefix) => `${prefix}${canonical}`);
}

/** Every THREE.Bone under root, by name (first occurrence wins) */
export function collectBones(root: THREE.Object3D): Map<string, THREE.Bone> {
  const bones = new Map<string, THREE.Bone>();
  root.traverse((object) => {
    if (object instanceof THREE.Bone && !bones.has(object.name)) {
      bones.set(object.name, object);
    }
  });
  return bones;
}

export function normalizeBoneName(name: string): string {
  return name
    .toLowerCase()
    .replace(/mixamorig\d*/g, "")
    .replace(/[_\-:\s]/g, "");
}

export function extractKeywords(normalized: string): string[] {
  return BONE_KEYWORDS.filter((k) => normalized.includes(k));
}

function trailingNumber(name: string): number | null {
  const m = /(\d+)$/.exec(name);
  return m ? Number(m[1]) : null;
}

function findExact(
  bones: Map<string, THREE.Bone>,
  canonical: CanonicalBoneName,
): THREE.Bone | undefined {
  for (const candidate of nameVariants(canonical)) {
    const direct = bones.get(candidate);
    if (direct) return direct;
    const lower = candidate.toLowerCase();
    for (const [name, bone] of bones) {
      if (name.toLowerCase() === lower) return bone;
    }
  }
  return undefined;
}

/**
 * Keyword match. A candidate must contain every keyword of the canonical
 * name and, when the canonical name ends in a segment number, end in the same
 * number. Candidates score by keyword overlap (shared / union), so extra body
 * parts count against them: "LeftArm" prefers "left_arm" over
 * "left_fore_arm". Ties go to the closest normalised length.
 */
export function fuzzyMatchBone(
  bones: Map<string, THREE.Bone>,
  canonical: CanonicalBoneName,
  exclude: ReadonlySet<THREE.Object3D> = new Set(),
): THREE.Bone | undefined {
  const target = normalizeBoneName(canonical);
  const keywords = extractKeywords(target);
  if (keywords.length === 0) return undefined;
  const segment = trailingNumber(target);

  let best: THREE.Bone | undefined;
  let bestScore = 0.5;
  let bestLengthDiff = Infinity;

  for (const [name, bone] of bones) {
    if (exclude.has(bone)) continue;
    const normalized = normalizeBoneName(name);
    if (!keywords.every((k) => normalized.includes(k))) continue;
    if (segment !== null && trailingNumber(normalized) !== segment) continue;

    const candidateKeywords = extractKeywords(normalized);
    const score = keywords.length / candidateKeywords.length;
    const lengthDiff = Math.abs(normalized.length - target.length);
    if (
      score > bestScore ||
      (score === bestScore && best !== undefined && lengthDiff < bestLengthDiff)
    ) {
      best = bone;
      bestScore = score;
      bestLengthDiff = lengthDiff;
    }
  }
  return best;
}

// ============================================================================
// RESOLVE
// ============================================================================

export function resolveSkeletonBinding(
  root: THREE.Object3D,
  options: SkeletonBindingOptions = {},
): SkeletonBindingResult {
  const { bones: wanted = BINDABLE_BONES, fuzzy = true } = options;
  const bones = collectBones(root);
  const binding = new BoneTable<BoneHandle>();
  const used = new Set<THREE.Object3D>();
  const unresolved: CanonicalBoneName[] = [];
  const fuzzyMatches: FuzzyMatch[] = [];

  bindingLog.debug(`Model has ${bones.size} bones`);

  // Exact lookups first, so fuzzy matching never steals a bone that
  // another canonical name owns by name.
  for (const canonical of wanted) {
    const bone = findExact(bones, canonical);
    if (bone) {
      binding.set(canonical, new ThreeBoneHandle(bone));
      used.add(bone);
    } else {
      unresolved.push(canonical);
    }
  }

  const missing: CanonicalBoneName[] = [];
  for (const canonical of unresolved) {
    const bone = fuzzy ? fuzzyMatchBone(bones, canonical, used) : undefined;
    if (bone) {
      binding.set(canonical, new ThreeBoneHandle(bone));
      used.add(bone);
      fuzzyMatches.push({ canonical, boneName: bone.name });
      bindingLog.debug(`Fuzzy match: "${canonical}" → "${bone.name}"`);
    } else {
      missing.push(canonical);
    }
  }

  if (binding.isEmpty()) {
    bindingLog.warn("No canonical bones resolved");
  } else {
    bindingLog.info(`Resolved ${binding.size}/${wanted.length} bones`);
  }

  return { binding, missing, fuzzyMatches };
}
