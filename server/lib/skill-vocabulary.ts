/**
 * Skill Vocabulary
 *
 * Canonical skill identifiers as supplied by the ingestion side. Scoring works
 * on sets, so names are canonicalized and deduplicated here once per entity.
 */

import type { RawSkill, SkillRef } from "@shared/schema";

export interface PartitionedSkills {
  must: ReadonlySet<string>;
  needed: ReadonlySet<string>;
  all: ReadonlySet<string>;
}

/**
 * Lower-case, trim and collapse inner whitespace
 */
export function canonicalSkillName(raw: string): string {
  return raw.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Normalize raw skills into deduplicated SkillRefs.
 *
 * Bare strings (legacy flat lists) become `needed`/`extracted`. When a name
 * occurs in both categories the `must` entry wins; first-seen order is kept.
 */
export function normalizeSkillRefs(raw: readonly RawSkill[]): SkillRef[] {
  const byName = new Map<string, SkillRef>();

  for (const item of raw) {
    const ref: SkillRef =
      typeof item === "string"
        ? { name: item, category: "needed", provenance: "extracted" }
        : item;
    const name = canonicalSkillName(ref.name);
    if (!name) {
      continue;
    }

    const existing = byName.get(name);
    if (!existing) {
      byName.set(name, { ...ref, name });
    } else if (existing.category !== "must" && ref.category === "must") {
      byName.set(name, { ...existing, category: "must" });
    }
  }

  return Array.from(byName.values());
}

export function partitionSkills(refs: readonly SkillRef[]): PartitionedSkills {
  const must = new Set<string>();
  const needed = new Set<string>();

  for (const ref of refs) {
    const target: Set<string> = ref.category === "must" ? must : needed;
    target.add(ref.name);
  }

  return { must, needed, all: new Set([...must, ...needed]) };
}
