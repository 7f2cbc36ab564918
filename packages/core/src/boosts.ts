import type { RetrievalProfile } from "@corpora/types";

export interface BoostSubject {
  title: string;
  doctype: string | null;
}

/**
 * Additive re-ranking adjustment: the first positive rule matching the
 * title or doctype applies, every matching negative rule is added, then the
 * periodic rule is added when the title looks date-stamped.
 */
export function computeBoost(subject: BoostSubject, profile: RetrievalProfile): number {
  const fields = [subject.title, subject.doctype ?? ""];
  const matches = (source: string) => {
    const pattern = new RegExp(source, "i");
    return fields.some((field) => pattern.test(field));
  };
  let boost = 0;
  let positiveApplied = false;

  for (const rule of profile.boosts) {
    if (rule.weight === 0) continue;
    if (rule.weight > 0 && positiveApplied) continue;
    if (!matches(rule.pattern)) continue;
    boost += rule.weight;
    if (rule.weight > 0) positiveApplied = true;
  }

  if (new RegExp(profile.periodic.pattern, "i").test(subject.title)) {
    boost += profile.periodic.weight;
  }
  return boost;
}
