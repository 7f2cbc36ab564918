import type { QueryAnalysis, RetrievalProfile } from "@corpora/types";

function matches(pattern: string, text: string): boolean {
  return new RegExp(pattern, "i").test(text);
}

/**
 * Classify a query against the profile's domain triggers and, for domain
 * queries, append synonyms plus the terms of every matching expansion rule
 * as websearch `OR` alternatives. Other queries pass through unchanged.
 */
export function analyzeQuery(queryText: string, profile: RetrievalProfile): QueryAnalysis {
  const original = queryText.trim();
  const matchedTriggers = profile.domain.triggers.filter((trigger) => matches(trigger, original));

  if (matchedTriggers.length === 0) {
    return {
      original,
      expanded: original,
      isDomainQuery: false,
      matchedTriggers: [],
      appliedExpansions: [],
    };
  }

  const alternatives: string[] = [...profile.domain.synonyms];
  const appliedExpansions: string[] = [];
  for (const rule of profile.domain.expansions) {
    if (!matches(rule.when, original)) continue;
    appliedExpansions.push(rule.name);
    alternatives.push(...rule.terms);
  }

  const unique = [...new Set(alternatives)];
  return {
    original,
    expanded: [original, ...unique].join(" OR "),
    isDomainQuery: true,
    matchedTriggers,
    appliedExpansions,
  };
}
