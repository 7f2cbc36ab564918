import { describe, expect, it } from "vitest";
import { loadRetrievalProfile } from "@corpora/config";
import { analyzeQuery } from "./query-analysis.js";

const profile = loadRetrievalProfile();

describe("analyzeQuery", () => {
  it.each([
    "What is N2S?",
    "navigate to SaaS methodology",
    "Sprint 0 activities",
    "sprint zero checklist",
    "Where is the onboarding playbook?",
  ])("treats %s as a domain query", (query) => {
    expect(analyzeQuery(query, profile).isDomainQuery).toBe(true);
  });

  it.each(["How to configure SSO?", "Student registration process", "Database connection error"])(
    "leaves %s alone",
    (query) => {
      const analysis = analyzeQuery(query, profile);
      expect(analysis.isDomainQuery).toBe(false);
      expect(analysis.expanded).toBe(query);
      expect(analysis.appliedExpansions).toEqual([]);
    },
  );

  it("adds synonyms and lifecycle phases to lifecycle questions", () => {
    const analysis = analyzeQuery("N2S lifecycle overview", profile);

    expect(analysis.expanded).toBe(
      'N2S lifecycle overview OR N2S OR "Navigate to SaaS" OR Discovery OR Build OR Optimize OR "Sprint 0"',
    );
    expect(analysis.matchedTriggers).toEqual(["\\bn2s\\b"]);
    expect(analysis.appliedExpansions).toEqual(["lifecycle"]);
  });

  it("adds entry and exit criteria to governance questions", () => {
    const analysis = analyzeQuery("governance checkpoints in N2S", profile);

    expect(analysis.expanded).toBe(
      'governance checkpoints in N2S OR N2S OR "Navigate to SaaS" OR "entry criteria" OR "exit criteria" OR checkpoint',
    );
    expect(analysis.appliedExpansions).toEqual(["governance"]);
  });

  it("trims the query before matching", () => {
    const analysis = analyzeQuery("   Student registration process  ", profile);
    expect(analysis.original).toBe("Student registration process");
    expect(analysis.expanded).toBe("Student registration process");
  });
});
