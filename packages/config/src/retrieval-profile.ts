import { readFileSync } from "node:fs";
import { z } from "zod";
import type { RetrievalProfile } from "@corpora/types";
import { ValidationError } from "@corpora/errors";

const regexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source, "i");
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" },
);

const boostRuleSchema = z.object({
  name: z.string().min(1),
  pattern: regexSource,
  weight: z.number().min(-1).max(1),
});

export const retrievalProfileSchema = z.object({
  boosts: z.array(boostRuleSchema),
  periodic: boostRuleSchema,
  domain: z.object({
    triggers: z.array(regexSource),
    synonyms: z.array(z.string().min(1)),
    expansions: z.array(
      z.object({
        name: z.string().min(1),
        when: regexSource,
        terms: z.array(z.string().min(1)),
      }),
    ),
    spaceWhitelist: z.array(z.string().min(1)),
  }),
});

const DEFAULT_PROFILE_URL = new URL("../profiles/default-retrieval-profile.json", import.meta.url);

function readProfile(source: string | URL): RetrievalProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, "utf8"));
  } catch (error: unknown) {
    throw new ValidationError(
      `Cannot read retrieval profile ${String(source)}`,
      { RETRIEVAL_PROFILE_PATH: "unreadable or not JSON" },
      { cause: error },
    );
  }

  const result = retrievalProfileSchema.safeParse(raw);
  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fields[issue.path.join(".")] = issue.message;
    }
    throw new ValidationError(`Invalid retrieval profile ${String(source)}`, fields);
  }
  return result.data;
}

/**
 * Load the boost rules, domain triggers, query expansions and space whitelist.
 * Without a path the bundled default profile is used.
 */
export function loadRetrievalProfile(path?: string): RetrievalProfile {
  return readProfile(path ?? DEFAULT_PROFILE_URL);
}
