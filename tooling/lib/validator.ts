/**
 * Candidate validation: permanent, user-fixable setup errors
 */

import { MARKER_SUFFIX } from "./naming";
import { CandidateDeclaration, ValidationResult } from "./types";

type Rule = (candidate: CandidateDeclaration) => ValidationResult;

const rules: Rule[] = [
  (candidate) =>
    candidate.qualifiedName
      ? { ok: true }
      : { ok: false, rule: "missing-qualified-name", message: "@DataCompat must target classes with a qualified name" },

  (candidate) =>
    candidate.kind === "data"
      ? { ok: true }
      : {
          ok: false,
          rule: "not-data-kind",
          message: `@DataCompat cannot target a non-data class ${candidate.qualifiedName ?? ""}`.trimEnd(),
        },

  (candidate) =>
    candidate.visibility === "private"
      ? { ok: true }
      : { ok: false, rule: "not-private", message: "@DataCompat target must have private visibility (not exported)" },

  (candidate) =>
    candidate.typeParameters.length === 0
      ? { ok: true }
      : { ok: false, rule: "has-type-parameters", message: "@DataCompat target shouldn't have type parameters" },

  (candidate) =>
    candidate.simpleName?.endsWith(MARKER_SUFFIX)
      ? { ok: true }
      : { ok: false, rule: "missing-suffix", message: `@DataCompat target must end with ${MARKER_SUFFIX} suffix naming` },
];

/**
 * First failing rule wins
 */
export function validateCandidate(candidate: CandidateDeclaration): ValidationResult {
  for (const rule of rules) {
    const result = rule(candidate);
    if (!result.ok) {
      return result;
    }
  }
  return { ok: true };
}
