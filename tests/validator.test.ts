/**
 * Test suite for candidate validation
 */

import { describe, it, expect } from "@jest/globals";
import { validateCandidate } from "../tooling/lib/validator";
import { createCandidate, createPersonDescriptor } from "./fixtures/descriptors";

describe("validateCandidate", () => {
  it("accepts a private data class with the marker suffix", () => {
    expect(validateCandidate(createCandidate())).toEqual({ ok: true });
  });

  it("rejects anonymous declarations", () => {
    expect(validateCandidate(createCandidate({ qualifiedName: undefined, simpleName: undefined }))).toEqual({
      ok: false,
      rule: "missing-qualified-name",
      message: "@DataCompat must target classes with a qualified name",
    });
  });

  it("rejects classes that are not data-shaped", () => {
    expect(validateCandidate(createCandidate({ kind: "class" }))).toEqual({
      ok: false,
      rule: "not-data-kind",
      message: "@DataCompat cannot target a non-data class src/person.ts#PersonData",
    });
    expect(validateCandidate(createCandidate({ kind: "abstract-class" }))).toMatchObject({ rule: "not-data-kind" });
  });

  it("rejects exported classes", () => {
    expect(validateCandidate(createCandidate({ visibility: "public" }))).toEqual({
      ok: false,
      rule: "not-private",
      message: "@DataCompat target must have private visibility (not exported)",
    });
  });

  it("rejects generic classes", () => {
    expect(validateCandidate(createCandidate({ typeParameters: ["T"] }))).toEqual({
      ok: false,
      rule: "has-type-parameters",
      message: "@DataCompat target shouldn't have type parameters",
    });
  });

  it("rejects names without the suffix", () => {
    const descriptor = createPersonDescriptor({ key: "src/person.ts#Person", simpleName: "Person" });
    expect(validateCandidate(createCandidate({ descriptor, simpleName: "Person" }))).toEqual({
      ok: false,
      rule: "missing-suffix",
      message: "@DataCompat target must end with Data suffix naming",
    });
  });

  it("reports the first failing rule", () => {
    const result = validateCandidate(
      createCandidate({ kind: "class", visibility: "public", typeParameters: ["T"], simpleName: "Person" })
    );
    expect(result).toMatchObject({ ok: false, rule: "not-data-kind" });
  });
});
