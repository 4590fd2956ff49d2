/**
 * Test suite for ts-morph candidate discovery
 */

import { describe, it, expect } from "@jest/globals";
import { SyntaxKind } from "ts-morph";
import { collectDefaults, lookupDefault } from "../tooling/lib/default-collector";
import { describeParameterType, TsMorphHost } from "../tooling/lib/host";
import { CandidateDeclaration } from "../tooling/lib/types";
import { createInMemoryProject, PEOPLE_SOURCE, PROJECT_ROOT } from "./fixtures/project";

function hostFor(files: Record<string, string>): TsMorphHost {
  return new TsMorphHost(createInMemoryProject(files), PROJECT_ROOT);
}

function candidateNamed(host: TsMorphHost, simpleName: string): CandidateDeclaration {
  const candidate = host.discoverCandidates().find((c) => c.simpleName === simpleName);
  if (!candidate) {
    throw new Error(`No candidate named ${simpleName}`);
  }
  return candidate;
}

function singleClass(body: string): string {
  return ['import { DataCompat, Default } from "./markers";', "", body].join("\n");
}

describe("TsMorphHost", () => {
  describe("discoverCandidates", () => {
    it("finds every class carrying the marker", () => {
      const host = hostFor({ "src/people.ts": PEOPLE_SOURCE });

      expect(host.discoverCandidates().map((c) => c.key)).toEqual([
        "src/people.ts#PersonData",
        "src/people.ts#MeasurementData",
      ]);
    });

    it("restricts discovery to the requested keys", () => {
      const host = hostFor({ "src/people.ts": PEOPLE_SOURCE });

      expect(host.discoverCandidates(new Set(["src/people.ts#MeasurementData"])).map((c) => c.simpleName)).toEqual([
        "MeasurementData",
      ]);
    });

    it("describes a data class", () => {
      const candidate = candidateNamed(hostFor({ "src/people.ts": PEOPLE_SOURCE }), "PersonData");

      expect(candidate).toMatchObject({
        key: "src/people.ts#PersonData",
        qualifiedName: "src/people.ts#PersonData",
        kind: "data",
        visibility: "private",
        typeParameters: [],
        unresolvedReferences: [],
      });
      expect(candidate.descriptor).toMatchObject({
        simpleName: "PersonData",
        packageName: "src",
        documentation: "A person in the address book.",
        passThroughAnnotations: [],
        implementedCapabilities: [{ text: "Named" }],
        generateNamespaceHook: true,
        extraImportDirectives: [],
        typeImports: [{ module: "src/people", projectRelative: true, kind: "named", name: "Named" }],
      });
      expect(candidate.descriptor.properties).toEqual([
        {
          name: "name",
          type: { text: "string", nullable: false, floating: false, absentLiteral: undefined },
          documentation: "Full name of the person.",
        },
        {
          name: "nickname",
          type: { text: "string", nullable: false, floating: false, absentLiteral: undefined },
          documentation: undefined,
        },
        {
          name: "age",
          type: { text: "number", nullable: false, floating: true, absentLiteral: undefined },
          documentation: undefined,
        },
        {
          name: "email",
          type: { text: "string | undefined", nullable: true, floating: false, absentLiteral: "undefined" },
          documentation: undefined,
        },
      ]);
    });

    it("reads marker options and referenced types", () => {
      const candidate = candidateNamed(hostFor({ "src/people.ts": PEOPLE_SOURCE }), "MeasurementData");

      expect(candidate.descriptor.extraImportDirectives).toEqual(["./people#Unit"]);
      expect(candidate.descriptor.generateNamespaceHook).toBe(false);
      expect(candidate.descriptor.typeImports).toEqual([
        { module: "src/people", projectRelative: true, kind: "named", name: "Unit" },
      ]);
      expect(candidate.descriptor.properties.map((p) => p.type)).toEqual([
        { text: "number", nullable: false, floating: true, absentLiteral: undefined },
        { text: "Unit", nullable: false, floating: false, absentLiteral: undefined },
        { text: "number | null", nullable: true, floating: true, absentLiteral: "null" },
      ]);
    });

    it("reports exported, generic and non-data classes as they are", () => {
      const host = hostFor({
        "src/shapes.ts": singleClass(
          [
            "@DataCompat()",
            "export class PublicData {",
            "  constructor(readonly value: string) {}",
            "}",
            "@DataCompat()",
            "class BoxData<T> {",
            "  constructor(readonly value: T) {}",
            "}",
            "@DataCompat()",
            "class MutableData {",
            "  constructor(public value: string) {}",
            "}",
            "@DataCompat()",
            "class BehaviorData {",
            "  constructor(readonly value: string) {}",
            "  describe(): string {",
            "    return this.value;",
            "  }",
            "}",
            "@DataCompat()",
            "abstract class ShapeData {",
            "  constructor(readonly sides: number) {}",
            "}",
          ].join("\n")
        ),
      });

      expect(candidateNamed(host, "PublicData").visibility).toBe("public");
      expect(candidateNamed(host, "BoxData")).toMatchObject({ kind: "data", typeParameters: ["T"] });
      expect(candidateNamed(host, "MutableData").kind).toBe("class");
      expect(candidateNamed(host, "BehaviorData").kind).toBe("class");
      expect(candidateNamed(host, "ShapeData").kind).toBe("abstract-class");
    });

    it("reports type references that do not resolve yet", () => {
      const host = hostFor({
        "src/order.ts": singleClass(
          [
            'import { Address } from "../generated/datacompat/src/Address";',
            "@DataCompat()",
            "class OrderData {",
            "  constructor(readonly shipTo: Address, readonly lines: Missing[]) {}",
            "}",
          ].join("\n")
        ),
      });

      expect(candidateNamed(host, "OrderData").unresolvedReferences).toEqual(["Address", "Missing"]);
    });

    it("places root-level sources in the root package", () => {
      const host = hostFor({
        "point.ts": [
          'import { DataCompat } from "./src/markers";',
          "@DataCompat()",
          "class PointData {",
          "  constructor(readonly x: number, readonly y: number) {}",
          "}",
        ].join("\n"),
      });

      expect(candidateNamed(host, "PointData").descriptor.packageName).toBe("");
    });

    it("passes other decorators through", () => {
      const host = hostFor({
        "src/tagged.ts": singleClass(
          [
            "function Sealed(): ClassDecorator {",
            "  return () => undefined;",
            "}",
            "@Sealed()",
            "@DataCompat()",
            "class TaggedData {",
            "  constructor(readonly tag: string) {}",
            "}",
          ].join("\n")
        ),
      });

      const candidate = candidateNamed(host, "TaggedData");
      expect(candidate.unresolvedReferences).toEqual([]);
      expect(candidate.descriptor.passThroughAnnotations).toEqual([{ name: "Sealed", text: "@Sealed()" }]);
    });
  });

  describe("discoverDefaultMarkers", () => {
    it("finds parameter markers with their owners", () => {
      const host = hostFor({ "src/people.ts": PEOPLE_SOURCE });
      const markers = host.discoverDefaultMarkers();

      expect(markers.map((m) => [m.parameterName, m.expression, m.location])).toEqual([
        ["nickname", '"anonymous"', "src/people.ts:20"],
        ["unit", "Unit.Metric", "src/people.ts:30"],
      ]);

      const index = collectDefaults(markers);
      expect(lookupDefault(index, "src/people.ts#PersonData", "nickname")).toBe('"anonymous"');
      expect(lookupDefault(index, "src/people.ts#MeasurementData", "unit")).toBe("Unit.Metric");
    });

    it("keeps markers whose argument is not a string literal", () => {
      const host = hostFor({
        "src/odd.ts": [
          'import { DataCompat, Default } from "./markers";',
          'const expression = "1";',
          "@DataCompat()",
          "class OddData {",
          "  constructor(@Default(expression) readonly value: number) {}",
          "}",
        ].join("\n"),
      });

      expect(host.discoverDefaultMarkers().map((m) => [m.parameterName, m.expression])).toEqual([["value", undefined]]);
    });
  });

  describe("describeParameterType", () => {
    function parameterType(signature: string) {
      const project = createInMemoryProject({ "src/types.ts": `export function f(${signature}) {}` });
      const parameter = project
        .getSourceFileOrThrow(`${PROJECT_ROOT}/src/types.ts`)
        .getFirstDescendantByKindOrThrow(SyntaxKind.Parameter);
      return describeParameterType(parameter);
    }

    it("describes nullable unions", () => {
      expect(parameterType("value: string | null")).toEqual({
        text: "string | null",
        nullable: true,
        floating: false,
        absentLiteral: "null",
      });
      expect(parameterType("value: number | undefined")).toEqual({
        text: "number | undefined",
        nullable: true,
        floating: true,
        absentLiteral: "undefined",
      });
    });

    it("prefers undefined as the absent value when both are admitted", () => {
      expect(parameterType("value: string | null | undefined").absentLiteral).toBe("undefined");
    });

    it("treats numeric aliases as floating", () => {
      const project = createInMemoryProject({
        "src/types.ts": ["type Meters = number;", "export function f(value: Meters) {}"].join("\n"),
      });
      const parameter = project
        .getSourceFileOrThrow(`${PROJECT_ROOT}/src/types.ts`)
        .getFirstDescendantByKindOrThrow(SyntaxKind.Parameter);

      expect(describeParameterType(parameter)).toEqual({
        text: "Meters",
        nullable: false,
        floating: true,
        absentLiteral: undefined,
      });
    });

    it("does not treat other types as floating", () => {
      expect(parameterType("value: bigint").floating).toBe(false);
      expect(parameterType("value: number[]").floating).toBe(false);
    });
  });
});
