/**
 * Test suite for the runtime behaviour of generated value classes
 */

import { describe, it, expect, beforeAll } from "@jest/globals";
import { classifyProperties } from "../tooling/lib/classifier";
import { collectDefaults, createDefaultValueIndex } from "../tooling/lib/default-collector";
import { renderClassPlan } from "../tooling/lib/emitter";
import { synthesizeClass } from "../tooling/lib/synthesis";
import { DefaultValueIndex, TypeDescriptor } from "../tooling/lib/types";
import { createPersonDescriptor, defaultMarker, numberType, PERSON_KEY, property, stringType } from "./fixtures/descriptors";
import {
  call,
  field,
  invoke,
  isEqual,
  loadGeneratedModule,
  newBuilder,
  RUNTIME_MODULE,
} from "./fixtures/generated-module";

function generate(
  descriptor: TypeDescriptor = createPersonDescriptor(),
  index: DefaultValueIndex = createDefaultValueIndex()
): Record<string, unknown> {
  const plan = synthesizeClass(classifyProperties(descriptor, index));
  return loadGeneratedModule(renderClassPlan(plan, { runtimeModule: RUNTIME_MODULE, outputDir: "generated" }));
}

/**
 * Person(name, nickname, age, height) through its builder
 */
function buildPerson(
  exports: Record<string, unknown>,
  name: unknown,
  age: unknown,
  configure: (builder: unknown) => void = () => undefined
): unknown {
  const builder = newBuilder(exports, "Person", name, age);
  configure(builder);
  return invoke(builder, "build");
}

describe("generated value classes", () => {
  let exports: Record<string, unknown>;

  beforeAll(() => {
    exports = generate();
  });

  it("builds instances from mandatory values and absent defaults", () => {
    const person = buildPerson(exports, "Ada", 36);

    expect(field(person, "name")).toBe("Ada");
    expect(field(person, "nickname")).toBeUndefined();
    expect(field(person, "age")).toBe(36);
    expect(field(person, "height")).toBeNull();
  });

  it("prints every property", () => {
    const person = buildPerson(exports, "Ada", 36, (builder) => invoke(builder, "setHeight", 1.7));

    expect(invoke(person, "toString")).toBe("Person(name=Ada, nickname=undefined, age=36, height=1.7)");
  });

  it("returns the builder from setters", () => {
    const builder = newBuilder(exports, "Person", "Ada", 36);

    expect(invoke(builder, "setNickname", "ada")).toBe(builder);
  });

  it("compares by value", () => {
    const a = buildPerson(exports, "Ada", 36, (builder) => invoke(builder, "setNickname", "ada"));
    const b = buildPerson(exports, "Ada", 36, (builder) => invoke(builder, "setNickname", "ada"));
    const c = buildPerson(exports, "Ada", 37, (builder) => invoke(builder, "setNickname", "ada"));

    expect(isEqual(a, a)).toBe(true);
    expect(isEqual(a, b)).toBe(true);
    expect(invoke(a, "hashCode")).toBe(invoke(b, "hashCode"));
    expect(isEqual(a, c)).toBe(false);
    expect(isEqual(a, { name: "Ada", age: 36 })).toBe(false);
    expect(isEqual(a, null)).toBe(false);
  });

  it("treats NaN as equal to NaN", () => {
    const a = buildPerson(exports, "Ada", NaN);
    const b = buildPerson(exports, "Ada", NaN);

    expect(isEqual(a, b)).toBe(true);
    expect(invoke(a, "hashCode")).toBe(invoke(b, "hashCode"));
  });

  it("distinguishes negative zero", () => {
    const a = buildPerson(exports, "Ada", 0);
    const b = buildPerson(exports, "Ada", -0);

    expect(isEqual(a, b)).toBe(false);
  });

  it("compares an absent nullable number as zero", () => {
    const absent = buildPerson(exports, "Ada", 36);
    const zero = buildPerson(exports, "Ada", 36, (builder) => invoke(builder, "setHeight", 0));

    expect(isEqual(absent, zero)).toBe(true);
    expect(invoke(absent, "hashCode")).toBe(invoke(zero, "hashCode"));
  });

  it("round-trips through toBuilder", () => {
    const person = buildPerson(exports, "Ada", 36, (builder) => {
      invoke(builder, "setNickname", "ada");
      invoke(builder, "setHeight", 1.7);
    });

    const copy = invoke(invoke(person, "toBuilder"), "build");
    expect(copy).not.toBe(person);
    expect(isEqual(copy, person)).toBe(true);

    const older = invoke(invoke(invoke(person, "toBuilder"), "setAge", 37), "build");
    expect(field(older, "age")).toBe(37);
    expect(field(older, "nickname")).toBe("ada");
    expect(field(person, "age")).toBe(36);
  });

  it("builds the same value through the DSL factory", () => {
    const viaFactory = call(exports.person, "Ada", 36, (builder: unknown) => {
      invoke(builder, "setNickname", "ada");
    });
    const viaBuilder = buildPerson(exports, "Ada", 36, (builder) => invoke(builder, "setNickname", "ada"));

    expect(isEqual(viaFactory, viaBuilder)).toBe(true);
  });

  it("runs the DSL factory when a property is named builder", () => {
    const job = generate(
      createPersonDescriptor({
        simpleName: "JobData",
        properties: [property("builder", stringType()), property("priority", numberType())],
      })
    );

    const value = call(job.job, "nightly", 3, (builder: unknown) => {
      invoke(builder, "setPriority", 5);
    });

    expect(field(value, "builder")).toBe("nightly");
    expect(field(value, "priority")).toBe(5);
  });

  it("refuses to build without a mandatory value", () => {
    expect(() => buildPerson(exports, undefined, 36)).toThrow("Null name found when building Person.");
    expect(() => buildPerson(exports, "Ada", null)).toThrow("Null age found when building Person.");
  });

  it("starts builder fields at their default expressions", () => {
    const defaults = generate(
      createPersonDescriptor(),
      collectDefaults([defaultMarker(PERSON_KEY, "age", "18"), defaultMarker(PERSON_KEY, "nickname", '"anon"')])
    );

    const person = invoke(newBuilder(defaults, "Person", "Ada"), "build");
    expect(field(person, "age")).toBe(18);
    expect(field(person, "nickname")).toBe("anon");
  });

  it("exposes the companion object when requested", () => {
    const withCompanion = generate(createPersonDescriptor({ generateNamespaceHook: true }));
    const person = withCompanion.Person;

    expect(typeof person).toBe("function");
    expect(typeof person === "function" ? Reflect.get(person, "Companion") : undefined).toEqual({});
  });
});
