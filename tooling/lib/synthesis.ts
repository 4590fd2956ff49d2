/**
 * Synthesis engine
 * Turns a classified type into the structural plan of its value class.
 * Pure and total: every classified type yields a plan.
 */

import { mandatoryProperties, optionalProperties } from "./classifier";
import { factoryName, freeName, humanizeLabel, setterName, setterPhrase } from "./naming";
import {
  BuilderPlan,
  ClassMember,
  ClassPlan,
  EqualityCheck,
  EqualityStrategy,
  FactoryPlan,
  ParameterPlan,
  RuntimeHelper,
} from "./plan";
import { ClassifiedProperty, ClassifiedType } from "./types";

export const ABSENT_SENTINEL = "undefined";
export const REDUNDANT_VISIBILITY_RULE = "@typescript-eslint/explicit-member-accessibility";

function equalityStrategy(property: ClassifiedProperty): EqualityStrategy {
  if (!property.type.floating) {
    return "value-equality";
  }
  return property.type.nullable ? "numeric-order-absent-as-zero" : "numeric-order";
}

function toParameter(property: ClassifiedProperty): ParameterPlan {
  return { name: property.name, type: property.type.text };
}

function documentationOf(property: ClassifiedProperty): string {
  return property.documentation ?? humanizeLabel(property.name);
}

function buildBuilderPlan(classified: ClassifiedType): BuilderPlan {
  const { outputName, properties } = classified;

  return {
    name: "Builder",
    documentation: `Composes and builds a {@link ${outputName}} object.\n\nThis is a concrete implementation of the builder design pattern.`,
    constructorParameters: mandatoryProperties(classified).map(toParameter),
    fields: properties.map((property) => ({
      name: property.name,
      type: property.type.text,
      documentation: documentationOf(property),
      mandatory: property.isMandatory,
      initializer: property.isMandatory
        ? undefined
        : property.defaultExpression ?? property.type.absentLiteral ?? ABSENT_SENTINEL,
    })),
    setters: properties.map((property) => ({
      name: setterName(property.name),
      property: property.name,
      type: property.type.text,
      documentation: `Setter for ${property.name}: ${setterPhrase(documentationOf(property))}.\n\n@param ${property.name}\n@return Builder`,
    })),
    build: {
      documentation: `Returns a {@link ${outputName}} reference to the object being constructed by the builder.\n\n@return ${outputName}`,
      presenceChecks: mandatoryProperties(classified).map((property) => property.name),
      arguments: properties.map((property) => property.name),
    },
  };
}

function buildFactoryPlan(classified: ClassifiedType): FactoryPlan {
  const { outputName } = classified;
  const mandatory = mandatoryProperties(classified);
  const taken = new Set(mandatory.map((property) => property.name));
  const configurator = freeName("initializer", taken);
  const builderVariable = freeName("builder", new Set([...taken, configurator]));

  return {
    name: factoryName(outputName),
    documentation: `Creates a {@link ${outputName}} through a DSL-style builder.\n\n@param ${configurator} the initialisation block\n@return ${outputName}`,
    parameters: mandatory.map(toParameter),
    configurator: { name: configurator, type: `(builder: ${outputName}.Builder) => void` },
    builderVariable,
    builderArguments: mandatory.map((property) => property.name),
  };
}

function runtimeHelpersFor(checks: EqualityCheck[]): RuntimeHelper[] {
  const helpers: RuntimeHelper[] = ["combineHash"];
  if (checks.some((check) => check.strategy !== "value-equality")) {
    helpers.push("compareNumbers");
  }
  if (checks.some((check) => check.strategy === "value-equality")) {
    helpers.push("valuesEqual");
  }
  return helpers;
}

export function synthesizeClass(classified: ClassifiedType): ClassPlan {
  const { descriptor, outputName, properties } = classified;
  const names = properties.map((property) => property.name);
  const checks: EqualityCheck[] = properties.map((property) => ({
    property: property.name,
    strategy: equalityStrategy(property),
  }));

  const members: ClassMember[] = [
    { kind: "constructor", visibility: "private", parameters: properties.map(toParameter) },
    {
      kind: "fields",
      fields: properties.map((property) => ({
        name: property.name,
        type: property.type.text,
        documentation: documentationOf(property),
      })),
    },
    { kind: "toString", documentation: "Overloaded toString function.", typeName: outputName, properties: names },
    { kind: "equals", documentation: "Overloaded equals function.", checks },
    {
      kind: "hashCode",
      documentation: "Overloaded hashCode function based on all class properties.",
      properties: names,
    },
    {
      kind: "toBuilder",
      documentation: "Convert to Builder allowing to change class properties.",
      constructorArguments: mandatoryProperties(classified).map((property) => property.name),
      setterCalls: optionalProperties(classified).map((property) => ({
        setter: setterName(property.name),
        property: property.name,
      })),
    },
    { kind: "builder", builder: buildBuilderPlan(classified) },
  ];

  if (descriptor.generateNamespaceHook) {
    members.push({
      kind: "namespaceHook",
      name: "Companion",
      documentation: `Public companion object of {@link ${outputName}}.`,
    });
  }

  return {
    sourceKey: descriptor.key,
    name: outputName,
    packagePath: descriptor.packageName,
    documentation: descriptor.documentation,
    decorators: [...descriptor.passThroughAnnotations],
    implementsTypes: [...descriptor.implementedCapabilities],
    members,
    factory: buildFactoryPlan(classified),
    runtimeHelpers: runtimeHelpersFor(checks),
    typeImports: [...descriptor.typeImports],
    extraImportDirectives: [...descriptor.extraImportDirectives],
    suppressions: [REDUNDANT_VISIBILITY_RULE],
  };
}
