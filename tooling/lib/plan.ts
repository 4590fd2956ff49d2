/**
 * Structural plan of one generated value class.
 * Produced by the synthesis engine, consumed only by the renderer.
 */

import { AnnotationRef, ImportRef, InterfaceRef, TypeKey } from "./types";

export type ParameterPlan = {
  name: string;
  type: string;
};

export type FieldPlan = {
  name: string;
  type: string;
  documentation: string;
};

export type EqualityStrategy = "numeric-order" | "numeric-order-absent-as-zero" | "value-equality";

export type EqualityCheck = {
  property: string;
  strategy: EqualityStrategy;
};

export type SetterCall = {
  setter: string;
  property: string;
};

export type BuilderFieldPlan = FieldPlan & {
  /** Mandatory fields are builder constructor parameters and carry no initializer. */
  mandatory: boolean;
  initializer?: string;
};

export type SetterPlan = {
  name: string;
  property: string;
  type: string;
  documentation: string;
};

export type BuilderPlan = {
  name: "Builder";
  documentation: string;
  constructorParameters: ParameterPlan[];
  fields: BuilderFieldPlan[];
  setters: SetterPlan[];
  build: {
    documentation: string;
    presenceChecks: string[];
    arguments: string[];
  };
};

export type FactoryPlan = {
  name: string;
  documentation: string;
  parameters: ParameterPlan[];
  configurator: ParameterPlan;
  /** Local holding the builder; never equal to a parameter name */
  builderVariable: string;
  builderArguments: string[];
};

export type RuntimeHelper = "combineHash" | "compareNumbers" | "valuesEqual";

export type ClassMember =
  | { kind: "constructor"; visibility: "private"; parameters: ParameterPlan[] }
  | { kind: "fields"; fields: FieldPlan[] }
  | { kind: "toString"; documentation: string; typeName: string; properties: string[] }
  | { kind: "equals"; documentation: string; checks: EqualityCheck[] }
  | { kind: "hashCode"; documentation: string; properties: string[] }
  | { kind: "toBuilder"; documentation: string; constructorArguments: string[]; setterCalls: SetterCall[] }
  | { kind: "builder"; builder: BuilderPlan }
  | { kind: "namespaceHook"; name: "Companion"; documentation: string };

export type ClassPlan = {
  sourceKey: TypeKey;
  name: string;
  packagePath: string;
  documentation?: string;
  decorators: AnnotationRef[];
  implementsTypes: InterfaceRef[];
  members: ClassMember[];
  factory: FactoryPlan;
  runtimeHelpers: RuntimeHelper[];
  typeImports: ImportRef[];
  extraImportDirectives: string[];
  suppressions: string[];
};
