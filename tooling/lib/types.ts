/**
 * Shared type definitions for the datacompat build system
 */

import { LogLevel } from "./logger";

export type Config = {
  envSearchPaths?: string[];
  tsConfigPath?: string;
  sourceGlobs?: string[];
  outputDir?: string;
  runtimeModule?: string;
  maxRounds?: number;
  logLevel?: LogLevel;
};

/**
 * Identity of an owning type: `<project-relative file>#<class name>`.
 */
export type TypeKey = string;

export type TypeExpression = {
  text: string;
  nullable: boolean;
  floating: boolean;
  /** Literal for the absent value of a nullable type: `undefined` when the type admits it, else `null` */
  absentLiteral?: "undefined" | "null";
};

export type PropertyDescriptor = {
  name: string;
  type: TypeExpression;
  documentation?: string;
};

export type AnnotationRef = {
  name: string;
  text: string;
};

export type InterfaceRef = {
  text: string;
};

export type ImportKind = "named" | "default" | "namespace";

/**
 * An import the output unit needs. `projectRelative` modules are
 * project-root-relative paths without extension and get rebased on emit.
 */
export type ImportRef = {
  module: string;
  projectRelative: boolean;
  kind: ImportKind;
  name: string;
  alias?: string;
};

export type TypeDescriptor = {
  key: TypeKey;
  simpleName: string;
  packageName: string;
  properties: PropertyDescriptor[];
  documentation?: string;
  passThroughAnnotations: AnnotationRef[];
  implementedCapabilities: InterfaceRef[];
  generateNamespaceHook: boolean;
  extraImportDirectives: string[];
  typeImports: ImportRef[];
};

export type AggregateKind = "data" | "class" | "abstract-class";

export type Visibility = "private" | "public";

export type CandidateDeclaration = {
  key: TypeKey;
  simpleName?: string;
  qualifiedName?: string;
  kind: AggregateKind;
  visibility: Visibility;
  typeParameters: string[];
  location: string;
  unresolvedReferences: string[];
  descriptor: TypeDescriptor;
};

export type SymbolNodeKind = "aggregate" | "function" | "parameter" | "other";

/**
 * Host-neutral enclosing-declaration chain, walked upward from a marker.
 */
export type SymbolNode = {
  kind: SymbolNodeKind;
  key?: TypeKey;
  parent?: SymbolNode;
};

export type DefaultMarker = {
  parameterName: string;
  expression: string | undefined;
  declaration: SymbolNode;
  location: string;
};

export type DefaultCollision = {
  owner: TypeKey;
  propertyName: string;
  previous: string | undefined;
  next: string | undefined;
};

export type DefaultValueIndex = {
  entries: Map<TypeKey, Map<string, string | undefined>>;
  collisions: DefaultCollision[];
};

export type ValidationRule =
  | "missing-qualified-name"
  | "not-data-kind"
  | "not-private"
  | "has-type-parameters"
  | "missing-suffix";

export type ValidationResult = { ok: true } | { ok: false; rule: ValidationRule; message: string };

export type ClassifiedProperty = PropertyDescriptor & {
  isMandatory: boolean;
  defaultExpression?: string;
};

export type ClassifiedType = {
  descriptor: TypeDescriptor;
  outputName: string;
  properties: ClassifiedProperty[];
};

export type CandidateOutcome = "emitted" | "rejected" | "deferred" | "failed" | "unresolved";
