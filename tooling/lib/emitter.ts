/**
 * Emission adapter
 * Renders a ClassPlan to TypeScript source and writes one output unit per type
 * through a ts-morph Project.
 */

import { posix } from "node:path";
import { CodeBlockWriter, Project } from "ts-morph";
import { EmissionError } from "./errors";
import { BuilderPlan, ClassMember, ClassPlan, EqualityCheck, FactoryPlan, ParameterPlan } from "./plan";
import { ImportRef } from "./types";

export type RenderOptions = {
  /** Package name, or a project-relative path starting with `.` that is rebased per unit */
  runtimeModule: string;
  /** Project-relative output root */
  outputDir: string;
};

export interface EmissionSink {
  /**
   * Write one unit; resolves to the written path
   */
  write(unitName: string, packagePath: string, plan: ClassPlan): Promise<string>;
}

export function outputPathFor(options: RenderOptions, packagePath: string, unitName: string): string {
  return posix.join(options.outputDir, packagePath, `${unitName}.ts`);
}

/**
 * Relative module specifier from a directory to a project-relative module
 */
export function relativeSpecifier(fromDir: string, target: string): string {
  const relativePath = posix.relative(fromDir, target);
  return relativePath.startsWith(".") ? relativePath : `./${relativePath}`;
}

type ImportGroup = {
  module: string;
  defaultName?: string;
  namespaceName?: string;
  named: string[];
};

/**
 * Module specifier of the runtime helpers as seen from one output unit
 */
export function runtimeSpecifier(runtimeModule: string, unitDir: string): string {
  return runtimeModule.startsWith(".") ? relativeSpecifier(unitDir, posix.normalize(runtimeModule)) : runtimeModule;
}

function rebase(ref: ImportRef, unitDir: string): string {
  return ref.projectRelative ? relativeSpecifier(unitDir, ref.module) : ref.module;
}

function groupImports(refs: ImportRef[], unitDir: string): ImportGroup[] {
  const groups = new Map<string, ImportGroup>();

  for (const ref of refs) {
    const module = rebase(ref, unitDir);
    let group = groups.get(module);
    if (!group) {
      group = { module, named: [] };
      groups.set(module, group);
    }

    if (ref.kind === "default") {
      group.defaultName = ref.name;
    } else if (ref.kind === "namespace") {
      group.namespaceName = ref.name;
    } else {
      const binding = ref.alias ? `${ref.name} as ${ref.alias}` : ref.name;
      if (!group.named.includes(binding)) {
        group.named.push(binding);
      }
    }
  }

  return [...groups.values()];
}

function importStatements(group: ImportGroup): string[] {
  const statements: string[] = [];
  const from = JSON.stringify(group.module);

  if (group.namespaceName) {
    statements.push(`import * as ${group.namespaceName} from ${from};`);
  }

  const clauses: string[] = [];
  if (group.defaultName) clauses.push(group.defaultName);
  if (group.named.length > 0) clauses.push(`{ ${group.named.join(", ")} }`);
  if (clauses.length > 0) {
    statements.push(`import ${clauses.join(", ")} from ${from};`);
  }

  return statements;
}

export type ImportDirective = { kind: "import"; ref: ImportRef } | { kind: "side-effect"; module: string; projectRelative: boolean };

/**
 * `module#Name` imports a named export; a bare module is a side-effect import.
 * Relative modules are resolved against the source package.
 */
export function parseImportDirective(directive: string, packagePath: string): ImportDirective {
  const hashIndex = directive.lastIndexOf("#");
  const rawModule = hashIndex >= 0 ? directive.slice(0, hashIndex) : directive;
  const name = hashIndex >= 0 ? directive.slice(hashIndex + 1) : "";
  const projectRelative = rawModule.startsWith(".");
  const module = projectRelative ? posix.join(packagePath, rawModule) : rawModule;

  if (!name) {
    return { kind: "side-effect", module, projectRelative };
  }
  return { kind: "import", ref: { module, projectRelative, kind: "named", name } };
}

function writeDoc(writer: CodeBlockWriter, text: string | undefined): void {
  if (!text) return;
  writer.writeLine("/**");
  for (const line of text.split("\n")) {
    writer.writeLine(line.length > 0 ? ` * ${line}` : " *");
  }
  writer.writeLine(" */");
}

function parameterList(parameters: ParameterPlan[]): string {
  return parameters.map((p) => `${p.name}: ${p.type}`).join(", ");
}

function equalityExpression(check: EqualityCheck): string {
  const self = `this.${check.property}`;
  const other = `other.${check.property}`;
  switch (check.strategy) {
    case "numeric-order":
      return `compareNumbers(${self}, ${other}) === 0`;
    case "numeric-order-absent-as-zero":
      return `compareNumbers(${self} ?? 0, ${other} ?? 0) === 0`;
    case "value-equality":
      return `valuesEqual(${self}, ${other})`;
  }
}

function writeBuilder(writer: CodeBlockWriter, className: string, builder: BuilderPlan): void {
  writeDoc(writer, builder.documentation);
  writer.write(`public static readonly ${builder.name} = class ${builder.name} `).inlineBlock(() => {
    for (const field of builder.fields) {
      writeDoc(writer, field.documentation);
      const initializer = field.mandatory ? "" : ` = ${field.initializer}`;
      writer.writeLine(`public ${field.name}: ${field.type}${initializer};`);
    }

    if (builder.constructorParameters.length > 0) {
      writer.blankLine();
      writer.write(`constructor(${parameterList(builder.constructorParameters)})`).block(() => {
        for (const parameter of builder.constructorParameters) {
          writer.writeLine(`this.${parameter.name} = ${parameter.name};`);
        }
      });
    }

    for (const setter of builder.setters) {
      writer.blankLine();
      writeDoc(writer, setter.documentation);
      writer.write(`public ${setter.name}(${setter.property}: ${setter.type}): this`).block(() => {
        writer.writeLine(`this.${setter.property} = ${setter.property};`);
        writer.writeLine("return this;");
      });
    }

    writer.blankLine();
    writeDoc(writer, builder.build.documentation);
    writer.write(`public build(): ${className}`).block(() => {
      for (const name of builder.build.presenceChecks) {
        writer.write(`if (this.${name} === undefined || this.${name} === null)`).block(() => {
          writer.writeLine(`throw new Error(${JSON.stringify(`Null ${name} found when building ${className}.`)});`);
        });
      }
      const args = builder.build.arguments.map((name) => `this.${name}`).join(", ");
      writer.writeLine(`return new ${className}(${args});`);
    });
  });
  writer.write(";").newLine();
}

function writeMember(writer: CodeBlockWriter, plan: ClassPlan, member: ClassMember): void {
  switch (member.kind) {
    case "constructor":
      writer.write(`${member.visibility} constructor(${parameterList(member.parameters)})`).block(() => {
        for (const parameter of member.parameters) {
          writer.writeLine(`this.${parameter.name} = ${parameter.name};`);
        }
      });
      return;

    case "fields":
      member.fields.forEach((field, index) => {
        if (index > 0) writer.blankLine();
        writeDoc(writer, field.documentation);
        writer.writeLine(`public readonly ${field.name}: ${field.type};`);
      });
      return;

    case "toString": {
      const entries = member.properties.map((name) => `${name}=\${this.${name}}`).join(", ");
      writeDoc(writer, member.documentation);
      writer.write("public toString(): string").block(() => {
        writer.writeLine(`return \`${member.typeName}(${entries})\`;`);
      });
      return;
    }

    case "equals":
      writeDoc(writer, member.documentation);
      writer.write("public equals(other: unknown): boolean").block(() => {
        writer.writeLine("if (this === other) return true;");
        writer.writeLine(`if (!(other instanceof ${plan.name})) return false;`);
        if (member.checks.length === 0) {
          writer.writeLine("return true;");
          return;
        }
        const [first, ...rest] = member.checks.map(equalityExpression);
        writer.write(`return ${first}`);
        for (const expression of rest) {
          writer.newLine().write(`  && ${expression}`);
        }
        writer.write(";").newLine();
      });
      return;

    case "hashCode": {
      const args = member.properties.map((name) => `this.${name}`).join(", ");
      writeDoc(writer, member.documentation);
      writer.write("public hashCode(): number").block(() => {
        writer.writeLine(`return combineHash(${args});`);
      });
      return;
    }

    case "toBuilder": {
      const args = member.constructorArguments.map((name) => `this.${name}`).join(", ");
      writeDoc(writer, member.documentation);
      writer.write(`public toBuilder(): ${plan.name}.Builder`).block(() => {
        writer.write(`return new ${plan.name}.Builder(${args})`);
        for (const call of member.setterCalls) {
          writer.newLine().write(`  .${call.setter}(this.${call.property})`);
        }
        writer.write(";").newLine();
      });
      return;
    }

    case "builder":
      writeBuilder(writer, plan.name, member.builder);
      return;

    case "namespaceHook":
      writeDoc(writer, member.documentation);
      writer.writeLine(`public static readonly ${member.name} = {};`);
      return;
  }
}

function writeFactory(writer: CodeBlockWriter, className: string, factory: FactoryPlan): void {
  const parameters = parameterList([...factory.parameters, factory.configurator]);
  writeDoc(writer, factory.documentation);
  writer.write(`export function ${factory.name}(${parameters}): ${className}`).block(() => {
    const builder = factory.builderVariable;
    writer.writeLine(`const ${builder} = new ${className}.Builder(${factory.builderArguments.join(", ")});`);
    writer.writeLine(`${factory.configurator.name}(${builder});`);
    writer.writeLine(`return ${builder}.build();`);
  });
}

/**
 * Render the complete output unit for a plan. Deterministic for equal plans.
 */
export function renderClassPlan(plan: ClassPlan, options: RenderOptions): string {
  const writer = new CodeBlockWriter({ indentNumberOfSpaces: 2, newLine: "\n", useTabs: false });
  const unitDir = posix.join(options.outputDir, plan.packagePath);

  writer.writeLine(`// Code generated by datacompat from ${plan.sourceKey}. DO NOT EDIT.`);
  for (const rule of plan.suppressions) {
    writer.writeLine(`/* eslint-disable ${rule} */`);
  }

  const directives = plan.extraImportDirectives.map((directive) => parseImportDirective(directive, plan.packagePath));
  const refs = [...plan.typeImports];
  const sideEffects: string[] = [];
  for (const directive of directives) {
    if (directive.kind === "import") {
      refs.push(directive.ref);
    } else {
      const module = directive.projectRelative ? relativeSpecifier(unitDir, directive.module) : directive.module;
      if (!sideEffects.includes(module)) sideEffects.push(module);
    }
  }

  const runtime = runtimeSpecifier(options.runtimeModule, unitDir);
  writer.writeLine(`import { ${plan.runtimeHelpers.join(", ")} } from ${JSON.stringify(runtime)};`);
  for (const group of groupImports(refs, unitDir)) {
    importStatements(group).forEach((statement) => writer.writeLine(statement));
  }
  for (const module of sideEffects) {
    writer.writeLine(`import ${JSON.stringify(module)};`);
  }

  writer.blankLine();
  writeDoc(writer, plan.documentation);
  for (const decorator of plan.decorators) {
    writer.writeLine(decorator.text);
  }
  const heritage = plan.implementsTypes.length > 0 ? ` implements ${plan.implementsTypes.map((i) => i.text).join(", ")}` : "";
  writer.write(`export class ${plan.name}${heritage}`).block(() => {
    plan.members.forEach((member, index) => {
      if (index > 0) writer.blankLine();
      writeMember(writer, plan, member);
    });
  });

  writer.blankLine();
  writer.write(`export namespace ${plan.name}`).block(() => {
    writer.writeLine(`export type Builder = InstanceType<typeof ${plan.name}.Builder>;`);
  });

  writer.blankLine();
  writeFactory(writer, plan.name, plan.factory);

  return writer.toString();
}

/**
 * Writes units into a ts-morph Project so later rounds can resolve them
 */
export class ProjectEmissionSink implements EmissionSink {
  constructor(
    private project: Project,
    private projectRoot: string,
    private options: RenderOptions
  ) {}

  async write(unitName: string, packagePath: string, plan: ClassPlan): Promise<string> {
    const relativePath = outputPathFor(this.options, packagePath, unitName);
    const filePath = posix.join(this.projectRoot, relativePath);

    try {
      const text = renderClassPlan(plan, this.options);
      const sourceFile = this.project.createSourceFile(filePath, text, { overwrite: true });
      await sourceFile.save();
    } catch (error) {
      throw new EmissionError(plan.sourceKey, relativePath, error);
    }

    return filePath;
  }
}
