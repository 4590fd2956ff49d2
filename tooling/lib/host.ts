/**
 * ts-morph host adapter
 * Discovers @DataCompat candidates and @Default markers in a Project and
 * describes them in the host-neutral model.
 */

import { posix } from "node:path";
import {
  ClassDeclaration,
  ClassExpression,
  Decorator,
  Identifier,
  Node,
  ParameterDeclaration,
  Project,
  SourceFile,
  SyntaxKind,
  TypeNode,
} from "ts-morph";
import { normalizeDocumentation, stripCommentDelimiters } from "./naming";
import {
  AggregateKind,
  AnnotationRef,
  CandidateDeclaration,
  DefaultMarker,
  ImportRef,
  InterfaceRef,
  PropertyDescriptor,
  SymbolNode,
  TypeExpression,
  TypeKey,
} from "./types";

export const DATA_COMPAT_MARKER = "DataCompat";
export const DEFAULT_MARKER = "Default";

type MarkerOptions = {
  importsForDefaults: string[];
  generateCompanionObject: boolean;
};

function isResolved(node: Node): boolean {
  const symbol = node.getSymbol();
  if (!symbol) return false;
  const target = symbol.isAlias() ? symbol.getAliasedSymbol() : symbol;
  return target !== undefined && target.getDeclarations().length > 0;
}

function unresolvedTypeReferences(typeNode: TypeNode | undefined): string[] {
  if (!typeNode) return [];
  return [typeNode, ...typeNode.getDescendants()]
    .flatMap((node) => (Node.isTypeReference(node) ? [node.getTypeName()] : []))
    .filter((name) => !isResolved(name))
    .map((name) => name.getText());
}

function markerOptions(decorator: Decorator): MarkerOptions {
  const options: MarkerOptions = { importsForDefaults: [], generateCompanionObject: false };
  const argument = decorator.getArguments()[0];
  if (!argument || !Node.isObjectLiteralExpression(argument)) {
    return options;
  }

  const imports = argument.getProperty("importsForDefaults");
  if (imports && Node.isPropertyAssignment(imports)) {
    const initializer = imports.getInitializer();
    if (initializer && Node.isArrayLiteralExpression(initializer)) {
      for (const element of initializer.getElements()) {
        if (Node.isStringLiteral(element) || Node.isNoSubstitutionTemplateLiteral(element)) {
          options.importsForDefaults.push(element.getLiteralValue());
        }
      }
    }
  }

  const companion = argument.getProperty("generateCompanionObject");
  if (companion && Node.isPropertyAssignment(companion)) {
    options.generateCompanionObject = companion.getInitializer()?.getKind() === SyntaxKind.TrueKeyword;
  }

  return options;
}

function leadingDocComment(node: Node): string | undefined {
  const docs = node.getLeadingCommentRanges().filter((range) => range.getText().startsWith("/**"));
  const last = docs[docs.length - 1];
  if (!last) return undefined;
  const text = normalizeDocumentation(stripCommentDelimiters(last.getText())).trim();
  return text.length > 0 ? text : undefined;
}

function classDocumentation(cls: ClassDeclaration): string | undefined {
  const docs = cls.getJsDocs();
  const last = docs[docs.length - 1];
  if (!last) return undefined;
  const text = normalizeDocumentation(stripCommentDelimiters(last.getText()));
  return text.length > 0 ? text : undefined;
}

function topLevelUnionMembers(typeNode: TypeNode | undefined): TypeNode[] {
  if (!typeNode) return [];
  return Node.isUnionTypeNode(typeNode) ? typeNode.getTypeNodes() : [typeNode];
}

function isNullTypeNode(node: TypeNode): boolean {
  return Node.isLiteralTypeNode(node) && node.getLiteral().getKind() === SyntaxKind.NullKeyword;
}

export function describeParameterType(parameter: ParameterDeclaration): TypeExpression {
  const typeNode = parameter.getTypeNode();
  const type = parameter.getType();
  const members = topLevelUnionMembers(typeNode);
  const checkerParts = type.isUnion() ? type.getUnionTypes() : [type];

  const admitsUndefined =
    parameter.hasQuestionToken() ||
    members.some((member) => member.getKind() === SyntaxKind.UndefinedKeyword) ||
    checkerParts.some((part) => part.isUndefined());
  const admitsNull = members.some(isNullTypeNode) || checkerParts.some((part) => part.isNull());
  const nullable = admitsUndefined || admitsNull;

  let text = typeNode ? typeNode.getText() : type.getText(parameter);
  if (parameter.hasQuestionToken() && !members.some((member) => member.getKind() === SyntaxKind.UndefinedKeyword)) {
    text = `${text} | undefined`;
  }

  const valueMembers = members.filter(
    (member) => member.getKind() !== SyntaxKind.UndefinedKeyword && !isNullTypeNode(member)
  );
  const syntacticNumber = valueMembers.length === 1 && valueMembers[0].getKind() === SyntaxKind.NumberKeyword;
  const floating = syntacticNumber || type.getNonNullableType().isNumber();

  return {
    text,
    nullable,
    floating,
    absentLiteral: nullable ? (admitsUndefined ? "undefined" : "null") : undefined,
  };
}

export class TsMorphHost {
  private projectRoot: string;

  constructor(
    private project: Project,
    projectRoot: string
  ) {
    this.projectRoot = projectRoot.replace(/\\/g, "/");
  }

  getProject(): Project {
    return this.project;
  }

  sourceFiles(): SourceFile[] {
    return this.project
      .getSourceFiles()
      .filter((file) => !file.isDeclarationFile() && !file.isInNodeModules());
  }

  relativePath(file: SourceFile): string {
    return posix.relative(this.projectRoot, file.getFilePath());
  }

  typeKeyOf(cls: ClassDeclaration | ClassExpression): TypeKey {
    const file = this.relativePath(cls.getSourceFile());
    return `${file}#${cls.getName() ?? `<anonymous@${cls.getStart()}>`}`;
  }

  /**
   * Enclosing-declaration chain of a node, nearest first
   */
  symbolNodeOf(node: Node): SymbolNode {
    const parent = node.getParent();
    const parentNode = parent && !Node.isSourceFile(parent) ? this.symbolNodeOf(parent) : undefined;

    if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
      return { kind: "aggregate", key: this.typeKeyOf(node), parent: parentNode };
    }
    if (Node.isParameterDeclaration(node)) {
      return { kind: "parameter", parent: parentNode };
    }
    if (
      Node.isConstructorDeclaration(node) ||
      Node.isMethodDeclaration(node) ||
      Node.isFunctionDeclaration(node) ||
      Node.isArrowFunction(node) ||
      Node.isFunctionExpression(node)
    ) {
      return { kind: "function", parent: parentNode };
    }
    return { kind: "other", parent: parentNode };
  }

  /**
   * Every @Default marker on a parameter, across all source files
   */
  discoverDefaultMarkers(): DefaultMarker[] {
    const markers: DefaultMarker[] = [];

    for (const file of this.sourceFiles()) {
      for (const decorator of file.getDescendantsOfKind(SyntaxKind.Decorator)) {
        if (decorator.getName() !== DEFAULT_MARKER) continue;

        const parameter = decorator.getParent();
        if (!Node.isParameterDeclaration(parameter)) continue;

        const argument = decorator.getArguments()[0];
        const expression =
          argument && (Node.isStringLiteral(argument) || Node.isNoSubstitutionTemplateLiteral(argument))
            ? argument.getLiteralValue()
            : undefined;

        markers.push({
          parameterName: parameter.getName(),
          expression,
          declaration: this.symbolNodeOf(parameter),
          location: `${this.relativePath(file)}:${decorator.getStartLineNumber()}`,
        });
      }
    }

    return markers;
  }

  /**
   * Every class carrying @DataCompat, optionally restricted to some keys
   */
  discoverCandidates(keys?: ReadonlySet<TypeKey>): CandidateDeclaration[] {
    const candidates: CandidateDeclaration[] = [];

    for (const file of this.sourceFiles()) {
      for (const cls of file.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
        const marker = cls.getDecorator(DATA_COMPAT_MARKER);
        if (!marker) continue;
        if (keys && !keys.has(this.typeKeyOf(cls))) continue;
        candidates.push(this.describeCandidate(cls, marker));
      }
    }

    return candidates;
  }

  private aggregateKind(cls: ClassDeclaration): AggregateKind {
    if (cls.isAbstract()) return "abstract-class";

    const constructors = cls.getConstructors();
    if (cls.compilerNode.members.length !== 1 || constructors.length !== 1) return "class";

    const parameters = constructors[0].getParameters();
    const dataShaped =
      parameters.length > 0 && parameters.every((parameter) => parameter.isParameterProperty() && parameter.isReadonly());
    return dataShaped ? "data" : "class";
  }

  private propertyParameters(cls: ClassDeclaration): ParameterDeclaration[] {
    const constructor = cls.getConstructors()[0];
    if (!constructor) return [];
    return constructor.getParameters().filter((parameter) => parameter.isParameterProperty());
  }

  private collectImports(cls: ClassDeclaration, roots: Node[]): ImportRef[] {
    const file = cls.getSourceFile();
    const fileDir = posix.dirname(this.relativePath(file));
    const ownModule = this.relativePath(file).replace(/\.[cm]?tsx?$/, "");
    const seen = new Set<string>();
    const refs: ImportRef[] = [];

    const add = (ref: ImportRef) => {
      const id = `${ref.module}|${ref.kind}|${ref.name}|${ref.alias ?? ""}`;
      if (seen.has(id)) return;
      seen.add(id);
      refs.push(ref);
    };

    const moduleRef = (specifier: string): Pick<ImportRef, "module" | "projectRelative"> =>
      specifier.startsWith(".")
        ? { module: posix.join(fileDir, specifier), projectRelative: true }
        : { module: specifier, projectRelative: false };

    const identifiers: Identifier[] = roots.flatMap((root) => [
      ...(Node.isIdentifier(root) ? [root] : []),
      ...root.getDescendantsOfKind(SyntaxKind.Identifier),
    ]);

    for (const identifier of identifiers) {
      const parent = identifier.getParent();
      if (Node.isQualifiedName(parent) && parent.getRight() === identifier) continue;
      if (Node.isPropertyAccessExpression(parent) && parent.getNameNode() === identifier) continue;
      if (Node.isPropertyAssignment(parent) && parent.getNameNode() === identifier) continue;

      const declaration = identifier.getSymbol()?.getDeclarations()[0];
      if (!declaration) continue;

      if (Node.isImportSpecifier(declaration)) {
        add({
          ...moduleRef(declaration.getImportDeclaration().getModuleSpecifierValue()),
          kind: "named",
          name: declaration.getName(),
          alias: declaration.getAliasNode()?.getText(),
        });
      } else if (Node.isImportClause(declaration)) {
        const importDeclaration = declaration.getFirstAncestorByKind(SyntaxKind.ImportDeclaration);
        const defaultImport = declaration.getDefaultImport();
        if (importDeclaration && defaultImport) {
          add({
            ...moduleRef(importDeclaration.getModuleSpecifierValue()),
            kind: "default",
            name: defaultImport.getText(),
          });
        }
      } else if (Node.isNamespaceImport(declaration)) {
        const importDeclaration = declaration.getFirstAncestorByKind(SyntaxKind.ImportDeclaration);
        if (importDeclaration) {
          add({
            ...moduleRef(importDeclaration.getModuleSpecifierValue()),
            kind: "namespace",
            name: declaration.getName(),
          });
        }
      } else if (
        declaration.getSourceFile() === file &&
        (Node.isInterfaceDeclaration(declaration) ||
          Node.isClassDeclaration(declaration) ||
          Node.isTypeAliasDeclaration(declaration) ||
          Node.isEnumDeclaration(declaration) ||
          Node.isFunctionDeclaration(declaration) ||
          Node.isVariableDeclaration(declaration)) &&
        declaration.isExported()
      ) {
        add({ module: ownModule, projectRelative: true, kind: "named", name: identifier.getText() });
      }
    }

    return refs;
  }

  describeCandidate(cls: ClassDeclaration, marker: Decorator): CandidateDeclaration {
    const file = cls.getSourceFile();
    const relativeFile = this.relativePath(file);
    const packageDir = posix.dirname(relativeFile);
    const key = this.typeKeyOf(cls);
    const name = cls.getName();
    const options = markerOptions(marker);
    const unresolved: string[] = [];

    const parameters = this.propertyParameters(cls);
    const properties: PropertyDescriptor[] = parameters.map((parameter) => {
      unresolved.push(...unresolvedTypeReferences(parameter.getTypeNode()));
      return {
        name: parameter.getName(),
        type: describeParameterType(parameter),
        documentation: leadingDocComment(parameter),
      };
    });

    const passThrough = cls.getDecorators().filter((decorator) => decorator !== marker);
    const annotations: AnnotationRef[] = passThrough.map((decorator) => {
      if (!isResolved(decorator.getNameNode())) {
        unresolved.push(decorator.getName());
      }
      return { name: decorator.getName(), text: decorator.getText() };
    });

    const capabilities: InterfaceRef[] = [];
    const capabilityNodes: Node[] = [];
    for (const clause of cls.getImplements()) {
      const expression = clause.getExpression();
      const symbol = expression.getSymbol();
      const target = symbol?.isAlias() ? symbol.getAliasedSymbol() : symbol;
      const declarations = target?.getDeclarations() ?? [];
      if (declarations.length === 0) {
        unresolved.push(expression.getText());
        continue;
      }
      if (declarations.some((d) => Node.isInterfaceDeclaration(d) || Node.isTypeAliasDeclaration(d))) {
        capabilities.push({ text: clause.getText() });
        capabilityNodes.push(clause);
      }
    }

    const typeRoots: Node[] = [
      ...parameters.flatMap((parameter) => {
        const typeNode = parameter.getTypeNode();
        return typeNode ? [typeNode] : [];
      }),
      ...capabilityNodes,
      ...passThrough,
    ];

    return {
      key,
      simpleName: name,
      qualifiedName: name ? key : undefined,
      kind: this.aggregateKind(cls),
      visibility: cls.isExported() ? "public" : "private",
      typeParameters: cls.getTypeParameters().map((parameter) => parameter.getName()),
      location: `${relativeFile}:${cls.getStartLineNumber()}`,
      unresolvedReferences: unresolved,
      descriptor: {
        key,
        simpleName: name ?? "",
        packageName: packageDir === "." ? "" : packageDir,
        properties,
        documentation: classDocumentation(cls),
        passThroughAnnotations: annotations,
        implementedCapabilities: capabilities,
        generateNamespaceHook: options.generateCompanionObject,
        extraImportDirectives: options.importsForDefaults,
        typeImports: this.collectImports(cls, typeRoots),
      },
    };
  }
}
