import {
  type ClassDeclaration,
  type Decorator,
  Node,
  type SourceFile,
} from "ts-morph";
import type {
  DeclarationKind,
  Entity,
  KindHint,
  Properties,
  Relationship,
  RelationshipType,
  StereotypeKind,
} from "../../shared/GraphTypes.js";
import { generateEntityId, generateFileId } from "../generateEntityId.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";
import {
  type DecoratorMetadata,
  parseDecoratorMetadata,
  readNameList,
} from "./parseDecoratorMetadata.js";
import {
  placeholderRelationship,
  resolvedRelationship,
} from "./relationships.js";

/**
 * Decorator name → entity kind. Anything else leaves the class a plain `Class`.
 */
const STEREOTYPE_DECORATORS: Readonly<Record<string, StereotypeKind>> = {
  Component: "Component",
  Injectable: "Service",
  NgModule: "Module",
  Pipe: "Pipe",
  Directive: "Directive",
};

/**
 * Metadata keys copied onto the entity for each stereotype
 * (source key → property name).
 */
const RECORDED_METADATA: Readonly<
  Record<StereotypeKind, ReadonlyArray<readonly [string, string]>>
> = {
  Component: [
    ["selector", "selector"],
    ["templateUrl", "templateUrl"],
    ["styleUrls", "styleUrls"],
    ["styleUrl", "styleUrl"],
    ["standalone", "standalone"],
  ],
  Service: [["providedIn", "providedIn"]],
  Module: [
    ["declarations", "declarations"],
    ["imports", "imports"],
    ["providers", "providers"],
    ["exports", "exports"],
    ["bootstrap", "bootstrap"],
  ],
  Pipe: [
    ["name", "pipeName"],
    ["pure", "pure"],
    ["standalone", "standalone"],
  ],
  Directive: [
    ["selector", "selector"],
    ["standalone", "standalone"],
  ],
};

/**
 * NgModule list → relationship type and the kind hint of its placeholders.
 */
const MODULE_LISTS: ReadonlyArray<
  readonly [string, RelationshipType, KindHint]
> = [
  ["declarations", "DECLARES", "Any"],
  ["imports", "IMPORTS_MODULE", "Module"],
  ["providers", "PROVIDES", "Service"],
  ["exports", "EXPORTS_MODULE", "Any"],
  ["bootstrap", "BOOTSTRAPS", "Component"],
];

interface Stereotype {
  kind: DeclarationKind;
  properties: Properties;
  relationships: Relationship[];
}

/**
 * Classify a standalone `imports` entry by naming convention.
 *
 * @example
 * classifyStandaloneImport("DatePipe") // => ["USES_PIPE", "Pipe"]
 * classifyStandaloneImport("HighlightDirective") // => ["USES_DIRECTIVE", "Directive"]
 * classifyStandaloneImport("FormsModule") // => ["IMPORTS_MODULE", "Module"]
 */
export const classifyStandaloneImport = (
  name: string,
): readonly [RelationshipType, KindHint] => {
  if (name.endsWith("Pipe")) {
    return ["USES_PIPE", "Pipe"];
  }
  if (name.endsWith("Directive") || name.endsWith("Component")) {
    return ["USES_DIRECTIVE", "Directive"];
  }
  return ["IMPORTS_MODULE", "Module"];
};

const stereotypeRelationships = (
  kind: StereotypeKind,
  metadata: DecoratorMetadata,
): Relationship[] => {
  if (kind === "Module") {
    return MODULE_LISTS.flatMap(([key, type, hint]) =>
      readNameList(metadata, key).map((name) =>
        placeholderRelationship(type, hint, name),
      ),
    );
  }

  if (kind === "Component" || kind === "Directive") {
    const providers = [
      ...readNameList(metadata, "providers"),
      ...readNameList(metadata, "viewProviders"),
    ].map((name) => placeholderRelationship("PROVIDES", "Service", name));
    const imports = readNameList(metadata, "imports").map((name) => {
      const [type, hint] = classifyStandaloneImport(name);
      return placeholderRelationship(type, hint, name);
    });
    return [...providers, ...imports];
  }

  return [];
};

/**
 * Determine kind, recorded metadata and module-list relationships from the
 * decorators attached to a class.
 */
export const classifyDecorators = (
  decorators: readonly Decorator[],
): Stereotype => {
  const stereotype: Stereotype = {
    kind: "Class",
    properties: {},
    relationships: [],
  };

  for (const decorator of decorators) {
    const kind = STEREOTYPE_DECORATORS[decorator.getName()];
    if (!kind) {
      continue;
    }

    const metadata = parseDecoratorMetadata(decorator);
    stereotype.kind = kind;
    for (const [sourceKey, propertyName] of RECORDED_METADATA[kind]) {
      const value = metadata[sourceKey];
      if (value !== undefined) {
        stereotype.properties[propertyName] = value;
      }
    }
    stereotype.relationships.push(...stereotypeRelationships(kind, metadata));
  }

  return stereotype;
};

/**
 * Bare type name of a parameter's declared type, without namespace or type
 * arguments. Keyword, union and literal types yield undefined.
 *
 * @example
 * // constructor(private store: Store<AppState>) → "Store"
 * // constructor(http: ng.HttpClient)            → "HttpClient"
 * // constructor(id: string)                     → undefined
 */
const referencedTypeName = (typeNode: Node | undefined): string | undefined => {
  if (!Node.isTypeReference(typeNode)) {
    return undefined;
  }
  const typeName = typeNode.getTypeName();
  return Node.isQualifiedName(typeName)
    ? typeName.getRight().getText()
    : typeName.getText();
};

const extractInjections = (
  classDecl: ClassDeclaration,
): { relationships: Relationship[]; bindings: string[] } => {
  const relationships: Relationship[] = [];
  const bindings: string[] = [];

  const constructors = classDecl.getConstructors();
  const constructorDecl =
    constructors.find((c) => c.isImplementation()) ?? constructors[0];

  for (const parameter of constructorDecl?.getParameters() ?? []) {
    const nameNode = parameter.getNameNode();
    const typeName = referencedTypeName(parameter.getTypeNode());
    if (!Node.isIdentifier(nameNode) || typeName === undefined) {
      continue;
    }
    const parameterName = nameNode.getText();
    bindings.push(`${parameterName}:${typeName}`);
    relationships.push(
      placeholderRelationship("INJECTS", "Service", typeName, {
        parameterName,
      }),
    );
  }

  // Field injection: `private readonly alpha = inject(AlphaService);`
  for (const property of classDecl.getProperties()) {
    const initializer = property.getInitializer();
    if (!Node.isCallExpression(initializer)) {
      continue;
    }
    const callee = initializer.getExpression();
    const [token] = initializer.getArguments();
    if (
      Node.isIdentifier(callee) &&
      callee.getText() === "inject" &&
      Node.isIdentifier(token)
    ) {
      relationships.push(
        placeholderRelationship("INJECTS", "Service", token.getText(), {
          propertyName: property.getName(),
        }),
      );
    }
  }

  return { relationships, bindings };
};

const extractImplements = (classDecl: ClassDeclaration): Relationship[] =>
  classDecl.getImplements().flatMap((clause) => {
    const expression = clause.getExpression();
    const name = Node.isPropertyAccessExpression(expression)
      ? expression.getName()
      : expression.getText();
    return [placeholderRelationship("IMPLEMENTS", "Interface", name)];
  });

const extractMethodEntities = (
  classDecl: ClassDeclaration,
  className: string,
  filePath: string,
): Entity[] => {
  const fileId = generateFileId(filePath);
  const seen = new Set<string>();
  const methods: Entity[] = [];

  for (const method of classDecl.getMethods()) {
    const memberName = `${className}.${method.getName()}`;
    if (seen.has(memberName)) {
      continue;
    }
    seen.add(memberName);

    methods.push({
      id: generateEntityId(filePath, memberName),
      kind: "Method",
      name: memberName,
      filePath,
      properties: {
        static: method.isStatic(),
        async: method.isAsync(),
        visibility: method.getScope(),
        startLine: method.getStartLineNumber(),
        endLine: method.getEndLineNumber(),
      },
      relationships: [resolvedRelationship("DEFINED_IN", fileId)],
    });
  }

  return methods;
};

/**
 * Extract class-like entities (and their methods) from the top-level class
 * declarations of a file.
 *
 * Every placeholder names its destination by bare name only: the path of a
 * decorator-listed or injected entity is unknown until every project has been
 * scanned.
 */
export const extractClassEntities = (
  sourceFile: SourceFile,
  context: FileAnalysisContext,
): Entity[] => {
  const { filePath } = context;
  const fileId = generateFileId(filePath);
  const entities: Entity[] = [];

  for (const classDecl of sourceFile.getClasses()) {
    const className = classDecl.getName();
    if (className === undefined) {
      continue;
    }

    const decorators = classDecl.getDecorators();
    const stereotype = classifyDecorators(decorators);
    const injections = extractInjections(classDecl);
    const methods = extractMethodEntities(classDecl, className, filePath);

    const properties: Properties = {
      exported: classDecl.isExported(),
      abstract: classDecl.isAbstract(),
      startLine: classDecl.getStartLineNumber(),
      endLine: classDecl.getEndLineNumber(),
      ...stereotype.properties,
    };
    const extendsClause = classDecl.getExtends();
    if (extendsClause) {
      properties.extends = extendsClause.getExpression().getText();
    }
    if (decorators.length > 0) {
      properties.decorators = decorators.map((d) => d.getName());
    }
    if (injections.bindings.length > 0) {
      properties.constructorParameters = injections.bindings;
    }

    entities.push({
      id: generateEntityId(filePath, className),
      kind: stereotype.kind,
      name: className,
      filePath,
      properties,
      relationships: [
        resolvedRelationship("DEFINED_IN", fileId),
        ...methods.map((method) =>
          resolvedRelationship("HAS_MEMBER", method.id),
        ),
        ...stereotype.relationships,
        ...injections.relationships,
        ...extractImplements(classDecl),
      ],
    });
    entities.push(...methods);
  }

  return entities;
};
