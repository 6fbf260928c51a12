import {
  type Decorator,
  type Expression,
  Node,
  type ObjectLiteralExpression,
  SyntaxKind,
} from "ts-morph";
import type { PropertyValue } from "../../shared/GraphTypes.js";

export type DecoratorMetadata = Record<string, PropertyValue>;

/**
 * Opaque marker recorded for metadata values that are not literals.
 *
 * @example
 * complexValueMarker("CallExpression") // => "[Complex Value: CallExpression]"
 */
export const complexValueMarker = (kindName: string): string =>
  `[Complex Value: ${kindName}]`;

/**
 * Reduce a list entry to the bare name of the entity it refers to.
 *
 * - `AlphaService` → "AlphaService"
 * - `shared.SharedModule` → "SharedModule"
 * - `RouterModule.forRoot(routes)` → "RouterModule"
 * - `{ provide: Token, useClass: Impl }` → "Impl" (else useExisting, else provide)
 *
 * Spreads, function-call providers and other expressions yield undefined.
 */
export const toMemberName = (node: Node): string | undefined => {
  if (Node.isIdentifier(node)) {
    return node.getText();
  }

  if (Node.isPropertyAccessExpression(node)) {
    return node.getName();
  }

  if (Node.isCallExpression(node)) {
    const callee = node.getExpression();
    return Node.isPropertyAccessExpression(callee)
      ? toMemberName(callee.getExpression())
      : undefined;
  }

  if (Node.isObjectLiteralExpression(node)) {
    for (const key of ["useClass", "useExisting", "provide"]) {
      const property = node.getProperty(key);
      if (Node.isPropertyAssignment(property)) {
        const initializer = property.getInitializer();
        const name = initializer ? toMemberName(initializer) : undefined;
        if (name) {
          return name;
        }
      }
    }
  }

  return undefined;
};

const parseArrayElement = (element: Expression): string | undefined => {
  if (
    Node.isStringLiteral(element) ||
    Node.isNoSubstitutionTemplateLiteral(element)
  ) {
    return element.getLiteralValue();
  }
  return toMemberName(element);
};

/**
 * Convert a metadata initializer into a stored value.
 */
export const parseMetadataValue = (value: Expression): PropertyValue => {
  if (
    Node.isStringLiteral(value) ||
    Node.isNoSubstitutionTemplateLiteral(value)
  ) {
    return value.getLiteralValue();
  }
  if (Node.isNumericLiteral(value)) {
    return value.getLiteralValue();
  }
  if (value.getKind() === SyntaxKind.TrueKeyword) {
    return true;
  }
  if (value.getKind() === SyntaxKind.FalseKeyword) {
    return false;
  }
  if (Node.isArrayLiteralExpression(value)) {
    return value
      .getElements()
      .map(parseArrayElement)
      .filter((name): name is string => name !== undefined && name !== "");
  }
  if (Node.isIdentifier(value) || Node.isPropertyAccessExpression(value)) {
    return value.getText();
  }
  return complexValueMarker(value.getKindName());
};

/**
 * Parse the object literal passed to a stereotype decorator.
 * Only `key: value` assignments with identifier or string keys are read.
 */
export const parseObjectLiteralMetadata = (
  objectLiteral: ObjectLiteralExpression,
): DecoratorMetadata => {
  const metadata: DecoratorMetadata = {};

  for (const property of objectLiteral.getProperties()) {
    if (!Node.isPropertyAssignment(property)) {
      continue;
    }
    const nameNode = property.getNameNode();
    const key = Node.isStringLiteral(nameNode)
      ? nameNode.getLiteralValue()
      : Node.isIdentifier(nameNode)
        ? nameNode.getText()
        : undefined;
    const initializer = property.getInitializer();
    if (key === undefined || !initializer) {
      continue;
    }
    metadata[key] = parseMetadataValue(initializer);
  }

  return metadata;
};

/**
 * Metadata of a decorator call such as `@Component({ ... })`.
 * Decorators without an object literal argument yield an empty record.
 */
export const parseDecoratorMetadata = (
  decorator: Decorator,
): DecoratorMetadata => {
  const [firstArgument] = decorator.getArguments();
  return Node.isObjectLiteralExpression(firstArgument)
    ? parseObjectLiteralMetadata(firstArgument)
    : {};
};

/**
 * Read a metadata entry as a list of member names.
 * A single name (e.g. `bootstrap: AppComponent`) becomes a one-element list;
 * complex values yield an empty list.
 */
export const readNameList = (
  metadata: DecoratorMetadata,
  key: string,
): string[] => {
  const value = metadata[key];
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === "string" && !value.startsWith("[Complex Value:")) {
    return [value.includes(".") ? (value.split(".").pop() ?? value) : value];
  }
  return [];
};
