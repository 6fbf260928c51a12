import type { RelationshipTarget } from "./GraphTypes.js";

/**
 * Render a relationship target in its display form.
 *
 * @example
 * formatTarget({ status: "placeholder", hint: "Service", name: "Alpha" })
 * // => "Service:Alpha:UNKNOWN_PATH"
 * formatTarget({ status: "unresolved", name: "Gamma" })
 * // => "Unresolved:Gamma"
 */
export const formatTarget = (target: RelationshipTarget): string => {
  switch (target.status) {
    case "resolved":
      return target.id;
    case "placeholder":
      return `${target.hint}:${target.name}:UNKNOWN_PATH`;
    case "file":
      return `File:${target.path}`;
    case "external":
      return `External:${target.specifier}`;
    case "unresolved":
      return `Unresolved:${target.name}`;
    case "ambiguous":
      return `Ambiguous:${target.name}`;
  }
};
