import {
  DECLARATION_KINDS,
  type DeclarationKind,
  type KindHint,
} from "../shared/GraphTypes.js";

/**
 * Kinds a placeholder with the given hint may resolve to.
 * `Any` covers every declaration kind; a component is a directive.
 */
const HINT_KINDS: Record<KindHint, readonly DeclarationKind[]> = {
  Any: DECLARATION_KINDS,
  Service: ["Service"],
  Module: ["Module"],
  Component: ["Component"],
  Interface: ["Interface"],
  Pipe: ["Pipe"],
  Directive: ["Directive", "Component"],
};

export const candidateKinds = (hint: KindHint): readonly DeclarationKind[] =>
  HINT_KINDS[hint];
