import type {
  EntityId,
  KindHint,
  Properties,
  Relationship,
  RelationshipType,
} from "../../shared/GraphTypes.js";

export const resolvedRelationship = (
  type: RelationshipType,
  id: EntityId,
  properties?: Properties,
): Relationship =>
  properties
    ? { type, target: { status: "resolved", id }, properties }
    : { type, target: { status: "resolved", id } };

export const placeholderRelationship = (
  type: RelationshipType,
  hint: KindHint,
  name: string,
  properties?: Properties,
): Relationship =>
  properties
    ? { type, target: { status: "placeholder", hint, name }, properties }
    : { type, target: { status: "placeholder", hint, name } };
