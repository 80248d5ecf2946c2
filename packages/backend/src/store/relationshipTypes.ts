import type { CooperativeRelationshipType, RelationshipType } from "@supplygraph/shared";

export const COOPERATIVE_RELATIONSHIP_TYPES: readonly CooperativeRelationshipType[] = [
  "SUPPLY_COMPONENTS",
  "MANUFACTURES_FOR",
  "DESIGN_CHIPS_FOR",
  "PARTNER_WITH"
];

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  ...COOPERATIVE_RELATIONSHIP_TYPES,
  "COMPETES_WITH"
];

/** Symmetric relationships, projected without direction. */
export const UNDIRECTED_RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  "COMPETES_WITH",
  "PARTNER_WITH"
];

export function isCooperativeRelationshipType(value: string): value is CooperativeRelationshipType {
  return COOPERATIVE_RELATIONSHIP_TYPES.some((type) => type === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPES.some((type) => type === value);
}
