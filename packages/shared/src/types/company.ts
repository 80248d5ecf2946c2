export interface Company {
  permid: number;
  name: string;
  isFinalAssembler?: boolean;
  matchScore?: number;
  industrySector?: string;
  country?: string;
  marketCap?: number;
  revenue?: number;
  ingestionDate?: Date;
  pagerankScore?: number;
  betweennessCentrality?: number;
  communityId?: number;
}

/**
 * Attributes accepted by an upsert. Algorithm annotations are excluded:
 * only a projection refresh writes those.
 */
export type CompanyInput = Omit<
  Company,
  "ingestionDate" | "pagerankScore" | "betweennessCentrality" | "communityId"
>;

export type CooperativeRelationshipType =
  | "SUPPLY_COMPONENTS"
  | "MANUFACTURES_FOR"
  | "DESIGN_CHIPS_FOR"
  | "PARTNER_WITH";

export type RelationshipType = CooperativeRelationshipType | "COMPETES_WITH";

export interface RelationshipInput {
  sourceName: string;
  targetName: string;
  type: RelationshipType;
  reliabilityScore?: number;
  confidence?: number;
  strength?: number;
  contractValue?: number;
  componentType?: string;
  isExclusive?: boolean;
}

export interface RelationshipWriteResult {
  source: string;
  target: string;
  type: RelationshipType;
  created: boolean;
}

export interface CompetitionInput {
  company1: string;
  company2: string;
  relationshipType?: string;
  strength?: number;
}

export interface CompetitionWriteResult {
  company1: string;
  company2: string;
  relationshipType: string;
  strength: number;
}
