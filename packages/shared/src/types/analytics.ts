import type { CooperativeRelationshipType, Company } from "./company.js";

export interface PathResult {
  source: string;
  target: string;
  pathNames: string[];
  /** Number of hops, one less than the number of companies on the path. */
  pathLength: number;
  totalCost: number;
  costs?: number[];
  reliabilityScore?: number;
}

export type CentralityType = "PAGERANK" | "BETWEENNESS";

export type Criticality = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export interface CentralityScore {
  companyName: string;
  permid: number;
  score: number;
}

export interface CentralityResult {
  companyName: string;
  permid: number;
  centralityScore: number;
  centralityType: CentralityType;
  rank: number;
  criticality: Criticality;
}

export interface CentralityAnalysisReport {
  pageRankResults: CentralityResult[];
  betweennessResults: CentralityResult[];
  combinedInsights: string[];
}

export interface CommunityMember {
  name: string;
  permid: number;
  isFinalAssembler?: boolean;
}

export interface CommunityGroup {
  communityId: number;
  members: CommunityMember[];
  communitySize: number;
}

export interface FrenemyRelationship {
  company1: string;
  company2: string;
  relationshipType: "FRENEMY";
  cooperationTypes: CooperativeRelationshipType[];
  combinedInfluence: number;
}

export interface SupplyChainVulnerability {
  vulnerableCustomer: string;
  criticalSupplier: string;
  impactSize: number;
  customerImportance: number;
}

export interface AcquisitionTarget {
  companyName: string;
  permid: number;
  networkImportance: number;
  marketCap: number;
  networkSize: number;
  valueEfficiency: number;
}

export interface ProjectionSnapshot {
  graphName: string;
  version: number;
  nodeCount: number;
  relationshipCount: number;
  createdAt: Date;
}

export interface ProjectionRefreshResult {
  projection: ProjectionSnapshot;
  pagerankScoresWritten: number;
  betweennessScoresWritten: number;
  communitiesWritten: number;
}

export interface GraphStatistics {
  totalCompanies: number;
  totalRelationships: number;
  relationshipTypeDistribution: Record<string, number>;
  avgMatchScore: number | null;
  minMatchScore: number | null;
  maxMatchScore: number | null;
  avgRelationshipsPerCompany: number;
}

export interface GraphConsistencyReport {
  companiesWithoutPermid: number;
  companiesWithoutNames: number;
  duplicatePermids: number;
  orphanedCompanies: number;
  relationshipsWithoutDates: number;
}

export interface GraphContext {
  query: string;
  entities: Company[];
  centralityResults: CentralityResult[];
}

export interface FraudAnalysisResult {
  timeWindow: string;
  minRiskScore: number;
  suspiciousEntities: string[];
}

export interface TradingIntelligenceResult {
  sector: string;
  analysisDepth: number;
  competitiveRelationships: FrenemyRelationship[];
  investmentOpportunities: AcquisitionTarget[];
  insights: string[];
}

export type AgentAnalysisRequest =
  | { analysisType: "PATHFINDING"; parameters: { source: string; target: string } }
  | { analysisType: "CENTRALITY"; parameters: { topN?: number | undefined } }
  | { analysisType: "COMMUNITY"; parameters: Record<string, never> }
  | { analysisType: "VULNERABILITY"; parameters: { minImpact?: number | undefined } };

export type AgentAnalysisType = AgentAnalysisRequest["analysisType"];

export type AgentAnalysisResult =
  | { analysisType: "PATHFINDING"; result: PathResult[] }
  | { analysisType: "CENTRALITY"; result: CentralityResult[] }
  | { analysisType: "COMMUNITY"; result: CommunityGroup[] }
  | { analysisType: "VULNERABILITY"; result: SupplyChainVulnerability[] };
