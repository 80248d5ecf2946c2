import type {
  AcquisitionTarget,
  CentralityScore,
  CommunityGroup,
  FrenemyRelationship,
  GraphConsistencyReport,
  GraphStatistics,
  PathResult,
  ProjectionRefreshResult,
  ProjectionSnapshot,
  SupplyChainVulnerability
} from "./types/analytics.js";
import type {
  Company,
  CompanyInput,
  RelationshipInput,
  RelationshipWriteResult
} from "./types/company.js";

export interface AlgorithmRunOptions {
  /** Aborting closes the underlying session and cancels the running query. */
  signal?: AbortSignal;
}

export interface AcquisitionTargetQuery {
  minCentrality: number;
  maxMarketCap: number;
  limit: number;
}

export interface CompanyStore {
  findByPermid(permid: number): Promise<Company | null>;
  findByName(name: string): Promise<Company | null>;
  findBySector(sector: string): Promise<Company[]>;
  findByCountry(country: string): Promise<Company[]>;
  findByMinMatchScore(threshold: number): Promise<Company[]>;
  upsertCompanies(companies: CompanyInput[]): Promise<number>;
}

export interface RelationshipStore {
  upsertRelationship(input: RelationshipInput): Promise<RelationshipWriteResult | null>;
  createCompetition(
    company1: string,
    company2: string,
    relationshipType: string,
    strength: number
  ): Promise<boolean>;
}

export interface GraphPatternStore {
  pathsWithinHops(
    startName: string,
    endName: string,
    maxHops: number,
    maxResults: number
  ): Promise<PathResult[]>;
  findSameCommunity(name: string): Promise<Company[]>;
  findFrenemies(): Promise<FrenemyRelationship[]>;
  findVulnerabilities(minDownstreamImpact: number): Promise<SupplyChainVulnerability[]>;
  findAcquisitionTargets(query: AcquisitionTargetQuery): Promise<AcquisitionTarget[]>;
}

/**
 * Server-side graph algorithms run over the current projection.
 */
export interface GraphAlgorithmEngine {
  shortestWeightedPaths(
    startName: string,
    endName: string,
    options?: AlgorithmRunOptions
  ): Promise<PathResult[]>;
  rankCentrality(topN: number, options?: AlgorithmRunOptions): Promise<CentralityScore[]>;
  bridgeCentrality(topN: number, options?: AlgorithmRunOptions): Promise<CentralityScore[]>;
  detectCommunities(options?: AlgorithmRunOptions): Promise<CommunityGroup[]>;
  refreshProjection(options?: AlgorithmRunOptions): Promise<ProjectionRefreshResult>;
  currentProjection(): ProjectionSnapshot | null;
}

export interface GraphMaintenanceStore {
  getStatistics(): Promise<GraphStatistics>;
  validateConsistency(): Promise<GraphConsistencyReport>;
  resetGraph(): Promise<number>;
}

export interface AbstractGraphStore
  extends CompanyStore,
    RelationshipStore,
    GraphPatternStore,
    GraphAlgorithmEngine,
    GraphMaintenanceStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
}
