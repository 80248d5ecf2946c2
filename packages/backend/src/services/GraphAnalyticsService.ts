import type {
  AbstractGraphStore,
  AcquisitionTarget,
  AgentAnalysisRequest,
  AgentAnalysisResult,
  CentralityAnalysisReport,
  CentralityResult,
  CommunityGroup,
  Company,
  CompanyInput,
  CompetitionInput,
  CompetitionWriteResult,
  FraudAnalysisResult,
  FrenemyRelationship,
  GraphConsistencyReport,
  GraphContext,
  GraphStatistics,
  PathResult,
  ProjectionRefreshResult,
  ProjectionSnapshot,
  RelationshipInput,
  RelationshipWriteResult,
  SupplyChainVulnerability,
  TradingIntelligenceResult
} from "@supplygraph/shared";
import { ForbiddenOperationError, InvalidArgumentError, NotFoundError } from "../errors.js";
import { isRelationshipType } from "../store/relationshipTypes.js";
import { logger } from "../utils/logger.js";
import type { AnalysisExecutor } from "./AnalysisExecutor.js";
import { toCentralityResults, withReliability } from "./enrichment.js";

export interface GraphAnalyticsServiceOptions {
  maxPathHops: number;
  allowGraphReset: boolean;
}

export interface AnalysisCallOptions {
  /** Cancels the analysis, e.g. when the HTTP client disconnects. */
  signal?: AbortSignal;
}

const defaultOptions: GraphAnalyticsServiceOptions = {
  maxPathHops: 10,
  allowGraphReset: false
};

const COMPREHENSIVE_TOP_N = 25;
const AGENT_CONTEXT_TOP_N = 50;
const FRAUD_SCAN_TOP_N = 10;
const ACQUISITION_TARGET_LIMIT = 20;
const TRADING_MAX_MARKET_CAP = 100_000_000_000;

export const COMPREHENSIVE_INSIGHTS = [
  "Companies appearing in both PageRank and Betweenness top 10 are critically important",
  "High PageRank with low Betweenness indicates influential but not controlling position",
  "High Betweenness with low PageRank indicates strategic bottleneck position"
];

export const TRADING_INSIGHTS = [
  "Complex competitor relationships indicate market consolidation opportunities",
  "High centrality companies with low market cap present strategic investment potential",
  "Supply chain vulnerabilities create both risks and opportunities"
];

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new InvalidArgumentError(`${field} must not be blank`);
  }
  return trimmed;
}

function requireDistinct(first: string, second: string, fields: [string, string]): void {
  if (first === second) {
    throw new InvalidArgumentError(`${fields[0]} and ${fields[1]} must be different companies`);
  }
}

function requirePositiveInteger(value: number, field: string, max?: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${field} must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw new InvalidArgumentError(`${field} must be at most ${max}`);
  }
  return value;
}

function requireNonNegativeInteger(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative integer`);
  }
  return value;
}

function requireUnitInterval(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(`${field} must be between 0 and 1`);
  }
  return value;
}

function requireNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative number`);
  }
  return value;
}

/**
 * Validates inputs, dispatches to the graph store and enriches raw results.
 * Algorithm calls run on the analysis executor.
 */
export class GraphAnalyticsService {
  private readonly options: GraphAnalyticsServiceOptions;

  constructor(
    private readonly store: AbstractGraphStore,
    private readonly executor: AnalysisExecutor,
    options: Partial<GraphAnalyticsServiceOptions> = {}
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  // ----- entity queries -----

  async findCompanyByName(name: string): Promise<Company | null> {
    return this.store.findByName(requireText(name, "name"));
  }

  async findCompanyByPermid(permid: number): Promise<Company | null> {
    return this.store.findByPermid(requirePositiveInteger(permid, "permid"));
  }

  async findCompaniesBySector(sector: string): Promise<Company[]> {
    return this.store.findBySector(requireText(sector, "sector"));
  }

  async findCompaniesByCountry(country: string): Promise<Company[]> {
    return this.store.findByCountry(requireText(country, "country"));
  }

  async getHighConfidenceCompanies(minMatchScore = 0.8): Promise<Company[]> {
    return this.store.findByMinMatchScore(requireUnitInterval(minMatchScore, "minMatchScore"));
  }

  async batchIngestCompanies(companies: CompanyInput[]): Promise<number> {
    if (companies.length === 0) {
      throw new InvalidArgumentError("companies must not be empty");
    }

    // Every record is checked before anything is written.
    const normalized = companies.map((company, index) => this.normalizeCompany(company, index));
    const count = await this.store.upsertCompanies(normalized);
    logger.info({ received: companies.length, ingested: count }, "Companies ingested");
    return count;
  }

  async createRelationship(input: RelationshipInput): Promise<RelationshipWriteResult> {
    const sourceName = requireText(input.sourceName, "sourceName");
    const targetName = requireText(input.targetName, "targetName");
    requireDistinct(sourceName, targetName, ["sourceName", "targetName"]);
    if (!isRelationshipType(input.type)) {
      throw new InvalidArgumentError(`Unsupported relationship type: ${input.type}`);
    }

    const normalized: RelationshipInput = { ...input, sourceName, targetName };
    if (input.reliabilityScore !== undefined) {
      requireUnitInterval(input.reliabilityScore, "reliabilityScore");
    }
    if (input.confidence !== undefined) {
      requireUnitInterval(input.confidence, "confidence");
    }
    if (input.strength !== undefined) {
      requireUnitInterval(input.strength, "strength");
    }
    if (input.contractValue !== undefined) {
      requireNonNegative(input.contractValue, "contractValue");
    }

    const result = await this.store.upsertRelationship(normalized);
    if (!result) {
      throw new NotFoundError(`Both companies must exist: ${sourceName}, ${targetName}`);
    }
    return result;
  }

  async createCompetitionRelationship(input: CompetitionInput): Promise<CompetitionWriteResult> {
    const company1 = requireText(input.company1, "company1");
    const company2 = requireText(input.company2, "company2");
    requireDistinct(company1, company2, ["company1", "company2"]);
    const relationshipType = requireText(input.relationshipType ?? "DIRECT", "relationshipType");
    const strength = requireUnitInterval(input.strength ?? 0.5, "strength");

    const written = await this.store.createCompetition(company1, company2, relationshipType, strength);
    if (!written) {
      throw new NotFoundError(`Both companies must exist: ${company1}, ${company2}`);
    }
    return { company1, company2, relationshipType, strength };
  }

  // ----- path finding -----

  async findBackupSupplierRoutes(
    startCompany: string,
    endCompany: string,
    options: AnalysisCallOptions = {}
  ): Promise<PathResult[]> {
    const start = requireText(startCompany, "startCompany");
    const end = requireText(endCompany, "endCompany");
    requireDistinct(start, end, ["startCompany", "endCompany"]);

    const paths = await this.executor.run(
      "backup-supplier-routes",
      (signal) => this.store.shortestWeightedPaths(start, end, { signal }),
      options
    );
    return withReliability(paths);
  }

  async findConstrainedPaths(
    startCompany: string,
    endCompany: string,
    maxHops = 5,
    maxResults = 10
  ): Promise<PathResult[]> {
    const start = requireText(startCompany, "startCompany");
    const end = requireText(endCompany, "endCompany");
    requireDistinct(start, end, ["startCompany", "endCompany"]);
    requirePositiveInteger(maxHops, "maxHops", this.options.maxPathHops);
    requirePositiveInteger(maxResults, "maxResults");

    const paths = await this.store.pathsWithinHops(start, end, maxHops, maxResults);
    return withReliability(paths);
  }

  // ----- centrality -----

  async analyzeCriticalNodes(topN = 20, options: AnalysisCallOptions = {}): Promise<CentralityResult[]> {
    requirePositiveInteger(topN, "topN");
    const scores = await this.executor.run(
      "pagerank",
      (signal) => this.store.rankCentrality(topN, { signal }),
      options
    );
    return toCentralityResults(scores, "PAGERANK");
  }

  async analyzeBridgeNodes(topN = 15, options: AnalysisCallOptions = {}): Promise<CentralityResult[]> {
    requirePositiveInteger(topN, "topN");
    const scores = await this.executor.run(
      "betweenness",
      (signal) => this.store.bridgeCentrality(topN, { signal }),
      options
    );
    return toCentralityResults(scores, "BETWEENNESS");
  }

  async performComprehensiveCentralityAnalysis(
    options: AnalysisCallOptions = {}
  ): Promise<CentralityAnalysisReport> {
    const [pageRankResults, betweennessResults] = await Promise.all([
      this.analyzeCriticalNodes(COMPREHENSIVE_TOP_N, options),
      this.analyzeBridgeNodes(COMPREHENSIVE_TOP_N, options)
    ]);

    return {
      pageRankResults,
      betweennessResults,
      combinedInsights: [...COMPREHENSIVE_INSIGHTS]
    };
  }

  // ----- communities and patterns -----

  async detectSupplyChainCommunities(options: AnalysisCallOptions = {}): Promise<CommunityGroup[]> {
    return this.executor.run(
      "louvain",
      (signal) => this.store.detectCommunities({ signal }),
      options
    );
  }

  async findRelatedCompanies(targetCompany: string): Promise<Company[]> {
    return this.store.findSameCommunity(requireText(targetCompany, "targetCompany"));
  }

  async analyzeFrenemyRelationships(): Promise<FrenemyRelationship[]> {
    return this.store.findFrenemies();
  }

  async assessSupplyChainVulnerabilities(
    minDownstreamImpact = 3
  ): Promise<SupplyChainVulnerability[]> {
    return this.store.findVulnerabilities(
      requireNonNegativeInteger(minDownstreamImpact, "minDownstreamImpact")
    );
  }

  async identifyAcquisitionTargets(
    minCentrality = 0.01,
    maxMarketCap = 50_000_000_000
  ): Promise<AcquisitionTarget[]> {
    requireNonNegative(minCentrality, "minCentrality");
    if (!Number.isFinite(maxMarketCap) || maxMarketCap <= 0) {
      throw new InvalidArgumentError("maxMarketCap must be a positive number");
    }

    return this.store.findAcquisitionTargets({
      minCentrality,
      maxMarketCap,
      limit: ACQUISITION_TARGET_LIMIT
    });
  }

  // ----- projection and maintenance -----

  async refreshGraphProjection(options: AnalysisCallOptions = {}): Promise<ProjectionRefreshResult> {
    const result = await this.executor.run(
      "projection-refresh",
      (signal) => this.store.refreshProjection({ signal }),
      options
    );
    logger.info(
      {
        graphName: result.projection.graphName,
        pagerankScoresWritten: result.pagerankScoresWritten,
        communitiesWritten: result.communitiesWritten
      },
      "Graph projection refreshed"
    );
    return result;
  }

  getProjectionSnapshot(): ProjectionSnapshot | null {
    return this.store.currentProjection();
  }

  async getGraphStatistics(): Promise<GraphStatistics> {
    return this.store.getStatistics();
  }

  async validateGraphConsistency(): Promise<GraphConsistencyReport> {
    return this.store.validateConsistency();
  }

  async resetGraph(): Promise<number> {
    if (!this.options.allowGraphReset) {
      throw new ForbiddenOperationError(
        "Graph reset is disabled. Set ALLOW_GRAPH_RESET=true to enable it."
      );
    }
    return this.store.resetGraph();
  }

  // ----- agent integration -----

  async getGraphContextForAgent(
    query: string,
    entityNames: string[],
    options: AnalysisCallOptions = {}
  ): Promise<GraphContext> {
    const normalizedQuery = requireText(query, "query");
    const names = entityNames.map((name) => name.trim()).filter((name) => name.length > 0);

    const [lookups, centralityResults] = await Promise.all([
      Promise.all(names.map((name) => this.store.findByName(name))),
      this.analyzeCriticalNodes(AGENT_CONTEXT_TOP_N, options)
    ]);

    return {
      query: normalizedQuery,
      entities: lookups.filter((company): company is Company => company !== null),
      centralityResults
    };
  }

  async executeAgentAnalysis(
    request: AgentAnalysisRequest,
    options: AnalysisCallOptions = {}
  ): Promise<AgentAnalysisResult> {
    switch (request.analysisType) {
      case "PATHFINDING":
        return {
          analysisType: "PATHFINDING",
          result: await this.findBackupSupplierRoutes(
            request.parameters.source,
            request.parameters.target,
            options
          )
        };
      case "CENTRALITY":
        return {
          analysisType: "CENTRALITY",
          result: await this.analyzeCriticalNodes(request.parameters.topN, options)
        };
      case "COMMUNITY":
        return {
          analysisType: "COMMUNITY",
          result: await this.detectSupplyChainCommunities(options)
        };
      case "VULNERABILITY":
        return {
          analysisType: "VULNERABILITY",
          result: await this.assessSupplyChainVulnerabilities(request.parameters.minImpact)
        };
      default: {
        const unsupported: never = request;
        throw new InvalidArgumentError(`Unknown analysis type: ${String(unsupported)}`);
      }
    }
  }

  // ----- financial use cases -----

  async detectFraudPatterns(
    timeWindow = "30d",
    minRiskScore = 0.7,
    options: AnalysisCallOptions = {}
  ): Promise<FraudAnalysisResult> {
    const window = requireText(timeWindow, "timeWindow");
    requireUnitInterval(minRiskScore, "minRiskScore");

    const nodes = await this.analyzeCriticalNodes(FRAUD_SCAN_TOP_N, options);
    return {
      timeWindow: window,
      minRiskScore,
      suspiciousEntities: nodes
        .filter((node) => node.centralityScore > minRiskScore)
        .map((node) => `Suspicious pattern detected for: ${node.companyName}`)
    };
  }

  async generateTradingIntelligence(
    sector = "Technology",
    analysisDepth = 3
  ): Promise<TradingIntelligenceResult> {
    const normalizedSector = requireText(sector, "sector");
    requirePositiveInteger(analysisDepth, "analysisDepth");

    const [competitiveRelationships, investmentOpportunities] = await Promise.all([
      this.analyzeFrenemyRelationships(),
      this.identifyAcquisitionTargets(0.01, TRADING_MAX_MARKET_CAP)
    ]);

    return {
      sector: normalizedSector,
      analysisDepth,
      competitiveRelationships,
      investmentOpportunities,
      insights: [...TRADING_INSIGHTS]
    };
  }

  private normalizeCompany(company: CompanyInput, index: number): CompanyInput {
    const field = (name: string): string => `companies[${index}].${name}`;
    requirePositiveInteger(company.permid, field("permid"));
    const normalized: CompanyInput = { ...company, name: requireText(company.name, field("name")) };

    if (company.matchScore !== undefined) {
      requireUnitInterval(company.matchScore, field("matchScore"));
    }
    if (company.marketCap !== undefined) {
      requireNonNegative(company.marketCap, field("marketCap"));
    }
    if (company.revenue !== undefined) {
      requireNonNegative(company.revenue, field("revenue"));
    }
    return normalized;
  }
}
