import neo4j, {
  Neo4jError,
  isDateTime,
  type Driver,
  type Node,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  AbstractGraphStore,
  AcquisitionTarget,
  AcquisitionTargetQuery,
  AlgorithmRunOptions,
  CentralityScore,
  CommunityGroup,
  CommunityMember,
  Company,
  CompanyInput,
  CooperativeRelationshipType,
  FrenemyRelationship,
  GraphConsistencyReport,
  GraphStatistics,
  PathResult,
  ProjectionRefreshResult,
  ProjectionSnapshot,
  RelationshipInput,
  RelationshipWriteResult,
  SupplyChainVulnerability
} from "@supplygraph/shared";
import { appConfig } from "../config.js";
import { AnalyticsError, GraphStoreError, StoreUnavailableError } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  COOPERATIVE_RELATIONSHIP_TYPES,
  RELATIONSHIP_TYPES,
  UNDIRECTED_RELATIONSHIP_TYPES,
  isCooperativeRelationshipType
} from "./relationshipTypes.js";
import { ProjectionManager } from "./ProjectionManager.js";

export interface Neo4jGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  projectionName: string;
  queryTimeoutMs: number;
}

type AccessMode = "READ" | "WRITE";

/** Yen's k for backup supplier routes. */
const BACKUP_ROUTE_COUNT = 3;

const TRANSIENT_DRIVER_CODES = new Set(["ServiceUnavailable", "SessionExpired"]);

export class Neo4jGraphStore implements AbstractGraphStore {
  private driver: Driver | null = null;
  private readonly projections: ProjectionManager;
  /** Company permids captured by each live projection, keyed by graph name. */
  private readonly projectedPermids = new Map<string, ReadonlySet<number>>();

  constructor(private readonly config: Neo4jGraphStoreConfig) {
    this.projections = new ProjectionManager(config.projectionName, {
      create: (graphName) => this.createProjection(graphName),
      drop: (graphName) => this.dropProjection(graphName)
    });
  }

  static fromEnv(): Neo4jGraphStore {
    return new Neo4jGraphStore({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE,
      projectionName: appConfig.GDS_PROJECTION_NAME,
      queryTimeoutMs: appConfig.NEO4J_QUERY_TIMEOUT_MS
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
      await this.ensureSchema();
    } catch (error) {
      await this.disconnect();
      throw this.toStoreError(error);
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.projections.dispose();
    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch (error) {
      logger.warn({ err: error }, "Neo4j health check failed");
      return false;
    }
  }

  async findByPermid(permid: number): Promise<Company | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company {permid: $permid})
        RETURN c
        LIMIT 1
        `,
        { permid: neo4j.int(permid) }
      );

      const record = result.records[0];
      if (!record) {
        return null;
      }

      return this.mapCompany(record.get("c"));
    });
  }

  async findByName(name: string): Promise<Company | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company {name: $name})
        RETURN c
        ORDER BY c.permid ASC
        LIMIT 1
        `,
        { name }
      );

      const record = result.records[0];
      if (!record) {
        return null;
      }

      return this.mapCompany(record.get("c"));
    });
  }

  async findBySector(sector: string): Promise<Company[]> {
    return this.findCompaniesWhere("c.industry_sector = $value", sector);
  }

  async findByCountry(country: string): Promise<Company[]> {
    return this.findCompaniesWhere("c.country = $value", country);
  }

  async findByMinMatchScore(threshold: number): Promise<Company[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company)
        WHERE c.match_score >= $minScore
        RETURN c
        ORDER BY c.match_score DESC, c.name ASC
        `,
        { minScore: threshold }
      );

      return result.records.map((record) => this.mapCompany(record.get("c")));
    });
  }

  async upsertCompanies(companies: CompanyInput[]): Promise<number> {
    if (companies.length === 0) {
      return 0;
    }

    return this.withSession("WRITE", async (session) => {
      // The incoming record wins when its match score is at least the stored one.
      const result = await session.run(
        `
        UNWIND $companies AS company
        MERGE (c:Company {permid: company.permid})
        ON CREATE SET c.ingestion_date = datetime()
        WITH c, company,
             coalesce(company.matchScore, 0.0) >= coalesce(c.match_score, 0.0) AS incomingWins
        FOREACH (_ IN CASE WHEN incomingWins THEN [1] ELSE [] END |
          SET
            c.name = company.name,
            c.match_score = coalesce(company.matchScore, c.match_score),
            c.is_final_assembler = coalesce(company.isFinalAssembler, c.is_final_assembler),
            c.industry_sector = coalesce(company.industrySector, c.industry_sector),
            c.country = coalesce(company.country, c.country),
            c.market_cap = coalesce(company.marketCap, c.market_cap),
            c.revenue = coalesce(company.revenue, c.revenue)
        )
        RETURN count(c) AS ingestedCount
        `,
        {
          companies: companies.map((company) => this.serializeCompany(company))
        }
      );

      return this.toNumber(result.records[0]?.get("ingestedCount"));
    });
  }

  async upsertRelationship(input: RelationshipInput): Promise<RelationshipWriteResult | null> {
    // Relationship types cannot be parameterized; only known types reach the query.
    if (!RELATIONSHIP_TYPES.includes(input.type)) {
      throw new GraphStoreError(`Unsupported relationship type: ${input.type}`);
    }

    return this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (source:Company {name: $sourceName})
        MATCH (target:Company {name: $targetName})
        MERGE (source)-[r:${input.type}]->(target)
        ON CREATE SET r.created_date = datetime(), r.reliability_score = 1.0, r.__created = true
        ON MATCH SET r.last_updated = datetime()
        SET r += $properties
        WITH source, target, r, coalesce(r.__created, false) AS created
        REMOVE r.__created
        RETURN source.name AS source, target.name AS target, created
        LIMIT 1
        `,
        {
          sourceName: input.sourceName,
          targetName: input.targetName,
          properties: this.serializeRelationshipProperties(input)
        }
      );

      const record = result.records[0];
      if (!record) {
        return null;
      }

      return {
        source: this.toString(record.get("source"), input.sourceName),
        target: this.toString(record.get("target"), input.targetName),
        type: input.type,
        created: record.get("created") === true
      };
    });
  }

  async createCompetition(
    company1: string,
    company2: string,
    relationshipType: string,
    strength: number
  ): Promise<boolean> {
    return this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (c1:Company {name: $company1})
        MATCH (c2:Company {name: $company2})
        MERGE (c1)-[forward:COMPETES_WITH]->(c2)
        ON CREATE SET forward.created_date = datetime()
        SET forward.relationship_type = $relationshipType,
            forward.strength = $strength,
            forward.reliability_score = coalesce(forward.reliability_score, 1.0)
        MERGE (c2)-[backward:COMPETES_WITH]->(c1)
        ON CREATE SET backward.created_date = datetime()
        SET backward.relationship_type = $relationshipType,
            backward.strength = $strength,
            backward.reliability_score = coalesce(backward.reliability_score, 1.0)
        RETURN count(*) AS written
        `,
        { company1, company2, relationshipType, strength }
      );

      return this.toNumber(result.records[0]?.get("written")) > 0;
    });
  }

  async shortestWeightedPaths(
    startName: string,
    endName: string,
    options: AlgorithmRunOptions = {}
  ): Promise<PathResult[]> {
    return this.projections.withProjection(async (projection) => {
      if (projection.nodeCount === 0 || projection.relationshipCount === 0) {
        return [];
      }

      return this.withSession(
        "READ",
        async (session) => {
          // Companies ingested after the projection was built are not in the in-memory graph,
          // and Yen rejects such endpoints, so they yield no route until the next refresh.
          const endpoints = await session.run(
            `
            MATCH (start:Company {name: $startName}), (end:Company {name: $endName})
            RETURN start.permid AS startPermid, end.permid AS endPermid
            `,
            { startName, endName },
            this.transactionConfig()
          );
          const projected = this.projectedPermids.get(projection.graphName) ?? new Set<number>();
          const startPermids = this.projectedEndpoints(endpoints.records, "startPermid", projected);
          const endPermids = this.projectedEndpoints(endpoints.records, "endPermid", projected);
          if (startPermids.length === 0 || endPermids.length === 0) {
            return [];
          }

          const result = await session.run(
            `
            MATCH (start:Company {name: $startName}), (end:Company {name: $endName})
            WHERE start.permid IN $startPermids AND end.permid IN $endPermids
            CALL gds.shortestPath.yens.stream($graphName, {
              sourceNode: start,
              targetNode: end,
              k: $k,
              relationshipWeightProperty: 'reliability_score'
            })
            YIELD index, sourceNode, targetNode, totalCost, nodeIds, costs
            RETURN gds.util.asNode(sourceNode).name AS source,
                   gds.util.asNode(targetNode).name AS target,
                   totalCost,
                   [nodeId IN nodeIds | gds.util.asNode(nodeId).name] AS pathNames,
                   costs
            ORDER BY totalCost ASC, index ASC
            `,
            {
              startName,
              endName,
              startPermids: startPermids.map((permid) => neo4j.int(permid)),
              endPermids: endPermids.map((permid) => neo4j.int(permid)),
              graphName: projection.graphName,
              k: neo4j.int(BACKUP_ROUTE_COUNT)
            },
            this.transactionConfig()
          );

          return result.records.map((record) => {
            const pathNames = this.toStringArray(record.get("pathNames"));
            return {
              source: this.toString(record.get("source"), startName),
              target: this.toString(record.get("target"), endName),
              pathNames,
              pathLength: Math.max(0, pathNames.length - 1),
              totalCost: this.toNumber(record.get("totalCost")),
              costs: this.toNumberArray(record.get("costs"))
            };
          });
        },
        options.signal
      );
    });
  }

  async pathsWithinHops(
    startName: string,
    endName: string,
    maxHops: number,
    maxResults: number
  ): Promise<PathResult[]> {
    // Variable-length bounds cannot be parameterized, so the validated hop count is inlined.
    const hops = Math.max(1, Math.floor(maxHops));

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH path = (start:Company {name: $startName})-[*1..${hops}]-(end:Company {name: $endName})
        WHERE start <> end
          AND ALL(node IN nodes(path) WHERE single(other IN nodes(path) WHERE other = node))
        WITH path,
             length(path) AS pathLength,
             [node IN nodes(path) | node.name] AS pathNames,
             [rel IN relationships(path) | coalesce(rel.reliability_score, 1.0)] AS costs
        WITH pathNames, pathLength, costs,
             reduce(total = 0.0, cost IN costs | total + cost) AS totalCost
        RETURN pathNames, pathLength, costs, totalCost
        ORDER BY pathLength ASC, totalCost ASC
        LIMIT $maxResults
        `,
        { startName, endName, maxResults: neo4j.int(maxResults) },
        this.transactionConfig()
      );

      return result.records.map((record) => ({
        source: startName,
        target: endName,
        pathNames: this.toStringArray(record.get("pathNames")),
        pathLength: this.toNumber(record.get("pathLength")),
        totalCost: this.toNumber(record.get("totalCost")),
        costs: this.toNumberArray(record.get("costs"))
      }));
    });
  }

  async rankCentrality(topN: number, options: AlgorithmRunOptions = {}): Promise<CentralityScore[]> {
    return this.streamCentrality(
      `
      CALL gds.pageRank.stream($graphName, {
        maxIterations: 20,
        dampingFactor: 0.85,
        tolerance: 0.0000001
      })
      YIELD nodeId, score
      WITH gds.util.asNode(nodeId) AS company, score
      `,
      topN,
      options
    );
  }

  async bridgeCentrality(topN: number, options: AlgorithmRunOptions = {}): Promise<CentralityScore[]> {
    return this.streamCentrality(
      `
      CALL gds.betweenness.stream($graphName)
      YIELD nodeId, score
      WITH gds.util.asNode(nodeId) AS company, score
      WHERE score > 0
      `,
      topN,
      options
    );
  }

  async detectCommunities(options: AlgorithmRunOptions = {}): Promise<CommunityGroup[]> {
    return this.projections.withProjection(async (projection) => {
      if (projection.nodeCount === 0) {
        return [];
      }

      return this.withSession(
        "READ",
        async (session) => {
          const result = await session.run(
            `
            CALL gds.louvain.stream($graphName, {
              maxIterations: 10,
              tolerance: 0.0001
            })
            YIELD nodeId, communityId
            WITH gds.util.asNode(nodeId) AS company, communityId
            WITH communityId,
                 collect({
                   name: company.name,
                   permid: company.permid,
                   isFinalAssembler: company.is_final_assembler
                 }) AS members,
                 count(company) AS communitySize
            RETURN communityId, members, communitySize
            ORDER BY communitySize DESC, communityId ASC
            `,
            { graphName: projection.graphName },
            this.transactionConfig()
          );

          return result.records.map((record) => ({
            communityId: this.toNumber(record.get("communityId")),
            members: this.toCommunityMembers(record.get("members")),
            communitySize: this.toNumber(record.get("communitySize"))
          }));
        },
        options.signal
      );
    });
  }

  async findSameCommunity(name: string): Promise<Company[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (target:Company {name: $name})
        WHERE target.community_id IS NOT NULL
        MATCH (related:Company)
        WHERE related.community_id = target.community_id AND related <> target
        RETURN related
        ORDER BY coalesce(related.pagerank_score, 0.0) DESC, related.name ASC
        `,
        { name }
      );

      return result.records.map((record) => this.mapCompany(record.get("related")));
    });
  }

  async findFrenemies(): Promise<FrenemyRelationship[]> {
    const cooperativeTypes = COOPERATIVE_RELATIONSHIP_TYPES.join("|");

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c1:Company)-[coop:${cooperativeTypes}]->(c2:Company)
        WHERE c1 <> c2 AND EXISTS { MATCH (c1)-[:COMPETES_WITH]-(c2) }
        WITH c1, c2, collect(DISTINCT type(coop)) AS cooperationTypes
        RETURN c1.name AS company1,
               c2.name AS company2,
               cooperationTypes,
               coalesce(c1.pagerank_score, 0.0) + coalesce(c2.pagerank_score, 0.0) AS combinedInfluence
        ORDER BY combinedInfluence DESC, company1 ASC, company2 ASC
        `
      );

      return result.records.map((record) => ({
        company1: this.toString(record.get("company1"), ""),
        company2: this.toString(record.get("company2"), ""),
        relationshipType: "FRENEMY" as const,
        cooperationTypes: this.toCooperativeTypes(record.get("cooperationTypes")),
        combinedInfluence: this.toNumber(record.get("combinedInfluence"))
      }));
    });
  }

  async findVulnerabilities(minDownstreamImpact: number): Promise<SupplyChainVulnerability[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (supplier:Company)-[:SUPPLY_COMPONENTS]->(customer:Company)
        WITH customer, collect(supplier) AS suppliers
        WHERE size(suppliers) = 1
        OPTIONAL MATCH (customer)-[:SUPPLY_COMPONENTS]->(downstream:Company)
        WITH customer, suppliers[0] AS singleSupplier, count(downstream) AS downstreamCount
        WHERE downstreamCount >= $minDownstream
        RETURN customer.name AS vulnerableCustomer,
               singleSupplier.name AS criticalSupplier,
               downstreamCount AS impactSize,
               coalesce(customer.pagerank_score, 0.0) AS customerImportance
        ORDER BY impactSize DESC, customerImportance DESC, vulnerableCustomer ASC
        `,
        { minDownstream: neo4j.int(minDownstreamImpact) }
      );

      return result.records.map((record) => ({
        vulnerableCustomer: this.toString(record.get("vulnerableCustomer"), ""),
        criticalSupplier: this.toString(record.get("criticalSupplier"), ""),
        impactSize: this.toNumber(record.get("impactSize")),
        customerImportance: this.toNumber(record.get("customerImportance"))
      }));
    });
  }

  async findAcquisitionTargets(query: AcquisitionTargetQuery): Promise<AcquisitionTarget[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company)
        WHERE c.pagerank_score IS NOT NULL
          AND c.market_cap IS NOT NULL
          AND c.market_cap > 0
          AND c.pagerank_score > $minCentrality
          AND c.market_cap < $maxMarketCap
        OPTIONAL MATCH (c)-[r:SUPPLY_COMPONENTS|COMPETES_WITH|PARTNER_WITH]-()
        WITH c, count(r) AS relationshipCount
        RETURN c.name AS companyName,
               c.permid AS permid,
               c.pagerank_score AS networkImportance,
               c.market_cap AS marketCap,
               relationshipCount AS networkSize,
               c.pagerank_score / (c.market_cap / 1000000.0) AS valueEfficiency
        ORDER BY valueEfficiency DESC, companyName ASC
        LIMIT $limit
        `,
        {
          minCentrality: query.minCentrality,
          maxMarketCap: query.maxMarketCap,
          limit: neo4j.int(query.limit)
        }
      );

      return result.records.map((record) => ({
        companyName: this.toString(record.get("companyName"), ""),
        permid: this.toNumber(record.get("permid")),
        networkImportance: this.toNumber(record.get("networkImportance")),
        marketCap: this.toNumber(record.get("marketCap")),
        networkSize: this.toNumber(record.get("networkSize")),
        valueEfficiency: this.toNumber(record.get("valueEfficiency"))
      }));
    });
  }

  async refreshProjection(options: AlgorithmRunOptions = {}): Promise<ProjectionRefreshResult> {
    await this.projections.refresh();

    return this.projections.withProjection(async (projection) => {
      if (projection.nodeCount === 0) {
        return {
          projection,
          pagerankScoresWritten: 0,
          betweennessScoresWritten: 0,
          communitiesWritten: 0
        };
      }

      return this.withSession(
        "WRITE",
        async (session) => {
          const params = { graphName: projection.graphName };
          const pagerank = await session.run(
            `
            CALL gds.pageRank.write($graphName, {
              writeProperty: 'pagerank_score',
              maxIterations: 20,
              dampingFactor: 0.85
            })
            YIELD nodePropertiesWritten
            RETURN nodePropertiesWritten
            `,
            params,
            this.transactionConfig()
          );
          const betweenness = await session.run(
            `
            CALL gds.betweenness.write($graphName, { writeProperty: 'betweenness_centrality' })
            YIELD nodePropertiesWritten
            RETURN nodePropertiesWritten
            `,
            params,
            this.transactionConfig()
          );
          const louvain = await session.run(
            `
            CALL gds.louvain.write($graphName, { writeProperty: 'community_id' })
            YIELD nodePropertiesWritten
            RETURN nodePropertiesWritten
            `,
            params,
            this.transactionConfig()
          );

          return {
            projection,
            pagerankScoresWritten: this.toNumber(pagerank.records[0]?.get("nodePropertiesWritten")),
            betweennessScoresWritten: this.toNumber(
              betweenness.records[0]?.get("nodePropertiesWritten")
            ),
            communitiesWritten: this.toNumber(louvain.records[0]?.get("nodePropertiesWritten"))
          };
        },
        options.signal
      );
    });
  }

  currentProjection(): ProjectionSnapshot | null {
    return this.projections.snapshot();
  }

  async getStatistics(): Promise<GraphStatistics> {
    return this.withSession("READ", async (session) => {
      const summary = await session.run(
        `
        MATCH (c:Company)
        OPTIONAL MATCH (c)-[r]-()
        WITH c, count(r) AS relationshipCount
        RETURN count(c) AS totalCompanies,
               avg(c.match_score) AS avgMatchScore,
               min(c.match_score) AS minMatchScore,
               max(c.match_score) AS maxMatchScore,
               avg(relationshipCount) AS avgRelationshipsPerCompany
        `
      );
      const distribution = await session.run(
        `
        MATCH (:Company)-[r]->(:Company)
        RETURN type(r) AS name, count(r) AS value
        ORDER BY value DESC
        `
      );

      const row = summary.records[0];
      const relationshipTypeDistribution: Record<string, number> = {};
      let totalRelationships = 0;
      for (const record of distribution.records) {
        const value = this.toNumber(record.get("value"));
        relationshipTypeDistribution[this.toString(record.get("name"), "UNKNOWN")] = value;
        totalRelationships += value;
      }

      return {
        totalCompanies: this.toNumber(row?.get("totalCompanies")),
        totalRelationships,
        relationshipTypeDistribution,
        avgMatchScore: this.toOptionalNumber(row?.get("avgMatchScore")) ?? null,
        minMatchScore: this.toOptionalNumber(row?.get("minMatchScore")) ?? null,
        maxMatchScore: this.toOptionalNumber(row?.get("maxMatchScore")) ?? null,
        avgRelationshipsPerCompany: this.toNumber(row?.get("avgRelationshipsPerCompany"))
      };
    });
  }

  async validateConsistency(): Promise<GraphConsistencyReport> {
    return this.withSession("READ", async (session) => {
      const count = async (query: string): Promise<number> => {
        const result = await session.run(query);
        return this.toNumber(result.records[0]?.get("count"));
      };

      return {
        companiesWithoutPermid: await count(
          "MATCH (c:Company) WHERE c.permid IS NULL RETURN count(c) AS count"
        ),
        companiesWithoutNames: await count(
          "MATCH (c:Company) WHERE c.name IS NULL OR trim(c.name) = '' RETURN count(c) AS count"
        ),
        duplicatePermids: await count(`
          MATCH (c:Company)
          WHERE c.permid IS NOT NULL
          WITH c.permid AS permid, count(c) AS occurrences
          WHERE occurrences > 1
          RETURN count(permid) AS count
        `),
        orphanedCompanies: await count(
          "MATCH (c:Company) WHERE NOT (c)--() RETURN count(c) AS count"
        ),
        relationshipsWithoutDates: await count(
          "MATCH (:Company)-[r]->(:Company) WHERE r.created_date IS NULL RETURN count(r) AS count"
        )
      };
    });
  }

  async resetGraph(): Promise<number> {
    const deleted = await this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company)
        DETACH DELETE c
        RETURN count(*) AS deleted
        `
      );
      return this.toNumber(result.records[0]?.get("deleted"));
    });

    this.projections.invalidate();
    logger.warn({ deleted }, "Graph reset: all companies deleted");
    return deleted;
  }

  private async streamCentrality(
    algorithmCall: string,
    topN: number,
    options: AlgorithmRunOptions
  ): Promise<CentralityScore[]> {
    return this.projections.withProjection(async (projection) => {
      if (projection.nodeCount === 0) {
        return [];
      }

      return this.withSession(
        "READ",
        async (session) => {
          const result = await session.run(
            `
            ${algorithmCall}
            RETURN company.name AS companyName,
                   company.permid AS permid,
                   score
            ORDER BY score DESC, companyName ASC
            LIMIT $topN
            `,
            { graphName: projection.graphName, topN: neo4j.int(topN) },
            this.transactionConfig()
          );

          return result.records.map((record) => ({
            companyName: this.toString(record.get("companyName"), ""),
            permid: this.toNumber(record.get("permid")),
            score: this.toNumber(record.get("score"))
          }));
        },
        options.signal
      );
    });
  }

  private async createProjection(
    graphName: string
  ): Promise<{ nodeCount: number; relationshipCount: number }> {
    return this.withSession("WRITE", async (session) => {
      const countResult = await session.run("MATCH (c:Company) RETURN count(c) AS companies");
      if (this.toNumber(countResult.records[0]?.get("companies")) === 0) {
        this.projectedPermids.set(graphName, new Set());
        return { nodeCount: 0, relationshipCount: 0 };
      }

      const relationshipTypes = RELATIONSHIP_TYPES.join("|");
      const result = await session.run(
        `
        MATCH (source:Company)
        OPTIONAL MATCH (source)-[r:${relationshipTypes}]->(target:Company)
        WITH gds.graph.project(
          $graphName,
          source,
          target,
          {
            relationshipType: type(r),
            relationshipProperties: { reliability_score: coalesce(r.reliability_score, 1.0) }
          },
          { undirectedRelationshipTypes: $undirectedTypes }
        ) AS projection,
        collect(DISTINCT source.permid) AS permids
        RETURN projection.nodeCount AS nodeCount,
               projection.relationshipCount AS relationshipCount,
               permids
        `,
        { graphName, undirectedTypes: [...UNDIRECTED_RELATIONSHIP_TYPES] },
        this.transactionConfig()
      );

      const row = result.records[0];
      this.projectedPermids.set(graphName, new Set(this.toNumberArray(row?.get("permids"))));
      return {
        nodeCount: this.toNumber(row?.get("nodeCount")),
        relationshipCount: this.toNumber(row?.get("relationshipCount"))
      };
    });
  }

  private async dropProjection(graphName: string): Promise<void> {
    this.projectedPermids.delete(graphName);
    await this.withSession("WRITE", async (session) => {
      await session.run("CALL gds.graph.drop($graphName, false) YIELD graphName RETURN graphName", {
        graphName
      });
    });
  }

  private async ensureSchema(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT company_permid_unique IF NOT EXISTS FOR (c:Company) REQUIRE c.permid IS UNIQUE`
      );
      await session.run(`CREATE INDEX company_name_idx IF NOT EXISTS FOR (c:Company) ON (c.name)`);
      await session.run(
        `CREATE INDEX company_match_score_idx IF NOT EXISTS FOR (c:Company) ON (c.match_score)`
      );
    });
  }

  private async findCompaniesWhere(predicate: string, value: string): Promise<Company[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Company)
        WHERE ${predicate}
        RETURN c
        ORDER BY c.name ASC
        `,
        { value }
      );

      return result.records.map((record) => this.mapCompany(record.get("c")));
    });
  }

  private async withSession<T>(
    accessMode: AccessMode,
    fn: (session: Session) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    signal?.throwIfAborted();

    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);
    const onAbort = (): void => {
      session.close().catch((error: unknown) => {
        logger.warn({ err: error }, "Failed to close aborted Neo4j session");
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await fn(session);
    } catch (error) {
      throw this.toStoreError(error);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await session.close();
    }
  }

  private transactionConfig(): { timeout: number } {
    return { timeout: this.config.queryTimeoutMs };
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new StoreUnavailableError("Neo4jGraphStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private toStoreError(error: unknown): Error {
    if (error instanceof AnalyticsError) {
      return error;
    }
    if (error instanceof Neo4jError) {
      const retryable =
        error.code.startsWith("Neo.TransientError") || TRANSIENT_DRIVER_CODES.has(error.code);
      return new GraphStoreError(error.message, error.code, { retryable, cause: error });
    }
    if (error instanceof Error) {
      return new GraphStoreError(error.message, undefined, { cause: error });
    }
    return new GraphStoreError(String(error));
  }

  private mapCompany(node: Node): Company {
    const props = this.asRecord(node.properties);
    const company: Company = {
      permid: this.toNumber(props.permid),
      name: this.toString(props.name, "")
    };

    const isFinalAssembler = props.is_final_assembler;
    if (typeof isFinalAssembler === "boolean") {
      company.isFinalAssembler = isFinalAssembler;
    }
    const matchScore = this.toOptionalNumber(props.match_score);
    if (matchScore !== undefined) {
      company.matchScore = matchScore;
    }
    const industrySector = this.toOptionalString(props.industry_sector);
    if (industrySector !== undefined) {
      company.industrySector = industrySector;
    }
    const country = this.toOptionalString(props.country);
    if (country !== undefined) {
      company.country = country;
    }
    const marketCap = this.toOptionalNumber(props.market_cap);
    if (marketCap !== undefined) {
      company.marketCap = marketCap;
    }
    const revenue = this.toOptionalNumber(props.revenue);
    if (revenue !== undefined) {
      company.revenue = revenue;
    }
    const ingestionDate = this.toOptionalDate(props.ingestion_date);
    if (ingestionDate !== undefined) {
      company.ingestionDate = ingestionDate;
    }
    const pagerankScore = this.toOptionalNumber(props.pagerank_score);
    if (pagerankScore !== undefined) {
      company.pagerankScore = pagerankScore;
    }
    const betweenness = this.toOptionalNumber(props.betweenness_centrality);
    if (betweenness !== undefined) {
      company.betweennessCentrality = betweenness;
    }
    const communityId = this.toOptionalNumber(props.community_id);
    if (communityId !== undefined) {
      company.communityId = communityId;
    }

    return company;
  }

  private serializeCompany(company: CompanyInput): Record<string, unknown> {
    return {
      permid: neo4j.int(company.permid),
      name: company.name.trim(),
      isFinalAssembler: company.isFinalAssembler ?? null,
      matchScore: company.matchScore ?? null,
      industrySector: company.industrySector ?? null,
      country: company.country ?? null,
      marketCap: company.marketCap ?? null,
      revenue: company.revenue ?? null
    };
  }

  private serializeRelationshipProperties(input: RelationshipInput): Record<string, unknown> {
    const properties: Record<string, unknown> = {};
    if (input.reliabilityScore !== undefined) {
      properties.reliability_score = input.reliabilityScore;
    }
    if (input.confidence !== undefined) {
      properties.confidence = input.confidence;
    }
    if (input.strength !== undefined) {
      properties.strength = input.strength;
    }
    if (input.contractValue !== undefined) {
      properties.contract_value = input.contractValue;
    }
    if (input.componentType !== undefined) {
      properties.component_type = input.componentType;
    }
    if (input.isExclusive !== undefined) {
      properties.is_exclusive = input.isExclusive;
    }
    return properties;
  }

  private toCommunityMembers(value: unknown): CommunityMember[] {
    if (!Array.isArray(value)) {
      return [];
    }

    return value.map((item: unknown) => {
      const raw = this.asRecord(item);
      const member: CommunityMember = {
        name: this.toString(raw.name, ""),
        permid: this.toNumber(raw.permid)
      };
      if (typeof raw.isFinalAssembler === "boolean") {
        member.isFinalAssembler = raw.isFinalAssembler;
      }
      return member;
    });
  }

  private toCooperativeTypes(value: unknown): CooperativeRelationshipType[] {
    return this.toStringArray(value).filter(isCooperativeRelationshipType);
  }

  private asRecord(value: unknown): Record<string, unknown> {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return {};
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toOptionalString(value: unknown): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    return undefined;
  }

  private toStringArray(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => String(item));
  }

  private projectedEndpoints(
    records: Array<{ get(key: string): unknown }>,
    key: string,
    projected: ReadonlySet<number>
  ): number[] {
    const permids = records.map((record) => this.toNumber(record.get(key)));
    return [...new Set(permids)].filter((permid) => projected.has(permid));
  }

  private toNumberArray(value: unknown): number[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => this.toNumber(item));
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return neo4j.integer.toNumber(value);
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }

  private toOptionalNumber(value: unknown): number | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.toNumber(value);
  }

  private toOptionalDate(value: unknown): Date | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? undefined : value;
    }
    if (isDateTime(value) || typeof value === "string") {
      const parsed = new Date(value.toString());
      return Number.isNaN(parsed.getTime()) ? undefined : parsed;
    }
    return undefined;
  }
}
