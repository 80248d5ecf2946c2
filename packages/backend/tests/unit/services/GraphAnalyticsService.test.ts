import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  ForbiddenOperationError,
  GraphStoreError,
  InvalidArgumentError,
  NotFoundError
} from "../../../src/errors.js";
import { AnalysisExecutor } from "../../../src/services/AnalysisExecutor.js";
import {
  COMPREHENSIVE_INSIGHTS,
  GraphAnalyticsService
} from "../../../src/services/GraphAnalyticsService.js";
import { FakeGraphStore } from "../../helpers/FakeGraphStore.js";
import { seedSupplyChain } from "../../helpers/testApp.js";

describe("GraphAnalyticsService", () => {
  let store: FakeGraphStore;
  let service: GraphAnalyticsService;

  beforeEach(async () => {
    store = new FakeGraphStore();
    await seedSupplyChain(store);
    service = new GraphAnalyticsService(
      store,
      new AnalysisExecutor({ timeoutMs: 5_000, maxRetries: 1, retryDelayMs: 1 }),
      { maxPathHops: 10 }
    );
  });

  it("applies the documented defaults", async () => {
    const rank = vi.spyOn(store, "rankCentrality");
    const bridge = vi.spyOn(store, "bridgeCentrality");
    const paths = vi.spyOn(store, "pathsWithinHops");
    const vulnerabilities = vi.spyOn(store, "findVulnerabilities");
    const targets = vi.spyOn(store, "findAcquisitionTargets");
    const confidence = vi.spyOn(store, "findByMinMatchScore");

    await service.analyzeCriticalNodes();
    await service.analyzeBridgeNodes();
    await service.findConstrainedPaths("Qualcomm", "TSMC");
    await service.assessSupplyChainVulnerabilities();
    await service.identifyAcquisitionTargets();
    await service.getHighConfidenceCompanies();

    expect(rank).toHaveBeenCalledWith(20, expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(bridge).toHaveBeenCalledWith(15, expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(paths).toHaveBeenCalledWith("Qualcomm", "TSMC", 5, 10);
    expect(vulnerabilities).toHaveBeenCalledWith(3);
    expect(targets).toHaveBeenCalledWith({
      minCentrality: 0.01,
      maxMarketCap: 50_000_000_000,
      limit: 20
    });
    expect(confidence).toHaveBeenCalledWith(0.8);
  });

  it("validates names, limits and thresholds before touching the store", async () => {
    const rank = vi.spyOn(store, "rankCentrality");

    await expect(service.findCompanyByName("   ")).rejects.toThrow("name must not be blank");
    await expect(service.findBackupSupplierRoutes("Apple", " Apple ")).rejects.toThrow(
      "startCompany and endCompany must be different companies"
    );
    await expect(service.analyzeCriticalNodes(0)).rejects.toThrow("topN must be a positive integer");
    await expect(service.analyzeCriticalNodes(2.5)).rejects.toThrow(InvalidArgumentError);
    await expect(service.findConstrainedPaths("Apple", "TSMC", 11)).rejects.toThrow(
      "maxHops must be at most 10"
    );
    await expect(service.assessSupplyChainVulnerabilities(-1)).rejects.toThrow(
      "minDownstreamImpact must be a non-negative integer"
    );
    await expect(service.getHighConfidenceCompanies(1.2)).rejects.toThrow(
      "minMatchScore must be between 0 and 1"
    );
    await expect(service.identifyAcquisitionTargets(0.01, 0)).rejects.toThrow(
      "maxMarketCap must be a positive number"
    );
    expect(rank).not.toHaveBeenCalled();
  });

  it("returns high-confidence companies in descending score order", async () => {
    const companies = await service.getHighConfidenceCompanies(0.95);

    expect(companies.map((company) => [company.name, company.matchScore])).toEqual([
      ["Apple", 0.98],
      ["Qualcomm", 0.96]
    ]);
  });

  it("checks every record of a batch before writing any", async () => {
    await expect(
      service.batchIngestCompanies([
        { permid: 10, name: "Bosch" },
        { permid: 11, name: "  " }
      ])
    ).rejects.toThrow("companies[1].name must not be blank");
    expect(store.companies.has(10)).toBe(false);

    await expect(service.batchIngestCompanies([])).rejects.toThrow("companies must not be empty");
    await expect(service.batchIngestCompanies([{ permid: 0, name: "Zero" }])).rejects.toThrow(
      "companies[0].permid must be a positive integer"
    );
  });

  it("keeps stored attributes when the incoming match score is lower", async () => {
    const before = await store.findByPermid(2);

    await service.batchIngestCompanies([
      { permid: 2, name: "Qualcomm Inc", matchScore: 0.5, country: "CA" }
    ]);
    expect(await store.findByPermid(2)).toMatchObject({
      name: "Qualcomm",
      matchScore: 0.96,
      country: "US"
    });

    await service.batchIngestCompanies([{ permid: 2, name: " Qualcomm Inc ", matchScore: 0.96 }]);
    const after = await store.findByPermid(2);
    expect(after).toMatchObject({ name: "Qualcomm Inc", matchScore: 0.96, country: "US" });
    expect(after?.ingestionDate).toEqual(before?.ingestionDate);
  });

  it("leaves the store unchanged when the same batch is applied twice", async () => {
    const batch = [
      { permid: 2, name: "Qualcomm", matchScore: 0.96, country: "US" },
      { permid: 20, name: "Infineon", matchScore: 0.71, country: "DE", marketCap: 4.5e10 }
    ];

    await service.batchIngestCompanies(batch);
    const once = [...store.companies.values()].map((company) => ({ ...company }));
    await service.batchIngestCompanies(batch);
    const twice = [...store.companies.values()].map((company) => ({ ...company }));

    expect(twice).toEqual(once);
    expect(twice).toHaveLength(5);
  });

  it("builds the comprehensive report from both centrality runs", async () => {
    const rank = vi.spyOn(store, "rankCentrality");
    const bridge = vi.spyOn(store, "bridgeCentrality");

    const report = await service.performComprehensiveCentralityAnalysis();

    expect(rank).toHaveBeenCalledWith(25, expect.anything());
    expect(bridge).toHaveBeenCalledWith(25, expect.anything());
    expect(report.pageRankResults.map((result) => result.companyName)).toEqual([
      "Apple",
      "Samsung",
      "Qualcomm",
      "TSMC"
    ]);
    expect(report.betweennessResults).toEqual([
      {
        companyName: "Apple",
        permid: 1,
        centralityScore: 2,
        centralityType: "BETWEENNESS",
        rank: 1,
        criticality: "CRITICAL"
      }
    ]);
    expect(report.combinedInsights).toEqual(COMPREHENSIVE_INSIGHTS);
  });

  it("retries an algorithm call after a transient store failure", async () => {
    store.failNextAlgorithm(
      new GraphStoreError("leader switch", "Neo.TransientError.Cluster.NotALeader", { retryable: true })
    );

    const results = await service.analyzeCriticalNodes(1);

    expect(results.map((result) => result.companyName)).toEqual(["Apple"]);
    expect(store.algorithmCalls).toBe(2);
  });

  it("finds the same cheapest route in both directions over undirected partnerships", async () => {
    const partners = new FakeGraphStore();
    await partners.upsertCompanies([
      { permid: 10, name: "Bosch" },
      { permid: 11, name: "Continental" },
      { permid: 12, name: "Denso" }
    ]);
    for (const [sourceName, targetName, reliabilityScore] of [
      ["Bosch", "Continental", 0.4],
      ["Continental", "Denso", 0.3],
      ["Bosch", "Denso", 0.9]
    ] as const) {
      await partners.upsertRelationship({ sourceName, targetName, type: "PARTNER_WITH", reliabilityScore });
    }
    const partnerService = new GraphAnalyticsService(partners, new AnalysisExecutor());

    const forward = await partnerService.findBackupSupplierRoutes("Bosch", "Denso");
    const backward = await partnerService.findBackupSupplierRoutes("Denso", "Bosch");

    expect(forward[0]?.totalCost).toBeCloseTo(0.7);
    expect(backward[0]?.totalCost).toBeCloseTo(0.7);
    expect(forward[0]?.pathNames).toEqual(["Bosch", "Continental", "Denso"]);
    expect(backward[0]?.pathNames).toEqual(["Denso", "Continental", "Bosch"]);
  });

  it("returns no scores for an empty graph", async () => {
    const emptyService = new GraphAnalyticsService(new FakeGraphStore(), new AnalysisExecutor());

    await expect(emptyService.analyzeCriticalNodes()).resolves.toEqual([]);
    await expect(emptyService.detectSupplyChainCommunities()).resolves.toEqual([]);
    await expect(emptyService.findBackupSupplierRoutes("Apple", "TSMC")).resolves.toEqual([]);
  });

  it("refuses to reset the graph unless enabled", async () => {
    await expect(service.resetGraph()).rejects.toBeInstanceOf(ForbiddenOperationError);
    expect(store.companies.size).toBe(4);

    const resettable = new GraphAnalyticsService(store, new AnalysisExecutor(), {
      allowGraphReset: true
    });
    await expect(resettable.resetGraph()).resolves.toBe(4);
    expect(store.companies.size).toBe(0);
  });

  it("reports missing endpoints when creating relationships", async () => {
    await expect(
      service.createRelationship({
        sourceName: "Qualcomm",
        targetName: "Nokia",
        type: "SUPPLY_COMPONENTS"
      })
    ).rejects.toBeInstanceOf(NotFoundError);

    await expect(
      service.createRelationship({
        sourceName: "Qualcomm",
        targetName: "TSMC",
        type: "DESIGN_CHIPS_FOR",
        reliabilityScore: 1.5
      })
    ).rejects.toThrow("reliabilityScore must be between 0 and 1");
  });

  it("dispatches agent requests to the matching analysis", async () => {
    const pathResult = await service.executeAgentAnalysis({
      analysisType: "PATHFINDING",
      parameters: { source: "Qualcomm", target: "Apple" }
    });
    expect(pathResult.analysisType).toBe("PATHFINDING");
    if (pathResult.analysisType === "PATHFINDING") {
      expect(pathResult.result.map((path) => path.pathNames)).toEqual([["Qualcomm", "Apple"]]);
    }

    const vulnerabilityResult = await service.executeAgentAnalysis({
      analysisType: "VULNERABILITY",
      parameters: {}
    });
    expect(vulnerabilityResult).toEqual({ analysisType: "VULNERABILITY", result: [] });
  });

  it("flags top PageRank companies above the risk threshold", async () => {
    const result = await service.detectFraudPatterns();

    expect(result).toEqual({
      timeWindow: "30d",
      minRiskScore: 0.7,
      suspiciousEntities: [
        "Suspicious pattern detected for: Apple",
        "Suspicious pattern detected for: Samsung"
      ]
    });
  });
});
