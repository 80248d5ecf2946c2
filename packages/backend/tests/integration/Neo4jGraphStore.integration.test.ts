import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { GenericContainer, Wait, type StartedTestContainer } from "testcontainers";
import { Neo4jGraphStore } from "../../src/store/Neo4jGraphStore.js";

const runIntegration = process.env.RUN_NEO4J_INTEGRATION === "true";

describe.skipIf(!runIntegration)("Neo4jGraphStore integration", () => {
  let container: StartedTestContainer;
  let store: Neo4jGraphStore;

  beforeAll(async () => {
    container = await new GenericContainer("neo4j:5.26.0")
      .withEnvironment({
        NEO4J_AUTH: "neo4j/test-password",
        NEO4J_PLUGINS: '["graph-data-science"]'
      })
      .withExposedPorts(7687)
      .withWaitStrategy(Wait.forLogMessage("Started."))
      .withStartupTimeout(180_000)
      .start();

    store = new Neo4jGraphStore({
      uri: `bolt://${container.getHost()}:${container.getMappedPort(7687)}`,
      user: "neo4j",
      password: "test-password",
      projectionName: "supply_chain_it",
      queryTimeoutMs: 30_000
    });

    await store.connect();
    await store.upsertCompanies([
      { permid: 1, name: "Apple", isFinalAssembler: true, matchScore: 0.98, marketCap: 3e12 },
      { permid: 2, name: "Qualcomm", matchScore: 0.96, marketCap: 1.8e11 },
      { permid: 3, name: "TSMC", matchScore: 0.94, marketCap: 5e11 },
      { permid: 4, name: "Samsung", matchScore: 0.89, marketCap: 3.5e11 }
    ]);
    await store.upsertRelationship({
      sourceName: "Qualcomm",
      targetName: "Apple",
      type: "SUPPLY_COMPONENTS",
      reliabilityScore: 0.85
    });
    await store.upsertRelationship({
      sourceName: "TSMC",
      targetName: "Apple",
      type: "MANUFACTURES_FOR",
      reliabilityScore: 0.95
    });
    await store.upsertRelationship({
      sourceName: "Samsung",
      targetName: "Apple",
      type: "SUPPLY_COMPONENTS"
    });
    await store.createCompetition("Samsung", "Apple", "DIRECT", 0.8);
  }, 240_000);

  afterAll(async () => {
    await store?.disconnect();
    await container?.stop();
  });

  it("keeps the stored record when a lower match score arrives", async () => {
    await store.upsertCompanies([{ permid: 2, name: "Qualcomm Inc", matchScore: 0.5 }]);

    const company = await store.findByPermid(2);
    expect(company?.name).toBe("Qualcomm");
    expect(company?.matchScore).toBe(0.96);
    expect(company?.ingestionDate).toBeInstanceOf(Date);
  });

  it("reports whether a relationship was created or updated", async () => {
    const first = await store.upsertRelationship({
      sourceName: "Qualcomm",
      targetName: "TSMC",
      type: "DESIGN_CHIPS_FOR",
      reliabilityScore: 0.7
    });
    const second = await store.upsertRelationship({
      sourceName: "Qualcomm",
      targetName: "TSMC",
      type: "DESIGN_CHIPS_FOR",
      reliabilityScore: 0.75
    });
    const missing = await store.upsertRelationship({
      sourceName: "Qualcomm",
      targetName: "Nokia",
      type: "SUPPLY_COMPONENTS"
    });

    expect(first?.created).toBe(true);
    expect(second?.created).toBe(false);
    expect(missing).toBeNull();
  });

  it("runs GDS algorithms over a versioned projection", async () => {
    const ranked = await store.rankCentrality(2);
    expect(ranked.map((entry) => entry.companyName)).toEqual(["Apple", "Samsung"]);

    const routes = await store.shortestWeightedPaths("TSMC", "Apple");
    expect(routes[0]?.pathNames).toEqual(["TSMC", "Apple"]);
    expect(routes[0]?.totalCost).toBeCloseTo(0.95);

    const refreshed = await store.refreshProjection();
    expect(refreshed.projection.graphName).toMatch(/^supply_chain_it_v\d+$/);
    expect(store.currentProjection()?.graphName).toBe(refreshed.projection.graphName);

    const related = await store.findSameCommunity("Apple");
    expect(related.length).toBeGreaterThan(0);
  });

  it("returns hop-bounded paths without repeated companies", async () => {
    const paths = await store.pathsWithinHops("Samsung", "Apple", 3, 10);

    expect(paths.length).toBeGreaterThan(0);
    for (const path of paths) {
      expect(new Set(path.pathNames).size).toBe(path.pathNames.length);
    }
  });

  it("skips Yen for an endpoint outside the live projection", async () => {
    await store.refreshProjection();
    await store.upsertCompanies([{ permid: 99, name: "Nokia", matchScore: 0.7 }]);
    await store.upsertRelationship({
      sourceName: "Nokia",
      targetName: "Apple",
      type: "SUPPLY_COMPONENTS",
      reliabilityScore: 0.7
    });

    await expect(store.shortestWeightedPaths("Nokia", "Apple")).resolves.toEqual([]);
  });

  it("finds companies that both cooperate and compete", async () => {
    const frenemies = await store.findFrenemies();

    expect(frenemies).toHaveLength(1);
    expect(frenemies[0]).toMatchObject({
      company1: "Samsung",
      company2: "Apple",
      relationshipType: "FRENEMY",
      cooperationTypes: ["SUPPLY_COMPONENTS"]
    });
  });

  it("summarizes the graph", async () => {
    const statistics = await store.getStatistics();
    const consistency = await store.validateConsistency();

    expect(statistics.totalCompanies).toBe(5);
    expect(statistics.relationshipTypeDistribution.COMPETES_WITH).toBe(2);
    expect(consistency.orphanedCompanies).toBe(0);
    expect(consistency.duplicatePermids).toBe(0);
  });
});
