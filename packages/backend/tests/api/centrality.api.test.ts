import request from "supertest";
import { describe, expect, it } from "vitest";
import { BASE, createTestContext, seedSupplyChain } from "../helpers/testApp.js";

describe("centrality api", () => {
  it("ranks critical nodes by PageRank", async () => {
    const { app, store } = createTestContext();
    await seedSupplyChain(store);

    const response = await request(app).get(`${BASE}/centrality/critical-nodes`).query({ topN: 2 });

    expect(response.status).toBe(200);
    expect(
      response.body.map((result: { companyName: string; rank: number; criticality: string }) => [
        result.companyName,
        result.rank,
        result.criticality
      ])
    ).toEqual([
      ["Apple", 1, "CRITICAL"],
      ["Samsung", 2, "CRITICAL"]
    ]);
    expect(response.body[0].centralityType).toBe("PAGERANK");
  });

  it("returns only companies that sit on shortest paths as bridges", async () => {
    const { app, store } = createTestContext();
    await seedSupplyChain(store);

    const response = await request(app).get(`${BASE}/centrality/bridge-nodes`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual([
      {
        companyName: "Apple",
        permid: 1,
        centralityScore: 2,
        centralityType: "BETWEENNESS",
        rank: 1,
        criticality: "CRITICAL"
      }
    ]);
  });

  it("combines both rankings with fixed insights", async () => {
    const { app, store } = createTestContext();
    await seedSupplyChain(store);

    const response = await request(app).get(`${BASE}/centrality/comprehensive`);

    expect(response.status).toBe(200);
    expect(response.body.pageRankResults).toHaveLength(4);
    expect(response.body.betweennessResults).toHaveLength(1);
    expect(response.body.combinedInsights).toHaveLength(3);
  });

  it("rejects a non-positive topN", async () => {
    const { app } = createTestContext();

    const response = await request(app).get(`${BASE}/centrality/critical-nodes`).query({ topN: 0 });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("topN must be a positive integer");
  });

  it("returns 504 when the algorithm outlives the analysis timeout", async () => {
    const { app, store } = createTestContext({
      store: { algorithmDelayMs: 200 },
      executor: { timeoutMs: 20 }
    });
    await seedSupplyChain(store);

    const response = await request(app).get(`${BASE}/centrality/critical-nodes`);

    expect(response.status).toBe(504);
    expect(response.body).toEqual({
      errorCode: "TIMEOUT",
      message: "Analysis 'pagerank' timed out after 20ms"
    });
  });
});
