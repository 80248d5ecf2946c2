import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app.js";
import { BASE, createTestContext } from "../helpers/testApp.js";

describe("error responses", () => {
  it("returns a structured 404 for unknown routes", async () => {
    const { app } = createTestContext();

    const response = await request(app).get(`${BASE}/unknown`);

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      errorCode: "NOT_FOUND",
      message: `Route not found: GET ${BASE}/unknown`
    });
  });

  it("maps malformed JSON to INVALID_REQUEST", async () => {
    const { app } = createTestContext();

    const response = await request(app)
      .post(`${BASE}/companies/batch`)
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ errorCode: "INVALID_REQUEST", message: "Malformed JSON body" });
  });

  it("returns 503 when the store cannot connect", async () => {
    const { app } = createTestContext({
      ensureStoreConnected: async () => {
        throw new Error("connection refused");
      }
    });

    const response = await request(app).get(`${BASE}/graph/statistics`);

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      errorCode: "STORE_UNAVAILABLE",
      message: "Graph store unavailable"
    });
  });

  it("wraps unexpected failures as INTERNAL_ERROR", async () => {
    const { app, store } = createTestContext();
    vi.spyOn(store, "getStatistics").mockRejectedValue(new Error("boom"));

    const response = await request(app).get(`${BASE}/graph/statistics`);

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      errorCode: "INTERNAL_ERROR",
      message: "An unexpected error occurred: boom"
    });
  });

  it("rate limits clients that exceed the window", async () => {
    const { store, service } = createTestContext();
    const app = createApp({
      store,
      service,
      ensureStoreConnected: () => store.connect(),
      checkNeo4j: async () => "ok",
      rateLimit: { windowMs: 60_000, limit: 2 }
    });

    await request(app).get(`${BASE}/health`);
    await request(app).get(`${BASE}/health`);
    const limited = await request(app).get(`${BASE}/health`);

    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({
      errorCode: "INVALID_REQUEST",
      message: "Too many requests, please try again later"
    });
  });
});
