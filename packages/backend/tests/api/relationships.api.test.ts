import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { BASE, createTestContext, seedSupplyChain, type TestContext } from "../helpers/testApp.js";

describe("relationships api", () => {
  let context: TestContext;

  beforeEach(async () => {
    context = createTestContext();
    await seedSupplyChain(context.store);
  });

  it("creates a relationship and then updates it in place", async () => {
    const body = {
      sourceName: "Qualcomm",
      targetName: "TSMC",
      type: "DESIGN_CHIPS_FOR",
      reliabilityScore: 0.7
    };

    const created = await request(context.app).post(`${BASE}/relationships`).send(body);
    expect(created.status).toBe(201);
    expect(created.body).toEqual({
      source: "Qualcomm",
      target: "TSMC",
      type: "DESIGN_CHIPS_FOR",
      created: true
    });

    const updated = await request(context.app)
      .post(`${BASE}/relationships`)
      .send({ ...body, reliabilityScore: 0.9 });
    expect(updated.status).toBe(200);
    expect(updated.body.created).toBe(false);

    const stored = context.store.relationships.filter((rel) => rel.type === "DESIGN_CHIPS_FOR");
    expect(stored).toHaveLength(1);
    expect(stored[0]?.reliabilityScore).toBe(0.9);
  });

  it("rejects unsupported relationship types", async () => {
    const response = await request(context.app).post(`${BASE}/relationships`).send({
      sourceName: "Qualcomm",
      targetName: "TSMC",
      type: "OWNS"
    });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe(
      "Invalid relationship: type: type must be one of SUPPLY_COMPONENTS, MANUFACTURES_FOR, DESIGN_CHIPS_FOR, PARTNER_WITH, COMPETES_WITH"
    );
  });

  it("returns 404 when an endpoint company is missing", async () => {
    const response = await request(context.app).post(`${BASE}/relationships`).send({
      sourceName: "Qualcomm",
      targetName: "Nokia",
      type: "SUPPLY_COMPONENTS"
    });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      errorCode: "NOT_FOUND",
      message: "Both companies must exist: Qualcomm, Nokia"
    });
  });

  it("creates symmetric competition with defaults", async () => {
    const response = await request(context.app)
      .post(`${BASE}/relationships/competition`)
      .send({ company1: "Qualcomm", company2: "TSMC" });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      company1: "Qualcomm",
      company2: "TSMC",
      relationshipType: "DIRECT",
      strength: 0.5
    });

    const competing = context.store.relationships
      .filter((rel) => rel.type === "COMPETES_WITH" && (rel.source === 2 || rel.target === 2))
      .map((rel) => [rel.source, rel.target]);
    expect(competing).toEqual([
      [2, 3],
      [3, 2]
    ]);
  });

  it("rejects competition with itself", async () => {
    const response = await request(context.app)
      .post(`${BASE}/relationships/competition`)
      .send({ company1: "Apple", company2: "Apple", strength: 0.9 });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("company1 and company2 must be different companies");
  });
});
