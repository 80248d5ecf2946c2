import { Router } from "express";
import { z } from "zod";
import type { RelationshipType } from "@supplygraph/shared";
import { parseWith } from "../middleware/validator.js";
import { RELATIONSHIP_TYPES, isRelationshipType } from "../store/relationshipTypes.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const relationshipTypeSchema = z.custom<RelationshipType>(
  (value) => typeof value === "string" && isRelationshipType(value),
  { message: `type must be one of ${RELATIONSHIP_TYPES.join(", ")}` }
);

const relationshipBodySchema = z.object({
  sourceName: z.string(),
  targetName: z.string(),
  type: relationshipTypeSchema,
  reliabilityScore: z.number().optional(),
  confidence: z.number().optional(),
  strength: z.number().optional(),
  contractValue: z.number().optional(),
  componentType: z.string().optional(),
  isExclusive: z.boolean().optional()
});

const competitionBodySchema = z.object({
  company1: z.string(),
  company2: z.string(),
  relationshipType: z.string().optional(),
  strength: z.number().optional()
});

export function createRelationshipsRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const relationshipsRouter = Router();
  relationshipsRouter.use(storeReady);

  relationshipsRouter.post("/", async (req, res) => {
    const input = parseWith(relationshipBodySchema, req.body, "Invalid relationship");
    const result = await service.createRelationship(input);
    res.status(result.created ? 201 : 200).json(result);
  });

  relationshipsRouter.post("/competition", async (req, res) => {
    const input = parseWith(competitionBodySchema, req.body, "Invalid competition relationship");
    res.status(201).json(await service.createCompetitionRelationship(input));
  });

  return relationshipsRouter;
}
