import { z } from "zod";
import type { AgentAnalysisRequest } from "@supplygraph/shared";
import { InvalidArgumentError } from "../errors.js";
import { parseWith } from "../middleware/validator.js";

const agentRequestSchema = z.object({
  analysisType: z.string().trim().min(1, "must not be blank"),
  parameters: z.record(z.unknown()).nullish()
});

const pathfindingParametersSchema = z.object({
  source: z.string().trim().min(1, "must not be blank"),
  target: z.string().trim().min(1, "must not be blank")
});

const centralityParametersSchema = z.object({
  topN: z.coerce.number().int().positive().optional()
});

const vulnerabilityParametersSchema = z.object({
  minImpact: z.coerce.number().int().min(0).optional()
});

/**
 * Decodes an agent request body into the tagged request union.
 * The analysis type is matched case-insensitively.
 */
export function decodeAgentAnalysisRequest(input: unknown): AgentAnalysisRequest {
  const raw = parseWith(agentRequestSchema, input, "Invalid analysis request");
  const parameters = raw.parameters ?? {};

  switch (raw.analysisType.toUpperCase()) {
    case "PATHFINDING":
      return {
        analysisType: "PATHFINDING",
        parameters: parseWith(pathfindingParametersSchema, parameters, "Invalid PATHFINDING parameters")
      };
    case "CENTRALITY":
      return {
        analysisType: "CENTRALITY",
        parameters: parseWith(centralityParametersSchema, parameters, "Invalid CENTRALITY parameters")
      };
    case "COMMUNITY":
      return { analysisType: "COMMUNITY", parameters: {} };
    case "VULNERABILITY":
      return {
        analysisType: "VULNERABILITY",
        parameters: parseWith(
          vulnerabilityParametersSchema,
          parameters,
          "Invalid VULNERABILITY parameters"
        )
      };
    default:
      throw new InvalidArgumentError(`Unknown analysis type: ${raw.analysisType}`);
  }
}
