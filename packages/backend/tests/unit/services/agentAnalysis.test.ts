import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../../src/errors.js";
import { decodeAgentAnalysisRequest } from "../../../src/services/agentAnalysis.js";

describe("decodeAgentAnalysisRequest", () => {
  it("matches the analysis type case-insensitively", () => {
    expect(
      decodeAgentAnalysisRequest({
        analysisType: "pathfinding",
        parameters: { source: " Qualcomm ", target: "Apple" }
      })
    ).toEqual({
      analysisType: "PATHFINDING",
      parameters: { source: "Qualcomm", target: "Apple" }
    });

    expect(decodeAgentAnalysisRequest({ analysisType: "Community" })).toEqual({
      analysisType: "COMMUNITY",
      parameters: {}
    });
  });

  it("coerces numeric parameters and keeps optional ones absent", () => {
    expect(
      decodeAgentAnalysisRequest({ analysisType: "CENTRALITY", parameters: { topN: "5" } })
    ).toEqual({ analysisType: "CENTRALITY", parameters: { topN: 5 } });

    expect(decodeAgentAnalysisRequest({ analysisType: "VULNERABILITY", parameters: {} })).toEqual({
      analysisType: "VULNERABILITY",
      parameters: {}
    });
  });

  it("rejects unknown analysis types", () => {
    expect(() => decodeAgentAnalysisRequest({ analysisType: "FORECAST" })).toThrow(
      new InvalidArgumentError("Unknown analysis type: FORECAST")
    );
  });

  it("rejects malformed parameter payloads", () => {
    expect(() =>
      decodeAgentAnalysisRequest({ analysisType: "PATHFINDING", parameters: { source: "Apple" } })
    ).toThrow("Invalid PATHFINDING parameters: target: Required");

    expect(() =>
      decodeAgentAnalysisRequest({ analysisType: "CENTRALITY", parameters: { topN: 0 } })
    ).toThrow(InvalidArgumentError);

    expect(() => decodeAgentAnalysisRequest({ parameters: {} })).toThrow(
      "Invalid analysis request: analysisType: Required"
    );
  });
});
