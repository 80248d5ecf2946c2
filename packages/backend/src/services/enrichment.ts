import type {
  CentralityResult,
  CentralityScore,
  CentralityType,
  Criticality,
  PathResult
} from "@supplygraph/shared";

/** Each hop costs ten percent of reliability, hyperbolically. */
export function pathReliability(pathLength: number): number {
  return 1 / (1 + pathLength * 0.1);
}

export function withReliability(paths: PathResult[]): PathResult[] {
  return paths.map((path) => ({
    ...path,
    reliabilityScore: pathReliability(path.pathLength)
  }));
}

export function classifyCriticality(score: number): Criticality {
  if (score > 0.1) {
    return "CRITICAL";
  }
  if (score > 0.05) {
    return "HIGH";
  }
  if (score > 0.01) {
    return "MEDIUM";
  }
  return "LOW";
}

/** Scores must already be sorted by descending score; rank follows input order. */
export function toCentralityResults(
  scores: CentralityScore[],
  centralityType: CentralityType
): CentralityResult[] {
  return scores.map((entry, index) => ({
    companyName: entry.companyName,
    permid: entry.permid,
    centralityScore: entry.score,
    centralityType,
    rank: index + 1,
    criticality: classifyCriticality(entry.score)
  }));
}
