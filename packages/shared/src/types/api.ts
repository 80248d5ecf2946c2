import type { ProjectionSnapshot } from "./analytics.js";

export type ApiErrorCode =
  | "INVALID_REQUEST"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "TIMEOUT"
  | "CANCELLED"
  | "STORE_UNAVAILABLE"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  errorCode: ApiErrorCode;
  message: string;
  details?: Array<{ path: string; message: string }>;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  message: string;
  timestamp: string;
  uptimeSec: number;
  checks: {
    neo4j: ServiceConnectionStatus;
  };
  projection: ProjectionSnapshot | null;
}

export interface BatchIngestResponse {
  count: number;
  message: string;
}

export interface GraphContextRequest {
  query: string;
  entityNames: string[];
}

export interface GraphResetResponse {
  deletedCompanies: number;
  message: string;
}
