export type * from "./types/company.js";
export type * from "./types/analytics.js";
export type * from "./types/api.js";
export type * from "./store.js";
