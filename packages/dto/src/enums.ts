export enum ReasonCategory {
  CATALOG = "CATALOG",
  ROUTER = "ROUTER",
  CHECKPOINT = "CHECKPOINT",
  CONFIG = "CONFIG",
}

export type ReasonCode =
  | "CATALOG_INVALID_RESPONSE"
  | "ROUTER_NO_CANDIDATES"
  | "ROUTER_INVALID_CANDIDATES"
  | "ROUTER_INVALID_REWARD"
  | "CHECKPOINT_CORRUPT"
  | "CHECKPOINT_INVALID_KEY"
  | "CONFIG_INVALID";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}

/** Lifecycle of a router's learned state. */
export enum RouterPhase {
  UNINITIALIZED = "UNINITIALIZED",
  LOADED = "LOADED",
  UPDATED = "UPDATED",
}
