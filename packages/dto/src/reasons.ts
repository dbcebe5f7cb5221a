import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CATALOG
  CATALOG_INVALID_RESPONSE: { code: 'CATALOG_INVALID_RESPONSE', category: ReasonCategory.CATALOG, message: 'Upstream catalog returned neither a list nor a { data: [...] } envelope' },

  // ROUTER
  ROUTER_NO_CANDIDATES: { code: 'ROUTER_NO_CANDIDATES', category: ReasonCategory.ROUTER, message: 'Router has no candidates to select from' },
  ROUTER_INVALID_CANDIDATES: { code: 'ROUTER_INVALID_CANDIDATES', category: ReasonCategory.ROUTER, message: 'Candidate ids must be non-empty and unique' },
  ROUTER_INVALID_REWARD: { code: 'ROUTER_INVALID_REWARD', category: ReasonCategory.ROUTER, message: 'Reward must be a finite number' },

  // CHECKPOINT
  CHECKPOINT_CORRUPT: { code: 'CHECKPOINT_CORRUPT', category: ReasonCategory.CHECKPOINT, message: 'Stored checkpoint is not a valid router snapshot' },
  CHECKPOINT_INVALID_KEY: { code: 'CHECKPOINT_INVALID_KEY', category: ReasonCategory.CHECKPOINT, message: 'Checkpoint key resolves outside the store' },

  // CONFIG
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: ReasonCategory.CONFIG, message: 'Invalid configuration value' },
}
