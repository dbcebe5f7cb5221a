/**
 * Bandit math public surface. Pure, side-effect free helpers.
 */
export * from './scoring'
export * from './stats'
