/**
 * Reasons Registry
 * Centralizes the machine-parsable failure codes of the selector packages.
 */
import { REASONS as DTO_REASONS, ReasonCode, ReasonDetail } from '@freeroute/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
