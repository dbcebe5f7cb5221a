/**
 * ReasonedError
 * Wraps a ReasonDetail so every deliberate failure carries a stable code.
 */
import { ReasonCode, ReasonDetail } from '@freeroute/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedError extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail, options?: { cause?: unknown }) {
    super(detail.message, options)
    this.name = 'ReasonedError'
    this.reason = detail
  }

  get code(): ReasonCode {
    return this.reason.code
  }

  static of(code: ReasonCode, overrides?: ReasonOverrides, cause?: unknown): ReasonedError {
    return new ReasonedError(reason(code, overrides), cause === undefined ? undefined : { cause })
  }
}

export function isReasoned(err: unknown, code?: ReasonCode): err is ReasonedError {
  if (!(err instanceof ReasonedError)) return false
  return code === undefined || err.code === code
}
