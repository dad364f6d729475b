/**
 * src/modules/handoff/handoff.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const HandoffErrors = {
  /**
   * Handoff token is malformed, forged, expired, already used, or meant for
   * another origin.
   *
   * SECURITY: one message covers every condition. The specific reason is logged
   * server-side only, so the response is no oracle for which check failed.
   */
  failed(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication failed. Please sign in again.', meta);
  },

  /** redirect_url points at an origin outside this session space. */
  redirectNotAllowed(meta?: AppErrorMeta) {
    return AppError.validationError('Redirect URL is not allowed.', meta);
  },

  /** Ledger or store did not answer in time. Fail closed, client may retry. */
  unavailable(meta?: AppErrorMeta) {
    return AppError.unavailable(undefined, meta);
  },
} as const;
