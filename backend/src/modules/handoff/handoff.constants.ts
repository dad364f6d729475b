/**
 * backend/src/modules/handoff/handoff.constants.ts
 *
 * RULES:
 * - Must not import from HTTP/framework code.
 */

/** Query parameter carrying the token on the primary → satellite leg. */
export const HANDOFF_PARAM = '__handoff';

export const HANDOFF_TOKEN_VERSION = 'v1';

/** Tolerated clock drift between primary and satellite for `iat`. `exp` is strict. */
export const HANDOFF_CLOCK_SKEW_SECONDS = 5;

/** Full key: `handoff:used:{jti}`. */
export const HANDOFF_LEDGER_KEY_PREFIX = 'handoff:used';

/** jti entropy: 16 bytes = 128 bits. */
export const HANDOFF_JTI_BYTES = 16;
