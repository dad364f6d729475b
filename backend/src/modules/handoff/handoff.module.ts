/**
 * src/modules/handoff/handoff.module.ts
 *
 * WHY:
 * - Encapsulates Handoff module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { Signer } from '../../shared/security/hmac-signer';
import type { SatelliteSessionStore } from '../../shared/session/satellite-session.store';

import { HandoffTokenCodec } from './handoff-token.codec';
import { HandoffLedger } from './handoff.ledger';
import { HandoffService } from './handoff.service';
import { registerHandoffRedemption } from './handoff-redemption.hook';

export type HandoffModule = ReturnType<typeof createHandoffModule>;

export function createHandoffModule(deps: {
  cache: Cache;
  signer: Signer;
  logger: Logger;
  satelliteSessionStore: SatelliteSessionStore;
  publishableKey: string;
  tokenTtlSeconds: number;
  lookupTimeoutMs: number;
  isProduction: boolean;
}) {
  const handoffService = new HandoffService({
    codec: new HandoffTokenCodec(deps.signer),
    ledger: new HandoffLedger(deps.cache),
    logger: deps.logger,
    publishableKey: deps.publishableKey,
    ttlSeconds: deps.tokenTtlSeconds,
    lookupTimeoutMs: deps.lookupTimeoutMs,
  });

  return {
    handoffService,
    registerHooks(app: FastifyInstance) {
      registerHandoffRedemption(app, {
        handoffService,
        satelliteSessionStore: deps.satelliteSessionStore,
        lookupTimeoutMs: deps.lookupTimeoutMs,
        isProduction: deps.isProduction,
      });
    },
  };
}
