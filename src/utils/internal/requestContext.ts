/**
 * @fileoverview Creation of request contexts: small records carried through
 * every operation so that log lines of one user turn can be correlated.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

/**
 * Context attached to log entries and errors. `requestId` and `timestamp`
 * are always present; everything else is free-form.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface ContextConfig {
  appName?: string;
  appVersion?: string;
  environment?: string;
}

let serviceConfig: ContextConfig = {};

export const requestContextService = {
  /**
   * Sets service-level fields that `createRequestContext` adds to every context.
   */
  configure(cfg: ContextConfig): ContextConfig {
    serviceConfig = { ...serviceConfig, ...cfg };
    return { ...serviceConfig };
  },

  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    return {
      ...additionalContext,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...(serviceConfig.appName ? { service: serviceConfig.appName } : {}),
    };
  },
};
