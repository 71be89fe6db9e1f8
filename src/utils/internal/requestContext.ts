/**
 * @fileoverview Per-run context carried through every operation for log correlation.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation: string;
  [key: string]: unknown;
}

export const requestContextService = {
  createRequestContext(
    operation: string,
    additional: Record<string, unknown> = {},
  ): RequestContext {
    return {
      ...additional,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      operation,
    };
  },

  /**
   * Derives a child context that keeps the parent's requestId.
   */
  forOperation(
    parent: RequestContext,
    operation: string,
    additional: Record<string, unknown> = {},
  ): RequestContext {
    return {
      ...parent,
      ...additional,
      operation,
      parentOperation: parent.operation,
    };
  },
};
