import type { FastifyReply } from 'fastify';

import { mapErrorToResponse, toErrorBody, type ErrorResponse } from '../errors';
import type { GatewayMetrics } from '../metrics';

export function sendError(reply: FastifyReply, mapped: ErrorResponse) {
  return reply.status(mapped.statusCode).send(toErrorBody(mapped));
}

export function sendValidationError(reply: FastifyReply, error: unknown) {
  return sendError(reply, mapErrorToResponse(error));
}

/**
 * Aborts when the client goes away before the reply has been written.
 */
export function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('client disconnected'));
    }
  });
  return controller.signal;
}

export async function trackImageAi<T>(
  metrics: GatewayMetrics,
  operation: 'generate' | 'edit' | 'prompt',
  run: () => Promise<T>
): Promise<T> {
  try {
    const result = await run();
    metrics.imageAiRequests.inc({ operation, outcome: 'success' });
    return result;
  } catch (err) {
    metrics.imageAiRequests.inc({ operation, outcome: 'error' });
    throw err;
  }
}
