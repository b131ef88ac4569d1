import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { isRewardEngineError } from '@podium/engine';

/** Shared by every reward route: engine codes and zod failures onto HTTP statuses. */
export const handleError = (error: unknown, request: FastifyRequest, reply: FastifyReply): void => {
  if (error instanceof z.ZodError) {
    void reply.status(400).send({
      error: 'validation_error',
      details: error.flatten()
    });
    return;
  }

  if (isRewardEngineError(error)) {
    switch (error.code) {
      case 'VALIDATION_FAILED':
      case 'POLICY_INVALID':
        void reply.status(400).send({ error: 'validation_error', message: error.message, details: error.details });
        return;
      case 'NOT_FOUND':
        void reply.status(404).send({ error: 'not_found', message: error.message });
        return;
      case 'PERSISTENCE_FAILED':
        void reply
          .status(503)
          .header('Retry-After', '1')
          .send({ error: 'persistence_unavailable', message: error.message, retryable: error.retryable });
        return;
      default:
        break;
    }
  }

  request.log.error({ err: error instanceof Error ? error.message : String(error) }, 'reward request failed');
  void reply.status(500).send({ error: 'internal_error', message: 'Unexpected error' });
};

export const firstHeader = (value: string | string[] | undefined): string | null => {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
};
