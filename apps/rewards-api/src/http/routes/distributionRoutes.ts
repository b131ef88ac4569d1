import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { DistributionRequest, DistributionSummary } from '../../services/distributionContext.js';
import type { PreviewRequest } from '../../services/rewardPreview.js';
import { firstHeader, handleError } from './errorResponses.js';

const paramsSchema = z.object({
  tournamentId: z.string().trim().min(1)
});

const participantSchema = z.object({
  userId: z.string().trim().min(1),
  placement: z.number().int().positive()
});

const bodySchema = z
  .object({
    participants: z.array(participantSchema).min(1).optional(),
    policy: z.record(z.unknown()).optional(),
    templateName: z.string().trim().min(1).optional(),
    forceRedistribution: z.boolean().default(false)
  })
  .strict();

export interface DistributionRouteDependencies {
  distributeRewards: (request: DistributionRequest) => Promise<DistributionSummary>;
  previewRewards: (request: PreviewRequest) => Promise<DistributionSummary>;
}

export const registerDistributionRoutes = async (
  app: FastifyInstance,
  dependencies: DistributionRouteDependencies
): Promise<void> => {
  app.post('/v1/tournaments/:tournamentId/rewards/distribute', async (request, reply) => {
    try {
      const { tournamentId } = paramsSchema.parse(request.params);
      const body = bodySchema.parse(request.body ?? {});
      const summary = await dependencies.distributeRewards({
        tournamentId,
        ...body,
        actorId: firstHeader(request.headers['x-actor-id'])
      });
      void reply.status(200).send(summary);
    } catch (error) {
      handleError(error, request, reply);
    }
  });

  app.post('/v1/tournaments/:tournamentId/rewards/preview', async (request, reply) => {
    try {
      const { tournamentId } = paramsSchema.parse(request.params);
      const body = bodySchema.parse(request.body ?? {});
      const summary = await dependencies.previewRewards({ tournamentId, ...body });
      void reply.status(200).send(summary);
    } catch (error) {
      handleError(error, request, reply);
    }
  });
};
