import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RewardQueries } from '../../services/rewardQueries.js';
import { handleError } from './errorResponses.js';

const userParamsSchema = z.object({
  userId: z.string().trim().min(1)
});

const userRewardParamsSchema = userParamsSchema.extend({
  tournamentId: z.string().trim().min(1)
});

export type UserRewardRouteDependencies = Pick<
  RewardQueries,
  'getUserReward' | 'getUserBadgeShowcase' | 'getUserSkillProfile'
>;

export const registerUserRewardRoutes = async (
  app: FastifyInstance,
  dependencies: UserRewardRouteDependencies
): Promise<void> => {
  app.get('/v1/tournaments/:tournamentId/rewards/users/:userId', async (request, reply) => {
    try {
      const { tournamentId, userId } = userRewardParamsSchema.parse(request.params);
      void reply.send(await dependencies.getUserReward(tournamentId, userId));
    } catch (error) {
      handleError(error, request, reply);
    }
  });

  app.get('/v1/users/:userId/badges/showcase', async (request, reply) => {
    try {
      const { userId } = userParamsSchema.parse(request.params);
      void reply.send(await dependencies.getUserBadgeShowcase(userId));
    } catch (error) {
      handleError(error, request, reply);
    }
  });

  app.get('/v1/users/:userId/skills', async (request, reply) => {
    try {
      const { userId } = userParamsSchema.parse(request.params);
      void reply.send(await dependencies.getUserSkillProfile(userId));
    } catch (error) {
      handleError(error, request, reply);
    }
  });
};
