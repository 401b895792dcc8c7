/**
 * Judge Routes — one blocking scripted run per request.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { SecureLogger } from '../logging/logger.js';
import { sendError } from '../utils/errors.js';
import type { JudgeHarness } from './harness.js';

const JudgeBodySchema = z
  .object({
    entryCommand: z.string().min(1).max(4096),
    inputFile: z.string().min(1).max(4096).optional(),
    context: z.string().max(65_536).optional(),
  })
  .strict();

export function registerJudgeRoutes(
  app: FastifyInstance,
  opts: { harness: JudgeHarness; logger: SecureLogger }
): void {
  const logger = opts.logger.child({ component: 'JudgeRoutes' });

  app.post('/api/v1/judge', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = JudgeBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, parsed.error.errors.map((e) => e.message).join('; '));
    }
    const { entryCommand, inputFile, context } = parsed.data;
    logger.debug('Judge requested', { entryCommand, inputFile });
    return opts.harness.judge(entryCommand, inputFile, context);
  });
}
