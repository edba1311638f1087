import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { AppContext } from '../types';
import { disconnectSignal, sendValidationError, trackImageAi } from './shared';

const promptImageBodySchema = z.object({
  prompt: z.string().trim().min(1),
  model: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.7)
});

export const registerPromptRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/prompt/image', async (request, reply) => {
    const parseResult = promptImageBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }
    const body = parseResult.data;

    const result = await trackImageAi(ctx.metrics, 'prompt', () =>
      ctx.imaging.runPrompt(
        {
          prompt: body.prompt,
          model: body.model ?? ctx.config.imageAi.chatModel,
          temperature: body.temperature
        },
        { logger: request.log, signal: disconnectSignal(reply) }
      )
    );

    return {
      original_prompt: result.originalPrompt,
      generated_images: result.generatedImages,
      edited_images: result.editedImages,
      message: result.message
    };
  });
};
