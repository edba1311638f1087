import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { uploadImages } from '../images/upload';
import { editImageArgsSchema, generateImageArgsSchema } from '../prompt/tools';
import type { AppContext } from '../types';
import { disconnectSignal, sendValidationError, trackImageAi } from './shared';

const MAX_IMAGES_PER_REQUEST = 20;

const uploadBodySchema = z.object({
  images: z.array(z.string()).min(1).max(MAX_IMAGES_PER_REQUEST)
});

export const registerImageRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/images/upload', async (request, reply) => {
    const parseResult = uploadBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const urls = await uploadImages(parseResult.data.images, {
      objectStore: ctx.objectStore,
      logger: request.log
    });
    ctx.metrics.imagesUploaded.inc(urls.length);
    return { urls };
  });

  app.post('/images/generate', async (request, reply) => {
    const parseResult = generateImageArgsSchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const urls = await trackImageAi(ctx.metrics, 'generate', () =>
      ctx.imaging.generate(parseResult.data, { logger: request.log, signal: disconnectSignal(reply) })
    );
    return { urls };
  });

  app.post('/images/edit', async (request, reply) => {
    const parseResult = editImageArgsSchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const urls = await trackImageAi(ctx.metrics, 'edit', () =>
      ctx.imaging.edit(parseResult.data, { logger: request.log, signal: disconnectSignal(reply) })
    );
    return { urls };
  });
};
