import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { collectExpandImageResult, submitExpandImage } from '../comfyui/expandImage';
import { mapComfyFailure } from '../errors';
import type { AppContext } from '../types';
import { disconnectSignal, sendError, sendValidationError } from './shared';

const optionalDimension = z.number().int().nullable().optional();

const expandImageBodySchema = z.object({
  image_url: z.string().min(1),
  client_id: z.string().min(1).optional(),
  left: optionalDimension,
  top: optionalDimension,
  right: optionalDimension,
  bottom: optionalDimension,
  width: optionalDimension,
  height: optionalDimension
});

const expandImageResultBodySchema = z.object({
  prompt_id: z.string().min(1)
});

export const registerComfyRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/comfyui/expandImage', async (request, reply) => {
    const parseResult = expandImageBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }
    const body = parseResult.data;

    const submission = await submitExpandImage(
      { ...ctx.comfy, logger: request.log },
      {
        clientId: body.client_id ?? ctx.config.comfyui.defaultClientId,
        patch: {
          imageUrl: body.image_url,
          left: body.left,
          top: body.top,
          right: body.right,
          bottom: body.bottom,
          width: body.width,
          height: body.height
        }
      },
      disconnectSignal(reply)
    );

    if (!submission.ok) {
      ctx.metrics.comfySubmissions.inc({ outcome: submission.error.kind });
      request.log.error({ failure: submission.error }, 'Expand image submission failed');
      return sendError(reply, mapComfyFailure(submission.error));
    }

    ctx.metrics.comfySubmissions.inc({ outcome: 'success' });
    return {
      status: 'success',
      result: submission.value.response,
      prompt_id: submission.value.promptId,
      message: 'Image URL successfully replaced in expand image workflow'
    };
  });

  app.post('/comfyui/expandImageResult', async (request, reply) => {
    const parseResult = expandImageResultBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const artifact = await collectExpandImageResult(
      { ...ctx.comfy, logger: request.log },
      parseResult.data.prompt_id,
      disconnectSignal(reply)
    );

    if (!artifact.ok) {
      ctx.metrics.artifactRelays.inc({ outcome: artifact.error.kind });
      request.log.error({ failure: artifact.error }, 'Expand image result retrieval failed');
      return sendError(reply, mapComfyFailure(artifact.error));
    }

    ctx.metrics.artifactRelays.inc({ outcome: 'success' });
    return { public_url: artifact.value.url, status: 'success' };
  });
};
