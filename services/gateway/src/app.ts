import fastify, { type FastifyInstance } from 'fastify';
import { Agent } from 'undici';

import { createPostgresPool } from '@outpaint-gateway/shared';

import { ComfyClient } from './comfyui/comfyClient';
import type { GatewayConfig } from './config';
import { mapErrorToResponse, toErrorBody } from './errors';
import { RemoteSession } from './http/remoteSession';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerComfyRoutes } from './routes/comfyui';
import { registerHealthRoutes } from './routes/health';
import { ImagingService } from './prompt/imaging';
import { OpenAiImageClient } from './prompt/openAiClient';
import type { ImageAiClient } from './prompt/types';
import { registerImageRoutes } from './routes/images';
import { registerPromptRoutes } from './routes/prompt';
import { registerTodoRoutes } from './routes/todos';
import { S3ObjectStore, type ObjectStore } from './storage/objectStore';
import { PostgresTodoRepository } from './todos/repository';
import { TodoService } from './todos/service';
import type { TodoRepository } from './todos/types';
import type { AppContext } from './types';

// Twenty base64 images per upload request.
const BODY_LIMIT_BYTES = 64 * 1024 * 1024;

export interface AppOverrides {
  objectStore?: ObjectStore;
  todoRepository?: TodoRepository;
  imageClient?: ImageAiClient | null;
  generateId?: () => string;
  now?: () => Date;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: GatewayConfig, overrides: AppOverrides = {}): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger, bodyLimit: BODY_LIMIT_BYTES });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'database' }, 0);

  const session = new RemoteSession({
    baseUrl: config.comfyui.baseUrl,
    username: config.comfyui.username,
    password: config.comfyui.password,
    timeoutMs: config.comfyui.requestTimeoutMs
  });
  // Template downloads and edit source images.
  const outboundAgent = new Agent({ keepAliveTimeout: 10_000 });

  const objectStore = overrides.objectStore ?? new S3ObjectStore(config.storage);
  const todoRepository =
    overrides.todoRepository ??
    new PostgresTodoRepository(
      createPostgresPool({
        connectionString: config.database.url,
        max: config.database.maxConnections,
        onError: (err, message) => app.log.error({ err }, `[postgres] ${message}`)
      })
    );

  const imageClient =
    overrides.imageClient !== undefined
      ? overrides.imageClient
      : config.imageAi.apiKey
        ? new OpenAiImageClient({
            apiKey: config.imageAi.apiKey,
            baseUrl: config.imageAi.baseUrl,
            timeoutMs: config.imageAi.timeoutMs
          })
        : null;

  const client = new ComfyClient({
    session,
    logger: app.log,
    requestDuration: metrics.comfyRequestDuration
  });

  const ctx: AppContext = {
    config,
    metrics,
    comfy: {
      client,
      objectStore,
      templateUrl: config.comfyui.workflowTemplateUrl,
      templateDispatcher: outboundAgent,
      generateId: overrides.generateId
    },
    objectStore,
    todoRepository,
    todos: new TodoService({
      repository: todoRepository,
      logger: app.log,
      generateId: overrides.generateId,
      now: overrides.now
    }),
    imaging: new ImagingService({
      client: imageClient,
      objectStore,
      sourceDispatcher: outboundAgent,
      generateId: overrides.generateId
    })
  };

  registerHealthRoutes(app, ctx);
  registerComfyRoutes(app, ctx);
  registerImageRoutes(app, ctx);
  registerTodoRoutes(app, ctx);
  registerPromptRoutes(app, ctx);

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({ detail: 'Not Found' });
  });

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send(toErrorBody(mapped));
  });

  app.addHook('onClose', async () => {
    await Promise.all([
      session.close(),
      outboundAgent.close(),
      objectStore.close(),
      todoRepository.close()
    ]);
  });

  return { app, ctx };
};
