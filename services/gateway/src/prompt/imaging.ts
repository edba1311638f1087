import { Buffer } from 'node:buffer';
import { randomUUID } from 'node:crypto';

import { fetch, type Dispatcher } from 'undici';

import { fail, ok, type Outcome } from '../comfyui/json';
import type { ComfyLogger } from '../comfyui/types';
import { GatewayError } from '../errors';
import { extensionForMimeType, imageKey } from '../images/upload';
import type { ObjectStore } from '../storage/objectStore';
import {
  EDIT_IMAGE_TOOL,
  GENERATE_IMAGE_TOOL,
  IMAGE_TOOLS,
  PROMPT_SYSTEM_MESSAGE,
  describeIssues,
  editImageArgsSchema,
  generateImageArgsSchema,
  type EditImageArgs,
  type GenerateImageArgs
} from './tools';
import {
  DEFAULT_IMAGE_MODEL,
  SIZES_BY_MODEL,
  defaultImageSize,
  type ChatMessage,
  type ChatReply,
  type ChatToolCall,
  type ImageAiClient,
  type ImageGenerationRequest,
  type ProducedImage,
  type PromptImageRequest,
  type PromptImageResult,
  type SourceImage
} from './types';

export interface ImagingServiceOptions {
  client: ImageAiClient | null;
  objectStore: ObjectStore;
  sourceDispatcher?: Dispatcher;
  generateId?: () => string;
}

export interface ImagingCallContext {
  logger: ComfyLogger;
  signal?: AbortSignal;
}

const DEFAULT_PROMPT_MESSAGE = 'Processing complete';

/**
 * Fills in the model, count and size defaults and rejects combinations the model cannot serve.
 */
export function resolveGeneration(args: GenerateImageArgs): ImageGenerationRequest {
  const model = args.model ?? DEFAULT_IMAGE_MODEL;
  const size = args.size ?? defaultImageSize(model);
  const count = args.count ?? 1;

  const supported = SIZES_BY_MODEL[model];
  if (!supported.includes(size)) {
    throw new GatewayError(
      `Size ${size} is not supported by ${model}; use one of: ${supported.join(', ')}`,
      'INVALID_IMAGE_REQUEST'
    );
  }
  if (model === 'dall-e-3' && count !== 1) {
    throw new GatewayError('dall-e-3 generates one image per request', 'INVALID_IMAGE_REQUEST');
  }
  return { prompt: args.prompt, model, count, size };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseToolArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export class ImagingService {
  private readonly client: ImageAiClient | null;
  private readonly objectStore: ObjectStore;
  private readonly sourceDispatcher?: Dispatcher;
  private readonly generateId: () => string;

  constructor(options: ImagingServiceOptions) {
    this.client = options.client;
    this.objectStore = options.objectStore;
    this.sourceDispatcher = options.sourceDispatcher;
    this.generateId = options.generateId ?? randomUUID;
  }

  async generate(args: GenerateImageArgs, context: ImagingCallContext): Promise<string[]> {
    const request = resolveGeneration(args);
    const client = this.requireClient();
    const produced = await this.callProvider('generate images', () =>
      client.generateImages(request, context.signal)
    );
    return this.storeProduced(produced, 'generate images', context);
  }

  async edit(args: EditImageArgs, context: ImagingCallContext): Promise<string[]> {
    const client = this.requireClient();
    const images = await this.fetchSourceImages(args.image_urls, context.signal);
    const produced = await this.callProvider('edit images', () =>
      client.editImages({ prompt: args.prompt, images }, context.signal)
    );
    return this.storeProduced(produced, 'edit images', context);
  }

  /**
   * Lets the chat model pick generate or edit through tool calls, runs the calls, then asks the
   * model to summarize. A failing tool call is reported to the model rather than to the caller.
   */
  async runPrompt(request: PromptImageRequest, context: ImagingCallContext): Promise<PromptImageResult> {
    const client = this.requireClient();
    const messages: ChatMessage[] = [
      { role: 'system', content: PROMPT_SYSTEM_MESSAGE },
      { role: 'user', content: request.prompt }
    ];
    const complete = (conversation: ChatMessage[]): Promise<ChatReply> =>
      this.callProvider('process image prompt', () =>
        client.complete(
          { model: request.model, temperature: request.temperature, messages: conversation, tools: IMAGE_TOOLS },
          context.signal
        )
      );

    const first = await complete(messages);
    if (first.toolCalls.length === 0) {
      return {
        originalPrompt: request.prompt,
        generatedImages: null,
        editedImages: null,
        message: first.content ?? DEFAULT_PROMPT_MESSAGE
      };
    }

    let generatedImages: string[] | null = null;
    let editedImages: string[] | null = null;
    const toolMessages: ChatMessage[] = [];
    for (const call of first.toolCalls) {
      const outcome = await this.runTool(call, context);
      if (outcome.ok) {
        if (call.name === GENERATE_IMAGE_TOOL) {
          generatedImages = [...(generatedImages ?? []), ...outcome.value];
        } else {
          editedImages = [...(editedImages ?? []), ...outcome.value];
        }
      } else {
        context.logger.warn({ tool: call.name, toolCallId: call.id, reason: outcome.error }, 'Image tool call failed');
      }
      toolMessages.push({
        role: 'tool',
        toolCallId: call.id,
        content: JSON.stringify(outcome.ok ? { urls: outcome.value } : { error: outcome.error })
      });
    }

    const final = await complete([
      ...messages,
      { role: 'assistant', content: first.content, toolCalls: first.toolCalls },
      ...toolMessages
    ]);

    return {
      originalPrompt: request.prompt,
      generatedImages,
      editedImages,
      message: final.content ?? first.content ?? DEFAULT_PROMPT_MESSAGE
    };
  }

  private async runTool(call: ChatToolCall, context: ImagingCallContext): Promise<Outcome<string[], string>> {
    const args = parseToolArguments(call.arguments);
    try {
      switch (call.name) {
        case GENERATE_IMAGE_TOOL: {
          const parsed = generateImageArgsSchema.safeParse(args);
          if (!parsed.success) {
            return fail(`Invalid arguments for ${GENERATE_IMAGE_TOOL}: ${describeIssues(parsed.error)}`);
          }
          return ok(await this.generate(parsed.data, context));
        }
        case EDIT_IMAGE_TOOL: {
          const parsed = editImageArgsSchema.safeParse(args);
          if (!parsed.success) {
            return fail(`Invalid arguments for ${EDIT_IMAGE_TOOL}: ${describeIssues(parsed.error)}`);
          }
          return ok(await this.edit(parsed.data, context));
        }
        default:
          return fail(`Unknown tool ${call.name}`);
      }
    } catch (err) {
      return fail(errorMessage(err));
    }
  }

  private requireClient(): ImageAiClient {
    if (!this.client) {
      throw new GatewayError('Image generation is not configured: set OPENAI_API_KEY', 'IMAGE_AI_UNAVAILABLE');
    }
    return this.client;
  }

  private async callProvider<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new GatewayError(`Failed to ${operation}: ${errorMessage(err)}`, 'IMAGE_AI_FAILED');
    }
  }

  private async fetchSourceImages(urls: readonly string[], signal?: AbortSignal): Promise<SourceImage[]> {
    const images: SourceImage[] = [];
    for (const [index, url] of urls.entries()) {
      let status: number;
      let declared: string;
      let bytes: Uint8Array;
      try {
        const response = await fetch(url, { signal, dispatcher: this.sourceDispatcher });
        status = response.status;
        declared = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
        bytes = new Uint8Array(await response.arrayBuffer());
      } catch (err) {
        throw new GatewayError(`Failed to fetch image ${url}: ${errorMessage(err)}`, 'INVALID_IMAGE');
      }

      if (status < 200 || status >= 300) {
        throw new GatewayError(`Failed to fetch image ${url}: HTTP ${status}`, 'INVALID_IMAGE');
      }
      if (bytes.byteLength === 0) {
        throw new GatewayError(`Failed to fetch image ${url}: empty body`, 'INVALID_IMAGE');
      }

      const extension = extensionForMimeType(declared);
      images.push({
        bytes,
        filename: `source-${index + 1}.${extension ?? 'png'}`,
        contentType: extension === null ? 'image/png' : declared
      });
    }
    return images;
  }

  private async storeProduced(
    produced: readonly ProducedImage[],
    operation: string,
    context: ImagingCallContext
  ): Promise<string[]> {
    const urls: string[] = [];
    for (const image of produced) {
      if (image.base64) {
        const key = imageKey(this.generateId(), 'png');
        const stored = await this.objectStore.putPublicObject({
          key,
          body: new Uint8Array(Buffer.from(image.base64, 'base64')),
          contentType: 'image/png'
        });
        context.logger.info({ key, url: stored.url }, 'Stored provider image in object storage');
        urls.push(stored.url);
      } else if (image.url) {
        urls.push(image.url);
      }
    }
    if (urls.length === 0) {
      throw new GatewayError(`Failed to ${operation}: provider returned no images`, 'IMAGE_AI_FAILED');
    }
    return urls;
  }
}
