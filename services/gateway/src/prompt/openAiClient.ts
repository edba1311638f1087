import { Buffer } from 'node:buffer';

import OpenAI, { toFile } from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool
} from 'openai/resources/chat/completions';

import {
  EDIT_IMAGE_MODEL,
  type ChatMessage,
  type ChatReply,
  type ChatRequest,
  type ChatTool,
  type ChatToolCall,
  type ImageAiClient,
  type ImageEditRequest,
  type ImageGenerationRequest,
  type ProducedImage
} from './types';

export interface OpenAiImageClientOptions {
  apiKey: string;
  baseUrl: string | null;
  timeoutMs: number;
}

interface ProviderImage {
  b64_json?: string;
  url?: string;
}

function toProducedImages(data: readonly ProviderImage[] | undefined): ProducedImage[] {
  return (data ?? []).map((image) => ({ base64: image.b64_json ?? null, url: image.url ?? null }));
}

function toToolCallParam(call: ChatToolCall): ChatCompletionMessageToolCall {
  return { id: call.id, type: 'function', function: { name: call.name, arguments: call.arguments } };
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return message.toolCalls.length > 0
        ? { role: 'assistant', content: message.content, tool_calls: message.toolCalls.map(toToolCallParam) }
        : { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

function toToolParam(tool: ChatTool): ChatCompletionTool {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  };
}

export class OpenAiImageClient implements ImageAiClient {
  private readonly client: OpenAI;

  constructor(options: OpenAiImageClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? undefined,
      timeout: options.timeoutMs
    });
  }

  async generateImages(request: ImageGenerationRequest, signal?: AbortSignal): Promise<ProducedImage[]> {
    const response = await this.client.images.generate(
      {
        model: request.model,
        prompt: request.prompt,
        n: request.count,
        size: request.size,
        // gpt-image-1 always answers inline and rejects response_format.
        ...(request.model === 'gpt-image-1' ? {} : { response_format: 'b64_json' as const })
      },
      { signal }
    );
    return toProducedImages(response.data);
  }

  async editImages(request: ImageEditRequest, signal?: AbortSignal): Promise<ProducedImage[]> {
    const files = await Promise.all(
      request.images.map((image) => toFile(Buffer.from(image.bytes), image.filename, { type: image.contentType }))
    );
    const response = await this.client.images.edit(
      { model: EDIT_IMAGE_MODEL, prompt: request.prompt, image: files },
      { signal }
    );
    return toProducedImages(response.data);
  }

  async complete(request: ChatRequest, signal?: AbortSignal): Promise<ChatReply> {
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature,
        messages: request.messages.map(toMessageParam),
        tools: request.tools.map(toToolParam),
        tool_choice: 'auto'
      },
      { signal }
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new Error('chat completion returned no choices');
    }
    return {
      content: choice.message.content,
      toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments
      }))
    };
  }
}
