export const IMAGE_MODELS = ['gpt-image-1', 'dall-e-3', 'dall-e-2'] as const;
export type ImageModel = (typeof IMAGE_MODELS)[number];

export const IMAGE_SIZES = [
  'auto',
  '1024x1024',
  '1536x1024',
  '1024x1536',
  '256x256',
  '512x512',
  '1792x1024',
  '1024x1792'
] as const;
export type ImageSize = (typeof IMAGE_SIZES)[number];

export const DEFAULT_IMAGE_MODEL: ImageModel = 'gpt-image-1';
export const EDIT_IMAGE_MODEL: ImageModel = 'gpt-image-1';
export const MAX_IMAGES_PER_GENERATION = 10;
export const MAX_IMAGES_PER_EDIT = 16;

export const SIZES_BY_MODEL: Record<ImageModel, readonly ImageSize[]> = {
  'gpt-image-1': ['auto', '1024x1024', '1536x1024', '1024x1536'],
  'dall-e-3': ['1024x1024', '1792x1024', '1024x1792'],
  'dall-e-2': ['256x256', '512x512', '1024x1024']
};

export function defaultImageSize(model: ImageModel): ImageSize {
  return model === 'gpt-image-1' ? 'auto' : '1024x1024';
}

export interface ImageGenerationRequest {
  prompt: string;
  model: ImageModel;
  count: number;
  size: ImageSize;
}

export interface SourceImage {
  bytes: Uint8Array;
  filename: string;
  contentType: string;
}

export interface ImageEditRequest {
  prompt: string;
  images: SourceImage[];
}

/** One image returned by the provider, inline or hosted. */
export interface ProducedImage {
  base64: string | null;
  url: string | null;
}

export interface ChatToolCall {
  id: string;
  name: string;
  arguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls: ChatToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ChatTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatRequest {
  model: string;
  temperature: number;
  messages: ChatMessage[];
  tools: ChatTool[];
}

export interface ChatReply {
  content: string | null;
  toolCalls: ChatToolCall[];
}

/**
 * Provider operations the imaging service needs. The production implementation wraps the
 * OpenAI SDK; tests supply their own.
 */
export interface ImageAiClient {
  generateImages(request: ImageGenerationRequest, signal?: AbortSignal): Promise<ProducedImage[]>;
  editImages(request: ImageEditRequest, signal?: AbortSignal): Promise<ProducedImage[]>;
  complete(request: ChatRequest, signal?: AbortSignal): Promise<ChatReply>;
}

export interface PromptImageRequest {
  prompt: string;
  model: string;
  temperature: number;
}

export interface PromptImageResult {
  originalPrompt: string;
  generatedImages: string[] | null;
  editedImages: string[] | null;
  message: string;
}
