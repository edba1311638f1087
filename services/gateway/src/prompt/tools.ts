import { z } from 'zod';

import {
  DEFAULT_IMAGE_MODEL,
  IMAGE_MODELS,
  IMAGE_SIZES,
  MAX_IMAGES_PER_EDIT,
  MAX_IMAGES_PER_GENERATION,
  type ChatTool
} from './types';

export const GENERATE_IMAGE_TOOL = 'generate_image';
export const EDIT_IMAGE_TOOL = 'edit_image';

export const generateImageArgsSchema = z.object({
  prompt: z.string().trim().min(1),
  model: z.enum(IMAGE_MODELS).optional(),
  count: z.number().int().min(1).max(MAX_IMAGES_PER_GENERATION).optional(),
  size: z.enum(IMAGE_SIZES).optional()
});

export type GenerateImageArgs = z.infer<typeof generateImageArgsSchema>;

export const editImageArgsSchema = z.object({
  image_urls: z.array(z.string().url()).min(1).max(MAX_IMAGES_PER_EDIT),
  prompt: z.string().trim().min(1)
});

export type EditImageArgs = z.infer<typeof editImageArgsSchema>;

export const PROMPT_SYSTEM_MESSAGE = [
  'You are an assistant that handles image requests.',
  'Use generate_image to create new images from a description, and edit_image to change existing images given their URLs.',
  'For generation, turn the request into a detailed prompt. For edits, pass every image URL the user mentions and a clear instruction.',
  'After the tools have run, reply with a short summary of what was produced.'
].join('\n');

export const IMAGE_TOOLS: ChatTool[] = [
  {
    name: GENERATE_IMAGE_TOOL,
    description: 'Generate images from a text prompt',
    parameters: {
      type: 'object',
      properties: {
        prompt: { type: 'string', description: 'A detailed description of the image to generate' },
        model: {
          type: 'string',
          enum: [...IMAGE_MODELS],
          description: 'The image model to use',
          default: DEFAULT_IMAGE_MODEL
        },
        count: {
          type: 'integer',
          minimum: 1,
          maximum: MAX_IMAGES_PER_GENERATION,
          description: 'Number of images to generate',
          default: 1
        },
        size: {
          type: 'string',
          enum: [...IMAGE_SIZES],
          description: 'Image size. Leave out to use the default for the model.'
        }
      },
      required: ['prompt']
    }
  },
  {
    name: EDIT_IMAGE_TOOL,
    description: 'Edit one or more images according to a text prompt',
    parameters: {
      type: 'object',
      properties: {
        image_urls: {
          type: 'array',
          items: { type: 'string' },
          minItems: 1,
          maxItems: MAX_IMAGES_PER_EDIT,
          description: 'URLs of the images to edit'
        },
        prompt: { type: 'string', description: 'Description of the edits to apply' }
      },
      required: ['image_urls', 'prompt']
    }
  }
];

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
