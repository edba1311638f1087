import { Buffer } from 'node:buffer';
import { randomUUID } from 'node:crypto';

import { GatewayError } from '../errors';
import type { ObjectStore } from '../storage/objectStore';

export interface DecodedImage {
  bytes: Uint8Array;
  extension: string;
  contentType: string;
}

export interface UploadImagesOptions {
  objectStore: ObjectStore;
  logger: { info(obj: Record<string, unknown>, msg: string): void };
  generateId?: () => string;
}

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'image/bmp': 'bmp',
  'image/svg+xml': 'svg'
};

const DATA_URI = /^data:([^,]*),/;
const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

export function extensionForMimeType(mime: string): string | null {
  const normalized = mime.split(';')[0].trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(IMAGE_EXTENSIONS, normalized) ? IMAGE_EXTENSIONS[normalized] : null;
}

function invalidImage(reason: string): GatewayError {
  return new GatewayError(`Failed to process image: ${reason}`, 'INVALID_IMAGE');
}

/**
 * Accepts raw base64 or a `data:<mime>;base64,` URI. Unknown or missing mime types are
 * stored as PNG.
 */
export function decodeImagePayload(entry: string): DecodedImage {
  let payload = entry.trim();
  let mime = 'image/png';

  const dataUri = DATA_URI.exec(payload);
  if (dataUri) {
    const declared = (dataUri[1] ?? '').split(';')[0].trim().toLowerCase();
    if (extensionForMimeType(declared) !== null) {
      mime = declared;
    }
    payload = payload.slice(dataUri[0].length);
  }

  payload = payload.replace(/\s+/g, '');
  if (payload.length === 0) {
    throw invalidImage('empty image payload');
  }
  if (payload.length % 4 !== 0 || !BASE64_BODY.test(payload)) {
    throw invalidImage('payload is not valid base64');
  }

  const extension = IMAGE_EXTENSIONS[mime];
  return {
    bytes: new Uint8Array(Buffer.from(payload, 'base64')),
    extension,
    contentType: mime === 'image/jpg' ? 'image/jpeg' : mime
  };
}

export function imageKey(id: string, extension: string): string {
  return `image_${id.replace(/-/g, '')}.${extension}`;
}

/**
 * Decodes every entry before storing any, so a malformed entry uploads nothing.
 */
export async function uploadImages(images: readonly string[], options: UploadImagesOptions): Promise<string[]> {
  const decoded = images.map((entry) => decodeImagePayload(entry));
  const generateId = options.generateId ?? randomUUID;

  const urls: string[] = [];
  for (const image of decoded) {
    const key = imageKey(generateId(), image.extension);
    const stored = await options.objectStore.putPublicObject({
      key,
      body: image.bytes,
      contentType: image.contentType
    });
    options.logger.info({ key, url: stored.url }, 'Uploaded image to object storage');
    urls.push(stored.url);
  }
  return urls;
}
