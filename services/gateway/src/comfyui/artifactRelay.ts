import { randomUUID } from 'node:crypto';

import { contentTypeForExtension, type ObjectStore } from '../storage/objectStore';
import type { ComfyClient } from './comfyClient';
import { fail, ok, type Outcome } from './json';
import type { ComfyLogger, RelayFailure, StoredArtifact } from './types';

export interface RelayOptions {
  client: Pick<ComfyClient, 'download'>;
  objectStore: ObjectStore;
  logger: ComfyLogger;
  signal?: AbortSignal;
  generateId?: () => string;
}

const UUID_SUFFIX = /-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface SplitFilename {
  stem: string;
  extension: string | null;
}

export function splitFilename(filename: string): SplitFilename {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0 || dot === filename.length - 1) {
    return { stem: filename, extension: null };
  }
  return { stem: filename.slice(0, dot), extension: filename.slice(dot + 1) };
}

/**
 * Builds `{stem}-{id}.{ext}`, dropping an id a previous relay already appended to the stem.
 */
export function buildArtifactKey(filename: string, id: string): string {
  const { stem, extension } = splitFilename(filename);
  const base = stem.replace(UUID_SUFFIX, '');
  return extension ? `${base}-${id}.${extension}` : `${base}-${id}`;
}

// The locator writes the filename into the query verbatim, so read it back raw:
// URLSearchParams would turn `+` into a space.
function readFilename(reference: string): string | null {
  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    return null;
  }
  const segment = url.search
    .slice(1)
    .split('&')
    .find((part) => part.startsWith('filename='));
  const filename = segment?.slice('filename='.length);
  return filename ? filename : null;
}

/**
 * Copies a workflow artifact into the public bucket under a fresh key.
 */
export async function relayArtifact(
  reference: string,
  options: RelayOptions
): Promise<Outcome<StoredArtifact, RelayFailure>> {
  const { logger } = options;
  const filename = readFilename(reference);
  if (!filename) {
    return fail({
      kind: 'relay',
      stage: 'download',
      message: `Failed to relay artifact: reference has no filename (${reference})`
    });
  }

  const downloaded = await options.client.download(reference, options.signal);
  if (!downloaded.ok) {
    return fail({
      kind: 'relay',
      stage: 'download',
      message: `Failed to download artifact: ${downloaded.error.message}`,
      cause: downloaded.error
    });
  }

  const key = buildArtifactKey(filename, (options.generateId ?? randomUUID)());
  const { extension } = splitFilename(filename);

  try {
    const stored = await options.objectStore.putPublicObject({
      key,
      body: downloaded.value,
      contentType: contentTypeForExtension(extension ?? '')
    });
    logger.info({ key, url: stored.url, bytes: downloaded.value.byteLength }, 'Relayed workflow artifact to object storage');
    return ok({ key: stored.key, url: stored.url });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error({ key, err }, 'Failed to store workflow artifact');
    return fail({ kind: 'relay', stage: 'upload', message: `Failed to upload artifact: ${reason}` });
  }
}
