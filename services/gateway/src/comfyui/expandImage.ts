import type { Dispatcher } from 'undici';

import type { ObjectStore } from '../storage/objectStore';
import { relayArtifact } from './artifactRelay';
import type { ComfyClient } from './comfyClient';
import { applyOverrides } from './graphPatcher';
import type { Outcome } from './json';
import { locateArtifact } from './resultLocator';
import { fetchWorkflowTemplate } from './templateFetcher';
import type { ComfyFailure, ComfyLogger, PatchSpec, PromptSubmission, StoredArtifact } from './types';

export interface ExpandImageDependencies {
  client: ComfyClient;
  objectStore: ObjectStore;
  templateUrl: string;
  templateDispatcher?: Dispatcher;
  logger: ComfyLogger;
  generateId?: () => string;
}

export interface ExpandImageRequest {
  patch: PatchSpec;
  clientId: string;
}

/**
 * Template fetch, patch and submission. Returns once the engine has queued the run; the
 * caller polls {@link collectExpandImageResult} with the returned prompt id.
 */
export async function submitExpandImage(
  deps: ExpandImageDependencies,
  request: ExpandImageRequest,
  signal?: AbortSignal
): Promise<Outcome<PromptSubmission, ComfyFailure>> {
  const template = await fetchWorkflowTemplate(deps.templateUrl, {
    dispatcher: deps.templateDispatcher,
    logger: deps.logger,
    signal
  });
  if (!template.ok) {
    return template;
  }

  const patched = applyOverrides(template.value, request.patch, deps.logger);
  if (!patched.ok) {
    return patched;
  }

  const submission = await deps.client.submitPrompt(patched.value, request.clientId, signal);
  if (submission.ok) {
    deps.logger.info({ promptId: submission.value.promptId, clientId: request.clientId }, 'Submitted expand image workflow');
  }
  return submission;
}

/** History lookup, artifact location and relay into object storage. */
export async function collectExpandImageResult(
  deps: ExpandImageDependencies,
  promptId: string,
  signal?: AbortSignal
): Promise<Outcome<StoredArtifact, ComfyFailure>> {
  const history = await deps.client.fetchHistory(promptId, signal);
  if (!history.ok) {
    return history;
  }

  const reference = locateArtifact(history.value, promptId, deps.client.baseUrl);
  if (!reference.ok) {
    return reference;
  }

  return relayArtifact(reference.value, {
    client: deps.client,
    objectStore: deps.objectStore,
    logger: deps.logger,
    signal,
    generateId: deps.generateId
  });
}
