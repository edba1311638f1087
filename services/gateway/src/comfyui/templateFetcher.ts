import { fetch, type Dispatcher } from 'undici';

import { fail, isJsonObject, ok, parseJson, type Outcome } from './json';
import type { ComfyLogger, TemplateFetchFailure, WorkflowGraph } from './types';

export interface FetchTemplateOptions {
  dispatcher?: Dispatcher;
  logger: ComfyLogger;
  signal?: AbortSignal;
}

const MESSAGE_PREFIX = 'Failed to fetch workflow JSON: ';

function templateFailure(
  reason: TemplateFetchFailure['reason'],
  detail: string,
  statusCode: number | null = null
): TemplateFetchFailure {
  return { kind: 'template_fetch', reason, statusCode, message: `${MESSAGE_PREFIX}${detail}` };
}

/**
 * Downloads the workflow template from its configured location. Single attempt.
 */
export async function fetchWorkflowTemplate(
  templateUrl: string,
  options: FetchTemplateOptions
): Promise<Outcome<WorkflowGraph, TemplateFetchFailure>> {
  const { logger } = options;

  let status: number;
  let text: string;
  try {
    const response = await fetch(templateUrl, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: options.signal,
      dispatcher: options.dispatcher
    });
    status = response.status;
    text = await response.text();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.error({ templateUrl, err }, 'Workflow template request failed');
    return fail(templateFailure('transport', detail));
  }

  if (status < 200 || status >= 300) {
    logger.error({ templateUrl, statusCode: status }, 'Workflow template request returned an error status');
    return fail(templateFailure('status', `HTTP ${status}`, status));
  }

  const parsed = parseJson(text);
  if (!parsed.ok) {
    logger.error({ templateUrl, err: parsed.error }, 'Workflow template is not valid JSON');
    return fail(templateFailure('parse', parsed.error, status));
  }
  if (!isJsonObject(parsed.value)) {
    logger.error({ templateUrl }, 'Workflow template is not a JSON object');
    return fail(templateFailure('parse', 'template must be a JSON object', status));
  }

  logger.info({ templateUrl }, 'Fetched workflow template');
  return ok(parsed.value);
}
