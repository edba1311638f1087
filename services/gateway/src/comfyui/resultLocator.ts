import { fail, isJsonObject, ok, readString, type JsonValue, type Outcome } from './json';
import { OUTPUT_NODE_ID, type LocatorField, type ResultLocatorFailure } from './types';

function missing(field: LocatorField, message: string): { ok: false; error: ResultLocatorFailure } {
  return fail({ kind: 'result_locator', missing: field, message });
}

/**
 * Resolves the first image produced by the output node into a `/view` reference on the
 * workflow engine. Query values are inserted as stored in the history record.
 */
export function locateArtifact(
  record: JsonValue,
  promptId: string,
  baseUrl: string
): Outcome<string, ResultLocatorFailure> {
  if (!isJsonObject(record) || !Object.prototype.hasOwnProperty.call(record, promptId)) {
    return missing('run', `Prompt ID ${promptId} not found in history`);
  }

  const run = record[promptId];
  if (!isJsonObject(run) || !isJsonObject(run.outputs)) {
    return missing('outputs', `No outputs found for prompt ID ${promptId}`);
  }

  const node = run.outputs[OUTPUT_NODE_ID];
  if (!isJsonObject(node)) {
    return missing('node', `Output node ${OUTPUT_NODE_ID} not found in prompt history`);
  }

  const images = node.images;
  const image = Array.isArray(images) ? images[0] : undefined;
  if (!isJsonObject(image)) {
    return missing('images', `No images found for output node ${OUTPUT_NODE_ID}`);
  }

  const fields: Array<'filename' | 'subfolder' | 'type'> = ['filename', 'subfolder', 'type'];
  const values: Record<'filename' | 'subfolder' | 'type', string> = { filename: '', subfolder: '', type: '' };
  for (const field of fields) {
    const value = readString(image, field);
    if (!value.ok) {
      return missing(field, `Image descriptor for output node ${OUTPUT_NODE_ID} is missing a string "${field}"`);
    }
    values[field] = value.value;
  }

  const base = baseUrl.replace(/\/+$/, '');
  return ok(`${base}/view?filename=${values.filename}&subfolder=${values.subfolder}&type=${values.type}`);
}
