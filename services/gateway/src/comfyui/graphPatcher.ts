import { cloneJson, fail, isJsonObject, ok, type JsonObject, type Outcome } from './json';
import {
  IMAGE_NODE_ID,
  PADDING_NODE_ID,
  RESIZE_NODE_ID,
  type ComfyLogger,
  type PatchSpec,
  type ScalarOverride,
  type StructuralPatchFailure,
  type WorkflowGraph
} from './types';

const SCALAR_TARGETS: ReadonlyArray<{ override: ScalarOverride; nodeId: string }> = [
  { override: 'left', nodeId: PADDING_NODE_ID },
  { override: 'top', nodeId: PADDING_NODE_ID },
  { override: 'right', nodeId: PADDING_NODE_ID },
  { override: 'bottom', nodeId: PADDING_NODE_ID },
  { override: 'width', nodeId: RESIZE_NODE_ID },
  { override: 'height', nodeId: RESIZE_NODE_ID }
];

function nodeInputs(graph: WorkflowGraph, nodeId: string): JsonObject | null {
  const node = graph[nodeId];
  if (!isJsonObject(node)) {
    return null;
  }
  const inputs = node.inputs;
  return isJsonObject(inputs) ? inputs : null;
}

function missingNode(nodeId: string, field: string): StructuralPatchFailure {
  return {
    kind: 'structural_patch',
    nodeId,
    field,
    message: `Failed to replace image URL in prompt: node ${nodeId} has no inputs to receive "${field}"`
  };
}

/**
 * Returns a patched deep copy of `graph` for the expand-image workflow.
 *
 * A template without the image node is passed through untouched (logged, not an error).
 * When the image node exists, its image input is always replaced, and each non-null
 * scalar override must find its padding/resize node or the patch fails.
 */
export function applyOverrides(
  graph: WorkflowGraph,
  spec: PatchSpec,
  logger?: Pick<ComfyLogger, 'warn'>
): Outcome<WorkflowGraph, StructuralPatchFailure> {
  const patched = cloneJson(graph);

  if (!Object.prototype.hasOwnProperty.call(patched, IMAGE_NODE_ID)) {
    logger?.warn({ nodeId: IMAGE_NODE_ID }, `Node ID ${IMAGE_NODE_ID} not found in prompt`);
    return ok(patched);
  }

  const imageInputs = nodeInputs(patched, IMAGE_NODE_ID);
  if (!imageInputs) {
    return fail(missingNode(IMAGE_NODE_ID, 'image'));
  }
  imageInputs.image = spec.imageUrl;

  for (const { override, nodeId } of SCALAR_TARGETS) {
    const value = spec[override];
    if (value === null || value === undefined) {
      continue;
    }
    const inputs = nodeInputs(patched, nodeId);
    if (!inputs) {
      return fail(missingNode(nodeId, override));
    }
    inputs[override] = value;
  }

  return ok(patched);
}
