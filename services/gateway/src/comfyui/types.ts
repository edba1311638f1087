import type { JsonObject, JsonValue } from './json';

/** Nodes keyed by identifier, as authored in the workflow template. */
export type WorkflowGraph = JsonObject;

export const IMAGE_NODE_ID = '22';
export const PADDING_NODE_ID = '15';
export const RESIZE_NODE_ID = '21';
export const OUTPUT_NODE_ID = '16';

export interface PatchSpec {
  imageUrl: string;
  left?: number | null;
  top?: number | null;
  right?: number | null;
  bottom?: number | null;
  width?: number | null;
  height?: number | null;
}

export type ScalarOverride = Exclude<keyof PatchSpec, 'imageUrl'>;

export type TemplateFetchFailure = {
  kind: 'template_fetch';
  reason: 'status' | 'transport' | 'parse';
  statusCode: number | null;
  message: string;
};

export type StructuralPatchFailure = {
  kind: 'structural_patch';
  nodeId: string;
  field: string;
  message: string;
};

export type RemoteServiceCategory = 'unavailable' | 'unauthorized' | 'forbidden' | 'not_found' | 'internal';

export type RemoteServiceFailure = {
  kind: 'remote_service';
  category: RemoteServiceCategory;
  statusCode: number | null;
  body: string | null;
  message: string;
};

export type MissingRunIdentifierFailure = {
  kind: 'missing_run_identifier';
  response: JsonValue;
  message: string;
};

export type LocatorField = 'run' | 'outputs' | 'node' | 'images' | 'filename' | 'subfolder' | 'type';

export type ResultLocatorFailure = {
  kind: 'result_locator';
  missing: LocatorField;
  message: string;
};

export type RelayFailure = {
  kind: 'relay';
  stage: 'download' | 'upload';
  message: string;
  cause?: RemoteServiceFailure;
};

export type ComfyFailure =
  | TemplateFetchFailure
  | StructuralPatchFailure
  | RemoteServiceFailure
  | MissingRunIdentifierFailure
  | ResultLocatorFailure
  | RelayFailure;

export interface PromptSubmission {
  promptId: string;
  response: JsonObject;
}

export interface StoredArtifact {
  key: string;
  url: string;
}

/** Structured logger surface the workflow components write to. */
export interface ComfyLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}
