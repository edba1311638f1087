import type { ExpandImageDependencies } from './comfyui/expandImage';
import type { GatewayConfig } from './config';
import type { GatewayMetrics } from './metrics';
import type { ImagingService } from './prompt/imaging';
import type { ObjectStore } from './storage/objectStore';
import type { TodoService } from './todos/service';
import type { TodoRepository } from './todos/types';

export type ComfyDependencies = Omit<ExpandImageDependencies, 'logger'>;

export interface AppContext {
  config: GatewayConfig;
  metrics: GatewayMetrics;
  comfy: ComfyDependencies;
  objectStore: ObjectStore;
  todoRepository: TodoRepository;
  todos: TodoService;
  imaging: ImagingService;
}
