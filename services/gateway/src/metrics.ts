import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface GatewayMetrics {
  register: Registry;
  comfySubmissions: Counter<'outcome'>;
  artifactRelays: Counter<'outcome'>;
  imagesUploaded: Counter<string>;
  todoOperations: Counter<'operation'>;
  imageAiRequests: Counter<'operation' | 'outcome'>;
  comfyRequestDuration: Histogram<'method' | 'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): GatewayMetrics => {
  const register = new Registry();

  const comfySubmissions = new Counter({
    name: 'gateway_comfyui_submissions_total',
    help: 'Expand-image workflow submissions by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const artifactRelays = new Counter({
    name: 'gateway_artifact_relays_total',
    help: 'Workflow artifacts relayed into object storage by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const imagesUploaded = new Counter({
    name: 'gateway_images_uploaded_total',
    help: 'Images uploaded through the upload endpoint',
    registers: [register]
  });

  const todoOperations = new Counter({
    name: 'gateway_todo_operations_total',
    help: 'Todo operations served by the gateway',
    registers: [register],
    labelNames: ['operation'] as const
  });

  const imageAiRequests = new Counter({
    name: 'gateway_image_ai_requests_total',
    help: 'Image generation, edit and prompt requests by outcome',
    registers: [register],
    labelNames: ['operation', 'outcome'] as const
  });

  const comfyRequestDuration = new Histogram({
    name: 'gateway_comfyui_request_duration_seconds',
    help: 'Latency of requests sent to the workflow engine',
    registers: [register],
    labelNames: ['method', 'outcome'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30]
  });

  const readinessGauge = new Gauge({
    name: 'gateway_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    comfySubmissions,
    artifactRelays,
    imagesUploaded,
    todoOperations,
    imageAiRequests,
    comfyRequestDuration,
    readinessGauge
  };
};
