export { PipelineError, ExternalDependencyError, isPipelineError } from './pipeline.error';
export { extractStatusCode, errorMessage } from './http-status';
