export {
  KubernetesClient,
  AuthMethod,
  detectAuthMethod,
  resolveKubeConfigPath,
} from './KubernetesClient.js';
export type { KubernetesClientConfig } from './KubernetesClient.js';

// Export resource operations
export { ResourceOperations } from './ResourceOperations.js';
export { BaseResourceOperations } from './BaseResourceOperations.js';
export type {
  ResourceOperationOptions,
  ListCallOptions,
  IResourceOperations,
} from './BaseResourceOperations.js';
export { NamespaceOperations } from './resources/NamespaceOperations.js';

// Export error handling
export {
  KubernetesError,
  AuthenticationError,
  AuthorizationError,
  ResourceNotFoundError,
  ResourceConflictError,
  ValidationError,
  ServerUnavailableError,
  TimeoutError,
  RateLimitError,
  NetworkError,
  convertApiError,
} from './ErrorHandling.js';
export type { ErrorDetails } from './ErrorHandling.js';
