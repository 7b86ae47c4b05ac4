import { ErrorDetails, KubernetesError } from '../kubernetes/ErrorHandling.js';

/**
 * Raised when the namespace listing behind the collision check fails
 */
export class NamespaceListError extends KubernetesError {
  constructor(cause: KubernetesError) {
    super(
      `failed to list namespaces: ${cause.message}`,
      'NAMESPACE_LIST_ERROR',
      cause.statusCode,
      cause.retryable,
      { ...cause.details, causeCode: cause.code },
    );
    this.name = 'NamespaceListError';
    Object.setPrototypeOf(this, NamespaceListError.prototype);
  }
}

/**
 * Raised when a resource descriptor cannot be serialized; the whole plan is discarded
 */
export class PlanRenderError extends KubernetesError {
  constructor(kind: string, reason: string, details?: ErrorDetails) {
    super(`failed to marshal ${kind} to yaml: ${reason}`, 'PLAN_RENDER_ERROR', undefined, false, {
      ...(details || {}),
      kind,
    });
    this.name = 'PlanRenderError';
    Object.setPrototypeOf(this, PlanRenderError.prototype);
  }
}
