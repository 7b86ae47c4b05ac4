import * as k8s from '@kubernetes/client-node';
import { BaseResourceOperations, ResourceOperationOptions } from '../BaseResourceOperations.js';
import { KubernetesClient } from '../KubernetesClient.js';

/**
 * Namespace operations implementation - Read-only operations
 */
export class NamespaceOperations extends BaseResourceOperations<k8s.V1Namespace> {
  constructor(client: KubernetesClient) {
    super(client, 'Namespace');
  }

  /**
   * Get a Namespace by name
   */
  async get(name: string, options?: ResourceOperationOptions): Promise<k8s.V1Namespace> {
    try {
      const response = await this.withAbort(
        () => this.client.core.readNamespace(name),
        options?.signal,
      );
      return response.body;
    } catch (error) {
      this.handleApiError(error, 'Get', name);
    }
  }

  /**
   * List Namespaces
   */
  async list(options?: ResourceOperationOptions): Promise<k8s.V1NamespaceList> {
    const { continueToken, fieldSelector, labelSelector, limit } = this.buildListOptions(options);
    try {
      const response = await this.withAbort(
        () =>
          this.client.core.listNamespace(
            undefined,
            undefined,
            continueToken,
            fieldSelector,
            labelSelector,
            limit,
          ),
        options?.signal,
      );
      return response.body;
    } catch (error) {
      this.handleApiError(error, 'List');
    }
  }
}
