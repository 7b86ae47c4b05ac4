import { KubernetesClient } from './KubernetesClient.js';
import { NamespaceOperations } from './resources/NamespaceOperations.js';

/**
 * Resource operations manager
 */
export class ResourceOperations {
  private namespaces: NamespaceOperations;

  constructor(client: KubernetesClient) {
    this.namespaces = new NamespaceOperations(client);
  }

  /**
   * Get namespace operations
   */
  public get namespace(): NamespaceOperations {
    return this.namespaces;
  }
}
