import * as k8s from '@kubernetes/client-node';
import { Logger } from 'winston';
import { KubernetesClient } from './KubernetesClient.js';
import { KubernetesError, TimeoutError, convertApiError } from './ErrorHandling.js';

/**
 * Common options for resource operations
 */
export interface ResourceOperationOptions {
  /**
   * Label selector for filtering resources
   */
  labelSelector?: string;

  /**
   * Field selector for filtering resources
   */
  fieldSelector?: string;

  /**
   * Maximum number of results to return
   */
  limit?: number;

  /**
   * Continue token for pagination
   */
  continueToken?: string;

  /**
   * Abort signal of the calling invocation
   */
  signal?: AbortSignal;
}

/**
 * List options in the order the generated API methods take them
 */
export interface ListCallOptions {
  continueToken?: string;
  fieldSelector?: string;
  labelSelector?: string;
  limit?: number;
}

/**
 * Read-only operations shared by all resource types
 */
export interface IResourceOperations<T extends k8s.KubernetesObject> {
  /**
   * Get a resource by name
   */
  get(name: string, options?: ResourceOperationOptions): Promise<T>;

  /**
   * List resources
   */
  list(options?: ResourceOperationOptions): Promise<k8s.KubernetesListObject<T>>;
}

/**
 * Base class for read-only resource operations with typed error handling
 */
export abstract class BaseResourceOperations<T extends k8s.KubernetesObject>
  implements IResourceOperations<T>
{
  protected logger?: Logger;

  constructor(
    protected client: KubernetesClient,
    protected resourceType: string,
  ) {
    this.logger = client.getLogger();
  }

  /**
   * Handle API errors and convert to a typed KubernetesError
   */
  protected handleApiError(error: unknown, operation: string, resourceName?: string): never {
    const typedError = convertApiError(error);

    if (resourceName) {
      throw new KubernetesError(
        typedError.message,
        typedError.code,
        typedError.statusCode,
        typedError.retryable,
        {
          ...typedError.details,
          resource: this.resourceType,
          resourceName,
          operation,
        },
      );
    }

    this.logger?.debug(`${this.resourceType}.${operation} failed: ${typedError.message}`);
    throw typedError;
  }

  /**
   * Build list options from ResourceOperationOptions
   */
  protected buildListOptions(options?: ResourceOperationOptions): ListCallOptions {
    const listOptions: ListCallOptions = {};

    if (options?.labelSelector) {
      listOptions.labelSelector = options.labelSelector;
    }

    if (options?.fieldSelector) {
      listOptions.fieldSelector = options.fieldSelector;
    }

    if (options?.limit) {
      listOptions.limit = options.limit;
    }

    if (options?.continueToken) {
      listOptions.continueToken = options.continueToken;
    }

    return listOptions;
  }

  /**
   * Send the request unless the caller's signal has aborted, and settle with it unless the
   * signal aborts first
   */
  protected async withAbort<R>(request: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    if (!signal) return request();
    if (signal.aborted) {
      throw new TimeoutError(`${this.resourceType} request aborted before it was sent`);
    }

    const promise = request();
    return new Promise<R>((resolve, reject) => {
      const onAbort = () => {
        reject(new TimeoutError(`${this.resourceType} request aborted by the caller`));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      promise
        .then((value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        })
        .catch((err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        });
    });
  }

  abstract get(name: string, options?: ResourceOperationOptions): Promise<T>;
  abstract list(options?: ResourceOperationOptions): Promise<k8s.KubernetesListObject<T>>;
}
