import { convertApiError } from '../kubernetes/ErrorHandling.js';
import { NamespaceListError } from './errors.js';
import type { InvocationContext, NamespaceLike, NamespaceLister } from './types.js';

/**
 * Report whether `name` is already a namespace in the cluster.
 *
 * Lists namespaces once and stops scanning at the first match.
 *
 * @throws {NamespaceListError} when the listing fails or the invocation is aborted
 */
export async function namespaceExists(
  lister: NamespaceLister,
  name: string,
  context: InvocationContext = {},
): Promise<boolean> {
  let namespaces: { items: NamespaceLike[] };
  try {
    namespaces = await lister.list({ signal: context.signal });
  } catch (error) {
    const listError = new NamespaceListError(convertApiError(error));
    context.logger?.warn(listError.message);
    throw listError;
  }

  const exists = namespaces.items.some((item) => item.metadata?.name === name);
  context.logger?.debug(
    `Namespace ${name} ${exists ? 'already exists' : 'not found'} among ${namespaces.items.length} namespaces`,
  );
  return exists;
}
