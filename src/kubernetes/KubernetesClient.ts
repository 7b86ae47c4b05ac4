import * as k8s from '@kubernetes/client-node';
import { Logger } from 'winston';
import { join } from 'path';
import { homedir } from 'os';
import { existsSync } from 'fs';
import { ResourceOperations } from './ResourceOperations.js';

export interface KubernetesClientConfig {
  /** Kubeconfig file; defaults to the first existing entry of KUBECONFIG, then ~/.kube/config */
  kubeConfigPath?: string;
  /** Kubeconfig context to use instead of the file's current-context */
  context?: string;
  /** Authenticate with the pod's service account */
  inCluster?: boolean;
  /** Used together with apiServerUrl */
  bearerToken?: string;
  apiServerUrl?: string;
  /** Accept any server certificate, for token and kubeconfig clusters alike */
  skipTlsVerify?: boolean;
  logger?: Logger;
}

export enum AuthMethod {
  KUBECONFIG = 'kubeconfig',
  IN_CLUSTER = 'in-cluster',
  TOKEN = 'token',
}

const TOKEN_CONTEXT = 'default';

export function detectAuthMethod(config: KubernetesClientConfig): AuthMethod {
  if (config.inCluster) {
    return AuthMethod.IN_CLUSTER;
  }
  if (config.bearerToken && config.apiServerUrl) {
    return AuthMethod.TOKEN;
  }
  return AuthMethod.KUBECONFIG;
}

/**
 * Pick the kubeconfig file to read. KUBECONFIG may list several paths separated by `:`;
 * the first one that exists wins.
 */
export function resolveKubeConfigPath(
  explicitPath?: string,
  kubeConfigEnv: string | undefined = process.env.KUBECONFIG,
): string {
  if (explicitPath) {
    return explicitPath;
  }
  const fromEnv = kubeConfigEnv?.split(':').find((path) => path && existsSync(path));
  return fromEnv ?? join(homedir(), '.kube', 'config');
}

/**
 * Read-only access to the cluster the planning tools inspect.
 *
 * Credentials are loaded once in the constructor. Kubeconfig clients reload the file on
 * {@link refreshCurrentContext} so a `kubectl config use-context` is picked up between calls.
 */
export class KubernetesClient {
  private kc: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api;
  private authMethod: AuthMethod;
  private logger?: Logger;
  private _resources: ResourceOperations;

  constructor(private config: KubernetesClientConfig = {}) {
    this.logger = config.logger;
    this.kc = new k8s.KubeConfig();
    this.authMethod = detectAuthMethod(config);

    try {
      this.loadCredentials();
    } catch (error) {
      const message = `Failed to initialize Kubernetes client: ${error instanceof Error ? error.message : String(error)}`;
      this.logger?.error(message);
      throw new Error(message);
    }
    this.logger?.info(`Kubernetes client initialized using ${this.authMethod} authentication`);

    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
    this._resources = new ResourceOperations(this);
  }

  private loadCredentials(): void {
    switch (this.authMethod) {
      case AuthMethod.IN_CLUSTER:
        this.kc.loadFromCluster();
        this.logger?.debug('Loaded in-cluster configuration');
        break;
      case AuthMethod.TOKEN:
        this.loadTokenConfig();
        break;
      case AuthMethod.KUBECONFIG:
        this.loadKubeConfigFile();
        break;
    }
  }

  private loadTokenConfig(): void {
    const { bearerToken, apiServerUrl } = this.config;
    if (!bearerToken || !apiServerUrl) {
      throw new Error('Bearer token and API server URL are required for token authentication');
    }

    this.kc.loadFromOptions({
      clusters: [
        {
          name: TOKEN_CONTEXT,
          server: apiServerUrl,
          skipTLSVerify: this.config.skipTlsVerify ?? false,
        },
      ],
      users: [{ name: TOKEN_CONTEXT, token: bearerToken }],
      contexts: [{ name: TOKEN_CONTEXT, cluster: TOKEN_CONTEXT, user: TOKEN_CONTEXT }],
      currentContext: TOKEN_CONTEXT,
    });
    this.logger?.debug(`Configured token authentication for: ${apiServerUrl}`);
  }

  private loadKubeConfigFile(): void {
    const kubeConfigPath = resolveKubeConfigPath(this.config.kubeConfigPath);
    if (!existsSync(kubeConfigPath)) {
      throw new Error(`Kubeconfig file not found at: ${kubeConfigPath}`);
    }

    this.kc.loadFromFile(kubeConfigPath);
    // An explicitly configured context wins over the file's current-context
    if (this.config.context) {
      this.kc.setCurrentContext(this.config.context);
    }
    if (this.config.skipTlsVerify) {
      this.skipTlsVerifyForCurrentCluster();
    }
    this.logger?.debug(`Loaded kubeconfig from: ${kubeConfigPath}`);
  }

  // Cluster entries are read-only, so the kubeconfig is reloaded with a patched copy
  private skipTlsVerifyForCurrentCluster(): void {
    const current = this.getCurrentCluster();
    if (!current || current.skipTLSVerify) {
      return;
    }

    this.kc.loadFromOptions({
      clusters: this.kc
        .getClusters()
        .map((cluster) =>
          cluster.name === current.name ? { ...cluster, skipTLSVerify: true } : cluster,
        ),
      users: this.kc.getUsers(),
      contexts: this.kc.getContexts(),
      currentContext: this.kc.getCurrentContext(),
    });
    this.logger?.debug(`TLS verification disabled for cluster ${current.name}`);
  }

  public getCurrentCluster(): k8s.Cluster | null {
    const currentContext = this.kc.getCurrentContext();
    const context = this.kc.getContexts().find((c) => c.name === currentContext);
    if (!context) {
      return null;
    }
    return this.kc.getClusters().find((c) => c.name === context.cluster) ?? null;
  }

  public getCurrentContext(): string {
    return this.kc.getCurrentContext();
  }

  /**
   * Reload the kubeconfig file and rebuild the API client when the current context moved.
   * A failed reload keeps the previously loaded context.
   */
  public async refreshCurrentContext(): Promise<void> {
    if (this.authMethod !== AuthMethod.KUBECONFIG) {
      this.logger?.debug('Skipping context refresh for non-kubeconfig authentication');
      return;
    }

    const oldContext = this.kc.getCurrentContext();
    try {
      this.loadKubeConfigFile();
    } catch (error) {
      this.logger?.warn(
        `Failed to refresh current context: ${error instanceof Error ? error.message : String(error)}`,
      );
      return;
    }

    const newContext = this.kc.getCurrentContext();
    if (oldContext !== newContext) {
      this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
      this.logger?.info(`Context changed from '${oldContext}' to '${newContext}'`);
    }
  }

  public getAuthMethod(): AuthMethod {
    return this.authMethod;
  }

  public getLogger(): Logger | undefined {
    return this.logger;
  }

  public get core(): k8s.CoreV1Api {
    return this.coreV1Api;
  }

  public get kubeConfig(): k8s.KubeConfig {
    return this.kc;
  }

  public get resources(): ResourceOperations {
    return this._resources;
  }
}
