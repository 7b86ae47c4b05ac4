/**
 * Fixed values used when planning a must-gather run. Read-only for the life of the process.
 */

/** Image used when the caller does not ask for specific gather images */
export const DEFAULT_MUST_GATHER_IMAGE = 'registry.redhat.io/openshift4/ose-must-gather:latest';

/** Collector binary shipped in every must-gather image */
export const DEFAULT_GATHER_COMMAND = '/usr/bin/gather';

/** Directory the gather containers write into */
export const DEFAULT_SOURCE_DIR = '/must-gather';

/** Wrapper that enforces the gather timeout inside the container */
export const TIMEOUT_BINARY = '/usr/bin/timeout';

/** Advertised default for the timeout parameter */
export const DEFAULT_TIMEOUT = '10m';

export const NAMESPACE_PREFIX = 'openshift-must-gather-';
export const NAMESPACE_SUFFIX_LENGTH = 6;

export const SERVICE_ACCOUNT_NAME = 'must-gather-collector';
export const CLUSTER_ROLE_BINDING_PREFIX = 'must-gather-collector-';
export const CLUSTER_ADMIN_ROLE = 'cluster-admin';
export const RBAC_API_GROUP = 'rbac.authorization.k8s.io';

export const POD_GENERATE_NAME = 'must-gather-';
export const POD_PRIORITY_CLASS = 'system-cluster-critical';

export const GATHER_CONTAINER_NAME = 'gather';
export const WAIT_CONTAINER_NAME = 'wait';
export const WAIT_CONTAINER_IMAGE = 'registry.redhat.io/ubi9/ubi-minimal';
export const WAIT_CONTAINER_COMMAND = ['/bin/bash', '-c', 'sleep infinity'];

export const OUTPUT_VOLUME_NAME = 'must-gather-collection';
/** Where the wait container exposes the shared volume for `kubectl cp` */
export const OUTPUT_MOUNT_PATH = '/must-gather';

export const SINCE_ENV_VAR = 'MUST_GATHER_SINCE';

/**
 * Annotation that ClusterOperators and ClusterServiceVersions use to advertise their own
 * must-gather image. Reserved for all_component_images discovery.
 */
export const MUST_GATHER_IMAGE_ANNOTATION = 'operators.openshift.io/must-gather-image';

/** Characters used for generated name suffixes (no vowels, no ambiguous digits) */
export const NAME_SUFFIX_CHARSET = 'bcdfghjklmnpqrstvwxz2456789';
