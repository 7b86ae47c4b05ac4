import { randomInt } from 'crypto';
import { posix } from 'path';
import { z } from 'zod';
import type { Logger } from 'winston';
import { ValidationError } from '../kubernetes/ErrorHandling.js';
import {
  DEFAULT_GATHER_COMMAND,
  DEFAULT_SOURCE_DIR,
  MUST_GATHER_IMAGE_ANNOTATION,
  NAME_SUFFIX_CHARSET,
  NAMESPACE_PREFIX,
  NAMESPACE_SUFFIX_LENGTH,
  TIMEOUT_BINARY,
} from './constants.js';
import { formatSeconds, parseDuration } from './DurationParser.js';
import type { PlanConfig, RandomIntSource } from './types.js';

/**
 * Every argument plan_mustgather recognizes. `null` is treated the same as an absent key;
 * keys not listed here are ignored.
 */
export const planMustGatherArgsSchema = z.object({
  node_name: z.string().nullish(),
  node_selector: z.string().nullish(),
  host_network: z.boolean().nullish(),
  gather_command: z.string().nullish(),
  all_component_images: z.boolean().nullish(),
  images: z.array(z.string()).nullish(),
  source_dir: z.string().nullish(),
  timeout: z.string().nullish(),
  namespace: z.string().nullish(),
  keep_namespace: z.boolean().nullish(),
  since: z.string().nullish(),
  image_stream: z.unknown().optional(),
});

export type PlanMustGatherArgs = z.infer<typeof planMustGatherArgsSchema>;

export interface ResolveOptions {
  random?: RandomIntSource;
  logger?: Logger;
}

const DNS1123_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS1123_LABEL_MAX_LENGTH = 63;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonBlank(value: string | null | undefined): string | undefined {
  return value !== undefined && value !== null && value.trim().length > 0 ? value : undefined;
}

/**
 * Random lowercase suffix drawn from a fixed charset
 */
export function generateNameSuffix(
  length: number = NAMESPACE_SUFFIX_LENGTH,
  random: RandomIntSource = (max) => randomInt(max),
): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += NAME_SUFFIX_CHARSET[random(NAME_SUFFIX_CHARSET.length)];
  }
  return suffix;
}

/**
 * Parse `key=value` pairs separated by commas. Pairs without `=` are dropped.
 */
export function parseNodeSelector(selector: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of selector.split(',')) {
    const trimmed = pair.trim();
    const separator = trimmed.indexOf('=');
    if (separator === -1) {
      continue;
    }
    result[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
  }
  return result;
}

/**
 * Collapse redundant separators and `..` segments and drop trailing slashes
 */
export function normalizeSourceDir(dir: string): string {
  const normalized = posix.normalize(dir);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.replace(/\/+$/, '');
  }
  return normalized;
}

export function isValidNamespaceName(name: string): boolean {
  return name.length <= DNS1123_LABEL_MAX_LENGTH && DNS1123_LABEL.test(name);
}

function rejectImageStream(args: Record<string, unknown>): void {
  const imageStream = args.image_stream;
  if (imageStream === undefined || imageStream === null || imageStream === '') {
    return;
  }
  throw new ValidationError(
    'image_stream is not supported, use the images parameter to select must-gather images',
    { parameter: 'image_stream' },
  );
}

function parseArgs(args: unknown): PlanMustGatherArgs {
  const input = args ?? {};
  if (!isRecord(input)) {
    throw new ValidationError('plan_mustgather arguments must be an object');
  }

  rejectImageStream(input);

  const result = planMustGatherArgsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const parameter = issue.path.join('.');
    throw new ValidationError(`invalid value for ${parameter}: ${issue.message}`, { parameter });
  }
  return result.data;
}

/**
 * Resolve the raw tool arguments into a complete PlanConfig.
 *
 * @throws {ValidationError} for unsupported parameters, wrongly typed values,
 *   unparsable durations and invalid namespace names
 */
export function resolvePlanConfig(args: unknown, options: ResolveOptions = {}): PlanConfig {
  const parsed = parseArgs(args);

  const requestedNamespace = nonBlank(parsed.namespace);
  if (requestedNamespace !== undefined && !isValidNamespaceName(requestedNamespace)) {
    throw new ValidationError(`namespace is not a valid namespace name: ${requestedNamespace}`, {
      parameter: 'namespace',
    });
  }
  const namespace =
    requestedNamespace ??
    `${NAMESPACE_PREFIX}${generateNameSuffix(NAMESPACE_SUFFIX_LENGTH, options.random)}`;

  let gatherCommand = nonBlank(parsed.gather_command) ?? DEFAULT_GATHER_COMMAND;

  const timeout = parsed.timeout ?? undefined;
  if (timeout !== undefined) {
    const seconds = parseDuration(timeout);
    if (seconds === undefined) {
      throw new ValidationError('timeout duration is not valid', { parameter: 'timeout' });
    }
    gatherCommand = `${TIMEOUT_BINARY} ${formatSeconds(seconds)} ${gatherCommand}`;
  }

  const since = parsed.since ?? undefined;
  if (since !== undefined && parseDuration(since) === undefined) {
    throw new ValidationError('since duration is not valid', { parameter: 'since' });
  }

  const allComponentImages = parsed.all_component_images ?? false;
  if (allComponentImages) {
    options.logger?.debug(
      `all_component_images requested; images annotated with ${MUST_GATHER_IMAGE_ANNOTATION} are not discovered yet`,
    );
  }

  return {
    nodeName: nonBlank(parsed.node_name),
    nodeSelector: parsed.node_selector ? parseNodeSelector(parsed.node_selector) : {},
    hostNetwork: parsed.host_network ?? false,
    gatherCommand,
    images: parsed.images ?? [],
    sourceDir: normalizeSourceDir(nonBlank(parsed.source_dir) ?? DEFAULT_SOURCE_DIR),
    timeout,
    since,
    namespace,
    keepNamespace: parsed.keep_namespace ?? false,
    allComponentImages,
  };
}
