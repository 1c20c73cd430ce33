/**
 * Annotation Overlay
 * @module metadata/annotations
 *
 * A user document that adjusts extracted resources before expansion and
 * the graph after it. Addresses are base identities
 * (`[module path.]type.name`); `update`, `remove`, `connect` and
 * `disconnect` also take patterns ending in `*`.
 *
 * @example
 * ```yaml
 * update:
 *   aws_instance.*:
 *     monitoring: true
 * add:
 *   external_service.billing:
 *     url: https://billing.internal
 * remove:
 *   - null_resource.*
 * connect:
 *   aws_lambda_function.worker: [external_service.billing]
 * ```
 */

import { readFile } from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';

import {
  AnnotationError,
  SourceErrorCodes,
  SourceUnavailableError,
  getErrorMessage,
} from '../errors';
import { Value, fromJSON } from '../resolver/value';
import {
  baseIdentity,
  matchesIdentityPattern,
  parseBaseIdentity,
  resourceAddress,
} from '../types';
import { ExtractedResource, StaticResource } from './metadata-extractor';

// ============================================================================
// Schema
// ============================================================================

const Address = z.string().min(1);

const AttributeValues = z.record(z.string(), z.unknown());

export const AnnotationOverlaySchema = z
  .object({
    update: z.record(Address, AttributeValues).default({}),
    add: z.record(Address, AttributeValues).default({}),
    remove: z.array(Address).default([]),
    connect: z.record(Address, z.array(Address)).default({}),
    disconnect: z.record(Address, z.array(Address)).default({}),
  })
  .strict();

export type AnnotationOverlay = z.infer<typeof AnnotationOverlaySchema>;

export type AnnotationInput = z.input<typeof AnnotationOverlaySchema>;

/**
 * Edges added to and removed from the graph, between base identities or patterns
 */
export type EdgeOverlay = Pick<AnnotationOverlay, 'connect' | 'disconnect'>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an overlay given as plain data
 */
export function parseAnnotations(data: unknown, origin = '<annotations>'): AnnotationOverlay {
  const result = AnnotationOverlaySchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new AnnotationError(`Invalid annotation overlay ${origin}`, issues);
  }

  const badAdds = Object.keys(result.data.add)
    .filter((address) => address.includes('*') || parseBaseIdentity(address) === null)
    .map((address) => `add.${address}: expected a resource address such as type.name`);
  if (badAdds.length > 0) {
    throw new AnnotationError(`Invalid annotation overlay ${origin}`, badAdds);
  }

  return result.data;
}

/**
 * Read and validate a YAML overlay document
 */
export async function loadAnnotations(filePath: string): Promise<AnnotationOverlay> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw SourceUnavailableError.notFound(filePath);
    }
    throw new SourceUnavailableError(filePath, getErrorMessage(error), SourceErrorCodes.FILE_READ_ERROR);
  }

  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (error) {
    throw new AnnotationError(`Annotation overlay ${filePath} is not valid YAML`, [getErrorMessage(error)]);
  }

  return parseAnnotations(data, filePath);
}

// ============================================================================
// Application
// ============================================================================

function toValues(values: Readonly<Record<string, unknown>>): Map<string, Value> {
  return new Map(Object.entries(values).map(([name, raw]): [string, Value] => [name, fromJSON(raw)]));
}

function identityOf(resource: ExtractedResource): string {
  return baseIdentity(resource.metadata.modulePath, resource.metadata.address);
}

/**
 * Apply `remove`, then `update`, then `add` to extracted resources
 */
export function applyAnnotations(
  resources: readonly ExtractedResource[],
  overlay: AnnotationOverlay
): ExtractedResource[] {
  const kept = resources.filter(
    (resource) => !overlay.remove.some((pattern) => matchesIdentityPattern(identityOf(resource), pattern))
  );

  const updated = kept.map((resource) => {
    let current = resource;
    for (const [pattern, values] of Object.entries(overlay.update)) {
      if (matchesIdentityPattern(identityOf(resource), pattern)) {
        current = current.withOverrides(toValues(values));
      }
    }
    return current;
  });

  for (const [address, values] of Object.entries(overlay.add)) {
    const existing = updated.findIndex((resource) => identityOf(resource) === address);
    if (existing !== -1) {
      updated[existing] = updated[existing].withOverrides(toValues(values));
      continue;
    }

    const parsed = parseBaseIdentity(address);
    if (!parsed) continue;

    updated.push(
      new StaticResource({
        address: resourceAddress(parsed.kind, parsed.type, parsed.name),
        kind: parsed.kind,
        type: parsed.type,
        name: parsed.name,
        modulePath: parsed.modulePath,
        attributes: toValues(values),
        condition: { kind: 'static' },
        source: null,
      })
    );
  }

  return updated;
}
