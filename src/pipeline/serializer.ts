/**
 * Listing Output
 * @module pipeline/serializer
 *
 * Deterministic JSON form of a pipeline result: identities sorted, attribute
 * keys in declaration order, references as `${...}` strings and unresolved
 * values as `{"$unresolved": [...causes]}`.
 */

import { JSONValue, toJSON } from '../resolver/value';
import type { PipelineResult } from './pipeline';

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function resultToJSON(result: PipelineResult): { [key: string]: JSONValue } {
  const graph: { [key: string]: JSONValue } = {};
  for (const id of [...result.graph.keys()].sort(compareIds)) {
    graph[id] = [...(result.graph.get(id) ?? [])];
  }

  const resources: { [key: string]: JSONValue } = {};
  for (const instance of [...result.instances].sort((a, b) => compareIds(a.identity, b.identity))) {
    const { metadata } = instance;
    const attributes: { [key: string]: JSONValue } = {};
    for (const [name, value] of metadata.attributes) {
      attributes[name] = toJSON(value);
    }

    resources[instance.identity] = {
      kind: metadata.kind,
      type: metadata.type,
      name: metadata.name,
      module: metadata.modulePath,
      key: instance.key,
      attributes,
      source: metadata.source ? `${metadata.source.file}:${metadata.source.line}` : null,
    };
  }

  const diagnostics: JSONValue[] = result.diagnostics.map((diagnostic) => ({
    code: diagnostic.code,
    severity: diagnostic.severity,
    module: diagnostic.module,
    subject: diagnostic.subject,
    message: diagnostic.message,
    location: diagnostic.location ? `${diagnostic.location.file}:${diagnostic.location.line}` : null,
  }));

  return { graph, resources, diagnostics };
}

/**
 * Byte-identical for identical results
 */
export function serializeResult(result: PipelineResult): string {
  return `${JSON.stringify(resultToJSON(result), null, 2)}\n`;
}
