import { z } from 'zod';
import type { JsonValue, SidecarDocument } from '../types';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/** A sidecar must be a JSON object at the top level */
export const SidecarDocumentSchema: z.ZodType<SidecarDocument> = z.record(JsonValueSchema);

export class SidecarValidationError extends Error {
  constructor(message: string, public issues: z.ZodIssue[]) {
    super(message);
    this.name = 'SidecarValidationError';
  }
}

function conformsToSidecar(data: unknown): data is SidecarDocument {
  return SidecarDocumentSchema.safeParse(data).success;
}

/**
 * Parse sidecar text into a document, preserving key order.
 * The parsed object itself is returned once it validates: zod rebuilds records
 * by assignment, which would drop an own "__proto__" key.
 */
export function parseSidecar(text: string): SidecarDocument {
  const data: unknown = JSON.parse(text);
  if (conformsToSidecar(data)) {
    return data;
  }

  const result = SidecarDocumentSchema.safeParse(data);
  const issues = result.success ? [] : result.error.issues;
  throw new SidecarValidationError(
    `Sidecar is not a JSON object: ${issues.map(i => i.message).join(', ')}`,
    issues
  );
}

export function serializeSidecar(document: SidecarDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
