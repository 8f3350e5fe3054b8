// Target file validation - the export format read back by `import`

import { z } from 'zod';
import type { TargetDocument } from '../core/types.js';

function present<T>(value: T | null): value is T {
  return value !== null;
}

/** List whose malformed items are dropped; a non-list becomes empty */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item.nullable().catch(null))
    .catch([])
    .transform((items) => items.filter(present));
}

const PortSchema = z.number().int().min(1).max(65535);

const TargetDocumentSchema = z.object({
  hostname: z.string().nullable().catch(null),
  open_ports: listOf(PortSchema),
  services: z
    .record(z.string().nullable().catch(null))
    .catch({})
    .transform((services) => {
      const kept: Record<string, string> = {};
      for (const [port, service] of Object.entries(services)) {
        if (service !== null) kept[port] = service;
      }
      return kept;
    }),
  vulnerabilities: listOf(z.string()),
  exploited: z.boolean().catch(false),
  shells: listOf(z.string()),
  credentials: listOf(z.string()),
  notes: listOf(z.string()),
});

/** Address → document; entries that are not objects are dropped */
const TargetFileSchema = z
  .record(TargetDocumentSchema.nullable().catch(null))
  .transform((entries) => {
    const documents: Record<string, TargetDocument> = {};
    for (const [ip, doc] of Object.entries(entries)) {
      if (doc) documents[ip] = doc;
    }
    return documents;
  });

/**
 * Validates a parsed targets file field by field.
 *
 * @returns null when the top level is not an address-keyed object
 */
export function parseTargetFile(raw: unknown): Record<string, TargetDocument> | null {
  const parsed = TargetFileSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
