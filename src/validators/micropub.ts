import { z } from 'zod';
import type { MicroformatsEntry, UpdateOperation } from '../types/micropub.js';

const propertiesSchema = z.record(z.array(z.unknown()));

/**
 * JSON create request: a single microformats2 object
 */
export const micropubCreateSchema = z.object({
  type: z.array(z.string()).min(1),
  properties: propertiesSchema,
});

export const micropubUpdateSchema = z.object({
  action: z.literal('update'),
  url: z.string().url(),
  replace: propertiesSchema.optional(),
  add: propertiesSchema.optional(),
  // property names, or property -> values to remove
  delete: z.union([z.array(z.string()), propertiesSchema]).optional(),
});

export const micropubActionSchema = z.discriminatedUnion('action', [
  micropubUpdateSchema,
  z.object({ action: z.literal('delete'), url: z.string().url() }),
  z.object({ action: z.literal('undelete'), url: z.string().url() }),
]);

export type MicropubUpdateRequest = z.infer<typeof micropubUpdateSchema>;
export type MicropubActionRequest = z.infer<typeof micropubActionSchema>;

export function validateMicropubCreate(data: unknown): MicroformatsEntry {
  return micropubCreateSchema.parse(data);
}

export function validateMicropubAction(data: unknown): MicropubActionRequest {
  return micropubActionSchema.parse(data);
}

/**
 * Flatten an update request into operations, applied in the order
 * replace, add, delete.
 */
export function convertToUpdateOperations(update: MicropubUpdateRequest): UpdateOperation[] {
  const operations: UpdateOperation[] = [];

  for (const [property, value] of Object.entries(update.replace ?? {})) {
    operations.push({ action: 'replace', property, value });
  }
  for (const [property, value] of Object.entries(update.add ?? {})) {
    operations.push({ action: 'add', property, value });
  }

  if (Array.isArray(update.delete)) {
    for (const property of update.delete) {
      operations.push({ action: 'delete', property });
    }
  } else if (update.delete) {
    for (const [property, value] of Object.entries(update.delete)) {
      operations.push({ action: 'delete', property, value });
    }
  }

  return operations;
}
