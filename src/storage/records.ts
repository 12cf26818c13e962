import type Joi from 'joi';
import type { DocumentBody, StoredDocument } from '../types/index.js';
import { StorageCorruptionError } from '../utils/errors.js';
import type { StorageProvider } from './StorageProvider.js';

/**
 * Typed view of a stored document. Dates are revived from their ISO form and
 * envelope fields the schema does not name are dropped.
 */
export function decodeRecord<T>(key: string, schema: Joi.ObjectSchema<T>, document: StoredDocument): T {
  const { error, value } = schema.validate(document, {
    convert: true,
    stripUnknown: true,
    abortEarly: true,
  });
  if (error) {
    throw new StorageCorruptionError(key, error.message);
  }
  return value;
}

export interface ReadRecordResult<T> {
  record: T | null;
  version: number;  // version to pass to the next put(), tombstones included
}

/**
 * Read and decode one key. A document that fails its schema is quarantined.
 */
export async function readRecord<T>(
  storage: StorageProvider,
  key: string,
  schema: Joi.ObjectSchema<T>
): Promise<ReadRecordResult<T>> {
  const result = await storage.get(key);
  if (result.status === 'not_found') {
    return { record: null, version: result.version };
  }

  const { error, value } = schema.validate(result.record, {
    convert: true,
    stripUnknown: true,
    abortEarly: true,
  });
  if (error) {
    const quarantinedTo = await storage.quarantine(key);
    throw new StorageCorruptionError(key, error.message, quarantinedTo ?? undefined);
  }
  return { record: value, version: result.record.version };
}

/**
 * Document body for an entity, with the id the envelope requires
 */
export function toDocument(id: string, fields: Record<string, unknown>): DocumentBody {
  return { ...fields, id };
}
