/**
 * Envelope fields every persisted document carries.
 * On disk `isDeleted` is written as `is_deleted`.
 */
export interface RecordEnvelope {
  id: string;
  version: number;
  isDeleted: boolean;
}

export type StoredRecord<T> = T & RecordEnvelope;

// Plain JSON object handed to the storage engine for writing
export type DocumentBody = { id: string } & Record<string, unknown>;

// A document as read back, before an entity store has validated it
export type StoredDocument = StoredRecord<Record<string, unknown>>;

/**
 * Extra precondition for a versioned write. `ifMatch` names fields the stored
 * document must still hold, compared in their JSON form. A key that was purged
 * and created again restarts its versions, so a version alone cannot tell the
 * new record from the one the caller read.
 */
export interface WriteOptions {
  ifMatch?: Record<string, unknown>;
}

export type GetResult =
  | { status: 'found'; record: StoredDocument }
  | { status: 'not_found'; version: number };  // tombstone version, 0 if never written

export type PutResult =
  | { status: 'ok'; version: number }
  | { status: 'conflict'; expectedVersion: number; actualVersion: number };

export type DeleteResult =
  | PutResult
  | { status: 'not_found' };
