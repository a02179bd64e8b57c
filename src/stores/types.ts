import type { DocumentData } from 'firebase-admin/firestore';

/** Equality filters; undefined entries are ignored. */
export type Filter<T> = { [K in keyof T]?: T[K] };

export interface ListOptions<T> {
  where?: Filter<T>;
  orderBy?: { field: keyof T & string; direction: 'asc' | 'desc' };
}

/**
 * Access to one document collection. Services only see this interface, so
 * tests can swap Firestore for an in-memory map.
 */
export interface Repository<T extends DocumentData> {
  /** Allocates a fresh document id without writing anything. */
  newId(): string;
  get(id: string): Promise<T | null>;
  /** Full-document overwrite. */
  set(id: string, value: T): Promise<void>;
  /** Field update; fails when the document does not exist. */
  update(id: string, patch: Partial<T>): Promise<void>;
  list(options?: ListOptions<T>): Promise<T[]>;
}
