/**
 * Object types exchanged with the backend
 */
export type SyncObject = 'collection' | 'search' | 'item' | 'trash' | 'settings';

/**
 * Object types that have per-object versions, in download order.
 * Collections and searches come first so items can reference them.
 */
export const VERSIONED_OBJECTS: readonly SyncObject[] = ['collection', 'search', 'item', 'trash'];
