/**
 * @folio/core - Shared primitives for Folio sync
 *
 * Library identifiers and scopes, synced object kinds, the result type of
 * remote calls and the structured error system used by every package.
 *
 * @packageDocumentation
 * @module @folio/core
 */

export * from './errors/index.js';
export * from './types/library.js';
export * from './types/result.js';
export * from './types/sync-object.js';
