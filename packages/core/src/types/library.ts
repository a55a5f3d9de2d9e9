/**
 * Identifies a library: the user's own library or a shared group.
 *
 * Every library carries its own version counter on the backend, so most
 * sync bookkeeping is scoped by library.
 */
export type LibraryIdentifier =
  | { readonly type: 'custom'; readonly customType: CustomLibraryType }
  | { readonly type: 'group'; readonly groupId: number };

/**
 * Kinds of custom (non-group) libraries
 */
export type CustomLibraryType = 'my-library';

/**
 * Set of libraries a sync covers
 */
export type Libraries =
  | { readonly type: 'all' }
  | { readonly type: 'specific'; readonly identifiers: readonly LibraryIdentifier[] };

/** The user's personal library */
export const MY_LIBRARY: LibraryIdentifier = { type: 'custom', customType: 'my-library' };

/** Scope covering every library the user can access */
export const ALL_LIBRARIES: Libraries = { type: 'all' };

/**
 * Create a group library identifier
 */
export function groupLibrary(groupId: number): LibraryIdentifier {
  return { type: 'group', groupId };
}

/**
 * Create a scope limited to the given libraries
 */
export function specificLibraries(identifiers: readonly LibraryIdentifier[]): Libraries {
  return { type: 'specific', identifiers };
}

/**
 * Structural equality of two library identifiers. `null` only equals `null`.
 */
export function isSameLibrary(
  a: LibraryIdentifier | null | undefined,
  b: LibraryIdentifier | null | undefined
): boolean {
  if (!a || !b) return !a && !b;
  if (a.type === 'custom') {
    return b.type === 'custom' && a.customType === b.customType;
  }
  return b.type === 'group' && a.groupId === b.groupId;
}

/**
 * Stable string key of a library, usable in maps and logs
 */
export function libraryKey(identifier: LibraryIdentifier): string {
  return identifier.type === 'custom'
    ? `custom:${identifier.customType}`
    : `group:${identifier.groupId}`;
}

/**
 * Path segment of the library on the REST backend (`users/{id}` or `groups/{id}`)
 */
export function libraryApiPath(identifier: LibraryIdentifier, userId: number): string {
  return identifier.type === 'custom' ? `users/${userId}` : `groups/${identifier.groupId}`;
}

/**
 * Whether a library belongs to the scope
 */
export function isLibraryInScope(libraries: Libraries, identifier: LibraryIdentifier): boolean {
  if (libraries.type === 'all') return true;
  return libraries.identifiers.some((id) => isSameLibrary(id, identifier));
}

/**
 * Whether the scope can contain group libraries
 */
export function scopeIncludesGroups(libraries: Libraries): boolean {
  if (libraries.type === 'all') return true;
  return libraries.identifiers.some((id) => id.type === 'group');
}
