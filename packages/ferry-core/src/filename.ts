// Filename guard for client-supplied names.

/**
 * Check that a client-supplied name can only refer to a direct child of the
 * served directory.
 *
 * This is a syntactic deny-list, not canonicalization: empty names, either
 * path separator and any `..` substring are rejected without looking at the
 * filesystem.
 */
export function isSafeFilename(name: string): boolean {
  if (name.length === 0) return false;
  if (name.includes("/")) return false;
  if (name.includes("\\")) return false;
  if (name.includes("..")) return false;
  return true;
}
