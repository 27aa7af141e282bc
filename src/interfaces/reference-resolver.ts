/**
 * Object id of the tree with no entries in a SHA-1 repository:
 * the SHA-1 of "tree 0\0".
 *
 * Comparing the index against it reports every staged path as fully added.
 */
export const EMPTY_TREE_ID = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

/**
 * Resolves revision names to commit ids.
 */
export interface ReferenceResolver {
  /**
   * @param name Revision name, e.g. "HEAD"
   * @returns Commit id, or undefined when the name does not resolve
   *   (for instance HEAD in a repository without commits)
   */
  resolve(name: string): Promise<string | undefined>;

  /**
   * Id of the empty tree in the repository's object format.
   */
  emptyTree(): Promise<string>;
}
