/**
 * Loads the staged snapshot before any comparison runs.
 */
export interface IndexLoader {
  /**
   * @returns false when the index exists but cannot be read
   */
  load(): Promise<boolean>;
}
