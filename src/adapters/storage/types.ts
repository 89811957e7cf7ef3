/**
 * Filesystem capability used by the initializer.
 * All paths are absolute; callers resolve them against the project root.
 */
export interface Storage {
  exists(filePath: string): Promise<boolean>;

  readFile(filePath: string): Promise<string>;

  /**
   * Replace a file's content through a temporary file and a rename,
   * so an interrupted process never leaves a half-written file behind.
   */
  writeFileAtomic(filePath: string, content: string): Promise<void>;
}
