export interface FileSystemPort {
  exists(path: string): Promise<boolean>;
  /**
   * Recursively removes a directory. Throws `OutputDirectoryNotFoundError`
   * when nothing is there.
   */
  removeDirectory(path: string): Promise<void>;
}
