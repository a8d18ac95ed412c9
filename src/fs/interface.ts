/**
 * File content can be string or Buffer
 */
export type FileContent = string | Uint8Array;

/**
 * Initial files for an in-memory file system, keyed by absolute path
 */
export interface InitialFiles {
  [path: string]: FileContent;
}

/**
 * Read-only file system abstraction used to resolve FILE operands.
 *
 * Implementations decode file content as UTF-8 and reject invalid
 * byte sequences with an `InvalidEncodingError`.
 */
export interface IFileSystem {
  /**
   * Read a file's content as a UTF-8 string.
   * @throws Error with an ENOENT/EISDIR/EFBIG prefix, or InvalidEncodingError
   */
  readFile(path: string): Promise<string>;

  /**
   * Resolve a relative path against a base path
   */
  resolvePath(base: string, path: string): string;
}
