/**
 * Platform abstraction interfaces
 * Provided by the Node package
 */

/**
 * File system interface (platform abstraction)
 */
export interface IFileSystem {
  // Read operations
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;

  // Write operations
  writeFile(path: string, content: string): Promise<void>;
  ensureDir(path: string): Promise<void>;

  // Path operations
  join(...paths: string[]): string;
  dirname(path: string): string;
}
