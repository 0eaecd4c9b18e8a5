/**
 * FileSystemAdapter - IFileSystem over Node's fs/promises
 */

import type { IFileSystem } from '@agentloom/agents';
import fs from 'fs/promises';
import * as path from 'path';

export class FileSystemAdapter implements IFileSystem {
  async readFile(pathStr: string): Promise<string> {
    return fs.readFile(pathStr, 'utf-8');
  }

  async writeFile(pathStr: string, content: string): Promise<void> {
    await fs.writeFile(pathStr, content, 'utf-8');
  }

  async exists(pathStr: string): Promise<boolean> {
    try {
      await fs.access(pathStr);
      return true;
    } catch {
      return false;
    }
  }

  async ensureDir(pathStr: string): Promise<void> {
    await fs.mkdir(pathStr, { recursive: true });
  }

  // Path operations (synchronous)
  join(...paths: string[]): string {
    return path.join(...paths);
  }

  dirname(pathStr: string): string {
    return path.dirname(pathStr);
  }
}
