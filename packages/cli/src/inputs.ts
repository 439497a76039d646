/**
 * Reads configuration files named on the command line.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { RawFile } from '@conftree/parser';
import { CLIError } from './index';

/**
 * Each input is a file or a directory. Directories contribute their
 * top-level files ending in `extension`, sorted by name. Files are keyed
 * by base name and returned in merge order.
 */
export function readConfigFiles(inputs: string[], extension: string): RawFile[] {
  const files: RawFile[] = [];

  for (const input of inputs) {
    if (!fs.existsSync(input)) {
      throw new CLIError(`Input not found: ${input}`);
    }

    if (fs.statSync(input).isDirectory()) {
      const names = fs.readdirSync(input).filter(name => name.endsWith(extension)).sort();
      for (const name of names) {
        const fullPath = path.join(input, name);
        if (fs.statSync(fullPath).isFile()) {
          files.push({ name, text: fs.readFileSync(fullPath, 'utf-8') });
        }
      }
    } else {
      files.push({ name: path.basename(input), text: fs.readFileSync(input, 'utf-8') });
    }
  }

  return files;
}
