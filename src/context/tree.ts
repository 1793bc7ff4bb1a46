/**
 * Tree Renderer - turns a crawled DirectoryStructure into box-drawing lines.
 */

import { basename, resolve } from 'path';
import type { DirectoryStructure } from './crawler.js';

function entryName(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? path : path.slice(slash + 1);
}

/**
 * One line per entry. The last sibling gets `└── `, the others `├── `;
 * children inherit `    ` under a last sibling and `│   ` otherwise.
 */
export function renderTree(structure: DirectoryStructure, prefix: string = ''): string[] {
  const lines: string[] = [];

  for (let i = 0; i < structure.length; i++) {
    const entry = structure[i];
    const isLast = i === structure.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    lines.push(`${prefix}${connector}${entryName(entry.path)}`);

    if (entry.children && entry.children.length > 0) {
      lines.push(...renderTree(entry.children, `${prefix}${childPrefix}`));
    }
  }

  return lines;
}

/**
 * Tree lines headed by the root folder name, e.g. `project/`.
 */
export function renderDirectoryTree(directory: string, structure: DirectoryStructure): string[] {
  return [`${basename(resolve(directory))}/`, ...renderTree(structure)];
}
