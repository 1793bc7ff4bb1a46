/**
 * Bundle Writer - serializes the rendered tree and file contents into the
 * single text artifact sent to the model.
 */

import { writeFileSync } from 'fs';
import { BundleError, getErrorMessage } from '../errors.js';

/**
 * Format:
 *
 *   Directory Structure:
 *   <tree lines>
 *
 *   File Contents:
 *
 *   File Path: <path>
 *   Code:
 *   <content>
 *
 */
export function formatBundle(
    files: readonly string[],
    contents: readonly string[],
    treeLines: readonly string[]
): string {
    if (files.length !== contents.length) {
        throw new BundleError(
            `File list and contents are misaligned (${files.length} paths, ${contents.length} contents)`
        );
    }

    const sections: string[] = [
        'Directory Structure:\n',
        treeLines.join('\n'),
        '\n\nFile Contents:\n\n',
    ];

    for (let i = 0; i < files.length; i++) {
        sections.push(`File Path: ${files[i]}\nCode:\n${contents[i]}\n\n`);
    }

    return sections.join('');
}

/**
 * Write the bundle and return its text. I/O failures become a BundleError.
 */
export function writeBundle(
    outputFile: string,
    files: readonly string[],
    contents: readonly string[],
    treeLines: readonly string[]
): string {
    const text = formatBundle(files, contents, treeLines);

    try {
        writeFileSync(outputFile, text, 'utf-8');
    } catch (error) {
        throw new BundleError(`Error writing to ${outputFile}: ${getErrorMessage(error)}`, outputFile);
    }

    return text;
}
