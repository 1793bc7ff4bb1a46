/**
 * Response Renderer - cleans the model reply, saves it, and shows it.
 */

import { writeFileSync } from 'fs';
import { DEFAULT_RESPONSE_FILE } from '../context/defaults.js';
import { renderMarkdown } from './markdown.js';

export interface DisplayOptions {
  /** File the cleaned reply is written to (default: response.md) */
  responseFile?: string;
  /** Display collaborator (default: terminal Markdown) */
  display?: (markdown: string) => void;
}

/**
 * Drop the language tag after an opening fence: "```python\n" → "```\n".
 */
export function cleanResponse(response: string): string {
  return response.replace(/```[A-Za-z0-9_+#.-]+[ \t]*\n/g, '```\n');
}

export function saveResponse(response: string, responseFile: string = DEFAULT_RESPONSE_FILE): void {
  writeFileSync(responseFile, response, 'utf-8');
}

/**
 * Clean, persist and display a reply. A missing reply prints a diagnostic.
 * Returns the cleaned text, or null when there was nothing to show.
 */
export function displayResponse(response: string | null | undefined, options: DisplayOptions = {}): string | null {
  if (!response) {
    console.log('No response received from the API.');
    return null;
  }

  const cleaned = cleanResponse(response);
  saveResponse(cleaned, options.responseFile);
  (options.display ?? renderMarkdown)(cleaned);
  return cleaned;
}
