/**
 * Prompt Builder - wraps the bundle in an action-specific instruction.
 */

import { ValidationError } from '../errors.js';

// ── Actions ─────────────────────────────────────────────────────────────────

export const ACTIONS: Readonly<Record<string, string>> = Object.freeze({
    'code-review': 'Please review the following code and provide suggestions or identify any errors.',
    'code-improvement': 'Please suggest improvements to the following code.',
    'code-completion': 'Please add to the following code by adding limited new files or missing functionality.',
    'code-correction': 'Correct the following code by fixing any errors or issues.',
});

export const DEFAULT_ACTION = 'code-review';

/** Custom actions must be longer than this */
export const MIN_ACTION_LENGTH = 5;

// ── System instruction ──────────────────────────────────────────────────────

export const SYSTEM_INSTRUCTION = [
    'You are a world-class software developer. Provide complete, error-free code only when changes are made.',
    'Include ALL comments in updated code. Never use placeholders or ellipsis.',
    "State 'No changes required' without including code if no changes are needed.",
    'Format in Markdown with appropriate headers, lists, and code blocks.',
    'Use triple backticks for code blocks without language specification.',
    'Analyze thoroughly before responding. Provide clear, concise change lists.',
    'Follow the exact format in the instructions.',
].join('\n');

/**
 * Known action keywords map to their instruction; anything else is used
 * verbatim as a custom instruction.
 */
export function resolveActionInstruction(action: string): string {
    return Object.prototype.hasOwnProperty.call(ACTIONS, action) ? ACTIONS[action] : action;
}

export function validateAction(action: unknown): string {
    if (typeof action !== 'string' || action.length <= MIN_ACTION_LENGTH) {
        throw new ValidationError('Invalid action. Please provide a valid action string.', 'action', { action });
    }
    return action;
}

/**
 * Action menu printed by the CLI.
 */
export function listActions(): string[] {
    return [
        'Available options:',
        '1. Code Review. Action: code-review',
        '2. Code Improvement. Action: code-improvement',
        '3. Code Completion. Action: code-completion',
        '4. Code Correction. Action: code-correction',
        '5. Custom Action. Action: <your custom action>',
    ];
}

export function createPrompt(content: string, action: string): string {
    const instruction = resolveActionInstruction(action);

    return `Action: ${instruction}
Instructions: You will be given a directory structure followed by a set of files in the format: File Path: <file path> Code: <code>. Please apply the Action to each file. Please provide your response in the following format:

File Path: <file path>

Changes:
- <bulleted list of changes/suggestions>

Updated Code:

\`\`\`
<full, complete file code>
\`\`\`

Important:
1. Always provide the FULL, UPDATED code for each file that has changes.
2. DO NOT use placeholders or omit any parts of the code.
3. If no changes are required for a file, explicitly state "No changes required." under the Changes section and DO NOT include the "Updated Code" section.
4. Include ALL comments in the updated code.
5. Do not use ellipsis (...) or any other shorthand to indicate unchanged code.

Content:
${content}
`;
}
