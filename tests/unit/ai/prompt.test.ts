import { describe, it, expect } from 'vitest';
import {
    ACTIONS,
    DEFAULT_ACTION,
    createPrompt,
    listActions,
    resolveActionInstruction,
    validateAction,
} from '../../../src/ai/prompt.js';
import { ValidationError } from '../../../src/errors.js';

describe('resolveActionInstruction', () => {
    it('maps the built-in keywords', () => {
        expect(resolveActionInstruction('code-correction')).toBe(
            'Correct the following code by fixing any errors or issues.'
        );
        expect(resolveActionInstruction(DEFAULT_ACTION)).toBe(ACTIONS['code-review']);
    });

    it('passes custom text through unchanged', () => {
        expect(resolveActionInstruction('explain the architecture')).toBe('explain the architecture');
    });

    it('does not resolve inherited object keys', () => {
        expect(resolveActionInstruction('toString')).toBe('toString');
    });
});

describe('validateAction', () => {
    it('rejects short strings', () => {
        expect(() => validateAction('ab')).toThrow(ValidationError);
        expect(() => validateAction('abcde')).toThrow('Invalid action. Please provide a valid action string.');
    });

    it('rejects non-strings', () => {
        expect(() => validateAction(42)).toThrow(ValidationError);
        expect(() => validateAction(undefined)).toThrow(ValidationError);
    });

    it('accepts strings longer than five characters', () => {
        expect(validateAction('abcdef')).toBe('abcdef');
        expect(validateAction('code-review')).toBe('code-review');
    });
});

describe('createPrompt', () => {
    it('opens with the resolved action', () => {
        const prompt = createPrompt('BUNDLE', 'code-correction');
        expect(prompt.split('\n')[0]).toBe('Action: Correct the following code by fixing any errors or issues.');
    });

    it('ends with the bundle content', () => {
        expect(createPrompt('BUNDLE', 'code-review').endsWith('\nContent:\nBUNDLE\n')).toBe(true);
    });

    it('describes the response format', () => {
        const prompt = createPrompt('BUNDLE', 'find race conditions');
        expect(prompt).toContain('File Path: <file path>\n\nChanges:\n- <bulleted list of changes/suggestions>');
        expect(prompt.split('\n')[0]).toBe('Action: find race conditions');
    });
});

describe('listActions', () => {
    it('lists every built-in action plus the custom option', () => {
        const lines = listActions();
        expect(lines[0]).toBe('Available options:');
        for (const key of Object.keys(ACTIONS)) {
            expect(lines.some(line => line.endsWith(`Action: ${key}`))).toBe(true);
        }
        expect(lines[lines.length - 1]).toBe('5. Custom Action. Action: <your custom action>');
    });
});
