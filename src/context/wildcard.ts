/**
 * Shell-style name matching for exclusion patterns.
 *
 * Supports `*`, `?`, `[abc]`, `[a-z]` and `[!abc]`. Patterns are matched
 * against a single path segment and anchored at both ends.
 */

const compiled = new Map<string, RegExp>();

const REGEX_SPECIALS = /[.+^${}()|\\/]/g;

export function hasWildcard(pattern: string): boolean {
    return /[*?[]/.test(pattern);
}

function compile(pattern: string): RegExp {
    let source = '';
    let i = 0;

    while (i < pattern.length) {
        const ch = pattern[i];

        if (ch === '*') {
            source += '.*';
            i++;
            continue;
        }

        if (ch === '?') {
            source += '.';
            i++;
            continue;
        }

        if (ch === '[') {
            // a `]` right after `[` or `[!` is a member, not the end of the class
            const close = pattern.indexOf(']', i + (pattern[i + 1] === '!' ? 3 : 2));
            if (close === -1) {
                // unterminated class: literal bracket
                source += '\\[';
                i++;
                continue;
            }
            let body = pattern.slice(i + 1, close);
            const negated = body.startsWith('!');
            if (negated) body = body.slice(1);
            body = body.replace(/[\\\]^]/g, '\\$&');
            source += negated ? `[^${body}]` : `[${body}]`;
            i = close + 1;
            continue;
        }

        source += ch.replace(REGEX_SPECIALS, '\\$&');
        i++;
    }

    return new RegExp(`^${source}$`, 's');
}

export function matchesWildcard(name: string, pattern: string): boolean {
    let regex = compiled.get(pattern);
    if (!regex) {
        regex = compile(pattern);
        compiled.set(pattern, regex);
    }
    return regex.test(name);
}
