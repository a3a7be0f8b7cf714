/** Canonical international number: `+` or `00`, then digits. */
export const NUMBER_PATTERN = /^(?:\+|00)[0-9]+$/;

const NUMBER_GRAMMAR = '(?:\\+|00)[0-9]+';

export interface ContactIdentity {
    displayName: string;
    number: string;
}

export function isCanonicalNumber(number: string): boolean {
    return NUMBER_PATTERN.test(number);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function filenamePattern(extension: string): RegExp {
    return new RegExp(`^(([^/]*) (${NUMBER_GRAMMAR}))\\.${escapeRegExp(extension)}$`);
}

/** `<displayName> <number>`, the stem shared by history files and attachment directories. */
export function identityToStem(identity: ContactIdentity): string {
    return `${identity.displayName} ${identity.number}`;
}

export function identityToFilename(identity: ContactIdentity, extension: string): string {
    return `${identityToStem(identity)}.${extension}`;
}

/**
 * Parse `<displayName> <number>.<ext>`. The display name may itself contain
 * spaces; the number is the last space-separated token. Returns `null` when the
 * name does not follow the grammar.
 */
export function filenameToIdentity(filename: string, extension: string): ContactIdentity | null {
    const match = filenamePattern(extension).exec(filename);
    if (!match) {
        return null;
    }
    return { displayName: match[2], number: match[3] };
}
