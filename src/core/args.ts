import type { Result } from './types.js';
import { fail, failure, ok } from './errors.js';

export type ParsedArgs = { positionals: string[]; flags: Record<string, string> };

const SHORT_FLAGS: Record<string, string> = { '-f': 'format', '-o': 'output' };

function isFlag(arg: string): boolean {
    return arg.startsWith('--') || Object.hasOwn(SHORT_FLAGS, arg);
}

/**
 * Splits command-line arguments into positionals and flags.
 * --top-k 3, --top-k=3 and -f json all land in flags as topK / format.
 * Every flag takes a value; a flag with none is an error.
 */
export function parseArgs(args: string[]): Result<ParsedArgs> {
    const positionals: string[] = [];
    const flags: Record<string, string> = {};
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '-' || !a.startsWith('-')) { positionals.push(a); continue; }
        const missing = fail<ParsedArgs>(failure('INVALID_INPUT', `Option ${a.split('=')[0]} needs a value`));
        let name = SHORT_FLAGS[a];
        let value: string | undefined;
        if (!name) {
            const eq = a.indexOf('=');
            const raw = eq >= 0 ? a.slice(2, eq) : a.slice(2);
            if (eq >= 0) value = a.slice(eq + 1);
            name = raw.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
        }
        if (value === undefined) {
            const next = args[i + 1];
            if (next === undefined || isFlag(next)) return missing;
            value = next;
            i++;
        }
        if (value === '') return missing;
        flags[name] = value;
    }
    return ok({ positionals, flags });
}
