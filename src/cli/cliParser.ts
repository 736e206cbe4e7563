/**
 * Pure helpers for reading command-line arguments. No database, browser or
 * config access here.
 */

export function getOptionValue(args: string[], optionName: string): string | undefined {
    const index = args.findIndex((value) => value === optionName);
    if (index === -1 || index + 1 >= args.length) {
        return undefined;
    }
    return args[index + 1];
}

export function getPositionalArgs(args: string[]): string[] {
    const positional: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const value = args[i] ?? '';
        if (value.startsWith('--')) {
            i += 1;
            continue;
        }
        positional.push(value);
    }
    return positional;
}

export function parseIntStrict(raw: string, optionName: string): number {
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) {
        throw new Error(`invalid value for ${optionName}: ${raw}`);
    }
    return parsed;
}
