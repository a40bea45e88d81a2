/**
 * Command-line argument splitting.
 */

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    flags: Set<string>;
    values: Map<string, string>;
}

const VALUE_FLAGS = new Set(['--workspace', '--merchant']);

/**
 * Splits argv into command, positionals, boolean flags and valued flags.
 *
 * @throws Error when a valued flag has no value
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags = new Set<string>();
    const values = new Map<string, string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq >= 0 ? arg.slice(0, eq) : arg;
        if (!VALUE_FLAGS.has(name)) {
            flags.add(name);
            continue;
        }

        const value = eq >= 0 ? arg.slice(eq + 1) : argv[++i];
        if (value === undefined || value === '') {
            throw new Error(`Missing value for ${name}`);
        }
        values.set(name, value);
    }

    return { command: positionals.shift(), positionals, flags, values };
}
