/**
 * Fluent argv builder. Values are kept as separate argv entries; nothing is
 * ever passed through a shell.
 */
export type ArgValue = string | number | boolean | undefined | null;

export class CommandBuilder {
    private readonly argv: string[] = [];

    constructor(initial: readonly string[] = []) {
        this.argv.push(...initial);
    }

    /**
     * Append positional arguments
     */
    arg(...values: (string | number)[]): this {
        for (const value of values) {
            this.argv.push(String(value));
        }
        return this;
    }

    /**
     * Append a flag. `true` adds the bare flag; `false`, `undefined`, `null`
     * and `''` omit it; anything else adds the flag followed by its value.
     */
    flag(name: string, value: ArgValue): this {
        if (value === false || value === undefined || value === null || value === '') return this;
        this.argv.push(name);
        if (value !== true) this.argv.push(String(value));
        return this;
    }

    /**
     * Append `--name=value`, skipped for empty values
     */
    keyValue(name: string, value: ArgValue): this {
        if (value === false || value === undefined || value === null || value === '') return this;
        this.argv.push(`${name}=${value === true ? 'true' : String(value)}`);
        return this;
    }

    build(): string[] {
        return [...this.argv];
    }

    /**
     * Shell-quoted rendering for logs and display
     */
    toString(): string {
        return this.argv.map(quoteArg).join(' ');
    }
}

export function quoteArg(arg: string): string {
    if (arg === '') return "''";
    if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
    return `'${arg.replace(/'/g, "'\\''")}'`;
}

export function formatCommand(argv: readonly string[]): string {
    return argv.map(quoteArg).join(' ');
}
