import { describeError, isAssistantError } from "../errors";

export const COMMAND_NAMES = [
    "hello",
    "help",
    "exit",
    "close",
    "save",
    "add contact",
    "change contact",
    "remove phone",
    "show phone",
    "delete contact",
    "show all",
    "add birthday",
    "change birthday",
    "show birthday",
    "birthdays",
    "add email",
    "change email",
    "add address",
    "change address",
    "search",
    "add note",
    "edit note",
    "rename note",
    "delete note",
    "view notes",
    "search note",
    "add tag",
    "remove tag",
    "show tag",
    "sort notes",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type CommandGroup = "contacts" | "email" | "address" | "birthdays" | "notes" | "general";

export type CommandAction = "continue" | "exit";

export interface CommandReply {
    action: CommandAction;
    output?: string;
}

export type CommandHandler<Ctx> = (
    ctx: Ctx,
    args: string[]
) => string | CommandReply | Promise<string | CommandReply>;

export interface CommandDefinition<Ctx> {
    name: CommandName;
    aliases?: CommandName[];
    group: CommandGroup;
    /** Argument synopsis shown in help and in "not enough arguments" errors. */
    usage: string;
    description: string;
    /** Fewer arguments than this is rejected before the handler runs. */
    minArgs?: number;
    handler: CommandHandler<Ctx>;
}

export interface CommandSystemOptions {
    helpHeader?: string;
}

const GROUP_ORDER: readonly CommandGroup[] = ["contacts", "email", "address", "birthdays", "notes", "general"];

const GROUP_TITLES: Record<CommandGroup, string> = {
    contacts: "CONTACT MANAGEMENT",
    email: "EMAIL MANAGEMENT",
    address: "ADDRESS MANAGEMENT",
    birthdays: "BIRTHDAY MANAGEMENT",
    notes: "NOTE MANAGEMENT",
    general: "GENERAL",
};

const COMMAND_NAME_SET: ReadonlySet<string> = new Set(COMMAND_NAMES);

export function isCommandName(value: string): value is CommandName {
    return COMMAND_NAME_SET.has(value);
}

export function splitInput(input: string): string[] {
    return input.trim().split(/\s+/).filter(Boolean);
}

export class CommandSystem<Ctx> {
    private readonly helpHeader: string;
    private readonly commandsInOrder: CommandDefinition<Ctx>[] = [];
    private readonly lookup = new Map<CommandName, CommandDefinition<Ctx>>();

    constructor(options: CommandSystemOptions = {}) {
        this.helpHeader = options.helpHeader ?? "BOT ASSISTANT - AVAILABLE COMMANDS";
        this.register({
            name: "help",
            group: "general",
            usage: "help",
            description: "Show this menu",
            handler: () => this.formatHelp(),
        });
    }

    register(def: CommandDefinition<Ctx>): this {
        if (this.lookup.has(def.name)) throw new Error(`Command already registered: ${def.name}`);

        this.commandsInOrder.push(def);
        this.lookup.set(def.name, def);

        for (const alias of def.aliases ?? []) {
            if (this.lookup.has(alias)) throw new Error(`Command/alias already registered: ${alias}`);
            this.lookup.set(alias, def);
        }

        return this;
    }

    /**
     * Resolves a raw input line to a command: a two-word command wins over a one-word one.
     * Returns null for blank input.
     */
    parse(input: string): { name: string; args: string[] } | null {
        const parts = splitInput(input);
        if (parts.length === 0) return null;

        if (parts.length >= 2) {
            const twoWord = `${parts[0]} ${parts[1]}`.toLowerCase();
            if (isCommandName(twoWord) && this.lookup.has(twoWord)) {
                return { name: twoWord, args: parts.slice(2) };
            }
        }

        return { name: (parts[0] ?? "").toLowerCase(), args: parts.slice(1) };
    }

    async handle(input: string, ctx: Ctx): Promise<CommandReply | null> {
        const parsed = this.parse(input);
        if (!parsed) return null;

        if (!isCommandName(parsed.name) || !this.lookup.has(parsed.name)) {
            return { action: "continue", output: `Invalid command: '${parsed.name}'. Type 'help' for assistance.` };
        }

        return this.execute(parsed.name, ctx, parsed.args);
    }

    /** Runs one command; recoverable failures become `Error: ...` replies and never escape. */
    async execute(name: CommandName, ctx: Ctx, args: string[]): Promise<CommandReply> {
        const def = this.lookup.get(name);
        if (!def) {
            return { action: "continue", output: `Invalid command: '${name}'. Type 'help' for assistance.` };
        }

        if (args.length < (def.minArgs ?? 0)) {
            return { action: "continue", output: `Error: Not enough arguments. Usage: ${def.usage}` };
        }

        try {
            const result = await def.handler(ctx, args);
            return typeof result === "string" ? { action: "continue", output: result } : result;
        } catch (err) {
            if (isAssistantError(err)) {
                return { action: "continue", output: `Error: ${err.message}` };
            }
            return { action: "continue", output: `Unexpected error: ${describeError(err)}` };
        }
    }

    formatHelp(): string {
        const width = Math.max(...this.commandsInOrder.map((def) => def.usage.length)) + 2;
        const lines: string[] = [this.helpHeader];
        for (const group of GROUP_ORDER) {
            const defs = this.commandsInOrder.filter((def) => def.group === group);
            if (defs.length === 0) continue;
            lines.push("", `${GROUP_TITLES[group]}:`);
            for (const def of defs) {
                lines.push(`  ${def.usage.padEnd(width)} - ${def.description}`);
            }
        }
        return lines.join("\n");
    }
}
