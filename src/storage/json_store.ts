import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { describeError } from "../errors";
import { type InvalidRecordPolicy } from "../config/app_config";

export type WarningSink = (message: string) => void;

export interface JsonCollectionStoreOptions<Item, Entry> {
    filePath: string;
    /** Human-readable collection name used in warnings, e.g. "Address book". */
    label: string;
    entrySchema: z.ZodType<Entry, z.ZodTypeDef, unknown>;
    fromEntry: (entry: Entry) => Item;
    toEntry: (item: Item) => Entry;
    invalidRecordPolicy?: InvalidRecordPolicy;
    warn?: WarningSink;
}

async function atomicWrite(filePath: string, content: string): Promise<void> {
    const dir = dirname(filePath);
    await mkdir(dir, { recursive: true });
    const tmpPath = join(dir, `.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    try {
        await writeFile(tmpPath, content, "utf8");
        await rename(tmpPath, filePath);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One collection persisted as a pretty-printed JSON array.
 *
 * `load` never throws: unreadable or malformed files degrade to an empty list plus a warning.
 */
export class JsonCollectionStore<Item, Entry> {
    private readonly filePath: string;
    private readonly label: string;
    private readonly entrySchema: z.ZodType<Entry, z.ZodTypeDef, unknown>;
    private readonly fromEntry: (entry: Entry) => Item;
    private readonly toEntry: (item: Item) => Entry;
    private readonly policy: InvalidRecordPolicy;
    private readonly warn: WarningSink;

    constructor(options: JsonCollectionStoreOptions<Item, Entry>) {
        this.filePath = options.filePath;
        this.label = options.label;
        this.entrySchema = options.entrySchema;
        this.fromEntry = options.fromEntry;
        this.toEntry = options.toEntry;
        this.policy = options.invalidRecordPolicy ?? "skip";
        this.warn = options.warn ?? ((message) => console.warn(message));
    }

    async load(): Promise<Item[]> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, "utf8");
        } catch (error) {
            if (isMissingFile(error)) return [];
            this.warn(`Can't read ${this.filePath}: ${describeError(error)}. Created new ${this.label}.`);
            return [];
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            this.warn(`Can't parse ${this.filePath}. Created new ${this.label}.`);
            return [];
        }

        if (!Array.isArray(json)) {
            this.warn(`Expected a JSON array in ${this.filePath}. Created new ${this.label}.`);
            return [];
        }

        const items: Item[] = [];
        for (const [index, candidate] of json.entries()) {
            try {
                items.push(this.fromEntry(this.entrySchema.parse(candidate)));
            } catch (error) {
                const reason = error instanceof z.ZodError ? "unexpected shape" : describeError(error);
                if (this.policy === "reset") {
                    this.warn(
                        `Invalid entry #${index + 1} in ${this.filePath} (${reason}). Created new ${this.label}.`
                    );
                    return [];
                }
                this.warn(`Skipped invalid entry #${index + 1} in ${this.filePath}: ${reason}`);
            }
        }
        return items;
    }

    async save(items: readonly Item[]): Promise<void> {
        const payload = `${JSON.stringify(items.map(this.toEntry), null, 4)}\n`;
        await atomicWrite(this.filePath, payload);
    }
}
