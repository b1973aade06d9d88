import { homedir, platform } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_BIRTHDAY_DAYS } from "../address_book/address_book";

const APP_DIRECTORY_NAME = "personal-assistant";

/** What to do with a stored entry that no longer passes validation. */
export type InvalidRecordPolicy = "skip" | "reset";

const blankAsUndefined = (value: unknown) => {
    if (typeof value !== "string") return value;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

const envSchema = z.object({
    ASSISTANT_DATA_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
    ASSISTANT_ADDRESSBOOK_FILE: z.preprocess(blankAsUndefined, z.string().default("addressbook.json")),
    ASSISTANT_NOTEBOOK_FILE: z.preprocess(blankAsUndefined, z.string().default("notes.json")),
    ASSISTANT_INVALID_RECORDS: z.preprocess(blankAsUndefined, z.enum(["skip", "reset"]).default("skip")),
    ASSISTANT_BIRTHDAY_DAYS: z.preprocess(
        blankAsUndefined,
        z.coerce.number().int().min(0).default(DEFAULT_BIRTHDAY_DAYS)
    ),
});

export interface AppConfig {
    dataDirectory: string;
    addressBookFile: string;
    notebookFile: string;
    invalidRecordPolicy: InvalidRecordPolicy;
    defaultBirthdayDays: number;
}

type Env = Record<string, string | undefined>;

export function resolveDataDirectory(env: Env = process.env): string {
    const home = homedir();
    const platformName = platform();

    if (platformName === "win32") {
        const appData = env.APPDATA?.trim();
        if (appData && appData.length > 0) {
            return join(appData, APP_DIRECTORY_NAME);
        }
        return join(home, "AppData", "Roaming", APP_DIRECTORY_NAME);
    }

    if (platformName === "darwin") {
        return join(home, "Library", "Application Support", APP_DIRECTORY_NAME);
    }

    const xdg = env.XDG_DATA_HOME?.trim();
    if (xdg && xdg.length > 0) {
        return join(xdg, APP_DIRECTORY_NAME);
    }
    return join(home, ".local", "share", APP_DIRECTORY_NAME);
}

/**
 * Reads settings from the environment.
 *
 * File names may be absolute; relative ones live under the data directory.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid assistant configuration: ${details}`);
    }

    const parsed = result.data;
    const dataDirectory = resolve(parsed.ASSISTANT_DATA_DIR ?? resolveDataDirectory(env));
    const inDataDirectory = (file: string) => (isAbsolute(file) ? file : join(dataDirectory, file));

    return {
        dataDirectory,
        addressBookFile: inDataDirectory(parsed.ASSISTANT_ADDRESSBOOK_FILE),
        notebookFile: inDataDirectory(parsed.ASSISTANT_NOTEBOOK_FILE),
        invalidRecordPolicy: parsed.ASSISTANT_INVALID_RECORDS,
        defaultBirthdayDays: parsed.ASSISTANT_BIRTHDAY_DAYS,
    };
}
