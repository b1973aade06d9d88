import { z } from "zod";
import { AddressBook } from "../address_book/address_book";
import { ContactRecord, type ContactEntry } from "../address_book/record";
import { Note, type NoteEntry } from "../notebook/note";
import { Notebook } from "../notebook/notebook";
import { type AppConfig } from "../config/app_config";
import { describeError } from "../errors";
import { JsonCollectionStore, type WarningSink } from "./json_store";

const ADDRESS_BOOK_LABEL = "Address book";
const NOTEBOOK_LABEL = "Notebook";

const contactEntrySchema = z.object({
    name: z.string(),
    phones: z.array(z.string()).default([]),
    email: z.string().nullable().default(null),
    address: z.string().nullable().default(null),
    birthday: z.string().nullable().default(null),
});

const noteEntrySchema = z.object({
    title: z.string(),
    content: z.string(),
    tags: z.array(z.string()).default([]),
});

export interface AssistantData {
    addressBook: AddressBook;
    notebook: Notebook;
}

export type AssistantStorageOptions = Pick<AppConfig, "addressBookFile" | "notebookFile" | "invalidRecordPolicy"> & {
    warn?: WarningSink;
};

/** Loads and saves both collections; each lives in its own file. */
export class AssistantStorage {
    private readonly contacts: JsonCollectionStore<ContactRecord, ContactEntry>;
    private readonly notes: JsonCollectionStore<Note, NoteEntry>;

    constructor(options: AssistantStorageOptions) {
        this.contacts = new JsonCollectionStore<ContactRecord, ContactEntry>({
            filePath: options.addressBookFile,
            label: ADDRESS_BOOK_LABEL,
            entrySchema: contactEntrySchema,
            fromEntry: (entry) => ContactRecord.fromJSON(entry),
            toEntry: (record) => record.toJSON(),
            invalidRecordPolicy: options.invalidRecordPolicy,
            warn: options.warn,
        });
        this.notes = new JsonCollectionStore<Note, NoteEntry>({
            filePath: options.notebookFile,
            label: NOTEBOOK_LABEL,
            entrySchema: noteEntrySchema,
            fromEntry: (entry) => Note.fromJSON(entry),
            toEntry: (note) => note.toJSON(),
            invalidRecordPolicy: options.invalidRecordPolicy,
            warn: options.warn,
        });
    }

    async load(): Promise<AssistantData> {
        const addressBook = new AddressBook();
        for (const record of await this.contacts.load()) {
            addressBook.add(record);
        }

        const notebook = new Notebook();
        for (const note of await this.notes.load()) {
            notebook.add(note);
        }

        return { addressBook, notebook };
    }

    /** Writes both collections even when one of them fails; throws afterwards naming each failure. */
    async save({ addressBook, notebook }: AssistantData): Promise<void> {
        const failures: string[] = [];
        const attempt = async (label: string, write: () => Promise<void>) => {
            try {
                await write();
            } catch (error) {
                failures.push(`${label}: ${describeError(error)}`);
            }
        };

        await attempt(ADDRESS_BOOK_LABEL, () => this.contacts.save(addressBook.toArray()));
        await attempt(NOTEBOOK_LABEL, () => this.notes.save(notebook.toArray()));

        if (failures.length > 0) {
            throw new Error(`Couldn't save ${failures.join("; ")}`);
        }
    }
}
