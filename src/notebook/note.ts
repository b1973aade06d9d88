import { InvalidFormatError } from "../errors";

export interface NoteEntry {
    title: string;
    content: string;
    tags: string[];
}

/** `" #Work "` -> `"work"`; returns an empty string for a blank tag. */
export function normalizeTag(raw: string): string {
    return raw.trim().replace(/^#+/, "").trim().toLowerCase();
}

export function normalizeTags(raw: readonly string[]): string[] {
    return raw.map(normalizeTag).filter((tag) => tag.length > 0);
}

/** Immutable once built; `Notebook` swaps in a new instance on every change. */
export class Note {
    readonly title: string;
    readonly content: string;
    readonly tags: readonly string[];

    constructor(title: string, content: string, tags: readonly string[] = []) {
        this.title = Note.requireTitle(title);
        this.content = Note.requireContent(content);
        this.tags = normalizeTags(tags);
    }

    static validateTitle(value: string): boolean {
        return value.trim().length > 0;
    }

    static validateContent(value: string): boolean {
        return value.trim().length > 0;
    }

    static requireTitle(value: string): string {
        if (!Note.validateTitle(value)) {
            throw new InvalidFormatError("Note title cannot be empty.");
        }
        return value.trim();
    }

    static requireContent(value: string): string {
        if (!Note.validateContent(value)) {
            throw new InvalidFormatError("Note content cannot be empty.");
        }
        return value.trim();
    }

    toJSON(): NoteEntry {
        return {
            title: this.title,
            content: this.content,
            tags: [...this.tags],
        };
    }

    static fromJSON(entry: NoteEntry): Note {
        return new Note(entry.title, entry.content, entry.tags);
    }

    toString(): string {
        const tags = this.tags.length > 0 ? `[${this.tags.join(", ")}]` : "[no tags]";
        return `${this.title}\n  📝 ${this.content}\n  ${tags}`;
    }
}
