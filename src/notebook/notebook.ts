import { NotFoundError } from "../errors";
import { Note, normalizeTag, normalizeTags } from "./note";

export interface NoteEdit {
    newTitle?: string;
    newContent?: string;
    /** Replaces all tags when present; an empty array clears them. */
    newTags?: readonly string[];
}

/**
 * Notes keyed by title.
 *
 * - Preserves insertion order for rendering and search results.
 * - Adding an existing title replaces that note; renaming moves a note to the end.
 */
export class Notebook {
    private readonly notesByTitle = new Map<string, Note>();

    get size(): number {
        return this.notesByTitle.size;
    }

    has(title: string): boolean {
        return this.notesByTitle.has(title);
    }

    add(note: Note): void {
        this.notesByTitle.set(note.title, note);
    }

    find(title: string): Note | undefined {
        return this.notesByTitle.get(title);
    }

    delete(title: string): void {
        if (!this.notesByTitle.delete(title)) {
            throw new NotFoundError(`Note '${title}' not found`);
        }
    }

    edit(title: string, patch: NoteEdit): Note {
        const current = this.require(title);
        const next = new Note(
            patch.newTitle?.trim() ? patch.newTitle : current.title,
            patch.newContent?.trim() ? patch.newContent : current.content,
            patch.newTags ?? current.tags
        );

        if (next.title !== title) this.notesByTitle.delete(title);
        this.notesByTitle.set(next.title, next);
        return next;
    }

    /** Case-insensitive match on title, then content, then tags. */
    search(query: string): Note[] {
        const needle = query.toLowerCase();
        return this.toArray().filter(
            (note) =>
                note.title.toLowerCase().includes(needle) ||
                note.content.toLowerCase().includes(needle) ||
                note.tags.some((tag) => tag.toLowerCase().includes(needle))
        );
    }

    /** Union of the note's tags with `tags`; returns how many were new. */
    tagAdd(title: string, tags: readonly string[]): number {
        const note = this.require(title);
        const merged = [...note.tags];
        const present = new Set(merged);
        for (const tag of normalizeTags(tags)) {
            if (present.has(tag)) continue;
            present.add(tag);
            merged.push(tag);
        }
        this.notesByTitle.set(title, new Note(note.title, note.content, merged));
        return merged.length - note.tags.length;
    }

    tagRemove(title: string, tags: readonly string[]): number {
        const note = this.require(title);
        const doomed = new Set(normalizeTags(tags));
        const kept = note.tags.filter((tag) => !doomed.has(tag));
        this.notesByTitle.set(title, new Note(note.title, note.content, kept));
        return note.tags.length - kept.length;
    }

    withTag(tag: string): Note[] {
        const wanted = normalizeTag(tag);
        return this.toArray().filter((note) => note.tags.includes(wanted));
    }

    /** Stable sort by first tag; untagged notes come last. */
    sortByPrimaryTag(): Note[] {
        return this.toArray().sort((a, b) => {
            const left: string | undefined = a.tags[0];
            const right: string | undefined = b.tags[0];
            if (left === undefined || right === undefined) {
                return (left === undefined ? 1 : 0) - (right === undefined ? 1 : 0);
            }
            if (left < right) return -1;
            if (left > right) return 1;
            return 0;
        });
    }

    /** Notes in insertion order (stable). */
    toArray(): Note[] {
        return Array.from(this.notesByTitle.values());
    }

    private require(title: string): Note {
        const note = this.notesByTitle.get(title);
        if (!note) {
            throw new NotFoundError(`Note '${title}' not found`);
        }
        return note;
    }
}
