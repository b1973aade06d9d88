import { InvalidArgumentError, InvalidFormatError, PreconditionFailedError } from "../errors";
import { Note } from "../notebook/note";
import { type AssistantContext } from "../assistant_runner";
import { type CommandDefinition } from "./command_system";

const RULE_WIDTH = 50;

/** Splits `title, rest` on the first comma; note titles may contain spaces. */
function splitTitle(args: string[], usage: string, example: string): { title: string; rest: string } {
    const text = args.join(" ").trim();
    const comma = text.indexOf(",");
    if (comma < 0) {
        throw new InvalidArgumentError(`Missing comma separator!\nUsage: ${usage}\nExample: ${example}`);
    }

    const title = text.slice(0, comma).trim();
    if (!title) {
        throw new InvalidFormatError("Note title cannot be empty.");
    }
    return { title, rest: text.slice(comma + 1).trim() };
}

/** Words starting with `#` are tags, everything else is content. */
function splitContentAndTags(rest: string): { content: string; tags: string[] } {
    const tags: string[] = [];
    const words: string[] = [];
    for (const word of rest.split(/\s+/).filter(Boolean)) {
        if (word.startsWith("#")) {
            tags.push(word);
        } else {
            words.push(word);
        }
    }
    return { content: words.join(" "), tags };
}

function listNotes(header: string, notes: Note[]): string {
    return [header, ...notes.map((note, i) => `${i + 1}. ${note.toString()}`)].join("\n");
}

export const addNoteCommand: CommandDefinition<AssistantContext> = {
    name: "add note",
    group: "notes",
    usage: "add note [title], [content] [#tags]",
    description: "Add new note",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const { title, rest } = splitTitle(
            args,
            "add note [title], [content] [#tag1 #tag2 ...]",
            "add note To Do, Complete project #important"
        );
        const { content, tags } = splitContentAndTags(rest);
        if (!content) {
            throw new InvalidFormatError("Note content cannot be empty.");
        }

        const note = new Note(title, content, tags);
        notebook.add(note);
        return `Note added: '${note.title}' with ${note.tags.length} tag(s).`;
    },
};

export const viewNotesCommand: CommandDefinition<AssistantContext> = {
    name: "view notes",
    group: "notes",
    usage: "view notes",
    description: "Display all notes with content",
    handler: ({ notebook }) => {
        const notes = notebook.toArray();
        if (notes.length === 0) return "No notes saved.";
        const rule = "-".repeat(RULE_WIDTH);
        const body = notes.map((note, i) => `${i + 1}. ${note.toString()}\n${rule}`);
        return ["All notes:", "=".repeat(RULE_WIDTH), ...body].join("\n");
    },
};

export const searchNotesCommand: CommandDefinition<AssistantContext> = {
    name: "search note",
    group: "notes",
    usage: "search note [query]",
    description: "Search notes by keyword/tag",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const query = args.join(" ");
        const results = notebook.search(query.replace(/^#+/, ""));
        if (results.length === 0) return `No notes found matching '${query}'.`;
        return [`🔍 Search results for '${query}':`, ...results.map((note) => `  • ${note.toString()}`)].join("\n");
    },
};

export const editNoteCommand: CommandDefinition<AssistantContext> = {
    name: "edit note",
    group: "notes",
    usage: "edit note [title], [new_content] [#tags]",
    description: "Edit note content and/or replace its tags",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const { title, rest } = splitTitle(
            args,
            "edit note [title], [new_content] [#tag1 #tag2 ...]",
            "edit note To Do, Complete project and prepare #urgent"
        );
        if (!rest) {
            throw new InvalidFormatError("Note content cannot be empty.");
        }

        const { content, tags } = splitContentAndTags(rest);
        notebook.edit(title, {
            newContent: content || undefined,
            newTags: tags.length > 0 ? tags : undefined,
        });
        return `Note updated: '${title}'`;
    },
};

export const renameNoteCommand: CommandDefinition<AssistantContext> = {
    name: "rename note",
    group: "notes",
    usage: "rename note [title], [new_title]",
    description: "Rename note",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const { title, rest } = splitTitle(args, "rename note [title], [new_title]", "rename note To Do, Done");
        if (!rest) {
            throw new InvalidFormatError("New note title cannot be empty.");
        }
        if (rest !== title && notebook.has(rest)) {
            throw new PreconditionFailedError(`Note '${rest}' already exists.`);
        }

        notebook.edit(title, { newTitle: rest });
        return `Note renamed: '${title}' → '${rest}'`;
    },
};

export const deleteNoteCommand: CommandDefinition<AssistantContext> = {
    name: "delete note",
    group: "notes",
    usage: "delete note [title]",
    description: "Delete note",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const title = args.join(" ");
        notebook.delete(title);
        return `Note '${title}' deleted.`;
    },
};

export const addTagCommand: CommandDefinition<AssistantContext> = {
    name: "add tag",
    group: "notes",
    usage: "add tag [title], [#tag1 #tag2 ...]",
    description: "Add tags to existing note",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const { title, rest } = splitTitle(
            args,
            "add tag [title], [#tag1 #tag2 ...]",
            "add tag To Do, #urgent #important"
        );
        const tags = rest.split(/\s+/).filter(Boolean);
        if (tags.length === 0) {
            throw new InvalidArgumentError("Please provide at least one tag.");
        }

        const added = notebook.tagAdd(title, tags);
        const total = notebook.find(title)?.tags.length ?? 0;
        return `Added ${added} tag(s) to '${title}'. Total tags: ${total}`;
    },
};

export const removeTagCommand: CommandDefinition<AssistantContext> = {
    name: "remove tag",
    group: "notes",
    usage: "remove tag [title], [#tag1 ...]",
    description: "Remove tags from note",
    minArgs: 1,
    handler: ({ notebook }, args) => {
        const { title, rest } = splitTitle(args, "remove tag [title], [#tag1 #tag2 ...]", "remove tag To Do, #urgent");
        const tags = rest.split(/\s+/).filter(Boolean);
        if (tags.length === 0) {
            throw new InvalidArgumentError("Please provide at least one tag to remove.");
        }

        const removed = notebook.tagRemove(title, tags);
        if (removed === 0) return `No tags were removed from '${title}'.`;
        const remaining = notebook.find(title)?.tags.length ?? 0;
        return `Removed ${removed} tag(s) from '${title}'. Remaining tags: ${remaining}`;
    },
};

export const showTagCommand: CommandDefinition<AssistantContext> = {
    name: "show tag",
    group: "notes",
    usage: "show tag [#tag]",
    description: "Display notes with a tag",
    minArgs: 1,
    handler: ({ notebook }, [tag = ""]) => {
        const notes = notebook.withTag(tag);
        const label = tag.replace(/^#+/, "").toLowerCase();
        if (notes.length === 0) return `No notes tagged '#${label}'.`;
        return listNotes(`Notes tagged '#${label}':`, notes);
    },
};

export const sortNotesCommand: CommandDefinition<AssistantContext> = {
    name: "sort notes",
    group: "notes",
    usage: "sort notes",
    description: "Sort notes by tag",
    handler: ({ notebook }) => {
        if (notebook.size === 0) return "No notes saved.";
        return listNotes("Notes sorted by tag:", notebook.sortByPrimaryTag());
    },
};

export const noteCommands: CommandDefinition<AssistantContext>[] = [
    addNoteCommand,
    viewNotesCommand,
    searchNotesCommand,
    editNoteCommand,
    renameNoteCommand,
    deleteNoteCommand,
    addTagCommand,
    removeTagCommand,
    showTagCommand,
    sortNotesCommand,
];
