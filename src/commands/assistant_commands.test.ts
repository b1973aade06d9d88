import { beforeEach, describe, expect, it, vi } from "vitest";
import { AddressBook } from "../address_book/address_book";
import { Notebook } from "../notebook/notebook";
import { type AssistantContext } from "../assistant_runner";
import { createCommandSystem } from "./assistant_commands";

describe("assistant commands", () => {
    const commands = createCommandSystem();
    let ctx: AssistantContext;

    beforeEach(() => {
        ctx = {
            addressBook: new AddressBook(),
            notebook: new Notebook(),
            defaultBirthdayDays: 7,
            // Wednesday, 10 January 2024.
            now: () => new Date(2024, 0, 10),
            persist: vi.fn(async () => {}),
        };
    });

    async function run(input: string): Promise<string | undefined> {
        const reply = await commands.handle(input, ctx);
        return reply?.output;
    }

    describe("contacts", () => {
        it("creates a contact, then adds phones to it", async () => {
            expect(await run("add contact John 0931112233")).toBe("Contact added.");
            expect(await run("add contact John 0501234567")).toBe("Contact updated.");
            expect(await run("show phone John")).toBe("John: 0931112233; 0501234567");
        });

        it("does not create a contact when the phone is invalid", async () => {
            expect(await run("add contact Bad 123")).toBe(
                "Error: Phone number must contain 10 digits. Use format like 0931112233."
            );
            expect(ctx.addressBook.find("Bad")).toBeUndefined();
        });

        it("changes and removes phones", async () => {
            await run("add contact John 0931112233");
            expect(await run("change contact John 0931112233 0501234567")).toBe("Contact updated.");
            expect(await run("change contact John 0931112233 0501234567")).toBe(
                "Error: Phone number 0931112233 not found"
            );
            expect(await run("remove phone John 0501234567")).toBe("Phone 0501234567 removed from 'John'.");
            expect(await run("show phone John")).toBe("John has no phones.");
        });

        it("requires an existing email, address or birthday before changing it", async () => {
            await run("add contact John");
            expect(await run("change email John john@example.com")).toBe(
                "Error: Contact 'John' has no email. Use 'add email' first."
            );
            expect(await run("change address John Main St")).toBe(
                "Error: Contact 'John' has no address. Use 'add address' first."
            );
            expect(await run("change birthday John 01.01.2000")).toBe(
                "Error: Contact 'John' has no birthday. Use 'add birthday' first."
            );

            expect(await run("add email John John@Example.com")).toBe("Email added.");
            expect(await run("change email John j@example.org")).toBe("Email updated.");
            expect(await run("add address John Main St 5")).toBe("Address added.");
            expect(await run("change address John Oak Ave 7")).toBe("Address updated.");
            expect(await run("add birthday John 01.01.2000")).toBe("Birthday added.");
            expect(await run("change birthday John 02.01.2000")).toBe("Birthday updated.");

            expect(ctx.addressBook.find("John")?.toJSON()).toEqual({
                name: "John",
                phones: [],
                email: "j@example.org",
                address: "Oak Ave 7",
                birthday: "02.01.2000",
            });
        });

        it("shows birthdays", async () => {
            await run("add contact John");
            expect(await run("show birthday John")).toBe("John has no birthday set.");
            await run("add birthday John 17.01.1990");
            expect(await run("show birthday John")).toBe("John's birthday: 17.01.1990");
            expect(await run("show birthday Nobody")).toBe("Error: Contact 'Nobody' not found");
            expect(await run("add birthday John 31.02.1990")).toBe("Error: Invalid date format. Use DD.MM.YYYY.");
        });

        it("lists birthdays exactly N days ahead, defaulting to the configured count", async () => {
            await run("add contact John");
            await run("add birthday John 17.01.1990");

            expect(await run("birthdays")).toBe("Birthdays in 7 days:\n• John → 17.01.2024");
            expect(await run("birthdays 1")).toBe("No birthdays in 1 day.");
            expect(await run("birthdays abc")).toBe("Error: Enter a valid number (e.g., 'birthdays 5')");
            expect(await run("birthdays -2")).toBe("Error: Number of days must be a non-negative integer.");
        });

        it("lists, searches and deletes contacts", async () => {
            expect(await run("show all")).toBe("No contacts saved.");
            await run("add contact Anna 0931112233");
            await run("add contact Bob 0509998877");

            expect(await run("show all")).toBe(
                "All contacts:\nContact name: Anna, phones: 0931112233\nContact name: Bob, phones: 0509998877"
            );
            expect(await run("search 999")).toBe("Search results for '999':\nContact name: Bob, phones: 0509998877");
            expect(await run("search nobody here")).toBe("No contacts found matching 'nobody here'.");
            expect(await run("delete contact Anna")).toBe("Contact 'Anna' deleted.");
            expect(await run("delete contact Anna")).toBe("Error: Contact 'Anna' not found");
        });

        it("reports missing arguments with usage", async () => {
            expect(await run("add email John")).toBe("Error: Not enough arguments. Usage: add email [name] [email]");
        });
    });

    describe("notes", () => {
        it("adds notes with tags parsed from the text", async () => {
            expect(await run("add note To Do, Complete project #Important #urgent")).toBe(
                "Note added: 'To Do' with 2 tag(s)."
            );
            expect(ctx.notebook.find("To Do")?.toJSON()).toEqual({
                title: "To Do",
                content: "Complete project",
                tags: ["important", "urgent"],
            });
        });

        it("validates the note syntax", async () => {
            expect(await run("add note To Do")).toBe(
                "Error: Missing comma separator!\n" +
                    "Usage: add note [title], [content] [#tag1 #tag2 ...]\n" +
                    "Example: add note To Do, Complete project #important"
            );
            expect(await run("add note , content")).toBe("Error: Note title cannot be empty.");
            expect(await run("add note Title, #only")).toBe("Error: Note content cannot be empty.");
        });

        it("manages tags, renames and deletes", async () => {
            await run("add note To Do, Complete project #important #urgent");

            expect(await run("add tag To Do, #urgent #later")).toBe("Added 1 tag(s) to 'To Do'. Total tags: 3");
            expect(await run("remove tag To Do, #nothing")).toBe("No tags were removed from 'To Do'.");
            expect(await run("remove tag To Do, #urgent")).toBe("Removed 1 tag(s) from 'To Do'. Remaining tags: 2");
            expect(await run("add tag Missing, #x")).toBe("Error: Note 'Missing' not found");

            expect(await run("rename note To Do, Done list")).toBe("Note renamed: 'To Do' → 'Done list'");
            expect(await run("delete note To Do")).toBe("Error: Note 'To Do' not found");
            expect(await run("search note #important")).toBe(
                "🔍 Search results for '#important':\n  • Done list\n  📝 Complete project\n  [important, later]"
            );

            expect(await run("edit note Done list, New content")).toBe("Note updated: 'Done list'");
            expect(ctx.notebook.find("Done list")?.toJSON()).toEqual({
                title: "Done list",
                content: "New content",
                tags: ["important", "later"],
            });

            expect(await run("delete note Done list")).toBe("Note 'Done list' deleted.");
            expect(ctx.notebook.size).toBe(0);
        });

        it("refuses to rename onto an existing title", async () => {
            await run("add note One, first");
            await run("add note Two, second");
            expect(await run("rename note One, Two")).toBe("Error: Note 'Two' already exists.");
        });

        it("views, filters and sorts notes", async () => {
            expect(await run("view notes")).toBe("No notes saved.");
            expect(await run("sort notes")).toBe("No notes saved.");

            await run("add note Later, no tags here");
            await run("add note Groceries, milk #home");

            const rule = "-".repeat(50);
            expect(await run("view notes")).toBe(
                [
                    "All notes:",
                    "=".repeat(50),
                    "1. Later\n  📝 no tags here\n  [no tags]",
                    rule,
                    "2. Groceries\n  📝 milk\n  [home]",
                    rule,
                ].join("\n")
            );
            expect(await run("sort notes")).toBe(
                "Notes sorted by tag:\n1. Groceries\n  📝 milk\n  [home]\n2. Later\n  📝 no tags here\n  [no tags]"
            );
            expect(await run("show tag #HOME")).toBe("Notes tagged '#home':\n1. Groceries\n  📝 milk\n  [home]");
            expect(await run("show tag work")).toBe("No notes tagged '#work'.");
        });
    });

    describe("general", () => {
        it("greets, saves and exits", async () => {
            expect(await run("hello")).toBe("How can I help you?");
            expect(await run("save")).toBe("Data saved.");
            expect(ctx.persist).toHaveBeenCalledTimes(1);
            expect(await commands.handle("exit", ctx)).toEqual({ action: "exit" });
            expect(await commands.handle("close", ctx)).toEqual({ action: "exit" });
        });

        it("rejects unknown commands", async () => {
            expect(await run("dance")).toBe("Invalid command: 'dance'. Type 'help' for assistance.");
        });

        it("lists every command group in help", async () => {
            const help = (await run("help")) ?? "";
            expect(help.split("\n").filter((line) => line.endsWith("MANAGEMENT:") || line === "GENERAL:")).toEqual([
                "CONTACT MANAGEMENT:",
                "EMAIL MANAGEMENT:",
                "ADDRESS MANAGEMENT:",
                "BIRTHDAY MANAGEMENT:",
                "NOTE MANAGEMENT:",
                "GENERAL:",
            ]);
        });
    });
});
