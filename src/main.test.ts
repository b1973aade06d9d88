import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type AssistantUI } from "./cli_ui";
import { main } from "./main";

/** Fires Ctrl+C while the banner is printed, i.e. after loading but before the first prompt. */
class InterruptingUI implements AssistantUI {
    readonly results: string[] = [];
    readonly system: string[] = [];
    readonly errors: string[] = [];
    private readonly interruptListeners: (() => void)[] = [];
    private closed = false;

    constructor(private readonly inputs: string[]) {}

    printBanner(): void {
        for (const listener of this.interruptListeners) listener();
    }

    async promptUser(): Promise<string | null> {
        if (this.closed) return null;
        return this.inputs.shift() ?? null;
    }

    printResult(text: string): void {
        this.results.push(text);
    }

    printSystem(text: string): void {
        this.system.push(text);
    }

    printWarning(): void {}

    printError(text: string): void {
        this.errors.push(text);
    }

    onInterrupt(listener: () => void): void {
        this.interruptListeners.push(listener);
    }

    close(): void {
        this.closed = true;
    }
}

describe("main", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "assistant-main-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("ends the session and saves when interrupted before the first prompt", async () => {
        const ui = new InterruptingUI(["hello"]);

        await main(ui, { ASSISTANT_DATA_DIR: dir });

        expect(ui.results).toEqual([]);
        expect(ui.errors).toEqual([]);
        expect(ui.system).toEqual(["Data saved. Good bye!"]);
        expect(await readFile(join(dir, "addressbook.json"), "utf8")).toBe("[]\n");
        expect(await readFile(join(dir, "notes.json"), "utf8")).toBe("[]\n");
    });
});
