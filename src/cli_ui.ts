import * as readline from "node:readline";

export interface AssistantUI {
    printBanner(meta?: { dataDirectory?: string }): void;
    /** Resolves to null once input is closed (Ctrl+D, Ctrl+C or `close()`). */
    promptUser(): Promise<string | null>;
    printResult(text: string): void;
    printSystem(text: string): void;
    printWarning(text: string): void;
    printError(text: string): void;
    onInterrupt(listener: () => void): void;
    close(): void;
}

export class CliUI implements AssistantUI {
    private readonly rl: readline.Interface;
    private readonly supportsColor = Boolean(process.stdout.isTTY);
    private closed = false;
    private pending: ((answer: string | null) => void) | null = null;

    constructor() {
        this.rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            terminal: Boolean(process.stdin.isTTY),
        });
        this.rl.on("close", () => {
            this.closed = true;
            this.settle(null);
        });
    }

    printBanner(meta?: { dataDirectory?: string }) {
        const data = meta?.dataDirectory ? `  data=${meta.dataDirectory}` : "";
        console.log(this.bold(this.c(ANSI.cyan, "Address Book & Notebook Assistant")) + this.dim(data));
        console.log(this.dim("Type 'help' to see all available commands.  'exit' saves and quits."));
        console.log();
    }

    async promptUser(): Promise<string | null> {
        if (this.closed) return null;
        const prompt = this.bold(this.c(ANSI.blue, "Enter a command")) + this.dim(" › ");
        return new Promise<string | null>((resolve) => {
            this.pending = resolve;
            this.rl.question(prompt, (answer) => this.settle(answer.trim()));
        });
    }

    printResult(text: string): void {
        console.log();
        console.log(text);
        console.log();
    }

    printSystem(text: string): void {
        this.printBox("System", text, (s) => this.bold(this.c(ANSI.magenta, s)));
    }

    printWarning(text: string): void {
        this.printBox("Warning", text, (s) => this.bold(this.c(ANSI.yellow, s)));
    }

    printError(text: string): void {
        this.printBox("Error", text, (s) => this.bold(this.c(ANSI.red, s)));
    }

    onInterrupt(listener: () => void): void {
        this.rl.on("SIGINT", listener);
    }

    close(): void {
        if (this.closed) return;
        this.rl.close();
    }

    private settle(answer: string | null): void {
        const resolve = this.pending;
        this.pending = null;
        resolve?.(answer);
    }

    // -------------------------
    // rendering internals
    // -------------------------

    private c(code: string, text: string): string {
        return this.supportsColor ? `${code}${text}${ANSI.reset}` : text;
    }

    private dim(text: string): string {
        return this.c(ANSI.dim, text);
    }

    private bold(text: string): string {
        return this.c(ANSI.bold, text);
    }

    private wrapLines(text: string, width: number): string[] {
        const maxWidth = Math.max(20, width);
        const out: string[] = [];
        for (const rawLine of text.split(/\r?\n/)) {
            let line = rawLine;
            while (line.length > maxWidth) {
                // Prefer breaking on whitespace.
                let cut = line.lastIndexOf(" ", maxWidth);
                if (cut < 10) cut = maxWidth;
                out.push(line.slice(0, cut));
                line = line.slice(cut).trimStart();
            }
            out.push(line);
        }
        return out;
    }

    private printBox(title: string, body: string, titleColor: (s: string) => string) {
        const columns = process.stdout.columns ?? 100;
        const border = (s: string) => this.dim(s);

        console.log(`${border("┌─")} ${titleColor(title)}`);
        for (const line of this.wrapLines(body, columns - 4)) console.log(`${border("│")} ${line}`);
        console.log(`${border("└─")}`);
        console.log();
    }
}

const ANSI = {
    reset: "\x1b[0m",
    bold: "\x1b[1m",
    dim: "\x1b[2m",
    red: "\x1b[31m",
    yellow: "\x1b[33m",
    blue: "\x1b[34m",
    magenta: "\x1b[35m",
    cyan: "\x1b[36m",
} as const;
