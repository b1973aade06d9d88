import { type AddressBook } from "./address_book/address_book";
import { type AssistantUI } from "./cli_ui";
import { type CommandSystem } from "./commands/command_system";
import { type Notebook } from "./notebook/notebook";
import { type AssistantData } from "./storage/assistant_storage";

/** Everything a command handler may touch; there is no module-level state. */
export type AssistantContext = {
    addressBook: AddressBook;
    notebook: Notebook;
    defaultBirthdayDays: number;
    now: () => Date;
    persist: () => Promise<void>;
};

export interface DataStore {
    save(data: AssistantData): Promise<void>;
}

export type AssistantRunnerOptions = {
    addressBook: AddressBook;
    notebook: Notebook;
    storage: DataStore;
    commandSystem: CommandSystem<AssistantContext>;
    ui: AssistantUI;
    defaultBirthdayDays: number;
    now?: () => Date;
};

export class AssistantRunner {
    private readonly addressBook: AddressBook;
    private readonly notebook: Notebook;
    private readonly storage: DataStore;
    private readonly commandSystem: CommandSystem<AssistantContext>;
    private readonly ui: AssistantUI;
    private readonly defaultBirthdayDays: number;
    private readonly now: () => Date;

    constructor(options: AssistantRunnerOptions) {
        this.addressBook = options.addressBook;
        this.notebook = options.notebook;
        this.storage = options.storage;
        this.commandSystem = options.commandSystem;
        this.ui = options.ui;
        this.defaultBirthdayDays = options.defaultBirthdayDays;
        this.now = options.now ?? (() => new Date());
    }

    private createContext(): AssistantContext {
        return {
            addressBook: this.addressBook,
            notebook: this.notebook,
            defaultBirthdayDays: this.defaultBirthdayDays,
            now: this.now,
            persist: () => this.persist(),
        };
    }

    async persist(): Promise<void> {
        await this.storage.save({ addressBook: this.addressBook, notebook: this.notebook });
    }

    /**
     * Reads and executes commands until `exit`/`close` or end of input,
     * then saves both collections. Ctrl+C ends input, so it saves too.
     */
    async run(): Promise<void> {
        this.ui.onInterrupt(() => {
            this.ui.printSystem("Exiting... (Data will be saved)");
            this.ui.close();
        });

        const ctx = this.createContext();
        while (true) {
            const input = await this.ui.promptUser();
            if (input === null) break;

            const reply = await this.commandSystem.handle(input, ctx);
            if (!reply) continue;
            if (reply.output) this.ui.printResult(reply.output);
            if (reply.action === "exit") break;
        }

        await this.persist();
        this.ui.printSystem("Data saved. Good bye!");
    }
}
