import { AssistantRunner } from "./assistant_runner";
import { type AssistantUI, CliUI } from "./cli_ui";
import { createCommandSystem } from "./commands/assistant_commands";
import { loadAppConfig } from "./config/app_config";
import { describeError } from "./errors";
import { AssistantStorage } from "./storage/assistant_storage";

export async function main(ui: AssistantUI = new CliUI(), env: NodeJS.ProcessEnv = process.env): Promise<void> {
    // A TTY reports Ctrl+C through readline, anything else through the process; either way,
    // closing input ends the loop and the runner saves. Hooked before loading so an early
    // interrupt ends the session too.
    const stop = () => ui.close();
    ui.onInterrupt(stop);
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    try {
        const config = loadAppConfig(env);
        const storage = new AssistantStorage({
            addressBookFile: config.addressBookFile,
            notebookFile: config.notebookFile,
            invalidRecordPolicy: config.invalidRecordPolicy,
            warn: (message) => ui.printWarning(message),
        });
        const { addressBook, notebook } = await storage.load();

        ui.printBanner({ dataDirectory: config.dataDirectory });

        const runner = new AssistantRunner({
            addressBook,
            notebook,
            storage,
            commandSystem: createCommandSystem(),
            ui,
            defaultBirthdayDays: config.defaultBirthdayDays,
        });
        await runner.run();
    } catch (error) {
        ui.printError(describeError(error));
        process.exitCode = 1;
    } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
        ui.close();
    }
}
