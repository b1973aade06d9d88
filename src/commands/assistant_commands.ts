import { type AssistantContext } from "../assistant_runner";
import { CommandSystem } from "./command_system";
import { contactCommands } from "./contact_commands";
import { generalCommands } from "./general_commands";
import { noteCommands } from "./note_commands";

export function createCommandSystem(): CommandSystem<AssistantContext> {
    const commandSystem = new CommandSystem<AssistantContext>();
    for (const def of [...contactCommands, ...noteCommands, ...generalCommands]) {
        commandSystem.register(def);
    }
    return commandSystem;
}
