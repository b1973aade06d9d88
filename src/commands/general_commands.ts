import { type AssistantContext } from "../assistant_runner";
import { type CommandDefinition, type CommandReply } from "./command_system";

export const helloCommand: CommandDefinition<AssistantContext> = {
    name: "hello",
    group: "general",
    usage: "hello",
    description: "Greet the assistant",
    handler: () => "How can I help you?",
};

export const saveCommand: CommandDefinition<AssistantContext> = {
    name: "save",
    group: "general",
    usage: "save",
    description: "Save contacts and notes now",
    handler: async ({ persist }) => {
        await persist();
        return "Data saved.";
    },
};

export const exitCommand: CommandDefinition<AssistantContext> = {
    name: "exit",
    aliases: ["close"],
    group: "general",
    usage: "close/exit",
    description: "Save and exit",
    handler: (): CommandReply => ({ action: "exit" }),
};

export const generalCommands: CommandDefinition<AssistantContext>[] = [helloCommand, saveCommand, exitCommand];
