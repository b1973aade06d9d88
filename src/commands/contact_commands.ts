import { type AddressBook } from "../address_book/address_book";
import { ContactRecord } from "../address_book/record";
import { InvalidArgumentError, NotFoundError, PreconditionFailedError } from "../errors";
import { formatDate } from "../fields/fields";
import { type AssistantContext } from "../assistant_runner";
import { type CommandDefinition } from "./command_system";

function requireContact(book: AddressBook, name: string): ContactRecord {
    const record = book.find(name);
    if (!record) {
        throw new NotFoundError(`Contact '${name}' not found`);
    }
    return record;
}

function plural(count: number, word: string): string {
    return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function parseDays(raw: string | undefined, fallback: number): number {
    if (raw === undefined) return fallback;
    if (!/^-?\d+$/.test(raw)) {
        throw new InvalidArgumentError("Enter a valid number (e.g., 'birthdays 5')");
    }
    return Number(raw);
}

export const addContactCommand: CommandDefinition<AssistantContext> = {
    name: "add contact",
    group: "contacts",
    usage: "add contact [name] [phone]",
    description: "Add new contact or another phone to an existing one",
    minArgs: 1,
    handler: ({ addressBook }, [name = "", phone]) => {
        const existing = addressBook.find(name);
        if (existing) {
            if (phone !== undefined) existing.addPhone(phone);
            return "Contact updated.";
        }

        const record = new ContactRecord(name);
        if (phone !== undefined) record.addPhone(phone);
        addressBook.add(record);
        return "Contact added.";
    },
};

export const changeContactCommand: CommandDefinition<AssistantContext> = {
    name: "change contact",
    group: "contacts",
    usage: "change contact [name] [old] [new]",
    description: "Change phone number",
    minArgs: 3,
    handler: ({ addressBook }, [name = "", oldPhone = "", newPhone = ""]) => {
        requireContact(addressBook, name).editPhone(oldPhone, newPhone);
        return "Contact updated.";
    },
};

export const removePhoneCommand: CommandDefinition<AssistantContext> = {
    name: "remove phone",
    group: "contacts",
    usage: "remove phone [name] [phone]",
    description: "Remove phone number from contact",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", phone = ""]) => {
        requireContact(addressBook, name).removePhone(phone);
        return `Phone ${phone} removed from '${name}'.`;
    },
};

export const showPhoneCommand: CommandDefinition<AssistantContext> = {
    name: "show phone",
    group: "contacts",
    usage: "show phone [name]",
    description: "Display contact phone numbers",
    minArgs: 1,
    handler: ({ addressBook }, [name = ""]) => {
        const record = requireContact(addressBook, name);
        if (record.phones.length === 0) return `${name} has no phones.`;
        return `${name}: ${record.phones.map((phone) => phone.value).join("; ")}`;
    },
};

export const deleteContactCommand: CommandDefinition<AssistantContext> = {
    name: "delete contact",
    group: "contacts",
    usage: "delete contact [name]",
    description: "Delete contact",
    minArgs: 1,
    handler: ({ addressBook }, [name = ""]) => {
        addressBook.delete(name);
        return `Contact '${name}' deleted.`;
    },
};

export const showAllCommand: CommandDefinition<AssistantContext> = {
    name: "show all",
    group: "contacts",
    usage: "show all",
    description: "Display all contacts",
    handler: ({ addressBook }) => {
        const records = addressBook.toArray();
        if (records.length === 0) return "No contacts saved.";
        return ["All contacts:", ...records.map((record) => record.toString())].join("\n");
    },
};

export const searchContactsCommand: CommandDefinition<AssistantContext> = {
    name: "search",
    group: "contacts",
    usage: "search [query]",
    description: "Search contacts by name/phone/email/address/birthday",
    minArgs: 1,
    handler: ({ addressBook }, args) => {
        const query = args.join(" ");
        const results = addressBook.search(query);
        if (results.length === 0) return `No contacts found matching '${query}'.`;
        return [`Search results for '${query}':`, ...results.map((record) => record.toString())].join("\n");
    },
};

export const addEmailCommand: CommandDefinition<AssistantContext> = {
    name: "add email",
    group: "email",
    usage: "add email [name] [email]",
    description: "Add email to contact",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", email = ""]) => {
        requireContact(addressBook, name).addEmail(email);
        return "Email added.";
    },
};

export const changeEmailCommand: CommandDefinition<AssistantContext> = {
    name: "change email",
    group: "email",
    usage: "change email [name] [new_email]",
    description: "Change contact email",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", email = ""]) => {
        const record = requireContact(addressBook, name);
        if (!record.email) {
            throw new PreconditionFailedError(`Contact '${name}' has no email. Use 'add email' first.`);
        }
        record.editEmail(email);
        return "Email updated.";
    },
};

export const addAddressCommand: CommandDefinition<AssistantContext> = {
    name: "add address",
    group: "address",
    usage: "add address [name] [address]",
    description: "Add address to contact",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", ...words]) => {
        requireContact(addressBook, name).addAddress(words.join(" "));
        return "Address added.";
    },
};

export const changeAddressCommand: CommandDefinition<AssistantContext> = {
    name: "change address",
    group: "address",
    usage: "change address [name] [new_address]",
    description: "Change contact address",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", ...words]) => {
        const record = requireContact(addressBook, name);
        if (!record.address) {
            throw new PreconditionFailedError(`Contact '${name}' has no address. Use 'add address' first.`);
        }
        record.editAddress(words.join(" "));
        return "Address updated.";
    },
};

export const addBirthdayCommand: CommandDefinition<AssistantContext> = {
    name: "add birthday",
    group: "birthdays",
    usage: "add birthday [name] [DD.MM.YYYY]",
    description: "Add birthday to contact",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", birthday = ""]) => {
        requireContact(addressBook, name).addBirthday(birthday);
        return "Birthday added.";
    },
};

export const changeBirthdayCommand: CommandDefinition<AssistantContext> = {
    name: "change birthday",
    group: "birthdays",
    usage: "change birthday [name] [DD.MM.YYYY]",
    description: "Change contact birthday",
    minArgs: 2,
    handler: ({ addressBook }, [name = "", birthday = ""]) => {
        const record = requireContact(addressBook, name);
        if (!record.birthday) {
            throw new PreconditionFailedError(`Contact '${name}' has no birthday. Use 'add birthday' first.`);
        }
        record.addBirthday(birthday);
        return "Birthday updated.";
    },
};

export const showBirthdayCommand: CommandDefinition<AssistantContext> = {
    name: "show birthday",
    group: "birthdays",
    usage: "show birthday [name]",
    description: "Display contact birthday",
    minArgs: 1,
    handler: ({ addressBook }, [name = ""]) => {
        const record = requireContact(addressBook, name);
        if (!record.birthday) return `${name} has no birthday set.`;
        return `${name}'s birthday: ${record.birthday.format()}`;
    },
};

export const birthdaysCommand: CommandDefinition<AssistantContext> = {
    name: "birthdays",
    group: "birthdays",
    usage: "birthdays [N]",
    description: "Show birthdays in exactly N days (default: 7)",
    handler: ({ addressBook, defaultBirthdayDays, now }, [raw]) => {
        const days = parseDays(raw, defaultBirthdayDays);
        const upcoming = addressBook.birthdaysWithin(days, now());
        if (upcoming.length === 0) return `No birthdays in ${plural(days, "day")}.`;
        return [
            `Birthdays in ${plural(days, "day")}:`,
            ...upcoming.map((item) => `• ${item.name} → ${formatDate(item.congratulationDate)}`),
        ].join("\n");
    },
};

export const contactCommands: CommandDefinition<AssistantContext>[] = [
    addContactCommand,
    changeContactCommand,
    removePhoneCommand,
    showPhoneCommand,
    deleteContactCommand,
    showAllCommand,
    searchContactsCommand,
    addEmailCommand,
    changeEmailCommand,
    addAddressCommand,
    changeAddressCommand,
    addBirthdayCommand,
    changeBirthdayCommand,
    showBirthdayCommand,
    birthdaysCommand,
];
