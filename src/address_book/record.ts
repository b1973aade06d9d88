import { Address, Birthday, Email, Name, Phone, type FieldValue } from "../fields/fields";
import { NotFoundError } from "../errors";

/** Flat stored shape of a contact. */
export interface ContactEntry {
    name: string;
    phones: string[];
    email: string | null;
    address: string | null;
    birthday: string | null;
}

export class ContactRecord {
    readonly name: Name;
    readonly phones: Phone[] = [];
    email?: Email;
    address?: Address;
    birthday?: Birthday;

    constructor(name: string) {
        this.name = new Name(name);
    }

    /** Appends a phone; the same number may be stored more than once. */
    addPhone(raw: string): void {
        this.phones.push(new Phone(raw));
    }

    findPhone(value: string): Phone | undefined {
        return this.phones.find((phone) => phone.value === value);
    }

    editPhone(oldValue: string, newValue: string): void {
        const idx = this.phones.findIndex((phone) => phone.value === oldValue);
        if (idx < 0) {
            throw new NotFoundError(`Phone number ${oldValue} not found`);
        }
        this.phones[idx] = new Phone(newValue);
    }

    removePhone(value: string): void {
        const idx = this.phones.findIndex((phone) => phone.value === value);
        if (idx < 0) {
            throw new NotFoundError(`Phone number ${value} not found`);
        }
        this.phones.splice(idx, 1);
    }

    addEmail(raw: string): void {
        this.email = new Email(raw);
    }

    editEmail(raw: string): void {
        this.email = new Email(raw);
    }

    addAddress(raw: string): void {
        this.address = new Address(raw);
    }

    editAddress(raw: string): void {
        this.address = new Address(raw);
    }

    /** Sets or replaces the birthday. */
    addBirthday(raw: string): void {
        this.birthday = new Birthday(raw);
    }

    toJSON(): ContactEntry {
        return {
            name: this.name.value,
            phones: this.phones.map((phone) => phone.value),
            email: formatOptional(this.email),
            address: formatOptional(this.address),
            birthday: formatOptional(this.birthday),
        };
    }

    /** Rebuilds a record, running every stored value through the same validators as live input. */
    static fromJSON(entry: ContactEntry): ContactRecord {
        const record = new ContactRecord(entry.name);
        for (const phone of entry.phones) {
            record.addPhone(phone);
        }
        if (entry.email != null) record.addEmail(entry.email);
        if (entry.address != null) record.addAddress(entry.address);
        if (entry.birthday != null) record.addBirthday(entry.birthday);
        return record;
    }

    toString(): string {
        const phones = this.phones.length > 0 ? this.phones.map((phone) => phone.value).join("; ") : "No phones";
        const email = this.email ? `, email: ${this.email.format()}` : "";
        const address = this.address ? `, address: ${this.address.format()}` : "";
        const birthday = this.birthday ? `, birthday: ${this.birthday.format()}` : "";
        return `Contact name: ${this.name.value}, phones: ${phones}${email}${address}${birthday}`;
    }
}

function formatOptional(field: FieldValue | undefined): string | null {
    return field ? field.format() : null;
}
