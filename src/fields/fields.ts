import { format, isValid, parse } from "date-fns";
import { InvalidFormatError } from "../errors";

export const DATE_FORMAT = "dd.MM.yyyy";
export const DATE_FORMAT_LABEL = "DD.MM.YYYY";
export const PHONE_DIGITS_LENGTH = 10;

const PHONE_PATTERN = new RegExp(`^\\d{${PHONE_DIGITS_LENGTH}}$`);
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const DATE_SHAPE = /^\d{2}\.\d{2}\.\d{4}$/;

/** Canonical `DD.MM.YYYY` rendering used for display, search and storage. */
export function formatDate(date: Date): string {
    return format(date, DATE_FORMAT);
}

/** Strict `DD.MM.YYYY` parse; returns undefined for anything that is not a real calendar date. */
export function parseDate(raw: string): Date | undefined {
    if (!DATE_SHAPE.test(raw)) return undefined;
    const parsed = parse(raw, DATE_FORMAT, new Date(0));
    return isValid(parsed) ? parsed : undefined;
}

export class Name {
    readonly kind = "name";
    readonly value: string;

    constructor(raw: string) {
        if (!Name.validate(raw)) {
            throw new InvalidFormatError("Name cannot be empty.");
        }
        this.value = raw;
    }

    static validate(raw: string): boolean {
        return raw.trim().length > 0;
    }

    format(): string {
        return this.value;
    }
}

export class Phone {
    readonly kind = "phone";
    readonly value: string;

    constructor(raw: string) {
        if (!Phone.validate(raw)) {
            throw new InvalidFormatError(
                `Phone number must contain ${PHONE_DIGITS_LENGTH} digits. Use format like 0931112233.`
            );
        }
        this.value = raw;
    }

    static validate(raw: string): boolean {
        return PHONE_PATTERN.test(raw);
    }

    format(): string {
        return this.value;
    }
}

export class Email {
    readonly kind = "email";
    readonly value: string;

    constructor(raw: string) {
        const normalized = raw.trim().toLowerCase();
        if (!Email.validate(normalized)) {
            throw new InvalidFormatError("Invalid email format. Use format like name@example.com.");
        }
        this.value = normalized;
    }

    static validate(raw: string): boolean {
        return EMAIL_PATTERN.test(raw.trim().toLowerCase());
    }

    format(): string {
        return this.value;
    }
}

export class Address {
    readonly kind = "address";
    readonly value: string;

    constructor(raw: string) {
        if (!Address.validate(raw)) {
            throw new InvalidFormatError("Address cannot be empty.");
        }
        this.value = raw;
    }

    static validate(raw: string): boolean {
        return raw.trim().length > 0;
    }

    format(): string {
        return this.value;
    }
}

export class Birthday {
    readonly kind = "birthday";
    readonly value: Date;

    constructor(raw: string) {
        const parsed = parseDate(raw);
        if (!parsed) {
            throw new InvalidFormatError(`Invalid date format. Use ${DATE_FORMAT_LABEL}.`);
        }
        this.value = parsed;
    }

    static validate(raw: string): boolean {
        return parseDate(raw) !== undefined;
    }

    format(): string {
        return formatDate(this.value);
    }
}

export type FieldValue = Name | Phone | Email | Address | Birthday;
