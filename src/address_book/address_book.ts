import { addDays, differenceInCalendarDays, getDaysInMonth, isSaturday, isSunday, startOfDay } from "date-fns";
import { InvalidArgumentError, NotFoundError } from "../errors";
import { formatDate } from "../fields/fields";
import { type ContactRecord } from "./record";

export const DEFAULT_BIRTHDAY_DAYS = 7;

export interface UpcomingBirthday {
    name: string;
    /** Birthday occurrence moved off a weekend onto the following Monday. */
    congratulationDate: Date;
}

/**
 * Contacts keyed by name.
 *
 * - Iteration follows insertion order; re-adding a name replaces the record in place.
 * - Lookups are exact and case-sensitive.
 */
export class AddressBook {
    private readonly recordsByName = new Map<string, ContactRecord>();

    get size(): number {
        return this.recordsByName.size;
    }

    add(record: ContactRecord): void {
        this.recordsByName.set(record.name.value, record);
    }

    find(name: string): ContactRecord | undefined {
        return this.recordsByName.get(name);
    }

    delete(name: string): void {
        if (!this.recordsByName.delete(name)) {
            throw new NotFoundError(`Contact '${name}' not found`);
        }
    }

    toArray(): ContactRecord[] {
        return Array.from(this.recordsByName.values());
    }

    /** Contacts whose next birthday is exactly `days` calendar days after `today`. */
    birthdaysWithin(days: number, today: Date = new Date()): UpcomingBirthday[] {
        if (!Number.isInteger(days) || days < 0) {
            throw new InvalidArgumentError("Number of days must be a non-negative integer.");
        }

        const start = startOfDay(today);
        const result: UpcomingBirthday[] = [];

        for (const record of this.recordsByName.values()) {
            if (!record.birthday) continue;

            const birthday = record.birthday.value;
            let occurrence = occurrenceInYear(birthday, start.getFullYear());
            if (occurrence < start) {
                occurrence = occurrenceInYear(birthday, start.getFullYear() + 1);
            }
            if (differenceInCalendarDays(occurrence, start) !== days) continue;

            result.push({ name: record.name.value, congratulationDate: shiftOffWeekend(occurrence) });
        }

        return result.sort((a, b) => compareOrdinal(a.name, b.name));
    }

    upcomingBirthdays(today: Date = new Date()): UpcomingBirthday[] {
        return this.birthdaysWithin(DEFAULT_BIRTHDAY_DAYS, today);
    }

    /**
     * Case-insensitive substring search. Fields are tried in order
     * (name, phones, email, address, birthday) and a record is listed once.
     */
    search(query: string): ContactRecord[] {
        const needle = query.toLowerCase();
        return this.toArray().filter((record) => matchesRecord(record, needle));
    }
}

function matchesRecord(record: ContactRecord, needle: string): boolean {
    if (record.name.value.toLowerCase().includes(needle)) return true;
    if (record.phones.some((phone) => phone.value.includes(needle))) return true;
    if (record.email && record.email.value.toLowerCase().includes(needle)) return true;
    if (record.address && record.address.value.toLowerCase().includes(needle)) return true;
    return record.birthday !== undefined && formatDate(record.birthday.value).includes(needle);
}

// 29 February maps to 28 February outside leap years.
function occurrenceInYear(birthday: Date, year: number): Date {
    const month = birthday.getMonth();
    const day = Math.min(birthday.getDate(), getDaysInMonth(new Date(year, month, 1)));
    return new Date(year, month, day);
}

function shiftOffWeekend(date: Date): Date {
    if (isSaturday(date)) return addDays(date, 2);
    if (isSunday(date)) return addDays(date, 1);
    return date;
}

function compareOrdinal(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
