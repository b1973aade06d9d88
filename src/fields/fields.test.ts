import { describe, expect, it } from "vitest";
import { InvalidFormatError } from "../errors";
import { Address, Birthday, Email, Name, Phone, formatDate, parseDate } from "./fields";

describe("Phone", () => {
    it("accepts exactly ten digits", () => {
        for (const raw of ["0931112233", "0000000000", "9999999999"]) {
            expect(new Phone(raw).value).toBe(raw);
            expect(Phone.validate(raw)).toBe(true);
        }
    });

    it("rejects wrong length or non-digits with InvalidFormat", () => {
        for (const raw of ["", "12345", "09311122334", "093111223a", "093-111-22", " 0931112233"]) {
            expect(Phone.validate(raw)).toBe(false);
            expect(() => new Phone(raw)).toThrow(InvalidFormatError);
        }
    });

    it("names the expected format in the error", () => {
        expect(() => new Phone("123")).toThrow("Phone number must contain 10 digits. Use format like 0931112233.");
    });
});

describe("Email", () => {
    it("stores a trimmed, lower-cased address", () => {
        expect(new Email("  Ann.Lee@Example.COM ").value).toBe("ann.lee@example.com");
        expect(Email.validate("  Ann.Lee@Example.COM ")).toBe(true);
    });

    it("rejects addresses without domain or top-level segment", () => {
        for (const raw of ["ann@example", "annexample.com", "ann@example.c", "@example.com", "ann@@example.com"]) {
            expect(Email.validate(raw)).toBe(false);
            expect(() => new Email(raw)).toThrow(InvalidFormatError);
        }
    });
});

describe("Address", () => {
    it("keeps the address as entered", () => {
        expect(Address.validate("Main St 5, Kyiv")).toBe(true);
        expect(new Address("Main St 5, Kyiv").format()).toBe("Main St 5, Kyiv");
    });

    it("rejects blank input", () => {
        expect(Address.validate("")).toBe(false);
        expect(Address.validate("   ")).toBe(false);
        expect(() => new Address("   ")).toThrow("Address cannot be empty.");
    });
});

describe("Name", () => {
    it("rejects empty and whitespace-only names", () => {
        expect(Name.validate("")).toBe(false);
        expect(Name.validate(" \t ")).toBe(false);
        expect(Name.validate("Ann")).toBe(true);
        expect(() => new Name("")).toThrow(InvalidFormatError);
        expect(() => new Name("  ")).toThrow(InvalidFormatError);
        expect(new Name("Ann").format()).toBe("Ann");
    });
});

describe("Birthday", () => {
    it("parses DD.MM.YYYY into a date", () => {
        expect(Birthday.validate("05.03.1990")).toBe(true);
        const birthday = new Birthday("05.03.1990");
        expect(birthday.value.getFullYear()).toBe(1990);
        expect(birthday.value.getMonth()).toBe(2);
        expect(birthday.value.getDate()).toBe(5);
        expect(birthday.format()).toBe("05.03.1990");
    });

    it("accepts 29 February in a leap year", () => {
        expect(Birthday.validate("29.02.2000")).toBe(true);
        expect(new Birthday("29.02.2000").format()).toBe("29.02.2000");
    });

    it("rejects impossible dates, wrong separators and wrong digit counts", () => {
        for (const raw of ["31.02.2000", "29.02.2001", "00.01.2000", "13.13.2020", "5.3.1990", "05/03/1990", "1990-03-05", "05.03.90"]) {
            expect(Birthday.validate(raw)).toBe(false);
            expect(() => new Birthday(raw)).toThrow("Invalid date format. Use DD.MM.YYYY.");
        }
    });
});

describe("date helpers", () => {
    it("formats with zero padding", () => {
        expect(formatDate(new Date(2024, 0, 7))).toBe("07.01.2024");
    });

    it("returns undefined instead of an invalid date", () => {
        expect(parseDate("32.01.2024")).toBeUndefined();
        expect(parseDate("01.01.2024")?.getTime()).toBe(new Date(2024, 0, 1).getTime());
    });
});
