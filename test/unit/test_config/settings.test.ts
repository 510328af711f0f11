import { numberFromEnv } from "../../../src/config/settings";

describe("numberFromEnv", () => {
    it("should keep an explicit zero", () => {
        expect(numberFromEnv("0", 0.1)).toBe(0);
    });

    it("should parse a configured value", () => {
        expect(numberFromEnv("0.25", 0.1)).toBe(0.25);
    });

    it("should fall back when the variable is unset or blank", () => {
        expect(numberFromEnv(undefined, 0.1)).toBe(0.1);
        expect(numberFromEnv("  ", 0.1)).toBe(0.1);
    });

    it("should fall back on a value that is not a number", () => {
        expect(numberFromEnv("ten percent", 0.1)).toBe(0.1);
    });
});
