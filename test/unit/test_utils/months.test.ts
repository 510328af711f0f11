import { monthsBetween, normalizeMonthKey, shiftMonthKey, toMonthKey } from "../../../src/utils/months";

describe("month keys", () => {
    it("normalizes any day of a month to its first day", () => {
        expect(normalizeMonthKey("2024-03-17")).toBe("2024-03-01");
        expect(normalizeMonthKey("2024-03")).toBe("2024-03-01");
        expect(toMonthKey(new Date(2024, 2, 31))).toBe("2024-03-01");
    });

    it("returns null for values that are not months", () => {
        expect(normalizeMonthKey("March")).toBeNull();
        expect(normalizeMonthKey("2024-13-01")).toBeNull();
    });

    it("shifts across year boundaries", () => {
        expect(shiftMonthKey("2024-11-01", 3)).toBe("2025-02-01");
    });

    it("counts calendar months between keys", () => {
        expect(monthsBetween("2024-01-01", "2024-06-01")).toBe(5);
        expect(() => monthsBetween("2024-01-01", "soon")).toThrow(RangeError);
    });
});
