import { describe, expect, it } from "vitest";
import { splitLines } from "./session";

describe("splitLines", () => {
    it("returns no lines for empty output", () => {
        expect(splitLines("")).toEqual([]);
    });

    it("drops only the final newline", () => {
        expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
        expect(splitLines("a\n\n")).toEqual(["a", ""]);
    });

    it("handles CRLF line endings", () => {
        expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
    });
});
