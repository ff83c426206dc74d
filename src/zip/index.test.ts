import { describe, it, expect } from "vitest";
import { zipWrite, zipRead, zipReadString, zipPatch, zipReadData } from "./index.js";
import { InvalidArchiveError } from "../errors.js";

const text = (s: string) => new TextEncoder().encode(s);

function sample(compress: boolean): Uint8Array {
	const files = { "a.txt": text("alpha ".repeat(50)), "dir/b.xml": text("<b>beta</b>"), "c.bin": text("gamma") };
	return zipWrite({ files }, { compress });
}

describe("zipRead / zipWrite", () => {
	it("reads back stored entries", () => {
		const archive = zipRead(sample(false));
		expect(Object.keys(archive.files)).toEqual(["a.txt", "dir/b.xml", "c.bin"]);
		expect(zipReadString(archive, "dir/b.xml")).toBe("<b>beta</b>");
		expect(archive.entries.map((e) => e.method)).toEqual([0, 0, 0]);
	});

	it("reads back deflated entries", () => {
		const archive = zipRead(sample(true));
		expect(archive.entries.map((e) => e.method)).toEqual([8, 8, 8]);
		expect(zipReadString(archive, "a.txt")).toBe("alpha ".repeat(50));
		expect(archive.entries[0].compressedSize).toBeLessThan(archive.entries[0].uncompressedSize);
	});

	it("starts with the PK local header magic", () => {
		const bytes = sample(false);
		expect([bytes[0], bytes[1], bytes[2], bytes[3]]).toEqual([0x50, 0x4b, 0x03, 0x04]);
	});

	it("falls back to leading-slash and case-insensitive lookups", () => {
		const archive = zipRead(sample(false));
		expect(zipReadString(archive, "/dir/b.xml")).toBe("<b>beta</b>");
		expect(zipReadData(archive, "DIR/B.XML")).not.toBeNull();
		expect(zipReadString(archive, "missing.xml")).toBeNull();
	});

	it("rejects data that is not a zip", () => {
		expect(() => zipRead(text("this is definitely not a zip archive"))).toThrow(InvalidArchiveError);
		expect(() => zipRead(new Uint8Array(4))).toThrow("Invalid ZIP: data too short");
	});

	it("rejects an archive with a corrupted local header", () => {
		const broken = sample(true).slice();
		broken[0] = 0;
		expect(() => zipRead(broken)).toThrow(InvalidArchiveError);
	});
});

describe("zipPatch", () => {
	it("reproduces the archive when nothing is replaced", () => {
		const bytes = sample(true);
		const patched = zipPatch(zipRead(bytes), new Map());
		expect(patched).toEqual(bytes);
	});

	it("replaces one member and copies the others verbatim", () => {
		const original = zipRead(sample(true));
		const patched = zipRead(zipPatch(original, new Map([["dir/b.xml", text("<b>changed</b>")]])));

		expect(zipReadString(patched, "dir/b.xml")).toBe("<b>changed</b>");
		expect(zipReadString(patched, "a.txt")).toBe("alpha ".repeat(50));
		expect(patched.entries.map((e) => e.name)).toEqual(["a.txt", "dir/b.xml", "c.bin"]);
		expect(patched.entries[0].record).toEqual(original.entries[0].record);
		expect(patched.entries[2].record).toEqual(original.entries[2].record);
	});
});
