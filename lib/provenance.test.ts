import { describe, expect, it } from "vitest";
import { extractProvenance, formatProvenance } from "./provenance.js";

describe("formatProvenance", () => {
	it("renders the annotation exactly", () => {
		expect(formatProvenance("up-org", "project", "a1b2c3d")).toBe(
			"(cherry picked from commit up-org/project@a1b2c3d)",
		);
	});
});

describe("extractProvenance", () => {
	it("returns every referenced id in message order", () => {
		const message = [
			"Port two fixes",
			"",
			"(cherry picked from commit up-org/project@a1b2c3d)",
			"(cherry picked from commit up-org/project@e4f5a6b)",
		].join("\n");
		expect(extractProvenance(message, "up-org", "project")).toEqual(["a1b2c3d", "e4f5a6b"]);
	});

	it("ignores annotations for another repository", () => {
		const message = "Fix\n\n(cherry picked from commit other-org/project@a1b2c3d)";
		expect(extractProvenance(message, "up-org", "project")).toEqual([]);
	});

	it("treats org and repo names literally", () => {
		const message = "(cherry picked from commit upXorg/project@a1b2c3d)";
		expect(extractProvenance(message, "up.org", "project")).toEqual([]);
		expect(extractProvenance("(cherry picked from commit up.org/project@a1b2c3d)", "up.org", "project")).toEqual([
			"a1b2c3d",
		]);
	});

	it("returns nothing for a plain message", () => {
		expect(extractProvenance("Just a commit", "up-org", "project")).toEqual([]);
	});
});
