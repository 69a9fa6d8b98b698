import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { DocumentLoadError } from "../lib/errors";
import { loadUslmDocument } from "../lib/usc/document";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const fixturesDir = join(__dirname, "fixtures");

function loadFixture(filename: string): string {
	return readFileSync(join(fixturesDir, filename), "utf-8");
}

async function* chunked(
	bytes: Uint8Array,
	size: number,
): AsyncGenerator<Uint8Array, void, void> {
	for (let offset = 0; offset < bytes.length; offset += size) {
		yield bytes.subarray(offset, offset + size);
	}
}

describe("loadUslmDocument", () => {
	it("reads document metadata", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);

		expect(document.identifier).toBe("/us/usc/t5");
		expect(document.meta).toEqual({
			title: "Title 5",
			type: "USCTitle",
			docNumber: "5",
			docPublicationName: "Online@118-1",
			publisher: "OLRC",
			creator: null,
			created: "2024-01-01T00:00:00",
			isPositiveLaw: true,
			properties: { "is-positive-law": "yes" },
		});
	});

	it("decodes byte chunks split inside multi-byte characters", async () => {
		const xml =
			'<uscDoc identifier="/us/usc/t7"><meta><dc:title>§ Title 7—Agriculture</dc:title></meta><main/></uscDoc>';
		const bytes = new TextEncoder().encode(xml);

		const document = await loadUslmDocument(chunked(bytes, 3));

		expect(document.meta.title).toBe("§ Title 7—Agriculture");
	});

	it("rejects empty input", async () => {
		await expect(loadUslmDocument("   ")).rejects.toThrow(
			"USLM document is empty",
		);
	});

	it("rejects documents that are not USLM", async () => {
		const error = await loadUslmDocument("<html><body/></html>").catch(
			(caught: unknown) => caught,
		);

		expect(error).toBeInstanceOf(DocumentLoadError);
		if (!(error instanceof DocumentLoadError)) return;
		expect(error.code).toBe("DocumentLoadFailure");
		expect(error.message).toBe(
			"Unexpected root element <html>; expected <uscDoc> or <lawDoc>",
		);
	});

	it("requires a main element", async () => {
		await expect(loadUslmDocument("<uscDoc><meta/></uscDoc>")).rejects.toThrow(
			"<uscDoc> has no <main> element",
		);
	});

	it("rejects documents cut off before their closing tags", async () => {
		const error = await loadUslmDocument(
			'<uscDoc identifier="/us/usc/t5"><main><title identifier="/us/usc/t5"><section identifier="/us/usc/t5/s1"><num value="1"/><content>Body text</content></section><section identifier="/us/usc/t5/s2"><num value="2"/><content>Cut off mid',
		).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(DocumentLoadError);
		if (!(error instanceof DocumentLoadError)) return;
		expect(error.code).toBe("DocumentLoadFailure");
		expect(error.message).toBe(
			"USLM document is truncated: <content> is never closed",
		);
	});

	it("rejects truncated byte streams", async () => {
		const bytes = new TextEncoder().encode(
			'<uscDoc identifier="/us/usc/t7"><main><title identifier="/us/usc/t7"><section identifier="/us/usc/t7/s1"><num value="1"/>',
		);

		await expect(loadUslmDocument(chunked(bytes, 5))).rejects.toThrow(
			"USLM document is truncated: <section> is never closed",
		);
	});

	it("wraps read failures with their cause", async () => {
		const failure = new Error("socket closed");
		async function* failing(): AsyncGenerator<Uint8Array, void, void> {
			yield new TextEncoder().encode("<uscDoc>");
			throw failure;
		}

		const error = await loadUslmDocument(failing()).catch(
			(caught: unknown) => caught,
		);

		expect(error).toBeInstanceOf(DocumentLoadError);
		if (!(error instanceof DocumentLoadError)) return;
		expect(error.message).toBe("Failed to read USLM document: socket closed");
		expect(error.cause).toBe(failure);
	});
});
