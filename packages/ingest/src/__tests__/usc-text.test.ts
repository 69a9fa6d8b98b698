import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadUslmDocument } from "../lib/usc/document";
import { walkSections } from "../lib/usc/hierarchy";
import { assembleSectionText } from "../lib/usc/text";
import type { SectionNode } from "../types";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const fixturesDir = join(__dirname, "fixtures");

async function loadSections(): Promise<SectionNode[]> {
	const xml = readFileSync(join(fixturesDir, "usc_title_fixture.xml"), "utf-8");
	const document = await loadUslmDocument(xml);
	return [...walkSections(document)].map(({ node }) => node);
}

async function sectionAt(index: number): Promise<SectionNode> {
	const node = (await loadSections())[index];
	if (!node) throw new Error(`No section at ${index}`);
	return node;
}

describe("assembleSectionText", () => {
	it("puts each paragraph block on its own line", async () => {
		const { fullText, subsectionCount } = assembleSectionText(
			await sectionAt(0),
		);

		expect(fullText).toBe(
			[
				"Executive departments",
				"The Executive departments are:",
				"The Department of State.",
			].join("\n"),
		);
		expect(subsectionCount).toBe(0);
	});

	it("starts a line for every structural unit", async () => {
		const { fullText, subsectionCount } = assembleSectionText(
			await sectionAt(1),
		);

		expect(fullText.split("\n")).toEqual([
			"Definitions For the purposes of this title—",
			"(a) In general the term agency has the meaning given in section 552 of title 5; and",
			"(b) the term officer includes—",
			"(1) an officer described in [42 U.S.C. 1396 et seq.]; and",
			"(2) an employee under Ex. Ord. No. 12345.",
		]);
		expect(subsectionCount).toBe(4);
	});

	it("keeps quoted text inline without counting its subdivisions", async () => {
		const { fullText, subsectionCount } = assembleSectionText(
			await sectionAt(2),
		);

		expect(fullText).toBe(
			"Amendment of other law Section 2 of the Example Act is amended to read as follows: SEC. 2. (a) Quoted rule.",
		);
		expect(subsectionCount).toBe(0);
	});

	it("strips editorial brackets from repealed headings", async () => {
		const { fullText } = assembleSectionText(await sectionAt(3));

		expect(fullText).toBe(
			"Repealed. Pub. L. 89–554, §8(a), Sept. 6, 1966, 80 Stat. 632",
		);
	});
});
