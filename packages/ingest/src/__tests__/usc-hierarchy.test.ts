import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadUslmDocument } from "../lib/usc/document";
import { cleanHeading, walkSections } from "../lib/usc/hierarchy";
import { parseIdentifierSegments } from "../lib/usc/identifiers";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const fixturesDir = join(__dirname, "fixtures");

function loadFixture(filename: string): string {
	return readFileSync(join(fixturesDir, filename), "utf-8");
}

describe("walkSections", () => {
	it("yields Code sections in document order", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const sections = [...walkSections(document)];

		expect(sections.map(({ node }) => node.identifier)).toEqual([
			"/us/usc/t5/s101",
			"/us/usc/t5/s105",
			"/us/usc/t5/s106",
			"/us/usc/t5/s301",
			"/us/usc/t5a/s1",
		]);
		expect(sections.map(({ node }) => node.index)).toEqual([0, 1, 2, 3, 4]);
	});

	it("can be iterated more than once", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const walk = walkSections(document);

		expect([...walk]).toHaveLength(5);
		expect([...walk]).toHaveLength(5);
	});

	it("records the ancestor chain of each section", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const [, definitions] = [...walkSections(document)];

		expect(definitions?.path).toEqual({
			titleNum: "5",
			entries: [
				{
					level: "title",
					number: "5",
					name: "Government Organization and Employees",
					identifier: "/us/usc/t5",
				},
				{
					level: "chapter",
					number: "1",
					name: "ORGANIZATION",
					identifier: "/us/usc/t5/ch1",
				},
				{
					level: "subchapter",
					number: "II",
					name: "GENERAL PROVISIONS",
					identifier: "/us/usc/t5/ch1/schII",
				},
			],
			inAppendix: false,
			incomplete: false,
			missingLevels: [],
		});
	});

	it("flags levels named in identifiers but missing from the tree", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const repealed = [...walkSections(document)][3];

		expect(repealed?.path.entries.map((entry) => entry.level)).toEqual([
			"title",
			"chapter",
			"part",
		]);
		expect(repealed?.path.incomplete).toBe(true);
		expect(repealed?.path.missingLevels).toEqual(["subchapter"]);
		expect(repealed?.node.status).toBe("repealed");
	});

	it("marks appendix sections", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const appendix = [...walkSections(document)][4];

		expect(appendix?.path.inAppendix).toBe(true);
		expect(appendix?.path.titleNum).toBe("5a");
	});

	it("reads section attributes", async () => {
		const document = await loadUslmDocument(
			loadFixture("usc_title_fixture.xml"),
		);
		const [first] = [...walkSections(document)];

		expect(first?.node).toMatchObject({
			identifier: "/us/usc/t5/s101",
			guid: "s101-guid",
			temporalId: "s101",
			legacyName: "/us/usc/t5/s101",
			status: "operational",
			rawStatus: null,
			numValue: "101",
		});
	});

	it("maps unknown status values to other", async () => {
		const document = await loadUslmDocument(
			'<uscDoc><main><title identifier="/us/usc/t7"><section identifier="/us/usc/t7/s1" status="vacated"><num value="1"/></section></title></main></uscDoc>',
		);
		const [section] = [...walkSections(document)];

		expect(section?.node.status).toBe("other");
		expect(section?.node.rawStatus).toBe("vacated");
	});

	it("reports a missing title", async () => {
		const document = await loadUslmDocument(
			'<uscDoc><main><chapter identifier="/us/usc/t7/ch2"><num value="2"/><section identifier="/us/usc/t7/s12"><num value="12"/></section></chapter></main></uscDoc>',
		);
		const [section] = [...walkSections(document)];

		expect(section?.path.titleNum).toBeNull();
		expect(section?.path.missingLevels).toEqual(["title"]);
	});
});

describe("cleanHeading", () => {
	it("drops editorial brackets", () => {
		expect(cleanHeading("[Repealed]")).toBe("Repealed");
		expect(cleanHeading("Repealed. Pub. L. 89–554, §8(a)]")).toBe(
			"Repealed. Pub. L. 89–554, §8(a)",
		);
		expect(cleanHeading("Definitions")).toBe("Definitions");
	});
});

describe("parseIdentifierSegments", () => {
	it("splits level and section segments", () => {
		expect(parseIdentifierSegments("/us/usc/t42/ch21/schI/s1983")).toEqual([
			{ kind: "level", level: "title", num: "42" },
			{ kind: "level", level: "chapter", num: "21" },
			{ kind: "level", level: "subchapter", num: "I" },
			{ kind: "section", num: "1983" },
		]);
	});
});
