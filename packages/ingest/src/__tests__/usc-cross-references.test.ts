import { describe, expect, it } from "vitest";
import {
	extractCodeCitations,
	resolveHref,
	scanCrossReferences,
} from "../lib/usc/cross-references";
import { loadUslmDocument } from "../lib/usc/document";
import { readTaggedReferences } from "../lib/usc/notes";
import { findChild } from "../lib/xml";

const targets = (text: string, titleNum: string | null = null) =>
	extractCodeCitations(text, titleNum).map((match) => match.targetCitation);

describe("USC cross-reference grammar", () => {
	it("parses title-based references", () => {
		const text = "See 42 U.S.C. 1983 and 18 U.S.C. 1001.";
		const matches = extractCodeCitations(text, "42");

		expect(matches.map((match) => match.targetCitation)).toEqual([
			"42 U.S.C. § 1983",
			"18 U.S.C. § 1001",
		]);
		expect(matches[0]?.offset).toBe(text.indexOf("42"));
		expect(matches[0]?.rawText).toBe("42 U.S.C. 1983");
	});

	it("parses relative sections with explicit title", () => {
		const [match] = extractCodeCitations("Section 552 of title 5 applies.", "1");

		expect(match?.rawText).toBe("Section 552 of title 5");
		expect(match?.targetCitation).toBe("5 U.S.C. § 552");
		expect(match?.sections).toEqual(["552"]);
	});

	it("parses ranges in the current title", () => {
		const [match] = extractCodeCitations(
			"Sections 101 to 103, inclusive, of this title are reserved.",
			"12",
		);

		expect(match?.rawText).toBe("Sections 101 to 103, inclusive, of this title");
		expect(match?.targetCitation).toBe("12 U.S.C. §§ 101 to 103");
		expect(match?.sections).toEqual(["101", "103"]);
	});

	it("folds qualifier chains into the target", () => {
		const [match] = extractCodeCitations(
			"as defined in paragraph (2) of subsection (a) of section 552 of title 5",
			null,
		);

		expect(match?.rawText).toBe(
			"paragraph (2) of subsection (a) of section 552 of title 5",
		);
		expect(match?.targetCitation).toBe("5 U.S.C. § 552(a)(2)");
	});

	it("keeps designators written onto the section number", () => {
		expect(targets("under 5 U.S.C. 552(a) and")).toEqual([
			"5 U.S.C. § 552(a)",
		]);
	});

	it("parses section lists after a double section sign", () => {
		const [match] = extractCodeCitations("See 5 U.S.C. §§ 101, 102.", null);

		expect(match?.targetCitation).toBe("5 U.S.C. §§ 101, 102");
		expect(match?.sections).toEqual(["101", "102"]);
	});

	it("normalizes en dashes in compound section numbers", () => {
		const matches = extractCodeCitations(
			"See 42 U.S.C. 300aa–1 and section 1396a–2 of title 42.",
			null,
		);

		expect(
			matches.map((match) => [match.rawText, match.targetCitation]),
		).toEqual([
			["42 U.S.C. 300aa–1", "42 U.S.C. § 300aa-1"],
			["section 1396a–2 of title 42", "42 U.S.C. § 1396a-2"],
		]);
		expect(matches[0]?.sections).toEqual(["300aa-1"]);
	});

	it("reads appendix citations", () => {
		const matches = extractCodeCitations(
			"See 50 U.S.C. App. 2401 and 5 U.S.C. App. § 12.",
			null,
		);

		expect(
			matches.map((match) => [match.rawText, match.targetCitation]),
		).toEqual([
			["50 U.S.C. App. 2401", "50 U.S.C. App. § 2401"],
			["5 U.S.C. App. § 12", "5 U.S.C. App. § 12"],
		]);
	});

	it("ends a section list where a citation to another title begins", () => {
		expect(
			targets("Under 42 U.S.C. 1983 and section 1985 of title 18."),
		).toEqual(["42 U.S.C. § 1983", "18 U.S.C. § 1985"]);
	});

	it("ignores sections of unnamed acts", () => {
		expect(targets("section 3 of the Act")).toEqual([]);
		expect(targets("section 3 of this title")).toEqual([]);
	});
});

describe("scanCrossReferences", () => {
	it("tags citations inside editorial brackets", () => {
		const result = scanCrossReferences(
			"Appeals are governed by 5 U.S.C. § 1202. See also [42 U.S.C. 1396 et seq.]",
			[],
			{ titleNum: "5" },
		);

		expect(result.code).toEqual([
			{
				rawText: "5 U.S.C. § 1202",
				targetCitation: "5 U.S.C. § 1202",
				sections: ["1202"],
				editoriallyInserted: false,
				source: "text",
				href: null,
			},
			{
				rawText: "42 U.S.C. 1396 et seq.",
				targetCitation: "42 U.S.C. § 1396 et seq.",
				sections: ["1396"],
				editoriallyInserted: true,
				source: "text",
				href: null,
			},
		]);
	});

	it("buckets public laws, executive orders and Federal Register pages", () => {
		const result = scanCrossReferences(
			"Pub. L. 101–511 and Ex. Ord. No. 12345, 75 F.R. 707.",
			[],
			{ titleNum: null },
		);

		expect(result.code).toEqual([]);
		expect(result.publicLaws).toEqual([
			{
				rawText: "Pub. L. 101–511",
				targetCitation: "Pub. L. 101-511",
				sections: [],
				editoriallyInserted: false,
				source: "text",
				href: null,
			},
		]);
		expect(result.executiveOrders.map((ref) => ref.targetCitation)).toEqual([
			"Ex. Ord. No. 12345",
		]);
		expect(result.federalRegister.map((ref) => ref.rawText)).toEqual([
			"75 F.R. 707",
		]);
	});

	it("dedupes by raw text across text and notes", () => {
		const result = scanCrossReferences(
			"See 5 U.S.C. § 1202.",
			["Also 5 U.S.C. § 1202 and 5 U.S.C. § 1203."],
			{ titleNum: "5" },
		);

		expect(
			result.code.map((ref) => [ref.rawText, ref.source]),
		).toEqual([
			["5 U.S.C. § 1202", "text"],
			["5 U.S.C. § 1203", "notes"],
		]);
	});

	it("reads tagged refs before text patterns and dedupes against them", () => {
		const result = scanCrossReferences(
			"Benefits under [section 1202 of title 5] are paid.",
			["Enacted by Pub. L. 117–286, 136 Stat. 4306."],
			{
				titleNum: "5",
				tagged: [
					{
						href: "/us/usc/t5/s1202/a/1",
						text: "section 1202 of title 5",
						source: "text",
					},
					{ href: "/us/pl/117/286", text: "Pub. L. 117–286", source: "notes" },
					{ href: "/us/stat/136/4306", text: "136 Stat. 4306", source: "notes" },
					{
						href: "/us/act/1947-07-30/ch388/s2",
						text: "act July 30, 1947",
						source: "notes",
					},
				],
			},
		);

		expect(result.code).toEqual([
			{
				rawText: "section 1202 of title 5",
				targetCitation: "5 U.S.C. § 1202(a)(1)",
				sections: ["1202"],
				editoriallyInserted: true,
				source: "text",
				href: "/us/usc/t5/s1202/a/1",
			},
		]);
		expect(
			result.publicLaws.map((ref) => [ref.targetCitation, ref.href]),
		).toEqual([["Pub. L. 117-286", "/us/pl/117/286"]]);
		expect(
			result.statutes.map((ref) => [ref.targetCitation, ref.href]),
		).toEqual([["136 Stat. 4306", "/us/stat/136/4306"]]);
		expect(result.acts.map((ref) => ref.targetCitation)).toEqual([
			"Act of 1947-07-30, ch. 388, § 2",
		]);
	});

	it("collects Statutes at Large citations from text", () => {
		const result = scanCrossReferences(
			"As enacted at 70A Stat. 67 and 82 Stat. 77.",
			[],
			{ titleNum: null },
		);

		expect(result.statutes.map((ref) => ref.targetCitation)).toEqual([
			"70A Stat. 67",
			"82 Stat. 77",
		]);
	});
});

describe("resolveHref", () => {
	it("maps code hrefs to citations", () => {
		expect(resolveHref("/us/usc/t5/ch12")).toEqual({
			bucket: "code",
			targetCitation: "5 U.S.C. ch. 12",
			sections: [],
		});
		expect(resolveHref("/us/usc/t5/ch1/schII")?.targetCitation).toBe(
			"5 U.S.C. ch. 1, subch. II",
		);
		expect(resolveHref("/us/usc/t50a/s2401")).toEqual({
			bucket: "code",
			targetCitation: "50 U.S.C. App. § 2401",
			sections: ["2401"],
		});
	});

	it("ignores hrefs outside the known collections", () => {
		expect(resolveHref("/us/cfr/t7/s1")).toBeNull();
		expect(resolveHref("/us/usc/t5")).toBeNull();
		expect(resolveHref("https://example.com/us/usc/t5/s1")).toBeNull();
	});
});

describe("readTaggedReferences", () => {
	it("reads refs from content and notes but not the source credit", async () => {
		const document = await loadUslmDocument(
			'<uscDoc><main><section identifier="/us/usc/t5/s1"><content>See <ref href="/us/usc/t5/s2">section 2 of this title</ref>.</content><sourceCredit>(<ref href="/us/pl/90/284">Pub. L. 90-284</ref>.)</sourceCredit><notes><note><p>Formerly <ref href="/us/stat/82/77">82 Stat. 77</ref>.</p></note></notes></section></main></uscDoc>',
		);
		const main = findChild(document.root, "main");
		const section = main && findChild(main, "section");
		if (!section) throw new Error("fixture has no section");

		expect(readTaggedReferences(section)).toEqual([
			{
				href: "/us/usc/t5/s2",
				text: "section 2 of this title",
				source: "text",
			},
			{ href: "/us/stat/82/77", text: "82 Stat. 77", source: "notes" },
		]);
	});
});
