import type {
	CrossReference,
	CrossReferenceSet,
	CrossReferenceSource,
	TaggedReference,
} from "../../types";

type QualifierType =
	| "subsection"
	| "subdivision"
	| "paragraph"
	| "subparagraph"
	| "clause";

interface Qualifier {
	type: QualifierType;
	designators: string[];
}

type SectionTarget =
	| { type: "section"; section: string; designators: string[] }
	| { type: "range"; start: string; end: string; inclusive: boolean };

interface Span {
	start: number;
	end: number;
}

type Token =
	| ({ type: "sectionNumber"; value: string } & Span)
	| ({ type: "titleNumber"; value: string } & Span)
	| ({ type: "designator"; value: string } & Span)
	| ({ type: "word"; value: string } & Span)
	| ({ type: "punct"; value: "," | ";" | "." | ":" } & Span);

type WordToken = Extract<Token, { type: "word" }>;

/**
 * One code citation phrase found in text, before bucketing
 */
export interface CodeCitationMatch {
	rawText: string;
	offset: number;
	titleNum: string;
	sections: string[];
	targetCitation: string;
}

// USC section numbers: digits with optional letter suffix and dashed part (e.g., "1234a", "300aa–1")
const SECTION_NUMBER_RE = /^\d+[a-zA-Z]*(?:[-–]\d+)?$/;
// Title number reference
const TITLE_NUMBER_RE = /^\d+$/;
const DESIGNATOR_RE = /^\(([A-Za-z0-9ivxIVX]+)\)$/;
// Token regex: matches section numbers, designators, words (including U.S.C.), and punctuation
const TOKEN_RE =
	/\d+[a-zA-Z]*(?:[-–]\d+)?|\([A-Za-z0-9ivxIVX]+\)|U\.?S\.?C\.?|[A-Za-z]+(?:\/[A-Za-z]+)?|[,.;:§]/g;

const PUBLIC_LAW_RE = /\bPub(?:lic)?\.?\s*L(?:aw)?\.?\s*(\d+)\s*[-–—]\s*(\d+)/g;
const EXECUTIVE_ORDER_RE =
	/\b(?:Ex\.\s*Ord\.|Executive\s+Order)\s*(?:No\.\s*)?(\d+)/g;
const FEDERAL_REGISTER_RE = /\b(\d+)\s+(?:F\.\s?R\.|Fed\.\s*Reg\.)\s+(\d+)/g;
const STATUTES_RE = /\b(\d+)([A-Z]?)\s+Stat\.\s+(\d+)/g;

const QUALIFIER_KEYWORDS = new Map<string, QualifierType>([
	["subsection", "subsection"],
	["subsections", "subsection"],
	["subdivision", "subdivision"],
	["subdivisions", "subdivision"],
	["paragraph", "paragraph"],
	["paragraphs", "paragraph"],
	["subparagraph", "subparagraph"],
	["subparagraphs", "subparagraph"],
	["clause", "clause"],
	["clauses", "clause"],
]);

const SECTION_KEYWORDS = new Set(["section", "sections", "sec", "secs", "§"]);
const PLURAL_SECTION_KEYWORDS = new Set(["sections", "secs"]);
const USC_KEYWORDS = new Set(["usc", "u.s.c.", "u.s.c"]);
const SEPARATOR_WORDS = new Set(["and", "or", "and/or"]);

export interface ScanOptions {
	/** Title of the section being scanned, for "of this title" */
	titleNum: string | null;
	/** <ref href> elements of the section, read before the text patterns */
	tagged?: readonly TaggedReference[];
}

type Bucket = keyof CrossReferenceSet;

interface HrefTarget {
	bucket: Bucket;
	targetCitation: string;
	sections: string[];
}

/**
 * Collect references from a section's text and then its notes. Tagged
 * <ref> targets come first within each, then citation-shaped phrases.
 * Each bucket is deduplicated by raw text, keeping first-seen order.
 */
export function scanCrossReferences(
	text: string,
	notes: readonly string[],
	options: ScanOptions,
): CrossReferenceSet {
	const set: CrossReferenceSet = {
		code: [],
		publicLaws: [],
		executiveOrders: [],
		federalRegister: [],
		statutes: [],
		acts: [],
	};
	const seen = new Map<Bucket, Set<string>>();

	const add = (bucket: Bucket, reference: CrossReference) => {
		let rawTexts = seen.get(bucket);
		if (!rawTexts) {
			rawTexts = new Set();
			seen.set(bucket, rawTexts);
		}
		if (rawTexts.has(reference.rawText)) return;
		rawTexts.add(reference.rawText);
		set[bucket].push(reference);
	};

	const scanTagged = (body: string, source: CrossReferenceSource) => {
		const isBracketed = createBracketLookup(body);
		for (const ref of options.tagged ?? []) {
			if (ref.source !== source) continue;
			const target = resolveHref(ref.href);
			if (!target) continue;

			const offset = ref.text ? body.indexOf(ref.text) : -1;
			add(target.bucket, {
				rawText: ref.text || ref.href,
				targetCitation: target.targetCitation,
				sections: target.sections,
				editoriallyInserted: offset >= 0 && isBracketed(offset),
				source,
				href: ref.href,
			});
		}
	};

	const scan = (body: string, source: CrossReferenceSource) => {
		const isBracketed = createBracketLookup(body);
		const found = (
			bucket: Bucket,
			match: RegExpMatchArray,
			targetCitation: string,
		) => {
			add(bucket, {
				rawText: match[0],
				targetCitation,
				sections: [],
				editoriallyInserted: isBracketed(match.index ?? 0),
				source,
				href: null,
			});
		};

		for (const match of extractCodeCitations(body, options.titleNum)) {
			add("code", {
				rawText: match.rawText,
				targetCitation: match.targetCitation,
				sections: match.sections,
				editoriallyInserted: isBracketed(match.offset),
				source,
				href: null,
			});
		}
		for (const match of body.matchAll(PUBLIC_LAW_RE)) {
			found("publicLaws", match, `Pub. L. ${match[1]}-${match[2]}`);
		}
		for (const match of body.matchAll(EXECUTIVE_ORDER_RE)) {
			found("executiveOrders", match, `Ex. Ord. No. ${match[1]}`);
		}
		for (const match of body.matchAll(FEDERAL_REGISTER_RE)) {
			found("federalRegister", match, `${match[1]} F.R. ${match[2]}`);
		}
		for (const match of body.matchAll(STATUTES_RE)) {
			found("statutes", match, `${match[1]}${match[2]} Stat. ${match[3]}`);
		}
	};

	scanTagged(text, "text");
	scan(text, "text");
	scanTagged(notes.join("\n"), "notes");
	for (const note of notes) {
		scan(note, "notes");
	}

	return set;
}

const HREF_LEVEL_LABELS: ReadonlyArray<readonly [string, string]> = [
	["sch", "subch."],
	["ch", "ch."],
	["pt", "pt."],
];

/**
 * Map a USLM href onto a bucket and citation:
 * /us/usc/t5/s552/a/1, /us/usc/t5/ch12, /us/pl/117/286, /us/stat/116/926,
 * /us/act/1947-07-30/ch388
 */
export function resolveHref(href: string): HrefTarget | null {
	const segments = href.split("/").filter(Boolean);
	if (segments[0] !== "us") return null;
	const rest = segments.slice(2);

	switch (segments[1]) {
		case "usc":
			return resolveCodeHref(rest);
		case "pl": {
			const [congress, law] = rest;
			if (!congress || !law) return null;
			if (!/^\d+$/.test(congress) || !/^\d+$/.test(law)) return null;
			return {
				bucket: "publicLaws",
				targetCitation: `Pub. L. ${congress}-${law}`,
				sections: [],
			};
		}
		case "stat": {
			const [volume, page] = rest;
			if (!volume || !page) return null;
			if (!/^\d+[A-Z]?$/.test(volume) || !/^\d+$/.test(page)) return null;
			return {
				bucket: "statutes",
				targetCitation: `${volume} Stat. ${page}`,
				sections: [],
			};
		}
		case "act": {
			const [date, ...details] = rest;
			if (!date || details.length === 0) return null;
			const parts = details.map((part) => {
				const chapter = part.match(/^ch(\w+)$/);
				if (chapter) return `ch. ${chapter[1]}`;
				const section = part.match(/^s(\w+)$/);
				return section ? `§ ${section[1]}` : part;
			});
			return {
				bucket: "acts",
				targetCitation: `Act of ${date}, ${parts.join(", ")}`,
				sections: [],
			};
		}
		default:
			return null;
	}
}

function resolveCodeHref(rest: string[]): HrefTarget | null {
	const title = rest[0]?.match(/^t(\d+)(a?)$/);
	if (!title) return null;
	const prefix = `${title[1]} U.S.C.${title[2] ? " App." : ""}`;

	const levels: string[] = [];
	for (let index = 1; index < rest.length; index += 1) {
		const segment = rest[index] ?? "";
		const section = segment.match(/^s(\d[\w-]*)$/);
		if (section) {
			const designators = rest
				.slice(index + 1)
				.map((designator) => `(${designator})`)
				.join("");
			return {
				bucket: "code",
				targetCitation: `${prefix} § ${section[1]}${designators}`,
				sections: [section[1]],
			};
		}

		const level = HREF_LEVEL_LABELS.find(
			([abbreviation]) =>
				segment.startsWith(abbreviation) &&
				segment.length > abbreviation.length,
		);
		if (!level) return null;
		levels.push(`${level[1]} ${segment.slice(level[0].length)}`);
	}

	if (levels.length === 0) return null;
	return {
		bucket: "code",
		targetCitation: `${prefix} ${levels.join(", ")}`,
		sections: [],
	};
}

function createBracketLookup(text: string): (offset: number) => boolean {
	const depths = new Int32Array(text.length + 1);
	let depth = 0;
	for (let i = 0; i < text.length; i += 1) {
		depths[i] = depth;
		if (text[i] === "[") depth += 1;
		else if (text[i] === "]") depth = Math.max(0, depth - 1);
	}
	depths[text.length] = depth;
	return (offset) => (depths[offset] ?? 0) > 0;
}

/**
 * Extract U.S. Code citation phrases from text.
 * @param text The section body text
 * @param currentTitleNum The title number of the current section (for "of this title")
 */
export function extractCodeCitations(
	text: string,
	currentTitleNum: string | null,
): CodeCitationMatch[] {
	const tokens = tokenize(text);
	const matches: CodeCitationMatch[] = [];

	let index = 0;
	while (index < tokens.length) {
		const token = tokens[index];
		if (!token) {
			index += 1;
			continue;
		}

		// Check for "42 U.S.C. 1234" style references
		if (token.type === "titleNumber") {
			const parsed = parseTitleUSCReference(tokens, index);
			if (parsed) {
				matches.push(toMatch(text, tokens, index, parsed));
				index = parsed.nextIndex;
				continue;
			}
		}

		// Check for "section 1234 of title 42" style references
		if (isQualifierKeyword(token) || isSectionKeyword(token)) {
			const parsed = parseReference(tokens, index, currentTitleNum);
			if (parsed) {
				matches.push(toMatch(text, tokens, index, parsed));
				index = parsed.nextIndex;
				continue;
			}
		}

		index += 1;
	}

	return matches;
}

interface ParsedCitation {
	titleNum: string;
	/** "50 U.S.C. App. 2401" */
	appendix: boolean;
	items: SectionTarget[];
	plural: boolean;
	/** Designators from an enclosing qualifier chain, outermost first */
	qualifierSuffix: string[];
	etSeq: boolean;
	nextIndex: number;
}

function toMatch(
	text: string,
	tokens: Token[],
	startIndex: number,
	parsed: ParsedCitation,
): CodeCitationMatch {
	const first = tokens[startIndex];
	const last = tokens[parsed.nextIndex - 1];
	const offset = first?.start ?? 0;
	const end = last?.end ?? offset;

	return {
		rawText: text.slice(offset, end),
		offset,
		titleNum: parsed.titleNum,
		sections: parsed.items.flatMap((item) =>
			item.type === "section" ? [item.section] : [item.start, item.end],
		),
		targetCitation: formatTargetCitation(parsed),
	};
}

function formatTargetCitation(parsed: ParsedCitation): string {
	const single =
		parsed.items.length === 1 && parsed.items[0]?.type === "section";
	const parts = parsed.items.map((item) => {
		if (item.type === "range") {
			return `${item.start} to ${item.end}`;
		}
		const designators = single
			? [...item.designators, ...parsed.qualifierSuffix]
			: item.designators;
		return `${item.section}${designators.map((d) => `(${d})`).join("")}`;
	});

	const sign = single && !parsed.plural ? "§" : "§§";
	const etSeq = parsed.etSeq ? " et seq." : "";
	const code = parsed.appendix ? "U.S.C. App." : "U.S.C.";
	return `${parsed.titleNum} ${code} ${sign} ${parts.join(", ")}${etSeq}`;
}

function tokenize(text: string): Token[] {
	const tokens: Token[] = [];
	const matches = text.matchAll(TOKEN_RE);

	for (const match of matches) {
		const raw = match[0];
		if (!raw) continue;

		const start = match.index ?? 0;
		const end = start + raw.length;

		if (raw === "§") {
			tokens.push({ type: "word", value: "§", start, end });
			continue;
		}

		// Check for U.S.C. pattern
		if (USC_KEYWORDS.has(raw.toLowerCase().replace(/\./g, ""))) {
			tokens.push({ type: "word", value: "usc", start, end });
			continue;
		}

		// Check if it's a number (could be title or section number)
		if (TITLE_NUMBER_RE.test(raw)) {
			tokens.push({ type: "titleNumber", value: raw, start, end });
			continue;
		}

		// Check for section number with letter suffix
		if (SECTION_NUMBER_RE.test(raw)) {
			tokens.push({
				type: "sectionNumber",
				value: normalizeSectionNumber(raw),
				start,
				end,
			});
			continue;
		}

		const designatorMatch = raw.match(DESIGNATOR_RE);
		if (designatorMatch) {
			tokens.push({
				type: "designator",
				value: designatorMatch[1],
				start,
				end,
			});
			continue;
		}

		if (raw === "," || raw === ";" || raw === "." || raw === ":") {
			tokens.push({ type: "punct", value: raw, start, end });
			continue;
		}

		tokens.push({ type: "word", value: raw.toLowerCase(), start, end });
	}

	return tokens;
}

function normalizeSectionNumber(value: string): string {
	return value.replace("–", "-").toLowerCase();
}

function isQualifierKeyword(token: Token | undefined): token is WordToken {
	return token?.type === "word" && QUALIFIER_KEYWORDS.has(token.value);
}

function isSectionKeyword(token: Token | undefined): token is WordToken {
	return token?.type === "word" && SECTION_KEYWORDS.has(token.value);
}

function isUSCKeyword(token: Token | undefined): token is WordToken {
	return token?.type === "word" && token.value === "usc";
}

function isWord(token: Token | undefined, value: string): boolean {
	return token?.type === "word" && token.value === value;
}

function isPunct(token: Token | undefined, value: string): boolean {
	return token?.type === "punct" && token.value === value;
}

function isDesignator(
	token: Token | undefined,
): token is Extract<Token, { type: "designator" }> {
	return token?.type === "designator";
}

function isTitleNumber(
	token: Token | undefined,
): token is Extract<Token, { type: "titleNumber" }> {
	return token?.type === "titleNumber";
}

function isSeparator(token: Token | undefined): boolean {
	if (!token) return false;
	if (token.type === "punct") {
		return token.value === "," || token.value === ";";
	}
	return token.type === "word" && SEPARATOR_WORDS.has(token.value);
}

/**
 * Parse "42 U.S.C. 1234", "5 U.S.C. §§ 101, 102" and "50 U.S.C. App. 2401"
 * style references
 */
function parseTitleUSCReference(
	tokens: Token[],
	startIndex: number,
): ParsedCitation | null {
	const titleToken = tokens[startIndex];
	if (!isTitleNumber(titleToken)) return null;
	if (!isUSCKeyword(tokens[startIndex + 1])) return null;

	let index = startIndex + 2;
	const appendix = isWord(tokens[index], "app");
	if (appendix) {
		index += 1;
		if (isPunct(tokens[index], ".")) index += 1;
	}

	let signs = 0;
	while (isSectionKeyword(tokens[index])) {
		signs += 1;
		index += 1;
	}

	const sectionList = parseSectionList(tokens, index, true, true);
	if (!sectionList) return null;

	const etSeq = parseEtSeq(tokens, sectionList.nextIndex);
	return {
		titleNum: titleToken.value,
		appendix,
		items: sectionList.items,
		plural: signs > 1,
		qualifierSuffix: [],
		etSeq: etSeq !== null,
		nextIndex: etSeq ?? sectionList.nextIndex,
	};
}

function parseReference(
	tokens: Token[],
	startIndex: number,
	currentTitleNum: string | null,
): ParsedCitation | null {
	const token = tokens[startIndex];
	if (!token) return null;

	let index = startIndex;
	let qualifierSuffix: string[] = [];

	if (isQualifierKeyword(token)) {
		const qualifierChains = parseQualifierChainList(tokens, startIndex);
		if (!qualifierChains) return null;

		index = qualifierChains.nextIndex;
		if (!isWord(tokens[index], "of")) return null;
		index += 1;

		const [onlyChain] = qualifierChains.chains;
		if (qualifierChains.chains.length === 1 && onlyChain) {
			qualifierSuffix = onlyChain
				.slice()
				.reverse()
				.flatMap((qualifier) => qualifier.designators.slice(0, 1));
		}
	}

	const sectionKeyword = tokens[index];
	if (!isSectionKeyword(sectionKeyword)) return null;
	index += 1;

	let plural = PLURAL_SECTION_KEYWORDS.has(sectionKeyword.value);
	if (isSectionKeyword(tokens[index])) {
		plural = true;
		index += 1;
	}

	const sectionList = parseSectionList(tokens, index, true);
	if (!sectionList) return null;
	index = sectionList.nextIndex;

	const etSeq = parseEtSeq(tokens, index);
	if (etSeq !== null) index = etSeq;

	const title = parseTitleSuffix(tokens, index, currentTitleNum);
	if (!title) return null;

	return {
		titleNum: title.titleNum,
		appendix: false,
		items: sectionList.items,
		plural,
		qualifierSuffix,
		etSeq: etSeq !== null,
		nextIndex: title.nextIndex,
	};
}

/**
 * "of title 42" or "of this title", optionally after a comma
 */
function parseTitleSuffix(
	tokens: Token[],
	startIndex: number,
	currentTitleNum: string | null,
): { titleNum: string; nextIndex: number } | null {
	let index = startIndex;
	if (isPunct(tokens[index], ",")) index += 1;
	if (!isWord(tokens[index], "of")) return null;
	index += 1;

	if (isWord(tokens[index], "this") && isWord(tokens[index + 1], "title")) {
		return currentTitleNum
			? { titleNum: currentTitleNum, nextIndex: index + 2 }
			: null;
	}

	const titleNumToken = tokens[index + 1];
	if (isWord(tokens[index], "title") && isTitleNumber(titleNumToken)) {
		return { titleNum: titleNumToken.value, nextIndex: index + 2 };
	}

	return null;
}

function startsTitleSuffix(tokens: Token[], startIndex: number): boolean {
	const index = isPunct(tokens[startIndex], ",") ? startIndex + 1 : startIndex;
	return (
		isWord(tokens[index], "of") &&
		(isWord(tokens[index + 1], "title") || isWord(tokens[index + 1], "this"))
	);
}

/**
 * Index after a trailing "et seq." or null when absent
 */
function parseEtSeq(tokens: Token[], startIndex: number): number | null {
	if (!isWord(tokens[startIndex], "et")) return null;
	if (!isWord(tokens[startIndex + 1], "seq")) return null;
	return isPunct(tokens[startIndex + 2], ".")
		? startIndex + 3
		: startIndex + 2;
}

function parseQualifierChainList(
	tokens: Token[],
	startIndex: number,
): { chains: Qualifier[][]; nextIndex: number } | null {
	const firstChain = parseQualifierChain(tokens, startIndex);
	if (!firstChain) return null;

	const chains: Qualifier[][] = [firstChain.qualifiers];
	let index = firstChain.nextIndex;

	while (true) {
		const separatorIndex = consumeSeparators(tokens, index);
		if (separatorIndex === null) break;

		const nextToken = tokens[separatorIndex];
		if (!nextToken || !isQualifierKeyword(nextToken)) {
			break;
		}

		const nextChain = parseQualifierChain(tokens, separatorIndex);
		if (!nextChain) break;

		chains.push(nextChain.qualifiers);
		index = nextChain.nextIndex;
	}

	return { chains, nextIndex: index };
}

function parseQualifierChain(
	tokens: Token[],
	startIndex: number,
): { qualifiers: Qualifier[]; nextIndex: number } | null {
	const qualifier = parseQualifier(tokens, startIndex);
	if (!qualifier) return null;

	const qualifiers: Qualifier[] = [qualifier.qualifier];
	let index = qualifier.nextIndex;

	while (isWord(tokens[index], "of")) {
		const nextToken = tokens[index + 1];
		if (!nextToken || !isQualifierKeyword(nextToken)) break;

		const nextQualifier = parseQualifier(tokens, index + 1);
		if (!nextQualifier) break;

		qualifiers.push(nextQualifier.qualifier);
		index = nextQualifier.nextIndex;
	}

	return { qualifiers, nextIndex: index };
}

function parseQualifier(
	tokens: Token[],
	startIndex: number,
): { qualifier: Qualifier; nextIndex: number } | null {
	const token = tokens[startIndex];
	if (!token || !isQualifierKeyword(token)) return null;

	const type = QUALIFIER_KEYWORDS.get(token.value);
	if (!type) return null;

	const list = parseDesignatorList(tokens, startIndex + 1);
	if (!list) return null;

	return {
		qualifier: { type, designators: list.designators },
		nextIndex: list.nextIndex,
	};
}

function parseDesignatorList(
	tokens: Token[],
	startIndex: number,
): { designators: string[]; nextIndex: number } | null {
	const first = tokens[startIndex];
	if (!isDesignator(first)) return null;

	const designators: string[] = [first.value];
	let index = startIndex + 1;

	while (true) {
		const sepIndex = consumeSeparators(tokens, index);
		if (sepIndex === null) break;

		const nextToken = tokens[sepIndex];
		if (!isDesignator(nextToken)) break;

		designators.push(nextToken.value);
		index = sepIndex + 1;
	}

	return { designators, nextIndex: index };
}

function parseSectionList(
	tokens: Token[],
	startIndex: number,
	allowMultiple: boolean,
	stopBeforeTitleSuffix = false,
): { items: SectionTarget[]; nextIndex: number } | null {
	const firstItem = parseSectionItem(tokens, startIndex);
	if (!firstItem) return null;

	const items: SectionTarget[] = [firstItem.item];
	let index = firstItem.nextIndex;

	if (!allowMultiple) {
		return { items, nextIndex: index };
	}

	while (true) {
		const sepIndex = consumeSeparators(tokens, index);
		if (sepIndex === null) break;

		let nextIndex = sepIndex;
		const keyword = isSectionKeyword(tokens[nextIndex]);
		if (keyword) {
			nextIndex += 1;
		}

		// "42 U.S.C. 1983 and 18 U.S.C. 1001" starts a new citation
		if (isUSCKeyword(tokens[nextIndex + 1])) break;

		const nextItem = parseSectionItem(tokens, nextIndex);
		if (!nextItem) break;

		// so does "42 U.S.C. 1983 and section 1985 of title 18"
		if (
			keyword &&
			stopBeforeTitleSuffix &&
			startsTitleSuffix(tokens, nextItem.nextIndex)
		) {
			break;
		}

		items.push(nextItem.item);
		index = nextItem.nextIndex;
	}

	return { items, nextIndex: index };
}

function readSectionNumber(
	token: Token | undefined,
): (Span & { value: string }) | null {
	if (token?.type === "sectionNumber" || token?.type === "titleNumber") {
		return token;
	}
	return null;
}

function parseSectionItem(
	tokens: Token[],
	startIndex: number,
): { item: SectionTarget; nextIndex: number } | null {
	const token = readSectionNumber(tokens[startIndex]);
	if (!token) return null;

	let index = startIndex + 1;

	if (isWord(tokens[index], "to") || isWord(tokens[index], "through")) {
		const endToken = readSectionNumber(tokens[index + 1]);
		if (!endToken) return null;

		index += 2;
		let inclusive = false;

		if (isPunct(tokens[index], ",")) {
			if (isWord(tokens[index + 1], "inclusive")) {
				inclusive = true;
				index += 2;
			}
		} else if (isWord(tokens[index], "inclusive")) {
			inclusive = true;
			index += 1;
		}

		return {
			item: {
				type: "range",
				start: token.value,
				end: endToken.value,
				inclusive,
			},
			nextIndex: index,
		};
	}

	// "552(a)(1)" written without a space belongs to the section number
	const designators: string[] = [];
	let previousEnd = token.end;
	let next = tokens[index];
	while (isDesignator(next) && next.start === previousEnd) {
		designators.push(next.value);
		previousEnd = next.end;
		index += 1;
		next = tokens[index];
	}

	return {
		item: { type: "section", section: token.value, designators },
		nextIndex: index,
	};
}

function consumeSeparators(tokens: Token[], startIndex: number): number | null {
	let index = startIndex;
	let consumed = false;

	while (isSeparator(tokens[index])) {
		consumed = true;
		index += 1;
	}

	return consumed ? index : null;
}
