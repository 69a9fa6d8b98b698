import type {
	LegislativeAction,
	LegislativeActionKind,
	ParsedLegislativeAction,
	StatutesAtLargeCitation,
} from "../../types";
import { collapseWhitespace } from "../xml";

const MONTH_INDEX = new Map<string, number>([
	["jan", 1],
	["january", 1],
	["feb", 2],
	["february", 2],
	["mar", 3],
	["march", 3],
	["apr", 4],
	["april", 4],
	["may", 5],
	["june", 6],
	["jun", 6],
	["july", 7],
	["jul", 7],
	["aug", 8],
	["august", 8],
	["sept", 9],
	["sep", 9],
	["september", 9],
	["oct", 10],
	["october", 10],
	["nov", 11],
	["november", 11],
	["dec", 12],
	["december", 12],
]);

const DATE_RE = /\b([A-Z][a-z]{2,8})\.?\s+(\d{1,2}),\s*(\d{4})\b/g;
const EFFECTIVE_DATE_RE =
	/\beff\.\s+([A-Z][a-z]{2,8})\.?\s+(\d{1,2}),\s*(\d{4})\b/;

const RENUMBERED_RE =
	/\brenumbered(?:\s+§§?\s*([0-9][0-9A-Za-z–-]*))?(?:\s+and\s+amended)?/i;
const FORMERLY_RE = /\bformerly\s+§§?\s*([0-9][0-9A-Za-z–-]*)/i;
const ADDED_PREFIX_RE = /^(?:as\s+)?added\b\s*/i;
const AMENDED_PREFIX_RE = /^amended\b\s*/i;

const DIVISION_RE = /\bdiv\.\s*([A-Z]+)\b/;
const TITLE_IN_ACT_RE = /\btitle\s+([IVXLCDM]+|\d+[A-Za-z]?)\b/;
const STATUTES_RE =
	/\b(\d+)([A-Z]?)\s+Stat\.\s+(\d+)((?:\s*,\s*\d+\b(?!\s*Stat\.))*)/;

const SECTION_START_RE = /§(§?)\s*/;
const SECTION_FIRST_RE = /^\d+[A-Za-z0-9–-]*(?:\([A-Za-z0-9]+\))*/;
const SECTION_NEXT_PAREN_RE = /^,\s*((?:\([A-Za-z0-9]+\))+)/;
const SECTION_NEXT_NUMBER_RE =
	/^,\s*(\d+[A-Za-z0-9–-]*(?:\([A-Za-z0-9]+\))*)(?=\s*(?:,|$))/;

/**
 * Law identifier rules, tried in order. The first match names the law and
 * is cut from the segment before the remaining fields are read.
 */
const LAW_RULES: Array<{
	pattern: RegExp;
	format: (match: RegExpMatchArray, dateText: string | null) => string;
}> = [
	{
		pattern: /\bPub\.\s*L\.\s*(\d+)\s*[–—-]\s*(\d+)/,
		format: (match) => `Pub. L. ${match[1]}-${match[2]}`,
	},
	{
		pattern: /\bR\.\s*S\.\s*(§§?)\s*(\d+[A-Za-z]?(?:\s*,\s*\d+[A-Za-z]?)*)/,
		format: (match) =>
			`R.S. ${match[1]} ${match[2].replace(/\s*,\s*/g, ", ")}`,
	},
	{
		pattern: /\bReorg\.\s*Plan\s+No\.\s*(\d+)\s+of\s+(\d{4})/,
		format: (match) => `Reorg. Plan No. ${match[1]} of ${match[2]}`,
	},
	{
		pattern: /\bch\.\s*(\d+[A-Za-z]?)\b/,
		format: (match, dateText) =>
			dateText ? `Act ${dateText}, ch. ${match[1]}` : `ch. ${match[1]}`,
	},
];

/**
 * Segment classification rules, tried in order; the first that matches
 * decides the kind. Renumbering outranks every other keyword.
 */
const KIND_RULES: Array<{
	kind: LegislativeActionKind;
	matches: (segment: string, position: number) => boolean;
}> = [
	{ kind: "renumbered", matches: (segment) => RENUMBERED_RE.test(segment) },
	{ kind: "as_added", matches: (segment) => ADDED_PREFIX_RE.test(segment) },
	{
		kind: "amended",
		matches: (segment, position) =>
			position > 0 || AMENDED_PREFIX_RE.test(segment),
	},
	{ kind: "base", matches: () => true },
];

/**
 * Parse a section's source credit into one legislative action per
 * semicolon-delimited segment, in document order. Segments that name no
 * law and no Statutes at Large page come back as `unparsed`.
 */
export function parseSourceCredit(credit: string): LegislativeAction[] {
	const body = stripEnclosing(collapseWhitespace(credit));
	if (!body) return [];

	const actions: LegislativeAction[] = [];
	let pendingFormerNumber: string | null = null;

	splitTopLevel(body).forEach((segment, position) => {
		const action = parseSegment(segment, position);
		if (action.kind === "unparsed") {
			actions.push(action);
			return;
		}

		if (action.kind === "renumbered") {
			action.formerNumber ??= pendingFormerNumber;
			pendingFormerNumber = null;
		} else if (action.formerNumber) {
			pendingFormerNumber = action.formerNumber;
		}
		actions.push(action);
	});

	return actions;
}

function stripEnclosing(credit: string): string {
	let result = credit.trim().replace(/\.$/, "").trim();
	const wrapped =
		result.startsWith("(") && closingParenIndex(result) === result.length - 1;
	if (wrapped) {
		result = result.slice(1, -1).trim();
	}
	return result.replace(/\.$/, "").trim();
}

function closingParenIndex(value: string): number {
	let depth = 0;
	for (let i = 0; i < value.length; i += 1) {
		if (value[i] === "(") depth += 1;
		if (value[i] === ")") {
			depth -= 1;
			if (depth === 0) return i;
		}
	}
	return -1;
}

/**
 * Split on semicolons that are not nested inside parentheses
 */
function splitTopLevel(value: string): string[] {
	const segments: string[] = [];
	let depth = 0;
	let current = "";

	for (const char of value) {
		if (char === "(") depth += 1;
		if (char === ")") depth = Math.max(0, depth - 1);
		if (char === ";" && depth === 0) {
			segments.push(current.trim());
			current = "";
			continue;
		}
		current += char;
	}
	segments.push(current.trim());
	return segments;
}

function parseSegment(segment: string, position: number): LegislativeAction {
	const kind =
		KIND_RULES.find((rule) => rule.matches(segment, position))?.kind ??
		"base";

	let remaining = segment
		.replace(ADDED_PREFIX_RE, "")
		.replace(AMENDED_PREFIX_RE, "");

	let newNumber: string | null = null;
	const renumbered = remaining.match(RENUMBERED_RE);
	if (renumbered) {
		newNumber = renumbered[1] ? normalizeDash(renumbered[1]) : null;
		remaining = remaining.replace(RENUMBERED_RE, "");
	}

	let formerNumber: string | null = null;
	const formerly = remaining.match(FORMERLY_RE);
	if (formerly) {
		formerNumber = normalizeDash(formerly[1]);
		remaining = remaining.replace(FORMERLY_RE, "");
	}

	let effectiveDate: string | null = null;
	const effective = remaining.match(EFFECTIVE_DATE_RE);
	if (effective) {
		effectiveDate = toIsoDate(effective[1], effective[2], effective[3]);
		remaining = remaining.replace(EFFECTIVE_DATE_RE, "");
	}

	const date = findDate(remaining);
	const lawMatch = findLaw(remaining, date?.text ?? null);
	if (lawMatch) {
		remaining = remaining.replace(lawMatch.matched, "");
	}

	const statutesAtLarge = parseStatutesAtLarge(remaining);

	if (!lawMatch && !statutesAtLarge) {
		return { kind: "unparsed", rawText: segment };
	}

	const action: ParsedLegislativeAction = {
		kind,
		lawId: lawMatch?.lawId ?? null,
		division: remaining.match(DIVISION_RE)?.[1] ?? null,
		titleInAct: remaining.match(TITLE_IN_ACT_RE)?.[1] ?? null,
		sectionInAct: readActSection(remaining),
		date: date?.iso ?? null,
		effectiveDate,
		statutesAtLarge,
		formerNumber,
		newNumber,
		rawText: segment,
	};
	return action;
}

function findLaw(
	segment: string,
	dateText: string | null,
): { lawId: string; matched: string } | null {
	for (const rule of LAW_RULES) {
		const match = segment.match(rule.pattern);
		if (match) {
			return { lawId: rule.format(match, dateText), matched: match[0] };
		}
	}
	return null;
}

function findDate(segment: string): { iso: string; text: string } | null {
	for (const match of segment.matchAll(DATE_RE)) {
		const iso = toIsoDate(match[1], match[2], match[3]);
		if (iso) {
			return { iso, text: match[0] };
		}
	}
	return null;
}

/**
 * "Apr", "11", "1968" -> "1968-04-11"; null when the month is unknown or
 * the day does not exist in that month
 */
function toIsoDate(
	monthText: string,
	dayText: string,
	yearText: string,
): string | null {
	const month = MONTH_INDEX.get(monthText.toLowerCase());
	if (!month) return null;
	const day = Number.parseInt(dayText, 10);
	const year = Number.parseInt(yearText, 10);
	const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
	if (day < 1 || day > daysInMonth) return null;
	const mm = String(month).padStart(2, "0");
	const dd = String(day).padStart(2, "0");
	return `${yearText}-${mm}-${dd}`;
}

function parseStatutesAtLarge(
	segment: string,
): StatutesAtLargeCitation | null {
	const match = segment.match(STATUTES_RE);
	if (!match) return null;

	const extraPages = match[4]
		.split(",")
		.map((page) => page.trim())
		.filter(Boolean)
		.map((page) => Number.parseInt(page, 10));

	return {
		volume: Number.parseInt(match[1], 10),
		volumeSuffix: match[2] || null,
		pages: [Number.parseInt(match[3], 10), ...extraPages],
	};
}

/**
 * Read the act section designation ("§201", "§8077(b), (c)",
 * "§§ 101(b), 102(a)"). Parenthetical designators continue the current
 * section; bare numbers continue only a "§§" list.
 */
function readActSection(segment: string): string | null {
	const start = segment.match(SECTION_START_RE);
	if (start?.index === undefined) return null;

	const allowList = start[1] === "§";
	let rest = segment.slice(start.index + start[0].length);
	const first = rest.match(SECTION_FIRST_RE);
	if (!first) return null;

	let value = normalizeDash(first[0]);
	rest = rest.slice(first[0].length);

	while (true) {
		const paren = rest.match(SECTION_NEXT_PAREN_RE);
		if (paren) {
			value = `${value}, ${paren[1]}`;
			rest = rest.slice(paren[0].length);
			continue;
		}
		const number = allowList ? rest.match(SECTION_NEXT_NUMBER_RE) : null;
		if (number) {
			value = `${value}, ${normalizeDash(number[1])}`;
			rest = rest.slice(number[0].length);
			continue;
		}
		break;
	}

	return value;
}

function normalizeDash(value: string): string {
	return value.replace(/[–—]/g, "-");
}
