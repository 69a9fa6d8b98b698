import { USC_LEVEL_HIERARCHY, type USCLevelType } from "../../types";
import { stripLeadingZeros } from "../xml";

/**
 * Identifier prefix patterns for each level type (USLM identifier scheme)
 */
const LEVEL_ID_PREFIXES: Record<USCLevelType, string> = {
	title: "t",
	subtitle: "st",
	chapter: "ch",
	subchapter: "sch",
	part: "pt",
	subpart: "spt",
	division: "d",
	subdivision: "sd",
};

export type IdentifierSegment =
	| { kind: "level"; level: USCLevelType; num: string }
	| { kind: "section"; num: string };

// Longest prefixes first ("sch" before "st" before "s")
const PREFIX_MATCHERS: Array<{ prefix: string; level: USCLevelType | null }> =
	[
		...USC_LEVEL_HIERARCHY.map((level) => ({
			prefix: LEVEL_ID_PREFIXES[level],
			level,
		})),
		{ prefix: "s", level: null },
	].sort((a, b) => b.prefix.length - a.prefix.length);

/**
 * Split a USLM identifier such as /us/usc/t42/ch21/sch1/s1983 into its
 * recognized level and section segments.
 */
export function parseIdentifierSegments(
	ident: string | null | undefined,
): IdentifierSegment[] {
	if (!ident) return [];
	const rest = ident.replace(/^\/us\/usc\//, "").replace(/^\/+|\/+$/g, "");
	const segments: IdentifierSegment[] = [];

	for (const part of rest.split("/")) {
		for (const { prefix, level } of PREFIX_MATCHERS) {
			if (!part.startsWith(prefix)) continue;
			const numPart = part.substring(prefix.length);
			// Designators start with a digit or an uppercase letter ("schII")
			if (!/^[0-9A-Z]/.test(numPart)) continue;
			const num = stripLeadingZeros(numPart);
			segments.push(
				level ? { kind: "level", level, num } : { kind: "section", num },
			);
			break;
		}
	}
	return segments;
}

export function parseTitleFromIdentifier(
	ident: string | null | undefined,
): string | null {
	if (!ident || !ident.startsWith("/us/usc/")) return null;
	for (const segment of parseIdentifierSegments(ident)) {
		if (segment.kind === "level" && segment.level === "title") {
			return segment.num;
		}
	}
	return null;
}

export function parseSectionFromIdentifier(
	ident: string | null | undefined,
): string | null {
	for (const segment of parseIdentifierSegments(ident)) {
		if (segment.kind === "section") {
			return segment.num;
		}
	}
	return null;
}

export function parseLevelNumFromIdentifier(
	ident: string | null | undefined,
	levelType: USCLevelType,
): string | null {
	let found: string | null = null;
	for (const segment of parseIdentifierSegments(ident)) {
		if (segment.kind === "level" && segment.level === levelType) {
			found = segment.num;
		}
	}
	return found;
}

/**
 * Appendix titles carry an "a" suffix on the title number ("5a")
 */
export function appendixBaseTitle(titleNum: string): string {
	return titleNum.replace(/a$/i, "");
}
