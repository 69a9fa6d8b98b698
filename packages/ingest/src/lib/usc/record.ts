import type {
	AmendmentNote,
	AssembledText,
	CrossReferenceSet,
	ExtractionContext,
	HierarchyEntry,
	HierarchyPath,
	LegislativeAction,
	NoteBlock,
	SectionRecord,
	WalkedSection,
} from "../../types";
import { sha256Hex } from "../hash";
import { elementText, findChild } from "../xml";
import { cleanHeading } from "./hierarchy";
import {
	appendixBaseTitle,
	parseSectionFromIdentifier,
	parseTitleFromIdentifier,
} from "./identifiers";

export interface SectionRecordInput {
	section: WalkedSection;
	/** Identifier of the enclosing <uscDoc>, the last resort for the title */
	documentIdentifier: string | null;
	positiveLaw: boolean | null;
	text: AssembledText;
	sourceCredit: string;
	legislativeHistory: LegislativeAction[];
	crossReferences: CrossReferenceSet;
	notes: NoteBlock[];
	amendmentNotes: AmendmentNote[];
	context: ExtractionContext;
}

export type MissingAttribute = "identifier" | "title" | "text";

export type BuildResult =
	| { ok: true; record: SectionRecord }
	| { ok: false; attribute: MissingAttribute; message: string };

/**
 * Merge the per-section outputs into one immutable record. Sections that
 * cannot be cited (no title, no section number, no text) are refused.
 */
export async function buildSectionRecord(
	input: SectionRecordInput,
): Promise<BuildResult> {
	const { node, path } = input.section;

	const titleNum = resolveTitleNum(input.section, input.documentIdentifier);
	if (!titleNum) {
		return {
			ok: false,
			attribute: "title",
			message: "Section has no enclosing title",
		};
	}

	const sectionNum =
		parseSectionFromIdentifier(node.identifier) ?? node.numValue;
	if (!sectionNum) {
		return {
			ok: false,
			attribute: "identifier",
			message: "Section has neither an identifier nor a <num> value",
		};
	}

	const heading = cleanHeading(
		elementText(findChild(node.element, "heading")),
	);
	const { fullText, subsectionCount } = input.text;
	if (!fullText && !heading) {
		return {
			ok: false,
			attribute: "text",
			message: `Section ${sectionNum} has no text`,
		};
	}

	const record: SectionRecord = {
		citation: formatCitation(titleNum, sectionNum, path.inAppendix),
		titleNum,
		sectionNum,
		heading,
		hierarchy: path,
		parentCitation: formatParentCitation(titleNum, path),
		fullText,
		contentHash: await sha256Hex(fullText),
		subsectionCount,
		status: node.status,
		identifiers: {
			guid: node.guid,
			identifierPath: node.identifier,
			temporalId: node.temporalId,
			legacyName: node.legacyName,
		},
		sourceCredit: input.sourceCredit,
		legislativeHistory: input.legislativeHistory,
		crossReferences: input.crossReferences,
		notes: input.notes,
		amendmentNotes: input.amendmentNotes,
		positiveLaw: input.positiveLaw,
		incomplete: path.incomplete,
		extraction: input.context,
	};

	return { ok: true, record: deepFreeze(structuredClone(record)) };
}

/**
 * Title number from the enclosing <title>, else the section's own
 * identifier, else the document's
 */
export function resolveTitleNum(
	{ node, path }: WalkedSection,
	documentIdentifier: string | null,
): string | null {
	return (
		path.titleNum ??
		parseTitleFromIdentifier(node.identifier) ??
		parseTitleFromIdentifier(documentIdentifier)
	);
}

function citationPrefix(titleNum: string, inAppendix: boolean): string {
	return inAppendix
		? `${appendixBaseTitle(titleNum)} U.S.C. App.`
		: `${titleNum} U.S.C.`;
}

export function formatCitation(
	titleNum: string,
	sectionNum: string,
	inAppendix = false,
): string {
	return `${citationPrefix(titleNum, inAppendix)} § ${sectionNum}`;
}

/**
 * "5 U.S.C. ch. 5" or "5 U.S.C. ch. 5, subch. II" for the nearest chapter
 */
export function formatParentCitation(
	titleNum: string,
	path: HierarchyPath,
): string | null {
	let chapter: HierarchyEntry | null = null;
	let subchapter: HierarchyEntry | null = null;
	for (const entry of path.entries) {
		if (entry.level === "chapter") {
			chapter = entry;
			subchapter = null;
		} else if (entry.level === "subchapter" && chapter) {
			subchapter = entry;
		}
	}
	if (!chapter) return null;

	const prefix = citationPrefix(titleNum, path.inAppendix);
	const base = `${prefix} ch. ${chapter.number}`;
	return subchapter ? `${base}, subch. ${subchapter.number}` : base;
}

function deepFreeze<T>(value: T): T {
	if (value && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}
