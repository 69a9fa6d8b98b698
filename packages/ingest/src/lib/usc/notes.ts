import { type Element, isTag } from "domhandler";
import type {
	AmendmentNote,
	CrossReferenceSource,
	LegislativeAction,
	NoteBlock,
	TaggedReference,
} from "../../types";
import {
	childElements,
	collapseWhitespace,
	elementText,
	findChild,
	findChildren,
	getAttr,
	localName,
	rawText,
} from "../xml";

const CROSS_HEADING_TITLES = new Set([
	"Editorial Notes",
	"Statutory Notes and Related Subsidiaries",
]);

const AMENDMENT_YEAR_RE = /^(\d{4})\s*[—–-]/;
const AMENDMENT_PUBLIC_LAW_RE = /Pub\.\s*L\.\s*(\d+)\s*[-–—]\s*(\d+)/;
const AMENDMENT_STATUTES_RE = /(\d+\s+Stat\.\s+\d+)/;

// Refs here are credits or navigation, not references made by the section
const REF_SKIPPED_TAGS = new Set(["sourceCredit", "toc"]);

export function readSourceCredit(section: Element): string {
	return elementText(findChild(section, "sourceCredit"));
}

function descendants(element: Element, tagName: string): Element[] {
	const found: Element[] = [];
	for (const child of childElements(element)) {
		if (localName(child) === tagName) {
			found.push(child);
		}
		found.push(...descendants(child, tagName));
	}
	return found;
}

function sectionNotes(section: Element): Element[] {
	return findChildren(section, "notes").flatMap((notes) =>
		descendants(notes, "note"),
	);
}

function isCrossHeading(note: Element, heading: string): boolean {
	const role = getAttr(note, "role") ?? "";
	return role.includes("crossHeading") || CROSS_HEADING_TITLES.has(heading);
}

function noteBody(note: Element): string {
	const paragraphs = descendants(note, "p")
		.map((p) => elementText(p))
		.filter(Boolean);
	if (paragraphs.length > 0) {
		return paragraphs.join("\n");
	}

	let text = "";
	for (const child of note.children) {
		if (isTag(child) && localName(child) === "heading") continue;
		text += rawText(child);
	}
	return collapseWhitespace(text);
}

/**
 * <ref href> elements of a section, in document order, marked by whether
 * they sit in the section's body or its notes
 */
export function readTaggedReferences(section: Element): TaggedReference[] {
	const refs: TaggedReference[] = [];
	const visit = (element: Element, source: CrossReferenceSource) => {
		for (const child of childElements(element)) {
			const tagName = localName(child);
			if (REF_SKIPPED_TAGS.has(tagName)) continue;

			if (tagName === "ref") {
				const href = getAttr(child, "href");
				if (href) {
					refs.push({ href, text: elementText(child), source });
				}
				continue;
			}
			visit(child, tagName === "notes" ? "notes" : source);
		}
	};
	visit(section, "text");
	return refs;
}

/**
 * Editorial and statutory notes attached to a section, in document order
 */
export function extractNoteBlocks(section: Element): NoteBlock[] {
	const blocks: NoteBlock[] = [];
	for (const note of sectionNotes(section)) {
		const heading = elementText(findChild(note, "heading"));
		if (isCrossHeading(note, heading)) continue;

		const text = noteBody(note);
		if (!text && !heading) continue;

		blocks.push({
			topic: getAttr(note, "topic") ?? "",
			role: getAttr(note, "role") ?? "",
			heading,
			text,
		});
	}
	return blocks;
}

/**
 * Year-by-year entries of a section's "Amendments" note. Dates come from
 * the source-credit action enacted by the same public law.
 */
export function extractAmendmentNotes(
	section: Element,
	actions: readonly LegislativeAction[],
): AmendmentNote[] {
	const datesByLaw = new Map<string, string>();
	for (const action of actions) {
		if (action.kind === "unparsed") continue;
		if (action.lawId && action.date && !datesByLaw.has(action.lawId)) {
			datesByLaw.set(action.lawId, action.date);
		}
	}

	const amendments: AmendmentNote[] = [];
	for (const note of sectionNotes(section)) {
		if (getAttr(note, "topic") !== "amendments") continue;

		for (const p of descendants(note, "p")) {
			const text = elementText(p);
			const year = text.match(AMENDMENT_YEAR_RE);
			if (!year) continue;

			const law = text.match(AMENDMENT_PUBLIC_LAW_RE);
			const publicLaw = law ? `Pub. L. ${law[1]}-${law[2]}` : null;

			amendments.push({
				year: year[1],
				text,
				publicLaw,
				statutesAtLarge: text.match(AMENDMENT_STATUTES_RE)?.[1] ?? null,
				date: publicLaw ? (datesByLaw.get(publicLaw) ?? null) : null,
			});
		}
	}
	return amendments;
}
