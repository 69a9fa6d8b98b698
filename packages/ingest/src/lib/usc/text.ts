import { type Element, isTag, isText } from "domhandler";
import type { AssembledText, SectionNode } from "../../types";
import { collapseWhitespace, localName } from "../xml";
import { cleanHeading } from "./hierarchy";

const SUBDIVISION_TAGS = new Set([
	"subsection",
	"paragraph",
	"subparagraph",
	"clause",
	"subclause",
	"item",
	"subitem",
	"subsubitem",
]);

const EXCLUDED_TAGS = new Set(["sourceCredit", "notes", "toc"]);

// Subdivisions inside these belong to quoted or editorial text
const COUNT_BARRIER_TAGS = new Set([
	"quotedContent",
	"sourceCredit",
	"notes",
	"toc",
]);

/**
 * Flatten a section into plain text. Each structural unit starts a new
 * line holding its designation, heading, chapeau, content and
 * continuation; <p> blocks start lines of their own.
 */
export function assembleSectionText(node: SectionNode): AssembledText {
	const lines: string[] = [];
	appendUnit(node.element, lines, true);
	return {
		fullText: lines.join("\n"),
		subsectionCount: countSubdivisions(node.element),
	};
}

function appendUnit(element: Element, lines: string[], isSection: boolean) {
	let parts: string[] = [];
	const flush = () => {
		pushLines(lines, parts.join(" "));
		parts = [];
	};

	for (const child of element.children) {
		if (isText(child)) {
			parts.push(inlineText(child.data));
			continue;
		}
		if (!isTag(child)) continue;

		const tagName = localName(child);
		if (EXCLUDED_TAGS.has(tagName)) continue;
		if (isSection && tagName === "num") continue;

		if (SUBDIVISION_TAGS.has(tagName)) {
			flush();
			appendUnit(child, lines, false);
			continue;
		}

		if (isSection && tagName === "heading") {
			parts.push(cleanHeading(collapseWhitespace(blockText(child))));
			continue;
		}

		parts.push(blockText(child));
	}

	flush();
}

function blockText(element: Element): string {
	let text = "";
	for (const child of element.children) {
		if (isText(child)) {
			text += inlineText(child.data);
			continue;
		}
		if (!isTag(child)) continue;

		const tagName = localName(child);
		if (EXCLUDED_TAGS.has(tagName)) continue;
		if (tagName === "p") {
			text += `\n${blockText(child)}\n`;
			continue;
		}
		text += blockText(child);
	}
	return text;
}

// Source line breaks are layout only; "\n" marks block boundaries
function inlineText(value: string): string {
	return value.replace(/\s+/g, " ");
}

function pushLines(lines: string[], text: string): void {
	for (const line of text.split("\n")) {
		const normalized = collapseWhitespace(line);
		if (normalized) {
			lines.push(normalized);
		}
	}
}

/**
 * Number of subsection-or-deeper elements beneath a section, at any depth
 */
export function countSubdivisions(element: Element): number {
	let count = 0;
	for (const child of element.children) {
		if (!isTag(child)) continue;
		const tagName = localName(child);
		if (COUNT_BARRIER_TAGS.has(tagName)) continue;
		if (SUBDIVISION_TAGS.has(tagName)) {
			count += 1;
		}
		count += countSubdivisions(child);
	}
	return count;
}
