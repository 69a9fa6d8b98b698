import type { Element } from "domhandler";
import {
	type HierarchyEntry,
	type HierarchyPath,
	type SectionNode,
	type SectionStatus,
	USC_LEVEL_HIERARCHY,
	type USCLevelType,
	type UslmDocument,
	type WalkedSection,
} from "../../types";
import {
	childElements,
	elementText,
	findChild,
	getAttr,
	localName,
	stripLeadingZeros,
} from "../xml";
import {
	parseIdentifierSegments,
	parseLevelNumFromIdentifier,
} from "./identifiers";

const USC_LEVEL_SET = new Set<string>(USC_LEVEL_HIERARCHY);

// Sections quoted in amendments or notes are not sections of the Code
const IGNORED_CONTAINERS = new Set([
	"meta",
	"toc",
	"notes",
	"note",
	"quotedContent",
]);

const KNOWN_STATUSES: SectionStatus[] = [
	"operational",
	"repealed",
	"reserved",
	"transferred",
	"omitted",
	"renumbered",
];

interface LevelFrame {
	levelType: USCLevelType;
	num: string | null;
	heading: string | null;
	identifier: string | null;
	appendix: boolean;
}

/**
 * Enumerate every Code section of a document in document order along with
 * its enclosing hierarchy. The returned iterable can be iterated any number
 * of times; each pass re-walks the tree lazily.
 */
export function walkSections(
	document: UslmDocument,
): Iterable<WalkedSection> {
	return {
		[Symbol.iterator]: () => generateSections(document),
	};
}

function* generateSections(
	document: UslmDocument,
): Generator<WalkedSection, void, void> {
	const levelStack: LevelFrame[] = [];
	let index = 0;

	function* visit(element: Element): Generator<WalkedSection, void, void> {
		for (const child of childElements(element)) {
			const tagName = localName(child);
			if (IGNORED_CONTAINERS.has(tagName)) continue;

			if (tagName === "section") {
				const node = createSectionNode(child, index);
				index += 1;
				yield { node, path: buildHierarchyPath(levelStack, node) };
				continue;
			}

			const frame = createLevelFrame(child, tagName);
			if (frame) {
				levelStack.push(frame);
				yield* visit(child);
				levelStack.pop();
				continue;
			}

			yield* visit(child);
		}
	}

	yield* visit(document.root);
}

function createLevelFrame(
	element: Element,
	tagName: string,
): LevelFrame | null {
	const isAppendix = tagName === "appendix";
	if (!isAppendix && !USC_LEVEL_SET.has(tagName)) return null;

	const levelType = isAppendix
		? "title"
		: USC_LEVEL_HIERARCHY.find((level) => level === tagName);
	if (!levelType) return null;

	const identifier = getAttr(element, "identifier");
	const num =
		parseLevelNumFromIdentifier(identifier, levelType) ?? readNum(element);
	const heading = cleanHeading(elementText(findChild(element, "heading")));

	return {
		levelType,
		num,
		heading: heading || null,
		identifier,
		appendix: isAppendix,
	};
}

function readNum(element: Element): string | null {
	const numElement = findChild(element, "num");
	if (!numElement) return null;

	const value = getAttr(numElement, "value");
	if (value?.trim()) return stripLeadingZeros(value.trim());

	// "CHAPTER 1—", "SUBCHAPTER II—", "PART A—"
	const text = elementText(numElement).replace(/[\s—–.:§[\]-]+$/, "");
	const match = text.match(/([0-9]+[A-Za-z]*|[A-Z]+)$/);
	return match ? stripLeadingZeros(match[1]) : null;
}

/**
 * Drop editorial brackets around repealed headings ("[REPEALED]",
 * "Repealed. Pub. L. …]")
 */
export function cleanHeading(heading: string): string {
	let result = heading.trim();
	if (result.startsWith("[") && !result.includes("]")) {
		result = result.slice(1);
	}
	if (result.endsWith("]") && !result.includes("[")) {
		result = result.slice(0, -1);
	}
	if (result.startsWith("[") && result.endsWith("]")) {
		result = result.slice(1, -1);
	}
	return result.trim();
}

function toSectionStatus(raw: string | null): SectionStatus {
	if (!raw) return "operational";
	return KNOWN_STATUSES.find((status) => status === raw) ?? "other";
}

function createSectionNode(element: Element, index: number): SectionNode {
	const rawStatus = getAttr(element, "status");
	const numElement = findChild(element, "num");
	const numValue = numElement ? getAttr(numElement, "value") : null;

	return {
		element,
		index,
		identifier: getAttr(element, "identifier"),
		temporalId: getAttr(element, "temporalId"),
		guid: getAttr(element, "id"),
		legacyName: getAttr(element, "name"),
		status: toSectionStatus(rawStatus),
		rawStatus,
		style: getAttr(element, "style"),
		numValue: numValue?.trim() ? stripLeadingZeros(numValue.trim()) : null,
	};
}

function buildHierarchyPath(
	levelStack: LevelFrame[],
	node: SectionNode,
): HierarchyPath {
	const entries: HierarchyEntry[] = [];
	for (const frame of levelStack) {
		if (!frame.num) continue;
		entries.push({
			level: frame.levelType,
			number: frame.num,
			name: frame.heading,
			identifier: frame.identifier,
		});
	}

	const titleEntry = entries.find((entry) => entry.level === "title");
	const present = new Set<USCLevelType>(entries.map((entry) => entry.level));
	const missing = new Set<USCLevelType>();
	if (!titleEntry) {
		missing.add("title");
	}

	// Every USLM identifier names the levels above its element, so a level
	// named there but absent from the stack is a gap in the ancestor chain
	const identifiers = [
		...levelStack.map((frame) => frame.identifier),
		node.identifier,
	];
	for (const identifier of identifiers) {
		for (const segment of parseIdentifierSegments(identifier)) {
			if (segment.kind === "level" && !present.has(segment.level)) {
				missing.add(segment.level);
			}
		}
	}

	const missingLevels = USC_LEVEL_HIERARCHY.filter((level) =>
		missing.has(level),
	);

	return {
		titleNum: titleEntry?.number ?? null,
		entries,
		inAppendix: levelStack.some((frame) => frame.appendix),
		incomplete: missingLevels.length > 0,
		missingLevels,
	};
}
