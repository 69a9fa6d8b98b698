import type { Element } from "domhandler";

/**
 * Organizational levels of the Code, ordered from title down to the level
 * immediately above a section.
 */
export const USC_LEVEL_HIERARCHY = [
	"title",
	"subtitle",
	"chapter",
	"subchapter",
	"part",
	"subpart",
	"division",
	"subdivision",
] as const;

export type USCLevelType = (typeof USC_LEVEL_HIERARCHY)[number];

export type SectionStatus =
	| "operational"
	| "repealed"
	| "reserved"
	| "transferred"
	| "omitted"
	| "renumbered"
	| "other";

export interface DocumentMeta {
	title: string | null;
	type: string | null;
	docNumber: string | null;
	docPublicationName: string | null;
	publisher: string | null;
	creator: string | null;
	created: string | null;
	isPositiveLaw: boolean | null;
	/** `<property role="...">` values keyed by role */
	properties: Record<string, string>;
}

export interface UslmDocument {
	root: Element;
	identifier: string | null;
	meta: DocumentMeta;
}

/**
 * A `<section>` element plus the attributes the engine reads from it.
 * The element stays owned by the loaded document.
 */
export interface SectionNode {
	element: Element;
	index: number;
	identifier: string | null;
	temporalId: string | null;
	guid: string | null;
	legacyName: string | null;
	status: SectionStatus;
	rawStatus: string | null;
	style: string | null;
	numValue: string | null;
}

export interface HierarchyEntry {
	level: USCLevelType;
	number: string;
	name: string | null;
	identifier: string | null;
}

export interface HierarchyPath {
	titleNum: string | null;
	/** Ancestors from the title down to the nearest enclosing level */
	entries: HierarchyEntry[];
	inAppendix: boolean;
	incomplete: boolean;
	/** Levels named by USLM identifiers but absent from the ancestor chain */
	missingLevels: USCLevelType[];
}

export interface WalkedSection {
	node: SectionNode;
	path: HierarchyPath;
}

export interface AssembledText {
	fullText: string;
	subsectionCount: number;
}

export interface StatutesAtLargeCitation {
	volume: number;
	/** Lettered volumes, e.g. the "A" of "70A Stat. 67" */
	volumeSuffix: string | null;
	pages: number[];
}

export type LegislativeActionKind =
	| "base"
	| "as_added"
	| "renumbered"
	| "amended";

export interface ParsedLegislativeAction {
	kind: LegislativeActionKind;
	lawId: string | null;
	division: string | null;
	titleInAct: string | null;
	sectionInAct: string | null;
	/** ISO calendar date (YYYY-MM-DD) */
	date: string | null;
	effectiveDate: string | null;
	statutesAtLarge: StatutesAtLargeCitation | null;
	formerNumber: string | null;
	newNumber: string | null;
	rawText: string;
}

export interface UnparsedLegislativeAction {
	kind: "unparsed";
	rawText: string;
}

export type LegislativeAction =
	| ParsedLegislativeAction
	| UnparsedLegislativeAction;

export type CrossReferenceSource = "text" | "notes";

export interface CrossReference {
	rawText: string;
	targetCitation: string | null;
	/** Section numbers named by a code citation (empty for other buckets) */
	sections: string[];
	editoriallyInserted: boolean;
	source: CrossReferenceSource;
	/** href of the tagged <ref> element it was read from */
	href: string | null;
}

export interface CrossReferenceSet {
	code: CrossReference[];
	publicLaws: CrossReference[];
	executiveOrders: CrossReference[];
	federalRegister: CrossReference[];
	statutes: CrossReference[];
	acts: CrossReference[];
}

/**
 * A <ref href="..."> element found in a section's content or notes
 */
export interface TaggedReference {
	href: string;
	text: string;
	source: CrossReferenceSource;
}

export interface NoteBlock {
	topic: string;
	role: string;
	heading: string;
	text: string;
}

export interface AmendmentNote {
	year: string;
	text: string;
	publicLaw: string | null;
	statutesAtLarge: string | null;
	date: string | null;
}

export interface SectionIdentifiers {
	guid: string | null;
	identifierPath: string | null;
	temporalId: string | null;
	legacyName: string | null;
}

export interface ExtractionContext {
	/** ISO-8601 timestamp */
	extractedAt: string;
	engineVersion: string;
}

export interface SectionRecord {
	readonly citation: string;
	readonly titleNum: string;
	readonly sectionNum: string;
	readonly heading: string;
	readonly hierarchy: Readonly<HierarchyPath>;
	readonly parentCitation: string | null;
	readonly fullText: string;
	readonly contentHash: string;
	readonly subsectionCount: number;
	readonly status: SectionStatus;
	readonly identifiers: Readonly<SectionIdentifiers>;
	readonly sourceCredit: string;
	readonly legislativeHistory: readonly LegislativeAction[];
	readonly crossReferences: Readonly<CrossReferenceSet>;
	readonly notes: readonly NoteBlock[];
	readonly amendmentNotes: readonly AmendmentNote[];
	readonly positiveLaw: boolean | null;
	readonly incomplete: boolean;
	readonly extraction: Readonly<ExtractionContext>;
}

interface ProcessingNoteBase {
	sectionIndex: number;
	identifier: string | null;
	message: string;
}

export type ProcessingNote =
	| (ProcessingNoteBase & {
			code: "MalformedHierarchy";
			missingLevels: USCLevelType[];
	  })
	| (ProcessingNoteBase & {
			code: "UnparsedCitationSegment";
			segment: string;
	  })
	| (ProcessingNoteBase & {
			code: "MissingRequiredAttribute";
			attribute: "identifier" | "title" | "text";
	  })
	| (ProcessingNoteBase & {
			code: "SectionFailure";
	  });

export interface ExtractionResult {
	records: SectionRecord[];
	notes: ProcessingNote[];
	meta: DocumentMeta;
}
