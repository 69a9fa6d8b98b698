// Main exports for the extraction library

export { mapWithConcurrency } from "./lib/concurrency";
export {
	createExtractionContext,
	DEFAULT_CONCURRENCY,
	type ExtractionEnv,
} from "./lib/config";
export { DocumentLoadError } from "./lib/errors";
export { consoleLogger, type Logger, silentLogger } from "./lib/logger";
export {
	type CodeCitationMatch,
	extractCodeCitations,
	resolveHref,
	type ScanOptions,
	scanCrossReferences,
} from "./lib/usc/cross-references";
export {
	extractDocumentMeta,
	loadUslmDocument,
	type UslmInput,
} from "./lib/usc/document";
// Engine
export {
	type ExtractOptions,
	extractSectionRecords,
	extractSectionRecordsFromXml,
} from "./lib/usc/extract";
export { cleanHeading, walkSections } from "./lib/usc/hierarchy";
export {
	parseIdentifierSegments,
	parseSectionFromIdentifier,
	parseTitleFromIdentifier,
} from "./lib/usc/identifiers";
export {
	extractAmendmentNotes,
	extractNoteBlocks,
	readSourceCredit,
	readTaggedReferences,
} from "./lib/usc/notes";
export {
	type BuildResult,
	buildSectionRecord,
	formatCitation,
	formatParentCitation,
	type SectionRecordInput,
} from "./lib/usc/record";
export { parseSourceCredit } from "./lib/usc/source-credit";
export { assembleSectionText, countSubdivisions } from "./lib/usc/text";
// Types
export type {
	AmendmentNote,
	AssembledText,
	CrossReference,
	CrossReferenceSet,
	DocumentMeta,
	ExtractionContext,
	ExtractionResult,
	HierarchyEntry,
	HierarchyPath,
	LegislativeAction,
	LegislativeActionKind,
	NoteBlock,
	ParsedLegislativeAction,
	ProcessingNote,
	SectionNode,
	SectionRecord,
	SectionStatus,
	StatutesAtLargeCitation,
	TaggedReference,
	UnparsedLegislativeAction,
	USCLevelType,
	UslmDocument,
	WalkedSection,
} from "./types";
export { USC_LEVEL_HIERARCHY } from "./types";
