import type {
	ExtractionContext,
	ExtractionResult,
	ProcessingNote,
	SectionRecord,
	UslmDocument,
	WalkedSection,
} from "../../types";
import { mapWithConcurrency } from "../concurrency";
import { createExtractionContext, DEFAULT_CONCURRENCY } from "../config";
import { describeError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { scanCrossReferences } from "./cross-references";
import { loadUslmDocument, type UslmInput } from "./document";
import { walkSections } from "./hierarchy";
import {
	extractAmendmentNotes,
	extractNoteBlocks,
	readSourceCredit,
	readTaggedReferences,
} from "./notes";
import { buildSectionRecord, resolveTitleNum } from "./record";
import { parseSourceCredit } from "./source-credit";
import { assembleSectionText } from "./text";

export interface ExtractOptions {
	/** Timestamp and engine version stamped on every record */
	context?: ExtractionContext;
	/** Sections processed at once (default 8) */
	concurrency?: number;
	logger?: Logger;
}

interface SectionOutcome {
	record: SectionRecord | null;
	notes: ProcessingNote[];
}

/**
 * Extract one record per Code section of a loaded document. Records and
 * processing notes come back in document order; a section that cannot be
 * processed yields notes instead of a record and never aborts the run.
 */
export async function extractSectionRecords(
	document: UslmDocument,
	options: ExtractOptions = {},
): Promise<ExtractionResult> {
	const logger = options.logger ?? silentLogger;
	const context = options.context ?? createExtractionContext();
	const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
	const startedAt = Date.now();

	const outcomes = await mapWithConcurrency(
		walkSections(document),
		concurrency,
		(section) => processSection(section, document, context),
	);

	const records: SectionRecord[] = [];
	const notes: ProcessingNote[] = [];
	for (const outcome of outcomes) {
		if (outcome.record) {
			records.push(outcome.record);
		}
		notes.push(...outcome.notes);
	}

	for (const note of notes) {
		logger.warn(
			`${note.code} in section #${note.sectionIndex} (${note.identifier ?? "no identifier"}): ${note.message}`,
		);
	}
	logger.debug(
		`Extracted ${records.length} of ${outcomes.length} sections from ${document.identifier ?? "document"} (${notes.length} processing notes) in ${Date.now() - startedAt}ms`,
	);

	return { records, notes, meta: document.meta };
}

/**
 * Load a USLM document and extract its section records.
 * Throws DocumentLoadError when the input cannot be loaded.
 */
export async function extractSectionRecordsFromXml(
	input: UslmInput,
	options: ExtractOptions = {},
): Promise<ExtractionResult> {
	const document = await loadUslmDocument(input);
	options.logger?.info(
		`Loaded ${document.identifier ?? "document"} (${document.meta.title ?? "untitled"})`,
	);
	return extractSectionRecords(document, options);
}

async function processSection(
	section: WalkedSection,
	document: UslmDocument,
	context: ExtractionContext,
): Promise<SectionOutcome> {
	const { node, path } = section;
	const base = { sectionIndex: node.index, identifier: node.identifier };
	const notes: ProcessingNote[] = [];

	if (path.incomplete) {
		notes.push({
			...base,
			code: "MalformedHierarchy",
			missingLevels: path.missingLevels,
			message: `Missing ancestor levels: ${path.missingLevels.join(", ")}`,
		});
	}

	try {
		const text = assembleSectionText(node);
		const sourceCredit = readSourceCredit(node.element);
		const legislativeHistory = parseSourceCredit(sourceCredit);
		for (const action of legislativeHistory) {
			if (action.kind !== "unparsed") continue;
			notes.push({
				...base,
				code: "UnparsedCitationSegment",
				segment: action.rawText,
				message: `Unrecognized source credit segment "${action.rawText}"`,
			});
		}

		const noteBlocks = extractNoteBlocks(node.element);
		const crossReferences = scanCrossReferences(
			text.fullText,
			noteBlocks.map((block) => block.text),
			{
				titleNum: resolveTitleNum(section, document.identifier),
				tagged: readTaggedReferences(node.element),
			},
		);

		const built = await buildSectionRecord({
			section,
			documentIdentifier: document.identifier,
			positiveLaw: document.meta.isPositiveLaw,
			text,
			sourceCredit,
			legislativeHistory,
			crossReferences,
			notes: noteBlocks,
			amendmentNotes: extractAmendmentNotes(node.element, legislativeHistory),
			context,
		});

		if (!built.ok) {
			notes.push({
				...base,
				code: "MissingRequiredAttribute",
				attribute: built.attribute,
				message: built.message,
			});
			return { record: null, notes };
		}
		return { record: built.record, notes };
	} catch (error) {
		notes.push({
			...base,
			code: "SectionFailure",
			message: describeError(error),
		});
		return { record: null, notes };
	}
}
