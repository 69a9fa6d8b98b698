import { DomHandler, type Element, isTag } from "domhandler";
import { Parser } from "htmlparser2";
import type { DocumentMeta, UslmDocument } from "../../types";
import { DocumentLoadError, describeError } from "../errors";
import {
	childElements,
	elementText,
	findChild,
	getAttr,
	localName,
} from "../xml";

const USLM_ROOT_TAGS = new Set(["uscDoc", "lawDoc"]);

export type UslmInput = string | Uint8Array | AsyncIterable<Uint8Array>;

async function* stringChunks(
	input: UslmInput,
): AsyncGenerator<string, void, void> {
	if (typeof input === "string") {
		yield input;
		return;
	}

	const decoder = new TextDecoder();
	if (input instanceof Uint8Array) {
		yield decoder.decode(input);
		return;
	}

	for await (const value of input) {
		if (value) {
			yield decoder.decode(value, { stream: true });
		}
	}
	const final = decoder.decode();
	if (final) {
		yield final;
	}
}

/**
 * DomHandler that keeps the stack of elements still open. htmlparser2
 * closes whatever is left at end(), so the stack is read before that.
 */
class OpenElementTracker extends DomHandler {
	private readonly open: string[] = [];

	override onopentag(name: string, attribs: Record<string, string>): void {
		this.open.push(name);
		super.onopentag(name, attribs);
	}

	override onclosetag(): void {
		this.open.pop();
		super.onclosetag();
	}

	innermostOpen(): string | null {
		return this.open[this.open.length - 1] ?? null;
	}
}

/**
 * Parse a USLM XML document into a read-only DOM tree.
 * Throws DocumentLoadError when the input is not a USLM document.
 */
export async function loadUslmDocument(
	input: UslmInput,
): Promise<UslmDocument> {
	const handler = new OpenElementTracker(null, { xmlMode: true });
	const parser = new Parser(handler, {
		xmlMode: true,
		decodeEntities: true,
	});

	let sawContent = false;
	let unclosed: string | null = null;
	try {
		for await (const chunk of stringChunks(input)) {
			if (chunk.trim()) sawContent = true;
			parser.write(chunk);
		}
		unclosed = handler.innermostOpen();
		parser.end();
	} catch (error) {
		throw new DocumentLoadError(
			`Failed to read USLM document: ${describeError(error)}`,
			{ cause: error },
		);
	}

	if (!sawContent) {
		throw new DocumentLoadError("USLM document is empty");
	}
	if (unclosed) {
		throw new DocumentLoadError(
			`USLM document is truncated: <${unclosed}> is never closed`,
		);
	}

	const root = handler.root.children.find(isTag);
	if (!root) {
		throw new DocumentLoadError("USLM document has no root element");
	}
	const rootName = localName(root);
	if (!USLM_ROOT_TAGS.has(rootName)) {
		throw new DocumentLoadError(
			`Unexpected root element <${rootName}>; expected <uscDoc> or <lawDoc>`,
		);
	}
	if (!findChild(root, "main")) {
		throw new DocumentLoadError(`<${rootName}> has no <main> element`);
	}

	return {
		root,
		identifier: getAttr(root, "identifier"),
		meta: extractDocumentMeta(root),
	};
}

type MetaTextField =
	| "title"
	| "type"
	| "docNumber"
	| "docPublicationName"
	| "publisher"
	| "creator"
	| "created";

// dc:title, dc:type, dcterms:created etc. arrive with their prefix stripped
const META_TEXT_FIELDS: ReadonlySet<string> = new Set<MetaTextField>([
	"title",
	"type",
	"docNumber",
	"docPublicationName",
	"publisher",
	"creator",
	"created",
]);

function isMetaTextField(name: string): name is MetaTextField {
	return META_TEXT_FIELDS.has(name);
}

/**
 * Read Dublin Core and USLM properties from the document's <meta> block
 */
export function extractDocumentMeta(root: Element): DocumentMeta {
	const meta: DocumentMeta = {
		title: null,
		type: null,
		docNumber: null,
		docPublicationName: null,
		publisher: null,
		creator: null,
		created: null,
		isPositiveLaw: null,
		properties: {},
	};

	const metaElement = findChild(root, "meta");
	if (!metaElement) return meta;

	for (const child of childElements(metaElement)) {
		const name = localName(child);
		const text = elementText(child);
		if (!text) continue;

		if (name === "property") {
			const role = getAttr(child, "role");
			if (role) {
				meta.properties[role] = text;
			}
			continue;
		}

		if (isMetaTextField(name) && meta[name] === null) {
			meta[name] = text;
		}
	}

	const positiveLaw = meta.properties["is-positive-law"]?.toLowerCase();
	if (positiveLaw === "yes") meta.isPositiveLaw = true;
	if (positiveLaw === "no") meta.isPositiveLaw = false;

	return meta;
}
