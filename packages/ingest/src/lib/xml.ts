import { type AnyNode, type Element, isTag, isText } from "domhandler";

function normalizeTagName(tagName: string): string {
	const colonIndex = tagName.indexOf(":");
	if (colonIndex !== -1) {
		return tagName.substring(colonIndex + 1);
	}
	return tagName;
}

export function localName(element: Element): string {
	return normalizeTagName(element.name);
}

export function getAttr(element: Element, name: string): string | null {
	const value = element.attribs[name];
	if (typeof value !== "string") return null;
	return value;
}

export function childElements(element: Element): Element[] {
	return element.children.filter(isTag);
}

export function findChild(element: Element, tagName: string): Element | null {
	return (
		childElements(element).find((child) => localName(child) === tagName) ??
		null
	);
}

export function findChildren(element: Element, tagName: string): Element[] {
	return childElements(element).filter(
		(child) => localName(child) === tagName,
	);
}

/**
 * Raw text of a node and all of its descendants, in document order
 */
export function rawText(node: AnyNode): string {
	if (isText(node)) return node.data;
	if (isTag(node)) {
		let text = "";
		for (const child of node.children) {
			text += rawText(child);
		}
		return text;
	}
	return "";
}

/**
 * Collapse whitespace runs (no-break spaces included) to single spaces
 */
export function collapseWhitespace(value: string): string {
	return value.replace(/\s+/g, " ").trim();
}

export function elementText(element: Element | null): string {
	if (!element) return "";
	return collapseWhitespace(rawText(element));
}

/**
 * Strip leading zeros from a numeric string with optional letter suffix (e.g., "01" -> "1", "01a" -> "1a")
 */
export function stripLeadingZeros(value: string): string {
	const match = value.match(/^0*([0-9]+)([a-z]*)$/i);
	if (!match) return value;
	const num = String(Number.parseInt(match[1], 10));
	const suffix = match[2].toLowerCase();
	return `${num}${suffix}`;
}
