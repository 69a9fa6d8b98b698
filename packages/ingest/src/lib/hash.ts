import { webcrypto } from "node:crypto";

function toHex(buffer: ArrayBuffer): string {
	return [...new Uint8Array(buffer)]
		.map((b) => b.toString(16).padStart(2, "0"))
		.join("");
}

/**
 * Lowercase hex SHA-256 of the UTF-8 encoding of `value`
 */
export async function sha256Hex(value: string): Promise<string> {
	const enc = new TextEncoder();
	const digest = await webcrypto.subtle.digest("SHA-256", enc.encode(value));
	return toHex(digest);
}
