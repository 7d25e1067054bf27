export type DecodedByteArrayHeader = {
	guard?: string;
	array: string;
	length?: string;
	data: Buffer;
};

const GUARD_RE = /^#ifndef\s+(\S+)/m;
const ARRAY_RE = /unsigned char\s+(\w+)\s*\[\]\s*=\s*\{/;
const LENGTH_RE = /unsigned int\s+(\w+)\s*=\s*sizeof\(/;

/**
 * Parse a header produced by formatByteArrayHeader back into its symbols and bytes.
 */
export function decodeByteArrayHeader(text: string): DecodedByteArrayHeader {
	const arrayMatch = ARRAY_RE.exec(text);
	if (!arrayMatch)
		throw new Error("Array declaration not found.");

	const bodyStart = arrayMatch.index + arrayMatch[0].length;
	const bodyEnd = text.indexOf("};", bodyStart);
	if (bodyEnd < 0)
		throw new Error(`Array ${arrayMatch[1]} is not closed.`);

	const bytes: number[] = [];
	for (const token of text.slice(bodyStart, bodyEnd).split(",")) {
		const value = token.trim();
		if (!value.length)
			continue;
		if (!/^0x[0-9A-Fa-f]{2}$/.test(value))
			throw new Error(`Invalid byte literal: ${value}`);
		bytes.push(parseInt(value.substring(2), 16));
	}

	return {
		guard: GUARD_RE.exec(text)?.[1],
		array: arrayMatch[1],
		length: LENGTH_RE.exec(text)?.[1],
		data: Buffer.from(bytes),
	};
}
