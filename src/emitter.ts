import fs from "node:fs";
import createDebug from "debug";
import { sprintf } from "sprintf-js";
import { hexdump } from "./utils.js";

const debug = createDebug("bin2header:emitter");

export type SymbolNames = {
	guard: string;
	array: string;
	length: string;
};

export type ByteArrayFormatOptions = {
	bytesPerRow?: number;
	indent?: string;
};

const DEFAULT_FORMAT_OPTIONS: Required<ByteArrayFormatOptions> = {
	bytesPerRow: 16,
	indent: "    ",
};

export function deriveSymbolNames(assetName: string): SymbolNames {
	return {
		guard: `${assetName.toUpperCase()}_H`,
		array: assetName.toLowerCase(),
		length: `${assetName.toLowerCase()}_len`,
	};
}

/**
 * Render bytes as a C header with an `unsigned char` array and its length.
 *
 * Values in a row are separated by ", ". A row ends with a bare newline; a short
 * last row gets one extra newline. Empty input has no rows at all.
 */
export function formatByteArrayHeader(data: Uint8Array, assetName: string, options: ByteArrayFormatOptions = {}): string {
	const validOptions = {
		...DEFAULT_FORMAT_OPTIONS,
		...options
	};
	const { bytesPerRow, indent } = validOptions;

	if (!Number.isInteger(bytesPerRow) || bytesPerRow <= 0)
		throw new Error("bytesPerRow must be a positive integer.");

	const names = deriveSymbolNames(assetName);
	const output: string[] = [];

	output.push(`#ifndef ${names.guard}\n`);
	output.push(`#define ${names.guard}\n\n`);
	output.push(`unsigned char ${names.array}[] = {\n`);

	for (let i = 0; i < data.length; i++) {
		if (i % bytesPerRow == 0)
			output.push(indent);
		output.push(sprintf("0x%02X", data[i]));
		if (i < data.length - 1)
			output.push(",");
		output.push(i % bytesPerRow == bytesPerRow - 1 ? "\n" : " ");
	}

	if (data.length % bytesPerRow != 0)
		output.push("\n");

	output.push(`};\nunsigned int ${names.length} = sizeof(${names.array});\n\n#endif\n`);
	return output.join("");
}

export function emitByteArrayHeader(inputPath: string, outputPath: string, assetName: string, options: ByteArrayFormatOptions = {}) {
	const data = fs.readFileSync(inputPath);
	debug(sprintf("Read %d bytes from %s", data.length, inputPath));
	if (data.length > 0)
		debug(`First row: ${hexdump(data.subarray(0, 16))}`);

	const header = formatByteArrayHeader(data, assetName, options);
	fs.writeFileSync(outputPath, header);
	debug(sprintf("Wrote %d chars to %s", header.length, outputPath));
}
