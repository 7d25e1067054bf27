export function hexdump(buffer: Uint8Array) {
	const str: string[] = [];
	for (const byte of buffer)
		str.push(byte.toString(16).padStart(2, "0").toUpperCase());
	return str.join(" ");
}
