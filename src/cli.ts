import createDebug from "debug";
import { emitByteArrayHeader } from "./emitter.js";

const debug = createDebug("bin2header:cli");

export const USAGE = "Usage: bin2header <input_file> <output_h_file> <asset_name>";

export type CliIO = {
	stderr: (line: string) => void;
};

const defaultIO: CliIO = {
	stderr: (line) => console.error(line),
};

/**
 * Every argument is positional, including ones starting with "-".
 */
export function runCli(args: string[], io: CliIO = defaultIO): number {
	if (args.length != 3) {
		debug(`Expected 3 arguments, got ${args.length}`);
		io.stderr(USAGE);
		return 1;
	}

	const [inputPath, outputPath, assetName] = args;
	debug(`Converting ${inputPath} -> ${outputPath} (${assetName})`);
	emitByteArrayHeader(inputPath, outputPath, assetName);
	return 0;
}
