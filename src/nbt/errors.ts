export type NbtErrorCode =
	| "UnexpectedEof"
	| "UnknownTagKind"
	| "NegativeLength"
	| "DepthExceeded"
	| "UnexpectedEnd"
	| "TypeMismatch"
	| "ValueOutOfRange"
	| "StringTooLong"
	| "InvalidSnbt"
	| "UnsupportedCompression"
	| "CorruptRegionFile"
	| "CorruptChunkEntry"
	| "ChunkTooLarge";

/** Every failure raised by the codec and the region parser. */
export class NbtError extends Error {
	public readonly code: NbtErrorCode;

	constructor(code: NbtErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "NbtError";
		this.code = code;
	}
}

export const isNbtError = (
	error: unknown,
	code?: NbtErrorCode,
): error is NbtError =>
	error instanceof NbtError && (code === undefined || error.code === code);
