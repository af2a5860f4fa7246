export { paddedLength, padBytes, paddingLength, unpad } from "./block";
export {
	CHECKSUM_PLACEHOLDER,
	computeChecksum,
	POSIX_CHECKSUM_PLACEHOLDER,
	validateChecksum,
} from "./checksum";
export {
	BLOCK_SIZE,
	UNKNOWN_FILE_NAME,
	USTAR,
	USTAR_MAX_SIZE,
	USTAR_MAX_UID_GID,
} from "./constants";
export {
	ChecksumError,
	FieldOverflowError,
	InvalidFieldValueError,
	MalformedHeaderError,
	TarError,
	type TarErrorCode,
	TruncatedArchiveError,
} from "./errors";
export {
	createTarHeader,
	isTarHeader,
	parseTarHeader,
	readNameField,
	readSizeField,
	readTypeField,
} from "./header";
export {
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	modeFromNumber,
	modeToNumber,
} from "./mode";
export { decodeOctal, encodeOctal } from "./octal";
export { applyEntryOptions } from "./options";
export { packTar } from "./pack";
export { joinUstarPath, splitUstarPath } from "./path";
export { denormalizeString, normalizeString } from "./string";
export type {
	ChecksumConvention,
	FieldResult,
	FileMode,
	HeaderOptions,
	PackOptions,
	ParsedTarEntry,
	Permissions,
	SpecialBits,
	TarEntry,
	TarEntryData,
	TarEntryType,
	TarHeader,
	UnpackOptions,
} from "./types";
export { unpackTar } from "./unpack";
