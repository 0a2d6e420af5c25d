export const messages = {
	ALIGNMENT_INVALID: 'Alignment {alignment} is not a power of two between 1 and {max}.',
	COMPANION_MISSING: 'Could not find "{path}". A data file needs its info file (ending on "_info.bin") beside it.',
	DESTINATION_INVALID: 'Destination must be a directory.',
	ENCODING_ERROR: 'Entry {index} ("{name}") cannot be encoded: {reason}.',
	FILE_UNEXPECTED_EXTENSION: 'Expected "{path}" to have .{extension} extension.',
	JSON_INVALID: '"{path}" is not a valid {type} JSON file: {reason}.',
	MALFORMED_TABLE: 'Entry {index} ("{name}") is malformed: {reason}.',
	MISSING_PAYLOAD_FILE: 'Payload file "{path}" for entry {index} ("{name}") does not exist.',
	NAME_TOO_LONG: 'Entry {index} has a name of {length} bytes ("{name}"); at most {max} bytes fit in the info table.',
	NO_READ_PERMISSIONS_PATH: 'No read permissions for "{path}".',
	NO_READ_PERMISSIONS_TYPE: 'No read permissions for {type} path.',
	NO_WRITE_PERMISSIONS_PATH: 'No write permissions for "{path}".',
	NO_WRITE_PERMISSIONS_TYPE: 'No write permissions for {type} path.',
	NOT_FOUND: 'No entry named "{name}".',
	OUT_OF_BOUNDS: 'Entry {index} ("{name}") spans bytes {start} to {end}, past the end of the {length}-byte data file.',
	OUTPUT_NOT_EMPTY: 'The output directory "{path}" contains items. Run with --clean to overwrite them.',
	OUTPUT_WITH_MULTIPLE_SOURCES: 'An output path can only be given for a single {type} source.',
	PAYLOAD_FILE_COLLISION: 'Entries {otherIndex} ("{otherName}") and {index} ("{name}") would both be stored as "{file}" on a case-insensitive file system.',
	PATH_DOES_NOT_EXIST: 'The {type} path does not exist.',
	SOURCE_INVALID: 'Source must be a {description} file or a directory containing {description} files.',
	TEMP_FILE_DELETE_FAILED: 'Temp file "{path}" could not be deleted.',
	TRUNCATED_INFO: 'Info file ends early: {what} needs {needed} bytes, but the file is {available} bytes long.',
} as const;

export type MessageCode = keyof typeof messages;
