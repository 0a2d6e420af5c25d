export { EntryTable } from './entry-table.js';
export { parseInfo, serializeInfo, infoLength, encodeName, INFO_HEADER_SIZE, DESCRIPTOR_SIZE, MAX_NAME_LENGTH } from './info-codec.js';
export { readAll, writeAll, paddingFor, detectAlignment, isSupportedAlignment, DEFAULT_ALIGNMENT, MAX_ALIGNMENT } from './data-block-codec.js';
export { toManifest, fromManifest, parseManifest, serializeManifest, MANIFEST_TYPE } from './manifest-bridge.js';
export { extract } from './archive-extractor.js';
export { rebuild } from './archive-builder.js';
export { CustomError, NonFatalError, isNonFatalError } from './errors.js';
export { PayloadDirectory } from './util/payload-directory.js';

export type { Entry, EntryFlags, Payload, ManifestFile, ManifestEntry } from './types/archive.js';
export type { ManifestTarget, PayloadSink, PayloadSource, ManifestOptions, SizeMismatch } from './manifest-bridge.js';
export type { ExtractedArchive } from './archive-extractor.js';
export type { RebuiltArchive } from './archive-builder.js';
export type { MessageCode } from './messages.js';
