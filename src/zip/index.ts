import { deflateRawSync, inflateRawSync } from "node:zlib";
import { crc32 } from "./crc32.js";
import { InvalidArchiveError } from "../errors.js";

/** One member of a ZIP archive as it appears on disk. */
export interface ZipEntry {
	name: string;
	/** Compression method (0 = stored, 8 = deflate) */
	method: number;
	/** General purpose bit flags */
	flags: number;
	crc: number;
	compressedSize: number;
	uncompressedSize: number;
	/** Local header, name, extra field, data and optional data descriptor, verbatim */
	record: Uint8Array;
	/** Central directory header including name, extra field and comment, verbatim */
	central: Uint8Array;
}

/** In-memory representation of a ZIP archive. */
export interface ZipArchive {
	/** Map of file paths to their uncompressed contents. */
	files: Record<string, Uint8Array>;
	/** Entries in central directory order; empty for archives built in memory */
	entries: ZipEntry[];
	/** Archive comment from the End of Central Directory record */
	comment: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// -- ZIP format signatures (little-endian magic numbers) --
/** Local file header signature: "PK\x03\x04" */
const SIG_LOCAL = 0x04034b50;
/** Central directory file header signature: "PK\x01\x02" */
const SIG_CENTRAL = 0x02014b50;
/** End of Central Directory record signature: "PK\x05\x06" */
const SIG_EOCD = 0x06054b50;
/** Optional data descriptor signature: "PK\x07\x08" */
const SIG_DESCRIPTOR = 0x08074b50;

/** Bit 3: sizes and CRC follow the data in a data descriptor */
const FLAG_DESCRIPTOR = 0x0008;
/** Bit 11: file name is UTF-8 */
const FLAG_UTF8 = 0x0800;

/** Read an unsigned 16-bit little-endian integer from a buffer */
export function readU16(buf: Uint8Array, off: number): number {
	return buf[off] | (buf[off + 1] << 8);
}

/** Read an unsigned 32-bit little-endian integer from a buffer */
export function readU32(buf: Uint8Array, off: number): number {
	return (buf[off] | (buf[off + 1] << 8) | (buf[off + 2] << 16) | (buf[off + 3] << 24)) >>> 0;
}

/** Write an unsigned 16-bit little-endian integer to a buffer */
function writeU16(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
}

/** Write an unsigned 32-bit little-endian integer to a buffer */
function writeU32(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
	buf[off + 2] = (val >> 16) & 0xff;
	buf[off + 3] = (val >> 24) & 0xff;
}

function ensureRange(data: Uint8Array, start: number, length: number, what: string): void {
	if (start < 0 || start + length > data.length) {
		throw new InvalidArchiveError(`Invalid ZIP: ${what} extends past end of data`);
	}
}

function findEocd(data: Uint8Array): number {
	// EOCD is at least 22 bytes, max 65557 with comment
	for (let i = data.length - 22; i >= 0 && i >= data.length - 65557; i--) {
		if (readU32(data, i) === SIG_EOCD) {
			return i;
		}
	}
	return -1;
}

/**
 * Parse a ZIP archive from raw bytes.
 *
 * Locates the End of Central Directory (EOCD) record by scanning backward,
 * then reads the central directory to find all file entries. Deflated entries
 * are inflated synchronously. Every entry also keeps its raw on-disk records so
 * that {@link zipPatch} can copy it without recompressing.
 *
 * @throws InvalidArchiveError if the ZIP structure is unreadable or uses an unsupported feature
 */
export function zipRead(data: Uint8Array): ZipArchive {
	if (data.length < 22) {
		throw new InvalidArchiveError("Invalid ZIP: data too short");
	}
	const eocdOffset = findEocd(data);
	if (eocdOffset === -1) {
		throw new InvalidArchiveError("Invalid ZIP: EOCD not found");
	}

	// EOCD layout: +10 = total entries, +12 = CD size, +16 = CD offset, +20 = comment length
	const cdEntries = readU16(data, eocdOffset + 10);
	const cdOffset = readU32(data, eocdOffset + 16);
	const commentLen = readU16(data, eocdOffset + 20);
	if (cdEntries === 0xffff || cdOffset === 0xffffffff) {
		throw new InvalidArchiveError("Invalid ZIP: ZIP64 archives are not supported");
	}

	const files: Record<string, Uint8Array> = {};
	const entries: ZipEntry[] = [];
	let pos = cdOffset;
	for (let i = 0; i < cdEntries; i++) {
		ensureRange(data, pos, 46, "central directory");
		if (readU32(data, pos) !== SIG_CENTRAL) {
			throw new InvalidArchiveError("Invalid ZIP: bad central directory entry");
		}
		const flags = readU16(data, pos + 8);
		const method = readU16(data, pos + 10); // compression method (0=stored, 8=deflate)
		const crc = readU32(data, pos + 16);
		const compressedSize = readU32(data, pos + 20);
		const uncompressedSize = readU32(data, pos + 24);
		const nameLen = readU16(data, pos + 28);
		const extraLen = readU16(data, pos + 30);
		const entryCommentLen = readU16(data, pos + 32);
		const localOffset = readU32(data, pos + 42); // offset to local file header
		const centralLen = 46 + nameLen + extraLen + entryCommentLen;
		ensureRange(data, pos, centralLen, "central directory entry");
		const name = decoder.decode(data.subarray(pos + 46, pos + 46 + nameLen));
		const central = data.subarray(pos, pos + centralLen);
		pos += centralLen;

		ensureRange(data, localOffset, 30, "local file header");
		if (readU32(data, localOffset) !== SIG_LOCAL) {
			throw new InvalidArchiveError(`Invalid ZIP: bad local file header for ${name}`);
		}
		const dataStart = localOffset + 30 + readU16(data, localOffset + 26) + readU16(data, localOffset + 28);
		ensureRange(data, dataStart, compressedSize, `data of ${name}`);
		let recordEnd = dataStart + compressedSize;
		if (flags & FLAG_DESCRIPTOR) {
			// Descriptor: optional signature, crc, compressed size, uncompressed size
			recordEnd += recordEnd + 4 <= data.length && readU32(data, recordEnd) === SIG_DESCRIPTOR ? 16 : 12;
			ensureRange(data, localOffset, recordEnd - localOffset, `data descriptor of ${name}`);
		}

		entries.push({
			name,
			method,
			flags,
			crc,
			compressedSize,
			uncompressedSize,
			record: data.subarray(localOffset, recordEnd),
			central,
		});

		// Directory entries carry no content
		if (name.endsWith("/")) {
			continue;
		}
		const compressed = data.subarray(dataStart, dataStart + compressedSize);
		if (method === 0) {
			files[name] = compressed;
		} else if (method === 8) {
			try {
				files[name] = new Uint8Array(inflateRawSync(compressed));
			} catch (error) {
				throw new InvalidArchiveError(`Invalid ZIP: cannot inflate ${name}`, { cause: error });
			}
		} else {
			throw new InvalidArchiveError(`Unsupported ZIP compression method ${method} for ${name}`);
		}
	}

	return { files, entries, comment: data.subarray(eocdOffset + 22, eocdOffset + 22 + commentLen) };
}

/** Header fields for a freshly written entry */
interface NewEntry {
	nameBytes: Uint8Array;
	method: number;
	flags: number;
	crc: number;
	data: Uint8Array;
	uncompressedSize: number;
	/** Central header fields carried over from the entry being replaced */
	template?: Uint8Array;
}

function compressEntry(name: string, content: Uint8Array, compress: boolean, level: number, template?: Uint8Array): NewEntry {
	const data = compress ? new Uint8Array(deflateRawSync(content, { level })) : content;
	return {
		nameBytes: encoder.encode(name),
		method: compress ? 8 : 0,
		flags: FLAG_UTF8,
		crc: crc32(content),
		data,
		uncompressedSize: content.length,
		template,
	};
}

function localHeader(entry: NewEntry): Uint8Array {
	const buf = new Uint8Array(30 + entry.nameBytes.length);
	writeU32(buf, 0, SIG_LOCAL);
	writeU16(buf, 4, 20); // version needed to extract (2.0)
	writeU16(buf, 6, entry.flags);
	writeU16(buf, 8, entry.method);
	writeU16(buf, 10, entry.template ? readU16(entry.template, 12) : 0); // last mod file time
	writeU16(buf, 12, entry.template ? readU16(entry.template, 14) : 0x21); // last mod file date (1980-01-01)
	writeU32(buf, 14, entry.crc);
	writeU32(buf, 18, entry.data.length);
	writeU32(buf, 22, entry.uncompressedSize);
	writeU16(buf, 26, entry.nameBytes.length);
	writeU16(buf, 28, 0); // extra field length
	buf.set(entry.nameBytes, 30);
	return buf;
}

function centralHeader(entry: NewEntry, localOffset: number): Uint8Array {
	const buf = new Uint8Array(46 + entry.nameBytes.length);
	const t = entry.template;
	writeU32(buf, 0, SIG_CENTRAL);
	writeU16(buf, 4, t ? readU16(t, 4) : 20); // version made by
	writeU16(buf, 6, 20); // version needed to extract (2.0)
	writeU16(buf, 8, entry.flags);
	writeU16(buf, 10, entry.method);
	writeU16(buf, 12, t ? readU16(t, 12) : 0);
	writeU16(buf, 14, t ? readU16(t, 14) : 0x21);
	writeU32(buf, 16, entry.crc);
	writeU32(buf, 20, entry.data.length);
	writeU32(buf, 24, entry.uncompressedSize);
	writeU16(buf, 28, entry.nameBytes.length);
	writeU16(buf, 30, 0); // extra field length
	writeU16(buf, 32, 0); // file comment length
	writeU16(buf, 34, 0); // disk number start
	writeU16(buf, 36, t ? readU16(t, 36) : 0); // internal file attributes
	writeU32(buf, 38, t ? readU32(t, 38) : 0); // external file attributes
	writeU32(buf, 42, localOffset);
	buf.set(entry.nameBytes, 46);
	return buf;
}

function endOfCentralDirectory(count: number, cdSize: number, cdStart: number, comment: Uint8Array): Uint8Array {
	const buf = new Uint8Array(22 + comment.length);
	writeU32(buf, 0, SIG_EOCD);
	writeU16(buf, 4, 0); // number of this disk
	writeU16(buf, 6, 0); // disk where CD starts
	writeU16(buf, 8, count);
	writeU16(buf, 10, count);
	writeU32(buf, 12, cdSize);
	writeU32(buf, 16, cdStart);
	writeU16(buf, 20, comment.length);
	buf.set(comment, 22);
	return buf;
}

function concat(chunks: Uint8Array[]): Uint8Array {
	let total = 0;
	for (const chunk of chunks) {
		total += chunk.length;
	}
	const out = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		out.set(chunk, offset);
		offset += chunk.length;
	}
	return out;
}

/** Options for writing archives */
export interface ZipWriteOptions {
	/** Deflate entries (default: stored uncompressed) */
	compress?: boolean;
	/** zlib level used when deflating (default 6) */
	level?: number;
}

/**
 * Serialize the `files` of a {@link ZipArchive} to raw ZIP file bytes.
 *
 * Writes local file headers, central directory, and EOCD record.
 */
export function zipWrite(archive: Pick<ZipArchive, "files">, options: ZipWriteOptions = {}): Uint8Array {
	const level = options.level ?? 6;
	const locals: Uint8Array[] = [];
	const centrals: Uint8Array[] = [];
	let offset = 0;
	for (const name of Object.keys(archive.files)) {
		const entry = compressEntry(name, archive.files[name], options.compress ?? false, level);
		const header = localHeader(entry);
		centrals.push(centralHeader(entry, offset));
		locals.push(header, entry.data);
		offset += header.length + entry.data.length;
	}
	const cdSize = centrals.reduce((sum, c) => sum + c.length, 0);
	return concat([...locals, ...centrals, endOfCentralDirectory(centrals.length, cdSize, offset, new Uint8Array(0))]);
}

/**
 * Rebuild an archive read by {@link zipRead}, replacing the content of some members.
 *
 * Untouched members keep their original local records and central headers byte for
 * byte (only the local header offset in the central record is updated); replaced
 * members are deflated anew. Entry order and the archive comment are preserved.
 *
 * @param archive - Archive previously returned by {@link zipRead}
 * @param replacements - New uncompressed content keyed by member name
 * @param level - zlib level for replaced members
 */
export function zipPatch(archive: ZipArchive, replacements: ReadonlyMap<string, Uint8Array>, level = 6): Uint8Array {
	const chunks: Uint8Array[] = [];
	const centrals: Uint8Array[] = [];
	let offset = 0;
	for (const entry of archive.entries) {
		const replacement = replacements.get(entry.name);
		if (replacement === undefined) {
			const central = entry.central.slice();
			writeU32(central, 42, offset);
			centrals.push(central);
			chunks.push(entry.record);
			offset += entry.record.length;
			continue;
		}
		const fresh = compressEntry(entry.name, replacement, true, level, entry.central);
		const header = localHeader(fresh);
		centrals.push(centralHeader(fresh, offset));
		chunks.push(header, fresh.data);
		offset += header.length + fresh.data.length;
	}
	const cdSize = centrals.reduce((sum, c) => sum + c.length, 0);
	return concat([...chunks, ...centrals, endOfCentralDirectory(centrals.length, cdSize, offset, archive.comment)]);
}

/**
 * Read a file from a ZIP archive as a UTF-8 string.
 *
 * Falls back to trying with/without a leading slash if the exact path is not found.
 *
 * @returns Decoded string, or `null` if the file is not found
 */
export function zipReadString(archive: Pick<ZipArchive, "files">, path: string): string | null {
	const data = zipReadData(archive, path);
	return data ? decoder.decode(data) : null;
}

/**
 * Look up a member's bytes, trying the exact path, the path with or without a
 * leading slash, and finally a case-insensitive match.
 */
export function zipReadData(archive: Pick<ZipArchive, "files">, path: string): Uint8Array | null {
	const exact = archive.files[path];
	if (exact) {
		return exact;
	}
	const normalized = path.startsWith("/") ? path.slice(1) : "/" + path;
	if (archive.files[normalized]) {
		return archive.files[normalized];
	}
	// Case-insensitive fallback for interoperability with different ZIP tools
	const lpath = (path.startsWith("/") ? path.slice(1) : path).toLowerCase();
	for (const k of Object.keys(archive.files)) {
		if (k.toLowerCase() === lpath) {
			return archive.files[k];
		}
	}
	return null;
}
