import { zipRead, zipReadData, zipReadString, type ZipArchive } from "../zip/index.js";
import { getRelsPath, parseRelationships, type Relationships } from "../opc/relationships.js";
import { CONTENT_TYPES, parseContentTypes, partsOfType, type ContentTypes } from "../opc/content-types.js";
import { RELS, relTypeIs } from "../xml/namespaces.js";
import { MissingPartError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

/** Read access to the members of an opened `.xlsx` package. */
export interface XlsxPackage {
	readonly archive: ZipArchive;
	readonly contentTypes: ContentTypes;
	/** Path of the main workbook part, e.g. `xl/workbook.xml` */
	readonly workbookPath: string;
	part(path: string): Uint8Array | undefined;
	/** UTF-8 text of a part, or undefined when absent */
	text(path: string): string | undefined;
	/** UTF-8 text of a part that must exist */
	requireText(path: string): string;
	has(path: string): boolean;
	/** Relationships declared by a part; empty when it has no .rels sibling */
	relationshipsOf(partPath: string): Relationships;
}

/**
 * Open a zipped package and locate its workbook part.
 *
 * The workbook is found through the root `officeDocument` relationship, then the
 * content type overrides, then the conventional `xl/workbook.xml` path.
 *
 * @throws InvalidArchiveError when the bytes are not a readable zip
 * @throws MissingPartError when no workbook part exists
 */
export function openPackage(data: Uint8Array, logger: Logger = silentLogger()): XlsxPackage {
	const archive = zipRead(data);
	const relsCache = new Map<string, Relationships>();

	const part = (path: string): Uint8Array | undefined => zipReadData(archive, path) ?? undefined;
	const text = (path: string): string | undefined => zipReadString(archive, path) ?? undefined;
	const relationshipsOf = (partPath: string): Relationships => {
		let rels = relsCache.get(partPath);
		if (rels === undefined) {
			const relsPath = getRelsPath(partPath);
			const data = text(relsPath);
			rels = data === undefined ? new Map() : parseRelationships(data, relsPath, partPath);
			relsCache.set(partPath, rels);
		}
		return rels;
	};

	const ctText = text("[Content_Types].xml");
	const contentTypes = ctText === undefined ? { defaults: new Map<string, string>(), overrides: new Map<string, string>() } : parseContentTypes(ctText);
	if (ctText === undefined) {
		logger.warn({ part: "[Content_Types].xml" }, "part_missing");
	}

	const candidates: string[] = [];
	for (const rel of relationshipsOf("").values()) {
		if (!rel.external && relTypeIs(rel.type, RELS.WB)) {
			candidates.push(rel.target);
		}
	}
	candidates.push(...partsOfType(contentTypes, CONTENT_TYPES.workbook), "xl/workbook.xml");
	const workbookPath = candidates.find((path) => part(path) !== undefined);
	if (workbookPath === undefined) {
		throw new MissingPartError(candidates[0]);
	}
	logger.debug({ part: workbookPath, members: archive.entries.length }, "package_opened");

	return {
		archive,
		contentTypes,
		workbookPath,
		part,
		text,
		requireText(path) {
			const data = text(path);
			if (data === undefined) {
				throw new MissingPartError(path);
			}
			return data;
		},
		has: (path) => zipReadData(archive, path) !== null,
		relationshipsOf,
	};
}
