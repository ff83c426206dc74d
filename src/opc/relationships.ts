import { forEachXmlTag } from "../xml/parser.js";

/** A single relationship entry from a .rels file */
export interface Relationship {
	id: string;
	type: string;
	/** Package path for internal targets (no leading slash); the raw target for external ones */
	target: string;
	external: boolean;
}

/** Relationships of one part, keyed by rId */
export type Relationships = Map<string, Relationship>;

/**
 * Resolve a relative target path against the part that owns the relationship.
 * Handles ".." segments to navigate up the directory tree.
 * Absolute targets ("/xl/...") are taken from the package root.
 * @returns a package path without leading slash
 */
export function resolveTarget(target: string, ownerPath: string): string {
	const joined = target.charAt(0) === "/" ? target : ownerPath.slice(0, ownerPath.lastIndexOf("/") + 1) + target;
	const resolved: string[] = [];
	for (const p of joined.split("/")) {
		if (p === "..") {
			resolved.pop();
		} else if (p !== "." && p !== "") {
			resolved.push(p);
		}
	}
	return resolved.join("/");
}

/**
 * Get the conventional .rels file path for a given OPC part.
 * For example, "xl/workbook.xml" becomes "xl/_rels/workbook.xml.rels",
 * and the package root "" becomes "_rels/.rels".
 */
export function getRelsPath(file: string): string {
	const n = file.lastIndexOf("/");
	return file.slice(0, n + 1) + "_rels/" + file.slice(n + 1) + ".rels";
}

/**
 * Parse a .rels XML file.
 * @param data - raw XML of the .rels part
 * @param relsPath - path of the .rels part, used in error messages
 * @param ownerPath - the part that owns these relationships ("" for the package root)
 */
export function parseRelationships(data: string, relsPath: string, ownerPath: string): Relationships {
	const rels: Relationships = new Map();
	forEachXmlTag(data, relsPath, (tag) => {
		if (tag.name !== "Relationship" || tag.kind === "close") {
			return;
		}
		const { Id: id, Type: type = "", Target: target = "", TargetMode: mode } = tag.attrs;
		if (!id) {
			return;
		}
		const external = mode === "External";
		rels.set(id, { id, type, target: external ? target : resolveTarget(target, ownerPath), external });
	});
	return rels;
}
