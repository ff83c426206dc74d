import { expectRoot, forEachXmlTag, parseXmlInt, parseXmlNumber } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import type { Relationships } from "../opc/relationships.js";
import type { DrawingAnchor, DrawingContent, DrawingMarker } from "../types.js";

const ANCHORS = {
	twoCellAnchor: "twoCell",
	oneCellAnchor: "oneCell",
	absoluteAnchor: "absolute",
} as const;

type AnchorElement = keyof typeof ANCHORS;

function isAnchor(name: string): name is AnchorElement {
	return Object.hasOwn(ANCHORS, name);
}

type MarkerField = keyof DrawingMarker;

function isMarkerField(name: string): name is MarkerField {
	return name === "col" || name === "colOff" || name === "row" || name === "rowOff";
}

interface AnchorDraft {
	anchor: Omit<DrawingAnchor, "content">;
	kind?: DrawingContent["kind"];
	name: string;
	description?: string;
	target?: string;
	paragraphs: string[];
}

/**
 * Decode a drawing part (`xl/drawings/drawingN.xml`) into its anchored objects.
 * Picture and chart targets are resolved through the drawing's relationships.
 */
export function parseDrawing(data: string, part: string, rels: Relationships): DrawingAnchor[] {
	expectRoot(data, part, "wsDr");
	const anchors: DrawingAnchor[] = [];
	let depth = 0;
	let anchorDepth = -1;
	let draft: AnchorDraft | undefined;
	let marker: DrawingMarker | undefined;
	let field: MarkerField | undefined;
	let textStart = -1;

	const target = (relId: string | undefined): string | undefined => {
		const rel = relId ? rels.get(relId) : undefined;
		return rel && !rel.external ? rel.target : undefined;
	};

	forEachXmlTag(data, part, (tag) => {
		const { name, kind, attrs } = tag;
		if (kind === "close") {
			depth--;
			if (!draft) {
				return;
			}
			if (field && name === field) {
				if (marker) {
					marker[field] = parseXmlInt(data.slice(textStart, tag.start)) ?? 0;
				}
				field = undefined;
			} else if ((name === "from" || name === "to") && marker && depth === anchorDepth + 1) {
				draft.anchor[name] = marker;
				marker = undefined;
			} else if (name === "t" && textStart >= 0) {
				const text = unescapeXml(data.slice(textStart, tag.start));
				draft.paragraphs[draft.paragraphs.length - 1] += text;
				textStart = -1;
			} else if (isAnchor(name) && depth === anchorDepth) {
				const content = finishContent(draft, target);
				if (content) {
					anchors.push({ ...draft.anchor, content });
				}
				draft = undefined;
				anchorDepth = -1;
			}
			return;
		}
		const childOfAnchor = draft !== undefined && depth === anchorDepth + 1;
		if (kind === "open") {
			depth++;
		}

		if (isAnchor(name) && !draft) {
			draft = { anchor: { type: ANCHORS[name] }, name: "", paragraphs: [] };
			anchorDepth = depth - 1;
			if (kind === "empty") {
				draft = undefined;
			}
			return;
		}
		if (!draft) {
			return;
		}

		switch (name) {
			case "from":
			case "to":
				if (childOfAnchor) {
					marker = { col: 0, colOff: 0, row: 0, rowOff: 0 };
				}
				break;
			case "ext":
				if (childOfAnchor) {
					draft.anchor.ext = { cx: parseXmlNumber(attrs.cx) ?? 0, cy: parseXmlNumber(attrs.cy) ?? 0 };
				}
				break;
			case "pos":
				if (childOfAnchor) {
					draft.anchor.pos = { x: parseXmlNumber(attrs.x) ?? 0, y: parseXmlNumber(attrs.y) ?? 0 };
				}
				break;
			case "pic":
				draft.kind ??= "picture";
				break;
			case "graphicFrame":
				draft.kind ??= "chart";
				break;
			case "sp":
				draft.kind ??= "shape";
				break;
			case "cNvPr":
				if (!draft.name) {
					draft.name = attrs.name ?? "";
					draft.description = attrs.descr;
				}
				break;
			case "blip":
				if (draft.kind === "picture") {
					draft.target ??= target(attrs.embed);
				}
				break;
			case "chart":
				if (draft.kind === "chart") {
					draft.target ??= attrs.id;
				}
				break;
			case "p":
				draft.paragraphs.push("");
				break;
			case "t":
				if (kind === "open" && draft.paragraphs.length > 0) {
					textStart = tag.end;
				}
				break;
			default:
				if (marker && isMarkerField(name) && kind === "open") {
					field = name;
					textStart = tag.end;
				}
		}
	});
	return anchors;
}

function finishContent(draft: AnchorDraft, target: (relId: string | undefined) => string | undefined): DrawingContent | undefined {
	switch (draft.kind) {
		case "picture":
			return { kind: "picture", name: draft.name, description: draft.description, imagePath: draft.target };
		case "chart":
			return { kind: "chart", name: draft.name, chartPath: target(draft.target) };
		case "shape":
			return { kind: "shape", name: draft.name, text: draft.paragraphs.join("\n") };
	}
	return undefined;
}
