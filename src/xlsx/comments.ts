import { expectRoot, forEachXmlTag, parseXmlInt } from "../xml/parser.js";
import { unescapeXml } from "../xml/escape.js";
import { safeDecodeRange } from "../utils/cell.js";
import { RichTextCollector } from "./shared-strings.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Comment } from "../types.js";

/**
 * Decode a comments part (`xl/commentsN.xml`).
 * Comments whose `ref` is not a cell reference are dropped with a warning.
 */
export function parseComments(data: string, part: string, logger: Logger = silentLogger()): Comment[] {
	expectRoot(data, part, "comments");
	const authors: string[] = [];
	const comments: Comment[] = [];
	let authorStart = -1;
	let current: { ref: string; authorId: number; body: RichTextCollector } | undefined;

	forEachXmlTag(data, part, (tag) => {
		if (tag.name === "author") {
			if (tag.kind === "open") {
				authorStart = tag.end;
			} else if (tag.kind === "close") {
				authors.push(unescapeXml(data.slice(authorStart, tag.start)));
			} else {
				authors.push("");
			}
			return;
		}
		if (tag.name === "comment" && tag.kind !== "close") {
			current = { ref: tag.attrs.ref ?? "", authorId: parseXmlInt(tag.attrs.authorId) ?? 0, body: new RichTextCollector(data) };
			if (tag.kind === "open") {
				return;
			}
		}
		if (!current) {
			return;
		}
		if (tag.name !== "comment") {
			current.body.visit(tag);
			return;
		}
		const range = safeDecodeRange(current.ref);
		if (range) {
			comments.push({
				ref: current.ref,
				r: range.s.r,
				c: range.s.c,
				author: authors[current.authorId] ?? "",
				text: current.body.finish().text,
			});
		} else {
			logger.warn({ part, ref: current.ref }, "comment_ref_invalid");
		}
		current = undefined;
	});
	return comments;
}
