import { isTag, isText } from "domhandler";
import type { ParsedDocument } from "./document.js";
import type { CommentOptions, CommentType, CommentTypeFilter, PageComment } from "./types.js";

const TYPE_FILTERS: Record<CommentTypeFilter, readonly CommentType[]> = {
  html: ["html"],
  javascript: ["javascript_single", "javascript_multi"],
  js_single: ["javascript_single"],
  js_multi: ["javascript_multi"],
};

/** Line numbers for increasing positions of `source`, counted from the previous call. */
function lineCounter(source: string): (position: number) => number {
  let line = 1;
  let scanned = 0;
  return (position) => {
    for (; scanned < position; scanned++) {
      if (source.charCodeAt(scanned) === 10) {
        line++;
      }
    }
    return line;
  };
}

export function extractHtmlComments(html: string): PageComment[] {
  const comments: PageComment[] = [];
  const pattern = /<!--([\s\S]*?)-->/g;
  const lineAt = lineCounter(html);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    const content = match[1].trim();
    if (content) {
      comments.push({
        type: "html",
        content,
        lineStart: lineAt(match.index),
        position: match.index,
        location: "html",
      });
    }
  }
  return comments;
}

/**
 * `//` and `/* *\/` comments of a script body. A `//` right after a colon is
 * the start of a URL, not a comment.
 */
export function extractScriptComments(script: string): PageComment[] {
  const comments: PageComment[] = [];

  const singleLine = /(?<!:)\/\/[ \t]*(.*)$/gm;
  let lineAt = lineCounter(script);
  let match: RegExpExecArray | null;
  while ((match = singleLine.exec(script)) !== null) {
    const content = match[1].trim();
    if (content) {
      comments.push({
        type: "javascript_single",
        content,
        lineStart: lineAt(match.index),
        position: match.index,
        location: "inline_script",
      });
    }
  }

  const multiLine = /\/\*([\s\S]*?)\*\//g;
  lineAt = lineCounter(script);
  while ((match = multiLine.exec(script)) !== null) {
    const content = match[1].trim();
    if (content) {
      comments.push({
        type: "javascript_multi",
        content,
        lineStart: lineAt(match.index),
        position: match.index,
        location: "inline_script",
      });
    }
  }

  return comments;
}

/** HTML comments of the page followed by comments of its inline scripts. */
export function extractComments(document: ParsedDocument): PageComment[] {
  const { $ } = document;
  const comments = extractHtmlComments(document.html);
  for (const script of $("script:not([src])").toArray().filter(isTag)) {
    const body = script.children.map((child) => (isText(child) ? child.data : "")).join("");
    if (body) {
      comments.push(...extractScriptComments(body));
    }
  }
  return comments;
}

export function filterComments(comments: PageComment[], options: CommentOptions = {}): PageComment[] {
  const allowed = options.type ? TYPE_FILTERS[options.type] : null;
  const minLength = options.minLength ?? 0;
  return comments.filter(
    (comment) => (!allowed || allowed.includes(comment.type)) && comment.content.length >= minLength
  );
}

export function countCommentTypes(comments: PageComment[]): Partial<Record<CommentType, number>> {
  const counts: Partial<Record<CommentType, number>> = {};
  for (const comment of comments) {
    counts[comment.type] = (counts[comment.type] ?? 0) + 1;
  }
  return counts;
}
