import { isTag, type Element } from "domhandler";
import fs from "fs-extra";
import { collapseWhitespace, type ParsedDocument } from "./document.js";
import { ConfigError, errorMessage } from "./errors.js";

export interface ExtractionRule {
  selector: string;
  /** "text" for the element text, otherwise the attribute to read. Defaults to "text". */
  attribute?: string;
  /** Collect every match instead of the first. */
  all?: boolean;
}

export type ExtractionRules = Record<string, ExtractionRule>;

export type ExtractedValue = string | string[] | null;

export interface SelectedElement {
  text: string;
  html: string;
  attributes: Record<string, string>;
  href?: string;
}

export interface PageContent {
  url: string;
  title: string;
  textLength: number;
  statusCode: number;
  contentPreview: string;
}

const PREVIEW_LENGTH = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check an untrusted rules object field by field. */
export function validateExtractionRules(input: unknown): ExtractionRules {
  if (!isRecord(input)) {
    throw new ConfigError("Extraction rules must be a JSON object of field rules");
  }
  const rules: ExtractionRules = {};
  for (const [field, rule] of Object.entries(input)) {
    if (!isRecord(rule) || typeof rule.selector !== "string" || !rule.selector.trim()) {
      throw new ConfigError(`Extraction rule "${field}" needs a non-empty "selector"`);
    }
    if (rule.attribute !== undefined && typeof rule.attribute !== "string") {
      throw new ConfigError(`Extraction rule "${field}" has a non-string "attribute"`);
    }
    if (rule.all !== undefined && typeof rule.all !== "boolean") {
      throw new ConfigError(`Extraction rule "${field}" has a non-boolean "all"`);
    }
    rules[field] = { selector: rule.selector, attribute: rule.attribute, all: rule.all };
  }
  return rules;
}

export async function loadExtractionRules(filePath: string): Promise<ExtractionRules> {
  if (!(await fs.pathExists(filePath))) {
    throw new ConfigError(`Rules file not found: ${filePath}`);
  }
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in rules file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return validateExtractionRules(data);
}

/**
 * Evaluate each rule against the page. Missing single matches yield null; an
 * `all` rule with no matches yields an empty list.
 */
export function applyExtractionRules(
  document: ParsedDocument,
  rules: ExtractionRules
): Record<string, ExtractedValue> {
  const { $ } = document;
  const results: Record<string, ExtractedValue> = {};

  for (const [field, rule] of Object.entries(rules)) {
    const attribute = rule.attribute ?? "text";
    let elements: Element[];
    try {
      elements = $(rule.selector).toArray().filter(isTag);
    } catch {
      // Invalid selectors are reported as a missing value for that field only.
      results[field] = null;
      continue;
    }

    const read = (element: Element): string =>
      attribute === "text" ? $(element).text().trim() : ($(element).attr(attribute) ?? "");

    if (rule.all) {
      results[field] = elements.map(read);
    } else {
      results[field] = elements.length > 0 ? read(elements[0]) : null;
    }
  }

  return results;
}

export function selectElements(document: ParsedDocument, selector: string): SelectedElement[] {
  const { $ } = document;
  return $(selector)
    .toArray()
    .filter(isTag)
    .map((element) => {
      const $element = $(element);
      const attributes = { ...element.attribs };
      const selected: SelectedElement = {
        text: $element.text(),
        html: $.html(element),
        attributes,
      };
      if (attributes.href !== undefined) {
        selected.href = attributes.href;
      }
      return selected;
    });
}

export function extractPageContent(document: ParsedDocument, statusCode: number): PageContent {
  const { $ } = document;
  const text = $("body").text().trim() || collapseWhitespace($.root().text());
  return {
    url: document.pageUrl,
    title: document.title,
    textLength: text.length,
    statusCode,
    contentPreview: text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text,
  };
}
