import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { DomHandler, Parser } from "htmlparser2";

/**
 * Retains elements named `element` whose `attribute` equals one of `values`
 * exactly. Attribute values are compared as raw strings, so whitespace is
 * significant.
 */
export interface FilterRule {
  readonly element: string;
  readonly attribute: string;
  readonly values: readonly string[];
}

/**
 * Sections of a listing page that downstream extractors read.
 */
export const DEFAULT_FILTER_RULES: readonly FilterRule[] = Object.freeze([
  // Posting body on detail pages
  { element: "section", attribute: "class", values: ["userbody"] },
  // Inline search result data
  { element: "script", attribute: "type", values: ["text/javascript"] },
  // Trailing space after "search-attribute" is part of the class attribute
  {
    element: "div",
    attribute: "class",
    values: ["search-attribute ", "search-attribute hide-list"],
  },
  { element: "span", attribute: "class", values: ["totalcount"] },
  { element: "ul", attribute: "class", values: ["rows"] },
]);

/**
 * Decides which HTML elements survive parsing. Immutable; one instance can be
 * shared by every concurrent parse.
 */
export class DocumentFilter {
  private readonly rules: readonly FilterRule[];

  constructor(rules: readonly FilterRule[] = DEFAULT_FILTER_RULES) {
    this.rules = Object.freeze(
      rules.map((rule) =>
        Object.freeze({
          element: rule.element.toLowerCase(),
          attribute: rule.attribute,
          values: Object.freeze([...rule.values]),
        }),
      ),
    );
  }

  shouldRetain(
    elementName: string,
    attributes: Readonly<Record<string, string | undefined>>,
  ): boolean {
    const name = elementName.toLowerCase();
    return this.rules.some((rule) => {
      if (rule.element !== name) return false;
      const value = attributes[rule.attribute];
      return value !== undefined && rule.values.includes(value);
    });
  }

  /**
   * Parses `html` and returns a document holding only the retained elements,
   * each with its full subtree, in document order. Elements nested inside a
   * retained element are not duplicated; a retained element inside a dropped
   * one is kept.
   */
  parse(html: string): CheerioAPI {
    const handler = new RetainingDomHandler(this);
    new Parser(handler).end(html);
    return cheerio.load(handler.root, null, false);
  }
}

/**
 * DOM builder that only creates nodes for retained elements and their
 * descendants. Dropped elements only leave a marker on a stack and are never
 * turned into nodes.
 */
class RetainingDomHandler extends DomHandler {
  // One entry per open element: whether it was handed to the DOM builder
  private readonly opened: boolean[] = [];
  private retainedDepth = 0;

  constructor(private readonly filter: DocumentFilter) {
    super();
  }

  onopentag(name: string, attribs: { [key: string]: string }): void {
    if (this.retainedDepth > 0 || this.filter.shouldRetain(name, attribs)) {
      this.opened.push(true);
      this.retainedDepth++;
      super.onopentag(name, attribs);
    } else {
      this.opened.push(false);
    }
  }

  onclosetag(): void {
    if (this.opened.pop()) {
      this.retainedDepth--;
      super.onclosetag();
    }
  }

  ontext(data: string): void {
    if (this.retainedDepth > 0) super.ontext(data);
  }

  oncomment(data: string): void {
    if (this.retainedDepth > 0) super.oncomment(data);
  }

  oncommentend(): void {
    if (this.retainedDepth > 0) super.oncommentend();
  }

  oncdatastart(): void {
    if (this.retainedDepth > 0) super.oncdatastart();
  }

  oncdataend(): void {
    if (this.retainedDepth > 0) super.oncdataend();
  }

  onprocessinginstruction(name: string, data: string): void {
    if (this.retainedDepth > 0) super.onprocessinginstruction(name, data);
  }
}

export const defaultDocumentFilter = new DocumentFilter();
