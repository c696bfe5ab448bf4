import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import type { ExtractionError } from "../shared/errors.js";
import { errorMessage } from "../shared/errors.js";
import type { PartialRecord } from "../shared/record.js";
import { canonicalizeUrl, isDocumentUrl } from "./url.js";

export type EntryResult = { ok: true; record: PartialRecord } | { ok: false; error: ExtractionError };

const ENTRY_SELECTOR = "article, li.post, div.post, .wp-block-post";
const HEADING_SELECTOR = "h1, h2, h3, h4";
const DATE_SELECTOR = ".date, .post-date, .entry-date, .published";
const CONTENT_SELECTORS = [".entry-content", "article", "main"];
const BLOCK_SELECTOR = "p, h1, h2, h3, h4, h5, h6, li, blockquote, pre, figcaption";

const GENERIC_LINK_TEXT = new Set([
  "read more",
  "read the economic letter",
  "economic letter",
  "continue reading",
  "learn more",
  "download pdf",
  "pdf"
]);

const clean = (value: string | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();

const meaningfulText = (value: string | undefined): string => {
  const text = clean(value);
  return GENERIC_LINK_TEXT.has(text.toLowerCase()) ? "" : text;
};

const pad = (value: number) => String(value).padStart(2, "0");

/** YYYY-MM-DD from the first candidate that parses, then from a /YYYY/MM/ URL segment, else null. */
export const parsePublicationDate = (candidates: Array<string | undefined>, url?: string): string | null => {
  for (const raw of candidates) {
    const value = clean(raw);
    if (!value) continue;
    const iso = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (iso) {
      const [, year, month, day] = iso;
      const check = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
      if (check.getUTCMonth() === Number(month) - 1 && check.getUTCDate() === Number(day)) {
        return `${year}-${month}-${day}`;
      }
      continue;
    }
    const yearMonth = value.match(/^(\d{4})-(\d{2})$/);
    if (yearMonth) {
      const month = Number(yearMonth[2]);
      if (month >= 1 && month <= 12) return `${yearMonth[1]}-${yearMonth[2]}-01`;
      continue;
    }
    // Drop any time of day and zone so the date parses as written, in local time.
    const dateOnly = value.replace(/[T\s]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?.*$/, "").replace(/\s+(?:GMT|UTC|Z)$/, "");
    const date = new Date(dateOnly);
    if (!Number.isNaN(date.getTime())) {
      return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    }
  }
  const fromUrl = url?.match(/\/(\d{4})\/(\d{2})\//);
  if (fromUrl) {
    const month = Number(fromUrl[2]);
    if (month >= 1 && month <= 12) return `${fromUrl[1]}-${fromUrl[2]}-01`;
  }
  return null;
};

type EntryContext = {
  $: CheerioAPI;
  rootUrl: string;
  pageUrl: string;
  index: number;
};

const entryError = (ctx: EntryContext, message: string, url?: string): EntryResult => ({
  ok: false,
  error: { scope: "entry", message, page_url: ctx.pageUrl, entry_index: ctx.index, url }
});

const resolveDocumentUrl = (href: string, ctx: EntryContext): string | null => {
  try {
    const url = canonicalizeUrl(href, ctx.pageUrl);
    return isDocumentUrl(url, ctx.rootUrl) ? url : null;
  } catch {
    return null;
  }
};

const findSummary = ($: CheerioAPI, $scope: Cheerio<AnyNode>, title: string): string | null => {
  const paragraph = $scope
    .find("p")
    .toArray()
    .map((node) => clean($(node).text()))
    .find((text) => text.length > 0 && text !== title);
  return paragraph ?? null;
};

const findDate = ($scope: Cheerio<AnyNode>, url: string): string | null => {
  const time = $scope.find("time").first();
  return parsePublicationDate([time.attr("datetime"), time.text(), $scope.find(DATE_SELECTOR).first().text()], url);
};

const parseContainer = ($entry: Cheerio<Element>, ctx: EntryContext): EntryResult => {
  const heading = $entry.find(HEADING_SELECTOR).first();
  const links = $entry.find("a[href]").toArray().map((node) => ctx.$(node));
  const candidates = [...heading.find("a[href]").toArray().map((node) => ctx.$(node)), ...links];

  let url: string | null = null;
  for (const candidate of candidates) {
    url = resolveDocumentUrl(candidate.attr("href") ?? "", ctx);
    if (url) break;
  }
  if (!url) {
    const href = clean(links[0]?.attr("href"));
    return entryError(ctx, "Entry has no link to a document", href || undefined);
  }

  const title =
    clean(heading.text()) ||
    links.map((candidate) => meaningfulText(candidate.text())).find((text) => text.length > 0) ||
    "";
  if (!title) {
    return entryError(ctx, "Entry has no title", url);
  }

  return {
    ok: true,
    record: {
      title,
      canonical_url: url,
      publication_date: findDate($entry, url),
      summary: findSummary(ctx.$, $entry, title)
    }
  };
};

const parseLinkGroup = (url: string, anchors: Cheerio<Element>[], ctx: EntryContext): EntryResult => {
  const title = anchors.map((anchor) => meaningfulText(anchor.text())).find((text) => text.length > 0);
  if (!title) {
    return entryError(ctx, "Entry has no title", url);
  }
  const scope = anchors[0].closest("li, div, section");
  return {
    ok: true,
    record: {
      title,
      canonical_url: url,
      publication_date: scope.length > 0 ? findDate(scope, url) : parsePublicationDate([], url),
      summary: scope.length > 0 ? findSummary(ctx.$, scope, title) : null
    }
  };
};

function* iterateEntries(markup: string, rootUrl: string, pageUrl: string): Generator<EntryResult> {
  const pageError = (message: string): EntryResult => ({
    ok: false,
    error: { scope: "page", message, page_url: pageUrl }
  });

  let $: CheerioAPI;
  try {
    $ = cheerio.load(markup);
  } catch (error) {
    yield pageError(`Markup could not be parsed: ${errorMessage(error)}`);
    return;
  }

  if ($("body").find("*").length === 0) {
    yield pageError("Markup has no document structure");
    return;
  }

  const seen = new Set<string>();
  const containers = $(ENTRY_SELECTOR)
    .toArray()
    .filter((node) => $(node).parents(ENTRY_SELECTOR).length === 0);

  if (containers.length > 0) {
    let index = 0;
    for (const node of containers) {
      const ctx: EntryContext = { $, rootUrl, pageUrl, index };
      let result: EntryResult;
      try {
        result = parseContainer($(node), ctx);
      } catch (error) {
        result = entryError(ctx, `Entry could not be read: ${errorMessage(error)}`);
      }
      if (result.ok) {
        if (seen.has(result.record.canonical_url)) continue;
        seen.add(result.record.canonical_url);
      }
      index += 1;
      yield result;
    }
    return;
  }

  // No post containers: fall back to every link that points at a document.
  const groups = new Map<string, Cheerio<Element>[]>();
  for (const node of $("a[href]").toArray()) {
    const anchor = $(node);
    const url = resolveDocumentUrl(anchor.attr("href") ?? "", { $, rootUrl, pageUrl, index: 0 });
    if (!url) continue;
    const group = groups.get(url);
    if (group) {
      group.push(anchor);
    } else {
      groups.set(url, [anchor]);
    }
  }

  let index = 0;
  for (const [url, anchors] of groups) {
    const ctx: EntryContext = { $, rootUrl, pageUrl, index };
    try {
      yield parseLinkGroup(url, anchors, ctx);
    } catch (error) {
      yield entryError(ctx, `Entry could not be read: ${errorMessage(error)}`, url);
    }
    index += 1;
  }
}

// Every pass parses the markup again and yields the same entries in order.
export const parseListPage = (markup: string, rootUrl: string, pageUrl: string = rootUrl): Iterable<EntryResult> => ({
  [Symbol.iterator]: () => iterateEntries(markup, rootUrl, pageUrl)
});

export type CollectedPage = {
  records: PartialRecord[];
  errors: ExtractionError[];
  /** No entries at all and no page-level failure: upstream has nothing here. */
  empty: boolean;
};

export const collectListPage = (page: Iterable<EntryResult>): CollectedPage => {
  const records: PartialRecord[] = [];
  const errors: ExtractionError[] = [];
  for (const result of page) {
    if (result.ok) {
      records.push(result.record);
    } else {
      errors.push(result.error);
    }
  }
  return { records, errors, empty: records.length === 0 && errors.length === 0 };
};

export type DetailPage = {
  content: string;
  error?: string;
};

export const parseDetailPage = (markup: string): DetailPage => {
  try {
    const $ = cheerio.load(markup);
    const root = CONTENT_SELECTORS.map((selector) => $<Element, string>(selector).first()).find((candidate) => candidate.length > 0);
    if (!root) {
      return { content: "", error: "No content container found" };
    }
    root.find("script, style, noscript").remove();

    const blocks = root
      .find(BLOCK_SELECTOR)
      .toArray()
      .filter((node) => $(node).parentsUntil(root).filter(BLOCK_SELECTOR).length === 0)
      .map((node) => clean($(node).text()))
      .filter((text) => text.length > 0);

    const content = blocks.length > 0 ? blocks.join("\n") : clean(root.text());
    return content ? { content } : { content: "", error: "Content container is empty" };
  } catch (error) {
    return { content: "", error: `Detail markup could not be parsed: ${errorMessage(error)}` };
  }
};
