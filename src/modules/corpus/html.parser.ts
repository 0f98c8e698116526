import { CheerioAPI, load } from "cheerio";

type BlockTag = "h1" | "h2" | "h3" | "p" | "li";

export interface HtmlContentBlock {
  tag: BlockTag;
  text: string;
}

export interface ParsedHtmlDocument {
  title: string;
  blocks: HtmlContentBlock[];
  /** Blocks joined one per line, headings written as markdown headings. */
  text: string;
}

const DROP_SELECTORS: string[] = [
  "script",
  "style",
  "noscript",
  "iframe",
  "header",
  "footer",
  "nav",
  "#breadcrumbs",
  ".breadcrumbs",
  ".cookie",
  ".cookies",
  ".sidebar",
  ".menu",
];

const CONTENT_SELECTORS: string[] = ["main article", "main", "article", ".content", "body"];

const MIN_CONTENT_LENGTH = 120;

const HEADING_PREFIX: Record<BlockTag, string> = {
  h1: "# ",
  h2: "## ",
  h3: "### ",
  p: "",
  li: "",
};

const BLOCK_TAGS = new Set<string>(Object.keys(HEADING_PREFIX));

function isBlockTag(tag: string): tag is BlockTag {
  return BLOCK_TAGS.has(tag);
}

function pickContentRoot($: CheerioAPI) {
  for (const selector of CONTENT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length > 0 && candidate.text().replace(/\s+/g, " ").trim().length >= MIN_CONTENT_LENGTH) {
      return candidate;
    }
  }
  return $("body").first();
}

function collectBlocks(
  $: CheerioAPI,
  contentRoot: ReturnType<typeof pickContentRoot>
): HtmlContentBlock[] {
  const root = contentRoot.clone();
  root.find(DROP_SELECTORS.join(", ")).remove();

  const blocks: HtmlContentBlock[] = [];
  const seen = new Set<string>();

  root.find("h1, h2, h3, p, li").each((_index, el) => {
    const tag = el.tagName.toLowerCase();
    if (!isBlockTag(tag)) return;

    const text = $(el).text().replace(/\s+/g, " ").trim();
    if (text.length <= 1) return;

    const key = `${tag}:${text.toLowerCase()}`;
    if (!seen.has(key)) {
      seen.add(key);
      blocks.push({ tag, text });
    }
  });

  return blocks;
}

/**
 * Picks the main content element of a page, strips navigation and
 * boilerplate and keeps headings, paragraphs and list items once each.
 */
export function parseHtmlDocument(html: string): ParsedHtmlDocument {
  const $ = load(html);
  const blocks = collectBlocks($, pickContentRoot($));

  const title =
    $("h1").first().text().trim() || $("title").first().text().trim() || "Untitled page";

  return {
    title,
    blocks,
    text: blocks.map((block) => `${HEADING_PREFIX[block.tag]}${block.text}`).join("\n"),
  };
}
