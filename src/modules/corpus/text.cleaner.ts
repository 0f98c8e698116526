const FOOTER_PATTERNS: RegExp[] = [
  /^copyright\b/i,
  /^all rights reserved\b/i,
  /^всі права захищено\b/i,
  /^все права защищены\b/i,
  /^©/,
];

const SCRIPT_NOISE_PATTERNS: RegExp[] = [
  /^\s*function\s*\(/i,
  /^\s*var\s+[a-zA-Z_$]/,
  /^\s*\$\(/,
  /^\s*window\./,
  /^\s*document\./,
];

function normalizeQuotes(input: string): string {
  return input
    .replace(/[“”„‟«»]/g, "\"")
    .replace(/[‘’‚‛]/g, "'");
}

function cleanupWhitespace(input: string): string {
  return input
    .replace(/\u00a0/g, " ")
    .replace(/\t/g, " ")
    .replace(/[ ]{2,}/g, " ")
    .replace(/\r/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function shouldDropLine(line: string): boolean {
  if (line.length === 0) return false;
  if (FOOTER_PATTERNS.some((pattern) => pattern.test(line))) return true;
  return SCRIPT_NOISE_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Normalises whitespace and quotes and drops footer and inline-script
 * lines. Line structure is kept, so markdown headings survive.
 */
export function cleanText(input: string): string {
  if (!input || input.trim().length === 0) return "";

  const base = cleanupWhitespace(normalizeQuotes(input));

  const cleanedLines: string[] = [];
  for (const line of base.split("\n")) {
    const compact = line.trim();
    if (shouldDropLine(compact)) continue;
    cleanedLines.push(compact);
  }

  return cleanupWhitespace(cleanedLines.join("\n"));
}

/**
 * Flattens a fragment of markdown or HTML to a single line of plain text:
 * tags, headings, links, emphasis and `Q:`/`A:` style prefixes go.
 */
export function stripMarkup(text: string): string {
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/#{1,6}\s+/g, "")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/^[QA]:\s*/gm, "")
    .replace(/^[ВО]:\s*/gm, "")
    .replace(/\s+/g, " ")
    .trim();
}
