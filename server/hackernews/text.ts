import { load } from "cheerio";

// Item bodies use bare <p> tags as paragraph separators, with the first
// paragraph left unwrapped.
const PARAGRAPH_BREAK = /<\/?p(?:\s[^>]*)?>/i;

export const htmlToParagraphs = (html: string): string[] =>
  html
    .split(PARAGRAPH_BREAK)
    .map((chunk) => load(chunk, null, false).root().text().trim())
    .filter((paragraph) => paragraph.length > 0);
