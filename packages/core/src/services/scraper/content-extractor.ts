import * as cheerio from 'cheerio';

const HIDDEN_ELEMENTS = 'head, script, style, noscript, template';

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Main text of an HTML page: all paragraph text, or the page's visible text
 * when it has no paragraphs.
 */
export function extractMainText(html: string): string {
  const $ = cheerio.load(html);

  const paragraphs = $('p')
    .toArray()
    .map((element) => $(element).text())
    .join(' ');

  const paragraphText = collapseWhitespace(paragraphs);
  if (paragraphText) {
    return paragraphText;
  }

  $(HIDDEN_ELEMENTS).remove();
  return collapseWhitespace($.root().text());
}
