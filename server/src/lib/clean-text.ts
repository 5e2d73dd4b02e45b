/**
 * Remove markdown/HTML emphasis that models add to prose even when asked
 * for plain text. Line breaks are kept; runs of blank lines collapse to one.
 */
export function cleanModelText(text: string): string {
  if (!text) return '';

  let result = text.replace(/\r\n?/g, '\n');

  // <br> variants become newlines, every other tag is dropped
  result = result.replace(/<br\s*\/?>/gi, '\n');
  result = result.replace(/<\/?[A-Za-z][^>]*>/g, '');

  // Remove markdown heading markers (# ## ### etc.)
  result = result.replace(/^#{1,6}\s+/gm, '');

  // Remove bold/italic markers: ***text***, **text**, *text*
  result = result.replace(/\*{1,3}([^*\n]+)\*{1,3}/g, '$1');

  // Remove underscore bold: __text__ (single underscores stay, they appear in identifiers)
  result = result.replace(/__([^_\n]+)__/g, '$1');

  // Remove inline code backticks
  result = result.replace(/`([^`\n]+)`/g, '$1');

  // Remove markdown links: [text](url) -> text
  result = result.replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');

  result = result.replace(/[ \t]+/g, ' ');

  return result
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
