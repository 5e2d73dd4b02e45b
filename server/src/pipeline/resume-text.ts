import { InvalidInputError } from '../lib/errors.js';
import type { Contact, Resume, ResumeEntry, ResumeSection } from './types.js';

const MARKDOWN_HEADING = /^#{1,6}\s+(.+)$/;
const BULLET = /^(?:[•\-*–·]|\d+[.)])\s+(.+)$/;
const EMAIL = /[^\s@|,;]+@[^\s@|,;]+\.[A-Za-z]{2,}/;
const PHONE = /^\+?[\d\s().-]{7,}$/;
const LINK = /^(?:https?:\/\/\S+|(?:www\.)?(?:linkedin\.com|github\.com)\/\S+)$/i;
const YEAR_OR_PRESENT = /\b(?:19|20)\d{2}\b|\bpresent\b|\bcurrent\b/i;
const MAX_HEADING_CHARS = 40;
const MAX_PERIOD_CHARS = 40;
const PROSE_SECTION = /^(?:(?:professional\s+)?summary|profile|objective|about(?:\s+me)?)$/i;

function isAllCapsHeading(line: string): boolean {
  if (line.length > MAX_HEADING_CHARS || BULLET.test(line)) return false;
  if (!/[A-Z]/.test(line) || /[a-z]/.test(line)) return false;
  return /^[A-Z][A-Z0-9 &/,'-]*:?$/.test(line);
}

function headingText(line: string): string | null {
  const md = MARKDOWN_HEADING.exec(line);
  if (md) return md[1].trim();
  if (isAllCapsHeading(line)) return line.replace(/:$/, '').trim();
  return null;
}

export function slugify(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'section';
}

function isPeriod(text: string): boolean {
  return text.length <= MAX_PERIOD_CHARS && YEAR_OR_PRESENT.test(text);
}

function parseContact(name: string, lines: string[]): Contact {
  const contact: Contact = { name, links: [] };
  for (const line of lines) {
    for (const piece of line.split(/\s*[|•·]\s*/).map((p) => p.trim()).filter(Boolean)) {
      const email = EMAIL.exec(piece);
      if (email && !contact.email) contact.email = email[0];
      else if (LINK.test(piece)) contact.links.push(piece);
      else if (PHONE.test(piece) && !contact.phone) contact.phone = piece;
      else if (!contact.location) contact.location = piece;
    }
  }
  return contact;
}

/** Read "Title | Organization | Period" or "Title at Organization" into an entry. */
function applyHeaderLine(entry: ResumeEntry, line: string): void {
  const pieces = line.split(/\s+\|\s+/).map((p) => p.trim()).filter(Boolean);
  const rest: string[] = [];
  for (const piece of pieces) {
    if (!entry.period && isPeriod(piece) && pieces.length > 1) entry.period = piece;
    else rest.push(piece);
  }
  if (rest.length >= 2) {
    entry.title = rest[0];
    entry.organization = rest.slice(1).join(' | ');
    return;
  }
  const at = /^(.+?)\s+at\s+(.+)$/.exec(rest[0] ?? '');
  if (at) {
    entry.title = at[1].trim();
    entry.organization = at[2].trim();
    return;
  }
  entry.title = rest[0];
}

class SectionBuilder {
  readonly entries: ResumeEntry[] = [];
  private current: ResumeEntry | null = null;

  private readonly prose: boolean;

  constructor(readonly id: string, readonly title: string) {
    this.prose = PROSE_SECTION.test(title);
  }

  line(text: string): void {
    const entry = (this.current ??= { highlights: [] });
    const bullet = BULLET.exec(text);
    if (bullet) {
      entry.highlights.push(bullet[1].trim());
      return;
    }
    const startedBody = this.prose || entry.highlights.length > 0 || entry.summary !== undefined;
    if (!startedBody && !entry.period && !text.includes(' | ') && isPeriod(text)) {
      entry.period = text;
    } else if (!startedBody && !entry.title) {
      applyHeaderLine(entry, text);
    } else {
      entry.summary = entry.summary ? `${entry.summary} ${text}` : text;
    }
  }

  endEntry(): void {
    if (this.current) this.entries.push(this.current);
    this.current = null;
  }

  build(): ResumeSection {
    this.endEntry();
    return { id: this.id, title: this.title, entries: this.entries };
  }
}

/**
 * Parse plain-text resume content into the structured model.
 *
 * The first line is the candidate's name and the lines after it, up to the
 * first blank line or heading, are contact details. Headings are markdown
 * `#` lines or short ALL-CAPS lines. Within a section, blank lines separate
 * entries and bullet lines become highlights. Text before the first heading
 * lands in a "Summary" section.
 */
export function parseResumeText(text: string): Resume {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map((l) => l.trim());
  let i = 0;
  while (i < lines.length && !lines[i]) i += 1;
  if (i >= lines.length) {
    throw new InvalidInputError('Resume text is empty', ['resume: empty']);
  }

  const name = headingText(lines[i]) ?? lines[i];
  i += 1;
  const contactLines: string[] = [];
  while (i < lines.length && lines[i] && headingText(lines[i]) === null) {
    contactLines.push(lines[i]);
    i += 1;
  }

  const sections: ResumeSection[] = [];
  const usedIds = new Set<string>();
  let builder: SectionBuilder | null = null;

  const open = (title: string): SectionBuilder => {
    const base = slugify(title);
    let id = base;
    for (let n = 2; usedIds.has(id); n += 1) id = `${base}-${n}`;
    usedIds.add(id);
    return new SectionBuilder(id, title);
  };

  for (; i < lines.length; i += 1) {
    const line = lines[i];
    const heading = line ? headingText(line) : null;
    if (heading !== null) {
      if (builder) sections.push(builder.build());
      builder = open(heading);
    } else if (!line) {
      builder?.endEntry();
    } else {
      builder ??= open('Summary');
      builder.line(line);
    }
  }
  if (builder) sections.push(builder.build());

  return { contact: parseContact(name, contactLines), sections };
}
