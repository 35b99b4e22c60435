/**
 * Citation Ledger
 *
 * Hands out reference numbers to sources in the order they are first seen.
 * One ledger spans the whole run, so the same URL keeps its number across
 * pre-research and the main survey. References are never removed.
 */

export interface SourceReference {
  readonly url: string;
  readonly title: string;
  readonly accessedAt: string;
  readonly referenceNumber: number;
}

export function citationMark(referenceNumber: number): string {
  return `[※${referenceNumber}]`;
}

function escapeLinkText(text: string): string {
  return text.replace(/([[\]])/g, '\\$1');
}

/** Percent-encodes the characters that end a Markdown link destination early. */
export function linkDestination(url: string): string {
  return url.replace(/[\s()<>]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`);
}

export class CitationLedger {
  private readonly byUrl = new Map<string, SourceReference>();
  private nextNumber = 1;

  /**
   * Registers a source and returns its citation mark. Registering a URL that
   * is already known returns the existing mark; the title and access time of
   * the first registration are kept.
   */
  registerSource(url: string, title: string, accessedAt: Date = new Date()): string {
    const existing = this.byUrl.get(url);
    if (existing) {
      return citationMark(existing.referenceNumber);
    }

    const reference: SourceReference = Object.freeze({
      url,
      title,
      accessedAt: accessedAt.toISOString(),
      referenceNumber: this.nextNumber++,
    });
    this.byUrl.set(url, reference);
    return citationMark(reference.referenceNumber);
  }

  allReferences(): SourceReference[] {
    return [...this.byUrl.values()].sort((a, b) => a.referenceNumber - b.referenceNumber);
  }

  referenceByNumber(referenceNumber: number): SourceReference | undefined {
    return this.allReferences().find((ref) => ref.referenceNumber === referenceNumber);
  }

  get size(): number {
    return this.byUrl.size;
  }

  /** `## <title>` followed by one `※N. [title](url)` line per source. */
  toMarkdown(title: string): string {
    const references = this.allReferences();
    if (references.length === 0) {
      return '';
    }

    const lines = references.map(
      (ref) => `※${ref.referenceNumber}. [${escapeLinkText(ref.title || ref.url)}](${linkDestination(ref.url)})`
    );
    return `## ${title}\n\n${lines.join('\n\n')}\n`;
  }
}
