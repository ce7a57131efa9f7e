import type { ExtractOptions, MarkerPair } from '../types.js';

export interface SectionCodec {
  readonly markers: MarkerPair;
  extract(content: string, options?: ExtractOptions): string[];
  remove(content: string): string;
  inject(content: string, payload: string): string;
  merge(existing: string, payload: string): string;
  isEmpty(section: string): boolean;
}

export function markersFor(owner: string): MarkerPair {
  return {
    start: `# >>> ${owner}'s customizations`,
    end: `# <<< ${owner}'s customizations`,
  };
}

/**
 * Builds the extractor/injector for one marker pair. Markers only count when
 * they occupy a whole line (surrounding blanks and a CR line ending allowed);
 * a span runs from a start line to the first end line after it, so sections
 * never nest.
 */
export function createSectionCodec(markers: MarkerPair): SectionCodec {
  const start = escapeRegExp(markers.start);
  const end = escapeRegExp(markers.end);

  // Group 1 is the payload between the marker lines (plus its final newline)
  const spanSource = `^[ \\t]*${start}[ \\t]*\\r?$\\n?([\\s\\S]*?)^[ \\t]*${end}[ \\t]*\\r?$`;

  const spanRe = () => new RegExp(spanSource, 'gm');
  const removeRe = () => new RegExp(`${spanSource}\\n?`, 'gm');

  function extract(content: string, options: ExtractOptions = { withTags: true }): string[] {
    const sections: string[] = [];
    for (const match of content.matchAll(spanRe())) {
      sections.push(options.withTags ? match[0] : stripFinalNewline(match[1]));
    }
    return sections;
  }

  function remove(content: string): string {
    return content.replace(removeRe(), '').trim();
  }

  function inject(content: string, payload: string): string {
    const body = normalizePayload(payload);
    const section = body
      ? `${markers.start}\n${body}\n${markers.end}\n`
      : `${markers.start}\n${markers.end}\n`;

    const base = content.trimEnd();
    return base ? `${base}\n\n${section}` : section;
  }

  function merge(existing: string, payload: string): string {
    return inject(remove(existing), payload);
  }

  /** True when a section, tagged or bare payload, holds nothing but blanks */
  function isEmpty(section: string): boolean {
    const inner = extract(section, { withTags: false });
    return (inner.length > 0 ? inner.join('') : section).trim() === '';
  }

  return { markers, extract, remove, inject, merge, isEmpty };
}

/**
 * Drops blank lines around the payload; indentation of the first real line is kept.
 */
export function normalizePayload(payload: string): string {
  return payload.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd();
}

function stripFinalNewline(text: string): string {
  return text.replace(/\r?\n$/, '');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
