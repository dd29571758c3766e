import { AUTO_DETECTED_MARKER, AUTO_SET_MARKER } from './template.ts';

export type EditStatus = 'applied' | 'not_found' | 'skipped';

export interface EditOutcome {
  rule: string;
  status: EditStatus;
  detail?: string;
}

const MARKERS = [AUTO_DETECTED_MARKER, AUTO_SET_MARKER];

function markedAt(text: string, index: number): boolean {
  const rest = text.slice(index).replace(/^[ \t]+/, '');
  return MARKERS.some((marker) => rest.startsWith(marker));
}

/** First occurrence of `find` that is not already followed by a generator marker. */
function indexOfUnmarked(text: string, find: string): number {
  let from = 0;
  for (;;) {
    const index = text.indexOf(find, from);
    if (index < 0) return -1;
    if (!markedAt(text, index + find.length)) return index;
    from = index + 1;
  }
}

/**
 * Accumulates template edits and records, per rule, whether it took effect.
 */
export class TemplateEditor {
  #text: string;
  readonly #outcomes: EditOutcome[] = [];

  constructor(text: string) {
    this.#text = text;
  }

  get text(): string {
    return this.#text;
  }

  /**
   * Replaces the first occurrence of `find`, skipping one a previous run already marked.
   * `$` in `replacement` is not special.
   */
  replaceFirst(rule: string, find: string, replacement: string): boolean {
    const index = indexOfUnmarked(this.#text, find);
    if (index < 0) {
      this.#outcomes.push({ rule, status: 'not_found' });
      return false;
    }
    this.#text = this.#text.slice(0, index) + replacement + this.#text.slice(index + find.length);
    this.#outcomes.push({ rule, status: 'applied' });
    return true;
  }

  update(rule: string, edit: (text: string) => string | undefined, detail?: string): void {
    const next = edit(this.#text);
    if (next === undefined) {
      this.#outcomes.push({ rule, status: 'not_found', detail });
      return;
    }
    this.#text = next;
    this.#outcomes.push({ rule, status: 'applied', detail });
  }

  skip(rule: string, detail: string): void {
    this.#outcomes.push({ rule, status: 'skipped', detail });
  }

  outcomes(): EditOutcome[] {
    return [...this.#outcomes];
  }
}
