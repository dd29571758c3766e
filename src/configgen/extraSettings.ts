import { SUITE_SECTION_HEADERS } from './template.ts';

export interface ExtraSetting {
  section: string;
  key: string;
  value: string;
}

/**
 * `section:key=value`. The section is everything before the first `:`, so section
 * specifiers such as `fprate=peak` work; the key ends at the first `=` after it.
 */
export function parseExtraSetting(raw: string): ExtraSetting | undefined {
  const colon = raw.indexOf(':');
  if (colon < 0) return undefined;
  const assignment = raw.slice(colon + 1);
  const eq = assignment.indexOf('=');
  if (eq < 0) return undefined;

  const section = raw.slice(0, colon).trim();
  const key = assignment.slice(0, eq).trim();
  const value = assignment.slice(eq + 1).trim();
  if (!section || !key) return undefined;
  return { section, key, value };
}

export function formatSettingLine(setting: ExtraSetting): string {
  return `   ${setting.key} = ${setting.value}`;
}

/** Index of the first line that opens section `header` (`<header>` then end, blank or comment). */
export function findHeaderLine(lines: readonly string[], header: string): number {
  return lines.findIndex((line) => {
    if (!line.startsWith(header)) return false;
    const rest = line.slice(header.length);
    return rest.length === 0 || /^\s/.test(rest) || rest.startsWith('#');
  });
}

/**
 * Adds one setting. An existing section gets the line right after its header; otherwise
 * a new section goes in front of the first suite header from `SUITE_SECTION_HEADERS`,
 * or at the end of the file when the template has none of them.
 */
export function insertExtraSetting(text: string, setting: ExtraSetting): string {
  const lines = text.split('\n');
  const header = `${setting.section}:`;
  const line = formatSettingLine(setting);

  const existing = findHeaderLine(lines, header);
  if (existing >= 0) {
    lines.splice(existing + 1, 0, line);
    return lines.join('\n');
  }

  const block = [header, line, ''];
  for (const suiteHeader of SUITE_SECTION_HEADERS) {
    const at = findHeaderLine(lines, suiteHeader);
    if (at >= 0) {
      lines.splice(at, 0, ...block);
      return lines.join('\n');
    }
  }

  const body = text.endsWith('\n') || text.length === 0 ? text : `${text}\n`;
  return `${body}\n${header}\n${line}\n`;
}
