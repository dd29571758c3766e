const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function coerceString(input: unknown): string {
  try {
    return String(input ?? '');
  } catch {
    return '';
  }
}

function isForbidden(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/**
 * Collapses runs of whitespace and control characters into single spaces.
 *
 * `runcpu` output and `gcc --version` banners are echoed into log fields, where a stray
 * carriage return or escape sequence would break the JSON line.
 */
export function sanitizeOneLine(input: unknown): string {
  let out = '';
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    if (isForbidden(ch) || /\s/u.test(ch)) {
      pendingSpace = out.length > 0;
      continue;
    }
    if (pendingSpace) {
      out += ' ';
      pendingSpace = false;
    }
    out += ch;
  }
  return out;
}

export function truncateUtf8(input: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return '';
  const buf = new Uint8Array(maxBytes);
  const { read, written } = textEncoder.encodeInto(input, buf);
  if (read === input.length) return input;
  return written === 0 ? '' : textDecoder.decode(buf.subarray(0, written));
}

export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  return truncateUtf8(sanitizeOneLine(input), maxBytes);
}

function errorMessageOf(err: unknown): string {
  if (err === null) return 'null';
  if (typeof err === 'string') return err;
  if (typeof err === 'object') {
    try {
      if ('message' in err && typeof err.message === 'string') return err.message;
    } catch {
      // a throwing getter falls through to the generic label
    }
    return 'Error';
  }
  return String(err);
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = 'Error'): string {
  return formatOneLineUtf8(errorMessageOf(err), maxBytes) || fallback;
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/** Renders an argument vector the way a user would type it, for dry-run output. */
export function formatCommandLine(argv: readonly string[]): string {
  return argv
    .map((arg) => {
      if (arg.length > 0 && SHELL_SAFE.test(arg)) return arg;
      return `'${arg.replaceAll("'", `'\\''`)}'`;
    })
    .join(' ');
}
