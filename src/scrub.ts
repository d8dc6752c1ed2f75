const MAX_API_ERROR_CHARS = 200;
const REDACTED = '[REDACTED]';

const PREFIX_PATTERNS = [
  'sk-',
  'xoxb-',
  'xoxp-',
  'xoxs-',
  'xoxa-',
  'xapp-',
  'ghp_',
  'github_pat_',
  'hf_',
  'glpat-',
  'ya29.',
  'AIza',
  'AKIA',
  'ASIA',
  'eyJ',
  'GOCSPX-',
  'gho_',
  'ghu_',
  'ghs_',
  'sshpass-',
  'AGE-SECRET-KEY-'
] as const;

const MARKER_PATTERNS = [
  'Authorization: Bearer ',
  'authorization: bearer ',
  '"authorization":"Bearer ',
  '"authorization":"bearer ',
  'api_key=',
  'access_token=',
  'refresh_token=',
  'id_token=',
  '"api_key":"',
  '"access_token":"',
  '"refresh_token":"',
  '"id_token":"',
  '"token":"',
  '"secret":"',
  '"password":"',
  '"private_key":"',
  '"client_secret":"',
  '"database_url":"',
  'password=',
  'secret=',
  'DATABASE_URL=',
  'PRIVATE_KEY=',
  'SECRET_KEY='
] as const;

const PEM_BEGIN = '-----BEGIN ';
const PEM_LINE_SUFFIX = '-----';
const REDACTED_PEM = '[REDACTED-PEM]';

function isSecretChar(ch: string): boolean {
  return /^[A-Za-z0-9\-_.:+/=]$/.test(ch);
}

function tokenEnd(input: string, from: number): number {
  let end = from;
  while (end < input.length && isSecretChar(input[end])) end++;
  return end;
}

function scrubAfterMarker(input: string, marker: string): string {
  let output = input;
  let searchFrom = 0;
  for (;;) {
    const start = output.indexOf(marker, searchFrom);
    if (start < 0) break;
    const contentStart = start + marker.length;
    const end = tokenEnd(output, contentStart);
    // Bare marker with no token value
    if (end === contentStart) {
      searchFrom = contentStart;
      continue;
    }
    output = output.slice(0, start) + REDACTED + output.slice(end);
    searchFrom = start + REDACTED.length;
  }
  return output;
}

/** Replace whole `-----BEGIN X----- ... -----END X-----` blocks, with one trailing newline. */
function scrubPemBlocks(input: string): string {
  let output = input;
  let searchFrom = 0;
  for (;;) {
    const begin = output.indexOf(PEM_BEGIN, searchFrom);
    if (begin < 0) break;
    const kindStart = begin + PEM_BEGIN.length;
    const kindEnd = output.indexOf(PEM_LINE_SUFFIX, kindStart);
    if (kindEnd <= kindStart) {
      searchFrom = kindStart;
      continue;
    }
    const endMarker = `-----END ${output.slice(kindStart, kindEnd)}-----`;
    const endStart = output.indexOf(endMarker, kindEnd + PEM_LINE_SUFFIX.length);
    if (endStart < 0) {
      searchFrom = kindStart;
      continue;
    }
    let replaceEnd = endStart + endMarker.length;
    if (output.startsWith('\r\n', replaceEnd)) replaceEnd += 2;
    else if (output.startsWith('\n', replaceEnd)) replaceEnd += 1;
    output = output.slice(0, begin) + REDACTED_PEM + output.slice(replaceEnd);
    searchFrom = begin + REDACTED_PEM.length;
  }
  return output;
}

/**
 * Redact secret-looking tokens: provider key prefixes (`sk-`, `ghp_`, ...)
 * and header/query/JSON markers (`Authorization: Bearer ...`, `api_key=...`).
 * The marker itself is replaced along with its value. PEM blocks become
 * `[REDACTED-PEM]`.
 */
export function scrubSecretPatterns(input: string): string {
  const patterns: readonly string[] = [...PREFIX_PATTERNS, ...MARKER_PATTERNS];
  if (!input.includes(PEM_BEGIN) && !patterns.some((pattern) => input.includes(pattern))) return input;
  let scrubbed = input;
  for (const pattern of patterns) {
    scrubbed = scrubAfterMarker(scrubbed, pattern);
  }
  return scrubPemBlocks(scrubbed);
}

/** Scrub secrets and cap the text at 200 code points. */
export function sanitizeApiError(input: string): string {
  const scrubbed = scrubSecretPatterns(input);
  const chars = [...scrubbed];
  if (chars.length <= MAX_API_ERROR_CHARS) return scrubbed;
  return `${chars.slice(0, MAX_API_ERROR_CHARS).join('')}...`;
}
