/**
 * Commit message normalization
 */

/** Used when a suggestion has no usable summary line */
export const FALLBACK_MESSAGE = 'chore: update';

const BRACKETED_TYPE = /^\[(feat|fix|docs|style|refactor|perf|test|chore)\]\s*:/;
const EDGE_NOISE = /^[#\s]+|[#\s]+$/g;
const DECORATION_ONLY = /^[\s`#]*$/;

/**
 * Normalize a suggested message into `summary` or `summary\n\nbody`
 *
 * The summary is the first line that survives normalization; a leading
 * `[type]:` becomes `type:` and heading marks are trimmed. Remaining
 * non-empty lines form the body. Nothing is truncated.
 *
 * @example
 * sanitizeMessage('## [fix]: handle empty input\n\n- guard null\n')
 * // => 'fix: handle empty input\n\n- guard null'
 */
export function sanitizeMessage(raw: string): string {
  const lines = raw.split(/\r?\n/);

  let summary = '';
  let summaryIndex = -1;
  for (let i = 0; i < lines.length; i++) {
    const candidate = normalizeSummary(lines[i] ?? '');
    if (candidate) {
      summary = candidate;
      summaryIndex = i;
      break;
    }
  }

  if (!summary) {
    return FALLBACK_MESSAGE;
  }

  const body = lines
    .slice(summaryIndex + 1)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '');

  return body.length > 0 ? `${summary}\n\n${body.join('\n')}` : summary;
}

function normalizeSummary(line: string): string {
  let current = line;
  for (;;) {
    const next = current.replace(BRACKETED_TYPE, '$1:').replace(EDGE_NOISE, '');
    if (next === current) {
      return current;
    }
    current = next;
  }
}

/**
 * True for answers made only of code-fence backticks, `#` and whitespace
 */
export function isDecorationOnly(raw: string): boolean {
  return DECORATION_ONLY.test(raw);
}
