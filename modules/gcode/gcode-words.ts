/**
 * Word-level access to a single G-code line.
 *
 * Everything here works on offsets into the original text so that a caller can
 * swap one word value and leave every other byte of the line untouched.
 */

export type GcodeWord = {
  letter: string;
  raw: string;
  /** Offset of `raw` within the full line. */
  index: number;
};

export type ParsedGcodeLine = {
  command: string | null;
  words: GcodeWord[];
  hasChecksum: boolean;
  eol: string;
};

export const MIN_FRACTION_DIGITS = 5;

const NUMBER_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const WORD_RE = /\S+/g;
const EOL_RE = /\r?\n$/;

type LineSections = {
  body: string;
  rest: string;
  eol: string;
};

const splitSections = (line: string): LineSections => {
  const eolMatch = EOL_RE.exec(line);
  const eol = eolMatch ? eolMatch[0] : "";
  const content = eol ? line.slice(0, -eol.length) : line;
  const commentIdx = content.indexOf(";");
  if (commentIdx === -1) {
    return { body: content, rest: "", eol };
  }
  return { body: content.slice(0, commentIdx), rest: content.slice(commentIdx), eol };
};

// Parenthesised comments are blanked rather than removed so offsets stay valid.
const blankInlineComments = (body: string): string =>
  body.replace(/\([^)]*\)?/g, (match) => " ".repeat(match.length));

export function parseNumber(raw: string): number | null {
  if (!NUMBER_RE.test(raw)) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

const normalizeCommand = (letter: string, raw: string): string => {
  const value = parseNumber(raw);
  if (value === null) return `${letter}${raw.toUpperCase()}`;
  return `${letter}${value}`;
};

export function parseGcodeLine(line: string): ParsedGcodeLine {
  const { body, eol } = splitSections(line);
  const starIdx = body.indexOf("*");
  const scanned = blankInlineComments(starIdx === -1 ? body : body.slice(0, starIdx));

  const words: GcodeWord[] = [];
  let command: string | null = null;
  for (const match of scanned.matchAll(WORD_RE)) {
    const token = match[0];
    const start = match.index ?? 0;
    const letter = token[0].toUpperCase();
    if (!/[A-Z]/.test(letter)) continue;
    const raw = token.slice(1);
    if (command === null && letter !== "N") {
      command = normalizeCommand(letter, raw);
      continue;
    }
    if (command === null) continue;
    words.push({ letter, raw, index: start + 1 });
  }

  return { command, words, hasChecksum: starIdx !== -1, eol };
}

export function findWord(parsed: ParsedGcodeLine, letter: string): GcodeWord | undefined {
  const wanted = letter.toUpperCase();
  return parsed.words.find((word) => word.letter === wanted);
}

/**
 * Format `value` in the style of `source`: at least {@link MIN_FRACTION_DIGITS}
 * fraction digits (more if the source had more), leading-dot and explicit plus
 * sign preserved. Exponent sources come back in fixed point.
 */
export function formatLike(value: number, source: string): string {
  const mantissa = source.split(/[eE]/)[0];
  const dot = mantissa.indexOf(".");
  const sourceDigits = dot === -1 ? 0 : mantissa.length - dot - 1;
  let text = value.toFixed(Math.max(sourceDigits, MIN_FRACTION_DIGITS));
  if (Number(text) === 0) text = text.replace(/^-/, "");
  if (/^[-+]?\./.test(mantissa)) text = text.replace(/^(-?)0\./, "$1.");
  if (mantissa.startsWith("+") && !text.startsWith("-")) text = `+${text}`;
  return text;
}

export function replaceWordValue(line: string, word: GcodeWord, raw: string): string {
  return `${line.slice(0, word.index)}${raw}${line.slice(word.index + word.raw.length)}`;
}

export function computeChecksum(text: string): number {
  let checksum = 0;
  for (let i = 0; i < text.length; i += 1) {
    checksum ^= text.charCodeAt(i) & 0xff;
  }
  return checksum;
}

/** Recompute a trailing `*NN` checksum after the words before it changed. */
export function refreshChecksum(line: string): string {
  const { body, rest, eol } = splitSections(line);
  const starIdx = body.indexOf("*");
  if (starIdx === -1) return line;
  const payload = body.slice(0, starIdx);
  const tail = body.slice(starIdx + 1).replace(/^\d+/, "");
  return `${payload}*${computeChecksum(payload)}${tail}${rest}${eol}`;
}
