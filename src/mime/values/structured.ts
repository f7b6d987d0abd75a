/**
 * Helpers for structured header values (RFC 2822 section 3.2)
 *
 * Quoted strings, comments and angle-bracketed addresses are scanned as
 * units so separators inside them are not mistaken for delimiters.
 */

/**
 * Removes folding: CRLF (or LF) followed by whitespace
 */
export function unfold(value: string): string {
  return value.replace(/\r?\n(?=[ \t])/g, '');
}

export interface SplitOptions {
  /** Treat "name: ... ;" address groups as single items */
  groups?: boolean;
}

/**
 * Splits at a separator character outside quotes, comments and brackets
 */
export function splitTopLevel(text: string, separator: string, options: SplitOptions = {}): string[] {
  const items: string[] = [];
  let current = '';
  let inQuote = false;
  let commentDepth = 0;
  let angleDepth = 0;
  let inGroup = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuote) {
      current += char;
      if (char === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (char === '"') {
        inQuote = false;
      }
      continue;
    }

    if (commentDepth > 0) {
      current += char;
      if (char === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (char === '(') {
        commentDepth++;
      } else if (char === ')') {
        commentDepth--;
      }
      continue;
    }

    if (char === '"') {
      inQuote = true;
    } else if (char === '(') {
      commentDepth++;
    } else if (char === '<') {
      angleDepth++;
    } else if (char === '>' && angleDepth > 0) {
      angleDepth--;
    } else if (options.groups && angleDepth === 0 && char === ':') {
      inGroup = true;
    } else if (options.groups && inGroup && char === ';') {
      inGroup = false;
    } else if (char === separator && angleDepth === 0 && !inGroup) {
      items.push(current);
      current = '';
      continue;
    }

    current += char;
  }

  items.push(current);
  return items;
}

/**
 * Index of a character outside quotes, comments and angle brackets, or -1
 */
export function indexOfTopLevel(text: string, char: string, from: number = 0): number {
  let inQuote = false;
  let commentDepth = 0;
  let angleDepth = 0;

  for (let i = from; i < text.length; i++) {
    const c = text[i];
    if (inQuote) {
      if (c === '\\') i++;
      else if (c === '"') inQuote = false;
    } else if (commentDepth > 0) {
      if (c === '\\') i++;
      else if (c === '(') commentDepth++;
      else if (c === ')') commentDepth--;
    } else if (c === char && angleDepth === 0) {
      return i;
    } else if (c === '"') {
      inQuote = true;
    } else if (c === '(') {
      commentDepth++;
    } else if (c === '<') {
      angleDepth++;
    } else if (c === '>' && angleDepth > 0) {
      angleDepth--;
    }
  }

  return -1;
}

/**
 * Removes comments, returning the remaining text and the comment contents
 */
export function extractComments(text: string): { text: string; comments: string[] } {
  let result = '';
  const comments: string[] = [];
  let comment = '';
  let depth = 0;
  let inQuote = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (depth === 0) {
      if (inQuote) {
        result += char;
        if (char === '\\' && i + 1 < text.length) result += text[++i];
        else if (char === '"') inQuote = false;
      } else if (char === '"') {
        inQuote = true;
        result += char;
      } else if (char === '(') {
        depth = 1;
        comment = '';
      } else {
        result += char;
      }
      continue;
    }

    if (char === '\\' && i + 1 < text.length) {
      comment += text[++i];
    } else if (char === '(') {
      depth++;
      comment += char;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        comments.push(comment.trim());
        // A comment separates tokens like whitespace
        result += ' ';
      } else {
        comment += char;
      }
    } else {
      comment += char;
    }
  }

  return { text: result, comments };
}

/**
 * Removes surrounding quotes and backslash escapes from every quoted string
 */
export function unquote(text: string): string {
  let result = '';
  let inQuote = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '"') {
      inQuote = !inQuote;
    } else if (inQuote && char === '\\' && i + 1 < text.length) {
      result += text[++i];
    } else {
      result += char;
    }
  }

  return result;
}

/**
 * Wraps a string in quotes, escaping quotes and backslashes
 */
export function quote(text: string): string {
  return '"' + text.replace(/(["\\])/g, '\\$1') + '"';
}

/** RFC 2822 specials that force a phrase into a quoted string */
const PHRASE_SPECIALS = /[()<>[\]:;@\\,."]/;

/**
 * Returns a phrase as-is, or quoted when it contains specials or
 * leading/trailing whitespace
 */
export function quoteIfNeeded(text: string): string {
  if (text === '' || PHRASE_SPECIALS.test(text) || /^\s|\s$/.test(text)) {
    return quote(text);
  }
  return text;
}

/**
 * Collapses whitespace runs and trims
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/[ \t\r\n]+/g, ' ').trim();
}
