export type FunctionSignature = {
  name: string;
  /** The header's tokens joined by single spaces; whitespace in the source is not significant. */
  text: string;
  /** Name, parameter and return tokens; the `def`/`function` keyword is left out. */
  tokens: string[];
};

const TOKEN_PATTERN =
  /[A-Za-z_$][A-Za-z0-9_$]*|\d+(?:\.\d+)?|->|=>|\*\*|\.\.\.|"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'|\S/g;

export const tokenize = (source: string): string[] => source.match(TOKEN_PATTERN) ?? [];

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}", "<": ">" };

/**
 * Reads from the opening parenthesis at `start` through the header's end and returns the
 * index just past it. Python headers stop before the trailing colon, TypeScript ones
 * before the body brace or semicolon.
 */
const scanHeaderEnd = (source: string, start: number, style: "python" | "typescript"): number => {
  let depth = 0;
  let i = start;
  for (; i < source.length; i += 1) {
    const char = source[i];
    if (char === "(") depth += 1;
    if (char === ")") {
      depth -= 1;
      if (depth === 0) {
        i += 1;
        break;
      }
    }
  }
  if (depth !== 0) {
    return -1;
  }

  const rest = source.slice(i);
  const annotation = style === "python" ? /^\s*->/.exec(rest) : /^\s*:/.exec(rest);
  if (!annotation) {
    return i;
  }

  const stack: string[] = [];
  let j = i + annotation[0].length;
  let end = j;
  for (; j < source.length; j += 1) {
    const char = source[j];
    if (stack.length === 0) {
      if (style === "python" && (char === ":" || char === "\n")) break;
      if (style === "typescript" && (char === "{" || char === ";" || char === "\n")) break;
    }
    if (char in OPENERS) {
      stack.push(OPENERS[char]);
    } else if (stack.length > 0 && char === stack[stack.length - 1]) {
      stack.pop();
    } else if (style === "typescript" && char === "=" && source[j + 1] === ">") {
      // arrow in a function type: keep the closing angle bracket out of the stack
      j += 1;
    }
    if (!/\s/.test(char)) {
      end = j + 1;
    }
  }
  return end;
};

// `function` headers count only at the start of a line; prose mentions do not.
const HEADER_PATTERNS: Array<{ pattern: RegExp; style: "python" | "typescript" }> = [
  { pattern: /\b(?:async\s+)?def\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(/g, style: "python" },
  {
    pattern:
      /^[ \t]*(?:export[ \t]+)?(?:default[ \t]+)?(?:async[ \t]+)?function[ \t]*\*?[ \t]*([A-Za-z_$][A-Za-z0-9_$]*)[ \t]*(?:<[^>()\n]*>)?[ \t]*\(/gm,
    style: "typescript"
  }
];

const DECLARATION_KEYWORDS = new Set(["def", "function"]);

/** Function headers written in the text, in order of appearance, without duplicates. */
export const extractSignatures = (source: string): FunctionSignature[] => {
  const found: Array<{ index: number; signature: FunctionSignature }> = [];
  const seen = new Set<string>();

  for (const { pattern, style } of HEADER_PATTERNS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(source))) {
      const open = match.index + match[0].length - 1;
      const end = scanHeaderEnd(source, open, style);
      if (end < 0) {
        continue;
      }
      const all = tokenize(source.slice(match.index, end));
      const header = all.slice(all.findIndex((token) => DECLARATION_KEYWORDS.has(token)));
      const name = match[1];
      const tokens = header.slice(header.indexOf(name));
      const key = tokens.join(" ");
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      found.push({ index: match.index, signature: { name, text: header.join(" "), tokens } });
    }
  }

  return found.sort((a, b) => a.index - b.index).map((entry) => entry.signature);
};

const followsKeyword = (tokens: string[], index: number): boolean => {
  const previous = tokens[index - 1];
  if (previous === "*") {
    return tokens[index - 2] === "function";
  }
  return previous !== undefined && DECLARATION_KEYWORDS.has(previous);
};

/** True when `needle` occurs in `haystack` right after a `def` or `function` keyword. */
const containsDeclaration = (haystack: string[], needle: string[]): boolean => {
  if (needle.length === 0) {
    return true;
  }
  for (let i = 0; i + needle.length <= haystack.length; i += 1) {
    if (!followsKeyword(haystack, i)) {
      continue;
    }
    let matched = true;
    for (let j = 0; j < needle.length; j += 1) {
      if (haystack[i + j] !== needle[j]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return true;
    }
  }
  return false;
};

/**
 * Signatures not declared in `candidate`. A header matches under either keyword, so a
 * `function` header in the requirement is kept by a `def` with the same name and parameters.
 */
export const findMissingSignatures = (
  signatures: ReadonlyArray<FunctionSignature>,
  candidate: string
): FunctionSignature[] => {
  const tokens = tokenize(candidate);
  return signatures.filter((signature) => !containsDeclaration(tokens, signature.tokens));
};
