const parseJsonCandidate = (raw: string): unknown | null => {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
};

const fencedBlocks = (content: string): string[] => {
  const regex = /```(?:json)?\s*([\s\S]*?)```/gi;
  const blocks: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(content))) {
    const candidate = match[1]?.trim();
    if (candidate) {
      blocks.push(candidate);
    }
  }
  return blocks;
};

/** Returns the end index of the balanced object starting at `start`, or -1. */
const matchObjectEnd = (content: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaping = false;
  for (let j = start; j < content.length; j += 1) {
    const char = content[j];
    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (char === "\\") {
        escaping = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
      continue;
    }
    if (char === "{") depth += 1;
    if (char === "}") depth -= 1;
    if (depth === 0) {
      return j;
    }
  }
  return -1;
};

const bareObjects = (content: string): string[] => {
  const objects: string[] = [];
  let i = 0;
  while (i < content.length) {
    if (content[i] !== "{") {
      i += 1;
      continue;
    }
    const end = matchObjectEnd(content, i);
    if (end < 0) {
      break;
    }
    const candidate = content.slice(i, end + 1);
    if (parseJsonCandidate(candidate) !== null) {
      objects.push(candidate);
      i = end + 1;
    } else {
      i += 1;
    }
  }
  return objects;
};

/**
 * Every JSON value found in a model reply: fenced blocks first, then balanced objects in
 * the surrounding prose, in order of appearance. The whole reply is tried first when it
 * is itself JSON.
 */
export const collectJsonCandidates = (content: string): unknown[] => {
  const trimmed = content.trim();
  const sources = [trimmed, ...fencedBlocks(content), ...bareObjects(content)];
  const seen = new Set<string>();
  const candidates: unknown[] = [];
  for (const source of sources) {
    if (seen.has(source)) {
      continue;
    }
    seen.add(source);
    const parsed = parseJsonCandidate(source);
    if (parsed !== null) {
      candidates.push(parsed);
    }
  }
  return candidates;
};
