/**
 * Pull the first JSON object out of free-form oracle text. Handles a
 * surrounding markdown fence, leading prose and braces inside string literals.
 */

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const FENCE_REGEX = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/;

function unfence(content: string): string {
  const match = content.match(FENCE_REGEX);
  return (match ? match[1] : content).trim();
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === "{") {
      depth++;
    } else if (c === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

export function extractJsonObject(content: string): ExtractResult {
  const text = unfence(content);
  if (!text) {
    return { found: false, reason: "Empty content" };
  }
  const start = text.indexOf("{");
  if (start < 0) {
    return { found: false, reason: "No JSON object found in content" };
  }
  const end = findObjectEnd(text, start);
  if (end < 0) {
    return { found: false, reason: "Unclosed JSON object" };
  }
  return { found: true, json: text.slice(start, end + 1) };
}
