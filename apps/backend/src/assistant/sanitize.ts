const SENTENCE_END = new Set(["。", "！", "？", ".", "!", "?"]);
const MAX_SENTENCES = 2;

export function introFor(assistantName: string): string {
  return `我是你的桌面助手${assistantName}`;
}

export function splitSentences(text: string): string[] {
  const parts: string[] = [];
  let current = "";
  for (const char of text) {
    current += char;
    if (SENTENCE_END.has(char)) {
      const sentence = current.trim();
      if (sentence) parts.push(sentence);
      current = "";
    }
  }
  const tail = current.trim();
  if (tail) parts.push(tail);
  return parts;
}

function dedupeSentences(parts: string[]): string[] {
  const seen = new Set<string>();
  return parts.filter((part) => {
    const key = part.replace(/\s/g, "");
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function keepFirstIntro(parts: string[], assistantName: string | null): string[] {
  if (!assistantName) return parts;
  const intro = introFor(assistantName);
  let found = false;
  return parts.filter((part) => {
    if (!part.includes(intro)) return true;
    if (found) return false;
    found = true;
    return true;
  });
}

/**
 * Flattens a model reply for speech: no emoji or line breaks, no repeated sentences, at most
 * two sentences.
 */
export function sanitizeReply(raw: string, assistantName: string | null = null): string {
  const clean = raw.replace(/\p{So}/gu, "").replace(/\s+/g, " ").trim();
  const parts = keepFirstIntro(dedupeSentences(splitSentences(clean)), assistantName);
  if (parts.length === 0) return clean;
  return parts.slice(0, MAX_SENTENCES).join("").trim();
}
