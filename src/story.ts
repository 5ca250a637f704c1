// src/story.ts
export const FALLBACK_SUBJECT = "a small creature";

// "about a fox", "About an old lighthouse": stops at the first period, newline or comma
const ABOUT_PATTERN = /about (?:a |an )?([^.\n,]+)/i;

export function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function firstWords(text: string, count = 4): string {
  return words(text).slice(0, count).join(" ");
}

/**
 * Pull a short subject phrase (at most four words) out of a prompt.
 * Never returns an empty string.
 */
export function extractSubject(prompt: string): string {
  if (!prompt) return FALLBACK_SUBJECT;

  const m = ABOUT_PATTERN.exec(prompt);
  const subject = m ? firstWords(m[1].trim()) : firstWords(prompt);
  return subject || FALLBACK_SUBJECT;
}

export function makeThreeSentenceStory(prompt: string): string {
  const subject = extractSubject(prompt);
  const lead = words(subject)[0] ?? subject;

  return [
    `In a peaceful grove beneath a silver moon, ${subject} discovered a hidden pool that reflected the stars.`,
    `As ${lead} approached the water, the pool began to shimmer and revealed a pathway to a gentle, magical realm.`,
    `Filled with wonder, ${lead} whispered a wish for all who dream to find their own spark of magic, and left footprints that twinkled like stardust.`,
  ].join(" ");
}
