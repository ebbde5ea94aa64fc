import { normalizeText } from "./normalize";

export const STOPWORDS: ReadonlySet<string> = new Set([
  "the", "and", "a", "an", "to", "of", "in", "for", "with", "on", "at", "by", "from", "as", "is", "are", "be",
  "this", "that", "it", "or", "we", "you", "your", "our", "their", "they", "i", "me", "my", "us", "will", "can",
  "may", "must", "should", "could", "would", "role", "position", "team", "work", "working", "experience",
  "skills", "ability", "strong",
]);

const TOKEN_REGEX = /[a-z][a-z0-9+#-]+/g;
const TOP_JOB_TOKENS = 8;

/** Word-like tokens of already lower-cased text. */
export function tokenize(lowerText: string): string[] {
  return lowerText.match(TOKEN_REGEX) ?? [];
}

/** Job tokens that carry meaning: no stopwords, at least three characters. */
export function contentTokens(text: string): string[] {
  return tokenize(normalizeText(text).toLowerCase()).filter((w) => w.length >= 3 && !STOPWORDS.has(w));
}

/**
 * Most frequent tokens, highest count first. Ties keep first-occurrence order:
 * Map iteration follows insertion and Array#sort is stable.
 */
export function topTokens(tokens: string[], limit: number): string[] {
  const freq = new Map<string, number>();
  for (const t of tokens) freq.set(t, (freq.get(t) ?? 0) + 1);
  return [...freq.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([token]) => token);
}

/**
 * Keywords for a job: known skills that appear verbatim in the job text, then
 * its most frequent content words. Deduplicated case-insensitively.
 */
export function extractKeywords(jobText: string, skills: string[]): string[] {
  if (!jobText) return [];
  const jobLower = normalizeText(jobText).toLowerCase();
  const matched = skills.filter((s) => s && jobLower.includes(s.toLowerCase()));
  const top = topTokens(contentTokens(jobText), TOP_JOB_TOKENS);

  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const k of [...matched, ...top]) {
    const key = k.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    keywords.push(k);
  }
  return keywords;
}

/** Number of keywords found (substring, case-insensitive) in text. */
export function relevanceScore(text: string, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  const lower = text.toLowerCase();
  return keywords.filter((k) => lower.includes(k.toLowerCase())).length;
}

/** Stable sort, most relevant first. */
export function sortByRelevance<T>(items: T[], text: (item: T) => string, keywords: string[]): T[] {
  return items
    .map((item) => ({ item, score: relevanceScore(text(item), keywords) }))
    .sort((a, b) => b.score - a.score)
    .map(({ item }) => item);
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** Skills equal to a keyword first; each group alphabetical. */
export function rankSkills(skills: string[], keywords: string[]): string[] {
  const keywordSet = new Set(keywords.map((k) => k.toLowerCase()));
  return [...skills].sort((a, b) => {
    const aMiss = keywordSet.has(a.toLowerCase()) ? 0 : 1;
    const bMiss = keywordSet.has(b.toLowerCase()) ? 0 : 1;
    return aMiss - bMiss || compareCodePoints(a.toLowerCase(), b.toLowerCase());
  });
}

/**
 * Keep the skills a job asks for, padded with the rest of the list so the
 * section does not look sparse.
 */
export function filterSkillsForJob(skills: string[], jobText: string, maxSkills = 16, minSkills = 10): string[] {
  if (skills.length === 0) return skills;
  if (!jobText) return skills.slice(0, maxSkills);

  const jobLower = normalizeText(jobText).toLowerCase();
  const jobWords = new Set(contentTokens(jobText));

  const matches = skills
    .map((skill, index) => {
      const norm = normalizeText(skill).toLowerCase();
      let score = norm && jobLower.includes(norm) ? 5 : 0;
      for (const token of tokenize(norm)) {
        if (jobWords.has(token)) score += 1;
      }
      return { skill, index, score };
    })
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const selected: string[] = [];
  const selectedKeys = new Set<string>();
  for (const { skill } of matches) {
    const key = skill.toLowerCase();
    if (!selectedKeys.has(key)) {
      selected.push(skill);
      selectedKeys.add(key);
    }
    if (selected.length >= maxSkills) break;
  }

  for (const skill of skills) {
    const key = skill.toLowerCase();
    if (selectedKeys.has(key)) continue;
    if (selected.length >= maxSkills) break;
    selected.push(skill);
    selectedKeys.add(key);
    if (selected.length >= minSkills && matches.length > 0) break;
  }

  return selected.slice(0, maxSkills);
}

/**
 * Which keywords/phrases appear in a text (substring match, case-insensitive).
 */
export function compareKeywordList(
  text: string,
  keywordList: string[]
): { matchedKeywords: string[]; missingKeywords: string[] } {
  const lower = normalizeText(text).toLowerCase();
  const matchedKeywords: string[] = [];
  const missingKeywords: string[] = [];
  for (const kw of keywordList) {
    const normalized = kw.trim();
    if (!normalized) continue;
    if (lower.includes(normalized.toLowerCase())) {
      matchedKeywords.push(normalized);
    } else {
      missingKeywords.push(normalized);
    }
  }
  return { matchedKeywords, missingKeywords };
}
