import type { SkillDefinition, SkillMatch } from "./types.js";

const MAX_SEARCH_RESULTS = 10;
const MAX_DESCRIPTION_POINTS = 6;
const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "as",
  "at",
  "be",
  "by",
  "for",
  "from",
  "if",
  "in",
  "into",
  "is",
  "it",
  "of",
  "on",
  "or",
  "the",
  "to",
  "with",
  "you",
  "your",
]);

/** Ranks skills by keyword overlap with the query; zero-score skills are dropped. */
export function searchSkills(query: string, skills: SkillDefinition[], limit = MAX_SEARCH_RESULTS): SkillMatch[] {
  const queryLower = query.trim().toLowerCase();
  if (!queryLower) {
    return [];
  }
  const queryTokens = new Set(tokenize(queryLower).filter((token) => !STOP_WORDS.has(token)));

  return skills
    .map((skill) => ({ skill, score: scoreSkill(skill, queryLower, queryTokens) }))
    .filter((row) => row.score > 0)
    .sort((left, right) => {
      if (right.score !== left.score) {
        return right.score - left.score;
      }
      return left.skill.name.localeCompare(right.skill.name);
    })
    .slice(0, Math.max(0, limit));
}

function scoreSkill(skill: SkillDefinition, queryLower: string, queryTokens: Set<string>): number {
  let score = 0;

  if (skill.nameLower.includes(queryLower) || queryLower.includes(skill.nameLower)) {
    score += 12;
  }

  for (const token of tokenize(skill.nameLower)) {
    if (token.length >= 2 && queryTokens.has(token)) {
      score += 4;
    }
  }

  let descriptionPoints = 0;
  const seen = new Set<string>();
  for (const token of tokenize(skill.description)) {
    if (token.length < 3 || STOP_WORDS.has(token) || seen.has(token)) {
      continue;
    }
    seen.add(token);
    if (queryTokens.has(token)) {
      descriptionPoints += 1;
      if (descriptionPoints >= MAX_DESCRIPTION_POINTS) {
        break;
      }
    }
  }

  return score + descriptionPoints;
}

function tokenize(value: string): string[] {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .split(/\s+/)
    .filter(Boolean);
}
