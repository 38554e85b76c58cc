/**
 * Titles that mark a person as an engineering leader.
 * Matched case-insensitively against the person's job title.
 */
export const LEADER_TITLES: string[] = [
  "cto", "chief technology officer", "vp engineering", "vp of engineering",
  "vice president of engineering", "head of engineering", "director of engineering",
  "engineering director", "engineering manager", "engineering lead", "principal engineer",
];

/** Seniority levels reported by the provider that always count as leadership. */
export const LEADER_LEVELS: string[] = ["cxo", "vp", "director"];

/** Number of engineers requested per team lookup; leaders are picked from these. */
export const ENGINEERING_SAMPLE_SIZE = 25;
