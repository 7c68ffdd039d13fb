import visualData from "../data/visual-concepts.json";
import { escapeRegExp } from "./text";
import type { ArticleDraft, ImageTone } from "./types";

const COVER_PROMPT_BUDGET = 450;

function countOccurrences(text: string, phrase: string): number {
  const matches = text.match(new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "g"));
  return matches ? matches.length : 0;
}

/** Cuts at the last comma that fits, or hard-cuts when there is none. */
export function truncateAtComma(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  const lastComma = cut.lastIndexOf(",");
  return (lastComma > 0 ? cut.slice(0, lastComma) : cut).trim();
}

/**
 * Visual phrases for the concepts the article talks about, strongest first.
 * Title hits weigh double, keyword hits add one.
 */
export function detectVisualConcepts(
  title: string,
  body: string,
  keywords: string[]
): string[] {
  const titleText = title.toLowerCase();
  const text = `${titleText} ${body.toLowerCase()}`;
  const keywordText = keywords.join(" ").toLowerCase();

  const scored: Array<{ visuals: string[]; score: number }> = [];
  for (const [concept, visuals] of Object.entries(visualData.concepts)) {
    const occurrences = countOccurrences(text, concept);
    if (occurrences === 0) continue;
    let score = occurrences;
    if (countOccurrences(titleText, concept) > 0) score += 2;
    if (countOccurrences(keywordText, concept) > 0) score += 1;
    scored.push({ visuals, score });
  }

  if (scored.length === 0) return [...visualData.fallbackConcepts];

  scored.sort((a, b) => b.score - a.score);
  const picked: string[] = [];
  for (const entry of scored.slice(0, 3)) {
    for (const visual of entry.visuals.slice(0, 2)) {
      if (!picked.includes(visual)) picked.push(visual);
    }
  }
  return picked.slice(0, 6);
}

export function detectThemes(text: string): string[] {
  const lower = text.toLowerCase();
  return Object.entries(visualData.themes)
    .filter(([, patterns]) => patterns.some((pattern) => lower.includes(pattern)))
    .map(([theme]) => theme)
    .slice(0, 3);
}

function pickSetting(themes: string[], tone: ImageTone): string {
  if (themes.includes("global")) return visualData.themeSettings.global;
  if (themes.includes("future")) return visualData.themeSettings.future;
  if (themes.includes("growth")) return visualData.themeSettings.growth;
  return visualData.tones[tone].setting;
}

function pickMood(themes: string[]): string[] {
  const moods: string[] = [];
  if (themes.includes("growth")) moods.push(visualData.themeMoods.growth);
  if (themes.includes("innovation")) moods.push(visualData.themeMoods.innovation);
  if (themes.includes("success")) moods.push(visualData.themeMoods.success);
  return moods;
}

export function buildCoverPrompt(draft: ArticleDraft, tone: ImageTone): string {
  const body = [
    draft.metaDescription,
    ...draft.sections.map((section) => `${section.heading} ${section.content}`),
  ].join(" ");
  const concepts = detectVisualConcepts(draft.title, body, draft.focusKeywords);
  const themes = detectThemes(`${draft.title} ${body}`);
  const toneProfile = visualData.tones[tone];
  const keyword = draft.focusKeywords[0];

  const subject = keyword ? `${concepts[0]} evoking ${keyword}` : concepts[0];
  const parts = [
    `A ${tone}, high-quality editorial cover illustration of ${subject}`,
    `set in ${pickSetting(themes, tone)}`,
    `featuring ${[...concepts.slice(1, 3), toneProfile.elements].join(", ")}`,
    `rendered in ${toneProfile.style}`,
    toneProfile.lighting,
    ...pickMood(themes),
    "no text or lettering",
  ];

  return truncateAtComma(parts.join(", "), COVER_PROMPT_BUDGET);
}
