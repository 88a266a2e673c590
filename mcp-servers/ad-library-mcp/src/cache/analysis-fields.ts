import { z } from 'zod';

/**
 * Analysis documents are free-form JSON objects. Only the handful of fields
 * below are read by the cache, and only when an analysis is written.
 */
export const analysisPayloadSchema = z.record(z.string(), z.unknown());

export type AnalysisPayload = z.infer<typeof analysisPayloadSchema>;

export interface DerivedAnalysisFields {
  dominantColors: string[];
  hasPeople: boolean;
  textElements: string[];
}

const dominantColorsShape = z.object({
  colors: z.object({
    dominant_colors: z.array(z.unknown()),
  }),
});

const peopleShape = z.object({
  people_description: z.string(),
});

const textElementsShape = z.object({
  text_elements: z.record(z.string(), z.unknown()),
});

function onlyStrings(values: unknown[]): string[] {
  return values.filter((value): value is string => typeof value === 'string');
}

export function extractDominantColors(analysis: AnalysisPayload): string[] {
  const parsed = dominantColorsShape.safeParse(analysis);
  if (!parsed.success) return [];
  return onlyStrings(parsed.data.colors.dominant_colors);
}

export function extractHasPeople(analysis: AnalysisPayload): boolean {
  const parsed = peopleShape.safeParse(analysis);
  if (!parsed.success) return false;
  return parsed.data.people_description.trim().length > 0;
}

export function extractTextElements(analysis: AnalysisPayload): string[] {
  const parsed = textElementsShape.safeParse(analysis);
  if (!parsed.success) return [];

  const texts: string[] = [];
  for (const value of Object.values(parsed.data.text_elements)) {
    if (Array.isArray(value)) {
      texts.push(...onlyStrings(value));
    } else if (typeof value === 'string') {
      texts.push(value);
    }
  }
  return texts;
}

export function deriveAnalysisFields(analysis?: AnalysisPayload): DerivedAnalysisFields {
  if (!analysis) {
    return { dominantColors: [], hasPeople: false, textElements: [] };
  }
  return {
    dominantColors: extractDominantColors(analysis),
    hasPeople: extractHasPeople(analysis),
    textElements: extractTextElements(analysis),
  };
}
