import { analysisPayloadSchema, type AnalysisPayload } from '../cache/analysis-fields.js';
import type { MediaFacts } from '../cache/types.js';

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export const IMAGE_ANALYSIS_PROMPT = [
  'Analyze this advertisement image and respond with a single JSON object.',
  'Include: "summary", "brand_elements", "people_description" (empty string when nobody is shown),',
  '"colors": { "dominant_colors": [color names] }, "text_elements": { "headline": ..., "body_text": [...], "call_to_action": ... },',
  '"composition", "target_audience" and "creative_strategy".',
].join(' ');

export const VIDEO_ANALYSIS_PROMPT = [
  'Analyze this advertisement video and respond with a single JSON object.',
  'Include: "summary", "scenes" (timestamped), "hook", "people_description" (empty string when nobody is shown),',
  '"colors": { "dominant_colors": [color names] }, "text_elements": { "on_screen_text": [...], "call_to_action": ... },',
  '"audio": { "has_voiceover": boolean, "has_music": boolean, "music_description", "transcript" }, "duration_seconds" and "creative_strategy".',
].join(' ');

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? match[1] : trimmed;
}

/**
 * Turns model output into a stored analysis. Output that is not a JSON object
 * is kept verbatim under `raw_analysis`.
 */
export function toAnalysisPayload(text: string, model: string): AnalysisPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch {
    return { raw_analysis: text, model_used: model };
  }

  const payload = analysisPayloadSchema.safeParse(parsed);
  if (!payload.success) {
    return { raw_analysis: text, model_used: model };
  }
  return { ...payload.data, model_used: model };
}

/** Reads `duration_seconds` and `audio` hints from a video analysis. */
export function videoFacts(analysis: AnalysisPayload): MediaFacts {
  const facts: MediaFacts = {};
  const duration = analysis.duration_seconds;
  if (typeof duration === 'number' && Number.isFinite(duration) && duration >= 0) {
    facts.durationSeconds = duration;
  }
  const audio = analysis.audio;
  if (typeof audio === 'object' && audio !== null && !Array.isArray(audio)) {
    // Descriptions such as "none" or "silent" say nothing; only flags and a transcript count.
    const flagged = Object.values(audio).some((value) => value === true);
    const transcript = 'transcript' in audio ? audio.transcript : undefined;
    facts.hasAudio = flagged || (typeof transcript === 'string' && transcript.trim() !== '');
  }
  return facts;
}
