import { toAnalysisPayload, videoFacts } from '../clients/analysis-response.js';

describe('toAnalysisPayload', () => {
  it('parses a fenced JSON object and records the model', () => {
    const text = '```json\n{"summary":"Runner at dawn","people_description":"one runner"}\n```';

    expect(toAnalysisPayload(text, 'gemini-test')).toEqual({
      summary: 'Runner at dawn',
      people_description: 'one runner',
      model_used: 'gemini-test',
    });
  });

  it('parses bare JSON and overrides any model_used from the output', () => {
    expect(toAnalysisPayload('{"summary":"x","model_used":"other"}', 'gemini-test')).toEqual({
      summary: 'x',
      model_used: 'gemini-test',
    });
  });

  it('keeps non-JSON output verbatim', () => {
    expect(toAnalysisPayload('A bright product shot.', 'gemini-test')).toEqual({
      raw_analysis: 'A bright product shot.',
      model_used: 'gemini-test',
    });
  });

  it('keeps JSON that is not an object verbatim', () => {
    expect(toAnalysisPayload('["a","b"]', 'gemini-test')).toEqual({
      raw_analysis: '["a","b"]',
      model_used: 'gemini-test',
    });
  });
});

describe('videoFacts', () => {
  it('reads duration and audio presence from flags', () => {
    expect(
      videoFacts({ duration_seconds: 14.5, audio: { has_voiceover: false, has_music: true, transcript: '' } })
    ).toEqual({ durationSeconds: 14.5, hasAudio: true });
  });

  it('treats a spoken transcript as audio', () => {
    expect(videoFacts({ audio: { has_voiceover: false, transcript: 'Shop now' } })).toEqual({ hasAudio: true });
  });

  it('does not read descriptive text as audio presence', () => {
    expect(
      videoFacts({ audio: { has_voiceover: false, has_music: false, music_description: 'none', transcript: ' ' } })
    ).toEqual({ hasAudio: false });
    expect(videoFacts({ audio: { music: 'silent', notes: 'no sound' } })).toEqual({ hasAudio: false });
  });

  it('ignores invalid durations and missing audio', () => {
    expect(videoFacts({ duration_seconds: -3 })).toEqual({});
    expect(videoFacts({ duration_seconds: '12' })).toEqual({});
  });
});
