import { createPartFromUri, FileState, GoogleGenAI, type File as GeminiFile } from '@google/genai';
import type { AnalysisPayload } from '../cache/analysis-fields.js';
import { logger } from '../utils/logger.js';
import { IMAGE_ANALYSIS_PROMPT, VIDEO_ANALYSIS_PROMPT, toAnalysisPayload } from './analysis-response.js';
import { ConfigurationError, MediaAnalysisError } from './errors.js';

export interface ImageAnalysisInput {
  bytes: Buffer;
  mimeType: string;
  context?: string;
}

export interface VideoAnalysisInput {
  filePath: string;
  mimeType: string;
  context?: string;
}

export interface MediaAnalyzer {
  readonly model: string;
  analyzeImage(input: ImageAnalysisInput): Promise<AnalysisPayload>;
  analyzeVideo(input: VideoAnalysisInput): Promise<AnalysisPayload>;
}

interface GeminiMediaAnalyzerOptions {
  apiKey?: string;
  model: string;
  pollIntervalMs?: number;
  processingTimeoutMs?: number;
  sleepFn?: (ms: number) => Promise<void>;
}

function withContext(prompt: string, context?: string): string {
  return context ? `${prompt}\nContext: ${context}` : prompt;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GeminiMediaAnalyzer implements MediaAnalyzer {
  readonly model: string;
  private readonly apiKey?: string;
  private readonly pollIntervalMs: number;
  private readonly processingTimeoutMs: number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private client: GoogleGenAI | null = null;

  constructor(options: GeminiMediaAnalyzerOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.processingTimeoutMs = options.processingTimeoutMs ?? 300_000;
    this.sleepFn = options.sleepFn || ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async analyzeImage(input: ImageAnalysisInput): Promise<AnalysisPayload> {
    const ai = this.getClient();
    try {
      const response = await ai.models.generateContent({
        model: this.model,
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { mimeType: input.mimeType, data: input.bytes.toString('base64') } },
              { text: withContext(IMAGE_ANALYSIS_PROMPT, input.context) },
            ],
          },
        ],
        config: { responseMimeType: 'application/json' },
      });
      return toAnalysisPayload(response.text ?? '', this.model);
    } catch (error) {
      throw new MediaAnalysisError(`Image analysis failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async analyzeVideo(input: VideoAnalysisInput): Promise<AnalysisPayload> {
    const ai = this.getClient();
    let uploaded: GeminiFile | undefined;
    try {
      uploaded = await ai.files.upload({ file: input.filePath, config: { mimeType: input.mimeType } });
      const active = await this.waitUntilActive(ai, uploaded);
      if (!active.uri) {
        throw new Error('Uploaded video has no URI');
      }

      const response = await ai.models.generateContent({
        model: this.model,
        contents: [
          {
            role: 'user',
            parts: [
              createPartFromUri(active.uri, active.mimeType ?? input.mimeType),
              { text: withContext(VIDEO_ANALYSIS_PROMPT, input.context) },
            ],
          },
        ],
        config: { responseMimeType: 'application/json' },
      });
      return toAnalysisPayload(response.text ?? '', this.model);
    } catch (error) {
      if (error instanceof MediaAnalysisError) throw error;
      throw new MediaAnalysisError(`Video analysis failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      if (uploaded?.name) {
        await this.deleteUpload(ai, uploaded.name);
      }
    }
  }

  private getClient(): GoogleGenAI {
    if (!this.apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY is not set. Add it to the environment to analyze media.');
    }
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  private async waitUntilActive(ai: GoogleGenAI, file: GeminiFile): Promise<GeminiFile> {
    let current = file;
    let waitedMs = 0;
    while (current.state === FileState.PROCESSING) {
      if (waitedMs >= this.processingTimeoutMs) {
        throw new MediaAnalysisError(`Video processing timed out after ${waitedMs}ms`);
      }
      await this.sleepFn(this.pollIntervalMs);
      waitedMs += this.pollIntervalMs;
      if (!current.name) break;
      current = await ai.files.get({ name: current.name });
    }

    if (current.state === FileState.FAILED) {
      throw new MediaAnalysisError(`Video processing failed for ${current.name ?? 'upload'}`);
    }
    logger.info('Video uploaded for analysis', { name: current.name, waitedMs });
    return current;
  }

  private async deleteUpload(ai: GoogleGenAI, name: string): Promise<void> {
    try {
      await ai.files.delete({ name });
    } catch (error) {
      logger.warn('Failed to delete uploaded video', { name, message: errorMessage(error) });
    }
  }
}
