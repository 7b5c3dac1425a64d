/**
 * Google Cloud Vision label service: web detection + OCR, batched.
 */

import { ImageAnnotatorClient } from '@google-cloud/vision';

import { describeError } from '../shared/errors.js';
import { nullSink, type EventSink } from '../shared/events.js';
import type { LabelResult } from '../shared/types.js';

export interface ImageBytes {
  locator: string;
  content: Buffer;
}

export interface LabelService {
  /** One result per input image, same order. Per-image failures come back as `error`. */
  annotate(images: ImageBytes[]): Promise<LabelResult[]>;
}

/** The slice of a Vision AnnotateImageResponse we read. */
export interface VisionResponse {
  webDetection?: {
    pagesWithMatchingImages?: Array<{ url?: string | null }> | null;
    bestGuessLabels?: Array<{ label?: string | null }> | null;
  } | null;
  textAnnotations?: Array<{ description?: string | null }> | null;
  error?: { message?: string | null } | null;
}

export interface VisionBatchClient {
  batchAnnotateImages(request: {
    requests: Array<{
      image: { content: Buffer };
      features: Array<{ type: 'WEB_DETECTION' | 'TEXT_DETECTION'; maxResults?: number }>;
    }>;
  }): Promise<[{ responses?: VisionResponse[] | null }, ...unknown[]]>;
}

export const MAX_BATCH_SIZE = 16;
const WEB_MAX_RESULTS = 10;

export function normalizeVisionResponse(locator: string, response: VisionResponse | undefined): LabelResult {
  if (!response) {
    return { locator, pageUrls: [], bestGuessLabel: null, ocrText: null, error: 'no response for image' };
  }
  if (response.error?.message) {
    return { locator, pageUrls: [], bestGuessLabel: null, ocrText: null, error: response.error.message };
  }

  const web = response.webDetection;
  const pageUrls = (web?.pagesWithMatchingImages ?? [])
    .map((p) => p.url ?? '')
    .filter((u) => u !== '');
  const bestGuessLabel = web?.bestGuessLabels?.[0]?.label || null;
  const ocrText = response.textAnnotations?.[0]?.description || null;

  return { locator, pageUrls, bestGuessLabel, ocrText, error: null };
}

export class VisionLabelService implements LabelService {
  private readonly client: VisionBatchClient;
  private readonly batchSize: number;
  private readonly events: EventSink;

  constructor(opts: { batchSize: number; client?: VisionBatchClient; events?: EventSink }) {
    this.client = opts.client ?? new ImageAnnotatorClient();
    this.batchSize = Math.min(MAX_BATCH_SIZE, Math.max(1, opts.batchSize));
    this.events = opts.events ?? nullSink;
  }

  async annotate(images: ImageBytes[]): Promise<LabelResult[]> {
    const out: LabelResult[] = [];

    for (let i = 0; i < images.length; i += this.batchSize) {
      const batch = images.slice(i, i + this.batchSize);
      try {
        const [response] = await this.client.batchAnnotateImages({
          requests: batch.map((img) => ({
            image: { content: img.content },
            features: [
              { type: 'WEB_DETECTION', maxResults: WEB_MAX_RESULTS },
              { type: 'TEXT_DETECTION' },
            ],
          })),
        });
        const responses = response.responses ?? [];
        batch.forEach((img, j) => out.push(normalizeVisionResponse(img.locator, responses[j])));
      } catch (err) {
        // the whole batch failed; each image goes to review with the reason
        const error = `label batch failed: ${describeError(err)}`;
        this.events.emit({ type: 'warn', message: error });
        for (const img of batch) {
          out.push({ locator: img.locator, pageUrls: [], bestGuessLabel: null, ocrText: null, error });
        }
      }
    }

    return out;
  }
}
