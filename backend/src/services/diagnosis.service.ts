import { type CompletionParser, parseCompletion } from '../diagnosis/parser';
import { buildDiagnosisPrompt } from '../diagnosis/prompt';
import type { DiagnosisResult } from '../diagnosis/types';
import { type EncodeOptions, encodeImage } from '../image/encoder';
import type { VisionClient } from '../inference/vision-client';

export interface DiagnosisServiceDeps {
  vision: VisionClient;
  upload?: Partial<EncodeOptions>;
  parse?: CompletionParser;
}

export interface LeafUpload {
  bytes: Buffer;
  contentType?: string;
  filename?: string;
}

/**
 * Runs one diagnosis: validate and encode the upload, ask the vision model,
 * read its answer into a DiagnosisResult.
 */
export class DiagnosisService {
  private readonly vision: VisionClient;
  private readonly upload: Partial<EncodeOptions>;
  private readonly parse: CompletionParser;

  constructor(deps: DiagnosisServiceDeps) {
    this.vision = deps.vision;
    this.upload = deps.upload ?? {};
    this.parse = deps.parse ?? parseCompletion;
  }

  async diagnose(upload: LeafUpload): Promise<DiagnosisResult> {
    const label = upload.filename ?? 'upload';
    const image = await encodeImage(upload.bytes, upload.contentType, this.upload);

    const startedAt = Date.now();
    const completion = await this.vision.complete({ prompt: buildDiagnosisPrompt(), image });
    console.info(`[diagnosis] ${label}: model answered in ${Date.now() - startedAt} ms`);

    const { result, strategy } = this.parse(completion);
    if (strategy === 'regex' || strategy === 'defaults') {
      console.warn(`[diagnosis] ${label}: completion was not valid JSON, parsed with ${strategy} strategy`);
    } else {
      console.info(`[diagnosis] ${label}: parsed with ${strategy} strategy`);
    }
    return result;
  }
}
