#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';

import dotenv from 'dotenv';

import { loadConfig } from './config';
import { buildDiagnosisReport } from './diagnosis/report';
import { DiagnosisError } from './errors';
import { createAnthropicVisionClient } from './inference/vision-client';
import { DiagnosisService } from './services/diagnosis.service';

const CONTENT_TYPES: Partial<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

const USAGE = 'Usage: leaf-doctor <image-path> [--report]';

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      report: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [imagePath] = positionals;
  if (values.help || imagePath === undefined) {
    console.log(USAGE);
    return imagePath === undefined && !values.help ? 1 : 0;
  }

  dotenv.config();
  const config = loadConfig();
  const service = new DiagnosisService({
    vision: createAnthropicVisionClient(config),
    upload: config.upload,
  });

  const bytes = await readFile(imagePath);
  const result = await service.diagnose({
    bytes,
    contentType: CONTENT_TYPES[path.extname(imagePath).toLowerCase()],
    filename: path.basename(imagePath),
  });

  const output = values.report ? { result, report: buildDiagnosisReport(result) } : result;
  console.log(JSON.stringify(output, null, 2));
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof DiagnosisError) {
      console.error(JSON.stringify({ error: error.message, code: error.code }));
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  },
);
