import { createScheduler, createWorker, OEM, PSM } from 'tesseract.js';

import type {
  ImageVariant,
  OcrDevice,
  OcrEngine,
  RawFragment,
} from '@/lib/ocr/types';

type TesseractBbox = { x0: number; y0: number; x1: number; y1: number };
type TesseractWord = { text: string; bbox: TesseractBbox; confidence: number };
type TesseractLine = { words: TesseractWord[] };
type TesseractParagraph = { lines: TesseractLine[] };
export type TesseractBlock = { paragraphs: TesseractParagraph[] };

export type TesseractEngineOptions = {
  device: OcrDevice;
  workers: number;
  language: string;
  langPath?: string;
  cachePath?: string;
};

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function wordsFromBlocks(
  blocks: TesseractBlock[] | null | undefined,
  variant: ImageVariant,
): RawFragment[] {
  const fragments: RawFragment[] = [];
  for (const block of blocks ?? []) {
    for (const paragraph of block.paragraphs) {
      for (const line of paragraph.lines) {
        for (const word of line.words) {
          const text = word.text.trim();
          if (text.length === 0) continue;
          fragments.push({
            text,
            region: {
              left: word.bbox.x0,
              top: word.bbox.y0,
              width: word.bbox.x1 - word.bbox.x0,
              height: word.bbox.y1 - word.bbox.y0,
            },
            confidence: clamp01(word.confidence / 100),
            source: variant,
          });
        }
      }
    }
  }
  return fragments;
}

export async function createTesseractEngine(
  options: TesseractEngineOptions,
): Promise<OcrEngine> {
  const scheduler = createScheduler();
  // 'cpu' selects the legacy pattern engine; 'accelerated' the LSTM network.
  const oem =
    options.device === 'accelerated' ? OEM.LSTM_ONLY : OEM.TESSERACT_ONLY;

  try {
    for (let i = 0; i < options.workers; i += 1) {
      const worker = await createWorker(options.language, oem, {
        langPath: options.langPath,
        cachePath: options.cachePath,
      });
      await worker.setParameters({
        tessedit_pageseg_mode: PSM.SPARSE_TEXT,
        preserve_interword_spaces: '1',
        user_defined_dpi: '300',
      });
      scheduler.addWorker(worker);
    }
  } catch (err) {
    await scheduler.terminate();
    throw err;
  }

  return {
    device: options.device,
    async detect(image, variant) {
      const result = await scheduler.addJob(
        'recognize',
        image,
        {},
        { blocks: true, text: false },
      );
      return wordsFromBlocks(result.data.blocks, variant);
    },
    async terminate() {
      await scheduler.terminate();
    },
  };
}
