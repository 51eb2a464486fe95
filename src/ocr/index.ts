/**
 * ocr/index.ts - Text extraction from image bytes
 *
 * OCR is optional. When OCR_LANGUAGES is set, indexing stores the recognized
 * text as the `ocr_text` payload field; the text itself is treated as opaque.
 *
 * Language data is read from the @tesseract.js-data/<lang> npm packages, so
 * starting a worker never fetches anything. A language without an installed
 * package fails at startup, which leaves OCR unavailable.
 */

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { gunzipSync } from "node:zlib";
import { createWorker, OEM, type Worker } from "tesseract.js";

export interface OcrEngine {
  recognize(bytes: Uint8Array): Promise<string>;
  close(): Promise<void>;
}

/** Loads the uncompressed traineddata for one language code */
export type LanguageDataLoader = (code: string) => Promise<Uint8Array>;

/** Directory inside each data package holding the LSTM models */
const DATA_DIR = "4.0.0_best_int";

const require = createRequire(import.meta.url);

/**
 * Reads `<code>.traineddata.gz` from the installed @tesseract.js-data package.
 */
export const readInstalledLanguageData: LanguageDataLoader = async (code) => {
  let packageJson: string;
  try {
    packageJson = require.resolve(`@tesseract.js-data/${code}/package.json`);
  } catch {
    throw new Error(
      `No OCR language data for "${code}": install @tesseract.js-data/${code}`
    );
  }
  const file = path.join(path.dirname(packageJson), DATA_DIR, `${code}.traineddata.gz`);
  return new Uint8Array(gunzipSync(await readFile(file)));
};

/**
 * Splits a Tesseract language string ("deu+eng") into its codes.
 */
export function parseLanguages(languages: string): string[] {
  const codes = languages
    .split("+")
    .map((code) => code.trim())
    .filter((code) => code.length > 0);
  if (codes.length === 0) {
    throw new Error("OCR_LANGUAGES names no language");
  }
  for (const code of codes) {
    if (!/^[a-z_]+$/.test(code)) {
      throw new Error(`Invalid OCR language code "${code}"`);
    }
  }
  return codes;
}

/**
 * Tesseract.js engine with a single worker.
 */
export class TesseractOcr implements OcrEngine {
  private constructor(private readonly worker: Worker) {}

  static async create(
    languages: string,
    loadData: LanguageDataLoader = readInstalledLanguageData
  ): Promise<TesseractOcr> {
    const codes = parseLanguages(languages);
    const langs = await Promise.all(
      codes.map(async (code) => ({ code, data: await loadData(code) }))
    );
    // Data is handed over in memory; cacheMethod "none" keeps the worker
    // from writing .traineddata files into the working directory.
    const worker = await createWorker(langs, OEM.LSTM_ONLY, { cacheMethod: "none" });
    return new TesseractOcr(worker);
  }

  async recognize(bytes: Uint8Array): Promise<string> {
    const { data } = await this.worker.recognize(Buffer.from(bytes));
    return data.text.trim();
  }

  async close(): Promise<void> {
    await this.worker.terminate();
  }
}
