import { createRequire } from 'node:module'
import path from 'node:path'
import type { Worker } from 'tesseract.js'
import { ExtractionError, errorMessage } from '@domain/errors.ts'

/** Anything that can turn an image into raw text. */
export interface TextExtractor {
  extractText(image: Buffer): Promise<string>
}

export interface TesseractOptions {
  lang: string
  /** Directory holding `<lang>.traineddata.gz`. English defaults to the bundled data. */
  langPath?: string
}

export const BUNDLED_LANG = 'eng'

const require = createRequire(import.meta.url)

/** Directory of the English model installed with `@tesseract.js-data/eng`. */
export function bundledLangPath(): string {
  const pkg = require.resolve('@tesseract.js-data/eng/package.json')
  return path.join(path.dirname(pkg), '4.0.0_best_int')
}

export class TesseractTextExtractor implements TextExtractor {
  private readonly options: TesseractOptions

  constructor(options: TesseractOptions) {
    this.options = options
  }

  async extractText(image: Buffer): Promise<string> {
    const worker = await this.startWorker()

    let text: string
    try {
      const { data } = await worker.recognize(image)
      text = data.text
    } catch (err) {
      throw new ExtractionError(`Failed to process image: ${errorMessage(err)}`, { cause: err })
    } finally {
      await worker.terminate()
    }

    const trimmed = text.trim()
    if (!trimmed) throw new ExtractionError('No text found in image')
    return trimmed
  }

  private async startWorker(): Promise<Worker> {
    const { lang } = this.options
    try {
      const langPath = this.options.langPath ?? (lang === BUNDLED_LANG ? bundledLangPath() : undefined)
      const { createWorker } = await import('tesseract.js')
      return await createWorker(lang, undefined, langPath ? { langPath } : {})
    } catch (err) {
      throw new ExtractionError(`OCR engine unavailable: ${errorMessage(err)}`, { cause: err })
    }
  }
}
