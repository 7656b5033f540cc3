import path from 'path';
import { UnsupportedFormatError } from './errors.js';

export type TextFormat = 'txt' | 'pdf';

const FORMAT_BY_EXTENSION: Record<string, TextFormat> = {
  '.txt': 'txt',
  '.pdf': 'pdf',
};

const FORMAT_BY_CONTENT_TYPE: Record<string, TextFormat> = {
  'text/plain': 'txt',
  'application/pdf': 'pdf',
};

export class TextProcessor {
  /**
   * Work out the source format from the file name, falling back to the declared content type.
   */
  static detectFormat(filename: string, contentType?: string | null): TextFormat {
    const byExtension = FORMAT_BY_EXTENSION[path.extname(filename).toLowerCase()];
    if (byExtension) return byExtension;

    const mediaType = contentType?.split(';')[0]?.trim().toLowerCase();
    const byContentType = mediaType ? FORMAT_BY_CONTENT_TYPE[mediaType] : undefined;
    if (byContentType) return byContentType;

    throw new UnsupportedFormatError('Unsupported file format. Only PDF and TXT are supported.');
  }

  static async extractText(content: Uint8Array, format: TextFormat): Promise<string> {
    switch (format) {
      case 'txt':
        return this.decodeUtf8(content);
      case 'pdf':
        return this.extractFromPdf(content);
      default:
        throw new UnsupportedFormatError(`Unsupported format: ${String(format)}`);
    }
  }

  private static decodeUtf8(content: Uint8Array): string {
    return new TextDecoder('utf-8').decode(content).replace(/^\uFEFF/, '');
  }

  /**
   * One paragraph per page; items flagged end-of-line become line breaks.
   */
  private static async extractFromPdf(content: Uint8Array): Promise<string> {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

    let pdf: Awaited<ReturnType<typeof pdfjs.getDocument>['promise']>;
    try {
      pdf = await pdfjs.getDocument({
        data: new Uint8Array(content),
        isEvalSupported: false,
        useSystemFonts: true,
      }).promise;
    } catch (error) {
      throw new UnsupportedFormatError(`Could not read PDF: ${String(error)}`);
    }

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const textContent = await page.getTextContent();
        let pageText = '';
        for (const item of textContent.items) {
          if ('str' in item) {
            pageText += item.str + (item.hasEOL ? '\n' : '');
          }
        }
        pages.push(pageText.trim());
      }
      return pages.filter(Boolean).join('\n\n');
    } finally {
      await pdf.destroy();
    }
  }

  /**
   * Estimate token count (rough approximation: ~4 characters per token for English text)
   */
  static estimateTokenCount(text: string): number {
    return Math.ceil(text.length / 4);
  }

  static sanitizeFilename(filename: string): string {
    const base = path.basename(filename);
    const sanitized = base.replace(/[^A-Za-z0-9._-]/g, '_');
    return sanitized.length > 0 ? sanitized : 'upload';
  }

  static truncate(text: string, maxLength: number): string {
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
  }
}
