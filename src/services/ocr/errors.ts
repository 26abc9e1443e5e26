/**
 * OCR extraction errors
 *
 * @module ocr/errors
 */

export class OcrError extends Error {
  constructor(
    message: string,
    public readonly imagePath: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'OcrError';
  }
}
