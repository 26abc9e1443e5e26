/**
 * OCR collaborators: extraction and image lookup
 */

export { TesseractExtractor, type OcrExtractor, type TesseractOptions } from './extractor.js';
export { DirectoryImageStore, type ImageStore } from './image-store.js';
export { OcrError } from './errors.js';
