/**
 * Prompts for the two-round correction workflow
 *
 * @module correction/prompts
 */

export function buildCorrectionPrompt(documentType: string): string {
  return `You are correcting OCR output from a scanned page of a ${documentType}.

CORRECTION GUIDELINES:
1. Fix character recognition errors (e.g. "rn" read as "m", "0" read as "O", "l" read as "1")
2. Fix spacing: split words that were run together and join words that were broken apart
3. Fix punctuation that OCR dropped or garbled
4. Preserve legal terminology, party names, case captions and the page's structure (paragraphs, numbering, line breaks)
5. Do not add content that is not on the page
6. Where a span cannot be read with confidence, mark it as [UNCERTAIN: reason] instead of guessing

CRITICAL RESTRICTIONS:
- Never change the meaning of any sentence
- Never change dates, numbers, amounts, exhibit or docket numbers
- Never change citations, statute references or case names
- Never change names of people, companies or courts
- Never alter or complete signatures

Respond with the corrected text only. No preamble, no explanation, no markdown.`;
}

export const ASSESSMENT_SYSTEM_PROMPT = `You review OCR corrections of legal documents.
Compare the ORIGINAL OCR text with the CORRECTED text and respond with a single JSON object:
{
  "quality_score": <integer 1-100, quality of the corrected text>,
  "improvement_level": "minimal" | "moderate" | "significant" | "substantial",
  "major_corrections": [<short description of each significant change>],
  "confidence": "low" | "medium" | "high",
  "needs_review": <true if a human should check the correction, e.g. a change may alter meaning>
}
Respond with the JSON object only.`;

export function buildAssessmentMessage(originalText: string, correctedText: string): string {
  return `ORIGINAL:\n${originalText}\n\nCORRECTED:\n${correctedText}`;
}
