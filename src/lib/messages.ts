import type {Category, ToolSpec} from '@/lib/tools';

export const MODEL_UNAVAILABLE_MESSAGE =
  '⚠️ AI service temporarily unavailable. Please try again later, and consult a doctor or pharmacist if you need advice now.';

export const DISCLAIMER = '⚠️ Informational only. Consult a licensed doctor.';

export function missingInputMessage(tool: ToolSpec): string {
  if (tool.modality === 'text') return 'Please describe your symptoms.';
  return 'Please upload an image (JPEG or PNG) to analyze.';
}

export function mismatchBlockedMessage(tool: ToolSpec, detected: Category): string {
  return `🚫 This looks like **${detected}**, not **${tool.expectedCategory}**. Please upload the right kind of document for ${tool.title}.`;
}

export function mismatchWarningMessage(detected: Category): string {
  return `⚠️ Detected **${detected}**, but continuing. Results may be less reliable.`;
}
