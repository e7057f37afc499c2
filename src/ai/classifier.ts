import {logger} from 'genkit/logging';
import type {ModelGateway} from '@/ai/model-gateway';
import type {ImageInput} from '@/lib/image';
import type {Category} from '@/lib/tools';

/**
 * @fileOverview Labels an input with one of the fixed categories.
 *
 * The model is asked for a single word but is not trusted to comply, so the
 * whole answer is matched against `CLASSIFICATION_RULES` in order and the
 * first rule with a matching keyword wins.
 */

export const CLASSIFICATION_PROMPT = `Classify the input into ONE category only.
Respond with exactly one of: Prescription, LabReport, Food, Symptoms, Unknown`;

export type ClassificationRule = {
  keywords: readonly string[];
  category: Exclude<Category, 'Unknown'>;
};

// Order is the tie-break: "lab report about a symptom" is a LabReport.
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {keywords: ['prescription', 'medicine'], category: 'Prescription'},
  {keywords: ['lab', 'report'], category: 'LabReport'},
  {keywords: ['food', 'meal', 'calorie'], category: 'Food'},
  {keywords: ['symptom', 'fever', 'pain', 'cough'], category: 'Symptoms'},
];

export function normalizeCategory(raw: string, rules: readonly ClassificationRule[] = CLASSIFICATION_RULES): Category {
  const text = raw.toLowerCase();
  const rule = rules.find(candidate => candidate.keywords.some(keyword => text.includes(keyword)));
  return rule?.category ?? 'Unknown';
}

export type ClassifyFn = (image?: ImageInput, text?: string) => Promise<Category>;

export function createClassifier(gateway: ModelGateway): ClassifyFn {
  return async (image, text) => {
    const trimmed = text?.trim();
    if (!image && !trimmed) return 'Unknown';

    const result = await gateway.generate(CLASSIFICATION_PROMPT, {image, text: trimmed});
    if (!result.ok) {
      logger.warn(`Classification fell back to Unknown: ${result.error.detail}`);
      return 'Unknown';
    }

    const category = normalizeCategory(result.value);
    logger.debug(`Classified input as ${category}`);
    return category;
  };
}
