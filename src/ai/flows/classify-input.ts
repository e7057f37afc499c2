/**
 * @fileOverview Classifies an uploaded image and/or typed text into a content category.
 *
 * - classifyInput - A function that runs the classification.
 * - ClassifyInput - The input type for the classifyInput function.
 * - ClassifyOutput - The return type for the classifyInput function.
 */

import {ai, classify} from '@/ai/genkit';
import {
  ClassifyInputSchema,
  ClassifyOutputSchema,
  toPayload,
  type ClassifyInput,
  type ClassifyOutput,
} from '@/ai/schemas/input-schema';

export type {ClassifyInput, ClassifyOutput};

export async function classifyInput(input: ClassifyInput): Promise<ClassifyOutput> {
  return classifyInputFlow(input);
}

const classifyInputFlow = ai.defineFlow(
  {
    name: 'classifyInputFlow',
    inputSchema: ClassifyInputSchema,
    outputSchema: ClassifyOutputSchema,
  },
  async input => {
    const {image, text} = toPayload(input);
    return {category: await classify(image, text)};
  }
);
