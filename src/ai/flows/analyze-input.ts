/**
 * @fileOverview Runs the selected tool (prescription, lab report, food or symptoms)
 * against the user's input and returns the markdown to render.
 *
 * - analyzeInput - A function that runs the analysis.
 * - AnalyzeInput - The input type for the analyzeInput function.
 * - AnalyzeOutput - The return type for the analyzeInput function.
 */

import {ai, router} from '@/ai/genkit';
import {
  AnalyzeInputSchema,
  AnalyzeOutputSchema,
  toAnalyzeOutput,
  toPayload,
  type AnalyzeInput,
  type AnalyzeOutput,
} from '@/ai/schemas/input-schema';
import {renderOutcome} from '@/ai/tool-router';

export type {AnalyzeInput, AnalyzeOutput};

export async function analyzeInput(input: AnalyzeInput): Promise<AnalyzeOutput> {
  return analyzeInputFlow(input);
}

const analyzeInputFlow = ai.defineFlow(
  {
    name: 'analyzeInputFlow',
    inputSchema: AnalyzeInputSchema,
    outputSchema: AnalyzeOutputSchema,
  },
  async input => {
    const outcome = await router.analyze(input.tool, toPayload(input));
    return toAnalyzeOutput(outcome, renderOutcome(outcome));
  }
);
