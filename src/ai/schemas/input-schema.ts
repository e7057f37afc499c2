import {z} from 'genkit';
import type {AnalysisOutcome, InputPayload} from '@/ai/tool-router';
import {imageFromDataUri} from '@/lib/image';
import {CategorySchema, ToolIdSchema} from '@/lib/tools';

/**
 * @fileOverview Zod schemas for the flow boundary, shared by the classify and
 * analyze flows, and the conversions between them and the router's types.
 */

const PhotoDataUriSchema = z
  .string()
  .refine(uri => imageFromDataUri(uri) !== null, 'Expected a JPEG or PNG image as a base64 data URI.')
  .describe(
    "An image as a data URI that must include a MIME type and use Base64 encoding. Expected format: 'data:<mimetype>;base64,<encoded_data>'."
  );

export const ClassifyInputSchema = z.object({
  photoDataUri: PhotoDataUriSchema.optional(),
  text: z.string().optional().describe('Free text typed by the user.'),
});
export type ClassifyInput = z.infer<typeof ClassifyInputSchema>;

export const ClassifyOutputSchema = z.object({
  category: CategorySchema.describe('The detected content category.'),
});
export type ClassifyOutput = z.infer<typeof ClassifyOutputSchema>;

export const AnalyzeInputSchema = ClassifyInputSchema.extend({
  tool: ToolIdSchema.describe('The tool the user selected on the dashboard.'),
});
export type AnalyzeInput = z.infer<typeof AnalyzeInputSchema>;

export const AnalyzeOutputSchema = z.object({
  status: z.enum(['rejected', 'blocked', 'completed']),
  category: CategorySchema.optional().describe('Absent when the input was rejected before classification.'),
  warning: z.string().optional(),
  rawText: z.string().describe('The model output before post-processing. Empty unless the analysis ran.'),
  markdown: z.string().describe('What the UI should render.'),
  succeeded: z.boolean(),
  errorDetail: z.string().optional(),
});
export type AnalyzeOutput = z.infer<typeof AnalyzeOutputSchema>;

export function toPayload(input: ClassifyInput): InputPayload {
  const image = input.photoDataUri ? imageFromDataUri(input.photoDataUri) : null;
  return {image: image ?? undefined, text: input.text};
}

export function toAnalyzeOutput(outcome: AnalysisOutcome, markdown: string): AnalyzeOutput {
  switch (outcome.status) {
    case 'rejected':
      return {status: 'rejected', rawText: '', markdown, succeeded: false};
    case 'blocked':
      return {status: 'blocked', category: outcome.category, rawText: '', markdown, succeeded: false};
    case 'completed':
      return {
        status: 'completed',
        category: outcome.category,
        warning: outcome.warning,
        rawText: outcome.result.rawText,
        markdown,
        succeeded: outcome.result.succeeded,
        errorDetail: outcome.result.errorDetail,
      };
  }
}
