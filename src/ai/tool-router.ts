import {logger} from 'genkit/logging';
import type {ClassifyFn} from '@/ai/classifier';
import type {ModelGateway} from '@/ai/model-gateway';
import type {ImageInput} from '@/lib/image';
import {patchMedicineLinks} from '@/lib/medicine-links';
import {
  DISCLAIMER,
  MODEL_UNAVAILABLE_MESSAGE,
  mismatchBlockedMessage,
  mismatchWarningMessage,
  missingInputMessage,
} from '@/lib/messages';
import {TOOLS, renderAnalysisPrompt, type Category, type ToolId, type ToolSpec, type ToolTable} from '@/lib/tools';

/**
 * @fileOverview Runs one tool against one input: validate, classify, apply the
 * tool's mismatch policy, analyze, post-process.
 *
 * - createToolRouter - binds the router to a classifier, a gateway and a tool table.
 * - renderOutcome - the markdown the UI shows for an outcome.
 */

export type InputPayload = Readonly<{
  image?: ImageInput;
  text?: string;
}>;

export type AnalysisResult = {
  rawText: string;
  patchedText: string;
  succeeded: boolean;
  errorDetail?: string;
};

export type AnalysisOutcome =
  | {status: 'rejected'; message: string}
  | {status: 'blocked'; category: Category; message: string}
  | {status: 'completed'; category: Category; warning?: string; result: AnalysisResult};

export type ToolRouterDeps = {
  classify: ClassifyFn;
  gateway: ModelGateway;
  tools?: ToolTable;
};

export interface ToolRouter {
  analyze(tool: ToolId, payload: InputPayload): Promise<AnalysisOutcome>;
}

function isExpected(tool: ToolSpec, category: Category): boolean {
  if (category === tool.expectedCategory) return true;
  return category === 'Unknown' && tool.acceptsUnknown;
}

export function createToolRouter({classify, gateway, tools = TOOLS}: ToolRouterDeps): ToolRouter {
  const runAnalysis = async (tool: ToolSpec, image?: ImageInput, text?: string): Promise<AnalysisResult> => {
    const prompt = renderAnalysisPrompt(tool, text);
    const response = await gateway.generate(prompt, {image});

    if (!response.ok) {
      return {
        rawText: '',
        patchedText: MODEL_UNAVAILABLE_MESSAGE,
        succeeded: false,
        errorDetail: response.error.detail,
      };
    }

    const rawText = response.value;
    return {
      rawText,
      patchedText: tool.patchesMedicineLinks ? patchMedicineLinks(rawText) : rawText,
      succeeded: true,
    };
  };

  return {
    async analyze(toolId, payload) {
      const tool = tools[toolId];
      const image = tool.modality === 'image' ? payload.image : undefined;
      const text = tool.modality === 'text' ? payload.text?.trim() : undefined;

      if (!image && !text) {
        return {status: 'rejected', message: missingInputMessage(tool)};
      }

      const category = await classify(image, text);

      if (!isExpected(tool, category)) {
        if (tool.mismatchPolicy === 'block') {
          logger.info(`[${tool.id}] blocked: classified as ${category}, expected ${tool.expectedCategory}`);
          return {status: 'blocked', category, message: mismatchBlockedMessage(tool, category)};
        }
        logger.warn(`[${tool.id}] continuing despite ${category} classification`);
        const result = await runAnalysis(tool, image, text);
        return {status: 'completed', category, warning: mismatchWarningMessage(category), result};
      }

      const result = await runAnalysis(tool, image, text);
      logger.info(`[${tool.id}] analysis ${result.succeeded ? 'completed' : 'failed'}`);
      return {status: 'completed', category, result};
    },
  };
}

export function renderOutcome(outcome: AnalysisOutcome): string {
  switch (outcome.status) {
    case 'rejected':
    case 'blocked':
      return outcome.message;
    case 'completed':
      return [outcome.warning, outcome.result.patchedText, DISCLAIMER]
        .filter((block): block is string => Boolean(block))
        .join('\n\n');
  }
}
