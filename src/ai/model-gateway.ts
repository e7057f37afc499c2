import type {Part} from 'genkit';
import {logger} from 'genkit/logging';
import {describeError} from '@/lib/errors';
import type {ImageInput} from '@/lib/image';
import {err, ok, type Result} from '@/lib/result';

/**
 * @fileOverview The single boundary to the generative model.
 *
 * - ModelGateway - `generate(prompt, attachments)` returning a typed result.
 * - ModelTransport - the raw call underneath; Genkit in production, stubs in tests.
 * - createModelGateway - wraps a transport with the attempt budget.
 * - createGenkitTransport - the Genkit-backed transport; `ai` from `@/ai/genkit` is its client.
 */

export type ModelAttachments = {
  image?: ImageInput;
  text?: string;
};

export type ModelError = {
  code: 'invalid_request' | 'model_unavailable';
  detail: string;
  attempts: number;
};

export interface ModelTransport {
  generate(parts: Part[]): Promise<string>;
}

export interface ModelGateway {
  generate(promptText: string, attachments?: ModelAttachments): Promise<Result<string, ModelError>>;
}

export type ModelGatewayOptions = {
  transport: ModelTransport;
  /** Total attempts, including the first one. */
  maxAttempts: number;
};

export function buildParts(promptText: string, attachments: ModelAttachments = {}): Part[] {
  const parts: Part[] = [{text: promptText}];
  if (attachments.image) {
    parts.push({media: {url: attachments.image.url, contentType: attachments.image.contentType}});
  }
  if (attachments.text) {
    parts.push({text: attachments.text});
  }
  return parts;
}

export function createModelGateway({transport, maxAttempts}: ModelGatewayOptions): ModelGateway {
  const attemptBudget = Math.max(1, Math.floor(maxAttempts));

  return {
    async generate(promptText, attachments) {
      if (!promptText.trim()) {
        return err<ModelError>({code: 'invalid_request', detail: 'empty_prompt', attempts: 0});
      }

      const parts = buildParts(promptText, attachments);
      let lastError = 'unknown_error';

      // Sequential, no backoff. An empty answer is still an answer.
      for (let attempt = 1; attempt <= attemptBudget; attempt++) {
        try {
          const text = await transport.generate(parts);
          return ok(text);
        } catch (error) {
          lastError = describeError(error);
          logger.warn(`Model call failed (attempt ${attempt}/${attemptBudget}): ${lastError}`);
        }
      }

      logger.error(`Model unavailable after ${attemptBudget} attempt(s): ${lastError}`);
      return err<ModelError>({code: 'model_unavailable', detail: lastError, attempts: attemptBudget});
    },
  };
}

export type GenerateClient = {
  generate(options: {model: string; prompt: Part[]; abortSignal?: AbortSignal}): Promise<{text: string}>;
};

/**
 * Aborts the call after `ms` and reports a timeout, but only once the aborted
 * call has settled, so a retry never runs alongside it.
 */
async function withAbortController<T>(fn: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, ms);

  try {
    const value = await fn(controller.signal);
    if (timedOut) throw new Error(`model_timeout_after_${ms}ms`);
    return value;
  } catch (error) {
    throw timedOut ? new Error(`model_timeout_after_${ms}ms`) : error;
  } finally {
    clearTimeout(timer);
  }
}

export function createGenkitTransport(ai: GenerateClient, model: string, timeoutMs: number): ModelTransport {
  return {
    async generate(parts) {
      const response = await withAbortController(
        abortSignal => ai.generate({model, prompt: parts, abortSignal}),
        timeoutMs
      );
      return response.text;
    },
  };
}
