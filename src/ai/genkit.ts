import 'dotenv/config';
import {googleAI} from '@genkit-ai/googleai';
import {genkit} from 'genkit';
import {logger} from 'genkit/logging';
import {createClassifier} from '@/ai/classifier';
import {createGenkitTransport, createModelGateway} from '@/ai/model-gateway';
import {createToolRouter} from '@/ai/tool-router';
import {loadConfig} from '@/lib/config';

// Throws MissingCredentialError when no API key can be found; nothing runs without one.
export const config = loadConfig();

logger.setLogLevel(config.logLevel);

export const ai = genkit({
  plugins: [googleAI({apiKey: config.apiKey})],
  model: config.modelName,
});

export const gateway = createModelGateway({
  transport: createGenkitTransport(ai, config.modelName, config.timeoutMs),
  maxAttempts: config.maxAttempts,
});

export const classify = createClassifier(gateway);

export const router = createToolRouter({classify, gateway});
