// Entry point for the Genkit developer UI: `npm run genkit:dev`.
import '@/ai/flows/classify-input';
import '@/ai/flows/analyze-input';
