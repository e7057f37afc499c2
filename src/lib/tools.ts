import {z} from 'genkit';

export const CATEGORIES = ['Prescription', 'LabReport', 'Food', 'Symptoms', 'Unknown'] as const;
export type Category = (typeof CATEGORIES)[number];
export const CategorySchema = z.enum(CATEGORIES);

export const TOOL_IDS = ['rx', 'lab', 'food', 'sym'] as const;
export type ToolId = (typeof TOOL_IDS)[number];
export const ToolIdSchema = z.enum(TOOL_IDS);

export type MismatchPolicy = 'block' | 'warn';

export type ToolSpec = {
  id: ToolId;
  title: string;
  modality: 'image' | 'text';
  expectedCategory: Category;
  /** Analysis prompt. `{{symptoms}}` is replaced with the user's text for text tools. */
  analysisPromptTemplate: string;
  mismatchPolicy: MismatchPolicy;
  /** Whether an Unknown classification counts as a match. */
  acceptsUnknown: boolean;
  patchesMedicineLinks: boolean;
};

export type ToolTable = Readonly<Record<ToolId, Readonly<ToolSpec>>>;

const RX_PROMPT = `Analyze this doctor's prescription carefully.

For EACH medicine:
- If it is a BRAND name, suggest the GENERIC equivalent.
- If it is ALREADY GENERIC, say "Already generic".

Output a markdown table with the columns:
Medicine Written | Type | Generic Name | Explanation

After the table, list every brand-name medicine on its own line, exactly in this form:
**Brand Medicine:** <brand name>

Be precise. Do not hallucinate. If a name is illegible, say so instead of guessing.`;

const LAB_PROMPT = `Analyze this lab report.

Output a markdown table with the columns:
Test | Result | Reference Range | Status

Mark every value outside its reference range as **High** or **Low**, then explain in plain language what the abnormal values may indicate.
Do not diagnose. Recommend discussing the results with a doctor.`;

const FOOD_PROMPT = `Identify the food shown in this image and estimate its nutrition.

Output a markdown table with the columns:
Item | Estimated Portion | Calories (kcal) | Protein (g) | Carbs (g) | Fat (g)

Finish with the estimated total calories and one line on how balanced the meal is. State that all values are estimates.`;

const SYMPTOMS_PROMPT = `A person describes the following symptoms:
"{{symptoms}}"

Provide:
1. Possible causes, most likely first.
2. Severity: Mild, Moderate or Urgent, with a one-line reason.
3. Self-care advice that is safe to try at home.
4. Warning signs that mean they should see a doctor or seek emergency care.

Do not give a diagnosis or prescribe medication.`;

const TOOL_SPECS: Record<ToolId, ToolSpec> = {
  rx: {
    id: 'rx',
    title: '💊 Generic Medicine Intelligence',
    modality: 'image',
    expectedCategory: 'Prescription',
    analysisPromptTemplate: RX_PROMPT,
    mismatchPolicy: 'block',
    acceptsUnknown: true,
    patchesMedicineLinks: true,
  },
  lab: {
    id: 'lab',
    title: '📋 Lab Report Pro',
    modality: 'image',
    expectedCategory: 'LabReport',
    analysisPromptTemplate: LAB_PROMPT,
    mismatchPolicy: 'block',
    acceptsUnknown: true,
    patchesMedicineLinks: false,
  },
  food: {
    id: 'food',
    title: '🍎 Nutritional AI',
    modality: 'image',
    expectedCategory: 'Food',
    analysisPromptTemplate: FOOD_PROMPT,
    mismatchPolicy: 'warn',
    acceptsUnknown: true,
    patchesMedicineLinks: false,
  },
  sym: {
    id: 'sym',
    title: '🌡️ Symptom Checker',
    modality: 'text',
    expectedCategory: 'Symptoms',
    analysisPromptTemplate: SYMPTOMS_PROMPT,
    mismatchPolicy: 'warn',
    acceptsUnknown: true,
    patchesMedicineLinks: false,
  },
};

for (const spec of Object.values(TOOL_SPECS)) Object.freeze(spec);

export const TOOLS: ToolTable = Object.freeze(TOOL_SPECS);

export function renderAnalysisPrompt(tool: ToolSpec, text?: string): string {
  return tool.analysisPromptTemplate.replace('{{symptoms}}', () => (text ?? '').trim());
}
