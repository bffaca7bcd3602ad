import { GoogleGenAI } from '@google/genai';
import type { AnalystContext } from '../types';
import { ConfigurationError, ProviderError } from './errors';
import { createLogger } from './logger';

const log = createLogger('memo');

const SYSTEM_PROMPT = `
You are a buy-side Fundamental Analyst. Your job is to write a short, auditable investment memo around an FCFF-DCF valuation that has already been computed. You must never fabricate numbers. If a metric is missing, state it is unavailable and list it under limitations. Your memo must only use numbers contained in the provided context object. Use conditional language and explicitly disclose approximations (e.g., book debt proxy, Kd assumption, FCFF built from the latest period).
`;

const MEMO_TEMPLATE_INSTRUCTION = `
Output the final memo in Markdown exactly following the memo template headings:

### Title
**{{meta.ticker}} — Fundamental Analyst Memo (FCFF DCF)**
Date (UTC): {{meta.generated_at_utc}}
Data source: {{meta.source}} (cache_used={{meta.cache_used}})

### 1) Executive Summary
- Verdict ({{valuation.verdict}}) with conditional language.
- Intrinsic value per share and upside/downside vs market price (if available).
- One-paragraph rationale referencing **only** context numbers.

### 2) Cash Flow Build
- Base-year FCF: {{valuation.base_fcf}}, statement date {{valuation.statement_date}}.
- Projection: horizon={{inputs.horizon_years}}, growth={{inputs.growth}}, discount={{inputs.discount_rate}}, terminal g={{inputs.terminal_growth}}.
- PV of forecast vs PV of terminal value; note how much of EV the terminal value carries.

### 3) Capital Structure & Discount Rate
- Equity (market cap E), Debt (book D), Cash, Net debt from capital_structure.
- If wacc is present: Ke, Kd, tax rate, weights and WACC from the wacc block. If wacc is null, say the discount rate was supplied by the user.

### 4) Scenarios & Sensitivity
- If sensitivity is present, create a standard Markdown table for the Bear/Base/Bull scenarios.
  Columns: **Scenario**, **WACC**, **Value Per Share**, **Upside/Downside**.
  Ensure there is an empty line before and after the table.
- Describe the WACC×g grid in words (do not invent numbers). If sensitivity is null, say it was not run.

### 5) Risks & Limitations
- List risks tied to assumptions (discount rate, growth, terminal g).
- List limitations EXACTLY from context.limitations (no new claims).
- List every entry of context.warnings.
`;

export interface MemoOptions {
  apiKey: string | undefined;
  model: string;
}

export const buildMemoPrompt = (context: AnalystContext): string => `
    ${MEMO_TEMPLATE_INSTRUCTION}

    Here is the DATA CONTEXT you MUST use. Do not use outside data:
    \`\`\`json
    ${JSON.stringify(context, null, 2)}
    \`\`\`
  `;

export const generateMemo = async (context: AnalystContext, options: MemoOptions): Promise<string> => {
  if (!options.apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY is required for --memo');
  }

  const ai = new GoogleGenAI({ apiKey: options.apiKey });

  let text: string | undefined;
  try {
    const response = await ai.models.generateContent({
      model: options.model,
      contents: buildMemoPrompt(context),
      config: {
        systemInstruction: SYSTEM_PROMPT,
        temperature: 0.3, // Lower temperature for more factual output
      },
    });
    text = response.text;
  } catch (error) {
    log.error('Gemini API error', error instanceof Error ? error.message : error);
    throw new ProviderError('memo', `Memo generation failed: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!text) {
    throw new ProviderError('memo', 'Memo generation returned no text');
  }
  return text;
};
