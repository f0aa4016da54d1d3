/**
 * @fileoverview Rights Agreement Extraction Prompt
 *
 * The engine gives no structural guarantee, so the prompt asks for a single JSON
 * object with fixed top-level keys and forbids prose. Whatever comes back is
 * still cleaned and validated by the orchestrator.
 */

import type { EnginePrompt } from '../client';
import { FIELD_DESCRIPTIONS, REQUIRED_FIELDS } from '../schemas/rights-agreement';

const SYSTEM = `You are a precise extraction assistant for media rights-licensing agreements.

Rules:
- Extract only what the agreement states. Never invent parties, amounts or dates.
- Copy monetary values and durations exactly as written, including currency and units (e.g. "USD 2,500,000", "5 years").
- Write dates as YYYY-MM-DD when the document gives a full date; otherwise copy them as written.
- Use null for a section the agreement does not cover.
- Respond with one JSON object and nothing else: no markdown fences, no commentary.`;

/**
 * Build the engine prompt for one agreement.
 *
 * @param text - Plain text of the agreement, already truncated by the caller
 *
 * @example
 * ```typescript
 * const prompt = buildRightsAgreementPrompt(agreementText);
 * const output = await engine.generate(prompt, { signal });
 * ```
 */
export function buildRightsAgreementPrompt(text: string): EnginePrompt {
  const fields = REQUIRED_FIELDS.map(field => `- ${field}: ${FIELD_DESCRIPTIONS[field]}`).join('\n');
  const prompt = `Extract the deal terms from the agreement below.

Return a JSON object with exactly these top-level keys:
${fields}

Each value may be a string, an object or an array, whichever fits the agreement best.

<<<AGREEMENT
${text}
AGREEMENT>>>`;
  return { system: SYSTEM, prompt };
}
