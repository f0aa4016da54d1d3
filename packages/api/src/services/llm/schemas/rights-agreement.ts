/**
 * @fileoverview Rights Agreement Extraction Schema
 *
 * Top-level shape of a parsed licensing agreement. Only the presence of the
 * required sections is enforced; their contents are whatever structure the
 * engine produced (strings, objects or arrays), because agreements vary too
 * much for a closed schema. Every required key is present in a validated
 * payload, possibly with a null value.
 */

import { z } from 'zod';

/**
 * Required top-level sections, in prompt order.
 */
export const REQUIRED_FIELDS = [
  'parties',
  'content',
  'territory',
  'media_rights',
  'term',
  'financial_terms',
  'deliverables',
  'technical_specifications',
  'governing_law',
  'signatories'
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** Plain-language description of each section, used to build the prompt. */
export const FIELD_DESCRIPTIONS: Record<RequiredField, string> = {
  parties: 'licensor and licensee (legal names, addresses, roles)',
  content: 'identification of the licensed content (title, type, language, episodes or runtime)',
  territory: 'territories where the rights apply, as written',
  media_rights: 'media and platforms licensed (e.g. SVOD, AVOD, linear TV), with any holdbacks',
  term: 'licence period and exclusivity (duration, start and end dates, exclusive or not)',
  financial_terms: 'fees, currency, payment schedule and revenue share, amounts exactly as written',
  deliverables: 'materials the licensor must deliver',
  technical_specifications: 'format, resolution, audio and subtitle requirements',
  governing_law: 'governing law and dispute forum',
  signatories: 'people who signed, with title and date where given'
};

/**
 * A single non-empty JSON object. Any value is allowed per key.
 */
export const ParsedAgreementSchema = z
  .record(z.string(), z.unknown())
  .refine(obj => Object.keys(obj).length > 0, { message: 'object is empty' });

/** Validated payload; every required section is present, possibly null. */
export type ParsedAgreement = Record<string, unknown>;

/**
 * Fill every missing required section with null.
 */
export function withRequiredFields(obj: Record<string, unknown>): ParsedAgreement {
  const filled: ParsedAgreement = { ...obj };
  for (const field of REQUIRED_FIELDS) {
    if (filled[field] === undefined) filled[field] = null;
  }
  return filled;
}

export function missingFields(obj: Record<string, unknown>): RequiredField[] {
  return REQUIRED_FIELDS.filter(field => !(field in obj));
}
