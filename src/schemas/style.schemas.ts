/**
 * Style Engine Schemas
 *
 * Zod schemas for persisted rule sets, index snapshots and the bundled
 * clinical term tables.
 */

import { z } from 'zod';
import { CHUNK_RULE_TYPES, RULE_CATEGORIES, RULE_TYPES } from '../types/style-guide.types';

// ============================================
// ENUMS
// ============================================

export const ruleCategoryEnum = z.enum(RULE_CATEGORIES);

export const ruleTypeEnum = z.enum(RULE_TYPES);

export const chunkRuleTypeEnum = z.enum(CHUNK_RULE_TYPES);

// ============================================
// RULES & CHUNKS
// ============================================

const ruleFields = {
  category: ruleCategoryEnum,
  type: ruleTypeEnum,
  description: z.string().max(2000).default(''),
  pattern: z.string().trim().min(1, 'Pattern is required').max(500),
  replacement: z.string().max(500),
  examples: z.array(z.string()).default([]),
  context: z.record(z.string()).default({}),
};

const requireReplacement = (rule: { replacement: string; context: Record<string, string> }): boolean =>
  rule.replacement.length > 0 || rule.context.action === 'delete';

const replacementIssue = {
  message: 'Replacement may only be empty for deletion rules',
  path: ['replacement'],
};

export const styleRuleSchema = z
  .object({ id: z.string().min(1), ...ruleFields })
  .refine(requireReplacement, replacementIssue);

/**
 * Rule as it appears in an imported rule set; a missing id is generated on import
 */
export const importedRuleSchema = z
  .object({ id: z.string().min(1).optional(), ...ruleFields })
  .refine(requireReplacement, replacementIssue);

/**
 * Rule-set document; rules are validated one by one so a bad entry is skipped
 * rather than failing the whole import
 */
export const ruleSetDocumentSchema = z.object({
  version: z.string(),
  exportedAt: z.string().optional(),
  rules: z.array(z.unknown()),
});

export const styleChunkSchema = z.object({
  content: z.string(),
  ruleType: chunkRuleTypeEnum,
  section: z.string(),
  examples: z.array(z.string()),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  embedding: z.array(z.number()).optional(),
});

// ============================================
// INDEX SNAPSHOT
// ============================================

export const indexedItemSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('rule'), rule: styleRuleSchema }),
  z.object({ kind: z.literal('chunk'), chunk: styleChunkSchema }),
]);

export const INDEX_SNAPSHOT_VERSION = 1;

export const indexSnapshotSchema = z
  .object({
    version: z.literal(INDEX_SNAPSHOT_VERSION),
    dimension: z.number().int().positive(),
    items: z.array(indexedItemSchema),
    vectors: z.array(z.array(z.number())),
  })
  .refine((snapshot) => snapshot.items.length === snapshot.vectors.length, {
    message: 'Every indexed item needs exactly one vector',
    path: ['vectors'],
  })
  .refine((snapshot) => snapshot.vectors.every((vector) => vector.length === snapshot.dimension), {
    message: 'Vector length does not match index dimension',
    path: ['vectors'],
  });

// ============================================
// CLINICAL TERMS
// ============================================

export const clinicalTermsSchema = z.object({
  structureTerms: z.array(z.string().min(1)),
  properTerms: z.array(z.string().min(1)),
  firstMentionAbbreviations: z.array(
    z.object({
      term: z.string().min(1),
      abbreviation: z.string().min(1),
    })
  ),
  acronyms: z.array(z.string().min(1)),
  units: z.record(z.string()),
  phaseNumbers: z.record(z.string()),
});

// ============================================
// TYPE EXPORTS
// ============================================

export type ImportedRule = z.infer<typeof importedRuleSchema>;
export type RuleSetDocument = z.infer<typeof ruleSetDocumentSchema>;
export type IndexSnapshot = z.infer<typeof indexSnapshotSchema>;
export type ClinicalTerms = z.infer<typeof clinicalTermsSchema>;
