/**
 * Correction Engine Service Tests
 */
import { describe, it, expect, vi } from 'vitest';
import {
  CorrectionEngineService,
  formatChangeMarker,
  type MatchSource,
} from '../../../../src/services/correction/correction-engine.service';
import { applyRecords } from '../../../../src/services/correction/deterministic-corrections';
import { RuleExtractorService } from '../../../../src/services/style/rule-extractor.service';
import { logger } from '../../../../src/lib/logger';
import type {
  CorrectionMatch,
  IndexSearchHit,
  StyleChunk,
  StyleRule,
} from '../../../../src/types/style-guide.types';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const makeRule = (overrides: Partial<StyleRule> = {}): StyleRule => ({
  id: 'rule-1',
  category: 'Domain',
  type: 'DIRECT',
  description: 'patient → Subject',
  pattern: 'patient',
  replacement: 'Subject',
  examples: [],
  context: {},
  ...overrides,
});

const ruleMatch = (rule: StyleRule, confidence: number): CorrectionMatch => ({
  rule: { kind: 'rule', rule },
  distance: 0.5,
  confidence,
  changes: [],
});

const chunkMatch = (chunk: StyleChunk, confidence: number): CorrectionMatch => ({
  rule: { kind: 'chunk', chunk },
  distance: 0.5,
  confidence,
  changes: [],
});

const sourceOf = (hits: IndexSearchHit[]) => {
  const search = vi.fn(async () => hits);
  const source: MatchSource = { size: hits.length, search };
  return { source, search };
};

describe('CorrectionEngineService', () => {
  const engine = new CorrectionEngineService({
    topK: 3,
    ruleDistanceThreshold: 100,
    chunkDistanceThreshold: 1.5,
    minConfidence: 0.1,
    layerRetrieval: true,
  });

  describe('applyCorrections', () => {
    it('should space units from numbers', () => {
      expect(engine.applyCorrections('100mg dose')).toEqual({
        correctedText: '100 mg dose',
        changes: ["Changed '100mg' to '100 mg'"],
      });
    });

    it('should space whole and decimal quantities from units', () => {
      expect(engine.applyCorrections('2.5mg and 10ml')).toEqual({
        correctedText: '2.5 mg and 10 mL',
        changes: ["Changed '2.5mg' to '2.5 mg'", "Changed '10ml' to '10 mL'"],
      });
    });

    it('should normalize both sides of a phase range', () => {
      expect(engine.applyCorrections('a phase I/II study')).toEqual({
        correctedText: 'a Phase 1/2 study',
        changes: ["Changed 'phase I/II' to 'Phase 1/2'"],
      });
    });

    it('should keep a sentence-initial capital on Latin abbreviations', () => {
      expect(engine.applyCorrections('E.g.the dose')).toEqual({
        correctedText: 'E.g., the dose',
        changes: ["Changed 'E.g.' to 'E.g., '"],
      });
    });

    it('should normalize phase numbers', () => {
      expect(engine.applyCorrections('phase i trial')).toEqual({
        correctedText: 'Phase 1 trial',
        changes: ["Changed 'phase i' to 'Phase 1'"],
      });
    });

    it('should uppercase acronyms', () => {
      expect(engine.applyCorrections('submitted to fda')).toEqual({
        correctedText: 'submitted to FDA',
        changes: ["Changed 'fda' to 'FDA'"],
      });
    });

    it('should run the whole table in order', () => {
      const text =
        'approximately 5mg given at base-line and follow up; p-value < 0.05 (sd) e.g.the odds ratio in table 2 of daiichi sankyo phase iii data, 37 °C and 50 %';

      const result = engine.applyCorrections(text);

      expect(result.correctedText).toBe(
        '~5 mg given at baseline and follow-up; P value < 0.05 (SD) e.g., the odds ratio (OR) in Table 2 of Daiichi Sankyo Phase 3 data, 37°C and 50%'
      );
      expect(result.changes).toHaveLength(13);
      expect(result.changes).toContain("Changed 'odds ratio' to 'odds ratio (OR)'");
      expect(result.changes).toContain("Changed '37 °C' to '37°C'");
    });

    it('should expand end of treatment before capitalizing treatment period', () => {
      expect(engine.applyCorrections('at the end of treatment period').correctedText).toBe(
        'at the end of treatment (EOT) period'
      );
      expect(engine.applyCorrections('during the screening period').correctedText).toBe(
        'during the Screening Period'
      );
    });

    it('should tag the most specific adverse-event term', () => {
      expect(engine.applyCorrections('A treatment emergent adverse event was reported.')).toEqual({
        correctedText: 'A treatment-emergent adverse event (TEAE) was reported.',
        changes: ["Changed 'treatment emergent adverse event' to 'treatment-emergent adverse event (TEAE)'"],
      });
      expect(engine.applyCorrections('One serious adverse event and one adverse event occurred.').correctedText).toBe(
        'One serious adverse event (SAE) and one adverse event (AE) occurred.'
      );
    });

    it('should tag only the first mention', () => {
      expect(
        engine.applyCorrections('An adverse event was mild. Another adverse event was severe.').correctedText
      ).toBe('An adverse event (AE) was mild. Another adverse event was severe.');
    });

    it('should not re-tag tagged terms', () => {
      expect(engine.applyCorrections('The serious adverse event (SAE) resolved.')).toEqual({
        correctedText: 'The serious adverse event (SAE) resolved.',
        changes: [],
      });
    });

    it('should keep the leading capital of hyphenated terms', () => {
      expect(engine.applyCorrections('Treatment Emergent Adverse Event').correctedText).toBe(
        'Treatment-Emergent Adverse Event (TEAE)'
      );
    });

    it('should be idempotent', () => {
      const inputs = [
        '100mg dose',
        'phase i trial',
        'submitted to fda',
        'A treatment emergent adverse event was reported.',
        'One serious adverse event and one adverse event occurred.',
        'at the end of treatment period',
        'approximately 5mg given at base-line and follow up; p-value < 0.05 (sd) e.g.the odds ratio in table 2 of daiichi sankyo phase iii data, 37 °C and 50 %',
        'greater than or equal to 18 years, hazard ratio vs. placebo, etc.and more',
        '2.5mg and 10ml',
        'a phase I/II study',
        'E.g.the dose',
      ];

      for (const input of inputs) {
        const once = engine.applyCorrections(input);
        const twice = engine.applyCorrections(once.correctedText);
        expect(twice.correctedText).toBe(once.correctedText);
        expect(twice.changes).toEqual([]);
      }
    });
  });

  describe('applyRecords', () => {
    it('should log a failing record and continue with the next one', () => {
      const result = applyRecords('ab', [
        {
          id: 'boom',
          matcher: /a/g,
          substitution: () => {
            throw new Error('boom');
          },
        },
        { id: 'upper-b', matcher: /b/g, substitution: 'B' },
      ]);

      expect(result).toEqual({ correctedText: 'aB', changes: ["Changed 'b' to 'B'"] });
      expect(logger.error).toHaveBeenCalledWith('[Corrections] Correction record boom failed', expect.any(Error));
    });
  });

  describe('applyRetrievedRules', () => {
    it('should wrap the replacement in a change marker', () => {
      const rule = makeRule({ examples: ['Subject'] });

      const result = engine.applyRetrievedRules('The patient was enrolled.', [ruleMatch(rule, 0.87)]);

      expect(result.correctedText).toBe('The <change confidence=0.87>Subject</change> was enrolled.');
      expect(result.applied).toHaveLength(1);
      expect(result.applied[0].changes).toEqual(["Changed 'patient' to 'Subject'"]);
    });

    it('should replace only the first case-insensitive occurrence', () => {
      const result = engine.applyRetrievedRules('Patient A and patient B', [ruleMatch(makeRule(), 0.87)]);
      expect(result.correctedText).toBe('<change confidence=0.87>Subject</change> A and patient B');
    });

    it('should ignore matches below the minimum confidence', () => {
      const result = engine.applyRetrievedRules('The patient', [ruleMatch(makeRule(), 0.05)]);
      expect(result).toEqual({ correctedText: 'The patient', applied: [] });
    });

    it('should not apply identical replacements', () => {
      const rule = makeRule({ pattern: 'FDA', replacement: 'FDA' });
      expect(engine.applyRetrievedRules('Sent to FDA', [ruleMatch(rule, 0.9)]).applied).toEqual([]);
    });

    it('should apply rightmost spans first', () => {
      const patient = makeRule({ id: 'patient' });
      const investigator = makeRule({ id: 'investigator', pattern: 'investigator', replacement: 'Investigator' });

      const result = engine.applyRetrievedRules('The investigator saw the patient.', [
        ruleMatch(investigator, 0.8),
        ruleMatch(patient, 0.9),
      ]);

      expect(result.correctedText).toBe(
        'The <change confidence=0.80>Investigator</change> saw the <change confidence=0.90>Subject</change>.'
      );
      expect(result.applied.map((match) => match.rule.kind === 'rule' && match.rule.rule.id)).toEqual([
        'patient',
        'investigator',
      ]);
    });

    it('should skip spans that overlap an applied one', () => {
      const adverseEvent = makeRule({ id: 'ae', pattern: 'adverse event', replacement: 'AE' });
      const event = makeRule({ id: 'event', pattern: 'event', replacement: 'occurrence' });

      const result = engine.applyRetrievedRules('One adverse event.', [
        ruleMatch(adverseEvent, 0.6),
        ruleMatch(event, 0.9),
      ]);

      expect(result.correctedText).toBe('One adverse <change confidence=0.90>occurrence</change>.');
      expect(result.applied).toHaveLength(1);
    });

    it('should prefer the higher confidence at the same position', () => {
      const subject = makeRule({ id: 'subject' });
      const participant = makeRule({ id: 'participant', replacement: 'Participant' });

      const result = engine.applyRetrievedRules('The patient.', [
        ruleMatch(subject, 0.5),
        ruleMatch(participant, 0.7),
      ]);

      expect(result.correctedText).toBe('The <change confidence=0.70>Participant</change>.');
    });

    it('should match extracted triggers containing regex characters literally', () => {
      const [rule] = new RuleExtractorService().extractRules('Kaplan-Meier (KM) → KM');
      expect(rule).toMatchObject({ type: 'PATTERN', pattern: 'Kaplan-Meier (KM)', replacement: 'KM' });

      const result = engine.applyRetrievedRules('The Kaplan-Meier (KM) estimate.', [ruleMatch(rule, 0.9)]);

      expect(result.correctedText).toBe('The <change confidence=0.90>KM</change> estimate.');
      expect(result.applied[0].changes).toEqual(["Changed 'Kaplan-Meier (KM)' to 'KM'"]);
    });

    it('should match PATTERN rules as regular expressions', () => {
      const rule = makeRule({ type: 'PATTERN', pattern: 'colou?r', replacement: 'color' });
      expect(engine.applyRetrievedRules('The Colour chart', [ruleMatch(rule, 0.9)]).correctedText).toBe(
        'The <change confidence=0.90>color</change> chart'
      );
    });

    it('should skip unsafe or invalid PATTERN rules', () => {
      const unsafe = makeRule({ id: 'unsafe', type: 'PATTERN', pattern: '(a+)+$', replacement: 'a' });
      const invalid = makeRule({ id: 'invalid', type: 'PATTERN', pattern: '([', replacement: 'b' });

      const result = engine.applyRetrievedRules('aaaa', [ruleMatch(unsafe, 0.9), ruleMatch(invalid, 0.9)]);

      expect(result).toEqual({ correctedText: 'aaaa', applied: [] });
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it('should replace chunk content with the chunk example', () => {
      const chunk: StyleChunk = {
        content: 'use numerals for doses',
        ruleType: 'formatting',
        section: 'Numbers',
        examples: ['Use numerals for doses'],
        metadata: {},
      };
      const withoutExample: StyleChunk = { ...chunk, examples: [] };

      expect(engine.applyRetrievedRules('Always use numerals for doses.', [chunkMatch(chunk, 0.75)]).correctedText).toBe(
        'Always <change confidence=0.75>Use numerals for doses</change>.'
      );
      expect(engine.applyRetrievedRules('Always use numerals for doses.', [chunkMatch(withoutExample, 0.75)]).applied).toEqual([]);
    });
  });

  describe('findMatches', () => {
    it('should score hits and drop those beyond their threshold', async () => {
      const rule = makeRule();
      const chunk: StyleChunk = { content: 'c', ruleType: 'general', section: '', examples: [], metadata: {} };
      const { source, search } = sourceOf([
        { item: { kind: 'rule', rule }, distance: 0.25, position: 0 },
        { item: { kind: 'chunk', chunk }, distance: 1.6, position: 1 },
        { item: { kind: 'chunk', chunk }, distance: 0.5, position: 2 },
        { item: { kind: 'rule', rule }, distance: 150, position: 3 },
      ]);

      const matches = await engine.findMatches('query text', source);

      expect(search).toHaveBeenCalledWith('query text', 3);
      expect(matches.map((match) => [match.distance, match.confidence])).toEqual([
        [0.25, 0.8],
        [0.5, 0.75],
      ]);
    });
  });

  describe('correctChunk', () => {
    const dose = makeRule({ pattern: 'dose', replacement: 'dosage' });
    const hits: IndexSearchHit[] = [{ item: { kind: 'rule', rule: dose }, distance: 0.25, position: 0 }];

    it('should layer retrieval over deterministic corrections', async () => {
      const { source, search } = sourceOf(hits);

      const result = await engine.correctChunk('100mg dose', source);

      expect(search).toHaveBeenCalledWith('100mg dose', 3);
      expect(result).toEqual({
        originalText: '100mg dose',
        correctedText: '100 mg <change confidence=0.80>dosage</change>',
        appliedRules: [
          {
            rule: { kind: 'rule', rule: dose },
            distance: 0.25,
            confidence: 0.8,
            changes: ["Changed 'dose' to 'dosage'"],
          },
        ],
        changes: ["Changed '100mg' to '100 mg'"],
      });
    });

    it('should skip retrieval after deterministic changes when layering is off', async () => {
      const fallbackOnly = new CorrectionEngineService({ layerRetrieval: false });
      const { source, search } = sourceOf(hits);

      const changed = await fallbackOnly.correctChunk('100mg dose', source);
      expect(changed.correctedText).toBe('100 mg dose');
      expect(search).not.toHaveBeenCalled();

      const unchanged = await fallbackOnly.correctChunk('one dose', source);
      expect(unchanged.correctedText).toMatch(/^one <change confidence=\d\.\d\d>dosage<\/change>$/);
    });

    it('should only run deterministic passes without an index', async () => {
      expect(await engine.correctChunk('submitted to fda')).toEqual({
        originalText: 'submitted to fda',
        correctedText: 'submitted to FDA',
        appliedRules: [],
        changes: ["Changed 'fda' to 'FDA'"],
      });
    });
  });

  it('should format markers with two decimals', () => {
    expect(formatChangeMarker('Subject', 0.5)).toBe('<change confidence=0.50>Subject</change>');
  });
});
