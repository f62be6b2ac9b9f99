/**
 * Property 13: Explainability
 *
 * Every vendor summary can be explained in plain language: strengths,
 * concerns, risks and confidence. Every comparison report yields an
 * executive summary naming the recommended vendor and those set aside.
 *
 * @file src/backend/explainability-layer/src/narrative-generator.ts
 * @file src/backend/explainability-layer/src/category-analyzer.ts
 * @file src/backend/explainability-layer/src/comparison-engine.ts
 */

import fc from 'fast-check';
import { describe, expect, it, beforeAll } from 'vitest';

import {
  analyzeCategories,
  analyzeComparisons,
  buildExecutiveSummary,
  compareCategories,
  determineRiskSeverity,
  explainVendor,
  generateDisqualificationReason,
} from '../../src/backend/explainability-layer/src/index.js';
import {
  compareVendors,
  scoreVendors,
} from '../../src/backend/proposal-scoring-service/src/index.js';
import type { ComparisonReport, VendorScoreSummary } from '../../src/backend/shared/src/index.js';
import { buildFixtureScorecard, buildFixtureStore } from '../helpers/fixtures.js';
import { makeCategory, makeSummary } from '../helpers/summaries.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

async function fixtureReport(): Promise<ComparisonReport> {
  const scorecard = buildFixtureScorecard();
  const store = buildFixtureStore(scorecard);
  const { summaries, failures } = await scoreVendors(store.vendorIds(), scorecard, store);
  return compareVendors(summaries, { failures, scorecard });
}

function summaryOf(report: ComparisonReport, vendorId: string): VendorScoreSummary {
  const summary = report.summaries.find((candidate) => candidate.vendorId === vendorId);
  if (!summary) {
    throw new Error(`missing summary for ${vendorId}`);
  }
  return summary;
}

const mixedVendor = makeSummary({
  vendorId: 'northwind',
  overallScore: 88,
  overallConfidence: 0.8,
  categoryScores: [
    makeCategory('delivery', 92, { name: 'Delivery' }),
    makeCategory('pricing', 84, { name: 'Pricing' }),
    makeCategory('support', 45, { name: 'Support' }),
  ],
});

describe('Property 13: Explainability', () => {
  let report: ComparisonReport;

  beforeAll(async () => {
    report = await fixtureReport();
  });

  describe('explainVendor', () => {
    it('describes strengths and concerns of a mixed vendor', () => {
      const explanation = explainVendor(mixedVendor);

      expect(explanation.summary).toBe('Overall score of 88.0 (grade B) with high confidence (80%).');
      expect(explanation.strengths).toEqual(['Delivery', 'Pricing']);
      expect(explanation.weaknesses).toEqual(['Support']);
      expect(explanation.strengthsNarrative).toBe('Key strengths include Delivery (92) and Pricing (84).');
      expect(explanation.weaknessNarrative).toBe('Areas of concern: Support (45).');
      expect(explanation.riskNarrative).toBe('Minor concerns: Support scored 45/100.');
      expect(explanation.fullNarrative).toBe(
        'Overall score of 88.0 (grade B) with high confidence (80%). ' +
          'Key strengths include Delivery (92) and Pricing (84). ' +
          'Areas of concern: Support (45).'
      );
    });

    it('includes the rank and, in verbose mode, risks and confidence', () => {
      const explanation = explainVendor(mixedVendor, 2, { verboseMode: true });

      expect(explanation.summary).toBe(
        'Ranked #2 with an overall score of 88.0 (grade B) with high confidence (80%).'
      );
      expect(explanation.fullNarrative).toBe(
        'Ranked #2 with an overall score of 88.0 (grade B) with high confidence (80%). ' +
          'Key strengths include Delivery (92) and Pricing (84). ' +
          'Areas of concern: Support (45). ' +
          'Minor concerns: Support scored 45/100. ' +
          'High confidence (80.0%). Scores rest on well-supported extracted evidence.'
      );
    });

    it('handles a single strength and a vendor with none', () => {
      const single = makeSummary({
        vendorId: 'solo',
        overallScore: 81,
        categoryScores: [makeCategory('delivery', 81, { name: 'Delivery' })],
      });
      const plain = makeSummary({ vendorId: 'plain', overallScore: 50, overallConfidence: 0.6 });

      expect(explainVendor(single).strengthsNarrative).toBe('The primary strength is Delivery (81).');
      expect(explainVendor(plain).summary).toBe('Overall score of 50.0 (grade F).');
      expect(explainVendor(plain).strengthsNarrative).toBe('No category reached the strength threshold.');
      expect(explainVendor(plain).weaknessNarrative).toBeNull();
      expect(explainVendor(plain).riskNarrative).toBeNull();
    });

    it('groups risks of a thinly evidenced vendor by severity', () => {
      const explanation = explainVendor(summaryOf(report, 'initech'));

      expect(explanation.strengths).toEqual(['Compliance', 'Cost']);
      expect(explanation.strengthsNarrative).toBe('Key strengths include Compliance (100) and Cost (80).');
      expect(explanation.weaknessNarrative).toBe('Areas of concern: Technical Capability (25).');
      expect(explanation.riskNarrative).toBe(
        'Critical concerns: Technical Capability scored 25/100. ' +
          'Moderate concerns: No evidence found for support. ' +
          'Minor concerns: Technical Capability confidence is 15%.'
      );
      expect(explanation.summary).toMatch(/^Overall score of 56\.5 \(grade F\) with limited confidence \(\d+%\)\.$/);
    });

    it('summarizes a disqualified vendor by its compliance failures', () => {
      const explanation = explainVendor(summaryOf(report, 'globex'), 3);

      expect(explanation.summary).toBe('Disqualified: failed 1 compliance criterion.');
    });
  });

  describe('analyzeCategories', () => {
    it('ranks categories by weighted contribution and lists missing evidence', () => {
      const analysis = analyzeCategories(summaryOf(report, 'initech'));

      expect(analysis.allCategories.map((c) => [c.category.categoryId, c.rank])).toEqual([
        ['cost', 1],
        ['compliance', 2],
        ['technical', 3],
      ]);
      expect(analysis.missingEvidence).toEqual(['support']);
      expect(analysis.overallRiskLevel).toBe('high');
    });

    it('reports the failed compliance criterion as a high risk', () => {
      const analysis = analyzeCategories(summaryOf(report, 'globex'));

      expect(analysis.riskFactors).toEqual([
        {
          source: 'compliance',
          subjectId: 'soc2',
          severity: 'high',
          description: 'Failed compliance criterion soc2 in Compliance',
        },
      ]);
    });

    it('classifies weak scores by severity', () => {
      expect(determineRiskSeverity(50)).toBeNull();
      expect(determineRiskSeverity(45)).toBe('low');
      expect(determineRiskSeverity(35)).toBe('medium');
      expect(determineRiskSeverity(10)).toBe('high');
    });

    it('should flag every category scoring under the weakness threshold', () => {
      fc.assert(
        fc.property(fc.array(fc.integer({ min: 0, max: 100 }), { minLength: 1, maxLength: 6 }), (scores) => {
          const summary = makeSummary({
            vendorId: 'v',
            categoryScores: scores.map((score, i) => makeCategory(`c${i}`, score)),
          });
          const analysis = analyzeCategories(summary);

          expect(analysis.weaknesses).toHaveLength(scores.filter((score) => score < 50).length);
          expect(analysis.strengths).toHaveLength(scores.filter((score) => score >= 80).length);
        }),
        propertyConfig
      );
    });
  });

  describe('generateDisqualificationReason', () => {
    it('lists each failed compliance criterion', () => {
      expect(generateDisqualificationReason(summaryOf(report, 'globex'))).toEqual({
        vendorId: 'globex',
        reason: 'Vendor failed one or more compliance requirements',
        details: ['compliance/soc2: compliance requirement not met'],
      });
    });

    it('returns null for a qualified vendor', () => {
      expect(generateDisqualificationReason(summaryOf(report, 'acme'))).toBeNull();
    });
  });

  describe('buildExecutiveSummary', () => {
    it('recommends the leader of the fixture comparison', () => {
      const summary = buildExecutiveSummary(report);

      expect(summary.recommendedVendor).toBe('acme');
      expect(summary.grade).toBe('B');
      expect(summary.confidenceLevel).toBe('High');
      expect(summary.vendorsEvaluated).toBe(3);
      expect(summary.disqualifiedVendors).toEqual(['globex']);
      expect(summary.failedVendors).toEqual([]);
      expect(summary.reviewRequired).toBe(true);
      expect(summary.narrative).toBe(
        'acme is recommended with an overall score of 83.5 (grade B) and high confidence. ' +
          'It leads initech by 27.0 points. Disqualified: globex. ' +
          'Human review is recommended before award.'
      );
    });

    it('needs no review for a clear, well-evidenced winner', () => {
      const summary = buildExecutiveSummary(
        compareVendors([
          makeSummary({ vendorId: 'a', overallScore: 70, overallConfidence: 0.9 }),
          makeSummary({ vendorId: 'b', overallScore: 60, overallConfidence: 0.8 }),
        ])
      );

      expect(summary.reviewRequired).toBe(false);
      expect(summary.narrative).toBe(
        'a is recommended with an overall score of 70.0 (grade C) and high confidence. It leads b by 10.0 points.'
      );
    });

    it('names vendors that could not be scored', () => {
      const summary = buildExecutiveSummary(
        compareVendors([makeSummary({ vendorId: 'a', overallScore: 70, overallConfidence: 0.9 })], {
          failures: [{ vendorId: 'broken', errorCode: 'INVALID_EVIDENCE', message: 'bad record' }],
        })
      );

      expect(summary.vendorsEvaluated).toBe(2);
      expect(summary.failedVendors).toEqual(['broken']);
      expect(summary.narrative).toBe(
        'a is recommended with an overall score of 70.0 (grade C) and high confidence. ' +
          'Not scored: broken. Human review is recommended before award.'
      );
    });

    it('has no recommendation when every vendor is disqualified', () => {
      const summary = buildExecutiveSummary(
        compareVendors([makeSummary({ vendorId: 'x', complianceFailures: 1 })])
      );

      expect(summary).toEqual({
        recommendedVendor: null,
        winningScore: 0,
        grade: null,
        confidenceLevel: null,
        vendorsEvaluated: 1,
        disqualifiedVendors: ['x'],
        failedVendors: [],
        reviewRequired: true,
        narrative:
          'No qualified vendor: every evaluated vendor was disqualified or could not be scored. ' +
          'Disqualified: x. Human review is recommended before award.',
      });
    });

    it('should recommend the first qualified vendor of any ranking', () => {
      fc.assert(
        fc.property(
          fc.array(
            fc.record({
              score: fc.integer({ min: 0, max: 100 }),
              failures: fc.integer({ min: 0, max: 1 }),
            }),
            { minLength: 1, maxLength: 6 }
          ),
          (vendors) => {
            const ranked = compareVendors(
              vendors.map((vendor, i) =>
                makeSummary({
                  vendorId: `v${i}`,
                  overallScore: vendor.score,
                  complianceFailures: vendor.failures,
                })
              )
            );
            const firstQualified = ranked.rankings.find((row) => !row.disqualified);

            expect(buildExecutiveSummary(ranked).recommendedVendor).toBe(firstQualified?.vendorId ?? null);
          }
        ),
        propertyConfig
      );
    });
  });

  describe('comparisons', () => {
    it('explains each adjacent pair of the fixture ranking', () => {
      const analysis = analyzeComparisons(report);

      expect(analysis.comparisons.map((c) => c.comparisonNarrative)).toEqual([
        'acme ranks above initech by 27.0 points. The primary advantage is Technical Capability. ' +
          'initech scores higher on Cost, but the overall score favors acme.',
        'initech ranks above globex, which is disqualified by a compliance failure.',
      ]);
      expect(analysis.topVendorAdvantages).toEqual(['Technical Capability']);
      expect(analysis.overallNarrative).toBe(
        'acme is ranked first with a score of 83.5. The primary differentiator is Technical Capability.'
      );
    });

    it('orders significant category differences by size', () => {
      const differences = compareCategories(summaryOf(report, 'acme'), summaryOf(report, 'initech'));

      expect(differences.map((d) => [d.categoryId, d.favorsBetter])).toEqual([
        ['technical', true],
        ['cost', false],
      ]);
      expect(differences[1].explanation).toBe(
        'Lower-ranked vendor scores better on Cost (80 vs 70), but other categories outweigh this'
      );
    });

    it('handles reports with one or no qualified vendors', () => {
      expect(analyzeComparisons(compareVendors([])).overallNarrative).toBe(
        'No vendors available for comparison.'
      );
      expect(
        analyzeComparisons(compareVendors([makeSummary({ vendorId: 'only', overallScore: 75 })]))
          .overallNarrative
      ).toBe('only is the only qualified vendor.');
    });
  });
});
