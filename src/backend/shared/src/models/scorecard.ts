/**
 * Scorecard Data Models and Zod Schemas
 *
 * Defines the descriptor shapes accepted from the scorecard-generation
 * collaborator: the weighted form (fractions) and the point-allocation form.
 * Schemas check shape only; weight normalization is enforced by Scorecard.build.
 */

import { z } from 'zod';

/**
 * Scoring scale for a criterion. Defaults to 0-100.
 */
export const ScoringScaleSchema = z.object({
  min: z.number().finite(),
  max: z.number().finite(),
});

export type ScoringScale = z.infer<typeof ScoringScaleSchema>;

export const DEFAULT_SCORING_SCALE: ScoringScale = { min: 0, max: 100 };

/**
 * Single weighted criterion
 */
export const CriterionDescriptorSchema = z.object({
  id: z.string().min(1).max(100),
  description: z.string().max(2000).default(''),
  weight: z.number().finite(),
  scale: ScoringScaleSchema.default(DEFAULT_SCORING_SCALE),
  compliance: z.boolean().default(false),
});

export type CriterionDescriptor = z.infer<typeof CriterionDescriptorSchema>;
export type CriterionDescriptorInput = z.input<typeof CriterionDescriptorSchema>;

/**
 * Category of criteria
 */
export const CategoryDescriptorSchema = z.object({
  id: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  weight: z.number().finite(),
  criteria: z.array(CriterionDescriptorSchema),
});

export type CategoryDescriptor = z.infer<typeof CategoryDescriptorSchema>;
export type CategoryDescriptorInput = z.input<typeof CategoryDescriptorSchema>;

/**
 * Weighted scorecard descriptor
 */
export const ScorecardDescriptorSchema = z.object({
  categories: z.array(CategoryDescriptorSchema).min(1),
});

export type ScorecardDescriptor = z.infer<typeof ScorecardDescriptorSchema>;
export type ScorecardDescriptorInput = z.input<typeof ScorecardDescriptorSchema>;

/**
 * Point-allocation descriptor, e.g. "Technical Capability: 35 points"
 */
export const PointsCriterionSchema = z.object({
  id: z.string().min(1).max(100),
  description: z.string().max(2000).default(''),
  points: z.number().finite().min(0),
  scale: ScoringScaleSchema.optional(),
  compliance: z.boolean().default(false),
});

export const PointsCategorySchema = z.object({
  id: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  points: z.number().finite().min(0),
  criteria: z.array(PointsCriterionSchema),
});

export const PointsScorecardDescriptorSchema = z.object({
  categories: z.array(PointsCategorySchema).min(1),
});

export type PointsScorecardDescriptor = z.infer<typeof PointsScorecardDescriptorSchema>;
export type PointsScorecardDescriptorInput = z.input<typeof PointsScorecardDescriptorSchema>;
