/**
 * Scorecard Model
 *
 * Validated, immutable hierarchy of weighted categories and criteria.
 * Construction fails with InvalidScorecardError listing every weight, scale
 * or id violation; nothing is repaired. Edits produce a new Scorecard.
 */

import {
  ScorecardDescriptorSchema,
  PointsScorecardDescriptorSchema,
  DEFAULT_ENGINE_CONFIG,
  InvalidScorecardError,
  UnknownCriterionError,
  deepFreeze,
  formatSchemaIssues,
  type CategoryDescriptorInput,
  type ScorecardDescriptor,
  type ScoringScale,
} from '@proposal-eval/shared';

/**
 * Criterion as held by a built scorecard
 */
export interface Criterion {
  readonly id: string;
  readonly categoryId: string;
  readonly description: string;
  /** Fraction of the enclosing category's weight */
  readonly weight: number;
  readonly scale: Readonly<ScoringScale>;
  /** Pass/fail criterion; a failure vetoes the category and the vendor */
  readonly compliance: boolean;
}

/**
 * Category as held by a built scorecard
 */
export interface Category {
  readonly id: string;
  readonly name: string;
  /** Fraction of the total score */
  readonly weight: number;
  readonly criteria: readonly Criterion[];
}

export interface ScorecardBuildOptions {
  /** Allowed deviation of weight sums from 1.0 */
  weightTolerance?: number;
}

function sumOf(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Collects every structural violation of an already-parsed descriptor
 */
function collectViolations(descriptor: ScorecardDescriptor, tolerance: number): string[] {
  const violations: string[] = [];
  const categoryIds = new Set<string>();
  const criterionIds = new Set<string>();

  for (const category of descriptor.categories) {
    if (categoryIds.has(category.id)) {
      violations.push(`duplicate category id "${category.id}"`);
    }
    categoryIds.add(category.id);

    if (category.weight < 0) {
      violations.push(`category "${category.id}" has negative weight ${category.weight}`);
    }

    if (category.criteria.length === 0) {
      violations.push(`category "${category.id}" has no criteria`);
      continue;
    }

    for (const criterion of category.criteria) {
      if (criterionIds.has(criterion.id)) {
        violations.push(`duplicate criterion id "${criterion.id}"`);
      }
      criterionIds.add(criterion.id);

      if (criterion.weight < 0) {
        violations.push(`criterion "${criterion.id}" has negative weight ${criterion.weight}`);
      }

      const span = criterion.scale.max - criterion.scale.min;
      if (!Number.isFinite(span) || !(span > 0)) {
        violations.push(
          `criterion "${criterion.id}" has invalid scale [${criterion.scale.min}, ${criterion.scale.max}]`
        );
      }
    }

    const criterionSum = sumOf(category.criteria.map((c) => c.weight));
    if (Math.abs(criterionSum - 1) > tolerance) {
      violations.push(
        `criterion weights in category "${category.id}" sum to ${criterionSum.toFixed(6)}, expected 1.0`
      );
    }
  }

  const categorySum = sumOf(descriptor.categories.map((c) => c.weight));
  if (Math.abs(categorySum - 1) > tolerance) {
    violations.push(`category weights sum to ${categorySum.toFixed(6)}, expected 1.0`);
  }

  return violations;
}

export class Scorecard {
  readonly categories: readonly Category[];
  readonly weightTolerance: number;
  private readonly criteriaById: ReadonlyMap<string, Criterion>;
  private readonly categoriesById: ReadonlyMap<string, Category>;

  private constructor(categories: Category[], weightTolerance: number) {
    this.categories = deepFreeze(categories);
    this.weightTolerance = weightTolerance;
    this.categoriesById = new Map(categories.map((category) => [category.id, category]));
    this.criteriaById = new Map(
      categories.flatMap((category) => category.criteria.map((c) => [c.id, c] as const))
    );
    Object.freeze(this);
  }

  /**
   * Builds a scorecard from category descriptors.
   * Throws InvalidScorecardError on any schema or weight violation.
   */
  static build(
    categories: CategoryDescriptorInput[],
    options: ScorecardBuildOptions = {}
  ): Scorecard {
    const tolerance = options.weightTolerance ?? DEFAULT_ENGINE_CONFIG.weightTolerance;
    const parsed = ScorecardDescriptorSchema.safeParse({ categories });

    if (!parsed.success) {
      throw new InvalidScorecardError(formatSchemaIssues(parsed.error));
    }

    const violations = collectViolations(parsed.data, tolerance);
    if (violations.length > 0) {
      throw new InvalidScorecardError(violations);
    }

    return new Scorecard(
      parsed.data.categories.map((category) => ({
        id: category.id,
        name: category.name,
        weight: category.weight,
        criteria: category.criteria.map((criterion) => ({
          id: criterion.id,
          categoryId: category.id,
          description: criterion.description,
          weight: criterion.weight,
          scale: { min: criterion.scale.min, max: criterion.scale.max },
          compliance: criterion.compliance,
        })),
      })),
      tolerance
    );
  }

  /**
   * Builds a scorecard from an untrusted JSON descriptor
   */
  static fromDescriptor(data: unknown, options: ScorecardBuildOptions = {}): Scorecard {
    const parsed = ScorecardDescriptorSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidScorecardError(formatSchemaIssues(parsed.error));
    }
    return Scorecard.build(parsed.data.categories, options);
  }

  /**
   * Builds a scorecard from a point-allocation descriptor, converting
   * points into weight fractions of the total and of each category
   */
  static fromPointsDescriptor(data: unknown, options: ScorecardBuildOptions = {}): Scorecard {
    const parsed = PointsScorecardDescriptorSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidScorecardError(formatSchemaIssues(parsed.error));
    }

    const totalPoints = sumOf(parsed.data.categories.map((c) => c.points));
    if (totalPoints <= 0) {
      throw new InvalidScorecardError(['total category points must be positive']);
    }

    const violations: string[] = [];
    const categories: CategoryDescriptorInput[] = parsed.data.categories.map((category) => {
      const criterionPoints = sumOf(category.criteria.map((c) => c.points));
      if (category.criteria.length > 0 && criterionPoints <= 0) {
        violations.push(`criterion points in category "${category.id}" must be positive`);
      }

      return {
        id: category.id,
        name: category.name,
        weight: category.points / totalPoints,
        criteria: category.criteria.map((criterion) => ({
          id: criterion.id,
          description: criterion.description,
          weight: criterionPoints > 0 ? criterion.points / criterionPoints : 0,
          scale: criterion.scale,
          compliance: criterion.compliance,
        })),
      };
    });

    if (violations.length > 0) {
      throw new InvalidScorecardError(violations);
    }

    return Scorecard.build(categories, options);
  }

  /**
   * Returns the criterion or throws UnknownCriterionError
   */
  criterion(id: string): Criterion {
    const criterion = this.criteriaById.get(id);
    if (!criterion) {
      throw new UnknownCriterionError(id);
    }
    return criterion;
  }

  hasCriterion(id: string): boolean {
    return this.criteriaById.has(id);
  }

  /**
   * Returns the category that declares the criterion
   */
  categoryOf(criterionId: string): Category {
    const criterion = this.criterion(criterionId);
    const category = this.categoriesById.get(criterion.categoryId);
    if (!category) {
      throw new UnknownCriterionError(criterionId);
    }
    return category;
  }

  category(id: string): Category | undefined {
    return this.categoriesById.get(id);
  }

  /**
   * All criteria in declaration order
   */
  criteria(): Criterion[] {
    return this.categories.flatMap((category) => [...category.criteria]);
  }

  /**
   * Returns a new scorecard with the category replaced (matched by id) or appended
   */
  withCategory(category: CategoryDescriptorInput): Scorecard {
    const descriptor = this.toDescriptor();
    const index = descriptor.categories.findIndex((c) => c.id === category.id);
    const categories: CategoryDescriptorInput[] = [...descriptor.categories];

    if (index >= 0) {
      categories[index] = category;
    } else {
      categories.push(category);
    }

    return Scorecard.build(categories, { weightTolerance: this.weightTolerance });
  }

  /**
   * Plain JSON form of the scorecard
   */
  toDescriptor(): ScorecardDescriptor {
    return {
      categories: this.categories.map((category) => ({
        id: category.id,
        name: category.name,
        weight: category.weight,
        criteria: category.criteria.map((criterion) => ({
          id: criterion.id,
          description: criterion.description,
          weight: criterion.weight,
          scale: { min: criterion.scale.min, max: criterion.scale.max },
          compliance: criterion.compliance,
        })),
      })),
    };
  }
}
