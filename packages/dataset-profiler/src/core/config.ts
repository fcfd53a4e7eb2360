/**
 * Profiler Configuration
 *
 * Every threshold that shapes detection or preview output lives here with a
 * documented default, so a run is reproducible from its configuration alone.
 * Partial configurations are deep-merged over the defaults and validated
 * with Zod before the engine sees them.
 *
 * @module core/config
 */

import { z } from 'zod';
import { ensureDefinition } from '../preview/reproject.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const SimplificationSchema = z.discriminatedUnion('mode', [
  z.object({
    /** Tolerance is `ratio` times the dataset extent diagonal */
    mode: z.literal('relative'),
    ratio: z.number().min(0).max(1),
  }),
  z.object({
    /** Fixed tolerance in canonical units (degrees) */
    mode: z.literal('absolute'),
    tolerance: z.number().min(0),
  }),
]);

const CodeListHeuristicSchema = z
  .object({
    maxTextLength: z.number().int().positive(),
    maxCardinalityRatio: z.number().gt(0).max(1),
    maxDistinctValues: z.number().int().positive(),
    minDistinctValues: z.number().int().positive(),
  })
  .refine((value) => value.minDistinctValues <= value.maxDistinctValues, {
    message: 'minDistinctValues must not exceed maxDistinctValues',
    path: ['minDistinctValues'],
  });

const CRS_IDENTIFIER = /^[A-Za-z]+:\d+$/;

export const ProfilerConfigSchema = z.object({
  /** Layers whose name starts with this prefix are Code Tables */
  codeTablePrefix: z.string().min(1),
  /** Non-null sample values kept per field */
  sampleSize: z.number().int().min(0).max(100),
  codeLists: CodeListHeuristicSchema,
  preview: z.object({
    simplification: SimplificationSchema,
    maxFeaturesPerLayer: z.number().int().positive(),
    /** Budget split evenly across the spatial layers of a dataset */
    maxTotalFeatures: z.number().int().positive(),
  }),
  canonicalCrs: z
    .string()
    .regex(CRS_IDENTIFIER, 'expected AUTHORITY:CODE, e.g. EPSG:4326')
    .refine((value) => !CRS_IDENTIFIER.test(value) || ensureDefinition(value), {
      message: 'reference system has no proj4 definition',
    }),
  /** Datasets profiled at the same time */
  concurrency: z.number().int().positive().max(64),
});

export type ProfilerConfig = z.infer<typeof ProfilerConfigSchema>;
export type SimplificationPolicy = z.infer<typeof SimplificationSchema>;
export type CodeListHeuristic = z.infer<typeof CodeListHeuristicSchema>;

/**
 * Deep partial of the configuration, as accepted from callers and rc-files.
 * Ranges are checked after merging, by ProfilerConfigSchema.
 */
export const ProfilerConfigInputSchema = z
  .object({
    codeTablePrefix: z.string(),
    sampleSize: z.number(),
    codeLists: z
      .object({
        maxTextLength: z.number(),
        maxCardinalityRatio: z.number(),
        maxDistinctValues: z.number(),
        minDistinctValues: z.number(),
      })
      .partial()
      .strict(),
    preview: z
      .object({
        simplification: SimplificationSchema,
        maxFeaturesPerLayer: z.number(),
        maxTotalFeatures: z.number(),
      })
      .partial()
      .strict(),
    canonicalCrs: z.string(),
    concurrency: z.number(),
  })
  .partial()
  .strict();

export type ProfilerConfigInput = z.infer<typeof ProfilerConfigInputSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: ProfilerConfig = {
  codeTablePrefix: 'code_',
  sampleSize: 5,
  codeLists: {
    maxTextLength: 40,
    maxCardinalityRatio: 0.2,
    maxDistinctValues: 25,
    minDistinctValues: 1,
  },
  preview: {
    simplification: { mode: 'relative', ratio: 0.001 },
    maxFeaturesPerLayer: 500,
    maxTotalFeatures: 2500,
  },
  canonicalCrs: 'EPSG:4326',
  concurrency: 4,
};

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge a partial configuration over the defaults and validate it
 *
 * @throws {ConfigurationError} If any value is out of range
 */
export function resolveConfig(
  input: ProfilerConfigInput = {},
  base: ProfilerConfig = DEFAULT_CONFIG
): ProfilerConfig {
  const merged = {
    codeTablePrefix: input.codeTablePrefix ?? base.codeTablePrefix,
    sampleSize: input.sampleSize ?? base.sampleSize,
    codeLists: { ...base.codeLists, ...input.codeLists },
    preview: {
      simplification: input.preview?.simplification ?? base.preview.simplification,
      maxFeaturesPerLayer: input.preview?.maxFeaturesPerLayer ?? base.preview.maxFeaturesPerLayer,
      maxTotalFeatures: input.preview?.maxTotalFeatures ?? base.preview.maxTotalFeatures,
    },
    canonicalCrs: input.canonicalCrs ?? base.canonicalCrs,
    concurrency: input.concurrency ?? base.concurrency,
  };

  const result = ProfilerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid profiler configuration: ${issues.join('; ')}`, 'CONFIGURATION_INVALID', issues);
  }
  return result.data;
}

/**
 * Effective per-layer feature cap for a dataset with `spatialLayers` spatial layers
 */
export function effectiveFeatureCap(config: Pick<ProfilerConfig, 'preview'>, spatialLayers: number): number {
  const share = Math.max(1, Math.floor(config.preview.maxTotalFeatures / Math.max(1, spatialLayers)));
  return Math.min(config.preview.maxFeaturesPerLayer, share);
}
