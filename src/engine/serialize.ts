import { z } from 'zod';
import { ImageReference } from '../parser/types';
import { Analysis } from './types';

const imageComponentsSchema = z.object({
  registry: z.string().nullable(),
  name: z.string().min(1),
  tag: z.string().nullable(),
  digest: z.string().nullable(),
});

const imageSchema = z.object({
  full: z.string(),
  components: imageComponentsSchema.nullable(),
});

/**
 * Mappings are written as `[key, value]` pairs so that first-seen order
 * survives every JSON encoder, integer-like keys included.
 */
function entriesSchema<T extends z.ZodTypeAny>(value: T) {
  return z
    .array(z.tuple([z.string(), value]))
    .refine(entries => new Set(entries.map(([key]) => key)).size === entries.length, {
      message: 'duplicate key',
    });
}

const multistageSchema = z.object({
  is_multistage: z.boolean(),
  stages_used_as_base_images: z.array(z.string()),
  stages_copied_from: z.array(z.string()),
  stages_added_from: z.array(z.string()),
  unused_stages: z.array(z.string()),
});

export const analysisDictSchema = z.object({
  num_stages: z.number().int().nonnegative(),
  images: z.array(imageSchema),
  stage_names: z.array(z.string()),
  copy_from_stages: z.array(z.string()),
  add_from_stages: z.array(z.string()),
  multistage_analysis: multistageSchema,
  exposed_ports: z.array(z.string()),
  instructions: z.object({
    total_count: z.number().int().nonnegative(),
    by_type: entriesSchema(z.number().int().nonnegative()),
  }),
  args: entriesSchema(z.string().nullable()),
  labels: entriesSchema(z.string()),
  env_vars: entriesSchema(z.string()),
});

export type AnalysisDict = z.infer<typeof analysisDictSchema>;
export type ImageDict = z.infer<typeof imageSchema>;

function imageToDict(image: ImageReference): ImageDict {
  const c = image.components;
  return {
    full: image.full,
    components: c
      ? { registry: c.registry ?? null, name: c.name, tag: c.tag ?? null, digest: c.digest ?? null }
      : null,
  };
}

function imageFromDict(image: ImageDict): ImageReference {
  const c = image.components;
  if (!c) return { full: image.full };
  return {
    full: image.full,
    components: {
      registry: c.registry ?? undefined,
      name: c.name,
      tag: c.tag ?? undefined,
      digest: c.digest ?? undefined,
    },
  };
}

/**
 * Canonical key-value form for JSON-style consumers. Field names are
 * snake_case, absent values are `null` and mappings are ordered entry lists.
 */
export function toDict(analysis: Analysis): AnalysisDict {
  const msa = analysis.multistageAnalysis;
  return {
    num_stages: analysis.numStages,
    images: analysis.images.map(imageToDict),
    stage_names: [...analysis.stageNames],
    copy_from_stages: [...analysis.copyFromStages],
    add_from_stages: [...analysis.addFromStages],
    multistage_analysis: {
      is_multistage: msa.isMultistage,
      stages_used_as_base_images: [...msa.stagesUsedAsBaseImages],
      stages_copied_from: [...msa.stagesCopiedFrom],
      stages_added_from: [...msa.stagesAddedFrom],
      unused_stages: [...msa.unusedStages],
    },
    exposed_ports: [...analysis.exposedPorts],
    instructions: {
      total_count: analysis.instructions.totalCount,
      by_type: [...analysis.instructions.byType],
    },
    args: [...analysis.args].map(([k, v]): [string, string | null] => [k, v ?? null]),
    labels: [...analysis.labels],
    env_vars: [...analysis.envVars],
  };
}

/** Read the canonical form back; throws a ZodError on malformed input. */
export function fromDict(value: unknown): Analysis {
  const dict = analysisDictSchema.parse(value);
  const msa = dict.multistage_analysis;
  return {
    numStages: dict.num_stages,
    images: dict.images.map(imageFromDict),
    stageNames: dict.stage_names,
    copyFromStages: dict.copy_from_stages,
    addFromStages: dict.add_from_stages,
    multistageAnalysis: {
      isMultistage: msa.is_multistage,
      stagesUsedAsBaseImages: msa.stages_used_as_base_images,
      stagesCopiedFrom: msa.stages_copied_from,
      stagesAddedFrom: msa.stages_added_from,
      unusedStages: msa.unused_stages,
    },
    exposedPorts: dict.exposed_ports,
    instructions: {
      totalCount: dict.instructions.total_count,
      byType: new Map(dict.instructions.by_type),
    },
    args: new Map(dict.args.map(([k, v]): [string, string | undefined] => [k, v ?? undefined])),
    labels: new Map(dict.labels),
    envVars: new Map(dict.env_vars),
  };
}
