import { z, type ZodIssue } from "zod";

// Descriptor schema. Every object is strict so misspelled keys fail loudly.

export const DESCRIPTOR_SCHEMA_VERSIONS = [1, 2] as const;

export const CORE_NAME = "core";
export const DEFAULT_VERSION = "default";

// Free-form annotations; never interpreted.
const TagsSchema = z.record(z.string(), z.unknown()).nullable().optional();

const NameListSchema = z.array(z.string().min(1)).default([]);

export const FetchSchema = z
  .object({
    commands: z.array(z.string()).default([]),
  })
  .strict();

export const LayerCollectionSchema = z
  .object({
    name: z.string().min(1),
    paths: z.array(z.string().min(1)).default([]),
    bbmask: z.array(z.string().min(1)).default([]),
    fetch: FetchSchema.optional(),
    tags: TagsSchema,
  })
  .strict();

export const PyrexSchema = z
  .object({
    root: z.string().min(1),
    conf: z.string().min(1),
  })
  .strict();

export const VersionSchema = z
  .object({
    description: z.string().default(""),
    compat: z.string().min(1).default("auto"),
    oeinit: z.string().min(1),
    bitbakedir: z.string().min(1).optional(),
    pyrex: PyrexSchema.optional(),
    fetch: FetchSchema.optional(),
    tags: TagsSchema,
    layers: z.array(LayerCollectionSchema).default([]),
  })
  .strict();

export const ProfileSchema = z
  .object({
    description: z.string().default(""),
    conf: z.string().default(""),
    tags: TagsSchema,
  })
  .strict();

export const CoreSchema = z
  .object({
    layers: NameListSchema,
    layerconf: z.string().default(""),
    conf: z.string().default(""),
  })
  .strict();

export const MaintainerSchema = z
  .object({
    name: z.string().min(1),
    email: z.string().optional(),
  })
  .strict();

export const SubproductSchema = z
  .object({
    description: z.string().optional(),
    targets: NameListSchema,
    conf: z.string().default(""),
    deploy_deps: NameListSchema,
    tags: TagsSchema,
  })
  .strict();

export const ProductSchema = z
  .object({
    description: z.string().default(""),
    maintainers: z.array(MaintainerSchema).default([]),
    default_version: z.string().min(1),
    layers: NameListSchema,
    targets: NameListSchema,
    multiconfig_enabled: z.boolean().default(true),
    multiconfigs: NameListSchema,
    subproducts: z.record(z.string().min(1), SubproductSchema).optional(),
    deploy_deps: NameListSchema,
    conf: z.string().default(""),
    tags: TagsSchema,
  })
  .strict();

export const HooksSchema = z
  .object({
    pre_init: z.string().default(""),
    post_init: z.string().default(""),
    env_passthrough_vars: NameListSchema,
  })
  .strict();

export const DefaultsSchema = z
  .object({
    products: z.array(z.string().min(1)).optional(),
    // Deprecated single-product spelling.
    product: z.string().min(1).optional(),
    mode: z.string().min(1).optional(),
    site: z.string().min(1).optional(),
    build_dir: z.string().min(1).optional(),
  })
  .strict();

export const DescriptorSchema = z
  .object({
    version: z.union([z.literal(1), z.literal(2)]),
    project_root: z.string().min(1).default("."),
    cache: z.string().min(1).optional(),
    defaults: DefaultsSchema.default({}),
    hooks: HooksSchema.default({}),
    fetch: FetchSchema.optional(),
    versions: z.record(z.string().min(1), VersionSchema),
    modes: z.record(z.string().min(1), ProfileSchema),
    sites: z.record(z.string().min(1), ProfileSchema),
    core: CoreSchema.default({}),
    products: z.record(z.string().min(1), ProductSchema).default({}),
  })
  .strict();

export type Descriptor = z.infer<typeof DescriptorSchema>;
export type VersionConfig = z.infer<typeof VersionSchema>;
export type LayerCollectionConfig = z.infer<typeof LayerCollectionSchema>;
export type ProfileConfig = z.infer<typeof ProfileSchema>;
export type ProductConfig = z.infer<typeof ProductSchema>;
export type SubproductConfig = z.infer<typeof SubproductSchema>;

// Loaded descriptor with project-relative locations made absolute.
export type ProjectConfig = Descriptor & {
  config_path: string;
  project_root: string;
  cache: string;
};

export function formatDescriptorIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }
    if (issue.code === "invalid_union" && issue.path[0] === "version") {
      return `${location}: Expected one of ${DESCRIPTOR_SCHEMA_VERSIONS.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
