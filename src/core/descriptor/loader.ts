/*
Purpose: read, validate and expand a project descriptor into a ProjectConfig.
Assumptions: structural validation runs on the raw document, expansion runs on string
values only, and referential checks run on the expanded result.
Usage: const config = loadDescriptor("/src/strata.yaml", { env: process.env });
*/

import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";

import { SchemaError, UserFacingError, USER_FACING_ERROR_CODES } from "../errors.js";
import { createExpansionContext, expandDocument, type VariableMap } from "../expand.js";
import { listBuildUnits } from "../units.js";

import {
  CORE_NAME,
  DEFAULT_VERSION,
  DescriptorSchema,
  formatDescriptorIssues,
  type Descriptor,
  type ProjectConfig,
} from "./schema.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export const DEFAULT_CACHE_FILE = ".config.yaml";

export type LoadDescriptorOptions = {
  env: VariableMap;
};

export function loadDescriptor(configPath: string, options: LoadDescriptorOptions): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  const text = readDescriptorText(resolvedPath);
  return parseDescriptor(text, resolvedPath, options);
}

export function parseDescriptor(
  text: string,
  configPath: string,
  options: LoadDescriptorOptions,
): ProjectConfig {
  const raw = parseYamlDocument(text, configPath);

  const structural = DescriptorSchema.safeParse(raw);
  if (!structural.success) {
    throw createSchemaIssuesError(configPath, structural.error.issues);
  }

  // project_root is taken literally, before any expansion.
  const projectRoot = path.resolve(path.dirname(configPath), structural.data.project_root);

  const ctx = createExpansionContext({ env: options.env, projectRoot });
  const expanded = DescriptorSchema.safeParse(expandDocument(raw, ctx));
  if (!expanded.success) {
    throw createSchemaIssuesError(configPath, expanded.error.issues);
  }

  const problems = checkReferences(expanded.data);
  if (problems.length > 0) {
    throw createSchemaError(configPath, problems);
  }

  return {
    ...expanded.data,
    config_path: configPath,
    project_root: projectRoot,
    cache: path.resolve(projectRoot, expanded.data.cache ?? DEFAULT_CACHE_FILE),
  };
}

// =============================================================================
// REFERENTIAL CHECKS
// =============================================================================

export function checkReferences(descriptor: Descriptor): string[] {
  const problems: string[] = [];
  const versions = new Set(Object.keys(descriptor.versions));

  if (Object.hasOwn(descriptor.products, CORE_NAME)) {
    problems.push(`products.${CORE_NAME}: "${CORE_NAME}" is reserved for the base configuration`);
  }
  if (versions.has(DEFAULT_VERSION)) {
    problems.push(`versions.${DEFAULT_VERSION}: "${DEFAULT_VERSION}" is reserved for the default version`);
  }

  for (const [name, product] of Object.entries(descriptor.products)) {
    if (!versions.has(product.default_version)) {
      problems.push(
        `products.${name}.default_version: Unknown version "${product.default_version}"`,
      );
    }

    if (!product.multiconfig_enabled) {
      if (product.multiconfigs.length > 0) {
        problems.push(
          `products.${name}.multiconfigs: Must be empty when multiconfig_enabled is false`,
        );
      }
      if (product.subproducts && Object.keys(product.subproducts).length > 0) {
        problems.push(
          `products.${name}.subproducts: Subproducts require multiconfig_enabled to be true`,
        );
      }
    }
  }

  const seen = new Set<string>();
  const units = listBuildUnits(descriptor);
  for (const unit of units) {
    if (unit.name === CORE_NAME && unit.subproduct !== undefined) {
      problems.push(`products.${unit.product}.subproducts: Unit name "${CORE_NAME}" is reserved`);
    } else if (seen.has(unit.name)) {
      problems.push(`products.${unit.product}: Build unit name "${unit.name}" is declared twice`);
    }
    seen.add(unit.name);
  }

  for (const unit of units) {
    for (const dep of unit.deployDeps) {
      if (!seen.has(dep)) {
        problems.push(`${unit.location}.deploy_deps: Unknown build unit "${dep}"`);
      }
    }
  }

  return problems;
}

// =============================================================================
// INTERNALS
// =============================================================================

function readDescriptorText(configPath: string): string {
  if (!fs.existsSync(configPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.schema,
      title: "Project descriptor missing.",
      message: `Project descriptor not found at ${configPath}.`,
      hint: "Pass --conf <path> or run strata from inside the project tree.",
      cause: new SchemaError(`Descriptor not found at ${configPath}`),
    });
  }

  try {
    return fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.schema,
      title: "Project descriptor unreadable.",
      message: `Failed to read project descriptor at ${configPath}.`,
      hint: "Check the file permissions.",
      cause: new SchemaError(`Failed to read ${configPath}`, err),
    });
  }
}

function parseYamlDocument(text: string, configPath: string): unknown {
  try {
    return parseYaml(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw createSchemaError(configPath, [`<root>: ${err.message}`], err);
    }
    throw err;
  }
}

function createSchemaIssuesError(configPath: string, issues: ZodIssue[]): UserFacingError {
  return createSchemaError(configPath, formatDescriptorIssues(issues));
}

function createSchemaError(configPath: string, problems: string[], cause?: unknown): UserFacingError {
  const detail = problems.join("\n");
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.schema,
    title: "Project descriptor invalid.",
    message: `Invalid descriptor ${configPath}:\n${detail}`,
    hint: `Fix the listed fields, then re-run "strata validate ${configPath}".`,
    cause: new SchemaError(detail, cause),
  });
}
