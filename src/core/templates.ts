import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { EmissionError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactTemplateName = "site.conf" | "bblayers.conf" | "multiconfig.conf" | "env.sh";

export type ArtifactTemplateValues = Record<string, unknown>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderArtifactTemplate(
  name: ArtifactTemplateName,
  values: ArtifactTemplateValues,
): Promise<string> {
  const template = await loadTemplate(name);

  try {
    return template(values);
  } catch (err) {
    throw createTemplateRenderError(name, err);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<ArtifactTemplateName, Handlebars.TemplateDelegate>();
const TEMPLATE_ERROR_CODE = USER_FACING_ERROR_CODES.emission;
const TEMPLATE_INSTALL_HINT = "Reinstall strata; its templates directory is incomplete.";

function createTemplateError(title: string, message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title,
    message,
    hint: TEMPLATE_INSTALL_HINT,
    cause: new EmissionError(message, cause),
  });
}

function createTemplateRenderError(name: ArtifactTemplateName, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Artifact template failed to render.",
    message: `Template "${name}" could not be rendered.`,
    cause: new EmissionError(`Rendering ${name} failed`, cause),
  });
}

async function loadTemplate(name: ArtifactTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(await resolveTemplatesDir(), `${name}.hbs`);
  if (!(await fse.pathExists(templatePath))) {
    throw createTemplateError(
      "Artifact template missing.",
      `Template "${name}" not found at ${templatePath}.`,
    );
  }

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw createTemplateError(
      "Artifact template unreadable.",
      `Failed to read template "${name}" at ${templatePath}.`,
      err,
    );
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw createTemplateError(
      "Artifact template invalid.",
      `Template "${name}" failed to compile.`,
      err,
    );
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

async function resolveTemplatesDir(): Promise<string> {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates");
}

// Walk upward until we find the package root so compiled builds resolve templates too.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw createTemplateError(
    "Artifact templates unavailable.",
    `package.json not found while resolving the templates directory from ${startDir}.`,
  );
}
