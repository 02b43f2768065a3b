import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Catalog, CommandTemplate, FlagBinding, OptionSpec, PlatformClass, PlatformVariant } from "./ToolTypes";

export class CatalogError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "CatalogError";
  }
}

const platformSchema = z.enum(["windows", "unix"]);
const flagSchema = z.union([z.string(), z.array(z.string())]);

const variantSchema = z.object({
  base: z.string().min(1),
  flags: z.record(flagSchema).default({}),
});

const optionSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  type: z.string().default("value"),
  required: z.boolean().default(false),
  placeholder: z.string().optional(),
  platforms: z.array(platformSchema).optional(),
});

const templateSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  platforms: z.array(platformSchema).optional(),
  windows: variantSchema.optional(),
  unix: variantSchema.optional(),
  // platform-neutral fallback for whichever of windows/unix is missing
  command: variantSchema.optional(),
  options: z.array(optionSchema).default([]),
  target: z.string().optional(),
});

const catalogSchema = z.record(templateSchema);

type TemplateDocument = z.infer<typeof templateSchema>;
type VariantDocument = z.infer<typeof variantSchema>;

export function toFlagBinding(raw: string | string[] | undefined): FlagBinding {
  if (raw === undefined) return { kind: "none" };
  if (Array.isArray(raw)) return raw.length > 0 ? { kind: "multi", tokens: [...raw] } : { kind: "none" };
  return raw.length > 0 ? { kind: "single", token: raw } : { kind: "none" };
}

function toVariant(doc: VariantDocument): PlatformVariant {
  const flags: Record<string, FlagBinding> = {};
  for (const [optionId, raw] of Object.entries(doc.flags)) flags[optionId] = toFlagBinding(raw);
  return { base: doc.base, flags };
}

function toTemplate(id: string, doc: TemplateDocument): CommandTemplate {
  const variants: Partial<Record<PlatformClass, PlatformVariant>> = {};
  const windows = doc.windows ?? doc.command;
  const unix = doc.unix ?? doc.command;
  if (windows) variants.windows = toVariant(windows);
  if (unix) variants.unix = toVariant(unix);

  const options = doc.options.map((o): OptionSpec => ({
    id: o.id,
    label: o.label ?? o.id,
    type: o.type === "checkbox" ? "checkbox" : "value",
    inputType: o.type,
    required: o.required,
    placeholder: o.placeholder,
    supportedPlatforms: o.platforms,
  }));

  return {
    id,
    name: doc.name,
    description: doc.description,
    supportedPlatforms: doc.platforms,
    variants,
    options,
    targetOptionId: doc.target,
  };
}

export function parseCatalog(text: string, format: "json" | "yaml", source?: string): Catalog {
  let raw: unknown;
  try {
    raw = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (e) {
    throw new CatalogError(`unparsable ${format}: ${e instanceof Error ? e.message : String(e)}`, source);
  }
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new CatalogError(`invalid catalog: ${issues}`, source);
  }
  const catalog: Catalog = {};
  for (const [id, doc] of Object.entries(parsed.data)) catalog[id] = toTemplate(id, doc);
  return catalog;
}

export function resolveCatalogPath(customPath?: string, baseDir = process.cwd()): string | undefined {
  const tryPaths = [
    customPath,
    path.resolve(baseDir, "commands.json"),
    path.resolve(baseDir, "commands.yaml"),
    path.resolve(baseDir, "commands.yml"),
  ].filter((p): p is string => !!p);
  return tryPaths.find(p => fs.existsSync(p));
}

export function loadCatalog(filePath: string): Catalog {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    throw new CatalogError(`cannot read catalog: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }
  return parseCatalog(text, /\.ya?ml$/i.test(filePath) ? "yaml" : "json", filePath);
}
