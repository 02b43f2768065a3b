import { supports } from "../platform/PlatformResolver";
import type { CommandTemplate, FlagBinding, ParamValue, PlatformClass, PlatformVariant, ToolParams } from "../tools/ToolTypes";

export class ValidationError extends Error {
  constructor(readonly missingOption: string) {
    super(`${missingOption} is required`);
    this.name = "ValidationError";
  }
}

export type BuildResult =
  | { ok: true; argv: string[] }
  | { ok: false; error: ValidationError };

function bindingTokens(binding: FlagBinding | undefined): string[] {
  if (!binding) return [];
  switch (binding.kind) {
    case "none":
      return [];
    case "single":
      return [binding.token];
    case "multi":
      return binding.tokens;
  }
}

// Absent, null, '', 0 and false all count as "not set"
function isSet(value: ParamValue | undefined): value is string | number | true {
  return Boolean(value);
}

function readParam(params: ToolParams, key: string): ParamValue | undefined {
  return Object.prototype.hasOwnProperty.call(params, key) ? params[key] : undefined;
}

export function buildArguments(
  template: CommandTemplate,
  variant: PlatformVariant,
  params: ToolParams,
  platform: PlatformClass,
): BuildResult {
  const argv: string[] = [variant.base];

  for (const option of template.options) {
    if (!supports(option.supportedPlatforms, platform)) continue;
    const value = readParam(params, option.id);
    if (!isSet(value)) {
      if (option.required) return { ok: false, error: new ValidationError(option.label) };
      continue;
    }
    const tokens = bindingTokens(
      Object.prototype.hasOwnProperty.call(variant.flags, option.id) ? variant.flags[option.id] : undefined,
    );
    if (tokens.length === 0) continue; // unbound on this platform
    argv.push(...tokens);
    if (option.type === "value") argv.push(String(value));
  }

  if (template.targetOptionId) {
    const target = readParam(params, template.targetOptionId);
    if (isSet(target)) argv.push(String(target));
  }

  return { ok: true, argv };
}
